export * from './types.js'
export * from './engine.js'
export * from './orchestrator.js'
