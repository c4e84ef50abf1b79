export * from './types.js'
export * from './validation.js'
export * from './helper.js'
export * from './workflow.js'
export * from './builder.js'
export * from './registry.js'
