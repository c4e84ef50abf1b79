export * from './types.js'
export * from './checkpointStore.js'
export * from './in_memory_checkpoint.js'
