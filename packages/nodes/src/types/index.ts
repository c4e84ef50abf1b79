export * from './state.js'
export * from './node.js'
export * from './edge.js'
export * from './interrupt.js'
