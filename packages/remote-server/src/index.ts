export * from './server.js'
export * from './middlewares/index.js'
export * from './schemas/index.js'
export { openapiDoc } from './swagger/index.js'
