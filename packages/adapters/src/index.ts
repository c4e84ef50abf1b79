export * from './checkpoint_store.js'
export * from './config/postgres_cfg.js'
export * as dbSchema from './db/schema/checkpoints.js'
