import { CheckpointStore, InMemoryCheckpointStore } from '@threadgraph/checkpoint'
import { PostgresCheckpointStore, getPostgresUrl } from '@threadgraph/adapters'
import { createRegistry } from '@threadgraph/catalog'
import { Orchestrator } from '@threadgraph/engine'
import { errorMeta, makeLogger } from '@threadgraph/logger'
import { AppConfig, postgresEnv } from './config.js'

const logger = makeLogger('threadgraph')

export type StoreKind = AppConfig['DATABASE_TYPE']

export interface SelectedStore {
  kind: StoreKind
  store: CheckpointStore
  close(): Promise<void>
}

function inMemory(config: AppConfig): SelectedStore {
  return {
    kind: 'inmemory',
    store: new InMemoryCheckpointStore({ lockTtlMs: config.THREAD_LOCK_TTL_MS }),
    close: async () => undefined,
  }
}

/**
 * Picks the store named by DATABASE_TYPE. A postgres store that cannot be
 * configured or set up is replaced by the in-memory one, with a warning.
 */
export async function selectCheckpointStore(config: AppConfig): Promise<SelectedStore> {
  if (config.DATABASE_TYPE === 'inmemory') return inMemory(config)

  let store: PostgresCheckpointStore | undefined
  try {
    store = new PostgresCheckpointStore({
      postgresUrl: getPostgresUrl(postgresEnv(config)),
      maxRetries: config.DB_MAX_RETRIES,
      retryDelayMs: config.DB_RETRY_DELAY_MS,
      lockTtlMs: config.THREAD_LOCK_TTL_MS,
    })
    await store.setup()
    const ready = store
    return { kind: 'postgres', store: ready, close: () => ready.close() }
  } catch (err) {
    logger.warn('postgres checkpoint store unavailable, falling back to memory', errorMeta(err))
    if (store) {
      await store.close().catch((closeErr: unknown) =>
        logger.warn('failed to close postgres pool', errorMeta(closeErr)),
      )
    }
    return inMemory(config)
  }
}

export interface Runtime {
  orchestrator: Orchestrator
  storeKind: StoreKind
  close(): Promise<void>
}

export async function createRuntime(config: AppConfig): Promise<Runtime> {
  const selected = await selectCheckpointStore(config)
  const orchestrator = new Orchestrator(createRegistry(), selected.store, {
    maxSteps: config.ENGINE_MAX_STEPS,
  })
  logger.info('runtime ready', {
    store: selected.kind,
    workflows: orchestrator.listAvailableWorkflows(),
  })
  return { orchestrator, storeKind: selected.kind, close: () => selected.close() }
}
