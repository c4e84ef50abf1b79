import { v4 as uuidv4 } from 'uuid'
import { NotFoundError, StateRecord, WorkflowMismatchError } from '@threadgraph/nodes'
import { WorkflowDescriptionType, WorkflowRegistry } from '@threadgraph/workflow'
import { CheckpointStore, CheckpointType } from '@threadgraph/checkpoint'
import { Logger, makeLogger } from '@threadgraph/logger'
import { ListOptions, ListResult } from '@threadgraph/utils'
import { ExecutionEngine } from './engine.js'
import { EngineOptions, ExecutionResultType, ThreadSnapshotType, toSnapshot } from './types.js'

export interface StartOptions {
  /** Use this id instead of generating one. */
  threadId?: string
}

/** Entry point for callers: resolves workflows, threads and runs. */
export class Orchestrator {
  private readonly logger: Logger
  private readonly engine: ExecutionEngine

  constructor(
    private readonly registry: WorkflowRegistry,
    private readonly store: CheckpointStore,
    options: EngineOptions = {},
  ) {
    this.logger = makeLogger('Orchestrator')
    this.engine = new ExecutionEngine(store, options)
  }

  public async start(
    workflowName: string,
    input: unknown = {},
    options: StartOptions = {},
  ): Promise<ExecutionResultType> {
    const workflow = this.registry.resolve(workflowName)
    const threadId = options.threadId ?? uuidv4()
    this.logger.info('starting workflow', { workflowName, threadId })
    return this.engine.run(workflow, threadId, input)
  }

  /** Resumes a thread; `input` is the resume signal, merged into state. */
  public async continue(
    workflowName: string,
    threadId: string,
    input?: StateRecord,
  ): Promise<ExecutionResultType> {
    const workflow = this.registry.resolve(workflowName)
    await this.loadBound(workflowName, threadId)
    this.logger.info('continuing workflow', { workflowName, threadId, withInput: !!input })
    return this.engine.run(workflow, threadId, undefined, input)
  }

  public async getState(threadId: string): Promise<ThreadSnapshotType> {
    const cp = await this.store.load(threadId)
    if (!cp) throw NotFoundError.thread(threadId)
    return toSnapshot(cp)
  }

  public async getWorkflowState(workflowName: string, threadId: string): Promise<ThreadSnapshotType> {
    this.registry.resolve(workflowName)
    return toSnapshot(await this.loadBound(workflowName, threadId))
  }

  public listAvailableWorkflows(): string[] {
    return this.registry.list()
  }

  public describeWorkflow(workflowName: string): WorkflowDescriptionType & { name: string } {
    const { name, definition } = this.registry.resolve(workflowName)
    return { name, ...definition.describe() }
  }

  public async getHistory(
    workflowName: string,
    threadId: string,
    options?: ListOptions,
  ): Promise<ListResult<ThreadSnapshotType>> {
    this.registry.resolve(workflowName)
    await this.loadBound(workflowName, threadId)
    const page = await this.store.history(threadId, options)
    return { items: page.items.map(toSnapshot), nextCursor: page.nextCursor }
  }

  public async listThreads(options?: ListOptions): Promise<ListResult<ThreadSnapshotType>> {
    const page = await this.store.list(options)
    return { items: page.items.map(toSnapshot), nextCursor: page.nextCursor }
  }

  private async loadBound(workflowName: string, threadId: string): Promise<CheckpointType> {
    const cp = await this.store.load(threadId)
    if (!cp) throw NotFoundError.thread(threadId)
    if (cp.workflowName !== workflowName) {
      throw new WorkflowMismatchError(threadId, cp.workflowName, workflowName)
    }
    return cp
  }
}
