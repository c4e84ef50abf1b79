import type { StateRecord } from './state.js'

/** Target that finishes the thread. */
export const END = '__end__'
export type EdgeTarget = string

export interface DirectEdge {
  kind: 'direct'
  from: string
  to: EdgeTarget
}

export interface Branch<S extends StateRecord> {
  to: EdgeTarget
  when: (state: Readonly<S>) => boolean
  /** Shown in diagrams; defaults to the target name. */
  label?: string
}

export interface ConditionalEdge<S extends StateRecord> {
  kind: 'conditional'
  from: string
  branches: ReadonlyArray<Branch<S>>
  default?: EdgeTarget
}

export type EdgeDef<S extends StateRecord> = DirectEdge | ConditionalEdge<S>

export class EdgeDefClass<S extends StateRecord> {
  constructor(protected edgeDef: EdgeDef<S>) {}

  getFrom(): string {
    return this.edgeDef.from
  }

  /** Every target this edge can select, in declared order. */
  getTargets(): EdgeTarget[] {
    if (this.edgeDef.kind === 'direct') return [this.edgeDef.to]
    const targets = this.edgeDef.branches.map((b) => b.to)
    if (this.edgeDef.default !== undefined) targets.push(this.edgeDef.default)
    return targets
  }

  isConditional(): boolean {
    return this.edgeDef.kind === 'conditional'
  }

  getAll(): EdgeDef<S> {
    return this.edgeDef
  }
}
