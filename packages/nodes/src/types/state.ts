import { z } from 'zod'
import { StateValidationError } from '../errors.js'

export type StateRecord = Record<string, unknown>

/** Keys of `S` whose values are arrays; only these may be declared append-only. */
export type AppendableKeys<S> = {
  [K in keyof S]-?: NonNullable<S[K]> extends ReadonlyArray<unknown> ? K : never
}[keyof S] &
  string

export type StateUpdate<S extends StateRecord> = Partial<S>

/**
 * Typed state record for one workflow. Fields are overwritten by later writers
 * unless declared append-only, in which case updates are concatenated.
 */
export class StateSchema<S extends StateRecord> {
  private readonly appendOnly: ReadonlySet<string>

  constructor(
    private readonly schema: z.ZodType<S>,
    appendOnly: ReadonlyArray<AppendableKeys<S>> = [],
  ) {
    this.appendOnly = new Set(appendOnly)
  }

  public appendOnlyFields(): string[] {
    return Array.from(this.appendOnly)
  }

  public isAppendOnly(field: string): boolean {
    return this.appendOnly.has(field)
  }

  /** Builds the first state of a thread from the caller's payload. */
  public initialize(input: unknown): S {
    return this.parse(input ?? {}, 'initial input does not match the workflow state')
  }

  public parse(value: unknown, message = 'state does not match the workflow schema'): S {
    const result = this.schema.safeParse(value)
    if (!result.success) {
      throw new StateValidationError(message, {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.map(String).join('.'),
          message: issue.message,
          code: issue.code,
        })),
      })
    }
    return result.data
  }

  public merge(state: Readonly<S>, update: Readonly<Partial<S>> | Readonly<StateRecord>): S {
    const next: StateRecord = Object.fromEntries(Object.entries(state))

    for (const [key, value] of Object.entries(update)) {
      if (value === undefined) continue

      if (this.appendOnly.has(key)) {
        const prev = next[key]
        const existing = Array.isArray(prev) ? prev : []
        const incoming: unknown[] = Array.isArray(value) ? value : [value]
        next[key] = [...existing, ...incoming]
      } else {
        next[key] = value
      }
    }

    return this.parse(next, 'state update does not match the workflow schema')
  }
}
