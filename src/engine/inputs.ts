/**
 * InputStore — caller-supplied values for formula-less variables.
 *
 * Values are keyed by (variable, period) and hold one entry per entity of
 * the variable's entity kind. An optional presence mask marks which
 * entities actually supplied a value; the others fall back to the default
 * (or to a divided year input, see Simulation).
 */

import type { EnumArray } from './enums'
import { InvalidInputError } from './errors'
import { Period } from './period'
import type { FloatVector } from './vector'

export type RawInput =
  | FloatVector
  | EnumArray
  | readonly number[]
  | readonly boolean[]
  | readonly string[]

export interface InputEntry {
  values: RawInput
  present?: readonly boolean[]
}

export interface InputRecord {
  variable: string
  period: Period
  entry: InputEntry
}

export class InputStore {
  private readonly entries = new Map<string, Map<string, { period: Period; entry: InputEntry }>>()

  set(variable: string, period: Period | string, values: RawInput, present?: readonly boolean[]): this {
    const p = typeof period === 'string' ? Period.parse(period) : period
    if (present && present.length !== values.length) {
      throw new InvalidInputError(
        `Presence mask for "${variable}" at ${p.toString()} has ${present.length} entries, values have ${values.length}`,
      )
    }
    let byPeriod = this.entries.get(variable)
    if (!byPeriod) {
      byPeriod = new Map()
      this.entries.set(variable, byPeriod)
    }
    byPeriod.set(p.toString(), { period: p, entry: present ? { values, present } : { values } })
    return this
  }

  get(variable: string, period: Period): InputEntry | undefined {
    return this.entries.get(variable)?.get(period.toString())?.entry
  }

  has(variable: string, period: Period): boolean {
    return this.get(variable, period) !== undefined
  }

  get size(): number {
    let n = 0
    for (const byPeriod of this.entries.values()) n += byPeriod.size
    return n
  }

  *[Symbol.iterator](): IterableIterator<InputRecord> {
    for (const [variable, byPeriod] of this.entries) {
      for (const { period, entry } of byPeriod.values()) {
        yield { variable, period, entry }
      }
    }
  }
}
