/**
 * Parameter store — time-versioned legislation values.
 *
 * Formulas receive `parameters(period)` and read the tree that was in force
 * at the start of that period. Leaves are numbers or marginal rate scales.
 */

import { UnknownParameterError } from './errors'
import type { Period } from './period'
import { MarginalRateScale } from './scale'

export type ParameterAccessor<P> = (period: Period) => P

export interface ParameterStore<P> {
  at: (period: Period) => P
}

export interface ParameterVersion<P> {
  /** First period the values apply to (inclusive). */
  from: Period
  values: P
}

export class VersionedParameters<P> implements ParameterStore<P> {
  private readonly versions: readonly ParameterVersion<P>[]

  constructor(versions: readonly ParameterVersion<P>[]) {
    this.versions = [...versions].sort((a, b) => startIndex(a.from) - startIndex(b.from))
  }

  at(period: Period): P {
    const start = startIndex(period)
    let match: ParameterVersion<P> | undefined
    for (const version of this.versions) {
      if (startIndex(version.from) > start) break
      match = version
    }
    if (!match) {
      const first = this.versions[0]?.from.toString() ?? 'none'
      throw new UnknownParameterError(
        `No parameters in force for ${period.toString()} (first version starts ${first})`,
      )
    }
    return match.values
  }

  /** Start periods of all versions, oldest first. */
  versionStarts(): Period[] {
    return this.versions.map((v) => v.from)
  }
}

function startIndex(period: Period): number {
  return period.year * 12 + (period.month - 1)
}

// ── Dotted-path access ───────────────────────────────────────────

export type ParameterValue = number | MarginalRateScale

/**
 * Resolve a dotted path such as `taxes.income_tax_brackets` in a tree.
 * Throws UnknownParameterError when a segment is missing or the path stops
 * at a subtree instead of a leaf.
 */
export function getParameter(tree: object, path: string): ParameterValue {
  let node: unknown = tree
  for (const segment of path.split('.')) {
    node = childOf(node, segment)
    if (node === undefined) {
      throw new UnknownParameterError(`Unknown parameter "${path}" (missing "${segment}")`)
    }
  }
  if (typeof node === 'number' || node instanceof MarginalRateScale) return node
  throw new UnknownParameterError(`Parameter "${path}" is a subtree, not a value`)
}

function childOf(node: unknown, key: string): unknown {
  if (typeof node !== 'object' || node === null || node instanceof MarginalRateScale) {
    return undefined
  }
  return Object.entries(node).find(([k]) => k === key)?.[1]
}

// ── JSON view ────────────────────────────────────────────────────

export type ParameterJson =
  | number
  | { brackets: { threshold: number; rate: number }[] }
  | { [key: string]: ParameterJson }

/** Plain JSON rendering of a parameter tree, scales as bracket lists. */
export function describeParameters(node: unknown): ParameterJson {
  if (typeof node === 'number') return node
  if (node instanceof MarginalRateScale) {
    return { brackets: node.brackets.map((b) => ({ threshold: b.threshold, rate: b.rate })) }
  }
  const out: { [key: string]: ParameterJson } = {}
  if (typeof node === 'object' && node !== null) {
    for (const [key, value] of Object.entries(node)) {
      out[key] = describeParameters(value)
    }
  }
  return out
}
