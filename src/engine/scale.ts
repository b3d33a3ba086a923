/**
 * Marginal rate scale — progressive bracket math.
 *
 * Each bracket is { threshold, rate }. The ceiling of a bracket is the
 * threshold of the next one; the last bracket is open-ended.
 * Tax = Σ rate_i × (min(value, threshold_{i+1}) − threshold_i) for every
 * bracket whose threshold lies below the value.
 */

import { InvalidScaleError } from './errors'
import type { FloatVector } from './vector'

export interface Bracket {
  threshold: number
  rate: number   // decimal, e.g. 0.3582 for 35.82%
}

export class MarginalRateScale {
  readonly brackets: readonly Bracket[]

  constructor(brackets: readonly Bracket[]) {
    validateBrackets(brackets)
    this.brackets = brackets.map((b) => ({ ...b }))
  }

  /** Build from `[threshold, rate]` pairs. */
  static fromPairs(pairs: readonly (readonly [number, number])[]): MarginalRateScale {
    return new MarginalRateScale(pairs.map(([threshold, rate]) => ({ threshold, rate })))
  }

  calcOne(value: number): number {
    if (value <= 0) return 0

    let tax = 0
    for (let i = 0; i < this.brackets.length; i++) {
      const floor = this.brackets[i].threshold
      const ceiling = i + 1 < this.brackets.length ? this.brackets[i + 1].threshold : Infinity
      if (value <= floor) break
      tax += (Math.min(value, ceiling) - floor) * this.brackets[i].rate
    }
    return tax
  }

  calc(values: FloatVector): FloatVector {
    return values.map((v) => this.calcOne(v))
  }

  /** Rate of the bracket each value falls in (0 for values ≤ 0). */
  marginalRates(values: FloatVector): FloatVector {
    return values.map((v) => {
      if (v <= 0) return 0
      let rate = 0
      for (const bracket of this.brackets) {
        if (v <= bracket.threshold) break
        rate = bracket.rate
      }
      return rate
    })
  }
}

function validateBrackets(brackets: readonly Bracket[]): void {
  if (brackets.length === 0) {
    throw new InvalidScaleError('A scale needs at least one bracket')
  }
  if (brackets[0].threshold !== 0) {
    throw new InvalidScaleError(`First threshold must be 0, got ${brackets[0].threshold}`)
  }
  for (let i = 0; i < brackets.length; i++) {
    const { threshold, rate } = brackets[i]
    if (!Number.isFinite(threshold) || !Number.isFinite(rate)) {
      throw new InvalidScaleError(`Bracket ${i} has a non-finite threshold or rate`)
    }
    if (rate < 0) {
      throw new InvalidScaleError(`Bracket ${i} has a negative rate (${rate})`)
    }
    if (i > 0 && threshold <= brackets[i - 1].threshold) {
      throw new InvalidScaleError(
        `Thresholds must be strictly increasing: ${brackets[i - 1].threshold} then ${threshold}`,
      )
    }
  }
}
