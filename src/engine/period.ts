/**
 * Period — a month or a calendar year.
 *
 * A year period always starts in January and spans 12 months. Periods are
 * immutable; compare them with `equals`, not `===`.
 *
 *   Period.parse('2025')     → year 2025
 *   Period.parse('2025-03')  → March 2025
 */

import { InvalidPeriodError } from './errors'

export type PeriodUnit = 'month' | 'year'

const KEY_PATTERN = /^(\d{4})(?:-(\d{2}))?$/

export class Period {
  private constructor(
    readonly unit: PeriodUnit,
    readonly year: number,
    readonly month: number,
  ) {}

  static month(year: number, month: number): Period {
    assertYear(year)
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new InvalidPeriodError(`Month must be an integer in 1..12, got ${month}`)
    }
    return new Period('month', year, month)
  }

  static year(year: number): Period {
    assertYear(year)
    return new Period('year', year, 1)
  }

  static parse(key: string): Period {
    const match = KEY_PATTERN.exec(key)
    if (!match) {
      throw new InvalidPeriodError(`Cannot parse period "${key}" (expected YYYY or YYYY-MM)`)
    }
    const year = Number(match[1])
    return match[2] === undefined ? Period.year(year) : Period.month(year, Number(match[2]))
  }

  /** Number of months spanned. */
  get size(): number {
    return this.unit === 'year' ? 12 : 1
  }

  get firstMonth(): Period {
    return this.unit === 'month' ? this : Period.month(this.year, 1)
  }

  get thisYear(): Period {
    return this.unit === 'year' ? this : Period.year(this.year)
  }

  /** The months covered by this period, in calendar order. */
  months(): Period[] {
    if (this.unit === 'month') return [this]
    const months: Period[] = []
    for (let m = 1; m <= 12; m++) {
      months.push(Period.month(this.year, m))
    }
    return months
  }

  contains(other: Period): boolean {
    if (this.unit === 'month') return this.equals(other)
    return other.year === this.year
  }

  equals(other: Period): boolean {
    return this.unit === other.unit && this.year === other.year && this.month === other.month
  }

  toString(): string {
    const year = String(this.year).padStart(4, '0')
    if (this.unit === 'year') return year
    return `${year}-${String(this.month).padStart(2, '0')}`
  }
}

function assertYear(year: number): void {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new InvalidPeriodError(`Year must be an integer in 1..9999, got ${year}`)
  }
}
