/**
 * Closed enumerations and their vector form.
 *
 * An EnumArray stores one index per entity into its type's symbol list, so
 * comparisons against a symbol stay elementwise.
 */

import { UnknownSymbolError } from './errors'

export class EnumType<S extends string = string> {
  readonly symbols: readonly S[]
  readonly defaultSymbol: S
  readonly labels: Readonly<Partial<Record<S, string>>>

  constructor(
    readonly name: string,
    symbols: readonly S[],
    defaultSymbol: S,
    labels: Partial<Record<S, string>> = {},
  ) {
    if (symbols.length === 0) {
      throw new Error(`Enum ${name} must declare at least one symbol`)
    }
    if (new Set(symbols).size !== symbols.length) {
      throw new Error(`Enum ${name} declares a symbol twice`)
    }
    this.symbols = [...symbols]
    this.labels = { ...labels }
    this.defaultSymbol = defaultSymbol
    // Validated last so the error message can list the symbols.
    this.indexOf(defaultSymbol)
  }

  has(symbol: string): symbol is S {
    return this.symbols.some((s) => s === symbol)
  }

  indexOf(symbol: string): number {
    const index = this.symbols.findIndex((s) => s === symbol)
    if (index < 0) throw new UnknownSymbolError(this.name, symbol, this.symbols)
    return index
  }

  encode(values: readonly string[]): EnumArray {
    const indices = new Uint16Array(values.length)
    values.forEach((value, i) => {
      indices[i] = this.indexOf(value)
    })
    return new EnumArray(this, indices)
  }

  /** A vector of `length` copies of the default symbol. */
  filled(length: number, symbol: string = this.defaultSymbol): EnumArray {
    return new EnumArray(this, new Uint16Array(length).fill(this.indexOf(symbol)))
  }
}

export class EnumArray {
  constructor(
    readonly type: EnumType,
    readonly indices: Uint16Array,
  ) {}

  get length(): number {
    return this.indices.length
  }

  eq(symbol: string): boolean[] {
    const index = this.type.indexOf(symbol)
    return Array.from(this.indices, (i) => i === index)
  }

  ne(symbol: string): boolean[] {
    return this.eq(symbol).map((b) => !b)
  }

  /** True where the value is any of `symbols`. */
  isIn(...symbols: string[]): boolean[] {
    const wanted = new Set(symbols.map((s) => this.type.indexOf(s)))
    return Array.from(this.indices, (i) => wanted.has(i))
  }

  at(i: number): string {
    const symbol = this.type.symbols[this.indices[i]]
    if (symbol === undefined) throw new RangeError(`Index ${i} out of range`)
    return symbol
  }

  decode(): string[] {
    return Array.from(this.indices, (_, i) => this.at(i))
  }

  /** Pick the values at the given entity positions (used for broadcasting). */
  take(positions: readonly number[]): EnumArray {
    return new EnumArray(this.type, Uint16Array.from(positions, (p) => this.indices[p]))
  }
}
