/**
 * Elementwise helpers over entity vectors.
 *
 * Float quantities are Float64Arrays, booleans are plain arrays. Every binary
 * helper accepts a scalar in place of either operand and broadcasts it.
 */

import { EnumArray } from './enums'

export type FloatVector = Float64Array
export type BoolVector = readonly boolean[]
export type Vector = FloatVector | BoolVector | EnumArray

type Operand = FloatVector | number
type BoolOperand = BoolVector | boolean

function lengthOf(...operands: (Operand | BoolOperand)[]): number {
  let length = -1
  for (const op of operands) {
    if (typeof op === 'number' || typeof op === 'boolean') continue
    if (length >= 0 && op.length !== length) {
      throw new RangeError(`Vector length mismatch: ${length} vs ${op.length}`)
    }
    length = op.length
  }
  if (length < 0) throw new RangeError('At least one operand must be a vector')
  return length
}

function valueAt(op: Operand, i: number): number {
  return typeof op === 'number' ? op : op[i]
}

function boolAt(op: BoolOperand, i: number): boolean {
  return typeof op === 'boolean' ? op : op[i]
}

function map2(a: Operand, b: Operand, fn: (x: number, y: number) => number): FloatVector {
  const n = lengthOf(a, b)
  const out = new Float64Array(n)
  for (let i = 0; i < n; i++) out[i] = fn(valueAt(a, i), valueAt(b, i))
  return out
}

// ── Construction ─────────────────────────────────────────────────

export function zeros(length: number): FloatVector {
  return new Float64Array(length)
}

export function filled(length: number, value: number): FloatVector {
  return new Float64Array(length).fill(value)
}

export function falses(length: number): boolean[] {
  return new Array<boolean>(length).fill(false)
}

/** 1 where true, 0 where false. */
export function toFloat(values: BoolVector): FloatVector {
  return Float64Array.from(values, (b) => (b ? 1 : 0))
}

// ── Arithmetic ───────────────────────────────────────────────────

export function add(...operands: Operand[]): FloatVector {
  const n = lengthOf(...operands)
  const out = new Float64Array(n)
  for (const op of operands) {
    for (let i = 0; i < n; i++) out[i] += valueAt(op, i)
  }
  return out
}

export function sub(a: Operand, b: Operand): FloatVector {
  return map2(a, b, (x, y) => x - y)
}

export function mul(a: Operand, b: Operand): FloatVector {
  return map2(a, b, (x, y) => x * y)
}

export function div(a: Operand, b: Operand): FloatVector {
  return map2(a, b, (x, y) => x / y)
}

export function maximum(a: Operand, b: Operand): FloatVector {
  return map2(a, b, Math.max)
}

export function minimum(a: Operand, b: Operand): FloatVector {
  return map2(a, b, Math.min)
}

// ── Comparison & selection ───────────────────────────────────────

export function gte(a: Operand, b: Operand): boolean[] {
  const n = lengthOf(a, b)
  const out = new Array<boolean>(n)
  for (let i = 0; i < n; i++) out[i] = valueAt(a, i) >= valueAt(b, i)
  return out
}

export function gt(a: Operand, b: Operand): boolean[] {
  const n = lengthOf(a, b)
  const out = new Array<boolean>(n)
  for (let i = 0; i < n; i++) out[i] = valueAt(a, i) > valueAt(b, i)
  return out
}

export function or(a: BoolOperand, b: BoolOperand): boolean[] {
  const n = lengthOf(a, b)
  return Array.from({ length: n }, (_, i) => boolAt(a, i) || boolAt(b, i))
}

export function and(a: BoolOperand, b: BoolOperand): boolean[] {
  const n = lengthOf(a, b)
  return Array.from({ length: n }, (_, i) => boolAt(a, i) && boolAt(b, i))
}

export function not(a: BoolVector): boolean[] {
  return a.map((b) => !b)
}

/** `whenTrue[i]` where `condition[i]`, otherwise `whenFalse[i]`. */
export function where(condition: BoolVector, whenTrue: Operand, whenFalse: Operand): FloatVector {
  const n = lengthOf(condition, whenTrue, whenFalse)
  const out = new Float64Array(n)
  for (let i = 0; i < n; i++) {
    out[i] = condition[i] ? valueAt(whenTrue, i) : valueAt(whenFalse, i)
  }
  return out
}

// ── Plain values ─────────────────────────────────────────────────

export type PlainValue = number | boolean | string

/** JSON-friendly copy: numbers, booleans, or enum symbols. */
export function toPlain(values: Vector): PlainValue[] {
  if (values instanceof EnumArray) return values.decode()
  if (values instanceof Float64Array) return Array.from(values)
  return [...values]
}

/** A copy the caller may write to without touching the original. */
export function copyVector(values: Vector): Vector {
  if (values instanceof EnumArray) return new EnumArray(values.type, values.indices.slice())
  if (values instanceof Float64Array) return values.slice()
  return [...values]
}
