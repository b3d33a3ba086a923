/**
 * Simulation — one calculation run over one population.
 *
 * Resolves (variable, period) requests recursively: a formula reads its
 * dependencies through entity views that call back into the same
 * simulation, so every value is computed at most once per run. The cache,
 * the pending stack and the trace are private to the run; the system is
 * shared read-only.
 */

import { EnumArray } from './enums'
import {
  CyclicDependencyError,
  InvalidInputError,
  PeriodMismatchError,
  ValueTypeMismatchError,
} from './errors'
import { InputStore } from './inputs'
import type { InputEntry, RawInput } from './inputs'
import type { ParameterAccessor } from './parameters'
import type { Period } from './period'
import type { Population } from './population'
import type { VariableDefinition } from './registry'
import type { TaxBenefitSystem } from './system'
import { Tracer } from './trace'
import type { TraceNode } from './trace'
import { add, copyVector, div, filled, toPlain } from './vector'
import type { BoolVector, FloatVector, Vector } from './vector'
import { HouseholdView, PersonView } from './views'

/**
 * How to bridge a unit mismatch between the request and the variable:
 * - `add`: a monthly variable requested for a year is summed over its months
 * - `divide`: a yearly variable requested for a month is divided by 12
 */
export type CalculationOption = 'add' | 'divide'

export interface SimulationOptions {
  trace?: boolean
}

interface NormalizedInput {
  values: Vector
  present?: readonly boolean[]
}

export class Simulation<P> {
  private readonly cache = new Map<string, Vector>()
  private readonly pending: string[] = []
  private readonly normalizedInputs = new Map<string, NormalizedInput>()
  private readonly tracer: Tracer | null
  private readonly parameterAccessor: ParameterAccessor<P>
  private readonly personView: PersonView<P>
  private readonly householdView: HouseholdView<P>

  constructor(
    readonly system: TaxBenefitSystem<P>,
    readonly population: Population,
    readonly inputs: InputStore = new InputStore(),
    options: SimulationOptions = {},
  ) {
    system.variables.freeze()
    this.tracer = options.trace ? new Tracer() : null
    this.parameterAccessor = (period) => system.parameters.at(period)
    this.personView = new PersonView(this)
    this.householdView = new HouseholdView(this)
    this.loadInputs()
  }

  // ── Public API ─────────────────────────────────────────────────

  calculate(name: string, period: Period, option?: CalculationOption): Vector {
    const definition = this.system.variables.get(name)

    // The cached vector stays private to the run.
    if (period.unit === definition.definitionPeriod) {
      return copyVector(this.resolve(definition, period))
    }
    if (option === 'add' && definition.definitionPeriod === 'month') {
      const months = period.months().map((month) => this.asFloat(name, this.resolve(definition, month)))
      return add(...months)
    }
    if (option === 'divide' && definition.definitionPeriod === 'year') {
      return div(this.asFloat(name, this.resolve(definition, period.thisYear)), 12)
    }
    throw new PeriodMismatchError(
      `"${name}" is defined per ${definition.definitionPeriod} but was requested for ${period.unit} ${period.toString()}` +
        (option ? ` with option "${option}"` : ''),
    )
  }

  calculateFloat(name: string, period: Period, option?: CalculationOption): FloatVector {
    this.expectType(name, 'float')
    return this.asFloat(name, this.calculate(name, period, option))
  }

  calculateBool(name: string, period: Period): BoolVector {
    this.expectType(name, 'bool')
    const values = this.calculate(name, period)
    if (values instanceof Float64Array || values instanceof EnumArray) {
      throw new ValueTypeMismatchError(`"${name}" did not produce booleans`)
    }
    return values
  }

  calculateEnum(name: string, period: Period): EnumArray {
    this.expectType(name, 'enum')
    const values = this.calculate(name, period)
    if (!(values instanceof EnumArray)) {
      throw new ValueTypeMismatchError(`"${name}" did not produce enum values`)
    }
    return values
  }

  /**
   * The trace of a request, computing it first if needed. A request bridged
   * by an option gets a node of its own over the periods it combined.
   */
  trace(name: string, period: Period, option?: CalculationOption): TraceNode {
    if (!this.tracer) throw new Error('Tracing is disabled for this simulation')
    const values = this.calculate(name, period, option)
    const definition = this.system.variables.get(name)
    if (period.unit === definition.definitionPeriod) return this.tracedNode(name, period)

    const parts = definition.definitionPeriod === 'month' ? period.months() : [period.thisYear]
    return {
      variable: name,
      period: period.toString(),
      entity: definition.entity,
      label: definition.label,
      source: 'formula',
      value: toPlain(values),
      dependencies: parts.map((part) => this.tracedNode(name, part)),
    }
  }

  get cacheSize(): number {
    return this.cache.size
  }

  // ── Resolution ─────────────────────────────────────────────────

  private tracedNode(name: string, period: Period): TraceNode {
    const node = this.tracer?.find(name, period)
    if (!node) throw new Error(`No trace recorded for ${name}@${period.toString()}`)
    return node
  }

  private resolve(definition: VariableDefinition<P>, period: Period): Vector {
    const key = `${definition.name}@${period.toString()}`

    const cached = this.cache.get(key)
    if (cached) {
      this.tracer?.cached(definition, period, cached)
      return cached
    }

    const pendingAt = this.pending.indexOf(key)
    if (pendingAt >= 0) {
      throw new CyclicDependencyError([...this.pending.slice(pendingAt), key])
    }

    this.pending.push(key)
    const node = this.tracer?.enter(definition, period)
    try {
      const values = definition.formula
        ? this.runFormula(definition, period)
        : this.readInput(definition, period)
      this.checkResult(definition, values)
      this.cache.set(key, values)
      if (node) {
        const source = definition.formula ? 'formula' : this.inputSource(definition, period)
        this.tracer?.complete(node, values, source)
      }
      return values
    } finally {
      this.pending.pop()
      if (node) this.tracer?.leave()
    }
  }

  private runFormula(definition: VariableDefinition<P>, period: Period): Vector {
    if (definition.entity === 'person') {
      const formula = definition.formula
      if (formula) return formula(this.personView, period, this.parameterAccessor)
    } else {
      const formula = definition.formula
      if (formula) return formula(this.householdView, period, this.parameterAccessor)
    }
    throw new Error(`"${definition.name}" has no formula`)
  }

  private checkResult(definition: VariableDefinition<P>, values: Vector): void {
    const expected = this.population.count(definition.entity)
    if (values.length !== expected) {
      throw new InvalidInputError(
        `"${definition.name}" produced ${values.length} values for ${expected} ${definition.entity} entities`,
      )
    }
    const actual =
      values instanceof Float64Array ? 'float' :
      values instanceof EnumArray ? 'enum' :
      'bool'
    if (actual !== definition.valueType) {
      throw new ValueTypeMismatchError(
        `"${definition.name}" is a ${definition.valueType} variable but produced ${actual} values`,
      )
    }
  }

  // ── Inputs ─────────────────────────────────────────────────────

  /**
   * Month inputs win over a divided year input for the same entity;
   * entities with neither get the default.
   */
  private readInput(definition: VariableDefinition<P>, period: Period): Vector {
    let values = defaultVector(definition, this.population.count(definition.entity))

    if (definition.definitionPeriod === 'month') {
      const yearly = this.normalizedInputs.get(inputKey(definition.name, period.thisYear))
      if (yearly) {
        values = overlay(values, div(this.asFloat(definition.name, yearly.values), 12), yearly.present)
      }
    }

    const exact = this.normalizedInputs.get(inputKey(definition.name, period))
    if (exact) values = overlay(values, exact.values, exact.present)

    return values
  }

  private inputSource(definition: VariableDefinition<P>, period: Period): 'input' | 'default' {
    const supplied =
      this.normalizedInputs.has(inputKey(definition.name, period)) ||
      (definition.definitionPeriod === 'month' &&
        this.normalizedInputs.has(inputKey(definition.name, period.thisYear)))
    return supplied ? 'input' : 'default'
  }

  /** Validate every supplied input up front so a bad run fails before any formula runs. */
  private loadInputs(): void {
    for (const { variable, period, entry } of this.inputs) {
      const definition = this.system.variables.get(variable)

      if (definition.formula) {
        throw new InvalidInputError(
          `"${variable}" is computed by a formula and cannot be supplied as an input`,
        )
      }
      if (period.unit !== definition.definitionPeriod) {
        const divisible =
          definition.definitionPeriod === 'month' && definition.setInput === 'divide_by_period'
        if (!divisible) {
          throw new PeriodMismatchError(
            `"${variable}" is defined per ${definition.definitionPeriod}; an input for ${period.toString()} cannot be used`,
          )
        }
      }

      const expected = this.population.count(definition.entity)
      if (entry.values.length !== expected) {
        throw new InvalidInputError(
          `Input "${variable}" at ${period.toString()} has ${entry.values.length} values for ${expected} ${definition.entity} entities`,
        )
      }

      this.normalizedInputs.set(inputKey(variable, period), normalizeInput(definition, entry))
    }
  }

  // ── Helpers ────────────────────────────────────────────────────

  private expectType(name: string, valueType: 'float' | 'bool' | 'enum'): void {
    const definition = this.system.variables.get(name)
    if (definition.valueType !== valueType) {
      throw new ValueTypeMismatchError(
        `"${name}" is a ${definition.valueType} variable, read as ${valueType}`,
      )
    }
  }

  private asFloat(name: string, values: Vector): FloatVector {
    if (!(values instanceof Float64Array)) {
      throw new ValueTypeMismatchError(`"${name}" is not numeric`)
    }
    return values
  }
}

/** One-shot evaluation with a fresh cache. */
export function evaluate<P>(
  system: TaxBenefitSystem<P>,
  name: string,
  period: Period,
  population: Population,
  inputs: InputStore = new InputStore(),
): Vector {
  return new Simulation(system, population, inputs).calculate(name, period)
}

function inputKey(name: string, period: Period): string {
  return `${name}@${period.toString()}`
}

function defaultVector<P>(definition: VariableDefinition<P>, length: number): Vector {
  switch (definition.valueType) {
    case 'float':
      return filled(length, definition.defaultValue ?? 0)
    case 'bool':
      return new Array<boolean>(length).fill(definition.defaultValue ?? false)
    case 'enum': {
      const type = definition.possibleValues
      if (!type) throw new Error(`Enum variable "${definition.name}" has no possibleValues`)
      return type.filled(length, definition.defaultValue ?? type.defaultSymbol)
    }
  }
}

function normalizeInput<P>(definition: VariableDefinition<P>, entry: InputEntry): NormalizedInput {
  const values = toVector(definition, entry.values)
  return entry.present ? { values, present: entry.present } : { values }
}

function toVector<P>(definition: VariableDefinition<P>, raw: RawInput): Vector {
  const mismatch = () =>
    new ValueTypeMismatchError(`Input for "${definition.name}" does not hold ${definition.valueType} values`)

  switch (definition.valueType) {
    case 'float':
      if (raw instanceof Float64Array) return raw
      if (raw instanceof EnumArray || !isNumberArray(raw)) throw mismatch()
      return Float64Array.from(raw)
    case 'bool':
      if (raw instanceof Float64Array || raw instanceof EnumArray || !isBooleanArray(raw)) throw mismatch()
      return [...raw]
    case 'enum': {
      const type = definition.possibleValues
      if (!type) throw new Error(`Enum variable "${definition.name}" has no possibleValues`)
      if (raw instanceof EnumArray) {
        if (raw.type !== type) throw mismatch()
        return raw
      }
      if (raw instanceof Float64Array || !isStringArray(raw)) throw mismatch()
      return type.encode(raw)
    }
  }
}

function isNumberArray(values: readonly unknown[]): values is readonly number[] {
  return values.every((v) => typeof v === 'number')
}

function isBooleanArray(values: readonly unknown[]): values is readonly boolean[] {
  return values.every((v) => typeof v === 'boolean')
}

function isStringArray(values: readonly unknown[]): values is readonly string[] {
  return values.every((v) => typeof v === 'string')
}

/** Replace `base[i]` by `layer[i]` wherever the layer is present. */
function overlay(base: Vector, layer: Vector, present: readonly boolean[] | undefined): Vector {
  const use = (i: number): boolean => present === undefined || present[i]

  if (base instanceof Float64Array && layer instanceof Float64Array) {
    const top = layer
    return base.map((v, i) => (use(i) ? top[i] : v))
  }
  if (base instanceof EnumArray && layer instanceof EnumArray) {
    const top = layer.indices
    return new EnumArray(base.type, base.indices.map((v, i) => (use(i) ? top[i] : v)))
  }
  if (
    !(base instanceof Float64Array) && !(base instanceof EnumArray) &&
    !(layer instanceof Float64Array) && !(layer instanceof EnumArray)
  ) {
    const top = layer
    return base.map((v, i) => (use(i) ? top[i] : v))
  }
  throw new ValueTypeMismatchError('Cannot combine input vectors of different value types')
}
