/**
 * Variable registry — the table of named, typed, period-scoped quantities.
 *
 * A variable is a plain record: owning entity, value type, definition
 * period and an optional formula. Variables without a formula are inputs.
 * The registry is filled once at startup and frozen as soon as a
 * simulation uses it, after which it is shared read-only.
 */

import type { EnumArray, EnumType } from './enums'
import {
  DuplicateVariableError,
  RegistryFrozenError,
  UnknownVariableError,
} from './errors'
import type { ParameterAccessor } from './parameters'
import type { Period, PeriodUnit } from './period'
import type { EntityKind } from './population'
import type { BoolVector, FloatVector } from './vector'
import type { HouseholdView, PersonView } from './views'

export type ValueType = 'float' | 'bool' | 'enum'

export type ValueOf<T extends ValueType> =
  T extends 'float' ? FloatVector :
  T extends 'bool' ? BoolVector :
  EnumArray

export type ViewOf<P, E extends EntityKind> = E extends 'person' ? PersonView<P> : HouseholdView<P>

export type DefaultOf<T extends ValueType> =
  T extends 'float' ? number :
  T extends 'bool' ? boolean :
  string

export interface VariableSpec<P, E extends EntityKind, T extends ValueType> {
  name: string
  entity: E
  valueType: T
  definitionPeriod: PeriodUnit
  label?: string
  reference?: string
  documentation?: string
  /** Year inputs on a month variable are spread evenly over its months. */
  setInput?: 'divide_by_period'
  defaultValue?: DefaultOf<T>
  /** Required for enum variables. */
  possibleValues?: EnumType
  formula?: (entity: ViewOf<P, E>, period: Period, parameters: ParameterAccessor<P>) => ValueOf<T>
}

export type VariableDefinition<P> = {
  [E in EntityKind]: { [T in ValueType]: VariableSpec<P, E, T> }[ValueType]
}[EntityKind]

/**
 * Identity helper that infers entity and value type from the literal, so
 * the formula's entity view and return type are checked.
 *
 *   const defineVariable = variableFactory<MyParameters>()
 *   defineVariable({ name: 'salary', entity: 'person', valueType: 'float', definitionPeriod: 'month' })
 */
export function variableFactory<P>() {
  return <E extends EntityKind, T extends ValueType>(definition: VariableSpec<P, E, T>): VariableSpec<P, E, T> => definition
}

export class VariableRegistry<P> {
  private readonly variables = new Map<string, VariableDefinition<P>>()
  private frozen = false

  register(definition: VariableDefinition<P>): void {
    if (this.frozen) throw new RegistryFrozenError(definition.name)
    if (definition.name.trim() === '') {
      throw new Error('Variable name must not be empty')
    }
    if (this.variables.has(definition.name)) {
      throw new DuplicateVariableError(definition.name)
    }
    if (definition.valueType === 'enum' && !definition.possibleValues) {
      throw new Error(`Enum variable "${definition.name}" must declare possibleValues`)
    }
    if (definition.setInput === 'divide_by_period') {
      if (definition.definitionPeriod !== 'month' || definition.valueType !== 'float') {
        throw new Error(`Only monthly float variables can divide year inputs ("${definition.name}")`)
      }
    }
    this.variables.set(definition.name, definition)
  }

  registerAll(definitions: readonly VariableDefinition<P>[]): void {
    for (const definition of definitions) this.register(definition)
  }

  get(name: string): VariableDefinition<P> {
    const definition = this.variables.get(name)
    if (!definition) throw new UnknownVariableError(name)
    return definition
  }

  has(name: string): boolean {
    return this.variables.has(name)
  }

  names(): string[] {
    return [...this.variables.keys()].sort()
  }

  list(): VariableDefinition<P>[] {
    return this.names().map((name) => this.get(name))
  }

  freeze(): void {
    this.frozen = true
  }

  get isFrozen(): boolean {
    return this.frozen
  }
}
