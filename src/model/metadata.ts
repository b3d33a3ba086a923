/**
 * Variable metadata — what the web API publishes about the registry.
 */

import type { EntityKind, PeriodUnit, TaxBenefitSystem, ValueType, VariableDefinition } from '../engine'

export interface VariableSummary {
  entity: EntityKind
  valueType: ValueType
  definitionPeriod: PeriodUnit
  label?: string
}

export interface PossibleValue {
  symbol: string
  label: string
}

export interface VariableDescription extends VariableSummary {
  name: string
  reference?: string
  documentation?: string
  /** Inputs have no formula. */
  hasFormula: boolean
  defaultValue: number | boolean | string
  /** Set when a year input is spread over the months of the year. */
  setInput?: 'divide_by_period'
  possibleValues?: PossibleValue[]
}

export function summarizeVariables<P>(system: TaxBenefitSystem<P>): Record<string, VariableSummary> {
  const out: Record<string, VariableSummary> = {}
  for (const definition of system.variables.list()) {
    out[definition.name] = {
      entity: definition.entity,
      valueType: definition.valueType,
      definitionPeriod: definition.definitionPeriod,
      label: definition.label,
    }
  }
  return out
}

export function describeVariable<P>(definition: VariableDefinition<P>): VariableDescription {
  const description: VariableDescription = {
    name: definition.name,
    entity: definition.entity,
    valueType: definition.valueType,
    definitionPeriod: definition.definitionPeriod,
    label: definition.label,
    reference: definition.reference,
    documentation: definition.documentation,
    hasFormula: definition.formula !== undefined,
    defaultValue: defaultValueOf(definition),
    setInput: definition.setInput,
  }

  if (definition.valueType === 'enum' && definition.possibleValues) {
    const type = definition.possibleValues
    description.possibleValues = type.symbols.map((symbol) => ({
      symbol,
      label: type.labels[symbol] ?? symbol,
    }))
  }
  return description
}

function defaultValueOf<P>(definition: VariableDefinition<P>): number | boolean | string {
  switch (definition.valueType) {
    case 'float':
      return definition.defaultValue ?? 0
    case 'bool':
      return definition.defaultValue ?? false
    case 'enum':
      return definition.defaultValue ?? definition.possibleValues?.defaultSymbol ?? ''
  }
}
