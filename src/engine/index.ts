export * from './errors'
export { Period } from './period'
export type { PeriodUnit } from './period'
export { MarginalRateScale } from './scale'
export type { Bracket } from './scale'
export { EnumArray, EnumType } from './enums'
export { Population } from './population'
export type { EntityKind, HouseholdSpec, PopulationSpec } from './population'
export { VersionedParameters, describeParameters, getParameter } from './parameters'
export type {
  ParameterAccessor,
  ParameterJson,
  ParameterStore,
  ParameterValue,
  ParameterVersion,
} from './parameters'
export { VariableRegistry, variableFactory } from './registry'
export type { ValueType, VariableDefinition, VariableSpec } from './registry'
export { InputStore } from './inputs'
export type { InputEntry, RawInput } from './inputs'
export { TaxBenefitSystem } from './system'
export { Simulation, evaluate } from './simulation'
export type { CalculationOption, SimulationOptions } from './simulation'
export { HouseholdView, PersonView } from './views'
export { Tracer, explainTrace } from './trace'
export type { TraceNode, TraceSource } from './trace'
export * from './vector'
