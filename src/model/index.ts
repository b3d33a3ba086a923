export { parseSituation, situationSchema } from './schemas'
export type {
  EntityVariables,
  HouseholdEntry,
  PeriodValues,
  Situation,
  SituationDocument,
  SituationValue,
} from './schemas'
export { cloneSituation, serializeSituation } from './serialize'
export { buildSimulation, calculateSituation, traceSituation } from './situation'
export type { CalculationRequest, SituationSimulation, TraceEntry, TracedSituation } from './situation'
export { describeVariable, summarizeVariables } from './metadata'
export type { PossibleValue, VariableDescription, VariableSummary } from './metadata'
