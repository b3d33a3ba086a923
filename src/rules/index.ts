export { buildTaxBenefitSystem, NL_VARIABLES } from './system'
export { HousingOccupancyStatus, defineVariable } from './define'
export { PARAMETER_VERSIONS, createParameterStore, getSupportedTaxYears } from './parameterVersions'
export type { NlParameters } from './types'
