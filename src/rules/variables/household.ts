/**
 * Personal and housing facts — pure inputs, no formulas.
 */

import type { VariableDefinition } from '../../engine'
import { HousingOccupancyStatus, defineVariable } from '../define'
import type { NlParameters } from '../types'

export const age = defineVariable({
  name: 'age',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Age in whole years',
})

export const accommodationSize = defineVariable({
  name: 'accommodation_size',
  entity: 'household',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Size of the accommodation, in square metres',
})

export const housingOccupancyStatus = defineVariable({
  name: 'housing_occupancy_status',
  entity: 'household',
  valueType: 'enum',
  definitionPeriod: 'month',
  possibleValues: HousingOccupancyStatus,
  label: 'Legal housing situation of the household concerning their main residence',
})

export const householdVariables: VariableDefinition<NlParameters>[] = [
  age,
  accommodationSize,
  housingOccupancyStatus,
]
