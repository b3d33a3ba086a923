/**
 * Benefits and household income aggregates.
 */

import type { VariableDefinition } from '../../engine'
import { defineVariable } from '../define'
import type { NlParameters } from '../types'

export const pension = defineVariable({
  name: 'pension',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Pension income',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/pensioen/pensioen',
})

export const householdIncome = defineVariable({
  name: 'household_income',
  entity: 'household',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'The sum of the salaries of those living in a household',
  formula: (household, period) => household.sum(household.members.float('salary', period)),
})

export const benefitVariables: VariableDefinition<NlParameters>[] = [pension, householdIncome]
