/**
 * Statistics — household-level totals.
 */

import { add, div } from '../../engine'
import type { VariableDefinition } from '../../engine'
import { defineVariable } from '../define'
import type { NlParameters } from '../types'

export const totalTaxes = defineVariable({
  name: 'total_taxes',
  entity: 'household',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Sum of the taxes paid by a household',
  reference: 'https://www.cbs.nl/nl-nl/cijfers/detail/80068NED',
  formula: (household, period) => {
    const incomeTax = household.sum(household.members.float('income_tax', period))
    const contributions = household.sum(household.members.float('social_security_contribution', period))
    const housingTax = div(household.float('housing_tax', period.thisYear), 12)
    return add(incomeTax, contributions, housingTax)
  },
})

export const statsVariables: VariableDefinition<NlParameters>[] = [totalTaxes]
