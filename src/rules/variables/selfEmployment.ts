/**
 * Self-employment (winst uit onderneming)
 *
 * Profit minus the zelfstandigenaftrek, minus the mkb-winstvrijstelling on
 * what remains. The deduction only applies when the hours criterion is met
 * for the year.
 */

import { maximum, mul, sub, toFloat } from '../../engine'
import type { VariableDefinition } from '../../engine'
import { defineVariable } from '../define'
import type { NlParameters } from '../types'

export const urencriteriumVoldaan = defineVariable({
  name: 'urencriterium_voldaan',
  entity: 'person',
  valueType: 'bool',
  definitionPeriod: 'year',
  label: 'Whether the hours criterion (urencriterium) for self-employment is met',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/zelfstandigen/content/hulpmiddel-urencriterium',
  documentation:
    'At least 1225 hours per year spent on the business, required for the zelfstandigenaftrek.',
})

export const zelfstandigenaftrek = defineVariable({
  name: 'zelfstandigenaftrek',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Self-employed deduction (zelfstandigenaftrek)',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/zelfstandigen/content/hulpmiddel-zelfstandigenaftrek',
  formula: (person, period, parameters) => {
    const criterionMet = person.bool('urencriterium_voldaan', period.thisYear)
    const monthlyDeduction = parameters(period).self_employment.zelfstandigenaftrek / 12
    return mul(toFloat(criterionMet), monthlyDeduction)
  },
})

export const mkbWinstvrijstelling = defineVariable({
  name: 'mkb_winstvrijstelling',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'SME profit exemption (mkb-winstvrijstelling)',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/zelfstandigen/content/hulpmiddel-mkb-winstvrijstelling',
  formula: (person, period, parameters) => {
    const profit = person.float('winst_voor_aftrek', period)
    const aftrek = person.float('zelfstandigenaftrek', period)
    // Negative bases get no exemption.
    const base = maximum(sub(profit, aftrek), 0)
    return mul(base, parameters(period).self_employment.mkb_winstvrijstelling_rate)
  },
})

export const selfEmploymentTaxableIncome = defineVariable({
  name: 'self_employment_taxable_income',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Taxable income from self-employment (Box 1)',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/zelfstandigen/content/winst-uit-onderneming',
  formula: (person, period) => {
    const profit = person.float('winst_voor_aftrek', period)
    const aftrek = person.float('zelfstandigenaftrek', period)
    const mkb = person.float('mkb_winstvrijstelling', period)
    return maximum(sub(sub(profit, aftrek), mkb), 0)
  },
})

export const selfEmploymentVariables: VariableDefinition<NlParameters>[] = [
  urencriteriumVoldaan,
  zelfstandigenaftrek,
  mkbWinstvrijstelling,
  selfEmploymentTaxableIncome,
]
