/**
 * Income — wages, capital returns, freelance revenue and the household's
 * disposable income.
 */

import { add, sub } from '../../engine'
import type { VariableDefinition } from '../../engine'
import { defineVariable } from '../define'
import type { NlParameters } from '../types'

export const salary = defineVariable({
  name: 'salary',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  // A yearly salary is spread evenly over its months.
  setInput: 'divide_by_period',
  label: 'Salary (gross monthly wage income)',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/werk-en-inkomen/content/loon',
})

export const capitalReturns = defineVariable({
  name: 'capital_returns',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  setInput: 'divide_by_period',
  label: 'Capital returns (Box 3 income)',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/box-3/box-3',
})

export const omzet = defineVariable({
  name: 'omzet',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Freelance revenue',
})

export const kosten = defineVariable({
  name: 'kosten',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Deductible business expenses',
})

export const winstVoorAftrek = defineVariable({
  name: 'winst_voor_aftrek',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Profit before deductions',
  formula: (person, period) => sub(person.float('omzet', period), person.float('kosten', period)),
})

export const disposableIncome = defineVariable({
  name: 'disposable_income',
  entity: 'household',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Actual amount available to the household at the end of the month',
  reference: 'https://www.cbs.nl/nl-nl/nieuws/2024/16/besteedbaar-inkomen-huishoudens-met-6-5-procent-gestegen',
  documentation:
    'Income after taxes and social security contributions: salary, self-employment income, ' +
    'capital returns and pension, minus income tax, housing tax and contributions. ' +
    'A modelling definition, not the CBS one.',
  formula: (household, period) => {
    const sumOf = (name: string) => household.sum(household.members.float(name, period))

    const income = add(
      sumOf('salary'),
      sumOf('self_employment_taxable_income'),
      sumOf('capital_returns'),
      sumOf('pension'),
    )
    // Housing tax is yearly; a month carries a twelfth of it.
    const housingTax = household.float('housing_tax', period, 'divide')

    return sub(income, add(sumOf('income_tax'), housingTax, sumOf('social_security_contribution')))
  },
})

export const incomeVariables: VariableDefinition<NlParameters>[] = [
  salary,
  capitalReturns,
  omzet,
  kosten,
  winstVoorAftrek,
  disposableIncome,
]
