/**
 * Taxes — Box 1 income tax with its credits, social security
 * contributions and the yearly housing tax (OZB).
 *
 * Credits and the Box 1 scale are annual: the monthly figure is
 * annualised (×12), run through the annual rule, and divided back by 12.
 */

import {
  add,
  div,
  gte,
  maximum,
  minimum,
  mul,
  or,
  sub,
  toFloat,
  where,
} from '../../engine'
import type { VariableDefinition } from '../../engine'
import { defineVariable } from '../define'
import type { NlParameters } from '../types'

export const arbeidsinkomen = defineVariable({
  name: 'arbeidsinkomen',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Labor income (arbeidsinkomen) for tax purposes',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/werk-en-inkomen/content/wat-is-arbeidsinkomen',
  formula: (person, period) =>
    add(person.float('salary', period), person.float('self_employment_taxable_income', period)),
})

export const taxableIncome = defineVariable({
  name: 'taxable_income',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Total Box 1 taxable income before credits',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/inkomstenbelasting/content/tarieven-inkomstenbelasting',
  // Not clamped: a loss on one source offsets the others.
  formula: (person, period) =>
    add(
      person.float('salary', period),
      person.float('capital_returns', period),
      person.float('pension', period),
      person.float('self_employment_taxable_income', period),
    ),
})

export const algemeneHeffingskorting = defineVariable({
  name: 'algemene_heffingskorting',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'General tax credit (algemene heffingskorting)',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/heffingskortingen/content/algemene-heffingskorting',
  formula: (person, period, parameters) => {
    const credits = parameters(period).taxes.tax_credits
    const annualIncome = mul(person.float('taxable_income', period), 12)

    const excess = maximum(sub(annualIncome, credits.algemene_heffingskorting_income_threshold), 0)
    const reduction = mul(excess, credits.algemene_heffingskorting_phase_out_rate)
    const annualCredit = maximum(sub(credits.algemene_heffingskorting_max, reduction), 0)

    return div(annualCredit, 12)
  },
})

export const arbeidskorting = defineVariable({
  name: 'arbeidskorting',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Labor tax credit (arbeidskorting)',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/heffingskortingen/content/arbeidskorting',
  formula: (person, period, parameters) => {
    const credits = parameters(period).taxes.tax_credits
    const annualLaborIncome = mul(person.float('arbeidsinkomen', period), 12)

    const buildup = mul(annualLaborIncome, credits.arbeidskorting_buildup_rate)
    const excess = maximum(sub(annualLaborIncome, credits.arbeidskorting_max_income), 0)
    const phaseOut = mul(excess, credits.arbeidskorting_phase_out_rate)
    const annualCredit = maximum(sub(minimum(buildup, credits.arbeidskorting_max), phaseOut), 0)

    return div(annualCredit, 12)
  },
})

export const incomeTax = defineVariable({
  name: 'income_tax',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Income tax on Box 1 taxable income, after tax credits',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/inkomstenbelasting/content/tarieven-inkomstenbelasting',
  documentation:
    'People at or above AOW age pay no AOW premium, so a lower first-bracket rate applies to them.',
  formula: (person, period, parameters) => {
    const params = parameters(period)
    const annualIncome = mul(person.float('taxable_income', period), 12)

    const aowAge = gte(person.float('age', period), params.general.age_of_retirement)
    const grossAow = params.taxes.income_tax_brackets_aow.calc(annualIncome)
    const grossRegular = params.taxes.income_tax_brackets.calc(annualIncome)
    const grossTax = div(where(aowAge, grossAow, grossRegular), 12)

    const credits = add(
      person.float('algemene_heffingskorting', period),
      person.float('arbeidskorting', period),
    )
    return maximum(sub(grossTax, credits), 0)
  },
})

export const socialSecurityContribution = defineVariable({
  name: 'social_security_contribution',
  entity: 'person',
  valueType: 'float',
  definitionPeriod: 'month',
  label: 'Progressive contribution paid on salaries to finance social security',
  reference: 'https://www.belastingdienst.nl/wps/wcm/connect/nl/werk-en-inkomen/content/hoe-werkt-de-inhouding-van-loonheffing',
  formula: (person, period, parameters) =>
    parameters(period).taxes.social_security_contribution.calc(person.float('salary', period)),
})

export const housingTax = defineVariable({
  name: 'housing_tax',
  entity: 'household',
  valueType: 'float',
  definitionPeriod: 'year',
  label: 'Property tax (onroerendezaakbelasting - OZB)',
  reference: 'https://www.rijksoverheid.nl/onderwerpen/belastingen-voor-particulieren/onroerendezaakbelasting-ozb',
  documentation:
    'Yearly tax based on the accommodation size and occupancy status in January. ' +
    'Only households that own or rent their main residence pay it.',
  formula: (household, period, parameters) => {
    const january = period.firstMonth
    const params = parameters(period).taxes.housing_tax

    const size = household.float('accommodation_size', january)
    const amount = maximum(mul(size, params.rate), params.minimal_amount)

    const status = household.enum('housing_occupancy_status', january)
    const liable = or(status.eq('owner'), status.eq('tenant'))

    return mul(toFloat(liable), amount)
  },
})

export const taxVariables: VariableDefinition<NlParameters>[] = [
  arbeidsinkomen,
  taxableIncome,
  algemeneHeffingskorting,
  arbeidskorting,
  incomeTax,
  socialSecurityContribution,
  housingTax,
]
