/**
 * 2025 Parameters
 *
 * Box 1 rates and credits as published for tax year 2025. The arbeidskorting
 * is modelled with a single build-up rate instead of the statutory
 * multi-segment build-up.
 *
 * Source: https://www.belastingdienst.nl/wps/wcm/connect/nl/inkomstenbelasting/content/tarieven-inkomstenbelasting
 */

import { MarginalRateScale } from '../../engine'
import type { NlParameters } from '../types'

export const PARAMETERS_2025: NlParameters = {
  general: {
    age_of_retirement: 67,
  },
  taxes: {
    income_tax_brackets: MarginalRateScale.fromPairs([
      [0, 0.3582],
      [38441, 0.3748],
      [76817, 0.495],
    ]),
    income_tax_brackets_aow: MarginalRateScale.fromPairs([
      [0, 0.1792],
      [38441, 0.3748],
      [76817, 0.495],
    ]),
    social_security_contribution: MarginalRateScale.fromPairs([
      [0, 0.02],
      [2500, 0.06],
      [6000, 0.12],
    ]),
    housing_tax: {
      rate: 10,
      minimal_amount: 200,
    },
    tax_credits: {
      algemene_heffingskorting_max: 3068,
      algemene_heffingskorting_income_threshold: 28406,
      algemene_heffingskorting_phase_out_rate: 0.06337,
      arbeidskorting_max: 5599,
      arbeidskorting_max_income: 43071,
      arbeidskorting_buildup_rate: 0.2,
      arbeidskorting_phase_out_rate: 0.0651,
    },
  },
  self_employment: {
    zelfstandigenaftrek: 2470,
    mkb_winstvrijstelling_rate: 0.127,
  },
}
