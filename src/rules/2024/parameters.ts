/**
 * 2024 Parameters
 *
 * Two-bracket Box 1 scale below AOW age, three brackets above it.
 */

import { MarginalRateScale } from '../../engine'
import type { NlParameters } from '../types'

export const PARAMETERS_2024: NlParameters = {
  general: {
    age_of_retirement: 67,
  },
  taxes: {
    income_tax_brackets: MarginalRateScale.fromPairs([
      [0, 0.3697],
      [75518, 0.495],
    ]),
    income_tax_brackets_aow: MarginalRateScale.fromPairs([
      [0, 0.1907],
      [38098, 0.3697],
      [75518, 0.495],
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
      algemene_heffingskorting_max: 3362,
      algemene_heffingskorting_income_threshold: 24812,
      algemene_heffingskorting_phase_out_rate: 0.0663,
      arbeidskorting_max: 5532,
      arbeidskorting_max_income: 39958,
      arbeidskorting_buildup_rate: 0.2,
      arbeidskorting_phase_out_rate: 0.0651,
    },
  },
  self_employment: {
    zelfstandigenaftrek: 3750,
    mkb_winstvrijstelling_rate: 0.1331,
  },
}
