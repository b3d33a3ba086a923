/**
 * Shape of the Dutch parameter tree.
 *
 * Keys are the legislation identifiers used in dotted paths
 * (e.g. `taxes.tax_credits.arbeidskorting_max`), hence snake_case.
 * Amounts are euros; scales marked "annual" apply to yearly income.
 */

import type { MarginalRateScale } from '../engine'

export interface NlParameters {
  general: {
    /** AOW (state pension) age in years. */
    age_of_retirement: number
  }
  taxes: {
    /** Box 1 scale below AOW age (annual). */
    income_tax_brackets: MarginalRateScale
    /** Box 1 scale at or above AOW age (annual). */
    income_tax_brackets_aow: MarginalRateScale
    /** Contribution scale on monthly salary. */
    social_security_contribution: MarginalRateScale
    housing_tax: {
      /** Euros per m² of accommodation. */
      rate: number
      minimal_amount: number
    }
    tax_credits: {
      algemene_heffingskorting_max: number
      algemene_heffingskorting_income_threshold: number
      algemene_heffingskorting_phase_out_rate: number
      arbeidskorting_max: number
      arbeidskorting_max_income: number
      arbeidskorting_buildup_rate: number
      arbeidskorting_phase_out_rate: number
    }
  }
  self_employment: {
    /** Annual self-employed deduction. */
    zelfstandigenaftrek: number
    mkb_winstvrijstelling_rate: number
  }
}
