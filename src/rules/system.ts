/**
 * Dutch tax-benefit system
 *
 * Registers every variable of the model against the versioned parameter
 * store. Build it once and share it: simulations only read from it.
 */

import { TaxBenefitSystem } from '../engine'
import type { VariableDefinition } from '../engine'
import { createParameterStore } from './parameterVersions'
import type { NlParameters } from './types'
import { benefitVariables } from './variables/benefits'
import { householdVariables } from './variables/household'
import { incomeVariables } from './variables/income'
import { selfEmploymentVariables } from './variables/selfEmployment'
import { statsVariables } from './variables/stats'
import { taxVariables } from './variables/taxes'

export const NL_VARIABLES: readonly VariableDefinition<NlParameters>[] = [
  ...householdVariables,
  ...incomeVariables,
  ...selfEmploymentVariables,
  ...benefitVariables,
  ...taxVariables,
  ...statsVariables,
]

export function buildTaxBenefitSystem(): TaxBenefitSystem<NlParameters> {
  return new TaxBenefitSystem(createParameterStore(), NL_VARIABLES)
}
