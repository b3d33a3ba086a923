/**
 * Versioned parameter registry
 *
 * Maps the first month a set of values applies to → the parameter tree, so
 * formulas read the values in force for the period they compute.
 *
 * Adding a new tax year:
 * 1. Create src/rules/<year>/parameters.ts (spread the previous year and
 *    override what changed)
 * 2. Add it to PARAMETER_VERSIONS below
 */

import { Period, VersionedParameters } from '../engine'
import type { ParameterVersion } from '../engine'
import { PARAMETERS_2024 } from './2024/parameters'
import { PARAMETERS_2025 } from './2025/parameters'
import { PARAMETERS_2026 } from './2026/parameters'
import type { NlParameters } from './types'

export const PARAMETER_VERSIONS: readonly ParameterVersion<NlParameters>[] = [
  { from: Period.month(2024, 1), values: PARAMETERS_2024 },
  { from: Period.month(2025, 1), values: PARAMETERS_2025 },
  { from: Period.month(2026, 1), values: PARAMETERS_2026 },
]

export function createParameterStore(): VersionedParameters<NlParameters> {
  return new VersionedParameters(PARAMETER_VERSIONS)
}

/** Calendar years covered by a parameter version. */
export function getSupportedTaxYears(): number[] {
  return PARAMETER_VERSIONS.map((v) => v.from.year).sort((a, b) => a - b)
}
