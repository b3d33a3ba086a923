/**
 * 2026 Parameters
 *
 * Delta over 2025: only the values that change year-over-year are
 * overridden, everything else is carried forward.
 */

import { PARAMETERS_2025 } from '../2025/parameters'
import type { NlParameters } from '../types'

export const PARAMETERS_2026: NlParameters = {
  ...PARAMETERS_2025,
  self_employment: {
    ...PARAMETERS_2025.self_employment,
    zelfstandigenaftrek: 1200,
  },
}
