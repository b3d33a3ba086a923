/**
 * TaxBenefitSystem — the variable registry plus the parameter store.
 *
 * Built once at startup and passed by reference into every simulation.
 * The first simulation freezes the registry; from then on the system is
 * read-only and may be shared by any number of concurrent runs.
 */

import type { ParameterStore } from './parameters'
import { VariableRegistry } from './registry'
import type { VariableDefinition } from './registry'

export class TaxBenefitSystem<P> {
  readonly variables = new VariableRegistry<P>()

  constructor(
    readonly parameters: ParameterStore<P>,
    definitions: readonly VariableDefinition<P>[] = [],
  ) {
    this.variables.registerAll(definitions)
  }
}
