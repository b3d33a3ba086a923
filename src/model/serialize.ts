/**
 * Situation → document conversion.
 *
 * Used by the web API to answer with the same shape the caller posted.
 */

import type { Situation, SituationDocument } from './schemas'

export function serializeSituation(situation: Situation): SituationDocument {
  const households: SituationDocument['households'] = {}
  for (const [id, household] of Object.entries(situation.households)) {
    households[id] = { members: [...household.members], ...cloneVariables(household.variables) }
  }
  const persons: SituationDocument['persons'] = {}
  for (const [id, variables] of Object.entries(situation.persons)) {
    persons[id] = cloneVariables(variables)
  }
  return { persons, households }
}

export function cloneSituation(situation: Situation): Situation {
  const persons: Situation['persons'] = {}
  for (const [id, variables] of Object.entries(situation.persons)) {
    persons[id] = cloneVariables(variables)
  }
  const households: Situation['households'] = {}
  for (const [id, household] of Object.entries(situation.households)) {
    households[id] = { members: [...household.members], variables: cloneVariables(household.variables) }
  }
  return { persons, households }
}

function cloneVariables<V>(variables: Record<string, Record<string, V>>): Record<string, Record<string, V>> {
  const out: Record<string, Record<string, V>> = {}
  for (const [name, values] of Object.entries(variables)) out[name] = { ...values }
  return out
}
