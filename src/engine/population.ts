/**
 * Population — persons grouped into households.
 *
 * Membership is fixed for the lifetime of a population. Every person
 * belongs to exactly one household; a household may have no members.
 * Person vectors follow `personIds` order, household vectors follow
 * `householdIds` order.
 */

import { EnumArray } from './enums'
import { InvalidInputError } from './errors'
import type { BoolVector, FloatVector } from './vector'

export type EntityKind = 'person' | 'household'

export interface HouseholdSpec {
  id: string
  members: readonly string[]
}

export interface PopulationSpec {
  persons: readonly string[]
  households: readonly HouseholdSpec[]
}

export class Population {
  readonly personIds: readonly string[]
  readonly householdIds: readonly string[]
  /** For each person, the index of its household. */
  readonly householdIndex: readonly number[]
  /** For each household, the person indices of its members in order. */
  readonly memberIndices: readonly (readonly number[])[]

  private constructor(
    personIds: readonly string[],
    householdIds: readonly string[],
    householdIndex: readonly number[],
    memberIndices: readonly (readonly number[])[],
  ) {
    this.personIds = personIds
    this.householdIds = householdIds
    this.householdIndex = householdIndex
    this.memberIndices = memberIndices
  }

  static build(layout: PopulationSpec): Population {
    const personPosition = new Map<string, number>()
    layout.persons.forEach((id, i) => {
      if (personPosition.has(id)) throw new InvalidInputError(`Person "${id}" is declared twice`)
      personPosition.set(id, i)
    })

    const householdIds: string[] = []
    const householdIndex = new Array<number>(layout.persons.length).fill(-1)
    const memberIndices: number[][] = []

    for (const household of layout.households) {
      if (householdIds.includes(household.id)) {
        throw new InvalidInputError(`Household "${household.id}" is declared twice`)
      }
      const h = householdIds.length
      householdIds.push(household.id)

      const members: number[] = []
      for (const personId of household.members) {
        const p = personPosition.get(personId)
        if (p === undefined) {
          throw new InvalidInputError(
            `Household "${household.id}" lists unknown person "${personId}"`,
          )
        }
        if (householdIndex[p] >= 0) {
          throw new InvalidInputError(
            `Person "${personId}" belongs to both "${householdIds[householdIndex[p]]}" and "${household.id}"`,
          )
        }
        householdIndex[p] = h
        members.push(p)
      }
      memberIndices.push(members)
    }

    const orphan = householdIndex.findIndex((h) => h < 0)
    if (orphan >= 0) {
      throw new InvalidInputError(`Person "${layout.persons[orphan]}" does not belong to any household`)
    }

    return new Population([...layout.persons], householdIds, householdIndex, memberIndices)
  }

  count(entity: EntityKind): number {
    return entity === 'person' ? this.personIds.length : this.householdIds.length
  }

  ids(entity: EntityKind): readonly string[] {
    return entity === 'person' ? this.personIds : this.householdIds
  }

  // ── Person → household aggregation ─────────────────────────────

  sum(values: FloatVector | BoolVector): FloatVector {
    this.assertPersonLength(values.length)
    return Float64Array.from(this.memberIndices, (members) => {
      let total = 0
      for (const p of members) total += Number(values[p])
      return total
    })
  }

  any(values: BoolVector): boolean[] {
    this.assertPersonLength(values.length)
    return this.memberIndices.map((members) => members.some((p) => values[p]))
  }

  /** True for households whose members all satisfy the condition (vacuously for empty ones). */
  all(values: BoolVector): boolean[] {
    this.assertPersonLength(values.length)
    return this.memberIndices.map((members) => members.every((p) => values[p]))
  }

  /** Largest member value; households without members get 0. */
  max(values: FloatVector): FloatVector {
    this.assertPersonLength(values.length)
    return Float64Array.from(this.memberIndices, (members) => fold(members, values, Math.max))
  }

  /** Smallest member value; households without members get 0. */
  min(values: FloatVector): FloatVector {
    this.assertPersonLength(values.length)
    return Float64Array.from(this.memberIndices, (members) => fold(members, values, Math.min))
  }

  nbPersons(): FloatVector {
    return Float64Array.from(this.memberIndices, (members) => members.length)
  }

  // ── Household → person broadcast ───────────────────────────────

  project(values: FloatVector): FloatVector
  project(values: BoolVector): boolean[]
  project(values: EnumArray): EnumArray
  project(values: FloatVector | BoolVector | EnumArray): FloatVector | boolean[] | EnumArray
  project(values: FloatVector | BoolVector | EnumArray): FloatVector | boolean[] | EnumArray {
    this.assertHouseholdLength(values.length)
    if (values instanceof EnumArray) return values.take(this.householdIndex)
    if (values instanceof Float64Array) {
      const floats = values
      return Float64Array.from(this.householdIndex, (h) => floats[h])
    }
    const flags = values
    return this.householdIndex.map((h) => flags[h])
  }

  private assertPersonLength(length: number): void {
    if (length !== this.personIds.length) {
      throw new InvalidInputError(
        `Expected a person vector of length ${this.personIds.length}, got ${length}`,
      )
    }
  }

  private assertHouseholdLength(length: number): void {
    if (length !== this.householdIds.length) {
      throw new InvalidInputError(
        `Expected a household vector of length ${this.householdIds.length}, got ${length}`,
      )
    }
  }
}

/** Pairwise fold over the member values, 0 for an empty household. */
function fold(members: readonly number[], values: FloatVector, pick: (a: number, b: number) => number): number {
  if (members.length === 0) return 0
  let result = values[members[0]]
  for (let i = 1; i < members.length; i++) result = pick(result, values[members[i]])
  return result
}
