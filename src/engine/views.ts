/**
 * Entity views handed to formulas.
 *
 * A person formula reads person variables directly and household variables
 * through `person.household`, which broadcasts each household's value to its
 * members. A household formula reads household variables directly, person
 * variables through `household.members`, and folds them back with
 * `sum`/`any`/`all`/`max`/`min`.
 */

import type { EnumArray } from './enums'
import { EntityMismatchError } from './errors'
import type { Period } from './period'
import type { EntityKind, Population } from './population'
import type { CalculationOption, Simulation } from './simulation'
import type { BoolVector, FloatVector } from './vector'

/** Typed reads of the variables owned by one entity kind. */
export class VariableReader<P> {
  constructor(
    protected readonly simulation: Simulation<P>,
    readonly entity: EntityKind,
  ) {}

  get count(): number {
    return this.simulation.population.count(this.entity)
  }

  float(name: string, period: Period, option?: CalculationOption): FloatVector {
    this.assertEntity(name)
    return this.simulation.calculateFloat(name, period, option)
  }

  bool(name: string, period: Period): BoolVector {
    this.assertEntity(name)
    return this.simulation.calculateBool(name, period)
  }

  enum(name: string, period: Period): EnumArray {
    this.assertEntity(name)
    return this.simulation.calculateEnum(name, period)
  }

  private assertEntity(name: string): void {
    const definition = this.simulation.system.variables.get(name)
    if (definition.entity !== this.entity) {
      throw new EntityMismatchError(
        `"${name}" belongs to ${definition.entity}, but was read from a ${this.entity} formula`,
      )
    }
  }
}

/** Household variables seen from persons: one value per member. */
export class HouseholdBroadcast<P> {
  private readonly reader: VariableReader<P>
  private readonly population: Population

  constructor(simulation: Simulation<P>) {
    this.reader = new VariableReader(simulation, 'household')
    this.population = simulation.population
  }

  float(name: string, period: Period, option?: CalculationOption): FloatVector {
    return this.population.project(this.reader.float(name, period, option))
  }

  bool(name: string, period: Period): boolean[] {
    return this.population.project(this.reader.bool(name, period))
  }

  enum(name: string, period: Period): EnumArray {
    return this.population.project(this.reader.enum(name, period))
  }
}

export class PersonView<P> extends VariableReader<P> {
  readonly household: HouseholdBroadcast<P>

  constructor(simulation: Simulation<P>) {
    super(simulation, 'person')
    this.household = new HouseholdBroadcast(simulation)
  }
}

export class HouseholdView<P> extends VariableReader<P> {
  /** Person variables, one value per person in population order. */
  readonly members: VariableReader<P>

  constructor(simulation: Simulation<P>) {
    super(simulation, 'household')
    this.members = new VariableReader(simulation, 'person')
  }

  sum(values: FloatVector | BoolVector): FloatVector {
    return this.simulation.population.sum(values)
  }

  any(values: BoolVector): boolean[] {
    return this.simulation.population.any(values)
  }

  all(values: BoolVector): boolean[] {
    return this.simulation.population.all(values)
  }

  max(values: FloatVector): FloatVector {
    return this.simulation.population.max(values)
  }

  min(values: FloatVector): FloatVector {
    return this.simulation.population.min(values)
  }

  nbPersons(): FloatVector {
    return this.simulation.population.nbPersons()
  }

  /** Broadcast a household vector to the persons of each household. */
  project(values: FloatVector): FloatVector {
    return this.simulation.population.project(values)
  }
}
