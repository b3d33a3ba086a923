/**
 * Situation runner — turns a situation document into a simulation and
 * fills in the values it asks for.
 *
 * Every non-null value becomes an input; every null value is a request.
 * Inputs of one variable at one period are gathered into a single vector
 * with a presence mask, so entities that left the value out keep the
 * default (or a divided year input).
 */

import {
  EntityMismatchError,
  InputStore,
  Period,
  Population,
  Simulation,
  ValueTypeMismatchError,
  explainTrace,
  toPlain,
} from '../engine'
import type {
  CalculationOption,
  EntityKind,
  RawInput,
  SimulationOptions,
  TaxBenefitSystem,
  TraceNode,
  VariableDefinition,
  Vector,
} from '../engine'
import { cloneSituation } from './serialize'
import type { EntityVariables, Situation, SituationValue } from './schemas'

// ── Types ────────────────────────────────────────────────────────

export interface CalculationRequest {
  entity: EntityKind
  id: string
  variable: string
  /** Canonical period key, e.g. `2025-01`. */
  period: string
}

export interface SituationSimulation<P> {
  simulation: Simulation<P>
  population: Population
  inputs: InputStore
  requests: CalculationRequest[]
}

export interface TraceEntry {
  variable: string
  period: string
  tree: TraceNode
  explanation: string
}

export interface TracedSituation {
  situation: Situation
  traces: TraceEntry[]
}

interface Cell {
  index: number
  value: SituationValue
}

// ── Building ─────────────────────────────────────────────────────

export function buildSimulation<P>(
  system: TaxBenefitSystem<P>,
  situation: Situation,
  options: SimulationOptions = {},
): SituationSimulation<P> {
  const population = Population.build({
    persons: Object.keys(situation.persons),
    households: Object.entries(situation.households).map(([id, household]) => ({
      id,
      members: household.members,
    })),
  })

  const inputs = new InputStore()
  const requests: CalculationRequest[] = []

  const personEntries = population.personIds.map((id) => situation.persons[id])
  const householdEntries = population.householdIds.map((id) => situation.households[id].variables)

  collect(system, 'person', population, personEntries, inputs, requests)
  collect(system, 'household', population, householdEntries, inputs, requests)

  const simulation = new Simulation(system, population, inputs, options)
  return { simulation, population, inputs, requests }
}

function collect<P>(
  system: TaxBenefitSystem<P>,
  entity: EntityKind,
  population: Population,
  entries: readonly EntityVariables[],
  inputs: InputStore,
  requests: CalculationRequest[],
): void {
  const ids = population.ids(entity)
  // variable → period key → supplied cells
  const supplied = new Map<string, Map<string, Cell[]>>()

  entries.forEach((variables, index) => {
    for (const [variable, values] of Object.entries(variables)) {
      const definition = system.variables.get(variable)
      if (definition.entity !== entity) {
        throw new EntityMismatchError(
          `"${variable}" belongs to ${definition.entity}, but was given for ${entity} "${ids[index]}"`,
        )
      }

      for (const [key, value] of Object.entries(values)) {
        const period = Period.parse(key).toString()
        if (value === null) {
          requests.push({ entity, id: ids[index], variable, period })
          continue
        }
        let byPeriod = supplied.get(variable)
        if (!byPeriod) {
          byPeriod = new Map()
          supplied.set(variable, byPeriod)
        }
        const cells = byPeriod.get(period) ?? []
        cells.push({ index, value })
        byPeriod.set(period, cells)
      }
    }
  })

  for (const [variable, byPeriod] of supplied) {
    const definition = system.variables.get(variable)
    for (const [period, cells] of byPeriod) {
      const present = new Array<boolean>(ids.length).fill(false)
      for (const cell of cells) present[cell.index] = true
      inputs.set(variable, period, toInputVector(definition, ids.length, cells), present)
    }
  }
}

/** Lay the supplied cells over a default-filled vector of the right kind. */
function toInputVector<P>(definition: VariableDefinition<P>, length: number, cells: readonly Cell[]): RawInput {
  const mismatch = (value: SituationValue) =>
    new ValueTypeMismatchError(
      `"${definition.name}" is a ${definition.valueType} variable, got ${JSON.stringify(value)}`,
    )

  switch (definition.valueType) {
    case 'float': {
      const values = new Array<number>(length).fill(0)
      for (const { index, value } of cells) {
        if (typeof value !== 'number') throw mismatch(value)
        values[index] = value
      }
      return values
    }
    case 'bool': {
      const values = new Array<boolean>(length).fill(false)
      for (const { index, value } of cells) {
        if (typeof value !== 'boolean') throw mismatch(value)
        values[index] = value
      }
      return values
    }
    case 'enum': {
      const type = definition.possibleValues
      if (!type) throw new Error(`Enum variable "${definition.name}" has no possibleValues`)
      const values = new Array<string>(length).fill(type.defaultSymbol)
      for (const { index, value } of cells) {
        if (typeof value !== 'string') throw mismatch(value)
        values[index] = value
      }
      return values
    }
  }
}

// ── Running ──────────────────────────────────────────────────────

/** Compute every requested value; the returned situation has no nulls left. */
export function calculateSituation<P>(system: TaxBenefitSystem<P>, situation: Situation): Situation {
  const { simulation, population, requests } = buildSimulation(system, situation)
  return fillRequests(situation, population, requests, (variable, period) =>
    calculateBridged(simulation, variable, Period.parse(period)),
  )
}

/** Like `calculateSituation`, plus the computation tree of each requested value. */
export function traceSituation<P>(system: TaxBenefitSystem<P>, situation: Situation): TracedSituation {
  const { simulation, population, requests } = buildSimulation(system, situation, { trace: true })

  const traces: TraceEntry[] = []
  const traced = new Set<string>()
  for (const { variable, period } of requests) {
    const key = `${variable}@${period}`
    if (traced.has(key)) continue
    traced.add(key)
    const target = Period.parse(period)
    const tree = simulation.trace(variable, target, bridgeOption(simulation, variable, target))
    traces.push({ variable, period, tree, explanation: explainTrace(tree) })
  }

  const filled = fillRequests(situation, population, requests, (variable, period) =>
    calculateBridged(simulation, variable, Period.parse(period)),
  )
  return { situation: filled, traces }
}

/**
 * Numeric values asked for at the other unit are bridged: a monthly amount
 * asked for a year is summed, a yearly amount asked for a month divided.
 */
function bridgeOption<P>(simulation: Simulation<P>, variable: string, period: Period): CalculationOption | undefined {
  const definition = simulation.system.variables.get(variable)
  if (definition.valueType !== 'float' || definition.definitionPeriod === period.unit) return undefined
  return period.unit === 'year' ? 'add' : 'divide'
}

function calculateBridged<P>(simulation: Simulation<P>, variable: string, period: Period): Vector {
  return simulation.calculate(variable, period, bridgeOption(simulation, variable, period))
}

function fillRequests(
  situation: Situation,
  population: Population,
  requests: readonly CalculationRequest[],
  compute: (variable: string, period: string) => Vector,
): Situation {
  const result = cloneSituation(situation)

  for (const request of requests) {
    const values = toPlain(compute(request.variable, request.period))
    const index = population.ids(request.entity).indexOf(request.id)
    const variables =
      request.entity === 'person' ? result.persons[request.id] : result.households[request.id].variables
    variables[request.variable][request.period] = values[index]
  }
  return result
}
