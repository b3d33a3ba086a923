import { describe, it, expect } from 'vitest'
import {
  CyclicDependencyError,
  EntityMismatchError,
  EnumType,
  InputStore,
  InvalidInputError,
  Period,
  PeriodMismatchError,
  Population,
  Simulation,
  TaxBenefitSystem,
  UnknownSymbolError,
  UnknownVariableError,
  ValueTypeMismatchError,
  VersionedParameters,
  div,
  evaluate,
  mul,
  toFloat,
  variableFactory,
  zeros,
} from '../../src/engine/index.ts'
import type { FloatVector, Vector } from '../../src/engine/index.ts'

// ── Test system ──────────────────────────────────────────────────

interface TestParameters {
  rate: number
}

const Occupancy = new EnumType('Occupancy', ['owner', 'tenant', 'other'], 'tenant')

const define = variableFactory<TestParameters>()

const variables = [
  define({
    name: 'salary',
    entity: 'person',
    valueType: 'float',
    definitionPeriod: 'month',
    setInput: 'divide_by_period',
  }),
  define({ name: 'eligible', entity: 'person', valueType: 'bool', definitionPeriod: 'year' }),
  define({ name: 'rent', entity: 'household', valueType: 'float', definitionPeriod: 'month' }),
  define({
    name: 'occupancy',
    entity: 'household',
    valueType: 'enum',
    definitionPeriod: 'month',
    possibleValues: Occupancy,
  }),
  define({
    name: 'tax',
    entity: 'person',
    valueType: 'float',
    definitionPeriod: 'month',
    formula: (person, period, parameters) => mul(person.float('salary', period), parameters(period).rate),
  }),
  define({
    name: 'household_tax',
    entity: 'household',
    valueType: 'float',
    definitionPeriod: 'month',
    formula: (household, period) => household.sum(household.members.float('tax', period)),
  }),
  define({
    name: 'annual_salary',
    entity: 'person',
    valueType: 'float',
    definitionPeriod: 'year',
    formula: (person, period) => person.float('salary', period, 'add'),
  }),
  define({
    name: 'yearly_fee',
    entity: 'household',
    valueType: 'float',
    definitionPeriod: 'year',
    formula: (household, period) =>
      mul(toFloat(household.enum('occupancy', period.firstMonth).eq('owner')), 1200),
  }),
  define({
    name: 'monthly_fee',
    entity: 'household',
    valueType: 'float',
    definitionPeriod: 'month',
    formula: (household, period) => household.float('yearly_fee', period, 'divide'),
  }),
  define({
    name: 'rent_share',
    entity: 'person',
    valueType: 'float',
    definitionPeriod: 'month',
    formula: (person, period) => div(person.household.float('rent', period), 2),
  }),
  define({
    name: 'reads_rent_directly',
    entity: 'person',
    valueType: 'float',
    definitionPeriod: 'month',
    formula: (person, period) => person.float('rent', period),
  }),
  define({
    name: 'loop_a',
    entity: 'person',
    valueType: 'float',
    definitionPeriod: 'month',
    formula: (person, period) => person.float('loop_b', period),
  }),
  define({
    name: 'loop_b',
    entity: 'person',
    valueType: 'float',
    definitionPeriod: 'month',
    formula: (person, period) => person.float('loop_a', period),
  }),
  define({
    name: 'short_result',
    entity: 'person',
    valueType: 'float',
    definitionPeriod: 'month',
    formula: () => zeros(1),
  }),
]

const parameters = new VersionedParameters<TestParameters>([
  { from: Period.month(2025, 1), values: { rate: 0.1 } },
  { from: Period.month(2025, 7), values: { rate: 0.25 } },
])

const system = new TaxBenefitSystem(parameters, variables)

// Two persons in one household, one person in another.
const population = Population.build({
  persons: ['ann', 'bob', 'cas'],
  households: [
    { id: 'home', members: ['ann', 'bob'] },
    { id: 'flat', members: ['cas'] },
  ],
})

const JAN = Period.month(2025, 1)
const YEAR = Period.year(2025)

function simulate(inputs = new InputStore()): Simulation<TestParameters> {
  return new Simulation(system, population, inputs)
}

function floats(values: Vector): number[] {
  if (!(values instanceof Float64Array)) throw new Error('expected floats')
  return Array.from(values)
}

function expectClose(values: FloatVector, expected: number[]): void {
  expect(values).toHaveLength(expected.length)
  expected.forEach((value, i) => expect(values[i]).toBeCloseTo(value, 9))
}

// ── Tests ────────────────────────────────────────────────────────

describe('Simulation', () => {
  describe('pure inputs', () => {
    it('returns the supplied values', () => {
      const sim = simulate(new InputStore().set('salary', '2025-01', [3000, 1000, 0]))
      expect(floats(sim.calculate('salary', JAN))).toEqual([3000, 1000, 0])
    })

    it('defaults to 0, false and the enum default when nothing is supplied', () => {
      const sim = simulate()
      expect(floats(sim.calculate('salary', JAN))).toEqual([0, 0, 0])
      expect(sim.calculateBool('eligible', YEAR)).toEqual([false, false, false])
      expect(sim.calculateEnum('occupancy', JAN).decode()).toEqual(['tenant', 'tenant'])
    })

    it('uses the default for entities outside the presence mask', () => {
      const sim = simulate(new InputStore().set('rent', '2025-01', [900, 123], [true, false]))
      expect(floats(sim.calculate('rent', JAN))).toEqual([900, 0])
    })

    it('only reads inputs of the exact period', () => {
      const sim = simulate(new InputStore().set('rent', '2025-01', [900, 500]))
      expect(floats(sim.calculate('rent', Period.month(2025, 2)))).toEqual([0, 0])
    })
  })

  describe('formulas', () => {
    it('computes from dependencies and period parameters', () => {
      const sim = simulate(
        new InputStore()
          .set('salary', '2025-01', [3000, 1000, 0])
          .set('salary', '2025-07', [3000, 1000, 0]),
      )
      expectClose(sim.calculateFloat('tax', JAN), [300, 100, 0])
      expectClose(sim.calculateFloat('tax', Period.month(2025, 7)), [750, 250, 0])
    })

    it('sums person values per household', () => {
      const sim = simulate(new InputStore().set('salary', '2025-01', [3000, 1000, 2000]))
      expectClose(sim.calculateFloat('household_tax', JAN), [400, 200])
    })

    it('broadcasts household values to members', () => {
      const sim = simulate(new InputStore().set('rent', '2025-01', [900, 500]))
      expectClose(sim.calculateFloat('rent_share', JAN), [450, 450, 250])
    })

    it('reads enums at another period', () => {
      const sim = simulate(new InputStore().set('occupancy', '2025-01', ['owner', 'other']))
      expectClose(sim.calculateFloat('yearly_fee', YEAR), [1200, 0])
    })
  })

  describe('year inputs on monthly variables', () => {
    it('divides a year input evenly over the months', () => {
      const sim = simulate(new InputStore().set('salary', '2025', [12_000, 24_000, 0]))
      expect(floats(sim.calculate('salary', Period.month(2025, 5)))).toEqual([1000, 2000, 0])
    })

    it('lets a month input win over the divided year input', () => {
      const sim = simulate(
        new InputStore()
          .set('salary', '2025', [12_000, 24_000, 0])
          .set('salary', '2025-02', [5000, 0, 0], [true, false, false]),
      )
      expect(floats(sim.calculate('salary', Period.month(2025, 2)))).toEqual([5000, 2000, 0])
      expect(floats(sim.calculate('salary', Period.month(2025, 3)))).toEqual([1000, 2000, 0])
    })

    it('rejects year inputs on variables that cannot divide them', () => {
      expect(() => simulate(new InputStore().set('rent', '2025', [12_000, 0]))).toThrow(PeriodMismatchError)
    })
  })

  describe('calculation options', () => {
    it("'add' sums a monthly variable over the year", () => {
      const sim = simulate(
        new InputStore()
          .set('salary', '2025-01', [100, 0, 0])
          .set('salary', '2025-02', [200, 0, 0])
          .set('salary', '2025-12', [50, 0, 10]),
      )
      expect(floats(sim.calculate('annual_salary', YEAR))).toEqual([350, 0, 10])
      expect(floats(sim.calculate('salary', YEAR, 'add'))).toEqual([350, 0, 10])
    })

    it("'divide' spreads a yearly variable over each month", () => {
      const sim = simulate(new InputStore().set('occupancy', '2025-01', ['owner', 'tenant']))
      for (const month of YEAR.months()) {
        expect(floats(sim.calculate('monthly_fee', month))).toEqual([100, 0])
      }
    })

    it('passes same-unit requests through unchanged', () => {
      const sim = simulate(new InputStore().set('salary', '2025-01', [1, 2, 3]))
      expect(floats(sim.calculate('salary', JAN, 'add'))).toEqual([1, 2, 3])
    })

    it('rejects unit mismatches the option cannot bridge', () => {
      const sim = simulate()
      expect(() => sim.calculate('tax', YEAR)).toThrow(PeriodMismatchError)
      expect(() => sim.calculate('tax', YEAR, 'divide')).toThrow(
        '"tax" is defined per month but was requested for year 2025 with option "divide"',
      )
      expect(() => sim.calculate('yearly_fee', JAN, 'add')).toThrow(PeriodMismatchError)
    })

    it("rejects 'add' on non-numeric variables", () => {
      expect(() => simulate().calculate('occupancy', YEAR, 'add')).toThrow(ValueTypeMismatchError)
    })
  })

  describe('cache', () => {
    it('computes each (variable, period) once per run', () => {
      const sim = simulate(new InputStore().set('salary', '2025-01', [3000, 1000, 0]))
      const first = sim.calculate('household_tax', JAN)
      const size = sim.cacheSize
      expect(floats(sim.calculate('household_tax', JAN))).toEqual(floats(first))
      expect(sim.cacheSize).toBe(size)
      // salary, tax, household_tax
      expect(size).toBe(3)
    })

    it('hands out copies, so writing to a result leaves later values alone', () => {
      const sim = simulate(new InputStore().set('salary', '2025-01', [3000, 1000, 0]))
      const salary = sim.calculateFloat('salary', JAN)
      salary[0] = 999_999
      expect(floats(sim.calculate('salary', JAN))).toEqual([3000, 1000, 0])
      expect(floats(sim.calculate('tax', JAN))[0]).toBeCloseTo(3000 * 0.1, 9)
    })

    it('copies boolean and enum results too', () => {
      const sim = simulate(
        new InputStore().set('eligible', '2025', [true, false, true]).set('occupancy', '2025-01', ['owner', 'tenant']),
      )
      const eligible = sim.calculateBool('eligible', YEAR)
      expect(eligible).not.toBe(sim.calculateBool('eligible', YEAR))

      const occupancy = sim.calculateEnum('occupancy', JAN)
      occupancy.indices[0] = 1
      expect(sim.calculateEnum('occupancy', JAN).decode()).toEqual(['owner', 'tenant'])
    })

    it('keeps runs independent', () => {
      const a = simulate(new InputStore().set('salary', '2025-01', [1, 1, 1]))
      const b = simulate(new InputStore().set('salary', '2025-01', [2, 2, 2]))
      expect(floats(a.calculate('salary', JAN))).toEqual([1, 1, 1])
      expect(floats(b.calculate('salary', JAN))).toEqual([2, 2, 2])
    })
  })

  describe('errors', () => {
    it('fails on unknown variables', () => {
      expect(() => simulate().calculate('nope', JAN)).toThrow(UnknownVariableError)
      expect(() => simulate(new InputStore().set('nope', '2025-01', [1, 2, 3]))).toThrow(UnknownVariableError)
    })

    it('detects cycles instead of recursing', () => {
      const sim = simulate()
      let caught: unknown
      try {
        sim.calculate('loop_a', JAN)
      } catch (err) {
        caught = err
      }
      expect(caught).toBeInstanceOf(CyclicDependencyError)
      if (!(caught instanceof CyclicDependencyError)) return
      expect(caught.cycle).toEqual(['loop_a@2025-01', 'loop_b@2025-01', 'loop_a@2025-01'])
      expect(caught.message).toBe('Cyclic dependency: loop_a@2025-01 -> loop_b@2025-01 -> loop_a@2025-01')
    })

    it('recovers after a failed request', () => {
      const sim = simulate(new InputStore().set('salary', '2025-01', [10, 20, 30]))
      expect(() => sim.calculate('loop_a', JAN)).toThrow(CyclicDependencyError)
      expectClose(sim.calculateFloat('tax', JAN), [1, 2, 3])
    })

    it('rejects inputs for formula variables', () => {
      expect(() => simulate(new InputStore().set('tax', '2025-01', [1, 2, 3]))).toThrow(
        '"tax" is computed by a formula and cannot be supplied as an input',
      )
    })

    it('rejects inputs of the wrong length or kind', () => {
      expect(() => simulate(new InputStore().set('salary', '2025-01', [1, 2]))).toThrow(InvalidInputError)
      expect(() => simulate(new InputStore().set('salary', '2025-01', ['a', 'b', 'c']))).toThrow(
        ValueTypeMismatchError,
      )
      expect(() => simulate(new InputStore().set('occupancy', '2025-01', ['owner', 'castle']))).toThrow(
        UnknownSymbolError,
      )
    })

    it('rejects formulas producing the wrong length', () => {
      expect(() => simulate().calculate('short_result', JAN)).toThrow(
        '"short_result" produced 1 values for 3 person entities',
      )
    })

    it('rejects reads across entities without aggregation', () => {
      expect(() => simulate().calculate('reads_rent_directly', JAN)).toThrow(EntityMismatchError)
    })

    it('checks the value type of typed reads', () => {
      expect(() => simulate().calculateFloat('eligible', YEAR)).toThrow(
        '"eligible" is a bool variable, read as float',
      )
    })
  })

  describe('evaluate', () => {
    it('runs a single request with a fresh cache', () => {
      const inputs = new InputStore().set('salary', '2025-01', [3000, 0, 0])
      expect(floats(evaluate(system, 'salary', JAN, population, inputs))).toEqual([3000, 0, 0])
    })
  })
})
