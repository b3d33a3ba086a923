import { describe, it, expect } from 'vitest'
import { InvalidScaleError, MarginalRateScale } from '../../src/engine/index.ts'

const scale = MarginalRateScale.fromPairs([
  [0, 0.1],
  [2000, 0.3],
])

describe('MarginalRateScale', () => {
  describe('calc', () => {
    it('taxes each slice at its own rate', () => {
      // 2000 × 0.10 + 34000 × 0.30
      expect(scale.calcOne(36_000)).toBeCloseTo(10_400, 8)
    })

    it('stays inside the first bracket for small values', () => {
      expect(scale.calcOne(1500)).toBeCloseTo(150, 10)
    })

    it('is exactly the first bracket at a threshold', () => {
      expect(scale.calcOne(2000)).toBeCloseTo(200, 10)
    })

    it('returns 0 for zero and negative values', () => {
      expect(scale.calcOne(0)).toBe(0)
      expect(scale.calcOne(-500)).toBe(0)
    })

    it('works elementwise on vectors', () => {
      const out = scale.calc(Float64Array.from([0, 1000, 3000]))
      expect(out[0]).toBe(0)
      expect(out[1]).toBeCloseTo(100, 10)
      expect(out[2]).toBeCloseTo(500, 10)
    })

    it('is non-decreasing in the input', () => {
      const three = MarginalRateScale.fromPairs([
        [0, 0.02],
        [2500, 0.06],
        [6000, 0.12],
      ])
      let previous = 0
      for (let v = 0; v <= 10_000; v += 250) {
        const tax = three.calcOne(v)
        expect(tax).toBeGreaterThanOrEqual(previous)
        previous = tax
      }
    })

    it('is continuous across thresholds', () => {
      expect(scale.calcOne(2000.001) - scale.calcOne(1999.999)).toBeLessThan(0.001)
    })
  })

  describe('marginalRates', () => {
    it('returns the rate of the bracket each value falls in', () => {
      expect(Array.from(scale.marginalRates(Float64Array.from([-1, 0, 500, 2000, 2001])))).toEqual([
        0, 0, 0.1, 0.1, 0.3,
      ])
    })
  })

  describe('validation', () => {
    it('requires at least one bracket', () => {
      expect(() => new MarginalRateScale([])).toThrow(InvalidScaleError)
    })

    it('requires the first threshold to be 0', () => {
      expect(() => MarginalRateScale.fromPairs([[100, 0.1]])).toThrow('First threshold must be 0, got 100')
    })

    it('requires strictly increasing thresholds', () => {
      expect(() =>
        MarginalRateScale.fromPairs([
          [0, 0.1],
          [5000, 0.2],
          [5000, 0.3],
        ]),
      ).toThrow('Thresholds must be strictly increasing: 5000 then 5000')
    })

    it('rejects negative and non-finite rates', () => {
      expect(() => MarginalRateScale.fromPairs([[0, -0.1]])).toThrow(InvalidScaleError)
      expect(() => MarginalRateScale.fromPairs([[0, Number.NaN]])).toThrow(InvalidScaleError)
    })

    it('copies the brackets it is given', () => {
      const brackets = [{ threshold: 0, rate: 0.1 }]
      const s = new MarginalRateScale(brackets)
      brackets[0].rate = 0.9
      expect(s.brackets[0].rate).toBe(0.1)
    })
  })
})
