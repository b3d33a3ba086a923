import { describe, it, expect } from 'vitest'
import { InputStore } from '../../src/engine/index.ts'
import { simulate, valueOf } from '../fixtures/households.ts'

function freelancer(omzet: number, kosten: number, hoursMet: boolean, month = '2025-01'): InputStore {
  return new InputStore()
    .set('omzet', month, [omzet])
    .set('kosten', month, [kosten])
    .set('urencriterium_voldaan', month.slice(0, 4), [hoursMet])
}

describe('self-employment', () => {
  it('computes profit before deductions', () => {
    const sim = simulate(['sem'], freelancer(5000, 1000, true))
    expect(valueOf(sim, 'winst_voor_aftrek', '2025-01')).toBe(4000)
  })

  it('grants a twelfth of the yearly deduction when the hours criterion is met', () => {
    const sim = simulate(['sem'], freelancer(5000, 1000, true))
    expect(valueOf(sim, 'zelfstandigenaftrek', '2025-01')).toBeCloseTo(2470 / 12, 9)
  })

  it('grants no deduction without the hours criterion', () => {
    const sim = simulate(['sem'], freelancer(5000, 1000, false))
    expect(valueOf(sim, 'zelfstandigenaftrek', '2025-01')).toBe(0)
    expect(valueOf(sim, 'mkb_winstvrijstelling', '2025-01')).toBeCloseTo(508, 9)
    expect(valueOf(sim, 'self_employment_taxable_income', '2025-01')).toBeCloseTo(3492, 9)
  })

  it('exempts a share of the profit left after the deduction', () => {
    const sim = simulate(['sem'], freelancer(5000, 1000, true))
    // (4000 − 205.833…) × 0.127
    expect(valueOf(sim, 'mkb_winstvrijstelling', '2025-01')).toBeCloseTo(481.859166667, 6)
    expect(valueOf(sim, 'self_employment_taxable_income', '2025-01')).toBeCloseTo(3312.3075, 6)
  })

  it('clamps losses to zero taxable income', () => {
    const sim = simulate(['sem'], freelancer(500, 1000, true))
    expect(valueOf(sim, 'winst_voor_aftrek', '2025-01')).toBe(-500)
    expect(valueOf(sim, 'mkb_winstvrijstelling', '2025-01')).toBe(0)
    expect(valueOf(sim, 'self_employment_taxable_income', '2025-01')).toBe(0)
  })

  it('counts self-employment income as labour income', () => {
    const sim = simulate(['sem'], freelancer(5000, 1000, true))
    expect(valueOf(sim, 'arbeidsinkomen', '2025-01')).toBeCloseTo(3312.3075, 6)
    expect(valueOf(sim, 'income_tax', '2025-01')).toBeCloseTo(525.919708942, 6)
  })

  it('uses the reduced deduction of 2026', () => {
    const sim = simulate(['sem'], freelancer(5000, 1000, true, '2026-03'))
    expect(valueOf(sim, 'zelfstandigenaftrek', '2026-03')).toBeCloseTo(100, 9)
    expect(valueOf(sim, 'self_employment_taxable_income', '2026-03')).toBeCloseTo(3404.7, 6)
  })
})
