import { describe, it, expect } from 'vitest'
import { situationSchema } from '../../src/model/schemas.ts'

describe('situationSchema', () => {
  it('splits household members from household variables', () => {
    const parsed = situationSchema.parse({
      persons: { anna: { salary: { '2025-01': 3000 } } },
      households: { home: { members: ['anna'], housing_tax: { '2025': null } } },
    })
    expect(parsed.households.home).toEqual({
      members: ['anna'],
      variables: { housing_tax: { '2025': null } },
    })
    expect(parsed.persons.anna.salary['2025-01']).toBe(3000)
  })

  it('accepts numbers, booleans, strings and null', () => {
    const result = situationSchema.safeParse({
      persons: {
        anna: {
          salary: { '2025-01': 3000 },
          urencriterium_voldaan: { '2025': true },
          income_tax: { '2025-01': null },
        },
      },
      households: { home: { members: ['anna'], housing_occupancy_status: { '2025-01': 'owner' } } },
    })
    expect(result.success).toBe(true)
  })

  it('requires members on every household', () => {
    const result = situationSchema.safeParse({
      persons: {},
      households: { home: { housing_tax: { '2025': null } } },
    })
    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues[0].path).toEqual(['households', 'home', 'members'])
    expect(result.error.issues[0].message).toBe('A household must list its members')
  })

  it('rejects malformed period keys', () => {
    const result = situationSchema.safeParse({
      persons: { anna: { salary: { '2025-13': 3000 } } },
      households: { home: { members: ['anna'] } },
    })
    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues.map((i) => i.message)).toContain('Month must be an integer in 1..12, got 13')
  })

  it('rejects values that are not scalars', () => {
    const result = situationSchema.safeParse({
      persons: { anna: { salary: { '2025-01': { amount: 3000 } } } },
      households: { home: { members: ['anna'] } },
    })
    expect(result.success).toBe(false)
  })

  it('requires both entity collections', () => {
    expect(situationSchema.safeParse({ persons: {} }).success).toBe(false)
  })
})
