import { describe, it, expect } from 'vitest'
import { EnumArray, EnumType, UnknownSymbolError } from '../../src/engine/index.ts'

const Status = new EnumType('Status', ['owner', 'tenant', 'other'], 'tenant', { owner: 'Owner' })

describe('EnumType', () => {
  it('encodes symbols to an EnumArray', () => {
    const values = Status.encode(['owner', 'other', 'tenant'])
    expect(values.length).toBe(3)
    expect(Array.from(values.indices)).toEqual([0, 2, 1])
    expect(values.decode()).toEqual(['owner', 'other', 'tenant'])
  })

  it('rejects symbols outside the closed set', () => {
    expect(() => Status.encode(['owner', 'landlord'])).toThrow(UnknownSymbolError)
    expect(() => Status.indexOf('landlord')).toThrow(
      '"landlord" is not a value of Status (expected one of: owner, tenant, other)',
    )
  })

  it('fills with the default symbol', () => {
    expect(Status.filled(2).decode()).toEqual(['tenant', 'tenant'])
    expect(Status.filled(1, 'owner').decode()).toEqual(['owner'])
  })

  it('checks membership', () => {
    expect(Status.has('owner')).toBe(true)
    expect(Status.has('landlord')).toBe(false)
  })

  it('rejects a default outside the set and duplicate symbols', () => {
    expect(() => new EnumType('Bad', ['a', 'b'], 'c')).toThrow(UnknownSymbolError)
    expect(() => new EnumType('Bad', ['a', 'a'], 'a')).toThrow('Enum Bad declares a symbol twice')
    expect(() => new EnumType('Bad', [], 'a')).toThrow('Enum Bad must declare at least one symbol')
  })
})

describe('EnumArray', () => {
  const values = Status.encode(['owner', 'tenant', 'owner', 'other'])

  it('compares elementwise against a symbol', () => {
    expect(values.eq('owner')).toEqual([true, false, true, false])
    expect(values.ne('owner')).toEqual([false, true, false, true])
  })

  it('matches any of several symbols', () => {
    expect(values.isIn('owner', 'tenant')).toEqual([true, true, true, false])
  })

  it('fails on comparisons with unknown symbols', () => {
    expect(() => values.eq('landlord')).toThrow(UnknownSymbolError)
  })

  it('reads single values and takes positions', () => {
    expect(values.at(3)).toBe('other')
    expect(() => values.at(10)).toThrow(RangeError)
    const taken = values.take([3, 3, 0])
    expect(taken).toBeInstanceOf(EnumArray)
    expect(taken.decode()).toEqual(['other', 'other', 'owner'])
  })
})
