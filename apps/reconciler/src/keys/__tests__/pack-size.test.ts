import { describe, it, expect } from 'vitest'
import { isPackSizeToken, parsePackSize, weightKg } from '../pack-size'

describe('parsePackSize', () => {
  it('parses single sizes', () => {
    expect(parsePackSize('400g')).toEqual({ count: 1, amount: 400, unit: 'g' })
    expect(parsePackSize('2 KG')).toEqual({ count: 1, amount: 2, unit: 'kg' })
    expect(parsePackSize('1,5kg')).toEqual({ count: 1, amount: 1.5, unit: 'kg' })
  })

  it('parses multipacks', () => {
    expect(parsePackSize('12x85g')).toEqual({ count: 12, amount: 85, unit: 'g' })
    expect(parsePackSize('6 x 400 g')).toEqual({ count: 6, amount: 400, unit: 'g' })
  })

  it('returns null for anything else', () => {
    expect(parsePackSize('large bag')).toBeNull()
    expect(isPackSizeToken('adult')).toBe(false)
    expect(isPackSizeToken('15kg')).toBe(true)
  })
})

describe('weightKg', () => {
  it('converts to kilograms', () => {
    expect(weightKg('400g')).toBeCloseTo(0.4, 10)
    expect(weightKg('2kg')).toBe(2)
    expect(weightKg('12x85g')).toBeCloseTo(1.02, 10)
    expect(weightKg('4.4lb')).toBeCloseTo(1.99580643, 6)
  })

  it('returns null for volumes, zero and missing sizes', () => {
    expect(weightKg('400ml')).toBeNull()
    expect(weightKg('0g')).toBeNull()
    expect(weightKg(null)).toBeNull()
    expect(weightKg('family pack')).toBeNull()
  })
})
