import { describe, it, expect } from 'vitest'
import { estimateKcal, priceBucket, pricePerUnit } from '../pricing'

const noMacros = {
  proteinPercent: null,
  fatPercent: null,
  fiberPercent: null,
  ashPercent: null,
  moisturePercent: null,
}

describe('pricePerUnit', () => {
  it('divides the price by the first pack weight', () => {
    expect(pricePerUnit(4.5, ['400g', '2kg'])).toBe(11.25)
    expect(pricePerUnit(9.99, ['3kg'])).toBe(3.33)
    expect(pricePerUnit(12, ['12x85g'])).toBe(11.76)
  })

  it('is null without a usable price or weight', () => {
    expect(pricePerUnit(null, ['400g'])).toBeNull()
    expect(pricePerUnit(0, ['400g'])).toBeNull()
    expect(pricePerUnit(10, [])).toBeNull()
    expect(pricePerUnit(10, ['400ml'])).toBeNull()
  })
})

describe('priceBucket', () => {
  it('buckets with inclusive mid bounds', () => {
    expect(priceBucket(11.25)).toBe('mid')
    expect(priceBucket(4.99)).toBe('low')
    expect(priceBucket(5)).toBe('mid')
    expect(priceBucket(15)).toBe('mid')
    expect(priceBucket(15.01)).toBe('high')
    expect(priceBucket(null)).toBeNull()
  })

  it('honours configured thresholds', () => {
    expect(priceBucket(11.25, { lowMax: 12, midMax: 30 })).toBe('low')
  })
})

describe('estimateKcal', () => {
  it('applies modified Atwater factors', () => {
    expect(
      estimateKcal({ proteinPercent: 25, fatPercent: 15, fiberPercent: 3, ashPercent: 7, moisturePercent: 8 })
    ).toBe(362)
  })

  it('assumes 8% ash and 10% moisture when missing', () => {
    expect(estimateKcal({ ...noMacros, proteinPercent: 26, fatPercent: 16 })).toBe(367)
  })

  it('needs protein and fat', () => {
    expect(estimateKcal({ ...noMacros, proteinPercent: 26 })).toBeNull()
    expect(estimateKcal(noMacros)).toBeNull()
  })

  it('rejects implausible estimates', () => {
    expect(
      estimateKcal({ proteinPercent: 8, fatPercent: 5, fiberPercent: 0.5, ashPercent: 2, moisturePercent: 80 })
    ).toBeNull()
  })
})
