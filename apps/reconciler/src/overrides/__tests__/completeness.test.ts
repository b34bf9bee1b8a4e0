import { describe, it, expect } from 'vitest'
import { DEFAULT_COMPLETENESS_TIERS, gradeCompleteness, type CompletenessTiers } from '../completeness'
import { loadDefaultCompletenessTiers } from '../../config/data'

const empty = {
  kcalPer100g: null,
  proteinPercent: null,
  fatPercent: null,
  ingredientsTokens: [],
  form: 'any' as const,
  lifeStage: null,
  pricePerUnit: null,
  imageUrl: null,
}

const gradeA = { ...empty, kcalPer100g: 365, proteinPercent: 25, fatPercent: 14, ingredientsTokens: ['chicken'] }

describe('gradeCompleteness', () => {
  it('grades A+ when every top-tier field is present', () => {
    expect(gradeCompleteness({ ...gradeA, form: 'dry', lifeStage: 'adult', pricePerUnit: 4.2 })).toBe('A+')
  })

  it('grades A without form, life stage or price', () => {
    expect(gradeCompleteness(gradeA)).toBe('A')
  })

  it('grades B on energy alone or on protein and fat', () => {
    expect(gradeCompleteness({ ...empty, kcalPer100g: 365 })).toBe('B')
    expect(gradeCompleteness({ ...empty, proteinPercent: 25, fatPercent: 14 })).toBe('B')
  })

  it('falls back to C', () => {
    expect(gradeCompleteness({ ...empty, proteinPercent: 25 })).toBe('C')
  })

  it('treats form "any" as missing', () => {
    expect(gradeCompleteness({ ...gradeA, lifeStage: 'adult', pricePerUnit: 4.2 })).toBe('A')
  })

  it('uses a configured tier list', () => {
    const tiers: CompletenessTiers = { fallback: 'C', tiers: [{ grade: 'A', anyOf: [['imageUrl']] }] }
    expect(gradeCompleteness({ ...empty, imageUrl: 'https://example.com/x.png' }, tiers)).toBe('A')
  })

  it('ships the default tiers as data', () => {
    expect(loadDefaultCompletenessTiers()).toEqual(DEFAULT_COMPLETENESS_TIERS)
  })
})
