import { describe, expect, it } from 'vitest'
import { buildRecipeCandidate } from '@/test/recipe-fixtures'
import { canonicalizeConstraint, canonicalizeIngredientList, matchesConstraint, withinReadyTime } from './constraints'

describe('canonicalizeIngredientList', () => {
  it('lowercases, trims, de-duplicates and sorts', () => {
    expect(canonicalizeIngredientList([' Tomato', 'egg', 'EGG', '', 'green   beans'])).toEqual([
      'egg',
      'green beans',
      'tomato',
    ])
  })
})

describe('canonicalizeConstraint', () => {
  it('normalizes tags and drops unusable limits', () => {
    const constraint = canonicalizeConstraint({
      cuisine: ' Italian ',
      diet: '',
      maxReadyMinutes: -5,
      desiredCount: 4.7,
    })

    expect(constraint).toEqual({ cuisine: 'italian', diet: undefined, maxReadyMinutes: undefined, desiredCount: 4 })
    expect(Object.isFrozen(constraint)).toBe(true)
  })
})

describe('matchesConstraint', () => {
  const recipe = buildRecipeCandidate({ cuisines: ['Italian'], diets: ['vegetarian'], readyMinutes: 25 })

  it('accepts candidates tagged with the wanted cuisine and diet', () => {
    expect(matchesConstraint(recipe, { cuisine: 'italian', diet: 'vegetarian', maxReadyMinutes: 30, desiredCount: 5 })).toBe(true)
  })

  it('rejects candidates tagged with other cuisines or diets', () => {
    expect(matchesConstraint(recipe, { cuisine: 'mexican', desiredCount: 5 })).toBe(false)
    expect(matchesConstraint(recipe, { diet: 'vegan', desiredCount: 5 })).toBe(false)
  })

  it('lets untagged candidates through tag filters', () => {
    expect(matchesConstraint(buildRecipeCandidate(), { cuisine: 'mexican', diet: 'vegan', desiredCount: 5 })).toBe(true)
  })

  it('rejects candidates slower than the time limit', () => {
    expect(matchesConstraint(recipe, { maxReadyMinutes: 20, desiredCount: 5 })).toBe(false)
  })
})

describe('withinReadyTime', () => {
  it('passes candidates with unknown ready time', () => {
    expect(withinReadyTime(buildRecipeCandidate({ readyMinutes: null }), { maxReadyMinutes: 10, desiredCount: 1 })).toBe(true)
  })

  it('includes the limit itself', () => {
    expect(withinReadyTime(buildRecipeCandidate({ readyMinutes: 10 }), { maxReadyMinutes: 10, desiredCount: 1 })).toBe(true)
  })
})
