import type { RecipeCandidate } from './types'

function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Total order shared by live and fallback results: more used ingredients,
 * fewer missing ingredients, quicker recipes (unknown times last), then title
 * and id.
 */
export function compareRecipeCandidates(a: RecipeCandidate, b: RecipeCandidate): number {
  if (a.usedIngredientCount !== b.usedIngredientCount) {
    return b.usedIngredientCount - a.usedIngredientCount
  }
  if (a.missingIngredientCount !== b.missingIngredientCount) {
    return a.missingIngredientCount - b.missingIngredientCount
  }
  if (a.readyMinutes !== b.readyMinutes) {
    if (a.readyMinutes === null) return 1
    if (b.readyMinutes === null) return -1
    return a.readyMinutes - b.readyMinutes
  }
  return compareText(a.title, b.title) || compareText(a.id, b.id)
}

export function rankRecipeCandidates(candidates: readonly RecipeCandidate[]): RecipeCandidate[] {
  return [...candidates].sort(compareRecipeCandidates)
}
