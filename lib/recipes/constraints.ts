import type { RecipeCandidate, RecipeConstraint } from './types'

export function canonicalizeIngredientList(ingredients: readonly string[]): string[] {
  const names = ingredients.map((ingredient) => ingredient.trim().toLowerCase().replace(/\s+/g, ' ')).filter(Boolean)
  return [...new Set(names)].sort()
}

function canonicalTag(value: string | undefined): string | undefined {
  const normalized = value?.trim().toLowerCase().replace(/\s+/g, ' ')
  return normalized ? normalized : undefined
}

export function canonicalizeConstraint(constraint: RecipeConstraint): RecipeConstraint {
  const maxReadyMinutes =
    constraint.maxReadyMinutes !== undefined && Number.isFinite(constraint.maxReadyMinutes) && constraint.maxReadyMinutes > 0
      ? Math.floor(constraint.maxReadyMinutes)
      : undefined

  return Object.freeze({
    cuisine: canonicalTag(constraint.cuisine),
    diet: canonicalTag(constraint.diet),
    maxReadyMinutes,
    desiredCount: Math.max(0, Math.floor(constraint.desiredCount)),
  })
}

function includesTag(tags: readonly string[], wanted: string): boolean {
  return tags.some((tag) => tag.trim().toLowerCase() === wanted)
}

/**
 * Cuisine and diet filters only reject a candidate that lists tags without the
 * wanted one; an untagged candidate passes. A candidate without a ready time
 * passes the time filter.
 */
export function matchesConstraint(candidate: RecipeCandidate, constraint: RecipeConstraint): boolean {
  if (constraint.cuisine && candidate.cuisines.length > 0 && !includesTag(candidate.cuisines, constraint.cuisine)) {
    return false
  }
  if (constraint.diet && candidate.diets.length > 0 && !includesTag(candidate.diets, constraint.diet)) {
    return false
  }
  return withinReadyTime(candidate, constraint)
}

export function withinReadyTime(candidate: RecipeCandidate, constraint: RecipeConstraint): boolean {
  if (constraint.maxReadyMinutes === undefined || candidate.readyMinutes === null) return true
  return candidate.readyMinutes <= constraint.maxReadyMinutes
}
