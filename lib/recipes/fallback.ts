import { z } from 'zod'
import { canonicalizeLabel } from '@/lib/detection/label-policy'
import { canonicalizeConstraint, canonicalizeIngredientList, matchesConstraint } from './constraints'
import fallbackCatalogData from './fallback-catalog.json'
import { rankRecipeCandidates } from './ranking'
import type { RecipeCandidate, RecipeConstraint } from './types'

const catalogRecipeSchema = z.object({
  id: z.string().trim().min(1),
  title: z.string().trim().min(1),
  ingredients: z.array(z.string().trim().min(1)).min(1),
  readyMinutes: z.number().int().positive().nullable().optional().default(null),
  servings: z.number().int().positive().nullable().optional().default(null),
  cuisines: z.array(z.string()).optional().default([]),
  diets: z.array(z.string()).optional().default([]),
  healthScore: z.number().min(0).max(100).nullable().optional().default(null),
  imageUrl: z.string().url().nullable().optional().default(null),
  sourceUrl: z.string().url().nullable().optional().default(null),
})

export const fallbackCatalogSchema = z.array(catalogRecipeSchema)

export type CatalogRecipe = z.output<typeof catalogRecipeSchema>

export const DEFAULT_FALLBACK_CATALOG: readonly CatalogRecipe[] = fallbackCatalogSchema.parse(fallbackCatalogData)

function containsPhrase(haystack: string, needle: string): boolean {
  return ` ${haystack} `.includes(` ${needle} `)
}

/**
 * True when either name contains the other as whole words, so "cheese" is
 * covered by "cheddar cheese" and "bell pepper" by "pepper".
 */
export function ingredientMatches(required: string, available: string): boolean {
  const a = canonicalizeLabel(required)
  const b = canonicalizeLabel(available)
  if (!a || !b) return false
  return a === b || containsPhrase(a, b) || containsPhrase(b, a)
}

export function toFallbackCandidate(recipe: CatalogRecipe, available: readonly string[]): RecipeCandidate {
  const usedIngredients = new Set<string>()
  const missingIngredients = new Set<string>()

  for (const ingredient of recipe.ingredients) {
    const name = ingredient.trim().toLowerCase()
    if (available.some((entry) => ingredientMatches(name, entry))) {
      usedIngredients.add(name)
    } else {
      missingIngredients.add(name)
    }
  }

  return {
    id: recipe.id,
    title: recipe.title,
    imageUrl: recipe.imageUrl,
    usedIngredientCount: usedIngredients.size,
    missingIngredientCount: missingIngredients.size,
    readyMinutes: recipe.readyMinutes,
    servings: recipe.servings,
    sourceUrl: recipe.sourceUrl,
    healthScore: recipe.healthScore,
    usedIngredients: [...usedIngredients].sort(),
    missingIngredients: [...missingIngredients].sort(),
    cuisines: recipe.cuisines.map((cuisine) => cuisine.toLowerCase()),
    diets: recipe.diets.map((diet) => diet.toLowerCase()),
  }
}

/**
 * Ranks the local catalog against the supplied ingredients. Recipes that use
 * none of them are left out; the result is not truncated.
 */
export function findFallbackRecipes(
  ingredients: readonly string[],
  constraint: RecipeConstraint,
  catalog: readonly CatalogRecipe[] = DEFAULT_FALLBACK_CATALOG,
): RecipeCandidate[] {
  const available = canonicalizeIngredientList(ingredients)
  if (available.length === 0) return []

  const canonical = canonicalizeConstraint(constraint)
  const candidates = catalog
    .map((recipe) => toFallbackCandidate(recipe, available))
    .filter((candidate) => candidate.usedIngredientCount > 0)
    .filter((candidate) => matchesConstraint(candidate, canonical))

  return rankRecipeCandidates(candidates)
}
