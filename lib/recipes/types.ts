export type RecipeConstraint = {
  readonly cuisine?: string
  readonly diet?: string
  readonly maxReadyMinutes?: number
  readonly desiredCount: number
}

export type RecipeCandidate = {
  id: string
  title: string
  imageUrl: string | null
  usedIngredientCount: number
  missingIngredientCount: number
  readyMinutes: number | null
  servings: number | null
  sourceUrl: string | null
  healthScore: number | null
  usedIngredients: string[]
  missingIngredients: string[]
  cuisines: string[]
  diets: string[]
}

export type RecipeSource = 'live' | 'fallback' | 'cache'

export type RecipeRecommendation = {
  recipes: RecipeCandidate[]
  source: RecipeSource
}

export type RecipeSearchParams = {
  ingredients: string[]
  cuisine?: string
  diet?: string
  maxReadyMinutes?: number
  count: number
}

export interface RecipeServiceClient {
  search(params: RecipeSearchParams, options?: { signal?: AbortSignal }): Promise<RecipeCandidate[]>
}
