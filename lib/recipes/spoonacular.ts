import { ServiceError, parseRetryAfterSeconds } from '@/lib/errors'
import { spoonacularSearchResponseSchema, type SpoonacularRecipe } from './schema'
import type { RecipeCandidate, RecipeSearchParams, RecipeServiceClient } from './types'

const DEFAULT_BASE_URL = 'https://api.spoonacular.com'
const SEARCH_PATH = '/recipes/complexSearch'

/**
 * Query parameter names as documented for `GET /recipes/complexSearch`.
 * The service ignores unknown names silently, so a wrong key here drops the
 * filter instead of failing.
 */
export const SEARCH_QUERY_PARAMS = {
  ingredients: 'includeIngredients',
  cuisine: 'cuisine',
  diet: 'diet',
  maxReadyMinutes: 'maxReadyTime',
  count: 'number',
} as const satisfies Record<keyof RecipeSearchParams, string>

const FIXED_QUERY_PARAMS: Record<string, string> = {
  sort: 'max-used-ingredients',
  fillIngredients: 'true',
  addRecipeInformation: 'true',
  ignorePantry: 'true',
}

const DIET_ALIASES: Record<string, string> = {
  keto: 'ketogenic',
  paleo: 'paleo',
  'gluten-free': 'gluten free',
  'dairy-free': 'dairy free',
}

function normalizeDiet(diet: string): string {
  const key = diet.trim().toLowerCase()
  return DIET_ALIASES[key] ?? key
}

export function buildSearchQuery(params: RecipeSearchParams, apiKey: string): URLSearchParams {
  const query = new URLSearchParams()
  query.set(SEARCH_QUERY_PARAMS.ingredients, params.ingredients.join(','))
  if (params.cuisine) query.set(SEARCH_QUERY_PARAMS.cuisine, params.cuisine.trim().toLowerCase())
  if (params.diet) query.set(SEARCH_QUERY_PARAMS.diet, normalizeDiet(params.diet))
  if (params.maxReadyMinutes !== undefined) {
    query.set(SEARCH_QUERY_PARAMS.maxReadyMinutes, String(params.maxReadyMinutes))
  }
  query.set(SEARCH_QUERY_PARAMS.count, String(params.count))
  for (const [key, value] of Object.entries(FIXED_QUERY_PARAMS)) {
    query.set(key, value)
  }
  query.set('apiKey', apiKey)
  return query
}

function ingredientNames(entries: Array<{ name: string }>): string[] {
  return [...new Set(entries.map((entry) => entry.name.trim().toLowerCase()).filter(Boolean))].sort()
}

export function toRecipeCandidate(recipe: SpoonacularRecipe): RecipeCandidate {
  const usedIngredients = ingredientNames(recipe.usedIngredients)
  const missingIngredients = ingredientNames(recipe.missedIngredients)

  return {
    id: String(recipe.id),
    title: recipe.title,
    imageUrl: recipe.image || null,
    usedIngredientCount: recipe.usedIngredientCount ?? usedIngredients.length,
    missingIngredientCount: recipe.missedIngredientCount ?? missingIngredients.length,
    readyMinutes: recipe.readyInMinutes ?? null,
    servings: recipe.servings ?? null,
    sourceUrl: recipe.sourceUrl || null,
    healthScore: recipe.healthScore ?? null,
    usedIngredients,
    missingIngredients,
    cuisines: recipe.cuisines.map((cuisine) => cuisine.toLowerCase()),
    diets: recipe.diets.map((diet) => diet.toLowerCase()),
  }
}

function errorFromResponse(response: Response): ServiceError {
  const status = response.status

  if (status === 402 || status === 429) {
    return new ServiceError('Recipe service quota exceeded.', 'recipes', 'quota_exceeded', {
      status,
      retryAfterSeconds: parseRetryAfterSeconds(response.headers.get('retry-after')),
    })
  }

  if (status >= 500) {
    return new ServiceError(`Recipe service unavailable (status ${status}).`, 'recipes', 'unavailable', { status })
  }

  return new ServiceError(`Recipe service rejected the request (status ${status}).`, 'recipes', 'unknown', { status })
}

export type SpoonacularClientOptions = {
  apiKey: string
  baseUrl?: string
}

export class SpoonacularRecipeClient implements RecipeServiceClient {
  private readonly apiKey: string
  private readonly baseUrl: string

  constructor(options: SpoonacularClientOptions) {
    this.apiKey = options.apiKey
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
  }

  async search(params: RecipeSearchParams, options?: { signal?: AbortSignal }): Promise<RecipeCandidate[]> {
    const url = `${this.baseUrl}${SEARCH_PATH}?${buildSearchQuery(params, this.apiKey).toString()}`

    let response: Response
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: options?.signal,
      })
    } catch (error) {
      if (options?.signal?.aborted) {
        throw new ServiceError('Recipe search timed out.', 'recipes', 'timeout', { cause: error })
      }
      throw new ServiceError('Could not reach the recipe service.', 'recipes', 'unavailable', { cause: error })
    }

    if (!response.ok) {
      throw errorFromResponse(response)
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (error) {
      throw new ServiceError('Recipe service returned invalid JSON.', 'recipes', 'invalid_response', { cause: error })
    }

    const parsed = spoonacularSearchResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new ServiceError('Recipe service response did not match the expected shape.', 'recipes', 'invalid_response', {
        cause: parsed.error,
      })
    }

    return parsed.data.results.map(toRecipeCandidate)
  }
}
