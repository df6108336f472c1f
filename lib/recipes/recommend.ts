import { InputError, ServiceError, isTransientServiceError } from '@/lib/errors'
import type { ServiceRateLimiter } from '@/lib/services/rate-limit'
import { withRetry, withTimeout, type RetryOptions } from '@/lib/services/retry'
import { buildRecipeCacheKey, type RecipeResultCache } from './cache'
import { canonicalizeConstraint, canonicalizeIngredientList, withinReadyTime } from './constraints'
import { DEFAULT_FALLBACK_CATALOG, findFallbackRecipes, type CatalogRecipe } from './fallback'
import { rankRecipeCandidates } from './ranking'
import type {
  RecipeCandidate,
  RecipeConstraint,
  RecipeRecommendation,
  RecipeSearchParams,
  RecipeServiceClient,
  RecipeSource,
} from './types'

const DEFAULT_TIMEOUT_MS = 8_000

export type RecipeMatchingEngineOptions = {
  client: RecipeServiceClient | null
  limiter: ServiceRateLimiter
  cache: RecipeResultCache
  catalog?: readonly CatalogRecipe[]
  timeoutMs?: number
  retry?: Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>
}

function describeError(error: unknown) {
  if (error instanceof ServiceError) {
    return { kind: error.kind, status: error.status ?? null, message: error.message }
  }
  return { kind: 'unknown', status: null, message: error instanceof Error ? error.message : String(error) }
}

/**
 * Recommends recipes for a set of ingredient names. Live search goes through
 * the shared limiter and retry policy; any live failure degrades to the local
 * catalog, so the only error surfaced is an empty ingredient list.
 */
export class RecipeMatchingEngine {
  private readonly client: RecipeServiceClient | null
  private readonly limiter: ServiceRateLimiter
  private readonly cache: RecipeResultCache
  private readonly catalog: readonly CatalogRecipe[]
  private readonly timeoutMs: number
  private readonly retry: RecipeMatchingEngineOptions['retry']

  constructor(options: RecipeMatchingEngineOptions) {
    this.client = options.client
    this.limiter = options.limiter
    this.cache = options.cache
    this.catalog = options.catalog ?? DEFAULT_FALLBACK_CATALOG
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.retry = options.retry
  }

  async recommend(ingredients: readonly string[], constraint: RecipeConstraint): Promise<RecipeRecommendation> {
    const names = canonicalizeIngredientList(ingredients)
    if (names.length === 0) {
      throw new InputError('At least one ingredient is required to recommend recipes.', 'missing_ingredients')
    }

    const canonical = canonicalizeConstraint(constraint)
    const cacheKey = buildRecipeCacheKey(names, canonical)
    const cached = this.cache.get(cacheKey)
    if (cached) {
      return { recipes: cached.slice(0, canonical.desiredCount), source: 'cache' }
    }

    const live = await this.searchLive(names, canonical)
    if (live && live.length > 0) {
      return this.store(cacheKey, live, canonical, 'live')
    }

    return this.store(cacheKey, findFallbackRecipes(names, canonical, this.catalog), canonical, 'fallback')
  }

  private store(
    cacheKey: string,
    candidates: RecipeCandidate[],
    constraint: RecipeConstraint,
    source: RecipeSource,
  ): RecipeRecommendation {
    const recipes = rankRecipeCandidates(candidates).slice(0, constraint.desiredCount)
    this.cache.set(cacheKey, recipes)
    return { recipes, source }
  }

  private async searchLive(ingredients: string[], constraint: RecipeConstraint): Promise<RecipeCandidate[] | null> {
    const client = this.client
    if (!client) return null

    if (!this.limiter.allowRequest()) {
      console.info('[recipe-engine] recipe service cooling down, using fallback catalog', {
        cooldownRemainingMs: this.limiter.cooldownRemainingMs(),
      })
      return null
    }

    const params: RecipeSearchParams = {
      ingredients,
      cuisine: constraint.cuisine,
      diet: constraint.diet,
      maxReadyMinutes: constraint.maxReadyMinutes,
      count: constraint.desiredCount,
    }

    try {
      const results = await withRetry(
        async () => {
          const granted = await this.limiter.acquire()
          if (!granted) {
            throw new ServiceError('Recipe service is cooling down.', 'recipes', 'quota_exceeded')
          }

          try {
            const found = await withTimeout(
              (signal) => client.search(params, { signal }),
              this.timeoutMs,
              () => new ServiceError('Recipe search timed out.', 'recipes', 'timeout'),
            )
            this.limiter.recordSuccess()
            return found
          } catch (error) {
            const isQuotaError = error instanceof ServiceError && error.isQuotaError
            this.limiter.recordFailure(isQuotaError, error instanceof ServiceError ? error.retryAfterSeconds : undefined)
            throw error
          }
        },
        {
          ...this.retry,
          onRetry: (error, attempt, delayMs) => {
            console.warn('[recipe-engine] recipe search failed, retrying', {
              attempt,
              delayMs,
              ...describeError(error),
            })
          },
        },
      )

      return results.filter((recipe) => withinReadyTime(recipe, constraint))
    } catch (error) {
      if (isTransientServiceError(error)) this.limiter.recordPersistentFailure()
      console.warn('[recipe-engine] live recipe search failed, using fallback catalog', describeError(error))
      return null
    }
  }
}
