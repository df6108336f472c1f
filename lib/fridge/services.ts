import type { FridgeConfig } from '@/lib/config'
import { RecipeResultCache } from '@/lib/recipes/cache'
import { RecipeMatchingEngine } from '@/lib/recipes/recommend'
import { SpoonacularRecipeClient } from '@/lib/recipes/spoonacular'
import type { RecipeServiceClient } from '@/lib/recipes/types'
import { ServiceRateLimiter } from '@/lib/services/rate-limit'
import type { Sleep } from '@/lib/services/retry'
import { createOpenAIVisionClient } from '@/lib/vision/openai'
import { RateLimitedVisionClient } from '@/lib/vision/rate-limited'
import type { VisionClient } from '@/lib/vision/types'

export type FridgeServices = {
  config: FridgeConfig
  vision: VisionClient | null
  visionLimiter: ServiceRateLimiter
  recipeLimiter: ServiceRateLimiter
  recipeCache: RecipeResultCache
  recipeEngine: RecipeMatchingEngine
}

export type FridgeServiceOverrides = {
  vision?: VisionClient | null
  recipeClient?: RecipeServiceClient | null
  now?: () => number
  sleep?: Sleep
}

/**
 * Builds one set of collaborators for the analysis pipeline. Nothing here is a
 * module-level singleton; callers decide how long an instance lives.
 */
export function createFridgeServices(config: FridgeConfig, overrides: FridgeServiceOverrides = {}): FridgeServices {
  const recipeLimiter = new ServiceRateLimiter({
    name: 'recipes',
    minIntervalMs: config.rateLimitMinIntervalSeconds * 1000,
    defaultCooldownMs: config.quotaCooldownSeconds * 1000,
    now: overrides.now,
    sleep: overrides.sleep,
  })
  const visionLimiter = new ServiceRateLimiter({
    name: 'vision',
    minIntervalMs: 0,
    defaultCooldownMs: config.quotaCooldownSeconds * 1000,
    now: overrides.now,
    sleep: overrides.sleep,
  })
  const recipeCache = new RecipeResultCache({ ttlMs: config.cacheTtlSeconds * 1000, now: overrides.now })

  const recipeClient =
    overrides.recipeClient !== undefined
      ? overrides.recipeClient
      : config.spoonacularApiKey
        ? new SpoonacularRecipeClient({ apiKey: config.spoonacularApiKey })
        : null

  const visionClient =
    overrides.vision !== undefined
      ? overrides.vision
      : config.openaiApiKey
        ? createOpenAIVisionClient(config.openaiApiKey, { model: config.visionModel, timeoutMs: config.serviceTimeoutMs })
        : null
  const vision = visionClient
    ? new RateLimitedVisionClient({
        client: visionClient,
        limiter: visionLimiter,
        timeoutMs: config.serviceTimeoutMs,
        retry: { maxAttempts: config.retryMaxAttempts, sleep: overrides.sleep },
      })
    : null

  const recipeEngine = new RecipeMatchingEngine({
    client: recipeClient,
    limiter: recipeLimiter,
    cache: recipeCache,
    timeoutMs: config.serviceTimeoutMs,
    retry: { maxAttempts: config.retryMaxAttempts, sleep: overrides.sleep },
  })

  return { config, vision, visionLimiter, recipeLimiter, recipeCache, recipeEngine }
}
