import { afterEach, describe, expect, it, vi } from 'vitest'
import { loadFridgeConfig } from '@/lib/config'
import { RateLimitedVisionClient } from '@/lib/vision/rate-limited'
import { createFridgeServices } from './services'

function jsonResponse(body: unknown) {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } })
}

describe('createFridgeServices', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  it('creates a vision client only when an API key is configured', () => {
    const withKey = createFridgeServices(
      loadFridgeConfig({ FRIDGE_CONFIDENCE_THRESHOLD: '0.3', OPENAI_API_KEY: 'test-key' }),
    )
    const withoutKey = createFridgeServices(loadFridgeConfig({ FRIDGE_CONFIDENCE_THRESHOLD: '0.3' }))

    expect(withKey.vision).toBeInstanceOf(RateLimitedVisionClient)
    expect(withoutKey.vision).toBeNull()
  })

  it('recommends from the local catalog when no recipe API key is configured', async () => {
    const fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)
    const services = createFridgeServices(loadFridgeConfig({ FRIDGE_CONFIDENCE_THRESHOLD: '0.3' }))

    const result = await services.recipeEngine.recommend(['egg'], { desiredCount: 3 })

    expect(result.source).toBe('fallback')
    expect(result.recipes.length).toBeGreaterThan(0)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('searches the recipe API when a key is configured', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({ results: [{ id: 7, title: 'Egg Salad', usedIngredients: [{ name: 'egg' }], missedIngredients: [] }] }),
    )
    vi.stubGlobal('fetch', fetchMock)
    const services = createFridgeServices(
      loadFridgeConfig({ FRIDGE_CONFIDENCE_THRESHOLD: '0.3', SPOONACULAR_API_KEY: 'test-key' }),
    )

    const result = await services.recipeEngine.recommend(['egg'], { desiredCount: 3 })

    expect(result).toMatchObject({ source: 'live', recipes: [{ id: '7', title: 'Egg Salad' }] })
    expect(String(fetchMock.mock.calls[0]?.[0])).toContain('apiKey=test-key')
  })

  it('applies the configured cooldown and cache lifetime', () => {
    let now = 1_000
    const services = createFridgeServices(
      loadFridgeConfig({
        FRIDGE_CONFIDENCE_THRESHOLD: '0.3',
        RECIPE_QUOTA_COOLDOWN_SECONDS: '120',
        RECIPE_CACHE_TTL_SECONDS: '60',
      }),
      { now: () => now },
    )
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)

    services.recipeLimiter.recordFailure(true)
    services.recipeCache.set('key', [])
    now += 59_999

    expect(services.recipeLimiter.cooldownRemainingMs()).toBe(60_001)
    expect(services.recipeCache.get('key')).toEqual([])

    now += 1
    expect(services.recipeCache.get('key')).toBeUndefined()
  })
})
