import { beforeEach, describe, expect, it, vi } from 'vitest'
import { loadFridgeConfig } from '@/lib/config'
import { createFridgeServices } from '@/lib/fridge/services'
import type { RecipeServiceClient } from '@/lib/recipes/types'
import { buildRecipeCandidate } from '@/test/recipe-fixtures'

const getFridgeServicesMock = vi.hoisted(() => vi.fn())

vi.mock('@/lib/fridge/runtime', () => ({
  getFridgeServices: getFridgeServicesMock,
}))

function makeJsonRequest(body: unknown) {
  return new Request('http://localhost/api/recipes/recommend', {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  })
}

function createServices(recipeClient: RecipeServiceClient | null = null) {
  return createFridgeServices(loadFridgeConfig({ FRIDGE_CONFIDENCE_THRESHOLD: '0.3', FRIDGE_MAX_RECIPES: '2' }), {
    vision: null,
    recipeClient,
  })
}

describe('POST /api/recipes/recommend', () => {
  beforeEach(() => {
    vi.resetAllMocks()
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  it('returns ranked live recipes for the requested constraints', async () => {
    const search = vi.fn<RecipeServiceClient['search']>().mockResolvedValue([
      buildRecipeCandidate({ id: 'quick', title: 'Quick Eggs', usedIngredientCount: 1 }),
      buildRecipeCandidate({ id: 'best', title: 'Frittata', usedIngredientCount: 2 }),
    ])
    getFridgeServicesMock.mockReturnValue(createServices({ search }))

    const { POST } = await import('./route')
    const response = await POST(
      makeJsonRequest({ ingredients: ['Egg', 'spinach'], cuisine: null, diet: 'Vegetarian', maxReadyMinutes: 30, count: 5 }),
    )

    expect(response.status).toBe(200)
    const payload = await response.json()
    expect(payload).toMatchObject({ source: 'live', count: 2 })
    expect(payload.recipes.map((recipe: { id: string }) => recipe.id)).toEqual(['best', 'quick'])
    expect(search.mock.calls[0]?.[0]).toEqual({
      ingredients: ['egg', 'spinach'],
      cuisine: undefined,
      diet: 'vegetarian',
      maxReadyMinutes: 30,
      count: 5,
    })
  })

  it('defaults the recipe count to the configured maximum', async () => {
    getFridgeServicesMock.mockReturnValue(createServices())

    const { POST } = await import('./route')
    const response = await POST(makeJsonRequest({ ingredients: ['egg', 'cheese', 'onion', 'tomato'] }))

    expect(response.status).toBe(200)
    const payload = await response.json()
    expect(payload.source).toBe('fallback')
    expect(payload.count).toBe(2)
    expect(payload.recipes).toHaveLength(2)
  })

  it('returns 400 when no usable ingredient is given', async () => {
    getFridgeServicesMock.mockReturnValue(createServices())

    const { POST } = await import('./route')
    const response = await POST(makeJsonRequest({ ingredients: ['  '] }))

    expect(response.status).toBe(400)
    await expect(response.json()).resolves.toEqual({
      error: 'At least one ingredient is required to recommend recipes.',
      code: 'missing_ingredients',
    })
  })

  it('returns 400 for invalid request payloads', async () => {
    getFridgeServicesMock.mockReturnValue(createServices())

    const { POST } = await import('./route')
    const response = await POST(makeJsonRequest({ ingredients: ['egg'], count: 0 }))

    expect(response.status).toBe(400)
    await expect(response.json()).resolves.toMatchObject({
      error: 'Invalid request payload.',
      code: 'invalid_payload',
    })
  })

  it('returns 400 for malformed JSON', async () => {
    getFridgeServicesMock.mockReturnValue(createServices())

    const { POST } = await import('./route')
    const response = await POST(makeJsonRequest('{"ingredients": ['))

    expect(response.status).toBe(400)
    await expect(response.json()).resolves.toEqual({
      error: 'Request body must be valid JSON.',
      code: 'invalid_json',
    })
  })

  it('returns 500 config_error when configuration is invalid', async () => {
    getFridgeServicesMock.mockImplementation(() => loadFridgeConfig({}))

    const { POST } = await import('./route')
    const response = await POST(makeJsonRequest({ ingredients: ['egg'] }))

    expect(response.status).toBe(500)
    await expect(response.json()).resolves.toEqual({ error: 'Service is not configured.', code: 'config_error' })
  })
})
