import { ingredientNames, normalizeDetections, poolDetectionPasses } from '@/lib/detection/normalize'
import type { Detection, Ingredient } from '@/lib/detection/types'
import { ConfigError, ServiceError } from '@/lib/errors'
import type { RecipeCandidate, RecipeSource } from '@/lib/recipes/types'
import { ENHANCED_IMAGE_MIME_TYPE, enhanceImage, readImageDimensions } from '@/lib/vision/enhance'
import { validateImage } from '@/lib/vision/image'
import type { VisionClient, VisionImage } from '@/lib/vision/types'
import type { FridgePreferences } from './schema'
import type { FridgeServices } from './services'

export type FridgeImageUpload = {
  bytes: Uint8Array
  mimeType: string
}

export type FridgeAnalysis = {
  ingredients: Ingredient[]
  recipes: RecipeCandidate[]
  recipeSource: RecipeSource | null
  summary: {
    itemsDetected: number
    recipesFound: number
    averageConfidence: number
  }
}

function averageConfidence(ingredients: readonly Ingredient[]): number {
  if (ingredients.length === 0) return 0
  const total = ingredients.reduce((sum, ingredient) => sum + ingredient.confidence, 0)
  return Math.round((total / ingredients.length) * 1000) / 1000
}

async function detectEnhanced(vision: VisionClient, image: VisionImage, confidenceThreshold: number) {
  try {
    const bytes = await enhanceImage(image.bytes)
    return await vision.detect(
      { bytes, mimeType: ENHANCED_IMAGE_MIME_TYPE, width: image.width, height: image.height },
      { confidenceThreshold, sourcePass: 'enhanced' },
    )
  } catch (error) {
    console.warn('[fridge] enhanced pass failed, continuing with original detections', {
      kind: error instanceof ServiceError ? error.kind : null,
      message: error instanceof Error ? error.message : String(error),
    })
    return []
  }
}

/**
 * Photo in, ranked ingredients and recipes out. The original pass must
 * succeed; the enhanced pass only adds detections.
 */
export async function analyzeFridgeImage(
  upload: FridgeImageUpload,
  preferences: FridgePreferences,
  services: FridgeServices,
): Promise<FridgeAnalysis> {
  const { config, vision } = services
  const validated = validateImage(upload, config.maxImageBytes)
  if (!vision) {
    throw new ConfigError('OPENAI_API_KEY is required to analyze fridge images.', ['OPENAI_API_KEY: is required'])
  }

  const dimensions = await readImageDimensions(validated.bytes)
  const image: VisionImage = dimensions ? { ...validated, ...dimensions } : validated
  const threshold = config.confidenceThreshold

  const [original, enhanced] = await Promise.all([
    vision.detect(image, { confidenceThreshold: threshold, sourcePass: 'original' }),
    config.enhancedPass ? detectEnhanced(vision, image, threshold) : Promise.resolve<Detection[]>([]),
  ])

  const ingredients = normalizeDetections(poolDetectionPasses({ original, enhanced }), {
    confidenceThreshold: threshold,
    iouThreshold: config.iouThreshold,
  })

  if (ingredients.length === 0) {
    return {
      ingredients,
      recipes: [],
      recipeSource: null,
      summary: { itemsDetected: 0, recipesFound: 0, averageConfidence: 0 },
    }
  }

  const recommendation = await services.recipeEngine.recommend(
    ingredientNames(ingredients),
    {
      cuisine: preferences.cuisine,
      diet: preferences.diet,
      maxReadyMinutes: preferences.maxReadyMinutes,
      desiredCount: preferences.count ?? config.maxRecipes,
    },
  )

  return {
    ingredients,
    recipes: recommendation.recipes,
    recipeSource: recommendation.source,
    summary: {
      itemsDetected: ingredients.length,
      recipesFound: recommendation.recipes.length,
      averageConfidence: averageConfidence(ingredients),
    },
  }
}
