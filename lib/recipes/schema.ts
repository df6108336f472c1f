import { z } from 'zod'

const ingredientRefSchema = z.object({
  name: z.string().trim().min(1),
})

const optionalCount = z.number().int().min(0).nullable().optional()

export const spoonacularRecipeSchema = z.object({
  id: z.union([z.number().int(), z.string().trim().min(1)]),
  title: z.string().trim().min(1),
  image: z.string().nullable().optional(),
  readyInMinutes: z.number().positive().nullable().optional(),
  servings: z.number().positive().nullable().optional(),
  sourceUrl: z.string().nullable().optional(),
  healthScore: z.number().nullable().optional(),
  usedIngredientCount: optionalCount,
  missedIngredientCount: optionalCount,
  usedIngredients: z.array(ingredientRefSchema).optional().default([]),
  missedIngredients: z.array(ingredientRefSchema).optional().default([]),
  cuisines: z.array(z.string()).optional().default([]),
  diets: z.array(z.string()).optional().default([]),
})

export const spoonacularSearchResponseSchema = z.object({
  results: z.array(spoonacularRecipeSchema),
})

export type SpoonacularRecipe = z.output<typeof spoonacularRecipeSchema>

export const recommendRequestSchema = z.object({
  ingredients: z.array(z.string().trim().max(80)).max(100),
  cuisine: z.string().trim().max(60).optional().nullable(),
  diet: z.string().trim().max(60).optional().nullable(),
  maxReadyMinutes: z.number().int().positive().max(24 * 60).optional().nullable(),
  count: z.number().int().min(1).max(100).optional(),
})

export type RecommendRequest = z.output<typeof recommendRequestSchema>
