import { NextResponse } from 'next/server'
import { getFridgeServices } from '@/lib/fridge/runtime'
import { errorResponse, readJsonBody } from '@/lib/http/responses'
import { recommendRequestSchema } from '@/lib/recipes/schema'

export const runtime = 'nodejs'

export async function POST(request: Request) {
  try {
    const body = recommendRequestSchema.parse(await readJsonBody(request))
    const services = getFridgeServices()

    const recommendation = await services.recipeEngine.recommend(body.ingredients, {
      cuisine: body.cuisine ?? undefined,
      diet: body.diet ?? undefined,
      maxReadyMinutes: body.maxReadyMinutes ?? undefined,
      desiredCount: body.count ?? services.config.maxRecipes,
    })

    return NextResponse.json({
      recipes: recommendation.recipes,
      source: recommendation.source,
      count: recommendation.recipes.length,
    })
  } catch (error) {
    return errorResponse(error, '[api/recipes/recommend]')
  }
}
