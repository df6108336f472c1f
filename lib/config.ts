import { z } from 'zod'
import { ConfigError } from '@/lib/errors'

const DEFAULT_IOU_THRESHOLD = 0.45
const DEFAULT_MAX_RECIPES = 10
const DEFAULT_MIN_INTERVAL_SECONDS = 1
const DEFAULT_QUOTA_COOLDOWN_SECONDS = 15 * 60
const DEFAULT_CACHE_TTL_SECONDS = 60 * 60
const DEFAULT_SERVICE_TIMEOUT_MS = 8_000
const DEFAULT_RETRY_MAX_ATTEMPTS = 3
const DEFAULT_MAX_IMAGE_BYTES = 20 * 1024 * 1024
const DEFAULT_VISION_MODEL = 'gpt-4.1-mini'

function blankToUndefined(value: unknown) {
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  return trimmed ? trimmed : undefined
}

const requiredNumber = (schema: z.ZodNumber) =>
  z.preprocess(blankToUndefined, z.string({ required_error: 'is required' }).pipe(z.coerce.number().pipe(schema)))
const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess(blankToUndefined, z.coerce.number().pipe(schema).optional())
const envString = z.preprocess(blankToUndefined, z.string().optional())
const envBoolean = z.preprocess(
  (value) => {
    const normalized = blankToUndefined(value)
    return typeof normalized === 'string' ? normalized.toLowerCase() : normalized
  },
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((value) => (value === undefined ? undefined : ['true', '1', 'yes'].includes(value))),
)

const unitInterval = z.number().min(0).max(1)

const fridgeEnvSchema = z.object({
  FRIDGE_CONFIDENCE_THRESHOLD: requiredNumber(unitInterval),
  FRIDGE_IOU_THRESHOLD: optionalNumber(unitInterval),
  FRIDGE_MAX_RECIPES: optionalNumber(z.number().int().min(1).max(100)),
  FRIDGE_MAX_IMAGE_BYTES: optionalNumber(z.number().int().positive()),
  FRIDGE_ENHANCED_PASS: envBoolean,
  RECIPE_RATE_LIMIT_MIN_INTERVAL_SECONDS: optionalNumber(z.number().min(0)),
  RECIPE_QUOTA_COOLDOWN_SECONDS: optionalNumber(z.number().min(0)),
  RECIPE_CACHE_TTL_SECONDS: optionalNumber(z.number().positive()),
  RECIPE_SERVICE_TIMEOUT_MS: optionalNumber(z.number().int().positive()),
  RECIPE_RETRY_MAX_ATTEMPTS: optionalNumber(z.number().int().min(1).max(10)),
  OPENAI_API_KEY: envString,
  VISION_MODEL: envString,
  SPOONACULAR_API_KEY: envString,
})

export type FridgeConfig = {
  confidenceThreshold: number
  iouThreshold: number
  maxRecipes: number
  maxImageBytes: number
  enhancedPass: boolean
  rateLimitMinIntervalSeconds: number
  quotaCooldownSeconds: number
  cacheTtlSeconds: number
  serviceTimeoutMs: number
  retryMaxAttempts: number
  openaiApiKey: string | null
  visionModel: string
  spoonacularApiKey: string | null
}

/**
 * Reads the analysis settings from the environment. The confidence threshold
 * has no default and must be set explicitly.
 */
export function loadFridgeConfig(env: Record<string, string | undefined> = process.env): FridgeConfig {
  const parsed = fridgeEnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid fridge configuration: ${issues.join('; ')}`, issues)
  }

  const values = parsed.data
  return {
    confidenceThreshold: values.FRIDGE_CONFIDENCE_THRESHOLD,
    iouThreshold: values.FRIDGE_IOU_THRESHOLD ?? DEFAULT_IOU_THRESHOLD,
    maxRecipes: values.FRIDGE_MAX_RECIPES ?? DEFAULT_MAX_RECIPES,
    maxImageBytes: values.FRIDGE_MAX_IMAGE_BYTES ?? DEFAULT_MAX_IMAGE_BYTES,
    enhancedPass: values.FRIDGE_ENHANCED_PASS ?? true,
    rateLimitMinIntervalSeconds: values.RECIPE_RATE_LIMIT_MIN_INTERVAL_SECONDS ?? DEFAULT_MIN_INTERVAL_SECONDS,
    quotaCooldownSeconds: values.RECIPE_QUOTA_COOLDOWN_SECONDS ?? DEFAULT_QUOTA_COOLDOWN_SECONDS,
    cacheTtlSeconds: values.RECIPE_CACHE_TTL_SECONDS ?? DEFAULT_CACHE_TTL_SECONDS,
    serviceTimeoutMs: values.RECIPE_SERVICE_TIMEOUT_MS ?? DEFAULT_SERVICE_TIMEOUT_MS,
    retryMaxAttempts: values.RECIPE_RETRY_MAX_ATTEMPTS ?? DEFAULT_RETRY_MAX_ATTEMPTS,
    openaiApiKey: values.OPENAI_API_KEY ?? null,
    visionModel: values.VISION_MODEL ?? DEFAULT_VISION_MODEL,
    spoonacularApiKey: values.SPOONACULAR_API_KEY ?? null,
  }
}
