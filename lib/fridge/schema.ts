import { z } from 'zod'

function emptyToUndefined(value: unknown) {
  if (value === null) return undefined
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  return trimmed ? trimmed : undefined
}

const formText = z.preprocess(emptyToUndefined, z.string().max(60).optional())
const formInteger = (schema: z.ZodNumber) => z.preprocess(emptyToUndefined, z.coerce.number().pipe(schema).optional())

/** Optional recipe preferences sent as multipart form fields next to the image. */
export const fridgePreferencesSchema = z.object({
  cuisine: formText,
  diet: formText,
  maxReadyMinutes: formInteger(z.number().int().positive().max(24 * 60)),
  count: formInteger(z.number().int().min(1).max(100)),
})

export type FridgePreferences = z.output<typeof fridgePreferencesSchema>
