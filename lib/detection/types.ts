import type { BoundingBox } from '@/lib/geometry/bbox'

export type SourcePass = 'original' | 'enhanced'

export type Detection = {
  label: string
  confidence: number
  bbox: BoundingBox
  sourcePass: SourcePass
}

export type Ingredient = {
  name: string
  confidence: number
  occurrenceCount: number
}

export type LabelRule = { action: 'food'; food: string } | { action: 'drop' }

export type LabelPolicy = {
  rules: ReadonlyMap<string, LabelRule>
  invariantWords: ReadonlySet<string>
}

export type NormalizeOptions = {
  confidenceThreshold: number
  iouThreshold: number
  policy?: LabelPolicy
}
