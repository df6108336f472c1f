import { intersectionOverUnion } from '@/lib/geometry/bbox'
import { DEFAULT_LABEL_POLICY, resolveLabel } from './label-policy'
import type { Detection, Ingredient, NormalizeOptions, SourcePass } from './types'

export type RawDetection = Omit<Detection, 'sourcePass'>

type ResolvedDetection = Detection & {
  name: string
  index: number
}

export function poolDetectionPasses(passes: {
  original: readonly RawDetection[]
  enhanced?: readonly RawDetection[]
}): Detection[] {
  const tag = (sourcePass: SourcePass) => (detection: RawDetection): Detection => ({ ...detection, sourcePass })
  return [...passes.original.map(tag('original')), ...(passes.enhanced ?? []).map(tag('enhanced'))]
}

function meanConfidence(detections: ResolvedDetection[], sourcePass: SourcePass): number {
  const scores = detections.filter((detection) => detection.sourcePass === sourcePass).map((d) => d.confidence)
  if (scores.length === 0) return 0
  return scores.reduce((sum, score) => sum + score, 0) / scores.length
}

/**
 * Pass order used when two detections share a confidence: the pass that scored
 * higher on average wins, and the original image wins an exact draw.
 */
function rankPasses(detections: ResolvedDetection[]): Record<SourcePass, number> {
  const enhancedAhead = meanConfidence(detections, 'enhanced') > meanConfidence(detections, 'original')
  return enhancedAhead ? { enhanced: 0, original: 1 } : { original: 0, enhanced: 1 }
}

function resolveDetections(detections: readonly Detection[], options: NormalizeOptions): ResolvedDetection[] {
  const policy = options.policy ?? DEFAULT_LABEL_POLICY
  const resolved: ResolvedDetection[] = []

  detections.forEach((detection, index) => {
    if (!(detection.confidence >= options.confidenceThreshold)) return

    const label = resolveLabel(detection.label, policy)
    if (label.kind !== 'food') return

    resolved.push({ ...detection, name: label.name, index })
  })

  return resolved
}

function suppressDuplicates(sorted: ResolvedDetection[], iouThreshold: number): Map<string, ResolvedDetection[]> {
  const keptByName = new Map<string, ResolvedDetection[]>()

  for (const detection of sorted) {
    const kept = keptByName.get(detection.name) ?? []
    const overlapsKept = kept.some((keeper) => intersectionOverUnion(keeper.bbox, detection.bbox) >= iouThreshold)
    if (overlapsKept) continue

    kept.push(detection)
    keptByName.set(detection.name, kept)
  }

  return keptByName
}

export function compareIngredients(a: Ingredient, b: Ingredient): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence
  if (a.name < b.name) return -1
  if (a.name > b.name) return 1
  return 0
}

/**
 * Turns raw detections (one or two pooled passes) into a de-duplicated
 * ingredient list. Non-max suppression runs per resolved label, so two
 * different foods overlapping on screen are both kept.
 */
export function normalizeDetections(detections: readonly Detection[], options: NormalizeOptions): Ingredient[] {
  const resolved = resolveDetections(detections, options)
  if (resolved.length === 0) return []

  const passRank = rankPasses(resolved)
  const sorted = [...resolved].sort((a, b) => {
    if (a.confidence !== b.confidence) return b.confidence - a.confidence
    if (a.sourcePass !== b.sourcePass) return passRank[a.sourcePass] - passRank[b.sourcePass]
    return a.index - b.index
  })

  const ingredients: Ingredient[] = []
  for (const [name, kept] of suppressDuplicates(sorted, options.iouThreshold)) {
    ingredients.push({
      name,
      confidence: Math.max(...kept.map((detection) => detection.confidence)),
      occurrenceCount: kept.length,
    })
  }

  return ingredients.sort(compareIngredients)
}

export function ingredientNames(ingredients: readonly Ingredient[]): string[] {
  return ingredients.map((ingredient) => ingredient.name)
}
