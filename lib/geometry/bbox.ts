/**
 * Axis-aligned box in absolute pixel coordinates, top-left (x1, y1) to
 * bottom-right (x2, y2).
 */
export type BoundingBox = {
  x1: number
  y1: number
  x2: number
  y2: number
}

export function isValidBox(box: BoundingBox): boolean {
  const coords = [box.x1, box.y1, box.x2, box.y2]
  if (!coords.every((value) => Number.isFinite(value))) return false
  return box.x1 < box.x2 && box.y1 < box.y2
}

export function boxArea(box: BoundingBox): number {
  const width = box.x2 - box.x1
  const height = box.y2 - box.y1
  if (width <= 0 || height <= 0) return 0
  return width * height
}

export function intersectionArea(a: BoundingBox, b: BoundingBox): number {
  const width = Math.min(a.x2, b.x2) - Math.max(a.x1, b.x1)
  const height = Math.min(a.y2, b.y2) - Math.max(a.y1, b.y1)
  if (width <= 0 || height <= 0) return 0
  return width * height
}

/**
 * Intersection over union in [0, 1]. Touching or disjoint boxes give 0, as does
 * a pair of degenerate boxes.
 */
export function intersectionOverUnion(a: BoundingBox, b: BoundingBox): number {
  const intersection = intersectionArea(a, b)
  if (intersection === 0) return 0

  const union = boxArea(a) + boxArea(b) - intersection
  return union > 0 ? intersection / union : 0
}
