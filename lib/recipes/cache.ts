import { createHash } from 'node:crypto'
import { canonicalizeConstraint, canonicalizeIngredientList } from './constraints'
import type { RecipeCandidate, RecipeConstraint } from './types'

const DEFAULT_MAX_ENTRIES = 500

type CacheEntry = {
  key: string
  value: RecipeCandidate[]
  expiresAt: number
}

export type RecipeResultCacheOptions = {
  ttlMs: number
  maxEntries?: number
  now?: () => number
}

export function buildRecipeCacheKey(ingredients: readonly string[], constraint: RecipeConstraint): string {
  const canonical = canonicalizeConstraint(constraint)
  const payload = JSON.stringify({
    ingredients: canonicalizeIngredientList(ingredients),
    cuisine: canonical.cuisine ?? null,
    diet: canonical.diet ?? null,
    maxReadyMinutes: canonical.maxReadyMinutes ?? null,
    desiredCount: canonical.desiredCount,
  })
  return createHash('sha256').update(payload).digest('hex')
}

/**
 * Time-bounded memo of ranked recipe lists. Each key holds one private copy
 * that is replaced wholesale on write; expired entries read as misses.
 */
export class RecipeResultCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly ttlMs: number
  private readonly maxEntries: number
  private readonly now: () => number

  constructor(options: RecipeResultCacheOptions) {
    this.ttlMs = options.ttlMs
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES)
    this.now = options.now ?? Date.now
  }

  get size(): number {
    return this.entries.size
  }

  get(key: string): RecipeCandidate[] | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key)
      return undefined
    }

    return structuredClone(entry.value)
  }

  set(key: string, value: readonly RecipeCandidate[]): void {
    this.entries.delete(key)
    if (this.entries.size >= this.maxEntries) {
      this.prune()
    }
    while (this.entries.size >= this.maxEntries) {
      const oldestKey = this.entries.keys().next().value
      if (oldestKey === undefined) break
      this.entries.delete(oldestKey)
    }

    this.entries.set(key, { key, value: structuredClone([...value]), expiresAt: this.now() + this.ttlMs })
  }

  prune(): number {
    const now = this.now()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key)
        removed += 1
      }
    }
    return removed
  }
}
