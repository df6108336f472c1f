import { z } from 'zod'
import labelPolicyData from './label-policy.json'
import type { LabelPolicy, LabelRule } from './types'

const labelListSchema = z.array(z.string().trim().min(1))
const labelMapSchema = z.record(z.string().trim().min(1), z.string().trim().min(1))

export const labelPolicySourceSchema = z.object({
  foods: labelListSchema,
  aliases: labelMapSchema.optional().default({}),
  containers: labelMapSchema.optional().default({}),
  nonFood: labelListSchema.optional().default([]),
  invariantWords: labelListSchema.optional().default([]),
})

export type LabelPolicySource = z.input<typeof labelPolicySourceSchema>

const ES_SUFFIX_PATTERN = /(ches|shes|sses|xes|zes|oes)$/

// Singulars ending in "ie", so "cookies" is not read as "cooky".
const IE_SINGULARS: ReadonlySet<string> = new Set(['brownie', 'cookie', 'pie', 'smoothie', 'veggie'])

function singularizeWord(word: string, invariantWords: ReadonlySet<string>): string {
  if (word.length <= 3 || invariantWords.has(word)) return word
  if (/(ss|us|is)$/.test(word)) return word
  if (word.endsWith('ies')) {
    const withIe = word.slice(0, -1)
    return word.length <= 4 || IE_SINGULARS.has(withIe) ? withIe : `${word.slice(0, -3)}y`
  }
  if (ES_SUFFIX_PATTERN.test(word)) return word.slice(0, -2)
  if (word.endsWith('s')) return word.slice(0, -1)
  return word
}

/**
 * Lowercases, collapses separators and singularizes the last word, so
 * "Cherry_Tomatoes " and "cherry tomato" share one key.
 */
export function canonicalizeLabel(label: string, invariantWords: ReadonlySet<string> = new Set()): string {
  const words = label
    .toLowerCase()
    .replace(/[_\s]+/g, ' ')
    .trim()
    .split(' ')
    .filter(Boolean)

  if (words.length === 0) return ''

  const lastIndex = words.length - 1
  words[lastIndex] = singularizeWord(words[lastIndex] ?? '', invariantWords)
  return words.join(' ')
}

export function buildLabelPolicy(source: LabelPolicySource): LabelPolicy {
  const parsed = labelPolicySourceSchema.parse(source)
  const invariantWords = new Set(parsed.invariantWords.map((word) => word.toLowerCase()))
  const canonical = (label: string) => canonicalizeLabel(label, invariantWords)
  const rules = new Map<string, LabelRule>()

  for (const food of parsed.foods) {
    const name = canonical(food)
    rules.set(name, { action: 'food', food: name })
  }

  for (const [alias, food] of Object.entries(parsed.aliases)) {
    rules.set(canonical(alias), { action: 'food', food: canonical(food) })
  }

  for (const [container, food] of Object.entries(parsed.containers)) {
    rules.set(canonical(container), { action: 'food', food: canonical(food) })
  }

  // Non-food classes win over any food or container entry with the same key.
  for (const label of parsed.nonFood) {
    rules.set(canonical(label), { action: 'drop' })
  }

  return { rules, invariantWords }
}

export const DEFAULT_LABEL_POLICY: LabelPolicy = buildLabelPolicy(labelPolicyData)

export type ResolvedLabel =
  | { kind: 'food'; name: string }
  | { kind: 'non_food' }
  | { kind: 'unknown' }

export function resolveLabel(label: string, policy: LabelPolicy = DEFAULT_LABEL_POLICY): ResolvedLabel {
  const key = canonicalizeLabel(label, policy.invariantWords)
  const rule = policy.rules.get(key)
  if (!rule) return { kind: 'unknown' }
  if (rule.action === 'drop') return { kind: 'non_food' }
  return { kind: 'food', name: rule.food }
}
