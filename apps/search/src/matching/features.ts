import {
  BRAND_RULES,
  CATEGORY_RULES,
  COLOR_PATTERN,
  KEY_SPEC_RULES,
  MODEL_RULES,
  STORAGE_PATTERN,
  type LabelRule,
} from './feature-rules.js'

export interface FeatureSet {
  brand?: string
  model?: string
  /** e.g. "128GB" */
  storage?: string
  color?: string
  category?: string
  keySpecs: string[]
}

function firstLabel(rules: readonly LabelRule[], text: string): string | undefined {
  return rules.find((rule) => rule.pattern.test(text))?.label
}

function extractModel(text: string, brand: string | undefined): string | undefined {
  for (const rule of MODEL_RULES) {
    if (rule.brand !== undefined && rule.brand !== brand) continue
    const model = rule.pattern.exec(text)?.[1]?.trim()
    if (model) return model
  }
  return undefined
}

/**
 * Extract brand, model, storage, colour, category and key specs from a
 * product name and the query it was found for. Brand runs first because
 * some model rules only apply to one brand.
 */
export function extractFeatures(productName: string, query = ''): FeatureSet {
  const text = `${productName} ${query}`.toLowerCase()
  const features: FeatureSet = { keySpecs: [] }

  const brand = firstLabel(BRAND_RULES, text)
  if (brand) features.brand = brand

  const model = extractModel(text, brand)
  if (model) features.model = model

  const storage = STORAGE_PATTERN.exec(text)
  if (storage) features.storage = `${storage[1]}${(storage[2] ?? '').toUpperCase()}`

  const color = COLOR_PATTERN.exec(text)?.[1]
  if (color) features.color = color

  const category = firstLabel(CATEGORY_RULES, text)
  if (category) features.category = category

  for (const rule of KEY_SPEC_RULES) {
    const match = text.match(rule.pattern)
    if (match) features.keySpecs.push(rule.format(match))
  }

  return features
}
