/**
 * Ordered rule tables for product feature extraction.
 *
 * Rules are evaluated top to bottom and the first hit wins, so adding a
 * brand, model family or colour is a new row, not new code.
 */

export interface LabelRule {
  label: string
  pattern: RegExp
}

/**
 * A model rule reads the model from capture group 1.
 * `brand` restricts it to texts where that brand was detected.
 */
export interface ModelRule {
  brand?: string
  pattern: RegExp
}

export interface SpecRule {
  pattern: RegExp
  format: (match: RegExpMatchArray) => string
}

export const BRAND_RULES: readonly LabelRule[] = [
  { label: 'apple', pattern: /\b(apple|iphone|ipad|macbook|imac|airpods)\b/ },
  { label: 'samsung', pattern: /\b(samsung|galaxy)\b/ },
  { label: 'oneplus', pattern: /\b(oneplus|one\s*plus)\b/ },
  { label: 'xiaomi', pattern: /\b(xiaomi|mi|redmi)\b/ },
  { label: 'oppo', pattern: /\boppo\b/ },
  { label: 'vivo', pattern: /\bvivo\b/ },
  { label: 'realme', pattern: /\brealme\b/ },
  { label: 'google', pattern: /\b(google|pixel)\b/ },
  { label: 'sony', pattern: /\b(sony|xperia)\b/ },
  { label: 'lg', pattern: /\blg\b/ },
  { label: 'motorola', pattern: /\b(motorola|moto)\b/ },
  { label: 'nokia', pattern: /\bnokia\b/ },
  { label: 'huawei', pattern: /\b(huawei|honor)\b/ },
]

export const MODEL_RULES: readonly ModelRule[] = [
  { brand: 'apple', pattern: /\biphone\s*(\d+(?:\s*pro)?(?:\s*max)?)\b/ },
  { brand: 'samsung', pattern: /\bgalaxy\s*([a-z]\d+(?:\s*\+)?)/ },
  { brand: 'google', pattern: /\bpixel\s*(\d+(?:\s*pro)?(?:\s*xl)?)\b/ },
  { pattern: /\b([a-z]+\s*\d+(?:\s*[a-z]+)*)\b/ },
]

export const STORAGE_PATTERN = /\b(\d+)\s*(gb|tb|mb)\b/

export const COLOR_PATTERN =
  /\b(black|white|blue|red|green|gold|silver|rose|pink|purple|yellow|orange|gray|grey|titanium|natural|midnight|starlight)\b/

export const CATEGORY_RULES: readonly LabelRule[] = [
  { label: 'smartphone', pattern: /\b(phone|smartphone|mobile|iphone)\b/ },
  { label: 'laptop', pattern: /\b(laptop|notebook|macbook)\b/ },
  { label: 'tablet', pattern: /\b(tablet|ipad)\b/ },
  { label: 'headphones', pattern: /\b(headphones|earphones|airpods|earbuds)\b/ },
  { label: 'watch', pattern: /\b(watch|smartwatch)\b/ },
]

export const KEY_SPEC_RULES: readonly SpecRule[] = [
  { pattern: /\b(\d+)\s*gb\s*(?:ram|memory)\b/, format: (match) => `${match[1]}GB RAM` },
  { pattern: /\b(\d+)\s*mp\b/, format: (match) => `${match[1]}MP` },
  { pattern: /\b(\d+(?:\.\d+)?)\s*(?:inch|in)\b/, format: (match) => `${match[1]}"` },
]
