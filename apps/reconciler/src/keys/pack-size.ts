/**
 * Pack-size parsing: "2kg", "400 g", "12x85g", "6 x 400 g", "4.4lb".
 */

const UNIT_GRAMS: Record<string, number> = {
  g: 1,
  kg: 1000,
  lb: 453.59237,
  lbs: 453.59237,
  oz: 28.349523125,
}

const UNIT_PATTERN = '(kg|g|lbs?|oz|ml|l)'
const AMOUNT_PATTERN = '(\\d+(?:[.,]\\d+)?)'

const SINGLE_SIZE = new RegExp(`^${AMOUNT_PATTERN}\\s*${UNIT_PATTERN}$`)
const MULTIPACK = new RegExp(`^(\\d+)\\s*x\\s*${AMOUNT_PATTERN}\\s*${UNIT_PATTERN}$`)

// Used inside product names; \b keeps "400g" from matching inside "1400gx".
export const MULTIPACK_IN_TEXT = new RegExp(
  `\\b\\d+\\s*x\\s*\\d+(?:[.,]\\d+)?\\s*(?:kg|g|lbs?|oz|ml|l)\\b`,
  'g'
)
export const SINGLE_SIZE_IN_TEXT = new RegExp(`\\b\\d+(?:[.,]\\d+)?\\s*(?:kg|g|lbs?|oz|ml|l)\\b`, 'g')

export interface PackSize {
  count: number
  amount: number
  unit: string
}

export function parsePackSize(size: string): PackSize | null {
  const text = size.trim().toLowerCase()

  const multi = MULTIPACK.exec(text)
  if (multi) {
    return {
      count: Number(multi[1]),
      amount: Number(multi[2].replace(',', '.')),
      unit: multi[3],
    }
  }

  const single = SINGLE_SIZE.exec(text)
  if (single) {
    return { count: 1, amount: Number(single[1].replace(',', '.')), unit: single[2] }
  }

  return null
}

export function isPackSizeToken(token: string): boolean {
  return parsePackSize(token) !== null
}

/**
 * Total net weight in kg, or null for volumes and unparseable sizes.
 */
export function weightKg(size: string | null | undefined): number | null {
  if (!size) return null
  const parsed = parsePackSize(size)
  if (!parsed) return null
  const grams = UNIT_GRAMS[parsed.unit]
  if (grams === undefined) return null
  const kg = (parsed.count * parsed.amount * grams) / 1000
  return kg > 0 ? kg : null
}
