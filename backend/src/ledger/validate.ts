/** Reserved name an unset item argument would carry. `add` never stores it. */
export const RESERVED_ITEM_NAME = 'default'

export function isItemName(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0
}

export function isAddableItemName(value: unknown): value is string {
  return isItemName(value) && value !== RESERVED_ITEM_NAME
}

// Booleans are not quantities, neither are fractions, NaN, Infinity or integers past 2^53 - 1
export function isQuantity(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value)
}

const integerPattern = /^[+-]?\d+$/

/**
 * Converts command line or other textual input to a quantity.
 * Returns undefined when the text is not a plain decimal integer.
 */
export function toQuantity(value: unknown): number | undefined {
  if (isQuantity(value)) return value
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  if (!integerPattern.test(trimmed)) return undefined
  const n = Number.parseInt(trimmed, 10)
  return Number.isSafeInteger(n) ? n : undefined
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export interface IstockEntries {
  entries: Array<[string, number]>
  rejected: string[]
}

/**
 * Splits a parsed document into entries the Stock Map may hold and the keys it must drop:
 * empty names and values that are not positive integers.
 */
export function toStockEntries(document: Record<string, unknown>): IstockEntries {
  const result: IstockEntries = { entries: [], rejected: [] }
  for (const [key, value] of Object.entries(document)) {
    if (isItemName(key) && isQuantity(value) && value > 0) result.entries.push([key, value])
    else result.rejected.push(key)
  }
  return result
}
