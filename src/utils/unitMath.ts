/**
 * Integer helpers for unit and price arithmetic
 */

export function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

export function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Price of `units` at `unitPrice`, or null when the product leaves the safe integer range
 */
export function totalPrice(units: number, unitPrice: number): number | null {
  const total = units * unitPrice;
  return Number.isSafeInteger(total) ? total : null;
}

/**
 * Share of the asset held, as a percentage rounded to 4 decimal places
 */
export function ownershipPercent(units: number, totalUnits: number): number {
  if (totalUnits <= 0) {
    return 0;
  }
  return Math.round((units / totalUnits) * 100 * 10000) / 10000;
}
