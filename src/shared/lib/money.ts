/**
 * Currency helpers
 * Amounts are euros held as numbers and always rounded to cents
 */

export const CURRENCY_SYMBOL = '€'

export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100
}

/** Fixed-point text used in the CSV log, e.g. `1.50` */
export function formatAmount(amount: number): string {
  return roundToCents(amount).toFixed(2)
}

/** Display text, e.g. `1.50 €` */
export function formatCurrency(amount: number): string {
  return `${formatAmount(amount)} ${CURRENCY_SYMBOL}`
}

export function sumAmounts(amounts: Iterable<number>): number {
  let total = 0
  for (const amount of amounts) {
    total += amount
  }
  return roundToCents(total)
}
