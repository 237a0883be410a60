/**
 * Internal Helpers
 *
 * Text helpers shared by the formatting and parsing code of each value type.
 */

export function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

export function padN(n: number, width: number): string {
  let s = '' + Math.abs(n)
  while (s.length < width) s = '0' + s
  return n < 0 ? '-' + s : s
}

/** ISO year text: four digits, a sign beyond 9999, a minus before negatives. */
export function formatYear(year: number): string {
  if (Math.abs(year) < 1000) return padN(year, 4)
  if (year > 9999) return '+' + year
  return '' + year
}

/** Fraction of a second as 3, 6 or 9 digits, with the leading dot; empty when zero. */
export function formatNanoFraction(nano: number): string {
  if (nano === 0) return ''
  if (nano % 1_000_000 === 0) return '.' + padN(nano / 1_000_000, 3)
  if (nano % 1_000 === 0) return '.' + padN(nano / 1_000, 6)
  return '.' + padN(nano, 9)
}

/** Parses 1 to 9 fraction digits into nanoseconds. */
export function fractionToNanos(digits: string): number {
  return parseInt((digits + '000000000').substring(0, 9), 10)
}

export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
}
