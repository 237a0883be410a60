/**
 * Integer arithmetic on safe integers.
 *
 * Every checked operation raises ArithmeticOverflowError when the exact
 * result cannot be represented as a safe integer.
 */

import { ArithmeticOverflowError } from '../errors'

export const NANOS_PER_SECOND = 1_000_000_000
export const NANOS_PER_MILLI = 1_000_000
export const NANOS_PER_MICRO = 1_000
export const MILLIS_PER_SECOND = 1_000
export const SECONDS_PER_MINUTE = 60
export const SECONDS_PER_HOUR = 3_600
export const SECONDS_PER_DAY = 86_400
export const MINUTES_PER_HOUR = 60
export const MINUTES_PER_DAY = 1_440
export const HOURS_PER_DAY = 24
export const NANOS_PER_MINUTE = 60_000_000_000
export const NANOS_PER_HOUR = 3_600_000_000_000
export const NANOS_PER_DAY = 86_400_000_000_000

const INT_MIN = -2147483648
const INT_MAX = 2147483647

// ============================================================================
// Floor Division
// ============================================================================

/** Floor division by a positive divisor, exact across the whole safe range. */
export function floorDiv(a: number, b: number): number {
  let q = Math.floor(a / b)
  const r = a - q * b
  if (r < 0) q--
  else if (r >= b) q++
  return q
}

export function floorMod(a: number, b: number): number {
  return a - floorDiv(a, b) * b
}

// ============================================================================
// Checked Arithmetic
// ============================================================================

function checkSafe(value: number, op: string): number {
  if (!Number.isSafeInteger(value)) throw new ArithmeticOverflowError(`${op} overflows the supported range`)
  return value
}

export function addExact(a: number, b: number): number {
  return checkSafe(a + b, 'Addition')
}

export function subtractExact(a: number, b: number): number {
  return checkSafe(a - b, 'Subtraction')
}

export function multiplyExact(a: number, b: number): number {
  if (a === 0 || b === 0) return 0
  return checkSafe(a * b, 'Multiplication')
}

export function negateExact(a: number): number {
  return a === 0 ? 0 : -a
}

export function toIntExact(a: number): number {
  if (a < INT_MIN || a > INT_MAX) throw new ArithmeticOverflowError(`Value ${a} does not fit an int`)
  return a
}

/** Converts a bigint to a number, failing when it is outside the safe range. */
export function bigToSafe(value: bigint, op: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new ArithmeticOverflowError(`${op} overflows the supported range`)
  }
  return Number(value)
}

/** Floor division on bigint values. */
export function bigFloorDiv(a: bigint, b: bigint): bigint {
  const q = a / b
  return (a % b !== 0n) && ((a < 0n) !== (b < 0n)) ? q - 1n : q
}

export function bigFloorMod(a: bigint, b: bigint): bigint {
  return a - bigFloorDiv(a, b) * b
}

/** Normalises a JavaScript `-0` to `0`. */
export function zeroSign(n: number): number {
  return n === 0 ? 0 : n
}
