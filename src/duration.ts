/**
 * Duration
 *
 * A time-based amount of seconds and nanoseconds. The nanosecond part is
 * always in [0, 999,999,999]; a negative duration carries its sign in the
 * seconds, so -0.1s is (-1 s, 900,000,000 ns).
 *
 * Seconds are bounded by the safe-integer range; leaving it raises
 * ArithmeticOverflowError. Nanosecond totals are computed with bigint.
 */

import type {
  Duration, Instant, LocalTime, LocalDateTime, OffsetDateTime, OffsetTime, ZonedDateTime,
} from './types'
import {
  ArithmeticOverflowError, InvalidArgumentError, ParseError, UnsupportedFieldError, requireNonNull,
} from './errors'
import { type Result, Ok, Err } from './result'
import { isDurationEstimated, unitLength, type ChronoUnit } from './fields'
import {
  addExact, multiplyExact, floorDiv, floorMod, bigToSafe,
  NANOS_PER_SECOND, SECONDS_PER_DAY, SECONDS_PER_HOUR, SECONDS_PER_MINUTE,
} from './internal/math'
import { toEpochDay } from './internal/calendar'

const BIG_NANOS = BigInt(NANOS_PER_SECOND)

function create(seconds: number, nano: number): Duration {
  if (!Number.isSafeInteger(seconds)) throw new ArithmeticOverflowError('Duration exceeds the supported range')
  return { kind: 'Duration', seconds: seconds + 0, nano }
}

export const DURATION_ZERO: Duration = create(0, 0)

// ============================================================================
// Construction
// ============================================================================

export function durationOfSeconds(seconds: number, nanoAdjustment = 0): Duration {
  const secs = addExact(seconds, floorDiv(nanoAdjustment, NANOS_PER_SECOND))
  return create(secs, floorMod(nanoAdjustment, NANOS_PER_SECOND))
}

export function durationOfDays(days: number): Duration {
  return create(multiplyExact(days, SECONDS_PER_DAY), 0)
}

export function durationOfHours(hours: number): Duration {
  return create(multiplyExact(hours, SECONDS_PER_HOUR), 0)
}

export function durationOfMinutes(minutes: number): Duration {
  return create(multiplyExact(minutes, SECONDS_PER_MINUTE), 0)
}

export function durationOfMillis(millis: number): Duration {
  return create(floorDiv(millis, 1_000), floorMod(millis, 1_000) * 1_000_000)
}

export function durationOfNanos(nanos: number): Duration {
  return create(floorDiv(nanos, NANOS_PER_SECOND), floorMod(nanos, NANOS_PER_SECOND))
}

function fromTotalNanos(total: bigint): Duration {
  const seconds = total / BIG_NANOS
  let nanos = total % BIG_NANOS
  let secs = seconds
  if (nanos < 0n) {
    nanos += BIG_NANOS
    secs -= 1n
  }
  return create(bigToSafe(secs, 'Duration'), Number(nanos))
}

/** A duration of an exact unit; Days counts as exactly 24 hours. */
export function durationOf(amount: number, unit: ChronoUnit): Duration {
  return durationPlusUnit(DURATION_ZERO, amount, unit)
}

// ============================================================================
// Between
// ============================================================================

export type TimeBearing = Instant | LocalTime | LocalDateTime | OffsetDateTime | OffsetTime | ZonedDateTime

type Scale = 'timeline' | 'local' | 'time'

function position(value: TimeBearing): { scale: Scale; seconds: number; nano: number } {
  switch (value.kind) {
    case 'Instant':
      return { scale: 'timeline', seconds: value.epochSecond, nano: value.nano }
    case 'LocalTime':
      return { scale: 'time', seconds: localTimeSeconds(value), nano: value.nano }
    case 'OffsetTime':
      return { scale: 'time', seconds: localTimeSeconds(value.time) - value.offset.totalSeconds, nano: value.time.nano }
    case 'LocalDateTime':
      return { scale: 'local', seconds: localSeconds(value), nano: value.time.nano }
    case 'OffsetDateTime':
    case 'ZonedDateTime':
      return {
        scale: 'timeline',
        seconds: localSeconds(value.dateTime) - value.offset.totalSeconds,
        nano: value.dateTime.time.nano,
      }
  }
}

function localTimeSeconds(time: LocalTime): number {
  return time.hour * SECONDS_PER_HOUR + time.minute * SECONDS_PER_MINUTE + time.second
}

function localSeconds(dateTime: LocalDateTime): number {
  const { date, time } = dateTime
  return toEpochDay(date.year, date.month, date.day) * SECONDS_PER_DAY + localTimeSeconds(time)
}

/**
 * The exact duration from `start` to `end`. Instants, offset date-times and
 * zoned date-times may be mixed; local values need a partner of the same kind.
 */
export function durationBetween(start: TimeBearing, end: TimeBearing): Duration {
  requireNonNull(start, 'startInclusive')
  requireNonNull(end, 'endExclusive')
  const a = position(start)
  const b = position(end)
  if (a.scale !== b.scale || (a.scale !== 'timeline' && start.kind !== end.kind)) {
    throw new InvalidArgumentError(`Unable to obtain Duration between ${start.kind} and ${end.kind}`)
  }
  return durationOfSeconds(b.seconds - a.seconds, b.nano - a.nano)
}

// ============================================================================
// Arithmetic
// ============================================================================

function plus(duration: Duration, seconds: number, nanos: number): Duration {
  if (seconds === 0 && nanos === 0) return duration
  let epochSec = addExact(duration.seconds, seconds)
  epochSec = addExact(epochSec, floorDiv(nanos, NANOS_PER_SECOND))
  return durationOfSeconds(epochSec, duration.nano + floorMod(nanos, NANOS_PER_SECOND))
}

export function durationPlus(a: Duration, b: Duration): Duration {
  return plus(a, b.seconds, b.nano)
}

export function durationMinus(a: Duration, b: Duration): Duration {
  return durationPlus(a, durationNegated(b))
}

export function durationPlusUnit(duration: Duration, amount: number, unit: ChronoUnit): Duration {
  requireNonNull(unit, 'unit')
  if (unit === 'Days') return plus(duration, multiplyExact(amount, SECONDS_PER_DAY), 0)
  if (isDurationEstimated(unit)) throw new UnsupportedFieldError('Unit must not have an estimated duration')
  if (amount === 0) return duration
  switch (unit) {
    case 'Nanos': return durationPlusNanos(duration, amount)
    case 'Micros': return plus(duration, floorDiv(amount, 1_000_000), floorMod(amount, 1_000_000) * 1_000)
    case 'Millis': return durationPlusMillis(duration, amount)
    case 'Seconds': return durationPlusSeconds(duration, amount)
    default: return plus(duration, multiplyExact(unitLength(unit).seconds, amount), 0)
  }
}

export function durationPlusDays(duration: Duration, days: number): Duration {
  return plus(duration, multiplyExact(days, SECONDS_PER_DAY), 0)
}

export function durationPlusHours(duration: Duration, hours: number): Duration {
  return plus(duration, multiplyExact(hours, SECONDS_PER_HOUR), 0)
}

export function durationPlusMinutes(duration: Duration, minutes: number): Duration {
  return plus(duration, multiplyExact(minutes, SECONDS_PER_MINUTE), 0)
}

export function durationPlusSeconds(duration: Duration, seconds: number): Duration {
  return plus(duration, seconds, 0)
}

export function durationPlusMillis(duration: Duration, millis: number): Duration {
  return plus(duration, floorDiv(millis, 1_000), floorMod(millis, 1_000) * 1_000_000)
}

export function durationPlusNanos(duration: Duration, nanos: number): Duration {
  return plus(duration, 0, nanos)
}

export function durationMinusDays(duration: Duration, days: number): Duration {
  return durationPlusDays(duration, -days)
}

export function durationMinusHours(duration: Duration, hours: number): Duration {
  return durationPlusHours(duration, -hours)
}

export function durationMinusMinutes(duration: Duration, minutes: number): Duration {
  return durationPlusMinutes(duration, -minutes)
}

export function durationMinusSeconds(duration: Duration, seconds: number): Duration {
  return durationPlusSeconds(duration, -seconds)
}

export function durationMinusMillis(duration: Duration, millis: number): Duration {
  return durationPlusMillis(duration, -millis)
}

export function durationMinusNanos(duration: Duration, nanos: number): Duration {
  return durationPlusNanos(duration, -nanos)
}

function requireWhole(value: number, name: string): void {
  if (!Number.isSafeInteger(value)) throw new ArithmeticOverflowError(`Duration ${name} must be a safe integer: ${value}`)
}

export function durationMultipliedBy(duration: Duration, multiplicand: number): Duration {
  requireWhole(multiplicand, 'multiplicand')
  if (multiplicand === 0) return DURATION_ZERO
  if (multiplicand === 1) return duration
  return fromTotalNanos(durationToNanos(duration) * BigInt(multiplicand))
}

/** Divides, truncating toward zero at nanosecond precision. */
export function durationDividedBy(duration: Duration, divisor: number): Duration {
  requireWhole(divisor, 'divisor')
  if (divisor === 0) throw new ArithmeticOverflowError('Cannot divide by zero')
  if (divisor === 1) return duration
  return fromTotalNanos(durationToNanos(duration) / BigInt(divisor))
}

export function durationNegated(duration: Duration): Duration {
  return durationMultipliedBy(duration, -1)
}

export function durationAbs(duration: Duration): Duration {
  return durationIsNegative(duration) ? durationNegated(duration) : duration
}

// ============================================================================
// Queries
// ============================================================================

export function durationIsZero(duration: Duration): boolean {
  return duration.seconds === 0 && duration.nano === 0
}

export function durationIsNegative(duration: Duration): boolean {
  return duration.seconds < 0
}

export function durationToDays(duration: Duration): number {
  return Math.trunc(duration.seconds / SECONDS_PER_DAY)
}

export function durationToHours(duration: Duration): number {
  return Math.trunc(duration.seconds / SECONDS_PER_HOUR)
}

export function durationToMinutes(duration: Duration): number {
  return Math.trunc(duration.seconds / SECONDS_PER_MINUTE)
}

export function durationToMillis(duration: Duration): number {
  return addExact(multiplyExact(duration.seconds, 1_000), Math.floor(duration.nano / 1_000_000))
}

export function durationToNanos(duration: Duration): bigint {
  return BigInt(duration.seconds) * BIG_NANOS + BigInt(duration.nano)
}

export function compareDurations(a: Duration, b: Duration): number {
  return Math.sign(a.seconds - b.seconds) || a.nano - b.nano
}

export function durationEquals(a: Duration, b: Duration): boolean {
  return a.seconds === b.seconds && a.nano === b.nano
}

// ============================================================================
// Formatting & Parsing
// ============================================================================

/** ISO-8601 seconds-based text such as `PT8H6M12.345S`; zero is `PT0S`. */
export function formatDuration(duration: Duration): string {
  if (durationIsZero(duration)) return 'PT0S'
  const { seconds, nano } = duration
  const hours = Math.trunc(seconds / SECONDS_PER_HOUR)
  const minutes = Math.trunc((seconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE)
  const secs = seconds % SECONDS_PER_MINUTE
  let text = 'PT'
  if (hours !== 0) text += hours + 'H'
  if (minutes !== 0) text += minutes + 'M'
  if (secs === 0 && nano === 0 && text.length > 2) return text
  if (secs < 0 && nano > 0) {
    text += secs === -1 ? '-0' : '' + (secs + 1)
  } else {
    text += secs
  }
  if (nano > 0) {
    const fraction = secs < 0 ? 2 * NANOS_PER_SECOND - nano : nano + NANOS_PER_SECOND
    text += '.' + ('' + fraction).substring(1).replace(/0+$/, '')
  }
  return text + 'S'
}

const DURATION_RE =
  /^([-+]?)P(?:([-+]?[0-9]+)D)?(T(?:([-+]?[0-9]+)H)?(?:([-+]?[0-9]+)M)?(?:([-+]?[0-9]+)(?:[.,]([0-9]{0,9}))?S)?)?$/i

function durationParseError(text: string, detail?: string): ParseError {
  const message = detail ? `Text cannot be parsed to a Duration: ${detail}` : 'Text cannot be parsed to a Duration'
  return new ParseError(message, text, 0)
}

/**
 * Parses `PnDTnHnMn.nS`. Each component may carry its own sign, the whole
 * text may be negated, and the fraction takes up to nine digits after `.` or `,`.
 */
export function parseDuration(text: string): Result<Duration, ParseError> {
  requireNonNull(text, 'text')
  const match = DURATION_RE.exec(text)
  if (!match || (match[3] ?? '').toUpperCase() === 'T') return Err(durationParseError(text))
  const [, sign, dayText, , hourText, minuteText, secondText, fractionText] = match
  if (dayText === undefined && hourText === undefined && minuteText === undefined && secondText === undefined) {
    return Err(durationParseError(text))
  }
  try {
    const days = scaled(dayText, SECONDS_PER_DAY, 'days')
    const hours = scaled(hourText, SECONDS_PER_HOUR, 'hours')
    const minutes = scaled(minuteText, SECONDS_PER_MINUTE, 'minutes')
    const seconds = scaled(secondText, 1, 'seconds')
    const negativeSeconds = secondText !== undefined && secondText.charAt(0) === '-'
    const nanos = fractionText ? parseInt((fractionText + '000000000').substring(0, 9), 10) * (negativeSeconds ? -1 : 1) : 0
    const total = durationOfSeconds(addExact(days, addExact(hours, addExact(minutes, seconds))), nanos)
    return Ok(sign === '-' ? durationNegated(total) : total)
  } catch (e) {
    if (e instanceof ArithmeticOverflowError) return Err(durationParseError(text, e.message))
    throw e
  }
}

function scaled(part: string | undefined, multiplier: number, name: string): number {
  if (part === undefined) return 0
  return bigToSafe(BigInt(part) * BigInt(multiplier), name)
}
