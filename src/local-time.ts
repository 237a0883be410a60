/**
 * Local Time
 *
 * A time of day without a date or zone, to nanosecond precision.
 * Arithmetic wraps around midnight.
 */

import type { LocalTime } from './types'
import { UnsupportedFieldError, requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import { checkField, fieldRangeOf, isTimeBasedField, type ChronoField, type ChronoUnit, type ValueRange } from './fields'
import {
  floorMod, floorDiv,
  NANOS_PER_SECOND, NANOS_PER_MINUTE, NANOS_PER_HOUR, NANOS_PER_DAY,
  SECONDS_PER_DAY, SECONDS_PER_HOUR, SECONDS_PER_MINUTE, MINUTES_PER_DAY,
} from './internal/math'
import { pad2, formatNanoFraction, fractionToNanos } from './internal/helpers'
import { parseFailure, resolveParsed, digits } from './internal/parse'

function make(hour: number, minute: number, second: number, nano: number): LocalTime {
  return { kind: 'LocalTime', hour, minute, second, nano }
}

export const MIDNIGHT: LocalTime = make(0, 0, 0, 0)
export const NOON: LocalTime = make(12, 0, 0, 0)
export const TIME_MIN: LocalTime = MIDNIGHT
export const TIME_MAX: LocalTime = make(23, 59, 59, 999_999_999)

// ============================================================================
// Construction
// ============================================================================

export function timeOf(hour: number, minute: number, second = 0, nano = 0): LocalTime {
  checkField('HourOfDay', hour)
  checkField('MinuteOfHour', minute)
  checkField('SecondOfMinute', second)
  checkField('NanoOfSecond', nano)
  return make(hour, minute, second, nano)
}

export function timeOfSecondOfDay(secondOfDay: number, nanoOfSecond = 0): LocalTime {
  checkField('SecondOfDay', secondOfDay)
  checkField('NanoOfSecond', nanoOfSecond)
  const hour = Math.floor(secondOfDay / SECONDS_PER_HOUR)
  const rest = secondOfDay - hour * SECONDS_PER_HOUR
  const minute = Math.floor(rest / SECONDS_PER_MINUTE)
  return make(hour, minute, rest - minute * SECONDS_PER_MINUTE, nanoOfSecond)
}

export function timeOfNanoOfDay(nanoOfDay: number): LocalTime {
  checkField('NanoOfDay', nanoOfDay)
  const hour = Math.floor(nanoOfDay / NANOS_PER_HOUR)
  let rest = nanoOfDay - hour * NANOS_PER_HOUR
  const minute = Math.floor(rest / NANOS_PER_MINUTE)
  rest -= minute * NANOS_PER_MINUTE
  const second = Math.floor(rest / NANOS_PER_SECOND)
  return make(hour, minute, second, rest - second * NANOS_PER_SECOND)
}

export function timeToSecondOfDay(time: LocalTime): number {
  return time.hour * SECONDS_PER_HOUR + time.minute * SECONDS_PER_MINUTE + time.second
}

export function timeToNanoOfDay(time: LocalTime): number {
  return time.hour * NANOS_PER_HOUR + time.minute * NANOS_PER_MINUTE + time.second * NANOS_PER_SECOND + time.nano
}

// ============================================================================
// Arithmetic
// ============================================================================

export function timePlusHours(time: LocalTime, hours: number): LocalTime {
  if (hours === 0) return time
  const hour = (floorMod(hours, 24) + time.hour) % 24
  return make(hour, time.minute, time.second, time.nano)
}

export function timePlusMinutes(time: LocalTime, minutes: number): LocalTime {
  if (minutes === 0) return time
  const current = time.hour * 60 + time.minute
  const next = (floorMod(minutes, MINUTES_PER_DAY) + current) % MINUTES_PER_DAY
  if (current === next) return time
  return make(Math.floor(next / 60), next % 60, time.second, time.nano)
}

export function timePlusSeconds(time: LocalTime, seconds: number): LocalTime {
  if (seconds === 0) return time
  const current = timeToSecondOfDay(time)
  const next = (floorMod(seconds, SECONDS_PER_DAY) + current) % SECONDS_PER_DAY
  if (current === next) return time
  return timeOfSecondOfDay(next, time.nano)
}

export function timePlusNanos(time: LocalTime, nanos: number): LocalTime {
  if (nanos === 0) return time
  const current = timeToNanoOfDay(time)
  const next = (floorMod(nanos, NANOS_PER_DAY) + current) % NANOS_PER_DAY
  if (current === next) return time
  return timeOfNanoOfDay(next)
}

export function timeMinusHours(time: LocalTime, hours: number): LocalTime {
  return timePlusHours(time, -floorMod(hours, 24))
}

export function timeMinusMinutes(time: LocalTime, minutes: number): LocalTime {
  return timePlusMinutes(time, -floorMod(minutes, MINUTES_PER_DAY))
}

export function timeMinusSeconds(time: LocalTime, seconds: number): LocalTime {
  return timePlusSeconds(time, -floorMod(seconds, SECONDS_PER_DAY))
}

export function timeMinusNanos(time: LocalTime, nanos: number): LocalTime {
  return timePlusNanos(time, -floorMod(nanos, NANOS_PER_DAY))
}

export function timePlus(time: LocalTime, amount: number, unit: ChronoUnit): LocalTime {
  switch (unit) {
    case 'Nanos': return timePlusNanos(time, amount)
    case 'Micros': return timePlusNanos(time, (amount % 86_400_000_000) * 1_000)
    case 'Millis': return timePlusNanos(time, (amount % 86_400_000) * 1_000_000)
    case 'Seconds': return timePlusSeconds(time, amount)
    case 'Minutes': return timePlusMinutes(time, amount)
    case 'Hours': return timePlusHours(time, amount)
    case 'HalfDays': return timePlusHours(time, (amount % 2) * 12)
    default: throw new UnsupportedFieldError(`Unsupported unit: ${unit}`)
  }
}

export function timeMinus(time: LocalTime, amount: number, unit: ChronoUnit): LocalTime {
  return timePlus(time, -amount, unit)
}

// ============================================================================
// Adjustment
// ============================================================================

export function timeWithHour(time: LocalTime, hour: number): LocalTime {
  if (time.hour === hour) return time
  checkField('HourOfDay', hour)
  return make(hour, time.minute, time.second, time.nano)
}

export function timeWithMinute(time: LocalTime, minute: number): LocalTime {
  if (time.minute === minute) return time
  checkField('MinuteOfHour', minute)
  return make(time.hour, minute, time.second, time.nano)
}

export function timeWithSecond(time: LocalTime, second: number): LocalTime {
  if (time.second === second) return time
  checkField('SecondOfMinute', second)
  return make(time.hour, time.minute, second, time.nano)
}

export function timeWithNano(time: LocalTime, nano: number): LocalTime {
  if (time.nano === nano) return time
  checkField('NanoOfSecond', nano)
  return make(time.hour, time.minute, time.second, nano)
}

export function timeWithField(time: LocalTime, field: ChronoField, value: number): LocalTime {
  requireNonNull(field, 'field')
  if (!isTimeBasedField(field)) throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  checkField(field, value)
  switch (field) {
    case 'NanoOfSecond': return timeWithNano(time, value)
    case 'NanoOfDay': return timeOfNanoOfDay(value)
    case 'MicroOfSecond': return timeWithNano(time, value * 1_000)
    case 'MicroOfDay': return timeOfNanoOfDay(value * 1_000)
    case 'MilliOfSecond': return timeWithNano(time, value * 1_000_000)
    case 'MilliOfDay': return timeOfNanoOfDay(value * 1_000_000)
    case 'SecondOfMinute': return timeWithSecond(time, value)
    case 'SecondOfDay': return timePlusSeconds(time, value - timeToSecondOfDay(time))
    case 'MinuteOfHour': return timeWithMinute(time, value)
    case 'MinuteOfDay': return timePlusMinutes(time, value - (time.hour * 60 + time.minute))
    case 'HourOfAmPm': return timePlusHours(time, value - (time.hour % 12))
    case 'ClockHourOfAmPm': return timePlusHours(time, (value === 12 ? 0 : value) - (time.hour % 12))
    case 'HourOfDay': return timeWithHour(time, value)
    case 'ClockHourOfDay': return timeWithHour(time, value === 24 ? 0 : value)
    case 'AmPmOfDay': return timePlusHours(time, (value - Math.floor(time.hour / 12)) * 12)
    default: throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  }
}

/** Truncates to a unit that divides a day evenly; Days truncates to midnight. */
export function timeTruncatedTo(time: LocalTime, unit: ChronoUnit): LocalTime {
  if (unit === 'Nanos') return time
  if (unit === 'Days') return MIDNIGHT
  const unitNanos = UNIT_NANOS[unit]
  if (unitNanos === undefined) throw new UnsupportedFieldError('Unit is too large to be used for truncation')
  const nanoOfDay = timeToNanoOfDay(time)
  return timeOfNanoOfDay(floorDiv(nanoOfDay, unitNanos) * unitNanos)
}

const UNIT_NANOS: Partial<Record<ChronoUnit, number>> = {
  Nanos: 1,
  Micros: 1_000,
  Millis: 1_000_000,
  Seconds: NANOS_PER_SECOND,
  Minutes: NANOS_PER_MINUTE,
  Hours: NANOS_PER_HOUR,
  HalfDays: 12 * NANOS_PER_HOUR,
}

/** Whole units from `start` to `end`, negative when `end` is earlier. */
export function timeUntil(start: LocalTime, end: LocalTime, unit: ChronoUnit): number {
  const unitNanos = UNIT_NANOS[unit]
  if (unitNanos === undefined) throw new UnsupportedFieldError(`Unsupported unit: ${unit}`)
  return Math.trunc((timeToNanoOfDay(end) - timeToNanoOfDay(start)) / unitNanos)
}

// ============================================================================
// Field Access
// ============================================================================

export function timeIsSupported(field: ChronoField): boolean {
  return isTimeBasedField(field)
}

export function timeGetLong(time: LocalTime, field: ChronoField): number {
  requireNonNull(field, 'field')
  switch (field) {
    case 'NanoOfSecond': return time.nano
    case 'NanoOfDay': return timeToNanoOfDay(time)
    case 'MicroOfSecond': return Math.floor(time.nano / 1_000)
    case 'MicroOfDay': return Math.floor(timeToNanoOfDay(time) / 1_000)
    case 'MilliOfSecond': return Math.floor(time.nano / 1_000_000)
    case 'MilliOfDay': return Math.floor(timeToNanoOfDay(time) / 1_000_000)
    case 'SecondOfMinute': return time.second
    case 'SecondOfDay': return timeToSecondOfDay(time)
    case 'MinuteOfHour': return time.minute
    case 'MinuteOfDay': return time.hour * 60 + time.minute
    case 'HourOfAmPm': return time.hour % 12
    case 'ClockHourOfAmPm': {
      const hourOfAmPm = time.hour % 12
      return hourOfAmPm === 0 ? 12 : hourOfAmPm
    }
    case 'HourOfDay': return time.hour
    case 'ClockHourOfDay': return time.hour === 0 ? 24 : time.hour
    case 'AmPmOfDay': return Math.floor(time.hour / 12)
    default: throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  }
}

export function timeFieldRange(field: ChronoField): ValueRange {
  if (!isTimeBasedField(field)) throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  return fieldRangeOf(field)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareTimes(a: LocalTime, b: LocalTime): number {
  return a.hour - b.hour || a.minute - b.minute || a.second - b.second || a.nano - b.nano
}

export function isTimeBefore(a: LocalTime, b: LocalTime): boolean {
  return compareTimes(a, b) < 0
}

export function isTimeAfter(a: LocalTime, b: LocalTime): boolean {
  return compareTimes(a, b) > 0
}

export function timeEquals(a: LocalTime, b: LocalTime): boolean {
  return compareTimes(a, b) === 0
}

// ============================================================================
// Formatting & Parsing
// ============================================================================

/** `HH:mm`, with seconds and a 3, 6 or 9 digit fraction only when non-zero. */
export function formatTime(time: LocalTime): string {
  let text = pad2(time.hour) + ':' + pad2(time.minute)
  if (time.second > 0 || time.nano > 0) {
    text += ':' + pad2(time.second) + formatNanoFraction(time.nano)
  }
  return text
}

export const TIME_PATTERN = /(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?/

const TIME_RE = new RegExp('^' + TIME_PATTERN.source + '$')

export function parseTime(text: string): Result<LocalTime, ParseError> {
  requireNonNull(text, 'text')
  const match = TIME_RE.exec(text)
  if (!match) return Err(parseFailure(text))
  return resolveParsed(text, () => timeFromMatch(match, 1))
}

/** Builds a time from the four groups of TIME_PATTERN starting at `index`. */
export function timeFromMatch(match: RegExpExecArray, index: number): LocalTime {
  const fraction = match[index + 3]
  return timeOf(
    digits(match[index]),
    digits(match[index + 1]),
    digits(match[index + 2]),
    fraction === undefined ? 0 : fractionToNanos(fraction),
  )
}
