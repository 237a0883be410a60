/**
 * Fields, Units and Value Ranges
 *
 * The vocabulary used to query and adjust temporal values generically.
 * Fields are named the way they print in error messages ('MonthOfYear'),
 * units likewise ('Days').
 */

import { DateTimeRangeError } from './errors'
import { YEAR_MIN, YEAR_MAX, EPOCH_DAY_MIN, EPOCH_DAY_MAX } from './internal/calendar'

// ============================================================================
// Value Range
// ============================================================================

/**
 * Range of valid values for a field. The maximum may vary between
 * `maxSmallest` and `maxLargest` (day-of-month is 1 - 28/31).
 */
export type ValueRange = {
  readonly minSmallest: number
  readonly minLargest: number
  readonly maxSmallest: number
  readonly maxLargest: number
}

export function valueRangeOf(min: number, max: number): ValueRange {
  if (min > max) throw new DateTimeRangeError('Minimum value must be less than maximum value')
  return { minSmallest: min, minLargest: min, maxSmallest: max, maxLargest: max }
}

export function valueRangeOfVariable(min: number, maxSmallest: number, maxLargest: number): ValueRange {
  if (min > maxSmallest) throw new DateTimeRangeError('Minimum value must be less than smallest maximum value')
  if (maxSmallest > maxLargest) throw new DateTimeRangeError('Smallest maximum value must be less than largest maximum value')
  return { minSmallest: min, minLargest: min, maxSmallest, maxLargest }
}

export function isFixedRange(range: ValueRange): boolean {
  return range.minSmallest === range.minLargest && range.maxSmallest === range.maxLargest
}

export function isValidValue(range: ValueRange, value: number): boolean {
  return value >= range.minSmallest && value <= range.maxLargest
}

/** True when every value of the range fits a 32-bit int. */
export function isIntRange(range: ValueRange): boolean {
  return range.minSmallest >= -2147483648 && range.maxLargest <= 2147483647
}

export function checkValidValue(range: ValueRange, value: number, field: ChronoField): number {
  if (!Number.isInteger(value) || !isValidValue(range, value)) {
    throw new DateTimeRangeError(`Invalid value for ${field} (valid values ${formatValueRange(range)}): ${value}`)
  }
  return value
}

export function formatValueRange(range: ValueRange): string {
  let text = '' + range.minSmallest
  if (range.minSmallest !== range.minLargest) text += '/' + range.minLargest
  text += ' - ' + range.maxSmallest
  if (range.maxSmallest !== range.maxLargest) text += '/' + range.maxLargest
  return text
}

// ============================================================================
// Units
// ============================================================================

export type ChronoUnit =
  | 'Nanos' | 'Micros' | 'Millis' | 'Seconds' | 'Minutes' | 'Hours' | 'HalfDays'
  | 'Days' | 'Weeks' | 'Months' | 'Years' | 'Decades' | 'Centuries' | 'Millennia'
  | 'Eras' | 'Forever'

const SECONDS_PER_YEAR = 31_556_952

/** Unit lengths as [seconds, nanos]; lengths from Days upwards are estimates. */
const UNIT_LENGTHS: Record<ChronoUnit, readonly [number, number]> = {
  Nanos: [0, 1],
  Micros: [0, 1_000],
  Millis: [0, 1_000_000],
  Seconds: [1, 0],
  Minutes: [60, 0],
  Hours: [3_600, 0],
  HalfDays: [43_200, 0],
  Days: [86_400, 0],
  Weeks: [7 * 86_400, 0],
  Months: [SECONDS_PER_YEAR / 12, 0],
  Years: [SECONDS_PER_YEAR, 0],
  Decades: [SECONDS_PER_YEAR * 10, 0],
  Centuries: [SECONDS_PER_YEAR * 100, 0],
  Millennia: [SECONDS_PER_YEAR * 1_000, 0],
  Eras: [SECONDS_PER_YEAR * 1_000_000_000, 0],
  Forever: [Number.POSITIVE_INFINITY, 999_999_999],
}

export const CHRONO_UNITS: readonly ChronoUnit[] = [
  'Nanos', 'Micros', 'Millis', 'Seconds', 'Minutes', 'Hours', 'HalfDays',
  'Days', 'Weeks', 'Months', 'Years', 'Decades', 'Centuries', 'Millennia',
  'Eras', 'Forever',
]

export function unitLength(unit: ChronoUnit): { seconds: number; nanos: number } {
  const [seconds, nanos] = UNIT_LENGTHS[unit]
  return { seconds, nanos }
}

/** Days and larger units have no exact length. */
export function isDurationEstimated(unit: ChronoUnit): boolean {
  return isDateBasedUnit(unit) || unit === 'Forever'
}

export function isDateBasedUnit(unit: ChronoUnit): boolean {
  return CHRONO_UNITS.indexOf(unit) >= CHRONO_UNITS.indexOf('Days') && unit !== 'Forever'
}

export function isTimeBasedUnit(unit: ChronoUnit): boolean {
  return CHRONO_UNITS.indexOf(unit) < CHRONO_UNITS.indexOf('Days')
}

/** Exact length of a time-based unit in nanoseconds. */
export function unitNanos(unit: ChronoUnit): number {
  const [seconds, nanos] = UNIT_LENGTHS[unit]
  return seconds * 1_000_000_000 + nanos
}

// ============================================================================
// Fields
// ============================================================================

export type ChronoField =
  | 'NanoOfSecond' | 'NanoOfDay' | 'MicroOfSecond' | 'MicroOfDay'
  | 'MilliOfSecond' | 'MilliOfDay' | 'SecondOfMinute' | 'SecondOfDay'
  | 'MinuteOfHour' | 'MinuteOfDay' | 'HourOfAmPm' | 'ClockHourOfAmPm'
  | 'HourOfDay' | 'ClockHourOfDay' | 'AmPmOfDay'
  | 'DayOfWeek' | 'AlignedDayOfWeekInMonth' | 'AlignedDayOfWeekInYear'
  | 'DayOfMonth' | 'DayOfYear' | 'EpochDay' | 'AlignedWeekOfMonth' | 'AlignedWeekOfYear'
  | 'MonthOfYear' | 'ProlepticMonth' | 'YearOfEra' | 'Year' | 'Era'
  | 'InstantSeconds' | 'OffsetSeconds'

type FieldInfo = {
  readonly baseUnit: ChronoUnit
  readonly rangeUnit: ChronoUnit
  readonly range: ValueRange
  readonly dateBased: boolean
}

function time(baseUnit: ChronoUnit, rangeUnit: ChronoUnit, range: ValueRange): FieldInfo {
  return { baseUnit, rangeUnit, range, dateBased: false }
}

function date(baseUnit: ChronoUnit, rangeUnit: ChronoUnit, range: ValueRange): FieldInfo {
  return { baseUnit, rangeUnit, range, dateBased: true }
}

const FIELDS: Record<ChronoField, FieldInfo> = {
  NanoOfSecond: time('Nanos', 'Seconds', valueRangeOf(0, 999_999_999)),
  NanoOfDay: time('Nanos', 'Days', valueRangeOf(0, 86_400 * 1_000_000_000 - 1)),
  MicroOfSecond: time('Micros', 'Seconds', valueRangeOf(0, 999_999)),
  MicroOfDay: time('Micros', 'Days', valueRangeOf(0, 86_400 * 1_000_000 - 1)),
  MilliOfSecond: time('Millis', 'Seconds', valueRangeOf(0, 999)),
  MilliOfDay: time('Millis', 'Days', valueRangeOf(0, 86_400 * 1_000 - 1)),
  SecondOfMinute: time('Seconds', 'Minutes', valueRangeOf(0, 59)),
  SecondOfDay: time('Seconds', 'Days', valueRangeOf(0, 86_400 - 1)),
  MinuteOfHour: time('Minutes', 'Hours', valueRangeOf(0, 59)),
  MinuteOfDay: time('Minutes', 'Days', valueRangeOf(0, 24 * 60 - 1)),
  HourOfAmPm: time('Hours', 'HalfDays', valueRangeOf(0, 11)),
  ClockHourOfAmPm: time('Hours', 'HalfDays', valueRangeOf(1, 12)),
  HourOfDay: time('Hours', 'Days', valueRangeOf(0, 23)),
  ClockHourOfDay: time('Hours', 'Days', valueRangeOf(1, 24)),
  AmPmOfDay: time('HalfDays', 'Days', valueRangeOf(0, 1)),
  DayOfWeek: date('Days', 'Weeks', valueRangeOf(1, 7)),
  AlignedDayOfWeekInMonth: date('Days', 'Weeks', valueRangeOf(1, 7)),
  AlignedDayOfWeekInYear: date('Days', 'Weeks', valueRangeOf(1, 7)),
  DayOfMonth: date('Days', 'Months', valueRangeOfVariable(1, 28, 31)),
  DayOfYear: date('Days', 'Years', valueRangeOfVariable(1, 365, 366)),
  EpochDay: date('Days', 'Forever', valueRangeOf(EPOCH_DAY_MIN, EPOCH_DAY_MAX)),
  AlignedWeekOfMonth: date('Weeks', 'Months', valueRangeOfVariable(1, 4, 5)),
  AlignedWeekOfYear: date('Weeks', 'Years', valueRangeOf(1, 53)),
  MonthOfYear: date('Months', 'Years', valueRangeOf(1, 12)),
  ProlepticMonth: date('Months', 'Forever', valueRangeOf(YEAR_MIN * 12, YEAR_MAX * 12 + 11)),
  YearOfEra: date('Years', 'Eras', valueRangeOfVariable(1, YEAR_MAX, YEAR_MAX + 1)),
  Year: date('Years', 'Forever', valueRangeOf(YEAR_MIN, YEAR_MAX)),
  Era: date('Eras', 'Forever', valueRangeOf(0, 1)),
  InstantSeconds: time('Seconds', 'Forever', valueRangeOf(Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER)),
  OffsetSeconds: time('Seconds', 'Forever', valueRangeOf(-18 * 3600, 18 * 3600)),
}

/** The outer range of a field, independent of any particular value. */
export function fieldRangeOf(field: ChronoField): ValueRange {
  return FIELDS[field].range
}

export function fieldBaseUnit(field: ChronoField): ChronoUnit {
  return FIELDS[field].baseUnit
}

export function fieldRangeUnit(field: ChronoField): ChronoUnit {
  return FIELDS[field].rangeUnit
}

export function isDateBasedField(field: ChronoField): boolean {
  return FIELDS[field].dateBased
}

/** Instant and offset seconds are neither date nor time based. */
export function isTimeBasedField(field: ChronoField): boolean {
  return !FIELDS[field].dateBased && field !== 'InstantSeconds' && field !== 'OffsetSeconds'
}

export function checkField(field: ChronoField, value: number): number {
  return checkValidValue(FIELDS[field].range, value, field)
}
