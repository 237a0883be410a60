/**
 * Local Date-Time
 *
 * A date and a time of day without a zone. Time arithmetic carries whole
 * days into the date.
 */

import type { LocalDate, LocalDateTime, LocalTime, Duration, Instant, Period, ZoneOffset, OffsetDateTime } from './types'
import { UnsupportedFieldError, requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import { isDateBasedField, isTimeBasedField, type ChronoField, type ChronoUnit, type ValueRange } from './fields'
import {
  addExact, multiplyExact, floorDiv, floorMod,
  NANOS_PER_DAY, NANOS_PER_SECOND, NANOS_PER_MINUTE, NANOS_PER_HOUR,
  SECONDS_PER_DAY, MINUTES_PER_DAY, HOURS_PER_DAY,
} from './internal/math'
import { parseFailure, resolveParsed } from './internal/parse'
import {
  dateOf, dateOfEpochDay, dateToEpochDay, datePlus, datePlusDays, datePlusWeeks, datePlusMonths,
  datePlusYears, datePlusPeriod, dateMinusPeriod, dateWithYear, dateWithMonth, dateWithDayOfMonth,
  dateWithDayOfYear, dateWithField, dateGetLong, dateFieldRange, dateUntil, compareDates,
  isDateAfter, isDateBefore, formatDate, DATE_PATTERN, dateFromMatch, validYearSign,
  DATE_MIN, DATE_MAX, type DateAdjuster,
} from './local-date'
import {
  timeOf, timeOfSecondOfDay, timeOfNanoOfDay, timeToNanoOfDay, timeToSecondOfDay,
  timeWithHour, timeWithMinute, timeWithSecond, timeWithNano, timeWithField, timeGetLong,
  timeFieldRange, timeTruncatedTo, compareTimes, isTimeAfter, isTimeBefore, formatTime,
  TIME_PATTERN, timeFromMatch, TIME_MIN, TIME_MAX,
} from './local-time'
import { instantOfEpochSecond } from './instant'

function make(date: LocalDate, time: LocalTime): LocalDateTime {
  return { kind: 'LocalDateTime', date, time }
}

export const DATE_TIME_MIN: LocalDateTime = make(DATE_MIN, TIME_MIN)
export const DATE_TIME_MAX: LocalDateTime = make(DATE_MAX, TIME_MAX)

// ============================================================================
// Construction
// ============================================================================

export function dateTimeOf(
  year: number, month: number, day: number,
  hour: number, minute: number, second = 0, nano = 0,
): LocalDateTime {
  return make(dateOf(year, month, day), timeOf(hour, minute, second, nano))
}

export function dateTimeOfDateAndTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return make(requireNonNull(date, 'date'), requireNonNull(time, 'time'))
}

/** The local date-time seen at an epoch second by an observer at the offset. */
export function dateTimeOfEpochSecond(epochSecond: number, nanoOfSecond: number, offset: ZoneOffset): LocalDateTime {
  requireNonNull(offset, 'offset')
  const localSecond = addExact(epochSecond, offset.totalSeconds)
  const date = dateOfEpochDay(floorDiv(localSecond, SECONDS_PER_DAY))
  return make(date, timeOfSecondOfDay(floorMod(localSecond, SECONDS_PER_DAY), nanoOfSecond))
}

export function dateTimeOfInstant(instant: Instant, offset: ZoneOffset): LocalDateTime {
  return dateTimeOfEpochSecond(instant.epochSecond, instant.nano, offset)
}

export function dateTimeToEpochSecond(dateTime: LocalDateTime, offset: ZoneOffset): number {
  const secs = dateToEpochDay(dateTime.date) * SECONDS_PER_DAY + timeToSecondOfDay(dateTime.time)
  return secs - offset.totalSeconds
}

export function dateTimeToInstant(dateTime: LocalDateTime, offset: ZoneOffset): Instant {
  return instantOfEpochSecond(dateTimeToEpochSecond(dateTime, offset), dateTime.time.nano)
}

export function dateTimeAtOffset(dateTime: LocalDateTime, offset: ZoneOffset): OffsetDateTime {
  return { kind: 'OffsetDateTime', dateTime, offset: requireNonNull(offset, 'offset') }
}

// ============================================================================
// Arithmetic
// ============================================================================

function withParts(dateTime: LocalDateTime, date: LocalDate, time: LocalTime): LocalDateTime {
  if (dateTime.date === date && dateTime.time === time) return dateTime
  return make(date, time)
}

/** Adds a time amount given as separate parts, carrying days into the date. */
function plusWithOverflow(
  dateTime: LocalDateTime, hours: number, minutes: number, seconds: number, nanos: number, sign: 1 | -1,
): LocalDateTime {
  if (hours === 0 && minutes === 0 && seconds === 0 && nanos === 0) return dateTime
  let totalDays =
    Math.trunc(nanos / NANOS_PER_DAY) +
    Math.trunc(seconds / SECONDS_PER_DAY) +
    Math.trunc(minutes / MINUTES_PER_DAY) +
    Math.trunc(hours / HOURS_PER_DAY)
  totalDays *= sign
  let totalNanos =
    (nanos % NANOS_PER_DAY) +
    (seconds % SECONDS_PER_DAY) * NANOS_PER_SECOND +
    (minutes % MINUTES_PER_DAY) * NANOS_PER_MINUTE +
    (hours % HOURS_PER_DAY) * NANOS_PER_HOUR
  const currentNanoOfDay = timeToNanoOfDay(dateTime.time)
  totalNanos = totalNanos * sign + currentNanoOfDay
  totalDays = addExact(totalDays, floorDiv(totalNanos, NANOS_PER_DAY))
  const newNanoOfDay = floorMod(totalNanos, NANOS_PER_DAY)
  const time = newNanoOfDay === currentNanoOfDay ? dateTime.time : timeOfNanoOfDay(newNanoOfDay)
  return withParts(dateTime, datePlusDays(dateTime.date, totalDays), time)
}

export function dateTimePlusYears(dateTime: LocalDateTime, years: number): LocalDateTime {
  return withParts(dateTime, datePlusYears(dateTime.date, years), dateTime.time)
}

export function dateTimePlusMonths(dateTime: LocalDateTime, months: number): LocalDateTime {
  return withParts(dateTime, datePlusMonths(dateTime.date, months), dateTime.time)
}

export function dateTimePlusWeeks(dateTime: LocalDateTime, weeks: number): LocalDateTime {
  return withParts(dateTime, datePlusWeeks(dateTime.date, weeks), dateTime.time)
}

export function dateTimePlusDays(dateTime: LocalDateTime, days: number): LocalDateTime {
  return withParts(dateTime, datePlusDays(dateTime.date, days), dateTime.time)
}

export function dateTimePlusHours(dateTime: LocalDateTime, hours: number): LocalDateTime {
  return plusWithOverflow(dateTime, hours, 0, 0, 0, 1)
}

export function dateTimePlusMinutes(dateTime: LocalDateTime, minutes: number): LocalDateTime {
  return plusWithOverflow(dateTime, 0, minutes, 0, 0, 1)
}

export function dateTimePlusSeconds(dateTime: LocalDateTime, seconds: number): LocalDateTime {
  return plusWithOverflow(dateTime, 0, 0, seconds, 0, 1)
}

export function dateTimePlusNanos(dateTime: LocalDateTime, nanos: number): LocalDateTime {
  return plusWithOverflow(dateTime, 0, 0, 0, nanos, 1)
}

export function dateTimeMinusYears(dateTime: LocalDateTime, years: number): LocalDateTime {
  return dateTimePlusYears(dateTime, -years)
}

export function dateTimeMinusMonths(dateTime: LocalDateTime, months: number): LocalDateTime {
  return dateTimePlusMonths(dateTime, -months)
}

export function dateTimeMinusWeeks(dateTime: LocalDateTime, weeks: number): LocalDateTime {
  return dateTimePlusWeeks(dateTime, -weeks)
}

export function dateTimeMinusDays(dateTime: LocalDateTime, days: number): LocalDateTime {
  return dateTimePlusDays(dateTime, -days)
}

export function dateTimeMinusHours(dateTime: LocalDateTime, hours: number): LocalDateTime {
  return plusWithOverflow(dateTime, hours, 0, 0, 0, -1)
}

export function dateTimeMinusMinutes(dateTime: LocalDateTime, minutes: number): LocalDateTime {
  return plusWithOverflow(dateTime, 0, minutes, 0, 0, -1)
}

export function dateTimeMinusSeconds(dateTime: LocalDateTime, seconds: number): LocalDateTime {
  return plusWithOverflow(dateTime, 0, 0, seconds, 0, -1)
}

export function dateTimeMinusNanos(dateTime: LocalDateTime, nanos: number): LocalDateTime {
  return plusWithOverflow(dateTime, 0, 0, 0, nanos, -1)
}

export function dateTimePlus(dateTime: LocalDateTime, amount: number, unit: ChronoUnit): LocalDateTime {
  switch (unit) {
    case 'Nanos': return dateTimePlusNanos(dateTime, amount)
    case 'Micros':
      return dateTimePlusNanos(
        dateTimePlusDays(dateTime, Math.trunc(amount / 86_400_000_000)),
        (amount % 86_400_000_000) * 1_000,
      )
    case 'Millis':
      return dateTimePlusNanos(
        dateTimePlusDays(dateTime, Math.trunc(amount / 86_400_000)),
        (amount % 86_400_000) * 1_000_000,
      )
    case 'Seconds': return dateTimePlusSeconds(dateTime, amount)
    case 'Minutes': return dateTimePlusMinutes(dateTime, amount)
    case 'Hours': return dateTimePlusHours(dateTime, amount)
    case 'HalfDays':
      return dateTimePlusHours(dateTimePlusDays(dateTime, Math.trunc(amount / 256)), (amount % 256) * 12)
    default: return withParts(dateTime, datePlus(dateTime.date, amount, unit), dateTime.time)
  }
}

export function dateTimeMinus(dateTime: LocalDateTime, amount: number, unit: ChronoUnit): LocalDateTime {
  return dateTimePlus(dateTime, -amount, unit)
}

export function dateTimePlusDuration(dateTime: LocalDateTime, duration: Duration): LocalDateTime {
  return dateTimePlusNanos(dateTimePlusSeconds(dateTime, duration.seconds), duration.nano)
}

export function dateTimeMinusDuration(dateTime: LocalDateTime, duration: Duration): LocalDateTime {
  return dateTimeMinusNanos(dateTimeMinusSeconds(dateTime, duration.seconds), duration.nano)
}

export function dateTimePlusPeriod(dateTime: LocalDateTime, period: Period): LocalDateTime {
  return withParts(dateTime, datePlusPeriod(dateTime.date, period), dateTime.time)
}

export function dateTimeMinusPeriod(dateTime: LocalDateTime, period: Period): LocalDateTime {
  return withParts(dateTime, dateMinusPeriod(dateTime.date, period), dateTime.time)
}

// ============================================================================
// Adjustment
// ============================================================================

export function dateTimeWithDate(dateTime: LocalDateTime, date: LocalDate): LocalDateTime {
  return withParts(dateTime, requireNonNull(date, 'date'), dateTime.time)
}

export function dateTimeWithTime(dateTime: LocalDateTime, time: LocalTime): LocalDateTime {
  return withParts(dateTime, dateTime.date, requireNonNull(time, 'time'))
}

export function dateTimeWithYear(dateTime: LocalDateTime, year: number): LocalDateTime {
  return withParts(dateTime, dateWithYear(dateTime.date, year), dateTime.time)
}

export function dateTimeWithMonth(dateTime: LocalDateTime, month: number): LocalDateTime {
  return withParts(dateTime, dateWithMonth(dateTime.date, month), dateTime.time)
}

export function dateTimeWithDayOfMonth(dateTime: LocalDateTime, day: number): LocalDateTime {
  return withParts(dateTime, dateWithDayOfMonth(dateTime.date, day), dateTime.time)
}

export function dateTimeWithDayOfYear(dateTime: LocalDateTime, dayOfYear: number): LocalDateTime {
  return withParts(dateTime, dateWithDayOfYear(dateTime.date, dayOfYear), dateTime.time)
}

export function dateTimeWithHour(dateTime: LocalDateTime, hour: number): LocalDateTime {
  return withParts(dateTime, dateTime.date, timeWithHour(dateTime.time, hour))
}

export function dateTimeWithMinute(dateTime: LocalDateTime, minute: number): LocalDateTime {
  return withParts(dateTime, dateTime.date, timeWithMinute(dateTime.time, minute))
}

export function dateTimeWithSecond(dateTime: LocalDateTime, second: number): LocalDateTime {
  return withParts(dateTime, dateTime.date, timeWithSecond(dateTime.time, second))
}

export function dateTimeWithNano(dateTime: LocalDateTime, nano: number): LocalDateTime {
  return withParts(dateTime, dateTime.date, timeWithNano(dateTime.time, nano))
}

export function dateTimeWithField(dateTime: LocalDateTime, field: ChronoField, value: number): LocalDateTime {
  requireNonNull(field, 'field')
  if (isTimeBasedField(field)) return withParts(dateTime, dateTime.date, timeWithField(dateTime.time, field, value))
  return withParts(dateTime, dateWithField(dateTime.date, field, value), dateTime.time)
}

export function dateTimeWith(dateTime: LocalDateTime, adjuster: DateAdjuster): LocalDateTime {
  return withParts(dateTime, requireNonNull(adjuster, 'adjuster')(dateTime.date), dateTime.time)
}

export function dateTimeTruncatedTo(dateTime: LocalDateTime, unit: ChronoUnit): LocalDateTime {
  return withParts(dateTime, dateTime.date, timeTruncatedTo(dateTime.time, unit))
}

/** Whole units from `start` to `end`, negative when `end` is earlier. */
export function dateTimeUntil(start: LocalDateTime, end: LocalDateTime, unit: ChronoUnit): number {
  switch (unit) {
    case 'Nanos': case 'Micros': case 'Millis': case 'Seconds':
    case 'Minutes': case 'Hours': case 'HalfDays': {
      let days = dateToEpochDay(end.date) - dateToEpochDay(start.date)
      let nanos = timeToNanoOfDay(end.time) - timeToNanoOfDay(start.time)
      if (days > 0 && nanos < 0) {
        days--
        nanos += NANOS_PER_DAY
      } else if (days < 0 && nanos > 0) {
        days++
        nanos -= NANOS_PER_DAY
      }
      const [perDay, unitNanos] = TIME_UNIT_SCALE[unit]
      return addExact(multiplyExact(days, perDay), Math.trunc(nanos / unitNanos))
    }
    default: {
      let endDate = end.date
      if (isDateAfter(endDate, start.date) && isTimeBefore(end.time, start.time)) {
        endDate = datePlusDays(endDate, -1)
      } else if (isDateBefore(endDate, start.date) && isTimeAfter(end.time, start.time)) {
        endDate = datePlusDays(endDate, 1)
      }
      return dateUntil(start.date, endDate, unit)
    }
  }
}

const TIME_UNIT_SCALE: Record<'Nanos' | 'Micros' | 'Millis' | 'Seconds' | 'Minutes' | 'Hours' | 'HalfDays', readonly [number, number]> = {
  Nanos: [NANOS_PER_DAY, 1],
  Micros: [86_400_000_000, 1_000],
  Millis: [86_400_000, 1_000_000],
  Seconds: [SECONDS_PER_DAY, NANOS_PER_SECOND],
  Minutes: [MINUTES_PER_DAY, NANOS_PER_MINUTE],
  Hours: [HOURS_PER_DAY, NANOS_PER_HOUR],
  HalfDays: [2, 12 * NANOS_PER_HOUR],
}

// ============================================================================
// Field Access
// ============================================================================

export function dateTimeIsSupported(field: ChronoField): boolean {
  return isDateBasedField(field) || isTimeBasedField(field)
}

export function dateTimeGetLong(dateTime: LocalDateTime, field: ChronoField): number {
  requireNonNull(field, 'field')
  if (isTimeBasedField(field)) return timeGetLong(dateTime.time, field)
  if (isDateBasedField(field)) return dateGetLong(dateTime.date, field)
  throw new UnsupportedFieldError(`Unsupported field: ${field}`)
}

export function dateTimeFieldRange(dateTime: LocalDateTime, field: ChronoField): ValueRange {
  requireNonNull(field, 'field')
  if (isTimeBasedField(field)) return timeFieldRange(field)
  return dateFieldRange(dateTime.date, field)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  return compareDates(a.date, b.date) || compareTimes(a.time, b.time)
}

export function isDateTimeBefore(a: LocalDateTime, b: LocalDateTime): boolean {
  return compareDateTimes(a, b) < 0
}

export function isDateTimeAfter(a: LocalDateTime, b: LocalDateTime): boolean {
  return compareDateTimes(a, b) > 0
}

export function dateTimeEquals(a: LocalDateTime, b: LocalDateTime): boolean {
  return compareDateTimes(a, b) === 0
}

// ============================================================================
// Formatting & Parsing
// ============================================================================

export function formatDateTime(dateTime: LocalDateTime): string {
  return formatDate(dateTime.date) + 'T' + formatTime(dateTime.time)
}

/** Nine groups: five for the date, four for the time. */
export const DATE_TIME_PATTERN = new RegExp(DATE_PATTERN.source + 'T' + TIME_PATTERN.source)

const DATE_TIME_RE = new RegExp('^' + DATE_TIME_PATTERN.source + '$')

export function parseDateTime(text: string): Result<LocalDateTime, ParseError> {
  requireNonNull(text, 'text')
  const match = DATE_TIME_RE.exec(text)
  if (!match || !validYearSign(match, 1)) return Err(parseFailure(text))
  return resolveParsed(text, () => dateTimeFromMatch(match, 1))
}

export function dateTimeFromMatch(match: RegExpExecArray, index: number): LocalDateTime {
  return make(dateFromMatch(match, index), timeFromMatch(match, index + 5))
}

