/**
 * Zoned Date-Time
 *
 * A local date-time, the offset in force and the zone that decided it.
 *
 * A local date-time can be ambiguous in a zone. In a gap it does not exist:
 * resolution moves it forward by the length of the gap. In an overlap it
 * occurs twice: resolution keeps the preferred offset when that offset is
 * valid, and otherwise takes the offset in force before the overlap.
 *
 * Date-based changes (fields, years, months, weeks, days) re-resolve the new
 * local date-time this way, keeping the old offset where it still applies.
 * Time-based changes (hours and smaller, durations) move along the instant
 * time-line, so adding an hour across a gap or overlap adds exactly an hour.
 */

import type {
  Duration, Instant, LocalDate, LocalDateTime, LocalTime, OffsetDateTime, Period, ZoneId, ZoneOffset, ZonedDateTime,
} from './types'
import { ZoneReconciliationError, requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import { checkField, fieldRangeOf, isDateBasedUnit, type ChronoField, type ChronoUnit, type ValueRange } from './fields'
import { parseFailure, resolveParsed } from './internal/parse'
import { offsetEquals, offsetOfTotalSeconds } from './zone-offset'
import { instantOfEpochSecond } from './instant'
import { validYearSign, type DateAdjuster } from './local-date'
import {
  dateTimeOfDateAndTime, dateTimeOfEpochSecond, dateTimeToEpochSecond, dateTimePlus, dateTimePlusSeconds,
  dateTimePlusYears, dateTimePlusMonths, dateTimePlusWeeks, dateTimePlusDays, dateTimePlusHours,
  dateTimePlusMinutes, dateTimePlusNanos, dateTimePlusDuration, dateTimePlusPeriod, dateTimeMinusPeriod,
  dateTimeMinusDuration, dateTimeWithYear, dateTimeWithMonth, dateTimeWithDayOfMonth, dateTimeWithDayOfYear,
  dateTimeWithHour, dateTimeWithMinute, dateTimeWithSecond, dateTimeWithNano, dateTimeWithField, dateTimeWith,
  dateTimeTruncatedTo, dateTimeUntil, dateTimeIsSupported, dateTimeGetLong, dateTimeFieldRange,
  compareDateTimes, dateTimeEquals, formatDateTime, dateTimeFromMatch, DATE_TIME_PATTERN,
} from './local-date-time'
import { offsetDateTimeOf, offsetDateTimeUntil, OFFSET_PATTERN, offsetFromMatch } from './offset-date-time'
import {
  rulesOffsetAt, rulesValidOffsets, rulesTransitionAt, rulesIsValidOffset,
} from './zone-rules'
import { isGap, isOverlap, transitionDuration } from './zone-offset-transition'
import { zoneIdEquals, zoneIdOf, zoneRules } from './zone-id'
import type { ZoneRulesRegistry } from './zone-rules-provider'

function make(dateTime: LocalDateTime, offset: ZoneOffset, zone: ZoneId): ZonedDateTime {
  return { kind: 'ZonedDateTime', dateTime, offset, zone }
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Resolves a local date-time in a zone. The preferred offset wins in an
 * overlap when it is one of the two valid offsets.
 */
export function zonedOf(dateTime: LocalDateTime, zone: ZoneId, preferredOffset?: ZoneOffset | null): ZonedDateTime {
  requireNonNull(dateTime, 'localDateTime')
  requireNonNull(zone, 'zone')
  if (zone.kind === 'ZoneOffset') return make(dateTime, zone, zone)
  const rules = zone.rules
  const validOffsets = rulesValidOffsets(rules, dateTime)
  if (validOffsets.length === 1) return make(dateTime, validOffsets[0]!, zone)
  if (validOffsets.length === 0) {
    const trans = rulesTransitionAt(rules, dateTime)
    if (trans === null) throw new ZoneReconciliationError(`No offset for LocalDateTime '${formatDateTime(dateTime)}' in zone '${zone.id}'`)
    return make(dateTimePlusSeconds(dateTime, transitionDuration(trans).seconds), trans.offsetAfter, zone)
  }
  if (preferredOffset && validOffsets.some(o => offsetEquals(o, preferredOffset))) {
    return make(dateTime, preferredOffset, zone)
  }
  return make(dateTime, validOffsets[0]!, zone)
}

/** Creates a value from its three parts, failing unless the offset is valid for the local date-time. */
export function zonedOfStrict(dateTime: LocalDateTime, offset: ZoneOffset, zone: ZoneId): ZonedDateTime {
  requireNonNull(dateTime, 'localDateTime')
  requireNonNull(offset, 'offset')
  requireNonNull(zone, 'zone')
  const rules = zoneRules(zone)
  if (!rulesIsValidOffset(rules, dateTime, offset)) {
    const trans = rulesTransitionAt(rules, dateTime)
    if (trans !== null && isGap(trans)) {
      throw new ZoneReconciliationError(
        `LocalDateTime '${formatDateTime(dateTime)}' does not exist in zone '${zone.id}' ` +
        'due to a gap in the local time-line, typically caused by daylight savings',
      )
    }
    throw new ZoneReconciliationError(
      `ZoneOffset '${offset.id}' is not valid for LocalDateTime '${formatDateTime(dateTime)}' in zone '${zone.id}'`,
    )
  }
  return make(dateTime, offset, zone)
}

function ofEpochSecond(epochSecond: number, nano: number, zone: ZoneId): ZonedDateTime {
  const offset = rulesOffsetAt(zoneRules(zone), instantOfEpochSecond(epochSecond, nano))
  return make(dateTimeOfEpochSecond(epochSecond, nano, offset), offset, zone)
}

export function zonedOfInstant(instant: Instant, zone: ZoneId): ZonedDateTime {
  requireNonNull(instant, 'instant')
  requireNonNull(zone, 'zone')
  return ofEpochSecond(instant.epochSecond, instant.nano, zone)
}

/** The instant described by a local date-time and offset, viewed in a zone. */
export function zonedOfInstantAndOffset(dateTime: LocalDateTime, offset: ZoneOffset, zone: ZoneId): ZonedDateTime {
  requireNonNull(dateTime, 'localDateTime')
  requireNonNull(offset, 'offset')
  requireNonNull(zone, 'zone')
  return ofEpochSecond(dateTimeToEpochSecond(dateTime, offset), dateTime.time.nano, zone)
}

// ============================================================================
// Resolution
// ============================================================================

function resolveLocal(zdt: ZonedDateTime, dateTime: LocalDateTime): ZonedDateTime {
  if (dateTime === zdt.dateTime) return zdt
  return zonedOf(dateTime, zdt.zone, zdt.offset)
}

function resolveInstant(zdt: ZonedDateTime, dateTime: LocalDateTime): ZonedDateTime {
  if (dateTime === zdt.dateTime) return zdt
  return zonedOfInstantAndOffset(dateTime, zdt.offset, zdt.zone)
}

function resolveOffset(zdt: ZonedDateTime, offset: ZoneOffset): ZonedDateTime {
  if (!offsetEquals(offset, zdt.offset) && rulesIsValidOffset(zoneRules(zdt.zone), zdt.dateTime, offset)) {
    return make(zdt.dateTime, offset, zdt.zone)
  }
  return zdt
}

/** In an overlap, switches to the offset in force before it. */
export function zonedWithEarlierOffsetAtOverlap(zdt: ZonedDateTime): ZonedDateTime {
  const trans = rulesTransitionAt(zoneRules(zdt.zone), zdt.dateTime)
  if (trans !== null && isOverlap(trans) && !offsetEquals(trans.offsetBefore, zdt.offset)) {
    return make(zdt.dateTime, trans.offsetBefore, zdt.zone)
  }
  return zdt
}

/** In an overlap, switches to the offset in force after it. */
export function zonedWithLaterOffsetAtOverlap(zdt: ZonedDateTime): ZonedDateTime {
  const trans = rulesTransitionAt(zoneRules(zdt.zone), zdt.dateTime)
  if (trans !== null && isOverlap(trans) && !offsetEquals(trans.offsetAfter, zdt.offset)) {
    return make(zdt.dateTime, trans.offsetAfter, zdt.zone)
  }
  return zdt
}

export function zonedWithZoneSameLocal(zdt: ZonedDateTime, zone: ZoneId): ZonedDateTime {
  requireNonNull(zone, 'zone')
  return zoneIdEquals(zdt.zone, zone) ? zdt : zonedOf(zdt.dateTime, zone, zdt.offset)
}

export function zonedWithZoneSameInstant(zdt: ZonedDateTime, zone: ZoneId): ZonedDateTime {
  requireNonNull(zone, 'zone')
  if (zoneIdEquals(zdt.zone, zone)) return zdt
  return ofEpochSecond(zonedToEpochSecond(zdt), zdt.dateTime.time.nano, zone)
}

/** Replaces the zone with the current offset, fixing the value to it. */
export function zonedWithFixedOffsetZone(zdt: ZonedDateTime): ZonedDateTime {
  if (zdt.zone.kind === 'ZoneOffset' && offsetEquals(zdt.zone, zdt.offset)) return zdt
  return make(zdt.dateTime, zdt.offset, zdt.offset)
}

// ============================================================================
// Conversion
// ============================================================================

export function zonedToEpochSecond(zdt: ZonedDateTime): number {
  return dateTimeToEpochSecond(zdt.dateTime, zdt.offset)
}

export function zonedToInstant(zdt: ZonedDateTime): Instant {
  return instantOfEpochSecond(zonedToEpochSecond(zdt), zdt.dateTime.time.nano)
}

export function zonedToLocalDateTime(zdt: ZonedDateTime): LocalDateTime {
  return zdt.dateTime
}

export function zonedToLocalDate(zdt: ZonedDateTime): LocalDate {
  return zdt.dateTime.date
}

export function zonedToLocalTime(zdt: ZonedDateTime): LocalTime {
  return zdt.dateTime.time
}

export function zonedToOffsetDateTime(zdt: ZonedDateTime): OffsetDateTime {
  return offsetDateTimeOf(zdt.dateTime, zdt.offset)
}

// ============================================================================
// Field Mutators
// ============================================================================

export function zonedWithYear(zdt: ZonedDateTime, year: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWithYear(zdt.dateTime, year))
}

export function zonedWithMonth(zdt: ZonedDateTime, month: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWithMonth(zdt.dateTime, month))
}

export function zonedWithDayOfMonth(zdt: ZonedDateTime, day: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWithDayOfMonth(zdt.dateTime, day))
}

export function zonedWithDayOfYear(zdt: ZonedDateTime, dayOfYear: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWithDayOfYear(zdt.dateTime, dayOfYear))
}

export function zonedWithHour(zdt: ZonedDateTime, hour: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWithHour(zdt.dateTime, hour))
}

export function zonedWithMinute(zdt: ZonedDateTime, minute: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWithMinute(zdt.dateTime, minute))
}

export function zonedWithSecond(zdt: ZonedDateTime, second: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWithSecond(zdt.dateTime, second))
}

export function zonedWithNano(zdt: ZonedDateTime, nano: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWithNano(zdt.dateTime, nano))
}

export function zonedWithDate(zdt: ZonedDateTime, date: LocalDate): ZonedDateTime {
  return resolveLocal(zdt, dateTimeOfDateAndTime(date, zdt.dateTime.time))
}

export function zonedWithTime(zdt: ZonedDateTime, time: LocalTime): ZonedDateTime {
  return resolveLocal(zdt, dateTimeOfDateAndTime(zdt.dateTime.date, time))
}

/**
 * Sets a field. InstantSeconds moves to that instant in the same zone;
 * OffsetSeconds switches offset only when the new one is valid here.
 */
export function zonedWithField(zdt: ZonedDateTime, field: ChronoField, value: number): ZonedDateTime {
  requireNonNull(field, 'field')
  switch (field) {
    case 'InstantSeconds':
      return ofEpochSecond(checkField(field, value), zdt.dateTime.time.nano, zdt.zone)
    case 'OffsetSeconds':
      return resolveOffset(zdt, offsetOfTotalSeconds(checkField(field, value)))
    default:
      return resolveLocal(zdt, dateTimeWithField(zdt.dateTime, field, value))
  }
}

export function zonedWith(zdt: ZonedDateTime, adjuster: DateAdjuster): ZonedDateTime {
  return resolveLocal(zdt, dateTimeWith(zdt.dateTime, adjuster))
}

export function zonedTruncatedTo(zdt: ZonedDateTime, unit: ChronoUnit): ZonedDateTime {
  return resolveLocal(zdt, dateTimeTruncatedTo(zdt.dateTime, unit))
}

// ============================================================================
// Arithmetic
// ============================================================================

export function zonedPlusYears(zdt: ZonedDateTime, years: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimePlusYears(zdt.dateTime, years))
}

export function zonedPlusMonths(zdt: ZonedDateTime, months: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimePlusMonths(zdt.dateTime, months))
}

export function zonedPlusWeeks(zdt: ZonedDateTime, weeks: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimePlusWeeks(zdt.dateTime, weeks))
}

export function zonedPlusDays(zdt: ZonedDateTime, days: number): ZonedDateTime {
  return resolveLocal(zdt, dateTimePlusDays(zdt.dateTime, days))
}

export function zonedPlusHours(zdt: ZonedDateTime, hours: number): ZonedDateTime {
  return resolveInstant(zdt, dateTimePlusHours(zdt.dateTime, hours))
}

export function zonedPlusMinutes(zdt: ZonedDateTime, minutes: number): ZonedDateTime {
  return resolveInstant(zdt, dateTimePlusMinutes(zdt.dateTime, minutes))
}

export function zonedPlusSeconds(zdt: ZonedDateTime, seconds: number): ZonedDateTime {
  return resolveInstant(zdt, dateTimePlusSeconds(zdt.dateTime, seconds))
}

export function zonedPlusNanos(zdt: ZonedDateTime, nanos: number): ZonedDateTime {
  return resolveInstant(zdt, dateTimePlusNanos(zdt.dateTime, nanos))
}

export function zonedMinusYears(zdt: ZonedDateTime, years: number): ZonedDateTime {
  return zonedPlusYears(zdt, -years)
}

export function zonedMinusMonths(zdt: ZonedDateTime, months: number): ZonedDateTime {
  return zonedPlusMonths(zdt, -months)
}

export function zonedMinusWeeks(zdt: ZonedDateTime, weeks: number): ZonedDateTime {
  return zonedPlusWeeks(zdt, -weeks)
}

export function zonedMinusDays(zdt: ZonedDateTime, days: number): ZonedDateTime {
  return zonedPlusDays(zdt, -days)
}

export function zonedMinusHours(zdt: ZonedDateTime, hours: number): ZonedDateTime {
  return zonedPlusHours(zdt, -hours)
}

export function zonedMinusMinutes(zdt: ZonedDateTime, minutes: number): ZonedDateTime {
  return zonedPlusMinutes(zdt, -minutes)
}

export function zonedMinusSeconds(zdt: ZonedDateTime, seconds: number): ZonedDateTime {
  return zonedPlusSeconds(zdt, -seconds)
}

export function zonedMinusNanos(zdt: ZonedDateTime, nanos: number): ZonedDateTime {
  return zonedPlusNanos(zdt, -nanos)
}

/** Date-based units re-resolve locally; time-based units move on the instant time-line. */
export function zonedPlus(zdt: ZonedDateTime, amount: number, unit: ChronoUnit): ZonedDateTime {
  const dateTime = dateTimePlus(zdt.dateTime, amount, unit)
  return isDateBasedUnit(unit) ? resolveLocal(zdt, dateTime) : resolveInstant(zdt, dateTime)
}

export function zonedMinus(zdt: ZonedDateTime, amount: number, unit: ChronoUnit): ZonedDateTime {
  return zonedPlus(zdt, -amount, unit)
}

export function zonedPlusDuration(zdt: ZonedDateTime, duration: Duration): ZonedDateTime {
  return resolveInstant(zdt, dateTimePlusDuration(zdt.dateTime, duration))
}

export function zonedMinusDuration(zdt: ZonedDateTime, duration: Duration): ZonedDateTime {
  return resolveInstant(zdt, dateTimeMinusDuration(zdt.dateTime, duration))
}

export function zonedPlusPeriod(zdt: ZonedDateTime, period: Period): ZonedDateTime {
  return resolveLocal(zdt, dateTimePlusPeriod(zdt.dateTime, period))
}

export function zonedMinusPeriod(zdt: ZonedDateTime, period: Period): ZonedDateTime {
  return resolveLocal(zdt, dateTimeMinusPeriod(zdt.dateTime, period))
}

/**
 * Units between two values, after moving `end` into the zone of `start`.
 * Date-based units count on the local time-line, time-based ones on the
 * instant time-line.
 */
export function zonedUntil(start: ZonedDateTime, end: ZonedDateTime, unit: ChronoUnit): number {
  const aligned = zonedWithZoneSameInstant(end, start.zone)
  if (isDateBasedUnit(unit)) return dateTimeUntil(start.dateTime, aligned.dateTime, unit)
  return offsetDateTimeUntil(zonedToOffsetDateTime(start), zonedToOffsetDateTime(aligned), unit)
}

// ============================================================================
// Field Access
// ============================================================================

export function zonedIsSupported(field: ChronoField): boolean {
  return field === 'InstantSeconds' || field === 'OffsetSeconds' || dateTimeIsSupported(field)
}

export function zonedGetLong(zdt: ZonedDateTime, field: ChronoField): number {
  requireNonNull(field, 'field')
  switch (field) {
    case 'InstantSeconds': return zonedToEpochSecond(zdt)
    case 'OffsetSeconds': return zdt.offset.totalSeconds
    default: return dateTimeGetLong(zdt.dateTime, field)
  }
}

export function zonedFieldRange(zdt: ZonedDateTime, field: ChronoField): ValueRange {
  requireNonNull(field, 'field')
  if (field === 'InstantSeconds' || field === 'OffsetSeconds') return fieldRangeOf(field)
  return dateTimeFieldRange(zdt.dateTime, field)
}

// ============================================================================
// Comparison
// ============================================================================

/** Orders by instant, then local date-time, then zone id. */
export function compareZoned(a: ZonedDateTime, b: ZonedDateTime): number {
  const bySecond = Math.sign(zonedToEpochSecond(a) - zonedToEpochSecond(b))
  if (bySecond !== 0) return bySecond
  const byNano = a.dateTime.time.nano - b.dateTime.time.nano
  if (byNano !== 0) return Math.sign(byNano)
  const byLocal = compareDateTimes(a.dateTime, b.dateTime)
  if (byLocal !== 0) return byLocal
  return a.zone.id < b.zone.id ? -1 : a.zone.id > b.zone.id ? 1 : 0
}

/** Same instant, whatever the zones. */
export function isZonedEqual(a: ZonedDateTime, b: ZonedDateTime): boolean {
  return zonedToEpochSecond(a) === zonedToEpochSecond(b) && a.dateTime.time.nano === b.dateTime.time.nano
}

export function isZonedBefore(a: ZonedDateTime, b: ZonedDateTime): boolean {
  const sa = zonedToEpochSecond(a)
  const sb = zonedToEpochSecond(b)
  return sa < sb || (sa === sb && a.dateTime.time.nano < b.dateTime.time.nano)
}

export function isZonedAfter(a: ZonedDateTime, b: ZonedDateTime): boolean {
  return isZonedBefore(b, a)
}

/** Same local date-time, offset and zone. */
export function zonedEquals(a: ZonedDateTime, b: ZonedDateTime): boolean {
  return dateTimeEquals(a.dateTime, b.dateTime) && offsetEquals(a.offset, b.offset) && zoneIdEquals(a.zone, b.zone)
}

// ============================================================================
// Formatting & Parsing
// ============================================================================

/** `2008-06-30T11:30+01:00[Europe/Paris]`; the bracket is left out when the zone is the offset. */
export function formatZoned(zdt: ZonedDateTime): string {
  const text = formatDateTime(zdt.dateTime) + zdt.offset.id
  if (zdt.zone.kind === 'ZoneOffset' && offsetEquals(zdt.zone, zdt.offset)) return text
  return text + '[' + zdt.zone.id + ']'
}

const ZONED_RE = new RegExp('^' + DATE_TIME_PATTERN.source + OFFSET_PATTERN.source + '(?:\\[([^\\]]+)\\])?$')

/**
 * Parses the form `formatZoned` writes. A bracketed zone is looked up in the
 * registry and must accept the offset at that instant.
 */
export function parseZoned(text: string, registry: ZoneRulesRegistry): Result<ZonedDateTime, ParseError> {
  requireNonNull(text, 'text')
  requireNonNull(registry, 'registry')
  const match = ZONED_RE.exec(text)
  if (!match || !validYearSign(match, 1)) return Err(parseFailure(text))
  return resolveParsed(text, () => {
    const dateTime = dateTimeFromMatch(match, 1)
    const offset = offsetFromMatch(match[10] ?? '')
    const zoneText = match[11]
    if (zoneText === undefined) return make(dateTime, offset, offset)
    return zonedOfStrict(dateTime, offset, zoneIdOf(registry, zoneText))
  })
}
