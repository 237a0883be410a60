/**
 * Offset Time
 *
 * A time of day with an offset from UTC and no date.
 */

import type { Instant, LocalDate, LocalTime, OffsetDateTime, OffsetTime, ZoneOffset } from './types'
import { requireNonNull, type ParseError } from './errors'
import { type Result, Err } from './result'
import { checkField, fieldRangeOf, isTimeBasedField, type ChronoField, type ChronoUnit, type ValueRange } from './fields'
import { floorMod, NANOS_PER_SECOND, SECONDS_PER_DAY } from './internal/math'
import { parseFailure, resolveParsed } from './internal/parse'
import { offsetOfTotalSeconds, offsetEquals } from './zone-offset'
import {
  timeOfSecondOfDay, timeToNanoOfDay, timePlus, timePlusSeconds, timeWithField, timeTruncatedTo,
  timeUntil, timeGetLong, timeFieldRange, compareTimes, timeEquals, formatTime, TIME_PATTERN, timeFromMatch,
} from './local-time'
import { dateTimeOfDateAndTime } from './local-date-time'
import { OFFSET_PATTERN, offsetFromMatch } from './offset-date-time'

function make(time: LocalTime, offset: ZoneOffset): OffsetTime {
  return { kind: 'OffsetTime', time, offset }
}

export function offsetTimeOf(time: LocalTime, offset: ZoneOffset): OffsetTime {
  return make(requireNonNull(time, 'time'), requireNonNull(offset, 'offset'))
}

export function offsetTimeOfInstant(instant: Instant, offset: ZoneOffset): OffsetTime {
  requireNonNull(instant, 'instant')
  requireNonNull(offset, 'offset')
  const secondOfDay = floorMod(instant.epochSecond + offset.totalSeconds, SECONDS_PER_DAY)
  return make(timeOfSecondOfDay(secondOfDay, instant.nano), offset)
}

export function offsetTimeAtDate(ot: OffsetTime, date: LocalDate): OffsetDateTime {
  return { kind: 'OffsetDateTime', dateTime: dateTimeOfDateAndTime(date, ot.time), offset: ot.offset }
}

export function offsetTimeWithOffsetSameLocal(ot: OffsetTime, offset: ZoneOffset): OffsetTime {
  return offsetEquals(ot.offset, offset) ? ot : make(ot.time, offset)
}

export function offsetTimeWithOffsetSameInstant(ot: OffsetTime, offset: ZoneOffset): OffsetTime {
  if (offsetEquals(ot.offset, offset)) return ot
  return make(timePlusSeconds(ot.time, offset.totalSeconds - ot.offset.totalSeconds), offset)
}

function withTime(ot: OffsetTime, time: LocalTime): OffsetTime {
  return ot.time === time ? ot : make(time, ot.offset)
}

export function offsetTimePlus(ot: OffsetTime, amount: number, unit: ChronoUnit): OffsetTime {
  return withTime(ot, timePlus(ot.time, amount, unit))
}

export function offsetTimeMinus(ot: OffsetTime, amount: number, unit: ChronoUnit): OffsetTime {
  return withTime(ot, timePlus(ot.time, -amount, unit))
}

export function offsetTimeWithField(ot: OffsetTime, field: ChronoField, value: number): OffsetTime {
  requireNonNull(field, 'field')
  if (field === 'OffsetSeconds') return make(ot.time, offsetOfTotalSeconds(checkField(field, value)))
  return withTime(ot, timeWithField(ot.time, field, value))
}

export function offsetTimeTruncatedTo(ot: OffsetTime, unit: ChronoUnit): OffsetTime {
  return withTime(ot, timeTruncatedTo(ot.time, unit))
}

export function offsetTimeUntil(start: OffsetTime, end: OffsetTime, unit: ChronoUnit): number {
  return timeUntil(start.time, offsetTimeWithOffsetSameInstant(end, start.offset).time, unit)
}

export function offsetTimeIsSupported(field: ChronoField): boolean {
  return field === 'OffsetSeconds' || isTimeBasedField(field)
}

export function offsetTimeGetLong(ot: OffsetTime, field: ChronoField): number {
  requireNonNull(field, 'field')
  return field === 'OffsetSeconds' ? ot.offset.totalSeconds : timeGetLong(ot.time, field)
}

export function offsetTimeFieldRange(field: ChronoField): ValueRange {
  return field === 'OffsetSeconds' ? fieldRangeOf(field) : timeFieldRange(field)
}

/** Nanos of the UTC-adjusted time of day, used for ordering. */
function epochNano(ot: OffsetTime): number {
  return timeToNanoOfDay(ot.time) - ot.offset.totalSeconds * NANOS_PER_SECOND
}

/** Orders by the UTC-adjusted time, then by the local time. */
export function compareOffsetTimes(a: OffsetTime, b: OffsetTime): number {
  if (offsetEquals(a.offset, b.offset)) return compareTimes(a.time, b.time)
  return Math.sign(epochNano(a) - epochNano(b)) || compareTimes(a.time, b.time)
}

export function isOffsetTimeEqual(a: OffsetTime, b: OffsetTime): boolean {
  return epochNano(a) === epochNano(b)
}

export function isOffsetTimeBefore(a: OffsetTime, b: OffsetTime): boolean {
  return epochNano(a) < epochNano(b)
}

export function isOffsetTimeAfter(a: OffsetTime, b: OffsetTime): boolean {
  return epochNano(a) > epochNano(b)
}

export function offsetTimeEquals(a: OffsetTime, b: OffsetTime): boolean {
  return timeEquals(a.time, b.time) && offsetEquals(a.offset, b.offset)
}

export function formatOffsetTime(ot: OffsetTime): string {
  return formatTime(ot.time) + ot.offset.id
}

const OFFSET_TIME_RE = new RegExp('^' + TIME_PATTERN.source + OFFSET_PATTERN.source + '$')

export function parseOffsetTime(text: string): Result<OffsetTime, ParseError> {
  requireNonNull(text, 'text')
  const match = OFFSET_TIME_RE.exec(text)
  if (!match) return Err(parseFailure(text))
  return resolveParsed(text, () => make(timeFromMatch(match, 1), offsetFromMatch(match[5] ?? '')))
}
