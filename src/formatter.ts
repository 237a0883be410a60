/**
 * Pattern Formatter
 *
 * Compiles a pattern such as `uuuu-MM-dd HH:mm` into a list of segments and
 * uses it both to print a temporal value and to parse text into a map of
 * fields. Parsed fields are turned into values by the `resolve*` functions.
 *
 * Pattern letters:
 *
 *   G era            u year             y year-of-era      M/L month
 *   d day-of-month   D day-of-year      E day-of-week      e day-of-week (ISO number)
 *   a am-pm          h clock-hour-am-pm K hour-of-am-pm    k clock-hour-of-day
 *   H hour-of-day    m minute           s second           S fraction
 *   n nano-of-second N nano-of-day      A milli-of-day
 *   Q/q quarter      Y week-based-year  w week-of-week-based-year
 *   V zone id        z zone id          O localized offset
 *   X offset, Z for zero               x offset           Z offset
 *
 * Text between single quotes is literal (`''` is a quote), `[` … `]` marks an
 * optional section. The letter count sets the width of numbers and the style
 * of text: three letters for short text, four for full, five for narrow.
 * Text is English only, and `z` prints the zone id. `Y` and `w` follow the
 * ISO week-based calendar, with weeks starting on Monday.
 */

import type {
  Instant, LocalDate, LocalDateTime, LocalTime, OffsetDateTime, ZoneId, ZonedDateTime, ZoneOffset,
} from './types'
import { DateTimeRangeError, InvalidArgumentError, ParseError, UnsupportedFieldError, requireNonNull } from './errors'
import { type Result, Ok, Err } from './result'
import { checkField, type ChronoField } from './fields'
import { capitalize, fractionToNanos, pad2 } from './internal/helpers'
import { parseFailure, resolveParsed } from './internal/parse'
import { monthName, monthOf } from './month'
import { dayOfWeekName, dayOfWeekOf } from './day-of-week'
import { offsetOfTotalSeconds } from './zone-offset'
import { DATE_PATTERN, dateDayOfWeek, dateOf, dateOfYearDay, formatDate } from './local-date'
import { TIME_PATTERN, timeOf, timeOfNanoOfDay } from './local-time'
import { dateTimeOfDateAndTime, dateTimeToEpochSecond } from './local-date-time'
import { formatInstant, instantOfEpochSecond, parseInstant } from './instant'
import { offsetDateTimeOf } from './offset-date-time'
import { zoneIdOf } from './zone-id'
import { zonedOf, zonedOfStrict } from './zoned-date-time'
import { getLong, isSupported, type Temporal } from './temporal'
import {
  ISO_FIELDS, checkIsoField, isIsoField, isIsoTemporal, isoDateOfQuarter, isoDateOfWeek, isoGetLong, type IsoField,
} from './iso-fields'
import type { ZoneRulesRegistry } from './zone-rules-provider'

// ============================================================================
// Types
// ============================================================================

type SignStyle = 'normal' | 'exceedsPad' | 'notNegative'
type TextStyle = 'full' | 'short' | 'narrow'
type TextField = 'Era' | 'QuarterOfYear' | 'MonthOfYear' | 'DayOfWeek' | 'AmPmOfDay'

/** Anything a pattern letter can print or parse. */
type FormatField = ChronoField | IsoField

type Segment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'number'; readonly field: FormatField; readonly minWidth: number; readonly maxWidth: number; readonly sign: SignStyle }
  | { readonly kind: 'reduced'; readonly field: FormatField; readonly base: number }
  | { readonly kind: 'text'; readonly field: TextField; readonly style: TextStyle }
  | { readonly kind: 'fraction'; readonly minWidth: number; readonly maxWidth: number; readonly decimalPoint: boolean }
  | { readonly kind: 'offset'; readonly style: number; readonly noOffsetText: string }
  | { readonly kind: 'localizedOffset'; readonly full: boolean }
  | { readonly kind: 'zone'; readonly regionOnly: boolean }
  | { readonly kind: 'instant' }
  | { readonly kind: 'optional'; readonly segments: readonly Segment[] }

export type DateTimeFormatter = {
  readonly kind: 'DateTimeFormatter'
  /** The pattern it was compiled from, or the name of a predefined formatter. */
  readonly pattern: string
  readonly segments: readonly Segment[]
}

/** Fields read from text, before they are resolved into a value. */
export type ParsedFields = {
  readonly kind: 'ParsedFields'
  readonly text: string
  readonly fields: ReadonlyMap<FormatField, number>
  readonly offset: ZoneOffset | null
  readonly zoneText: string | null
}

/** Offset layouts; lower-case minutes and seconds are printed only when non-zero. */
const OFFSET_STYLES = ['+HH', '+HHmm', '+HH:mm', '+HHMM', '+HH:MM', '+HHMMss', '+HH:MM:ss', '+HHMMSS', '+HH:MM:SS'] as const

const MAX_WIDTH = 19

// ============================================================================
// Text Tables
// ============================================================================

type TextTable = { readonly base: number; readonly full: readonly string[] }

const MONTH_TEXT: readonly string[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12].map(m => capitalize(monthName(monthOf(m))))
const DAY_TEXT: readonly string[] = [1, 2, 3, 4, 5, 6, 7].map(d => capitalize(dayOfWeekName(dayOfWeekOf(d))))

const TEXT_TABLES: Record<TextField, TextTable> = {
  Era: { base: 0, full: ['Before Christ', 'Anno Domini'] },
  QuarterOfYear: { base: 1, full: ['1st quarter', '2nd quarter', '3rd quarter', '4th quarter'] },
  MonthOfYear: { base: 1, full: MONTH_TEXT },
  DayOfWeek: { base: 1, full: DAY_TEXT },
  AmPmOfDay: { base: 0, full: ['AM', 'PM'] },
}

const ERA_SHORT = ['BC', 'AD']
const QUARTER_SHORT = ['Q1', 'Q2', 'Q3', 'Q4']

function textsOf(field: TextField, style: TextStyle): readonly string[] {
  const full = TEXT_TABLES[field].full
  if (field === 'AmPmOfDay') return full
  if (field === 'Era' && style === 'short') return ERA_SHORT
  if (field === 'QuarterOfYear' && style !== 'full') return style === 'short' ? QUARTER_SHORT : ['1', '2', '3', '4']
  switch (style) {
    case 'full': return full
    case 'short': return full.map(t => t.substring(0, 3))
    case 'narrow': return full.map(t => t.substring(0, 1))
  }
}

// ============================================================================
// Segment Constructors
// ============================================================================

function literal(text: string): Segment {
  return { kind: 'literal', text }
}

function num(field: FormatField, minWidth: number, maxWidth: number, sign: SignStyle): Segment {
  return { kind: 'number', field, minWidth, maxWidth, sign }
}

function fixed(field: FormatField, width: number): Segment {
  return num(field, width, width, 'notNegative')
}

function optional(...segments: Segment[]): Segment {
  return { kind: 'optional', segments }
}

// ============================================================================
// Pattern Compilation
// ============================================================================

function tooMany(letter: string): InvalidArgumentError {
  return new InvalidArgumentError(`Too many pattern letters: ${letter}`)
}

function textStyleOf(letter: string, count: number): TextStyle {
  if (count <= 3) return 'short'
  if (count === 4) return 'full'
  if (count === 5) return 'narrow'
  throw tooMany(letter)
}

function yearSegment(field: FormatField, count: number): Segment {
  if (count === 2) return { kind: 'reduced', field, base: 2000 }
  if (count < 4) return num(field, count, MAX_WIDTH, 'normal')
  return num(field, count, MAX_WIDTH, 'exceedsPad')
}

/** One or two digits: `d` reads any width, `dd` exactly two. */
function smallNumber(letter: string, field: FormatField, count: number): Segment {
  if (count === 1) return num(field, 1, MAX_WIDTH, 'normal')
  if (count === 2) return fixed(field, 2)
  throw tooMany(letter)
}

function offsetSegment(letter: 'X' | 'x', count: number): Segment {
  const style = [1, 3, 4, 5, 6][count - 1]
  if (style === undefined) throw tooMany(letter)
  if (letter === 'X') return { kind: 'offset', style, noOffsetText: 'Z' }
  const noOffsetText = ['+00', '+0000', '+00:00', '+0000', '+00:00'][count - 1] ?? '+00'
  return { kind: 'offset', style, noOffsetText }
}

function letterSegment(letter: string, count: number): Segment {
  switch (letter) {
    case 'G': return { kind: 'text', field: 'Era', style: textStyleOf(letter, count) }
    case 'u': return yearSegment('Year', count)
    case 'y': return yearSegment('YearOfEra', count)
    case 'M':
    case 'L':
      if (count <= 2) return smallNumber(letter, 'MonthOfYear', count)
      return { kind: 'text', field: 'MonthOfYear', style: textStyleOf(letter, count) }
    case 'Q':
    case 'q':
      if (count <= 2) return smallNumber(letter, 'QuarterOfYear', count)
      return { kind: 'text', field: 'QuarterOfYear', style: textStyleOf(letter, count) }
    case 'Y': return yearSegment('WeekBasedYear', count)
    case 'w': return smallNumber(letter, 'WeekOfWeekBasedYear', count)
    case 'd': return smallNumber(letter, 'DayOfMonth', count)
    case 'D':
      if (count === 1) return num('DayOfYear', 1, MAX_WIDTH, 'normal')
      if (count === 2) return num('DayOfYear', 2, 3, 'notNegative')
      if (count === 3) return fixed('DayOfYear', 3)
      throw tooMany(letter)
    case 'E': return { kind: 'text', field: 'DayOfWeek', style: textStyleOf(letter, count) }
    case 'e':
      if (count <= 2) return fixed('DayOfWeek', count)
      return { kind: 'text', field: 'DayOfWeek', style: textStyleOf(letter, count) }
    case 'a':
      if (count > 1) throw tooMany(letter)
      return { kind: 'text', field: 'AmPmOfDay', style: 'short' }
    case 'h': return smallNumber(letter, 'ClockHourOfAmPm', count)
    case 'K': return smallNumber(letter, 'HourOfAmPm', count)
    case 'k': return smallNumber(letter, 'ClockHourOfDay', count)
    case 'H': return smallNumber(letter, 'HourOfDay', count)
    case 'm': return smallNumber(letter, 'MinuteOfHour', count)
    case 's': return smallNumber(letter, 'SecondOfMinute', count)
    case 'S':
      if (count > 9) throw tooMany(letter)
      return { kind: 'fraction', minWidth: count, maxWidth: count, decimalPoint: false }
    case 'n': return num('NanoOfSecond', count, MAX_WIDTH, 'notNegative')
    case 'N': return num('NanoOfDay', count, MAX_WIDTH, 'notNegative')
    case 'A': return num('MilliOfDay', count, MAX_WIDTH, 'notNegative')
    case 'V':
      if (count !== 2) throw new InvalidArgumentError('Pattern letter count must be 2: V')
      return { kind: 'zone', regionOnly: false }
    case 'z':
      if (count > 4) throw tooMany(letter)
      return { kind: 'zone', regionOnly: false }
    case 'O':
      if (count === 1) return { kind: 'localizedOffset', full: false }
      if (count === 4) return { kind: 'localizedOffset', full: true }
      throw new InvalidArgumentError('Pattern letter count must be 1 or 4: O')
    case 'X':
    case 'x':
      return offsetSegment(letter, count)
    case 'Z':
      if (count <= 3) return { kind: 'offset', style: 3, noOffsetText: '+0000' }
      if (count === 4) return { kind: 'localizedOffset', full: true }
      if (count === 5) return { kind: 'offset', style: 6, noOffsetText: 'Z' }
      throw tooMany(letter)
    default:
      throw new InvalidArgumentError(`Unknown pattern letter: ${letter}`)
  }
}

function isPatternLetter(ch: string): boolean {
  return (ch >= 'A' && ch <= 'Z') || (ch >= 'a' && ch <= 'z')
}

function appendLiteral(segments: Segment[], text: string): void {
  const last = segments[segments.length - 1]
  if (last?.kind === 'literal') segments[segments.length - 1] = literal(last.text + text)
  else segments.push(literal(text))
}

export function formatterOfPattern(pattern: string): DateTimeFormatter {
  requireNonNull(pattern, 'pattern')
  const root: Segment[] = []
  const parents: Segment[][] = []
  let current = root
  let i = 0

  while (i < pattern.length) {
    const ch = pattern.charAt(i)
    if (isPatternLetter(ch)) {
      let end = i
      while (pattern.charAt(end) === ch) end++
      current.push(letterSegment(ch, end - i))
      i = end
    } else if (ch === "'") {
      i++
      let text = ''
      for (;;) {
        if (i >= pattern.length) throw new InvalidArgumentError(`Pattern ends with an incomplete string literal: ${pattern}`)
        const c = pattern.charAt(i)
        if (c === "'") {
          if (pattern.charAt(i + 1) !== "'") break
          i++
        }
        text += c
        i++
      }
      i++
      appendLiteral(current, text === '' ? "'" : text)
    } else if (ch === '[') {
      parents.push(current)
      const inner: Segment[] = []
      current.push({ kind: 'optional', segments: inner })
      current = inner
      i++
    } else if (ch === ']') {
      const parent = parents.pop()
      if (!parent) throw new InvalidArgumentError('Pattern invalid as it contains ] without previous [')
      current = parent
      i++
    } else if (ch === '{' || ch === '}' || ch === '#') {
      throw new InvalidArgumentError(`Pattern includes reserved character: '${ch}'`)
    } else {
      appendLiteral(current, ch)
      i++
    }
  }
  return { kind: 'DateTimeFormatter', pattern, segments: root }
}

// ============================================================================
// Predefined Formatters
// ============================================================================

function predefined(pattern: string, segments: Segment[]): DateTimeFormatter {
  return { kind: 'DateTimeFormatter', pattern, segments }
}

const DATE_SEGMENTS: Segment[] = [
  num('Year', 4, 10, 'exceedsPad'), literal('-'), fixed('MonthOfYear', 2), literal('-'), fixed('DayOfMonth', 2),
]

const TIME_SEGMENTS: Segment[] = [
  fixed('HourOfDay', 2), literal(':'), fixed('MinuteOfHour', 2),
  optional(literal(':'), fixed('SecondOfMinute', 2), optional({ kind: 'fraction', minWidth: 0, maxWidth: 9, decimalPoint: true })),
]

const DATE_TIME_SEGMENTS: Segment[] = [...DATE_SEGMENTS, literal('T'), ...TIME_SEGMENTS]

const OFFSET_DATE_TIME_SEGMENTS: Segment[] = [...DATE_TIME_SEGMENTS, { kind: 'offset', style: 6, noOffsetText: 'Z' }]

/** `2011-12-03` */
export const ISO_LOCAL_DATE = predefined('ISO_LOCAL_DATE', DATE_SEGMENTS)
/** `10:15:30`, with a fraction of up to nine digits when non-zero */
export const ISO_LOCAL_TIME = predefined('ISO_LOCAL_TIME', TIME_SEGMENTS)
/** `2011-12-03T10:15:30` */
export const ISO_LOCAL_DATE_TIME = predefined('ISO_LOCAL_DATE_TIME', DATE_TIME_SEGMENTS)
/** `2011-12-03T10:15:30+01:00` */
export const ISO_OFFSET_DATE_TIME = predefined('ISO_OFFSET_DATE_TIME', OFFSET_DATE_TIME_SEGMENTS)
/** `2011-12-03T10:15:30+01:00[Europe/Paris]`; the zone is printed only for regions */
export const ISO_ZONED_DATE_TIME = predefined('ISO_ZONED_DATE_TIME', [
  ...OFFSET_DATE_TIME_SEGMENTS, optional(literal('['), { kind: 'zone', regionOnly: true }, literal(']')),
])
/** `2011-12-03T10:15:30Z` */
export const ISO_INSTANT = predefined('ISO_INSTANT', [{ kind: 'instant' }])
/** `20111203`, with an optional `+0100` style offset */
export const BASIC_ISO_DATE = predefined('BASIC_ISO_DATE', [
  fixed('Year', 4), fixed('MonthOfYear', 2), fixed('DayOfMonth', 2),
  optional({ kind: 'offset', style: 5, noOffsetText: 'Z' }),
])
/** `2012-W48-6`, with an optional offset */
export const ISO_WEEK_DATE = predefined('ISO_WEEK_DATE', [
  num('WeekBasedYear', 4, 10, 'exceedsPad'), literal('-W'), fixed('WeekOfWeekBasedYear', 2), literal('-'), fixed('DayOfWeek', 1),
  optional({ kind: 'offset', style: 6, noOffsetText: 'Z' }),
])

// ============================================================================
// Formatting
// ============================================================================

function offsetOf(temporal: Temporal): ZoneOffset | null {
  switch (temporal.kind) {
    case 'OffsetDateTime':
    case 'OffsetTime':
    case 'ZonedDateTime':
      return temporal.offset
    default:
      return null
  }
}

function zoneOf(temporal: Temporal, regionOnly: boolean): ZoneId | null {
  if (temporal.kind !== 'ZonedDateTime') return null
  if (regionOnly && temporal.zone.kind !== 'ZoneRegion') return null
  return temporal.zone
}

function supports(temporal: Temporal, field: FormatField): boolean {
  return isIsoField(field) ? isIsoTemporal(temporal) : isSupported(temporal, field)
}

function readField(temporal: Temporal, field: FormatField): number {
  if (!isIsoField(field)) return getLong(temporal, field)
  if (!isIsoTemporal(temporal)) throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  return isoGetLong(temporal, field)
}

function canFormat(segments: readonly Segment[], temporal: Temporal): boolean {
  return segments.every(seg => {
    switch (seg.kind) {
      case 'literal':
      case 'optional':
        return true
      case 'number':
      case 'reduced':
      case 'text':
        return supports(temporal, seg.field)
      case 'fraction':
        return isSupported(temporal, 'NanoOfSecond')
      case 'offset':
      case 'localizedOffset':
        return offsetOf(temporal) !== null
      case 'zone':
        return zoneOf(temporal, seg.regionOnly) !== null
      case 'instant':
        return isSupported(temporal, 'InstantSeconds')
    }
  })
}

function formatNumber(field: FormatField, value: number, minWidth: number, maxWidth: number, sign: SignStyle): string {
  const digits = String(Math.abs(value))
  if (digits.length > maxWidth) {
    throw new DateTimeRangeError(`Field ${field} cannot be printed as the value ${value} exceeds the maximum print width of ${maxWidth}`)
  }
  let prefix = ''
  if (value < 0) {
    if (sign === 'notNegative') {
      throw new DateTimeRangeError(`Field ${field} cannot be printed as the value ${value} cannot be negative according to the SignStyle`)
    }
    prefix = '-'
  } else if (sign === 'exceedsPad' && digits.length > minWidth) {
    prefix = '+'
  }
  return prefix + digits.padStart(minWidth, '0')
}

function formatFraction(nano: number, minWidth: number, maxWidth: number, decimalPoint: boolean): string {
  let digits = String(nano).padStart(9, '0').substring(0, maxWidth)
  while (digits.length > minWidth && digits.endsWith('0')) digits = digits.substring(0, digits.length - 1)
  if (digits === '') return ''
  return decimalPoint ? '.' + digits : digits
}

function offsetParts(offset: ZoneOffset): { sign: string; hours: number; minutes: number; seconds: number } {
  const abs = Math.abs(offset.totalSeconds)
  return {
    sign: offset.totalSeconds < 0 ? '-' : '+',
    hours: Math.floor(abs / 3600),
    minutes: Math.floor(abs / 60) % 60,
    seconds: abs % 60,
  }
}

function formatOffsetStyle(offset: ZoneOffset, style: number, noOffsetText: string): string {
  if (offset.totalSeconds === 0) return noOffsetText
  const { sign, hours, minutes, seconds } = offsetParts(offset)
  const colon = style > 0 && style % 2 === 0 ? ':' : ''
  let text = sign + pad2(hours)
  if (style >= 3 || (style >= 1 && minutes > 0)) {
    text += colon + pad2(minutes)
    if (style >= 7 || (style >= 5 && seconds > 0)) text += colon + pad2(seconds)
  }
  return text
}

function formatLocalizedOffset(offset: ZoneOffset, full: boolean): string {
  if (offset.totalSeconds === 0) return 'GMT'
  const { sign, hours, minutes, seconds } = offsetParts(offset)
  if (full) return 'GMT' + sign + pad2(hours) + ':' + pad2(minutes) + (seconds > 0 ? ':' + pad2(seconds) : '')
  let text = 'GMT' + sign + hours
  if (minutes > 0 || seconds > 0) {
    text += ':' + pad2(minutes)
    if (seconds > 0) text += ':' + pad2(seconds)
  }
  return text
}

function formatSegments(segments: readonly Segment[], temporal: Temporal, out: string[]): void {
  for (const seg of segments) {
    switch (seg.kind) {
      case 'literal':
        out.push(seg.text)
        break
      case 'number':
        out.push(formatNumber(seg.field, readField(temporal, seg.field), seg.minWidth, seg.maxWidth, seg.sign))
        break
      case 'reduced':
        out.push(pad2(Math.abs(readField(temporal, seg.field)) % 100))
        break
      case 'text': {
        const table = TEXT_TABLES[seg.field]
        const value = readField(temporal, seg.field)
        out.push(textsOf(seg.field, seg.style)[value - table.base] ?? String(value))
        break
      }
      case 'fraction':
        out.push(formatFraction(getLong(temporal, 'NanoOfSecond'), seg.minWidth, seg.maxWidth, seg.decimalPoint))
        break
      case 'offset':
      case 'localizedOffset': {
        const offset = offsetOf(temporal)
        if (!offset) throw new UnsupportedFieldError(`Unable to obtain offset from ${temporal.kind}`)
        out.push(seg.kind === 'offset'
          ? formatOffsetStyle(offset, seg.style, seg.noOffsetText)
          : formatLocalizedOffset(offset, seg.full))
        break
      }
      case 'zone': {
        const zone = zoneOf(temporal, seg.regionOnly)
        if (!zone) throw new UnsupportedFieldError(`Unable to obtain zone from ${temporal.kind}`)
        out.push(zone.id)
        break
      }
      case 'instant':
        out.push(formatInstant(instantOfEpochSecond(getLong(temporal, 'InstantSeconds'), getLong(temporal, 'NanoOfSecond'))))
        break
      case 'optional':
        if (canFormat(seg.segments, temporal)) formatSegments(seg.segments, temporal, out)
        break
    }
  }
}

export function formatWith(formatter: DateTimeFormatter, temporal: Temporal): string {
  requireNonNull(formatter, 'formatter')
  requireNonNull(temporal, 'temporal')
  const out: string[] = []
  formatSegments(formatter.segments, temporal, out)
  return out.join('')
}

// ============================================================================
// Parsing
// ============================================================================

type ParseState = {
  fields: Map<FormatField, number>
  offset: ZoneOffset | null
  zoneText: string | null
}

/** Parse steps return the next position, or the bitwise complement of the error position. */
type Position = number

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9'
}

function countDigits(text: string, pos: number, max: number): number {
  let n = 0
  while (n < max && isDigit(text[pos + n])) n++
  return n
}

function setField(state: ParseState, field: FormatField, value: number): boolean {
  const existing = state.fields.get(field)
  if (existing !== undefined && existing !== value) return false
  state.fields.set(field, value)
  return true
}

/** Width that fixed-width numbers directly after index `i` need, so a variable-width number leaves it for them. */
function reservedAfter(segments: readonly Segment[], i: number): number {
  let reserved = 0
  for (let j = i + 1; j < segments.length; j++) {
    const seg = segments[j]
    if (seg?.kind === 'number' && seg.minWidth === seg.maxWidth) reserved += seg.minWidth
    else if (seg?.kind === 'reduced') reserved += 2
    else break
  }
  return reserved
}

function parseNumber(seg: Extract<Segment, { kind: 'number' }>, text: string, pos: number, reserved: number, state: ParseState): Position {
  let p = pos
  const sign = text[p]
  if (sign === '+' || sign === '-') {
    if (seg.sign === 'notNegative' || (sign === '+' && seg.sign === 'normal')) return ~pos
    p++
  }
  const available = countDigits(text, p, text.length)
  const width = Math.min(seg.maxWidth, available - reserved)
  if (width < seg.minWidth || width <= 0) return ~p
  if (seg.sign === 'exceedsPad') {
    if (sign === '+' && width <= seg.minWidth) return ~pos
    if (sign !== '+' && sign !== '-' && width > seg.minWidth) return ~pos
  }
  const magnitude = parseInt(text.substring(p, p + width), 10)
  if (!Number.isSafeInteger(magnitude)) return ~p
  const value = sign === '-' ? -magnitude : magnitude
  return setField(state, seg.field, value) ? p + width : ~pos
}

function parseText(field: TextField, style: TextStyle, text: string, pos: number, state: ParseState): Position {
  const candidates = textsOf(field, style)
  let best = -1
  let bestLength = 0
  candidates.forEach((candidate, index) => {
    if (candidate.length > bestLength && text.substring(pos, pos + candidate.length).toLowerCase() === candidate.toLowerCase()) {
      best = index
      bestLength = candidate.length
    }
  })
  if (best < 0) return ~pos
  return setField(state, field, best + TEXT_TABLES[field].base) ? pos + bestLength : ~pos
}

function parseFraction(seg: Extract<Segment, { kind: 'fraction' }>, text: string, pos: number, state: ParseState): Position {
  let p = pos
  if (seg.decimalPoint) {
    if (text[p] !== '.') return seg.minWidth === 0 ? pos : ~pos
    p++
  }
  const width = countDigits(text, p, seg.maxWidth)
  if (width < Math.max(seg.minWidth, seg.decimalPoint ? 1 : 0)) return ~p
  if (width === 0) return p
  return setField(state, 'NanoOfSecond', fractionToNanos(text.substring(p, p + width))) ? p + width : ~pos
}

function twoDigits(text: string, pos: number): number | null {
  return countDigits(text, pos, 2) === 2 ? parseInt(text.substring(pos, pos + 2), 10) : null
}

function toOffset(sign: string, hours: number, minutes: number, seconds: number): ZoneOffset | null {
  if (minutes > 59 || seconds > 59) return null
  const total = hours * 3600 + minutes * 60 + seconds
  if (total > 18 * 3600) return null
  return offsetOfTotalSeconds(sign === '-' ? -total : total)
}

function parseOffsetStyle(style: number, noOffsetText: string, text: string, pos: number, state: ParseState): Position {
  const sign = text[pos]
  if (sign === '+' || sign === '-') {
    const colon = style > 0 && style % 2 === 0 ? ':' : ''
    let p = pos + 1
    const hours = twoDigits(text, p)
    if (hours !== null) {
      p += 2
      let minutes = 0
      let seconds = 0
      let ok = true
      if (style >= 1) {
        const hasMinutes = text.startsWith(colon, p) && twoDigits(text, p + colon.length) !== null
        if (hasMinutes) {
          minutes = twoDigits(text, p + colon.length) ?? 0
          p += colon.length + 2
          if (style >= 5) {
            const hasSeconds = text.startsWith(colon, p) && twoDigits(text, p + colon.length) !== null
            if (hasSeconds) {
              seconds = twoDigits(text, p + colon.length) ?? 0
              p += colon.length + 2
            } else if (style >= 7) {
              ok = false
            }
          }
        } else if (style >= 3) {
          ok = false
        }
      }
      const offset = ok ? toOffset(sign, hours, minutes, seconds) : null
      if (offset) {
        state.offset = offset
        return p
      }
    }
  }
  if (noOffsetText !== '' && text.startsWith(noOffsetText, pos)) {
    state.offset = offsetOfTotalSeconds(0)
    return pos + noOffsetText.length
  }
  return ~pos
}

function parseLocalizedOffset(full: boolean, text: string, pos: number, state: ParseState): Position {
  if (!text.startsWith('GMT', pos)) return ~pos
  let p = pos + 3
  const sign = text[p]
  if (sign !== '+' && sign !== '-') {
    state.offset = offsetOfTotalSeconds(0)
    return p
  }
  p++
  const hourDigits = countDigits(text, p, 2)
  if (hourDigits === 0 || (full && hourDigits !== 2)) return ~p
  const hours = parseInt(text.substring(p, p + hourDigits), 10)
  p += hourDigits
  let minutes = 0
  let seconds = 0
  if (text[p] === ':' && twoDigits(text, p + 1) !== null) {
    minutes = twoDigits(text, p + 1) ?? 0
    p += 3
    if (text[p] === ':' && twoDigits(text, p + 1) !== null) {
      seconds = twoDigits(text, p + 1) ?? 0
      p += 3
    }
  } else if (full) {
    return ~p
  }
  const offset = toOffset(sign, hours, minutes, seconds)
  if (!offset) return ~pos
  state.offset = offset
  return p
}

const ZONE_TEXT_RE = /[A-Za-z0-9~/._+:-]+/y

function parseZoneText(text: string, pos: number, state: ParseState): Position {
  ZONE_TEXT_RE.lastIndex = pos
  const match = ZONE_TEXT_RE.exec(text)
  if (!match) return ~pos
  state.zoneText = match[0]
  return pos + match[0].length
}

const INSTANT_TEXT_RE = new RegExp(DATE_PATTERN.source + 'T' + TIME_PATTERN.source + 'Z', 'y')

function parseInstantText(text: string, pos: number, state: ParseState): Position {
  INSTANT_TEXT_RE.lastIndex = pos
  const match = INSTANT_TEXT_RE.exec(text)
  if (!match) return ~pos
  const parsed = parseInstant(match[0])
  if (!parsed.ok) return ~pos
  if (!setField(state, 'InstantSeconds', parsed.value.epochSecond)) return ~pos
  if (!setField(state, 'NanoOfSecond', parsed.value.nano)) return ~pos
  return pos + match[0].length
}

function parseSegments(segments: readonly Segment[], text: string, start: number, state: ParseState): Position {
  let pos = start
  for (const [i, seg] of segments.entries()) {
    switch (seg.kind) {
      case 'literal':
        if (!text.startsWith(seg.text, pos)) return ~pos
        pos += seg.text.length
        break
      case 'number':
        pos = parseNumber(seg, text, pos, seg.minWidth === seg.maxWidth ? 0 : reservedAfter(segments, i), state)
        break
      case 'reduced': {
        const value = twoDigits(text, pos)
        if (value === null || !setField(state, seg.field, seg.base + value)) return ~pos
        pos += 2
        break
      }
      case 'text':
        pos = parseText(seg.field, seg.style, text, pos, state)
        break
      case 'fraction':
        pos = parseFraction(seg, text, pos, state)
        break
      case 'offset':
        pos = parseOffsetStyle(seg.style, seg.noOffsetText, text, pos, state)
        break
      case 'localizedOffset':
        pos = parseLocalizedOffset(seg.full, text, pos, state)
        break
      case 'zone':
        pos = parseZoneText(text, pos, state)
        break
      case 'instant':
        pos = parseInstantText(text, pos, state)
        break
      case 'optional': {
        const saved: ParseState = { fields: new Map(state.fields), offset: state.offset, zoneText: state.zoneText }
        const end = parseSegments(seg.segments, text, pos, state)
        if (end < 0) {
          state.fields = saved.fields
          state.offset = saved.offset
          state.zoneText = saved.zoneText
        } else {
          pos = end
        }
        break
      }
    }
    if (pos < 0) return pos
  }
  return pos
}

/** Reads the whole text into fields; nothing may be left over. */
export function parseWith(formatter: DateTimeFormatter, text: string): Result<ParsedFields, ParseError> {
  requireNonNull(formatter, 'formatter')
  requireNonNull(text, 'text')
  const state: ParseState = { fields: new Map(), offset: null, zoneText: null }
  const end = parseSegments(formatter.segments, text, 0, state)
  if (end < 0) return Err(parseFailure(text, ~end))
  if (end < text.length) {
    return Err(new ParseError(`Text '${text}' could not be parsed, unparsed text found at index ${end}`, text, end))
  }
  return Ok({ kind: 'ParsedFields', text, fields: state.fields, offset: state.offset, zoneText: state.zoneText })
}

// ============================================================================
// Resolving
// ============================================================================

function unable(type: string, parsed: ParsedFields): InvalidArgumentError {
  const fields = [...parsed.fields].map(([f, v]) => `${f}=${v}`).join(', ')
  return new InvalidArgumentError(`Unable to obtain ${type} from parsed fields: {${fields}}`)
}

function field(parsed: ParsedFields, name: ChronoField): number | undefined {
  const value = parsed.fields.get(name)
  return value === undefined ? undefined : checkField(name, value)
}

function yearOf(parsed: ParsedFields): number | undefined {
  const year = field(parsed, 'Year')
  const yearOfEra = field(parsed, 'YearOfEra')
  if (yearOfEra === undefined) return year
  const era = field(parsed, 'Era') ?? 1
  const derived = era === 1 ? yearOfEra : 1 - yearOfEra
  if (year !== undefined && year !== derived) {
    throw new DateTimeRangeError(`Conflict found: Year ${year} differs from Year ${derived} derived from YearOfEra ${yearOfEra}`)
  }
  return derived
}

function isoField(parsed: ParsedFields, name: IsoField): number | undefined {
  const value = parsed.fields.get(name)
  return value === undefined ? undefined : checkIsoField(name, value)
}

/** Year with month and day, day-of-year or quarter; or a week-based year, week and day-of-week. */
function baseDate(parsed: ParsedFields): LocalDate {
  const year = yearOf(parsed)
  if (year !== undefined) {
    const month = field(parsed, 'MonthOfYear')
    const day = field(parsed, 'DayOfMonth')
    if (month !== undefined && day !== undefined) return dateOf(year, month, day)
    const dayOfYear = field(parsed, 'DayOfYear')
    if (dayOfYear !== undefined) return dateOfYearDay(year, dayOfYear)
    const quarter = isoField(parsed, 'QuarterOfYear')
    const dayOfQuarter = isoField(parsed, 'DayOfQuarter')
    if (quarter !== undefined && dayOfQuarter !== undefined) return isoDateOfQuarter(year, quarter, dayOfQuarter)
  }
  const weekBasedYear = isoField(parsed, 'WeekBasedYear')
  const week = isoField(parsed, 'WeekOfWeekBasedYear')
  const dayOfWeek = field(parsed, 'DayOfWeek')
  if (weekBasedYear !== undefined && week !== undefined && dayOfWeek !== undefined) {
    return isoDateOfWeek(weekBasedYear, week, dayOfWeek)
  }
  throw unable('LocalDate', parsed)
}

function buildDate(parsed: ParsedFields): LocalDate {
  const date = baseDate(parsed)
  const dayOfWeek = field(parsed, 'DayOfWeek')
  if (dayOfWeek !== undefined && dayOfWeek !== dateDayOfWeek(date)) {
    throw new DateTimeRangeError(`Conflict found: DayOfWeek ${dayOfWeek} does not match ${formatDate(date)}`)
  }
  for (const name of ISO_FIELDS) {
    const value = parsed.fields.get(name)
    if (value !== undefined && value !== isoGetLong(date, name)) {
      throw new DateTimeRangeError(`Conflict found: ${name} ${value} does not match ${formatDate(date)}`)
    }
  }
  return date
}

function hourOf(parsed: ParsedFields): number | undefined {
  const hour = field(parsed, 'HourOfDay')
  if (hour !== undefined) return hour
  const clockHour = field(parsed, 'ClockHourOfDay')
  if (clockHour !== undefined) return clockHour === 24 ? 0 : clockHour
  const amPm = field(parsed, 'AmPmOfDay')
  const clockHourOfAmPm = field(parsed, 'ClockHourOfAmPm')
  const hourOfAmPm = field(parsed, 'HourOfAmPm') ?? (clockHourOfAmPm === undefined ? undefined : clockHourOfAmPm % 12)
  if (amPm === undefined || hourOfAmPm === undefined) return undefined
  return amPm * 12 + hourOfAmPm
}

function buildTime(parsed: ParsedFields): LocalTime {
  const hour = hourOf(parsed)
  if (hour === undefined) {
    const nanoOfDay = field(parsed, 'NanoOfDay')
    if (nanoOfDay !== undefined) return timeOfNanoOfDay(nanoOfDay)
    const milliOfDay = field(parsed, 'MilliOfDay')
    if (milliOfDay !== undefined) return timeOfNanoOfDay(milliOfDay * 1_000_000)
    throw unable('LocalTime', parsed)
  }
  return timeOf(hour, field(parsed, 'MinuteOfHour') ?? 0, field(parsed, 'SecondOfMinute') ?? 0, field(parsed, 'NanoOfSecond') ?? 0)
}

function buildDateTime(parsed: ParsedFields): LocalDateTime {
  return dateTimeOfDateAndTime(buildDate(parsed), buildTime(parsed))
}

export function resolveDate(parsed: ParsedFields): Result<LocalDate, ParseError> {
  return resolveParsed(parsed.text, () => buildDate(parsed))
}

export function resolveTime(parsed: ParsedFields): Result<LocalTime, ParseError> {
  return resolveParsed(parsed.text, () => buildTime(parsed))
}

export function resolveDateTime(parsed: ParsedFields): Result<LocalDateTime, ParseError> {
  return resolveParsed(parsed.text, () => buildDateTime(parsed))
}

export function resolveOffsetDateTime(parsed: ParsedFields): Result<OffsetDateTime, ParseError> {
  return resolveParsed(parsed.text, () => {
    if (!parsed.offset) throw unable('OffsetDateTime', parsed)
    return offsetDateTimeOf(buildDateTime(parsed), parsed.offset)
  })
}

/** From parsed instant seconds, or from a date-time and an offset. */
export function resolveInstant(parsed: ParsedFields): Result<Instant, ParseError> {
  return resolveParsed(parsed.text, () => {
    const seconds = parsed.fields.get('InstantSeconds')
    if (seconds !== undefined) return instantOfEpochSecond(seconds, parsed.fields.get('NanoOfSecond') ?? 0)
    if (!parsed.offset) throw unable('Instant', parsed)
    const dateTime = buildDateTime(parsed)
    return instantOfEpochSecond(dateTimeToEpochSecond(dateTime, parsed.offset), dateTime.time.nano)
  })
}

/**
 * A parsed zone must accept a parsed offset; with a zone alone the local
 * date-time is resolved leniently, with an offset alone the offset is the zone.
 */
export function resolveZoned(parsed: ParsedFields, registry: ZoneRulesRegistry): Result<ZonedDateTime, ParseError> {
  requireNonNull(registry, 'registry')
  return resolveParsed(parsed.text, () => {
    const dateTime = buildDateTime(parsed)
    const zone = parsed.zoneText === null ? null : zoneIdOf(registry, parsed.zoneText)
    if (zone && parsed.offset) return zonedOfStrict(dateTime, parsed.offset, zone)
    if (zone) return zonedOf(dateTime, zone)
    if (parsed.offset) return zonedOf(dateTime, parsed.offset)
    throw unable('ZonedDateTime', parsed)
  })
}
