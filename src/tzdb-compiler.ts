/**
 * TZDB Compiler
 *
 * Compiles time-zone database source text (`Rule`, `Zone` and `Link`
 * lines) into zone rules, one set per region id.
 *
 * Recognised forms:
 * - years: a number, `minimum`/`maximum` (or any abbreviation of at least
 *   three letters), `only`
 * - days: `15`, `lastSun`, `Sun>=8`, `Sun<=25`
 * - times: `2`, `2:00`, `2:00:30`, `-0:01:15`, `24:00`, with an optional
 *   suffix `w` (wall), `s` (standard) or `u`/`g`/`z` (UTC)
 */

import type { DayOfWeek, LocalDate, LocalDateTime, LocalTime, TimeDefinition, ZoneOffset, ZoneRules } from './types'
import { DateTimeError, InvalidArgumentError, ParseError, requireNonNull } from './errors'
import { YEAR_MIN, YEAR_MAX, isLeapYear } from './internal/calendar'
import { dayOfWeekFromName } from './day-of-week'
import { monthFromName, monthLength, monthOf } from './month'
import { offsetOfTotalSeconds } from './zone-offset'
import { MIDNIGHT, timeOfSecondOfDay } from './local-time'
import { dateOf, datePlusDays, dateWith } from './local-date'
import { dateTimeOfDateAndTime, dateTimePlusDays } from './local-date-time'
import { nextOrSame, previousOrSame } from './temporal-adjusters'
import { createZoneRulesBuilder, type ZoneRulesBuilder } from './zone-rules-builder'

// ============================================================================
// Types
// ============================================================================

export type TzdbSource = {
  /** File name, used in error messages. */
  name: string
  text: string
}

export type TzdbCompileOptions = {
  version: string
}

export type CompiledTzdb = {
  version: string
  zones: Map<string, ZoneRules>
}

type MonthDayTime = {
  month: number
  dayOfMonth: number
  adjustForwards: boolean
  dayOfWeek: DayOfWeek | null
  time: LocalTime
  endOfDay: boolean
  timeDefinition: TimeDefinition
}

type TzdbRule = MonthDayTime & {
  startYear: number
  endYear: number
  savingsAmount: number
}

type TzdbZone = MonthDayTime & {
  standardOffset: ZoneOffset
  fixedSavingsSecs: number | null
  savingsRule: string | null
  year: number | null
}

/** Ids that name the fixed UTC zone and are served by ZoneId parsing instead. */
const UTC_IDS = ['UTC', 'GMT', 'GMT0', 'GMT+0', 'GMT-0']

function defaultMonthDayTime(): MonthDayTime {
  return {
    month: 1,
    dayOfMonth: 1,
    adjustForwards: true,
    dayOfWeek: null,
    time: MIDNIGHT,
    endOfDay: false,
    timeDefinition: 'WALL',
  }
}

// ============================================================================
// Field Parsers
// ============================================================================

/** True when `text` abbreviates `word` to at least its first three letters. */
function matches(text: string, word: string): boolean {
  return text.length >= 3 && word.startsWith(text)
}

function parseYear(text: string, defaultYear: number): number {
  const lower = text.toLowerCase()
  if (matches(lower, 'minimum')) return YEAR_MIN
  if (matches(lower, 'maximum')) return YEAR_MAX
  if (lower === 'only') return defaultYear
  return parseInteger(text)
}

function parseInteger(text: string): number {
  if (!/^-?\d+$/.test(text)) throw new InvalidArgumentError(`Invalid number: ${text}`)
  return parseInt(text, 10)
}

function parseMonth(text: string): number {
  const month = text.length >= 3 ? monthFromName(text) : null
  if (month === null) throw new InvalidArgumentError(`Unknown month: ${text.toLowerCase()}`)
  return month
}

function parseDayOfWeek(text: string): DayOfWeek {
  const dow = text.length >= 3 ? dayOfWeekFromName(text) : null
  if (dow === null) throw new InvalidArgumentError(`Unknown day-of-week: ${text.toLowerCase()}`)
  return dow
}

const SECS_RE = /^(-)?(\d+)(?::(\d{2})(?::(\d{2}))?)?/

/** Seconds in `[-]H[:MM[:SS]]`, ignoring any suffix letter; `-` alone is zero. */
function parseSecs(text: string): number {
  if (text === '-') return 0
  const match = SECS_RE.exec(text)
  if (!match) throw new InvalidArgumentError(text)
  const secs = parseInt(match[2] ?? '0', 10) * 3600 +
    parseInt(match[3] ?? '0', 10) * 60 +
    parseInt(match[4] ?? '0', 10)
  return match[1] ? -secs : secs
}

function parseTimeDefinition(suffix: string): TimeDefinition {
  switch (suffix) {
    case 's': case 'S': return 'STANDARD'
    case 'u': case 'U': case 'g': case 'G': case 'z': case 'Z': return 'UTC'
    default: return 'WALL'
  }
}

/** Reads `IN [ON [AT]]` into a month-day-time, consuming tokens from the front. */
function parseMonthDayTime(tokens: string[], mdt: MonthDayTime): void {
  mdt.month = parseMonth(tokens.shift() ?? '')
  let dayRule = tokens.shift()
  if (dayRule === undefined) return
  if (dayRule.startsWith('last')) {
    mdt.dayOfMonth = -1
    mdt.dayOfWeek = parseDayOfWeek(dayRule.substring(4))
    mdt.adjustForwards = false
  } else {
    let index = dayRule.indexOf('>=')
    if (index > 0) {
      mdt.dayOfWeek = parseDayOfWeek(dayRule.substring(0, index))
      dayRule = dayRule.substring(index + 2)
    } else {
      index = dayRule.indexOf('<=')
      if (index > 0) {
        mdt.dayOfWeek = parseDayOfWeek(dayRule.substring(0, index))
        mdt.adjustForwards = false
        dayRule = dayRule.substring(index + 2)
      }
    }
    mdt.dayOfMonth = parseInteger(dayRule)
  }
  const timeText = tokens.shift()
  if (timeText === undefined) return
  let secsOfDay = parseSecs(timeText)
  if (secsOfDay === 86_400) {
    mdt.endOfDay = true
    secsOfDay = 0
  }
  mdt.time = timeOfSecondOfDay(secsOfDay)
  mdt.timeDefinition = parseTimeDefinition(timeText.charAt(timeText.length - 1))
}

/** Rewrites an on-or-before day as the equivalent on-or-after day six days earlier. */
function adjustToForwards(mdt: MonthDayTime, year: number): void {
  if (!mdt.adjustForwards && mdt.dayOfMonth > 0) {
    const adjusted = datePlusDays(dateOf(year, mdt.month, mdt.dayOfMonth), -6)
    mdt.dayOfMonth = adjusted.day
    mdt.month = adjusted.month
    mdt.adjustForwards = true
  }
}

// ============================================================================
// Line Parsers
// ============================================================================

function parseRuleLine(tokens: string[]): [string, TzdbRule] {
  const name = tokens.shift() ?? ''
  const startYear = parseYear(tokens.shift() ?? '', 0)
  const endYear = parseYear(tokens.shift() ?? '', startYear)
  if (startYear > endYear) throw new InvalidArgumentError(`Year order invalid: ${startYear} > ${endYear}`)
  tokens.shift()
  const rule: TzdbRule = { ...defaultMonthDayTime(), startYear, endYear, savingsAmount: 0 }
  parseMonthDayTime(tokens, rule)
  rule.savingsAmount = parseSecs(tokens.shift() ?? '')
  return [name, rule]
}

/** Parses `STDOFF RULES FORMAT [UNTIL]`; returns true when the zone has no until, closing it. */
function parseZoneLine(tokens: string[], zoneList: TzdbZone[]): boolean {
  const zone: TzdbZone = {
    ...defaultMonthDayTime(),
    standardOffset: offsetOfTotalSeconds(parseSecs(tokens.shift() ?? '')),
    fixedSavingsSecs: 0,
    savingsRule: null,
    year: null,
  }
  zoneList.push(zone)
  const savings = tokens.shift() ?? '-'
  if (savings !== '-') {
    if (SECS_RE.test(savings)) {
      zone.fixedSavingsSecs = parseSecs(savings)
    } else {
      zone.fixedSavingsSecs = null
      zone.savingsRule = savings
    }
  }
  tokens.shift()
  const year = tokens.shift()
  if (year === undefined) return true
  zone.year = parseInteger(year)
  if (tokens.length > 0) parseMonthDayTime(tokens, zone)
  return false
}

// ============================================================================
// Building
// ============================================================================

function zoneUntil(zone: TzdbZone, year: number): LocalDateTime {
  adjustToForwards(zone, year)
  let date: LocalDate
  if (zone.dayOfMonth === -1) {
    const month = monthOf(zone.month)
    zone.dayOfMonth = monthLength(month, isLeapYear(year))
    date = dateOf(year, month, zone.dayOfMonth)
    if (zone.dayOfWeek !== null) date = dateWith(date, previousOrSame(zone.dayOfWeek))
  } else {
    date = dateOf(year, zone.month, zone.dayOfMonth)
    if (zone.dayOfWeek !== null) date = dateWith(date, nextOrSame(zone.dayOfWeek))
  }
  const dateTime = dateTimeOfDateAndTime(date, zone.time)
  return zone.endOfDay ? dateTimePlusDays(dateTime, 1) : dateTime
}

function addZoneToBuilder(builder: ZoneRulesBuilder, zone: TzdbZone, rules: Map<string, TzdbRule[]>): void {
  if (zone.year !== null) builder.addWindow(zone.standardOffset, zoneUntil(zone, zone.year), zone.timeDefinition)
  else builder.addWindowForever(zone.standardOffset)

  if (zone.fixedSavingsSecs !== null) {
    builder.setFixedSavingsToWindow(zone.fixedSavingsSecs)
    return
  }
  const ruleList = rules.get(zone.savingsRule ?? '')
  if (!ruleList) throw new InvalidArgumentError(`Rule not found: ${zone.savingsRule ?? ''}`)
  for (const rule of ruleList) {
    adjustToForwards(rule, 2004)
    builder.addRuleToWindow({
      startYear: rule.startYear,
      endYear: rule.endYear,
      month: rule.month,
      dayOfMonthIndicator: rule.dayOfMonth,
      dayOfWeek: rule.dayOfWeek,
      time: rule.time,
      timeEndOfDay: rule.endOfDay,
      timeDefinition: rule.timeDefinition,
      savingAmountSecs: rule.savingsAmount,
    })
  }
}

// ============================================================================
// Compiler
// ============================================================================

/**
 * Compiles tzdb sources into rules per region id. Links resolve to the rules
 * of their target, through at most one further link.
 */
export function compileTzdb(sources: readonly TzdbSource[], options: TzdbCompileOptions): CompiledTzdb {
  requireNonNull(sources, 'sources')
  const rules = new Map<string, TzdbRule[]>()
  const zones = new Map<string, TzdbZone[]>()
  const links = new Map<string, string>()

  for (const source of sources) {
    parseSource(source, rules, zones, links)
  }

  const built = new Map<string, ZoneRules>()
  for (const [zoneId, zoneList] of zones) {
    const builder = createZoneRulesBuilder()
    for (const zone of zoneList) addZoneToBuilder(builder, zone, rules)
    built.set(zoneId, builder.toRules(zoneId))
  }

  for (const [aliasId, targetId] of links) {
    let realId = targetId
    let realRules = built.get(realId)
    if (!realRules) {
      realId = links.get(realId) ?? realId
      realRules = built.get(realId)
      if (!realRules) {
        throw new InvalidArgumentError(`Alias '${aliasId}' links to invalid zone '${realId}' for '${options.version}'`)
      }
    }
    built.set(aliasId, realRules)
  }

  for (const id of UTC_IDS) built.delete(id)
  return { version: options.version, zones: built }
}

function parseSource(
  source: TzdbSource,
  rules: Map<string, TzdbRule[]>,
  zones: Map<string, TzdbZone[]>,
  links: Map<string, string>,
): void {
  const lines = source.text.split(/\r?\n/)
  let openZone: TzdbZone[] | null = null

  for (const [index, rawLine] of lines.entries()) {
    const hash = rawLine.indexOf('#')
    const line = hash >= 0 ? rawLine.substring(0, hash) : rawLine
    if (line.trim().length === 0) continue
    const tokens = line.trim().split(/[ \t]+/)
    try {
      if (openZone !== null && /^\s/.test(line)) {
        if (parseZoneLine(tokens, openZone)) openZone = null
        continue
      }
      const first = tokens.shift()
      if (first === 'Zone') {
        if (tokens.length < 4) throw new InvalidArgumentError('Invalid Zone line')
        const zoneList: TzdbZone[] = []
        zones.set(tokens.shift() ?? '', zoneList)
        openZone = parseZoneLine(tokens, zoneList) ? null : zoneList
        continue
      }
      openZone = null
      if (first === 'Rule') {
        if (tokens.length < 9) throw new InvalidArgumentError('Invalid Rule line')
        const [name, rule] = parseRuleLine(tokens)
        const list = rules.get(name)
        if (list) list.push(rule)
        else rules.set(name, [rule])
      } else if (first === 'Link') {
        if (tokens.length < 2) throw new InvalidArgumentError('Invalid Link line')
        links.set(tokens[1] ?? '', tokens[0] ?? '')
      } else {
        throw new InvalidArgumentError('Unknown line')
      }
    } catch (e) {
      if (!(e instanceof DateTimeError)) throw e
      const lineNumber = index + 1
      throw new ParseError(
        `Failed while processing file '${source.name}' on line ${lineNumber} '${rawLine}': ${e.message}`,
        rawLine,
        lineNumber,
      )
    }
  }
}
