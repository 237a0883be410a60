/**
 * Zone Rules Builder
 *
 * Assembles standard zone rules from a sequence of windows. Each window has
 * a standard offset that applies until a local date-time, and either a fixed
 * amount of savings or a set of daylight-savings rules. Rules that last
 * forever become the yearly transition rules; the rest become historical
 * transitions.
 */

import type {
  DayOfWeek, LocalDate, LocalDateTime, LocalTime, TimeDefinition, ZoneOffset, ZoneOffsetTransition,
  ZoneOffsetTransitionRule, ZoneRules,
} from './types'
import { InvalidArgumentError, requireNonNull } from './errors'
import { checkField } from './fields'
import { YEAR_MIN, YEAR_MAX, isLeapYear } from './internal/calendar'
import { monthLength, monthMaxLength, monthOf } from './month'
import { dayOfWeekPlus } from './day-of-week'
import { offsetOfTotalSeconds, offsetEquals } from './zone-offset'
import { MIDNIGHT, compareTimes, timeEquals } from './local-time'
import { dateOf, datePlusDays, dateWith, compareDates } from './local-date'
import {
  dateTimeOf, dateTimeOfDateAndTime, dateTimeOfEpochSecond, dateTimeToEpochSecond, dateTimeEquals,
  isDateTimeBefore, formatDateTime, DATE_TIME_MAX,
} from './local-date-time'
import { nextOrSame, previousOrSame } from './temporal-adjusters'
import { transitionOf, rawTransition } from './zone-offset-transition'
import { transitionRuleOf, toWallDateTime } from './zone-offset-transition-rule'
import { standardZoneRules } from './zone-rules'

const MAX_RULES_PER_WINDOW = 2000

// ============================================================================
// Types
// ============================================================================

/** A daylight-savings rule as it is added to a window. */
export type WindowRule =
  | {
      /** A single transition at a local date-time. */
      dateTime: LocalDateTime
      timeDefinition: TimeDefinition
      savingAmountSecs: number
    }
  | {
      startYear: number
      /** Pass YEAR_MAX for a rule that lasts forever. */
      endYear: number
      month: number
      dayOfMonthIndicator: number
      dayOfWeek?: DayOfWeek | null
      time: LocalTime
      timeEndOfDay?: boolean
      timeDefinition: TimeDefinition
      savingAmountSecs: number
    }

export type ZoneRulesBuilder = {
  addWindow(standardOffset: ZoneOffset, until: LocalDateTime, untilDefinition: TimeDefinition): ZoneRulesBuilder
  addWindowForever(standardOffset: ZoneOffset): ZoneRulesBuilder
  setFixedSavingsToWindow(fixedSavingAmountSecs: number): ZoneRulesBuilder
  addRuleToWindow(rule: WindowRule): ZoneRulesBuilder
  toRules(zoneId: string): ZoneRules
}

/** One yearly occurrence of a rule; mutable while the builder tidies it. */
type BuilderRule = {
  year: number
  month: number
  dayOfMonthIndicator: number
  dayOfWeek: DayOfWeek | null
  time: LocalTime
  timeEndOfDay: boolean
  timeDefinition: TimeDefinition
  savingAmountSecs: number
}

type Window = {
  standardOffset: ZoneOffset
  windowEnd: LocalDateTime
  timeDefinition: TimeDefinition
  fixedSavingAmountSecs: number | null
  ruleList: BuilderRule[]
  lastRuleList: BuilderRule[]
  maxLastRuleStartYear: number
}

// ============================================================================
// Rule Helpers
// ============================================================================

function ruleDate(rule: BuilderRule): LocalDate {
  const month = monthOf(rule.month)
  let date: LocalDate
  if (rule.dayOfMonthIndicator < 0) {
    date = dateOf(rule.year, month, monthLength(month, isLeapYear(rule.year)) + 1 + rule.dayOfMonthIndicator)
    if (rule.dayOfWeek !== null) date = dateWith(date, previousOrSame(rule.dayOfWeek))
  } else {
    date = dateOf(rule.year, month, rule.dayOfMonthIndicator)
    if (rule.dayOfWeek !== null) date = dateWith(date, nextOrSame(rule.dayOfWeek))
  }
  return rule.timeEndOfDay ? datePlusDays(date, 1) : date
}

function compareRules(a: BuilderRule, b: BuilderRule): number {
  return a.year - b.year ||
    a.month - b.month ||
    compareDates(ruleDate(a), ruleDate(b)) ||
    compareTimes(a.time, b.time)
}

function ruleToTransition(rule: BuilderRule, standardOffset: ZoneOffset, savingsBeforeSecs: number): ZoneOffsetTransition {
  const local = dateTimeOfDateAndTime(ruleDate(rule), rule.time)
  const wallOffset = offsetOfTotalSeconds(standardOffset.totalSeconds + savingsBeforeSecs)
  const wall = toWallDateTime(rule.timeDefinition, local, standardOffset, wallOffset)
  const offsetAfter = offsetOfTotalSeconds(standardOffset.totalSeconds + rule.savingAmountSecs)
  return rawTransition(wall, wallOffset, offsetAfter)
}

/**
 * Converts a forever rule into a yearly transition rule. Counting back from
 * the end of any month but February is rewritten as a fixed day, and a
 * 24:00 time moves to midnight of the next day.
 */
function ruleToTransitionRule(rule: BuilderRule, standardOffset: ZoneOffset, savingsBeforeSecs: number): ZoneOffsetTransitionRule {
  if (rule.dayOfMonthIndicator < 0 && rule.month !== 2) {
    rule.dayOfMonthIndicator = monthMaxLength(monthOf(rule.month)) - 6
  }
  if (rule.timeEndOfDay && rule.dayOfMonthIndicator > 0 && !(rule.dayOfMonthIndicator === 28 && rule.month === 2)) {
    const date = datePlusDays(dateOf(2004, rule.month, rule.dayOfMonthIndicator), 1)
    rule.month = date.month
    rule.dayOfMonthIndicator = date.day
    if (rule.dayOfWeek !== null) rule.dayOfWeek = dayOfWeekPlus(rule.dayOfWeek, 1)
    rule.timeEndOfDay = false
  }
  const trans = ruleToTransition(rule, standardOffset, savingsBeforeSecs)
  return transitionRuleOf({
    month: rule.month,
    dayOfMonthIndicator: rule.dayOfMonthIndicator,
    dayOfWeek: rule.dayOfWeek,
    time: rule.time,
    timeEndOfDay: rule.timeEndOfDay,
    timeDefinition: rule.timeDefinition,
    standardOffset,
    offsetBefore: trans.offsetBefore,
    offsetAfter: trans.offsetAfter,
  })
}

// ============================================================================
// Window Helpers
// ============================================================================

function addRule(window: Window, rule: Omit<BuilderRule, 'year'>, startYear: number, endYear: number): void {
  if (window.fixedSavingAmountSecs !== null) {
    throw new InvalidArgumentError('Window has a fixed DST saving, so cannot have DST rules')
  }
  if (window.ruleList.length >= MAX_RULES_PER_WINDOW) {
    throw new InvalidArgumentError('Window has reached the maximum number of allowed rules')
  }
  const forever = endYear === YEAR_MAX
  const lastYear = forever ? startYear : endYear
  for (let year = startYear; year <= lastYear; year++) {
    if (forever) {
      window.lastRuleList.push({ ...rule, year })
      window.maxLastRuleStartYear = Math.max(startYear, window.maxLastRuleStartYear)
    } else {
      window.ruleList.push({ ...rule, year })
    }
  }
}

/** Expands forever rules into yearly rules up to the point where the history ends. */
function tidyWindow(window: Window, windowStartYear: number): void {
  if (window.lastRuleList.length === 1) {
    throw new InvalidArgumentError('Cannot have only one rule defined as being forever')
  }
  if (dateTimeEquals(window.windowEnd, DATE_TIME_MAX)) {
    window.maxLastRuleStartYear = Math.max(window.maxLastRuleStartYear, windowStartYear) + 1
    for (const lastRule of [...window.lastRuleList]) {
      addRule(window, lastRule, lastRule.year, window.maxLastRuleStartYear)
      lastRule.year = window.maxLastRuleStartYear + 1
    }
    if (window.maxLastRuleStartYear === YEAR_MAX) window.lastRuleList = []
    else window.maxLastRuleStartYear++
  } else {
    const endYear = window.windowEnd.date.year
    for (const lastRule of window.lastRuleList) {
      addRule(window, lastRule, lastRule.year, endYear + 1)
    }
    window.lastRuleList = []
    window.maxLastRuleStartYear = YEAR_MAX
  }
  window.ruleList.sort(compareRules)
  window.lastRuleList.sort(compareRules)
  if (window.ruleList.length === 0 && window.fixedSavingAmountSecs === null) {
    window.fixedSavingAmountSecs = 0
  }
}

function windowWallOffset(window: Window, savingsSecs: number): ZoneOffset {
  return offsetOfTotalSeconds(window.standardOffset.totalSeconds + savingsSecs)
}

function windowEndEpochSecond(window: Window, savingsSecs: number): number {
  const wallOffset = windowWallOffset(window, savingsSecs)
  const end = toWallDateTime(window.timeDefinition, window.windowEnd, window.standardOffset, wallOffset)
  return dateTimeToEpochSecond(end, wallOffset)
}

// ============================================================================
// Builder
// ============================================================================

export function createZoneRulesBuilder(): ZoneRulesBuilder {
  const windows: Window[] = []

  function currentWindow(message: string): Window {
    const window = windows[windows.length - 1]
    if (!window) throw new InvalidArgumentError(message)
    return window
  }

  const builder: ZoneRulesBuilder = {
    addWindow(standardOffset, until, untilDefinition) {
      requireNonNull(standardOffset, 'standardOffset')
      requireNonNull(until, 'until')
      requireNonNull(untilDefinition, 'untilDefinition')
      const previous = windows[windows.length - 1]
      if (previous && isDateTimeBefore(until, previous.windowEnd)) {
        throw new InvalidArgumentError(
          `Windows must be added in date-time order: ${formatDateTime(until)} < ${formatDateTime(previous.windowEnd)}`,
        )
      }
      windows.push({
        standardOffset,
        windowEnd: until,
        timeDefinition: untilDefinition,
        fixedSavingAmountSecs: null,
        ruleList: [],
        lastRuleList: [],
        maxLastRuleStartYear: YEAR_MIN,
      })
      return builder
    },

    addWindowForever(standardOffset) {
      return builder.addWindow(standardOffset, DATE_TIME_MAX, 'WALL')
    },

    setFixedSavingsToWindow(fixedSavingAmountSecs) {
      const window = currentWindow('Must add a window before setting the fixed savings')
      if (window.ruleList.length > 0 || window.lastRuleList.length > 0) {
        throw new InvalidArgumentError('Window has DST rules, so cannot have fixed savings')
      }
      window.fixedSavingAmountSecs = fixedSavingAmountSecs
      return builder
    },

    addRuleToWindow(rule) {
      requireNonNull(rule, 'rule')
      if ('dateTime' in rule) {
        const { date, time } = rule.dateTime
        return builder.addRuleToWindow({
          startYear: date.year,
          endYear: date.year,
          month: date.month,
          dayOfMonthIndicator: date.day,
          time,
          timeDefinition: rule.timeDefinition,
          savingAmountSecs: rule.savingAmountSecs,
        })
      }
      requireNonNull(rule.time, 'time')
      requireNonNull(rule.timeDefinition, 'timeDefinition')
      checkField('Year', rule.startYear)
      checkField('Year', rule.endYear)
      monthOf(rule.month)
      const dom = rule.dayOfMonthIndicator
      if (dom < -28 || dom > 31 || dom === 0) {
        throw new InvalidArgumentError('Day of month indicator must be between -28 and 31 inclusive excluding zero')
      }
      const timeEndOfDay = rule.timeEndOfDay ?? false
      if (timeEndOfDay && !timeEquals(rule.time, MIDNIGHT)) {
        throw new InvalidArgumentError('Time must be midnight when end of day flag is true')
      }
      const window = currentWindow('Must add a window before adding a rule')
      addRule(window, {
        month: rule.month,
        dayOfMonthIndicator: dom,
        dayOfWeek: rule.dayOfWeek ?? null,
        time: rule.time,
        timeEndOfDay,
        timeDefinition: rule.timeDefinition,
        savingAmountSecs: rule.savingAmountSecs,
      }, rule.startYear, rule.endYear)
      return builder
    },

    toRules(zoneId) {
      requireNonNull(zoneId, 'zoneId')
      const firstWindow = windows[0]
      if (!firstWindow) throw new InvalidArgumentError('No windows have been added to the builder')
      return buildRules(windows, firstWindow)
    },
  }

  return builder
}

function buildRules(windows: readonly Window[], firstWindow: Window): ZoneRules {
  const standardTransitions: ZoneOffsetTransition[] = []
  const transitions: ZoneOffsetTransition[] = []
  const lastRules: ZoneOffsetTransitionRule[] = []

  let loopStandardOffset = firstWindow.standardOffset
  let loopSavings = firstWindow.fixedSavingAmountSecs ?? 0
  const firstWallOffset = offsetOfTotalSeconds(loopStandardOffset.totalSeconds + loopSavings)
  let loopWindowStart = dateTimeOf(YEAR_MIN, 1, 1, 0, 0)
  let loopWindowOffset = firstWallOffset

  for (const window of windows) {
    tidyWindow(window, loopWindowStart.date.year)
    const windowStartEpochSecond = dateTimeToEpochSecond(loopWindowStart, loopWindowOffset)

    let effectiveSavings = window.fixedSavingAmountSecs
    if (effectiveSavings === null) {
      effectiveSavings = 0
      for (const rule of window.ruleList) {
        const trans = ruleToTransition(rule, loopStandardOffset, loopSavings)
        if (trans.epochSecond > windowStartEpochSecond) break
        effectiveSavings = rule.savingAmountSecs
      }
    }

    if (!offsetEquals(loopStandardOffset, window.standardOffset)) {
      standardTransitions.push(transitionOf(
        dateTimeOfEpochSecond(windowStartEpochSecond, 0, loopStandardOffset),
        loopStandardOffset,
        window.standardOffset,
      ))
      loopStandardOffset = window.standardOffset
    }

    const effectiveWallOffset = offsetOfTotalSeconds(loopStandardOffset.totalSeconds + effectiveSavings)
    if (!offsetEquals(loopWindowOffset, effectiveWallOffset)) {
      transitions.push(transitionOf(loopWindowStart, loopWindowOffset, effectiveWallOffset))
    }
    loopSavings = effectiveSavings

    for (const rule of window.ruleList) {
      const trans = ruleToTransition(rule, loopStandardOffset, loopSavings)
      if (
        trans.epochSecond >= windowStartEpochSecond &&
        trans.epochSecond < windowEndEpochSecond(window, loopSavings) &&
        !offsetEquals(trans.offsetBefore, trans.offsetAfter)
      ) {
        transitions.push(trans)
        loopSavings = rule.savingAmountSecs
      }
    }

    for (const lastRule of window.lastRuleList) {
      lastRules.push(ruleToTransitionRule(lastRule, loopStandardOffset, loopSavings))
      loopSavings = lastRule.savingAmountSecs
    }

    loopWindowOffset = windowWallOffset(window, loopSavings)
    loopWindowStart = dateTimeOfEpochSecond(windowEndEpochSecond(window, loopSavings), 0, loopWindowOffset)
  }

  return standardZoneRules({
    baseStandardOffset: firstWindow.standardOffset,
    baseWallOffset: firstWallOffset,
    standardOffsetTransitions: standardTransitions,
    transitions,
    lastRules,
  })
}
