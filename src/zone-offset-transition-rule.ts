/**
 * Zone Offset Transition Rules
 *
 * A rule describes a transition that recurs every year, such as "the last
 * Sunday in March at 01:00 UTC". Zone rules use them to generate the
 * transitions that lie beyond their recorded history.
 */

import type {
  DayOfWeek, LocalDate, LocalDateTime, LocalTime, TimeDefinition, ZoneOffset, ZoneOffsetTransition,
  ZoneOffsetTransitionRule,
} from './types'
import { InvalidArgumentError, requireNonNull } from './errors'
import { isLeapYear } from './internal/calendar'
import { monthLength, monthName, monthOf } from './month'
import { dayOfWeekName } from './day-of-week'
import { offsetEquals } from './zone-offset'
import { MIDNIGHT, formatTime, timeEquals } from './local-time'
import { dateOf, datePlusDays, dateWith } from './local-date'
import { dateTimeOfDateAndTime, dateTimePlusSeconds } from './local-date-time'
import { nextOrSame, previousOrSame } from './temporal-adjusters'
import { transitionOf } from './zone-offset-transition'

export type TransitionRuleInput = {
  month: number
  dayOfMonthIndicator: number
  dayOfWeek: DayOfWeek | null
  time: LocalTime
  timeEndOfDay: boolean
  timeDefinition: TimeDefinition
  standardOffset: ZoneOffset
  offsetBefore: ZoneOffset
  offsetAfter: ZoneOffset
}

// ============================================================================
// Construction
// ============================================================================

export function transitionRuleOf(input: TransitionRuleInput): ZoneOffsetTransitionRule {
  requireNonNull(input.time, 'time')
  requireNonNull(input.timeDefinition, 'timeDefinition')
  requireNonNull(input.standardOffset, 'standardOffset')
  requireNonNull(input.offsetBefore, 'offsetBefore')
  requireNonNull(input.offsetAfter, 'offsetAfter')
  monthOf(input.month)
  const dom = input.dayOfMonthIndicator
  if (dom < -28 || dom > 31 || dom === 0) {
    throw new InvalidArgumentError('Day of month indicator must be between -28 and 31 inclusive excluding zero')
  }
  if (input.timeEndOfDay && !timeEquals(input.time, MIDNIGHT)) {
    throw new InvalidArgumentError('Time must be midnight when end of day flag is true')
  }
  return { kind: 'ZoneOffsetTransitionRule', ...input }
}

// ============================================================================
// Time Definitions
// ============================================================================

/**
 * Converts a date-time read under a time definition into the wall time
 * in force before the transition.
 */
export function toWallDateTime(
  definition: TimeDefinition, dateTime: LocalDateTime, standardOffset: ZoneOffset, wallOffset: ZoneOffset,
): LocalDateTime {
  switch (definition) {
    case 'UTC': return dateTimePlusSeconds(dateTime, wallOffset.totalSeconds)
    case 'STANDARD': return dateTimePlusSeconds(dateTime, wallOffset.totalSeconds - standardOffset.totalSeconds)
    case 'WALL': return dateTime
  }
}

// ============================================================================
// Transition Generation
// ============================================================================

/** The transition this rule produces in one year. */
export function createTransition(rule: ZoneOffsetTransitionRule, year: number): ZoneOffsetTransition {
  const month = monthOf(rule.month)
  const dom = rule.dayOfMonthIndicator
  let date: LocalDate
  if (dom < 0) {
    date = dateOf(year, month, monthLength(month, isLeapYear(year)) + 1 + dom)
    if (rule.dayOfWeek !== null) date = dateWith(date, previousOrSame(rule.dayOfWeek))
  } else {
    date = dateOf(year, month, dom)
    if (rule.dayOfWeek !== null) date = dateWith(date, nextOrSame(rule.dayOfWeek))
  }
  if (rule.timeEndOfDay) date = datePlusDays(date, 1)
  const local = dateTimeOfDateAndTime(date, rule.time)
  const wall = toWallDateTime(rule.timeDefinition, local, rule.standardOffset, rule.offsetBefore)
  return transitionOf(wall, rule.offsetBefore, rule.offsetAfter)
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

export function transitionRuleEquals(a: ZoneOffsetTransitionRule, b: ZoneOffsetTransitionRule): boolean {
  return a === b || (
    a.month === b.month &&
    a.dayOfMonthIndicator === b.dayOfMonthIndicator &&
    a.dayOfWeek === b.dayOfWeek &&
    a.timeDefinition === b.timeDefinition &&
    timeEquals(a.time, b.time) &&
    a.timeEndOfDay === b.timeEndOfDay &&
    offsetEquals(a.standardOffset, b.standardOffset) &&
    offsetEquals(a.offsetBefore, b.offsetBefore) &&
    offsetEquals(a.offsetAfter, b.offsetAfter)
  )
}

/**
 * `TransitionRule[Gap Z to +01:00, SUNDAY on or before last day of
 * MARCH at 01:00 UTC, standard offset Z]`
 */
export function formatTransitionRule(rule: ZoneOffsetTransitionRule): string {
  const gap = rule.offsetBefore.totalSeconds < rule.offsetAfter.totalSeconds
  const month = monthName(monthOf(rule.month))
  const dom = rule.dayOfMonthIndicator
  let when: string
  if (rule.dayOfWeek === null) {
    when = `${month} ${dom}`
  } else {
    const dow = dayOfWeekName(rule.dayOfWeek)
    if (dom === -1) when = `${dow} on or before last day of ${month}`
    else if (dom < 0) when = `${dow} on or before last day minus ${-dom - 1} of ${month}`
    else when = `${dow} on or after ${month} ${dom}`
  }
  const time = rule.timeEndOfDay ? '24:00' : formatTime(rule.time)
  return `TransitionRule[${gap ? 'Gap' : 'Overlap'} ${rule.offsetBefore.id} to ${rule.offsetAfter.id}, ` +
    `${when} at ${time} ${rule.timeDefinition}, standard offset ${rule.standardOffset.id}]`
}
