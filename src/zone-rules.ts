/**
 * Zone Rules
 *
 * Resolves offsets for a zone. Fixed rules always answer the same offset.
 * Standard rules hold the recorded history of transitions, searched by
 * binary search, and a set of yearly rules that generate the transitions
 * after the end of the history.
 *
 * A local date-time resolves to one of three cases:
 * - normal: exactly one valid offset
 * - gap: no valid offset; the local time was skipped
 * - overlap: two valid offsets; the local time was repeated
 */

import type {
  Duration, FixedZoneRules, Instant, LocalDateTime, StandardZoneRules, ZoneOffset,
  ZoneOffsetTransition, ZoneOffsetTransitionRule, ZoneRules,
} from './types'
import { InvalidArgumentError, requireNonNull } from './errors'
import { floorDiv, SECONDS_PER_DAY } from './internal/math'
import { fromEpochDay, YEAR_MAX } from './internal/calendar'
import { offsetEquals } from './zone-offset'
import { durationOfSeconds, DURATION_ZERO } from './duration'
import { INSTANT_EPOCH } from './instant'
import { compareDateTimes, dateTimeEquals, isDateTimeAfter, isDateTimeBefore } from './local-date-time'
import {
  transitionOfEpochSecond, transitionOf, transitionDateTimeAfter, transitionValidOffsets, isGap,
} from './zone-offset-transition'
import { createTransition, transitionRuleEquals } from './zone-offset-transition-rule'

/** Generated transitions are cached only for years before this one. */
const LAST_CACHED_YEAR = 2100

const MAX_LAST_RULES = 15

// ============================================================================
// Construction
// ============================================================================

export function fixedZoneRules(offset: ZoneOffset): FixedZoneRules {
  return { kind: 'ZoneRules', type: 'fixed', offset: requireNonNull(offset, 'offset') }
}

export type StandardZoneRulesInput = {
  baseStandardOffset: ZoneOffset
  baseWallOffset: ZoneOffset
  standardOffsetTransitions: readonly ZoneOffsetTransition[]
  transitions: readonly ZoneOffsetTransition[]
  lastRules: readonly ZoneOffsetTransitionRule[]
}

/** Builds standard rules from transition lists, as the rules builder produces them. */
export function standardZoneRules(input: StandardZoneRulesInput): StandardZoneRules {
  const standardOffsets = [input.baseStandardOffset]
  for (const trans of input.standardOffsetTransitions) standardOffsets.push(trans.offsetAfter)
  const wallOffsets = [input.baseWallOffset]
  for (const trans of input.transitions) wallOffsets.push(trans.offsetAfter)
  return standardZoneRulesOfArrays(
    input.standardOffsetTransitions.map(t => t.epochSecond),
    standardOffsets,
    input.transitions.map(t => t.epochSecond),
    wallOffsets,
    input.lastRules,
  )
}

/**
 * Builds standard rules from their stored arrays. Each offset array has one
 * more entry than its transition array.
 */
export function standardZoneRulesOfArrays(
  standardTransitions: readonly number[],
  standardOffsets: readonly ZoneOffset[],
  savingsInstantTransitions: readonly number[],
  wallOffsets: readonly ZoneOffset[],
  lastRules: readonly ZoneOffsetTransitionRule[],
): StandardZoneRules {
  if (standardOffsets.length !== standardTransitions.length + 1 || wallOffsets.length !== savingsInstantTransitions.length + 1) {
    throw new InvalidArgumentError('Offset arrays must have one more entry than their transition arrays')
  }
  if (lastRules.length > MAX_LAST_RULES) throw new InvalidArgumentError('Too many transition rules')
  const savingsLocalTransitions: LocalDateTime[] = []
  savingsInstantTransitions.forEach((epochSecond, i) => {
    const trans = transitionOfEpochSecond(epochSecond, wallOffsets[i]!, wallOffsets[i + 1]!)
    if (isGap(trans)) {
      savingsLocalTransitions.push(trans.dateTimeBefore, transitionDateTimeAfter(trans))
    } else {
      savingsLocalTransitions.push(transitionDateTimeAfter(trans), trans.dateTimeBefore)
    }
  })
  return {
    kind: 'ZoneRules',
    type: 'standard',
    standardTransitions: [...standardTransitions],
    standardOffsets: [...standardOffsets],
    savingsInstantTransitions: [...savingsInstantTransitions],
    wallOffsets: [...wallOffsets],
    savingsLocalTransitions,
    lastRules: [...lastRules],
  }
}

// ============================================================================
// Search Helpers
// ============================================================================

/** Index of `key`, or `-(insertionPoint) - 1` when absent. */
function binarySearch<T>(items: readonly T[], key: T, compare: (a: T, b: T) => number): number {
  let low = 0
  let high = items.length - 1
  while (low <= high) {
    const mid = (low + high) >>> 1
    const cmp = compare(items[mid]!, key)
    if (cmp < 0) low = mid + 1
    else if (cmp > 0) high = mid - 1
    else return mid
  }
  return -(low + 1)
}

const compareNumbers = (a: number, b: number): number => a - b

function findYear(epochSecond: number, offset: ZoneOffset): number {
  return fromEpochDay(floorDiv(epochSecond + offset.totalSeconds, SECONDS_PER_DAY)).year
}

const transitionCache = new WeakMap<StandardZoneRules, Map<number, ZoneOffsetTransition[]>>()

/** The transitions the yearly rules produce in a year, in rule order. */
function findTransitionArray(rules: StandardZoneRules, year: number): ZoneOffsetTransition[] {
  let byYear = transitionCache.get(rules)
  const cached = byYear?.get(year)
  if (cached) return cached
  const transitions = rules.lastRules.map(rule => createTransition(rule, year))
  if (year < LAST_CACHED_YEAR) {
    if (!byYear) {
      byYear = new Map()
      transitionCache.set(rules, byYear)
    }
    byYear.set(year, transitions)
  }
  return transitions
}

function lastOf<T>(items: readonly T[]): T | undefined {
  return items[items.length - 1]
}

/** Either the single valid offset, or the transition the local date-time falls in. */
type OffsetInfo = ZoneOffset | ZoneOffsetTransition

function findOffsetInfo(dateTime: LocalDateTime, trans: ZoneOffsetTransition): OffsetInfo {
  const localTransition = trans.dateTimeBefore
  if (isGap(trans)) {
    if (isDateTimeBefore(dateTime, localTransition)) return trans.offsetBefore
    if (isDateTimeBefore(dateTime, transitionDateTimeAfter(trans))) return trans
    return trans.offsetAfter
  }
  if (!isDateTimeBefore(dateTime, localTransition)) return trans.offsetAfter
  if (isDateTimeBefore(dateTime, transitionDateTimeAfter(trans))) return trans.offsetBefore
  return trans
}

function offsetInfo(rules: StandardZoneRules, dateTime: LocalDateTime): OffsetInfo {
  const locals = rules.savingsLocalTransitions
  const lastLocal = lastOf(locals)
  if (rules.lastRules.length > 0 && (lastLocal === undefined || isDateTimeAfter(dateTime, lastLocal))) {
    let info: OffsetInfo = rules.wallOffsets[rules.wallOffsets.length - 1]!
    for (const trans of findTransitionArray(rules, dateTime.date.year)) {
      info = findOffsetInfo(dateTime, trans)
      if (info.kind === 'ZoneOffsetTransition' || offsetEquals(info, trans.offsetBefore)) return info
    }
    return info
  }

  let index = binarySearch(locals, dateTime, compareDateTimes)
  if (index === -1) return rules.wallOffsets[0]!
  if (index < 0) {
    index = -index - 2
  } else if (index < locals.length - 1 && dateTimeEquals(locals[index]!, locals[index + 1]!)) {
    index++
  }
  if ((index & 1) === 0) {
    const dtBefore = locals[index]!
    const dtAfter = locals[index + 1]!
    const offsetBefore = rules.wallOffsets[index / 2]!
    const offsetAfter = rules.wallOffsets[index / 2 + 1]!
    return offsetAfter.totalSeconds > offsetBefore.totalSeconds
      ? transitionOf(dtBefore, offsetBefore, offsetAfter)
      : transitionOf(dtAfter, offsetBefore, offsetAfter)
  }
  return rules.wallOffsets[(index >> 1) + 1]!
}

// ============================================================================
// Offset Resolution
// ============================================================================

/** The offset in force at an instant. */
export function rulesOffsetAt(rules: ZoneRules, instant: Instant): ZoneOffset {
  if (rules.type === 'fixed') return rules.offset
  const epochSecond = instant.epochSecond
  const lastSavings = lastOf(rules.savingsInstantTransitions)
  if (rules.lastRules.length > 0 && (lastSavings === undefined || epochSecond > lastSavings)) {
    const year = findYear(epochSecond, rules.wallOffsets[rules.wallOffsets.length - 1]!)
    const transitions = findTransitionArray(rules, year)
    for (const trans of transitions) {
      if (epochSecond < trans.epochSecond) return trans.offsetBefore
    }
    return transitions[transitions.length - 1]!.offsetAfter
  }
  let index = binarySearch(rules.savingsInstantTransitions, epochSecond, compareNumbers)
  if (index < 0) index = -index - 2
  return rules.wallOffsets[index + 1]!
}

/**
 * The best offset for a local date-time. In a gap or an overlap this is
 * the offset before the transition.
 */
export function rulesOffsetAtLocal(rules: ZoneRules, dateTime: LocalDateTime): ZoneOffset {
  if (rules.type === 'fixed') return rules.offset
  const info = offsetInfo(rules, dateTime)
  return info.kind === 'ZoneOffsetTransition' ? info.offsetBefore : info
}

/**
 * Every offset valid for a local date-time: none in a gap, the offset
 * before then the offset after in an overlap, otherwise exactly one.
 */
export function rulesValidOffsets(rules: ZoneRules, dateTime: LocalDateTime): ZoneOffset[] {
  if (rules.type === 'fixed') return [rules.offset]
  const info = offsetInfo(rules, dateTime)
  return info.kind === 'ZoneOffsetTransition' ? transitionValidOffsets(info) : [info]
}

/** The gap or overlap a local date-time falls in, or null when it has a single offset. */
export function rulesTransitionAt(rules: ZoneRules, dateTime: LocalDateTime): ZoneOffsetTransition | null {
  if (rules.type === 'fixed') return null
  const info = offsetInfo(rules, dateTime)
  return info.kind === 'ZoneOffsetTransition' ? info : null
}

export function rulesIsValidOffset(rules: ZoneRules, dateTime: LocalDateTime, offset: ZoneOffset): boolean {
  return rulesValidOffsets(rules, dateTime).some(valid => offsetEquals(valid, offset))
}

// ============================================================================
// Standard Offset and Daylight Savings
// ============================================================================

export function rulesStandardOffset(rules: ZoneRules, instant: Instant): ZoneOffset {
  if (rules.type === 'fixed') return rules.offset
  let index = binarySearch(rules.standardTransitions, instant.epochSecond, compareNumbers)
  if (index < 0) index = -index - 2
  return rules.standardOffsets[index + 1]!
}

/** The amount the actual offset is ahead of the standard offset. */
export function rulesDaylightSavings(rules: ZoneRules, instant: Instant): Duration {
  if (rules.type === 'fixed') return DURATION_ZERO
  return durationOfSeconds(rulesOffsetAt(rules, instant).totalSeconds - rulesStandardOffset(rules, instant).totalSeconds)
}

export function rulesIsDaylightSavings(rules: ZoneRules, instant: Instant): boolean {
  return !offsetEquals(rulesStandardOffset(rules, instant), rulesOffsetAt(rules, instant))
}

// ============================================================================
// Transition Queries
// ============================================================================

/** The first transition strictly after the instant, or null. */
export function rulesNextTransition(rules: ZoneRules, instant: Instant): ZoneOffsetTransition | null {
  if (rules.type === 'fixed') return null
  const savings = rules.savingsInstantTransitions
  if (savings.length === 0) return null
  const epochSecond = instant.epochSecond
  if (epochSecond >= savings[savings.length - 1]!) {
    if (rules.lastRules.length === 0) return null
    const year = findYear(epochSecond, rules.wallOffsets[rules.wallOffsets.length - 1]!)
    for (const trans of findTransitionArray(rules, year)) {
      if (epochSecond < trans.epochSecond) return trans
    }
    if (year < YEAR_MAX) return findTransitionArray(rules, year + 1)[0] ?? null
    return null
  }
  let index = binarySearch(savings, epochSecond, compareNumbers)
  index = index < 0 ? -index - 1 : index + 1
  return transitionOfEpochSecond(savings[index]!, rules.wallOffsets[index]!, rules.wallOffsets[index + 1]!)
}

/** The last transition strictly before the instant, or null. */
export function rulesPreviousTransition(rules: ZoneRules, instant: Instant): ZoneOffsetTransition | null {
  if (rules.type === 'fixed') return null
  const savings = rules.savingsInstantTransitions
  if (savings.length === 0) return null
  let epochSecond = instant.epochSecond
  if (instant.nano > 0) epochSecond++
  const lastHistoric = savings[savings.length - 1]!
  if (rules.lastRules.length > 0 && epochSecond > lastHistoric) {
    const lastHistoricOffset = rules.wallOffsets[rules.wallOffsets.length - 1]!
    let year = findYear(epochSecond, lastHistoricOffset)
    const transitions = findTransitionArray(rules, year)
    for (let i = transitions.length - 1; i >= 0; i--) {
      if (epochSecond > transitions[i]!.epochSecond) return transitions[i]!
    }
    const lastHistoricYear = findYear(lastHistoric, lastHistoricOffset)
    if (--year > lastHistoricYear) {
      const previousYear = findTransitionArray(rules, year)
      return previousYear[previousYear.length - 1] ?? null
    }
  }
  let index = binarySearch(savings, epochSecond, compareNumbers)
  if (index < 0) index = -index - 1
  if (index <= 0) return null
  return transitionOfEpochSecond(savings[index - 1]!, rules.wallOffsets[index - 1]!, rules.wallOffsets[index]!)
}

/** The recorded history of transitions; later ones come from `rulesTransitionRules`. */
export function rulesTransitions(rules: ZoneRules): ZoneOffsetTransition[] {
  if (rules.type === 'fixed') return []
  return rules.savingsInstantTransitions.map((epochSecond, i) =>
    transitionOfEpochSecond(epochSecond, rules.wallOffsets[i]!, rules.wallOffsets[i + 1]!))
}

export function rulesTransitionRules(rules: ZoneRules): ZoneOffsetTransitionRule[] {
  return rules.type === 'fixed' ? [] : [...rules.lastRules]
}

export function rulesIsFixedOffset(rules: ZoneRules): boolean {
  return rules.type === 'fixed' || rules.savingsInstantTransitions.length === 0
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

function arraysEqual<T>(a: readonly T[], b: readonly T[], equals: (x: T, y: T) => boolean): boolean {
  return a.length === b.length && a.every((item, i) => equals(item, b[i]!))
}

/**
 * Standard rules equal fixed rules when they have no transitions and the
 * same offset.
 */
export function rulesEquals(a: ZoneRules, b: ZoneRules): boolean {
  if (a === b) return true
  if (a.type === 'fixed' && b.type === 'fixed') return offsetEquals(a.offset, b.offset)
  if (a.type === 'fixed' || b.type === 'fixed') {
    return rulesIsFixedOffset(a) && rulesIsFixedOffset(b) &&
      offsetEquals(rulesOffsetAt(a, INSTANT_EPOCH), rulesOffsetAt(b, INSTANT_EPOCH))
  }
  const sameNumber = (x: number, y: number): boolean => x === y
  return arraysEqual(a.standardTransitions, b.standardTransitions, sameNumber) &&
    arraysEqual(a.standardOffsets, b.standardOffsets, offsetEquals) &&
    arraysEqual(a.savingsInstantTransitions, b.savingsInstantTransitions, sameNumber) &&
    arraysEqual(a.wallOffsets, b.wallOffsets, offsetEquals) &&
    arraysEqual(a.lastRules, b.lastRules, transitionRuleEquals)
}

export function formatZoneRules(rules: ZoneRules): string {
  if (rules.type === 'fixed') return `FixedRules:${rules.offset.id}`
  return `StandardZoneRules[currentStandardOffset=${rules.standardOffsets[rules.standardOffsets.length - 1]!.id}]`
}
