/**
 * Zone Offset Transition
 *
 * A change of offset at one instant. A gap skips local times (spring
 * forward); an overlap repeats them (fall back).
 */

import type { Duration, Instant, LocalDateTime, ZoneOffset, ZoneOffsetTransition } from './types'
import { InvalidArgumentError, requireNonNull } from './errors'
import { offsetEquals } from './zone-offset'
import { durationOfSeconds } from './duration'
import { instantOfEpochSecond } from './instant'
import {
  dateTimeOfEpochSecond, dateTimeToEpochSecond, dateTimePlusSeconds, dateTimeEquals, formatDateTime,
} from './local-date-time'

// ============================================================================
// Construction
// ============================================================================

/**
 * Creates a transition at a local date-time read in the offset before.
 * The offsets must differ and the date-time must have no fraction of a second.
 */
export function transitionOf(dateTime: LocalDateTime, offsetBefore: ZoneOffset, offsetAfter: ZoneOffset): ZoneOffsetTransition {
  requireNonNull(dateTime, 'transition')
  requireNonNull(offsetBefore, 'offsetBefore')
  requireNonNull(offsetAfter, 'offsetAfter')
  if (offsetEquals(offsetBefore, offsetAfter)) throw new InvalidArgumentError('Offsets must not be equal')
  if (dateTime.time.nano !== 0) throw new InvalidArgumentError('Nano-of-second must be zero')
  return rawTransition(dateTime, offsetBefore, offsetAfter)
}

/**
 * Creates a transition without validating it. The rules builder uses this
 * for candidate transitions whose offsets may turn out equal.
 */
export function rawTransition(dateTime: LocalDateTime, offsetBefore: ZoneOffset, offsetAfter: ZoneOffset): ZoneOffsetTransition {
  return {
    kind: 'ZoneOffsetTransition',
    epochSecond: dateTimeToEpochSecond(dateTime, offsetBefore),
    dateTimeBefore: dateTime,
    offsetBefore,
    offsetAfter,
  }
}

export function transitionOfEpochSecond(epochSecond: number, offsetBefore: ZoneOffset, offsetAfter: ZoneOffset): ZoneOffsetTransition {
  return transitionOf(dateTimeOfEpochSecond(epochSecond, 0, offsetBefore), offsetBefore, offsetAfter)
}

// ============================================================================
// Accessors
// ============================================================================

export function transitionInstant(transition: ZoneOffsetTransition): Instant {
  return instantOfEpochSecond(transition.epochSecond)
}

export function transitionEpochSecond(transition: ZoneOffsetTransition): number {
  return transition.epochSecond
}

export function transitionDateTimeBefore(transition: ZoneOffsetTransition): LocalDateTime {
  return transition.dateTimeBefore
}

/** The local date-time at the instant, read in the offset after. */
export function transitionDateTimeAfter(transition: ZoneOffsetTransition): LocalDateTime {
  return dateTimePlusSeconds(transition.dateTimeBefore, durationSeconds(transition))
}

export function transitionDuration(transition: ZoneOffsetTransition): Duration {
  return durationOfSeconds(durationSeconds(transition))
}

function durationSeconds(transition: ZoneOffsetTransition): number {
  return transition.offsetAfter.totalSeconds - transition.offsetBefore.totalSeconds
}

export function isGap(transition: ZoneOffsetTransition): boolean {
  return transition.offsetAfter.totalSeconds > transition.offsetBefore.totalSeconds
}

export function isOverlap(transition: ZoneOffsetTransition): boolean {
  return transition.offsetAfter.totalSeconds < transition.offsetBefore.totalSeconds
}

/** In an overlap both offsets are valid; in a gap neither is. */
export function transitionIsValidOffset(transition: ZoneOffsetTransition, offset: ZoneOffset): boolean {
  if (isGap(transition)) return false
  return offsetEquals(transition.offsetBefore, offset) || offsetEquals(transition.offsetAfter, offset)
}

export function transitionValidOffsets(transition: ZoneOffsetTransition): ZoneOffset[] {
  return isGap(transition) ? [] : [transition.offsetBefore, transition.offsetAfter]
}

// ============================================================================
// Comparison
// ============================================================================

export function compareTransitions(a: ZoneOffsetTransition, b: ZoneOffsetTransition): number {
  return Math.sign(a.epochSecond - b.epochSecond)
}

export function transitionEquals(a: ZoneOffsetTransition, b: ZoneOffsetTransition): boolean {
  return a === b || (
    dateTimeEquals(a.dateTimeBefore, b.dateTimeBefore) &&
    offsetEquals(a.offsetBefore, b.offsetBefore) &&
    offsetEquals(a.offsetAfter, b.offsetAfter)
  )
}

/** `Transition[Gap at 2008-03-30T01:00Z to +01:00]` */
export function formatTransition(transition: ZoneOffsetTransition): string {
  return 'Transition[' + (isGap(transition) ? 'Gap' : 'Overlap') + ' at ' +
    formatDateTime(transition.dateTimeBefore) + transition.offsetBefore.id +
    ' to ' + transition.offsetAfter.id + ']'
}
