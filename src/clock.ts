/**
 * Clock
 *
 * A source of the current instant together with the zone used to turn it
 * into local values. Every `*Now` function takes a clock, so tests pass a
 * fixed clock instead of reading the host time.
 */

import type { Duration, Instant, LocalDate, LocalDateTime, LocalTime, OffsetDateTime, ZoneId, ZonedDateTime, ZoneOffset } from './types'
import { InvalidArgumentError, requireNonNull } from './errors'
import { floorMod, NANOS_PER_SECOND } from './internal/math'
import { UTC } from './zone-offset'
import { instantOfEpochMilli, instantPlus, instantMinusNanos, instantToEpochMilli } from './instant'
import { durationIsNegative, durationOfMinutes, durationOfSeconds, durationToNanos } from './duration'
import { dateTimeOfEpochSecond } from './local-date-time'
import { offsetDateTimeOfInstant } from './offset-date-time'
import { rulesOffsetAt } from './zone-rules'
import { zoneRules } from './zone-id'
import { zonedOfInstant } from './zoned-date-time'

export type Clock = {
  readonly zone: ZoneId
  instant(): Instant
  withZone(zone: ZoneId): Clock
}

// ============================================================================
// Clocks
// ============================================================================

/** The host clock, at millisecond precision. */
export function systemClock(zone: ZoneId): Clock {
  requireNonNull(zone, 'zone')
  return {
    zone,
    instant: () => instantOfEpochMilli(Date.now()),
    withZone: (next) => systemClock(next),
  }
}

export function systemUtcClock(): Clock {
  return systemClock(UTC)
}

/** Always returns the same instant. */
export function fixedClock(fixed: Instant, zone: ZoneId): Clock {
  requireNonNull(fixed, 'instant')
  requireNonNull(zone, 'zone')
  return {
    zone,
    instant: () => fixed,
    withZone: (next) => fixedClock(fixed, next),
  }
}

/** The base clock shifted by a duration. */
export function offsetClock(base: Clock, offset: Duration): Clock {
  requireNonNull(base, 'baseClock')
  requireNonNull(offset, 'offsetDuration')
  return {
    zone: base.zone,
    instant: () => instantPlus(base.instant(), offset),
    withZone: (next) => offsetClock(base.withZone(next), offset),
  }
}

/**
 * The base clock truncated to whole ticks. The tick must divide a second
 * exactly or be a whole number of milliseconds.
 */
export function tickClock(base: Clock, tick: Duration): Clock {
  requireNonNull(base, 'baseClock')
  requireNonNull(tick, 'tickDuration')
  if (durationIsNegative(tick)) throw new InvalidArgumentError('Tick duration must not be negative')
  const tickNanos = durationToNanos(tick)
  if (tickNanos % 1_000_000n !== 0n && BigInt(NANOS_PER_SECOND) % tickNanos !== 0n) {
    throw new InvalidArgumentError('Invalid tick duration')
  }
  if (tickNanos <= 1n) return base

  const instant = tickNanos % 1_000_000n === 0n
    ? () => {
      const millis = instantToEpochMilli(base.instant())
      const tickMillis = Number(tickNanos / 1_000_000n)
      return instantOfEpochMilli(millis - floorMod(millis, tickMillis))
    }
    : () => {
      const now = base.instant()
      return instantMinusNanos(now, floorMod(now.nano, Number(tickNanos)))
    }

  return {
    zone: base.zone,
    instant,
    withZone: (next) => tickClock(base.withZone(next), tick),
  }
}

export function tickSeconds(zone: ZoneId): Clock {
  return tickClock(systemClock(zone), durationOfSeconds(1))
}

export function tickMinutes(zone: ZoneId): Clock {
  return tickClock(systemClock(zone), durationOfMinutes(1))
}

export function clockInstant(clock: Clock): Instant {
  return clock.instant()
}

export function clockMillis(clock: Clock): number {
  return instantToEpochMilli(clock.instant())
}

export function clockWithZone(clock: Clock, zone: ZoneId): Clock {
  requireNonNull(zone, 'zone')
  return clock.withZone(zone)
}

// ============================================================================
// Current Values
// ============================================================================

function currentOffset(clock: Clock, now: Instant): ZoneOffset {
  return rulesOffsetAt(zoneRules(clock.zone), now)
}

export function instantNow(clock: Clock): Instant {
  return clock.instant()
}

export function dateTimeNow(clock: Clock): LocalDateTime {
  const now = clock.instant()
  return dateTimeOfEpochSecond(now.epochSecond, now.nano, currentOffset(clock, now))
}

export function dateNow(clock: Clock): LocalDate {
  return dateTimeNow(clock).date
}

export function timeNow(clock: Clock): LocalTime {
  return dateTimeNow(clock).time
}

export function offsetDateTimeNow(clock: Clock): OffsetDateTime {
  const now = clock.instant()
  return offsetDateTimeOfInstant(now, currentOffset(clock, now))
}

export function zonedNow(clock: Clock): ZonedDateTime {
  return zonedOfInstant(clock.instant(), clock.zone)
}
