/**
 * Shared Types
 *
 * Value types used across modules. Every value is an immutable plain object
 * tagged with a `kind` discriminator; the operations live in the module named
 * after the type.
 */

// ============================================================================
// Calendar Enumerations
// ============================================================================

/** ISO day-of-week, Monday = 1 through Sunday = 7 */
export type DayOfWeek = 1 | 2 | 3 | 4 | 5 | 6 | 7

/** Month-of-year, January = 1 through December = 12 */
export type Month = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12

// ============================================================================
// Civil Values
// ============================================================================

export type LocalDate = {
  readonly kind: 'LocalDate'
  readonly year: number
  readonly month: number
  readonly day: number
}

export type LocalTime = {
  readonly kind: 'LocalTime'
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly nano: number
}

export type LocalDateTime = {
  readonly kind: 'LocalDateTime'
  readonly date: LocalDate
  readonly time: LocalTime
}

export type YearMonth = {
  readonly kind: 'YearMonth'
  readonly year: number
  readonly month: number
}

export type MonthDay = {
  readonly kind: 'MonthDay'
  readonly month: number
  readonly day: number
}

// ============================================================================
// Timeline Values
// ============================================================================

/** A point on the UTC time-line. `nano` is always in [0, 999,999,999]. */
export type Instant = {
  readonly kind: 'Instant'
  readonly epochSecond: number
  readonly nano: number
}

/** A time-based amount. `nano` is always in [0, 999,999,999], the sign lives in `seconds`. */
export type Duration = {
  readonly kind: 'Duration'
  readonly seconds: number
  readonly nano: number
}

/** A date-based amount in years, months and days. */
export type Period = {
  readonly kind: 'Period'
  readonly years: number
  readonly months: number
  readonly days: number
}

// ============================================================================
// Offsets and Zones
// ============================================================================

export type ZoneOffset = {
  readonly kind: 'ZoneOffset'
  readonly totalSeconds: number
  readonly id: string
}

export type OffsetDateTime = {
  readonly kind: 'OffsetDateTime'
  readonly dateTime: LocalDateTime
  readonly offset: ZoneOffset
}

export type OffsetTime = {
  readonly kind: 'OffsetTime'
  readonly time: LocalTime
  readonly offset: ZoneOffset
}

/** A discontinuity in the local time-line of a zone. */
export type ZoneOffsetTransition = {
  readonly kind: 'ZoneOffsetTransition'
  readonly epochSecond: number
  /** Local date-time at the instant of the transition, expressed in the offset before. */
  readonly dateTimeBefore: LocalDateTime
  readonly offsetBefore: ZoneOffset
  readonly offsetAfter: ZoneOffset
}

/** How the time of a transition rule is to be read. */
export type TimeDefinition = 'UTC' | 'WALL' | 'STANDARD'

/** Describes a transition that recurs every year. */
export type ZoneOffsetTransitionRule = {
  readonly kind: 'ZoneOffsetTransitionRule'
  readonly month: number
  /**
   * Day-of-month for the transition. Negative values count back from the end
   * of the month, -1 being the last day.
   */
  readonly dayOfMonthIndicator: number
  readonly dayOfWeek: DayOfWeek | null
  readonly time: LocalTime
  /** The transition happens at 24:00, the end of the computed day. */
  readonly timeEndOfDay: boolean
  readonly timeDefinition: TimeDefinition
  readonly standardOffset: ZoneOffset
  readonly offsetBefore: ZoneOffset
  readonly offsetAfter: ZoneOffset
}

export type FixedZoneRules = {
  readonly kind: 'ZoneRules'
  readonly type: 'fixed'
  readonly offset: ZoneOffset
}

export type StandardZoneRules = {
  readonly kind: 'ZoneRules'
  readonly type: 'standard'
  /** Epoch seconds at which the standard offset changed. */
  readonly standardTransitions: readonly number[]
  /** One more entry than `standardTransitions`. */
  readonly standardOffsets: readonly ZoneOffset[]
  /** Epoch seconds at which the wall offset changed. */
  readonly savingsInstantTransitions: readonly number[]
  /** One more entry than `savingsInstantTransitions`. */
  readonly wallOffsets: readonly ZoneOffset[]
  /** Local date-time pairs bracketing each wall transition, in time-line order. */
  readonly savingsLocalTransitions: readonly LocalDateTime[]
  readonly lastRules: readonly ZoneOffsetTransitionRule[]
}

export type ZoneRules = FixedZoneRules | StandardZoneRules

/** A named region whose rules come from a provider. */
export type ZoneRegion = {
  readonly kind: 'ZoneRegion'
  readonly id: string
  readonly rules: ZoneRules
}

export type ZoneId = ZoneOffset | ZoneRegion

export type ZonedDateTime = {
  readonly kind: 'ZonedDateTime'
  readonly dateTime: LocalDateTime
  readonly offset: ZoneOffset
  readonly zone: ZoneId
}

// ============================================================================
// Calendar Systems
// ============================================================================

export type Chronology = 'ISO' | 'Minguo' | 'ThaiBuddhist' | 'Japanese' | 'Hijrah'

/** A date in one of the supported calendar systems; `epochDay` ties it to the ISO time-line. */
export type ChronoDate = {
  readonly kind: 'ChronoDate'
  readonly chronology: Chronology
  readonly era: number
  readonly yearOfEra: number
  readonly prolepticYear: number
  readonly month: number
  readonly day: number
  readonly epochDay: number
}
