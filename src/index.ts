/**
 * civil-time
 *
 * Public API exports
 */

// Errors
export {
  DateTimeErrorCode, DateTimeError, DateTimeRangeError, UnsupportedFieldError, NullArgumentError,
  ArithmeticOverflowError, InvalidArgumentError, ParseError, ZoneReconciliationError, ZoneRulesError,
  CorruptDataError, requireNonNull,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap, attempt } from './result'

// Value types
export type {
  DayOfWeek, Month, LocalDate, LocalTime, LocalDateTime, YearMonth, MonthDay, Instant, Duration, Period,
  ZoneOffset, OffsetDateTime, OffsetTime, ZoneOffsetTransition, TimeDefinition, ZoneOffsetTransitionRule,
  FixedZoneRules, StandardZoneRules, ZoneRules, ZoneRegion, ZoneId, ZonedDateTime, Chronology, ChronoDate,
} from './types'

// Fields and units
export type { ValueRange, ChronoUnit, ChronoField } from './fields'
export {
  valueRangeOf, valueRangeOfVariable, isFixedRange, isValidValue, isIntRange, checkValidValue,
  formatValueRange, CHRONO_UNITS, unitLength, isDurationEstimated, isDateBasedUnit, isTimeBasedUnit,
  unitNanos, fieldRangeOf, fieldBaseUnit, fieldRangeUnit, isDateBasedField, isTimeBasedField, checkField,
} from './fields'

// Day-of-week and month
export type { DayOfWeekName } from './day-of-week'
export {
  MONDAY, TUESDAY, WEDNESDAY, THURSDAY, FRIDAY, SATURDAY, SUNDAY, isDayOfWeek, dayOfWeekOf, dayOfWeekPlus,
  dayOfWeekMinus, dayOfWeekName, dayOfWeekFromName,
} from './day-of-week'
export type { MonthName } from './month'
export {
  isMonth, monthOf, monthPlus, monthLength, monthMinLength, monthMaxLength, monthFirstDayOfYear,
  firstMonthOfQuarter, monthName, monthFromName,
} from './month'

// Offsets
export {
  offsetOfTotalSeconds, offsetOfHoursMinutesSeconds, offsetOfHoursMinutes, offsetOfHours, UTC, OFFSET_MIN,
  OFFSET_MAX, parseOffset, formatOffset, offsetTotalSeconds, compareOffsets, offsetEquals,
} from './zone-offset'

// Local values
export {
  MIDNIGHT, NOON, TIME_MIN, TIME_MAX, timeOf, timeOfSecondOfDay, timeOfNanoOfDay, timeToSecondOfDay,
  timeToNanoOfDay, timePlusHours, timePlusMinutes, timePlusSeconds, timePlusNanos, timeMinusHours,
  timeMinusMinutes, timeMinusSeconds, timeMinusNanos, timePlus, timeMinus, timeWithHour, timeWithMinute,
  timeWithSecond, timeWithNano, timeWithField, timeTruncatedTo, timeUntil, timeIsSupported, timeGetLong,
  timeFieldRange, compareTimes, isTimeBefore, isTimeAfter, timeEquals, formatTime, TIME_PATTERN, parseTime,
  timeFromMatch,
} from './local-time'
export type { DateAdjuster } from './local-date'
export {
  dateOf, dateOfYearDay, dateOfEpochDay, DATE_MIN, DATE_MAX, EPOCH, dateToEpochDay, dateDayOfWeek,
  dateDayOfYear, dateLengthOfMonth, dateLengthOfYear, dateIsLeapYear, datePlusDays, datePlusWeeks,
  datePlusMonths, datePlusYears, dateMinusDays, dateMinusWeeks, dateMinusMonths, dateMinusYears, datePlus,
  dateMinus, datePlusPeriod, dateMinusPeriod, dateWithYear, dateWithMonth, dateWithDayOfMonth,
  dateWithDayOfYear, dateWithField, dateWith, dateAtTime, dateAtStartOfDay, dateIsSupported, dateGetLong,
  dateFieldRange, dateUntil, monthsUntil, compareDates, isDateBefore, isDateAfter, dateEquals, formatDate,
  DATE_PATTERN, parseDate, validYearSign, dateFromMatch, isLeapYear,
} from './local-date'
export {
  DATE_TIME_MIN, DATE_TIME_MAX, dateTimeOf, dateTimeOfDateAndTime, dateTimeOfEpochSecond, dateTimeOfInstant,
  dateTimeToEpochSecond, dateTimeToInstant, dateTimeAtOffset, dateTimePlusYears, dateTimePlusMonths,
  dateTimePlusWeeks, dateTimePlusDays, dateTimePlusHours, dateTimePlusMinutes, dateTimePlusSeconds,
  dateTimePlusNanos, dateTimeMinusYears, dateTimeMinusMonths, dateTimeMinusWeeks, dateTimeMinusDays,
  dateTimeMinusHours, dateTimeMinusMinutes, dateTimeMinusSeconds, dateTimeMinusNanos, dateTimePlus,
  dateTimeMinus, dateTimePlusDuration, dateTimeMinusDuration, dateTimePlusPeriod, dateTimeMinusPeriod,
  dateTimeWithDate, dateTimeWithTime, dateTimeWithYear, dateTimeWithMonth, dateTimeWithDayOfMonth,
  dateTimeWithDayOfYear, dateTimeWithHour, dateTimeWithMinute, dateTimeWithSecond, dateTimeWithNano,
  dateTimeWithField, dateTimeWith, dateTimeTruncatedTo, dateTimeUntil, dateTimeIsSupported, dateTimeGetLong,
  dateTimeFieldRange, compareDateTimes, isDateTimeBefore, isDateTimeAfter, dateTimeEquals, formatDateTime,
  DATE_TIME_PATTERN, parseDateTime, dateTimeFromMatch,
} from './local-date-time'

// Instant and amounts
export {
  INSTANT_EPOCH, INSTANT_MIN, INSTANT_MAX, instantOfEpochSecond, instantOfEpochMilli, instantPlus,
  instantMinus, instantPlusSeconds, instantPlusMillis, instantPlusNanos, instantMinusSeconds,
  instantMinusMillis, instantMinusNanos, instantPlusUnit, instantMinusUnit, instantTruncatedTo, instantUntil,
  instantToEpochMilli, instantIsSupported, instantGetLong, instantWithField, compareInstants,
  isInstantBefore, isInstantAfter, instantEquals, formatInstant, parseInstant,
} from './instant'
export type { TimeBearing } from './duration'
export {
  DURATION_ZERO, durationOfSeconds, durationOfDays, durationOfHours, durationOfMinutes, durationOfMillis,
  durationOfNanos, durationOf, durationBetween, durationPlus, durationMinus, durationPlusUnit,
  durationPlusDays, durationPlusHours, durationPlusMinutes, durationPlusSeconds, durationPlusMillis,
  durationPlusNanos, durationMinusDays, durationMinusHours, durationMinusMinutes, durationMinusSeconds,
  durationMinusMillis, durationMinusNanos, durationMultipliedBy, durationDividedBy, durationNegated,
  durationAbs, durationIsZero, durationIsNegative, durationToDays, durationToHours, durationToMinutes,
  durationToMillis, durationToNanos, compareDurations, durationEquals, formatDuration, parseDuration,
} from './duration'
export {
  PERIOD_ZERO, periodOf, periodOfYears, periodOfMonths, periodOfWeeks, periodOfDays, periodBetween,
  periodPlus, periodMinus, periodPlusYears, periodPlusMonths, periodPlusDays, periodWithYears,
  periodWithMonths, periodWithDays, periodMultipliedBy, periodNegated, periodNormalized, periodToTotalMonths,
  periodIsZero, periodIsNegative, periodEquals, formatPeriod, parsePeriod,
} from './period'

// Partial dates
export {
  yearMonthOf, yearMonthFromDate, yearMonthPlusMonths, yearMonthPlusYears, yearMonthMinusMonths,
  yearMonthMinusYears, yearMonthIsLeapYear, yearMonthLengthOfMonth, yearMonthIsValidDay, yearMonthAtDay,
  yearMonthAtEndOfMonth, yearMonthMonthsUntil, compareYearMonths, yearMonthEquals, formatYearMonth,
  parseYearMonth,
} from './year-month'
export {
  monthDayOf, monthDayFromDate, monthDayIsValidYear, monthDayAtYear, monthDayWithMonth, compareMonthDays,
  monthDayEquals, formatMonthDay, parseMonthDay,
} from './month-day'

// Offset values
export {
  OFFSET_DATE_TIME_MIN, OFFSET_DATE_TIME_MAX, offsetDateTimeOf, offsetDateTimeOfInstant,
  offsetDateTimeToEpochSecond, offsetDateTimeToInstant, offsetDateTimeToLocalDate, offsetDateTimeToLocalTime,
  offsetDateTimeToOffsetTime, offsetDateTimeWithOffsetSameLocal, offsetDateTimeWithOffsetSameInstant,
  offsetDateTimePlus, offsetDateTimeMinus, offsetDateTimePlusDuration, offsetDateTimeMinusDuration,
  offsetDateTimePlusPeriod, offsetDateTimeMinusPeriod, offsetDateTimeWithField, offsetDateTimeWith,
  offsetDateTimeTruncatedTo, offsetDateTimeUntil, offsetDateTimeIsSupported, offsetDateTimeGetLong,
  offsetDateTimeFieldRange, compareOffsetDateTimes, isOffsetDateTimeEqual, isOffsetDateTimeBefore,
  isOffsetDateTimeAfter, offsetDateTimeEquals, formatOffsetDateTime, OFFSET_PATTERN, parseOffsetDateTime,
  offsetFromMatch,
} from './offset-date-time'
export {
  offsetTimeOf, offsetTimeOfInstant, offsetTimeAtDate, offsetTimeWithOffsetSameLocal,
  offsetTimeWithOffsetSameInstant, offsetTimePlus, offsetTimeMinus, offsetTimeWithField,
  offsetTimeTruncatedTo, offsetTimeUntil, offsetTimeIsSupported, offsetTimeGetLong, offsetTimeFieldRange,
  compareOffsetTimes, isOffsetTimeEqual, isOffsetTimeBefore, isOffsetTimeAfter, offsetTimeEquals,
  formatOffsetTime, parseOffsetTime,
} from './offset-time'

// Adjusters
export {
  firstDayOfMonth, lastDayOfMonth, firstDayOfNextMonth, firstDayOfYear, lastDayOfYear, firstDayOfNextYear,
  firstInMonth, lastInMonth, dayOfWeekInMonth, next, nextOrSame, previous, previousOrSame,
} from './temporal-adjusters'

// Zone rules
export {
  transitionOf, rawTransition, transitionOfEpochSecond, transitionInstant, transitionEpochSecond,
  transitionDateTimeBefore, transitionDateTimeAfter, transitionDuration, isGap, isOverlap,
  transitionIsValidOffset, transitionValidOffsets, compareTransitions, transitionEquals, formatTransition,
} from './zone-offset-transition'
export type { TransitionRuleInput } from './zone-offset-transition-rule'
export {
  transitionRuleOf, toWallDateTime, createTransition, transitionRuleEquals, formatTransitionRule,
} from './zone-offset-transition-rule'
export type { StandardZoneRulesInput } from './zone-rules'
export {
  fixedZoneRules, standardZoneRules, standardZoneRulesOfArrays, rulesOffsetAt, rulesOffsetAtLocal,
  rulesValidOffsets, rulesTransitionAt, rulesIsValidOffset, rulesStandardOffset, rulesDaylightSavings,
  rulesIsDaylightSavings, rulesNextTransition, rulesPreviousTransition, rulesTransitions,
  rulesTransitionRules, rulesIsFixedOffset, rulesEquals, formatZoneRules,
} from './zone-rules'
export type { WindowRule, ZoneRulesBuilder } from './zone-rules-builder'
export { createZoneRulesBuilder } from './zone-rules-builder'

// Providers and registry
export type {
  ZoneRulesProvider, ZoneRulesRegistryEvent, ZoneRulesRegistryConfig, ZoneRulesRegistry,
} from './zone-rules-provider'
export { createZoneRulesRegistry } from './zone-rules-provider'
export type { TzdbSource, TzdbCompileOptions, CompiledTzdb } from './tzdb-compiler'
export { compileTzdb } from './tzdb-compiler'
export type { TzdbVersionSource } from './tzdb-provider'
export {
  createTzdbZoneRulesProvider, providerOfCompiled, loadBundledSources, createBundledTzdbProvider,
  createDefaultRegistry,
} from './tzdb-provider'
export type { IntlProviderConfig } from './intl-provider'
export { deriveIntlRules, createIntlZoneRulesProvider } from './intl-provider'
export type { SqliteRulesStore } from './sqlite-rules-store'
export { createSqliteZoneRulesStore } from './sqlite-rules-store'

// Serialization
export {
  SerializedType, writeOffset, readOffset, writeEpochSecond, readEpochSecond, decode, encodeZoneRules,
  decodeZoneRules, encodeTransition, decodeTransition, encodeTransitionRule, decodeTransitionRule,
  encodeOffset, decodeOffset, encodeEpochSecond, decodeEpochSecond,
} from './zone-rules-serialization'

// Zones
export {
  SHORT_IDS, zoneRegionOf, zoneIdOf, zoneIdOfOffset, systemDefaultZone, zoneRules, zoneIdNormalized,
  zoneIdEquals, formatZoneId,
} from './zone-id'
export {
  zonedOf, zonedOfStrict, zonedOfInstant, zonedOfInstantAndOffset, zonedWithEarlierOffsetAtOverlap,
  zonedWithLaterOffsetAtOverlap, zonedWithZoneSameLocal, zonedWithZoneSameInstant, zonedWithFixedOffsetZone,
  zonedToEpochSecond, zonedToInstant, zonedToLocalDateTime, zonedToLocalDate, zonedToLocalTime,
  zonedToOffsetDateTime, zonedWithYear, zonedWithMonth, zonedWithDayOfMonth, zonedWithDayOfYear,
  zonedWithHour, zonedWithMinute, zonedWithSecond, zonedWithNano, zonedWithDate, zonedWithTime,
  zonedWithField, zonedWith, zonedTruncatedTo, zonedPlusYears, zonedPlusMonths, zonedPlusWeeks,
  zonedPlusDays, zonedPlusHours, zonedPlusMinutes, zonedPlusSeconds, zonedPlusNanos, zonedMinusYears,
  zonedMinusMonths, zonedMinusWeeks, zonedMinusDays, zonedMinusHours, zonedMinusMinutes, zonedMinusSeconds,
  zonedMinusNanos, zonedPlus, zonedMinus, zonedPlusDuration, zonedMinusDuration, zonedPlusPeriod,
  zonedMinusPeriod, zonedUntil, zonedIsSupported, zonedGetLong, zonedFieldRange, compareZoned, isZonedEqual,
  isZonedBefore, isZonedAfter, zonedEquals, formatZoned, parseZoned,
} from './zoned-date-time'

// Generic field access
export type { Temporal } from './temporal'
export { isSupported, getLong, getField, fieldRange } from './temporal'

// Clocks
export type { Clock } from './clock'
export {
  systemClock, systemUtcClock, fixedClock, offsetClock, tickClock, tickSeconds, tickMinutes, clockInstant,
  clockMillis, clockWithZone, instantNow, dateTimeNow, dateNow, timeNow, offsetDateTimeNow, zonedNow,
} from './clock'

// Pattern formatter
export type { DateTimeFormatter, ParsedFields } from './formatter'
export {
  formatterOfPattern, ISO_LOCAL_DATE, ISO_LOCAL_TIME, ISO_LOCAL_DATE_TIME, ISO_OFFSET_DATE_TIME,
  ISO_ZONED_DATE_TIME, ISO_INSTANT, BASIC_ISO_DATE, ISO_WEEK_DATE, formatWith, parseWith, resolveDate, resolveTime,
  resolveDateTime, resolveOffsetDateTime, resolveInstant, resolveZoned,
} from './formatter'

// ISO quarter and week fields
export type { IsoField, IsoUnit, IsoTemporal } from './iso-fields'
export {
  ISO_FIELDS, isIsoField, isoFieldOuterRange, isoDateOfQuarter, isoDateOfWeek, weeksInWeekBasedYear, isoGetLong,
  isoFieldRange, isoWithField, isoPlus, isoUntil, isoWeekDate,
} from './iso-fields'

// Chronologies
export type { ChronoEra } from './chronology'
export {
  chronologyById, chronologyCalendarType, chronoEras, chronoEraOf, chronoIsLeapYear, chronoRange, chronoDate,
  chronoDateOfEra, chronoDateOfYearDay, chronoDateOfEpochDay, chronoDateFrom, chronoToLocalDate,
  chronoLengthOfMonth, chronoLengthOfYear, chronoGetLong, chronoPlusDays, chronoPlusWeeks, chronoPlusMonths,
  chronoPlusYears, chronoWithField, chronoWith, compareChronoDates, chronoDateEquals, formatChronoDate,
} from './chronology'
