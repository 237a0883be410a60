/**
 * Chronologies
 *
 * Dates in calendar systems other than ISO. Each system is described by a
 * `CalendarSystem` record; the exported operations are written once against
 * that record and dispatch on the date's `chronology` tag.
 *
 * - Minguo: ISO months and days, year counted from 1912 (ROC 1)
 * - ThaiBuddhist: ISO months and days, year counted from 543 BCE
 * - Japanese: ISO years, eras from Meiji onwards; dates before 1873 are rejected
 * - Hijrah: the tabular Islamic calendar, 30-year cycle, years 1 - 9999
 *
 * Every date converts through its epoch-day, so any two chronologies can be
 * compared or converted.
 */

import type { ChronoDate, Chronology, LocalDate } from './types'
import { DateTimeRangeError, InvalidArgumentError, UnsupportedFieldError, requireNonNull } from './errors'
import { checkValidValue, fieldRangeOf, valueRangeOf, valueRangeOfVariable, type ChronoField, type ValueRange } from './fields'
import {
  EPOCH_DAY_MAX, EPOCH_DAY_MIN, YEAR_MAX, YEAR_MIN,
  dayOfWeekOfEpochDay, daysInMonth, daysInYear, fromEpochDay, isLeapYear, toEpochDay,
} from './internal/calendar'
import { addExact, floorDiv, floorMod, multiplyExact } from './internal/math'
import { pad2 } from './internal/helpers'
import { dateOfEpochDay, dateToEpochDay, type DateAdjuster } from './local-date'

// ============================================================================
// Types
// ============================================================================

export type ChronoEra = {
  readonly chronology: Chronology
  readonly value: number
  readonly name: string
}

type YearMonthDay = { year: number; month: number; day: number }

type CalendarSystem = {
  readonly id: Chronology
  readonly calendarType: string
  readonly eras: readonly ChronoEra[]
  readonly yearRange: ValueRange
  readonly yearOfEraRange: ValueRange
  readonly minEpochDay: number
  readonly maxEpochDay: number
  /** Message for an epoch-day outside `minEpochDay` - `maxEpochDay`. */
  readonly outOfRange: string
  isLeapYear(prolepticYear: number): boolean
  lengthOfMonth(prolepticYear: number, month: number): number
  lengthOfYear(prolepticYear: number): number
  toEpochDay(prolepticYear: number, month: number, day: number): number
  fromEpochDay(epochDay: number): YearMonthDay
  eraOf(prolepticYear: number, epochDay: number): ChronoEra
  yearOfEra(era: ChronoEra, prolepticYear: number): number
  prolepticYear(era: ChronoEra, yearOfEra: number): number
}

// ============================================================================
// ISO-Based Systems
// ============================================================================

function eraPair(chronology: Chronology, before: string, current: string): [ChronoEra, ChronoEra] {
  return [
    Object.freeze({ chronology, value: 0, name: before }),
    Object.freeze({ chronology, value: 1, name: current }),
  ]
}

/** A system that is ISO with the year number shifted. */
function shiftedIso(id: Chronology, calendarType: string, yearShift: number, names: [string, string]): CalendarSystem {
  const [before, current] = eraPair(id, names[0], names[1])
  const yearMin = YEAR_MIN + yearShift
  const yearMax = YEAR_MAX + yearShift
  return {
    id,
    calendarType,
    eras: [before, current],
    yearRange: valueRangeOf(yearMin, yearMax),
    yearOfEraRange: valueRangeOfVariable(1, Math.min(yearMax, 1 - yearMin), Math.max(yearMax, 1 - yearMin)),
    minEpochDay: EPOCH_DAY_MIN,
    maxEpochDay: EPOCH_DAY_MAX,
    outOfRange: `Date is outside the range supported by ${id}`,
    isLeapYear: (year) => isLeapYear(year - yearShift),
    lengthOfMonth: (year, month) => daysInMonth(year - yearShift, month),
    lengthOfYear: (year) => daysInYear(year - yearShift),
    toEpochDay: (year, month, day) => toEpochDay(year - yearShift, month, day),
    fromEpochDay: (epochDay) => {
      const iso = fromEpochDay(epochDay)
      return { year: iso.year + yearShift, month: iso.month, day: iso.day }
    },
    eraOf: (year) => year >= 1 ? current : before,
    yearOfEra: (era, year) => era.value === 1 ? year : 1 - year,
    prolepticYear: (era, yearOfEra) => era.value === 1 ? yearOfEra : 1 - yearOfEra,
  }
}

const ISO = shiftedIso('ISO', 'iso8601', 0, ['BCE', 'CE'])
const MINGUO = shiftedIso('Minguo', 'roc', -1911, ['BEFORE_ROC', 'ROC'])
const THAI_BUDDHIST = shiftedIso('ThaiBuddhist', 'buddhist', 543, ['BEFORE_BE', 'BE'])

// ============================================================================
// Japanese
// ============================================================================

type JapaneseEra = ChronoEra & { readonly sinceYear: number; readonly sinceEpochDay: number }

function japaneseEra(value: number, name: string, year: number, month: number, day: number): JapaneseEra {
  return Object.freeze({ chronology: 'Japanese', value, name, sinceYear: year, sinceEpochDay: toEpochDay(year, month, day) })
}

const JAPANESE_ERAS: readonly JapaneseEra[] = [
  japaneseEra(-1, 'Meiji', 1868, 9, 8),
  japaneseEra(0, 'Taisho', 1912, 7, 30),
  japaneseEra(1, 'Showa', 1926, 12, 25),
  japaneseEra(2, 'Heisei', 1989, 1, 8),
  japaneseEra(3, 'Reiwa', 2019, 5, 1),
]

const JAPANESE_MIN_YEAR = 1873

function japaneseEraOf(era: ChronoEra): JapaneseEra {
  const found = JAPANESE_ERAS.find(e => e.value === era.value)
  if (!found) throw new DateTimeRangeError(`Invalid era: ${era.value}`)
  return found
}

const JAPANESE: CalendarSystem = {
  ...ISO,
  id: 'Japanese',
  calendarType: 'japanese',
  eras: JAPANESE_ERAS,
  yearRange: valueRangeOf(JAPANESE_MIN_YEAR, YEAR_MAX),
  // Taisho is the shortest closed era
  yearOfEraRange: valueRangeOfVariable(1, 15, YEAR_MAX - 2019 + 1),
  minEpochDay: toEpochDay(JAPANESE_MIN_YEAR, 1, 1),
  outOfRange: 'Minimum supported date is January 1st Meiji 6',
  eraOf: (_year, epochDay) => {
    let era = JAPANESE_ERAS[0]!
    for (const candidate of JAPANESE_ERAS) {
      if (candidate.sinceEpochDay <= epochDay) era = candidate
    }
    return era
  },
  yearOfEra: (era, year) => year - japaneseEraOf(era).sinceYear + 1,
  prolepticYear: (era, yearOfEra) => japaneseEraOf(era).sinceYear + yearOfEra - 1,
}

// ============================================================================
// Hijrah
// ============================================================================

/** 1 Muharram 1 AH */
const HIJRAH_EPOCH_DAY = -492_148
const HIJRAH_MAX_YEAR = 9999
const HIJRAH_YEAR_DAYS = 354
const HIJRAH_CYCLE_YEARS = 30
const HIJRAH_CYCLE_DAYS = 10_631
/** Positions within the 30-year cycle whose twelfth month has 30 days. */
const HIJRAH_LEAP_YEARS: ReadonlySet<number> = new Set([2, 5, 7, 10, 13, 16, 18, 21, 24, 26, 29])

function hijrahIsLeap(year: number): boolean {
  return HIJRAH_LEAP_YEARS.has(floorMod(year - 1, HIJRAH_CYCLE_YEARS) + 1)
}

function hijrahMonthLength(year: number, month: number): number {
  if (month === 12) return hijrahIsLeap(year) ? 30 : 29
  return month % 2 === 1 ? 30 : 29
}

function hijrahYearLength(year: number): number {
  return hijrahIsLeap(year) ? HIJRAH_YEAR_DAYS + 1 : HIJRAH_YEAR_DAYS
}

function hijrahDaysBeforeYear(year: number): number {
  const cycles = floorDiv(year - 1, HIJRAH_CYCLE_YEARS)
  const inCycle = floorMod(year - 1, HIJRAH_CYCLE_YEARS)
  let days = cycles * HIJRAH_CYCLE_DAYS + inCycle * HIJRAH_YEAR_DAYS
  for (const leap of HIJRAH_LEAP_YEARS) {
    if (leap <= inCycle) days++
  }
  return days
}

function hijrahToEpochDay(year: number, month: number, day: number): number {
  // Odd months have 30 days, even months 29
  const daysBeforeMonth = 29 * (month - 1) + Math.floor(month / 2)
  return HIJRAH_EPOCH_DAY + hijrahDaysBeforeYear(year) + daysBeforeMonth + day - 1
}

function hijrahFromEpochDay(epochDay: number): YearMonthDay {
  let remaining = epochDay - HIJRAH_EPOCH_DAY
  const cycles = Math.floor(remaining / HIJRAH_CYCLE_DAYS)
  remaining -= cycles * HIJRAH_CYCLE_DAYS
  let year = cycles * HIJRAH_CYCLE_YEARS + 1
  while (remaining >= hijrahYearLength(year)) {
    remaining -= hijrahYearLength(year)
    year++
  }
  let month = 1
  while (remaining >= hijrahMonthLength(year, month)) {
    remaining -= hijrahMonthLength(year, month)
    month++
  }
  return { year, month, day: remaining + 1 }
}

const [BEFORE_AH, AH] = eraPair('Hijrah', 'BEFORE_AH', 'AH')

const HIJRAH: CalendarSystem = {
  id: 'Hijrah',
  calendarType: 'islamic-civil',
  eras: [BEFORE_AH, AH],
  yearRange: valueRangeOf(1, HIJRAH_MAX_YEAR),
  yearOfEraRange: valueRangeOf(1, HIJRAH_MAX_YEAR),
  minEpochDay: HIJRAH_EPOCH_DAY,
  maxEpochDay: hijrahToEpochDay(HIJRAH_MAX_YEAR, 12, hijrahMonthLength(HIJRAH_MAX_YEAR, 12)),
  outOfRange: `Date is outside the range supported by Hijrah: years 1 - ${HIJRAH_MAX_YEAR}`,
  isLeapYear: hijrahIsLeap,
  lengthOfMonth: hijrahMonthLength,
  lengthOfYear: hijrahYearLength,
  toEpochDay: hijrahToEpochDay,
  fromEpochDay: hijrahFromEpochDay,
  eraOf: () => AH,
  yearOfEra: (_era, year) => year,
  prolepticYear: (era, yearOfEra) => era.value === 1 ? yearOfEra : 1 - yearOfEra,
}

// ============================================================================
// Lookup
// ============================================================================

const SYSTEMS: Record<Chronology, CalendarSystem> = {
  ISO,
  Minguo: MINGUO,
  ThaiBuddhist: THAI_BUDDHIST,
  Japanese: JAPANESE,
  Hijrah: HIJRAH,
}

const BY_ID: ReadonlyMap<string, Chronology> = new Map(
  Object.values(SYSTEMS).flatMap((sys): [string, Chronology][] => [[sys.id, sys.id], [sys.calendarType, sys.id]]),
)

/** Looks up a chronology by its id (`Minguo`) or calendar type (`roc`). */
export function chronologyById(id: string): Chronology {
  requireNonNull(id, 'id')
  const chrono = BY_ID.get(id)
  if (!chrono) throw new InvalidArgumentError(`Unknown chronology: ${id}`)
  return chrono
}

export function chronologyCalendarType(chrono: Chronology): string {
  return SYSTEMS[chrono].calendarType
}

export function chronoEras(chrono: Chronology): readonly ChronoEra[] {
  return SYSTEMS[chrono].eras
}

export function chronoEraOf(chrono: Chronology, value: number): ChronoEra {
  const era = SYSTEMS[chrono].eras.find(e => e.value === value)
  if (!era) throw new DateTimeRangeError(`Invalid era for ${chrono}: ${value}`)
  return era
}

export function chronoIsLeapYear(chrono: Chronology, prolepticYear: number): boolean {
  return SYSTEMS[chrono].isLeapYear(prolepticYear)
}

/** Outer range of a field in a chronology. */
export function chronoRange(chrono: Chronology, field: ChronoField): ValueRange {
  const sys = SYSTEMS[chrono]
  switch (field) {
    case 'Era': {
      const values = sys.eras.map(e => e.value)
      return valueRangeOf(Math.min(...values), Math.max(...values))
    }
    case 'Year': return sys.yearRange
    case 'YearOfEra': return sys.yearOfEraRange
    case 'ProlepticMonth': return valueRangeOf(sys.yearRange.minSmallest * 12, sys.yearRange.maxLargest * 12 + 11)
    case 'EpochDay': return valueRangeOf(sys.minEpochDay, sys.maxEpochDay)
    case 'DayOfMonth': return chrono === 'Hijrah' ? valueRangeOfVariable(1, 29, 30) : fieldRangeOf(field)
    case 'DayOfYear':
      return chrono === 'Hijrah' ? valueRangeOfVariable(1, HIJRAH_YEAR_DAYS, HIJRAH_YEAR_DAYS + 1) : fieldRangeOf(field)
    case 'MonthOfYear':
    case 'DayOfWeek':
    case 'AlignedDayOfWeekInMonth':
    case 'AlignedDayOfWeekInYear':
    case 'AlignedWeekOfMonth':
    case 'AlignedWeekOfYear':
      return fieldRangeOf(field)
    default:
      throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  }
}

// ============================================================================
// Construction
// ============================================================================

function checkEpochDay(sys: CalendarSystem, epochDay: number): void {
  if (epochDay < sys.minEpochDay || epochDay > sys.maxEpochDay) throw new DateTimeRangeError(sys.outOfRange)
}

function make(sys: CalendarSystem, year: number, month: number, day: number, epochDay: number): ChronoDate {
  checkEpochDay(sys, epochDay)
  const era = sys.eraOf(year, epochDay)
  return Object.freeze({
    kind: 'ChronoDate',
    chronology: sys.id,
    era: era.value,
    yearOfEra: sys.yearOfEra(era, year),
    prolepticYear: year,
    month,
    day,
    epochDay,
  })
}

function checkDate(sys: CalendarSystem, year: number, month: number, day: number): void {
  checkValidValue(sys.yearRange, year, 'Year')
  checkValidValue(valueRangeOf(1, 12), month, 'MonthOfYear')
  checkValidValue(valueRangeOf(1, sys.lengthOfMonth(year, month)), day, 'DayOfMonth')
}

export function chronoDate(chrono: Chronology, prolepticYear: number, month: number, day: number): ChronoDate {
  const sys = SYSTEMS[chrono]
  checkDate(sys, prolepticYear, month, day)
  return make(sys, prolepticYear, month, day, sys.toEpochDay(prolepticYear, month, day))
}

/** The date must fall within the era; a Japanese era ends where the next begins. */
export function chronoDateOfEra(chrono: Chronology, era: ChronoEra, yearOfEra: number, month: number, day: number): ChronoDate {
  requireNonNull(era, 'era')
  if (era.chronology !== chrono) throw new InvalidArgumentError(`Era must be ${chrono}, but was ${era.chronology}`)
  const sys = SYSTEMS[chrono]
  checkValidValue(sys.yearOfEraRange, yearOfEra, 'YearOfEra')
  const date = chronoDate(chrono, sys.prolepticYear(era, yearOfEra), month, day)
  if (date.era !== era.value) throw new DateTimeRangeError(`Requested date is outside bounds of era ${era.name}`)
  return date
}

export function chronoDateOfYearDay(chrono: Chronology, prolepticYear: number, dayOfYear: number): ChronoDate {
  const sys = SYSTEMS[chrono]
  checkValidValue(sys.yearRange, prolepticYear, 'Year')
  checkValidValue(valueRangeOf(1, sys.lengthOfYear(prolepticYear)), dayOfYear, 'DayOfYear')
  return chronoDateOfEpochDay(chrono, sys.toEpochDay(prolepticYear, 1, 1) + dayOfYear - 1)
}

export function chronoDateOfEpochDay(chrono: Chronology, epochDay: number): ChronoDate {
  const sys = SYSTEMS[chrono]
  checkEpochDay(sys, epochDay)
  const { year, month, day } = sys.fromEpochDay(epochDay)
  return make(sys, year, month, day, epochDay)
}

/** The same day in another chronology. */
export function chronoDateFrom(chrono: Chronology, date: LocalDate | ChronoDate): ChronoDate {
  requireNonNull(date, 'date')
  const epochDay = date.kind === 'LocalDate' ? dateToEpochDay(date) : date.epochDay
  return chronoDateOfEpochDay(chrono, epochDay)
}

export function chronoToLocalDate(date: ChronoDate): LocalDate {
  return dateOfEpochDay(date.epochDay)
}

// ============================================================================
// Queries
// ============================================================================

export function chronoLengthOfMonth(date: ChronoDate): number {
  return SYSTEMS[date.chronology].lengthOfMonth(date.prolepticYear, date.month)
}

export function chronoLengthOfYear(date: ChronoDate): number {
  return SYSTEMS[date.chronology].lengthOfYear(date.prolepticYear)
}

function dayOfYear(date: ChronoDate): number {
  return date.epochDay - SYSTEMS[date.chronology].toEpochDay(date.prolepticYear, 1, 1) + 1
}

export function chronoGetLong(date: ChronoDate, field: ChronoField): number {
  switch (field) {
    case 'DayOfWeek': return dayOfWeekOfEpochDay(date.epochDay)
    case 'AlignedDayOfWeekInMonth': return ((date.day - 1) % 7) + 1
    case 'AlignedDayOfWeekInYear': return ((dayOfYear(date) - 1) % 7) + 1
    case 'DayOfMonth': return date.day
    case 'DayOfYear': return dayOfYear(date)
    case 'EpochDay': return date.epochDay
    case 'AlignedWeekOfMonth': return Math.floor((date.day - 1) / 7) + 1
    case 'AlignedWeekOfYear': return Math.floor((dayOfYear(date) - 1) / 7) + 1
    case 'MonthOfYear': return date.month
    case 'ProlepticMonth': return date.prolepticYear * 12 + date.month - 1
    case 'YearOfEra': return date.yearOfEra
    case 'Year': return date.prolepticYear
    case 'Era': return date.era
    default: throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  }
}

// ============================================================================
// Arithmetic
// ============================================================================

function resolvePreviousValid(sys: CalendarSystem, year: number, month: number, day: number): ChronoDate {
  checkValidValue(sys.yearRange, year, 'Year')
  const clamped = Math.min(day, sys.lengthOfMonth(year, month))
  return make(sys, year, month, clamped, sys.toEpochDay(year, month, clamped))
}

export function chronoPlusDays(date: ChronoDate, days: number): ChronoDate {
  if (days === 0) return date
  return chronoDateOfEpochDay(date.chronology, addExact(date.epochDay, days))
}

export function chronoPlusWeeks(date: ChronoDate, weeks: number): ChronoDate {
  return chronoPlusDays(date, multiplyExact(weeks, 7))
}

/** Adds months, clamping the day to the end of the resulting month. */
export function chronoPlusMonths(date: ChronoDate, months: number): ChronoDate {
  if (months === 0) return date
  const total = addExact(date.prolepticYear * 12 + date.month - 1, months)
  return resolvePreviousValid(SYSTEMS[date.chronology], floorDiv(total, 12), floorMod(total, 12) + 1, date.day)
}

export function chronoPlusYears(date: ChronoDate, years: number): ChronoDate {
  if (years === 0) return date
  return resolvePreviousValid(SYSTEMS[date.chronology], addExact(date.prolepticYear, years), date.month, date.day)
}

// ============================================================================
// Adjustment
// ============================================================================

export function chronoWithField(date: ChronoDate, field: ChronoField, value: number): ChronoDate {
  const chrono = date.chronology
  const sys = SYSTEMS[chrono]
  checkValidValue(chronoRange(chrono, field), value, field)
  const clampTo = (year: number, month: number) => Math.min(date.day, sys.lengthOfMonth(year, month))
  switch (field) {
    case 'DayOfWeek':
      return chronoPlusDays(date, value - chronoGetLong(date, 'DayOfWeek'))
    case 'AlignedDayOfWeekInMonth':
    case 'AlignedDayOfWeekInYear':
    case 'AlignedWeekOfMonth':
    case 'AlignedWeekOfYear': {
      const step = field === 'AlignedWeekOfMonth' || field === 'AlignedWeekOfYear' ? 7 : 1
      return chronoPlusDays(date, (value - chronoGetLong(date, field)) * step)
    }
    case 'DayOfMonth':
      return chronoDate(chrono, date.prolepticYear, date.month, value)
    case 'DayOfYear':
      return chronoDateOfYearDay(chrono, date.prolepticYear, value)
    case 'EpochDay':
      return chronoDateOfEpochDay(chrono, value)
    case 'MonthOfYear':
      return chronoDate(chrono, date.prolepticYear, value, clampTo(date.prolepticYear, value))
    case 'ProlepticMonth':
      return chronoPlusMonths(date, value - chronoGetLong(date, 'ProlepticMonth'))
    case 'Year':
      return chronoDate(chrono, value, date.month, clampTo(value, date.month))
    case 'YearOfEra': {
      const era = chronoEraOf(chrono, date.era)
      const year = sys.prolepticYear(era, value)
      return chronoDateOfEra(chrono, era, value, date.month, clampTo(year, date.month))
    }
    case 'Era': {
      const era = chronoEraOf(chrono, value)
      const year = sys.prolepticYear(era, date.yearOfEra)
      return chronoDateOfEra(chrono, era, date.yearOfEra, date.month, clampTo(year, date.month))
    }
    default:
      throw new UnsupportedFieldError(`Unsupported field: ${field}`)
  }
}

/** Applies an ISO date adjuster, keeping the chronology. */
export function chronoWith(date: ChronoDate, adjuster: DateAdjuster): ChronoDate {
  requireNonNull(adjuster, 'adjuster')
  return chronoDateFrom(date.chronology, adjuster(chronoToLocalDate(date)))
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

/** Orders by position on the time-line, then by chronology id. */
export function compareChronoDates(a: ChronoDate, b: ChronoDate): number {
  if (a.epochDay !== b.epochDay) return a.epochDay < b.epochDay ? -1 : 1
  return a.chronology < b.chronology ? -1 : a.chronology > b.chronology ? 1 : 0
}

export function chronoDateEquals(a: ChronoDate, b: ChronoDate): boolean {
  return a.chronology === b.chronology && a.epochDay === b.epochDay
}

/** `Minguo ROC 101-10-29` */
export function formatChronoDate(date: ChronoDate): string {
  const era = chronoEraOf(date.chronology, date.era)
  return `${date.chronology} ${era.name} ${date.yearOfEra}-${pad2(date.month)}-${pad2(date.day)}`
}
