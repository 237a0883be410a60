/**
 * Segment 09: Pattern Formatter
 *
 * Compiling patterns, printing values through them, and parsing text back
 * into fields that resolve to dates, times and zoned values.
 */

import { describe, it, expect } from 'vitest'
import {
  formatterOfPattern,
  formatWith,
  parseWith,
  resolveDate,
  resolveTime,
  resolveDateTime,
  resolveOffsetDateTime,
  resolveInstant,
  resolveZoned,
  ISO_LOCAL_DATE,
  ISO_LOCAL_TIME,
  ISO_OFFSET_DATE_TIME,
  ISO_ZONED_DATE_TIME,
  ISO_INSTANT,
  BASIC_ISO_DATE,
  type ParsedFields,
} from '../src/formatter'
import { dateOf } from '../src/local-date'
import { timeOf, MIDNIGHT } from '../src/local-time'
import { dateTimeOf } from '../src/local-date-time'
import { offsetDateTimeOf, offsetDateTimeEquals } from '../src/offset-date-time'
import { zonedOf, formatZoned } from '../src/zoned-date-time'
import { instantOfEpochSecond } from '../src/instant'
import { UTC, offsetOfHours, offsetOfHoursMinutes, offsetOfHoursMinutesSeconds } from '../src/zone-offset'
import { createDefaultRegistry } from '../src/tzdb-provider'
import { zoneIdOf } from '../src/zone-id'
import { InvalidArgumentError, UnsupportedFieldError } from '../src/errors'
import { unwrap } from '../src/result'

const registry = createDefaultRegistry()
const LONDON = zoneIdOf(registry, 'Europe/London')

/** Friday */
const DATE = dateOf(2024, 3, 15)

function fmt(pattern: string, value: Parameters<typeof formatWith>[1]): string {
  return formatWith(formatterOfPattern(pattern), value)
}

function parsed(pattern: string, text: string): ParsedFields {
  return unwrap(parseWith(formatterOfPattern(pattern), text))
}

function parseMessage(result: { ok: true } | { ok: false; error: Error }): string {
  return result.ok ? '' : result.error.message
}

// ============================================================================
// 1. PATTERN COMPILATION
// ============================================================================

describe('Pattern compilation', () => {
  it('keeps the pattern it came from', () => {
    expect(formatterOfPattern('uuuu-MM-dd').pattern).toBe('uuuu-MM-dd')
    expect(ISO_LOCAL_DATE.pattern).toBe('ISO_LOCAL_DATE')
  })

  it('rejects too many letters', () => {
    expect(() => formatterOfPattern('EEEEEE')).toThrow('Too many pattern letters: E')
    expect(() => formatterOfPattern('ddd')).toThrow('Too many pattern letters: d')
    expect(() => formatterOfPattern('aa')).toThrow('Too many pattern letters: a')
  })

  it('rejects letter counts a letter does not take', () => {
    expect(() => formatterOfPattern('VVV')).toThrow('Pattern letter count must be 2: V')
    expect(() => formatterOfPattern('OO')).toThrow('Pattern letter count must be 1 or 4: O')
  })

  it('rejects unknown letters and reserved characters', () => {
    expect(() => formatterOfPattern('b')).toThrow(InvalidArgumentError)
    expect(() => formatterOfPattern('b')).toThrow('Unknown pattern letter: b')
    expect(() => formatterOfPattern('uuuu#')).toThrow("Pattern includes reserved character: '#'")
  })

  it('rejects unbalanced quotes and brackets', () => {
    expect(() => formatterOfPattern("'abc")).toThrow("Pattern ends with an incomplete string literal: 'abc")
    expect(() => formatterOfPattern('HH]')).toThrow('Pattern invalid as it contains ] without previous [')
  })
})

// ============================================================================
// 2. FORMATTING
// ============================================================================

describe('Formatting', () => {
  describe('dates', () => {
    it('prints numbers at their width', () => {
      expect(fmt('uuuu-MM-dd', DATE)).toBe('2024-03-15')
      expect(fmt('d/M/uu', DATE)).toBe('15/3/24')
      expect(fmt('D DDD', DATE)).toBe('75 075')
      expect(fmt('e', DATE)).toBe('5')
    })

    it('prints month and day names', () => {
      expect(fmt('EEEE d MMMM uuuu', DATE)).toBe('Friday 15 March 2024')
      expect(fmt('EEE, d MMM', DATE)).toBe('Fri, 15 Mar')
      expect(fmt('MMMMM EEEEE', DATE)).toBe('M F')
    })

    it('prints eras', () => {
      expect(fmt('G GGGG', DATE)).toBe('AD Anno Domini')
      expect(fmt('yyyy G', dateOf(0, 1, 1))).toBe('0001 BC')
    })

    it('signs years wider than the pattern', () => {
      expect(fmt('uuuu', dateOf(12345, 1, 1))).toBe('+12345')
      expect(formatWith(ISO_LOCAL_DATE, dateOf(-1, 1, 1))).toBe('-0001-01-01')
    })

    it('refuses fields the value does not have', () => {
      expect(() => fmt('HH', DATE)).toThrow(UnsupportedFieldError)
    })
  })

  describe('times', () => {
    const time = timeOf(13, 5, 9, 120_000_000)

    it('prints twelve and twenty-four hour clocks', () => {
      expect(fmt('h:mm a', time)).toBe('1:05 PM')
      expect(fmt('K a', timeOf(12, 0))).toBe('0 PM')
      expect(fmt('kk', MIDNIGHT)).toBe('24')
    })

    it('prints fractions at a fixed width', () => {
      expect(fmt('HH:mm:ss.SSS', time)).toBe('13:05:09.120')
      expect(formatWith(ISO_LOCAL_TIME, time)).toBe('13:05:09.12')
    })

    it('prints quoted literals', () => {
      expect(fmt("'at' HH 'o''clock'", time)).toBe("at 13 o'clock")
      expect(fmt("HH''mm", time)).toBe("13'05")
    })

    it('skips optional sections the value cannot fill', () => {
      expect(fmt('HH:mm[:ss]', time)).toBe('13:05:09')
      expect(fmt('uuuu-MM-dd[ HH:mm]', DATE)).toBe('2024-03-15')
    })
  })

  describe('offsets', () => {
    const india = offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 0), offsetOfHoursMinutes(5, 30))
    const utc = offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 0), UTC)

    it('prints the X and x styles', () => {
      expect(fmt('X|XX|XXX', india)).toBe('+0530|+0530|+05:30')
      expect(fmt('X', offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 0), offsetOfHours(-8)))).toBe('-08')
      expect(fmt('X|XXX', utc)).toBe('Z|Z')
      expect(fmt('x|xxx', utc)).toBe('+00|+00:00')
    })

    it('prints the Z styles', () => {
      expect(fmt('Z|ZZZZ|ZZZZZ', india)).toBe('+0530|GMT+05:30|+05:30')
      expect(fmt('Z|ZZZZZ', utc)).toBe('+0000|Z')
    })

    it('prints localized offsets', () => {
      expect(fmt('O|OOOO', india)).toBe('GMT+5:30|GMT+05:30')
      expect(fmt('O', utc)).toBe('GMT')
    })

    it('prints seconds only where the style allows', () => {
      const odd = offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 0), offsetOfHoursMinutesSeconds(5, 53, 28))
      expect(fmt('XXX|XXXXX', odd)).toBe('+05:53|+05:53:28')
    })

    it('refuses an offset on a local value', () => {
      expect(() => fmt('X', dateTimeOf(2024, 3, 15, 10, 0))).toThrow('Unable to obtain offset from LocalDateTime')
    })
  })

  describe('predefined formatters', () => {
    const zoned = zonedOf(dateTimeOf(2008, 7, 1, 12, 0), LONDON)

    it('prints the region only for zoned values', () => {
      expect(formatWith(ISO_ZONED_DATE_TIME, zoned)).toBe('2008-07-01T12:00:00+01:00[Europe/London]')
      expect(formatWith(ISO_ZONED_DATE_TIME, zonedOf(dateTimeOf(2008, 7, 1, 12, 0), offsetOfHours(1))))
        .toBe('2008-07-01T12:00:00+01:00')
    })

    it('prints the instant in UTC', () => {
      expect(formatWith(ISO_INSTANT, zoned)).toBe('2008-07-01T11:00:00Z')
    })

    it('prints the basic date with an optional offset', () => {
      expect(formatWith(BASIC_ISO_DATE, DATE)).toBe('20240315')
      expect(formatWith(BASIC_ISO_DATE, offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 0), offsetOfHoursMinutes(5, 30))))
        .toBe('20240315+0530')
    })
  })
})

// ============================================================================
// 3. PARSING
// ============================================================================

describe('Parsing', () => {
  describe('dates', () => {
    it('reads numeric dates', () => {
      expect(unwrap(resolveDate(parsed('uuuu-MM-dd', '2024-03-15')))).toEqual(DATE)
      expect(unwrap(resolveDate(parsed('uuuuMMdd', '20240315')))).toEqual(DATE)
      expect(unwrap(resolveDate(parsed('uuuu DDD', '2024 075')))).toEqual(DATE)
    })

    it('reads names without regard to case', () => {
      expect(unwrap(resolveDate(parsed('d MMMM uuuu', '15 march 2024')))).toEqual(DATE)
      expect(unwrap(resolveDate(parsed('EEE d MMM uuuu', 'FRI 15 MAR 2024')))).toEqual(DATE)
    })

    it('reads the year of an era', () => {
      expect(unwrap(resolveDate(parsed('yyyy-MM-dd G', '0001-01-01 BC')))).toEqual(dateOf(0, 1, 1))
    })

    it('reads two-digit years in the current century', () => {
      expect(unwrap(resolveDate(parsed('dd/MM/uu', '15/03/24')))).toEqual(DATE)
    })
  })

  describe('failures', () => {
    it('reports where the text stopped matching', () => {
      const result = parseWith(ISO_LOCAL_DATE, '2024-3-15')
      expect(parseMessage(result)).toBe("Text '2024-3-15' could not be parsed at index 5")
      if (!result.ok) expect(result.error.errorIndex).toBe(5)
    })

    it('reports leftover text', () => {
      expect(parseMessage(parseWith(ISO_LOCAL_DATE, '2024-03-15x')))
        .toBe("Text '2024-03-15x' could not be parsed, unparsed text found at index 10")
    })

    it('rolls back an optional section that does not match', () => {
      expect(parseMessage(parseWith(formatterOfPattern('HH:mm[:ss]'), '10:15:')))
        .toBe("Text '10:15:' could not be parsed, unparsed text found at index 5")
    })

    it('reports out of range fields when resolving', () => {
      expect(parseMessage(resolveDate(parsed('uuuu-MM-dd', '2024-13-01'))))
        .toBe("Text '2024-13-01' could not be parsed: Invalid value for MonthOfYear (valid values 1 - 12): 13")
    })

    it('reports a day of week that does not match', () => {
      expect(parseMessage(resolveDate(parsed('EEE d MMM uuuu', 'Thu 15 Mar 2024'))))
        .toBe("Text 'Thu 15 Mar 2024' could not be parsed: Conflict found: DayOfWeek 4 does not match 2024-03-15")
    })

    it('reports conflicting years', () => {
      expect(parseMessage(resolveDate(parsed('uuuu yyyy-MM-dd', '2024 2023-03-15'))))
        .toBe("Text '2024 2023-03-15' could not be parsed: " +
          'Conflict found: Year 2024 differs from Year 2023 derived from YearOfEra 2023')
    })

    it('reports missing fields', () => {
      expect(parseMessage(resolveDate(parsed('uuuu', '2024'))))
        .toBe("Text '2024' could not be parsed: Unable to obtain LocalDate from parsed fields: {Year=2024}")
    })
  })

  describe('times', () => {
    it('reads twelve-hour clocks', () => {
      expect(unwrap(resolveTime(parsed('h:mm a', '1:05 pm')))).toEqual(timeOf(13, 5))
      expect(unwrap(resolveTime(parsed('h:mm a', '12:30 AM')))).toEqual(timeOf(0, 30))
    })

    it('reads hour twenty-four as midnight', () => {
      expect(unwrap(resolveTime(parsed('kk:mm', '24:00')))).toEqual(MIDNIGHT)
    })

    it('reads optional seconds and fractions', () => {
      expect(unwrap(resolveTime(unwrap(parseWith(ISO_LOCAL_TIME, '10:15'))))).toEqual(timeOf(10, 15))
      expect(unwrap(resolveTime(unwrap(parseWith(ISO_LOCAL_TIME, '10:15:30.5'))))).toEqual(timeOf(10, 15, 30, 500_000_000))
    })

    it('joins a date and a time', () => {
      expect(unwrap(resolveDateTime(parsed("uuuu-MM-dd'T'HH:mm", '2024-03-15T10:00'))))
        .toEqual(dateTimeOf(2024, 3, 15, 10, 0))
    })
  })

  describe('offsets and zones', () => {
    it('reads an offset date-time', () => {
      const odt = unwrap(resolveOffsetDateTime(unwrap(parseWith(ISO_OFFSET_DATE_TIME, '2024-03-15T10:00:00+05:30'))))
      expect(offsetDateTimeEquals(odt, offsetDateTimeOf(dateTimeOf(2024, 3, 15, 10, 0), offsetOfHoursMinutes(5, 30)))).toBe(true)
    })

    it('reads each offset style', () => {
      expect(parsed('XX', '+0530').offset).toBe(offsetOfHoursMinutes(5, 30))
      expect(parsed('x', '+00').offset).toBe(UTC)
      expect(parsed('O', 'GMT+5:30').offset).toBe(offsetOfHoursMinutes(5, 30))
      expect(parsed('OOOO', 'GMT').offset).toBe(UTC)
    })

    it('requires the separator its style prints', () => {
      expect(parseMessage(parseWith(formatterOfPattern('XXX'), '+0530'))).toBe("Text '+0530' could not be parsed at index 0")
    })

    it('reads instants directly or through an offset', () => {
      const expected = instantOfEpochSecond(1_214_910_000)
      expect(unwrap(resolveInstant(unwrap(parseWith(ISO_INSTANT, '2008-07-01T11:00:00Z'))))).toEqual(expected)
      expect(unwrap(resolveInstant(unwrap(parseWith(ISO_OFFSET_DATE_TIME, '2008-07-01T12:00:00+01:00'))))).toEqual(expected)
    })

    it('checks a parsed offset against the zone', () => {
      const zdt = unwrap(resolveZoned(unwrap(parseWith(ISO_ZONED_DATE_TIME, '2008-10-26T01:30:00Z[Europe/London]')), registry))
      expect(formatZoned(zdt)).toBe('2008-10-26T01:30Z[Europe/London]')
    })

    it('resolves a zone alone leniently', () => {
      const zdt = unwrap(resolveZoned(parsed('uuuu-MM-dd HH:mm VV', '2008-03-30 01:30 Europe/London'), registry))
      expect(formatZoned(zdt)).toBe('2008-03-30T02:30+01:00[Europe/London]')
    })

    it('needs an offset or a zone', () => {
      expect(parseMessage(resolveZoned(parsed('uuuu-MM-dd HH:mm', '2008-03-30 01:30'), registry)))
        .toBe("Text '2008-03-30 01:30' could not be parsed: Unable to obtain ZonedDateTime from parsed fields: " +
          '{Year=2008, MonthOfYear=3, DayOfMonth=30, HourOfDay=1, MinuteOfHour=30}')
    })
  })
})
