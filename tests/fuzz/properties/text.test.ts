/**
 * Property tests for text forms: value printers and the pattern formatter
 * read back what they write.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { localDateTimeGen, offsetGen } from '../generators'
import {
  formatterOfPattern,
  formatWith,
  parseWith,
  resolveDateTime,
  resolveOffsetDateTime,
  ISO_OFFSET_DATE_TIME,
} from '../../../src/formatter'
import { formatOffset, parseOffset } from '../../../src/zone-offset'
import { formatPeriod, parsePeriod, periodEquals, periodOf } from '../../../src/period'
import { durationEquals, durationOfSeconds, formatDuration, parseDuration } from '../../../src/duration'
import { offsetDateTimeOf, offsetDateTimeEquals } from '../../../src/offset-date-time'
import { dateTimeEquals } from '../../../src/local-date-time'
import { unwrap } from '../../../src/result'

const FULL_PATTERN = formatterOfPattern('uuuu-MM-dd HH:mm:ss.SSSSSSSSS')

describe('Value text', () => {
  it('reads back an offset', () => {
    fc.assert(
      fc.property(offsetGen(), (offset) => {
        expect(unwrap(parseOffset(formatOffset(offset))).totalSeconds).toBe(offset.totalSeconds)
      })
    )
  })

  it('reads back a period', () => {
    const part = fc.integer({ min: -10_000, max: 10_000 })
    fc.assert(
      fc.property(part, part, part, (years, months, days) => {
        const period = periodOf(years, months, days)
        expect(periodEquals(unwrap(parsePeriod(formatPeriod(period))), period)).toBe(true)
      })
    )
  })

  it('reads back a duration', () => {
    fc.assert(
      fc.property(fc.integer({ min: -1_000_000_000, max: 1_000_000_000 }), fc.integer({ min: 0, max: 999_999_999 }), (seconds, nano) => {
        const duration = durationOfSeconds(seconds, nano)
        expect(durationEquals(unwrap(parseDuration(formatDuration(duration))), duration)).toBe(true)
      })
    )
  })
})

describe('Pattern formatter', () => {
  it('reads back every field of a pattern', () => {
    fc.assert(
      fc.property(localDateTimeGen(), (dateTime) => {
        const text = formatWith(FULL_PATTERN, dateTime)
        expect(dateTimeEquals(unwrap(resolveDateTime(unwrap(parseWith(FULL_PATTERN, text)))), dateTime)).toBe(true)
      })
    )
  })

  it('reads back an offset date-time', () => {
    fc.assert(
      fc.property(localDateTimeGen(), offsetGen(), (dateTime, offset) => {
        const odt = offsetDateTimeOf(dateTime, offset)
        const text = formatWith(ISO_OFFSET_DATE_TIME, odt)
        expect(offsetDateTimeEquals(unwrap(resolveOffsetDateTime(unwrap(parseWith(ISO_OFFSET_DATE_TIME, text)))), odt)).toBe(true)
      })
    )
  })
})
