import { describe, it, expect } from 'vitest'
import { parseDutchTimestamp, timeZoneOffsetMs, zonedTimeToDate } from '../parse/timestamp.js'

describe('parseDutchTimestamp', () => {
  it('parses the listing format with weekday and seconds', () => {
    expect(parseDutchTimestamp('zondag 6 april 2025 14:55:01')?.toISOString()).toBe('2025-04-06T12:55:01.000Z')
  })

  it('accepts a missing weekday and missing seconds', () => {
    expect(parseDutchTimestamp('13 januari 2025 08:05')?.toISOString()).toBe('2025-01-13T07:05:00.000Z')
  })

  it('ignores case and extra whitespace', () => {
    expect(parseDutchTimestamp('  Zondag  6 April 2025   14:55:01 ')?.toISOString()).toBe('2025-04-06T12:55:01.000Z')
  })

  it('picks standard time for a wall-clock time that occurs twice', () => {
    expect(parseDutchTimestamp('27 oktober 2024 02:30:00')?.toISOString()).toBe('2024-10-27T01:30:00.000Z')
  })

  it('moves a skipped spring time one hour forward', () => {
    expect(parseDutchTimestamp('30 maart 2025 02:30:00')?.toISOString()).toBe('2025-03-30T01:30:00.000Z')
  })

  it('rejects text that is not a valid date and time', () => {
    expect(parseDutchTimestamp(undefined)).toBeNull()
    expect(parseDutchTimestamp('')).toBeNull()
    expect(parseDutchTimestamp('gisteren')).toBeNull()
    expect(parseDutchTimestamp('6 foo 2025 10:00')).toBeNull()
    expect(parseDutchTimestamp('31 februari 2025 10:00')).toBeNull()
    expect(parseDutchTimestamp('6 april 2025 24:00')).toBeNull()
    expect(parseDutchTimestamp('6 april 2025 10:60')).toBeNull()
  })
})

describe('timeZoneOffsetMs', () => {
  it('returns the Amsterdam offset for winter and summer', () => {
    expect(timeZoneOffsetMs(Date.UTC(2025, 0, 13, 12), 'Europe/Amsterdam')).toBe(60 * 60 * 1000)
    expect(timeZoneOffsetMs(Date.UTC(2025, 6, 1, 12), 'Europe/Amsterdam')).toBe(2 * 60 * 60 * 1000)
  })
})

describe('zonedTimeToDate', () => {
  it('converts wall-clock fields in another zone', () => {
    const date = zonedTimeToDate({ year: 2025, month: 6, day: 1, hour: 9, minute: 0, second: 0 }, 'UTC')
    expect(date.toISOString()).toBe('2025-07-01T09:00:00.000Z')
  })
})
