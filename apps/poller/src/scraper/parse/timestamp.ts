/**
 * Dutch listing timestamps
 *
 * The listing shows absolute times as "zondag 6 april 2025 14:55:01".
 * Month names are matched without relying on the process locale; the weekday
 * is optional and ignored. The wall-clock time is interpreted in the source
 * time zone (Europe/Amsterdam), so the resulting Date is an exact instant.
 */

export const SOURCE_TIME_ZONE = 'Europe/Amsterdam'

const DUTCH_MONTHS: Record<string, number> = {
  januari: 0,
  februari: 1,
  maart: 2,
  april: 3,
  mei: 4,
  juni: 5,
  juli: 6,
  augustus: 7,
  september: 8,
  oktober: 9,
  november: 10,
  december: 11,
}

const WEEKDAYS = 'maandag|dinsdag|woensdag|donderdag|vrijdag|zaterdag|zondag'

const TIMESTAMP_PATTERN = new RegExp(
  `^(?:(?:${WEEKDAYS})\\s+)?(\\d{1,2})\\s+([a-z]+)\\s+(\\d{4})\\s+(\\d{1,2}):(\\d{2})(?::(\\d{2}))?$`
)

const formatters = new Map<string, Intl.DateTimeFormat>()

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    })
    formatters.set(timeZone, formatter)
  }
  return formatter
}

/**
 * Offset of `timeZone` from UTC at the given instant, in milliseconds.
 */
export function timeZoneOffsetMs(instant: number, timeZone: string): number {
  const parts: Record<string, number> = {}
  for (const part of getFormatter(timeZone).formatToParts(new Date(instant))) {
    if (part.type !== 'literal') {
      parts[part.type] = Number(part.value)
    }
  }

  const wallClockAsUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second)
  const truncated = instant - (((instant % 1000) + 1000) % 1000)
  return wallClockAsUtc - truncated
}

/**
 * Convert wall-clock fields in `timeZone` to an instant. For times that occur
 * twice (autumn DST change) the standard-time occurrence wins; times skipped
 * in spring resolve one hour later.
 */
export function zonedTimeToDate(
  fields: { year: number; month: number; day: number; hour: number; minute: number; second: number },
  timeZone: string = SOURCE_TIME_ZONE
): Date {
  const asUtc = Date.UTC(fields.year, fields.month, fields.day, fields.hour, fields.minute, fields.second)
  const firstOffset = timeZoneOffsetMs(asUtc, timeZone)
  const candidate = asUtc - firstOffset
  const secondOffset = timeZoneOffsetMs(candidate, timeZone)

  return new Date(secondOffset === firstOffset ? candidate : asUtc - secondOffset)
}

/**
 * Parse a listing timestamp. Returns null for anything that is not a valid
 * calendar date and time.
 */
export function parseDutchTimestamp(text: string | undefined, timeZone: string = SOURCE_TIME_ZONE): Date | null {
  if (!text) return null

  const normalized = text.trim().toLowerCase().replace(/\s+/g, ' ')
  const match = TIMESTAMP_PATTERN.exec(normalized)
  if (!match) return null

  const [, dayStr, monthName, yearStr, hourStr, minuteStr, secondStr] = match
  const month = DUTCH_MONTHS[monthName]
  if (month === undefined) return null

  const fields = {
    year: Number(yearStr),
    month,
    day: Number(dayStr),
    hour: Number(hourStr),
    minute: Number(minuteStr),
    second: secondStr ? Number(secondStr) : 0,
  }

  if (fields.hour > 23 || fields.minute > 59 || fields.second > 59) return null

  // Reject 31 februari and friends
  const calendarCheck = new Date(Date.UTC(fields.year, fields.month, fields.day))
  if (calendarCheck.getUTCMonth() !== fields.month || calendarCheck.getUTCDate() !== fields.day) {
    return null
  }

  return zonedTimeToDate(fields, timeZone)
}
