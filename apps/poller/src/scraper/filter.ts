/**
 * Filter evaluation
 *
 * Picks the record to publish from a newest-first record list.
 * An empty filter set disables filtering.
 */

import type { MessageRecord, Selection, ServiceType } from './types.js'

export function matchesFilter(record: MessageRecord, filters: readonly ServiceType[]): boolean {
  return filters.length === 0 || filters.includes(record.serviceType)
}

/**
 * First record matching the filters, or, when none matches, the newest record
 * with `matched: false` so there is always something to show.
 */
export function selectMessage(records: readonly MessageRecord[], filters: readonly ServiceType[]): Selection {
  if (records.length === 0) {
    return { record: null, matched: false }
  }

  const match = records.find((record) => matchesFilter(record, filters))
  if (match) {
    return { record: match, matched: true }
  }

  return { record: records[0] ?? null, matched: false }
}
