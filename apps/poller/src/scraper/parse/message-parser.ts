/**
 * Region listing parser
 *
 * Turns a listing page into MessageRecords in page order (newest first).
 *
 * Fail-soft per block, fail-closed per page:
 * - a block missing a required field is skipped and reported as an anomaly
 * - a malformed coordinate is dropped from its record, the record is kept
 * - STRUCTURE_CHANGED only when a non-empty page yields zero records, which
 *   means the page layout no longer matches SELECTORS
 */

import * as cheerio from 'cheerio'
import type { ILogger } from '@p2000-monitor/logger'
import { classify } from '../classify.js'
import type { MessageRecord, ParseResult, RequiredField, SoftAnomaly } from '../types.js'
import { BLOCK_ATTRIBUTES, LOCATION_LINKS, POSTAL_CODE_PATTERN, SELECTORS } from './selectors.js'
import { parseDutchTimestamp } from './timestamp.js'
import { loggers } from '../../config/logger.js'

/**
 * Raw text pulled from one block before validation.
 */
export interface BlockFields {
  priorityCode?: string
  absoluteTime?: string
  relativeTime?: string
  description?: string
  street?: string
  location?: string
  postalCode?: string
  region?: string
  latitude?: string
  longitude?: string
}

/**
 * One link of the location paragraph.
 */
export interface LocationLink {
  href?: string
  text?: string
}

export type BlockResult =
  | { ok: true; record: MessageRecord; anomalies: SoftAnomaly[] }
  | { ok: false; anomalies: SoftAnomaly[] }

const REQUIRED_FIELDS: readonly RequiredField[] = ['priorityCode', 'timestamp', 'region', 'location', 'description']

/**
 * Collapse runs of whitespace. Returns undefined for blank text.
 */
export function cleanText(text: string | undefined): string | undefined {
  const cleaned = text?.replace(/\s+/g, ' ').trim()
  return cleaned || undefined
}

/**
 * Message bodies keep their line structure; each line is cleaned on its own.
 */
function cleanMultiline(text: string | undefined): string | undefined {
  if (!text) return undefined
  const lines = text
    .split(/\r?\n/)
    .map((line) => cleanText(line))
    .filter((line): line is string => line !== undefined)
  return lines.length > 0 ? lines.join('\n') : undefined
}

/**
 * Parse a coordinate attribute. Blank means absent; anything that is not a
 * finite number within range is malformed.
 */
export function parseCoordinate(
  raw: string | undefined,
  field: 'latitude' | 'longitude'
): { value?: number; malformed: boolean } {
  const text = raw?.trim()
  if (!text) return { malformed: false }

  const normalized = text.replace(',', '.')
  if (!/^[-+]?\d+(\.\d+)?$/.test(normalized)) {
    return { malformed: true }
  }

  const value = Number.parseFloat(normalized)
  const limit = field === 'latitude' ? 90 : 180
  if (!Number.isFinite(value) || Math.abs(value) > limit) {
    return { malformed: true }
  }

  return { value, malformed: false }
}

function linkDepth(href: string | undefined): number | undefined {
  const path = href?.trim().replace(/^[a-z]+:\/\/[^/]+/i, '').split(/[?#]/)[0]
  if (!path) return undefined
  return path.split('/').filter((segment) => segment.length > 0).length
}

function isPostalCodeLink(link: LocationLink): boolean {
  if (link.href?.includes(LOCATION_LINKS.postalCodePath)) return true
  return link.text !== undefined && POSTAL_CODE_PATTERN.test(link.text)
}

/**
 * Assign town, postal code and region from the location links. Links with an
 * href are told apart by path: the postal code path, a one-segment region path
 * and a deeper town path. Without hrefs the region is the last place link and
 * the town the first of two.
 */
export function splitLocationLinks(links: LocationLink[]): Pick<BlockFields, 'location' | 'postalCode' | 'region'> {
  const named = links.filter((link) => link.text !== undefined)
  const postalCode = named.find(isPostalCodeLink)?.text
  const places = named.filter((link) => !isPostalCodeLink(link))

  if (places.some((link) => linkDepth(link.href) !== undefined)) {
    return {
      location: places.find((link) => (linkDepth(link.href) ?? 0) > LOCATION_LINKS.regionDepth)?.text,
      postalCode,
      region: places.find((link) => linkDepth(link.href) === LOCATION_LINKS.regionDepth)?.text,
    }
  }

  return {
    location: places.length > 1 ? places[0]?.text : undefined,
    postalCode,
    region: places.at(-1)?.text,
  }
}

/**
 * Validate the raw fields of one block and build its record.
 */
export function buildRecord(fields: BlockFields, index: number): BlockResult {
  const anomalies: SoftAnomaly[] = []

  const timestamp = parseDutchTimestamp(fields.absoluteTime)
  const present: Record<RequiredField, boolean> = {
    priorityCode: fields.priorityCode !== undefined,
    timestamp: timestamp !== null,
    region: fields.region !== undefined,
    location: fields.location !== undefined,
    description: fields.description !== undefined,
  }

  for (const field of REQUIRED_FIELDS) {
    if (!present[field]) {
      anomalies.push({ kind: 'missing_required_field', index, field })
    }
  }

  if (
    anomalies.length > 0 ||
    fields.priorityCode === undefined ||
    timestamp === null ||
    fields.region === undefined ||
    fields.location === undefined ||
    fields.description === undefined
  ) {
    return { ok: false, anomalies }
  }

  const record: MessageRecord = {
    priorityCode: fields.priorityCode,
    timestamp,
    region: fields.region,
    location: fields.location,
    description: fields.description,
    serviceType: classify(fields.description),
  }

  if (fields.street) record.street = fields.street
  if (fields.postalCode) record.postalCode = fields.postalCode
  if (fields.relativeTime) record.relativeTime = fields.relativeTime
  if (fields.absoluteTime) record.absoluteTime = fields.absoluteTime

  for (const field of ['latitude', 'longitude'] as const) {
    const coordinate = parseCoordinate(fields[field], field)
    if (coordinate.malformed) {
      anomalies.push({ kind: 'malformed_coordinate', index, field, raw: fields[field] ?? '' })
    } else if (coordinate.value !== undefined) {
      record[field] = coordinate.value
    }
  }

  return { ok: true, record, anomalies }
}

/**
 * Pull the raw field text out of every message block, in page order.
 */
export function extractBlocks(html: string): BlockFields[] {
  const $ = cheerio.load(html)
  const blocks: BlockFields[] = []

  $(SELECTORS.block).each((_, node) => {
    const block = $(node)
    const time = block.find(SELECTORS.time).first()
    const locationParagraph = block.find(SELECTORS.locationParagraph).first()
    const links = locationParagraph
      .children(SELECTORS.locationLink)
      .toArray()
      .map((link) => ({ href: $(link).attr('href'), text: cleanText($(link).text()) }))

    blocks.push({
      priorityCode: cleanText(block.find(SELECTORS.priorityCode).first().text()),
      absoluteTime: cleanText(time.attr(BLOCK_ATTRIBUTES.absoluteTime)),
      relativeTime: cleanText(time.text()),
      description: cleanMultiline(block.find(SELECTORS.description).first().text()),
      street: cleanText(locationParagraph.children(SELECTORS.street).first().text()),
      ...splitLocationLinks(links),
      latitude: block.attr(BLOCK_ATTRIBUTES.latitude),
      longitude: block.attr(BLOCK_ATTRIBUTES.longitude),
    })
  })

  return blocks
}

export function parseMessages(html: string, log: ILogger = loggers.parser): ParseResult {
  if (html.trim() === '') {
    return { ok: true, records: [], anomalies: [], blockCount: 0 }
  }

  const blocks = extractBlocks(html)
  const records: MessageRecord[] = []
  const anomalies: SoftAnomaly[] = []

  blocks.forEach((fields, index) => {
    const result = buildRecord(fields, index)
    anomalies.push(...result.anomalies)
    if (result.ok) {
      records.push(result.record)
    }
  })

  for (const anomaly of anomalies) {
    log.warn('PARSE_SOFT_ANOMALY', { ...anomaly, blockCount: blocks.length })
  }

  if (records.length === 0) {
    return {
      ok: false,
      reason: 'STRUCTURE_CHANGED',
      details:
        blocks.length === 0
          ? `No message blocks matched "${SELECTORS.block}"`
          : `None of ${blocks.length} message blocks had all required fields`,
      anomalies,
      blockCount: blocks.length,
    }
  }

  if (records.length < blocks.length) {
    log.warn('PARSE_DEGRADED', {
      blockCount: blocks.length,
      recordCount: records.length,
      skipped: blocks.length - records.length,
    })
  }

  return { ok: true, records, anomalies, blockCount: blocks.length }
}
