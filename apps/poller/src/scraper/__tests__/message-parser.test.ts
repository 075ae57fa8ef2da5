import { describe, it, expect } from 'vitest'
import { buildRecord, cleanText, parseCoordinate, parseMessages, splitLocationLinks } from '../parse/message-parser.js'
import { readFixture, TestLogger } from './helpers.js'

describe('parseMessages', () => {
  it('extracts one record per message block in page order', () => {
    const log = new TestLogger()
    const result = parseMessages(readFixture('listing.html'), log)

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.blockCount).toBe(4)
    expect(result.records.map((record) => record.priorityCode)).toEqual(['A1', 'P 1', 'P 2', 'P 3'])
    expect(result.records.map((record) => record.serviceType)).toEqual(['Ambulance', 'Fire', 'Police', 'Other'])
  })

  it('maps every field of a complete block', () => {
    const result = parseMessages(readFixture('listing.html'), new TestLogger())

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.records[0]).toEqual({
      priorityCode: 'A1',
      timestamp: new Date('2025-04-06T12:55:01.000Z'),
      region: 'Utrecht',
      location: 'Utrecht',
      street: 'Damstraat',
      postalCode: '3511AB',
      description: 'A1 AMBU 17124 Damstraat Utrecht\nReanimatie',
      latitude: 52.0907,
      longitude: 5.1214,
      serviceType: 'Ambulance',
      relativeTime: '2 minuten geleden',
      absoluteTime: 'zondag 6 april 2025 14:55:01',
    })
  })

  it('accepts comma decimal coordinates', () => {
    const result = parseMessages(readFixture('listing.html'), new TestLogger())

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.records[1].latitude).toBe(52.0833)
    expect(result.records[1].longitude).toBe(5.2333)
  })

  it('leaves coordinates out when the block has none', () => {
    const result = parseMessages(readFixture('listing.html'), new TestLogger())

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.records[2]).not.toHaveProperty('latitude')
    expect(result.records[2]).not.toHaveProperty('longitude')
  })

  it('keeps a record with a malformed coordinate and reports the anomaly', () => {
    const log = new TestLogger()
    const result = parseMessages(readFixture('listing.html'), log)

    expect(result.ok).toBe(true)
    if (!result.ok) return

    const record = result.records[3]
    expect(record.priorityCode).toBe('P 3')
    expect(record).not.toHaveProperty('latitude')
    expect(record.longitude).toBe(5.1)

    expect(result.anomalies).toEqual([{ kind: 'malformed_coordinate', index: 3, field: 'latitude', raw: 'abc' }])
    expect(log.warn).toHaveBeenCalledTimes(1)
    expect(log.warn).toHaveBeenCalledWith('PARSE_SOFT_ANOMALY', {
      kind: 'malformed_coordinate',
      index: 3,
      field: 'latitude',
      raw: 'abc',
      blockCount: 4,
    })
  })

  it('skips a block missing a required field and keeps the rest', () => {
    const log = new TestLogger()
    const result = parseMessages(readFixture('missing-region.html'), log)

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.blockCount).toBe(3)
    expect(result.records.map((record) => record.priorityCode)).toEqual(['A2', 'P 1'])
    expect(result.anomalies).toEqual([{ kind: 'missing_required_field', index: 1, field: 'region' }])
    expect(log.warn).toHaveBeenCalledWith('PARSE_DEGRADED', { blockCount: 3, recordCount: 2, skipped: 1 })
  })

  it('reads town and region from a block without a street', () => {
    const log = new TestLogger()
    const result = parseMessages(readFixture('optional-fields.html'), log)

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.records).toHaveLength(3)
    expect(result.anomalies).toEqual([])
    expect(log.warn).not.toHaveBeenCalled()
    expect(result.records[0]).toEqual({
      priorityCode: 'A1',
      timestamp: new Date('2025-04-06T13:10:00.000Z'),
      region: 'Utrecht',
      location: 'Houten',
      postalCode: '3995AA',
      description: 'A1 Ambulance 17126 Houten',
      serviceType: 'Ambulance',
      relativeTime: '1 minuut geleden',
      absoluteTime: 'zondag 6 april 2025 15:10:00',
    })
  })

  it('reads town and region from a block without a postal code', () => {
    const result = parseMessages(readFixture('optional-fields.html'), new TestLogger())

    expect(result.ok).toBe(true)
    if (!result.ok) return

    const record = result.records[1]
    expect(record.priorityCode).toBe('P 1')
    expect(record.street).toBe('Lange Dreef')
    expect(record.location).toBe('Houten')
    expect(record.region).toBe('Utrecht')
    expect(record).not.toHaveProperty('postalCode')
    expect(record.serviceType).toBe('Fire')
  })

  it('falls back to link order when location links carry no href', () => {
    const result = parseMessages(readFixture('optional-fields.html'), new TestLogger())

    expect(result.ok).toBe(true)
    if (!result.ok) return

    const record = result.records[2]
    expect(record.priorityCode).toBe('P 2')
    expect(record).not.toHaveProperty('street')
    expect(record.location).toBe('Nieuwegein')
    expect(record.postalCode).toBe('3431 AB')
    expect(record.region).toBe('Utrecht')
  })

  it('keeps a complete block that follows a block without a street', () => {
    const html = `<div id="calls">
      <div class="call">
        <h2><a><b>A1</b></a> <span title="zondag 6 april 2025 15:10:00">nu</span></h2>
        <span><p>Capcodes</p><p><a><span>Houten</span></a> <a><span>3995AA</span></a> <a><span>Utrecht</span></a></p></span>
        <pre>A1 Ambulance Houten</pre>
      </div>
      <div class="call">
        <h2><a><b>A2</b></a> <span title="zondag 6 april 2025 15:00:00">10 minuten geleden</span></h2>
        <span><p>Capcodes</p><p><span>Lange Dreef</span> <a>Houten</a> <a>Utrecht</a></p></span>
        <pre>A2 Ambulance Lange Dreef Houten</pre>
      </div>
    </div>`
    const result = parseMessages(html, new TestLogger())

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.anomalies).toEqual([])
    expect(result.records.map((record) => [record.priorityCode, record.location, record.region])).toEqual([
      ['A1', 'Houten', 'Utrecht'],
      ['A2', 'Houten', 'Utrecht'],
    ])
    expect(result.records[0].postalCode).toBe('3995AA')
    expect(result.records[1].street).toBe('Lange Dreef')
  })

  it('interprets winter timestamps as CET', () => {
    const result = parseMessages(readFixture('missing-region.html'), new TestLogger())

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.records[0].timestamp.toISOString()).toBe('2025-01-13T07:05:00.000Z')
    expect(result.records[1].timestamp.toISOString()).toBe('2025-01-13T06:58:00.000Z')
  })

  it('reports STRUCTURE_CHANGED when no message blocks match', () => {
    const result = parseMessages(readFixture('structure-changed.html'), new TestLogger())

    expect(result).toEqual({
      ok: false,
      reason: 'STRUCTURE_CHANGED',
      details: 'No message blocks matched "#calls .call"',
      anomalies: [],
      blockCount: 0,
    })
  })

  it('reports STRUCTURE_CHANGED when no block has all required fields', () => {
    const html = '<div id="calls"><div class="call"><h2><a><b>A1</b></a></h2></div></div>'
    const result = parseMessages(html, new TestLogger())

    expect(result.ok).toBe(false)
    if (result.ok) return

    expect(result.details).toBe('None of 1 message blocks had all required fields')
    expect(result.anomalies.map((anomaly) => anomaly.kind === 'missing_required_field' && anomaly.field)).toEqual([
      'timestamp',
      'region',
      'location',
      'description',
    ])
  })

  it('returns no records for a blank page', () => {
    expect(parseMessages('  \n ', new TestLogger())).toEqual({ ok: true, records: [], anomalies: [], blockCount: 0 })
  })
})

describe('buildRecord', () => {
  const complete = {
    priorityCode: 'A1',
    absoluteTime: 'zondag 6 april 2025 14:55:01',
    region: 'Utrecht',
    location: 'Utrecht',
    description: 'A1 Ambulance Damstraat Utrecht',
  }

  it('treats an unparsable timestamp as a missing required field', () => {
    expect(buildRecord({ ...complete, absoluteTime: 'gisteren' }, 2)).toEqual({
      ok: false,
      anomalies: [{ kind: 'missing_required_field', index: 2, field: 'timestamp' }],
    })
  })

  it('omits optional fields that are absent', () => {
    const result = buildRecord(complete, 0)

    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(Object.keys(result.record).sort()).toEqual(
      ['absoluteTime', 'description', 'location', 'priorityCode', 'region', 'serviceType', 'timestamp'].sort()
    )
  })
})

describe('splitLocationLinks', () => {
  it('tells links apart by href path', () => {
    expect(
      splitLocationLinks([
        { href: '/utrecht/', text: 'Utrecht' },
        { href: '/postcode/3511AB/', text: '3511AB' },
        { href: 'https://p2000.test/utrecht/zeist/', text: 'Zeist' },
      ])
    ).toEqual({ location: 'Zeist', postalCode: '3511AB', region: 'Utrecht' })
  })

  it('leaves the region out when no one-segment link exists', () => {
    expect(
      splitLocationLinks([
        { href: '/utrecht/houten/', text: 'Houten' },
        { href: '/postcode/3995AA/', text: '3995AA' },
      ])
    ).toEqual({ location: 'Houten', postalCode: '3995AA', region: undefined })
  })

  it('treats a lone place link without href as the region', () => {
    expect(splitLocationLinks([{ text: 'Utrecht' }])).toEqual({
      location: undefined,
      postalCode: undefined,
      region: 'Utrecht',
    })
  })

  it('ignores links without text', () => {
    expect(splitLocationLinks([{ text: undefined }, { text: 'Houten' }, { text: 'Utrecht' }])).toEqual({
      location: 'Houten',
      postalCode: undefined,
      region: 'Utrecht',
    })
  })
})

describe('parseCoordinate', () => {
  it('parses dot and comma decimals', () => {
    expect(parseCoordinate('52.5', 'latitude')).toEqual({ value: 52.5, malformed: false })
    expect(parseCoordinate(' 5,75 ', 'longitude')).toEqual({ value: 5.75, malformed: false })
    expect(parseCoordinate('-33.9', 'latitude')).toEqual({ value: -33.9, malformed: false })
  })

  it('treats blank text as absent', () => {
    expect(parseCoordinate(undefined, 'latitude')).toEqual({ malformed: false })
    expect(parseCoordinate('   ', 'longitude')).toEqual({ malformed: false })
  })

  it('rejects non-numeric and out-of-range values', () => {
    expect(parseCoordinate('abc', 'latitude').malformed).toBe(true)
    expect(parseCoordinate('1e3', 'latitude').malformed).toBe(true)
    expect(parseCoordinate('91', 'latitude').malformed).toBe(true)
    expect(parseCoordinate('181', 'longitude').malformed).toBe(true)
    expect(parseCoordinate('179.9', 'longitude')).toEqual({ value: 179.9, malformed: false })
  })
})

describe('cleanText', () => {
  it('collapses whitespace and drops blank text', () => {
    expect(cleanText('  Lange \n  Dreef ')).toBe('Lange Dreef')
    expect(cleanText(' \t ')).toBeUndefined()
    expect(cleanText(undefined)).toBeUndefined()
  })
})
