import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { vi } from 'vitest'
import type { ILogger } from '@p2000-monitor/logger'
import type { FetchError, Fetcher, FetchResult, MessageRecord } from '../types.js'

export function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf8')
}

/**
 * Logger that records calls instead of writing them.
 */
export class TestLogger implements ILogger {
  readonly debug = vi.fn<ILogger['debug']>()
  readonly info = vi.fn<ILogger['info']>()
  readonly warn = vi.fn<ILogger['warn']>()
  readonly error = vi.fn<ILogger['error']>()
  readonly fatal = vi.fn<ILogger['fatal']>()

  child(): ILogger {
    return this
  }
}

export function okResult(html: string): FetchResult {
  return { ok: true, url: 'https://p2000.test/utrecht/', statusCode: 200, html, durationMs: 12 }
}

export function failedResult(error: FetchError): FetchResult {
  return { ok: false, url: 'https://p2000.test/utrecht/', error, durationMs: 12 }
}

export function stubFetcher() {
  const fetch = vi.fn<Fetcher['fetch']>()
  const fetcher: Fetcher = { fetch }
  return { fetcher, fetch }
}

export function makeRecord(overrides: Partial<MessageRecord> = {}): MessageRecord {
  return {
    priorityCode: 'A1',
    timestamp: new Date('2025-04-06T12:55:01.000Z'),
    region: 'Utrecht',
    location: 'Utrecht',
    description: 'A1 Ambulance 17124 Damstraat Utrecht',
    serviceType: 'Ambulance',
    ...overrides,
  }
}
