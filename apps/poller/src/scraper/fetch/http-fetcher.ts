/**
 * HTTP Fetcher
 *
 * Retrieves a region listing page with native fetch.
 * One attempt per call, bounded by a timeout. Retrying is the coordinator's
 * concern: the next scheduled poll is the retry.
 *
 * Failures are returned, never thrown:
 * - timeout: the request did not complete within timeoutMs
 * - http_status: non-2xx response
 * - network: DNS, connection reset, TLS, external abort
 * - empty_body: 2xx response with a blank body
 * - invalid_region_path: blank path, rejected before any request
 */

import type { ILogger } from '@p2000-monitor/logger'
import type { Fetcher, FetchOptions, FetchResult } from '../types.js'
import { buildRegionUrl, normalizeRegionPath } from '../utils/url.js'
import { DEFAULT_BASE_URL, DEFAULT_FETCH_TIMEOUT_MS } from '../../config/settings.js'
import { loggers } from '../../config/logger.js'

export const DEFAULT_USER_AGENT = 'p2000-monitor/0.1 (+region message poller)'

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'nl-NL,nl;q=0.9,en;q=0.5',
}

export interface HttpFetcherOptions {
  baseUrl?: string
  timeoutMs?: number
  userAgent?: string
  logger?: ILogger
}

export class HttpFetcher implements Fetcher {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly userAgent: string
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.log = options.logger ?? loggers.fetcher
  }

  urlFor(regionPath: string): string {
    return buildRegionUrl(this.baseUrl, regionPath)
  }

  async fetch(regionPath: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()

    if (!normalizeRegionPath(regionPath)) {
      return {
        ok: false,
        error: { kind: 'invalid_region_path' },
        durationMs: 0,
      }
    }

    const url = this.urlFor(regionPath)
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const controller = new AbortController()

    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)

    const onExternalAbort = () => controller.abort()
    if (options.signal?.aborted) {
      controller.abort()
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true })
    }

    this.log.debug('FETCH_REQUEST', { url, timeoutMs })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          ...DEFAULT_FETCH_HEADERS,
          'User-Agent': this.userAgent,
        },
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        return {
          ok: false,
          url,
          error: { kind: 'http_status', statusCode: response.status, statusText: response.statusText || undefined },
          durationMs: Date.now() - startTime,
        }
      }

      const html = await response.text()
      if (html.trim() === '') {
        return {
          ok: false,
          url,
          error: { kind: 'empty_body', statusCode: response.status },
          durationMs: Date.now() - startTime,
        }
      }

      return {
        ok: true,
        url,
        statusCode: response.status,
        html,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (timedOut) {
        return {
          ok: false,
          url,
          error: { kind: 'timeout', timeoutMs },
          durationMs: Date.now() - startTime,
        }
      }

      return {
        ok: false,
        url,
        error: { kind: 'network', message: describeNetworkError(error) },
        durationMs: Date.now() - startTime,
      }
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', onExternalAbort)
    }
  }
}

/**
 * Undici reports transport failures as `TypeError: fetch failed` with the
 * actual reason on `cause`.
 */
function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error)
  }

  const cause: unknown = error.cause
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`
  }
  return error.message
}
