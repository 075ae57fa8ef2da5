/**
 * Poll error helpers
 *
 * Fetch and parse failures travel as values. These helpers turn them into
 * the PollError stored on coordinator state and into one-line messages.
 */

import type { FetchError, PollError, PollStage } from './types.js'

export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'timeout':
      return `Request timed out after ${error.timeoutMs}ms`
    case 'http_status':
      return error.statusText ? `HTTP ${error.statusCode}: ${error.statusText}` : `HTTP ${error.statusCode}`
    case 'network':
      return `Network error: ${error.message}`
    case 'empty_body':
      return `Empty response body (HTTP ${error.statusCode})`
    case 'invalid_region_path':
      return 'Region path is empty'
  }
}

export function fromFetchError(error: FetchError, at: Date): PollError {
  return {
    stage: 'fetch',
    reason: error.kind,
    message: describeFetchError(error),
    statusCode: error.kind === 'http_status' || error.kind === 'empty_body' ? error.statusCode : undefined,
    at,
  }
}

export function fromStructureChanged(details: string, at: Date): PollError {
  return {
    stage: 'parse',
    reason: 'STRUCTURE_CHANGED',
    message: `Page structure changed: ${details}`,
    at,
  }
}

export function fromUnexpected(stage: PollStage, error: unknown, at: Date): PollError {
  return {
    stage,
    reason: 'unexpected',
    message: error instanceof Error ? error.message : String(error),
    at,
  }
}

export function describePollError(error: PollError): string {
  const status = error.statusCode !== undefined ? ` [${error.statusCode}]` : ''
  return `${error.stage}/${error.reason}${status}: ${error.message}`
}
