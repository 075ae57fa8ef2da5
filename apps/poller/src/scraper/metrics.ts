/**
 * Poll metrics
 *
 * No metrics backend; every poll outcome is a structured log event that log
 * shipping can count and alert on.
 */

import { loggers } from '../config/logger.js'
import type { PollError, ServiceType } from './types.js'

const log = loggers.metrics

export interface PollCompletedPayload {
  regionPath: string
  instanceName: string
  durationMs: number
  recordCount: number
  blockCount: number
  anomalyCount: number
  matched: boolean
  priorityCode: string | null
  serviceType: ServiceType | null
}

export interface PollFailedPayload {
  regionPath: string
  instanceName: string
  durationMs: number
  consecutiveErrors: number
  error: PollError
}

export function recordPollCompleted(payload: PollCompletedPayload): void {
  log.info('POLL_COMPLETED', {
    event_name: 'POLL_COMPLETED',
    ...payload,
  })
}

export function recordPollFailed(payload: PollFailedPayload): void {
  const { error, ...rest } = payload
  log.error('POLL_FAILED', {
    event_name: 'POLL_FAILED',
    ...rest,
    stage: error.stage,
    reason: error.reason,
    statusCode: error.statusCode,
    errorMessage: error.message,
  })
}

/**
 * Emitted once per outage, when the consecutive error count reaches the threshold.
 */
export function recordConsecutiveErrorsAlert(payload: {
  regionPath: string
  instanceName: string
  consecutiveErrors: number
  threshold: number
  lastSuccessfulUpdate: Date | null
}): void {
  log.warn('POLL_ALERT_CONSECUTIVE_ERRORS', {
    event_name: 'POLL_ALERT_CONSECUTIVE_ERRORS',
    ...payload,
  })
}

export function recordPollRecovered(payload: {
  regionPath: string
  instanceName: string
  failedPolls: number
}): void {
  log.info('POLL_RECOVERED', {
    event_name: 'POLL_RECOVERED',
    ...payload,
  })
}
