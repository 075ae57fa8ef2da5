/**
 * JSON-safe dump of one region instance: its configuration and coordinator state.
 */

import type { RegionConfig } from '../config/settings.js'
import type { RegionCoordinator } from './coordinator.js'
import { describePollError } from './errors.js'
import type { CoordinatorPhase, MessageRecord, UpdateStatus } from './types.js'
import { buildRegionUrl } from './utils/url.js'

export interface SerializedMessage extends Omit<MessageRecord, 'timestamp'> {
  timestamp: string
}

export interface RegionDiagnostics {
  config: RegionConfig
  coordinator: {
    regionPath: string
    url: string
    scanIntervalSeconds: number
    phase: CoordinatorPhase
    lastUpdateStatus: UpdateStatus
    lastUpdateAttempt: string | null
    lastSuccessfulUpdate: string | null
    consecutiveErrors: number
    pollCount: number
    skippedTicks: number
    lastError: {
      stage: string
      reason: string
      message: string
      statusCode: number | null
      at: string
      summary: string
    } | null
    matchesFilter: boolean
    lastMessage: SerializedMessage | null
  }
}

export function serializeMessage(record: MessageRecord): SerializedMessage {
  return { ...record, timestamp: record.timestamp.toISOString() }
}

export function buildDiagnostics(coordinator: RegionCoordinator, options: { baseUrl: string }): RegionDiagnostics {
  const region = coordinator.region
  const state = coordinator.getState()
  const error = state.lastError

  return {
    config: {
      ...region,
      enabledSensors: [...region.enabledSensors],
      serviceTypeFilters: [...region.serviceTypeFilters],
    },
    coordinator: {
      regionPath: region.regionPath,
      url: buildRegionUrl(options.baseUrl, region.regionPath),
      scanIntervalSeconds: region.scanIntervalSeconds,
      phase: state.phase,
      lastUpdateStatus: state.lastUpdateStatus,
      lastUpdateAttempt: state.lastUpdateAttempt?.toISOString() ?? null,
      lastSuccessfulUpdate: state.lastSuccessfulUpdate?.toISOString() ?? null,
      consecutiveErrors: state.consecutiveErrors,
      pollCount: state.pollCount,
      skippedTicks: state.skippedTicks,
      lastError: error
        ? {
            stage: error.stage,
            reason: error.reason,
            message: error.message,
            statusCode: error.statusCode ?? null,
            at: error.at.toISOString(),
            summary: describePollError(error),
          }
        : null,
      matchesFilter: state.matchesFilter,
      lastMessage: state.lastMessage ? serializeMessage(state.lastMessage) : null,
    },
  }
}
