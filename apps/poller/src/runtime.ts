/**
 * Poller runtime
 *
 * One coordinator per configured region, all sharing one fetcher.
 * Regions share no state; a failing region never affects the others.
 */

import type { ILogger } from '@p2000-monitor/logger'
import { loggers } from './config/logger.js'
import type { PollerSettings } from './config/settings.js'
import { isSameMessage, RegionCoordinator } from './scraper/coordinator.js'
import { HttpFetcher } from './scraper/fetch/http-fetcher.js'
import { toPublishedState } from './scraper/publish.js'
import type { Fetcher, MessageRecord } from './scraper/types.js'

export interface PollerRuntime {
  coordinators: RegionCoordinator[]
  /** Resolves once every region finished its first poll */
  ready: Promise<void>
  stop(): Promise<void>
}

export interface PollerDependencies {
  fetcher?: Fetcher
  logger?: ILogger
  now?: () => Date
}

/**
 * Log a region's message whenever it changes. This is the point where an
 * entity layer would push the published state.
 */
function watchRegion(coordinator: RegionCoordinator, log: ILogger): void {
  let current: MessageRecord | null = null

  coordinator.onUpdate((state) => {
    const record = state.lastMessage
    if (!record || (current && isSameMessage(current, record))) {
      return
    }
    current = record

    const published = toPublishedState(coordinator.region, state)
    log.info('REGION_MESSAGE_PUBLISHED', {
      regionPath: published.regionPath,
      instanceName: published.instanceName,
      state: published.state,
      serviceType: record.serviceType,
      matchesFilter: state.matchesFilter,
      timestamp: record.timestamp,
    })
  })
}

export function startPoller(settings: PollerSettings, deps: PollerDependencies = {}): PollerRuntime {
  const log = deps.logger ?? loggers.worker
  const fetcher =
    deps.fetcher ?? new HttpFetcher({ baseUrl: settings.baseUrl, timeoutMs: settings.fetchTimeoutMs })

  const coordinators = settings.regions.map(
    (region) =>
      new RegionCoordinator({
        region,
        fetcher,
        fetchTimeoutMs: settings.fetchTimeoutMs,
        errorAlertThreshold: settings.errorAlertThreshold,
        now: deps.now,
      })
  )

  for (const coordinator of coordinators) {
    watchRegion(coordinator, log)
  }

  log.info('POLLER_STARTING', {
    baseUrl: settings.baseUrl,
    regions: settings.regions.map((region) => region.regionPath),
  })

  const ready = Promise.all(coordinators.map((coordinator) => coordinator.start())).then(() => undefined)

  return {
    coordinators,
    ready,
    async stop() {
      await Promise.all(coordinators.map((coordinator) => coordinator.stop()))
      log.info('POLLER_STOPPED', { regions: coordinators.length })
    },
  }
}

/**
 * Start the poller and stop it gracefully on SIGINT/SIGTERM.
 */
export function runUntilSignal(settings: PollerSettings, log: ILogger = loggers.worker): PollerRuntime {
  const runtime = startPoller(settings, { logger: log })

  runtime.ready
    .then(() => log.info('POLLER_READY', { regions: runtime.coordinators.length }))
    .catch((error: unknown) => log.error('POLLER_FIRST_POLL_FAILED', {}, error))

  // Track if shutdown is in progress to prevent double-shutdown
  let isShuttingDown = false

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      log.warn('SHUTDOWN_ALREADY_IN_PROGRESS', { signal })
      return
    }
    isShuttingDown = true

    log.info('SHUTDOWN_STARTED', { signal })
    const shutdownStart = Date.now()

    try {
      await runtime.stop()
      log.info('SHUTDOWN_COMPLETE', { durationMs: Date.now() - shutdownStart })
      process.exit(0)
    } catch (error) {
      log.error('SHUTDOWN_FAILED', {}, error)
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))

  return runtime
}
