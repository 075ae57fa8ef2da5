/**
 * Region Coordinator
 *
 * Owns the poll schedule and the state of one region instance.
 *
 * Per poll: fetch → parse (classifies each record) → select → publish.
 * Phases: idle → fetching → parsing → selecting → published, or → failed from
 * whichever stage broke. The terminal phase stays visible until the next poll.
 *
 * Rules:
 * - never two polls at once; a tick that finds a poll in flight is skipped, not queued
 * - on failure the last published message stays (stale beats empty)
 * - consecutiveErrors counts failed polls since the last success; no backoff
 * - poll errors are recorded in state and logged, never thrown to callers
 * - a poll cancelled by stop() leaves status and error counts as they were
 */

import type { ILogger } from '@p2000-monitor/logger'
import { loggers } from '../config/logger.js'
import { DEFAULT_ERROR_ALERT_THRESHOLD } from '../config/settings.js'
import type { RegionConfig } from '../config/settings.js'
import { describePollError, fromFetchError, fromStructureChanged, fromUnexpected } from './errors.js'
import { selectMessage } from './filter.js'
import { recordConsecutiveErrorsAlert, recordPollCompleted, recordPollFailed, recordPollRecovered } from './metrics.js'
import { parseMessages } from './parse/message-parser.js'
import type {
  CoordinatorListener,
  CoordinatorPhase,
  CoordinatorState,
  Fetcher,
  MessageRecord,
  PollError,
  PollStage,
  Selection,
} from './types.js'

export interface RegionCoordinatorOptions {
  region: RegionConfig
  fetcher: Fetcher
  /** Per-request timeout; falls back to the fetcher's default */
  fetchTimeoutMs?: number
  /** consecutiveErrors value at which an alert event is logged */
  errorAlertThreshold?: number
  logger?: ILogger
  now?: () => Date
}

type PollOutcome =
  | { ok: true; selection: Selection; recordCount: number; blockCount: number; anomalyCount: number }
  | { ok: false; error: PollError }

export function createInitialState(): CoordinatorState {
  return {
    phase: 'idle',
    lastMessage: null,
    matchesFilter: false,
    lastUpdateAttempt: null,
    lastUpdateStatus: 'ok',
    lastSuccessfulUpdate: null,
    consecutiveErrors: 0,
    lastError: null,
    pollCount: 0,
    skippedTicks: 0,
  }
}

function copyDate(date: Date): Date {
  return new Date(date.getTime())
}

export function isSameMessage(a: MessageRecord, b: MessageRecord): boolean {
  return (
    a.priorityCode === b.priorityCode &&
    a.timestamp.getTime() === b.timestamp.getTime() &&
    a.description === b.description
  )
}

export class RegionCoordinator {
  readonly region: RegionConfig

  private readonly fetcher: Fetcher
  private readonly fetchTimeoutMs?: number
  private readonly errorAlertThreshold: number
  private readonly log: ILogger
  private readonly now: () => Date
  private readonly listeners = new Set<CoordinatorListener>()

  private state: CoordinatorState = createInitialState()
  private timer: NodeJS.Timeout | null = null
  private inFlight: Promise<Readonly<CoordinatorState>> | null = null
  private abortController: AbortController | null = null

  constructor(options: RegionCoordinatorOptions) {
    this.region = options.region
    this.fetcher = options.fetcher
    this.fetchTimeoutMs = options.fetchTimeoutMs
    this.errorAlertThreshold = options.errorAlertThreshold ?? DEFAULT_ERROR_ALERT_THRESHOLD
    this.now = options.now ?? (() => new Date())
    this.log =
      options.logger ??
      loggers.coordinator.child(options.region.regionPath, {
        regionPath: options.region.regionPath,
        instanceName: options.region.instanceName,
      })
  }

  get isRunning(): boolean {
    return this.timer !== null
  }

  get isPolling(): boolean {
    return this.inFlight !== null
  }

  /**
   * Start the schedule. Polls once right away and resolves with the state
   * after that first poll; later polls follow every scanIntervalSeconds.
   */
  start(): Promise<Readonly<CoordinatorState>> {
    if (this.timer) {
      this.log.warn('COORDINATOR_ALREADY_RUNNING')
      return this.inFlight ?? Promise.resolve(this.getState())
    }

    const intervalMs = this.region.scanIntervalSeconds * 1000
    this.timer = setInterval(() => this.tick(), intervalMs)

    this.log.info('COORDINATOR_STARTED', {
      scanIntervalSeconds: this.region.scanIntervalSeconds,
      serviceTypeFilters: this.region.serviceTypeFilters,
    })

    return this.poll()
  }

  /**
   * Stop the schedule, cancel an in-flight fetch and wait for that poll to settle.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }

    this.abortController?.abort()
    if (this.inFlight) {
      await this.inFlight
    }

    this.log.info('COORDINATOR_STOPPED', { pollCount: this.state.pollCount })
  }

  /**
   * Poll now. Joins the running poll instead of starting a second one.
   */
  poll(): Promise<Readonly<CoordinatorState>> {
    if (this.inFlight) {
      return this.inFlight
    }

    const run = this.runPoll().finally(() => {
      this.inFlight = null
    })
    this.inFlight = run
    return run
  }

  /**
   * Snapshot of the state. Records and dates are copies, so callers and
   * listeners cannot change what the coordinator holds.
   */
  getState(): Readonly<CoordinatorState> {
    const { lastMessage, lastError, lastUpdateAttempt, lastSuccessfulUpdate } = this.state
    return {
      ...this.state,
      lastMessage: lastMessage ? { ...lastMessage, timestamp: copyDate(lastMessage.timestamp) } : null,
      lastUpdateAttempt: lastUpdateAttempt && copyDate(lastUpdateAttempt),
      lastSuccessfulUpdate: lastSuccessfulUpdate && copyDate(lastSuccessfulUpdate),
      lastError: lastError ? { ...lastError, at: copyDate(lastError.at) } : null,
    }
  }

  /**
   * Called with a state snapshot after every poll. Returns an unsubscribe function.
   */
  onUpdate(listener: CoordinatorListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private tick(): void {
    if (this.inFlight) {
      this.state.skippedTicks += 1
      this.log.debug('POLL_TICK_SKIPPED', { skippedTicks: this.state.skippedTicks })
      return
    }

    void this.poll()
  }

  private async runPoll(): Promise<Readonly<CoordinatorState>> {
    const startedAt = Date.now()
    const controller = new AbortController()
    this.abortController = controller

    const previousPhase = this.state.phase
    this.state.lastUpdateAttempt = this.now()
    this.state.pollCount += 1

    try {
      const outcome = await this.execute(controller.signal)
      if (outcome.ok) {
        this.applySuccess(outcome, Date.now() - startedAt)
      } else if (controller.signal.aborted) {
        // Cancelled by stop(): not an upstream failure
        this.setPhase(previousPhase)
        this.log.info('POLL_CANCELLED', { stage: outcome.error.stage })
      } else {
        this.applyFailure(outcome.error, Date.now() - startedAt)
      }
    } finally {
      if (this.abortController === controller) {
        this.abortController = null
      }
    }

    const snapshot = this.getState()
    this.notify(snapshot)
    return snapshot
  }

  private async execute(signal: AbortSignal): Promise<PollOutcome> {
    let stage: PollStage = 'fetch'

    try {
      this.setPhase('fetching')
      const fetched = await this.fetcher.fetch(this.region.regionPath, {
        timeoutMs: this.fetchTimeoutMs,
        signal,
      })
      if (!fetched.ok) {
        return { ok: false, error: fromFetchError(fetched.error, this.now()) }
      }

      stage = 'parse'
      this.setPhase('parsing')
      const parsed = parseMessages(fetched.html, this.log)
      if (!parsed.ok) {
        return { ok: false, error: fromStructureChanged(parsed.details, this.now()) }
      }

      stage = 'select'
      this.setPhase('selecting')
      return {
        ok: true,
        selection: selectMessage(parsed.records, this.region.serviceTypeFilters),
        recordCount: parsed.records.length,
        blockCount: parsed.blockCount,
        anomalyCount: parsed.anomalies.length,
      }
    } catch (error) {
      this.log.error('POLL_UNEXPECTED_ERROR', { stage }, error)
      return { ok: false, error: fromUnexpected(stage, error, this.now()) }
    }
  }

  private applySuccess(outcome: Extract<PollOutcome, { ok: true }>, durationMs: number): void {
    const { record, matched } = outcome.selection
    const previous = this.state.lastMessage
    const failedPolls = this.state.consecutiveErrors

    if (record === null) {
      this.log.debug('POLL_NO_RECORDS')
    } else if (previous && record.timestamp.getTime() < previous.timestamp.getTime()) {
      // Published timestamps only move forward
      this.log.debug('POLL_OLDER_RECORD_IGNORED', {
        priorityCode: record.priorityCode,
        timestamp: record.timestamp,
        publishedTimestamp: previous.timestamp,
      })
    } else {
      if (previous && isSameMessage(previous, record)) {
        this.log.debug('POLL_MESSAGE_UNCHANGED', { priorityCode: record.priorityCode })
      }
      this.state.lastMessage = record
      this.state.matchesFilter = matched
    }

    this.state.lastSuccessfulUpdate = this.now()
    this.state.lastUpdateStatus = 'ok'
    this.state.consecutiveErrors = 0
    this.state.lastError = null
    this.setPhase('published')

    if (failedPolls > 0) {
      recordPollRecovered({
        regionPath: this.region.regionPath,
        instanceName: this.region.instanceName,
        failedPolls,
      })
    }

    recordPollCompleted({
      regionPath: this.region.regionPath,
      instanceName: this.region.instanceName,
      durationMs,
      recordCount: outcome.recordCount,
      blockCount: outcome.blockCount,
      anomalyCount: outcome.anomalyCount,
      matched: this.state.matchesFilter,
      priorityCode: this.state.lastMessage?.priorityCode ?? null,
      serviceType: this.state.lastMessage?.serviceType ?? null,
    })
  }

  private applyFailure(error: PollError, durationMs: number): void {
    this.state.lastUpdateStatus = 'error'
    this.state.consecutiveErrors += 1
    this.state.lastError = error
    this.setPhase('failed')

    this.log.debug('POLL_ERROR_RECORDED', { error: describePollError(error) })

    recordPollFailed({
      regionPath: this.region.regionPath,
      instanceName: this.region.instanceName,
      durationMs,
      consecutiveErrors: this.state.consecutiveErrors,
      error,
    })

    if (this.state.consecutiveErrors === this.errorAlertThreshold) {
      recordConsecutiveErrorsAlert({
        regionPath: this.region.regionPath,
        instanceName: this.region.instanceName,
        consecutiveErrors: this.state.consecutiveErrors,
        threshold: this.errorAlertThreshold,
        lastSuccessfulUpdate: this.state.lastSuccessfulUpdate,
      })
    }
  }

  private setPhase(phase: CoordinatorPhase): void {
    this.state.phase = phase
  }

  private notify(snapshot: Readonly<CoordinatorState>): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot)
      } catch (error) {
        this.log.error('COORDINATOR_LISTENER_FAILED', {}, error)
      }
    }
  }
}
