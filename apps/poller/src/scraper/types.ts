/**
 * Poller Core Types
 *
 * Message records, fetch/parse results and coordinator state for the
 * fetch → parse → classify → select → publish pipeline.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Service Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Emergency service a message is addressed to.
 * Assigned by keyword classification of the message text; `Other` when nothing matches.
 */
export type ServiceType = 'Ambulance' | 'Fire' | 'Police' | 'Other'

/**
 * Fixed classification priority. When keywords of several groups occur in one
 * message, the group listed first wins.
 */
export const SERVICE_TYPE_PRIORITY = ['Ambulance', 'Fire', 'Police', 'Other'] as const satisfies readonly ServiceType[]

// ═══════════════════════════════════════════════════════════════════════════════
// MessageRecord
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One emergency message as listed on a region page.
 */
export interface MessageRecord {
  /** Priority code as shown by the source, e.g. "A1", "P 2" */
  priorityCode: string

  /** Wall-clock time of the message, interpreted in the source time zone */
  timestamp: Date

  /** Safety region the message was routed through */
  region: string

  /** Town or area */
  location: string

  street?: string

  postalCode?: string

  /** Full message body */
  description: string

  latitude?: number

  longitude?: number

  serviceType: ServiceType

  /** Relative time text as displayed ("3 minuten geleden") */
  relativeTime?: string

  /** Absolute time text the timestamp was parsed from */
  absoluteTime?: string
}

/**
 * Record fields that can be exposed as attributes.
 */
export const MESSAGE_FIELDS = [
  'priorityCode',
  'timestamp',
  'region',
  'location',
  'street',
  'postalCode',
  'description',
  'latitude',
  'longitude',
  'serviceType',
  'relativeTime',
  'absoluteTime',
] as const satisfies readonly (keyof MessageRecord)[]

export type MessageField = (typeof MESSAGE_FIELDS)[number]

/**
 * Fields a block must yield to become a record.
 */
export type RequiredField = 'priorityCode' | 'timestamp' | 'region' | 'location' | 'description'

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch
// ═══════════════════════════════════════════════════════════════════════════════

export type FetchError =
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'http_status'; statusCode: number; statusText?: string }
  | { kind: 'network'; message: string }
  | { kind: 'empty_body'; statusCode: number }
  | { kind: 'invalid_region_path' }

export type FetchResult =
  | { ok: true; url: string; statusCode: number; html: string; durationMs: number }
  | { ok: false; url?: string; error: FetchError; durationMs: number }

export interface FetchOptions {
  /** Overrides the fetcher's default timeout */
  timeoutMs?: number

  /** Cancels the request when aborted (shutdown) */
  signal?: AbortSignal
}

/**
 * Retrieves the listing page of one region. Single attempt, never throws.
 */
export interface Fetcher {
  fetch(regionPath: string, options?: FetchOptions): Promise<FetchResult>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parse
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Per-block imperfection. Recorded and logged, never fails a poll.
 */
export type SoftAnomaly =
  | { kind: 'missing_required_field'; index: number; field: RequiredField }
  | { kind: 'malformed_coordinate'; index: number; field: 'latitude' | 'longitude'; raw: string }

export type ParseResult =
  | { ok: true; records: MessageRecord[]; anomalies: SoftAnomaly[]; blockCount: number }
  | { ok: false; reason: 'STRUCTURE_CHANGED'; details: string; anomalies: SoftAnomaly[]; blockCount: number }

// ═══════════════════════════════════════════════════════════════════════════════
// Select
// ═══════════════════════════════════════════════════════════════════════════════

export interface Selection {
  record: MessageRecord | null
  /** Whether `record` satisfies the enabled service types */
  matched: boolean
}

// ═══════════════════════════════════════════════════════════════════════════════
// Coordinator
// ═══════════════════════════════════════════════════════════════════════════════

export type CoordinatorPhase = 'idle' | 'fetching' | 'parsing' | 'selecting' | 'published' | 'failed'

export type PollStage = 'fetch' | 'parse' | 'select'

export type UpdateStatus = 'ok' | 'error'

export type PollErrorReason = FetchError['kind'] | 'STRUCTURE_CHANGED' | 'unexpected'

export interface PollError {
  stage: PollStage
  reason: PollErrorReason
  message: string
  statusCode?: number
  at: Date
}

/**
 * State of one region instance. Owned by its coordinator; never shared.
 */
export interface CoordinatorState {
  phase: CoordinatorPhase
  lastMessage: MessageRecord | null
  matchesFilter: boolean
  lastUpdateAttempt: Date | null
  lastUpdateStatus: UpdateStatus
  lastSuccessfulUpdate: Date | null
  consecutiveErrors: number
  lastError: PollError | null
  pollCount: number
  skippedTicks: number
}

export type CoordinatorListener = (state: Readonly<CoordinatorState>) => void
