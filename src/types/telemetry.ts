/** JSON-compatible value carried in an event payload. */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/** Kinds of events produced by the metrics collector. */
export type TelemetryEventKind = 'MEASUREMENT' | 'ALERT';

/** Structured event shipped to the remote ingestion service. Frozen once created. */
export interface TelemetryEvent {
    readonly id: string;
    readonly channel: string;
    readonly kind: TelemetryEventKind;
    /** ISO-8601 creation instant. */
    readonly timestamp: string;
    readonly payload: Readonly<Record<string, JsonValue>>;
}

/** A backlog entry: an event that has not (yet) been confirmed by the remote. */
export interface LocalRecord {
    event: TelemetryEvent;
    synced: boolean;
    attemptCount: number;
}

/** On-disk shape of one backlog line. Field names are part of the file format. */
export interface BacklogLine {
    id: string;
    channel: string;
    kind: TelemetryEventKind;
    timestamp: string;
    payload: Record<string, JsonValue>;
    synced: boolean;
    attempt_count: number;
}

/** One line of the sync journal. */
export interface JournalLine {
    op: 'synced' | 'attempt';
    id: string;
    at: string;
}

/** One line of the dead-letter file. */
export interface DeadLetterLine extends BacklogLine {
    reason: string;
    dead_lettered_at: string;
}

/** Circuit breaker states. */
export type CircuitState = 'closed' | 'open' | 'half-open';

/** Read-only view of the breaker, used by health reporting. */
export interface CircuitSnapshot {
    state: CircuitState;
    failureCount: number;
    lastFailureAt: string | null;
    openedAt: string | null;
    cooldownMs: number;
    remainingCooldownMs: number;
    trialInFlight: boolean;
}

export interface CircuitTransition {
    previousState: CircuitState;
    newState: CircuitState;
    reason: string;
    at: string;
}

export type CircuitTransitionListener = (transition: CircuitTransition) => void;

/** Classified failure kinds of the remote ingestion call. */
export type IngestErrorKind = 'network' | 'timeout' | 'server' | 'rate_limit' | 'auth' | 'validation';

/** Why an event ended up in the local backlog instead of the remote. */
export type QueueReason = 'circuit_open' | 'retries_exhausted' | 'rate_limited' | 'auth_blocked' | 'shutting_down';

/** Result of {@link TelemetryClient.send}. */
export type SendOutcome =
    | { status: 'delivered'; attempts: number }
    | { status: 'queued'; reason: QueueReason; attempts: number }
    | { status: 'rejected'; error: string; kind: IngestErrorKind; attempts: number };

/** Why a resync cycle ended. */
export type ResyncStopReason = 'drained' | 'remote_failure' | 'circuit_open' | 'auth_blocked' | 'shutting_down';

export interface ResyncReport {
    delivered: number;
    deadLettered: number;
    remaining: number;
    stoppedBy: ResyncStopReason;
    durationMs: number;
}

export interface HealthCheckResult {
    status: 'healthy' | 'unhealthy';
    latencyMs: number;
    error?: string;
    circuit: CircuitSnapshot;
    version: string;
    apiVersion: string;
}

/** Backlog rotation policy modes. */
export type RotationMode = 'daily' | 'size' | 'daily-or-size';

export interface RotationSettings {
    mode: RotationMode;
    /** Size threshold in bytes for `size` and `daily-or-size`. */
    maxBytes: number;
}

/** Options consumed by the telemetry core, resolved from configuration. */
export interface TelemetryOptions {
    remoteTimeoutMs: number;
    breakerFailureThreshold: number;
    breakerCooldownMs: number;
    breakerMaxCooldownMs: number;
    breakerFailureWindowMs: number;
    retryBaseDelayMs: number;
    retryMaxAttempts: number;
    retryMaxDelayMs: number;
    retryJitterRatio: number;
    resyncCron: string;
    rotation: RotationSettings;
}

/** Per-channel response-time statistics. */
export interface ChannelStats {
    average: number;
    min: number;
    max: number;
    count: number;
    slaViolations: number;
}
