import type { IngestErrorKind } from './telemetry.js';

export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'info';

/** Base class for failures raised by the telemetry pipeline. */
export class TelemetryError extends Error {
    readonly severity: ErrorSeverity;

    constructor(message: string, severity: ErrorSeverity) {
        super(message);
        this.name = 'TelemetryError';
        this.severity = severity;
    }
}

const RETRIABLE_KINDS: ReadonlySet<IngestErrorKind> = new Set(['network', 'timeout', 'server', 'rate_limit']);

/** A classified failure of the remote ingestion call. */
export class IngestError extends TelemetryError {
    readonly kind: IngestErrorKind;
    readonly retriable: boolean;
    readonly status: number | null;
    /** Server-provided back-off hint for `rate_limit`, when present. */
    readonly retryAfterMs: number | null;

    constructor(kind: IngestErrorKind, message: string, options: { status?: number; retryAfterMs?: number | null } = {}) {
        super(message, kind === 'auth' ? 'critical' : 'error');
        this.name = 'IngestError';
        this.kind = kind;
        this.retriable = RETRIABLE_KINDS.has(kind);
        this.status = options.status ?? null;
        this.retryAfterMs = options.retryAfterMs ?? null;
    }
}

/** The local backlog could not persist a record. Always critical. */
export class LocalStorageError extends TelemetryError {
    readonly path: string;

    constructor(message: string, path: string) {
        super(message, 'critical');
        this.name = 'LocalStorageError';
        this.path = path;
    }
}

/** Normalize anything thrown by a transport into an {@link IngestError}. */
export function toIngestError(err: unknown): IngestError {
    if (err instanceof IngestError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new IngestError('network', message);
}
