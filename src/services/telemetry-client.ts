import type {
    CircuitTransition,
    HealthCheckResult,
    LocalRecord,
    QueueReason,
    ResyncReport,
    ResyncStopReason,
    SendOutcome,
    TelemetryEvent,
} from '../types/telemetry.js';
import { IngestError, LocalStorageError, toIngestError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import { RetryPolicy, sleep, withRetry } from '../utils/retry.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import { DeliveryTracker } from './delivery-tracker.js';
import { CLIENT_VERSION, INGEST_API_VERSION, type IngestTransport } from './ingest-transport.js';
import type { JobScheduler } from './job-scheduler.js';
import type { LocalStore } from './local-store.js';
import { createTelemetryEvent } from './telemetry-event.js';

export interface TelemetryClientDeps {
    transport: IngestTransport;
    breaker: CircuitBreaker;
    store: LocalStore;
    retryPolicy?: RetryPolicy;
    scheduler?: JobScheduler;
    tracker?: DeliveryTracker;
}

export interface TelemetryClientOptions {
    /** Per-attempt bound on the remote call. @default 5000 */
    remoteTimeoutMs?: number;
    /** Cron expression for the periodic resync. @default every 30 seconds */
    resyncCron?: string;
    /** Attempts at writing a record locally before giving up. @default 3 */
    storageRetryAttempts?: number;
    /** Base delay between local write attempts. @default 100 */
    storageRetryDelayMs?: number;
}

export const RESYNC_JOB_ID = 'backlog-resync';

const DEFAULTS = {
    remoteTimeoutMs: 5_000,
    resyncCron: '*/30 * * * * *',
    storageRetryAttempts: 3,
    storageRetryDelayMs: 100,
};

type AttemptResult = { ok: true } | { ok: false; error: IngestError };

type BlockReason = Extract<QueueReason, 'circuit_open' | 'auth_blocked' | 'shutting_down'>;

/**
 * Ships events to the remote ingestion service.
 *
 * `send` tries the remote under the circuit breaker and retry policy and
 * falls back to the local backlog when the remote is unavailable; that
 * fallback is a normal outcome, never an exception. `resync` drains the
 * backlog in stored order once the remote is healthy again, on a timer and
 * right after the breaker closes.
 *
 * The only error `send` lets through is {@link LocalStorageError}: the
 * backlog is the last copy of the event.
 */
export class TelemetryClient {
    readonly #transport: IngestTransport;
    readonly #breaker: CircuitBreaker;
    readonly #store: LocalStore;
    readonly #retryPolicy: RetryPolicy;
    readonly #scheduler: JobScheduler | undefined;
    readonly #tracker: DeliveryTracker;
    readonly #remoteTimeoutMs: number;
    readonly #resyncCron: string;
    readonly #storageRetryAttempts: number;
    readonly #storageRetryDelayMs: number;
    readonly #inFlight: Set<Promise<SendOutcome>> = new Set();
    readonly #shutdownController = new AbortController();
    readonly #unsubscribeBreaker: () => void;

    #resyncRun: Promise<ResyncReport> | null = null;
    #authBlock: string | null = null;

    constructor(deps: TelemetryClientDeps, options: TelemetryClientOptions = {}) {
        this.#transport = deps.transport;
        this.#breaker = deps.breaker;
        this.#store = deps.store;
        this.#retryPolicy = deps.retryPolicy ?? new RetryPolicy();
        this.#scheduler = deps.scheduler;
        this.#tracker = deps.tracker ?? new DeliveryTracker();
        this.#remoteTimeoutMs = Math.max(1, options.remoteTimeoutMs ?? DEFAULTS.remoteTimeoutMs);
        this.#resyncCron = options.resyncCron ?? DEFAULTS.resyncCron;
        this.#storageRetryAttempts = Math.max(1, options.storageRetryAttempts ?? DEFAULTS.storageRetryAttempts);
        this.#storageRetryDelayMs = Math.max(0, options.storageRetryDelayMs ?? DEFAULTS.storageRetryDelayMs);

        this.#unsubscribeBreaker = this.#breaker.onTransition((transition) => {
            this.#onBreakerTransition(transition);
        });
    }

    get tracker(): DeliveryTracker {
        return this.#tracker;
    }

    get store(): LocalStore {
        return this.#store;
    }

    get breaker(): CircuitBreaker {
        return this.#breaker;
    }

    get shuttingDown(): boolean {
        return this.#shutdownController.signal.aborted;
    }

    /** The auth error that stopped remote delivery, or null. */
    get authBlock(): string | null {
        return this.#authBlock;
    }

    /**
     * Resume remote delivery. Called once the remote accepts the credentials
     * again: a passing health check, or the first record of a resync while blocked.
     */
    clearAuthBlock(): void {
        if (this.#authBlock === null) return;
        this.#authBlock = null;
        void logThought('[TelemetryClient] Auth block cleared; remote delivery resumed.');
    }

    /** Register the periodic resync with the scheduler. */
    start(): void {
        if (!this.#scheduler || this.#scheduler.getJob(RESYNC_JOB_ID)) return;

        this.#scheduler.register({
            id: RESYNC_JOB_ID,
            cronExpression: this.#resyncCron,
            description: 'Drain the local backlog to the remote ingestion service',
            handler: async () => {
                await this.resync();
            },
            autoStart: true,
        });
    }

    /** Deliver one event, or keep it in the local backlog. */
    send(event: TelemetryEvent): Promise<SendOutcome> {
        const run = this.#send(event);
        this.#inFlight.add(run);
        const forget = (): void => {
            this.#inFlight.delete(run);
        };
        run.then(forget, forget);
        return run;
    }

    /**
     * Push unsynced backlog records to the remote, oldest first, one attempt
     * each. Stops at the first retriable failure so order is preserved.
     * Concurrent calls share one cycle.
     */
    resync(): Promise<ResyncReport> {
        if (this.#resyncRun) return this.#resyncRun;

        const run = this.#resync().finally(() => {
            this.#resyncRun = null;
        });
        this.#resyncRun = run;
        return run;
    }

    /** Check the remote with a synthetic event that is never stored. */
    async healthCheck(): Promise<HealthCheckResult> {
        const check = createTelemetryEvent({
            channel: 'health',
            kind: 'MEASUREMENT',
            payload: { healthCheck: true },
        });
        const startedAt = Date.now();
        const result = await this.#attemptRemote(check);
        const latencyMs = Date.now() - startedAt;
        if (result.ok) {
            this.clearAuthBlock();
        }

        return {
            status: result.ok ? 'healthy' : 'unhealthy',
            latencyMs,
            ...(result.ok ? {} : { error: result.error.message }),
            circuit: this.#breaker.snapshot(),
            version: CLIENT_VERSION,
            apiVersion: INGEST_API_VERSION,
        };
    }

    /**
     * Stop the resync timer, cut pending backoff sleeps short, and wait until
     * every in-flight send has been delivered or written to the backlog.
     */
    async shutdown(): Promise<void> {
        if (!this.shuttingDown) {
            this.#shutdownController.abort();
            void logThought(`[TelemetryClient] Shutting down; waiting for ${this.#inFlight.size} in-flight send(s).`);
        }

        if (this.#scheduler?.getJob(RESYNC_JOB_ID)) {
            this.#scheduler.unregister(RESYNC_JOB_ID);
        }
        this.#unsubscribeBreaker();

        await Promise.allSettled([...this.#inFlight]);
        if (this.#resyncRun) {
            await this.#resyncRun.catch((err: unknown) => {
                void logThought(`[TelemetryClient] Resync failed during shutdown: ${String(err)}`, 'error');
            });
        }
    }

    // ── Send path ────────────────────────────────────────────────────────────

    async #send(event: TelemetryEvent): Promise<SendOutcome> {
        this.#tracker.createRecord(event.id, event.channel);

        const blocked = this.#blockedReason();
        if (blocked) {
            return this.#queue(event, blocked, 0);
        }

        const totalAttempts = this.#retryPolicy.maxAttempts() + 1;
        for (let attempt = 1; attempt <= totalAttempts; attempt++) {
            if (attempt > 1) {
                const stillBlocked = this.#blockedReason();
                if (stillBlocked) {
                    return this.#queue(event, stillBlocked, attempt - 1);
                }
            }

            this.#tracker.recordAttemptStart(event.id);
            const result = await this.#attemptRemote(event);

            if (result.ok) {
                this.#breaker.recordSuccess();
                this.#tracker.markDelivered(event.id);
                return { status: 'delivered', attempts: attempt };
            }

            const { error } = result;
            this.#tracker.recordFailure(event.id, error.message);

            if (!error.retriable) {
                // The remote answered; that settles a half-open trial.
                this.#breaker.recordSuccess();
                return this.#reject(event, error, attempt);
            }

            this.#breaker.recordFailure(error.message);
            void logThought(
                `[TelemetryClient] Attempt ${attempt}/${totalAttempts} for event ${event.id} (${event.channel}) failed: [${error.kind}] ${error.message}`,
                'warn',
            );

            if (attempt < totalAttempts && !this.shuttingDown) {
                const hint = error.retryAfterMs ?? 0;
                if (hint > this.#retryPolicy.maxDelayMs()) {
                    void logThought(
                        `[TelemetryClient] Remote asked to wait ${hint}ms before retrying event ${event.id}; above the ${this.#retryPolicy.maxDelayMs()}ms cap, leaving it to resync.`,
                        'warn',
                    );
                    return this.#queue(event, 'rate_limited', attempt);
                }
                await sleep(Math.max(this.#retryPolicy.nextDelay(attempt), hint), this.#shutdownController.signal);
            }
        }

        return this.#queue(event, this.shuttingDown ? 'shutting_down' : 'retries_exhausted', totalAttempts);
    }

    /**
     * Allow check before every try. Note that `breaker.allow()` consumes the
     * half-open trial slot, so it is the last condition evaluated. An auth
     * trial lets one resync attempt through a standing auth block.
     */
    #blockedReason(authTrial = false): BlockReason | null {
        if (this.shuttingDown) return 'shutting_down';
        if (this.#authBlock !== null && !authTrial) return 'auth_blocked';
        if (!this.#breaker.allow()) return 'circuit_open';
        return null;
    }

    async #reject(event: TelemetryEvent, error: IngestError, attempts: number): Promise<SendOutcome> {
        if (error.kind === 'auth') {
            this.#enterAuthBlock(error);
            await this.#persist({ event, synced: false, attemptCount: attempts });
        } else {
            await this.#store.deadLetter(event, error.message, attempts);
        }

        this.#tracker.markRejected(event.id, error.message);
        return { status: 'rejected', error: error.message, kind: error.kind, attempts };
    }

    async #queue(event: TelemetryEvent, reason: QueueReason, attempts: number): Promise<SendOutcome> {
        await this.#persist({ event, synced: false, attemptCount: attempts });
        this.#tracker.markQueued(event.id, reason);
        void logThought(`[TelemetryClient] Event ${event.id} (${event.channel}) queued locally: ${reason}.`);
        return { status: 'queued', reason, attempts };
    }

    /** Write to the backlog, retrying a few times before surfacing the failure. */
    async #persist(record: LocalRecord): Promise<void> {
        const result = await withRetry(() => this.#store.append(record), {
            maxAttempts: this.#storageRetryAttempts,
            baseDelayMs: this.#storageRetryDelayMs,
            label: `backlog:append:${record.event.id}`,
        });
        if (result.ok) return;

        const message = `Event ${record.event.id} (${record.event.channel}) DROPPED: local backlog unavailable after ${result.attempts} attempt(s): ${result.error ?? 'unknown error'}`;
        await logThought(`[TelemetryClient] ${message}`, 'critical');
        throw result.cause instanceof LocalStorageError
            ? result.cause
            : new LocalStorageError(message, this.#store.directory);
    }

    async #attemptRemote(event: TelemetryEvent): Promise<AttemptResult> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.#remoteTimeoutMs);
        const timedOut = new Promise<never>((_resolve, reject) => {
            controller.signal.addEventListener(
                'abort',
                () => reject(new IngestError('timeout', `No ack within ${this.#remoteTimeoutMs}ms.`)),
                { once: true },
            );
        });
        // Settled by the race only; a late abort must not surface as unhandled.
        timedOut.catch(() => undefined);

        try {
            await Promise.race([this.#transport.ingest(event, controller.signal), timedOut]);
            return { ok: true };
        } catch (err) {
            return { ok: false, error: toIngestError(err) };
        } finally {
            clearTimeout(timer);
        }
    }

    #enterAuthBlock(error: IngestError): void {
        if (this.#authBlock !== null) return;
        this.#authBlock = error.message;
        void logThought(
            `[TelemetryClient] Remote rejected credentials (${error.message}). Remote delivery paused; events stay in the local backlog until the token is fixed.`,
            'critical',
        );
    }

    // ── Resync path ──────────────────────────────────────────────────────────

    async #resync(): Promise<ResyncReport> {
        const startedAt = Date.now();
        let delivered = 0;
        let deadLettered = 0;
        let stoppedBy: ResyncStopReason = 'drained';
        // While auth is blocked the first backlog record doubles as the credential check.
        let authTrial = this.#authBlock !== null;

        for await (const record of this.#store.scanUnsynced()) {
            const blocked = this.#blockedReason(authTrial);
            if (blocked) {
                stoppedBy = blocked;
                break;
            }

            const result = await this.#attemptRemote(record.event);
            if (authTrial && (result.ok || result.error.kind !== 'auth')) {
                this.clearAuthBlock();
            }
            authTrial = false;

            if (result.ok) {
                this.#breaker.recordSuccess();
                await this.#store.markSynced(record.event.id);
                this.#tracker.markResynced(record.event.id, record.event.channel);
                delivered += 1;
                continue;
            }

            const { error } = result;
            if (error.kind === 'validation') {
                this.#breaker.recordSuccess();
                await this.#store.deadLetter(record.event, error.message, record.attemptCount + 1);
                await this.#store.markSynced(record.event.id);
                deadLettered += 1;
                continue;
            }

            if (error.kind === 'auth') {
                this.#breaker.recordSuccess();
                this.#enterAuthBlock(error);
                stoppedBy = 'auth_blocked';
                break;
            }

            this.#breaker.recordFailure(error.message);
            await this.#store.recordAttempt(record.event.id);
            void logThought(
                `[TelemetryClient] Resync stopped at event ${record.event.id}: [${error.kind}] ${error.message}`,
                'warn',
            );
            stoppedBy = 'remote_failure';
            break;
        }

        const remaining = await this.#store.countUnsynced();
        if (remaining === 0 && delivered + deadLettered > 0) {
            await this.#store.compact();
        }

        const report: ResyncReport = {
            delivered,
            deadLettered,
            remaining,
            stoppedBy,
            durationMs: Date.now() - startedAt,
        };

        if (delivered > 0 || deadLettered > 0 || stoppedBy !== 'drained') {
            void logThought(
                `[TelemetryClient] Resync: ${delivered} delivered, ${deadLettered} dead-lettered, ${remaining} remaining (${stoppedBy}).`,
            );
        }
        return report;
    }

    #onBreakerTransition(transition: CircuitTransition): void {
        if (transition.newState !== 'closed' || this.shuttingDown) return;

        this.resync().catch((err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[TelemetryClient] Recovery resync failed: ${message}`, 'error');
        });
    }
}
