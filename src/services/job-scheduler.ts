import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type {
    JobConfig,
    JobSnapshot,
    JobStatus,
    SchedulerEvent,
    SchedulerEventListener,
    SchedulerEventType,
} from '../types/scheduler.js';

/** Internal bookkeeping for a registered job. */
interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    inFlight: Promise<void> | null;
    skippedTicks: number;
    stopped: boolean;
}

/**
 * Background job scheduler for the monitoring session.
 *
 * Wraps `node-cron` to manage named, repeating jobs with event emission and
 * error isolation. A tick that arrives while the job's previous run is still
 * going is skipped rather than stacked, so a slow resync never overlaps itself.
 *
 * Usage:
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'backlog-resync',
 *   cronExpression: '*\/30 * * * * *',
 *   description: 'Drain the local backlog',
 *   handler: async () => { await client.resync(); },
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();

    /** Register a new repeating job. Throws if a job with the same ID already exists. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: null,
            status: 'idle',
            lastRunAt: null,
            lastError: null,
            inFlight: null,
            skippedTicks: 0,
            stopped: false,
        };

        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
    }

    /** Unregister and stop a job by ID. */
    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    /**
     * Run a job now, outside its schedule. Joins the current run when one is
     * already in flight.
     */
    async trigger(jobId: string): Promise<void> {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await (entry.inFlight ?? this.#executeJob(entry));
    }

    /** Stop all running jobs and wait for any in-flight handler to finish. */
    async stopAll(): Promise<void> {
        const pending: Promise<void>[] = [];
        for (const entry of this.#jobs.values()) {
            entry.task?.stop();
            entry.task = null;
            entry.stopped = true;
            entry.status = 'stopped';
            if (entry.inFlight) pending.push(entry.inFlight);
        }
        await Promise.allSettled(pending);
    }

    /** Return a read-only snapshot of all registered jobs. */
    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    /** Get a single job's snapshot by ID. Returns `undefined` if not found. */
    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#snapshot(entry) : undefined;
    }

    /** Subscribe to scheduler events. Returns an unsubscribe function. */
    on(eventType: SchedulerEventType, listener: SchedulerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
            skippedTicks: entry.skippedTicks,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, () => {
            if (entry.inFlight) {
                entry.skippedTicks += 1;
                this.#emit({ type: 'job:skipped', jobId: entry.config.id, timestamp: new Date() });
                return;
            }
            void this.#executeJob(entry);
        });

        entry.status = 'idle';
    }

    #executeJob(entry: RegisteredJob): Promise<void> {
        const run = this.#runHandler(entry).finally(() => {
            entry.inFlight = null;
        });
        entry.inFlight = run;
        return run;
    }

    async #runHandler(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        entry.status = 'running';
        entry.lastRunAt = new Date();

        this.#emit({ type: 'job:start', jobId: config.id, timestamp: new Date() });

        try {
            await config.handler();
            entry.status = entry.stopped ? 'stopped' : 'idle';
            entry.lastError = null;

            this.#emit({ type: 'job:done', jobId: config.id, timestamp: new Date() });
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;

            await logThought(`[JobScheduler] Job '${config.id}' failed: ${message}`, 'error');

            this.#emit({ type: 'job:error', jobId: config.id, timestamp: new Date(), error: message });
        }
    }

    #emit(event: SchedulerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[JobScheduler] Event listener threw an error:', listenerErr);
            }
        }
    }
}
