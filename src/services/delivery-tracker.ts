import type {
    DeliveryRecord,
    DeliveryAttempt,
    DeliveryState,
    ReliabilityMetrics,
} from '../types/reliability.js';
import { logThought } from '../utils/logger.js';

const MAX_HISTORY = 200;

const RESOLVED_STATES: ReadonlySet<DeliveryState> = new Set(['delivered', 'queued', 'rejected', 'resynced']);

/**
 * Tracks per-event delivery outcomes for reliability telemetry.
 *
 * Maintains an in-memory ring buffer of delivery records keyed by event id.
 * Each send records its attempts, timing, and final outcome; resync later
 * flips queued records to `resynced`.
 *
 * Not thread-safe; designed for single-process Node.js usage.
 */
export class DeliveryTracker {
    readonly #records: DeliveryRecord[] = [];
    readonly #now: () => Date;

    constructor(now: () => Date = () => new Date()) {
        this.#now = now;
    }

    /** Start tracking an event. Re-tracking an id returns the existing record. */
    createRecord(eventId: string, channel: string): DeliveryRecord {
        const existing = this.#findRecord(eventId);
        if (existing) return existing;

        const record: DeliveryRecord = {
            id: eventId,
            channel,
            state: 'pending',
            attempts: [],
            createdAt: this.#now().toISOString(),
        };

        this.#records.push(record);

        // Trim ring buffer
        if (this.#records.length > MAX_HISTORY) {
            this.#records.splice(0, this.#records.length - MAX_HISTORY);
        }

        return record;
    }

    /** Record the start of a send attempt. */
    recordAttemptStart(eventId: string): void {
        const record = this.#findRecord(eventId);
        if (!record) return;

        const attempt: DeliveryAttempt = {
            attemptNumber: record.attempts.length + 1,
            startedAt: this.#now().toISOString(),
        };

        record.attempts.push(attempt);
        record.state = record.attempts.length === 1 ? 'sending' : 'retrying';
    }

    /** Mark the latest attempt as failed. */
    recordFailure(eventId: string, error: string): void {
        const last = this.#closeLastAttempt(eventId);
        if (last) last.error = error;
    }

    /** Mark the latest attempt as successful and the event delivered. */
    markDelivered(eventId: string): void {
        this.#closeLastAttempt(eventId);
        this.#resolve(eventId, 'delivered');
    }

    /** The event went to the local backlog instead of the remote. */
    markQueued(eventId: string, reason: string): void {
        this.#resolve(eventId, 'queued', reason);
    }

    markRejected(eventId: string, error: string): void {
        this.#resolve(eventId, 'rejected', error);
        void logThought(`[DeliveryTracker] Event ${eventId} REJECTED by remote: ${error}`, 'error');
    }

    /** A backlog record reached the remote during resync. */
    markResynced(eventId: string, channel: string): void {
        this.createRecord(eventId, channel);
        this.#resolve(eventId, 'resynced');
    }

    /** Compute reliability metrics from the current record history. */
    getMetrics(limit = 50): ReliabilityMetrics {
        const resolved = this.#records.filter((r) => RESOLVED_STATES.has(r.state));
        const count = (state: DeliveryState): number => resolved.filter((r) => r.state === state).length;

        const attempted = resolved.filter((r) => r.attempts.length > 0);
        const totalRetries = attempted.reduce(
            (sum, r) => sum + Math.max(0, r.attempts.length - 1),
            0,
        );
        const averageAttempts =
            attempted.length > 0
                ? attempted.reduce((sum, r) => sum + r.attempts.length, 0) / attempted.length
                : 0;

        return {
            totalDelivered: count('delivered'),
            totalQueued: count('queued'),
            totalRejected: count('rejected'),
            totalResynced: count('resynced'),
            totalRetries,
            averageAttempts: Math.round(averageAttempts * 100) / 100,
            recentRecords: limit > 0 ? this.#records.slice(-limit) : [],
        };
    }

    // ── Private ───────────────────────────────────────────────────────────────

    #findRecord(id: string): DeliveryRecord | undefined {
        return this.#records.find((r) => r.id === id);
    }

    #closeLastAttempt(eventId: string): DeliveryAttempt | undefined {
        const record = this.#findRecord(eventId);
        const last = record?.attempts[record.attempts.length - 1];
        if (!last) return undefined;

        last.completedAt = this.#now().toISOString();
        last.durationMs = new Date(last.completedAt).getTime() - new Date(last.startedAt).getTime();
        return last;
    }

    #resolve(eventId: string, state: DeliveryState, detail?: string): void {
        const record = this.#findRecord(eventId);
        if (!record) return;

        record.state = state;
        record.resolvedAt = this.#now().toISOString();
        if (detail !== undefined) record.detail = detail;
    }
}
