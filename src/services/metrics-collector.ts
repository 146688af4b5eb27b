import type { ChannelStats, JsonValue, SendOutcome, TelemetryEvent } from '../types/telemetry.js';
import { LocalStorageError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import type { AlertLog } from './alert-log.js';
import { CLIENT_VERSION } from './ingest-transport.js';
import type { TelemetryClient } from './telemetry-client.js';
import { createTelemetryEvent } from './telemetry-event.js';

export const KNOWN_CHANNELS = ['chat', 'voice', 'email'] as const;
export const OTHER_CHANNEL = 'other';
export const DEFAULT_SLA_THRESHOLD_SEC = 5;

export interface MetricsCollectorOptions {
    client: TelemetryClient;
    alertLog?: AlertLog;
    /** @default 5 */
    slaThresholdSec?: number;
    channels?: readonly string[];
}

export interface RecordResult {
    channel: string;
    aboveSla: boolean;
    measurement: SendOutcome;
    alert: SendOutcome | null;
}

interface Sample {
    elapsedSec: number;
    aboveSla: boolean;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

function statsPayload(stats: ChannelStats): Record<string, JsonValue> {
    return {
        average: stats.average,
        min: stats.min,
        max: stats.max,
        count: stats.count,
        slaViolations: stats.slaViolations,
    };
}

/**
 * Records response times per support channel and checks them against the SLA.
 *
 * Every sample becomes a MEASUREMENT event; a sample strictly above its
 * threshold also becomes an ALERT. Events of one channel enter the telemetry
 * client in the order they were recorded; channels do not wait on each other.
 */
export class MetricsCollector {
    readonly #client: TelemetryClient;
    readonly #alertLog: AlertLog | undefined;
    readonly #slaThresholdSec: number;
    readonly #channels: ReadonlySet<string>;
    readonly #samples: Map<string, Sample[]> = new Map();
    readonly #lanes: Map<string, Promise<void>> = new Map();

    constructor(options: MetricsCollectorOptions) {
        this.#client = options.client;
        this.#alertLog = options.alertLog;
        this.#slaThresholdSec = options.slaThresholdSec ?? DEFAULT_SLA_THRESHOLD_SEC;
        this.#channels = new Set(options.channels ?? KNOWN_CHANNELS);
        for (const channel of this.#channels) {
            this.#samples.set(channel, []);
        }
    }

    get slaThresholdSec(): number {
        return this.#slaThresholdSec;
    }

    /**
     * Record one response time. Resolves once the channel's events have been
     * delivered or stored locally.
     *
     * @throws RangeError when `elapsedSec` or the threshold is not a finite, non-negative number.
     * @throws LocalStorageError when an undeliverable event could not be stored.
     */
    record(channel: string, elapsedSec: number, slaThresholdSec = this.#slaThresholdSec): Promise<RecordResult> {
        if (!Number.isFinite(elapsedSec) || elapsedSec < 0) {
            return Promise.reject(new RangeError(`elapsedSec must be a non-negative number, got ${elapsedSec}.`));
        }
        if (!Number.isFinite(slaThresholdSec) || slaThresholdSec < 0) {
            return Promise.reject(new RangeError(`slaThresholdSec must be a non-negative number, got ${slaThresholdSec}.`));
        }

        const resolved = this.#resolveChannel(channel);
        const aboveSla = elapsedSec > slaThresholdSec;

        let samples = this.#samples.get(resolved);
        if (!samples) {
            samples = [];
            this.#samples.set(resolved, samples);
        }
        samples.push({ elapsedSec, aboveSla });

        const measurement = createTelemetryEvent({
            channel: resolved,
            kind: 'MEASUREMENT',
            payload: {
                elapsedSec,
                slaThresholdSec,
                aboveSla,
                version: CLIENT_VERSION,
                stats: statsPayload(this.channelStats(resolved)),
            },
        });

        let alert: TelemetryEvent | null = null;
        if (aboveSla) {
            const message = `ALERT: response time of ${elapsedSec.toFixed(2)}s on channel '${resolved}' is above the SLA of ${slaThresholdSec}s!`;
            void logThought(`[MetricsCollector] ${message}`, 'warn');
            alert = createTelemetryEvent({
                channel: resolved,
                kind: 'ALERT',
                payload: { elapsedSec, slaThresholdSec, message },
            });
        }

        return this.#enqueue(resolved, () => this.#ship(measurement, alert)).then((outcomes) => ({
            channel: resolved,
            aboveSla,
            ...outcomes,
        }));
    }

    /** Statistics for one channel; zeros when it has no samples. */
    channelStats(channel: string): ChannelStats {
        const samples = this.#samples.get(channel) ?? [];
        if (samples.length === 0) {
            return { average: 0, min: 0, max: 0, count: 0, slaViolations: 0 };
        }

        const values = samples.map((sample) => sample.elapsedSec);
        return {
            average: values.reduce((sum, value) => sum + value, 0) / values.length,
            min: Math.min(...values),
            max: Math.max(...values),
            count: values.length,
            slaViolations: samples.filter((sample) => sample.aboveSla).length,
        };
    }

    /** Every channel's statistics, keyed by channel name. */
    stats(): Record<string, ChannelStats> {
        const result: Record<string, ChannelStats> = {};
        for (const channel of this.#samples.keys()) {
            result[channel] = this.channelStats(channel);
        }
        return result;
    }

    /** Mean response time per channel, rounded to two decimals (0 when empty). */
    averages(): Record<string, number> {
        const result: Record<string, number> = {};
        for (const [channel, samples] of this.#samples) {
            result[channel] = samples.length === 0
                ? 0
                : round2(samples.reduce((sum, sample) => sum + sample.elapsedSec, 0) / samples.length);
        }
        return result;
    }

    /** Wait for every channel's queued events to be handed off. */
    async flush(): Promise<void> {
        await Promise.allSettled([...this.#lanes.values()]);
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #resolveChannel(channel: string): string {
        const normalized = channel.trim().toLowerCase();
        if (this.#channels.has(normalized)) return normalized;

        void logThought(
            `[MetricsCollector] Channel '${channel}' is not recognized. Recording as '${OTHER_CHANNEL}'.`,
            'warn',
        );
        return OTHER_CHANNEL;
    }

    #enqueue<T>(channel: string, task: () => Promise<T>): Promise<T> {
        const previous = this.#lanes.get(channel) ?? Promise.resolve();
        const run = previous.then(task);
        const settled = run.then(
            () => undefined,
            () => undefined,
        );
        this.#lanes.set(channel, settled);
        void settled.then(() => {
            if (this.#lanes.get(channel) === settled) this.#lanes.delete(channel);
        });
        return run;
    }

    /**
     * Hand both events to the client. Every step is attempted even when an
     * earlier one fails; the first failure is rethrown once they are done.
     */
    async #ship(
        measurement: TelemetryEvent,
        alert: TelemetryEvent | null,
    ): Promise<{ measurement: SendOutcome; alert: SendOutcome | null }> {
        const failures: unknown[] = [];

        const measurementOutcome = await this.#attempt(failures, () => this.#client.send(measurement), (err) =>
            `${err.message} (${err.path})`,
        );

        let alertOutcome: SendOutcome | null = null;
        if (alert) {
            const alertEvent = alert;
            const alertLog = this.#alertLog;
            if (alertLog) {
                await this.#attempt(failures, () => alertLog.append(alertEvent), (err) =>
                    `alert ${alertEvent.id} (${alertEvent.channel}) missing from the alert log: ${err.message} (${err.path})`,
                );
            }
            alertOutcome = (await this.#attempt(failures, () => this.#client.send(alertEvent), (err) =>
                `${err.message} (${err.path})`,
            )) ?? null;
        }

        if (failures.length > 0 || measurementOutcome === undefined) {
            throw failures[0];
        }
        return { measurement: measurementOutcome, alert: alertOutcome };
    }

    async #attempt<T>(
        failures: unknown[],
        task: () => Promise<T>,
        describeStorageFailure: (err: LocalStorageError) => string,
    ): Promise<T | undefined> {
        try {
            return await task();
        } catch (err) {
            failures.push(err);
            if (err instanceof LocalStorageError) {
                await logThought(`[MetricsCollector] CRITICAL MONITORING FAILURE: ${describeStorageFailure(err)}`, 'critical');
            } else {
                await logThought(
                    `[MetricsCollector] Failed to ship event: ${err instanceof Error ? err.message : String(err)}`,
                    'error',
                );
            }
            return undefined;
        }
    }
}
