import { mkdir, open, readFile, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { TelemetryEvent } from '../types/telemetry.js';
import { LocalStorageError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import { createTelemetryEvent, isJsonObject } from './telemetry-event.js';

export const ALERT_LOG_FILE = 'alerts.jsonl';
const DEFAULT_RECENT_LIMIT = 20;

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function parseAlertLine(raw: string): TelemetryEvent | null {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch {
        return null;
    }
    if (!isJsonObject(value)) return null;

    const { id, channel, kind, timestamp, payload } = value;
    if (typeof id !== 'string' || typeof channel !== 'string' || typeof timestamp !== 'string') return null;
    if (kind !== 'ALERT' || !isJsonObject(payload)) return null;

    return createTelemetryEvent({ id, channel, kind, timestamp, payload });
}

/**
 * Operator-facing stream of SLA alerts, one ALERT event per line.
 *
 * Kept apart from the backlog: alerts stay here whether or not they reached
 * the remote, and backlog rotation or compaction never touches this file.
 */
export class AlertLog {
    readonly #filePath: string;
    #writeChain: Promise<void> = Promise.resolve();

    constructor(dir: string) {
        this.#filePath = path.resolve(dir, ALERT_LOG_FILE);
    }

    get filePath(): string {
        return this.#filePath;
    }

    /** Durably append one alert. */
    append(event: TelemetryEvent): Promise<void> {
        const run = this.#writeChain.then(() => this.#appendLine(`${JSON.stringify(event)}\n`));
        this.#writeChain = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    /** Most recent alerts, newest first. */
    async readRecent(limit = DEFAULT_RECENT_LIMIT): Promise<TelemetryEvent[]> {
        if (limit <= 0) return [];

        let raw: string;
        try {
            raw = await readFile(this.#filePath, 'utf8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
            throw new LocalStorageError(`Failed to read alert log: ${errorMessage(err)}`, this.#filePath);
        }

        const alerts: TelemetryEvent[] = [];
        let skipped = 0;
        for (const line of raw.split('\n')) {
            if (line.trim() === '') continue;
            const alert = parseAlertLine(line);
            if (alert) {
                alerts.push(alert);
            } else {
                skipped += 1;
            }
        }

        if (skipped > 0) {
            void logThought(`[AlertLog] Skipped ${skipped} malformed line(s) in ${ALERT_LOG_FILE}.`, 'warn');
        }

        return alerts.slice(-limit).reverse();
    }

    async #appendLine(data: string): Promise<void> {
        let handle: FileHandle | undefined;
        let failure: unknown = null;
        try {
            await mkdir(path.dirname(this.#filePath), { recursive: true });
            handle = await open(this.#filePath, 'a');
            await handle.write(data);
            await handle.sync();
        } catch (err) {
            failure = err;
        }

        if (handle) {
            try {
                await handle.close();
            } catch (err) {
                if (failure === null) {
                    failure = err;
                } else {
                    void logThought(`[AlertLog] Also failed to close ${ALERT_LOG_FILE}: ${errorMessage(err)}`, 'warn');
                }
            }
        }

        if (failure !== null) {
            throw new LocalStorageError(`Failed to append alert: ${errorMessage(failure)}`, this.#filePath);
        }
    }
}
