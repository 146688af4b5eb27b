import { randomUUID } from 'node:crypto';
import type { JsonValue, TelemetryEvent, TelemetryEventKind } from '../types/telemetry.js';

export interface TelemetryEventInput {
    channel: string;
    kind: TelemetryEventKind;
    payload: Record<string, JsonValue>;
    id?: string;
    timestamp?: string;
}

/** Build an immutable event, assigning a UUID and the current instant when absent. */
export function createTelemetryEvent(input: TelemetryEventInput): TelemetryEvent {
    return Object.freeze({
        id: input.id ?? randomUUID(),
        channel: input.channel,
        kind: input.kind,
        timestamp: input.timestamp ?? new Date().toISOString(),
        payload: Object.freeze({ ...input.payload }),
    });
}

export function isJsonObject(value: unknown): value is Record<string, JsonValue> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
