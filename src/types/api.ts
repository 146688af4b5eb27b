import type { ConfigValidationResult } from '../config/env-validator.js';
import type { SegmentInfo } from '../services/local-store.js';
import type { ReliabilityMetrics } from './reliability.js';
import type { ChannelStats, CircuitSnapshot, SendOutcome, TelemetryEvent } from './telemetry.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    circuit: CircuitSnapshot;
    authBlocked: boolean;
    backlog: { unsynced: number };
    delivery: Omit<ReliabilityMetrics, 'recentRecords'>;
    resync: {
        running: boolean;
        lastRunAt: string | null;
        lastError: string | null;
        skippedTicks: number;
    } | null;
}

// ── Backlog ─────────────────────────────────────────────────────────────────

export interface BacklogData {
    unsynced: number;
    directory: string;
    deadLetterPath: string;
    segments: SegmentInfo[];
}

// ── Metrics ─────────────────────────────────────────────────────────────────

export interface MetricsData {
    slaThresholdSec: number;
    averages: Record<string, number>;
    channels: Record<string, ChannelStats>;
}

// ── Alerts ──────────────────────────────────────────────────────────────────

export interface AlertsData {
    alerts: TelemetryEvent[];
}

// ── Measurements ────────────────────────────────────────────────────────────

export interface MeasurementRequest {
    channel: string;
    elapsedSec: number;
    slaThresholdSec?: number;
}

export interface MeasurementData {
    channel: string;
    aboveSla: boolean;
    measurement: SendOutcome;
    alert: SendOutcome | null;
}

// ── Config Validation ───────────────────────────────────────────────────────

export interface ConfigValidationData {
    ok: boolean;
    presentKeys: string[];
    issues: ConfigValidationResult['issues'];
    fatalIssues: ConfigValidationResult['fatalIssues'];
    validatedAt: string;
}
