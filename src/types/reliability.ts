/** Lifecycle of one event as seen by the telemetry client. */
export type DeliveryState = 'pending' | 'sending' | 'retrying' | 'delivered' | 'queued' | 'rejected' | 'resynced';

/** A single tracked remote delivery attempt. */
export interface DeliveryAttempt {
    attemptNumber: number;
    startedAt: string;
    completedAt?: string;
    error?: string;
    durationMs?: number;
}

/** Delivery record for one event. */
export interface DeliveryRecord {
    id: string;
    channel: string;
    state: DeliveryState;
    attempts: DeliveryAttempt[];
    createdAt: string;
    resolvedAt?: string;
    detail?: string;
}

/** Summary telemetry counters for reliability reporting. */
export interface ReliabilityMetrics {
    totalDelivered: number;
    totalQueued: number;
    totalRejected: number;
    totalResynced: number;
    totalRetries: number;
    averageAttempts: number;
    /** Delivery records for the most recent N events. */
    recentRecords: DeliveryRecord[];
}
