import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { JobScheduler } from '../../services/job-scheduler.js';
import type { TelemetryClient } from '../../services/telemetry-client.js';
import { RESYNC_JOB_ID } from '../../services/telemetry-client.js';
import { mapError, sendError, sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    client: TelemetryClient;
    scheduler?: JobScheduler;
}

/** GET /health: Breaker state, backlog size and delivery counters. */
export function handleHealth(deps: HealthDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        let unsynced: number;
        try {
            unsynced = await deps.client.store.countUnsynced();
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
            return;
        }

        const circuit = deps.client.breaker.snapshot();
        const authBlocked = deps.client.authBlock !== null;
        const { recentRecords: _recent, ...delivery } = deps.client.tracker.getMetrics(0);
        const resyncJob = deps.scheduler?.getJob(RESYNC_JOB_ID);

        const data: HealthData = {
            status: circuit.state !== 'closed' || authBlocked || unsynced > 0 ? 'degraded' : 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            circuit,
            authBlocked,
            backlog: { unsynced },
            delivery,
            resync: resyncJob
                ? {
                    running: resyncJob.status === 'running',
                    lastRunAt: resyncJob.lastRunAt?.toISOString() ?? null,
                    lastError: resyncJob.lastError,
                    skippedTicks: resyncJob.skippedTicks,
                }
                : null,
        };

        sendOk(res, data);
    };
}

/** GET /health/live: The process is up and serving requests. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        sendOk(res, { alive: true });
    };
}
