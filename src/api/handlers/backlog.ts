import type { Request, Response } from 'express';
import type { BacklogData } from '../../types/api.js';
import type { TelemetryClient } from '../../services/telemetry-client.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface BacklogDeps {
    client: TelemetryClient;
}

/** GET /backlog: Unsynced record count and the segments holding them. */
export function handleBacklog(deps: BacklogDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            const { store } = deps.client;
            const data: BacklogData = {
                unsynced: await store.countUnsynced(),
                directory: store.directory,
                deadLetterPath: store.deadLetterPath,
                segments: await store.listSegments(),
            };
            sendOk(res, data);
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}

/** POST /backlog/resync: Run one resync cycle now and report what it did. */
export function handleBacklogResync(deps: BacklogDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        if (deps.client.shuttingDown) {
            sendError(res, 'Telemetry client is shutting down.', 503);
            return;
        }

        try {
            const report = await deps.client.resync();
            sendOk(res, report);
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}
