import type { Request, Response } from 'express';
import type { AlertsData } from '../../types/api.js';
import type { AlertLog } from '../../services/alert-log.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface AlertsDeps {
    alertLog: AlertLog;
}

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 500;

/** GET /alerts?limit=N: Most recent SLA alerts, newest first. */
export function handleAlerts(deps: AlertsDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const rawLimit = req.query.limit;
        let limit = DEFAULT_LIMIT;
        if (rawLimit !== undefined) {
            const parsed = typeof rawLimit === 'string' ? Number(rawLimit) : Number.NaN;
            if (!Number.isInteger(parsed) || parsed < 1) {
                sendError(res, "'limit' must be a positive integer.", 400);
                return;
            }
            limit = Math.min(parsed, MAX_LIMIT);
        }

        try {
            const data: AlertsData = { alerts: await deps.alertLog.readRecent(limit) };
            sendOk(res, data);
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}
