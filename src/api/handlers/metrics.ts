import type { Request, Response } from 'express';
import type { MeasurementData, MeasurementRequest, MetricsData } from '../../types/api.js';
import type { MetricsCollector } from '../../services/metrics-collector.js';
import { isJsonObject } from '../../services/telemetry-event.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface MetricsDeps {
    collector: MetricsCollector;
}

function parseMeasurement(body: unknown): MeasurementRequest | string {
    if (!isJsonObject(body)) return 'Request body must be a JSON object.';

    const { channel, elapsedSec, slaThresholdSec } = body;
    if (typeof channel !== 'string' || channel.trim() === '') {
        return "'channel' must be a non-empty string.";
    }
    if (typeof elapsedSec !== 'number') {
        return "'elapsedSec' must be a number.";
    }
    if (slaThresholdSec !== undefined && typeof slaThresholdSec !== 'number') {
        return "'slaThresholdSec' must be a number when provided.";
    }
    return { channel, elapsedSec, slaThresholdSec };
}

/** GET /metrics: Per-channel averages and statistics. */
export function handleMetrics(deps: MetricsDeps) {
    return (_req: Request, res: Response): void => {
        const data: MetricsData = {
            slaThresholdSec: deps.collector.slaThresholdSec,
            averages: deps.collector.averages(),
            channels: deps.collector.stats(),
        };
        sendOk(res, data);
    };
}

/** POST /measurements: Record one response time. */
export function handleRecordMeasurement(deps: MetricsDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const parsed = parseMeasurement(req.body);
        if (typeof parsed === 'string') {
            sendError(res, parsed, 400);
            return;
        }

        try {
            const result = await deps.collector.record(parsed.channel, parsed.elapsedSec, parsed.slaThresholdSec);
            const data: MeasurementData = result;
            sendOk(res, data, 202);
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}
