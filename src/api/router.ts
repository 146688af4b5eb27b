import { createServer, type Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { handleHealth, handleLiveness } from './handlers/health.js';
import { handleBacklog, handleBacklogResync } from './handlers/backlog.js';
import { handleMetrics, handleRecordMeasurement } from './handlers/metrics.js';
import { handleAlerts } from './handlers/alerts.js';
import { handleConfigValidate } from './handlers/config-validate.js';
import { mapError, requestLogger, requireSignature, sendError, setRawRequestBody } from './shared.js';
import type { MonitoringSession } from '../core/monitoring-session.js';
import { getConfigValue } from '../config/json-config.js';
import { logThought } from '../utils/logger.js';

export type ApiServerDeps = Pick<MonitoringSession, 'client' | 'collector' | 'alertLog' | 'scheduler'>;

const DEFAULT_PORT = 3100;

/**
 * Build the control plane express app.
 *
 * Endpoints:
 *   GET  /health              Breaker, backlog and delivery snapshot
 *   GET  /health/live         Liveness check
 *   GET  /backlog             Unsynced count and segments
 *   POST /backlog/resync      Run a resync cycle now (signed)
 *   GET  /metrics             Per-channel response time statistics
 *   GET  /alerts?limit=N      Recent SLA alerts
 *   POST /measurements        Record a response time (signed)
 *   GET  /config/validate     Runtime config validation report (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    const clientDeps = { client: deps.client, scheduler: deps.scheduler };
    const metricsDeps = { collector: deps.collector };

    app.get('/health', handleHealth(clientDeps));
    app.get('/health/live', handleLiveness());
    app.get('/backlog', handleBacklog(clientDeps));
    app.get('/metrics', handleMetrics(metricsDeps));
    app.get('/alerts', handleAlerts({ alertLog: deps.alertLog }));

    // Protected endpoints
    app.post('/backlog/resync', requireSignature, handleBacklogResync(clientDeps));
    app.post('/measurements', requireSignature, handleRecordMeasurement(metricsDeps));
    app.get('/config/validate', requireSignature, handleConfigValidate());

    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SyntaxError) {
            sendError(res, 'Malformed JSON body.', 400);
            return;
        }
        const { status, message } = mapError(err);
        void logThought(`[API] Unhandled error: ${message}`, 'error');
        sendError(res, message, status);
    });

    return app;
}

/** Create the control plane app and start listening. Resolves once the port is bound. */
export function startApiServer(deps: ApiServerDeps, port = Number(getConfigValue('API_PORT')) || DEFAULT_PORT): Promise<Server> {
    const server = createServer(createApiApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            void logThought(`[API] Control plane listening on http://localhost:${port}`);
            resolve(server);
        });
    });
}
