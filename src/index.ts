#!/usr/bin/env node
import 'dotenv/config';
import type { Server } from 'node:http';
import {
    handleAlertsCli,
    handleHelpCli,
    handleRecordCli,
    handleResyncCli,
    handleStatusCli,
    handleUnknownCommand,
} from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { MonitoringSession } from './core/monitoring-session.js';
import { assertRuntimeConfig } from './config/env-validator.js';
import { startApiServer } from './api/router.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── One-shot CLI commands (bypass monitor startup) ───────────────────────────

if (handleHelpCli(argv) || handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (
    (await handleStatusCli(argv)) ||
    (await handleRecordCli(argv)) ||
    (await handleResyncCli(argv)) ||
    (await handleAlertsCli(argv))
) {
    process.exit(process.exitCode ?? 0);
}

// `logs --follow` keeps running until interrupted.
if (!(await handleLogsCli(argv))) {
    await runMonitor();
}

// ── Long-running monitor ─────────────────────────────────────────────────────

async function runMonitor(): Promise<void> {
    try {
        const validation = assertRuntimeConfig();
        for (const issue of validation.issues) {
            console.warn(`[Monitor] Config warning: ${issue.message}`);
        }
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Monitor] Startup blocked by config validation: ${message}`);
        process.exit(1);
    }

    const session = new MonitoringSession();
    await session.start();

    let server: Server;
    try {
        server = await startApiServer(session);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Monitor] Control plane failed to start: ${message}`);
        await session.shutdown();
        process.exit(1);
    }

    void logThought('[Monitor] Process started; resync scheduled and control plane online.');

    let stopping = false;
    const stop = (signal: NodeJS.Signals): void => {
        if (stopping) return;
        stopping = true;
        void logThought(`[Monitor] Received ${signal}; shutting down.`);

        server.close();
        session
            .shutdown()
            .then(() => {
                process.exit(0);
            })
            .catch((error: unknown) => {
                const message = error instanceof Error ? error.message : String(error);
                console.error(`[Monitor] Shutdown failed: ${message}`);
                process.exit(1);
            });
    };

    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
}
