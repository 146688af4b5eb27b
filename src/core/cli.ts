import path from 'node:path';
import { validateRuntimeConfig } from '../config/env-validator.js';
import { resolveDataDir } from '../config/json-config.js';
import { AlertLog } from '../services/alert-log.js';
import { LocalStore } from '../services/local-store.js';
import type { SendOutcome } from '../types/telemetry.js';
import { BACKLOG_SUBDIR, MonitoringSession } from './monitoring-session.js';

// ── Help text ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Usage: node dist/index.js [command] [options]

Commands:
  (none)                    Run the monitor: control plane API + periodic backlog resync
  status                    Validate configuration, check the ingestion service, count the backlog
  record <channel> <sec>    Record one response time (chat, voice, email; others count as 'other')
  resync                    Push the local backlog to the ingestion service now
  alerts                    Show recent SLA alerts
  logs                      Print today's log file

Options:
  --help, -h                Show this help message
  --json                    Machine-readable output (status only)
  --limit <n>               Number of alerts to show (alerts only, default 20)
  --follow, -f              Keep printing new log lines (logs only)

Examples:
  node dist/index.js status
  node dist/index.js record chat 3.2
  node dist/index.js alerts --limit 5
  node dist/index.js logs --follow
`.trim();

export const KNOWN_COMMANDS: ReadonlySet<string> = new Set([
  'status',
  'record',
  'resync',
  'alerts',
  'logs',
  '--help',
  '-h',
]);

export interface CliDeps {
  createSession?: () => MonitoringSession;
  dataDir?: string;
}

function describeOutcome(outcome: SendOutcome): string {
  switch (outcome.status) {
    case 'delivered':
      return `delivered (${outcome.attempts} attempt${outcome.attempts === 1 ? '' : 's'})`;
    case 'queued':
      return `stored locally (${outcome.reason})`;
    case 'rejected':
      return `rejected by remote [${outcome.kind}]: ${outcome.error}`;
  }
}

function parseLimit(argv: string[]): number | null {
  const index = argv.indexOf('--limit');
  if (index === -1) return 20;
  const parsed = Number(argv[index + 1]);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  const command = argv[0];
  if (command === undefined || KNOWN_COMMANDS.has(command)) return false;

  console.error(`[Monitor] Unknown command: '${command}'`);
  console.error(`Run 'node dist/index.js --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}

/**
 * Handle the `status` command: config report, backlog size and a remote health check.
 * Exits 0 when the configuration is valid and the remote is healthy.
 */
export async function handleStatusCli(argv: string[], deps: CliDeps = {}): Promise<boolean> {
  if (argv[0] !== 'status') return false;

  const asJson = argv.includes('--json');
  const config = validateRuntimeConfig();
  const dataDir = deps.dataDir ?? resolveDataDir();
  const store = new LocalStore({ dir: path.join(dataDir, BACKLOG_SUBDIR) });

  let unsynced: number | null = null;
  let backlogError: string | null = null;
  try {
    unsynced = await store.countUnsynced();
  } catch (err) {
    backlogError = err instanceof Error ? err.message : String(err);
  }

  let remote: { status: string; latencyMs?: number; error?: string } = {
    status: 'skipped',
    error: 'configuration incomplete',
  };
  if (config.fatalIssues.length === 0) {
    const session = (deps.createSession ?? (() => new MonitoringSession()))();
    try {
      const health = await session.client.healthCheck();
      remote = { status: health.status, latencyMs: health.latencyMs, error: health.error };
    } finally {
      await session.shutdown();
    }
  }

  const healthy = config.ok && backlogError === null && remote.status === 'healthy';

  if (asJson) {
    console.log(JSON.stringify({ healthy, config, backlog: { unsynced, error: backlogError }, remote }, null, 2));
  } else {
    console.log(`Configuration: ${config.ok ? 'ok' : `${config.issues.length} issue(s)`}`);
    for (const issue of config.issues) {
      console.log(`  - [${issue.class}] ${issue.message}`);
      console.log(`    ${issue.remediation}`);
    }
    console.log(`Backlog:       ${backlogError ?? `${unsynced ?? 0} unsynced event(s) in ${store.directory}`}`);
    const latency = remote.latencyMs === undefined ? '' : ` (${remote.latencyMs}ms)`;
    console.log(`Remote:        ${remote.status}${latency}${remote.error ? `: ${remote.error}` : ''}`);
  }

  process.exitCode = healthy ? 0 : 1;
  return true;
}

/** Handle `record <channel> <seconds>`. */
export async function handleRecordCli(argv: string[], deps: CliDeps = {}): Promise<boolean> {
  if (argv[0] !== 'record') return false;

  const channel = argv[1];
  const elapsedSec = Number(argv[2]);
  if (!channel || argv[2] === undefined || !Number.isFinite(elapsedSec) || elapsedSec < 0) {
    console.error('Usage: record <channel> <seconds>');
    process.exitCode = 1;
    return true;
  }

  const session = (deps.createSession ?? (() => new MonitoringSession()))();
  try {
    const result = await session.collector.record(channel, elapsedSec);
    console.log(`Recorded ${elapsedSec}s on '${result.channel}': ${describeOutcome(result.measurement)}`);
    if (result.alert) {
      console.log(`SLA alert (> ${session.collector.slaThresholdSec}s): ${describeOutcome(result.alert)}`);
    }
    process.exitCode = 0;
  } catch (err) {
    console.error(`[Monitor] Failed to record measurement: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    await session.shutdown();
  }
  return true;
}

/** Handle `resync`. Exits 1 while events remain in the backlog. */
export async function handleResyncCli(argv: string[], deps: CliDeps = {}): Promise<boolean> {
  if (argv[0] !== 'resync') return false;

  const session = (deps.createSession ?? (() => new MonitoringSession()))();
  try {
    const report = await session.client.resync();
    console.log(
      `Resync: ${report.delivered} delivered, ${report.deadLettered} dead-lettered, ${report.remaining} remaining (${report.stoppedBy}).`,
    );
    process.exitCode = report.remaining === 0 ? 0 : 1;
  } catch (err) {
    console.error(`[Monitor] Resync failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    await session.shutdown();
  }
  return true;
}

/** Handle `alerts [--limit N]`. */
export async function handleAlertsCli(argv: string[], deps: CliDeps = {}): Promise<boolean> {
  if (argv[0] !== 'alerts') return false;

  const limit = parseLimit(argv);
  if (limit === null) {
    console.error('Usage: alerts [--limit <positive integer>]');
    process.exitCode = 1;
    return true;
  }

  const alertLog = new AlertLog(deps.dataDir ?? resolveDataDir());
  const alerts = await alertLog.readRecent(limit);
  if (alerts.length === 0) {
    console.log('No alerts recorded.');
  }
  for (const alert of alerts) {
    const message = typeof alert.payload.message === 'string' ? alert.payload.message : JSON.stringify(alert.payload);
    console.log(`${alert.timestamp}  ${alert.channel.padEnd(6)}  ${message}`);
  }
  process.exitCode = 0;
  return true;
}
