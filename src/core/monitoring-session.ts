import path from 'node:path';
import {
  getConfigValue,
  resolveChannels,
  resolveDataDir,
  resolveSlaThresholdSec,
  resolveStorageRetryAttempts,
  resolveTelemetryOptions,
} from '../config/json-config.js';
import { AlertLog } from '../services/alert-log.js';
import { CircuitBreaker } from '../services/circuit-breaker.js';
import { DeliveryTracker } from '../services/delivery-tracker.js';
import { HttpIngestTransport, type IngestTransport } from '../services/ingest-transport.js';
import { JobScheduler } from '../services/job-scheduler.js';
import { LocalStore } from '../services/local-store.js';
import { MetricsCollector } from '../services/metrics-collector.js';
import { RotationPolicy } from '../services/rotation-policy.js';
import { TelemetryClient } from '../services/telemetry-client.js';
import type { HealthCheckResult, TelemetryOptions } from '../types/telemetry.js';
import { RetryPolicy } from '../utils/retry.js';
import { logThought } from '../utils/logger.js';

export const BACKLOG_SUBDIR = 'backlog';

export interface MonitoringSessionOptions {
  /** Root for the backlog and alert log. Defaults to `DATA_DIR`. */
  dataDir?: string;
  /** Replaces the HTTPS transport built from `INGEST_*` settings. */
  transport?: IngestTransport;
  /** Overrides on top of the configured telemetry options. */
  telemetry?: Partial<TelemetryOptions>;
  slaThresholdSec?: number;
  channels?: readonly string[];
  storageRetryAttempts?: number;
  storageRetryDelayMs?: number;
  now?: () => Date;
}

function buildTransport(now: () => Date): IngestTransport {
  const baseUrl = getConfigValue('INGEST_URL');
  const dataset = getConfigValue('INGEST_DATASET');
  const token = getConfigValue('INGEST_TOKEN');
  if (!baseUrl || !dataset || !token) {
    throw new Error(
      '[MonitoringSession] INGEST_URL, INGEST_DATASET and INGEST_TOKEN must be configured (environment or monitor.json).',
    );
  }

  return new HttpIngestTransport({
    baseUrl,
    dataset,
    token,
    orgId: getConfigValue('INGEST_ORG_ID'),
    now,
  });
}

/**
 * Owns every long-lived piece of the monitor: one breaker per remote, the
 * backlog, the resync scheduler, the telemetry client and the collector.
 *
 * Built once at startup and torn down once by {@link shutdown}.
 */
export class MonitoringSession {
  readonly breaker: CircuitBreaker;
  readonly store: LocalStore;
  readonly scheduler: JobScheduler;
  readonly tracker: DeliveryTracker;
  readonly client: TelemetryClient;
  readonly alertLog: AlertLog;
  readonly collector: MetricsCollector;
  readonly options: TelemetryOptions;

  #started = false;
  #shutdown: Promise<void> | null = null;

  constructor(sessionOptions: MonitoringSessionOptions = {}) {
    const now = sessionOptions.now ?? (() => new Date());
    const options: TelemetryOptions = { ...resolveTelemetryOptions(), ...sessionOptions.telemetry };
    const dataDir = path.resolve(sessionOptions.dataDir ?? resolveDataDir());
    const transport = sessionOptions.transport ?? buildTransport(now);

    this.options = options;
    this.breaker = new CircuitBreaker({
      name: transport.endpoint,
      failureThreshold: options.breakerFailureThreshold,
      cooldownMs: options.breakerCooldownMs,
      maxCooldownMs: options.breakerMaxCooldownMs,
      failureWindowMs: options.breakerFailureWindowMs,
      now: () => now().getTime(),
    });
    this.store = new LocalStore({
      dir: path.join(dataDir, BACKLOG_SUBDIR),
      rotation: new RotationPolicy(options.rotation),
      now,
    });
    this.scheduler = new JobScheduler();
    this.tracker = new DeliveryTracker(now);
    this.client = new TelemetryClient(
      {
        transport,
        breaker: this.breaker,
        store: this.store,
        retryPolicy: new RetryPolicy({
          baseDelayMs: options.retryBaseDelayMs,
          maxAttempts: options.retryMaxAttempts,
          maxDelayMs: options.retryMaxDelayMs,
          jitterRatio: options.retryJitterRatio,
        }),
        scheduler: this.scheduler,
        tracker: this.tracker,
      },
      {
        remoteTimeoutMs: options.remoteTimeoutMs,
        resyncCron: options.resyncCron,
        storageRetryAttempts: sessionOptions.storageRetryAttempts ?? resolveStorageRetryAttempts(),
        storageRetryDelayMs: sessionOptions.storageRetryDelayMs,
      },
    );
    this.alertLog = new AlertLog(dataDir);
    this.collector = new MetricsCollector({
      client: this.client,
      alertLog: this.alertLog,
      slaThresholdSec: sessionOptions.slaThresholdSec ?? resolveSlaThresholdSec(),
      channels: sessionOptions.channels ?? resolveChannels(),
    });
  }

  get started(): boolean {
    return this.#started;
  }

  /**
   * Check the remote, drain whatever an earlier run left in the backlog, and
   * start the periodic resync. An unhealthy remote is logged, not fatal.
   */
  async start(): Promise<HealthCheckResult> {
    if (this.#shutdown) {
      throw new Error('[MonitoringSession] Cannot start a session that has been shut down.');
    }

    const health = await this.verifyIntegration();
    if (!this.#started) {
      this.#started = true;
      this.client.start();
      if (health.status === 'healthy') {
        await this.client.resync();
      }
    }
    return health;
  }

  async verifyIntegration(): Promise<HealthCheckResult> {
    const health = await this.client.healthCheck();
    if (health.status === 'healthy') {
      await logThought(
        `[MonitoringSession] Ingestion service reachable (latency ${health.latencyMs}ms, client ${health.version}, API ${health.apiVersion}).`,
      );
    } else {
      await logThought(
        `[MonitoringSession] Ingestion service unavailable: ${health.error ?? 'unknown error'}. Events will be kept locally until it recovers.`,
        'warn',
      );
    }
    return health;
  }

  /** Flush the collector, stop resync, and wait for every in-flight send. Safe to call twice. */
  shutdown(): Promise<void> {
    if (!this.#shutdown) {
      this.#shutdown = this.#runShutdown();
    }
    return this.#shutdown;
  }

  async #runShutdown(): Promise<void> {
    await logThought('[MonitoringSession] Shutting down.');
    await this.client.shutdown();
    await this.collector.flush();
    await this.scheduler.stopAll();

    const remaining = await this.store.countUnsynced();
    await logThought(`[MonitoringSession] Shutdown complete; ${remaining} event(s) remain in the local backlog.`);
  }
}
