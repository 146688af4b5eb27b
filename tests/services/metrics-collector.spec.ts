import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AlertLog } from '../../src/services/alert-log.js';
import { CircuitBreaker } from '../../src/services/circuit-breaker.js';
import type { IngestTransport } from '../../src/services/ingest-transport.js';
import { LocalStore } from '../../src/services/local-store.js';
import { MetricsCollector } from '../../src/services/metrics-collector.js';
import { TelemetryClient } from '../../src/services/telemetry-client.js';
import { LocalStorageError } from '../../src/types/errors.js';
import type { TelemetryEvent } from '../../src/types/telemetry.js';
import { logThought } from '../../src/utils/logger.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  scrubSensitiveText: (value: string) => value,
}));

class RecordingTransport implements IngestTransport {
  readonly endpoint = 'fake://ingest';
  readonly received: TelemetryEvent[] = [];

  async ingest(event: TelemetryEvent): Promise<void> {
    this.received.push(event);
  }
}

class BrokenStore extends LocalStore {
  override async append(): Promise<void> {
    throw new LocalStorageError('disk full', '/unwritable');
  }
}

describe('MetricsCollector', () => {
  let dir: string;
  let transport: RecordingTransport;
  let client: TelemetryClient;
  let alertLog: AlertLog;
  let collector: MetricsCollector;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(path.join(os.tmpdir(), 'metrics-collector-'));
    transport = new RecordingTransport();
    client = new TelemetryClient({
      transport,
      breaker: new CircuitBreaker(),
      store: new LocalStore({ dir: path.join(dir, 'backlog') }),
    });
    alertLog = new AlertLog(dir);
    collector = new MetricsCollector({ client, alertLog });
  });

  afterEach(async () => {
    await client.shutdown();
    await rm(dir, { recursive: true, force: true });
  });

  it('ships a measurement with running statistics for a response within the SLA', async () => {
    const result = await collector.record('chat', 3.2);

    expect(result).toEqual({
      channel: 'chat',
      aboveSla: false,
      measurement: { status: 'delivered', attempts: 1 },
      alert: null,
    });
    expect(transport.received).toHaveLength(1);
    expect(transport.received[0]?.kind).toBe('MEASUREMENT');
    expect(transport.received[0]?.payload).toEqual({
      elapsedSec: 3.2,
      slaThresholdSec: 5,
      aboveSla: false,
      version: '1.0.0',
      stats: { average: 3.2, min: 3.2, max: 3.2, count: 1, slaViolations: 0 },
    });
  });

  it('raises, logs and stores an alert for a response above the SLA', async () => {
    const result = await collector.record('voice', 7.5);

    expect(result.aboveSla).toBe(true);
    expect(result.alert).toEqual({ status: 'delivered', attempts: 1 });
    expect(transport.received.map((event) => event.kind)).toEqual(['MEASUREMENT', 'ALERT']);

    const message = "ALERT: response time of 7.50s on channel 'voice' is above the SLA of 5s!";
    expect(transport.received[1]?.payload).toEqual({ elapsedSec: 7.5, slaThresholdSec: 5, message });
    expect(vi.mocked(logThought)).toHaveBeenCalledWith(`[MetricsCollector] ${message}`, 'warn');

    const [stored] = await alertLog.readRecent();
    expect(stored?.id).toBe(transport.received[1]?.id);
  });

  it('does not alert on a response exactly at the threshold', async () => {
    const result = await collector.record('email', 5);

    expect(result.aboveSla).toBe(false);
    expect(result.alert).toBeNull();
    expect(await alertLog.readRecent()).toEqual([]);
  });

  it('applies a per-call threshold', async () => {
    const result = await collector.record('email', 3, 2);

    expect(result.aboveSla).toBe(true);
    expect(transport.received[1]?.payload.message).toBe(
      "ALERT: response time of 3.00s on channel 'email' is above the SLA of 2s!",
    );
  });

  it('normalizes channel names and files unknown ones under other', async () => {
    const known = await collector.record('  Chat ', 1);
    const unknown = await collector.record('SMS', 1);

    expect(known.channel).toBe('chat');
    expect(unknown.channel).toBe('other');
    expect(vi.mocked(logThought)).toHaveBeenCalledWith(
      "[MetricsCollector] Channel 'SMS' is not recognized. Recording as 'other'.",
      'warn',
    );
  });

  it('keeps per-channel statistics and rounded averages', async () => {
    await collector.record('chat', 2);
    await collector.record('chat', 4);
    await collector.record('chat', 9);
    await collector.record('voice', 1);
    await collector.record('voice', 2);
    await collector.record('voice', 2);

    expect(collector.channelStats('chat')).toEqual({ average: 5, min: 2, max: 9, count: 3, slaViolations: 1 });
    expect(collector.averages()).toEqual({ chat: 5, voice: 1.67, email: 0 });
    expect(collector.stats().email).toEqual({ average: 0, min: 0, max: 0, count: 0, slaViolations: 0 });
    expect(Object.keys(collector.stats())).toEqual(['chat', 'voice', 'email']);
  });

  it('ships one channel in the order its samples were recorded', async () => {
    await Promise.all([collector.record('chat', 1), collector.record('chat', 2), collector.record('chat', 3)]);

    expect(transport.received.map((event) => event.payload.elapsedSec)).toEqual([1, 2, 3]);
  });

  it('rejects invalid samples without recording them', async () => {
    await expect(collector.record('chat', -1)).rejects.toBeInstanceOf(RangeError);
    await expect(collector.record('chat', Number.NaN)).rejects.toBeInstanceOf(RangeError);
    await expect(collector.record('chat', 1, -5)).rejects.toBeInstanceOf(RangeError);

    expect(collector.channelStats('chat').count).toBe(0);
    expect(transport.received).toEqual([]);
  });

  it('reports a critical monitoring failure when an event cannot be kept', async () => {
    const breaker = new CircuitBreaker();
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();
    const brokenClient = new TelemetryClient(
      { transport, breaker, store: new BrokenStore({ dir }) },
      { storageRetryDelayMs: 0 },
    );
    const brokenCollector = new MetricsCollector({ client: brokenClient });

    await expect(brokenCollector.record('chat', 1)).rejects.toBeInstanceOf(LocalStorageError);
    expect(vi.mocked(logThought)).toHaveBeenCalledWith(
      '[MetricsCollector] CRITICAL MONITORING FAILURE: disk full (/unwritable)',
      'critical',
    );
    await brokenClient.shutdown();
  });

  it('still ships the alert when the alert log cannot be written', async () => {
    const notADirectory = path.join(dir, 'not-a-directory');
    await writeFile(notADirectory, 'x', 'utf8');
    const lossyCollector = new MetricsCollector({ client, alertLog: new AlertLog(path.join(notADirectory, 'alerts')) });

    await expect(lossyCollector.record('chat', 9)).rejects.toBeInstanceOf(LocalStorageError);

    expect(transport.received.map((event) => event.kind)).toEqual(['MEASUREMENT', 'ALERT']);
    expect(vi.mocked(logThought)).toHaveBeenCalledWith(
      expect.stringMatching(/^\[MetricsCollector\] CRITICAL MONITORING FAILURE: alert \S+ \(chat\) missing from the alert log: /),
      'critical',
    );
  });

  it('attempts the alert even when the measurement cannot be stored', async () => {
    const breaker = new CircuitBreaker();
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();
    const brokenClient = new TelemetryClient(
      { transport, breaker, store: new BrokenStore({ dir }) },
      { storageRetryDelayMs: 0 },
    );
    const brokenCollector = new MetricsCollector({ client: brokenClient, alertLog });

    await expect(brokenCollector.record('voice', 8)).rejects.toBeInstanceOf(LocalStorageError);

    const critical = vi
      .mocked(logThought)
      .mock.calls.filter(([message, level]) => level === 'critical' && message.startsWith('[MetricsCollector]'));
    expect(critical).toHaveLength(2);
    expect((await alertLog.readRecent(5)).map((event) => event.channel)).toEqual(['voice']);
    await brokenClient.shutdown();
  });

  it('waits for queued events on flush', async () => {
    const pending = collector.record('chat', 1);
    await collector.flush();

    expect(transport.received).toHaveLength(1);
    await pending;
  });
});
