import { createHmac } from 'node:crypto';
import type { Express } from 'express';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApiApp } from '../../src/api/router.js';
import { MonitoringSession } from '../../src/core/monitoring-session.js';
import type { IngestTransport } from '../../src/services/ingest-transport.js';
import { createTelemetryEvent } from '../../src/services/telemetry-event.js';
import { IngestError } from '../../src/types/errors.js';
import type { TelemetryEvent } from '../../src/types/telemetry.js';
import { useIsolatedConfig } from '../harness/config-env.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (s: string) => s,
}));

const API_SECRET = 'test-secret';

const sign = (body: unknown, secret = API_SECRET) =>
  `sha256=${createHmac('sha256', secret).update(JSON.stringify(body)).digest('hex')}`;

class FakeTransport implements IngestTransport {
  readonly endpoint = 'fake://ingest';
  readonly received: TelemetryEvent[] = [];
  fallback: IngestError | null = null;

  async ingest(event: TelemetryEvent): Promise<void> {
    if (this.fallback) throw this.fallback;
    this.received.push(event);
  }
}

describe('control plane API', () => {
  const config = useIsolatedConfig();
  let transport: FakeTransport;
  let session: MonitoringSession;
  let app: Express;

  beforeEach(() => {
    process.env.API_SECRET = API_SECRET;
    transport = new FakeTransport();
    session = new MonitoringSession({
      dataDir: config.dir,
      transport,
      telemetry: { retryBaseDelayMs: 0 },
      slaThresholdSec: 5,
      channels: ['chat', 'voice', 'email'],
      storageRetryDelayMs: 0,
    });
    app = createApiApp(session);
  });

  afterEach(async () => {
    await session.shutdown();
  });

  const postMeasurement = (body: Record<string, unknown>) =>
    request(app).post('/measurements').set('X-Signature', sign(body)).send(body);

  describe('GET /health', () => {
    it('reports ok with a closed circuit and an empty backlog', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.ok).toBe(true);
      expect(res.body.data).toMatchObject({
        status: 'ok',
        authBlocked: false,
        backlog: { unsynced: 0 },
        resync: null,
      });
      expect(res.body.data.circuit.state).toBe('closed');
      expect(res.body.data.delivery.totalDelivered).toBe(0);
      expect(typeof res.body.correlationId).toBe('string');
    });

    it('reports degraded once events are kept locally during an outage', async () => {
      transport.fallback = new IngestError('network', 'connect ECONNREFUSED');
      await postMeasurement({ channel: 'chat', elapsedSec: 7 });

      const res = await request(app).get('/health');

      expect(res.body.data.status).toBe('degraded');
      expect(res.body.data.circuit.state).toBe('open');
      expect(res.body.data.backlog.unsynced).toBe(2);
    });

    it('answers the liveness check', async () => {
      const res = await request(app).get('/health/live');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ alive: true });
    });
  });

  describe('POST /measurements', () => {
    it('records a signed measurement and returns its delivery outcome', async () => {
      const res = await postMeasurement({ channel: 'chat', elapsedSec: 3 });

      expect(res.status).toBe(202);
      expect(res.body.data).toEqual({
        channel: 'chat',
        aboveSla: false,
        measurement: { status: 'delivered', attempts: 1 },
        alert: null,
      });
      expect(transport.received).toHaveLength(1);
    });

    it('stores the event locally and still answers while the remote is down', async () => {
      transport.fallback = new IngestError('network', 'connect ECONNREFUSED');

      const res = await postMeasurement({ channel: 'voice', elapsedSec: 9 });

      expect(res.status).toBe(202);
      expect(res.body.data.measurement).toEqual({ status: 'queued', reason: 'circuit_open', attempts: 3 });
      expect(res.body.data.alert).toEqual({ status: 'queued', reason: 'circuit_open', attempts: 0 });
    });

    it('rejects unsigned requests', async () => {
      const res = await request(app).post('/measurements').send({ channel: 'chat', elapsedSec: 1 });

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('Missing or malformed X-Signature header.');
    });

    it('rejects a signature made with another secret', async () => {
      const body = { channel: 'chat', elapsedSec: 1 };
      const res = await request(app).post('/measurements').set('X-Signature', sign(body, 'other-secret')).send(body);

      expect(res.status).toBe(403);
      expect(res.body.error).toBe('Invalid signature.');
    });

    it('refuses signed endpoints when no API secret is configured', async () => {
      delete process.env.API_SECRET;

      const res = await postMeasurement({ channel: 'chat', elapsedSec: 1 });

      expect(res.status).toBe(503);
      expect(res.body.error).toBe('Signed API endpoints are unavailable (missing API_SECRET).');
    });

    it('validates the request body', async () => {
      const emptyChannel = await postMeasurement({ channel: ' ', elapsedSec: 1 });
      const textElapsed = await postMeasurement({ channel: 'chat', elapsedSec: 'fast' });
      const textThreshold = await postMeasurement({ channel: 'chat', elapsedSec: 1, slaThresholdSec: 'high' });
      const negative = await postMeasurement({ channel: 'chat', elapsedSec: -1 });

      expect(emptyChannel.status).toBe(400);
      expect(emptyChannel.body.error).toBe("'channel' must be a non-empty string.");
      expect(textElapsed.body.error).toBe("'elapsedSec' must be a number.");
      expect(textThreshold.body.error).toBe("'slaThresholdSec' must be a number when provided.");
      expect(negative.status).toBe(400);
      expect(negative.body.error).toBe('elapsedSec must be a non-negative number, got -1.');
    });

    it('rejects a malformed JSON body', async () => {
      const res = await request(app)
        .post('/measurements')
        .set('Content-Type', 'application/json')
        .send('{"channel": ');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Malformed JSON body.');
    });
  });

  describe('GET /metrics', () => {
    it('returns per-channel averages and statistics', async () => {
      await postMeasurement({ channel: 'chat', elapsedSec: 2 });
      await postMeasurement({ channel: 'chat', elapsedSec: 4 });

      const res = await request(app).get('/metrics');

      expect(res.status).toBe(200);
      expect(res.body.data.slaThresholdSec).toBe(5);
      expect(res.body.data.averages).toEqual({ chat: 3, voice: 0, email: 0 });
      expect(res.body.data.channels.chat).toEqual({ average: 3, min: 2, max: 4, count: 2, slaViolations: 0 });
    });
  });

  describe('GET /alerts', () => {
    it('lists recent alerts newest first', async () => {
      await postMeasurement({ channel: 'chat', elapsedSec: 6 });
      await postMeasurement({ channel: 'email', elapsedSec: 8 });

      const all = await request(app).get('/alerts');
      const latest = await request(app).get('/alerts?limit=1');

      expect(all.body.data.alerts.map((alert: TelemetryEvent) => alert.channel)).toEqual(['email', 'chat']);
      expect(latest.body.data.alerts).toHaveLength(1);
      expect(latest.body.data.alerts[0].payload.message).toBe(
        "ALERT: response time of 8.00s on channel 'email' is above the SLA of 5s!",
      );
    });

    it('rejects a non-numeric limit', async () => {
      const res = await request(app).get('/alerts?limit=many');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("'limit' must be a positive integer.");
    });
  });

  describe('backlog endpoints', () => {
    it('shows the backlog and drains it on a signed resync', async () => {
      const event = createTelemetryEvent({ id: 'stored-1', channel: 'chat', kind: 'MEASUREMENT', payload: {} });
      await session.store.append({ event, synced: false, attemptCount: 1 });

      const before = await request(app).get('/backlog');
      const resync = await request(app).post('/backlog/resync').set('X-Signature', sign({})).send({});
      const after = await request(app).get('/backlog');

      expect(before.body.data.unsynced).toBe(1);
      expect(before.body.data.segments).toHaveLength(1);
      expect(resync.status).toBe(200);
      expect(resync.body.data).toMatchObject({ delivered: 1, deadLettered: 0, remaining: 0, stoppedBy: 'drained' });
      expect(after.body.data.unsynced).toBe(0);
      expect(transport.received.map((e) => e.id)).toEqual(['stored-1']);
    });

    it('refuses a resync once the session is shutting down', async () => {
      await session.shutdown();

      const res = await request(app).post('/backlog/resync').set('X-Signature', sign({})).send({});

      expect(res.status).toBe(503);
      expect(res.body.error).toBe('Telemetry client is shutting down.');
    });
  });

  describe('GET /config/validate', () => {
    it('returns the validation report to signed callers', async () => {
      process.env.INGEST_URL = 'https://ingest.example.test';
      process.env.INGEST_DATASET = 'support-sla';
      process.env.INGEST_TOKEN = 'test-token-value';

      const res = await request(app).get('/config/validate').set('X-Signature', sign({}));

      expect(res.status).toBe(200);
      expect(res.body.data.ok).toBe(true);
      expect(res.body.data.fatalIssues).toEqual([]);
      expect(res.body.data.presentKeys).toContain('INGEST_TOKEN');
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ ok: false, error: 'Not found.' });
  });
});
