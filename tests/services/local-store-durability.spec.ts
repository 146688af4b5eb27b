import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LocalStore } from '../../src/services/local-store.js';
import { createTelemetryEvent } from '../../src/services/telemetry-event.js';
import { LocalStorageError } from '../../src/types/errors.js';

const { synced, failing } = vi.hoisted(() => {
  const paths: string[] = [];
  const faults: { close: Set<string>; write: Set<string> } = { close: new Set(), write: new Set() };
  return { synced: paths, failing: faults };
});

// Records every path whose handle is fsynced; fails close or write for listed paths.
vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      const handle = await actual.open(...args);
      const sync = handle.sync.bind(handle);
      handle.sync = async () => {
        synced.push(String(args[0]));
        await sync();
      };
      const target = String(args[0]);
      const close = handle.close.bind(handle);
      handle.close = async () => {
        await close();
        if (failing.close.has(target)) throw new Error('EIO: close failed');
      };
      if (failing.write.has(target)) {
        handle.write = async () => {
          throw new Error('ENOSPC: no space left on device');
        };
      }
      return handle;
    },
  };
});

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  scrubSensitiveText: (value: string) => value,
}));

const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');

describe('LocalStore durability', () => {
  let dir: string;

  beforeEach(async () => {
    synced.length = 0;
    failing.close.clear();
    failing.write.clear();
    dir = await mkdtemp(path.join(os.tmpdir(), 'local-store-durability-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fsyncs a new segment, the index and their directory before an append returns', async () => {
    const store = new LocalStore({ dir, now: () => FIXED_NOW });
    const event = createTelemetryEvent({ id: 'a', channel: 'chat', kind: 'MEASUREMENT', payload: {} });

    await store.append({ event, synced: false, attemptCount: 0 });

    const segmentPath = path.join(dir, 'backlog-20260301-0001.jsonl');
    const indexTemp = synced.findIndex((p) => /backlog\.index\.json\.\d+\.tmp$/.test(p));
    expect(synced.indexOf(segmentPath)).toBeGreaterThanOrEqual(0);
    expect(synced.indexOf(segmentPath)).toBeLessThan(indexTemp);
    expect(synced.slice(indexTemp + 1)).toContain(dir);
    expect(synced[synced.length - 1]).toBe(segmentPath);
    expect(JSON.parse(await readFile(path.join(dir, 'backlog.index.json'), 'utf8'))).toMatchObject({
      nextSeq: 2,
      segments: [{ file: 'backlog-20260301-0001.jsonl' }],
    });
  });

  it('skips the index rewrite for appends to the active segment', async () => {
    const store = new LocalStore({ dir, now: () => FIXED_NOW });
    const first = createTelemetryEvent({ id: 'a', channel: 'chat', kind: 'MEASUREMENT', payload: {} });
    const second = createTelemetryEvent({ id: 'b', channel: 'chat', kind: 'MEASUREMENT', payload: {} });
    await store.append({ event: first, synced: false, attemptCount: 0 });
    synced.length = 0;

    await store.append({ event: second, synced: false, attemptCount: 0 });

    expect(synced).toEqual([path.join(dir, 'backlog-20260301-0001.jsonl')]);
  });

  it('reports a failed close as a storage error', async () => {
    const store = new LocalStore({ dir, now: () => FIXED_NOW });
    const first = createTelemetryEvent({ id: 'a', channel: 'chat', kind: 'MEASUREMENT', payload: {} });
    const second = createTelemetryEvent({ id: 'b', channel: 'chat', kind: 'MEASUREMENT', payload: {} });
    await store.append({ event: first, synced: false, attemptCount: 0 });
    const segmentPath = path.join(dir, 'backlog-20260301-0001.jsonl');
    failing.close.add(segmentPath);

    const result = store.append({ event: second, synced: false, attemptCount: 0 });

    await expect(result).rejects.toBeInstanceOf(LocalStorageError);
    await expect(result).rejects.toThrow('Failed to append to backlog-20260301-0001.jsonl: EIO: close failed');
  });

  it('keeps the write failure when closing also fails', async () => {
    const store = new LocalStore({ dir, now: () => FIXED_NOW });
    const first = createTelemetryEvent({ id: 'a', channel: 'chat', kind: 'MEASUREMENT', payload: {} });
    const second = createTelemetryEvent({ id: 'b', channel: 'chat', kind: 'MEASUREMENT', payload: {} });
    await store.append({ event: first, synced: false, attemptCount: 0 });
    const segmentPath = path.join(dir, 'backlog-20260301-0001.jsonl');
    failing.close.add(segmentPath);
    failing.write.add(segmentPath);

    await expect(store.append({ event: second, synced: false, attemptCount: 0 })).rejects.toThrow(
      'Failed to append to backlog-20260301-0001.jsonl: ENOSPC: no space left on device',
    );
  });
});
