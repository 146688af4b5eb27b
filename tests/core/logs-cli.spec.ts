import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { handleLogsCli } from '../../src/core/logs-cli.js';

const { watchMock } = vi.hoisted(() => ({
  watchMock: vi.fn(() => ({ close: () => undefined })),
}));

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return { ...actual, watch: watchMock };
});

function currentDateIso(): string {
  return new Date().toISOString().slice(0, 10);
}

describe('handleLogsCli', () => {
  let tempDir = '';

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'monitor-logs-cli-'));
    vi.stubEnv('LOG_DIR', tempDir);
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    watchMock.mockClear();
    await rm(tempDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('ignores other commands', async () => {
    expect(await handleLogsCli(['status'])).toBe(false);
  });

  it('prints current daily logs when available', async () => {
    const logBody = '- [10:00:00] [INFO] [TelemetryClient] hello from the monitor\n';
    await writeFile(path.join(tempDir, `${currentDateIso()}.md`), logBody, 'utf8');

    const writes: string[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });

    const handled = await handleLogsCli(['logs']);
    expect(handled).toBe(true);
    expect(process.exitCode).toBe(0);
    expect(writes.join('')).toBe(logBody);
  });

  it('returns failure when no log file exists for today', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args) => errors.push(args.join(' ')));

    const handled = await handleLogsCli(['logs']);
    expect(handled).toBe(true);
    expect(process.exitCode).toBe(1);
    expect(errors).toEqual([`[Logs] No logs found for today at ${path.join(tempDir, `${currentDateIso()}.md`)}.`]);
  });

  it('starts follow mode and watches the file', async () => {
    const logPath = path.join(tempDir, `${currentDateIso()}.md`);
    await writeFile(logPath, '', 'utf8');

    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((...args) => logs.push(args.join(' ')));

    const handled = await handleLogsCli(['logs', '--follow']);
    expect(handled).toBe(true);
    expect(logs.join('\n')).toContain(`Following logs from ${logPath}`);
    expect(watchMock).toHaveBeenCalledTimes(1);
  });
});
