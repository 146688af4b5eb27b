import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
    clearConfigCacheForTests,
    DEFAULT_CONFIG,
    getConfigValue,
    mergeWithDefaults,
    readConfig,
    resolveChannels,
    resolveDataDir,
    resolveTelemetryOptions,
    writeConfig,
    type MonitorConfig,
} from '../../src/config/json-config.js';
import { useIsolatedConfig } from '../harness/config-env.js';

describe('Config JSON Foundation', () => {
    const config = useIsolatedConfig();

    afterEach(() => {
        vi.restoreAllMocks();
    });

    async function writeRawConfig(content: unknown): Promise<void> {
        await fs.writeFile(config.configPath, JSON.stringify(content), 'utf-8');
        clearConfigCacheForTests();
    }

    it('loads default config when file is missing', async () => {
        const loaded = await readConfig();

        expect(loaded).toEqual(DEFAULT_CONFIG);
        expect(loaded.runtime.apiPort).toBe(3100);
        expect(loaded.telemetry.breakerCooldownMs).toBeNull();
    });

    it('saves and reads structured config correctly', async () => {
        const custom: MonitorConfig = mergeWithDefaults({});
        custom.ingest.url = 'https://ingest.example.test';
        custom.ingest.dataset = 'support-sla';
        custom.telemetry.retryMaxAttempts = 5;
        custom.monitor.channels = ['chat', 'sms'];

        await writeConfig(custom);
        const loaded = await readConfig();

        expect(loaded).toEqual(custom);
        const stats = await fs.stat(config.configPath);
        expect(stats.mode & 0o777).toBe(0o600);
    });

    it('fails with the file path when the JSON is invalid', async () => {
        await fs.writeFile(config.configPath, '{ not json', 'utf-8');

        await expect(readConfig()).rejects.toThrow(`Failed to parse config file at ${config.configPath}`);
    });

    it('keeps defaults for fields with the wrong type', () => {
        const merged = mergeWithDefaults({
            telemetry: { retryMaxAttempts: '5', remoteTimeoutMs: 2000 },
            storage: { rotationMode: 'hourly' },
            monitor: { channels: ['chat', 3, 'sms'] },
            ingest: 'not-an-object',
        });

        expect(merged.telemetry.retryMaxAttempts).toBe(3);
        expect(merged.telemetry.remoteTimeoutMs).toBe(2000);
        expect(merged.storage.rotationMode).toBe('daily-or-size');
        expect(merged.monitor.channels).toEqual(['chat', 'sms']);
        expect(merged.ingest).toEqual(DEFAULT_CONFIG.ingest);
    });

    it('prefers a non-empty environment variable over the JSON value', async () => {
        await writeRawConfig({ ingest: { dataset: 'from-json' }, runtime: { apiPort: 4000 } });

        expect(getConfigValue('INGEST_DATASET')).toBe('from-json');
        expect(getConfigValue('API_PORT')).toBe('4000');

        vi.stubEnv('INGEST_DATASET', 'from-env');
        expect(getConfigValue('INGEST_DATASET')).toBe('from-env');

        vi.stubEnv('INGEST_DATASET', '   ');
        expect(getConfigValue('INGEST_DATASET')).toBe('from-json');
        vi.unstubAllEnvs();
    });

    it('returns undefined for empty, null and unknown keys', () => {
        expect(getConfigValue('INGEST_TOKEN')).toBeUndefined();
        expect(getConfigValue('BREAKER_COOLDOWN_MS')).toBeUndefined();
        expect(getConfigValue('NOT_A_KEY')).toBeUndefined();
    });

    it('seeds the breaker cooldown from the retry schedule by default', () => {
        const options = resolveTelemetryOptions();

        expect(options).toEqual({
            remoteTimeoutMs: 5000,
            breakerFailureThreshold: 3,
            breakerCooldownMs: 8000,
            breakerMaxCooldownMs: 30_000,
            breakerFailureWindowMs: 60_000,
            retryBaseDelayMs: 1000,
            retryMaxAttempts: 3,
            retryMaxDelayMs: 30_000,
            retryJitterRatio: 0,
            resyncCron: '*/30 * * * * *',
            rotation: { mode: 'daily-or-size', maxBytes: 5 * 1024 * 1024 },
        });
    });

    it('follows a customised retry schedule and honours an explicit cooldown', async () => {
        vi.stubEnv('RETRY_BASE_DELAY_MS', '500');
        vi.stubEnv('RETRY_MAX_ATTEMPTS', '2');
        expect(resolveTelemetryOptions().breakerCooldownMs).toBe(2000);

        await writeRawConfig({ telemetry: { breakerCooldownMs: 12_000 } });
        expect(resolveTelemetryOptions().breakerCooldownMs).toBe(12_000);
        vi.unstubAllEnvs();
    });

    it('falls back to the default for an invalid numeric value', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.stubEnv('REMOTE_TIMEOUT_MS', 'soon');

        expect(resolveTelemetryOptions().remoteTimeoutMs).toBe(5000);
        expect(warn).toHaveBeenCalledWith("[Config] Ignoring invalid REMOTE_TIMEOUT_MS='soon'; using 5000.");
        vi.unstubAllEnvs();
    });

    it('normalises configured channels and resolves the data directory', () => {
        vi.stubEnv('MONITOR_CHANNELS', ' Chat, SMS ,,');
        vi.stubEnv('DATA_DIR', config.dir);

        expect(resolveChannels()).toEqual(['chat', 'sms']);
        expect(resolveDataDir()).toBe(path.resolve(config.dir));
        vi.unstubAllEnvs();
    });
});
