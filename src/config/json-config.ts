import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import type { RotationMode, TelemetryOptions } from '../types/telemetry.js';
import { RetryPolicy } from '../utils/retry.js';
import { parseRotationMode } from '../services/rotation-policy.js';

export interface MonitorConfig {
    runtime: {
        apiSecret: string;
        apiPort: number;
    };
    ingest: {
        url: string;
        dataset: string;
        token: string;
        orgId: string;
    };
    telemetry: {
        remoteTimeoutMs: number;
        breakerFailureThreshold: number;
        /** Null seeds the cooldown from the retry schedule. */
        breakerCooldownMs: number | null;
        breakerMaxCooldownMs: number;
        breakerFailureWindowMs: number;
        retryBaseDelayMs: number;
        retryMaxAttempts: number;
        retryMaxDelayMs: number;
        retryJitterRatio: number;
        resyncCron: string;
        storageRetryAttempts: number;
    };
    storage: {
        dataDir: string;
        rotationMode: RotationMode;
        rotationMaxBytes: number;
    };
    monitor: {
        slaThresholdSec: number;
        channels: string[];
    };
}

export const DEFAULT_CONFIG: MonitorConfig = {
    runtime: {
        apiSecret: '',
        apiPort: 3100,
    },
    ingest: {
        url: '',
        dataset: '',
        token: '',
        orgId: '',
    },
    telemetry: {
        remoteTimeoutMs: 5000,
        breakerFailureThreshold: 3,
        breakerCooldownMs: null,
        breakerMaxCooldownMs: 30_000,
        breakerFailureWindowMs: 60_000,
        retryBaseDelayMs: 1000,
        retryMaxAttempts: 3,
        retryMaxDelayMs: 30_000,
        retryJitterRatio: 0,
        resyncCron: '*/30 * * * * *',
        storageRetryAttempts: 3,
    },
    storage: {
        dataDir: 'data',
        rotationMode: 'daily-or-size',
        rotationMaxBytes: 5 * 1024 * 1024,
    },
    monitor: {
        slaThresholdSec: 5,
        channels: ['chat', 'voice', 'email'],
    },
};

export const DEFAULT_CONFIG_FILE = 'monitor.json';

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    const fromEnv = process.env.MONITOR_CONFIG_PATH?.trim();
    return path.resolve(fromEnv || DEFAULT_CONFIG_FILE);
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export async function readConfig(overridePath?: string): Promise<MonitorConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isMissingFile(error)) return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${errorMessage(error)}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${errorMessage(error)}`);
    }
}

export async function writeConfig(config: MonitorConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${errorMessage(error)}`);
    }
}

// ── Merge helpers ────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = source[key];
    return isRecord(value) ? value : {};
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickNullableNumber(source: Record<string, unknown>, key: string, fallback: number | null): number | null {
    const value = source[key];
    if (value === null) return null;
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function mergeWithDefaults(loaded: unknown): MonitorConfig {
    const root = isRecord(loaded) ? loaded : {};
    const defaults = DEFAULT_CONFIG;

    const runtime = section(root, 'runtime');
    const ingest = section(root, 'ingest');
    const telemetry = section(root, 'telemetry');
    const storage = section(root, 'storage');
    const monitor = section(root, 'monitor');

    const channels = Array.isArray(monitor.channels)
        ? monitor.channels.filter((value): value is string => typeof value === 'string')
        : [...defaults.monitor.channels];

    return {
        runtime: {
            apiSecret: pickString(runtime, 'apiSecret', defaults.runtime.apiSecret),
            apiPort: pickNumber(runtime, 'apiPort', defaults.runtime.apiPort),
        },
        ingest: {
            url: pickString(ingest, 'url', defaults.ingest.url),
            dataset: pickString(ingest, 'dataset', defaults.ingest.dataset),
            token: pickString(ingest, 'token', defaults.ingest.token),
            orgId: pickString(ingest, 'orgId', defaults.ingest.orgId),
        },
        telemetry: {
            remoteTimeoutMs: pickNumber(telemetry, 'remoteTimeoutMs', defaults.telemetry.remoteTimeoutMs),
            breakerFailureThreshold: pickNumber(telemetry, 'breakerFailureThreshold', defaults.telemetry.breakerFailureThreshold),
            breakerCooldownMs: pickNullableNumber(telemetry, 'breakerCooldownMs', defaults.telemetry.breakerCooldownMs),
            breakerMaxCooldownMs: pickNumber(telemetry, 'breakerMaxCooldownMs', defaults.telemetry.breakerMaxCooldownMs),
            breakerFailureWindowMs: pickNumber(telemetry, 'breakerFailureWindowMs', defaults.telemetry.breakerFailureWindowMs),
            retryBaseDelayMs: pickNumber(telemetry, 'retryBaseDelayMs', defaults.telemetry.retryBaseDelayMs),
            retryMaxAttempts: pickNumber(telemetry, 'retryMaxAttempts', defaults.telemetry.retryMaxAttempts),
            retryMaxDelayMs: pickNumber(telemetry, 'retryMaxDelayMs', defaults.telemetry.retryMaxDelayMs),
            retryJitterRatio: pickNumber(telemetry, 'retryJitterRatio', defaults.telemetry.retryJitterRatio),
            resyncCron: pickString(telemetry, 'resyncCron', defaults.telemetry.resyncCron),
            storageRetryAttempts: pickNumber(telemetry, 'storageRetryAttempts', defaults.telemetry.storageRetryAttempts),
        },
        storage: {
            dataDir: pickString(storage, 'dataDir', defaults.storage.dataDir),
            rotationMode: parseRotationMode(pickString(storage, 'rotationMode', defaults.storage.rotationMode)),
            rotationMaxBytes: pickNumber(storage, 'rotationMaxBytes', defaults.storage.rotationMaxBytes),
        },
        monitor: {
            slaThresholdSec: pickNumber(monitor, 'slaThresholdSec', defaults.monitor.slaThresholdSec),
            channels,
        },
    };
}

// ── Flat key adapter ─────────────────────────────────────────────────────────

let cachedConfig: MonitorConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): MonitorConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            const content = readFileSync(configPath, 'utf8');
            cachedConfig = mergeWithDefaults(JSON.parse(content));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

function loadCachedConfig(): MonitorConfig {
    return cachedConfig ?? reloadConfigSync();
}

/** Flat key → value read from the structured config. */
const CONFIG_KEY_MAP: Readonly<Record<string, (config: MonitorConfig) => string | number | null>> = {
    API_SECRET: (c) => c.runtime.apiSecret,
    API_PORT: (c) => c.runtime.apiPort,
    INGEST_URL: (c) => c.ingest.url,
    INGEST_DATASET: (c) => c.ingest.dataset,
    INGEST_TOKEN: (c) => c.ingest.token,
    INGEST_ORG_ID: (c) => c.ingest.orgId,
    REMOTE_TIMEOUT_MS: (c) => c.telemetry.remoteTimeoutMs,
    BREAKER_FAILURE_THRESHOLD: (c) => c.telemetry.breakerFailureThreshold,
    BREAKER_COOLDOWN_MS: (c) => c.telemetry.breakerCooldownMs,
    BREAKER_MAX_COOLDOWN_MS: (c) => c.telemetry.breakerMaxCooldownMs,
    BREAKER_FAILURE_WINDOW_MS: (c) => c.telemetry.breakerFailureWindowMs,
    RETRY_BASE_DELAY_MS: (c) => c.telemetry.retryBaseDelayMs,
    RETRY_MAX_ATTEMPTS: (c) => c.telemetry.retryMaxAttempts,
    RETRY_MAX_DELAY_MS: (c) => c.telemetry.retryMaxDelayMs,
    RETRY_JITTER_RATIO: (c) => c.telemetry.retryJitterRatio,
    RESYNC_CRON: (c) => c.telemetry.resyncCron,
    STORAGE_RETRY_ATTEMPTS: (c) => c.telemetry.storageRetryAttempts,
    DATA_DIR: (c) => c.storage.dataDir,
    ROTATION_MODE: (c) => c.storage.rotationMode,
    ROTATION_MAX_BYTES: (c) => c.storage.rotationMaxBytes,
    SLA_THRESHOLD_SEC: (c) => c.monitor.slaThresholdSec,
    MONITOR_CHANNELS: (c) => c.monitor.channels.join(','),
};

/**
 * Gets a configured value: a non-empty environment variable of the same name
 * wins, then `monitor.json` (merged with defaults).
 */
export function getConfigValue(key: string): string | undefined {
    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const read = CONFIG_KEY_MAP[key];
    if (!read) return undefined;

    const jsonValue = read(loadCachedConfig());
    if (jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }
    return undefined;
}

export function listConfigKeys(): string[] {
    return Object.keys(CONFIG_KEY_MAP);
}

function numberValue(key: string, fallback: number, min = 0): number {
    const raw = getConfigValue(key);
    if (raw === undefined) return fallback;

    const parsed = Number(raw.trim());
    if (!Number.isFinite(parsed) || parsed < min) {
        console.warn(`[Config] Ignoring invalid ${key}='${raw}'; using ${fallback}.`);
        return fallback;
    }
    return parsed;
}

/** Numeric options for the telemetry core, with invalid values replaced by defaults. */
export function resolveTelemetryOptions(): TelemetryOptions {
    const defaults = DEFAULT_CONFIG.telemetry;
    const retryBaseDelayMs = numberValue('RETRY_BASE_DELAY_MS', defaults.retryBaseDelayMs);
    const retryMaxAttempts = Math.floor(numberValue('RETRY_MAX_ATTEMPTS', defaults.retryMaxAttempts));
    const retryMaxDelayMs = numberValue('RETRY_MAX_DELAY_MS', defaults.retryMaxDelayMs);

    const cooldownSeed = new RetryPolicy({
        baseDelayMs: retryBaseDelayMs,
        maxAttempts: retryMaxAttempts,
        maxDelayMs: retryMaxDelayMs,
    }).cooldownSeed();

    return {
        remoteTimeoutMs: numberValue('REMOTE_TIMEOUT_MS', defaults.remoteTimeoutMs, 1),
        breakerFailureThreshold: Math.floor(numberValue('BREAKER_FAILURE_THRESHOLD', defaults.breakerFailureThreshold, 1)),
        breakerCooldownMs: numberValue('BREAKER_COOLDOWN_MS', cooldownSeed),
        breakerMaxCooldownMs: numberValue('BREAKER_MAX_COOLDOWN_MS', defaults.breakerMaxCooldownMs),
        breakerFailureWindowMs: numberValue('BREAKER_FAILURE_WINDOW_MS', defaults.breakerFailureWindowMs),
        retryBaseDelayMs,
        retryMaxAttempts,
        retryMaxDelayMs,
        retryJitterRatio: Math.min(1, numberValue('RETRY_JITTER_RATIO', defaults.retryJitterRatio)),
        resyncCron: getConfigValue('RESYNC_CRON') ?? defaults.resyncCron,
        rotation: {
            mode: parseRotationMode(getConfigValue('ROTATION_MODE')),
            maxBytes: numberValue('ROTATION_MAX_BYTES', DEFAULT_CONFIG.storage.rotationMaxBytes, 1),
        },
    };
}

export function resolveStorageRetryAttempts(): number {
    return Math.floor(numberValue('STORAGE_RETRY_ATTEMPTS', DEFAULT_CONFIG.telemetry.storageRetryAttempts, 1));
}

export function resolveSlaThresholdSec(): number {
    return numberValue('SLA_THRESHOLD_SEC', DEFAULT_CONFIG.monitor.slaThresholdSec);
}

export function resolveChannels(): string[] {
    const raw = getConfigValue('MONITOR_CHANNELS');
    const channels = (raw ?? '')
        .split(',')
        .map((value) => value.trim().toLowerCase())
        .filter((value) => value.length > 0);
    return channels.length > 0 ? channels : [...DEFAULT_CONFIG.monitor.channels];
}

export function resolveDataDir(): string {
    return path.resolve(getConfigValue('DATA_DIR') ?? DEFAULT_CONFIG.storage.dataDir);
}
