import { writeFile } from 'node:fs/promises';
import { describe, expect, it } from 'vitest';
import { assertRuntimeConfig, validateRuntimeConfig } from '../../src/config/env-validator.js';
import { CONFIG_SCHEMA, CONFIG_SCHEMA_MAP } from '../../src/config/env-schema.js';
import { clearConfigCacheForTests, listConfigKeys } from '../../src/config/json-config.js';
import { useIsolatedConfig } from '../harness/config-env.js';

const REQUIRED_ENV = {
  INGEST_URL: 'https://ingest.example.test',
  INGEST_DATASET: 'support-sla',
  INGEST_TOKEN: 'test-token-value',
};

function setEnv(vars: Record<string, string>): void {
  for (const [key, value] of Object.entries(vars)) {
    process.env[key] = value;
  }
}

describe('CONFIG_SCHEMA', () => {
  it('contains unique key entries', () => {
    const keys = CONFIG_SCHEMA.map((s) => s.key);
    const uniqueKeys = new Set(keys);
    expect(keys.length).toBe(uniqueKeys.size);
    expect(CONFIG_SCHEMA_MAP.size).toBe(keys.length);
  });

  it('covers every key the config layer resolves', () => {
    expect(CONFIG_SCHEMA.map((s) => s.key).sort()).toEqual(listConfigKeys().sort());
  });

  it('all entries have non-empty description and remediation', () => {
    for (const spec of CONFIG_SCHEMA) {
      expect(spec.description.trim(), `description for ${spec.key}`).not.toBe('');
      expect(spec.remediation.trim(), `remediation for ${spec.key}`).not.toBe('');
    }
  });

  it('marks the ingestion token and API secret as secrets', () => {
    expect(CONFIG_SCHEMA_MAP.get('INGEST_TOKEN')?.type).toBe('secret');
    expect(CONFIG_SCHEMA_MAP.get('API_SECRET')?.type).toBe('secret');
  });
});

describe('validateRuntimeConfig', () => {
  const config = useIsolatedConfig();

  it('reports missing_required for each ingestion key', () => {
    const result = validateRuntimeConfig();

    expect(result.ok).toBe(false);
    expect(result.fatalIssues.map((i) => i.key)).toEqual(['INGEST_URL', 'INGEST_DATASET', 'INGEST_TOKEN']);
    expect(result.fatalIssues.every((i) => i.class === 'missing_required')).toBe(true);
  });

  it('passes when the ingestion keys are present in env', () => {
    setEnv(REQUIRED_ENV);

    const result = validateRuntimeConfig(() => new Date('2026-03-01T00:00:00.000Z'));

    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.presentKeys).toContain('INGEST_TOKEN');
    expect(result.presentKeys).not.toContain('API_SECRET');
    expect(result.validatedAt).toBe('2026-03-01T00:00:00.000Z');
  });

  it('accepts values from monitor.json', async () => {
    await writeFile(
      config.configPath,
      JSON.stringify({ ingest: { url: 'https://ingest.example.test', dataset: 'sla', token: 'test-token-value' } }),
      'utf-8',
    );
    clearConfigCacheForTests();

    expect(validateRuntimeConfig().fatalIssues).toEqual([]);
  });

  it('reports format errors without making them fatal', () => {
    setEnv({
      ...REQUIRED_ENV,
      INGEST_URL: 'ftp://ingest.example.test',
      API_PORT: '70000',
      RESYNC_CRON: 'sometimes',
      RETRY_JITTER_RATIO: '1.5',
      ROTATION_MODE: 'hourly',
    });

    const result = validateRuntimeConfig();
    const messages = Object.fromEntries(result.issues.map((i) => [i.key, i.message]));

    expect(result.ok).toBe(false);
    expect(result.fatalIssues).toEqual([]);
    expect(result.issues.every((i) => i.class === 'format_error')).toBe(true);
    expect(messages).toEqual({
      INGEST_URL: "INGEST_URL must use http or https, got 'ftp://ingest.example.test'.",
      API_PORT: "API_PORT must be an integer in range 1–65535, got '70000'.",
      RETRY_JITTER_RATIO: "RETRY_JITTER_RATIO must be a number between 0 and 1, got '1.5'.",
      RESYNC_CRON: "RESYNC_CRON must be a valid cron expression, got 'sometimes'.",
      ROTATION_MODE: "ROTATION_MODE must be 'daily', 'size' or 'daily-or-size', got 'hourly'.",
    });
  });

  it('never includes secret values in the report', () => {
    setEnv({ ...REQUIRED_ENV, API_SECRET: 'test-secret' });

    const serialized = JSON.stringify(validateRuntimeConfig());

    expect(serialized).not.toContain('test-token-value');
    expect(serialized).not.toContain('test-secret');
  });
});

describe('assertRuntimeConfig', () => {
  useIsolatedConfig();

  it('throws when required keys are missing', () => {
    expect(() => assertRuntimeConfig()).toThrow(
      "Runtime config validation failed: Required config key 'INGEST_URL' is missing.",
    );
  });

  it('returns the report when only optional keys are invalid', () => {
    setEnv({ ...REQUIRED_ENV, SLA_THRESHOLD_SEC: '-2' });

    const result = assertRuntimeConfig();

    expect(result.issues.map((i) => i.key)).toEqual(['SLA_THRESHOLD_SEC']);
  });
});
