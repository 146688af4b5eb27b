/**
 * Runtime configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for:
 *   - Missing required config keys.
 *   - Format/type violations on present values.
 *
 * No secret values are ever included in the output.
 */

import cron from 'node-cron';
import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { getConfigValue } from './json-config.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  /** Affected config key. */
  key: string;
  /** Semantic category for automation. */
  class: ConfigIssueClass;
  /** Human-readable description of the problem. */
  message: string;
  /** Actionable remediation hint (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when the monitor is configured well enough to run. */
  ok: boolean;
  /** Keys with a value from the environment, monitor.json or the built-in defaults. */
  presentKeys: string[];
  issues: ConfigIssue[];
  /** Subset of issues that prevent startup. */
  fatalIssues: ConfigIssue[];
  validatedAt: string;
}

// ── Internal helpers ─────────────────────────────────────────────────────────

function readValue(spec: ConfigKeySpec): string | undefined {
  const raw = getConfigValue(spec.key);
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Check a present value against its declared format.
 * Returns an issue string if invalid, null if ok. Secret values are never quoted.
 */
function formatError(spec: ConfigKeySpec, value: string): string | null {
  const shown = spec.type === 'secret' ? '[REDACTED]' : `'${value}'`;
  const asNumber = Number(value);

  switch (spec.format) {
    case 'url': {
      let parsed: URL;
      try {
        parsed = new URL(value);
      } catch {
        return `${spec.key} must be an absolute http(s) URL, got ${shown}.`;
      }
      if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
        return `${spec.key} must use http or https, got ${shown}.`;
      }
      return null;
    }
    case 'port':
      if (!Number.isInteger(asNumber) || asNumber < 1 || asNumber > 65535) {
        return `${spec.key} must be an integer in range 1–65535, got ${shown}.`;
      }
      return null;
    case 'positive_integer':
      if (!Number.isInteger(asNumber) || asNumber <= 0) {
        return `${spec.key} must be a positive integer, got ${shown}.`;
      }
      return null;
    case 'non_negative_number':
      if (!Number.isFinite(asNumber) || asNumber < 0) {
        return `${spec.key} must be a non-negative number, got ${shown}.`;
      }
      return null;
    case 'ratio':
      if (!Number.isFinite(asNumber) || asNumber < 0 || asNumber > 1) {
        return `${spec.key} must be a number between 0 and 1, got ${shown}.`;
      }
      return null;
    case 'cron':
      if (!cron.validate(value)) {
        return `${spec.key} must be a valid cron expression, got ${shown}.`;
      }
      return null;
    case 'rotation_mode':
      if (value !== 'daily' && value !== 'size' && value !== 'daily-or-size') {
        return `${spec.key} must be 'daily', 'size' or 'daily-or-size', got ${shown}.`;
      }
      return null;
    case 'text':
      return null;
  }
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate the runtime configuration against the schema.
 *
 * @param now - Injectable clock. Defaults to `new Date()`.
 */
export function validateRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const value = readValue(spec);

    if (value === undefined) {
      if (spec.class === 'required') {
        issues.push({
          key: spec.key,
          class: 'missing_required',
          message: `Required config key '${spec.key}' is missing. ${spec.description}`,
          remediation: spec.remediation,
        });
      }
      continue;
    }

    presentKeys.push(spec.key);

    const formatErr = formatError(spec, value);
    if (formatErr) {
      issues.push({
        key: spec.key,
        class: 'format_error',
        message: formatErr,
        remediation: spec.remediation,
      });
    }
  }

  const fatalIssues = issues.filter((i) => i.class === 'missing_required');

  return {
    ok: issues.length === 0,
    presentKeys: presentKeys.sort(),
    issues,
    fatalIssues,
    validatedAt: now().toISOString(),
  };
}

/**
 * Run the runtime config validation and throw when fatal issues exist.
 *
 * @throws Error with a redaction-safe message when required keys are missing.
 */
export function assertRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const result = validateRuntimeConfig(now);

  if (result.fatalIssues.length > 0) {
    const reasons = result.fatalIssues.map((i) => i.message).join(' | ');
    throw new Error(`Runtime config validation failed: ${reasons}`);
  }

  return result;
}
