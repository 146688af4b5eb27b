/**
 * Registry of every configuration key the monitor consumes.
 *
 * Each entry declares:
 *   - `key`         The flat key, also the environment variable name.
 *   - `type`        Whether the value is a secret (never echoed) or a plain value.
 *   - `class`       'required' | 'optional'.
 *   - `format`      How the value is checked when present.
 *   - `scope`       Subsystem that owns the key.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'runtime' | 'ingest' | 'telemetry' | 'storage' | 'monitor';

export type ConfigKeyFormat =
  | 'text'
  | 'url'
  | 'port'
  | 'positive_integer'
  | 'non_negative_number'
  | 'ratio'
  | 'cron'
  | 'rotation_mode';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  format: ConfigKeyFormat;
  scope: ConfigKeyScope;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Remote ingestion ────────────────────────────────────────────────────────
  {
    key: 'INGEST_URL',
    type: 'env',
    class: 'required',
    format: 'url',
    scope: 'ingest',
    description: 'Base URL of the remote ingestion service.',
    remediation: 'Set INGEST_URL (or ingest.url in monitor.json), e.g. INGEST_URL=https://ingest.example.com.',
  },
  {
    key: 'INGEST_DATASET',
    type: 'env',
    class: 'required',
    format: 'text',
    scope: 'ingest',
    description: 'Dataset that receives measurement and alert events.',
    remediation: 'Set INGEST_DATASET to the name of the target dataset.',
  },
  {
    key: 'INGEST_TOKEN',
    type: 'secret',
    class: 'required',
    format: 'text',
    scope: 'ingest',
    description: 'Bearer token for the ingestion API.',
    remediation: 'Set INGEST_TOKEN in your .env file. A rejected token pauses remote delivery until it is fixed.',
  },
  {
    key: 'INGEST_ORG_ID',
    type: 'env',
    class: 'optional',
    format: 'text',
    scope: 'ingest',
    description: 'Organization id sent as X-Org-Id, for tokens that span organizations.',
    remediation: 'Set INGEST_ORG_ID only when the ingestion service asks for it.',
  },

  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'API_SECRET',
    type: 'secret',
    class: 'optional',
    format: 'text',
    scope: 'runtime',
    description: 'HMAC secret for signed control plane endpoints (manual resync, measurement ingestion).',
    remediation: 'Set API_SECRET to enable signed endpoints; without it they answer 503.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    format: 'port',
    scope: 'runtime',
    description: 'Listening port for the HTTP control plane API (default: 3100).',
    remediation: 'Set API_PORT to change the control plane port, e.g. API_PORT=8080.',
  },

  // ── Telemetry client ────────────────────────────────────────────────────────
  {
    key: 'REMOTE_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    format: 'positive_integer',
    scope: 'telemetry',
    description: 'Per-attempt bound on a remote call in ms (default: 5000).',
    remediation: 'Set REMOTE_TIMEOUT_MS to a positive integer.',
  },
  {
    key: 'BREAKER_FAILURE_THRESHOLD',
    type: 'env',
    class: 'optional',
    format: 'positive_integer',
    scope: 'telemetry',
    description: 'Failures within the window that open the circuit (default: 3).',
    remediation: 'Set BREAKER_FAILURE_THRESHOLD to a positive integer.',
  },
  {
    key: 'BREAKER_COOLDOWN_MS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_number',
    scope: 'telemetry',
    description: 'Initial open-state cooldown in ms (default: the retry schedule step after the last retry, 8000).',
    remediation: 'Set BREAKER_COOLDOWN_MS to a non-negative number, or leave it unset.',
  },
  {
    key: 'BREAKER_MAX_COOLDOWN_MS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_number',
    scope: 'telemetry',
    description: 'Cap for the cooldown after repeated failed trials (default: 30000).',
    remediation: 'Set BREAKER_MAX_COOLDOWN_MS to a non-negative number.',
  },
  {
    key: 'BREAKER_FAILURE_WINDOW_MS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_number',
    scope: 'telemetry',
    description: 'Rolling window for counting failures (default: 60000).',
    remediation: 'Set BREAKER_FAILURE_WINDOW_MS to a non-negative number.',
  },
  {
    key: 'RETRY_BASE_DELAY_MS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_number',
    scope: 'telemetry',
    description: 'Delay before the first retry in ms; doubles per retry (default: 1000).',
    remediation: 'Set RETRY_BASE_DELAY_MS to a non-negative number.',
  },
  {
    key: 'RETRY_MAX_ATTEMPTS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_number',
    scope: 'telemetry',
    description: 'Retries after the first attempt (default: 3).',
    remediation: 'Set RETRY_MAX_ATTEMPTS to a non-negative integer.',
  },
  {
    key: 'RETRY_MAX_DELAY_MS',
    type: 'env',
    class: 'optional',
    format: 'non_negative_number',
    scope: 'telemetry',
    description: 'Cap for any single backoff delay in ms (default: 30000).',
    remediation: 'Set RETRY_MAX_DELAY_MS to a non-negative number.',
  },
  {
    key: 'RETRY_JITTER_RATIO',
    type: 'env',
    class: 'optional',
    format: 'ratio',
    scope: 'telemetry',
    description: 'Upper bound of random jitter added to each delay, as a fraction (default: 0).',
    remediation: 'Set RETRY_JITTER_RATIO to a number between 0 and 1.',
  },
  {
    key: 'RESYNC_CRON',
    type: 'env',
    class: 'optional',
    format: 'cron',
    scope: 'telemetry',
    description: 'Schedule of the backlog resync (default: every 30 seconds).',
    remediation: "Set RESYNC_CRON to a node-cron expression, e.g. RESYNC_CRON='*/30 * * * * *'.",
  },
  {
    key: 'STORAGE_RETRY_ATTEMPTS',
    type: 'env',
    class: 'optional',
    format: 'positive_integer',
    scope: 'telemetry',
    description: 'Attempts at writing an undeliverable event to the backlog (default: 3).',
    remediation: 'Set STORAGE_RETRY_ATTEMPTS to a positive integer.',
  },

  // ── Storage ─────────────────────────────────────────────────────────────────
  {
    key: 'DATA_DIR',
    type: 'env',
    class: 'optional',
    format: 'text',
    scope: 'storage',
    description: 'Directory for the backlog, dead letters and alert log (default: ./data).',
    remediation: 'Set DATA_DIR to a writable directory.',
  },
  {
    key: 'ROTATION_MODE',
    type: 'env',
    class: 'optional',
    format: 'rotation_mode',
    scope: 'storage',
    description: "Backlog segment rotation: 'daily', 'size' or 'daily-or-size' (default).",
    remediation: "Set ROTATION_MODE to 'daily', 'size' or 'daily-or-size'.",
  },
  {
    key: 'ROTATION_MAX_BYTES',
    type: 'env',
    class: 'optional',
    format: 'positive_integer',
    scope: 'storage',
    description: 'Segment size that triggers rotation in size modes (default: 5 MiB).',
    remediation: 'Set ROTATION_MAX_BYTES to a positive integer.',
  },

  // ── Monitor ─────────────────────────────────────────────────────────────────
  {
    key: 'SLA_THRESHOLD_SEC',
    type: 'env',
    class: 'optional',
    format: 'non_negative_number',
    scope: 'monitor',
    description: 'Response time above which an alert is raised, in seconds (default: 5).',
    remediation: 'Set SLA_THRESHOLD_SEC to a non-negative number.',
  },
  {
    key: 'MONITOR_CHANNELS',
    type: 'env',
    class: 'optional',
    format: 'text',
    scope: 'monitor',
    description: "Comma-separated known channels (default: chat,voice,email); others are recorded as 'other'.",
    remediation: 'Set MONITOR_CHANNELS to a comma-separated list, e.g. MONITOR_CHANNELS=chat,voice,email.',
  },
] as const;

/** Quick lookup map by key name. */
export const CONFIG_SCHEMA_MAP: ReadonlyMap<string, ConfigKeySpec> = new Map(
  CONFIG_SCHEMA.map((spec) => [spec.key, spec]),
);
