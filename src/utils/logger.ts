import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

const SENSITIVE_ENV_KEYS = ['INGEST_TOKEN', 'API_SECRET'];
const MIN_SECRET_LENGTH = 8;
const REDACTED = '[REDACTED]';

const INLINE_PATTERNS: readonly RegExp[] = [
    /(Bearer\s+)[A-Za-z0-9._~+/=-]+/gi,
    /((?:token|secret|password|api[_-]?key)\s*[=:]\s*)["']?[^\s"',;]+/gi,
];

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Redact bearer tokens, `key=value` credentials and the raw values of the
 * configured secrets from a string before it is logged or returned to a client.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (typeof value === 'string' && value.trim().length >= MIN_SECRET_LENGTH) {
            scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value.trim()), 'g'), REDACTED);
        }
    }

    for (const pattern of INLINE_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, `$1${REDACTED}`);
    }

    return scrubbed;
}

function resolveLogDir(): string {
    return path.resolve(process.env.LOG_DIR?.trim() || 'logs');
}

function currentDateIso(now: Date): string {
    return now.toISOString().slice(0, 10);
}

/** Path of the daily log file for the given instant. */
export function getDailyLogPath(now: Date = new Date()): string {
    return path.join(resolveLogDir(), `${currentDateIso(now)}.md`);
}

/**
 * Append a line to today's log file (`LOG_DIR/YYYY-MM-DD.md`).
 *
 * Warnings and above are echoed to the console. A failed write is reported on
 * stderr and never rethrown, so logging cannot take a send path down with it.
 */
export async function logThought(message: string, level: LogLevel = 'info'): Promise<void> {
    const now = new Date();
    const line = `- [${now.toISOString().slice(11, 19)}] [${level.toUpperCase()}] ${scrubSensitiveText(message)}\n`;

    if (level === 'warn') {
        console.warn(line.trimEnd());
    } else if (level === 'error' || level === 'critical') {
        console.error(line.trimEnd());
    }

    const logPath = getDailyLogPath(now);
    try {
        await mkdir(path.dirname(logPath), { recursive: true });
        await appendFile(logPath, line, 'utf8');
    } catch (err) {
        console.error(`[Logger] Failed to write ${logPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
}
