import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    /** The last thrown value, kept so callers can rethrow it typed. */
    cause?: unknown;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS: Required<Omit<RetryOptions, 'label'>> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times on failure.
 * - Delay doubles after each attempt (capped at `maxDelayMs`).
 * - All attempts are logged for postmortem traceability.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => store.append(record),
 *   { maxAttempts: 3, baseDelayMs: 100, label: 'backlog:append' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';

    const start = Date.now();
    let lastError = '';
    let lastCause: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn();
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastCause = err;
            lastError = err instanceof Error ? err.message : String(err);

            if (attempt < maxAttempts) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                    'warn',
                );
                await sleep(delay);
            } else {
                void logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                    'error',
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        cause: lastCause,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}

// ── Backoff policy for remote sends ───────────────────────────────────────────

export interface RetryPolicyOptions {
    /** Delay before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Retries after the initial attempt. @default 3 */
    maxAttempts?: number;
    /** Cap applied to every computed delay. @default 30000 */
    maxDelayMs?: number;
    /** Upper bound of added jitter, as a fraction of the delay. @default 0 */
    jitterRatio?: number;
    /** Random source in [0, 1), injectable for tests. */
    random?: () => number;
}

/**
 * Bounded exponential backoff: `base * 2^(attempt - 1)`.
 *
 * With the defaults a send makes four tries (one plus three retries) separated
 * by 1s, 2s and 4s. The next step of the schedule (8s) is not a retry; it is
 * exposed as {@link RetryPolicy.cooldownSeed} and used as the breaker's
 * initial cooldown.
 */
export class RetryPolicy {
    readonly #baseDelayMs: number;
    readonly #maxAttempts: number;
    readonly #maxDelayMs: number;
    readonly #jitterRatio: number;
    readonly #random: () => number;

    constructor(options: RetryPolicyOptions = {}) {
        this.#baseDelayMs = Math.max(0, options.baseDelayMs ?? 1000);
        this.#maxAttempts = Math.max(0, Math.floor(options.maxAttempts ?? 3));
        this.#maxDelayMs = Math.max(0, options.maxDelayMs ?? 30_000);
        this.#jitterRatio = Math.min(1, Math.max(0, options.jitterRatio ?? 0));
        this.#random = options.random ?? Math.random;
    }

    /** Number of retries allowed after the first attempt. */
    maxAttempts(): number {
        return this.#maxAttempts;
    }

    /** Longest backoff the policy will wait between two attempts. */
    maxDelayMs(): number {
        return this.#maxDelayMs;
    }

    /** Delay to wait after failed attempt number `attempt` (1-based). */
    nextDelay(attempt: number): number {
        const exponent = Math.max(0, Math.floor(attempt) - 1);
        const base = Math.min(this.#baseDelayMs * 2 ** exponent, this.#maxDelayMs);
        if (this.#jitterRatio === 0) return base;
        return Math.round(base + base * this.#jitterRatio * this.#random());
    }

    /** The schedule's step after the last retry; seeds the breaker cooldown. */
    cooldownSeed(): number {
        const exponent = this.#maxAttempts;
        return Math.min(this.#baseDelayMs * 2 ** exponent, this.#maxDelayMs);
    }
}

/**
 * Timer-based sleep that resolves early when `signal` aborts.
 * Never rejects: an aborted sleep simply ends.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
