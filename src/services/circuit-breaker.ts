import type {
    CircuitSnapshot,
    CircuitState,
    CircuitTransition,
    CircuitTransitionListener,
} from '../types/telemetry.js';
import { logThought } from '../utils/logger.js';

export interface CircuitBreakerOptions {
    /** Label used in log lines, usually the remote endpoint. */
    name?: string;
    /** Consecutive failures (within the window) that open the circuit. @default 3 */
    failureThreshold?: number;
    /** Initial open-state cooldown. @default 8000 */
    cooldownMs?: number;
    /** Cap for the cooldown after repeated half-open failures. @default 30000 */
    maxCooldownMs?: number;
    /** A failure older than this restarts the count. @default 60000 */
    failureWindowMs?: number;
    now?: () => number;
}

const DEFAULTS = {
    failureThreshold: 3,
    cooldownMs: 8_000,
    maxCooldownMs: 30_000,
    failureWindowMs: 60_000,
};

/**
 * Health tracker for a remote dependency.
 *
 * closed → open once `failureThreshold` consecutive failures land inside the
 * rolling window. open → half-open once the cooldown has elapsed, where a
 * single trial request is let through. The trial's outcome closes the circuit
 * or re-opens it with a doubled cooldown (capped at `maxCooldownMs`).
 *
 * Every method is synchronous, so calls from concurrent senders are applied
 * one at a time by the event loop.
 */
export class CircuitBreaker {
    readonly #name: string;
    readonly #failureThreshold: number;
    readonly #baseCooldownMs: number;
    readonly #maxCooldownMs: number;
    readonly #failureWindowMs: number;
    readonly #now: () => number;
    readonly #listeners: Set<CircuitTransitionListener> = new Set();

    #state: CircuitState = 'closed';
    #failureCount = 0;
    #lastFailureAt: number | null = null;
    #openedAt: number | null = null;
    #cooldownMs: number;
    #trialInFlight = false;

    constructor(options: CircuitBreakerOptions = {}) {
        this.#name = options.name ?? 'remote';
        this.#failureThreshold = Math.max(1, Math.floor(options.failureThreshold ?? DEFAULTS.failureThreshold));
        this.#baseCooldownMs = Math.max(0, options.cooldownMs ?? DEFAULTS.cooldownMs);
        this.#maxCooldownMs = Math.max(this.#baseCooldownMs, options.maxCooldownMs ?? DEFAULTS.maxCooldownMs);
        this.#failureWindowMs = Math.max(0, options.failureWindowMs ?? DEFAULTS.failureWindowMs);
        this.#now = options.now ?? (() => Date.now());
        this.#cooldownMs = this.#baseCooldownMs;
    }

    get state(): CircuitState {
        this.#checkCooldown();
        return this.#state;
    }

    /**
     * Whether a request may go out now.
     *
     * In the open state before the cooldown expires this returns false and
     * changes nothing. In half-open it returns true exactly once, until the
     * trial is resolved by {@link recordSuccess} or {@link recordFailure}.
     */
    allow(): boolean {
        this.#checkCooldown();

        if (this.#state === 'closed') return true;
        if (this.#state === 'open') return false;

        if (this.#trialInFlight) return false;
        this.#trialInFlight = true;
        return true;
    }

    recordSuccess(): void {
        this.#checkCooldown();

        if (this.#state === 'half-open') {
            this.#failureCount = 0;
            this.#cooldownMs = this.#baseCooldownMs;
            this.#trialInFlight = false;
            this.#openedAt = null;
            this.#transition('closed', 'Trial request succeeded');
            return;
        }

        this.#failureCount = 0;
    }

    recordFailure(reason = 'unknown error'): void {
        this.#checkCooldown();
        const now = this.#now();

        if (this.#state === 'half-open') {
            this.#trialInFlight = false;
            this.#lastFailureAt = now;
            this.#failureCount += 1;
            this.#cooldownMs = Math.min(this.#cooldownMs * 2, this.#maxCooldownMs);
            this.#openedAt = now;
            this.#transition('open', `Trial request failed: ${reason}`);
            return;
        }

        if (this.#state === 'open') {
            // A late result from a request that started before the circuit opened.
            this.#lastFailureAt = now;
            this.#failureCount += 1;
            return;
        }

        if (this.#lastFailureAt !== null && now - this.#lastFailureAt > this.#failureWindowMs) {
            this.#failureCount = 0;
        }
        this.#failureCount += 1;
        this.#lastFailureAt = now;

        if (this.#failureCount >= this.#failureThreshold) {
            this.#openedAt = now;
            this.#transition(
                'open',
                `Failure threshold ${this.#failureThreshold} reached. Last error: ${reason}`,
            );
        }
    }

    /** Force the circuit closed and clear all counters. */
    reset(): void {
        const previous = this.#state;
        this.#failureCount = 0;
        this.#lastFailureAt = null;
        this.#openedAt = null;
        this.#cooldownMs = this.#baseCooldownMs;
        this.#trialInFlight = false;
        if (previous !== 'closed') {
            this.#transition('closed', 'Manual reset');
        }
    }

    snapshot(): CircuitSnapshot {
        this.#checkCooldown();
        const remaining = this.#state === 'open' && this.#openedAt !== null
            ? Math.max(0, this.#cooldownMs - (this.#now() - this.#openedAt))
            : 0;

        return {
            state: this.#state,
            failureCount: this.#failureCount,
            lastFailureAt: this.#lastFailureAt === null ? null : new Date(this.#lastFailureAt).toISOString(),
            openedAt: this.#openedAt === null ? null : new Date(this.#openedAt).toISOString(),
            cooldownMs: this.#cooldownMs,
            remainingCooldownMs: remaining,
            trialInFlight: this.#trialInFlight,
        };
    }

    /** Subscribe to state transitions. Returns an unsubscribe function. */
    onTransition(listener: CircuitTransitionListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #checkCooldown(): void {
        if (this.#state !== 'open' || this.#openedAt === null) return;
        if (this.#now() - this.#openedAt >= this.#cooldownMs) {
            this.#trialInFlight = false;
            this.#transition('half-open', 'Cooldown expired');
        }
    }

    #transition(newState: CircuitState, reason: string): void {
        const previousState = this.#state;
        this.#state = newState;

        const transition: CircuitTransition = {
            previousState,
            newState,
            reason,
            at: new Date(this.#now()).toISOString(),
        };

        const label = newState.toUpperCase();
        void logThought(
            `[CircuitBreaker] Circuit for '${this.#name}' transitioned ${previousState.toUpperCase()} → ${label} (${reason}).`,
            newState === 'open' ? 'warn' : 'info',
        );

        for (const listener of this.#listeners) {
            try {
                listener(transition);
            } catch (listenerErr) {
                console.error('[CircuitBreaker] Transition listener threw an error:', listenerErr);
            }
        }
    }
}
