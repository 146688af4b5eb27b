import type { TelemetryEvent } from '../types/telemetry.js';
import { IngestError } from '../types/errors.js';
import { scrubSensitiveText } from '../utils/logger.js';

export const CLIENT_VERSION = '1.0.0';
export const INGEST_API_VERSION = 'v1';

/** The remote ingestion call. Resolves on ack, rejects with an {@link IngestError}. */
export interface IngestTransport {
    readonly endpoint: string;
    ingest(event: TelemetryEvent, signal: AbortSignal): Promise<void>;
}

export interface HttpIngestTransportOptions {
    /** Base URL of the ingestion service, e.g. `https://ingest.example.com`. */
    baseUrl: string;
    dataset: string;
    token: string;
    orgId?: string;
    fetchFn?: typeof fetch;
    now?: () => Date;
}

function parseRetryAfterMs(value: string | null): number | null {
    if (!value) return null;
    const seconds = Number(value);
    if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
    const at = Date.parse(value);
    if (Number.isNaN(at)) return null;
    return Math.max(0, at - Date.now());
}

const VALIDATION_STATUSES: ReadonlySet<number> = new Set([400, 413, 422]);

/**
 * Map an HTTP status to the failure taxonomy. Only 400, 413 and 422 condemn
 * the event itself; any other 4xx (a wrong dataset, a moved endpoint) is kept
 * and retried like a server error.
 */
export function classifyStatus(status: number): IngestError['kind'] {
    if (status === 401 || status === 403) return 'auth';
    if (status === 429) return 'rate_limit';
    if (status === 408) return 'timeout';
    if (VALIDATION_STATUSES.has(status)) return 'validation';
    return 'server';
}

/**
 * HTTPS transport for the ingestion API.
 *
 * `POST {baseUrl}/v1/datasets/{dataset}/ingest` with a one-element JSON array
 * and a bearer token. Each event is stamped with `_metadata` describing the
 * client that sent it.
 */
export class HttpIngestTransport implements IngestTransport {
    readonly #url: string;
    readonly #token: string;
    readonly #orgId: string | undefined;
    readonly #fetch: typeof fetch;
    readonly #now: () => Date;

    constructor(options: HttpIngestTransportOptions) {
        const base = options.baseUrl.replace(/\/+$/, '');
        this.#url = `${base}/${INGEST_API_VERSION}/datasets/${encodeURIComponent(options.dataset)}/ingest`;
        this.#token = options.token;
        this.#orgId = options.orgId?.trim() || undefined;
        this.#fetch = options.fetchFn ?? fetch;
        this.#now = options.now ?? (() => new Date());
    }

    get endpoint(): string {
        return this.#url;
    }

    async ingest(event: TelemetryEvent, signal: AbortSignal): Promise<void> {
        const body = JSON.stringify([
            {
                ...event,
                _metadata: {
                    version: CLIENT_VERSION,
                    apiVersion: INGEST_API_VERSION,
                    sentAt: this.#now().toISOString(),
                },
            },
        ]);

        let response: Response;
        try {
            response = await this.#fetch(this.#url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.#token}`,
                    ...(this.#orgId ? { 'X-Org-Id': this.#orgId } : {}),
                },
                body,
                signal,
            });
        } catch (err) {
            if (signal.aborted) {
                throw new IngestError('timeout', 'Ingest request aborted (timeout).');
            }
            const message = err instanceof Error ? err.message : String(err);
            throw new IngestError('network', `Ingest request failed: ${scrubSensitiveText(message)}`);
        }

        if (response.ok) return;

        const detail = scrubSensitiveText((await response.text().catch(() => '')).slice(0, 300));
        const kind = classifyStatus(response.status);
        throw new IngestError(kind, `HTTP ${response.status}${detail ? `: ${detail}` : ''}`, {
            status: response.status,
            retryAfterMs: kind === 'rate_limit' ? parseRetryAfterMs(response.headers.get('retry-after')) : null,
        });
    }
}
