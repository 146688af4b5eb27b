import { createReadStream } from 'node:fs';
import { mkdir, open, readFile, rename, rm, stat, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline';
import type {
    BacklogLine,
    DeadLetterLine,
    JournalLine,
    LocalRecord,
    TelemetryEvent,
} from '../types/telemetry.js';
import { LocalStorageError } from '../types/errors.js';
import { logThought } from '../utils/logger.js';
import { RotationPolicy, utcDayStamp } from './rotation-policy.js';
import { createTelemetryEvent, isJsonObject } from './telemetry-event.js';

const INDEX_FILE = 'backlog.index.json';
const JOURNAL_FILE = 'backlog.journal.jsonl';
const DEAD_LETTER_FILE = 'dead-letter.jsonl';
const INDEX_VERSION = 1;

/** One backlog segment as registered in the index. */
export interface SegmentEntry {
    file: string;
    /** UTC day the segment was opened on, `YYYYMMDD`. */
    day: string;
    openedAt: string;
}

interface BacklogIndex {
    version: number;
    nextSeq: number;
    segments: SegmentEntry[];
}

interface JournalState {
    synced: Set<string>;
    attempts: Map<string, number>;
}

export interface SegmentInfo extends SegmentEntry {
    sizeBytes: number;
    active: boolean;
}

export interface CompactionResult {
    removedSegments: string[];
    prunedJournalEntries: number;
}

export interface LocalStoreOptions {
    /** Directory holding segments, index, journal and dead letters. */
    dir: string;
    rotation?: RotationPolicy;
    now?: () => Date;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Platforms that cannot open or fsync a directory report one of these. */
function cannotSyncDirectory(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'EISDIR' || err.code === 'EPERM' || err.code === 'EINVAL');
}

/**
 * Close `handle` after a file operation. Returns the error to report: the
 * operation's own failure when there was one, otherwise the close failure.
 */
async function closeHandle(handle: FileHandle | undefined, failure: unknown, filePath: string): Promise<unknown> {
    if (!handle) return failure;
    try {
        await handle.close();
    } catch (err) {
        if (failure === null) return err;
        void logThought(`[LocalStore] Also failed to close ${path.basename(filePath)}: ${errorMessage(err)}`, 'warn');
    }
    return failure;
}

/** Persist directory entries (created or renamed files) by fsyncing the directory. */
async function syncDirectory(dir: string): Promise<void> {
    let handle: FileHandle | undefined;
    let failure: unknown = null;
    try {
        handle = await open(dir, 'r');
        await handle.sync();
    } catch (err) {
        if (!cannotSyncDirectory(err)) failure = err;
    }
    failure = await closeHandle(handle, failure, dir);
    if (failure !== null) throw failure;
}

function toBacklogLine(record: LocalRecord): BacklogLine {
    return {
        id: record.event.id,
        channel: record.event.channel,
        kind: record.event.kind,
        timestamp: record.event.timestamp,
        payload: { ...record.event.payload },
        synced: record.synced,
        attempt_count: record.attemptCount,
    };
}

function parseBacklogLine(raw: string): BacklogLine | null {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch {
        return null;
    }
    if (!isJsonObject(value)) return null;

    const { id, channel, kind, timestamp, payload, synced, attempt_count: attemptCount } = value;
    if (typeof id !== 'string' || typeof channel !== 'string' || typeof timestamp !== 'string') return null;
    if (kind !== 'MEASUREMENT' && kind !== 'ALERT') return null;
    if (!isJsonObject(payload)) return null;

    return {
        id,
        channel,
        kind,
        timestamp,
        payload,
        synced: synced === true,
        attempt_count: typeof attemptCount === 'number' && Number.isFinite(attemptCount) ? attemptCount : 0,
    };
}

function parseJournalLine(raw: string): JournalLine | null {
    try {
        const value: unknown = JSON.parse(raw);
        if (!isJsonObject(value)) return null;
        const { op, id, at } = value;
        if ((op !== 'synced' && op !== 'attempt') || typeof id !== 'string') return null;
        return { op, id, at: typeof at === 'string' ? at : '' };
    } catch {
        return null;
    }
}

function parseIndex(raw: string): BacklogIndex | null {
    try {
        const value: unknown = JSON.parse(raw);
        if (!isJsonObject(value) || !Array.isArray(value.segments)) return null;
        const segments: SegmentEntry[] = [];
        for (const entry of value.segments) {
            if (!isJsonObject(entry)) return null;
            const { file, day, openedAt } = entry;
            if (typeof file !== 'string' || typeof day !== 'string') return null;
            segments.push({ file, day, openedAt: typeof openedAt === 'string' ? openedAt : '' });
        }
        const nextSeq = typeof value.nextSeq === 'number' ? value.nextSeq : segments.length + 1;
        return { version: INDEX_VERSION, nextSeq, segments };
    } catch {
        return null;
    }
}

/**
 * Append-only durable backlog of events that could not be delivered.
 *
 * Records are JSON lines in day-stamped segment files. `backlog.index.json`
 * lists the segments in creation order and is the only way segments are
 * found. Delivery confirmations go to an append-only journal, so segments are
 * never rewritten; fully-synced segments are dropped by {@link compact}.
 *
 * All writes go through a single promise chain, so concurrent appends never
 * interleave. Each append opens, writes, fsyncs and closes the segment before
 * it resolves.
 *
 * Single-process only: nothing guards the files against a second writer.
 */
export class LocalStore {
    readonly #dir: string;
    readonly #rotation: RotationPolicy;
    readonly #now: () => Date;
    #writeChain: Promise<void> = Promise.resolve();
    #journal: JournalState | null = null;

    constructor(options: LocalStoreOptions) {
        this.#dir = path.resolve(options.dir);
        this.#rotation = options.rotation ?? new RotationPolicy();
        this.#now = options.now ?? (() => new Date());
    }

    get directory(): string {
        return this.#dir;
    }

    get deadLetterPath(): string {
        return path.join(this.#dir, DEAD_LETTER_FILE);
    }

    /** Durably append one record to the active segment, rotating first if due. */
    async append(record: LocalRecord): Promise<void> {
        await this.#exclusive(async () => {
            const { segment } = await this.#rotateIfNeededLocked();
            const line = `${JSON.stringify(toBacklogLine(record))}\n`;
            await this.#appendDurable(path.join(this.#dir, segment.file), line);
        });
    }

    /** Close the active segment and start a new one when the policy says so. */
    async rotateIfNeeded(): Promise<boolean> {
        return this.#exclusive(async () => {
            const { rotated } = await this.#rotateIfNeededLocked();
            return rotated;
        });
    }

    /**
     * Yield every unsynced record in stored order (oldest segment first, then
     * line order). Each call re-reads index, journal and segments from disk.
     */
    async *scanUnsynced(): AsyncGenerator<LocalRecord> {
        const index = await this.#readIndex();
        const journal = await this.#readJournalState();
        const seen = new Set<string>();

        for (const segment of index.segments) {
            for await (const line of this.#readSegment(segment.file)) {
                if (seen.has(line.id)) continue;
                seen.add(line.id);
                if (line.synced || journal.synced.has(line.id)) continue;

                yield {
                    event: createTelemetryEvent({
                        id: line.id,
                        channel: line.channel,
                        kind: line.kind,
                        timestamp: line.timestamp,
                        payload: line.payload,
                    }),
                    synced: false,
                    attemptCount: line.attempt_count + (journal.attempts.get(line.id) ?? 0),
                };
            }
        }
    }

    /** Record that `id` reached the remote. Returns false when it already had. */
    async markSynced(id: string): Promise<boolean> {
        return this.#exclusive(async () => {
            const journal = await this.#loadJournal();
            if (journal.synced.has(id)) return false;

            await this.#appendJournal({ op: 'synced', id, at: this.#now().toISOString() });
            journal.synced.add(id);
            return true;
        });
    }

    /** Count one more failed delivery attempt against a backlog record. */
    async recordAttempt(id: string): Promise<void> {
        await this.#exclusive(async () => {
            const journal = await this.#loadJournal();
            await this.#appendJournal({ op: 'attempt', id, at: this.#now().toISOString() });
            journal.attempts.set(id, (journal.attempts.get(id) ?? 0) + 1);
        });
    }

    /** Park an event the remote will never accept. */
    async deadLetter(event: TelemetryEvent, reason: string, attemptCount = 0): Promise<void> {
        await this.#exclusive(async () => {
            const line: DeadLetterLine = {
                ...toBacklogLine({ event, synced: false, attemptCount }),
                reason,
                dead_lettered_at: this.#now().toISOString(),
            };
            await this.#appendDurable(this.deadLetterPath, `${JSON.stringify(line)}\n`);
        });
    }

    async countUnsynced(): Promise<number> {
        let count = 0;
        for await (const _record of this.scanUnsynced()) {
            count += 1;
        }
        return count;
    }

    async listSegments(): Promise<SegmentInfo[]> {
        const index = await this.#readIndex();
        const last = index.segments.length - 1;
        return Promise.all(
            index.segments.map(async (segment, position) => ({
                ...segment,
                sizeBytes: await this.#sizeOf(segment.file),
                active: position === last,
            })),
        );
    }

    /**
     * Delete closed segments whose every record is synced, and drop their
     * journal entries. The active segment is always kept.
     */
    async compact(): Promise<CompactionResult> {
        return this.#exclusive(async () => {
            const index = await this.#readIndex();
            const journal = await this.#readJournalState();
            const idsBySegment = new Map<string, Set<string>>();

            for (const segment of index.segments) {
                const ids = new Set<string>();
                for await (const line of this.#readSegment(segment.file)) {
                    ids.add(line.id);
                }
                idsBySegment.set(segment.file, ids);
            }

            const activeFile = index.segments[index.segments.length - 1]?.file;
            const removable = index.segments.filter((segment) => {
                if (segment.file === activeFile) return false;
                const ids = idsBySegment.get(segment.file) ?? new Set<string>();
                return [...ids].every((id) => journal.synced.has(id));
            });

            if (removable.length === 0) {
                return { removedSegments: [], prunedJournalEntries: 0 };
            }

            const removedFiles = new Set(removable.map((segment) => segment.file));
            const keptIds = new Set<string>();
            for (const [file, ids] of idsBySegment) {
                if (removedFiles.has(file)) continue;
                for (const id of ids) keptIds.add(id);
            }

            await this.#writeIndex({
                ...index,
                segments: index.segments.filter((segment) => !removedFiles.has(segment.file)),
            });

            const retained: JournalLine[] = [];
            let pruned = 0;
            for (const entry of await this.#readJournalLines()) {
                if (keptIds.has(entry.id)) {
                    retained.push(entry);
                } else {
                    pruned += 1;
                }
            }
            await this.#writeFileAtomic(
                path.join(this.#dir, JOURNAL_FILE),
                retained.map((entry) => `${JSON.stringify(entry)}\n`).join(''),
            );
            this.#journal = null;

            for (const segment of removable) {
                await rm(path.join(this.#dir, segment.file), { force: true });
            }

            void logThought(
                `[LocalStore] Compacted ${removable.length} fully-synced segment(s); pruned ${pruned} journal entr${pruned === 1 ? 'y' : 'ies'}.`,
            );

            return { removedSegments: removable.map((segment) => segment.file), prunedJournalEntries: pruned };
        });
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.#writeChain.then(task);
        this.#writeChain = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    async #rotateIfNeededLocked(): Promise<{ segment: SegmentEntry; rotated: boolean }> {
        const index = await this.#readIndex();
        const now = this.#now();
        const active = index.segments[index.segments.length - 1];

        if (active) {
            const decision = this.#rotation.evaluate(
                { day: active.day, sizeBytes: await this.#sizeOf(active.file) },
                now,
            );
            if (!decision.rotate) {
                return { segment: active, rotated: false };
            }
            void logThought(`[LocalStore] Rotating backlog segment ${active.file} (${decision.reason}).`);
        }

        const day = utcDayStamp(now);
        const segment: SegmentEntry = {
            file: `backlog-${day}-${String(index.nextSeq).padStart(4, '0')}.jsonl`,
            day,
            openedAt: now.toISOString(),
        };
        // The segment must exist on disk before the index points at it.
        await this.#createDurable(path.join(this.#dir, segment.file));
        await this.#writeIndex({
            version: INDEX_VERSION,
            nextSeq: index.nextSeq + 1,
            segments: [...index.segments, segment],
        });

        return { segment, rotated: active !== undefined };
    }

    async #readIndex(): Promise<BacklogIndex> {
        const indexPath = path.join(this.#dir, INDEX_FILE);
        let raw: string;
        try {
            raw = await readFile(indexPath, 'utf8');
        } catch (err) {
            if (isMissingFile(err)) {
                return { version: INDEX_VERSION, nextSeq: 1, segments: [] };
            }
            throw new LocalStorageError(`Failed to read backlog index: ${errorMessage(err)}`, indexPath);
        }

        const parsed = parseIndex(raw);
        if (!parsed) {
            throw new LocalStorageError('Backlog index is corrupt; refusing to guess segment order.', indexPath);
        }
        return parsed;
    }

    async #writeIndex(index: BacklogIndex): Promise<void> {
        await this.#writeFileAtomic(path.join(this.#dir, INDEX_FILE), JSON.stringify(index, null, 2));
    }

    async *#readSegment(file: string): AsyncGenerator<BacklogLine> {
        const segmentPath = path.join(this.#dir, file);
        try {
            await stat(segmentPath);
        } catch (err) {
            if (isMissingFile(err)) return;
            throw new LocalStorageError(`Failed to open backlog segment: ${errorMessage(err)}`, segmentPath);
        }

        const input = createReadStream(segmentPath, { encoding: 'utf8' });
        const lines = createInterface({ input, crlfDelay: Infinity });

        let lineNumber = 0;
        try {
            for await (const raw of lines) {
                lineNumber += 1;
                if (raw.trim() === '') continue;
                const parsed = parseBacklogLine(raw);
                if (!parsed) {
                    void logThought(`[LocalStore] Skipping malformed line ${lineNumber} in ${file}.`, 'warn');
                    continue;
                }
                yield parsed;
            }
        } finally {
            // Closing readline leaves the stream open when a caller stops early.
            lines.close();
            input.destroy();
        }
    }

    /** Cached journal state used by writers; only touched inside the write chain. */
    async #loadJournal(): Promise<JournalState> {
        if (!this.#journal) {
            this.#journal = await this.#readJournalState();
        }
        return this.#journal;
    }

    async #readJournalState(): Promise<JournalState> {
        const state: JournalState = { synced: new Set(), attempts: new Map() };
        for (const entry of await this.#readJournalLines()) {
            if (entry.op === 'synced') {
                state.synced.add(entry.id);
            } else {
                state.attempts.set(entry.id, (state.attempts.get(entry.id) ?? 0) + 1);
            }
        }
        return state;
    }

    async #readJournalLines(): Promise<JournalLine[]> {
        const journalPath = path.join(this.#dir, JOURNAL_FILE);
        let raw: string;
        try {
            raw = await readFile(journalPath, 'utf8');
        } catch (err) {
            if (isMissingFile(err)) return [];
            throw new LocalStorageError(`Failed to read sync journal: ${errorMessage(err)}`, journalPath);
        }

        const entries: JournalLine[] = [];
        for (const line of raw.split('\n')) {
            if (line.trim() === '') continue;
            const entry = parseJournalLine(line);
            if (entry) entries.push(entry);
        }
        return entries;
    }

    async #appendJournal(entry: JournalLine): Promise<void> {
        await this.#appendDurable(path.join(this.#dir, JOURNAL_FILE), `${JSON.stringify(entry)}\n`);
    }

    async #appendDurable(filePath: string, data: string): Promise<void> {
        let handle: FileHandle | undefined;
        let failure: unknown = null;
        try {
            await mkdir(path.dirname(filePath), { recursive: true });
            handle = await open(filePath, 'a');
            await handle.write(data);
            await handle.sync();
        } catch (err) {
            failure = err;
        }
        failure = await closeHandle(handle, failure, filePath);
        if (failure !== null) {
            throw new LocalStorageError(`Failed to append to ${path.basename(filePath)}: ${errorMessage(failure)}`, filePath);
        }
    }

    async #createDurable(filePath: string): Promise<void> {
        await this.#appendDurable(filePath, '');
        try {
            await syncDirectory(path.dirname(filePath));
        } catch (err) {
            throw new LocalStorageError(`Failed to create ${path.basename(filePath)}: ${errorMessage(err)}`, filePath);
        }
    }

    /** Write to a temp file, fsync it, rename over the target, then fsync the directory. */
    async #writeFileAtomic(targetPath: string, content: string): Promise<void> {
        const tempPath = `${targetPath}.${Date.now()}.tmp`;
        let handle: FileHandle | undefined;
        let failure: unknown = null;
        try {
            await mkdir(path.dirname(targetPath), { recursive: true });
            handle = await open(tempPath, 'w');
            await handle.writeFile(content, 'utf8');
            await handle.sync();
        } catch (err) {
            failure = err;
        }
        failure = await closeHandle(handle, failure, tempPath);

        if (failure === null) {
            try {
                await rename(tempPath, targetPath);
                await syncDirectory(path.dirname(targetPath));
            } catch (err) {
                failure = err;
            }
        }

        if (failure !== null) {
            await rm(tempPath, { force: true }).catch((err: unknown) => {
                void logThought(`[LocalStore] Could not remove ${path.basename(tempPath)}: ${errorMessage(err)}`, 'warn');
            });
            throw new LocalStorageError(`Failed to write ${path.basename(targetPath)}: ${errorMessage(failure)}`, targetPath);
        }
    }

    async #sizeOf(file: string): Promise<number> {
        try {
            return (await stat(path.join(this.#dir, file))).size;
        } catch (err) {
            if (isMissingFile(err)) return 0;
            throw new LocalStorageError(`Failed to stat ${file}: ${errorMessage(err)}`, path.join(this.#dir, file));
        }
    }
}
