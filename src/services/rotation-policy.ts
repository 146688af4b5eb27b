import type { RotationMode, RotationSettings } from '../types/telemetry.js';

/** The facts about the active segment a rotation decision depends on. */
export interface ActiveSegmentInfo {
    /** UTC day the segment was opened on, `YYYYMMDD`. */
    day: string;
    sizeBytes: number;
}

export type RotationDecision =
    | { rotate: false }
    | { rotate: true; reason: 'day_changed' | 'size_exceeded' };

export const DEFAULT_ROTATION: RotationSettings = {
    mode: 'daily-or-size',
    maxBytes: 5 * 1024 * 1024,
};

/** `YYYYMMDD` of the given instant in UTC. */
export function utcDayStamp(at: Date): string {
    return at.toISOString().slice(0, 10).replace(/-/g, '');
}

/**
 * Decides when the active backlog segment is closed and a new one started.
 *
 * - `daily`: rotate at UTC midnight.
 * - `size`: rotate once the segment reaches `maxBytes`.
 * - `daily-or-size`: whichever comes first.
 */
export class RotationPolicy {
    readonly mode: RotationMode;
    readonly maxBytes: number;

    constructor(settings: Partial<RotationSettings> = {}) {
        this.mode = settings.mode ?? DEFAULT_ROTATION.mode;
        const maxBytes = settings.maxBytes ?? DEFAULT_ROTATION.maxBytes;
        this.maxBytes = Number.isFinite(maxBytes) && maxBytes > 0 ? Math.floor(maxBytes) : DEFAULT_ROTATION.maxBytes;
    }

    evaluate(segment: ActiveSegmentInfo, now: Date): RotationDecision {
        const checksDay = this.mode === 'daily' || this.mode === 'daily-or-size';
        const checksSize = this.mode === 'size' || this.mode === 'daily-or-size';

        if (checksDay && segment.day !== utcDayStamp(now)) {
            return { rotate: true, reason: 'day_changed' };
        }
        if (checksSize && segment.sizeBytes >= this.maxBytes) {
            return { rotate: true, reason: 'size_exceeded' };
        }
        return { rotate: false };
    }
}

/** Parse a configured mode string, falling back to the default. */
export function parseRotationMode(raw: string | undefined): RotationMode {
    if (raw === 'daily' || raw === 'size' || raw === 'daily-or-size') return raw;
    return DEFAULT_ROTATION.mode;
}
