import type { Timestamp } from './types.js';

export const SECONDS_PER_DAY = 86_400;
export const SECONDS_PER_HOUR = 3_600;

// Strings must end in Z or an explicit ±hh:mm / ±hhmm offset
const EXPLICIT_OFFSET = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Normalizes a stored timestamp to a `Date`, or `null` when it is missing,
 * unparsable or lacks an explicit offset.
 */
export function toInstant(value: Timestamp | null | undefined): Date | null {
    if (value === null || value === undefined) {
        return null;
    }

    if (value instanceof Date) {
        return isNaN(value.getTime()) ? null : value;
    }

    const trimmed = value.trim();
    if (!EXPLICIT_OFFSET.test(trimmed)) {
        return null;
    }

    const parsed = new Date(trimmed);
    return isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Seconds shared by `[aStart, aEnd)` and `[windowStart, windowEnd)`.
 * An absent `aEnd` means the interval is still open and runs until `now`.
 */
export function overlapSeconds(
    aStart: Timestamp | null | undefined,
    aEnd: Timestamp | null | undefined,
    windowStart: Timestamp,
    windowEnd: Timestamp,
    now: Date,
): number {
    const start = toInstant(aStart);
    const windowFrom = toInstant(windowStart);
    const windowTo = toInstant(windowEnd);
    if (!start || !windowFrom || !windowTo) {
        return 0;
    }

    let end: Date | null = now;
    if (aEnd !== null && aEnd !== undefined) {
        end = toInstant(aEnd);
        if (!end) {
            return 0;
        }
    }

    const from = Math.max(start.getTime(), windowFrom.getTime());
    const to = Math.min(end.getTime(), windowTo.getTime());
    const seconds = (to - from) / 1000;
    return seconds > 0 ? seconds : 0;
}

/**
 * Length of `[start, end)` in seconds, with an absent `end` running until
 * `now`. Zero when an instant is invalid or the interval is inverted.
 */
export function elapsedSeconds(
    start: Timestamp | null | undefined,
    end: Timestamp | null | undefined,
    now: Date,
): number {
    const from = toInstant(start);
    if (!from) {
        return 0;
    }
    const to = end === null || end === undefined ? now : toInstant(end);
    if (!to) {
        return 0;
    }
    const seconds = (to.getTime() - from.getTime()) / 1000;
    return seconds > 0 ? seconds : 0;
}

export function differenceInDays(a: Date, b: Date): number {
    return (b.getTime() - a.getTime()) / 1000 / SECONDS_PER_DAY;
}

export function differenceInHours(a: Date, b: Date): number {
    return (b.getTime() - a.getTime()) / 1000 / SECONDS_PER_HOUR;
}

export function toIsoUtc(value: Date): string {
    return value.toISOString().replace('.000Z', 'Z');
}

export function toIsoDate(value: Date): string {
    return value.toISOString().slice(0, 10);
}

/**
 * Valid instants of `values`, ascending. Invalid entries are dropped.
 */
export function sortedInstants(values: readonly Timestamp[]): Date[] {
    const instants: Date[] = [];
    for (const value of values) {
        const instant = toInstant(value);
        if (instant) {
            instants.push(instant);
        }
    }
    return instants.sort((a, b) => a.getTime() - b.getTime());
}
