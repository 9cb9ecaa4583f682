import { describe, it, expect } from 'vitest';
import {
    differenceInDays,
    differenceInHours,
    elapsedSeconds,
    overlapSeconds,
    sortedInstants,
    toInstant,
    toIsoDate,
    toIsoUtc,
} from '../../../src/kpi/interval.js';

describe('toInstant', () => {
    it('should accept strings with Z or an explicit offset', () => {
        expect(toInstant('2024-03-01T10:00:00Z')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
        expect(toInstant('2024-03-01T10:00:00+02:00')?.toISOString()).toBe('2024-03-01T08:00:00.000Z');
    });

    it('should reject naive timestamps', () => {
        expect(toInstant('2024-03-01T10:00:00')).toBeNull();
        expect(toInstant('2024-03-01')).toBeNull();
    });

    it('should reject missing and unparsable values', () => {
        expect(toInstant(null)).toBeNull();
        expect(toInstant(undefined)).toBeNull();
        expect(toInstant('not a dateZ')).toBeNull();
        expect(toInstant(new Date('invalid'))).toBeNull();
    });

    it('should pass valid Date objects through', () => {
        const date = new Date('2024-03-01T10:00:00Z');
        expect(toInstant(date)).toBe(date);
    });
});

describe('overlapSeconds', () => {
    const windowStart = '2024-03-01T00:00:00Z';
    const windowEnd = '2024-03-02T00:00:00Z';
    const now = new Date('2024-03-10T00:00:00Z');

    it('should return the shared part of two intervals', () => {
        expect(overlapSeconds('2024-02-29T12:00:00Z', '2024-03-01T06:00:00Z', windowStart, windowEnd, now)).toBe(6 * 3600);
    });

    it('should count five days for a stay that ends inside a later window', () => {
        // min(Jan 10, Jan 15) - max(Jan 1, Jan 5)
        expect(overlapSeconds('2024-01-01T00:00:00Z', '2024-01-10T00:00:00Z', '2024-01-05T00:00:00Z', '2024-01-15T00:00:00Z', now)).toBe(5 * 86400);
    });

    it('should clip an open interval at the window end when now is later', () => {
        expect(overlapSeconds('2024-01-01T00:00:00Z', null, '2024-01-01T00:00:00Z', '2024-01-02T00:00:00Z', new Date('2024-01-20T00:00:00Z'))).toBe(86400);
    });

    it('should clip to the window on both sides', () => {
        expect(overlapSeconds('2024-02-20T00:00:00Z', '2024-03-05T00:00:00Z', windowStart, windowEnd, now)).toBe(86400);
    });

    it('should return 0 when intervals only touch', () => {
        expect(overlapSeconds('2024-02-29T00:00:00Z', windowStart, windowStart, windowEnd, now)).toBe(0);
        expect(overlapSeconds(windowEnd, '2024-03-03T00:00:00Z', windowStart, windowEnd, now)).toBe(0);
    });

    it('should run open intervals until now', () => {
        const midday = new Date('2024-03-01T12:00:00Z');
        expect(overlapSeconds('2024-03-01T06:00:00Z', null, windowStart, windowEnd, midday)).toBe(6 * 3600);
    });

    it('should return 0 for invalid endpoints', () => {
        expect(overlapSeconds('2024-03-01T06:00:00', null, windowStart, windowEnd, now)).toBe(0);
        expect(overlapSeconds('2024-03-01T06:00:00Z', 'garbage', windowStart, windowEnd, now)).toBe(0);
    });

    it('should never be negative for inverted intervals', () => {
        expect(overlapSeconds('2024-03-01T12:00:00Z', '2024-03-01T06:00:00Z', windowStart, windowEnd, now)).toBe(0);
    });
});

describe('elapsedSeconds', () => {
    it('should measure closed and open intervals', () => {
        const now = new Date('2024-03-02T00:00:00Z');
        expect(elapsedSeconds('2024-03-01T00:00:00Z', '2024-03-01T02:00:00Z', now)).toBe(7200);
        expect(elapsedSeconds('2024-03-01T00:00:00Z', null, now)).toBe(86400);
    });

    it('should return 0 for an invalid start or end', () => {
        const now = new Date('2024-03-02T00:00:00Z');
        expect(elapsedSeconds(null, '2024-03-01T02:00:00Z', now)).toBe(0);
        expect(elapsedSeconds('2024-03-01T00:00:00Z', 'nope', now)).toBe(0);
    });
});

describe('formatting helpers', () => {
    it('should compute signed differences', () => {
        const a = new Date('2024-03-01T00:00:00Z');
        const b = new Date('2024-03-02T12:00:00Z');
        expect(differenceInDays(a, b)).toBe(1.5);
        expect(differenceInHours(a, b)).toBe(36);
        expect(differenceInHours(b, a)).toBe(-36);
    });

    it('should drop zero milliseconds in UTC output', () => {
        expect(toIsoUtc(new Date('2024-03-01T10:00:00Z'))).toBe('2024-03-01T10:00:00Z');
        expect(toIsoUtc(new Date('2024-03-01T10:00:00.250Z'))).toBe('2024-03-01T10:00:00.250Z');
        expect(toIsoDate(new Date('2024-03-01T23:59:00Z'))).toBe('2024-03-01');
    });

    it('should sort instants and drop invalid ones', () => {
        const sorted = sortedInstants(['2024-03-02T00:00:00Z', 'bad', '2024-03-01T00:00:00Z']);
        expect(sorted.map(toIsoUtc)).toEqual(['2024-03-01T00:00:00Z', '2024-03-02T00:00:00Z']);
    });
});
