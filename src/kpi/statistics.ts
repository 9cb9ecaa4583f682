import type { SummaryStats } from './types.js';

export function roundTo(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

function sortedCopy(samples: readonly number[]): number[] {
    return [...samples].sort((a, b) => a - b);
}

export function mean(samples: readonly number[]): number {
    if (samples.length === 0) return 0;
    return samples.reduce((sum, value) => sum + value, 0) / samples.length;
}

export function median(samples: readonly number[]): number {
    if (samples.length === 0) return 0;
    const sorted = sortedCopy(samples);
    const middle = Math.floor(sorted.length / 2);
    if (sorted.length % 2 === 1) {
        return sorted[middle];
    }
    return (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * 90th percentile with linear interpolation between the ranks around
 * `0.9 * (n - 1)`.
 */
export function percentile90(samples: readonly number[]): number {
    if (samples.length === 0) return 0;
    const sorted = sortedCopy(samples);
    const rank = 0.9 * (sorted.length - 1);
    const lower = Math.floor(rank);
    const upper = Math.ceil(rank);
    if (lower === upper) {
        return sorted[lower];
    }
    return sorted[lower] + (rank - lower) * (sorted[upper] - sorted[lower]);
}

export function summarize(samples: readonly number[]): SummaryStats {
    if (samples.length === 0) {
        return { mean: 0, median: 0, p90: 0 };
    }
    return {
        mean: roundTo(mean(samples), 2),
        median: roundTo(median(samples), 2),
        p90: roundTo(percentile90(samples), 2),
    };
}

export function safeRatio(numerator: number, denominator: number, precision = 4): number {
    if (denominator === 0) return 0;
    return roundTo(numerator / denominator, precision);
}
