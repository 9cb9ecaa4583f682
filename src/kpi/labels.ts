import type { ReferenceRange } from '../rules/types.js';
import type { Admission, DeviceType, Outcome } from './types.js';

const OUTCOME_DESTINATIONS: Record<Outcome, string> = {
    'discharged-alive': 'ward',
    deceased: 'deceased',
    transferred: 'other-hospital',
    unknown: 'ward',
};

const OUTCOME_ALIASES: Record<string, Outcome> = {
    'discharged-alive': 'discharged-alive',
    discharged: 'discharged-alive',
    alta: 'discharged-alive',
    deceased: 'deceased',
    death: 'deceased',
    died: 'deceased',
    obito: 'deceased',
    transferred: 'transferred',
    transfer: 'transferred',
    transferencia: 'transferred',
};

const DEVICE_ALIASES: Record<string, DeviceType> = {
    cvc: 'catheter',
    catheter: 'catheter',
    'central-line': 'catheter',
    foley: 'urinary-catheter',
    'urinary-catheter': 'urinary-catheter',
    art: 'arterial-line',
    'art.': 'arterial-line',
    art_line: 'arterial-line',
    'art-line': 'arterial-line',
    arterial: 'arterial-line',
    'arterial-line': 'arterial-line',
};

/**
 * Discharge destination label. Every admission maps to exactly one label.
 */
export function normalizeDestination(admission: Pick<Admission, 'destinationLabel' | 'outcome'>): string {
    const label = (admission.destinationLabel ?? '').trim().toLowerCase();
    if (label) {
        return label;
    }
    return OUTCOME_DESTINATIONS[admission.outcome] ?? 'ward';
}

export function parseOutcome(raw: unknown): Outcome {
    if (typeof raw !== 'string') {
        return 'unknown';
    }
    return OUTCOME_ALIASES[raw.trim().toLowerCase()] ?? 'unknown';
}

export function canonicalDeviceType(raw: string | null | undefined): DeviceType {
    return DEVICE_ALIASES[(raw ?? '').trim().toLowerCase()] ?? 'other';
}

function toNumber(value: number | string | null | undefined): number | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (value.trim() === '') return null;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Out-of-range marker for a lab value: `↑`, `↓`, a range-specific label,
 * or an empty string when the value is in range or cannot be judged.
 */
export function labFlag(
    test: string,
    value: number | string | null | undefined,
    ranges: Record<string, ReferenceRange>,
): string {
    const range = ranges[test.trim().toLowerCase()];
    const numeric = toNumber(value);
    if (!range || numeric === null) {
        return '';
    }

    if (range.low_threshold !== undefined && numeric < range.low_threshold) {
        return range.low_label ?? '↓';
    }
    if (range.high_threshold !== undefined && numeric > range.high_threshold) {
        return range.high_label ?? '↑';
    }
    return '';
}
