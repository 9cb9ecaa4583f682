import { overlapSeconds, SECONDS_PER_DAY, toInstant } from './interval.js';
import type { Admission, QueryWindow, SectorStay } from './types.js';

export interface PresenceCohort {
    /** Every admission with a stay in the sector touching the window, sorted */
    admissionIds: string[];
    /** Days inside the window, only for admissions with a positive overlap */
    losDaysByAdmission: Map<string, number>;
}

/**
 * Whether a stay counts as present in the window:
 * `start < window.end` and (`end >= window.start` or still open).
 */
export function isPresentInWindow(stay: SectorStay, window: QueryWindow): boolean {
    const start = toInstant(stay.start);
    if (!start || start.getTime() >= window.end.getTime()) {
        return false;
    }

    if (stay.end === null || stay.end === undefined) {
        return true;
    }

    const end = toInstant(stay.end);
    return end !== null && end.getTime() >= window.start.getTime();
}

export function resolvePresenceCohort(
    stays: readonly SectorStay[],
    sectorId: string,
    window: QueryWindow,
    now: Date,
): PresenceCohort {
    const members = new Set<string>();
    const secondsByAdmission = new Map<string, number>();

    for (const stay of stays) {
        if (!stay.admissionId || stay.sectorId !== sectorId || !isPresentInWindow(stay, window)) {
            continue;
        }

        members.add(stay.admissionId);

        const seconds = overlapSeconds(stay.start, stay.end, window.start, window.end, now);
        if (seconds > 0) {
            secondsByAdmission.set(
                stay.admissionId,
                (secondsByAdmission.get(stay.admissionId) ?? 0) + seconds,
            );
        }
    }

    const losDaysByAdmission = new Map<string, number>();
    for (const admissionId of [...secondsByAdmission.keys()].sort()) {
        losDaysByAdmission.set(admissionId, (secondsByAdmission.get(admissionId) ?? 0) / SECONDS_PER_DAY);
    }

    return {
        admissionIds: [...members].sort(),
        losDaysByAdmission,
    };
}

/**
 * Admission ids that have at least one stay in the sector, at any time.
 */
export function admissionsThroughSector(stays: readonly SectorStay[], sectorId: string): Set<string> {
    const ids = new Set<string>();
    for (const stay of stays) {
        if (stay.sectorId === sectorId && stay.admissionId) {
            ids.add(stay.admissionId);
        }
    }
    return ids;
}

/**
 * Admissions discharged in `[window.start, window.end)` that passed through
 * the sector at some point, ordered by discharge instant then id.
 */
export function resolveDischargeCohort(
    admissions: readonly Admission[],
    sectorStays: readonly SectorStay[],
    sectorId: string,
    window: QueryWindow,
): Admission[] {
    const passedThrough = admissionsThroughSector(sectorStays, sectorId);
    const from = window.start.getTime();
    const to = window.end.getTime();

    const seen = new Set<string>();
    const cohort: Array<{ admission: Admission; dischargedAt: number }> = [];
    for (const admission of admissions) {
        const dischargedAt = toInstant(admission.dischargedAt);
        if (!dischargedAt || !passedThrough.has(admission.admissionId) || seen.has(admission.admissionId)) {
            continue;
        }
        const time = dischargedAt.getTime();
        if (time >= from && time < to) {
            seen.add(admission.admissionId);
            cohort.push({ admission, dischargedAt: time });
        }
    }

    return cohort
        .sort((a, b) =>
            a.dischargedAt - b.dischargedAt || a.admission.admissionId.localeCompare(b.admission.admissionId),
        )
        .map(({ admission }) => admission);
}
