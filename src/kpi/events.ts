import { differenceInHours, sortedInstants, toInstant } from './interval.js';
import { admissionsThroughSector } from './cohort.js';
import type { Admission, RateMetric, SectorStay, Timestamp, VentilationRecord } from './types.js';

export interface EventMatch {
    trigger: Date;
    next: Date | null;
    gapHours: number | null;
    matched: boolean;
}

export type EventCount = Omit<RateMetric, 'rate'>;

/**
 * For every trigger, finds the earliest candidate strictly after it and flags
 * it when the gap is at most `thresholdHours`. Triggers are independent: the
 * same candidate may answer several triggers.
 */
export function findNextWithin(
    triggers: readonly Timestamp[],
    candidates: readonly Timestamp[],
    thresholdHours: number,
): EventMatch[] {
    const sortedCandidates = sortedInstants(candidates);

    return sortedInstants(triggers).map((trigger) => {
        const next = sortedCandidates.find((candidate) => candidate.getTime() > trigger.getTime()) ?? null;
        if (!next) {
            return { trigger, next: null, gapHours: null, matched: false };
        }
        const gapHours = differenceInHours(trigger, next);
        return { trigger, next, gapHours, matched: gapHours <= thresholdHours };
    });
}

function countMatches(matches: readonly EventMatch[]): number {
    return matches.filter((match) => match.matched).length;
}

/**
 * Readmissions into the same sector after a live discharge.
 *
 * Base: discharge-cohort admissions whose outcome is discharged-alive and
 * whose discharge instant is valid. Candidates: admission instants of the same
 * patient's other admissions that also have a stay in `sectorId`.
 */
export function detectReadmissions(
    dischargeCohort: readonly Admission[],
    patientAdmissions: readonly Admission[],
    sectorStays: readonly SectorStay[],
    sectorId: string,
    thresholdHours: number,
): EventCount {
    const inSector = admissionsThroughSector(sectorStays, sectorId);

    const candidatesByPatient = new Map<string, Admission[]>();
    for (const admission of patientAdmissions) {
        if (!inSector.has(admission.admissionId)) continue;
        const list = candidatesByPatient.get(admission.patientId) ?? [];
        list.push(admission);
        candidatesByPatient.set(admission.patientId, list);
    }

    let base = 0;
    let count = 0;
    for (const discharge of dischargeCohort) {
        const dischargedAt = toInstant(discharge.dischargedAt);
        if (discharge.outcome !== 'discharged-alive' || !dischargedAt) {
            continue;
        }
        base++;

        const candidates = (candidatesByPatient.get(discharge.patientId) ?? [])
            .filter((admission) => admission.admissionId !== discharge.admissionId)
            .map((admission) => admission.admittedAt);

        const [match] = findNextWithin([dischargedAt], candidates, thresholdHours);
        if (match?.matched) {
            count++;
        }
    }

    return { count, base };
}

/**
 * Each valid extubation is one opportunity; it counts when an intubation
 * follows within the threshold.
 */
export function detectReintubations(record: VentilationRecord, thresholdHours: number): EventCount {
    const matches = findNextWithin(record.extubations, record.intubations, thresholdHours);
    return { count: countMatches(matches), base: matches.length };
}
