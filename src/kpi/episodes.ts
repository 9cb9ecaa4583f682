import {
    differenceInHours,
    elapsedSeconds,
    overlapSeconds,
    SECONDS_PER_DAY,
    sortedInstants,
    toInstant,
    toIsoDate,
    toIsoUtc,
} from './interval.js';
import { detectReintubations, findNextWithin, type EventCount } from './events.js';
import { canonicalDeviceType, labFlag } from './labels.js';
import { roundTo, safeRatio } from './statistics.js';
import type { KpiRules } from '../rules/types.js';
import {
    DEVICE_FLAGS,
    type Admission,
    type AntibioticRankingEntry,
    type AntibioticUsage,
    type DeviceDayAggregate,
    type DeviceDayRecord,
    type DeviceFlag,
    type DeviceType,
    type DeviceTypeSummary,
    type DeviceUsePeriod,
    type DeviceUtilization,
    type LabLatest,
    type LabPoint,
    type LabResult,
    type PatientKpiDocument,
    type QueryWindow,
    type SerializedPeriod,
    type Timestamp,
    type VentilationRecord,
} from './types.js';

const UNKNOWN_ANTIBIOTIC = 'unknown';

function serializeInstant(value: Timestamp | null | undefined): string | null {
    const instant = toInstant(value);
    return instant ? toIsoUtc(instant) : null;
}

// ---------------------------------------------------------------------------
// Ventilation
// ---------------------------------------------------------------------------

export interface VentilationSummary {
    /** Hours from admission to first intubation, one entry per intubated admission */
    timeToFirstIntubationHours: number[];
    /** Ventilated days inside the window, one entry per admission with positive overlap */
    ventilatedDays: number[];
    reintubation: EventCount;
}

/**
 * Seconds of ventilation inside the window; open periods run until `now`.
 */
export function ventilatedSecondsInWindow(record: VentilationRecord, window: QueryWindow, now: Date): number {
    return record.periods.reduce(
        (total, period) => total + overlapSeconds(period.start, period.end, window.start, window.end, now),
        0,
    );
}

/**
 * Hours from admission to the earliest valid intubation, or `null`.
 */
export function timeToFirstIntubationHours(
    record: VentilationRecord,
    admittedAt: Timestamp | null | undefined,
): number | null {
    const [firstIntubation] = sortedInstants(record.intubations);
    const admission = toInstant(admittedAt);
    if (!firstIntubation || !admission) {
        return null;
    }
    return differenceInHours(admission, firstIntubation);
}

export function buildVentilationSummary(
    records: readonly VentilationRecord[],
    admissions: readonly Admission[],
    cohortIds: ReadonlySet<string>,
    window: QueryWindow,
    now: Date,
    reintubationWindowHours: number,
): VentilationSummary {
    const admittedAt = new Map(admissions.map((admission) => [admission.admissionId, admission.admittedAt]));

    const summary: VentilationSummary = {
        timeToFirstIntubationHours: [],
        ventilatedDays: [],
        reintubation: { count: 0, base: 0 },
    };

    for (const record of records) {
        if (!cohortIds.has(record.admissionId)) {
            continue;
        }

        const hours = timeToFirstIntubationHours(record, admittedAt.get(record.admissionId));
        if (hours !== null) {
            summary.timeToFirstIntubationHours.push(hours);
        }

        const seconds = ventilatedSecondsInWindow(record, window, now);
        if (seconds > 0) {
            summary.ventilatedDays.push(seconds / SECONDS_PER_DAY);
        }

        const reintubation = detectReintubations(record, reintubationWindowHours);
        summary.reintubation.count += reintubation.count;
        summary.reintubation.base += reintubation.base;
    }

    return summary;
}

export function summarizePatientVentilation(
    record: VentilationRecord | null,
    admittedAt: Timestamp | null | undefined,
    now: Date,
    reintubationWindowHours: number,
): PatientKpiDocument['ventilation'] {
    if (!record) {
        return {
            totalDays: 0,
            timeToFirstIntubationHours: null,
            periods: [],
            extubations: [],
            reintubated48h: false,
        };
    }

    const totalSeconds = record.periods.reduce(
        (total, period) => total + elapsedSeconds(period.start, period.end, now),
        0,
    );

    const periods: SerializedPeriod[] = record.periods.map((period) => ({
        start: serializeInstant(period.start),
        end: serializeInstant(period.end),
        endSource: period.endSource ?? '',
    }));

    const hours = timeToFirstIntubationHours(record, admittedAt);
    const matches = findNextWithin(record.extubations, record.intubations, reintubationWindowHours);

    return {
        totalDays: roundTo(totalSeconds / SECONDS_PER_DAY, 2),
        timeToFirstIntubationHours: hours === null ? null : roundTo(hours, 2),
        periods,
        extubations: sortedInstants(record.extubations).map(toIsoUtc),
        reintubated48h: matches.some((match) => match.matched),
    };
}

// ---------------------------------------------------------------------------
// Device days
// ---------------------------------------------------------------------------

function emptyByFlag<T>(factory: () => T): Record<DeviceFlag, T> {
    return {
        ventilated: factory(),
        catheter: factory(),
        urinaryCatheter: factory(),
        arterialLine: factory(),
    };
}

/**
 * Rolls device-day rows (already scoped to sector and window) into counts
 * and distinct admission sets per device.
 */
export function aggregateDeviceDays(rows: readonly DeviceDayRecord[]): DeviceDayAggregate {
    const deviceDaysByType = emptyByFlag(() => 0);
    const idsByType = emptyByFlag(() => new Set<string>());
    const allIds = new Set<string>();

    for (const row of rows) {
        if (row.admissionId) {
            allIds.add(row.admissionId);
        }
        for (const flag of DEVICE_FLAGS) {
            if (row[flag] === true) {
                deviceDaysByType[flag]++;
                if (row.admissionId) {
                    idsByType[flag].add(row.admissionId);
                }
            }
        }
    }

    const admissionIdsByType = emptyByFlag<string[]>(() => []);
    for (const flag of DEVICE_FLAGS) {
        admissionIdsByType[flag] = [...idsByType[flag]].sort();
    }

    return {
        patientDays: rows.length,
        deviceDaysByType,
        admissionIdsByType,
        admissionIds: [...allIds].sort(),
    };
}

export function buildDeviceUtilization(aggregate: DeviceDayAggregate, flag: DeviceFlag): DeviceUtilization {
    const deviceDays = aggregate.deviceDaysByType[flag];
    const patients = aggregate.admissionIdsByType[flag].length;
    const totalPatients = aggregate.admissionIds.length;

    return {
        deviceDays,
        patientDays: aggregate.patientDays,
        utilization: safeRatio(deviceDays, aggregate.patientDays, 4),
        patients,
        totalPatients,
        fraction: safeRatio(patients, totalPatients, 4),
    };
}

const DEVICE_TYPE_ORDER: readonly DeviceType[] = ['catheter', 'urinary-catheter', 'arterial-line', 'other'];

export function groupDeviceUse(periods: readonly DeviceUsePeriod[], now: Date): DeviceTypeSummary[] {
    const grouped = new Map<DeviceType, DeviceUsePeriod[]>();
    for (const period of periods) {
        const type = canonicalDeviceType(period.deviceType);
        const list = grouped.get(type) ?? [];
        list.push(period);
        grouped.set(type, list);
    }

    const byStart = (a: DeviceUsePeriod, b: DeviceUsePeriod): number =>
        (toInstant(a.start)?.getTime() ?? Infinity) - (toInstant(b.start)?.getTime() ?? Infinity);

    return DEVICE_TYPE_ORDER.flatMap((type) => {
        const list = grouped.get(type);
        if (!list) {
            return [];
        }
        const sorted = [...list].sort(byStart);
        const totalSeconds = sorted.reduce(
            (total, period) => total + elapsedSeconds(period.start, period.end, now),
            0,
        );
        return [{
            type,
            totalDays: roundTo(totalSeconds / SECONDS_PER_DAY, 2),
            periods: sorted.map((period) => ({
                start: serializeInstant(period.start),
                end: serializeInstant(period.end),
                endSource: period.endSource ?? '',
                rawType: period.deviceType ?? '',
            })),
        }];
    });
}

// ---------------------------------------------------------------------------
// Antibiotics
// ---------------------------------------------------------------------------

function antibioticName(usage: AntibioticUsage): string {
    const name = (usage.antibioticName ?? '').trim();
    return name || UNKNOWN_ANTIBIOTIC;
}

/**
 * Days of therapy inside the window per antibiotic, restricted to the
 * cohort, ordered by DOT (desc) then name.
 */
export function buildAntibioticRanking(
    usages: readonly AntibioticUsage[],
    cohortIds: ReadonlySet<string>,
    window: QueryWindow,
    now: Date,
): AntibioticRankingEntry[] {
    const dotDays = new Map<string, number>();
    const exposed = new Map<string, Set<string>>();

    for (const usage of usages) {
        if (!cohortIds.has(usage.admissionId)) {
            continue;
        }
        const name = antibioticName(usage);

        for (const period of usage.periods) {
            // Dosing periods are closed; a missing end makes the period unusable
            if (period.end === null || period.end === undefined) {
                continue;
            }
            const seconds = overlapSeconds(period.start, period.end, window.start, window.end, now);
            if (seconds <= 0) {
                continue;
            }

            dotDays.set(name, (dotDays.get(name) ?? 0) + seconds / SECONDS_PER_DAY);
            const admissions = exposed.get(name) ?? new Set<string>();
            admissions.add(usage.admissionId);
            exposed.set(name, admissions);
        }
    }

    return [...dotDays.entries()]
        .map(([name, days]) => ({
            name,
            dotDays: roundTo(days, 2),
            patientsExposed: exposed.get(name)?.size ?? 0,
        }))
        .sort((a, b) => b.dotDays - a.dotDays || a.name.localeCompare(b.name));
}

export function buildAntibioticTherapy(
    usages: readonly AntibioticUsage[],
    now: Date,
): PatientKpiDocument['antibiotics'] {
    const dotSeconds = new Map<string, number>();
    const periodsByName = new Map<string, Array<{ start: Date; end: Date }>>();

    for (const usage of usages) {
        const name = antibioticName(usage);
        if (!dotSeconds.has(name)) {
            dotSeconds.set(name, 0);
            periodsByName.set(name, []);
        }

        for (const period of usage.periods) {
            const start = toInstant(period.start);
            const end = toInstant(period.end);
            if (!start || !end) {
                continue;
            }
            dotSeconds.set(name, (dotSeconds.get(name) ?? 0) + elapsedSeconds(start, end, now));
            periodsByName.get(name)?.push({ start, end });
        }
    }

    const names = [...dotSeconds.keys()].sort((a, b) => a.localeCompare(b));

    return {
        dotByDrug: names.map((name) => ({
            name,
            dotDays: roundTo((dotSeconds.get(name) ?? 0) / SECONDS_PER_DAY, 2),
        })),
        timelines: names.map((name) => ({
            name,
            periods: (periodsByName.get(name) ?? [])
                .sort((a, b) => a.start.getTime() - b.start.getTime())
                .map(({ start, end }) => ({ start: toIsoDate(start), end: toIsoDate(end) })),
        })),
    };
}

// ---------------------------------------------------------------------------
// Labs
// ---------------------------------------------------------------------------

export function buildLabPanel(results: readonly LabResult[], rules: KpiRules): PatientKpiDocument['labs'] {
    const tracked = rules.labs.tracked_tests.map((test) => test.toLowerCase());
    const byTest = new Map<string, Array<{ takenAt: Date; result: LabResult }>>();

    for (const result of results) {
        const test = (result.test ?? '').trim().toLowerCase();
        const takenAt = toInstant(result.takenAt);
        if (!tracked.includes(test) || !takenAt) {
            continue;
        }
        const list = byTest.get(test) ?? [];
        list.push({ takenAt, result });
        byTest.set(test, list);
    }

    const latestByTest: Record<string, LabLatest> = {};
    const seriesByTest: Record<string, LabPoint[]> = {};

    for (const test of tracked) {
        const entries = byTest.get(test);
        if (!entries || entries.length === 0) {
            continue;
        }
        entries.sort((a, b) => a.takenAt.getTime() - b.takenAt.getTime());

        seriesByTest[test] = entries.map(({ takenAt, result }) => ({
            takenAt: toIsoUtc(takenAt),
            value: result.value,
        }));

        const latest = entries[entries.length - 1];
        latestByTest[test] = {
            value: latest.result.value,
            unit: latest.result.unit ?? '',
            flag: labFlag(test, latest.result.value, rules.labs.reference_ranges),
            takenAt: toIsoUtc(latest.takenAt),
        };
    }

    return { latestByTest, seriesByTest };
}
