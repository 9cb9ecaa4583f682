import { admissionsThroughSector, resolveDischargeCohort, resolvePresenceCohort } from './cohort.js';
import {
    buildAntibioticRanking,
    buildAntibioticTherapy,
    buildDeviceUtilization,
    buildLabPanel,
    buildVentilationSummary,
    groupDeviceUse,
    summarizePatientVentilation,
} from './episodes.js';
import { detectReadmissions, type EventCount } from './events.js';
import { differenceInDays, toInstant, toIsoUtc } from './interval.js';
import { normalizeDestination } from './labels.js';
import { roundTo, safeRatio, summarize } from './statistics.js';
import type { KpiRules } from '../rules/types.js';
import type {
    Admission,
    AntibioticUsage,
    CountedStats,
    DestinationShare,
    DeviceDayAggregate,
    DeviceUsePeriod,
    LabResult,
    PatientKpiDocument,
    QueryWindow,
    RateMetric,
    SectorStay,
    UnitKpiDocument,
    VentilationRecord,
} from './types.js';

/**
 * Everything the unit-level document needs, fetched up front.
 */
export interface UnitSnapshot {
    sectorId: string;
    window: QueryWindow;
    now: Date;
    /** Stays in the sector overlapping the window */
    presenceStays: SectorStay[];
    /** Admissions discharged in the window, any sector */
    discharges: Admission[];
    /** Every admission of the patients in `discharges` (readmission candidates) */
    patientAdmissions: Admission[];
    /** Sector stays, at any time, for `discharges` and `patientAdmissions` */
    sectorMembership: SectorStay[];
    /** Admission records for the presence cohort */
    cohortAdmissions: Admission[];
    ventilation: VentilationRecord[];
    deviceDays: DeviceDayAggregate;
    antibiotics: AntibioticUsage[];
}

export interface PatientSnapshot {
    admission: Admission;
    now: Date;
    /** Sector the caller asked about, if any */
    sectorId: string | null;
    sectorStays: SectorStay[];
    ventilation: VentilationRecord | null;
    devices: DeviceUsePeriod[];
    antibiotics: AntibioticUsage[];
    labs: LabResult[];
}

function countedStats(samples: readonly number[]): CountedStats {
    return { ...summarize(samples), count: samples.length };
}

function toRate({ count, base }: EventCount): RateMetric {
    return { count, base, rate: safeRatio(count, base, 4) };
}

function destinationDistribution(discharges: readonly Admission[]): DestinationShare[] {
    const counts = new Map<string, number>();
    for (const admission of discharges) {
        const label = normalizeDestination(admission);
        counts.set(label, (counts.get(label) ?? 0) + 1);
    }

    const total = discharges.length || 1;
    return [...counts.entries()]
        .map(([label, count]) => ({ label, count, fraction: safeRatio(count, total, 4) }))
        .sort((a, b) => b.count - a.count || a.label.localeCompare(b.label));
}

function lengthOfStayAtDischarge(discharges: readonly Admission[]): number[] {
    const days: number[] = [];
    for (const admission of discharges) {
        const admittedAt = toInstant(admission.admittedAt);
        const dischargedAt = toInstant(admission.dischargedAt);
        if (admittedAt && dischargedAt) {
            days.push(differenceInDays(admittedAt, dischargedAt));
        }
    }
    return days;
}

export class KpiDocumentAssembler {
    constructor(private rules: KpiRules) { }

    assembleUnit(snapshot: UnitSnapshot): UnitKpiDocument {
        const { sectorId, window, now } = snapshot;

        // Presence cohort: LOS, ventilation, antibiotics
        const presence = resolvePresenceCohort(snapshot.presenceStays, sectorId, window, now);
        const losDays = [...presence.losDaysByAdmission.values()];
        const cohortIds = new Set(presence.admissionIds);

        // Discharge cohort: mortality, destination, readmission
        const dischargeCohort = resolveDischargeCohort(
            snapshot.discharges,
            snapshot.sectorMembership,
            sectorId,
            window,
        );
        const deaths = dischargeCohort.filter((admission) => admission.outcome === 'deceased').length;
        const readmissions = detectReadmissions(
            dischargeCohort,
            snapshot.patientAdmissions,
            snapshot.sectorMembership,
            sectorId,
            this.rules.readmission.window_hours,
        );

        const ventilation = buildVentilationSummary(
            snapshot.ventilation,
            snapshot.cohortAdmissions,
            cohortIds,
            window,
            now,
            this.rules.reintubation.window_hours,
        );

        return {
            period: { start: toIsoUtc(window.start), end: toIsoUtc(window.end) },
            sectorId,
            cohort: { criterion: 'sector-presence', count: losDays.length },
            los: countedStats(losDays),
            losByDischarge: countedStats(lengthOfStayAtDischarge(dischargeCohort)),
            mortality: {
                deaths,
                discharges: dischargeCohort.length,
                rate: safeRatio(deaths, dischargeCohort.length, 4),
            },
            readmission48h: toRate(readmissions),
            reintubation48h: toRate(ventilation.reintubation),
            destinationDistribution: destinationDistribution(dischargeCohort),
            antibiotics: {
                ranking: buildAntibioticRanking(snapshot.antibiotics, cohortIds, window, now),
            },
            devices: {
                ventilation: {
                    ...buildDeviceUtilization(snapshot.deviceDays, 'ventilated'),
                    timeToFirstIntubationHours: countedStats(ventilation.timeToFirstIntubationHours),
                    timeInWindowDays: countedStats(ventilation.ventilatedDays),
                },
                catheter: buildDeviceUtilization(snapshot.deviceDays, 'catheter'),
                urinaryCatheter: buildDeviceUtilization(snapshot.deviceDays, 'urinaryCatheter'),
                arterialLine: buildDeviceUtilization(snapshot.deviceDays, 'arterialLine'),
            },
        };
    }

    assemblePatient(snapshot: PatientSnapshot): PatientKpiDocument {
        const { admission, now } = snapshot;
        const admittedAt = toInstant(admission.admittedAt);
        const dischargedAt = toInstant(admission.dischargedAt);

        const totalStayDays = admittedAt ? differenceInDays(admittedAt, dischargedAt ?? now) : 0;

        let sectorId: string | null = null;
        if (snapshot.sectorId && admissionsThroughSector(snapshot.sectorStays, snapshot.sectorId).has(admission.admissionId)) {
            sectorId = snapshot.sectorId;
        }

        return {
            admissionId: admission.admissionId,
            patientId: admission.patientId,
            sectorId,
            status: dischargedAt ? admission.outcome : 'admitted',
            admittedAt: admittedAt ? toIsoUtc(admittedAt) : null,
            dischargedAt: dischargedAt ? toIsoUtc(dischargedAt) : null,
            totalStayDays: roundTo(totalStayDays, 2),
            ventilation: summarizePatientVentilation(
                snapshot.ventilation,
                admission.admittedAt,
                now,
                this.rules.reintubation.window_hours,
            ),
            devices: { byType: groupDeviceUse(snapshot.devices, now) },
            antibiotics: buildAntibioticTherapy(snapshot.antibiotics, now),
            labs: buildLabPanel(snapshot.labs, this.rules),
        };
    }
}
