import { isPresentInWindow } from '../../src/kpi/cohort.js';
import { aggregateDeviceDays } from '../../src/kpi/episodes.js';
import { toInstant } from '../../src/kpi/interval.js';
import type {
    Admission,
    AntibioticUsage,
    DeviceDayAggregate,
    DeviceUsePeriod,
    LabResult,
    QueryWindow,
    SectorStay,
    Timestamp,
    VentilationRecord,
} from '../../src/kpi/types.js';
import type { ClinicalRepository } from '../../src/storage/repository.js';
import type { ClinicalData } from './clinical-fixture.js';

function inWindow(value: Timestamp | null | undefined, window: QueryWindow): boolean {
    const instant = toInstant(value);
    return instant !== null && instant >= window.start && instant < window.end;
}

/**
 * Answers the repository queries from plain arrays, the way the Mongo
 * implementation filters its collections.
 */
export class InMemoryClinicalRepository implements ClinicalRepository {
    healthy = true;

    constructor(private data: ClinicalData) { }

    async fetchAdmissionsDischargedIn(window: QueryWindow): Promise<Admission[]> {
        return this.data.admissions.filter((admission) => inWindow(admission.dischargedAt, window));
    }

    async fetchAdmissions(admissionIds: readonly string[]): Promise<Admission[]> {
        return this.data.admissions.filter((admission) => admissionIds.includes(admission.admissionId));
    }

    async fetchAdmissionsForPatients(patientIds: readonly string[]): Promise<Admission[]> {
        return this.data.admissions.filter((admission) => patientIds.includes(admission.patientId));
    }

    async fetchAdmission(admissionId: string): Promise<Admission | null> {
        return this.data.admissions.find((admission) => admission.admissionId === admissionId) ?? null;
    }

    async fetchSectorStaysOverlapping(sectorId: string, window: QueryWindow): Promise<SectorStay[]> {
        return this.data.sectorStays.filter((stay) => stay.sectorId === sectorId && isPresentInWindow(stay, window));
    }

    async fetchSectorStaysForAdmissions(sectorId: string, admissionIds: readonly string[]): Promise<SectorStay[]> {
        return this.data.sectorStays.filter(
            (stay) => stay.sectorId === sectorId && admissionIds.includes(stay.admissionId),
        );
    }

    async fetchVentilationRecords(admissionIds: readonly string[]): Promise<VentilationRecord[]> {
        return this.data.ventilation.filter((record) => admissionIds.includes(record.admissionId));
    }

    async fetchDeviceDayAggregate(sectorId: string, window: QueryWindow): Promise<DeviceDayAggregate> {
        return aggregateDeviceDays(
            this.data.deviceDays.filter((row) => row.sectorId === sectorId && inWindow(row.day, window)),
        );
    }

    async fetchDeviceUse(admissionId: string): Promise<DeviceUsePeriod[]> {
        return this.data.deviceUse.filter((period) => period.admissionId === admissionId);
    }

    async fetchAntibioticUsage(admissionIds: readonly string[]): Promise<AntibioticUsage[]> {
        return this.data.antibiotics.filter((usage) => admissionIds.includes(usage.admissionId));
    }

    async fetchLabResults(admissionId: string, tests: readonly string[]): Promise<LabResult[]> {
        const wanted = new Set(tests.map((test) => test.toLowerCase()));
        return this.data.labs.filter(
            (result) => result.admissionId === admissionId && wanted.has(result.test.trim().toLowerCase()),
        );
    }

    async ping(): Promise<void> {
        if (!this.healthy) {
            throw new Error('storage unavailable');
        }
    }
}
