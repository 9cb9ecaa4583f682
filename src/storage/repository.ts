import type {
    Admission,
    AntibioticUsage,
    DeviceDayAggregate,
    DeviceUsePeriod,
    LabResult,
    QueryWindow,
    SectorStay,
    VentilationRecord,
} from '../kpi/types.js';

/**
 * Read-only access to clinical records. Implementations return typed
 * records and never compute KPIs; failures propagate to the caller.
 */
export interface ClinicalRepository {
    fetchAdmissionsDischargedIn(window: QueryWindow): Promise<Admission[]>;
    fetchAdmissions(admissionIds: readonly string[]): Promise<Admission[]>;
    fetchAdmissionsForPatients(patientIds: readonly string[]): Promise<Admission[]>;
    fetchAdmission(admissionId: string): Promise<Admission | null>;

    fetchSectorStaysOverlapping(sectorId: string, window: QueryWindow): Promise<SectorStay[]>;
    fetchSectorStaysForAdmissions(sectorId: string, admissionIds: readonly string[]): Promise<SectorStay[]>;

    fetchVentilationRecords(admissionIds: readonly string[]): Promise<VentilationRecord[]>;
    fetchDeviceDayAggregate(sectorId: string, window: QueryWindow): Promise<DeviceDayAggregate>;
    fetchDeviceUse(admissionId: string): Promise<DeviceUsePeriod[]>;
    fetchAntibioticUsage(admissionIds: readonly string[]): Promise<AntibioticUsage[]>;
    fetchLabResults(admissionId: string, tests: readonly string[]): Promise<LabResult[]>;

    /** Throws when storage is unreachable */
    ping(): Promise<void>;
}
