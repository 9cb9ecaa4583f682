/**
 * A point in time as read from storage. Strings must carry an explicit
 * offset (`Z` or `±hh:mm`); see `toInstant`.
 */
export type Timestamp = Date | string;

export type Outcome = 'discharged-alive' | 'deceased' | 'transferred' | 'unknown';

export interface QueryWindow {
    /** Inclusive */
    start: Date;
    /** Exclusive */
    end: Date;
}

export interface Admission {
    admissionId: string;
    patientId: string;
    admittedAt: Timestamp;
    dischargedAt?: Timestamp | null;
    outcome: Outcome;
    destinationLabel?: string | null;
}

export interface SectorStay {
    admissionId: string;
    sectorId: string;
    start: Timestamp;
    end?: Timestamp | null;
}

export interface VentilationPeriod {
    start: Timestamp;
    end?: Timestamp | null;
    endSource?: string;
}

export interface VentilationRecord {
    admissionId: string;
    intubations: Timestamp[];
    extubations: Timestamp[];
    periods: VentilationPeriod[];
}

export type DeviceFlag = 'catheter' | 'urinaryCatheter' | 'arterialLine' | 'ventilated';

export const DEVICE_FLAGS: readonly DeviceFlag[] = ['ventilated', 'catheter', 'urinaryCatheter', 'arterialLine'];

export interface DeviceDayRecord {
    admissionId: string;
    sectorId: string;
    day: Timestamp;
    catheter: boolean;
    urinaryCatheter: boolean;
    arterialLine: boolean;
    ventilated: boolean;
}

export interface DeviceDayAggregate {
    patientDays: number;
    deviceDaysByType: Record<DeviceFlag, number>;
    admissionIdsByType: Record<DeviceFlag, string[]>;
    admissionIds: string[];
}

export type DeviceType = 'catheter' | 'urinary-catheter' | 'arterial-line' | 'other';

export interface DeviceUsePeriod {
    admissionId: string;
    deviceType: string;
    start?: Timestamp | null;
    end?: Timestamp | null;
    endSource?: string;
}

export interface DosingPeriod {
    start: Timestamp;
    end: Timestamp;
}

export interface AntibioticUsage {
    antibioticUsageId: string;
    admissionId: string;
    antibioticName: string;
    periods: DosingPeriod[];
}

export interface LabResult {
    admissionId: string;
    test: string;
    value: number | string | null;
    unit?: string;
    takenAt: Timestamp;
}

// Output documents

export interface SummaryStats {
    mean: number;
    median: number;
    p90: number;
}

export interface CountedStats extends SummaryStats {
    count: number;
}

export interface RateMetric {
    count: number;
    base: number;
    rate: number;
}

export interface DestinationShare {
    label: string;
    count: number;
    fraction: number;
}

export interface AntibioticRankingEntry {
    name: string;
    dotDays: number;
    patientsExposed: number;
}

export interface DeviceUtilization {
    deviceDays: number;
    patientDays: number;
    utilization: number;
    patients: number;
    totalPatients: number;
    fraction: number;
}

export interface VentilationUtilization extends DeviceUtilization {
    timeToFirstIntubationHours: CountedStats;
    timeInWindowDays: CountedStats;
}

export interface UnitKpiDocument {
    period: { start: string; end: string };
    sectorId: string;
    cohort: { criterion: 'sector-presence'; count: number };
    los: CountedStats;
    losByDischarge: CountedStats;
    mortality: { deaths: number; discharges: number; rate: number };
    readmission48h: RateMetric;
    reintubation48h: RateMetric;
    destinationDistribution: DestinationShare[];
    antibiotics: { ranking: AntibioticRankingEntry[] };
    devices: {
        ventilation: VentilationUtilization;
        catheter: DeviceUtilization;
        urinaryCatheter: DeviceUtilization;
        arterialLine: DeviceUtilization;
    };
}

export type PatientStatus = Outcome | 'admitted';

export interface SerializedPeriod {
    start: string | null;
    end: string | null;
    endSource: string;
}

export interface DeviceTypeSummary {
    type: DeviceType;
    totalDays: number;
    periods: Array<SerializedPeriod & { rawType: string }>;
}

export interface LabLatest {
    value: number | string | null;
    unit: string;
    flag: string;
    takenAt: string;
}

export interface LabPoint {
    takenAt: string;
    value: number | string | null;
}

export interface PatientKpiDocument {
    admissionId: string;
    patientId: string;
    sectorId: string | null;
    status: PatientStatus;
    admittedAt: string | null;
    dischargedAt: string | null;
    totalStayDays: number;
    ventilation: {
        totalDays: number;
        timeToFirstIntubationHours: number | null;
        periods: SerializedPeriod[];
        extubations: string[];
        reintubated48h: boolean;
    };
    devices: { byType: DeviceTypeSummary[] };
    antibiotics: {
        dotByDrug: Array<{ name: string; dotDays: number }>;
        timelines: Array<{ name: string; periods: Array<{ start: string; end: string }> }>;
    };
    labs: {
        latestByTest: Record<string, LabLatest>;
        seriesByTest: Record<string, LabPoint[]>;
    };
}
