import type { Collection, Document, ObjectId, WithId } from 'mongodb';
import { logger } from '../config/logger.js';
import { aggregateDeviceDays } from '../kpi/episodes.js';
import { parseOutcome } from '../kpi/labels.js';
import type {
    Admission,
    AntibioticUsage,
    DeviceDayAggregate,
    DeviceDayRecord,
    DeviceUsePeriod,
    LabResult,
    QueryWindow,
    SectorStay,
    Timestamp,
    VentilationRecord,
} from '../kpi/types.js';
import type { ClinicalRepository } from './repository.js';
import type { MongoStore } from './connection.js';

// Stored document shapes. Fields may be missing on legacy rows.

interface AdmissionDoc {
    admission_id: string;
    patient_id: string;
    admitted_at: Timestamp;
    discharged_at?: Timestamp | null;
    outcome?: string | null;
    destination?: string | null;
}

interface SectorStayDoc {
    admission_id: string;
    sector_id: string;
    start: Timestamp;
    end?: Timestamp | null;
}

interface VentilationDoc {
    admission_id: string;
    intubations?: Timestamp[];
    extubations?: Timestamp[];
    periods?: Array<{ start: Timestamp; end?: Timestamp | null; end_source?: string }>;
}

interface DeviceDayDoc {
    admission_id: string;
    sector_id: string;
    day: Date;
    catheter?: boolean;
    urinary_catheter?: boolean;
    arterial_line?: boolean;
    ventilated?: boolean;
}

interface DeviceUseDoc {
    admission_id: string;
    type?: string;
    start?: Timestamp | null;
    end?: Timestamp | null;
    end_source?: string;
}

interface AntibioticUsageDoc {
    admission_id: string;
    antibiotic?: string;
}

interface AntibioticPeriodDoc {
    usage_id: ObjectId;
    start: Timestamp;
    end: Timestamp;
}

interface LabDoc {
    admission_id: string;
    test: string;
    value?: number | string | null;
    unit?: string;
    taken_at: Timestamp;
}

export const COLLECTIONS = {
    admissions: 'admissions',
    sectorStays: 'sector_stays',
    ventilation: 'ventilation',
    deviceDays: 'device_days',
    deviceUse: 'device_use',
    antibioticUsage: 'antibiotic_usage',
    antibioticPeriods: 'antibiotic_periods',
    labs: 'labs',
} as const;

function toAdmission(doc: WithId<AdmissionDoc>): Admission {
    return {
        admissionId: doc.admission_id,
        patientId: doc.patient_id,
        admittedAt: doc.admitted_at,
        dischargedAt: doc.discharged_at ?? null,
        outcome: parseOutcome(doc.outcome),
        destinationLabel: doc.destination ?? null,
    };
}

function toSectorStay(doc: WithId<SectorStayDoc>): SectorStay {
    return {
        admissionId: doc.admission_id,
        sectorId: doc.sector_id,
        start: doc.start,
        end: doc.end ?? null,
    };
}

function toVentilationRecord(doc: WithId<VentilationDoc>): VentilationRecord {
    return {
        admissionId: doc.admission_id,
        intubations: doc.intubations ?? [],
        extubations: doc.extubations ?? [],
        periods: (doc.periods ?? []).map((period) => ({
            start: period.start,
            end: period.end ?? null,
            endSource: period.end_source ?? '',
        })),
    };
}

/** Stored lab names vary in case and padding; tracked names are lower-case. */
export function testNamePattern(test: string): RegExp {
    const escaped = test.trim().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`^\\s*${escaped}\\s*$`, 'i');
}

function toDeviceDayRecord(doc: WithId<DeviceDayDoc>): DeviceDayRecord {
    return {
        admissionId: doc.admission_id,
        sectorId: doc.sector_id,
        day: doc.day,
        catheter: doc.catheter === true,
        urinaryCatheter: doc.urinary_catheter === true,
        arterialLine: doc.arterial_line === true,
        ventilated: doc.ventilated === true,
    };
}

export class MongoClinicalRepository implements ClinicalRepository {
    constructor(private store: MongoStore) { }

    private collection<T extends Document>(name: string): Collection<T> {
        return this.store.getDb().collection<T>(name);
    }

    async fetchAdmissionsDischargedIn(window: QueryWindow): Promise<Admission[]> {
        const docs = await this.collection<AdmissionDoc>(COLLECTIONS.admissions)
            .find({ discharged_at: { $gte: window.start, $lt: window.end } })
            .toArray();
        return docs.map(toAdmission);
    }

    async fetchAdmissions(admissionIds: readonly string[]): Promise<Admission[]> {
        if (admissionIds.length === 0) return [];
        const docs = await this.collection<AdmissionDoc>(COLLECTIONS.admissions)
            .find({ admission_id: { $in: [...admissionIds] } })
            .toArray();
        return docs.map(toAdmission);
    }

    async fetchAdmissionsForPatients(patientIds: readonly string[]): Promise<Admission[]> {
        if (patientIds.length === 0) return [];
        const docs = await this.collection<AdmissionDoc>(COLLECTIONS.admissions)
            .find({ patient_id: { $in: [...patientIds] } })
            .sort({ admitted_at: 1 })
            .toArray();
        return docs.map(toAdmission);
    }

    async fetchAdmission(admissionId: string): Promise<Admission | null> {
        const doc = await this.collection<AdmissionDoc>(COLLECTIONS.admissions)
            .findOne({ admission_id: admissionId });
        return doc ? toAdmission(doc) : null;
    }

    async fetchSectorStaysOverlapping(sectorId: string, window: QueryWindow): Promise<SectorStay[]> {
        const docs = await this.collection<SectorStayDoc>(COLLECTIONS.sectorStays)
            .find({
                sector_id: sectorId,
                start: { $lt: window.end },
                $or: [
                    { end: { $gte: window.start } },
                    { end: null },
                    { end: { $exists: false } },
                ],
            })
            .toArray();

        logger.debug({ sectorId, count: docs.length }, 'Fetched sector stays overlapping window');
        return docs.map(toSectorStay);
    }

    async fetchSectorStaysForAdmissions(sectorId: string, admissionIds: readonly string[]): Promise<SectorStay[]> {
        if (admissionIds.length === 0) return [];
        const docs = await this.collection<SectorStayDoc>(COLLECTIONS.sectorStays)
            .find({ sector_id: sectorId, admission_id: { $in: [...admissionIds] } })
            .toArray();
        return docs.map(toSectorStay);
    }

    async fetchVentilationRecords(admissionIds: readonly string[]): Promise<VentilationRecord[]> {
        if (admissionIds.length === 0) return [];
        const docs = await this.collection<VentilationDoc>(COLLECTIONS.ventilation)
            .find({ admission_id: { $in: [...admissionIds] } })
            .toArray();
        return docs.map(toVentilationRecord);
    }

    async fetchDeviceDayAggregate(sectorId: string, window: QueryWindow): Promise<DeviceDayAggregate> {
        const docs = await this.collection<DeviceDayDoc>(COLLECTIONS.deviceDays)
            .find({ sector_id: sectorId, day: { $gte: window.start, $lt: window.end } })
            .toArray();
        return aggregateDeviceDays(docs.map(toDeviceDayRecord));
    }

    async fetchDeviceUse(admissionId: string): Promise<DeviceUsePeriod[]> {
        const docs = await this.collection<DeviceUseDoc>(COLLECTIONS.deviceUse)
            .find({ admission_id: admissionId })
            .toArray();
        return docs.map((doc) => ({
            admissionId: doc.admission_id,
            deviceType: doc.type ?? '',
            start: doc.start ?? null,
            end: doc.end ?? null,
            endSource: doc.end_source ?? '',
        }));
    }

    async fetchAntibioticUsage(admissionIds: readonly string[]): Promise<AntibioticUsage[]> {
        if (admissionIds.length === 0) return [];

        const usages = await this.collection<AntibioticUsageDoc>(COLLECTIONS.antibioticUsage)
            .find({ admission_id: { $in: [...admissionIds] } })
            .toArray();
        if (usages.length === 0) return [];

        const periods = await this.collection<AntibioticPeriodDoc>(COLLECTIONS.antibioticPeriods)
            .find({ usage_id: { $in: usages.map((usage) => usage._id) } })
            .toArray();

        const periodsByUsage = new Map<string, AntibioticUsage['periods']>();
        for (const period of periods) {
            const key = period.usage_id.toHexString();
            const list = periodsByUsage.get(key) ?? [];
            list.push({ start: period.start, end: period.end });
            periodsByUsage.set(key, list);
        }

        return usages.map((usage) => ({
            antibioticUsageId: usage._id.toHexString(),
            admissionId: usage.admission_id,
            antibioticName: usage.antibiotic ?? '',
            periods: periodsByUsage.get(usage._id.toHexString()) ?? [],
        }));
    }

    async fetchLabResults(admissionId: string, tests: readonly string[]): Promise<LabResult[]> {
        if (tests.length === 0) return [];
        const docs = await this.collection<LabDoc>(COLLECTIONS.labs)
            .find({ admission_id: admissionId, test: { $in: tests.map(testNamePattern) } })
            .sort({ taken_at: 1 })
            .toArray();
        return docs.map((doc) => ({
            admissionId: doc.admission_id,
            test: doc.test,
            value: doc.value ?? null,
            unit: doc.unit ?? '',
            takenAt: doc.taken_at,
        }));
    }

    async ping(): Promise<void> {
        await this.store.getDb().command({ ping: 1 });
    }
}
