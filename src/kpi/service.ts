import { logger } from '../config/logger.js';
import { Metrics } from '../metrics/counter.js';
import type { ReportStore } from '../nats/report-store.js';
import type { KpiRules } from '../rules/types.js';
import type { ClinicalRepository } from '../storage/repository.js';
import { KpiDocumentAssembler, type UnitSnapshot } from './assembler.js';
import { resolvePresenceCohort } from './cohort.js';
import type { PatientKpiDocument, QueryWindow, UnitKpiDocument } from './types.js';

export type UnitReportSink = Pick<ReportStore, 'saveUnitReport'>;

export interface KpiServiceOptions {
    /** Absent when persistence is disabled */
    reportStore?: UnitReportSink | null;
    clock?: () => Date;
}

export interface UnitReportResult {
    document: UnitKpiDocument;
    /** `null` when persisting was not requested */
    persisted: boolean | null;
}

function unique(values: Iterable<string>): string[] {
    return [...new Set(values)].sort();
}

/**
 * Fetches one snapshot per request from the repository and hands it to the
 * assembler. Holds no state between calls.
 */
export class KpiService {
    private assembler: KpiDocumentAssembler;
    private reportStore: UnitReportSink | null;
    private clock: () => Date;

    constructor(
        private repository: ClinicalRepository,
        private rules: KpiRules,
        private metrics: Metrics,
        options: KpiServiceOptions = {},
    ) {
        this.assembler = new KpiDocumentAssembler(rules);
        this.reportStore = options.reportStore ?? null;
        this.clock = options.clock ?? (() => new Date());
    }

    async fetchUnitSnapshot(sectorId: string, window: QueryWindow): Promise<UnitSnapshot> {
        const now = this.clock();

        const [presenceStays, discharges, deviceDays] = await Promise.all([
            this.repository.fetchSectorStaysOverlapping(sectorId, window),
            this.repository.fetchAdmissionsDischargedIn(window),
            this.repository.fetchDeviceDayAggregate(sectorId, window),
        ]);

        const cohortIds = resolvePresenceCohort(presenceStays, sectorId, window, now).admissionIds;
        const patientIds = unique(discharges.map((admission) => admission.patientId));

        const [cohortAdmissions, ventilation, antibiotics, patientAdmissions] = await Promise.all([
            this.repository.fetchAdmissions(cohortIds),
            this.repository.fetchVentilationRecords(cohortIds),
            this.repository.fetchAntibioticUsage(cohortIds),
            this.repository.fetchAdmissionsForPatients(patientIds),
        ]);

        const membershipIds = unique([
            ...discharges.map((admission) => admission.admissionId),
            ...patientAdmissions.map((admission) => admission.admissionId),
        ]);
        const sectorMembership = await this.repository.fetchSectorStaysForAdmissions(sectorId, membershipIds);

        return {
            sectorId,
            window,
            now,
            presenceStays,
            discharges,
            patientAdmissions,
            sectorMembership,
            cohortAdmissions,
            ventilation,
            deviceDays,
            antibiotics,
        };
    }

    async computeUnitReport(
        sectorId: string,
        window: QueryWindow,
        options: { persist?: boolean } = {},
    ): Promise<UnitReportResult> {
        const startedAt = Date.now();

        let document: UnitKpiDocument;
        try {
            const snapshot = await this.fetchUnitSnapshot(sectorId, window);
            document = this.assembler.assembleUnit(snapshot);
        } catch (err) {
            this.metrics.incrementFailures();
            logger.error({ error: err, sectorId }, 'Unit report computation failed');
            throw err;
        }

        this.metrics.incrementUnitReports();
        logger.info(
            {
                sectorId,
                start: document.period.start,
                end: document.period.end,
                cohort: document.cohort.count,
                discharges: document.mortality.discharges,
                durationMs: Date.now() - startedAt,
            },
            'Unit report computed',
        );

        if (!options.persist) {
            return { document, persisted: null };
        }

        if (!this.reportStore) {
            logger.warn({ sectorId }, 'Persist requested but persistence is disabled');
            this.metrics.incrementPersistFailed();
            return { document, persisted: false };
        }

        const persisted = await this.reportStore.saveUnitReport(document, window);
        if (persisted) {
            this.metrics.incrementPersisted();
        } else {
            this.metrics.incrementPersistFailed();
        }

        return { document, persisted };
    }

    /**
     * Patient-level document, or `null` when the admission does not exist.
     */
    async computePatientReport(admissionId: string, sectorId: string | null = null): Promise<PatientKpiDocument | null> {
        try {
            const admission = await this.repository.fetchAdmission(admissionId);
            if (!admission) {
                this.metrics.incrementNotFound();
                logger.info({ admissionId }, 'Admission not found');
                return null;
            }

            const ids = [admissionId];
            const [sectorStays, ventilation, devices, antibiotics, labs] = await Promise.all([
                sectorId ? this.repository.fetchSectorStaysForAdmissions(sectorId, ids) : Promise.resolve([]),
                this.repository.fetchVentilationRecords(ids),
                this.repository.fetchDeviceUse(admissionId),
                this.repository.fetchAntibioticUsage(ids),
                this.repository.fetchLabResults(admissionId, this.rules.labs.tracked_tests),
            ]);

            const document = this.assembler.assemblePatient({
                admission,
                now: this.clock(),
                sectorId,
                sectorStays,
                ventilation: ventilation.find((record) => record.admissionId === admissionId) ?? null,
                devices,
                antibiotics,
                labs,
            });

            this.metrics.incrementPatientReports();
            logger.info({ admissionId, status: document.status }, 'Patient report computed');
            return document;
        } catch (err) {
            this.metrics.incrementFailures();
            logger.error({ error: err, admissionId }, 'Patient report computation failed');
            throw err;
        }
    }
}
