export class Metrics {
    private counters = {
        unit_reports: 0,
        patient_reports: 0,
        not_found: 0,
        rejected: 0,
        failures: 0,
        persisted: 0,
        persist_failed: 0,
    };

    incrementUnitReports(): void {
        this.counters.unit_reports++;
    }

    incrementPatientReports(): void {
        this.counters.patient_reports++;
    }

    incrementNotFound(): void {
        this.counters.not_found++;
    }

    incrementRejected(): void {
        this.counters.rejected++;
    }

    incrementFailures(): void {
        this.counters.failures++;
    }

    incrementPersisted(): void {
        this.counters.persisted++;
    }

    incrementPersistFailed(): void {
        this.counters.persist_failed++;
    }

    getCounters() {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = {
            unit_reports: 0,
            patient_reports: 0,
            not_found: 0,
            rejected: 0,
            failures: 0,
            persisted: 0,
            persist_failed: 0,
        };
    }
}
