import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';
import type { SchemaObject } from 'ajv';
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;

const SCHEMA_BASE = 'https://clinical-kpi.example.com/schemas';

export const SCHEMA_IDS = {
    unitKpiQuery: `${SCHEMA_BASE}/requests/unit-kpi-query.json`,
    kpiRules: `${SCHEMA_BASE}/config/kpi-rules.json`,
    sectorDirectory: `${SCHEMA_BASE}/config/sector-directory.json`,
    unitKpiReport: `${SCHEMA_BASE}/reports/unit-kpi-report.json`,
    patientKpiReport: `${SCHEMA_BASE}/reports/patient-kpi-report.json`,
    unitReportPersisted: `${SCHEMA_BASE}/events/kpi-unit-persisted.json`,
} as const;

export interface ValidationResult {
    valid: boolean;
    errors?: string;
}

function isSchemaObject(value: unknown): value is SchemaObject {
    return typeof value === 'object' && value !== null && '$id' in value && typeof value.$id === 'string';
}

function listJsonFiles(dir: string): string[] {
    return readdirSync(dir, { withFileTypes: true })
        .flatMap((entry) => {
            const fullPath = join(dir, entry.name);
            if (entry.isDirectory()) return listJsonFiles(fullPath);
            return entry.isFile() && entry.name.endsWith('.json') ? [fullPath] : [];
        })
        .sort();
}

/**
 * Registry of the request, configuration, report and event contracts,
 * keyed by `$id`. Every `.json` file under the contracts directory is loaded.
 */
export class SchemaValidator {
    private ajv = new Ajv2020({ validateSchema: false, strict: false, allErrors: true });
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        addFormats(this.ajv);
    }

    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        const files = listJsonFiles(this.contractsPath);
        for (const file of files) {
            try {
                const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));
                if (!isSchemaObject(schema)) {
                    logger.warn({ file }, 'Schema missing $id, skipped');
                    continue;
                }
                this.ajv.addSchema(schema);
            } catch (err) {
                logger.error({ file, error: err }, 'Failed to load schema');
            }
        }

        this.schemasLoaded = true;
        logger.info({ count: files.length, path: this.contractsPath }, 'Contracts loaded');
    }

    validate(schemaId: string, data: unknown): ValidationResult {
        if (!this.schemasLoaded) {
            return { valid: false, errors: 'Schemas not loaded' };
        }

        const validateFn = this.ajv.getSchema(schemaId);
        if (!validateFn) {
            return { valid: false, errors: `Schema not found: ${schemaId}` };
        }

        if (validateFn(data) !== true) {
            return { valid: false, errors: this.ajv.errorsText(validateFn.errors) };
        }
        return { valid: true };
    }

    /** Type guard over `validate`; the caller pairs `T` with the schema. */
    conforms<T>(schemaId: string, data: unknown): data is T {
        return this.validate(schemaId, data).valid;
    }

    validateUnitKpiQuery(data: unknown): ValidationResult {
        return this.validate(SCHEMA_IDS.unitKpiQuery, data);
    }

    validateUnitKpiReport(data: unknown): ValidationResult {
        return this.validate(SCHEMA_IDS.unitKpiReport, data);
    }

    validatePatientKpiReport(data: unknown): ValidationResult {
        return this.validate(SCHEMA_IDS.patientKpiReport, data);
    }

    validateUnitReportPersisted(data: unknown): ValidationResult {
        return this.validate(SCHEMA_IDS.unitReportPersisted, data);
    }
}
