import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import { SchemaValidator, SCHEMA_IDS } from '../contracts/schema-validator.js';
import type { KpiRules, SectorDirectory } from './types.js';

function readJson(path: string): unknown {
    const content = readFileSync(path, 'utf-8');
    return JSON.parse(content);
}

function loadValidated<T>(
    path: string,
    schemaId: string,
    validator: SchemaValidator,
    what: string,
): T {
    let data: unknown;
    try {
        data = readJson(path);
    } catch (err) {
        logger.error({ path, error: err }, `Failed to load ${what}`);
        throw new Error(`Failed to load ${what} from ${path}: ${err}`);
    }

    if (!validator.conforms<T>(schemaId, data)) {
        const { errors } = validator.validate(schemaId, data);
        logger.error({ path, errors }, `Invalid ${what}`);
        throw new Error(`Invalid ${what} in ${path}: ${errors}`);
    }

    logger.info({ path }, `${what} loaded successfully`);
    return data;
}

export function loadRules(rulesPath: string, validator: SchemaValidator): KpiRules {
    const rules = loadValidated<KpiRules>(rulesPath, SCHEMA_IDS.kpiRules, validator, 'KPI rules');

    // Lab lookups are case-insensitive
    const referenceRanges = Object.fromEntries(
        Object.entries(rules.labs.reference_ranges).map(([test, range]) => [test.toLowerCase(), range]),
    );

    return {
        ...rules,
        labs: {
            tracked_tests: rules.labs.tracked_tests.map((test) => test.toLowerCase()),
            reference_ranges: referenceRanges,
        },
    };
}

export function loadSectorDirectory(sectorsPath: string, validator: SchemaValidator): SectorDirectory {
    return loadValidated<SectorDirectory>(sectorsPath, SCHEMA_IDS.sectorDirectory, validator, 'Sector directory');
}
