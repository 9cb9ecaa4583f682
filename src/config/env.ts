import { config } from 'dotenv';

// Load .env file if present
config();

export interface AppConfig {
    mongo: {
        url: string;
        database: string;
    };
    nats: {
        url: string;
        kvBucket: string;
    };
    persist: {
        enabled: boolean;
    };
    contracts: {
        path: string;
    };
    rules: {
        path: string;
        sectorsPath: string;
    };
    http: {
        port: number;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    throw new Error(`Invalid boolean for environment variable ${key}: ${value}`);
}

export function loadConfig(): AppConfig {
    return {
        mongo: {
            url: getEnv('MONGO_URL', 'mongodb://localhost:27017'),
            database: getEnv('MONGO_DB', 'clinical'),
        },
        nats: {
            url: getEnv('NATS_URL', 'nats://localhost:4222'),
            kvBucket: getEnv('NATS_KV_BUCKET', 'kpi-reports'),
        },
        persist: {
            enabled: getEnvBoolean('PERSIST_ENABLED', false),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        rules: {
            path: getEnv('RULES_PATH', './rules/kpi.json'),
            sectorsPath: getEnv('SECTORS_PATH', './rules/sectors.json'),
        },
        http: {
            port: getEnvNumber('HTTP_PORT', 8093),
        },
    };
}
