import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig } from '../../../src/config/env.js';

describe('loadConfig', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('should fall back to defaults', () => {
        vi.stubEnv('HTTP_PORT', '');
        vi.stubEnv('PERSIST_ENABLED', '');
        vi.stubEnv('NATS_KV_BUCKET', '');

        const config = loadConfig();

        expect(config.http.port).toBe(8093);
        expect(config.persist.enabled).toBe(false);
        expect(config.nats.kvBucket).toBe('kpi-reports');
    });

    it('should read overrides from the environment', () => {
        vi.stubEnv('HTTP_PORT', '9100');
        vi.stubEnv('PERSIST_ENABLED', 'yes');
        vi.stubEnv('MONGO_DB', 'clinical_test');

        const config = loadConfig();

        expect(config.http.port).toBe(9100);
        expect(config.persist.enabled).toBe(true);
        expect(config.mongo.database).toBe('clinical_test');
    });

    it('should reject malformed numbers and booleans', () => {
        vi.stubEnv('HTTP_PORT', 'eighty');
        expect(() => loadConfig()).toThrow('Invalid number for environment variable HTTP_PORT: eighty');

        vi.stubEnv('HTTP_PORT', '8093');
        vi.stubEnv('PERSIST_ENABLED', 'maybe');
        expect(() => loadConfig()).toThrow('Invalid boolean for environment variable PERSIST_ENABLED: maybe');
    });
});
