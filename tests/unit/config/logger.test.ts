import { describe, it, expect, afterEach, vi } from 'vitest';

describe('logger', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        vi.resetModules();
    });

    it('should load even when other settings are malformed', async () => {
        vi.stubEnv('HTTP_PORT', 'eighty');
        vi.stubEnv('PERSIST_ENABLED', 'maybe');
        vi.stubEnv('LOG_LEVEL', 'warn');
        vi.resetModules();

        const { logger } = await import('../../../src/config/logger.js');

        expect(logger.level).toBe('warn');
    });

    it('should default to info', async () => {
        vi.stubEnv('LOG_LEVEL', '');
        vi.resetModules();

        const { logger } = await import('../../../src/config/logger.js');

        expect(logger.level).toBe('info');
    });
});
