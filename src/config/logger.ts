import { pino } from 'pino';

// Must not depend on loadConfig(): main() logs its failures.
const level = process.env.LOG_LEVEL || 'info';
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
    level,
    transport:
        pretty
            ? {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            }
            : undefined,
});
