import { StringCodec } from 'nats';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import { toIsoUtc } from '../kpi/interval.js';
import type { QueryWindow, UnitKpiDocument } from '../kpi/types.js';

export const UNIT_PERSISTED_SUBJECT = 'kpi.unit.persisted';

export interface ReportBucket {
    put(key: string, data: Uint8Array): Promise<number>;
}

/**
 * The part of `NatsClient` the store needs.
 */
export interface BucketClient {
    openBucket(name: string): Promise<ReportBucket>;
    publish(subject: string, data: Uint8Array): void;
}

export interface UnitPersistedEvent {
    event_name: typeof UNIT_PERSISTED_SUBJECT;
    event_id: string;
    timestamp: string;
    payload: {
        sector_id: string;
        period_start: string;
        period_end: string;
        key: string;
    };
}

const sc = StringCodec();

/**
 * Key for a unit report; the same sector and window always map to the same key.
 */
export function unitReportKey(sectorId: string, window: QueryWindow): string {
    const sector = sectorId.replace(/[^-_A-Za-z0-9]/g, '_');
    return `unit.${sector}.${window.start.getTime()}.${window.end.getTime()}`;
}

/**
 * Persists unit documents into a JetStream KV bucket. Each put fully replaces
 * the previous value under the key.
 */
export class ReportStore {
    private bucket: ReportBucket | null = null;

    constructor(
        private natsClient: BucketClient,
        private validator: SchemaValidator,
        private bucketName: string,
    ) { }

    private async getBucket(): Promise<ReportBucket> {
        if (!this.bucket) {
            this.bucket = await this.natsClient.openBucket(this.bucketName);
            logger.info({ bucket: this.bucketName }, 'KV bucket opened');
        }
        return this.bucket;
    }

    async saveUnitReport(document: UnitKpiDocument, window: QueryWindow): Promise<boolean> {
        const key = unitReportKey(document.sectorId, window);

        // Validate before persisting
        const validationResult = this.validator.validateUnitKpiReport(document);
        if (!validationResult.valid) {
            logger.error(
                { errors: validationResult.errors, key },
                'Unit report validation failed',
            );
            return false;
        }

        try {
            const bucket = await this.getBucket();
            await bucket.put(key, sc.encode(JSON.stringify(document)));
        } catch (err) {
            logger.error({ error: err, key }, 'Failed to persist unit report');
            return false;
        }

        logger.info({ key, sectorId: document.sectorId }, 'Unit report persisted');
        this.announce(document.sectorId, window, key);
        return true;
    }

    private announce(sectorId: string, window: QueryWindow, key: string): void {
        const event: UnitPersistedEvent = {
            event_name: UNIT_PERSISTED_SUBJECT,
            event_id: uuidv4(),
            timestamp: new Date().toISOString(),
            payload: {
                sector_id: sectorId,
                period_start: toIsoUtc(window.start),
                period_end: toIsoUtc(window.end),
                key,
            },
        };

        const validationResult = this.validator.validateUnitReportPersisted(event);
        if (!validationResult.valid) {
            logger.error(
                { errors: validationResult.errors, event },
                'Persisted event validation failed',
            );
            return;
        }

        try {
            this.natsClient.publish(UNIT_PERSISTED_SUBJECT, sc.encode(JSON.stringify(event)));
            logger.debug({ event_id: event.event_id, key }, 'Persisted event published');
        } catch (err) {
            logger.warn({ error: err, key }, 'Failed to publish persisted event');
        }
    }
}
