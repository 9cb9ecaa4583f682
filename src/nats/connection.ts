import { connect, type ConnectionOptions, type KV, type NatsConnection } from 'nats';
import { logger } from '../config/logger.js';

export class NatsClient {
    private nc: NatsConnection | null = null;
    private connecting = false;

    constructor(private options: ConnectionOptions) { }

    async connect(): Promise<void> {
        if (this.nc || this.connecting) {
            return;
        }

        this.connecting = true;

        try {
            logger.info({ servers: this.options.servers }, 'Connecting to NATS');

            const nc = await connect(this.options);
            this.nc = nc;

            logger.info('Connected to NATS successfully');

            // Handle connection events
            this.watchStatus(nc).catch((err) => {
                logger.error({ error: err }, 'NATS status watcher stopped');
            });
        } catch (err) {
            logger.error({ error: err }, 'Failed to connect to NATS');
            throw err;
        } finally {
            this.connecting = false;
        }
    }

    private async watchStatus(nc: NatsConnection): Promise<void> {
        for await (const status of nc.status()) {
            logger.info({ type: status.type, data: status.data }, 'NATS status update');
        }
    }

    getConnection(): NatsConnection {
        if (!this.nc) {
            throw new Error('NATS connection not established');
        }
        return this.nc;
    }

    /**
     * Opens (creating when missing) a JetStream key-value bucket.
     */
    async openBucket(name: string): Promise<KV> {
        const js = this.getConnection().jetstream();
        return js.views.kv(name);
    }

    publish(subject: string, data: Uint8Array): void {
        this.getConnection().publish(subject, data);
    }

    isConnected(): boolean {
        return this.nc !== null && !this.nc.isClosed();
    }

    async close(): Promise<void> {
        if (this.nc) {
            logger.info('Closing NATS connection');
            await this.nc.drain();
            this.nc = null;
        }
    }
}
