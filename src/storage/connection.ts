import { MongoClient, type Db, type MongoClientOptions } from 'mongodb';
import { logger } from '../config/logger.js';

export class MongoStore {
    private client: MongoClient | null = null;
    private db: Db | null = null;
    private connecting = false;

    constructor(
        private url: string,
        private databaseName: string,
        private options: MongoClientOptions = { serverSelectionTimeoutMS: 30_000 },
    ) { }

    async connect(): Promise<void> {
        if (this.client || this.connecting) {
            return;
        }

        this.connecting = true;

        try {
            logger.info({ database: this.databaseName }, 'Connecting to MongoDB');

            const client = new MongoClient(this.url, this.options);
            await client.connect();
            await client.db(this.databaseName).command({ ping: 1 });

            this.client = client;
            this.db = client.db(this.databaseName);

            logger.info('Connected to MongoDB successfully');
        } catch (err) {
            logger.error({ error: err }, 'Failed to connect to MongoDB');
            throw err;
        } finally {
            this.connecting = false;
        }
    }

    getDb(): Db {
        if (!this.db) {
            throw new Error('MongoDB connection not established');
        }
        return this.db;
    }

    isConnected(): boolean {
        return this.db !== null;
    }

    async close(): Promise<void> {
        if (this.client) {
            logger.info('Closing MongoDB connection');
            await this.client.close();
            this.client = null;
            this.db = null;
        }
    }
}
