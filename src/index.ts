import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { loadRules, loadSectorDirectory } from './rules/loader.js';
import { MongoStore } from './storage/connection.js';
import { MongoClinicalRepository } from './storage/mongo-repository.js';
import { NatsClient } from './nats/connection.js';
import { ReportStore } from './nats/report-store.js';
import { KpiService } from './kpi/service.js';
import { Metrics } from './metrics/counter.js';
import { ApiServer } from './api/server.js';

async function main() {
    logger.info('Starting Clinical KPI Service');

    // Load configuration
    const config = loadConfig();
    logger.info({ config: { ...config, mongo: { database: config.mongo.database } } }, 'Configuration loaded');

    // Initialize schema validator
    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    // Load rules and sector directory
    const rules = loadRules(config.rules.path, validator);
    const sectors = loadSectorDirectory(config.rules.sectorsPath, validator);

    // Initialize metrics
    const metrics = new Metrics();

    // Initialize storage
    const store = new MongoStore(config.mongo.url, config.mongo.database);
    await store.connect();
    const repository = new MongoClinicalRepository(store);

    // NATS is only needed to persist unit reports
    let natsClient: NatsClient | null = null;
    let reportStore: ReportStore | null = null;
    if (config.persist.enabled) {
        natsClient = new NatsClient({
            servers: config.nats.url,
            name: 'clinical-kpi',
        });
        await natsClient.connect();
        reportStore = new ReportStore(natsClient, validator, config.nats.kvBucket);
    }

    const service = new KpiService(repository, rules, metrics, { reportStore });

    // Initialize HTTP API server
    const nats = natsClient;
    const apiServer = new ApiServer(config.http.port, {
        service,
        repository,
        metrics,
        validator,
        sectors,
        natsStatus: nats ? () => nats.isConnected() : undefined,
    });

    // Start HTTP server
    await apiServer.start();

    logger.info({ persist: config.persist.enabled }, 'Clinical KPI Service running');

    // Graceful shutdown
    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        await apiServer.stop();
        if (nats) {
            await nats.close();
        }
        await store.close();

        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ error: err }, 'Error during shutdown');
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});
