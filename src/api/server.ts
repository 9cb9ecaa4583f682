import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import { logger } from '../config/logger.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import { resolveSectorId } from '../kpi/sectors.js';
import { KpiService } from '../kpi/service.js';
import type { QueryWindow } from '../kpi/types.js';
import { Metrics } from '../metrics/counter.js';
import type { SectorDirectory } from '../rules/types.js';
import type { ClinicalRepository } from '../storage/repository.js';

export interface ApiDependencies {
    service: KpiService;
    repository: Pick<ClinicalRepository, 'ping'>;
    metrics: Metrics;
    validator: SchemaValidator;
    sectors: SectorDirectory;
    /** Reports NATS state when persistence is enabled */
    natsStatus?: () => boolean;
}

export class HttpError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * `YYYY-MM-DD` as UTC midnight.
 */
export function parseDay(value: string): Date {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
    const parsed = new Date(`${value}T00:00:00Z`);
    if (!match || isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
        throw new HttpError(400, `Invalid date: ${value}. Use YYYY-MM-DD.`);
    }
    return parsed;
}

const PATIENT_ROUTE = /^\/kpi\/patient\/([^/]+)$/;

export function decodePathSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch (err) {
        if (err instanceof URIError) {
            throw new HttpError(400, `Malformed path segment: ${segment}`);
        }
        throw err;
    }
}

export class ApiServer {
    private server: Server;

    constructor(
        private port: number,
        private deps: ApiDependencies,
    ) {
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err) => {
                logger.error({ error: err }, 'Unhandled request error');
                this.sendJson(res, 500, { error: 'Internal server error' });
            });
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const { method } = req;
        const url = new URL(req.url ?? '/', 'http://localhost');

        // CORS headers
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        try {
            const patientMatch = PATIENT_ROUTE.exec(url.pathname);

            if (method === 'GET' && url.pathname === '/health') {
                await this.handleHealth(res);
            } else if (method === 'GET' && url.pathname === '/metrics') {
                this.handleMetrics(res);
            } else if (method === 'GET' && url.pathname === '/kpi/unit') {
                await this.handleUnitKpi(url.searchParams, res);
            } else if (method === 'GET' && patientMatch) {
                await this.handlePatientKpi(decodePathSegment(patientMatch[1]), url.searchParams, res);
            } else {
                this.sendJson(res, 404, { error: 'Not found' });
            }
        } catch (err) {
            if (err instanceof HttpError) {
                if (err.statusCode === 400) {
                    this.deps.metrics.incrementRejected();
                }
                this.sendJson(res, err.statusCode, { error: err.message });
                return;
            }

            logger.error({ error: err, method, path: url.pathname }, 'Request failed');
            this.sendJson(res, 500, { error: 'Internal server error' });
        }
    }

    private async handleHealth(res: ServerResponse): Promise<void> {
        let storageConnected = true;
        try {
            await this.deps.repository.ping();
        } catch (err) {
            logger.warn({ error: err }, 'Storage health check failed');
            storageConnected = false;
        }

        const natsEnabled = this.deps.natsStatus !== undefined;
        const natsConnected = this.deps.natsStatus ? this.deps.natsStatus() : false;
        const healthy = storageConnected && (!natsEnabled || natsConnected);

        const response = {
            status: healthy ? 'ok' : 'degraded',
            storage: {
                connected: storageConnected,
            },
            nats: {
                enabled: natsEnabled,
                connected: natsConnected,
            },
            timestamp: new Date().toISOString(),
        };

        this.sendJson(res, healthy ? 200 : 503, response);
    }

    private handleMetrics(res: ServerResponse): void {
        const response = {
            ...this.deps.metrics.getCounters(),
            timestamp: new Date().toISOString(),
        };

        this.sendJson(res, 200, response);
    }

    private async handleUnitKpi(params: URLSearchParams, res: ServerResponse): Promise<void> {
        const query = Object.fromEntries(params.entries());

        const validationResult = this.deps.validator.validateUnitKpiQuery(query);
        if (!validationResult.valid) {
            throw new HttpError(400, `Invalid query: ${validationResult.errors}`);
        }

        const window: QueryWindow = {
            start: parseDay(params.get('start') ?? ''),
            end: parseDay(params.get('end') ?? ''),
        };
        if (window.start.getTime() > window.end.getTime()) {
            throw new HttpError(400, 'start must not be after end');
        }

        const sectorId = resolveSectorId(params.get('sector') ?? '', this.deps.sectors);
        const result = await this.deps.service.computeUnitReport(sectorId, window, {
            persist: params.get('persist') === 'true',
        });

        if (result.persisted !== null) {
            res.setHeader('X-Report-Persisted', String(result.persisted));
        }
        this.sendJson(res, 200, result.document);
    }

    private async handlePatientKpi(admissionId: string, params: URLSearchParams, res: ServerResponse): Promise<void> {
        const sector = params.get('sector');
        const sectorId = sector ? resolveSectorId(sector, this.deps.sectors) : null;

        const document = await this.deps.service.computePatientReport(admissionId, sectorId);
        if (!document) {
            throw new HttpError(404, `Admission not found: ${admissionId}`);
        }

        this.sendJson(res, 200, document);
    }

    private sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
        if (res.headersSent) {
            res.end();
            return;
        }
        res.writeHead(statusCode, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
    }

    /**
     * Port the server is bound to; differs from the configured one when that was 0.
     */
    listeningPort(): number {
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
            return this.port;
        }
        const info: AddressInfo = address;
        return info.port;
    }

    async start(): Promise<void> {
        return new Promise((resolve) => {
            this.server.listen(this.port, () => {
                logger.info({ port: this.listeningPort() }, 'HTTP API server started');
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve) => {
            this.server.close(() => {
                logger.info('HTTP API server stopped');
                resolve();
            });
        });
    }
}
