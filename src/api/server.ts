import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../config/logger.js';
import { exportCsv } from '../export/csv.js';
import { Metrics } from '../metrics/counter.js';
import type { MonitoringSession } from '../monitor/session.js';
import type { InMemoryAssessmentRepository } from '../persistence/repository.js';

const DEFAULT_DAYS = 7;
const MAX_DAYS = 365;

export interface ApiResponse {
    status: number;
    contentType: string;
    body: string;
}

export interface ApiDependencies {
    bus: { isConnected(): boolean };
    metrics: Metrics;
    session: Pick<MonitoringSession, 'isRunning' | 'latestAssessment' | 'alertState' | 'currentZone' | 'bufferSizes'>;
    repository: Pick<InMemoryAssessmentRepository, 'query' | 'trends' | 'count'>;
    now?: () => Date;
}

function json(status: number, body: unknown): ApiResponse {
    return { status, contentType: 'application/json', body: JSON.stringify(body) };
}

export function parseDays(raw: string | null): number | null {
    if (raw === null) return DEFAULT_DAYS;
    if (!/^\d+$/.test(raw)) return null;
    const days = parseInt(raw, 10);
    if (days <= 0 || days > MAX_DAYS) return null;
    return days;
}

export class ApiServer {
    private server: Server;
    private readonly now: () => Date;

    constructor(
        private port: number,
        private deps: ApiDependencies,
    ) {
        this.now = deps.now ?? (() => new Date());
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err: unknown) => {
                logger.error({ error: err, url: req.url }, 'Request failed');
                if (!res.headersSent) {
                    res.writeHead(500, { 'Content-Type': 'application/json' });
                }
                res.end(JSON.stringify({ error: 'Internal error' }));
            });
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        // CORS headers
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (req.method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        const response = await this.route(req.method ?? 'GET', req.url ?? '/');
        res.writeHead(response.status, { 'Content-Type': response.contentType });
        res.end(response.body);
    }

    async route(method: string, rawUrl: string): Promise<ApiResponse> {
        const url = new URL(rawUrl, 'http://localhost');

        if (method !== 'GET') {
            return json(405, { error: 'Method not allowed' });
        }

        switch (url.pathname) {
            case '/health':
                return this.handleHealth();
            case '/metrics':
                return this.handleMetrics();
            case '/assessment':
                return this.handleLatest();
            case '/assessments':
            case '/export.csv':
                return this.handleHistory(url);
            default:
                return json(404, { error: 'Not found' });
        }
    }

    private handleHealth(): ApiResponse {
        const isBusConnected = this.deps.bus.isConnected();
        const isMonitoring = this.deps.session.isRunning;
        const healthy = isBusConnected && isMonitoring;

        return json(healthy ? 200 : 503, {
            status: healthy ? 'ok' : 'degraded',
            nats: { connected: isBusConnected },
            monitoring: { running: isMonitoring },
            timestamp: this.now().toISOString(),
        });
    }

    private handleMetrics(): ApiResponse {
        const { session, repository } = this.deps;

        return json(200, {
            ...this.deps.metrics.getCounters(),
            alert_status: session.alertState().status,
            zone: session.currentZone(),
            buffers: session.bufferSizes(),
            stored_assessments: repository.count(),
            timestamp: this.now().toISOString(),
        });
    }

    private handleLatest(): ApiResponse {
        const record = this.deps.session.latestAssessment();
        if (!record) {
            return json(404, { error: 'No assessment available' });
        }
        return json(200, record);
    }

    private async handleHistory(url: URL): Promise<ApiResponse> {
        const days = parseDays(url.searchParams.get('days'));
        if (days === null) {
            return json(400, { error: `days must be an integer between 1 and ${MAX_DAYS}` });
        }

        if (url.pathname === '/assessments') {
            const [records, trends] = await Promise.all([
                this.deps.repository.query(days),
                this.deps.repository.trends(days),
            ]);
            return json(200, { days, records, trends });
        }

        const records = await this.deps.repository.query(days);
        return {
            status: 200,
            contentType: 'text/csv; charset=utf-8',
            body: exportCsv([...records].reverse()),
        };
    }

    async start(): Promise<void> {
        return new Promise((resolve) => {
            this.server.listen(this.port, () => {
                logger.info({ port: this.port }, 'HTTP API server started');
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => {
                if (err) {
                    reject(err);
                    return;
                }
                logger.info('HTTP API server stopped');
                resolve();
            });
        });
    }
}
