import * as http from 'http';
import * as path from 'path';
import express, { Express, Request, Response } from 'express';
import swaggerJsdoc from 'swagger-jsdoc';
import swaggerUi from 'swagger-ui-express';
import { countSucceeded } from './FeedCoordinator';
import { Logger, logger as rootLogger } from './Logger';
import { CycleReport, ErrorKind, FeedKind } from './types';

export interface FeedStatus {
    url: string;
    kind: FeedKind;
    name?: string;
    succeeded: boolean;
    error?: ErrorKind;
    cycle: number;
    at: string;
}

export interface StatusSnapshot {
    startedAt: string;
    cycles: number;
    skippedCycles: number;
    lastCycle: {
        cycle: number;
        startedAt: string;
        finishedAt: string;
        skipped?: string;
        succeeded: number;
        total: number;
    } | null;
    feeds: FeedStatus[];
}

// Keeps the latest cycle report and the last known outcome of every feed
export class StatusBoard {
    private readonly startedAt = new Date();
    private cycles = 0;
    private skippedCycles = 0;
    private lastReport: CycleReport | null = null;
    private readonly feeds = new Map<string, FeedStatus>();

    record(report: CycleReport): void {
        this.cycles++;
        if (report.skipped) {
            this.skippedCycles++;
        }
        this.lastReport = report;

        for (const outcome of report.outcomes) {
            const status: FeedStatus = {
                url: outcome.descriptor.url,
                kind: outcome.descriptor.kind,
                succeeded: outcome.succeeded,
                cycle: report.cycle,
                at: report.finishedAt.toISOString(),
            };
            if (outcome.descriptor.name) status.name = outcome.descriptor.name;
            if (outcome.error) status.error = outcome.error;
            this.feeds.set(outcome.descriptor.url, status);
        }
    }

    snapshot(): StatusSnapshot {
        const report = this.lastReport;
        return {
            startedAt: this.startedAt.toISOString(),
            cycles: this.cycles,
            skippedCycles: this.skippedCycles,
            lastCycle: report
                ? {
                      cycle: report.cycle,
                      startedAt: report.startedAt.toISOString(),
                      finishedAt: report.finishedAt.toISOString(),
                      skipped: report.skipped,
                      succeeded: countSucceeded(report.outcomes),
                      total: report.outcomes.length,
                  }
                : null,
            feeds: [...this.feeds.values()],
        };
    }
}

const swaggerOptions: swaggerJsdoc.Options = {
    definition: {
        openapi: '3.0.0',
        info: {
            title: 'GTFS Feed Ingest Status API',
            version: '0.1.0',
            description: 'Health and latest ingestion cycle of the GTFS feed ingester',
        },
        tags: [
            { name: 'Documentation', description: 'API Documentation' },
            { name: 'Status', description: 'Ingestion status' },
        ],
    },
    apis: [path.join(__dirname, 'StatusServer.{ts,js}')],
};

export function createStatusApp(board: StatusBoard, logger: Logger = rootLogger): Express {
    const app = express();
    const log = logger.child({ component: 'status-server' });

    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerJsdoc(swaggerOptions), { explorer: true }));

    /**
     * @openapi
     * /health:
     *   get:
     *     summary: Liveness probe
     *     tags:
     *      - Status
     *     responses:
     *       200:
     *         description: The process is up
     *         content:
     *           application/json:
     *             schema:
     *               type: object
     *               properties:
     *                 status:
     *                   type: string
     *                   example: "ok"
     */
    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    /**
     * @openapi
     * /api/status:
     *   get:
     *     summary: Latest ingestion cycle and per-feed outcomes
     *     tags:
     *      - Status
     *     responses:
     *       200:
     *         description: Cycle counters, the last cycle summary and the last outcome of every feed
     *         content:
     *           application/json:
     *             schema:
     *               type: object
     *               properties:
     *                 startedAt:
     *                   type: string
     *                   example: "2026-10-18T04:05:06.000Z"
     *                 cycles:
     *                   type: integer
     *                   example: 42
     *                 skippedCycles:
     *                   type: integer
     *                   example: 3
     *                 lastCycle:
     *                   type: object
     *                   nullable: true
     *                   properties:
     *                     cycle:
     *                       type: integer
     *                     startedAt:
     *                       type: string
     *                     finishedAt:
     *                       type: string
     *                     skipped:
     *                       type: string
     *                       example: "quiet_hours"
     *                     succeeded:
     *                       type: integer
     *                     total:
     *                       type: integer
     *                 feeds:
     *                   type: array
     *                   items:
     *                     type: object
     *                     properties:
     *                       url:
     *                         type: string
     *                       kind:
     *                         type: string
     *                         example: "trip_updates"
     *                       name:
     *                         type: string
     *                       succeeded:
     *                         type: boolean
     *                       error:
     *                         type: string
     *                         example: "timeout"
     *                       cycle:
     *                         type: integer
     *                       at:
     *                         type: string
     */
    app.get('/api/status', (_req: Request, res: Response) => {
        log.debug('Request on GET /api/status');
        res.json(board.snapshot());
    });

    return app;
}

export function startStatusServer(board: StatusBoard, port: number, logger: Logger = rootLogger): Promise<http.Server> {
    return new Promise<http.Server>((resolve, reject) => {
        const server = createStatusApp(board, logger).listen(port);
        server.once('listening', () => {
            logger.info('Status server is running', { port });
            resolve(server);
        });
        server.once('error', reject);
    });
}

export function closeServer(server: http.Server): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}
