/**
 * Status API Server
 *
 * Read-only HTTP view over an output folder: processing records, run stats
 * and the speaker transcripts produced so far. The state store is re-read on
 * every request, so it can run alongside a batch.
 */

import * as fs from 'fs/promises';
import type { Server } from 'http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { OutputPaths } from '../config/config';
import { errorMessage } from '../shared/errors';
import { isNotFound } from '../shared/write-if-changed';
import { RunStateTracker, formatDuration } from '../state/run-state';

type Handler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: Handler) {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}

export function createStatusApi(paths: Pick<OutputPaths, 'stateFile' | 'speakers'>): Express {
    const app = express();

    const openState = () => RunStateTracker.open(paths.stateFile);

    app.use((req, res, next) => {
        res.header('Access-Control-Allow-Origin', '*');
        res.header('Access-Control-Allow-Methods', 'GET, OPTIONS');
        res.header('Access-Control-Allow-Headers', 'Content-Type');
        if (req.method === 'OPTIONS') {
            res.sendStatus(200);
            return;
        }
        next();
    });

    /**
     * Health check
     */
    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    /**
     * GET /status
     * Totals over every recorded attempt
     */
    app.get('/status', asyncRoute(async (req, res) => {
        const stats = (await openState()).stats();
        res.json({
            ...stats,
            totalDuration: formatDuration(stats.totalDurationSeconds),
            averageDuration: formatDuration(stats.averageDurationSeconds),
        });
    }));

    /**
     * GET /records
     */
    app.get('/records', asyncRoute(async (req, res) => {
        res.json((await openState()).getRecords());
    }));

    /**
     * GET /records/:fileName
     * Every attempt for one input file
     */
    app.get('/records/:fileName', asyncRoute(async (req, res) => {
        const records = (await openState()).getRecordsFor(req.params.fileName);
        if (records.length === 0) {
            res.status(404).json({ error: 'No records for this file' });
            return;
        }
        res.json(records);
    }));

    /**
     * GET /speakers
     * Speaker transcripts written by the last aggregation
     */
    app.get('/speakers', asyncRoute(async (req, res) => {
        let names: string[] = [];
        try {
            names = (await fs.readdir(paths.speakers)).filter(n => n.endsWith('.tsv')).sort();
        } catch (error) {
            if (!isNotFound(error)) throw error;
        }
        res.json({ speakers: names.map(n => n.slice(0, -'.tsv'.length)) });
    }));

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        res.status(500).json({ error: errorMessage(err) });
    });

    return app;
}

export function startStatusApi(app: Express, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            resolve(server);
        });
        server.once('error', reject);
    });
}
