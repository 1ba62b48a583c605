import express from 'express';
import Database from 'better-sqlite3';
import { PersonService } from './people/person-service';
import { PersonStore } from './people/person-store';
import { sendError } from './responses';

export const API_PREFIX = '/api/v1';

export type AppOptions = {
    logRequests?: boolean;
};

type HttpError = Error & { status: number; expose?: boolean };

const isHttpError = (error: unknown): error is HttpError =>
    error instanceof Error && 'status' in error && typeof error.status === 'number';

function requestLogger(): express.RequestHandler {
    return (req, res, next) => {
        const startedAt = Date.now();
        res.on('finish', () => {
            console.log(`[persons] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
        });
        next();
    };
}

/**
 * Build the HTTP application over an open database handle.
 */
export function createApp(db: Database.Database, options: AppOptions = {}): express.Express {
    const app = express();
    app.disable('x-powered-by');

    if (options.logRequests !== false) {
        app.use(requestLogger());
    }

    const personService = new PersonService(new PersonStore(db), API_PREFIX);
    app.use(API_PREFIX, personService.getRouter());

    app.use((_req, res) => {
        sendError(res, 404, 'Not found');
    });

    // Body read failures (size limit, bad charset) carry their own 4xx status
    app.use((error: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        if (isHttpError(error) && error.expose && error.status >= 400 && error.status < 500) {
            sendError(res, error.status, error.message);
            return;
        }
        console.error('[persons] Unhandled error:', error);
        sendError(res, 500, 'Internal server error');
    });

    return app;
}
