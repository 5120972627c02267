import express, { Express, NextFunction, Request, Response, Router } from 'express';
import cors from 'cors';
import { appConfig } from '@/config/app.config';
import { attachTraceId } from '@/middleware/trace.middleware';
import { isRecord, logger } from '@/utils';

export interface AppOptions {
    routers: Router[];
    corsOrigins?: string[];
    bodyLimit?: string;
}

const isBodyParseError = (error: unknown): boolean =>
    isRecord(error) && error.type === 'entity.parse.failed';

export const createApp = ({ routers, corsOrigins = appConfig.corsOrigins, bodyLimit = appConfig.bodyLimit }: AppOptions): Express => {
    const app = express();

    app.use(cors({
        origin: (origin, callback) => {
            // Service-to-service calls (Pub/Sub push, Eventarc, Cloud Tasks) carry no Origin header
            if (!origin || corsOrigins.length === 0 || corsOrigins.includes(origin)) {
                return callback(null, true);
            }
            logger.warn(`CORS: Blocked origin ${origin}. Allowed origins: ${corsOrigins.join(', ')}`);
            callback(new Error('Not allowed by CORS'));
        },
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Cloud-Trace-Context'],
        exposedHeaders: ['Content-Length', 'Content-Type', 'X-Trace-Id']
    }));

    app.use(express.json({ limit: bodyLimit }));
    app.use(attachTraceId);

    for (const router of routers) {
        app.use(router);
    }

    app.use('*', (_req: Request, res: Response) => {
        res.status(404).json({ success: false, message: 'Route not found' });
    });

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (isBodyParseError(error)) {
            logger.warn('Malformed JSON body', { path: req.path, traceId: req.traceId });
            res.status(400).json({ success: false, message: 'Malformed JSON body' });
            return;
        }
        logger.error('Unhandled error:', error, { path: req.path, traceId: req.traceId });
        res.status(500).json({ success: false, message: 'Internal server error' });
    });

    return app;
};
