import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { StatusCodes } from 'http-status-codes';
import { RateLimitController } from '@/controllers';
import { systemClock, type Clock } from '@/lib/clock';
import logger from '@/lib/logger';
import { requestLoggingMiddleware } from '@/middleware/logging';
import { errorResponse, responseEnvelopeMiddleware } from '@/middleware/response';
import { createV1Routes } from '@/routes/v1';
import { PathService } from '@/services/path.service';
import { TransferService } from '@/services/transfer.service';
import type { PathRegistry } from '@/store/path-registry';

export interface AppDependencies {
    registry: PathRegistry;
    clock?: Clock;
}

const hasStatus = (error: unknown): error is { status: number } =>
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';

export const createApp = ({ registry, clock = systemClock }: AppDependencies): Express => {
    const controller = new RateLimitController(new TransferService(registry), new PathService(registry), clock);
    const app = express();

    app.use(requestLoggingMiddleware);
    app.use(responseEnvelopeMiddleware);

    app.use(helmet());
    app.use(cors());
    app.use(express.json());

    // Routes
    app.use('/api/v1', createV1Routes(controller));

    // Health
    app.get('/health', (_req, res) => {
        res.json({ status: 'OK', timestamp: new Date().toISOString() });
    });

    // 404 fallback
    app.use((req, res) => {
        res.status(StatusCodes.NOT_FOUND).json(errorResponse('Route not found', req.id));
    });

    // Body parser failures (malformed JSON, oversized payloads) and anything a handler let escape
    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        const status = hasStatus(error) && error.status < 500 ? error.status : StatusCodes.INTERNAL_SERVER_ERROR;
        const message = status < 500 && error instanceof Error ? error.message : 'Internal Server Error';
        logger.log(status < 500 ? 'warn' : 'error', 'Request failed outside a handler', {
            requestId: req.id,
            status,
            error: error instanceof Error ? error.message : String(error)
        });
        res.status(status).json(errorResponse(message, req.id));
    });

    return app;
};
