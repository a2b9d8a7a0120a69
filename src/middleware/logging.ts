import { Request, Response, NextFunction } from 'express';
import logger from '@/lib/logger';

const REQUEST_ID_HEADER = 'x-request-id';

export const requestLoggingMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    req.id = incoming && incoming.length <= 128 ? incoming : `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
    req.startTime = Date.now();
    res.setHeader(REQUEST_ID_HEADER, req.id);

    logger.info('→ Request', {
        requestId: req.id,
        method: req.method,
        path: req.path,
        ip: req.ip
    });

    res.on('finish', () => {
        logger.info('← Response', {
            requestId: req.id,
            statusCode: res.statusCode,
            durationMs: Date.now() - req.startTime
        });
    });

    next();
};
