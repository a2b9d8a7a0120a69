import { Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import logger from '@/lib/logger';
import { RATE_LIMITS } from '@/constants';
import { rateLimitedResponse } from '@/middleware/response';

const throttled = (req: Request, res: Response, _next: NextFunction, options: { statusCode: number; message: unknown }) => {
    logger.warn('Request throttled', { requestId: req.id, ip: req.ip, path: req.path });
    res.status(options.statusCode).json(
        rateLimitedResponse(typeof options.message === 'string' ? options.message : 'Too many requests', req.id)
    );
};

export const transferLimiter = rateLimit({
    windowMs: RATE_LIMITS.TRANSFER.windowMs,
    limit: RATE_LIMITS.TRANSFER.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: throttled
});

export const adminLimiter = rateLimit({
    windowMs: RATE_LIMITS.ADMIN.windowMs,
    limit: RATE_LIMITS.ADMIN.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: throttled
});

export const queryLimiter = rateLimit({
    windowMs: RATE_LIMITS.QUERY.windowMs,
    limit: RATE_LIMITS.QUERY.max,
    standardHeaders: true,
    legacyHeaders: false
});
