import { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ZodError } from 'zod';
import { AppError, RateLimitExceededError } from '@/errors/app-error';
import { systemClock, type Clock } from '@/lib/clock';
import logger from '@/lib/logger';
import { errorResponse, rateLimitedResponse } from '@/middleware/response';
import { createPath, type Path } from '@/models/path';
import type { RateLimit } from '@/models/rate-limit';
import type { PathService } from '@/services/path.service';
import type { TransferService } from '@/services/transfer.service';
import {
    pathSchema,
    registerPathSchema,
    resetQuotaParamsSchema,
    reversalSchema,
    transferSchema
} from '@/validators/rate-limit.validator';

const describeIssues = (error: ZodError) =>
    error.issues.map((issue) => ({ field: issue.path.map(String).join('.'), message: issue.message }));

const toView = (path: Path, limits: RateLimit[]) => ({
    path,
    rateLimits: limits.map((limit) => limit.toRecord())
});

/** HTTP dispatch onto the path and transfer services. Reads the clock once per request. */
export class RateLimitController {
    constructor(
        private readonly transfers: TransferService,
        private readonly paths: PathService,
        private readonly clock: Clock = systemClock
    ) {}

    registerPath = async (req: Request, res: Response): Promise<void> => {
        const parsed = registerPathSchema.safeParse(req.body);
        if (!parsed.success) {
            this.invalid(req, res, parsed.error);
            return;
        }

        try {
            const { owner, channel, asset, quotas } = parsed.data;
            const path = createPath(owner, channel, asset);
            const limits = await this.paths.registerPath(path, quotas, this.clock());
            res.status(StatusCodes.CREATED).json(toView(path, limits));
        } catch (error: unknown) {
            this.fail(req, res, error, 'Error registering path');
        }
    };

    deregisterPath = async (req: Request, res: Response): Promise<void> => {
        const parsed = pathSchema.safeParse(req.params);
        if (!parsed.success) {
            this.invalid(req, res, parsed.error);
            return;
        }

        try {
            const path = createPath(parsed.data.owner, parsed.data.channel, parsed.data.asset);
            await this.paths.removePath(path);
            res.status(StatusCodes.OK).json({ path, removed: true });
        } catch (error: unknown) {
            this.fail(req, res, error, 'Error removing path');
        }
    };

    getQuotas = async (req: Request, res: Response): Promise<void> => {
        const parsed = pathSchema.safeParse(req.params);
        if (!parsed.success) {
            this.invalid(req, res, parsed.error);
            return;
        }

        try {
            const path = createPath(parsed.data.owner, parsed.data.channel, parsed.data.asset);
            const limits = await this.paths.getQuotas(path);
            res.status(StatusCodes.OK).json(toView(path, limits));
        } catch (error: unknown) {
            this.fail(req, res, error, 'Error fetching quotas');
        }
    };

    resetQuota = async (req: Request, res: Response): Promise<void> => {
        const parsed = resetQuotaParamsSchema.safeParse(req.params);
        if (!parsed.success) {
            this.invalid(req, res, parsed.error);
            return;
        }

        try {
            const { owner, channel, asset, quotaName } = parsed.data;
            const path = createPath(owner, channel, asset);
            const limits = await this.paths.resetPathQuota(path, quotaName, this.clock());
            res.status(StatusCodes.OK).json({ ...toView(path, limits), quotaName });
        } catch (error: unknown) {
            this.fail(req, res, error, 'Error resetting quota');
        }
    };

    recordTransfer = async (req: Request, res: Response): Promise<void> => {
        const parsed = transferSchema.safeParse(req.body);
        if (!parsed.success) {
            this.invalid(req, res, parsed.error);
            return;
        }

        try {
            const { owner, channel, asset, direction, amount } = parsed.data;
            const outcome = await this.transfers.tryTransfer(
                createPath(owner, channel, asset),
                amount,
                direction,
                this.clock()
            );
            res.status(StatusCodes.OK).json(outcome);
        } catch (error: unknown) {
            this.fail(req, res, error, 'Error recording transfer');
        }
    };

    reverseOutbound = async (req: Request, res: Response): Promise<void> => {
        const parsed = reversalSchema.safeParse(req.body);
        if (!parsed.success) {
            this.invalid(req, res, parsed.error);
            return;
        }

        try {
            const { owner, channel, asset, amount } = parsed.data;
            const outcome = await this.transfers.undoSend(createPath(owner, channel, asset), amount);
            res.status(StatusCodes.OK).json(outcome);
        } catch (error: unknown) {
            this.fail(req, res, error, 'Error reversing transfer');
        }
    };

    private invalid(req: Request, res: Response, error: ZodError): void {
        res.status(StatusCodes.BAD_REQUEST).json(
            errorResponse({ message: 'Validation failed', details: describeIssues(error) }, req.id)
        );
    }

    private fail(req: Request, res: Response, error: unknown, action: string): void {
        if (error instanceof RateLimitExceededError) {
            res.status(StatusCodes.TOO_MANY_REQUESTS).json(
                rateLimitedResponse({ message: error.message, details: error.context }, req.id)
            );
            return;
        }

        if (error instanceof AppError) {
            logger.warn(action, { requestId: req.id, statusCode: error.statusCode, error: error.message });
            res.status(error.statusCode).json(
                errorResponse(error.context ? { message: error.message, details: error.context } : error.message, req.id)
            );
            return;
        }

        logger.error(action, {
            requestId: req.id,
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined
        });
        res.status(StatusCodes.INTERNAL_SERVER_ERROR).json(errorResponse('Internal Server Error', req.id));
    }
}
