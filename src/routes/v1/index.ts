import { Router } from 'express';
import type { RateLimitController } from '@/controllers';
import { createPathRoutes } from '@/routes/v1/paths.routes';
import { createTransferRoutes } from '@/routes/v1/transfers.routes';

export const createV1Routes = (controller: RateLimitController): Router => {
    const router = Router();

    router.use('/paths', createPathRoutes(controller));
    router.use('/transfers', createTransferRoutes(controller));

    return router;
};
