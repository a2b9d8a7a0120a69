import { Router } from 'express';
import type { RateLimitController } from '@/controllers';
import { adminLimiter, queryLimiter } from '@/middleware/rate-limit';

export const createPathRoutes = (controller: RateLimitController): Router => {
    const router = Router();

    // Register (or overwrite) the quotas on a path
    router.post('/', adminLimiter, controller.registerPath);

    router.delete('/:owner/:channel/:asset', adminLimiter, controller.deregisterPath);

    // Current windows and counters for every quota on the path
    router.get('/:owner/:channel/:asset/quotas', queryLimiter, controller.getQuotas);

    // Start a new window for one quota
    router.post('/:owner/:channel/:asset/quotas/:quotaName/reset', adminLimiter, controller.resetQuota);

    return router;
};
