import { Router } from 'express';
import type { RateLimitController } from '@/controllers';
import { transferLimiter } from '@/middleware/rate-limit';

export const createTransferRoutes = (controller: RateLimitController): Router => {
    const router = Router();

    router.post('/', transferLimiter, controller.recordTransfer);

    // Undo a previously recorded outbound transfer (failed or timed-out delivery)
    router.post('/reversals', transferLimiter, controller.reverseOutbound);

    return router;
};
