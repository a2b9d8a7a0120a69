export { RateLimitController } from '@/controllers/rate-limit.controller';
