import logger from '@/lib/logger';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    isRetryable: (error: unknown) => boolean;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
    const { maxAttempts = 3, baseDelayMs = 25, isRetryable } = options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn();
        } catch (error: unknown) {
            if (!isRetryable(error)) throw error;
            lastError = error;
            if (attempt < maxAttempts) {
                const delayMs = Math.pow(2, attempt - 1) * baseDelayMs;
                logger.warn('Retryable registry error — retrying', {
                    attempt,
                    delayMs,
                    error: error instanceof Error ? error.message : String(error)
                });
                await new Promise((resolve) => setTimeout(resolve, delayMs));
            }
        }
    }
    throw lastError;
}
