import { logger } from '../config/logger';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
    /** Errors for which this returns false are rethrown at once. */
    isRetryable: (error: unknown) => boolean;
}

/**
 * Result of a retried operation: either a value, or the last retryable
 * error once every attempt is spent.
 */
export type RetryOutcome<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: unknown; attempts: number };

export interface IRetryUtil {
    executeWithRetry<T>(
        operation: (attempt: number) => Promise<T>,
        options: RetryOptions
    ): Promise<RetryOutcome<T>>;
}

/**
 * Retry Utility
 *
 * Runs an operation up to `maxAttempts` times with a capped, optionally
 * exponential, delay between attempts. Only errors accepted by
 * `isRetryable` are retried; anything else propagates immediately.
 */
export class RetryUtil {
    static async executeWithRetry<T>(
        operation: (attempt: number) => Promise<T>,
        options: RetryOptions
    ): Promise<RetryOutcome<T>> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation',
            isRetryable
        } = options;

        let lastError: unknown = new Error(`${operationName} was never attempted`);
        let attempt = 0;

        while (attempt < maxAttempts) {
            attempt++;
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const value = await operation(attempt);

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return { ok: true, value, attempts: attempt };

            } catch (error) {
                if (!isRetryable(error)) {
                    throw error;
                }
                lastError = error;

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: error instanceof Error ? error.message : String(error)
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: lastError instanceof Error ? lastError.message : String(lastError)
        }, `${operationName} failed after ${maxAttempts} attempts`);

        return { ok: false, error: lastError, attempts: attempt };
    }

    private static sleep(ms: number): Promise<void> {
        if (ms <= 0) {
            return Promise.resolve();
        }
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
