// src/utils/retry.ts
import { describeError, logger } from './logger';

export interface RetryOptions {
    maxRetries?: number;
    /** Base delay in ms, doubled after every failed attempt. */
    retryDelay?: number;
    operation?: string;
}

const MAX_RETRIES = 3;
const RETRY_DELAY = 2000;

/**
 * Runs `task`, retrying with exponential backoff. The last failure is rethrown
 * through `wrapError`.
 */
export async function withRetry<T>(
    task: () => Promise<T>,
    wrapError: (message: string) => Error,
    { maxRetries = MAX_RETRIES, retryDelay = RETRY_DELAY, operation = 'operation' }: RetryOptions = {}
): Promise<T> {
    let retries = 0;

    while (true) {
        try {
            return await task();
        } catch (error) {
            const errorMessage = describeError(error);
            logger.error(`Error during ${operation} (attempt ${retries + 1}/${maxRetries + 1}): ${errorMessage}`);

            if (retries >= maxRetries) {
                throw wrapError(`Failed ${operation} after ${maxRetries + 1} attempts: ${errorMessage}`);
            }

            const delay = retryDelay * Math.pow(2, retries);
            logger.info(`Waiting ${delay}ms before retry ${retries + 1}...`);
            await new Promise(resolve => setTimeout(resolve, delay));
            retries++;
        }
    }
}
