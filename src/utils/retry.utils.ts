// src/utils/retry.utils.ts
import { Logger } from 'pino';
import { FetchRetryOptionsStruct } from '../config/types';
import { getErrorMessageAndStack } from './errorUtils';

export type RetryOptions = FetchRetryOptionsStruct & {
    /** Return false to stop retrying and rethrow immediately. */
    shouldRetry?: (error: unknown) => boolean;
};

export const sleep = (ms: number): Promise<void> =>
    new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs `fn` up to `retries` times with exponential backoff
 * (`minTimeout * factor^(attempt-1)`), rethrowing the last error.
 */
export const retryAsync = async <T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions,
    logger: Logger
): Promise<T> => {
    const { retries, minTimeout, factor, shouldRetry } = options;
    const retryLogger = logger.child({ retryContext: 'retryAsync' });
    let lastError: unknown = new Error('retryAsync called with retries < 1.');

    for (let attempt = 1; attempt <= retries; attempt++) {
        try {
            return await fn(attempt);
        } catch (error: unknown) {
            lastError = error;
            const retryable = shouldRetry ? shouldRetry(error) : true;
            const isLastAttempt = attempt >= retries || !retryable;
            const timeout = Math.round(minTimeout * Math.pow(factor, attempt - 1));
            const { message, stack } = getErrorMessageAndStack(error);

            const logContext = {
                event: isLastAttempt ? 'retry_max_attempts_reached' : 'retry_attempt_failed',
                attempt,
                maxRetries: retries,
                retryable,
                err: { message, stack: stack?.substring(0, 500) },
                ...(isLastAttempt ? {} : { delayMs: timeout }),
            };

            if (isLastAttempt) {
                retryLogger.warn(logContext, retryable
                    ? `Failed after ${attempt} attempt(s). Giving up.`
                    : `Attempt ${attempt} failed with a non-retryable error.`);
                throw error;
            }
            retryLogger.warn(logContext, `Attempt ${attempt}/${retries} failed. Retrying in ${timeout}ms...`);
            await sleep(timeout);
        }
    }
    throw lastError;
};
