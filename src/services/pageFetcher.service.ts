// src/services/pageFetcher.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { FetchError } from '../types/errors';
import { retryAsync, RetryOptions } from '../utils/retry.utils';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export interface IPageFetcher {
    /**
     * @throws FetchError after the retries are exhausted, or at once for a permanent 4xx.
     */
    fetchPage(url: string, parentLogger: Logger): Promise<string>;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

@singleton()
export class PageFetcherService implements IPageFetcher {
    public readonly client: AxiosInstance;
    private readonly retryOptions: RetryOptions;
    private readonly serviceLogger: Logger;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
    ) {
        this.serviceLogger = loggingService.getLogger({ service: 'PageFetcherService' });
        const { fetchTimeoutMs, userAgent } = configService.scraperConfig;

        this.client = axios.create({
            timeout: fetchTimeoutMs,
            responseType: 'text',
            maxRedirects: 5,
            headers: {
                'User-Agent': userAgent,
                Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.9',
            },
        });
        this.retryOptions = {
            ...configService.fetchRetryOptions,
            shouldRetry: (error: unknown) => !(error instanceof FetchError) || error.isRetryable,
        };
    }

    public async fetchPage(url: string, parentLogger: Logger = this.serviceLogger): Promise<string> {
        const logger = parentLogger.child({ function: 'fetchPage', url });
        const startTime = Date.now();
        logger.debug({ event: 'fetch_start' }, 'Fetching page.');

        const html = await retryAsync(async (attempt) => {
            try {
                const response = await this.client.get<unknown>(url);
                if (typeof response.data !== 'string') {
                    throw new FetchError(`Response from ${url} is not text.`, url, response.status);
                }
                logger.debug({ event: 'fetch_attempt_success', attempt, status: response.status, length: response.data.length });
                return response.data;
            } catch (error: unknown) {
                throw this.toFetchError(error, url);
            }
        }, this.retryOptions, logger);

        logger.info({ event: 'fetch_success', durationMs: Date.now() - startTime, length: html.length }, 'Page fetched.');
        return html;
    }

    private toFetchError(error: unknown, url: string): FetchError {
        if (error instanceof FetchError) return error;
        if (isAxiosError(error)) {
            const status = error.response?.status;
            if (status !== undefined) {
                return new FetchError(`HTTP ${status} for ${url}`, url, status);
            }
            const timedOut = error.code !== undefined && TIMEOUT_CODES.has(error.code);
            return new FetchError(
                timedOut ? `Timed out fetching ${url}` : `Network error fetching ${url}: ${error.message}`,
                url,
                undefined,
                { code: error.code, timedOut },
            );
        }
        const { message } = getErrorMessageAndStack(error);
        return new FetchError(`Unexpected error fetching ${url}: ${message}`, url);
    }
}
