// src/config/scraper.config.ts
import { AppConfig, FetchRetryOptionsStruct } from './types';
import { ExpiredIssuePolicy } from '../types/specialIssue.types';

export class ScraperConfig {
    public readonly fetchTimeoutMs: number;
    public readonly retryRetries: number;
    public readonly retryMinTimeout: number;
    public readonly retryFactor: number;
    public readonly userAgent: string;

    public readonly journalConcurrency: number;
    public readonly journalDelayMs: number;
    public readonly detailPagesEnabled: boolean;
    public readonly detailPageDelayMs: number;
    public readonly genericMaxSections: number;
    public readonly expiredIssuePolicy: ExpiredIssuePolicy;

    constructor(appConfig: AppConfig) {
        this.fetchTimeoutMs = appConfig.FETCH_TIMEOUT_MS;
        this.retryRetries = appConfig.FETCH_RETRIES;
        this.retryMinTimeout = appConfig.FETCH_RETRY_MIN_TIMEOUT_MS;
        this.retryFactor = appConfig.FETCH_RETRY_FACTOR;
        this.userAgent = appConfig.FETCH_USER_AGENT;

        this.journalConcurrency = appConfig.JOURNAL_CONCURRENCY;
        this.journalDelayMs = appConfig.JOURNAL_DELAY_MS;
        this.detailPagesEnabled = appConfig.DETAIL_PAGES_ENABLED;
        this.detailPageDelayMs = appConfig.DETAIL_PAGE_DELAY_MS;
        this.genericMaxSections = appConfig.GENERIC_MAX_SECTIONS;
        this.expiredIssuePolicy = appConfig.EXPIRED_ISSUE_POLICY;
    }

    public get retryOptions(): FetchRetryOptionsStruct {
        return {
            retries: this.retryRetries,
            minTimeout: this.retryMinTimeout,
            factor: this.retryFactor,
        };
    }
}
