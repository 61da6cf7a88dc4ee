// src/config/config.service.ts
import dotenv from 'dotenv';
import { z } from 'zod';

import { envSchema } from './schemas';
import { AppConfig, FetchRetryOptionsStruct } from './types';
import { AppConfiguration } from './app.config';
import { ScraperConfig } from './scraper.config';
import { TranslationConfig } from './translation.config';
import { JournalConfig } from './journal.config';
import { ConfigurationError } from '../types/errors';
import { Journal } from '../types/specialIssue.types';

/**
 * Validated configuration of one process. Built once from the environment
 * (see `ConfigService.fromProcessEnv`) and registered in the container as a value.
 */
export class ConfigService {
    public readonly rawConfig: AppConfig;

    public readonly appConfiguration: AppConfiguration;
    public readonly scraperConfig: ScraperConfig;
    public readonly translationConfig: TranslationConfig;
    public readonly journalConfig: JournalConfig;

    /**
     * @throws ConfigurationError when a variable fails validation.
     */
    constructor(env: Record<string, string | undefined>) {
        try {
            this.rawConfig = envSchema.parse(env);
        } catch (error) {
            if (error instanceof z.ZodError) {
                throw new ConfigurationError('Invalid environment variables (schema validation failed).', {
                    issues: error.format(),
                });
            }
            throw error;
        }

        this.appConfiguration = new AppConfiguration(this.rawConfig);
        this.scraperConfig = new ScraperConfig(this.rawConfig);
        this.translationConfig = new TranslationConfig(this.rawConfig);
        this.journalConfig = new JournalConfig(this.rawConfig);
    }

    /**
     * Loads `.env` (if present) on top of `process.env` and validates the result.
     */
    public static fromProcessEnv(): ConfigService {
        dotenv.config();
        return new ConfigService(process.env);
    }

    // --- Delegated Getters ---
    get nodeEnv() { return this.appConfiguration.nodeEnv; }

    public get isProduction(): boolean {
        return this.appConfiguration.nodeEnv === 'production';
    }

    get logLevel() { return this.appConfiguration.logLevel; }
    get logsDirectory(): string { return this.appConfiguration.logsDirectoryPath; }
    get appLogFilePath(): string { return this.appConfiguration.appLogFilePath; }
    get logToConsole(): boolean { return this.appConfiguration.logToConsole; }
    get logToFile(): boolean { return this.appConfiguration.logToFile; }

    get dataFilePath(): string { return this.appConfiguration.dataFilePath; }
    get scrapeCronSchedule(): string { return this.appConfiguration.scrapeCronSchedule; }
    get cronTimezone(): string { return this.appConfiguration.cronTimezone; }

    get fetchRetryOptions(): FetchRetryOptionsStruct { return this.scraperConfig.retryOptions; }

    public loadJournals(): Journal[] {
        return this.journalConfig.loadJournals();
    }

    /**
     * Non-secret summary of the active configuration, for the startup log line.
     */
    public describe(): Record<string, unknown> {
        return {
            nodeEnv: this.nodeEnv,
            logLevel: this.logLevel,
            dataFilePath: this.dataFilePath,
            journalsConfigPath: this.journalConfig.journalsConfigPath,
            journalConcurrency: this.scraperConfig.journalConcurrency,
            detailPagesEnabled: this.scraperConfig.detailPagesEnabled,
            expiredIssuePolicy: this.scraperConfig.expiredIssuePolicy,
            translationEnabled: this.translationConfig.enabled,
            translationTargetLanguage: this.translationConfig.targetLanguage,
            geminiApiKey: this.translationConfig.apiKey ? 'Set' : 'Not Set',
        };
    }
}
