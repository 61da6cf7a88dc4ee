// src/testing/testHelpers.ts
import fs from 'fs';
import path from 'path';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from '../services/logging.service';
import { SpecialIssueRecord } from '../types/specialIssue.types';

// Quiet, fast settings shared by the tests.
export const TEST_ENV: Record<string, string> = {
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    LOG_TO_CONSOLE: 'false',
    LOG_TO_FILE: 'false',
    FETCH_RETRIES: '3',
    FETCH_RETRY_MIN_TIMEOUT_MS: '0',
    JOURNAL_DELAY_MS: '0',
    DETAIL_PAGE_DELAY_MS: '0',
    TRANSLATION_ENABLED: 'false',
    TRANSLATION_MIN_DELAY_MS: '0',
};

export const createTestConfig = (overrides: Record<string, string> = {}): ConfigService =>
    new ConfigService({ ...TEST_ENV, ...overrides });

export const createTestLogging = (configService: ConfigService = createTestConfig()): LoggingService =>
    new LoggingService(configService);

export const createTestLogger = (): Logger => createTestLogging().getLogger({ service: 'test' });

export const loadFixture = (name: string): string =>
    fs.readFileSync(path.join(__dirname, '..', 'parsers', '__fixtures__', name), 'utf8');

export const makeRecord = (overrides: Partial<SpecialIssueRecord> = {}): SpecialIssueRecord => ({
    title: 'Urban resilience',
    deadline: '2026-03-01',
    guestEditors: '',
    description: '',
    detailUrl: 'https://journals.example.org/si/urban-resilience',
    translatedTitle: '',
    translatedDescription: '',
    ...overrides,
});
