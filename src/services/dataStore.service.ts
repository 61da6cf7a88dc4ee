// src/services/dataStore.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { format } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { PersistenceError } from '../types/errors';
import { DataStore, JournalSnapshot, SpecialIssueRecord } from '../types/specialIssue.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export const LAST_UPDATED_FORMAT = 'yyyy-MM-dd HH:mm:ss';

// Older files hold null for fields that were never found.
const persistedText = z.string().nullish().transform(value => value ?? '');

const persistedIssueSchema = z.object({
    title: z.string(),
    deadline: persistedText,
    guest_editors: persistedText,
    description: persistedText,
    url: persistedText,
    translated_title: persistedText,
    translated_description: persistedText,
});

const persistedJournalSchema = z.object({
    name: z.string(),
    url: z.string(),
    special_issues: z.array(persistedIssueSchema),
});

export const persistedStoreSchema = z.object({
    last_updated: z.string(),
    journals: z.array(persistedJournalSchema),
});

export type PersistedStore = z.input<typeof persistedStoreSchema>;

export const formatLastUpdated = (date: Date): string => format(date, LAST_UPDATED_FORMAT);

// fs errors may come from another realm (e.g. a test sandbox), so the code is checked structurally.
const isMissingFileError = (error: unknown): boolean =>
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export const emptyDataStore = (): DataStore => ({ lastUpdated: '', journals: [] });

const toPersisted = (store: DataStore): PersistedStore => ({
    last_updated: store.lastUpdated,
    journals: store.journals.map(journal => ({
        name: journal.name,
        url: journal.url,
        special_issues: journal.specialIssues.map(issue => ({
            title: issue.title,
            deadline: issue.deadline,
            guest_editors: issue.guestEditors,
            description: issue.description,
            url: issue.detailUrl,
            translated_title: issue.translatedTitle,
            translated_description: issue.translatedDescription,
        })),
    })),
});

const fromPersisted = (persisted: z.output<typeof persistedStoreSchema>): DataStore => ({
    lastUpdated: persisted.last_updated,
    journals: persisted.journals.map((journal): JournalSnapshot => ({
        name: journal.name,
        url: journal.url,
        specialIssues: journal.special_issues.map((issue): SpecialIssueRecord => ({
            title: issue.title,
            deadline: issue.deadline,
            guestEditors: issue.guest_editors,
            description: issue.description,
            detailUrl: issue.url,
            translatedTitle: issue.translated_title,
            translatedDescription: issue.translated_description,
        })),
    })),
});

/**
 * Reads and atomically replaces the data file consumed by the display layer.
 */
@singleton()
export class DataStoreService {
    private readonly serviceLogger: Logger;
    public readonly dataFilePath: string;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
    ) {
        this.serviceLogger = loggingService.getLogger({ service: 'DataStoreService' });
        this.dataFilePath = configService.dataFilePath;
    }

    /**
     * Loads the previous store. A missing file is an empty store; an unreadable
     * or invalid one is fatal so that existing data is never overwritten blindly.
     * @throws PersistenceError
     */
    public async load(): Promise<DataStore> {
        const logger = this.serviceLogger.child({ function: 'load', path: this.dataFilePath });

        let content: string;
        try {
            content = await fs.promises.readFile(this.dataFilePath, 'utf8');
        } catch (error: unknown) {
            if (isMissingFileError(error)) {
                logger.info({ event: 'data_file_absent' }, 'No data file yet; starting from an empty store.');
                return emptyDataStore();
            }
            const { message } = getErrorMessageAndStack(error);
            throw new PersistenceError(`Cannot read data file "${this.dataFilePath}": ${message}`, { path: this.dataFilePath });
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            throw new PersistenceError(`Data file "${this.dataFilePath}" is not valid JSON: ${message}`, { path: this.dataFilePath });
        }

        const parsed = persistedStoreSchema.safeParse(raw);
        if (!parsed.success) {
            throw new PersistenceError(`Data file "${this.dataFilePath}" does not match the expected structure.`, {
                path: this.dataFilePath,
                issues: parsed.error.issues,
            });
        }

        const store = fromPersisted(parsed.data);
        logger.info({
            event: 'data_file_loaded',
            lastUpdated: store.lastUpdated,
            journalCount: store.journals.length,
            issueCount: store.journals.reduce((sum, journal) => sum + journal.specialIssues.length, 0),
        }, 'Previous data loaded.');
        return store;
    }

    /**
     * Writes the store to a temporary file beside the target, then renames it over the target.
     * @throws PersistenceError
     */
    public async save(store: DataStore): Promise<void> {
        const logger = this.serviceLogger.child({ function: 'save', path: this.dataFilePath });
        const tempPath = `${this.dataFilePath}.${uuidv4()}.tmp`;
        const json = `${JSON.stringify(toPersisted(store), null, 2)}\n`;

        try {
            await fs.promises.mkdir(path.dirname(this.dataFilePath), { recursive: true });
            await fs.promises.writeFile(tempPath, json, 'utf8');
            await fs.promises.rename(tempPath, this.dataFilePath);
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            try {
                await fs.promises.rm(tempPath, { force: true });
            } catch (cleanupError: unknown) {
                logger.warn({ event: 'temp_file_cleanup_failed', tempPath, err: getErrorMessageAndStack(cleanupError) });
            }
            throw new PersistenceError(`Failed to write data file "${this.dataFilePath}": ${message}`, { path: this.dataFilePath, tempPath });
        }

        logger.info({ event: 'data_file_saved', bytes: Buffer.byteLength(json), journalCount: store.journals.length }, 'Data file written.');
    }
}
