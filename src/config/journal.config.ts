// src/config/journal.config.ts
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AppConfig } from './types';
import { journalListSchema } from './schemas';
import { ConfigurationError } from '../types/errors';
import { Journal } from '../types/specialIssue.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Location and loading of the ordered journal list.
 */
export class JournalConfig {
    public readonly journalsConfigPath: string;

    constructor(appConfig: AppConfig) {
        this.journalsConfigPath = path.resolve(appConfig.JOURNALS_CONFIG_PATH);
    }

    /**
     * Reads and validates the journal list. Order in the file is the processing order.
     * @throws ConfigurationError when the file is missing, not JSON, or invalid.
     */
    public loadJournals(): Journal[] {
        let content: string;
        try {
            content = fs.readFileSync(this.journalsConfigPath, 'utf8');
        } catch (error) {
            const { message } = getErrorMessageAndStack(error);
            throw new ConfigurationError(`Cannot read journal list "${this.journalsConfigPath}": ${message}`, { path: this.journalsConfigPath });
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            const { message } = getErrorMessageAndStack(error);
            throw new ConfigurationError(`Journal list "${this.journalsConfigPath}" is not valid JSON: ${message}`, { path: this.journalsConfigPath });
        }

        try {
            return journalListSchema.parse(raw).map(entry => ({
                name: entry.name,
                url: entry.url,
                siteType: entry.site_type,
            }));
        } catch (error) {
            if (error instanceof z.ZodError) {
                throw new ConfigurationError(`Journal list "${this.journalsConfigPath}" is invalid.`, {
                    path: this.journalsConfigPath,
                    issues: error.issues,
                });
            }
            throw error;
        }
    }
}
