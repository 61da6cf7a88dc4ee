// src/config/schemas.ts
import { z } from 'zod';

// --- Helper Functions for Environment Variable Parsing ---

/**
 * Boolean flag read from an environment variable ("true"/"false", case-insensitive).
 */
const booleanFlag = (defaultValue: 'true' | 'false') =>
    z.string()
        .default(defaultValue)
        .transform(val => val.trim().toLowerCase())
        .pipe(z.enum(['true', 'false']))
        .transform(val => val === 'true');

// --- Zod Schema Definition for Environment Variables ---
/**
 * Zod schema defining the structure and validation rules for environment variables.
 * Each property corresponds to an environment variable.
 */
export const envSchema = z.object({
    /**
     * The current Node.js environment.
     * @default 'development'
     */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- Logging Configuration ---
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    /**
     * Directory where log files will be stored.
     * @default './logs'
     */
    LOGS_DIRECTORY: z.string().default('./logs'),
    APP_LOG_FILE_NAME: z.string().default('scraper.log'),
    LOG_TO_CONSOLE: booleanFlag('true'),
    LOG_TO_FILE: booleanFlag('true'),

    // --- Inputs and Outputs ---
    /**
     * The JSON data file read by the display layer.
     * @default './data/special_issues.json'
     */
    DATA_FILE_PATH: z.string().min(1).default('./data/special_issues.json'),
    /**
     * Ordered list of journals to track (`[{ name, url, site_type }]`).
     * @default './config/journals.json'
     */
    JOURNALS_CONFIG_PATH: z.string().min(1).default('./config/journals.json'),

    // --- Page Fetching ---
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    FETCH_RETRIES: z.coerce.number().int().min(1).default(3),
    FETCH_RETRY_MIN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(2000),
    FETCH_RETRY_FACTOR: z.coerce.number().positive().default(2),
    FETCH_USER_AGENT: z.string().default(
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),

    // --- Pipeline ---
    /**
     * Number of journals fetched/parsed at the same time. Merging is always serialized.
     * @default 1
     */
    JOURNAL_CONCURRENCY: z.coerce.number().int().min(1).default(1),
    /**
     * Pause before starting each journal after the first one.
     * @default 2000
     */
    JOURNAL_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
    DETAIL_PAGES_ENABLED: booleanFlag('false'),
    DETAIL_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(1500),
    GENERIC_MAX_SECTIONS: z.coerce.number().int().positive().default(10),
    /**
     * What to do with special issues whose deadline has passed.
     * @default 'retain'
     */
    EXPIRED_ISSUE_POLICY: z.enum(['retain', 'drop']).default('retain'),

    // --- Translation ---
    TRANSLATION_ENABLED: booleanFlag('true'),
    TRANSLATION_TARGET_LANGUAGE: z.string().min(2).default('zh-CN'),
    GEMINI_API_KEY: z.string().optional(),
    GEMINI_TRANSLATION_MODEL: z.string().default('gemini-2.0-flash'),
    TRANSLATION_RATE_LIMIT_POINTS: z.coerce.number().int().positive().default(10),
    TRANSLATION_RATE_LIMIT_DURATION_S: z.coerce.number().int().positive().default(60),
    TRANSLATION_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),

    // --- Cron Job Configuration ---
    /**
     * Cron schedule used by the `schedule` command.
     * @default '0 6 * * *' (every day at 06:00)
     */
    SCRAPE_CRON_SCHEDULE: z.string().default('0 6 * * *'),
    CRON_TIMEZONE: z.string().default('Asia/Shanghai'),
});

/**
 * One entry of the journal list file. `site_type` is not restricted here:
 * an unknown type is reported per journal by the parser registry.
 */
export const journalEntrySchema = z.object({
    name: z.string().trim().min(1),
    url: z.string().url(),
    site_type: z.string().trim().min(1),
});

export const journalListSchema = z.array(journalEntrySchema)
    .min(1, 'At least one journal must be configured.')
    .superRefine((entries, ctx) => {
        const seen = new Set<string>();
        entries.forEach((entry, index) => {
            if (seen.has(entry.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [index, 'name'],
                    message: `Duplicate journal name "${entry.name}".`,
                });
            }
            seen.add(entry.name);
        });
    });

export type JournalEntry = z.infer<typeof journalEntrySchema>;
