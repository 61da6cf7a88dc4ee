// src/services/translation/translation.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { Mutex } from 'async-mutex';
import { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { LoggingService } from '../logging.service';
import { ITranslationProvider } from './translationProvider';
import { SpecialIssueRecord } from '../../types/specialIssue.types';
import { sleep } from '../../utils/retry.utils';
import { getErrorMessageAndStack } from '../../utils/errorUtils';
import { collapseWhitespace } from '../../utils/text.utils';

export interface TranslationResult {
    records: SpecialIssueRecord[];
    translatedCount: number;
    reusedCount: number;
    failedCount: number;
}

const LIMITER_KEY = 'translation';

// Translations depend only on the source text.
const contentKey = (record: Pick<SpecialIssueRecord, 'title' | 'description'>): string =>
    `${collapseWhitespace(record.title)}\u0000${collapseWhitespace(record.description)}`;

const hasTranslation = (record: SpecialIssueRecord): boolean =>
    record.translatedTitle.length > 0 && (record.description.length === 0 || record.translatedDescription.length > 0);

/**
 * Adds translated titles and descriptions to fresh records.
 *
 * Calls go through a token bucket and are spaced by a minimum delay; when the
 * bucket is empty the service waits for it to refill. A record whose title and
 * description already have a translation in the previous snapshot reuses it.
 * Failures leave the translated fields empty.
 */
@singleton()
export class TranslationService {
    private readonly serviceLogger: Logger;
    private readonly targetLanguage: string;
    private readonly minDelayMs: number;
    private readonly limiter: RateLimiterMemory;
    private readonly callMutex = new Mutex();
    private lastCallAt = 0;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
        @inject('ITranslationProvider') private readonly provider: ITranslationProvider,
    ) {
        this.serviceLogger = loggingService.getLogger({ service: 'TranslationService' });
        const { rateLimit, targetLanguage } = configService.translationConfig;
        this.targetLanguage = targetLanguage;
        this.minDelayMs = rateLimit.minDelayMs;
        this.limiter = new RateLimiterMemory({
            points: rateLimit.points,
            duration: rateLimit.durationSeconds,
            keyPrefix: 'translation_provider',
        });
    }

    public get enabled(): boolean {
        return this.provider.enabled;
    }

    public async translateRecords(
        records: SpecialIssueRecord[],
        previousRecords: SpecialIssueRecord[],
        parentLogger: Logger = this.serviceLogger
    ): Promise<TranslationResult> {
        const logger = parentLogger.child({ function: 'translateRecords', provider: this.provider.name });
        const known = new Map<string, SpecialIssueRecord>();
        for (const previous of previousRecords) {
            if (hasTranslation(previous) && !known.has(contentKey(previous))) {
                known.set(contentKey(previous), previous);
            }
        }

        const result: TranslationResult = { records: [], translatedCount: 0, reusedCount: 0, failedCount: 0 };

        for (const record of records) {
            const reused = known.get(contentKey(record));
            if (reused) {
                result.records.push({
                    ...record,
                    translatedTitle: reused.translatedTitle,
                    translatedDescription: reused.translatedDescription,
                });
                result.reusedCount++;
                continue;
            }

            if (!this.provider.enabled) {
                result.records.push(record);
                continue;
            }

            const translatedTitle = await this.translateField(record.title, 'title', logger);
            const translatedDescription = record.description
                ? await this.translateField(record.description, 'description', logger)
                : '';
            const failed = !translatedTitle || (record.description.length > 0 && !translatedDescription);

            result.records.push({ ...record, translatedTitle, translatedDescription });
            if (failed) {
                result.failedCount++;
            } else {
                result.translatedCount++;
                known.set(contentKey(record), { ...record, translatedTitle, translatedDescription });
            }
        }

        logger.info({
            event: 'translation_finish',
            total: records.length,
            translated: result.translatedCount,
            reused: result.reusedCount,
            failed: result.failedCount,
            enabled: this.provider.enabled,
        }, 'Translation stage finished.');
        return result;
    }

    /** Returns '' when the call fails. */
    private async translateField(text: string, field: 'title' | 'description', logger: Logger): Promise<string> {
        try {
            return await this.callMutex.runExclusive(async () => {
                await this.acquireSlot(logger);
                return this.provider.translate(text, this.targetLanguage, logger);
            });
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            logger.warn({ event: 'translation_field_failed', field, err: { message } }, `Could not translate ${field}; leaving it empty.`);
            return '';
        }
    }

    private async acquireSlot(logger: Logger): Promise<void> {
        for (;;) {
            try {
                await this.limiter.consume(LIMITER_KEY);
                break;
            } catch (rejection: unknown) {
                if (!(rejection instanceof RateLimiterRes)) throw rejection;
                logger.info({ event: 'translation_rate_limited', waitMs: rejection.msBeforeNext }, 'Translation rate limit reached; waiting.');
                await sleep(rejection.msBeforeNext);
            }
        }

        const wait = this.lastCallAt + this.minDelayMs - Date.now();
        if (wait > 0) {
            await sleep(wait);
        }
        this.lastCallAt = Date.now();
    }
}
