// src/services/recordNormalizer.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { NormalizationError } from '../types/errors';
import { RawIssueFragment, SpecialIssueRecord } from '../types/specialIssue.types';
import { normalizeDeadline } from '../utils/deadline.utils';
import { collapseWhitespace, joinParagraphs, resolveUrl, uniqueValues } from '../utils/text.utils';

export interface DroppedFragment {
    fragment: RawIssueFragment;
    reason: string;
}

export interface NormalizationResult {
    records: SpecialIssueRecord[];
    dropped: DroppedFragment[];
}

const normalizeEditors = (raw: string | undefined): string =>
    uniqueValues(
        (raw ?? '')
            .split(/\s*(?:;|<br\s*\/?>|\n)\s*/i)
            .map(collapseWhitespace)
            .filter(name => name.length > 0)
    ).join('; ');

const normalizeDescription = (raw: string | undefined): string =>
    joinParagraphs((raw ?? '').split(/\n\s*\n/));

@singleton()
export class RecordNormalizerService {
    private readonly serviceLogger: Logger;

    constructor(@inject(LoggingService) loggingService: LoggingService) {
        this.serviceLogger = loggingService.getLogger({ service: 'RecordNormalizerService' });
    }

    /**
     * Turns a raw fragment into a record. Translated fields are left empty.
     * @throws NormalizationError when the title is missing, or both the deadline and the detail URL are.
     */
    public normalize(fragment: RawIssueFragment, baseUrl: string): SpecialIssueRecord {
        const title = collapseWhitespace(fragment.title);
        if (!title) {
            throw new NormalizationError('Fragment has no title.', { fragment });
        }

        const deadline = normalizeDeadline(fragment.deadline);
        const detailUrl = resolveUrl(fragment.detailUrl, baseUrl) ?? '';
        if (!deadline && !detailUrl) {
            throw new NormalizationError(`"${title}" has neither a deadline nor a detail URL.`, { fragment });
        }

        return {
            title,
            deadline,
            guestEditors: normalizeEditors(fragment.guestEditors),
            description: normalizeDescription(fragment.description),
            detailUrl,
            translatedTitle: '',
            translatedDescription: '',
        };
    }

    /**
     * Normalizes every fragment, collecting the unusable ones instead of throwing.
     */
    public normalizeAll(fragments: RawIssueFragment[], baseUrl: string, parentLogger: Logger = this.serviceLogger): NormalizationResult {
        const logger = parentLogger.child({ function: 'normalizeAll' });
        const records: SpecialIssueRecord[] = [];
        const dropped: DroppedFragment[] = [];

        for (const fragment of fragments) {
            try {
                records.push(this.normalize(fragment, baseUrl));
            } catch (error: unknown) {
                if (!(error instanceof NormalizationError)) throw error;
                dropped.push({ fragment, reason: error.message });
                logger.debug({ event: 'fragment_dropped', reason: error.message, title: fragment.title });
            }
        }

        if (dropped.length > 0) {
            logger.warn({ event: 'fragments_dropped', droppedCount: dropped.length, keptCount: records.length }, `Dropped ${dropped.length} unusable fragment(s).`);
        }
        return { records, dropped };
    }
}
