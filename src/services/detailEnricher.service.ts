// src/services/detailEnricher.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { IPageFetcher } from './pageFetcher.service';
import { ParserRegistry } from '../parsers/parserRegistry';
import { Journal, RawIssueFragment } from '../types/specialIssue.types';
import { normalizeDeadline } from '../utils/deadline.utils';
import { resolveUrl } from '../utils/text.utils';
import { sleep } from '../utils/retry.utils';
import { getErrorMessageAndStack } from '../utils/errorUtils';

const isMissing = (value: string | undefined): boolean => value === undefined || value.trim().length === 0;

/**
 * Fills the fields a listing page left out by reading each issue's own page.
 * Fields already present are never overwritten; a failed detail page leaves
 * the fragment as it was.
 */
@singleton()
export class DetailEnricherService {
    private readonly serviceLogger: Logger;
    private readonly detailPagesEnabled: boolean;
    private readonly detailPageDelayMs: number;

    constructor(
        @inject(ConfigService) configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
        @inject('IPageFetcher') private readonly pageFetcher: IPageFetcher,
        @inject(ParserRegistry) private readonly parserRegistry: ParserRegistry,
    ) {
        this.serviceLogger = loggingService.getLogger({ service: 'DetailEnricherService' });
        this.detailPagesEnabled = configService.scraperConfig.detailPagesEnabled;
        this.detailPageDelayMs = configService.scraperConfig.detailPageDelayMs;
    }

    public get enabled(): boolean {
        return this.detailPagesEnabled;
    }

    public needsDetails(fragment: RawIssueFragment): boolean {
        return !isMissing(fragment.detailUrl)
            && (normalizeDeadline(fragment.deadline) === '' || isMissing(fragment.guestEditors) || isMissing(fragment.description));
    }

    public async enrich(journal: Journal, fragments: RawIssueFragment[], parentLogger: Logger = this.serviceLogger): Promise<RawIssueFragment[]> {
        const logger = parentLogger.child({ function: 'enrich' });
        const detailParser = this.parserRegistry.getDetail(journal.siteType);
        if (!this.detailPagesEnabled || !detailParser) {
            logger.debug({ event: 'detail_enrichment_skipped', enabled: this.detailPagesEnabled, hasDetailParser: Boolean(detailParser) });
            return fragments;
        }

        const enriched: RawIssueFragment[] = [];
        let fetchedPages = 0;
        let failedPages = 0;

        for (const fragment of fragments) {
            const pageUrl = this.needsDetails(fragment) ? resolveUrl(fragment.detailUrl, journal.url) : undefined;
            if (!pageUrl) {
                enriched.push(fragment);
                continue;
            }

            if (fetchedPages + failedPages > 0 && this.detailPageDelayMs > 0) {
                await sleep(this.detailPageDelayMs);
            }

            try {
                const html = await this.pageFetcher.fetchPage(pageUrl, logger);
                const details = detailParser.parse(html);
                enriched.push({
                    ...fragment,
                    deadline: normalizeDeadline(fragment.deadline) === '' ? details.deadline ?? fragment.deadline : fragment.deadline,
                    guestEditors: isMissing(fragment.guestEditors) ? details.guestEditors ?? fragment.guestEditors : fragment.guestEditors,
                    description: isMissing(fragment.description) ? details.description ?? fragment.description : fragment.description,
                });
                fetchedPages++;
            } catch (error: unknown) {
                failedPages++;
                const { message } = getErrorMessageAndStack(error);
                logger.warn({ event: 'detail_page_failed', pageUrl, err: { message } }, 'Detail page could not be read; keeping listing data.');
                enriched.push(fragment);
            }
        }

        logger.info({ event: 'detail_enrichment_finish', fetchedPages, failedPages }, 'Detail pages processed.');
        return enriched;
    }
}
