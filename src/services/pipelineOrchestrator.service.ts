// src/services/pipelineOrchestrator.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import PQueue from 'p-queue';
import { Mutex } from 'async-mutex';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { IPageFetcher } from './pageFetcher.service';
import { DetailEnricherService } from './detailEnricher.service';
import { RecordNormalizerService } from './recordNormalizer.service';
import { TranslationService } from './translation/translation.service';
import { SnapshotMergeService } from './snapshotMerge.service';
import { DataStoreService, formatLastUpdated } from './dataStore.service';
import { ParserRegistry } from '../parsers/parserRegistry';
import {
    DataStore, FailableStage, Journal, JournalOutcome, JournalSnapshot, JournalState, RunReport,
} from '../types/specialIssue.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Runs every configured journal through fetch → parse → (details) → normalize
 * → translate → merge, then writes the store once.
 *
 * A journal that fails at any stage keeps its previous snapshot untouched;
 * only configuration and persistence errors abort the run.
 */
@singleton()
export class PipelineOrchestratorService {
    private readonly serviceLogger: Logger;
    private readonly mergeMutex = new Mutex();

    constructor(
        @inject(ConfigService) private readonly configService: ConfigService,
        @inject(LoggingService) loggingService: LoggingService,
        @inject('IPageFetcher') private readonly pageFetcher: IPageFetcher,
        @inject(ParserRegistry) private readonly parserRegistry: ParserRegistry,
        @inject(DetailEnricherService) private readonly detailEnricher: DetailEnricherService,
        @inject(RecordNormalizerService) private readonly normalizer: RecordNormalizerService,
        @inject(TranslationService) private readonly translator: TranslationService,
        @inject(SnapshotMergeService) private readonly merger: SnapshotMergeService,
        @inject(DataStoreService) private readonly dataStore: DataStoreService,
    ) {
        this.serviceLogger = loggingService.getLogger({ service: 'PipelineOrchestratorService' });
    }

    /**
     * @param journals defaults to the configured journal list.
     * @throws ConfigurationError | PersistenceError
     */
    public async run(journals: Journal[] = this.configService.loadJournals()): Promise<RunReport> {
        const startedAt = new Date();
        const logger = this.serviceLogger.child({ runId: startedAt.getTime() });
        const { journalConcurrency, journalDelayMs } = this.configService.scraperConfig;

        logger.info({ event: 'run_start', journalCount: journals.length, journalConcurrency }, 'Pipeline run started.');

        const previousStore = await this.dataStore.load();
        const previousByName = new Map(previousStore.journals.map(snapshot => [snapshot.name, snapshot]));
        this.warnAboutRemovedJournals(previousStore, journals, logger);

        const snapshots = new Map<string, JournalSnapshot>();
        const queue = new PQueue({ concurrency: journalConcurrency, intervalCap: 1, interval: journalDelayMs });

        const outcomes = await Promise.all(journals.map(journal =>
            queue.add(() => this.processJournal(journal, previousByName.get(journal.name), snapshots, startedAt, logger))
        ));
        await queue.onIdle();

        const store: DataStore = {
            lastUpdated: formatLastUpdated(new Date()),
            journals: journals.map(journal => snapshots.get(journal.name) ?? { name: journal.name, url: journal.url, specialIssues: [] }),
        };
        await this.dataStore.save(store);

        const report: RunReport = {
            startedAt: startedAt.toISOString(),
            finishedAt: new Date().toISOString(),
            outcomes,
            failedJournals: outcomes.filter(outcome => outcome.state.status === 'FAILED').map(outcome => outcome.journal),
            droppedCount: outcomes.reduce((sum, outcome) => sum + outcome.droppedCount, 0),
        };
        this.logSummary(report, logger);
        return report;
    }

    private async processJournal(
        journal: Journal,
        previous: JournalSnapshot | undefined,
        snapshots: Map<string, JournalSnapshot>,
        now: Date,
        parentLogger: Logger
    ): Promise<JournalOutcome> {
        const logger = parentLogger.child({ journal: journal.name, siteType: journal.siteType });
        const startTime = Date.now();
        const outcome: JournalOutcome = {
            journal: journal.name,
            siteType: journal.siteType,
            state: { status: 'PENDING' },
            fragmentCount: 0,
            droppedCount: 0,
            recordCount: 0,
            translatedCount: 0,
            durationMs: 0,
        };
        let stage: FailableStage = 'PENDING';
        logger.info({ event: 'journal_start', url: journal.url }, `Processing "${journal.name}".`);

        try {
            const html = await this.pageFetcher.fetchPage(journal.url, logger);
            stage = 'FETCHED';

            let fragments = this.parserRegistry.parse(journal.siteType, html, journal.url);
            if (this.detailEnricher.enabled) {
                fragments = await this.detailEnricher.enrich(journal, fragments, logger);
            }
            outcome.fragmentCount = fragments.length;
            stage = 'PARSED';

            const { records, dropped } = this.normalizer.normalizeAll(fragments, journal.url, logger);
            outcome.droppedCount = dropped.length;
            stage = 'NORMALIZED';

            const previousRecords = previous?.specialIssues ?? [];
            const translation = await this.translator.translateRecords(records, previousRecords, logger);
            outcome.translatedCount = translation.translatedCount + translation.reusedCount;
            stage = 'TRANSLATED';

            const merge = await this.mergeMutex.runExclusive(() => {
                const result = this.merger.merge(journal.name, previousRecords, translation.records, now);
                snapshots.set(journal.name, { name: journal.name, url: journal.url, specialIssues: result.records });
                return result;
            });
            outcome.merge = merge.stats;
            outcome.recordCount = merge.records.length;
            outcome.state = { status: 'MERGED' };
            logger.info({ event: 'journal_merged', ...merge.stats, recordCount: merge.records.length }, `"${journal.name}" merged.`);
        } catch (error: unknown) {
            outcome.state = this.failedState(stage, error);
            if (previous) {
                snapshots.set(journal.name, previous);
            }
            outcome.recordCount = previous?.specialIssues.length ?? 0;
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ event: 'journal_failed', stage, err: { message, stack } },
                `"${journal.name}" failed after ${stage}; keeping its previous snapshot.`);
        }

        outcome.durationMs = Date.now() - startTime;
        return outcome;
    }

    private failedState(stage: FailableStage, error: unknown): JournalState {
        const { message } = getErrorMessageAndStack(error);
        return {
            status: 'FAILED',
            stage,
            reason: message,
            errorName: error instanceof Error ? error.name : 'UnknownError',
        };
    }

    private warnAboutRemovedJournals(store: DataStore, journals: Journal[], logger: Logger): void {
        const configured = new Set(journals.map(journal => journal.name));
        const removed = store.journals.filter(snapshot => !configured.has(snapshot.name)).map(snapshot => snapshot.name);
        if (removed.length > 0) {
            logger.warn({ event: 'journals_removed', removed }, `Dropping ${removed.length} journal(s) no longer configured.`);
        }
    }

    private logSummary(report: RunReport, logger: Logger): void {
        const merged = report.outcomes.length - report.failedJournals.length;
        logger.info({
            event: 'run_finish',
            journals: report.outcomes.length,
            merged,
            failed: report.failedJournals.length,
            droppedCount: report.droppedCount,
            durationMs: Date.parse(report.finishedAt) - Date.parse(report.startedAt),
        }, `Pipeline run finished: ${merged} merged, ${report.failedJournals.length} failed.`);

        for (const outcome of report.outcomes) {
            if (outcome.state.status === 'FAILED') {
                logger.warn({
                    event: 'run_failed_journal',
                    journal: outcome.journal,
                    stage: outcome.state.stage,
                    errorName: outcome.state.errorName,
                    reason: outcome.state.reason,
                }, `Failed journal: "${outcome.journal}" (${outcome.state.errorName} after ${outcome.state.stage}).`);
            }
        }
    }
}
