// src/jobs/scrapeSpecialIssues.job.ts
import cron, { ScheduledTask } from 'node-cron';
import { container } from 'tsyringe';
import { Logger } from 'pino';
import { Mutex } from 'async-mutex';
import { LoggingService } from '../services/logging.service';
import { PipelineOrchestratorService } from '../services/pipelineOrchestrator.service';
import { ConfigService } from '../config/config.service';
import { ConfigurationError } from '../types/errors';
import { getErrorMessageAndStack } from '../utils/errorUtils';

const runMutex = new Mutex();

/**
 * Runs the pipeline once unless a previous trigger is still running.
 * Returns false when the trigger was skipped.
 */
export const runScrapeJobOnce = async (): Promise<boolean> => {
    const loggingService = container.resolve(LoggingService);
    const jobLogger: Logger = loggingService.getLogger({ job: 'ScrapeSpecialIssuesRun', runId: Date.now() });

    if (runMutex.isLocked()) {
        jobLogger.warn({ event: 'scrape_job_skipped' }, 'Previous run still in progress; skipping this trigger.');
        return false;
    }

    await runMutex.runExclusive(async () => {
        const jobStartTime = Date.now();
        jobLogger.info({ event: 'scrape_job_start' }, 'Starting scheduled scrape...');
        try {
            const orchestrator = container.resolve(PipelineOrchestratorService);
            const report = await orchestrator.run();
            jobLogger.info({
                event: 'scrape_job_success',
                durationMs: Date.now() - jobStartTime,
                failedJournals: report.failedJournals,
            }, 'Scheduled scrape completed.');
        } catch (error: unknown) {
            const { message, stack } = getErrorMessageAndStack(error);
            jobLogger.error({ event: 'scrape_job_failed', durationMs: Date.now() - jobStartTime, err: { message, stack } }, 'Scheduled scrape failed.');
        }
    });
    return true;
};

/**
 * Schedules the pipeline on `SCRAPE_CRON_SCHEDULE` in `CRON_TIMEZONE`.
 * @throws ConfigurationError for an invalid cron expression.
 */
export const scheduleScrapeJob = (): ScheduledTask => {
    const loggingService = container.resolve(LoggingService);
    const parentLogger = loggingService.getLogger({ job: 'ScrapeSpecialIssuesScheduler' });
    const configService = container.resolve(ConfigService);
    const cronSchedule = configService.scrapeCronSchedule;
    const timezone = configService.cronTimezone;

    if (!cron.validate(cronSchedule)) {
        throw new ConfigurationError(`Invalid SCRAPE_CRON_SCHEDULE "${cronSchedule}".`, { cronSchedule });
    }

    parentLogger.info({ event: 'scrape_job_scheduling', schedule: cronSchedule, timezone }, 'Scheduling special-issue scrape job...');
    const task = cron.schedule(cronSchedule, () => {
        runScrapeJobOnce().catch((error: unknown) => {
            const { message, stack } = getErrorMessageAndStack(error);
            parentLogger.error({ event: 'scrape_job_trigger_failed', err: { message, stack } }, 'Scrape trigger failed.');
        });
    }, {
        scheduled: true,
        timezone,
    });
    parentLogger.info({ event: 'scrape_job_scheduled' }, 'Special-issue scrape job scheduled.');
    return task;
};
