import { configureContainer } from '../container';
import { PipelineOrchestratorService } from '../services/pipelineOrchestrator.service';
import { createTestConfig } from '../testing/testHelpers';
import { ConfigurationError } from '../types/errors';
import { RunReport } from '../types/specialIssue.types';
import { runScrapeJobOnce, scheduleScrapeJob } from './scrapeSpecialIssues.job';

const emptyReport: RunReport = { startedAt: '', finishedAt: '', outcomes: [], failedJournals: [], droppedCount: 0 };

describe('scrapeSpecialIssues job', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('skips a trigger while the previous run is still going', async () => {
        configureContainer(createTestConfig());
        let finish: (report: RunReport) => void = () => undefined;
        const run = jest.spyOn(PipelineOrchestratorService.prototype, 'run')
            .mockImplementation(() => new Promise<RunReport>(resolve => { finish = resolve; }));

        const first = runScrapeJobOnce();
        await new Promise(resolve => setImmediate(resolve));
        await expect(runScrapeJobOnce()).resolves.toBe(false);

        finish(emptyReport);
        await expect(first).resolves.toBe(true);
        expect(run).toHaveBeenCalledTimes(1);

        run.mockResolvedValue(emptyReport);
        await expect(runScrapeJobOnce()).resolves.toBe(true);
        expect(run).toHaveBeenCalledTimes(2);
    });

    it('absorbs a failed run', async () => {
        configureContainer(createTestConfig());
        jest.spyOn(PipelineOrchestratorService.prototype, 'run').mockRejectedValue(new Error('disk full'));

        await expect(runScrapeJobOnce()).resolves.toBe(true);
    });

    it('refuses an invalid cron expression', () => {
        configureContainer(createTestConfig({ SCRAPE_CRON_SCHEDULE: 'every morning' }));

        expect(() => scheduleScrapeJob()).toThrow(ConfigurationError);
    });
});
