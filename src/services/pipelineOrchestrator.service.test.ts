import fs from 'fs';
import os from 'os';
import path from 'path';
import { Logger } from 'pino';
import { PipelineOrchestratorService } from './pipelineOrchestrator.service';
import { IPageFetcher } from './pageFetcher.service';
import { DetailEnricherService } from './detailEnricher.service';
import { RecordNormalizerService } from './recordNormalizer.service';
import { TranslationService } from './translation/translation.service';
import { DisabledTranslationProvider } from './translation/disabledTranslation.provider';
import { SnapshotMergeService } from './snapshotMerge.service';
import { DataStoreService } from './dataStore.service';
import { ParserRegistry } from '../parsers/parserRegistry';
import { createTestConfig, createTestLogging, loadFixture, makeRecord } from '../testing/testHelpers';
import { FetchError } from '../types/errors';
import { DataStore, Journal } from '../types/specialIssue.types';

class FakeFetcher implements IPageFetcher {
    constructor(private readonly pages: Record<string, string>) {}

    public async fetchPage(url: string, _parentLogger: Logger): Promise<string> {
        const page = this.pages[url];
        if (page === undefined) {
            throw new FetchError(`HTTP 503 for ${url}`, url, 503);
        }
        return page;
    }
}

const cities: Journal = { name: 'Cities', url: 'https://www.sciencedirect.com/journal/cities/about/call-for-papers', siteType: 'elsevier' };
const energy: Journal = { name: 'Energy', url: 'https://www.sciencedirect.com/journal/energy/about/call-for-papers', siteType: 'elsevier' };

const citiesRecord = makeRecord({
    title: 'Call for Papers: X',
    deadline: '2026-03-01',
    guestEditors: 'Jane Doe, John Smith',
    description: 'This special issue invites contributions on urban resilience, remote sensing and climate adaptation.',
    detailUrl: 'https://www.sciencedirect.com/si/x',
});

describe('PipelineOrchestratorService', () => {
    let tempDir: string;
    let dataStore: DataStoreService;

    const createOrchestrator = (pages: Record<string, string>): PipelineOrchestratorService => {
        const config = createTestConfig({ DATA_FILE_PATH: path.join(tempDir, 'special_issues.json') });
        const logging = createTestLogging(config);
        const fetcher = new FakeFetcher(pages);
        const registry = new ParserRegistry(config);
        dataStore = new DataStoreService(config, logging);
        return new PipelineOrchestratorService(
            config,
            logging,
            fetcher,
            registry,
            new DetailEnricherService(config, logging, fetcher, registry),
            new RecordNormalizerService(logging),
            new TranslationService(config, logging, new DisabledTranslationProvider()),
            new SnapshotMergeService(config),
            dataStore,
        );
    };

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'special-issues-run-'));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('writes the scraped journal and keeps a failed journal exactly as it was', async () => {
        const orchestrator = createOrchestrator({ [cities.url]: loadFixture('elsevier-listing.html') });
        const previous: DataStore = {
            lastUpdated: '2025-12-01 06:00:00',
            journals: [
                { name: 'Energy', url: energy.url, specialIssues: [makeRecord({ title: 'Grid storage', translatedTitle: '电网储能' })] },
                { name: 'Retired journal', url: 'https://example.org/retired', specialIssues: [makeRecord()] },
            ],
        };
        await dataStore.save(previous);

        const report = await orchestrator.run([cities, energy]);
        const stored = await dataStore.load();

        expect(stored.journals).toEqual([
            { name: 'Cities', url: cities.url, specialIssues: [citiesRecord] },
            previous.journals[0],
        ]);
        expect(stored.lastUpdated).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
        expect(stored.lastUpdated).not.toBe('2025-12-01 06:00:00');

        expect(report.failedJournals).toEqual(['Energy']);
        expect(report.outcomes[0]).toMatchObject({ journal: 'Cities', state: { status: 'MERGED' }, recordCount: 1, merge: { added: 1 } });
        expect(report.outcomes[1].state).toEqual({
            status: 'FAILED',
            stage: 'PENDING',
            reason: `HTTP 503 for ${energy.url}`,
            errorName: 'FetchError',
        });
    });

    it('writes an empty list for a new journal that failed', async () => {
        const report = await createOrchestrator({}).run([energy]);

        expect(report.outcomes[0].recordCount).toBe(0);
        expect((await dataStore.load()).journals).toEqual([{ name: 'Energy', url: energy.url, specialIssues: [] }]);
    });

    it('reports the stage a journal reached before failing', async () => {
        const report = await createOrchestrator({
            [cities.url]: '<html><body><p>Page moved</p></body></html>',
            [energy.url]: loadFixture('elsevier-listing.html'),
        }).run([cities, { ...energy, siteType: 'unknown-publisher' }]);

        expect(report.outcomes.map(outcome => outcome.state)).toEqual([
            {
                status: 'FAILED',
                stage: 'FETCHED',
                reason: 'No special-issue blocks found for site type "elsevier".',
                errorName: 'ParseError',
            },
            {
                status: 'FAILED',
                stage: 'FETCHED',
                reason: 'No parser registered for site type "unknown-publisher". Supported: elsevier, mdpi, springer, generic',
                errorName: 'UnsupportedSiteTypeError',
            },
        ]);
    });

    it('counts fragments dropped during normalization', async () => {
        const page = `
            <div class="special-issue"><h3>Orphan issue without link</h3></div>
            <div class="special-issue"><h3>Linked issue</h3><a href="/si/linked">More</a></div>`;

        const report = await createOrchestrator({ [cities.url]: page }).run([cities]);

        expect(report.droppedCount).toBe(1);
        expect(report.outcomes[0]).toMatchObject({ fragmentCount: 2, droppedCount: 1, recordCount: 1 });
    });

    it('leaves the records unchanged when the same page is scraped again', async () => {
        const orchestrator = createOrchestrator({ [cities.url]: loadFixture('elsevier-listing.html') });

        await orchestrator.run([cities]);
        const first = await dataStore.load();
        const report = await orchestrator.run([cities]);
        const second = await dataStore.load();

        expect(second.journals).toEqual(first.journals);
        expect(report.outcomes[0].merge).toEqual({ added: 0, updated: 0, retained: 0, expired: 0 });
    });
});
