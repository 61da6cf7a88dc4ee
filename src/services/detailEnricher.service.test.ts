import { Logger } from 'pino';
import { DetailEnricherService } from './detailEnricher.service';
import { IPageFetcher } from './pageFetcher.service';
import { ParserRegistry } from '../parsers/parserRegistry';
import { createTestConfig, createTestLogging, loadFixture } from '../testing/testHelpers';
import { FetchError } from '../types/errors';
import { Journal } from '../types/specialIssue.types';

class FakeFetcher implements IPageFetcher {
    public readonly requested: string[] = [];

    constructor(private readonly pages: Record<string, string>) {}

    public async fetchPage(url: string, _parentLogger: Logger): Promise<string> {
        this.requested.push(url);
        const page = this.pages[url];
        if (page === undefined) {
            throw new FetchError(`HTTP 404 for ${url}`, url, 404);
        }
        return page;
    }
}

const journal: Journal = { name: 'Cities', url: 'https://www.sciencedirect.com/journal/cities/about/call-for-papers', siteType: 'elsevier' };

const createEnricher = (fetcher: IPageFetcher, env: Record<string, string> = { DETAIL_PAGES_ENABLED: 'true' }): DetailEnricherService => {
    const config = createTestConfig(env);
    return new DetailEnricherService(config, createTestLogging(config), fetcher, new ParserRegistry(config));
};

describe('DetailEnricherService', () => {
    const detailUrl = 'https://www.sciencedirect.com/journal/cities/special-issue/heat';

    it('fills only the fields the listing left out', async () => {
        const fetcher = new FakeFetcher({ [detailUrl]: loadFixture('elsevier-detail.html') });

        const [enriched] = await createEnricher(fetcher).enrich(journal, [
            { title: 'Urban heat islands', description: 'Listing summary.', detailUrl: '/journal/cities/special-issue/heat' },
        ]);

        expect(fetcher.requested).toEqual([detailUrl]);
        expect(enriched).toEqual({
            title: 'Urban heat islands',
            deadline: '15 January 2027',
            guestEditors: 'Jane Doe; John Smith',
            description: 'Listing summary.',
            detailUrl: '/journal/cities/special-issue/heat',
        });
    });

    it('skips complete fragments and fragments without a link', async () => {
        const fetcher = new FakeFetcher({});
        const complete = { title: 'Complete', deadline: '2026-03-01', guestEditors: 'Jane Doe', description: 'Text.', detailUrl: detailUrl };
        const unlinked = { title: 'No link', deadline: '2026-03-01' };

        const result = await createEnricher(fetcher).enrich(journal, [complete, unlinked]);

        expect(result).toEqual([complete, unlinked]);
        expect(fetcher.requested).toEqual([]);
    });

    it('keeps the listing data when a detail page fails', async () => {
        const fragment = { title: 'Broken', detailUrl: 'https://www.sciencedirect.com/si/broken' };

        const result = await createEnricher(new FakeFetcher({})).enrich(journal, [fragment]);

        expect(result).toEqual([fragment]);
    });

    it('does nothing when detail pages are turned off', async () => {
        const fetcher = new FakeFetcher({});
        const enricher = createEnricher(fetcher, {});

        expect(enricher.enabled).toBe(false);
        await enricher.enrich(journal, [{ title: 'Heat', detailUrl }]);
        expect(fetcher.requested).toEqual([]);
    });

    it('does nothing for site types without a detail parser', async () => {
        const fetcher = new FakeFetcher({});

        await createEnricher(fetcher).enrich({ ...journal, siteType: 'mdpi' }, [{ title: 'Heat', detailUrl }]);

        expect(fetcher.requested).toEqual([]);
    });
});
