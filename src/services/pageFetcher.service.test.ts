import { AxiosAdapter, AxiosError, AxiosResponse } from 'axios';
import { PageFetcherService } from './pageFetcher.service';
import { createTestConfig, createTestLogging, createTestLogger } from '../testing/testHelpers';
import { FetchError } from '../types/errors';

const respondWith = (responses: Array<{ status: number; data: unknown }>): { adapter: AxiosAdapter; calls: () => number } => {
    let count = 0;
    const adapter: AxiosAdapter = async (config) => {
        const response = responses[Math.min(count, responses.length - 1)];
        count++;
        const result: AxiosResponse = { data: response.data, status: response.status, statusText: String(response.status), headers: {}, config };
        if (response.status >= 400) {
            throw new AxiosError(`Request failed with status code ${response.status}`, 'ERR_BAD_RESPONSE', config, undefined, result);
        }
        return result;
    };
    return { adapter, calls: () => count };
};

describe('PageFetcherService', () => {
    const url = 'https://journals.example.org/cities/call-for-papers';
    let fetcher: PageFetcherService;

    beforeEach(() => {
        const config = createTestConfig({ FETCH_RETRIES: '3' });
        fetcher = new PageFetcherService(config, createTestLogging(config));
    });

    it('returns the page body', async () => {
        const { adapter } = respondWith([{ status: 200, data: '<html>ok</html>' }]);
        fetcher.client.defaults.adapter = adapter;

        await expect(fetcher.fetchPage(url, createTestLogger())).resolves.toBe('<html>ok</html>');
    });

    it('retries server errors and succeeds', async () => {
        const { adapter, calls } = respondWith([
            { status: 503, data: 'busy' },
            { status: 200, data: '<html>second</html>' },
        ]);
        fetcher.client.defaults.adapter = adapter;

        await expect(fetcher.fetchPage(url, createTestLogger())).resolves.toBe('<html>second</html>');
        expect(calls()).toBe(2);
    });

    it('does not retry a 404', async () => {
        const { adapter, calls } = respondWith([{ status: 404, data: 'missing' }]);
        fetcher.client.defaults.adapter = adapter;

        const failure = fetcher.fetchPage(url, createTestLogger());
        await expect(failure).rejects.toBeInstanceOf(FetchError);
        await expect(failure).rejects.toMatchObject({ status: 404, url });
        expect(calls()).toBe(1);
    });

    it('gives up after the configured attempts', async () => {
        const { adapter, calls } = respondWith([{ status: 500, data: 'down' }]);
        fetcher.client.defaults.adapter = adapter;

        await expect(fetcher.fetchPage(url, createTestLogger())).rejects.toThrow(`HTTP 500 for ${url}`);
        expect(calls()).toBe(3);
    });
});

describe('FetchError', () => {
    it('treats permanent client errors as final', () => {
        expect(new FetchError('x', 'u', 404).isRetryable).toBe(false);
        expect(new FetchError('x', 'u', 429).isRetryable).toBe(true);
        expect(new FetchError('x', 'u', 502).isRetryable).toBe(true);
        expect(new FetchError('x', 'u').isRetryable).toBe(true);
    });
});
