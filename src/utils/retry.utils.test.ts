import { retryAsync } from './retry.utils';
import { createTestLogger } from '../testing/testHelpers';

describe('retryAsync', () => {
    const logger = createTestLogger();
    const options = { retries: 3, minTimeout: 0, factor: 2 };

    it('returns the first successful result', async () => {
        const fn = jest.fn()
            .mockRejectedValueOnce(new Error('flaky'))
            .mockResolvedValueOnce('ok');

        await expect(retryAsync(fn, options, logger)).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(2);
        expect(fn).toHaveBeenNthCalledWith(2, 2);
    });

    it('rethrows the last error once the attempts are used up', async () => {
        const fn = jest.fn().mockRejectedValue(new Error('down'));

        await expect(retryAsync(fn, options, logger)).rejects.toThrow('down');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('stops at once when shouldRetry rejects the error', async () => {
        const fn = jest.fn().mockRejectedValue(new Error('permanent'));

        await expect(retryAsync(fn, { ...options, shouldRetry: () => false }, logger)).rejects.toThrow('permanent');
        expect(fn).toHaveBeenCalledTimes(1);
    });
});
