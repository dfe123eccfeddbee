import axios, { AxiosError } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, it, expect, vi } from 'vitest';
import { fetchCommoditiesPage } from '../../services/api/commoditiesPage';
import { AnalysisError } from '../../services/utils/errors';
import { fetchWithRetry, isRetryableError } from '../../services/utils/retry';

const PAGE_URL = 'https://quotes.example.com/commodities';
const NO_WAIT = { delayMs: 0 };

const respond = (config: InternalAxiosRequestConfig, status: number, data: string): AxiosResponse<string> => ({
    data,
    status,
    statusText: String(status),
    headers: {},
    config
});

const httpError = (config: InternalAxiosRequestConfig, status: number) =>
    new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, respond(config, status, ''));

/** axios instance whose adapter plays back the given outcomes in order. */
const fakeClient = (...outcomes: (number | string)[]) => {
    const adapter = vi.fn(async (config: InternalAxiosRequestConfig) => {
        const next = outcomes.shift() ?? 500;
        if (typeof next === 'number') throw httpError(config, next);
        return respond(config, 200, next);
    });
    return { client: axios.create({ adapter }), adapter };
};

describe('Commodities page client', () => {
    it('returns the page HTML', async () => {
        const { client, adapter } = fakeClient('<table></table>');

        await expect(fetchCommoditiesPage(PAGE_URL, { client, retry: NO_WAIT })).resolves.toBe('<table></table>');
        expect(adapter).toHaveBeenCalledTimes(1);
        expect(adapter.mock.calls[0][0].url).toBe(PAGE_URL);
        expect(adapter.mock.calls[0][0].timeout).toBe(10_000);
    });

    it('retries server errors', async () => {
        const { client, adapter } = fakeClient(503, 502, '<table></table>');

        await expect(fetchCommoditiesPage(PAGE_URL, { client, retry: NO_WAIT })).resolves.toBe('<table></table>');
        expect(adapter).toHaveBeenCalledTimes(3);
    });

    it('gives up at once on a client error', async () => {
        const { client, adapter } = fakeClient(404);

        const error = await fetchCommoditiesPage(PAGE_URL, { client, retry: NO_WAIT }).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(AnalysisError);
        expect(error).toMatchObject({
            code: 'FETCH_FAILURE',
            message: `Failed to fetch ${PAGE_URL} (HTTP 404): Request failed with status code 404`
        });
        expect(adapter).toHaveBeenCalledTimes(1);
    });

    it('treats an empty page as a failed fetch', async () => {
        const { client, adapter } = fakeClient('  ', '');

        await expect(fetchCommoditiesPage(PAGE_URL, { client, retry: { delayMs: 0, maxRetries: 1 } })).rejects.toMatchObject({
            code: 'FETCH_FAILURE',
            message: `Empty response from ${PAGE_URL}`
        });
        expect(adapter).toHaveBeenCalledTimes(2);
    });
});

describe('fetchWithRetry', () => {
    it('backs off exponentially between attempts', async () => {
        vi.useFakeTimers();
        try {
            const fn = vi.fn<() => Promise<string>>()
                .mockRejectedValueOnce(new Error('socket hang up'))
                .mockRejectedValueOnce(new Error('socket hang up'))
                .mockResolvedValue('ok');

            const pending = fetchWithRetry(fn, { delayMs: 100 });
            await vi.advanceTimersByTimeAsync(300);

            await expect(pending).resolves.toBe('ok');
            expect(fn).toHaveBeenCalledTimes(3);
            expect(console.warn).toHaveBeenCalledWith('[Retry] Attempt 2 failed, retrying in 200ms...');
        } finally {
            vi.useRealTimers();
        }
    });

    it('only retries fetch failures among analysis errors', () => {
        expect(isRetryableError(new AnalysisError('FETCH_FAILURE', 'down'))).toBe(true);
        expect(isRetryableError(new AnalysisError('CONFIG_INVALID', 'bad'))).toBe(false);
        expect(isRetryableError(new Error('ECONNRESET'))).toBe(true);
    });
});
