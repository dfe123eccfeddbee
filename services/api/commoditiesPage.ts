/**
 * Commodities page client
 * Fetches the public quote table as raw HTML for the table parser.
 */

import axios, { isAxiosError } from 'axios';
import type { AxiosInstance } from 'axios';

import { SOURCE } from '../../config/analysisConfig';
import { AnalysisError, errorMessage } from '../utils/errors';
import { fetchWithRetry } from '../utils/retry';
import type { RetryOptions } from '../utils/retry';

export interface FetchPageOptions {
  client?: AxiosInstance;
  retry?: RetryOptions;
  timeoutMs?: number;
}

export const fetchCommoditiesPage = async (
  url: string = SOURCE.URL,
  options: FetchPageOptions = {}
): Promise<string> => {
  const client = options.client ?? axios;

  try {
    const html = await fetchWithRetry(async () => {
      console.log(`[Fetch] GET ${url}`);
      const res = await client.get<string>(url, {
        headers: { 'User-Agent': SOURCE.USER_AGENT, Accept: 'text/html' },
        timeout: options.timeoutMs ?? SOURCE.TIMEOUT_MS,
        responseType: 'text',
      });
      if (typeof res.data !== 'string' || res.data.trim() === '') {
        throw new AnalysisError('FETCH_FAILURE', `Empty response from ${url}`);
      }
      return res.data;
    }, options.retry);

    console.log(`[Fetch] Received ${html.length} bytes`);
    return html;
  } catch (error) {
    if (error instanceof AnalysisError) throw error;
    const status = isAxiosError(error) && error.response ? ` (HTTP ${error.response.status})` : '';
    throw new AnalysisError('FETCH_FAILURE', `Failed to fetch ${url}${status}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
};
