import { isAxiosError } from 'axios';

import { AnalysisError } from './errors';

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
}

export const isRetryableError = (error: unknown): boolean => {
  if (error instanceof AnalysisError) {
    return error.code === 'FETCH_FAILURE';
  }
  // Don't retry on 4xx client errors unless it's a rate limit
  if (isAxiosError(error) && error.response) {
    const { status } = error.response;
    if (status === 429) return true;
    if (status >= 400 && status < 500) return false;
  }
  return true;
};

export const fetchWithRetry = async <T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> => {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    shouldRetry = isRetryableError
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error) || attempt === maxRetries) {
        throw error;
      }

      const delay = delayMs * Math.pow(backoffMultiplier, attempt);
      console.warn(`[Retry] Attempt ${attempt + 1} failed, retrying in ${delay}ms...`);
      await new Promise(r => setTimeout(r, delay));
    }
  }

  throw lastError;
};
