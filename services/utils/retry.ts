import axios from 'axios';
import { createLogger } from './logger';

const log = createLogger('Retry');

export class ApiError extends Error {
  constructor(
    public code: 'MISSING_KEY' | 'RATE_LIMIT' | 'NETWORK' | 'NOT_FOUND' | 'UNKNOWN',
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
}

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export const isRetryable = (error: unknown): boolean => {
  // Don't retry on 4xx client errors unless it's a rate limit
  if (error instanceof ApiError) {
    if (error.code === 'MISSING_KEY' || error.code === 'NOT_FOUND') return false;
    return true;
  }
  if (axios.isAxiosError(error) && error.response) {
    const status = error.response.status;
    if (status === 429) return true;
    return status < 400 || status >= 500;
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
    shouldRetry = isRetryable,
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

      const wait = delayMs * Math.pow(backoffMultiplier, attempt);
      log.warn(`Attempt ${attempt + 1} failed, retrying in ${wait}ms...`);
      await delay(wait);
    }
  }

  throw lastError;
};
