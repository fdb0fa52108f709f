import axios, { AxiosInstance, isAxiosError } from 'axios';

export const createHttpClient = (
  baseURL: string,
  timeoutMs: number,
  headers: Record<string, string> = {},
): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'market-price-aggregator/1.0', Accept: 'application/json', ...headers },
  });

export const httpStatusOf = (error: unknown): number | undefined =>
  isAxiosError(error) ? error.response?.status : undefined;

/** Network failures and 5xx/429 are worth another attempt; other 4xx are not. */
export const isRetryableHttpError = (error: unknown): boolean => {
  if (!isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === undefined || status === 429 || status >= 500;
};
