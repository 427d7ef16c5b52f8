import ky from 'ky';
import { logger } from './logger.js';

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpGetOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

/** A GET that resolves for every status and rejects only on transport failure. */
export type HttpTransport = (url: string, options?: HttpGetOptions) => Promise<HttpResponse>;

export const httpGet: HttpTransport = async (url, options) => {
  try {
    const response = await ky.get(url, {
      headers: options?.headers,
      timeout: options?.timeout ?? 30000,
      retry: { limit: 0 },
      throwHttpErrors: false,
    });

    if (response.status !== 200) {
      await response.body?.cancel();
      return { status: response.status, body: '' };
    }

    return { status: response.status, body: await response.text() };
  } catch (error: unknown) {
    const errMsg = error instanceof Error ? error.message : String(error);
    logger.debug({ url, error: errMsg }, 'HTTP request failed');
    throw error;
  }
};
