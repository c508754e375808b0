import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { Readable } from 'stream';
import { logger } from '@genkit-ai/core/logging';
import { TransportError } from './errors';

export interface TransportResponse<T> {
  status: number;
  headers: Record<string, string>;
  data: T;
}

/**
 * HTTP exchange used by the client. Implementations return every response,
 * whatever its status, and throw only when no response could be obtained.
 */
export interface Transport {
  /** GET a JSON document. */
  get(url: string): Promise<TransportResponse<unknown>>;
  /** GET a raw body, left unread. */
  stream(url: string): Promise<TransportResponse<Readable>>;
  /** POST a multipart form and read the JSON answer. */
  post(url: string, form: FormData): Promise<TransportResponse<unknown>>;
}

export interface AxiosTransportOptions {
  timeoutMs?: number;
}

export class AxiosTransport implements Transport {
  private readonly http: AxiosInstance;

  constructor(options: AxiosTransportOptions = {}) {
    this.http = axios.create({
      timeout: options.timeoutMs,
      validateStatus: null // Don't throw on any status code
    });
  }

  get(url: string): Promise<TransportResponse<unknown>> {
    return this.send('GET', url, () => this.http.get<unknown>(url));
  }

  stream(url: string): Promise<TransportResponse<Readable>> {
    return this.send('GET', url, () => this.http.get<Readable>(url, { responseType: 'stream' }));
  }

  post(url: string, form: FormData): Promise<TransportResponse<unknown>> {
    return this.send('POST', url, () => this.http.post<unknown>(url, form));
  }

  private async send<T>(
    method: string,
    url: string,
    request: () => Promise<AxiosResponse<T>>
  ): Promise<TransportResponse<T>> {
    logger.debug(`${method} ${url}`);
    try {
      const response = await request();
      logger.debug(`Response status: ${response.status}`);
      return {
        status: response.status,
        headers: flattenHeaders(response.headers),
        data: response.data
      };
    } catch (error) {
      const reason = axios.isAxiosError(error) && error.code
        ? `${error.code}: ${error.message}`
        : error instanceof Error ? error.message : String(error);
      logger.error(`${method} ${url} failed: ${reason}`);
      throw new TransportError(`${method} ${url} failed: ${reason}`, url, error);
    }
  }
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === null || value === undefined) {
      continue;
    }
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flat;
}
