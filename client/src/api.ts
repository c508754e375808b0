import type { Readable } from 'stream';
import type { z } from 'zod';
import { logger } from '@genkit-ai/core/logging';
import { HTTPStatusError, ResponseFormatError } from './errors';
import type { Transport, TransportResponse } from './transport';

export type Clock = () => number;

const EXCERPT_LENGTH = 500;

/**
 * Shared plumbing for the objects of one client: URL resolution against the
 * base URL, status checks and response parsing.
 */
export class ApiContext {
  constructor(
    readonly baseUrl: string,
    readonly transport: Transport,
    readonly clock: Clock,
    readonly pollIntervalMs: number
  ) {}

  /** Resolve a server-relative path (e.g. `api/services` or `/api/jobs/x`) against the base URL. */
  resolve(path: string): string {
    return new URL(path, this.baseUrl).toString();
  }

  /**
   * GET a JSON document and validate it.
   * @param notFound error to raise instead of an HTTPStatusError on 404
   */
  async getJson<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
    notFound?: () => Error
  ): Promise<z.output<S>> {
    const response = await this.transport.get(url);
    if (response.status === 404 && notFound) {
      throw notFound();
    }
    this.ensureOk(response, url);
    return this.parse(schema, response.data, url);
  }

  postForm(url: string, form: FormData): Promise<TransportResponse<unknown>> {
    return this.transport.post(url, form);
  }

  /**
   * Open the body of `url` for reading. On a non-2xx status the body is
   * drained into the error excerpt instead.
   */
  async openStream(url: string): Promise<Readable> {
    const response = await this.transport.stream(url);
    if (isSuccess(response.status)) {
      return response.data;
    }
    const body = await readExcerpt(response.data);
    throw this.statusError(response.status, url, body);
  }

  ensureOk(response: TransportResponse<unknown>, url: string): void {
    if (!isSuccess(response.status)) {
      throw this.statusError(response.status, url, excerpt(response.data));
    }
  }

  parse<S extends z.ZodTypeAny>(schema: S, data: unknown, url: string): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      logger.error(`Unexpected response format from ${url}: ${issues}`);
      throw new ResponseFormatError(url, issues);
    }
    return result.data;
  }

  private statusError(status: number, url: string, body: string): HTTPStatusError {
    let hint: string | undefined;
    // relative API paths resolve against the parent of a base URL without the slash
    if (status === 404 && !new URL(this.baseUrl).pathname.endsWith('/')) {
      hint = `The base URL "${this.baseUrl}" does not end with "/"; did you mean "${this.baseUrl}/"?`;
      logger.warn(hint);
    }
    return new HTTPStatusError(status, url, body, hint);
  }
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function excerpt(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}...` : text;
}

async function readExcerpt(body: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of body) {
    const bytes = Buffer.from(chunk);
    chunks.push(bytes);
    size += bytes.length;
    if (size > EXCERPT_LENGTH) {
      break;
    }
  }
  return excerpt(Buffer.concat(chunks).toString('utf8'));
}
