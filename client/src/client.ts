import type { Readable } from 'stream';
import { logger } from '@genkit-ai/core/logging';
import { ApiContext, type Clock } from './api';
import { POLL_INTERVAL_MS, clientConfig } from './config';
import { NotFoundError } from './errors';
import { RemoteFile } from './file';
import { Job } from './job';
import { FileRecordSchema, JobRecordSchema, VersionRecordSchema } from './schema';
import type { Service } from './service';
import { ServiceCatalog } from './serviceCatalog';
import { filePart, toFormData, type JobData, type JobFiles } from './submission';
import { AxiosTransport, type Transport } from './transport';
import type { Version } from './types';

export const CLIENT_VERSION = '1.0.0';

export interface ClientOptions {
  /** Defaults to an axios transport using `timeoutMs`. */
  transport?: Transport;
  timeoutMs?: number;
  pollIntervalMs?: number;
  clock?: Clock;
}

/**
 * Entry point to a job service: version, service catalog, jobs and files.
 */
export class JobServiceClient {
  private readonly context: ApiContext;
  private readonly catalog: ServiceCatalog;

  constructor(baseUrl: string = clientConfig.baseUrl, options: ClientOptions = {}) {
    const transport = options.transport ?? new AxiosTransport({ timeoutMs: options.timeoutMs ?? clientConfig.timeoutMs });
    this.context = new ApiContext(
      baseUrl,
      transport,
      options.clock ?? Date.now,
      options.pollIntervalMs ?? POLL_INTERVAL_MS
    );
    this.catalog = new ServiceCatalog(this.context);
    logger.debug(`Created job service client for ${baseUrl}`);
  }

  get url(): string {
    return this.context.baseUrl;
  }

  /**
   * Versions of this client, the server and its API.
   * A 404 here usually means a wrong base URL; the error then carries a hint.
   */
  async version(): Promise<Version> {
    const record = await this.context.getJson(this.context.resolve('api/version'), VersionRecordSchema);
    return { client: CLIENT_VERSION, server: record.serverVersion, api: record.apiVersion };
  }

  services(): Promise<readonly Service[]> {
    return this.catalog.services();
  }

  reloadServices(): Promise<readonly Service[]> {
    return this.catalog.reload();
  }

  getService(id: string): Promise<Service> {
    return this.catalog.get(id);
  }

  async submitJob(serviceId: string, data: JobData = {}, files: JobFiles = {}): Promise<Job> {
    const service = await this.getService(serviceId);
    return service.submitJob(data, files);
  }

  /**
   * Rebuild a job handle from its id alone.
   */
  async getJob(id: string): Promise<Job> {
    const record = await this.context.getJson(
      this.context.resolve(`api/jobs/${encodeURIComponent(id)}`),
      JobRecordSchema,
      () => new NotFoundError('job', id)
    );
    return new Job(this.context, record);
  }

  async getFile(id: string): Promise<RemoteFile> {
    // file ids may contain "/" (job id and path)
    const path = id.split('/').map(encodeURIComponent).join('/');
    const record = await this.context.getJson(
      this.context.resolve(`api/files/${path}`),
      FileRecordSchema,
      () => new NotFoundError('file', id)
    );
    return new RemoteFile(this.context, record);
  }

  /**
   * Store local content on the server. The returned file can be given to any
   * file parameter of a later submission.
   * @param title file name sent with the content; defaults to the base name of a file stream
   */
  async uploadFile(source: Buffer | Uint8Array | Readable, title?: string): Promise<RemoteFile> {
    const url = this.context.resolve('api/files');
    const part = await filePart('file', source, title);
    const response = await this.context.postForm(url, toFormData([part]));
    this.context.ensureOk(response, url);

    const file = new RemoteFile(this.context, this.context.parse(FileRecordSchema, response.data, url));
    logger.info(`Uploaded ${part.content.length} bytes as ${file.id}`);
    return file;
  }

  toString(): string {
    return `JobServiceClient(${this.url})`;
  }
}
