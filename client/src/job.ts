import { logger } from '@genkit-ai/core/logging';
import type { ApiContext } from './api';
import { RemoteFile } from './file';
import { RefreshingValue } from './refresh';
import { FileListSchema, JobRecordSchema, type JobRecord } from './schema';
import { parseJobState, type JobState } from './types';

interface JobSnapshot {
  state: JobState;
  completionTime: Date | undefined;
}

function toSnapshot(record: JobRecord): JobSnapshot {
  return {
    state: parseJobState(record.status),
    completionTime: record.completionTime ?? undefined,
  };
}

/**
 * Handle to a job on the server. Status and results are cached and fetched
 * again only when read at least one poll interval after the previous fetch.
 * The server holds the job, so a handle can always be rebuilt from its id.
 */
export class Job {
  readonly url: string;
  readonly id: string;
  readonly service: string;
  readonly parameters: Readonly<Record<string, string | readonly string[]>>;
  readonly submissionTime: Date;

  private readonly snapshot: RefreshingValue<JobSnapshot>;
  private readonly files: RefreshingValue<readonly RemoteFile[]>;

  /** @param record job document just received; it counts as a status fetch */
  constructor(private readonly context: ApiContext, record: JobRecord) {
    this.url = context.resolve(record['@url']);
    this.id = record.id;
    this.service = record.service;
    this.parameters = Object.freeze({ ...record.parameters });
    this.submissionTime = record.submissionTime;
    this.snapshot = new RefreshingValue(
      () => this.fetchSnapshot(),
      context.clock,
      context.pollIntervalMs,
      toSnapshot(record)
    );
    this.files = new RefreshingValue(() => this.fetchFiles(), context.clock, context.pollIntervalMs);
  }

  async getStatus(): Promise<JobState> {
    return (await this.snapshot.get()).state;
  }

  async getCompletionTime(): Promise<Date | undefined> {
    return (await this.snapshot.get()).completionTime;
  }

  /** Result files in server order. */
  getResults(): Promise<readonly RemoteFile[]> {
    return this.files.get();
  }

  /** Fetch the status now, ignoring the poll interval. */
  async reload(): Promise<JobState> {
    return (await this.snapshot.refresh()).state;
  }

  toString(): string {
    return this.id;
  }

  private async fetchSnapshot(): Promise<JobSnapshot> {
    const record = await this.context.getJson(this.url, JobRecordSchema);
    const snapshot = toSnapshot(record);
    logger.debug(`Job ${this.id} is ${snapshot.state}`);
    return snapshot;
  }

  private async fetchFiles(): Promise<readonly RemoteFile[]> {
    const listing = await this.context.getJson(`${this.url}/files`, FileListSchema);
    logger.debug(`Job ${this.id} has ${listing.files.length} result files`);
    return Object.freeze(listing.files.map(file => new RemoteFile(this.context, file)));
  }
}
