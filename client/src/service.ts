import { logger } from '@genkit-ai/core/logging';
import type { ApiContext } from './api';
import { SubmissionError } from './errors';
import { Job } from './job';
import { toParameter } from './parameters';
import { JobRecordSchema, ValidationErrorListSchema, type ServiceRecord } from './schema';
import { SubmissionEncoder, toFormData, type JobData, type JobFiles } from './submission';
import type { Parameter, Preset, ServiceStatus } from './types';

// Status the server answers with when it rejects submitted values
const UNPROCESSABLE_ENTITY = 422;

/**
 * A job type offered by the server, as listed in the service catalog.
 */
export class Service {
  readonly url: string;
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly author: string;
  readonly version: string;
  readonly license: string;
  readonly classifiers: ReadonlySet<string>;
  readonly parameters: readonly Parameter[];
  readonly presets: readonly Preset[];
  readonly status: ServiceStatus;

  constructor(private readonly context: ApiContext, record: ServiceRecord) {
    this.url = context.resolve(record['@url']);
    this.id = record.id;
    this.name = record.name;
    this.description = record.description ?? '';
    this.author = record.author ?? '';
    this.version = record.version ?? '';
    this.license = record.license ?? '';
    this.classifiers = new Set(record.classifiers);
    this.parameters = Object.freeze(record.parameters.map(toParameter));
    this.presets = Object.freeze(
      record.presets.map(preset => ({
        id: preset.id,
        name: preset.name,
        description: preset.description ?? '',
        values: Object.freeze({ ...preset.values }),
      }))
    );
    this.status = Object.freeze({
      status: record.status.status,
      message: record.status.errorMessage ?? '',
      timestamp: record.status.timestamp,
    });
  }

  getParameter(id: string): Parameter | undefined {
    return this.parameters.find(parameter => parameter.id === id);
  }

  /**
   * Validate and send a new job.
   * @param data parameter values; arrays give several values to one parameter
   * @param files binary content (buffers or byte streams) and reused result files
   * @throws SubmissionError with every invalid field, whether found locally or by the server
   */
  async submitJob(data: JobData = {}, files: JobFiles = {}): Promise<Job> {
    const parts = await new SubmissionEncoder(this.parameters).encode(data, files);
    const url = `${this.url}/jobs`;
    logger.info(`Submitting ${this.id} job with ${parts.length} parts`);

    const response = await this.context.postForm(url, toFormData(parts));
    if (response.status === UNPROCESSABLE_ENTITY) {
      const { errors } = this.context.parse(ValidationErrorListSchema, response.data, url);
      logger.warn(`Server rejected ${this.id} job: ${errors.length} invalid fields`);
      throw new SubmissionError(
        errors.map(error => ({
          parameter: error.parameter,
          message: error.message,
          code: error.errorCode ?? 'invalid',
        }))
      );
    }
    this.context.ensureOk(response, url);

    const job = new Job(this.context, this.context.parse(JobRecordSchema, response.data, url));
    logger.info(`Submitted job ${job.id} to ${this.id}`);
    return job;
  }

  toString(): string {
    return `${this.id}: ${this.name}`;
  }
}
