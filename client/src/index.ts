export { JobServiceClient, CLIENT_VERSION, type ClientOptions } from './client';
export { ServiceCatalog } from './serviceCatalog';
export { Service } from './service';
export { Job } from './job';
export { RemoteFile, toPath, toStream, type DumpTarget } from './file';
export {
  SubmissionEncoder,
  filePart,
  toFormData,
  type FileInput,
  type FileSource,
  type JobData,
  type JobFiles,
  type MultipartPart,
  type ParameterInput,
  type ScalarValue,
} from './submission';
export { RefreshingValue } from './refresh';
export { AxiosTransport, type Transport, type TransportResponse } from './transport';
export type { Clock } from './api';
export { POLL_INTERVAL_MS, clientConfig, loadConfig, type ClientConfig } from './config';
export {
  JobServiceError,
  TransportError,
  HTTPStatusError,
  SubmissionError,
  NotFoundError,
  ResponseFormatError,
  type FieldError,
} from './errors';
export * from './types';
