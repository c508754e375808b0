/**
 * Fields shared by every parameter type
 */
interface BaseParameter {
  id: string;
  name: string;
  description: string;
  required: boolean;
  array: boolean;
  default?: unknown;
}

export interface IntegerParameter extends BaseParameter {
  type: 'integer';
  min?: number;
  max?: number;
}

export interface DecimalParameter extends BaseParameter {
  type: 'decimal';
  min?: number;
  max?: number;
  minExclusive: boolean;
  maxExclusive: boolean;
}

export interface TextParameter extends BaseParameter {
  type: 'text';
  minLength?: number;
  maxLength?: number;
}

export interface FlagParameter extends BaseParameter {
  type: 'flag';
}

export interface ChoiceParameter extends BaseParameter {
  type: 'choice';
  choices: readonly string[];
}

export interface FileParameter extends BaseParameter {
  type: 'file';
  mediaType?: string;
  mediaTypeParameters: Readonly<Record<string, unknown>>;
}

export interface UndefinedParameter extends BaseParameter {
  type: 'undefined';
}

/**
 * Parameter of a type this client does not know.
 * `attributes` holds the record exactly as the server sent it.
 */
export interface CustomParameter extends BaseParameter {
  type: 'unknown';
  rawType: string;
  attributes: Readonly<Record<string, unknown>>;
}

export type Parameter =
  | IntegerParameter
  | DecimalParameter
  | TextParameter
  | FlagParameter
  | ChoiceParameter
  | FileParameter
  | UndefinedParameter
  | CustomParameter;

export type ParameterType = Parameter['type'];

export interface Preset {
  id: string;
  name: string;
  description: string;
  values: Readonly<Record<string, unknown>>;
}

export interface ServiceStatus {
  status: 'OK' | 'WARNING' | 'DOWN';
  message: string;
  timestamp: Date;
}

export const JOB_STATES = [
  'PENDING',
  'REJECTED',
  'ACCEPTED',
  'QUEUED',
  'RUNNING',
  'COMPLETED',
  'INTERRUPTED',
  'DELETED',
  'FAILED',
  'ERROR',
  'UNKNOWN',
] as const;

export type JobState = (typeof JOB_STATES)[number];

const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>([
  'REJECTED',
  'COMPLETED',
  'INTERRUPTED',
  'DELETED',
  'FAILED',
  'ERROR',
]);

export function parseJobState(value: string): JobState {
  const upper = value.toUpperCase();
  return JOB_STATES.find(state => state === upper) ?? 'UNKNOWN';
}

/** True once the job will not change state anymore. */
export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface Version {
  client: string;
  server: string;
  api: string;
}
