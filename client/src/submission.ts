import path from 'path';
import fs from 'fs';
import { Readable } from 'stream';
import { Blob } from 'buffer';
import { SubmissionError, type FieldError } from './errors';
import { RemoteFile } from './file';
import type { Parameter } from './types';

export type ScalarValue = string | number | boolean | RemoteFile;
export type ParameterInput = ScalarValue | readonly ScalarValue[] | null | undefined;
export type FileSource = Buffer | Uint8Array | Readable | RemoteFile;
export type FileInput = FileSource | readonly FileSource[] | null | undefined;

export type JobData = Readonly<Record<string, ParameterInput>>;
export type JobFiles = Readonly<Record<string, FileInput>>;

export type MultipartPart =
  | { kind: 'field'; name: string; value: string }
  | { kind: 'file'; name: string; filename: string; content: Buffer };

type BinarySource = Buffer | Uint8Array | Readable;

// every value supplied for one parameter, from either map
type SuppliedValue = ScalarValue | BinarySource;

function isBinary(value: unknown): value is BinarySource {
  return value instanceof Uint8Array || value instanceof Readable;
}

function asList<T>(value: T | readonly T[] | null | undefined): T[] {
  if (value === null || value === undefined) {
    return [];
  }
  // readonly arrays are not narrowed by Array.isArray
  return isReadonlyArray(value) ? [...value] : [value];
}

function isReadonlyArray<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Checks job input against a service's parameters and turns it into multipart parts.
 */
export class SubmissionEncoder {
  private readonly parameters: ReadonlyMap<string, Parameter>;

  constructor(parameters: readonly Parameter[]) {
    this.parameters = new Map(parameters.map(parameter => [parameter.id, parameter]));
  }

  /**
   * Collect every problem with the input; an empty list means it can be sent.
   */
  validate(data: JobData = {}, files: JobFiles = {}): FieldError[] {
    const errors: FieldError[] = [];

    for (const parameter of this.parameters.values()) {
      const values: SuppliedValue[] = [
        ...asList<ScalarValue>(data[parameter.id]),
        ...asList<FileSource>(files[parameter.id]),
      ];
      errors.push(...checkParameter(parameter, values));
    }

    // files given as plain strings would be sent as text, not as content
    for (const [id, input] of Object.entries(files)) {
      if (asList<FileSource>(input).some(value => typeof value === 'string')) {
        errors.push({ parameter: id, code: 'invalid', message: 'File content must be bytes or a stream, not a string' });
      }
    }

    const seen = new Set<string>();
    for (const id of [...Object.keys(data), ...Object.keys(files)]) {
      if (!this.parameters.has(id) && !seen.has(id)) {
        seen.add(id);
        errors.push({ parameter: id, code: 'unknown', message: 'Service does not declare this parameter' });
      }
    }
    return errors;
  }

  /**
   * Validate the input and build the parts of the request body, data fields
   * first, in input order. Streams are read to the end.
   * @throws SubmissionError listing every invalid field
   */
  async encode(data: JobData = {}, files: JobFiles = {}): Promise<MultipartPart[]> {
    const errors = this.validate(data, files);
    if (errors.length > 0) {
      throw new SubmissionError(errors);
    }

    const parts: MultipartPart[] = [];
    const entries: [string, SuppliedValue[]][] = [
      ...Object.entries(data).map(([id, input]): [string, SuppliedValue[]] => [id, asList<ScalarValue>(input)]),
      ...Object.entries(files).map(([id, input]): [string, SuppliedValue[]] => [id, asList<FileSource>(input)]),
    ];
    for (const [name, values] of entries) {
      for (const value of values) {
        parts.push(await encodeValue(name, value));
      }
    }
    return parts;
  }
}

export function toFormData(parts: readonly MultipartPart[]): FormData {
  const form = new FormData();
  for (const part of parts) {
    if (part.kind === 'field') {
      form.append(part.name, part.value);
    } else {
      form.append(part.name, new Blob([part.content]), part.filename);
    }
  }
  return form;
}

async function encodeValue(name: string, value: SuppliedValue): Promise<MultipartPart> {
  if (value instanceof RemoteFile) {
    // the server resolves files it already holds by id
    return { kind: 'field', name, value: value.id };
  }
  if (isBinary(value)) {
    return filePart(name, value);
  }
  return { kind: 'field', name, value: String(value) };
}

/**
 * Read binary content into a file part. The file name defaults to the base
 * name of a file stream, or else to `name`.
 */
export async function filePart(
  name: string,
  source: Buffer | Uint8Array | Readable,
  filename?: string
): Promise<Extract<MultipartPart, { kind: 'file' }>> {
  if (source instanceof Readable) {
    return { kind: 'file', name, filename: filename ?? filenameOf(source, name), content: await readBytes(source) };
  }
  const content = Buffer.isBuffer(source) ? source : Buffer.from(source.buffer, source.byteOffset, source.byteLength);
  return { kind: 'file', name, filename: filename ?? name, content };
}

function filenameOf(stream: Readable, fallback: string): string {
  if (stream instanceof fs.ReadStream) {
    return path.basename(stream.path.toString());
  }
  return fallback;
}

async function readBytes(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    // text-mode streams yield decoded strings; turn them back into the original bytes
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, stream.readableEncoding ?? 'utf8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

function checkParameter(parameter: Parameter, values: SuppliedValue[]): FieldError[] {
  const fail = (code: string, message: string): FieldError => ({ parameter: parameter.id, code, message });

  if (values.length === 0) {
    if (parameter.required && (parameter.default === undefined || parameter.default === null)) {
      return [fail('required', 'Value is required')];
    }
    return [];
  }

  const errors: FieldError[] = [];
  if (!parameter.array && values.length > 1) {
    errors.push(fail('multiple', 'Parameter does not accept multiple values'));
  }
  for (const value of values) {
    const error = checkValue(parameter, value);
    if (error) {
      errors.push(fail(error.code, error.message));
    }
  }
  return errors;
}

type ValueProblem = { code: string; message: string } | undefined;

const INTEGER_PATTERN = /^[+-]?\d+$/;

function checkValue(parameter: Parameter, value: SuppliedValue): ValueProblem {
  if (parameter.type === 'undefined' || parameter.type === 'unknown') {
    return undefined;
  }
  if (parameter.type === 'file') {
    if (typeof value === 'number' || typeof value === 'boolean') {
      return { code: 'invalid', message: `${value} is not a file` };
    }
    return undefined;
  }
  if (isBinary(value) || value instanceof RemoteFile) {
    return { code: 'invalid', message: 'File content is only accepted by file parameters' };
  }

  switch (parameter.type) {
    case 'integer': {
      const number = typeof value === 'string' && INTEGER_PATTERN.test(value.trim()) ? Number(value) : value;
      if (typeof number !== 'number' || !Number.isInteger(number)) {
        return { code: 'invalid', message: `"${value}" is not an integer` };
      }
      return checkBounds(number, parameter.min, parameter.max, false, false);
    }
    case 'decimal': {
      const number = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
      if (typeof number !== 'number' || !Number.isFinite(number)) {
        return { code: 'invalid', message: `"${value}" is not a number` };
      }
      return checkBounds(number, parameter.min, parameter.max, parameter.minExclusive, parameter.maxExclusive);
    }
    case 'text': {
      // lengths count code points, not UTF-16 units
      const length = [...String(value)].length;
      if (parameter.minLength !== undefined && length < parameter.minLength) {
        return { code: 'min_length', message: `Text must be at least ${parameter.minLength} characters long` };
      }
      if (parameter.maxLength !== undefined && length > parameter.maxLength) {
        return { code: 'max_length', message: `Text must be at most ${parameter.maxLength} characters long` };
      }
      return undefined;
    }
    case 'flag':
      if (typeof value === 'boolean' || value === 'true' || value === 'false') {
        return undefined;
      }
      return { code: 'invalid', message: `"${value}" is not a boolean` };
    case 'choice':
      if (parameter.choices.includes(String(value))) {
        return undefined;
      }
      return { code: 'choice', message: `"${value}" is not one of: ${parameter.choices.join(', ')}` };
  }
}

function checkBounds(
  value: number,
  min: number | undefined,
  max: number | undefined,
  minExclusive: boolean,
  maxExclusive: boolean
): ValueProblem {
  if (min !== undefined && (minExclusive ? value <= min : value < min)) {
    return { code: 'min', message: `Value must be ${minExclusive ? 'greater than' : 'at least'} ${min}` };
  }
  if (max !== undefined && (maxExclusive ? value >= max : value > max)) {
    return { code: 'max', message: `Value must be ${maxExclusive ? 'less than' : 'at most'} ${max}` };
  }
  return undefined;
}
