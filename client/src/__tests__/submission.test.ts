import { describe, it } from '@jest/globals';
import { PassThrough, Readable } from 'stream';
import { SubmissionEncoder, filePart, toFormData, type MultipartPart } from '../submission';
import { SubmissionError } from '../errors';
import { RemoteFile } from '../file';
import { toParameter } from '../parameters';
import { ParameterRecordSchema, FileRecordSchema } from '../schema';
import type { Parameter } from '../types';
import { StubTransport, createContext, fileRecord, formEntry, parameterRecords } from './helpers/stubTransport';

function parameters(records: Record<string, unknown>[] = parameterRecords()): Parameter[] {
  return records.map(record => toParameter(ParameterRecordSchema.parse(record)));
}

function textStream(bytes: Buffer, encoding: BufferEncoding): Readable {
  const stream = new PassThrough();
  stream.setEncoding(encoding);
  stream.end(bytes);
  return stream;
}

describe('SubmissionEncoder', () => {
  const encoder = new SubmissionEncoder(parameters());

  it('encodes data fields before files, in input order', async () => {
    const parts = await encoder.encode(
      { param1: 'foobar', param0: 13, flag0: true, multi: ['x', 'y'] },
      { input0: Buffer.from('content') }
    );

    expect(parts).toEqual<MultipartPart[]>([
      { kind: 'field', name: 'param1', value: 'foobar' },
      { kind: 'field', name: 'param0', value: '13' },
      { kind: 'field', name: 'flag0', value: 'true' },
      { kind: 'field', name: 'multi', value: 'x' },
      { kind: 'field', name: 'multi', value: 'y' },
      { kind: 'file', name: 'input0', filename: 'input0', content: Buffer.from('content') },
    ]);
  });

  it('skips null and undefined values', async () => {
    const parts = await encoder.encode(
      { param0: '7', param1: 'label', choice0: null, multi: undefined },
      { input0: Buffer.from('x') }
    );

    expect(parts.map(part => part.name)).toEqual(['param0', 'param1', 'input0']);
  });

  it('reports every invalid field at once', () => {
    const errors = encoder.validate({ param1: 'much too long', choice0: 'medium', extra: 1 }, {});

    expect(errors).toEqual([
      { parameter: 'param0', code: 'required', message: 'Value is required' },
      { parameter: 'param1', code: 'max_length', message: 'Text must be at most 10 characters long' },
      { parameter: 'input0', code: 'required', message: 'Value is required' },
      { parameter: 'choice0', code: 'choice', message: '"medium" is not one of: fast, slow' },
      { parameter: 'extra', code: 'unknown', message: 'Service does not declare this parameter' },
    ]);
  });

  it('rejects an invalid submission with SubmissionError', async () => {
    const failure = encoder.encode({ param0: 'many', param1: 'ok' }, { input0: Buffer.from('x') });

    await expect(failure).rejects.toThrow(SubmissionError);
    await expect(failure).rejects.toThrow(`Invalid value for 'param0': "many" is not an integer`);
  });

  it('checks integer values and bounds', () => {
    const check = (value: string | number) =>
      encoder.validate({ param0: value, param1: 'ok' }, { input0: Buffer.from('x') });

    expect(check('42')).toEqual([]);
    expect(check(0)).toEqual([]);
    expect(check(101)).toEqual([{ parameter: 'param0', code: 'max', message: 'Value must be at most 100' }]);
    expect(check('-1')).toEqual([{ parameter: 'param0', code: 'min', message: 'Value must be at least 0' }]);
    expect(check(1.5)).toEqual([{ parameter: 'param0', code: 'invalid', message: '"1.5" is not an integer' }]);
  });

  it('honours exclusive decimal bounds', () => {
    const decimal = new SubmissionEncoder(
      parameters([{ type: 'decimal', id: 'ratio', name: 'Ratio', min: 0, max: 1, minExclusive: true }])
    );

    expect(decimal.validate({ ratio: 0 })).toEqual([
      { parameter: 'ratio', code: 'min', message: 'Value must be greater than 0' },
    ]);
    expect(decimal.validate({ ratio: '1' })).toEqual([]);
    expect(decimal.validate({ ratio: 'half' })).toEqual([
      { parameter: 'ratio', code: 'invalid', message: '"half" is not a number' },
    ]);
  });

  it('rejects several values for a single-valued parameter', () => {
    const errors = encoder.validate({ param0: [1, 2], param1: 'ok' }, { input0: Buffer.from('x') });

    expect(errors).toEqual([
      { parameter: 'param0', code: 'multiple', message: 'Parameter does not accept multiple values' },
    ]);
  });

  it('accepts a default in place of a missing required value', () => {
    const withDefault = new SubmissionEncoder(
      parameters([{ type: 'integer', id: 'count', name: 'Count', required: true, default: 3 }])
    );

    expect(withDefault.validate({})).toEqual([]);
  });

  it('measures text length in characters', () => {
    const tags = new SubmissionEncoder(
      parameters([{ type: 'text', id: 'tag', name: 'Tag', minLength: 2, maxLength: 2 }])
    );

    expect(tags.validate({ tag: '😀😀' })).toEqual([]);
    expect(tags.validate({ tag: '😀😀😀' })).toEqual([
      { parameter: 'tag', code: 'max_length', message: 'Text must be at most 2 characters long' },
    ]);
    expect(tags.validate({ tag: '😀' })).toEqual([
      { parameter: 'tag', code: 'min_length', message: 'Text must be at least 2 characters long' },
    ]);
  });

  it('accepts only booleans for flags', () => {
    const base = { param0: 1, param1: 'ok' };
    const files = { input0: Buffer.from('x') };

    expect(encoder.validate({ ...base, flag0: 'false' }, files)).toEqual([]);
    expect(encoder.validate({ ...base, flag0: 'yes' }, files)).toEqual([
      { parameter: 'flag0', code: 'invalid', message: '"yes" is not a boolean' },
    ]);
  });

  it('only lets file parameters take binary content', () => {
    const errors = encoder.validate({ param0: 1, input0: 5 }, { param1: Buffer.from('bytes') });

    expect(errors).toEqual([
      { parameter: 'param1', code: 'invalid', message: 'File content is only accepted by file parameters' },
      { parameter: 'input0', code: 'invalid', message: '5 is not a file' },
    ]);
  });

  it('sends the original bytes of text-mode streams', async () => {
    const utf8 = Buffer.from('żółw\n', 'utf8');
    const latin1 = Buffer.from([0x63, 0x61, 0x66, 0xe9]);
    const multiFile = new SubmissionEncoder(
      parameters([{ type: 'file', id: 'input', name: 'Input', array: true }])
    );

    const parts = await multiFile.encode({}, { input: [textStream(utf8, 'utf8'), textStream(latin1, 'latin1')] });

    expect(parts).toEqual<MultipartPart[]>([
      { kind: 'file', name: 'input', filename: 'input', content: utf8 },
      { kind: 'file', name: 'input', filename: 'input', content: latin1 },
    ]);
  });

  it('sends a file already on the server by its id', async () => {
    const file = new RemoteFile(
      createContext(new StubTransport()),
      FileRecordSchema.parse(fileRecord('job-1', 'out.txt'))
    );

    const parts = await encoder.encode({ param0: 1, param1: 'ok' }, { input0: file });

    expect(parts[2]).toEqual({ kind: 'field', name: 'input0', value: 'job-1/out.txt' });
  });
});

describe('filePart', () => {
  it('copies a view of a larger buffer', async () => {
    const bytes = new Uint8Array([0, 104, 105, 0]).subarray(1, 3);

    expect(await filePart('upload', bytes)).toEqual({
      kind: 'file',
      name: 'upload',
      filename: 'upload',
      content: Buffer.from('hi'),
    });
  });

  it('prefers an explicit file name', async () => {
    const part = await filePart('file', Readable.from([Buffer.from('abc')]), 'notes.txt');

    expect(part.filename).toBe('notes.txt');
    expect(part.content.toString('utf8')).toBe('abc');
  });
});

describe('toFormData', () => {
  it('appends fields as strings and files as named blobs', async () => {
    const form = toFormData([
      { kind: 'field', name: 'param0', value: '13' },
      { kind: 'file', name: 'input0', filename: 'data.txt', content: Buffer.from('hello') },
    ]);

    expect(await formEntry(form, 'param0')).toBe('13');
    expect(await formEntry(form, 'input0')).toEqual({ filename: 'data.txt', content: 'hello' });
  });

  it('keeps repeated names as separate entries', () => {
    const form = toFormData([
      { kind: 'field', name: 'multi', value: 'a' },
      { kind: 'field', name: 'multi', value: 'b' },
    ]);

    expect(form.getAll('multi')).toEqual(['a', 'b']);
  });
});
