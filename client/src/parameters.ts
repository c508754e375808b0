import type { ParameterRecord } from './schema';
import type { Parameter } from './types';

/**
 * Build a typed parameter from its server record.
 * Types the client does not know become `unknown` parameters that keep the raw record.
 */
export function toParameter(record: ParameterRecord): Parameter {
  const base = {
    id: record.id,
    name: record.name,
    description: record.description ?? '',
    required: record.required,
    array: record.array,
    default: record.default ?? undefined,
  };

  switch (record.type) {
    case 'integer':
      return {
        ...base,
        type: 'integer',
        min: record.min ?? undefined,
        max: record.max ?? undefined,
      };
    case 'decimal':
      return {
        ...base,
        type: 'decimal',
        min: record.min ?? undefined,
        max: record.max ?? undefined,
        minExclusive: record.minExclusive ?? false,
        maxExclusive: record.maxExclusive ?? false,
      };
    case 'text':
      return {
        ...base,
        type: 'text',
        minLength: record.minLength ?? undefined,
        maxLength: record.maxLength ?? undefined,
      };
    case 'flag':
      return { ...base, type: 'flag' };
    case 'choice':
      return { ...base, type: 'choice', choices: record.choices ?? [] };
    case 'file':
      return {
        ...base,
        type: 'file',
        mediaType: record.mediaType ?? undefined,
        mediaTypeParameters: record.mediaTypeParameters ?? {},
      };
    case 'undefined':
      return { ...base, type: 'undefined' };
    default:
      return { ...base, type: 'unknown', rawType: record.type, attributes: { ...record } };
  }
}
