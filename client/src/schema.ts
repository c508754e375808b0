import { z } from 'zod';

// Schemas for the JSON documents sent by the server

// Timestamps come as "YYYY-MM-DDTHH:MM:SS", sometimes with fraction and offset
export const TimestampSchema = z
  .string()
  .refine(value => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' })
  .transform(value => new Date(value));

export const VersionRecordSchema = z.object({
  serverVersion: z.string(),
  apiVersion: z.string(),
});

export const ParameterRecordSchema = z
  .object({
    type: z.string(),
    id: z.string(),
    name: z.string(),
    description: z.string().nullish(),
    required: z.boolean().default(true),
    array: z.boolean().default(false),
    default: z.unknown().optional(),
    min: z.number().nullish(),
    max: z.number().nullish(),
    minExclusive: z.boolean().nullish(),
    maxExclusive: z.boolean().nullish(),
    minLength: z.number().int().nullish(),
    maxLength: z.number().int().nullish(),
    choices: z.array(z.coerce.string()).nullish(),
    mediaType: z.string().nullish(),
    mediaTypeParameters: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const PresetRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  values: z.record(z.unknown()).default({}),
});

export const ServiceStatusRecordSchema = z.object({
  status: z.string().transform(value => value.toUpperCase()).pipe(z.enum(['OK', 'WARNING', 'DOWN'])),
  errorMessage: z.string().nullish(),
  timestamp: TimestampSchema,
});

export const ServiceRecordSchema = z.object({
  '@url': z.string(),
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  author: z.string().nullish(),
  version: z.string().nullish(),
  license: z.string().nullish(),
  classifiers: z.array(z.string()).default([]),
  parameters: z.array(ParameterRecordSchema),
  presets: z.array(PresetRecordSchema).default([]),
  status: ServiceStatusRecordSchema,
});

export const ServiceListSchema = z.object({
  services: z.array(ServiceRecordSchema),
});

export const JobRecordSchema = z.object({
  '@url': z.string(),
  id: z.string().min(1),
  service: z.string(),
  parameters: z.record(z.union([z.string(), z.array(z.string())])).default({}),
  submissionTime: TimestampSchema,
  completionTime: TimestampSchema.nullish(),
  status: z.string(),
});

export const FileRecordSchema = z.object({
  '@url': z.string(),
  '@content': z.string(),
  id: z.string(),
  jobId: z.string().nullish(),
  path: z.string(),
  label: z.string().nullish(),
  mediaType: z.string().nullish(),
});

export const FileListSchema = z.object({
  files: z.array(FileRecordSchema),
});

export const ValidationErrorListSchema = z.object({
  errors: z.array(
    z.object({
      parameter: z.string(),
      message: z.string(),
      errorCode: z.string().nullish(),
    })
  ),
});

export type VersionRecord = z.infer<typeof VersionRecordSchema>;
export type ParameterRecord = z.infer<typeof ParameterRecordSchema>;
export type PresetRecord = z.infer<typeof PresetRecordSchema>;
export type ServiceRecord = z.infer<typeof ServiceRecordSchema>;
export type JobRecord = z.infer<typeof JobRecordSchema>;
export type FileRecord = z.infer<typeof FileRecordSchema>;
