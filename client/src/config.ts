import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Minimum time between two status (or results) fetches of one job. */
export const POLL_INTERVAL_MS = 5000;

export const DEFAULT_BASE_URL = 'http://localhost:4040/';
const DEFAULT_TIMEOUT_MS = 30000;

// Unset or invalid values fall back to the defaults
const ConfigSchema = z.object({
  JOB_SERVICE_URL: z.string().min(1).catch(DEFAULT_BASE_URL),
  JOB_SERVICE_TIMEOUT_MS: z.coerce.number().int().positive().catch(DEFAULT_TIMEOUT_MS),
  JOB_SERVICE_LOG_LEVEL: LogLevelSchema.catch('info'),
});

export interface ClientConfig {
  baseUrl: string;
  timeoutMs: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = ConfigSchema.parse(env);
  return {
    baseUrl: parsed.JOB_SERVICE_URL,
    timeoutMs: parsed.JOB_SERVICE_TIMEOUT_MS,
    logLevel: parsed.JOB_SERVICE_LOG_LEVEL,
  };
}

// Configuration
export const clientConfig = loadConfig();
