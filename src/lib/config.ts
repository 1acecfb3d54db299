// /src/lib/config.ts

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

// --- Endpoints ---
export const LOGIN_ENDPOINT = '/auth/login';
export const REGISTER_ENDPOINT = '/auth/register';
export const TASKS_ENDPOINT = '/tasks';
export const TASK_SEARCH_ENDPOINT = '/tasks/search';
export const STATS_ENDPOINT = '/stats/tasks';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ClientConfig {
  apiBaseUrl: string;
  timeoutMs: number;
  pageSize: number;
  sessionFile: string;
  logLevel: LogLevel;
}

const DEFAULT_SESSION_FILE = join(homedir(), '.tasklane', 'session.json');

const envSchema = z.object({
  TASKLANE_API_URL: z.string().url().default('http://localhost:9090'),
  TASKLANE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TASKLANE_PAGE_SIZE: z.coerce.number().int().positive().default(10),
  TASKLANE_SESSION_FILE: z.string().min(1).default(DEFAULT_SESSION_FILE),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

// Expands ~/ and resolves relative paths against the working directory
export function normalizeSessionPath(input: string): string {
  let value = input.trim();
  if (value.startsWith('~/')) {
    value = join(homedir(), value.slice(2));
  }
  return isAbsolute(value) ? value : resolve(value);
}

/**
 * Reads the client configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ClientConfig> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') || 'environment';
    throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? 'unknown problem'}`, variable);
  }

  const values = parsed.data;
  return Object.freeze({
    apiBaseUrl: values.TASKLANE_API_URL.replace(/\/+$/, ''),
    timeoutMs: values.TASKLANE_TIMEOUT_MS,
    pageSize: values.TASKLANE_PAGE_SIZE,
    sessionFile: normalizeSessionPath(values.TASKLANE_SESSION_FILE),
    logLevel: values.LOG_LEVEL,
  });
}
