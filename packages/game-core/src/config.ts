// packages/game-core/src/config.ts
//
// Environment-driven configuration. loadConfig() reads `.env` through dotenv
// when no explicit environment is given, then validates with Zod:
//
//   LOG_LEVEL        pino level for the package logger (default "info")
//   SIM_MAX_TURNS    turn limit for simulators built by createSimulator (default 32)
//   DICTIONARY_FILE  optional path to a "word frequency" list; the bundled
//                    list is used when unset

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_MAX_TURNS } from '@fivefold/protocol';

import { ContractViolationError } from './errors.js';

export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);
export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default('info'),
  SIM_MAX_TURNS: z.coerce.number().int().min(1).default(DEFAULT_MAX_TURNS),
  DICTIONARY_FILE: z.string().min(1).optional(),
});

export interface Config {
  logLevel: LogLevel;
  maxTurns: number;
  dictionaryFile?: string;
}

type Env = Record<string, string | undefined>;

function invalidConfig(issues: z.ZodIssue[]): ContractViolationError {
  const problems = issues
    .map((i) => `${i.path.join('.')}: ${i.message}`)
    .join('; ');
  return new ContractViolationError(
    'invalid-config',
    `Invalid environment: ${problems}`,
    { issues },
  );
}

/**
 * loadConfig validates `env`; without one it loads `.env` into process.env
 * first and validates that.
 */
export function loadConfig(env?: Env): Config {
  if (env === undefined) loadDotenv();
  const parsed = envSchema.safeParse(env ?? process.env);
  if (!parsed.success) throw invalidConfig(parsed.error.issues);
  const { LOG_LEVEL, SIM_MAX_TURNS, DICTIONARY_FILE } = parsed.data;
  return {
    logLevel: LOG_LEVEL,
    maxTurns: SIM_MAX_TURNS,
    dictionaryFile: DICTIONARY_FILE,
  };
}

/** Reads LOG_LEVEL alone; nothing else in the environment is consulted. */
export function loadLogLevel(env: Env = process.env): LogLevel {
  const parsed = envSchema.pick({ LOG_LEVEL: true }).safeParse(env);
  if (!parsed.success) throw invalidConfig(parsed.error.issues);
  return parsed.data.LOG_LEVEL;
}
