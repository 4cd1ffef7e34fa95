import { z } from 'zod';

import type { LogLevel } from './logger.js';

/** Unset and empty variables are treated alike. */
function unsetIfEmpty(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const optionalPositiveInt = z.preprocess(unsetIfEmpty, z.coerce.number().int().positive().optional());
const optionalPath = z.preprocess(unsetIfEmpty, z.string().trim().optional());

const envSchema = z.object({
  AGENTS_DIR: optionalPath,
  AGENT_CATALOG_PHASES: optionalPath,
  AGENT_CATALOG_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? unsetIfEmpty(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('warn')
  ),
  AGENT_CATALOG_CONCURRENCY: optionalPositiveInt,
  AGENT_CATALOG_LOAD_TIMEOUT_MS: optionalPositiveInt,
});

export interface CatalogConfig {
  /** Default catalog root when `--dir` is omitted. */
  agentsDir?: string;
  /** Phase definition file replacing the shipped default. */
  phasesFile?: string;
  logLevel: LogLevel;
  concurrency?: number;
  loadTimeoutMs?: number;
}

/**
 * Read configuration from the environment.
 * @throws Error listing every invalid variable.
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }

  const parsed = result.data;
  return {
    agentsDir: parsed.AGENTS_DIR,
    phasesFile: parsed.AGENT_CATALOG_PHASES,
    logLevel: parsed.AGENT_CATALOG_LOG_LEVEL,
    concurrency: parsed.AGENT_CATALOG_CONCURRENCY,
    loadTimeoutMs: parsed.AGENT_CATALOG_LOAD_TIMEOUT_MS,
  };
}
