import {
  CatalogIOError,
  ResolutionSession,
  configureLogging,
  errorMessage,
  loadPhaseGraph,
  readConfig,
  type CatalogConfig,
  type LoggerConfig,
  type PhaseGraph,
  type SessionOptions,
} from '@agent-catalog/core';

import { UsageError } from './formatting.js';

export type ExitFn = (code: number) => never;

export interface CommandDependencies {
  env: NodeJS.ProcessEnv;
  readConfig: (env: NodeJS.ProcessEnv) => CatalogConfig;
  configureLogging: (config: LoggerConfig) => void;
  createSession: (options: SessionOptions) => ResolutionSession;
  loadPhases: (phasesFile?: string) => Promise<PhaseGraph>;
  writeStdout: (text: string) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: ExitFn;
}

function defaultExit(code: number): never {
  process.exit(code);
}

export function defaultCommandDependencies(overrides: Partial<CommandDependencies> = {}): CommandDependencies {
  return {
    env: process.env,
    readConfig,
    configureLogging,
    createSession: (options: SessionOptions) => new ResolutionSession(options),
    loadPhases: loadPhaseGraph,
    writeStdout: (text: string) => {
      process.stdout.write(text);
    },
    log: (...args: unknown[]) => console.log(...args),
    error: (...args: unknown[]) => console.error(...args),
    exit: defaultExit,
    ...overrides,
  };
}

export interface CommandContext {
  config: CatalogConfig;
  /** `--dir`, else `AGENTS_DIR`. */
  catalogDir(dirOption?: string): string;
  /** `--phases`, else `AGENT_CATALOG_PHASES`, else the shipped default. */
  phasesFile(phasesOption?: string): string | undefined;
}

/**
 * Read the environment and apply the configured log level.
 * @throws UsageError when the environment is invalid.
 */
export function createCommandContext(deps: CommandDependencies): CommandContext {
  let config: CatalogConfig;
  try {
    config = deps.readConfig(deps.env);
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
  deps.configureLogging({ level: config.logLevel });

  return {
    config,
    catalogDir(dirOption?: string): string {
      const dir = dirOption?.trim() || config.agentsDir;
      if (!dir) {
        throw new CatalogIOError('catalog directory', 'none given; pass --dir or set AGENTS_DIR');
      }
      return dir;
    },
    phasesFile(phasesOption?: string): string | undefined {
      return phasesOption?.trim() || config.phasesFile;
    },
  };
}
