#!/usr/bin/env node

import fs from 'node:fs';
import { pathToFileURL } from 'node:url';

import { createLogger, errorMessage } from '@agent-catalog/core';
import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';

import { registerCatalogCommands } from './commands/catalog.js';
import { registerResolveCommands } from './commands/resolve.js';

dotenvConfig({ quiet: true });

const log = createLogger('cli');

/** Both src/cli/bootstrap.ts and dist/cli/bootstrap.js sit two levels below the package root. */
const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

/** `version` from a package manifest, or 'unknown' when it cannot be read. */
export function readPackageVersion(manifestUrl: URL = PACKAGE_JSON_URL): string {
  let manifest: unknown;
  try {
    manifest = JSON.parse(fs.readFileSync(manifestUrl, 'utf-8'));
  } catch (err) {
    log.debug('Cannot read package manifest', { manifest: manifestUrl.href, error: errorMessage(err) });
    return 'unknown';
  }

  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return 'unknown';
}

/** `AGENT_CATALOG_VERSION` overrides the manifest version (release builds stamp it). */
export function resolveCliVersion(env: NodeJS.ProcessEnv = process.env): string {
  return env.AGENT_CATALOG_VERSION?.trim() || readPackageVersion();
}

export const VERSION = resolveCliVersion();

export function createProgram(): Command {
  const program = new Command();

  program
    .name('agent-catalog')
    .description('Load agent catalogs and resolve phase-ordered workflow plans')
    .version(VERSION, '-V, --version', 'Output the version number');

  registerResolveCommands(program);
  registerCatalogCommands(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<Command> {
  const program = createProgram();
  await program.parseAsync(argv);
  return program;
}

/**
 * True when `scriptPath` (normally `process.argv[1]`) is this module, following
 * the symlink npm creates for the `agent-catalog` bin.
 */
export function isMainModule(
  scriptPath: string | undefined = process.argv[1],
  moduleUrl: string = import.meta.url
): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) {
    return false;
  }
  return pathToFileURL(fs.realpathSync(scriptPath)).href === moduleUrl;
}

if (isMainModule()) {
  runCli().catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exit(1);
  });
}
