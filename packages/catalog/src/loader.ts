/**
 * Catalog Loader
 *
 * Walks a directory of agent documents, parses each document's metadata
 * block and registers one record per valid document. Loading is best-effort:
 * bad documents become issues and are skipped, only an unreadable root
 * directory aborts the load.
 *
 * Documents are parsed by a bounded pool of workers. Results are handed to a
 * single writer that registers them in source-path order, so which of two
 * duplicates wins never depends on which parse finished first.
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { CatalogIOError, ParseError, errorMessage } from './errors.js';
import { parseAgentMetadata } from './frontmatter.js';
import { createLogger, type Logger } from './logger.js';
import type { PhaseGraph } from './phase-graph.js';
import { AgentRegistry } from './registry.js';
import type { AgentRecord, Issue } from './types.js';

const DOCUMENT_EXTENSION = '.md';
const SKIPPED_DIRECTORIES = new Set(['node_modules']);
const SKIPPED_FILES = new Set(['readme.md']);

export interface LoadCatalogOptions {
  /** Built phase graph used to assign each record's phase. */
  phases: PhaseGraph;
  /** Maximum parses in flight. Defaults to the number of available processors. */
  concurrency?: number;
  /** Abort to stop loading early and keep what has been registered so far. */
  signal?: AbortSignal;
  logger?: Logger;
  readFile?: (absolutePath: string) => Promise<string>;
}

export interface CatalogLoadStats {
  /** Documents found under the root. */
  scanned: number;
  registered: number;
  /** Documents processed but not registered (parse, read or duplicate failures). */
  skipped: number;
}

export interface CatalogLoadResult {
  registry: AgentRegistry;
  issues: Issue[];
  stats: CatalogLoadStats;
  /** True when the signal aborted the load before every document was processed. */
  truncated: boolean;
}

type ParseOutcome = { record: AgentRecord } | { issue: Issue };

const ABORTED = Symbol('aborted');

export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Load every agent document under `rootDir`.
 * @throws CatalogIOError when `rootDir` is missing, not a directory or unreadable.
 */
export async function loadCatalog(rootDir: string, options: LoadCatalogOptions): Promise<CatalogLoadResult> {
  const logger = options.logger ?? createLogger('loader');
  const readFile = options.readFile ?? ((file: string) => fs.readFile(file, 'utf-8'));
  const root = path.resolve(rootDir);
  const { phases, signal } = options;

  await assertReadableDirectory(root);

  const issues: Issue[] = [];
  const files = await collectDocuments(root, issues, logger);
  const registry = new AgentRegistry();
  const warnedCategories = new Set<string>();
  logger.debug('Found agent documents', { root, count: files.length });

  // ── Single writer ──────────────────────────────────────────────────────
  const outcomes: Array<ParseOutcome | undefined> = new Array(files.length);
  let written = 0;
  let skipped = 0;

  const flush = (): void => {
    while (written < files.length) {
      const outcome = outcomes[written];
      if (outcome === undefined) return;
      outcomes[written] = undefined;
      written++;

      if ('issue' in outcome) {
        issues.push(outcome.issue);
        skipped++;
        continue;
      }

      const { record } = outcome;
      if (!phases.isRanked(record.category) && !warnedCategories.has(record.category)) {
        warnedCategories.add(record.category);
        issues.push({
          severity: 'warning',
          kind: 'UnknownCategory',
          message: `Category "${record.category}" is not in the phase graph; its agents are placed after every ranked phase`,
          context: `category:${record.category}`,
        });
      }

      const duplicate = registry.tryRegister(record);
      if (duplicate) {
        logger.warn('Rejected duplicate agent', { category: record.category, id: record.id, file: record.sourcePath });
        issues.push(duplicate);
        skipped++;
      }
    }
  };

  // ── Workers ────────────────────────────────────────────────────────────
  let next = 0;

  const parseOne = async (relativePath: string): Promise<ParseOutcome | typeof ABORTED> => {
    let content: string;
    try {
      const read = await unlessAborted(readFile(path.join(root, relativePath)), signal);
      if (read === ABORTED) return ABORTED;
      content = read;
    } catch (err) {
      logger.warn('Cannot read agent document', { file: relativePath, error: errorMessage(err) });
      return {
        issue: {
          severity: 'warning',
          kind: 'IOError',
          message: `Cannot read ${relativePath}: ${errorMessage(err)}`,
          context: `file:${relativePath}`,
        },
      };
    }

    try {
      const metadata = parseAgentMetadata(content, relativePath);
      return {
        record: {
          ...metadata,
          stackTags: new Set(metadata.stackTags),
          phase: phases.phaseOf(metadata.category),
          sourcePath: relativePath,
        },
      };
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      logger.debug('Skipping agent document', { file: relativePath, reason: err.issue });
      return {
        issue: { severity: 'warning', kind: err.kind, message: err.message, context: `file:${relativePath}` },
      };
    }
  };

  const worker = async (): Promise<void> => {
    while (next < files.length && !signal?.aborted) {
      const index = next++;
      const outcome = await parseOne(files[index]);
      if (outcome === ABORTED || signal?.aborted) return;
      outcomes[index] = outcome;
      flush();
    }
  };

  const poolSize = Math.min(files.length, Math.max(1, options.concurrency ?? defaultConcurrency()));
  await Promise.all(Array.from({ length: poolSize }, () => worker()));

  const truncated = written < files.length;
  if (truncated) {
    logger.warn('Catalog loading cancelled', { processed: written, total: files.length });
    issues.push({
      severity: 'warning',
      kind: 'LoadTruncated',
      message: `Catalog loading was cancelled after ${written} of ${files.length} documents; the plan uses a partial catalog`,
      context: `dir:${rootDir}`,
    });
  }

  const stats: CatalogLoadStats = { scanned: files.length, registered: registry.size, skipped };
  logger.info('Catalog loaded', { root, ...stats });
  return { registry, issues, stats, truncated };
}

async function assertReadableDirectory(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(root)).isDirectory();
  } catch (err) {
    throw new CatalogIOError(root, errorMessage(err));
  }
  if (!isDirectory) {
    throw new CatalogIOError(root, 'not a directory');
  }
}

/**
 * Relative paths (with `/` separators) of every agent document under
 * `root`, sorted. Unreadable sub-directories become warnings.
 */
async function collectDocuments(root: string, issues: Issue[], logger: Logger): Promise<string[]> {
  const found: string[] = [];

  const visit = async (dir: string): Promise<void> => {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === root) {
        throw new CatalogIOError(root, errorMessage(err));
      }
      const relativeDir = toPosix(path.relative(root, dir));
      logger.warn('Cannot read directory', { dir: relativeDir, error: errorMessage(err) });
      issues.push({
        severity: 'warning',
        kind: 'IOError',
        message: `Cannot read directory ${relativeDir}: ${errorMessage(err)}`,
        context: `dir:${relativeDir}`,
      });
      return;
    }

    for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
      if (entry.name.startsWith('.')) continue;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) await visit(fullPath);
      } else if (entry.isFile() && isAgentDocument(entry.name)) {
        found.push(toPosix(path.relative(root, fullPath)));
      }
    }
  };

  await visit(root);
  return found.sort();
}

export function isAgentDocument(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return lower.endsWith(DOCUMENT_EXTENSION) && !SKIPPED_FILES.has(lower);
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * Settle with `work`, or with ABORTED as soon as `signal` aborts. The abort
 * listener lives only as long as `work` is pending.
 */
function unlessAborted<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T | typeof ABORTED> {
  if (!signal) return work;
  if (signal.aborted) return Promise.resolve(ABORTED);

  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
