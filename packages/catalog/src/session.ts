/**
 * Resolution Session
 *
 * Drives one invocation end to end:
 *
 *   Idle → Loading → GraphBuilt → Resolving → Resolved
 *
 * `Failed` is entered when the catalog root or the phase definition cannot
 * be read, or when the phase graph has a cycle. Every other problem is
 * collected as an issue and the session still reaches `Resolved`.
 */

import { loadCatalog, type CatalogLoadStats } from './loader.js';
import { createLogger, type Logger } from './logger.js';
import type { PhaseGraph } from './phase-graph.js';
import { loadPhaseGraph } from './phases.js';
import type { AgentRegistry } from './registry.js';
import { resolveWorkflow } from './resolver.js';
import type { Issue, WorkflowPlan, WorkflowRequest } from './types.js';

export type SessionState = 'Idle' | 'Loading' | 'GraphBuilt' | 'Resolving' | 'Resolved' | 'Failed';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  Idle: ['Loading'],
  Loading: ['GraphBuilt', 'Failed'],
  GraphBuilt: ['Resolving'],
  Resolving: ['Resolved', 'Failed'],
  Resolved: [],
  Failed: [],
};

export interface SessionOptions {
  rootDir: string;
  /** Phase definition file; the shipped default when omitted. */
  phasesFile?: string;
  concurrency?: number;
  /** Abandon loading after this many milliseconds and continue with a partial catalog. */
  loadTimeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  readFile?: (absolutePath: string) => Promise<string>;
  loadPhases?: (phasesFile?: string) => Promise<PhaseGraph>;
}

export interface PreparedCatalog {
  registry: AgentRegistry;
  phases: PhaseGraph;
  issues: Issue[];
  stats: CatalogLoadStats;
  truncated: boolean;
}

export class ResolutionSession {
  private current: SessionState = 'Idle';
  private readonly visited: SessionState[] = ['Idle'];
  private prepared: PreparedCatalog | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: SessionOptions) {
    this.logger = options.logger ?? createLogger('session');
  }

  get state(): SessionState {
    return this.current;
  }

  /** States entered so far, in order. */
  get history(): readonly SessionState[] {
    return this.visited;
  }

  /**
   * Read and build the phase graph, then load the catalog.
   * @throws CatalogIOError, ParseError (phase file) or CycleError; the session is then `Failed`.
   */
  async prepare(): Promise<PreparedCatalog> {
    this.transition('Loading');
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    this.options.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (this.options.signal?.aborted) controller.abort();
    const timer =
      this.options.loadTimeoutMs !== undefined
        ? setTimeout(() => controller.abort(), this.options.loadTimeoutMs)
        : undefined;

    try {
      const phases = await (this.options.loadPhases ?? loadPhaseGraph)(this.options.phasesFile);
      const levels = phases.build();
      this.logger.debug('Phase graph built', { phases: levels.length });

      const loaded = await loadCatalog(this.options.rootDir, {
        phases,
        concurrency: this.options.concurrency,
        signal: controller.signal,
        logger: this.logger.child('loader'),
        readFile: this.options.readFile,
      });

      this.prepared = { ...loaded, phases };
      this.transition('GraphBuilt');
      return this.prepared;
    } catch (err) {
      this.transition('Failed');
      throw err;
    } finally {
      if (timer) clearTimeout(timer);
      this.options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /** Resolve a request against the prepared catalog. Loading issues come first in the plan. */
  resolve(request: WorkflowRequest): WorkflowPlan {
    const prepared = this.prepared;
    if (!prepared || this.current !== 'GraphBuilt') {
      throw new Error(`Cannot resolve from state ${this.current}; call prepare() first`);
    }

    this.transition('Resolving');
    try {
      const plan = resolveWorkflow(request, prepared.registry, prepared.phases);
      this.transition('Resolved');
      return Object.freeze({ ...plan, issues: Object.freeze([...prepared.issues, ...plan.issues]) });
    } catch (err) {
      this.transition('Failed');
      throw err;
    }
  }

  private transition(next: SessionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid session transition ${this.current} -> ${next}`);
    }
    this.logger.debug('Session state changed', { from: this.current, to: next });
    this.current = next;
    this.visited.push(next);
  }
}
