import { NotFoundError, UnresolvedCategoryError } from './errors.js';
import { slugify } from './frontmatter.js';
import type { PhaseGraph } from './phase-graph.js';
import type { AgentRegistry } from './registry.js';
import type { AgentRecord, Issue, WorkflowPlan, WorkflowRequest } from './types.js';

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Plan order: phase, then category, then id. */
export function comparePlanOrder(a: AgentRecord, b: AgentRecord): number {
  return a.phase - b.phase || compareText(a.category, b.category) || compareText(a.id, b.id);
}

function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

function intersects(tags: ReadonlySet<string>, wanted: ReadonlySet<string>): boolean {
  for (const tag of tags) {
    if (wanted.has(tag)) return true;
  }
  return false;
}

/**
 * Pick the agent for one category: the first (by id) whose stack tags
 * intersect the request's, otherwise the first overall.
 */
export function selectCandidate(
  candidates: readonly AgentRecord[],
  stackTags: ReadonlySet<string>
): AgentRecord | undefined {
  return candidates.find((record) => intersects(record.stackTags, stackTags)) ?? candidates[0];
}

/**
 * Turn a request into an ordered plan. Pure: the registry and the graph are
 * only read, so concurrent callers can share them.
 *
 * Categories and picked ids are matched in their slug form, the same form
 * the loader stores.
 */
export function resolveWorkflow(
  request: WorkflowRequest,
  registry: AgentRegistry,
  phases: PhaseGraph
): WorkflowPlan {
  if (!phases.isBuilt) {
    throw new Error('resolveWorkflow requires a built PhaseGraph');
  }

  const wantedTags = new Set([...request.stackTags].map(normalizeKey));
  const picks = new Map<string, string>();
  for (const [category, id] of request.explicitPicks ?? []) {
    picks.set(slugify(category), slugify(id));
  }
  const categories = [...new Set([...[...request.requiredCategories].map(slugify), ...picks.keys()])]
    .filter((category) => category.length > 0)
    .sort(compareText);

  const selected: AgentRecord[] = [];
  const unresolved: string[] = [];
  const issues: Issue[] = [];

  for (const category of categories) {
    const pickedId = picks.get(category);
    if (pickedId !== undefined) {
      try {
        selected.push(registry.lookup(category, pickedId));
        continue;
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        issues.push({
          severity: 'error',
          kind: err.kind,
          message: `${err.message}; falling back to stack tag selection`,
          context: `category:${category}`,
        });
      }
    }

    const candidate = selectCandidate(registry.listByCategory(category), wantedTags);
    if (candidate) {
      selected.push(candidate);
      continue;
    }

    const unresolvedError = new UnresolvedCategoryError(category);
    unresolved.push(category);
    issues.push({
      severity: request.strict ? 'error' : 'warning',
      kind: unresolvedError.kind,
      message: unresolvedError.message,
      context: `category:${category}`,
    });
  }

  return Object.freeze({
    orderedAgents: Object.freeze(selected.sort(comparePlanOrder)),
    unresolved: Object.freeze(unresolved),
    issues: Object.freeze(issues),
  });
}
