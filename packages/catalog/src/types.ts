/**
 * Agent Catalog Types
 *
 * Shared types for catalog records, workflow requests/plans and the issues
 * collected while loading and resolving.
 */

// ── Catalog records ─────────────────────────────────────────────────────────

/** Category assigned to documents that do not declare one. */
export const DEFAULT_CATEGORY = 'other';

/** One catalog entry derived from a document's front-matter. */
export interface AgentRecord {
  /** Unique within `category`. Front-matter `id`, or a slug of `name`. */
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly category: string;
  /** Lower-cased stack labels used for tag matching. */
  readonly stackTags: ReadonlySet<string>;
  /** Phase ordinal of `category` (ranked, or the unranked sentinel). */
  readonly phase: number;
  /** Path of the source document, relative to the catalog root. */
  readonly sourcePath: string;
  /** Target model named by the document, if any. */
  readonly model?: string;
}

// ── Issues ──────────────────────────────────────────────────────────────────

export type IssueSeverity = 'warning' | 'error';

export type IssueKind =
  | 'ParseError'
  | 'DuplicateNameError'
  | 'NotFoundError'
  | 'CycleError'
  | 'UnresolvedCategoryError'
  | 'IOError'
  | 'LoadTruncated'
  | 'UnknownCategory';

export interface Issue {
  severity: IssueSeverity;
  kind: IssueKind;
  message: string;
  /** Where the issue arose, e.g. "file:react/architect.md" or "category:testing". */
  context: string;
}

// ── Workflow resolution ─────────────────────────────────────────────────────

export interface WorkflowRequest {
  requiredCategories: ReadonlySet<string>;
  /** Stack tags used to prefer one candidate over another within a category. */
  stackTags: ReadonlySet<string>;
  /** Category → agent id overrides. */
  explicitPicks?: ReadonlyMap<string, string>;
  /** Escalate unresolved categories from warnings to errors. */
  strict: boolean;
}

export interface WorkflowPlan {
  readonly orderedAgents: readonly AgentRecord[];
  /** Requested categories with no selected agent, sorted. */
  readonly unresolved: readonly string[];
  readonly issues: readonly Issue[];
}

// ── Phase graph ─────────────────────────────────────────────────────────────

/** Categories sharing one phase ordinal. */
export interface PhaseLevel {
  phase: number;
  categories: string[];
}

/** Serializable phase graph, as stored in phases/*.yaml. */
export interface PhaseGraphDefinition {
  categories?: string[];
  edges: Array<[string, string]>;
}
