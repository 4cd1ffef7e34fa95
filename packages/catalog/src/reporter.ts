/**
 * Validation reporting
 *
 * Classifies the issues collected while loading and resolving, renders them
 * for humans, and decides the process exit code.
 */

import { CatalogIOError } from './errors.js';
import type { Issue, IssueKind, IssueSeverity } from './types.js';

export const EXIT_OK = 0;
export const EXIT_VALIDATION_FAILURE = 1;
export const EXIT_IO_FAILURE = 2;

export interface IssueSummary {
  hasErrors: boolean;
  report: string;
  exitCode: number;
  counts: Record<IssueSeverity, number>;
  byKind: Partial<Record<IssueKind, number>>;
}

const SEVERITY_ORDER: Record<IssueSeverity, number> = { error: 0, warning: 1 };
const SEVERITY_LABEL: Record<IssueSeverity, string> = { error: 'ERROR', warning: 'WARN' };

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Errors first, then by kind, context and message. Stable for equal issues. */
export function sortIssues(issues: readonly Issue[]): Issue[] {
  return [...issues].sort(
    (a, b) =>
      SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity] ||
      compareText(a.kind, b.kind) ||
      compareText(a.context, b.context) ||
      compareText(a.message, b.message)
  );
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

export function summarizeIssues(issues: readonly Issue[]): IssueSummary {
  const counts: Record<IssueSeverity, number> = { error: 0, warning: 0 };
  const byKind: Partial<Record<IssueKind, number>> = {};
  for (const issue of issues) {
    counts[issue.severity]++;
    byKind[issue.kind] = (byKind[issue.kind] ?? 0) + 1;
  }

  const hasErrors = counts.error > 0;
  return {
    hasErrors,
    report: formatIssueReport(issues),
    exitCode: hasErrors ? EXIT_VALIDATION_FAILURE : EXIT_OK,
    counts,
    byKind,
  };
}

/**
 * Render issues grouped by severity then kind:
 *
 *   ERROR DuplicateNameError (1)
 *     Agent "x" in category "styling" is already registered ... [file:b.md]
 *
 *   1 error, 0 warnings
 */
export function formatIssueReport(issues: readonly Issue[]): string {
  if (issues.length === 0) {
    return 'No issues found';
  }

  const lines: string[] = [];
  const sorted = sortIssues(issues);
  let index = 0;
  while (index < sorted.length) {
    const { severity, kind } = sorted[index];
    const group: Issue[] = [];
    while (index < sorted.length && sorted[index].severity === severity && sorted[index].kind === kind) {
      group.push(sorted[index]);
      index++;
    }

    lines.push(`${SEVERITY_LABEL[severity]} ${kind} (${group.length})`);
    for (const issue of group) {
      const where = issue.context ? ` [${issue.context}]` : '';
      lines.push(`  ${issue.message}${where}`);
    }
    lines.push('');
  }

  const errors = issues.filter((issue) => issue.severity === 'error').length;
  lines.push(`${plural(errors, 'error')}, ${plural(issues.length - errors, 'warning')}`);
  return lines.join('\n');
}

/** Exit code for an error that aborted the run before a plan existed (cycles, bad input). */
export function exitCodeForFatal(err: unknown): number {
  if (err instanceof CatalogIOError) return EXIT_IO_FAILURE;
  return EXIT_VALIDATION_FAILURE;
}
