import { CatalogError, errorMessage, type WorkflowPlan } from '@agent-catalog/core';

export interface PlanJson {
  agents: Array<{ id: string; name: string; category: string; phase: number }>;
  unresolved: string[];
  issues: Array<{ severity: string; kind: string; message: string }>;
}

export function planToJson(plan: WorkflowPlan): PlanJson {
  return {
    agents: plan.orderedAgents.map((agent) => ({
      id: agent.id,
      name: agent.name,
      category: agent.category,
      phase: agent.phase,
    })),
    unresolved: [...plan.unresolved],
    issues: plan.issues.map((issue) => ({
      severity: issue.severity,
      kind: issue.kind,
      message: issue.message,
    })),
  };
}

/** The plan as the single JSON document written to stdout. */
export function formatPlanJson(plan: WorkflowPlan): string {
  return `${JSON.stringify(planToJson(plan), null, 2)}\n`;
}

/** Kind reported for an error that stopped the run. */
export function fatalKind(err: unknown): string {
  if (err instanceof CatalogError) return err.kind;
  if (err instanceof Error && 'kind' in err && typeof err.kind === 'string') return err.kind;
  return 'Error';
}

export function formatFatalJson(err: unknown): string {
  return `${JSON.stringify({ error: { kind: fatalKind(err), message: errorMessage(err) } }, null, 2)}\n`;
}
