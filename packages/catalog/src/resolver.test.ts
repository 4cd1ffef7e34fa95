import { describe, expect, it } from 'vitest';

import { PhaseGraph } from './phase-graph.js';
import { loadPhaseGraph } from './phases.js';
import { AgentRegistry } from './registry.js';
import { comparePlanOrder, resolveWorkflow, selectCandidate } from './resolver.js';
import type { AgentRecord, WorkflowRequest } from './types.js';

function buildGraph(): PhaseGraph {
  const graph = PhaseGraph.fromDefinition({
    edges: [
      ['architecture', 'styling'],
      ['styling', 'testing'],
      ['testing', 'security'],
    ],
  });
  graph.build();
  return graph;
}

function buildRegistry(graph: PhaseGraph, entries: Array<[string, string, string[]]>): AgentRegistry {
  const registry = new AgentRegistry();
  for (const [category, id, tags] of entries) {
    registry.register({
      id,
      name: id,
      description: `${id} agent`,
      category,
      stackTags: new Set(tags),
      phase: graph.phaseOf(category),
      sourcePath: `${category}/${id}.md`,
    });
  }
  return registry;
}

function request(overrides: Partial<WorkflowRequest>): WorkflowRequest {
  return { requiredCategories: new Set(), stackTags: new Set(), strict: false, ...overrides };
}

const ids = (agents: readonly AgentRecord[]): string[] => agents.map((agent) => agent.id);

describe('resolveWorkflow', () => {
  const graph = buildGraph();
  const registry = buildRegistry(graph, [
    ['architecture', 'react-architect', ['react']],
    ['architecture', 'vue-architect', ['vue']],
    ['styling', 'tailwind', ['css']],
    ['testing', 'vitest-expert', ['react', 'vue']],
  ]);

  it('orders selected agents by phase', () => {
    const plan = resolveWorkflow(
      request({ requiredCategories: new Set(['testing', 'architecture', 'styling']), stackTags: new Set(['vue']) }),
      registry,
      graph
    );

    expect(ids(plan.orderedAgents)).toEqual(['vue-architect', 'tailwind', 'vitest-expert']);
    expect(plan.orderedAgents.map((agent) => agent.phase)).toEqual([1, 2, 3]);
    expect(plan.unresolved).toEqual([]);
    expect(plan.issues).toEqual([]);
  });

  it('follows phase order rather than request order with the shipped graph', async () => {
    const shipped = await loadPhaseGraph();
    shipped.build();
    const catalog = buildRegistry(shipped, [
      ['testing', 'frontend-tester', []],
      ['components', 'react-component-designer', ['react']],
      ['architecture', 'react-architect', ['react']],
    ]);

    const plan = resolveWorkflow(
      request({ requiredCategories: new Set(['testing', 'components', 'architecture']), stackTags: new Set(['react']) }),
      catalog,
      shipped
    );

    expect(ids(plan.orderedAgents)).toEqual(['react-architect', 'react-component-designer', 'frontend-tester']);
    expect(plan.orderedAgents.map((agent) => agent.phase)).toEqual([1, 2, 6]);
  });

  it('falls back to the first agent by id when no tag matches', () => {
    const plan = resolveWorkflow(
      request({ requiredCategories: new Set(['architecture']), stackTags: new Set(['angular']) }),
      registry,
      graph
    );

    expect(ids(plan.orderedAgents)).toEqual(['react-architect']);
  });

  it('matches tags case-insensitively', () => {
    const plan = resolveWorkflow(
      request({ requiredCategories: new Set([' Architecture ']), stackTags: new Set(['VUE']) }),
      registry,
      graph
    );

    expect(ids(plan.orderedAgents)).toEqual(['vue-architect']);
  });

  it('reports unresolved categories as warnings', () => {
    const plan = resolveWorkflow(
      request({ requiredCategories: new Set(['security', 'architecture']) }),
      registry,
      graph
    );

    expect(ids(plan.orderedAgents)).toEqual(['react-architect']);
    expect(plan.unresolved).toEqual(['security']);
    expect(plan.issues).toEqual([
      {
        severity: 'warning',
        kind: 'UnresolvedCategoryError',
        message: 'No agent available for category "security"',
        context: 'category:security',
      },
    ]);
  });

  it('escalates unresolved categories to errors in strict mode', () => {
    const plan = resolveWorkflow(request({ requiredCategories: new Set(['security']), strict: true }), registry, graph);

    expect(plan.orderedAgents).toEqual([]);
    expect(plan.issues.map((issue) => issue.severity)).toEqual(['error']);
  });

  it('honours explicit picks over tag selection', () => {
    const plan = resolveWorkflow(
      request({
        requiredCategories: new Set(['architecture']),
        stackTags: new Set(['vue']),
        explicitPicks: new Map([['architecture', 'react-architect']]),
      }),
      registry,
      graph
    );

    expect(ids(plan.orderedAgents)).toEqual(['react-architect']);
    expect(plan.issues).toEqual([]);
  });

  it('matches picks written the way documents name their agents', () => {
    const plan = resolveWorkflow(
      request({
        requiredCategories: new Set(['architecture']),
        stackTags: new Set(['vue']),
        explicitPicks: new Map([['Architecture', 'React-Architect']]),
      }),
      registry,
      graph
    );

    expect(ids(plan.orderedAgents)).toEqual(['react-architect']);
    expect(plan.issues).toEqual([]);
  });

  it('matches multi-word category names in slug form', () => {
    const local = buildRegistry(graph, [['state-management', 'redux-expert', []]]);

    const plan = resolveWorkflow(request({ requiredCategories: new Set(['State Management']) }), local, graph);

    expect(ids(plan.orderedAgents)).toEqual(['redux-expert']);
    expect(plan.unresolved).toEqual([]);
  });

  it('adds the category of a pick that was not requested', () => {
    const plan = resolveWorkflow(
      request({
        requiredCategories: new Set(['architecture']),
        explicitPicks: new Map([['testing', 'vitest-expert']]),
      }),
      registry,
      graph
    );

    expect(ids(plan.orderedAgents)).toEqual(['react-architect', 'vitest-expert']);
  });

  it('falls back to tag selection when a pick does not exist', () => {
    const plan = resolveWorkflow(
      request({
        requiredCategories: new Set(['architecture']),
        stackTags: new Set(['vue']),
        explicitPicks: new Map([['architecture', 'ghost']]),
      }),
      registry,
      graph
    );

    expect(ids(plan.orderedAgents)).toEqual(['vue-architect']);
    expect(plan.issues).toEqual([
      {
        severity: 'error',
        kind: 'NotFoundError',
        message: 'No agent "ghost" in category "architecture"; falling back to stack tag selection',
        context: 'category:architecture',
      },
    ]);
  });

  it('sorts unranked categories after every ranked phase', () => {
    const local = buildRegistry(graph, [
      ['docs', 'writer', []],
      ['security', 'auditor', []],
    ]);

    const plan = resolveWorkflow(request({ requiredCategories: new Set(['docs', 'security']) }), local, graph);

    expect(ids(plan.orderedAgents)).toEqual(['auditor', 'writer']);
    expect(plan.orderedAgents.map((agent) => agent.phase)).toEqual([4, 5]);
  });

  it('returns an empty plan for an empty request', () => {
    const plan = resolveWorkflow(request({}), registry, graph);

    expect(plan).toEqual({ orderedAgents: [], unresolved: [], issues: [] });
    expect(Object.isFrozen(plan)).toBe(true);
  });

  it('requires a built phase graph', () => {
    const unbuilt = PhaseGraph.fromDefinition({ edges: [['a', 'b']] });

    expect(() => resolveWorkflow(request({}), registry, unbuilt)).toThrow('resolveWorkflow requires a built PhaseGraph');
  });

  it('does not modify the registry', () => {
    const before = registry.all();
    resolveWorkflow(request({ requiredCategories: new Set(['architecture', 'security']) }), registry, graph);

    expect(registry.all()).toEqual(before);
    expect(registry.size).toBe(4);
  });
});

describe('selectCandidate', () => {
  const graph = buildGraph();
  const candidates = buildRegistry(graph, [
    ['styling', 'a-plain', []],
    ['styling', 'b-sass', ['sass']],
    ['styling', 'c-sass', ['sass', 'css']],
  ]).listByCategory('styling');

  it('returns the first candidate with a matching tag', () => {
    expect(selectCandidate(candidates, new Set(['css', 'sass']))?.id).toBe('b-sass');
  });

  it('returns undefined when there are no candidates', () => {
    expect(selectCandidate([], new Set(['css']))).toBeUndefined();
  });
});

describe('comparePlanOrder', () => {
  it('orders by phase, category and id', () => {
    const make = (phase: number, category: string, id: string): AgentRecord => ({
      id,
      name: id,
      description: '',
      category,
      stackTags: new Set(),
      phase,
      sourcePath: `${id}.md`,
    });
    const sorted = [make(2, 'b', 'z'), make(2, 'a', 'y'), make(1, 'c', 'x'), make(2, 'a', 'w')].sort(comparePlanOrder);

    expect(ids(sorted)).toEqual(['x', 'w', 'y', 'z']);
  });
});
