import { describe, expect, it } from 'vitest';

import { CycleError } from './errors.js';
import { PhaseGraph } from './phase-graph.js';

describe('PhaseGraph', () => {
  it('assigns longest-path phase ordinals', () => {
    const graph = PhaseGraph.fromDefinition({
      categories: ['docs'],
      edges: [
        ['a', 'b'],
        ['b', 'c'],
        ['a', 'c'],
      ],
    });

    expect(graph.build()).toEqual([
      { phase: 1, categories: ['a', 'docs'] },
      { phase: 2, categories: ['b'] },
      { phase: 3, categories: ['c'] },
    ]);
    expect(graph.phaseOf('c')).toBe(3);
  });

  it('places unknown categories after every ranked phase', () => {
    const graph = PhaseGraph.fromDefinition({ edges: [['architecture', 'testing']] });
    graph.build();

    expect(graph.unrankedPhase).toBe(3);
    expect(graph.phaseOf('security')).toBe(3);
    expect(graph.isRanked('security')).toBe(false);
    expect(graph.isRanked('testing')).toBe(true);
  });

  it('reports the categories on a cycle', () => {
    const graph = PhaseGraph.fromDefinition({
      edges: [
        ['a', 'b'],
        ['b', 'c'],
        ['c', 'a'],
      ],
    });

    expect(() => graph.build()).toThrow(CycleError);
    expect(() => graph.build()).toThrow('Phase precedence contains a cycle: a -> b -> c -> a');
    expect(graph.isBuilt).toBe(false);
  });

  it('treats a self edge as a cycle', () => {
    const graph = new PhaseGraph();
    graph.addPrecedence('styling', 'styling');

    try {
      graph.build();
      expect.unreachable('build() should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(CycleError);
      if (err instanceof CycleError) {
        expect(err.cycle).toEqual(['styling', 'styling']);
      }
    }
  });

  it('normalizes category names', () => {
    const graph = new PhaseGraph();
    graph.addPrecedence(' Architecture ', 'TESTING');

    graph.addCategory('State Management');

    expect(graph.categories()).toEqual(['architecture', 'state-management', 'testing']);
    expect(graph.edges()).toEqual([['architecture', 'testing']]);
    expect(() => graph.addCategory('  ')).toThrow('Category name must not be empty');
  });

  it('is read-only once built', () => {
    const graph = PhaseGraph.fromDefinition({ edges: [['a', 'b']] });
    const levels = graph.build();

    expect(graph.build()).toBe(levels);
    expect(() => graph.addPrecedence('b', 'c')).toThrow('PhaseGraph is read-only after build()');
  });

  it('requires build() before lookups', () => {
    const graph = PhaseGraph.fromDefinition({ edges: [['a', 'b']] });

    expect(() => graph.phaseOf('a')).toThrow('PhaseGraph has not been built; call build() first');
    expect(() => graph.unrankedPhase).toThrow('PhaseGraph has not been built; call build() first');
  });

  it('round-trips through its definition', () => {
    const graph = PhaseGraph.fromDefinition({
      categories: ['z'],
      edges: [
        ['b', 'c'],
        ['a', 'c'],
      ],
    });

    expect(graph.toDefinition()).toEqual({
      categories: ['a', 'b', 'c', 'z'],
      edges: [
        ['a', 'c'],
        ['b', 'c'],
      ],
    });
    expect(PhaseGraph.fromDefinition(graph.toDefinition()).build()).toEqual(graph.build());
  });
});
