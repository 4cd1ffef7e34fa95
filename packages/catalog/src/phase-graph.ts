import { CycleError } from './errors.js';
import { slugify } from './frontmatter.js';
import type { PhaseGraphDefinition, PhaseLevel } from './types.js';

/**
 * Category precedence graph.
 *
 * An edge `a -> b` means every agent in category `a` is planned before any
 * agent in category `b`. `build()` checks the graph for cycles and assigns
 * each category a 1-based phase ordinal: categories without predecessors get
 * phase 1, every other category one more than its latest predecessor.
 * Categories the graph does not know share the unranked phase, which sorts
 * after every ranked one.
 */
export class PhaseGraph {
  private readonly nodes = new Set<string>();
  private readonly successors = new Map<string, Set<string>>();
  private ranks: Map<string, number> | null = null;
  private levels: PhaseLevel[] = [];

  static fromDefinition(definition: PhaseGraphDefinition): PhaseGraph {
    const graph = new PhaseGraph();
    for (const category of definition.categories ?? []) {
      graph.addCategory(category);
    }
    for (const [from, to] of definition.edges) {
      graph.addPrecedence(from, to);
    }
    return graph;
  }

  get isBuilt(): boolean {
    return this.ranks !== null;
  }

  addCategory(category: string): void {
    this.assertMutable();
    this.nodes.add(normalizeCategory(category));
  }

  /** Declare that `before`'s phase comes ahead of `after`'s phase. */
  addPrecedence(before: string, after: string): void {
    this.assertMutable();
    const from = normalizeCategory(before);
    const to = normalizeCategory(after);
    this.nodes.add(from);
    this.nodes.add(to);

    let targets = this.successors.get(from);
    if (!targets) {
      targets = new Set();
      this.successors.set(from, targets);
    }
    targets.add(to);
  }

  /**
   * Validate the graph and compute phase ordinals. Later calls return the
   * same levels.
   * @throws CycleError naming the categories on the first cycle found.
   */
  build(): readonly PhaseLevel[] {
    if (this.ranks) return this.levels;

    this.detectCycles();

    const ranks = new Map<string, number>();
    for (const category of this.topologicalOrder()) {
      const rank = ranks.get(category) ?? 1;
      ranks.set(category, rank);
      for (const next of this.successorsOf(category)) {
        ranks.set(next, Math.max(ranks.get(next) ?? 1, rank + 1));
      }
    }

    const grouped = new Map<number, string[]>();
    for (const [category, rank] of ranks) {
      const bucket = grouped.get(rank) ?? [];
      bucket.push(category);
      grouped.set(rank, bucket);
    }

    this.levels = [...grouped.entries()]
      .sort(([a], [b]) => a - b)
      .map(([phase, categories]) => ({ phase, categories: categories.sort() }));
    this.ranks = ranks;
    return this.levels;
  }

  /** Phase ordinal of a category; unknown categories get `unrankedPhase`. */
  phaseOf(category: string): number {
    return this.builtRanks().get(category) ?? this.unrankedPhase;
  }

  isRanked(category: string): boolean {
    return this.builtRanks().has(category);
  }

  /** Sentinel ordinal that sorts after every ranked phase. */
  get unrankedPhase(): number {
    this.builtRanks();
    // Ordinals are contiguous from 1, so the level count is the highest rank.
    return this.levels.length + 1;
  }

  /** Every declared category, sorted. */
  categories(): string[] {
    return [...this.nodes].sort();
  }

  /** Every precedence edge, sorted by source then target. */
  edges(): Array<[string, string]> {
    const result: Array<[string, string]> = [];
    for (const from of [...this.successors.keys()].sort()) {
      for (const to of this.successorsOf(from)) {
        result.push([from, to]);
      }
    }
    return result;
  }

  toDefinition(): PhaseGraphDefinition {
    return { categories: this.categories(), edges: this.edges() };
  }

  private successorsOf(category: string): string[] {
    return [...(this.successors.get(category) ?? [])].sort();
  }

  private detectCycles(): void {
    const visited = new Set<string>();
    const inStack = new Set<string>();
    const stack: string[] = [];

    const dfs = (node: string): void => {
      if (inStack.has(node)) {
        throw new CycleError([...stack.slice(stack.indexOf(node)), node]);
      }
      if (visited.has(node)) return;
      inStack.add(node);
      stack.push(node);
      for (const next of this.successorsOf(node)) {
        dfs(next);
      }
      stack.pop();
      inStack.delete(node);
      visited.add(node);
    };

    for (const node of this.categories()) {
      dfs(node);
    }
  }

  /** Kahn's algorithm; ties resolved alphabetically. Assumes no cycles. */
  private topologicalOrder(): string[] {
    const inDegree = new Map<string, number>();
    for (const node of this.nodes) inDegree.set(node, 0);
    for (const targets of this.successors.values()) {
      for (const to of targets) inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
    }

    const queue = this.categories().filter((node) => inDegree.get(node) === 0);
    const order: string[] = [];
    while (queue.length > 0) {
      queue.sort();
      const node = queue.shift();
      if (node === undefined) break;
      order.push(node);
      for (const next of this.successorsOf(node)) {
        const degree = (inDegree.get(next) ?? 1) - 1;
        inDegree.set(next, degree);
        if (degree === 0) queue.push(next);
      }
    }
    return order;
  }

  private builtRanks(): Map<string, number> {
    if (!this.ranks) {
      throw new Error('PhaseGraph has not been built; call build() first');
    }
    return this.ranks;
  }

  private assertMutable(): void {
    if (this.ranks) {
      throw new Error('PhaseGraph is read-only after build()');
    }
  }
}

function normalizeCategory(category: string): string {
  const normalized = slugify(category);
  if (!normalized) {
    throw new Error('Category name must not be empty');
  }
  return normalized;
}
