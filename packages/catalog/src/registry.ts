import { DuplicateNameError, NotFoundError } from './errors.js';
import type { AgentRecord, Issue } from './types.js';

function compareIds(a: AgentRecord, b: AgentRecord): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * In-memory store of agent records keyed by (category, id).
 *
 * Registration is all-or-nothing: a rejected record leaves the registry
 * exactly as it was, and the first record registered under a key is kept.
 */
export class AgentRegistry {
  private readonly byCategory = new Map<string, Map<string, AgentRecord>>();
  private count = 0;

  get size(): number {
    return this.count;
  }

  /** @throws DuplicateNameError when (category, id) is already taken. */
  register(record: AgentRecord): void {
    const existing = this.byCategory.get(record.category)?.get(record.id);
    if (existing) {
      throw new DuplicateNameError(record.category, record.id, existing.sourcePath, record.sourcePath);
    }

    let bucket = this.byCategory.get(record.category);
    if (!bucket) {
      bucket = new Map();
      this.byCategory.set(record.category, bucket);
    }
    bucket.set(record.id, Object.freeze({ ...record, stackTags: new Set(record.stackTags) }));
    this.count++;
  }

  /**
   * Register a record, reporting a duplicate as an error-severity issue
   * instead of throwing.
   */
  tryRegister(record: AgentRecord): Issue | undefined {
    try {
      this.register(record);
      return undefined;
    } catch (err) {
      if (err instanceof DuplicateNameError) {
        return {
          severity: 'error',
          kind: err.kind,
          message: err.message,
          context: `file:${record.sourcePath}`,
        };
      }
      throw err;
    }
  }

  /** @throws NotFoundError */
  lookup(category: string, id: string): AgentRecord {
    const record = this.byCategory.get(category)?.get(id);
    if (!record) {
      throw new NotFoundError(category, id);
    }
    return record;
  }

  has(category: string, id: string): boolean {
    return this.byCategory.get(category)?.has(id) ?? false;
  }

  /** Records of one category, sorted by id ascending. */
  listByCategory(category: string): AgentRecord[] {
    const bucket = this.byCategory.get(category);
    if (!bucket) return [];
    return [...bucket.values()].sort(compareIds);
  }

  /** Categories that hold at least one record, sorted. */
  categories(): string[] {
    return [...this.byCategory.keys()].sort();
  }

  /** Every record, sorted by category then id. */
  all(): AgentRecord[] {
    return this.categories().flatMap((category) => this.listByCategory(category));
  }
}
