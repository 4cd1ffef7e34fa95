import type { IssueKind } from './types.js';

/**
 * Base class for every error the catalog raises. `kind` is the value that
 * appears in issues and in the CLI's JSON error object.
 */
export abstract class CatalogError extends Error {
  abstract readonly kind: IssueKind;
}

/** A document's metadata block is missing, malformed or lacks a required field. */
export class ParseError extends CatalogError {
  readonly kind = 'ParseError';

  constructor(
    public readonly filePath: string,
    public readonly issue: string
  ) {
    super(`${filePath}: ${issue}`);
    this.name = 'ParseError';
  }
}

export class DuplicateNameError extends CatalogError {
  readonly kind = 'DuplicateNameError';

  constructor(
    public readonly category: string,
    public readonly id: string,
    public readonly existingPath: string,
    public readonly rejectedPath: string
  ) {
    super(
      `Agent "${id}" in category "${category}" is already registered from ${existingPath}; ` +
        `rejected ${rejectedPath}`
    );
    this.name = 'DuplicateNameError';
  }
}

export class NotFoundError extends CatalogError {
  readonly kind = 'NotFoundError';

  constructor(
    public readonly category: string,
    public readonly id: string
  ) {
    super(`No agent "${id}" in category "${category}"`);
    this.name = 'NotFoundError';
  }
}

/** The phase precedence graph contains a cycle. `cycle` starts and ends on the same category. */
export class CycleError extends CatalogError {
  readonly kind = 'CycleError';

  constructor(public readonly cycle: readonly string[]) {
    super(`Phase precedence contains a cycle: ${cycle.join(' -> ')}`);
    this.name = 'CycleError';
  }
}

export class UnresolvedCategoryError extends CatalogError {
  readonly kind = 'UnresolvedCategoryError';

  constructor(public readonly category: string) {
    super(`No agent available for category "${category}"`);
    this.name = 'UnresolvedCategoryError';
  }
}

/** The catalog root (or a phase file) cannot be read. */
export class CatalogIOError extends CatalogError {
  readonly kind = 'IOError';

  constructor(
    public readonly targetPath: string,
    public readonly reason: string
  ) {
    super(`Cannot read ${targetPath}: ${reason}`);
    this.name = 'CatalogIOError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Errno code of a Node.js system error, if any. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
