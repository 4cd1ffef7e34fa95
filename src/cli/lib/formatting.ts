export class UsageError extends Error {
  readonly kind = 'UsageError';

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Split a comma-separated flag value, dropping blanks and duplicates. */
export function parseList(input?: string): string[] {
  if (!input) return [];
  const items = String(input)
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return [...new Set(items)];
}

/** Parse repeated `--pick category=id` values into a map. */
export function parsePicks(values: readonly string[]): Map<string, string> {
  const picks = new Map<string, string>();
  for (const value of values) {
    const separator = value.indexOf('=');
    const category = separator > 0 ? value.slice(0, separator).trim() : '';
    const id = separator > 0 ? value.slice(separator + 1).trim() : '';
    if (!category || !id) {
      throw new UsageError(`Invalid --pick "${value}": expected <category>=<id>`);
    }
    if (picks.has(category) && picks.get(category) !== id) {
      throw new UsageError(`Conflicting --pick values for category "${category}"`);
    }
    picks.set(category, id);
  }
  return picks;
}

export function parsePositiveInt(input: string | undefined, flag: string): number | undefined {
  if (input === undefined) return undefined;
  const trimmed = String(input).trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new UsageError(`Invalid ${flag} "${input}": expected a positive integer`);
  }
  return Number(trimmed);
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export interface TableColumn {
  value: string;
  width?: number;
}

export function formatTableRow(columns: TableColumn[]): string {
  return columns
    .map((column) => (typeof column.width === 'number' ? column.value.padEnd(column.width) : column.value))
    .join(' ');
}
