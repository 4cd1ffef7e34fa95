/**
 * Front-matter parsing for agent documents.
 *
 * A document starts with a YAML block fenced by `---` lines:
 *
 *   ---
 *   name: react-architect
 *   description: Designs React application structure
 *   category: architecture
 *   stackTags: [react, typescript]
 *   ---
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ParseError, errorMessage } from './errors.js';
import { DEFAULT_CATEGORY } from './types.js';

const FENCE = '---';
const YAML_DOCUMENT_END = '...';

function requiredText(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} must not be empty`);
}

function optionalText(field: string) {
  return z
    .string({ invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} must not be empty`)
    .optional();
}

const tagListSchema = z
  .union([z.string(), z.array(z.union([z.string(), z.number()]))], {
    errorMap: () => ({ message: 'tags must be a list or a comma-separated string' }),
  })
  .optional();

const metadataSchema = z
  .object({
    id: optionalText('id'),
    name: requiredText('name'),
    description: requiredText('description'),
    category: optionalText('category'),
    model: optionalText('model'),
    stackTags: tagListSchema,
    'stack-tags': tagListSchema,
    tags: tagListSchema,
  })
  .passthrough();

/** Metadata consumed from a document, with defaults applied. */
export interface AgentMetadata {
  id: string;
  name: string;
  description: string;
  category: string;
  /** Sorted, de-duplicated, lower-cased. */
  stackTags: string[];
  model?: string;
}

/**
 * Return the raw text between the opening and closing fences, or null when
 * the document has no front-matter block.
 */
export function extractFrontmatter(content: string): string | null {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  if (lines.length === 0 || lines[0].trim() !== FENCE) {
    return null;
  }

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === FENCE || line === YAML_DOCUMENT_END) {
      return lines.slice(1, i).join('\n');
    }
  }
  return null;
}

/** Key form shared by ids and categories: "State Management" becomes "state-management". */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function normalizeTags(...sources: Array<string | Array<string | number> | undefined>): string[] {
  const tags = new Set<string>();
  for (const source of sources) {
    if (source === undefined) continue;
    const items = typeof source === 'string' ? source.split(',') : source.map(String);
    for (const item of items) {
      const tag = item.trim().toLowerCase();
      if (tag) tags.add(tag);
    }
  }
  return [...tags].sort();
}

/**
 * Parse a document's metadata block.
 * @throws ParseError when the block is missing, malformed or lacks a required field.
 */
export function parseAgentMetadata(content: string, filePath: string): AgentMetadata {
  const block = extractFrontmatter(content);
  if (block === null) {
    throw new ParseError(filePath, 'missing front-matter metadata block');
  }

  let raw: unknown;
  try {
    raw = parseYaml(block);
  } catch (err) {
    throw new ParseError(filePath, `invalid YAML in metadata block: ${firstLine(errorMessage(err))}`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ParseError(filePath, 'metadata block must be a YAML mapping');
  }

  const result = metadataSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => issue.message);
    throw new ParseError(filePath, `invalid metadata: ${problems.join('; ')}`);
  }

  const data = result.data;
  const id = slugify(data.id ?? data.name);
  if (!id) {
    throw new ParseError(filePath, `cannot derive an id from "${data.id ?? data.name}"`);
  }

  const category = data.category === undefined ? DEFAULT_CATEGORY : slugify(data.category);
  if (!category) {
    throw new ParseError(filePath, `cannot derive a category from "${data.category}"`);
  }

  return {
    id,
    name: data.name,
    description: data.description,
    category,
    stackTags: normalizeTags(data.stackTags, data['stack-tags'], data.tags),
    ...(data.model ? { model: data.model } : {}),
  };
}

function firstLine(text: string): string {
  return text.split('\n', 1)[0];
}
