/**
 * Phase definition files
 *
 * Phase graphs are stored as YAML:
 *
 *   categories: [architecture, testing]
 *   edges:
 *     - [architecture, testing]
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { CatalogIOError, ParseError, errorMessage } from './errors.js';
import { PhaseGraph } from './phase-graph.js';
import type { PhaseGraphDefinition } from './types.js';

/** The phase graph shipped with the package. */
export const DEFAULT_PHASES_FILE = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../phases/default.yaml'
);

const categoryName = z.string().trim().min(1, 'category names must not be empty');

const definitionSchema = z.object({
  categories: z.array(categoryName).optional(),
  edges: z.array(z.tuple([categoryName, categoryName]), {
    required_error: 'edges is required',
    invalid_type_error: 'edges must be a list of [before, after] pairs',
  }),
});

/** Validate an already-parsed phase definition. */
export function parsePhaseDefinition(raw: unknown, source: string): PhaseGraphDefinition {
  const result = definitionSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${where}${issue.message}`;
    });
    throw new ParseError(source, `invalid phase definition: ${problems.join('; ')}`);
  }
  return result.data;
}

/**
 * Read a phase definition file (the shipped default when `filePath` is
 * omitted) and return an unbuilt graph.
 * @throws CatalogIOError when the file cannot be read, ParseError when it is not a valid definition.
 */
export async function loadPhaseGraph(filePath: string = DEFAULT_PHASES_FILE): Promise<PhaseGraph> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new CatalogIOError(filePath, errorMessage(err));
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ParseError(filePath, `invalid YAML: ${errorMessage(err).split('\n', 1)[0]}`);
  }

  return PhaseGraph.fromDefinition(parsePhaseDefinition(raw, filePath));
}
