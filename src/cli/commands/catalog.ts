import type { Command } from 'commander';
import { errorMessage, exitCodeForFatal, slugify, type AgentRecord, type PhaseLevel } from '@agent-catalog/core';

import {
  createCommandContext,
  defaultCommandDependencies,
  fatalKind,
  formatTableRow,
  parsePositiveInt,
  type CommandDependencies,
} from '../lib/index.js';

interface ListOptions {
  dir?: string;
  category?: string;
  phases?: string;
  concurrency?: string;
  json?: boolean;
}

interface PhasesOptions {
  phases?: string;
  json?: boolean;
}

function toListEntry(agent: AgentRecord) {
  return {
    id: agent.id,
    name: agent.name,
    category: agent.category,
    phase: agent.phase,
    stackTags: [...agent.stackTags].sort(),
    sourcePath: agent.sourcePath,
    ...(agent.model ? { model: agent.model } : {}),
  };
}

export function registerCatalogCommands(program: Command, overrides: Partial<CommandDependencies> = {}): void {
  const deps: CommandDependencies = defaultCommandDependencies(overrides);

  const fail = (err: unknown): never => {
    deps.error(`${fatalKind(err)}: ${errorMessage(err)}`);
    return deps.exit(exitCodeForFatal(err));
  };

  program
    .command('list')
    .description('List the agents in a catalog')
    .option('-d, --dir <path>', 'Catalog directory (default: $AGENTS_DIR)')
    .option('--category <name>', 'Only list one category')
    .option('--phases <file>', 'Phase definition YAML (default: $AGENT_CATALOG_PHASES or built-in)')
    .option('--concurrency <n>', 'Maximum documents parsed in parallel')
    .option('--json', 'Output as JSON', false)
    .action(async (options: ListOptions) => {
      let agents: AgentRecord[];
      let issueCount: number;
      try {
        const context = createCommandContext(deps);
        const session = deps.createSession({
          rootDir: context.catalogDir(options.dir),
          phasesFile: context.phasesFile(options.phases),
          concurrency: parsePositiveInt(options.concurrency, '--concurrency') ?? context.config.concurrency,
          loadTimeoutMs: context.config.loadTimeoutMs,
        });
        const { registry, issues } = await session.prepare();
        const category = options.category === undefined ? undefined : slugify(options.category);
        agents = category ? registry.listByCategory(category) : registry.all();
        issueCount = issues.length;
      } catch (err) {
        return fail(err);
      }

      if (issueCount > 0) {
        deps.error(`${issueCount} issue(s) found while loading; run "agent-catalog validate" for details`);
      }

      agents.sort((a, b) => a.phase - b.phase || (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));

      if (options.json) {
        deps.writeStdout(`${JSON.stringify(agents.map(toListEntry), null, 2)}\n`);
        return;
      }

      if (agents.length === 0) {
        deps.log('No agents found');
        return;
      }

      const idWidth = Math.max(2, ...agents.map((agent) => agent.id.length));
      const categoryWidth = Math.max(8, ...agents.map((agent) => agent.category.length));
      deps.log(
        formatTableRow([
          { value: 'PHASE', width: 5 },
          { value: 'CATEGORY', width: categoryWidth },
          { value: 'ID', width: idWidth },
          { value: 'TAGS' },
        ])
      );
      for (const agent of agents) {
        deps.log(
          formatTableRow([
            { value: String(agent.phase), width: 5 },
            { value: agent.category, width: categoryWidth },
            { value: agent.id, width: idWidth },
            { value: [...agent.stackTags].sort().join(',') || '-' },
          ])
        );
      }
    });

  program
    .command('phases')
    .description('Show the phase ordering of categories')
    .option('--phases <file>', 'Phase definition YAML (default: $AGENT_CATALOG_PHASES or built-in)')
    .option('--json', 'Output as JSON', false)
    .action(async (options: PhasesOptions) => {
      let levels: readonly PhaseLevel[];
      try {
        const context = createCommandContext(deps);
        const graph = await deps.loadPhases(context.phasesFile(options.phases));
        levels = graph.build();
      } catch (err) {
        return fail(err);
      }

      if (options.json) {
        deps.writeStdout(`${JSON.stringify(levels, null, 2)}\n`);
        return;
      }

      for (const level of levels) {
        deps.log(`Phase ${level.phase}: ${level.categories.join(', ')}`);
      }
    });
}
