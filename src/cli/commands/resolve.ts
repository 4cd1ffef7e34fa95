import type { Command } from 'commander';
import {
  errorMessage,
  exitCodeForFatal,
  summarizeIssues,
  type PreparedCatalog,
  type ResolutionSession,
  type WorkflowPlan,
} from '@agent-catalog/core';

import {
  collect,
  createCommandContext,
  defaultCommandDependencies,
  fatalKind,
  formatFatalJson,
  formatPlanJson,
  parseList,
  parsePicks,
  parsePositiveInt,
  type CommandDependencies,
} from '../lib/index.js';

interface ResolveOptions {
  dir?: string;
  stack?: string;
  categories?: string;
  pick: string[];
  strict?: boolean;
  phases?: string;
  concurrency?: string;
  timeout?: string;
  report?: boolean;
}

interface ValidateOptions {
  dir?: string;
  phases?: string;
  concurrency?: string;
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

async function attempt<T>(fn: () => T | Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

export function registerResolveCommands(program: Command, overrides: Partial<CommandDependencies> = {}): void {
  const deps: CommandDependencies = defaultCommandDependencies(overrides);

  program
    .command('resolve')
    .description('Resolve an ordered workflow plan from an agent catalog and print it as JSON')
    .option('-d, --dir <path>', 'Catalog directory (default: $AGENTS_DIR)')
    .option('-s, --stack <tags>', 'Comma-separated stack tags used to prefer agents', '')
    .option('-c, --categories <list>', 'Comma-separated categories to plan (default: every phase category)')
    .option('-p, --pick <category=id>', 'Use a specific agent for a category (repeatable)', collect, [])
    .option('--strict', 'Treat unresolved categories as errors', false)
    .option('--phases <file>', 'Phase definition YAML (default: $AGENT_CATALOG_PHASES or built-in)')
    .option('--concurrency <n>', 'Maximum documents parsed in parallel')
    .option('--timeout <ms>', 'Stop loading after this many milliseconds and plan with what was loaded')
    .option('--report', 'Print the issue report on stderr', false)
    .action(async (options: ResolveOptions) => {
      const setup = await attempt(() => {
        const context = createCommandContext(deps);
        return {
          session: deps.createSession({
            rootDir: context.catalogDir(options.dir),
            phasesFile: context.phasesFile(options.phases),
            concurrency: parsePositiveInt(options.concurrency, '--concurrency') ?? context.config.concurrency,
            loadTimeoutMs: parsePositiveInt(options.timeout, '--timeout') ?? context.config.loadTimeoutMs,
          }),
          picks: parsePicks(options.pick),
        };
      });
      if (!setup.ok) {
        deps.writeStdout(formatFatalJson(setup.error));
        deps.exit(exitCodeForFatal(setup.error));
      }
      const { session, picks } = setup.value;

      const prepared = await attempt(() => session.prepare());
      if (!prepared.ok) {
        deps.writeStdout(formatFatalJson(prepared.error));
        deps.exit(exitCodeForFatal(prepared.error));
      }

      const plan = resolvePlan(session, prepared.value, options, picks);
      deps.writeStdout(formatPlanJson(plan));

      const summary = summarizeIssues(plan.issues);
      if (options.report) {
        deps.error(summary.report);
      }
      deps.exit(summary.exitCode);
    });

  program
    .command('validate')
    .description('Load a catalog and phase graph and report every issue found')
    .option('-d, --dir <path>', 'Catalog directory (default: $AGENTS_DIR)')
    .option('--phases <file>', 'Phase definition YAML (default: $AGENT_CATALOG_PHASES or built-in)')
    .option('--concurrency <n>', 'Maximum documents parsed in parallel')
    .action(async (options: ValidateOptions) => {
      const setup = await attempt(() => {
        const context = createCommandContext(deps);
        return deps.createSession({
          rootDir: context.catalogDir(options.dir),
          phasesFile: context.phasesFile(options.phases),
          concurrency: parsePositiveInt(options.concurrency, '--concurrency') ?? context.config.concurrency,
          loadTimeoutMs: context.config.loadTimeoutMs,
        });
      });
      const prepared = setup.ok ? await attempt(() => setup.value.prepare()) : setup;
      if (!prepared.ok) {
        deps.error(`Validation: FAIL (${fatalKind(prepared.error)}: ${errorMessage(prepared.error)})`);
        deps.exit(exitCodeForFatal(prepared.error));
      }

      const { registry, phases, issues, stats } = prepared.value;
      const summary = summarizeIssues(issues);
      deps.log(
        `Loaded ${registry.size} of ${stats.scanned} documents in ` +
          `${registry.categories().length} categories (${phases.build().length} phases)`
      );
      deps.log('');
      deps.log(summary.report);
      deps.log('');
      deps.log(`Validation: ${summary.hasErrors ? 'FAIL' : 'PASS'}`);
      deps.exit(summary.exitCode);
    });
}

function resolvePlan(
  session: ResolutionSession,
  prepared: PreparedCatalog,
  options: ResolveOptions,
  picks: Map<string, string>
): WorkflowPlan {
  const requested = parseList(options.categories);
  return session.resolve({
    requiredCategories: new Set(requested.length > 0 ? requested : prepared.phases.categories()),
    stackTags: new Set(parseList(options.stack)),
    explicitPicks: picks,
    strict: options.strict ?? false,
  });
}
