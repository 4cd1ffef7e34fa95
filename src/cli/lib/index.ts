export { UsageError, collect, formatTableRow, parseList, parsePicks, parsePositiveInt } from './formatting.js';
export { fatalKind, formatFatalJson, formatPlanJson, planToJson, type PlanJson } from './output.js';
export {
  createCommandContext,
  defaultCommandDependencies,
  type CommandContext,
  type CommandDependencies,
  type ExitFn,
} from './context.js';
