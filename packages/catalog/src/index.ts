export * from './types.js';
export * from './errors.js';
export * from './frontmatter.js';
export * from './registry.js';
export * from './phase-graph.js';
export * from './phases.js';
export * from './loader.js';
export * from './resolver.js';
export * from './reporter.js';
export * from './session.js';
export * from './config.js';
export {
  Logger,
  createLogger,
  configure as configureLogging,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogWriter,
} from './logger.js';
