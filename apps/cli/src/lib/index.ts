/**
 * Library exports for CLI utilities
 */

export {
  getEnvironment,
  refreshEnvironment,
  getSymbols,
  UNICODE_SYMBOLS,
  ASCII_SYMBOLS,
  shouldUseColors,
  isVerbose,
  isQuiet,
  displayPath,
  registerShutdownHandlers,
  type Environment,
  type TerminalCapabilities,
  type SymbolSet,
} from './environment.js';

export {
  CliError,
  isCliError,
  wrapError,
  withTimeout,
  assertDefined,
  type ErrorCode,
  type ErrorSeverity,
  type ErrorContext,
} from './errors.js';

export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

export {
  loadConfig,
  getConfigPath,
  clearConfigCache,
  validateConfig,
  defineConfig,
  configSchema,
  defaultConfig,
  CONFIG_SEARCH_PLACES,
  type StewardConfig,
  type StewardConfigInput,
  type LoadConfigOptions,
} from './config.js';

export { CLI_VERSION, MIN_NODE_MAJOR } from './version.js';
