/**
 * Logger wrapper with level-based filtering and structured output
 *
 * Diagnostics go to stderr; stdout is reserved for command results
 * (`log` and `json`), so `--json` output stays machine-readable.
 */

import { createConsola, type LogLevel as ConsolaLevel } from 'consola';
import chalk from 'chalk';
import type { LogEntry as CoreLogEntry } from '@steward/core';
import { getSymbols, shouldUseColors } from './environment.js';
import { isCliError, type CliError } from './errors.js';

/** Log levels mapping */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'verbose' | 'normal' | 'quiet';

const LOG_LEVEL_MAP: Record<LogLevel, ConsolaLevel> = {
  silent: -999,
  error: 0,
  warn: 1,
  info: 3,
  debug: 4,
  // Aliases for CLI convenience
  verbose: 4,
  normal: 3,
  quiet: 0,
};

const LOG_LEVEL_NAMES: Record<number, string> = {
  0: 'ERROR',
  1: 'WARN',
  3: 'INFO',
  4: 'DEBUG',
};

/** Structured log entry */
export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  data?: unknown;
  context?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    suggestions?: string[];
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Emit diagnostics as JSON lines */
  json?: boolean;
  /** Include timestamps */
  timestamps?: boolean;
  /** Prefix for all messages */
  prefix?: string;
  /** Context to include in all log entries */
  context?: Record<string, unknown>;
  /** Force colors on or off; defaults to terminal detection */
  colors?: boolean;
  /** Output sinks, replaceable in tests */
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export interface Logger {
  success: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
  /** Result output on stdout, not subject to the level */
  log: (message: string) => void;
  logError: (error: CliError | Error) => void;
  newline: () => void;
  dim: (message: string) => void;
  json: (data: unknown) => void;
  setLevel: (level: LogLevel) => void;
  isLevelEnabled: (level: LogLevel) => boolean;
  /** Sink for core engine log entries, shown at debug level */
  engineSink: (entry: CoreLogEntry) => void;
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const symbols = getSymbols();
  const useJson = options.json ?? false;
  const useColors = (options.colors ?? shouldUseColors()) && !useJson;
  const useTimestamps = options.timestamps ?? useJson;
  const prefix = options.prefix ?? '';
  const context = options.context ?? {};
  const writeOut = options.stdout ?? ((line: string) => console.log(line));
  const writeErr = options.stderr ?? ((line: string) => console.error(line));

  const paint = (fn: (s: string) => string) => (useColors ? fn : (s: string) => s);
  const c = {
    green: paint(chalk.green),
    red: paint(chalk.red),
    yellow: paint(chalk.yellow),
    cyan: paint(chalk.cyan),
    dim: paint(chalk.dim),
  };

  const consola = createConsola({
    level: LOG_LEVEL_MAP[options.level ?? 'info'],
    formatOptions: {
      colors: useColors,
      date: false,
    },
  });

  function enabled(levelNum: ConsolaLevel): boolean {
    return levelNum <= consola.level;
  }

  function formatLogEntry(levelNum: number, message: string, data?: unknown): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level: LOG_LEVEL_NAMES[levelNum] ?? 'INFO',
      message,
      ...(data !== undefined ? { data } : {}),
      ...(Object.keys(context).length > 0 ? { context } : {}),
    };
  }

  function output(
    levelNum: ConsolaLevel,
    symbol: string,
    colorFn: (s: string) => string,
    message: string,
    args: unknown[]
  ): void {
    if (!enabled(levelNum)) return;

    if (useJson) {
      writeErr(JSON.stringify(formatLogEntry(levelNum, message, args.length > 0 ? args : undefined)));
      return;
    }

    const timestamp = useTimestamps ? c.dim(`[${new Date().toISOString()}] `) : '';
    const prefixStr = prefix ? `[${prefix}] ` : '';
    const extra = args.length > 0 ? ` ${args.map((arg) => (typeof arg === 'string' ? arg : JSON.stringify(arg))).join(' ')}` : '';
    writeErr(`${timestamp}${prefixStr}${colorFn(symbol)} ${message}${extra}`);
  }

  const logger: Logger = {
    success: (message, ...args) => output(3, symbols.tick, c.green, message, args),
    error: (message, ...args) => output(0, symbols.cross, c.red, message, args),
    warn: (message, ...args) => output(1, symbols.warning, c.yellow, message, args),
    info: (message, ...args) => output(3, symbols.info, c.cyan, message, args),
    debug: (message, ...args) => output(4, symbols.bullet, c.dim, message, args),

    log: (message) => {
      writeOut(message);
    },

    logError: (error) => {
      if (useJson) {
        const entry: LogEntry = {
          ...formatLogEntry(0, error.message),
          error: isCliError(error)
            ? { code: error.code, message: error.message, suggestions: error.suggestions }
            : { message: error.message },
        };
        writeErr(JSON.stringify(entry));
        return;
      }

      writeErr(`${c.red(symbols.cross)} ${error.message}`);
      if (!isCliError(error)) return;

      if (error.context.file) {
        writeErr(c.dim(`  Location: ${error.context.file}`));
      }
      for (const suggestion of error.suggestions) {
        writeErr(`  ${c.cyan(symbols.arrow)} ${suggestion}`);
      }
      if (enabled(4) && error.context.operation) {
        writeErr(c.dim(`  Operation: ${error.context.operation}`));
      }
      if (enabled(4) && error.cause) {
        writeErr(c.dim(`  Caused by: ${error.cause.message}`));
      }
    },

    newline: () => {
      if (!useJson && enabled(3)) {
        writeErr('');
      }
    },

    dim: (message) => {
      if (!useJson && enabled(3)) {
        writeErr(c.dim(message));
      }
    },

    json: (data) => {
      writeOut(JSON.stringify(data, null, 2));
    },

    setLevel: (newLevel) => {
      consola.level = LOG_LEVEL_MAP[newLevel];
    },

    isLevelEnabled: (level) => level !== 'silent' && enabled(LOG_LEVEL_MAP[level]),

    engineSink: (entry) => {
      logger.debug(`[${entry.component}] ${entry.message}`, ...(entry.context ? [entry.context] : []));
    },
  };

  return logger;
}
