/**
 * Environment detection for CI/TTY and graceful degradation
 */

import ci from 'ci-info';
import os from 'node:os';

/** Terminal capabilities */
export interface TerminalCapabilities {
  /** Supports ANSI colors */
  colors: boolean;
  /** Supports Unicode characters */
  unicode: boolean;
}

/** Environment information */
export interface Environment {
  nodeVersion: { major: number; minor: number; patch: number };
  terminal: TerminalCapabilities;
}

/** Symbol sets for different terminal capabilities */
export interface SymbolSet {
  tick: string;
  cross: string;
  warning: string;
  info: string;
  arrow: string;
  bullet: string;
}

export const UNICODE_SYMBOLS: SymbolSet = {
  tick: '✓',
  cross: '✖',
  warning: '⚠',
  info: 'ℹ',
  arrow: '→',
  bullet: '•',
};

export const ASCII_SYMBOLS: SymbolSet = {
  tick: '√',
  cross: 'x',
  warning: '!',
  info: 'i',
  arrow: '->',
  bullet: '*',
};

let envCache: Environment | null = null;
let symbolsCache: SymbolSet | null = null;

/**
 * Detect Unicode support
 */
function detectUnicodeSupport(): boolean {
  if (process.env['STEWARD_NO_UNICODE'] === '1') {
    return false;
  }
  if (process.env['STEWARD_UNICODE'] === '1') {
    return true;
  }

  if (process.platform === 'win32') {
    // Windows Terminal, ConEmu and the VS Code terminal render Unicode; cmd.exe does not
    return (
      Boolean(process.env['WT_SESSION']) ||
      process.env['ConEmuANSI'] === 'ON' ||
      process.env['TERM_PROGRAM'] === 'vscode' ||
      process.env['TERM'] === 'xterm-256color'
    );
  }

  return true;
}

/**
 * Detect color support
 */
function detectColorSupport(): boolean {
  if (process.env['NO_COLOR'] !== undefined || process.env['STEWARD_NO_COLOR'] === '1') {
    return false;
  }

  const forceColor = process.env['FORCE_COLOR'];
  if (forceColor !== undefined) {
    return forceColor !== '0' && forceColor !== 'false';
  }

  if (!process.stdout.isTTY) {
    // CI logs that render ANSI
    return ci.isCI && Boolean(process.env['GITHUB_ACTIONS'] || process.env['GITLAB_CI']);
  }

  return process.env['TERM'] !== 'dumb';
}

/**
 * Parse Node.js version
 */
function parseNodeVersion(): { major: number; minor: number; patch: number } {
  const match = process.version.match(/^v(\d+)\.(\d+)\.(\d+)/);
  if (match) {
    return {
      major: parseInt(match[1], 10),
      minor: parseInt(match[2], 10),
      patch: parseInt(match[3], 10),
    };
  }
  return { major: 0, minor: 0, patch: 0 };
}

function buildEnvironment(): Environment {
  return {
    nodeVersion: parseNodeVersion(),
    terminal: {
      colors: detectColorSupport(),
      unicode: detectUnicodeSupport(),
    },
  };
}

/**
 * Get current environment (cached)
 */
export function getEnvironment(): Environment {
  if (!envCache) {
    envCache = buildEnvironment();
  }
  return envCache;
}

/**
 * Drop cached detection, e.g. after tests change process.env
 */
export function refreshEnvironment(): Environment {
  envCache = null;
  symbolsCache = null;
  return getEnvironment();
}

/**
 * Get symbols based on environment capabilities
 */
export function getSymbols(): SymbolSet {
  if (!symbolsCache) {
    symbolsCache = getEnvironment().terminal.unicode ? UNICODE_SYMBOLS : ASCII_SYMBOLS;
  }
  return symbolsCache;
}

export function shouldUseColors(): boolean {
  return getEnvironment().terminal.colors;
}

/**
 * Check if running in verbose mode (via env or debug)
 */
export function isVerbose(): boolean {
  return process.env['STEWARD_VERBOSE'] === '1' || process.env['DEBUG'] === '1' || process.env['STEWARD_DEBUG'] === '1';
}

export function isQuiet(): boolean {
  return process.env['STEWARD_QUIET'] === '1';
}

/**
 * Home-relative display path for a location, e.g. in summaries
 */
export function displayPath(location: string): string {
  const home = os.homedir();
  return home.length > 1 && location.startsWith(home) ? `~${location.slice(home.length)}` : location;
}

/**
 * Exit cleanly on termination signals after running the cleanup callback
 */
export function registerShutdownHandlers(cleanup: () => void | Promise<void>, onCleanupError?: (error: unknown) => void): void {
  let shuttingDown = false;

  const handler = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    try {
      await cleanup();
    } catch (error) {
      onCleanupError?.(error);
    }

    process.exit(signal === 'SIGTERM' ? 0 : 130);
  };

  process.on('SIGINT', (signal) => void handler(signal));
  process.on('SIGTERM', (signal) => void handler(signal));
}
