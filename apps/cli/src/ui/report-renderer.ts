/**
 * Report Renderer
 *
 * Turns a docs bridge report into terminal lines. Rendering is pure: it
 * returns lines and never prints, so commands decide where output goes.
 *
 * @module ui/report-renderer
 */

import chalk from 'chalk';
import type { BridgeIssue, BridgeReport, IssueSeverity, SectionReport, SnapshotSummary, SyncStep } from '@steward/core';
import { getSymbols, shouldUseColors, type SymbolSet } from '../lib/environment.js';
import type { InitResult } from '../types.js';

export interface RenderOptions {
  /** Defaults to terminal detection */
  colors?: boolean;
  /** Defaults to the environment's symbol set */
  symbols?: SymbolSet;
}

type Paint = (text: string) => string;

interface Theme {
  symbols: SymbolSet;
  green: Paint;
  yellow: Paint;
  red: Paint;
  cyan: Paint;
  dim: Paint;
  bold: Paint;
}

function createTheme(options: RenderOptions): Theme {
  const useColors = options.colors ?? shouldUseColors();
  const paint = (fn: Paint): Paint => (useColors ? fn : (text) => text);
  return {
    symbols: options.symbols ?? getSymbols(),
    green: paint(chalk.green),
    yellow: paint(chalk.yellow),
    red: paint(chalk.red),
    cyan: paint(chalk.cyan),
    dim: paint(chalk.dim),
    bold: paint(chalk.bold),
  };
}

function severityMark(theme: Theme, severity: IssueSeverity | null): string {
  switch (severity) {
    case 'error':
      return theme.red(theme.symbols.cross);
    case 'warning':
      return theme.yellow(theme.symbols.warning);
    case 'info':
      return theme.cyan(theme.symbols.info);
    case null:
      return theme.green(theme.symbols.tick);
  }
}

/** Worst issue severity reported for a section */
function sectionSeverity(name: string, issues: readonly BridgeIssue[]): IssueSeverity | null {
  const own = issues.filter((issue) => issue.section === name).map((issue) => issue.severity);
  if (own.includes('error')) return 'error';
  if (own.includes('warning')) return 'warning';
  if (own.includes('info')) return 'info';
  return null;
}

function renderSections(theme: Theme, sections: readonly SectionReport[], issues: readonly BridgeIssue[]): string[] {
  const nameWidth = Math.max(...sections.map((section) => section.name.length));
  const statusWidth = Math.max(...sections.map((section) => section.status.length));
  const lines: string[] = [];

  for (const section of sections) {
    const mark = severityMark(theme, sectionSeverity(section.name, issues));
    let line = `  ${mark} ${theme.bold(section.name.padEnd(nameWidth))}  ${section.status.padEnd(statusWidth)}  ${theme.dim(section.target)}`;
    if (section.action && section.action !== 'none') {
      line += `  ${theme.symbols.arrow} ${section.action}`;
    }
    if (section.backup) {
      line += theme.dim(` (backup ${section.backup})`);
    }
    lines.push(line);

    if (section.diff) {
      lines.push(...renderDiff(theme, section.diff));
    }
  }
  return lines;
}

function renderDiff(theme: Theme, diff: string): string[] {
  return diff
    .replace(/\n$/, '')
    .split('\n')
    .map((line) => {
      if (line.startsWith('@@')) return `      ${theme.cyan(line)}`;
      if (line.startsWith('+') && !line.startsWith('+++')) return `      ${theme.green(line)}`;
      if (line.startsWith('-') && !line.startsWith('---')) return `      ${theme.red(line)}`;
      return `      ${theme.dim(line)}`;
    });
}

function renderSnapshots(theme: Theme, snapshots: readonly SnapshotSummary[]): string[] {
  if (snapshots.length === 0) {
    return [theme.dim('  (no snapshots)')];
  }
  const idWidth = Math.max(...snapshots.map((snapshot) => snapshot.id.length));
  const opWidth = Math.max(...snapshots.map((snapshot) => snapshot.operation.length));
  return snapshots.map(
    (snapshot) =>
      `  ${snapshot.id.padEnd(idWidth)}  ${snapshot.operation.padEnd(opWidth)}  ${snapshot.section}  ${theme.dim(snapshot.target)}`
  );
}

function renderSteps(theme: Theme, steps: readonly SyncStep[]): string[] {
  return steps.map((step) => {
    if (step.skipped) {
      return `  ${step.step}: ${theme.dim('skipped')}`;
    }
    const sections = step.sections.map((section) =>
      section.action && section.action !== 'none'
        ? `${section.name}=${section.status} (${section.action})`
        : `${section.name}=${section.status}`
    );
    return `  ${step.step}: ${sections.length > 0 ? sections.join(', ') : theme.dim('nothing to do')}`;
  });
}

function renderIssues(theme: Theme, issues: readonly BridgeIssue[]): string[] {
  const lines: string[] = [];
  for (const issue of issues) {
    lines.push(`  ${severityMark(theme, issue.severity)} [${issue.code}] ${issue.message}`);
    lines.push(`    ${theme.cyan(theme.symbols.arrow)} ${issue.remediation}`);
  }
  return lines;
}

/**
 * Render a bridge report as terminal lines
 */
export function renderReport(report: BridgeReport, options: RenderOptions = {}): string[] {
  const theme = createTheme(options);
  const status = report.status === 'ok' ? null : report.status;
  const lines = [`${severityMark(theme, status)} docs ${report.command}: ${theme.bold(report.status)}`];

  if (report.sections.length > 0) {
    lines.push('', 'Sections:', ...renderSections(theme, report.sections, report.issues));
  } else if (report.command === 'list' || report.command === 'diagnose') {
    lines.push('', theme.dim('  (no sections configured)'));
  }

  if (report.steps) {
    lines.push('', 'Steps:', ...renderSteps(theme, report.steps));
  }
  if (report.snapshots) {
    lines.push('', 'Snapshots:', ...renderSnapshots(theme, report.snapshots));
  }
  if (report.issues.length > 0) {
    lines.push('', 'Issues:', ...renderIssues(theme, report.issues));
  }

  return lines;
}

/**
 * Render the result of `docs init`
 */
export function renderInitResult(result: InitResult, options: RenderOptions = {}): string[] {
  const theme = createTheme(options);
  const verb = result.overwritten ? 'Overwrote' : 'Wrote';
  return [
    `${theme.green(theme.symbols.tick)} ${verb} ${result.path}`,
    theme.dim(`  ${theme.symbols.arrow} Edit the sections, then run \`steward docs diagnose\``),
  ];
}
