import chalk from 'chalk';

import type { AnalysisIssue, AnalysisResult, AnalyzerReport, AnalyzerStatus, Severity } from '../types';

// ── Severity display helpers ───────────────────────────

const SEVERITY_ICON: Record<Severity, string> = {
  critical: '✖',
  high: '✖',
  medium: '⚠',
  low: 'ℹ',
};

function severityLabel(severity: Severity): string {
  const icon = SEVERITY_ICON[severity];
  switch (severity) {
    case 'critical':
      return chalk.magenta(icon);
    case 'high':
      return chalk.red(icon);
    case 'medium':
      return chalk.yellow(icon);
    default:
      return chalk.blue(icon);
  }
}

const STATUS_LABEL: Record<AnalyzerStatus, string> = {
  passed: chalk.green('✔ passed'),
  warning: chalk.yellow('⚠ warning'),
  failed: chalk.red('✖ failed'),
  skipped: chalk.gray('· skipped'),
};

// ── Box-drawing helpers ────────────────────────────────

function termWidth(): number {
  return process.stdout.columns || 80;
}

function horizontalRule(): string {
  return chalk.dim('─'.repeat(termWidth()));
}

function sectionHeader(label: string): string {
  const prefix = '── ';
  const suffix = ' ';
  const remaining = Math.max(0, termWidth() - prefix.length - label.length - suffix.length);
  return chalk.dim(prefix) + chalk.bold(label) + chalk.dim(suffix + '─'.repeat(remaining));
}

function boxLine(text: string, width: number): string {
  const padding = Math.max(0, width - 4 - text.length);
  return chalk.dim('│') + '  ' + text + ' '.repeat(padding) + chalk.dim('│');
}

export interface ConsoleReportOptions {
  /** Issues printed per analyzer before the rest are elided. */
  maxIssuesPerAnalyzer?: number;
  suppressedByBaseline?: number;
  print?: (line: string) => void;
}

// ── Console Reporter ───────────────────────────────────

export class ConsoleReporter {
  private readonly print: (line: string) => void;

  constructor(private readonly options: ConsoleReportOptions = {}) {
    this.print = options.print ?? ((line) => console.log(line));
  }

  report(result: AnalysisResult): void {
    this.printHeader(result);
    this.printReports(result.reports);
    this.printSummaryBar(result);
  }

  // ── Header banner ─────────────────────────────────

  private printHeader(result: AnalysisResult): void {
    const w = termWidth();
    const lines = [
      chalk.bold(`laravel-lint ${result.toolVersion}`),
      `Project: ${result.projectPath}`,
      `${result.filesScanned} PHP file(s) scanned`,
    ];
    if (result.parseFailures.length > 0) {
      lines.push(`${result.parseFailures.length} file(s) could not be parsed`);
    }

    this.print('');
    this.print(chalk.dim('┌' + '─'.repeat(w - 2) + '┐'));
    for (const line of lines) this.print(boxLine(line, w));
    this.print(chalk.dim('└' + '─'.repeat(w - 2) + '┘'));
  }

  // ── Issues (grouped by analyzer) ──────────────────

  private printReports(reports: AnalyzerReport[]): void {
    const withIssues = reports.filter((report) => report.issues.length > 0);
    this.print('');
    if (withIssues.length === 0) {
      this.print(chalk.green('  ✔ No issues found.'));
      this.print('');
      return;
    }

    const limit = this.options.maxIssuesPerAnalyzer;
    for (const report of withIssues) {
      this.print(sectionHeader(`${report.name} (${report.analyzerId})`));
      this.print(`  ${STATUS_LABEL[report.status]} ${chalk.dim(report.message)}`);
      this.print('');
      const shown = limit !== undefined ? report.issues.slice(0, limit) : report.issues;
      for (const issue of shown) this.printIssue(issue);
      const hidden = report.issues.length - shown.length;
      if (hidden > 0) {
        this.print(chalk.dim(`  … ${hidden} more issue(s) from ${report.analyzerId}`));
        this.print('');
      }
    }
  }

  private printIssue(issue: AnalysisIssue): void {
    const { file, line } = issue.location;
    this.print(`  ${chalk.dim(`${file}:${line}`)} ${severityLabel(issue.severity)} ${chalk.dim(issue.code + ':')} ${issue.message}`);

    if (issue.snippet) {
      this.print('');
      this.print(`    ${chalk.dim(String(line).padStart(4) + ' │')} ${issue.snippet}`);
      this.print('');
    }

    if (issue.recommendation) {
      this.print(`       ${chalk.cyan('ℹ')} ${issue.recommendation}`);
    }
    this.print('');
  }

  // ── Summary bar ───────────────────────────────────

  private printSummaryBar(result: AnalysisResult): void {
    const s = result.summary;
    const suppressed = this.options.suppressedByBaseline ?? 0;

    this.print(horizontalRule());
    if (s.total === 0) {
      this.print(chalk.green('No issues found'));
    } else {
      const parts: string[] = [];
      if (s.critical > 0) parts.push(`${s.critical} ${chalk.magenta('✖ critical')}`);
      if (s.high > 0) parts.push(`${s.high} ${chalk.red('✖ high')}`);
      if (s.medium > 0) parts.push(`${s.medium} ${chalk.yellow('⚠ medium')}`);
      if (s.low > 0) parts.push(`${s.low} ${chalk.blue('ℹ low')}`);
      this.print(`Found ${chalk.bold(String(s.total))} issues (${parts.join(', ')})`);
    }
    if (suppressed > 0) this.print(chalk.gray(`Suppressed by baseline: ${suppressed}`));
    this.print(horizontalRule());
  }
}
