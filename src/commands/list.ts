/**
 * `list` command: prints the registered analyzers.
 */

import chalk from 'chalk';

import { createDefaultRegistry } from '../analyzers';
import type { AnalyzerMeta } from '../core/analyzer';
import { ConfigError } from '../core/config';
import { logger } from '../core/logger';

export interface ListCommandOptions {
  format?: string;
}

export function formatAnalyzerList(analyzers: readonly AnalyzerMeta[]): string[] {
  const idWidth = Math.max(...analyzers.map((meta) => meta.id.length), 2);
  const categoryWidth = Math.max(...analyzers.map((meta) => meta.category.length), 8);
  return analyzers.map(
    (meta) =>
      `${meta.id.padEnd(idWidth)}  ${meta.category.padEnd(categoryWidth)}  ${meta.severity.padEnd(8)}  ${meta.description}`,
  );
}

export function executeListCommand(options: ListCommandOptions): void {
  const analyzers = createDefaultRegistry().list();
  const format = options.format ?? 'console';

  if (format === 'json') {
    const rows = analyzers.map(({ id, name, category, severity, description, tags }) => ({
      id,
      name,
      category,
      severity,
      description,
      tags,
    }));
    console.log(JSON.stringify(rows, null, 2));
    return;
  }
  if (format !== 'console') {
    const error = new ConfigError('command line', [`Unsupported list format "${format}". Supported values: console, json`]);
    logger.error(error.message);
    process.exitCode = 1;
    return;
  }

  console.log(chalk.bold(`${analyzers.length} analyzers\n`));
  for (const line of formatAnalyzerList(analyzers)) console.log(line);
}
