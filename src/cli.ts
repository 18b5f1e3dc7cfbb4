#!/usr/bin/env node
/**
 * laravel-lint CLI
 * Static analysis for Laravel projects
 */

import { Command } from 'commander';

import { executeAnalyzeCommand, type AnalyzeCommandOptions } from './commands/analyze';
import { executeInitCommand } from './commands/init';
import { executeListCommand, type ListCommandOptions } from './commands/list';
import { logger } from './core/logger';
import { TOOL_VERSION } from './core/version';

const program = new Command();

program
  .name('laravel-lint')
  .description('Static analysis for Laravel projects: architecture smells, query performance and security risks')
  .version(TOOL_VERSION);

program
  .command('analyze')
  .description('Analyze a Laravel project')
  .argument('[path]', 'Project root', '.')
  .option('-f, --format <format>', 'Output format: console|json|sarif')
  .option('-o, --output <file>', 'Write the json or sarif report to a file')
  .option('-c, --config <file>', 'Path to config file (default: <project>/laravel-lint.config.json)')
  .option('--preset <name>', 'Rule preset: strict|balanced|legacy')
  .option('--only <ids>', 'Comma-separated analyzer ids to run')
  .option('--skip <ids>', 'Comma-separated analyzer ids to skip')
  .option('--exit-threshold <level>', 'Fail on severity threshold: none|low|medium|high|critical')
  .option('--baseline [file]', 'Suppress issues recorded in a baseline file (default: .laravel-lint-baseline.json)')
  .option('--write-baseline [file]', 'Write current findings to a baseline file')
  .option('--baseline-reason <text>', 'Reason recorded with suppressions written by --write-baseline')
  .option('--concurrency <n>', 'Files analyzed in parallel')
  .option('--max-issues <n>', 'Issues shown per analyzer in console output')
  .option('--no-cache', 'Disable the model registry cache')
  .option('-v, --verbose', 'Debug logging')
  .option('-q, --quiet', 'Only log errors')
  .action(async (projectPath: string, options: AnalyzeCommandOptions, command: Command) => {
    // `--no-cache` defaults `cache` to true; only an explicit flag should override the config file.
    const cache = command.getOptionValueSource('cache') === 'cli' ? options.cache : undefined;
    await executeAnalyzeCommand(projectPath, { ...options, cache });
  });

program
  .command('list')
  .description('List available analyzers')
  .option('-f, --format <format>', 'Output format: console|json', 'console')
  .action((options: ListCommandOptions) => {
    executeListCommand(options);
  });

program
  .command('init')
  .description(`Create a starter laravel-lint.config.json`)
  .argument('[path]', 'Project root', '.')
  .action((projectPath: string) => {
    executeInitCommand(projectPath);
  });

program.parseAsync().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) logger.debug(error.stack);
  process.exitCode = 1;
});
