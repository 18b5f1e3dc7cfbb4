/**
 * `analyze` command: loads configuration, runs the enabled analyzers over a
 * project, applies rule tuning and the baseline, renders the result and sets
 * the exit code.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import ora from 'ora';

import { createAnalyzers, createDefaultRegistry } from '../analyzers';
import { filterIssuesByBaseline, loadBaselineFingerprints, resolveBaselinePath, writeBaselineFile } from '../core/baseline';
import { RegistryCache, DEFAULT_CACHE_LOCATION } from '../core/cache';
import {
  ConfigError,
  isSupportedOutputFormat,
  loadConfig,
  mergeConfig,
  SUPPORTED_OUTPUT_FORMATS,
  type LintFileConfig,
} from '../core/config';
import { isExitThreshold, normalizeExitThreshold, shouldFailForThreshold } from '../core/exit-threshold';
import { logger } from '../core/logger';
import { RegistryStore } from '../core/model-registry';
import { AnalyzerOptionError } from '../core/options';
import { isPresetName, mergePresetAndCustomRuleSettings } from '../core/presets';
import { withIssues } from '../core/report';
import { applyRuleSettings } from '../core/rule-tuning';
import { ParseFailureLimitError, runAnalysis } from '../core/runner';
import { validateProjectPath, ValidationError } from '../core/validate';
import { ConsoleReporter } from '../reporters/console';
import { JsonReporter } from '../reporters/json';
import { SarifReporter } from '../reporters/sarif';
import type { AnalysisResult, OutputFormat } from '../types';

/** Raw option values as commander hands them over. */
export interface AnalyzeCommandOptions {
  format?: string;
  output?: string;
  config?: string;
  preset?: string;
  only?: string;
  skip?: string;
  exitThreshold?: string;
  baseline?: boolean | string;
  writeBaseline?: boolean | string;
  /** Recorded with each suppression written by `--write-baseline`. */
  baselineReason?: string;
  concurrency?: string;
  maxIssues?: string;
  /** Set only when `--no-cache` was given. */
  cache?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInteger(value: string | undefined, flag: string, errors: string[]): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isInteger(parsed) && parsed > 0) return parsed;
  errors.push(`${flag} must be a positive integer (received "${value}").`);
  return undefined;
}

/** Converts command-line flags to configuration values; invalid flags raise one `ConfigError`. */
export function cliConfig(options: AnalyzeCommandOptions): LintFileConfig {
  const errors: string[] = [];
  const values: LintFileConfig = {
    output: options.output ? path.resolve(options.output) : undefined,
    only: splitList(options.only),
    skip: splitList(options.skip),
    baseline: options.baseline,
    writeBaseline: options.writeBaseline,
    concurrency: parsePositiveInteger(options.concurrency, '--concurrency', errors),
    maxIssuesPerAnalyzer: parsePositiveInteger(options.maxIssues, '--max-issues', errors),
    cache: options.cache,
    verbose: options.verbose,
    quiet: options.quiet,
  };

  if (options.format !== undefined) {
    if (isSupportedOutputFormat(options.format)) values.format = options.format;
    else errors.push(`Unsupported output format "${options.format}". Supported values: ${SUPPORTED_OUTPUT_FORMATS.join(', ')}`);
  }
  if (options.preset !== undefined) {
    if (isPresetName(options.preset)) values.preset = options.preset;
    else errors.push(`Unsupported preset "${options.preset}". Supported values: strict, balanced, legacy`);
  }
  if (options.exitThreshold !== undefined) {
    const threshold = options.exitThreshold.toLowerCase();
    if (isExitThreshold(threshold)) values.exitThreshold = threshold;
    else errors.push(`Unsupported exit threshold "${options.exitThreshold}". Supported values: none, low, medium, high, critical`);
  }

  if (errors.length > 0) throw new ConfigError('command line', errors);
  return values;
}

function renderOutput(result: AnalysisResult, format: OutputFormat, config: LintFileConfig, suppressedCount: number): void {
  let rendered: string | undefined;
  if (format === 'json') {
    rendered = new JsonReporter().toJson(result);
  } else if (format === 'sarif') {
    rendered = new SarifReporter(createDefaultRegistry().list()).toSarif(result);
  } else {
    new ConsoleReporter({
      maxIssuesPerAnalyzer: config.maxIssuesPerAnalyzer,
      suppressedByBaseline: suppressedCount,
    }).report(result);
  }

  if (rendered === undefined) return;
  if (config.output) {
    fs.mkdirSync(path.dirname(config.output), { recursive: true });
    fs.writeFileSync(config.output, rendered, 'utf8');
    logger.info(`Report written to ${config.output}`);
  } else {
    console.log(rendered);
  }
}

function applyBaseline(
  issues: AnalysisResult['issues'],
  config: LintFileConfig,
  projectPath: string,
  reason?: string,
): { issues: AnalysisResult['issues']; suppressedCount: number } {
  const baselinePath = resolveBaselinePath(projectPath, typeof config.baseline === 'string' ? config.baseline : undefined);

  if (config.writeBaseline !== undefined && config.writeBaseline !== false) {
    const writePath =
      typeof config.writeBaseline === 'string' ? resolveBaselinePath(projectPath, config.writeBaseline) : baselinePath;
    const count = writeBaselineFile(writePath, issues, { includeMetadata: true, reason });
    logger.info(`Wrote baseline with ${count} fingerprint(s): ${writePath}`);
    return { issues, suppressedCount: 0 };
  }

  if (config.baseline === undefined || config.baseline === false) return { issues, suppressedCount: 0 };
  const filtered = filterIssuesByBaseline(issues, loadBaselineFingerprints(baselinePath));
  return { issues: filtered.issues, suppressedCount: filtered.suppressedCount };
}

/**
 * Runs the command. Configuration, validation and option errors are logged and
 * set exit code 1; the result is returned when the analysis ran.
 */
export async function executeAnalyzeCommand(
  projectPath: string,
  options: AnalyzeCommandOptions,
): Promise<AnalysisResult | undefined> {
  try {
    const absolutePath = path.resolve(projectPath);
    validateProjectPath(absolutePath);

    const cli = cliConfig(options);
    logger.configure(cli);
    const fileConfig = loadConfig(absolutePath, options.config);
    const config = mergeConfig(fileConfig.values, cli);
    logger.configure(config);
    if (fileConfig.path) logger.debug(`Using config: ${fileConfig.path}`);

    const format = config.format ?? 'console';
    const analyzers = createAnalyzers(config);
    logger.debug(`Enabled analyzers: ${analyzers.map((analyzer) => analyzer.meta.id).join(', ')}`);

    const cache =
      config.cache === false ? undefined : RegistryCache.forProject(absolutePath, config.cacheLocation ?? DEFAULT_CACHE_LOCATION);

    const spinner = format === 'console' && !config.quiet && !config.verbose ? ora('Analyzing PHP files...').start() : null;
    const result = await runAnalysis({
      projectPath: absolutePath,
      analyzers,
      paths: config.paths,
      excludedPaths: config.excludedPaths,
      registryStore: new RegistryStore(cache),
      concurrency: config.concurrency,
      maxParseFailures: config.maxParseFailures,
      onFileAnalyzed: (file, done, total) => {
        if (spinner) spinner.text = `Analyzing PHP files (${done}/${total}) ${file}`;
      },
    }).catch((error: unknown) => {
      spinner?.fail('Analysis failed');
      throw error;
    });
    spinner?.succeed(`Analyzed ${result.filesScanned} file(s)`);

    if (cache) {
      cache.save();
      const { hits, misses } = cache.stats();
      logger.debug(`Registry cache: ${hits} hit(s), ${misses} miss(es)`);
    }
    for (const failure of result.parseFailures) {
      logger.debug(`Parse failure: ${failure.file}${failure.line ? `:${failure.line}` : ''} ${failure.message}`);
    }

    const ruleSettings = mergePresetAndCustomRuleSettings(config.preset, config.ruleSettings);
    const tuned = applyRuleSettings(result.issues, ruleSettings);
    if (tuned.removedCount > 0 || tuned.modifiedCount > 0) {
      logger.debug(`Applied ruleSettings: removed ${tuned.removedCount}, modified ${tuned.modifiedCount} issue(s).`);
    }

    const baseline = applyBaseline(tuned.issues, config, absolutePath, options.baselineReason);
    const finalResult = withIssues(
      result,
      baseline.issues,
      analyzers.map((analyzer) => analyzer.meta),
    );
    renderOutput(finalResult, format, config, baseline.suppressedCount);

    if (shouldFailForThreshold(finalResult, normalizeExitThreshold(config.exitThreshold))) {
      process.exitCode = 1;
    }
    return finalResult;
  } catch (error) {
    if (
      error instanceof ConfigError ||
      error instanceof ValidationError ||
      error instanceof AnalyzerOptionError ||
      error instanceof ParseFailureLimitError
    ) {
      logger.error(error.message);
      if (error instanceof ValidationError && error.hint) logger.info(error.hint);
      process.exitCode = 1;
      return undefined;
    }
    throw error;
  }
}
