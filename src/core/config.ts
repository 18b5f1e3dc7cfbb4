import * as fs from 'node:fs';
import * as path from 'node:path';

import type { OutputFormat } from '../types';
import { isExitThreshold, type ExitThreshold } from './exit-threshold';
import { logger } from './logger';
import type { AnalyzerOptions } from './options';
import { isRecord } from './php/nodes';
import { isPresetName, type PresetName } from './presets';
import type { RuleSetting, RuleSettings } from './rule-tuning';
import { isSeverity } from './summary';

export const CONFIG_FILE_NAME = 'laravel-lint.config.json';

export const SUPPORTED_OUTPUT_FORMATS = ['console', 'json', 'sarif'] as const;

export function isSupportedOutputFormat(format: string): format is OutputFormat {
  return format === 'console' || format === 'json' || format === 'sarif';
}

export interface LintFileConfig {
  paths?: string[];
  excludedPaths?: string[];
  format?: OutputFormat;
  output?: string;
  exitThreshold?: ExitThreshold;
  preset?: PresetName;
  only?: string[];
  skip?: string[];
  baseline?: boolean | string;
  writeBaseline?: boolean | string;
  concurrency?: number;
  maxIssuesPerAnalyzer?: number;
  maxParseFailures?: number;
  cache?: boolean;
  cacheLocation?: string;
  verbose?: boolean;
  quiet?: boolean;
  ruleSettings?: RuleSettings;
  analyzers?: Record<string, AnalyzerOptions>;
}

export interface LoadedConfig {
  /** Absolute path of the file that was read, if any. */
  path?: string;
  values: LintFileConfig;
}

/**
 * Thrown when the configuration file is unreadable or invalid. Every problem
 * found in the file is listed in `errors`.
 */
export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    readonly errors: string[],
  ) {
    super(`Invalid configuration in ${configPath}:\n${errors.map((error) => `  - ${error}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

function resolvePathValue(value: string, configDirectory: string): string {
  return path.isAbsolute(value) ? value : path.resolve(configDirectory, value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

class FieldReader {
  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly configDirectory: string,
    readonly errors: string[],
  ) {}

  string(key: string): string | undefined {
    const value = this.raw[key];
    if (value === undefined || typeof value === 'string') return value;
    this.errors.push(`Config key "${key}" must be a string.`);
    return undefined;
  }

  path(key: string): string | undefined {
    const value = this.string(key);
    return value === undefined ? undefined : resolvePathValue(value, this.configDirectory);
  }

  boolean(key: string): boolean | undefined {
    const value = this.raw[key];
    if (value === undefined || typeof value === 'boolean') return value;
    this.errors.push(`Config key "${key}" must be a boolean.`);
    return undefined;
  }

  positiveInteger(key: string): number | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
    this.errors.push(`Config key "${key}" must be a positive integer.`);
    return undefined;
  }

  stringList(key: string): string[] | undefined {
    const value = this.raw[key];
    if (value === undefined || isStringArray(value)) return value;
    this.errors.push(`Config key "${key}" must be an array of strings.`);
    return undefined;
  }

  booleanOrPath(key: string): boolean | string | undefined {
    const value = this.raw[key];
    if (value === undefined || typeof value === 'boolean') return value;
    if (typeof value === 'string') return resolvePathValue(value, this.configDirectory);
    this.errors.push(`Config key "${key}" must be a boolean or string path.`);
    return undefined;
  }

  oneOf<T extends string>(key: string, guard: (value: string) => value is T, label: string): T | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    if (typeof value === 'string' && guard(value)) return value;
    this.errors.push(`Config key "${key}" must be one of: ${label}.`);
    return undefined;
  }
}

function validateRuleSetting(ruleId: string, value: Record<string, unknown>, errors: string[]): RuleSetting {
  const setting: RuleSetting = {};
  for (const key of Object.keys(value)) {
    if (key !== 'enabled' && key !== 'severity' && key !== 'ignorePaths') {
      errors.push(`ruleSettings["${ruleId}"] has unsupported key "${key}".`);
    }
  }
  if (value.enabled !== undefined) {
    if (typeof value.enabled === 'boolean') setting.enabled = value.enabled;
    else errors.push(`ruleSettings["${ruleId}"].enabled must be a boolean.`);
  }
  if (value.severity !== undefined) {
    if (isSeverity(value.severity)) setting.severity = value.severity;
    else errors.push(`ruleSettings["${ruleId}"].severity must be one of: critical, high, medium, low.`);
  }
  if (value.ignorePaths !== undefined) {
    if (isStringArray(value.ignorePaths)) setting.ignorePaths = value.ignorePaths;
    else errors.push(`ruleSettings["${ruleId}"].ignorePaths must be an array of strings.`);
  }
  return setting;
}

function validateRuleSettings(raw: unknown, errors: string[]): RuleSettings | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    errors.push('Config key "ruleSettings" must be an object.');
    return undefined;
  }
  const settings: RuleSettings = {};
  for (const [ruleId, value] of Object.entries(raw)) {
    if (!isRecord(value)) {
      errors.push(`ruleSettings["${ruleId}"] must be an object.`);
      continue;
    }
    settings[ruleId] = validateRuleSetting(ruleId, value, errors);
  }
  return settings;
}

/** Option bags are checked by each analyzer when it is constructed. */
function validateAnalyzerOptions(raw: unknown, errors: string[]): Record<string, AnalyzerOptions> | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    errors.push('Config key "analyzers" must be an object.');
    return undefined;
  }
  const options: Record<string, AnalyzerOptions> = {};
  for (const [ruleId, value] of Object.entries(raw)) {
    if (isRecord(value)) options[ruleId] = value;
    else errors.push(`analyzers["${ruleId}"] must be an object.`);
  }
  return options;
}

const KNOWN_KEYS = new Set([
  '$schema',
  'paths',
  'excludedPaths',
  'format',
  'output',
  'exitThreshold',
  'preset',
  'only',
  'skip',
  'baseline',
  'writeBaseline',
  'concurrency',
  'maxIssuesPerAnalyzer',
  'maxParseFailures',
  'cache',
  'cacheLocation',
  'verbose',
  'quiet',
  'ruleSettings',
  'analyzers',
]);

/** Drops keys whose value is undefined so that spreading the result never clears a default. */
function compact(values: LintFileConfig): LintFileConfig {
  const result: LintFileConfig = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) Object.assign(result, { [key]: value });
  }
  return result;
}

export function validateConfig(raw: unknown, configDirectory: string): { values: LintFileConfig; errors: string[] } {
  if (!isRecord(raw)) {
    return { values: {}, errors: ['Config file must contain a JSON object at the top level.'] };
  }

  const errors: string[] = [];
  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) errors.push(`Unsupported config key "${key}".`);
  }
  if (raw.$schema !== undefined && typeof raw.$schema !== 'string') {
    errors.push('Config key "$schema" must be a string.');
  }

  const fields = new FieldReader(raw, configDirectory, errors);
  const values = compact({
    paths: fields.stringList('paths'),
    excludedPaths: fields.stringList('excludedPaths'),
    format: fields.oneOf('format', isSupportedOutputFormat, SUPPORTED_OUTPUT_FORMATS.join(', ')),
    output: fields.path('output'),
    exitThreshold: fields.oneOf('exitThreshold', isExitThreshold, 'none, low, medium, high, critical'),
    preset: fields.oneOf('preset', isPresetName, 'strict, balanced, legacy'),
    only: fields.stringList('only'),
    skip: fields.stringList('skip'),
    baseline: fields.booleanOrPath('baseline'),
    writeBaseline: fields.booleanOrPath('writeBaseline'),
    concurrency: fields.positiveInteger('concurrency'),
    maxIssuesPerAnalyzer: fields.positiveInteger('maxIssuesPerAnalyzer'),
    maxParseFailures: fields.positiveInteger('maxParseFailures'),
    cache: fields.boolean('cache'),
    cacheLocation: fields.string('cacheLocation'),
    verbose: fields.boolean('verbose'),
    quiet: fields.boolean('quiet'),
    ruleSettings: validateRuleSettings(raw.ruleSettings, errors),
    analyzers: validateAnalyzerOptions(raw.analyzers, errors),
  });

  return { values, errors };
}

/**
 * Reads `laravel-lint.config.json` from the project root, or the file given
 * explicitly. A missing default file yields an empty configuration; a missing
 * explicit file is an error.
 */
export function loadConfig(projectPath: string, configPath?: string): LoadedConfig {
  const resolvedPath = configPath ? path.resolve(configPath) : path.join(projectPath, CONFIG_FILE_NAME);
  if (!fs.existsSync(resolvedPath)) {
    if (configPath) throw new ConfigError(resolvedPath, ['Config file does not exist.']);
    return { values: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolvedPath, 'utf8'));
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ConfigError(resolvedPath, [`Failed to parse config file: ${details}`]);
  }

  const { values, errors } = validateConfig(parsed, path.dirname(resolvedPath));
  if (errors.length > 0) throw new ConfigError(resolvedPath, errors);
  logger.debug(`Loaded configuration from ${resolvedPath}`);
  return { path: resolvedPath, values };
}

/** CLI values win over file values; keys the CLI leaves undefined fall through. */
export function mergeConfig(file: LintFileConfig, cli: LintFileConfig): LintFileConfig {
  return { ...file, ...compact(cli) };
}

/** Starter configuration written by `laravel-lint init`. */
export function starterConfig(): LintFileConfig {
  return {
    paths: ['app', 'config', 'database', 'routes'],
    excludedPaths: ['vendor/**', 'node_modules/**', 'storage/**', 'bootstrap/cache/**'],
    format: 'console',
    exitThreshold: 'high',
    preset: 'balanced',
    concurrency: 8,
    ruleSettings: {},
    analyzers: {
      'mixed-query-builder-eloquent': { model_paths: ['app/Models'], table_mappings: {} },
      'fat-model': { method_threshold: 15, loc_threshold: 300, complexity_threshold: 10 },
    },
  };
}
