/**
 * laravel-lint public API.
 */

export * from './types';
export { BUILTIN_ANALYZERS, createAnalyzers, createDefaultRegistry } from './analyzers';
export type { Analyzer, AnalyzerMeta, FileContext, IssueDraft, ProjectContext } from './core/analyzer';
export { AnalyzerRegistry, type AnalyzerDefinition, type AnalyzerSelection } from './core/analyzer-registry';
export { ConfigError, loadConfig, validateConfig, type LintFileConfig } from './core/config';
export { AnalyzerOptionError, type AnalyzerOptions } from './core/options';
export { ModelRegistry, RegistryStore } from './core/model-registry';
export { RegistryCache } from './core/cache';
export { analyzeFile, runAnalysis, ParseFailureLimitError, type RunOptions } from './core/runner';
export { ScopeTracker } from './core/scope';
export { parsePhp } from './core/php/parser';
export { applyRuleSettings, type RuleSettings } from './core/rule-tuning';
export { filterIssuesByBaseline, writeBaselineFile, loadBaselineFingerprints } from './core/baseline';
export { shouldFailForThreshold } from './core/exit-threshold';
export { summarizeIssues } from './core/summary';
export { withIssues } from './core/report';
export { ValidationError } from './core/validate';
export { ConsoleReporter } from './reporters/console';
export { JsonReporter } from './reporters/json';
export { SarifReporter } from './reporters/sarif';
