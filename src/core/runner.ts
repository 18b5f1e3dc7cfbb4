/**
 * Analysis runner.
 *
 * Discovers files, builds the model registry once, then parses and traverses
 * each file a single time with every applicable analyzer's visitor attached.
 * Files are processed concurrently; results are sorted so that repeated runs
 * produce identical output.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { performance } from 'node:perf_hooks';

import type { AnalysisIssue, AnalysisResult, AnalyzerReport, ParseFailureRecord } from '../types';
import { createIssue, statusFor, statusMessage, type Analyzer, type FileContext, type IssueDraft, type ProjectContext } from './analyzer';
import { DEFAULT_EXCLUDED_PATHS, DEFAULT_SCAN_PATHS, discoverSourceFiles, toRelative, walkFiles } from './files';
import { logger } from './logger';
import { DEFAULT_MODEL_PATHS, ModelRegistry, RegistryStore, collectClassRecords } from './model-registry';
import { nodeSource, startLine, type PhpNode } from './php/nodes';
import { parsePhp } from './php/parser';
import { traverse, type NodeVisitor } from './php/traverse';
import { globToRegExp } from './rule-tuning';
import { ScopeTracker } from './scope';
import { summarizeIssues } from './summary';
import { collectSuppressions, isSuppressedAt, type FileSuppressions } from './suppression';
import { TOOL_VERSION } from './version';

export const DEFAULT_CONCURRENCY = 8;
export const ANALYZER_ERROR_CODE = 'analyzer-error';

export class ParseFailureLimitError extends Error {
  constructor(readonly failures: ParseFailureRecord[]) {
    super(`Aborting: ${failures.length} file(s) failed to parse.`);
    this.name = 'ParseFailureLimitError';
  }
}

export interface RunOptions {
  projectPath: string;
  analyzers: Analyzer[];
  /** Scan paths relative to the project root. */
  paths?: string[];
  excludedPaths?: string[];
  /** Pre-built registry; otherwise one is taken from `registryStore`. */
  registry?: ModelRegistry;
  registryStore?: RegistryStore;
  concurrency?: number;
  /** Abort after this many unparseable files. Unlimited when absent. */
  maxParseFailures?: number;
  onFileAnalyzed?: (file: string, done: number, total: number) => void;
}

export interface FileAnalysis {
  file: string;
  /** Issues per analyzer id. */
  issues: Map<string, AnalysisIssue[]>;
  /** Analyzer ids whose visitor saw the file. */
  analyzedBy: string[];
  parseFailure?: ParseFailureRecord;
  /** Markers found in the file; absent when it was not parsed. */
  suppressions?: FileSuppressions;
  durations: Map<string, number>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function analyzerError(analyzer: Analyzer, file: string, line: number, error: unknown): AnalysisIssue {
  logger.debug(`Analyzer ${analyzer.meta.id} failed on ${file}:${line}:`, error);
  return createIssue(
    analyzer.meta,
    {
      code: ANALYZER_ERROR_CODE,
      severity: 'low',
      line,
      message: `${analyzer.meta.name} failed; findings for this file may be incomplete.`,
      recommendation: 'Fix runtime/analyzer errors and rerun the analysis.',
      metadata: { details: errorMessage(error) },
    },
    file,
  );
}

/**
 * Wraps a visitor so that a throwing analyzer records one `analyzer-error`
 * issue and stops receiving callbacks for the rest of the file.
 */
function guardVisitor(
  visitor: NodeVisitor,
  onError: (error: unknown, node: PhpNode | null) => void,
  onElapsed: (ms: number) => void,
): NodeVisitor {
  let failed = false;
  const call = (fn: () => void, node: PhpNode | null): void => {
    if (failed) return;
    const started = performance.now();
    try {
      fn();
    } catch (error) {
      failed = true;
      onError(error, node);
    } finally {
      onElapsed(performance.now() - started);
    }
  };
  return {
    enterNode: (node, parent) => call(() => visitor.enterNode?.(node, parent), node),
    leaveNode: (node, parent) => call(() => visitor.leaveNode?.(node, parent), node),
    afterTraverse: () => call(() => visitor.afterTraverse?.(), null),
  };
}

/** File order, then line, then code, then message. */
export function compareIssues(a: AnalysisIssue, b: AnalysisIssue): number {
  return (
    a.location.file.localeCompare(b.location.file) ||
    a.location.line - b.location.line ||
    a.code.localeCompare(b.code) ||
    a.message.localeCompare(b.message) ||
    a.ruleId.localeCompare(b.ruleId)
  );
}

/**
 * Parses one file and runs every applicable analyzer over it in a single
 * traversal. A parse failure skips the file for all analyzers.
 */
export function analyzeFile(file: string, source: string, analyzers: Analyzer[], registry: ModelRegistry): FileAnalysis {
  const result: FileAnalysis = { file, issues: new Map(), analyzedBy: [], durations: new Map() };
  const applicable = analyzers.filter((analyzer) => analyzer.createVisitor && (analyzer.appliesTo?.(file) ?? true));
  // Project hooks still need the file's suppression markers.
  if (applicable.length === 0 && !analyzers.some((analyzer) => analyzer.analyzeProject)) return result;

  const parsed = parsePhp(source, file);
  if (!parsed.ok) {
    logger.debug(`Skipping ${file}: ${parsed.error.message}`);
    result.parseFailure = { file, line: parsed.error.line, message: parsed.error.message };
    return result;
  }

  const program = parsed.program;
  const suppressions = collectSuppressions(program, source);
  result.suppressions = suppressions;
  const scope = new ScopeTracker({ registry, suppressions, localClasses: collectClassRecords(program, file) });
  const lines = source.split(/\r?\n/);
  const visitors: NodeVisitor[] = [];

  for (const analyzer of applicable) {
    const { id } = analyzer.meta;
    const issues: AnalysisIssue[] = [];
    result.issues.set(id, issues);
    result.analyzedBy.push(id);
    result.durations.set(id, 0);

    const isSuppressed = (line: number): boolean => scope.isSuppressed(id) || isSuppressedAt(suppressions, id, line);
    const context: FileContext = {
      file,
      source,
      program,
      scope,
      registry,
      report(draft: IssueDraft) {
        const target = draft.file ?? file;
        if (target === file && isSuppressed(draft.line)) return;
        const snippet = draft.snippet ?? (target === file ? lines[draft.line - 1]?.trim() : undefined);
        issues.push(createIssue(analyzer.meta, { ...draft, snippet: snippet || undefined }, target));
      },
      isSuppressed,
      text: (node) => nodeSource(node, source),
    };

    let visitor: NodeVisitor;
    try {
      const created = analyzer.createVisitor?.(context);
      if (!created) continue;
      visitor = created;
    } catch (error) {
      issues.push(analyzerError(analyzer, file, 1, error));
      continue;
    }
    visitors.push(
      guardVisitor(
        visitor,
        (error, node) => issues.push(analyzerError(analyzer, file, node ? Math.max(startLine(node), 1) : 1, error)),
        (ms) => result.durations.set(id, (result.durations.get(id) ?? 0) + ms),
      ),
    );
  }

  traverse(program, visitors, scope);
  return result;
}

async function mapWithConcurrency<T>(items: T[], limit: number, worker: (item: T) => Promise<void>): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (next < items.length) {
      const item = items[next];
      next += 1;
      await worker(item);
    }
  });
  await Promise.all(lanes);
}

function createProjectContext(
  projectPath: string,
  files: string[],
  registry: ModelRegistry,
  report: (draft: IssueDraft & { file: string }) => void,
): ProjectContext {
  const root = path.resolve(projectPath);
  let listing: Promise<string[]> | undefined;

  return {
    projectPath: root,
    files,
    registry,
    report,
    readFile(relativePath: string): string | undefined {
      const fullPath = path.resolve(root, relativePath);
      if (fullPath !== root && !fullPath.startsWith(root + path.sep)) return undefined;
      if (!fs.existsSync(fullPath) || !fs.statSync(fullPath).isFile()) return undefined;
      return fs.readFileSync(fullPath, 'utf8');
    },
    async listFiles(pattern: string): Promise<string[]> {
      listing ??= walkFiles(root).then((all) => all.map((file) => toRelative(root, file)));
      const regex = globToRegExp(pattern);
      return (await listing).filter((file) => regex.test(file));
    },
  };
}

/** Registry settings contributed by the analyzers, merged. */
function registryOptions(analyzers: Analyzer[]): { modelPaths: string[]; tableMappings: Record<string, string> } {
  const modelPaths = new Set<string>();
  const tableMappings: Record<string, string> = {};
  for (const analyzer of analyzers) {
    for (const modelPath of analyzer.registryOptions?.modelPaths ?? []) modelPaths.add(modelPath);
    Object.assign(tableMappings, analyzer.registryOptions?.tableMappings ?? {});
  }
  return { modelPaths: modelPaths.size > 0 ? [...modelPaths] : DEFAULT_MODEL_PATHS, tableMappings };
}

export async function runAnalysis(options: RunOptions): Promise<AnalysisResult> {
  const projectPath = path.resolve(options.projectPath);
  const { analyzers } = options;
  const started = performance.now();

  const files = await discoverSourceFiles(
    projectPath,
    options.paths ?? DEFAULT_SCAN_PATHS,
    options.excludedPaths ?? DEFAULT_EXCLUDED_PATHS,
  );
  logger.debug(`Discovered ${files.length} PHP file(s) under ${projectPath}`);

  const registry =
    options.registry ??
    (await (options.registryStore ?? new RegistryStore()).get({ projectPath, ...registryOptions(analyzers) }));

  for (const analyzer of analyzers) analyzer.reset?.();

  const buckets = new Map<string, AnalysisIssue[]>(analyzers.map((analyzer) => [analyzer.meta.id, []]));
  const fileCounts = new Map<string, number>(analyzers.map((analyzer) => [analyzer.meta.id, 0]));
  const durations = new Map<string, number>(analyzers.map((analyzer) => [analyzer.meta.id, 0]));
  const fileSuppressions = new Map<string, FileSuppressions>();
  const parseFailures: ParseFailureRecord[] = [];
  const limit = options.maxParseFailures;
  let done = 0;

  await mapWithConcurrency(files, options.concurrency ?? DEFAULT_CONCURRENCY, async (sourceFile) => {
    if (limit !== undefined && parseFailures.length >= limit) return;
    let source: string;
    try {
      source = await fs.promises.readFile(sourceFile.absolutePath, 'utf8');
    } catch (error) {
      logger.warn(`Cannot read ${sourceFile.relativePath}: ${errorMessage(error)}`);
      parseFailures.push({ file: sourceFile.relativePath, message: errorMessage(error) });
      return;
    }

    const analysis = analyzeFile(sourceFile.relativePath, source, analyzers, registry);
    if (analysis.parseFailure) parseFailures.push(analysis.parseFailure);
    for (const id of analysis.analyzedBy) fileCounts.set(id, (fileCounts.get(id) ?? 0) + 1);
    for (const [id, issues] of analysis.issues) buckets.get(id)?.push(...issues);
    for (const [id, ms] of analysis.durations) durations.set(id, (durations.get(id) ?? 0) + ms);
    if (analysis.suppressions) fileSuppressions.set(sourceFile.relativePath, analysis.suppressions);

    done += 1;
    options.onFileAnalyzed?.(sourceFile.relativePath, done, files.length);
  });

  if (limit !== undefined && parseFailures.length >= limit) {
    throw new ParseFailureLimitError([...parseFailures].sort((a, b) => a.file.localeCompare(b.file)));
  }

  const relativeFiles = files.map((file) => file.relativePath);
  for (const analyzer of analyzers) {
    if (!analyzer.analyzeProject) continue;
    const bucket = buckets.get(analyzer.meta.id) ?? [];
    const context = createProjectContext(projectPath, relativeFiles, registry, (draft) => {
      const suppressions = fileSuppressions.get(draft.file);
      if (suppressions && isSuppressedAt(suppressions, analyzer.meta.id, draft.line)) return;
      bucket.push(createIssue(analyzer.meta, draft, draft.file));
    });
    const hookStarted = performance.now();
    try {
      await analyzer.analyzeProject(context);
    } catch (error) {
      bucket.push(analyzerError(analyzer, '.', 1, error));
    }
    durations.set(analyzer.meta.id, (durations.get(analyzer.meta.id) ?? 0) + performance.now() - hookStarted);
  }

  const reports: AnalyzerReport[] = analyzers.map((analyzer) => {
    const { meta } = analyzer;
    const issues = (buckets.get(meta.id) ?? []).sort(compareIssues);
    const filesAnalyzed = fileCounts.get(meta.id) ?? 0;
    const status = filesAnalyzed === 0 && !analyzer.analyzeProject ? 'skipped' : statusFor(issues, meta.failOn);
    return {
      analyzerId: meta.id,
      name: meta.name,
      category: meta.category,
      status,
      message: statusMessage(meta.name, status, issues.length),
      issues,
      filesAnalyzed,
      durationMs: Math.round(durations.get(meta.id) ?? 0),
    };
  });

  const issues = reports.flatMap((report) => report.issues).sort(compareIssues);
  logger.debug(`Analysis finished in ${Math.round(performance.now() - started)}ms`);

  return {
    projectPath,
    timestamp: new Date().toISOString(),
    toolVersion: TOOL_VERSION,
    filesScanned: files.length,
    parseFailures: parseFailures.sort((a, b) => a.file.localeCompare(b.file)),
    reports,
    issues,
    summary: summarizeIssues(issues),
  };
}
