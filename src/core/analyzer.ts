/**
 * Analyzer capability.
 *
 * An analyzer contributes a visitor to the shared per-file traversal, a
 * project-level hook, or both. Analyzers never parse files or walk the tree
 * themselves; the runner does that once per file for all of them.
 */

import type { AnalysisIssue, AnalyzerCategory, AnalyzerStatus, Severity } from '../types';
import { issueFingerprint } from './baseline';
import type { ModelRegistry } from './model-registry';
import type { NodeVisitor } from './php/traverse';
import type { PhpNode } from './php/nodes';
import type { ScopeTracker } from './scope';
import { severityAtLeast } from './summary';

export interface AnalyzerMeta {
  /** Stable rule id used in configuration, suppression markers and baselines. */
  id: string;
  name: string;
  description: string;
  category: AnalyzerCategory;
  /** Severity of issues that do not set their own. */
  severity: Severity;
  /** Lowest severity that marks the report as failed. Defaults to `low`. */
  failOn?: Severity;
  tags: string[];
  docsUrl?: string;
}

export interface IssueDraft {
  message: string;
  line: number;
  endLine?: number;
  severity?: Severity;
  /** Defaults to the analyzer id. */
  code?: string;
  recommendation: string;
  metadata?: Record<string, unknown>;
  /** Project hooks report against other files; visitors default to the current one. */
  file?: string;
  snippet?: string;
}

export interface FileContext {
  /** Path relative to the project root, with forward slashes. */
  readonly file: string;
  readonly source: string;
  readonly program: PhpNode;
  readonly scope: ScopeTracker;
  readonly registry: ModelRegistry;
  report(draft: IssueDraft): void;
  /** True when a marker or an enclosing suppressed class silences this analyzer at `line`. */
  isSuppressed(line: number): boolean;
  /** Source text of a node. */
  text(node: PhpNode): string;
}

export interface ProjectContext {
  readonly projectPath: string;
  /** Relative paths of the files the run analyzed. */
  readonly files: readonly string[];
  readonly registry: ModelRegistry;
  /** Reads a project-relative file; undefined when it does not exist or escapes the project. */
  readFile(relativePath: string): string | undefined;
  /** Project-relative files matching a glob; `**` spans directories. */
  listFiles(pattern: string): Promise<string[]>;
  report(draft: IssueDraft & { file: string }): void;
}

/** Model directories and table mappings an analyzer needs the registry built with. */
export interface RegistryRequirements {
  modelPaths?: string[];
  tableMappings?: Record<string, string>;
}

export interface Analyzer {
  readonly meta: AnalyzerMeta;
  readonly registryOptions?: RegistryRequirements;
  /** Restricts the files the visitor sees. All files when absent. */
  appliesTo?(file: string): boolean;
  /** Called once per file; the visitor lives for that file only. */
  createVisitor?(context: FileContext): NodeVisitor;
  /** Called once after every file has been traversed. */
  analyzeProject?(context: ProjectContext): void | Promise<void>;
  /** Clears state carried between files before a new run. */
  reset?(): void;
}

export function createIssue(meta: AnalyzerMeta, draft: IssueDraft, file: string): AnalysisIssue {
  const code = draft.code ?? meta.id;
  const location = draft.endLine !== undefined && draft.endLine !== draft.line
    ? { file, line: draft.line, endLine: draft.endLine }
    : { file, line: draft.line };
  return {
    ruleId: meta.id,
    severity: draft.severity ?? meta.severity,
    category: meta.category,
    code,
    message: draft.message,
    recommendation: draft.recommendation,
    location,
    snippet: draft.snippet,
    metadata: draft.metadata ?? {},
    docsUrl: meta.docsUrl,
    fingerprint: issueFingerprint({ ruleId: meta.id, file, code, message: draft.message }),
  };
}

export function statusFor(issues: readonly AnalysisIssue[], failOn: Severity = 'low'): AnalyzerStatus {
  if (issues.length === 0) return 'passed';
  return issues.some((issue) => severityAtLeast(issue.severity, failOn)) ? 'failed' : 'warning';
}

export function statusMessage(name: string, status: AnalyzerStatus, issueCount: number): string {
  switch (status) {
    case 'passed':
      return `${name}: no issues found`;
    case 'skipped':
      return `${name}: no applicable files`;
    default:
      return `${name}: ${issueCount} issue${issueCount === 1 ? '' : 's'} found`;
  }
}
