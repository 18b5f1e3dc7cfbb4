/**
 * laravel-lint - Type Definitions
 */

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export type AnalyzerCategory = 'best-practices' | 'security';

export type AnalyzerStatus = 'passed' | 'warning' | 'failed' | 'skipped';

export interface IssueLocation {
  file: string;
  line: number;
  endLine?: number;
}

export interface AnalysisIssue {
  ruleId: string;
  severity: Severity;
  category: AnalyzerCategory;
  /** Machine-stable issue code, e.g. `n-plus-one-relationship`. */
  code: string;
  message: string;
  recommendation: string;
  location: IssueLocation;
  snippet?: string;
  metadata: Record<string, unknown>;
  docsUrl?: string;
  fingerprint: string;
}

export interface AnalyzerReport {
  analyzerId: string;
  name: string;
  category: AnalyzerCategory;
  status: AnalyzerStatus;
  message: string;
  issues: AnalysisIssue[];
  filesAnalyzed: number;
  durationMs: number;
}

export interface IssueSummary {
  critical: number;
  high: number;
  medium: number;
  low: number;
  total: number;
}

export interface AnalysisResult {
  projectPath: string;
  timestamp: string;
  toolVersion: string;
  filesScanned: number;
  parseFailures: ParseFailureRecord[];
  reports: AnalyzerReport[];
  issues: AnalysisIssue[];
  summary: IssueSummary;
}

export interface ParseFailureRecord {
  file: string;
  line?: number;
  message: string;
}

export type OutputFormat = 'console' | 'json' | 'sarif';
