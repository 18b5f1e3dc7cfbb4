/**
 * Post-run transformations of an analysis result: rule tuning and baseline
 * filtering change the issue list, after which each analyzer's report, status
 * and the summary are rebuilt from what remains.
 */

import type { AnalysisIssue, AnalysisResult } from '../types';
import { statusFor, statusMessage, type AnalyzerMeta } from './analyzer';
import { compareIssues } from './runner';
import { summarizeIssues } from './summary';

export function withIssues(result: AnalysisResult, issues: AnalysisIssue[], metas: readonly AnalyzerMeta[]): AnalysisResult {
  const failOn = new Map(metas.map((meta) => [meta.id, meta.failOn]));
  const byRule = new Map<string, AnalysisIssue[]>();
  for (const issue of issues) {
    const bucket = byRule.get(issue.ruleId) ?? [];
    bucket.push(issue);
    byRule.set(issue.ruleId, bucket);
  }

  const reports = result.reports.map((report) => {
    const kept = (byRule.get(report.analyzerId) ?? []).sort(compareIssues);
    const status = report.status === 'skipped' ? 'skipped' : statusFor(kept, failOn.get(report.analyzerId));
    return { ...report, issues: kept, status, message: statusMessage(report.name, status, kept.length) };
  });
  const sorted = [...issues].sort(compareIssues);

  return { ...result, reports, issues: sorted, summary: summarizeIssues(sorted) };
}
