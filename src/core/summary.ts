/**
 * Shared issue summary utilities
 */

import { AnalysisIssue, IssueSummary, Severity } from '../types';

export const SEVERITY_ORDER: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export const SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

export function isSeverity(value: unknown): value is Severity {
  return value === 'critical' || value === 'high' || value === 'medium' || value === 'low';
}

export function severityAtLeast(severity: Severity, minimum: Severity): boolean {
  return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[minimum];
}

/**
 * Count issues by severity and return a summary object.
 */
export function summarizeIssues(issues: AnalysisIssue[]): IssueSummary {
  return {
    critical: issues.filter((i) => i.severity === 'critical').length,
    high: issues.filter((i) => i.severity === 'high').length,
    medium: issues.filter((i) => i.severity === 'medium').length,
    low: issues.filter((i) => i.severity === 'low').length,
    total: issues.length,
  };
}
