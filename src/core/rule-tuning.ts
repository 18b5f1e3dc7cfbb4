import { AnalysisIssue, Severity } from '../types';

export interface RuleSetting {
  enabled?: boolean;
  severity?: Severity;
  ignorePaths?: string[];
}

export type RuleSettings = Record<string, RuleSetting>;

function normalizePath(value: string): string {
  return value.replace(/\\/g, '/').replace(/^\.\/+/, '');
}

function escapeRegex(value: string): string {
  return value.replace(/[|\\{}()[\]^$+?.]/g, '\\$&');
}

const globCache = new Map<string, RegExp>();

// `**` spans directories and a leading `**` segment may match none; `*` stays within one path segment.
export function globToRegExp(pattern: string): RegExp {
  const cached = globCache.get(pattern);
  if (cached) return cached;
  const dirMarker = '__LARAVEL_LINT_DIRSTAR__';
  const marker = '__LARAVEL_LINT_GLOBSTAR__';
  const escaped = escapeRegex(normalizePath(pattern))
    .replace(/\*\*\//g, dirMarker)
    .replace(/\*\*/g, marker)
    .replace(/\*/g, '[^/]*')
    .replace(new RegExp(dirMarker, 'g'), '(?:.*/)?')
    .replace(new RegExp(marker, 'g'), '.*');
  const regex = new RegExp(`^${escaped}$`);
  globCache.set(pattern, regex);
  return regex;
}

export function matchesAnyPattern(filePath: string | undefined, patterns: string[] | undefined): boolean {
  if (!filePath || !patterns || patterns.length === 0) return false;
  const normalizedPath = normalizePath(filePath);
  return patterns.some((pattern) => globToRegExp(pattern).test(normalizedPath));
}

export function isRuleEnabled(ruleId: string, ruleSettings?: RuleSettings): boolean {
  return ruleSettings?.[ruleId]?.enabled !== false;
}

export function applyRuleSettings(
  issues: AnalysisIssue[],
  ruleSettings?: RuleSettings,
): { issues: AnalysisIssue[]; removedCount: number; modifiedCount: number } {
  if (!ruleSettings || Object.keys(ruleSettings).length === 0) {
    return { issues, removedCount: 0, modifiedCount: 0 };
  }

  const kept: AnalysisIssue[] = [];
  let removedCount = 0;
  let modifiedCount = 0;

  for (const issue of issues) {
    const setting = ruleSettings[issue.ruleId];
    if (!setting) {
      kept.push(issue);
      continue;
    }

    if (setting.enabled === false || matchesAnyPattern(issue.location.file, setting.ignorePaths)) {
      removedCount += 1;
      continue;
    }

    if (setting.severity && setting.severity !== issue.severity) {
      kept.push({ ...issue, severity: setting.severity });
      modifiedCount += 1;
      continue;
    }

    kept.push(issue);
  }

  return { issues: kept, removedCount, modifiedCount };
}
