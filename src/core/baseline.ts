import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

import { AnalysisIssue } from '../types';
import { logger } from './logger';
import { isRecord } from './php/nodes';

export const BASELINE_SCHEMA_VERSION = '1.0.0';
export const DEFAULT_BASELINE_FILE = '.laravel-lint-baseline.json';

/** Metadata for a suppressed issue, providing an audit trail */
export interface SuppressionMetadata {
  fingerprint: string;
  addedAt: string;
  addedBy?: string;
  reason?: string;
  /** Suppression is ignored after this ISO 8601 date */
  expiresAt?: string;
  ruleId?: string;
}

interface BaselineFile {
  schemaVersion: string;
  generatedAt: string;
  fingerprints: string[];
  suppressions?: SuppressionMetadata[];
}

/**
 * Line-insensitive issue identity: moving code around a file keeps the
 * fingerprint, editing the message or moving the issue to another file does not.
 */
export function issueFingerprint(parts: { ruleId: string; file: string; code: string; message: string }): string {
  return crypto
    .createHash('sha256')
    .update([parts.ruleId, parts.file, parts.code, parts.message].join('|'))
    .digest('hex')
    .slice(0, 32);
}

export function resolveBaselinePath(projectPath: string, customPath?: string): string {
  if (customPath) return path.resolve(customPath);
  return path.join(projectPath, DEFAULT_BASELINE_FILE);
}

export interface LoadedBaseline {
  fingerprints: Set<string>;
  suppressions: Map<string, SuppressionMetadata>;
}

function toSuppression(value: unknown): SuppressionMetadata | null {
  if (!isRecord(value) || typeof value.fingerprint !== 'string') return null;
  const record: Record<string, unknown> = value;
  const optional = (key: string): string | undefined => {
    const field = record[key];
    return typeof field === 'string' ? field : undefined;
  };
  return {
    fingerprint: value.fingerprint,
    addedAt: optional('addedAt') ?? '',
    addedBy: optional('addedBy'),
    reason: optional('reason'),
    expiresAt: optional('expiresAt'),
    ruleId: optional('ruleId'),
  };
}

export function loadBaselineFingerprints(filePath: string): Set<string> {
  return loadBaselineWithMetadata(filePath).fingerprints;
}

export function loadBaselineWithMetadata(filePath: string, now = new Date()): LoadedBaseline {
  const empty: LoadedBaseline = { fingerprints: new Set(), suppressions: new Map() };
  if (!fs.existsSync(filePath)) return empty;

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    logger.warn(`Failed to read baseline ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return empty;
  }
  if (!isRecord(parsed)) return empty;

  const fingerprints = new Set<string>(
    Array.isArray(parsed.fingerprints)
      ? parsed.fingerprints.filter((item): item is string => typeof item === 'string')
      : [],
  );

  const suppressions = new Map<string, SuppressionMetadata>();
  if (Array.isArray(parsed.suppressions)) {
    for (const entry of parsed.suppressions) {
      const suppression = toSuppression(entry);
      if (!suppression) continue;
      if (suppression.expiresAt && new Date(suppression.expiresAt) <= now) {
        logger.debug(`Baseline suppression expired: ${suppression.fingerprint}`);
        fingerprints.delete(suppression.fingerprint);
        continue;
      }
      suppressions.set(suppression.fingerprint, suppression);
      fingerprints.add(suppression.fingerprint);
    }
  }

  return { fingerprints, suppressions };
}

export function filterIssuesByBaseline(
  issues: AnalysisIssue[],
  fingerprints: Set<string>,
): { issues: AnalysisIssue[]; suppressedCount: number } {
  if (fingerprints.size === 0) {
    return { issues, suppressedCount: 0 };
  }

  const kept: AnalysisIssue[] = [];
  let suppressedCount = 0;

  for (const issue of issues) {
    if (fingerprints.has(issue.fingerprint)) {
      suppressedCount += 1;
      continue;
    }
    kept.push(issue);
  }

  return { issues: kept, suppressedCount };
}

export interface WriteBaselineOptions {
  includeMetadata?: boolean;
  reason?: string;
}

function getCurrentUser(): string {
  return (
    process.env.GITHUB_ACTOR ||
    process.env.GITLAB_USER_LOGIN ||
    process.env.CI_COMMITTER_NAME ||
    process.env.USER ||
    process.env.USERNAME ||
    os.userInfo().username ||
    'unknown'
  );
}

export function writeBaselineFile(filePath: string, issues: AnalysisIssue[], options: WriteBaselineOptions = {}): number {
  const now = new Date().toISOString();

  const uniqueFingerprints = new Map<string, AnalysisIssue>();
  for (const issue of issues) {
    if (!uniqueFingerprints.has(issue.fingerprint)) {
      uniqueFingerprints.set(issue.fingerprint, issue);
    }
  }

  const fingerprints = Array.from(uniqueFingerprints.keys()).sort();

  const payload: BaselineFile = {
    schemaVersion: BASELINE_SCHEMA_VERSION,
    generatedAt: now,
    fingerprints,
  };

  if (options.includeMetadata) {
    const addedBy = getCurrentUser();
    payload.suppressions = fingerprints.map((fp) => ({
      fingerprint: fp,
      addedAt: now,
      addedBy,
      reason: options.reason,
      ruleId: uniqueFingerprints.get(fp)?.ruleId,
    }));
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(payload, null, 2), 'utf8');
  return fingerprints.length;
}
