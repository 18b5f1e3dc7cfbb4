import * as fs from 'node:fs';
import * as path from 'node:path';

import { createIssue, type AnalyzerMeta } from '../src/core/analyzer';
import {
  DEFAULT_BASELINE_FILE,
  filterIssuesByBaseline,
  issueFingerprint,
  loadBaselineFingerprints,
  loadBaselineWithMetadata,
  resolveBaselinePath,
  writeBaselineFile,
} from '../src/core/baseline';
import { isRecord } from '../src/core/php/nodes';
import type { AnalysisIssue } from '../src/types';
import { createProject, removeProject } from './helpers';

const META: AnalyzerMeta = {
  id: 'silent-failure',
  name: 'Silent Failure Analyzer',
  description: 'Swallowed exceptions',
  category: 'best-practices',
  severity: 'high',
  tags: [],
};

function issue(file: string, line: number, message = 'Empty catch block silently swallows exceptions'): AnalysisIssue {
  return createIssue(META, { message, line, recommendation: 'Log or rethrow' }, file);
}

describe('issueFingerprint', () => {
  it('should ignore the line but not the file', () => {
    const first = issue('app/Services/SyncService.php', 10);
    const moved = issue('app/Services/SyncService.php', 42);
    const elsewhere = issue('app/Services/ExportService.php', 10);

    expect(moved.fingerprint).toBe(first.fingerprint);
    expect(elsewhere.fingerprint).not.toBe(first.fingerprint);
    expect(first.fingerprint).toBe(
      issueFingerprint({
        ruleId: 'silent-failure',
        file: 'app/Services/SyncService.php',
        code: 'silent-failure',
        message: 'Empty catch block silently swallows exceptions',
      }),
    );
    expect(first.fingerprint).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe('baseline files', () => {
  let root: string;

  beforeEach(() => {
    root = createProject({});
  });

  afterEach(() => {
    removeProject(root);
  });

  it('should resolve the default location inside the project', () => {
    expect(resolveBaselinePath(root)).toBe(path.join(root, DEFAULT_BASELINE_FILE));
    expect(resolveBaselinePath(root, path.join(root, 'ci', 'baseline.json'))).toBe(path.join(root, 'ci', 'baseline.json'));
  });

  it('should write unique fingerprints and suppress them on the next run', () => {
    const file = path.join(root, 'ci', 'baseline.json');
    const known = [issue('app/Services/SyncService.php', 10), issue('app/Services/SyncService.php', 20)];

    expect(writeBaselineFile(file, known, { includeMetadata: true, reason: 'Existing debt' })).toBe(1);

    const written: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    expect(isRecord(written) && written.fingerprints).toEqual([known[0].fingerprint]);
    const loaded = loadBaselineWithMetadata(file);
    expect(loaded.suppressions.get(known[0].fingerprint)?.reason).toBe('Existing debt');
    expect(loaded.suppressions.get(known[0].fingerprint)?.ruleId).toBe('silent-failure');

    const fresh = issue('app/Services/ExportService.php', 5);
    const filtered = filterIssuesByBaseline([...known, fresh], loadBaselineFingerprints(file));
    expect(filtered).toEqual({ issues: [fresh], suppressedCount: 2 });
  });

  it('should drop expired suppressions', () => {
    const file = path.join(root, DEFAULT_BASELINE_FILE);
    fs.writeFileSync(
      file,
      JSON.stringify({
        schemaVersion: '1.0.0',
        generatedAt: '2026-01-01T00:00:00.000Z',
        fingerprints: ['aaaa', 'bbbb'],
        suppressions: [
          { fingerprint: 'aaaa', addedAt: '2026-01-01T00:00:00.000Z', expiresAt: '2026-02-01T00:00:00.000Z' },
          { fingerprint: 'cccc', addedAt: '2026-01-01T00:00:00.000Z', expiresAt: '2026-12-01T00:00:00.000Z' },
        ],
      }),
    );

    const loaded = loadBaselineWithMetadata(file, new Date('2026-06-01T00:00:00.000Z'));
    expect([...loaded.fingerprints].sort()).toEqual(['bbbb', 'cccc']);
    expect([...loaded.suppressions.keys()]).toEqual(['cccc']);
  });

  it('should treat a missing or unreadable baseline as empty', () => {
    expect(loadBaselineFingerprints(path.join(root, 'absent.json')).size).toBe(0);

    const file = path.join(root, 'broken.json');
    fs.writeFileSync(file, '{ not json');
    expect(loadBaselineFingerprints(file).size).toBe(0);
  });
});
