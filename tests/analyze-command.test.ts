import * as fs from 'node:fs';
import * as path from 'node:path';

import { executeAnalyzeCommand, type AnalyzeCommandOptions } from '../src/commands/analyze';
import { DEFAULT_BASELINE_FILE } from '../src/core/baseline';
import { isRecord } from '../src/core/php/nodes';
import { createProject, removeProject } from './helpers';

const CLEANUP = `<?php
use Illuminate\\Support\\Facades\\DB;
DB::unprepared('TRUNCATE jobs');
`;

describe('executeAnalyzeCommand', () => {
  let root: string;
  let stderr: jest.SpyInstance;

  beforeEach(() => {
    root = createProject({
      'composer.json': JSON.stringify({ require: { 'laravel/framework': '^11.0' } }),
      'app/Console/Cleanup.php': CLEANUP,
    });
    stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    process.exitCode = undefined;
  });

  afterEach(() => {
    stderr.mockRestore();
    process.exitCode = undefined;
    removeProject(root);
  });

  function options(extra: AnalyzeCommandOptions = {}): AnalyzeCommandOptions {
    return { format: 'json', output: path.join(root, 'report.json'), only: 'sql-injection', cache: false, quiet: true, ...extra };
  }

  it('should write the report and fail on findings at the threshold', async () => {
    const result = await executeAnalyzeCommand(root, options());

    expect(result?.issues.map((issue) => [issue.location.file, issue.location.line, issue.ruleId])).toEqual([
      ['app/Console/Cleanup.php', 3, 'sql-injection'],
    ]);
    const report: unknown = JSON.parse(fs.readFileSync(path.join(root, 'report.json'), 'utf8'));
    expect(isRecord(report) && isRecord(report.result) && report.result.summary).toEqual({
      critical: 1,
      high: 0,
      medium: 0,
      low: 0,
      total: 1,
    });
    expect(process.exitCode).toBe(1);
  });

  it('should pass when the threshold is none', async () => {
    await executeAnalyzeCommand(root, options({ exitThreshold: 'none' }));
    expect(process.exitCode).toBeUndefined();
  });

  it('should suppress issues recorded in a baseline', async () => {
    await executeAnalyzeCommand(root, options({ writeBaseline: true }));
    expect(fs.existsSync(path.join(root, DEFAULT_BASELINE_FILE))).toBe(true);

    process.exitCode = undefined;
    const result = await executeAnalyzeCommand(root, options({ baseline: true }));
    expect(result?.issues).toEqual([]);
    expect(result?.reports.map((report) => report.status)).toEqual(['passed']);
    expect(process.exitCode).toBeUndefined();
  });

  it('should report invalid flags without running', async () => {
    const result = await executeAnalyzeCommand(root, options({ format: 'xml' }));

    expect(result).toBeUndefined();
    expect(process.exitCode).toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      expect.stringContaining('Unsupported output format "xml". Supported values: console, json, sarif'),
    );
  });

  it('should reject directories that are not Laravel projects', async () => {
    const empty = createProject({});
    try {
      const result = await executeAnalyzeCommand(empty, options());
      expect(result).toBeUndefined();
      expect(process.exitCode).toBe(1);
    } finally {
      removeProject(empty);
    }
  });
});
