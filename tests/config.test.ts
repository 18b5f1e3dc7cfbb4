import * as path from 'node:path';

import { createAnalyzers } from '../src/analyzers';
import { cliConfig } from '../src/commands/analyze';
import { CONFIG_FILE_NAME, ConfigError, loadConfig, mergeConfig, validateConfig } from '../src/core/config';
import { AnalyzerOptionError } from '../src/core/options';
import { createProject, removeProject } from './helpers';

describe('validateConfig', () => {
  it('should reject a non-object document', () => {
    expect(validateConfig(['app'], '/project')).toEqual({
      values: {},
      errors: ['Config file must contain a JSON object at the top level.'],
    });
  });

  it('should collect every problem in the file', () => {
    const { errors } = validateConfig(
      {
        format: 'xml',
        concurrency: 0,
        extra: true,
        ruleSettings: { 'sql-injection': { severity: 'urgent', mute: true } },
        analyzers: { 'fat-model': 15 },
      },
      '/project',
    );

    expect(errors).toEqual([
      'Unsupported config key "extra".',
      'Config key "format" must be one of: console, json, sarif.',
      'Config key "concurrency" must be a positive integer.',
      'ruleSettings["sql-injection"] has unsupported key "mute".',
      'ruleSettings["sql-injection"].severity must be one of: critical, high, medium, low.',
      'analyzers["fat-model"] must be an object.',
    ]);
  });

  it('should resolve paths against the config directory', () => {
    const { values, errors } = validateConfig(
      { output: 'reports/lint.sarif', baseline: 'ci/baseline.json', writeBaseline: true, exitThreshold: 'medium' },
      '/project',
    );

    expect(errors).toEqual([]);
    expect(values).toEqual({
      output: path.resolve('/project', 'reports/lint.sarif'),
      baseline: path.resolve('/project', 'ci/baseline.json'),
      writeBaseline: true,
      exitThreshold: 'medium',
    });
  });
});

describe('loadConfig', () => {
  let root: string;

  afterEach(() => {
    if (root) removeProject(root);
  });

  it('should return an empty configuration when the default file is absent', () => {
    root = createProject({ artisan: '' });
    expect(loadConfig(root)).toEqual({ values: {} });
  });

  it('should fail when an explicit file is absent', () => {
    root = createProject({ artisan: '' });
    const missing = path.join(root, 'missing.json');

    expect(() => loadConfig(root, missing)).toThrow(
      new ConfigError(missing, ['Config file does not exist.']),
    );
  });

  it('should report malformed JSON', () => {
    root = createProject({ [CONFIG_FILE_NAME]: '{ "format": ' });

    let caught: unknown;
    try {
      loadConfig(root);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.errors).toHaveLength(1);
    expect(caught.errors[0].startsWith('Failed to parse config file: ')).toBe(true);
  });

  it('should format every validation error into the message', () => {
    root = createProject({ [CONFIG_FILE_NAME]: JSON.stringify({ preset: 'loose', quiet: 'yes' }) });
    const file = path.join(root, CONFIG_FILE_NAME);

    expect(() => loadConfig(root)).toThrow(
      `Invalid configuration in ${file}:\n` +
        '  - Config key "preset" must be one of: strict, balanced, legacy.\n' +
        '  - Config key "quiet" must be a boolean.',
    );
  });

  it('should load a valid file', () => {
    root = createProject({
      [CONFIG_FILE_NAME]: JSON.stringify({
        paths: ['app'],
        preset: 'legacy',
        ruleSettings: { 'sql-injection': { ignorePaths: ['app/Legacy/**'] } },
      }),
    });

    const loaded = loadConfig(root);
    expect(loaded.path).toBe(path.join(root, CONFIG_FILE_NAME));
    expect(loaded.values).toEqual({
      paths: ['app'],
      preset: 'legacy',
      ruleSettings: { 'sql-injection': { ignorePaths: ['app/Legacy/**'] } },
    });
  });
});

describe('mergeConfig', () => {
  it('should let command line values win and keep the rest', () => {
    expect(mergeConfig({ format: 'json', preset: 'legacy' }, { format: 'sarif', preset: undefined })).toEqual({
      format: 'sarif',
      preset: 'legacy',
    });
  });
});

describe('cliConfig', () => {
  it('should convert flags to configuration values', () => {
    const values = cliConfig({ only: 'sql-injection, mass-assignment,', exitThreshold: 'HIGH', concurrency: '4' });

    expect(values.only).toEqual(['sql-injection', 'mass-assignment']);
    expect(values.exitThreshold).toBe('high');
    expect(values.concurrency).toBe(4);
  });

  it('should report every invalid flag at once', () => {
    let caught: unknown;
    try {
      cliConfig({ format: 'xml', preset: 'loose', concurrency: 'two', exitThreshold: 'severe' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.configPath).toBe('command line');
    expect(caught.errors).toEqual([
      '--concurrency must be a positive integer (received "two").',
      'Unsupported output format "xml". Supported values: console, json, sarif',
      'Unsupported preset "loose". Supported values: strict, balanced, legacy',
      'Unsupported exit threshold "severe". Supported values: none, low, medium, high, critical',
    ]);
  });
});

describe('createAnalyzers', () => {
  it('should apply the preset under explicit rule settings', () => {
    const ids = (config: Parameters<typeof createAnalyzers>[0]) =>
      createAnalyzers(config).map((analyzer) => analyzer.meta.id);

    expect(ids({ preset: 'balanced', only: ['select-asterisk', 'facade-usage'] })).toEqual(['facade-usage']);
    expect(
      ids({
        preset: 'balanced',
        only: ['select-asterisk', 'facade-usage'],
        ruleSettings: { 'select-asterisk': { enabled: true } },
      }),
    ).toEqual(['facade-usage', 'select-asterisk']);
    expect(ids({ skip: ['facade-usage'], only: ['facade-usage', 'sql-injection'] })).toEqual(['sql-injection']);
  });

  it('should reject malformed analyzer options', () => {
    expect(() => createAnalyzers({ only: ['facade-usage'], analyzers: { 'facade-usage': { threshold: 'x' } } })).toThrow(
      new AnalyzerOptionError(
        'facade-usage',
        'threshold',
        'Invalid option "threshold" for analyzer "facade-usage": expected a non-negative integer, received "x".',
      ),
    );
  });
});
