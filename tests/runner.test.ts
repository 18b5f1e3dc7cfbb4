import { logicInRoutes } from '../src/analyzers/best-practices/logic-in-routes';
import { missingErrorTracking } from '../src/analyzers/best-practices/missing-error-tracking';
import { missingModelScope } from '../src/analyzers/best-practices/missing-model-scope';
import { mvcStructureViolation } from '../src/analyzers/best-practices/mvc-structure-violation';
import { sqlInjection } from '../src/analyzers/security/sql-injection';
import type { Analyzer } from '../src/core/analyzer';
import { ModelRegistry } from '../src/core/model-registry';
import { ParseFailureLimitError, analyzeFile, runAnalysis } from '../src/core/runner';
import { createProject, removeProject } from './helpers';

function scopedQuery(namespace: string, className: string): string {
  return `<?php
namespace ${namespace};

use App\\Models\\Post;

class ${className}
{
    public function index()
    {
        return Post::where('status', 'published')->where('type', 'post')->get();
    }
}
`;
}

const exploding: Analyzer = {
  meta: {
    id: 'exploding',
    name: 'Exploding Analyzer',
    description: 'Fails on the first class it sees',
    category: 'best-practices',
    severity: 'medium',
    tags: [],
  },
  createVisitor: () => ({
    enterNode(node) {
      if (node.kind === 'class') throw new Error('boom');
    },
  }),
};

describe('analyzeFile', () => {
  it('should record a parse failure and run no analyzer', () => {
    const analysis = analyzeFile('app/Broken.php', '<?php class {', [sqlInjection.create({})], ModelRegistry.empty());

    expect(analysis.parseFailure?.file).toBe('app/Broken.php');
    expect(analysis.issues.size).toBe(0);
    expect(analysis.analyzedBy).toEqual([]);
  });

  it('should turn a throwing visitor into one analyzer-error issue', () => {
    const source = `<?php

class Broken
{
}

class AlsoBroken
{
}
`;
    const analysis = analyzeFile('app/Broken.php', source, [exploding], ModelRegistry.empty());
    const issues = analysis.issues.get('exploding') ?? [];

    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe('analyzer-error');
    expect(issues[0].severity).toBe('low');
    expect(issues[0].location).toEqual({ file: 'app/Broken.php', line: 3 });
    expect(issues[0].message).toBe('Exploding Analyzer failed; findings for this file may be incomplete.');
    expect(issues[0].metadata).toEqual({ details: 'boom' });
  });

  it('should skip analyzers that do not apply to the file', () => {
    const analysis = analyzeFile('app/Models/Post.php', '<?php\n', [logicInRoutes.create({})], ModelRegistry.empty());
    expect(analysis.analyzedBy).toEqual([]);
    expect(analysis.parseFailure).toBeUndefined();
  });
});

describe('runAnalysis', () => {
  let root: string;

  afterEach(() => {
    if (root) removeProject(root);
  });

  it('should combine file visitors and project hooks into one sorted result', async () => {
    root = createProject({
      'composer.json': JSON.stringify({ require: { 'laravel/framework': '^11.0' } }),
      'app/Http/Controllers/PostController.php': scopedQuery('App\\Http\\Controllers', 'PostController'),
      'app/Services/FeedService.php': scopedQuery('App\\Services', 'FeedService'),
      'resources/views/welcome.blade.php': [
        '<h1>Posts</h1>',
        "@foreach (\\App\\Models\\Post::where('published', true)->get() as $post)",
        '    <p>{{ $post->title }}</p>',
        '@endforeach',
      ].join('\n'),
      'resources/views/admin/form.blade.php': "@php $log = \\App\\Models\\AuditLog::create(['action' => 'view']); @endphp\n",
    });

    const result = await runAnalysis({
      projectPath: root,
      analyzers: [mvcStructureViolation.create({}), missingModelScope.create({}), missingErrorTracking.create({})],
    });

    expect(result.filesScanned).toBe(2);
    expect(result.parseFailures).toEqual([]);
    expect(result.issues.map((issue) => [issue.location.file, issue.location.line, issue.code])).toEqual([
      ['app/Http/Controllers/PostController.php', 10, 'missing-model-scope'],
      ['composer.json', 1, 'missing-error-tracking'],
      ['resources/views/admin/form.blade.php', 1, 'view-model-write'],
      ['resources/views/welcome.blade.php', 2, 'view-database-query'],
    ]);
    expect(result.issues[0].message).toBe(
      `Query pattern "where('status', 'published', ...)->where('type', 'post', ...)" appears 2 times across the codebase`,
    );
    expect(result.summary).toEqual({ critical: 2, high: 0, medium: 1, low: 1, total: 4 });
  });

  it('should accept configured error tracking packages', async () => {
    root = createProject({
      'composer.json': JSON.stringify({ require: { 'acme/error-reporter': '^1.0' } }),
      'app/Models/Post.php': '<?php\n',
    });

    const plain = await runAnalysis({ projectPath: root, analyzers: [missingErrorTracking.create({})] });
    expect(plain.issues.map((issue) => issue.message)).toEqual(['No error tracking service found in composer.json']);

    const configured = await runAnalysis({
      projectPath: root,
      analyzers: [missingErrorTracking.create({ additional_packages: ['acme/error-reporter'] })],
    });
    expect(configured.issues).toEqual([]);
  });

  it('should mark analyzers without applicable files as skipped', async () => {
    root = createProject({ 'app/Models/Post.php': '<?php\n' });
    const result = await runAnalysis({ projectPath: root, analyzers: [logicInRoutes.create({})] });

    expect(result.reports.map((report) => [report.status, report.message])).toEqual([
      ['skipped', 'Logic in Routes Analyzer: no applicable files'],
    ]);
  });

  it('should record unparseable files and keep going', async () => {
    root = createProject({
      'app/Broken.php': '<?php class {',
      'app/Cleanup.php': "<?php\nuse Illuminate\\Support\\Facades\\DB;\nDB::unprepared('TRUNCATE jobs');\n",
    });
    const result = await runAnalysis({ projectPath: root, analyzers: [sqlInjection.create({})] });

    expect(result.parseFailures.map((failure) => failure.file)).toEqual(['app/Broken.php']);
    expect(result.issues.map((issue) => [issue.location.file, issue.location.line])).toEqual([['app/Cleanup.php', 3]]);
    expect(result.reports[0].status).toBe('failed');
  });

  it('should abort once the parse failure limit is reached', async () => {
    root = createProject({ 'app/Broken.php': '<?php class {' });
    const run = runAnalysis({ projectPath: root, analyzers: [sqlInjection.create({})], maxParseFailures: 1 });

    await expect(run).rejects.toBeInstanceOf(ParseFailureLimitError);
  });

  it('should produce identical issues on repeated runs', async () => {
    root = createProject({
      'app/Http/Controllers/PostController.php': scopedQuery('App\\Http\\Controllers', 'PostController'),
      'app/Services/FeedService.php': scopedQuery('App\\Services', 'FeedService'),
    });
    const analyzers = [missingModelScope.create({})];

    const first = await runAnalysis({ projectPath: root, analyzers });
    const second = await runAnalysis({ projectPath: root, analyzers });
    expect(second.issues.map((issue) => issue.fingerprint)).toEqual(first.issues.map((issue) => issue.fingerprint));
    expect(second.issues).toHaveLength(1);
  });
});
