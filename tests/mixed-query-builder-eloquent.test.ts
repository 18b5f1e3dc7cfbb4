import { mixedQueryBuilderEloquent } from '../src/analyzers/best-practices/mixed-query-builder-eloquent';
import { ModelRegistry } from '../src/core/model-registry';
import { runAnalysis } from '../src/core/runner';
import { analyzeSource, createProject, modelSource, removeProject } from './helpers';

function service(body: string): string {
  return `<?php
namespace App\\Services;

use App\\Models\\User;
use Illuminate\\Support\\Facades\\DB;

class ReportService
{
    public function build()
    {
${body}
    }
}
`;
}

describe('mixed-query-builder-eloquent', () => {
  it('should flag a table reached through both Eloquent and the Query Builder', () => {
    const issues = analyzeSource(
      mixedQueryBuilderEloquent,
      service(`        $active = User::where('active', 1)->get();
        $count = DB::table('users')->count();
        return [$active, $count];`),
    );

    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe('mixed-same-table');
    expect(issues[0].severity).toBe('high');
    expect(issues[0].location.line).toBe(12);
    expect(issues[0].message).toBe('Class "ReportService" uses both Eloquent and Query Builder for table "users"');
    expect(issues[0].metadata).toEqual({
      class: 'App\\Services\\ReportService',
      table: 'users',
      eloquent_line: 11,
      query_builder_line: 12,
    });
  });

  it('should leave framework tables without a model alone', () => {
    const issues = analyzeSource(
      mixedQueryBuilderEloquent,
      service(`        DB::table('jobs')->insert(['queue' => 'default']);
        DB::table('sessions')->where('user_id', 1)->delete();
        return User::find(1);`),
    );
    expect(issues).toEqual([]);
  });

  it('should flag classes that reach many model tables through the Query Builder', () => {
    const registry = ModelRegistry.fromSources(
      ['Post', 'Comment', 'Tag'].map((name) => ({ file: `app/Models/${name}.php`, source: modelSource(name) })),
    );
    const issues = analyzeSource(
      mixedQueryBuilderEloquent,
      service(`        $user = User::find(1);
        $posts = DB::table('posts')->get();
        $comments = DB::table('comments')->get();
        $tags = DB::table('tags')->get();`),
      { registry },
    );

    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe('mixed-significant');
    expect(issues[0].severity).toBe('medium');
    expect(issues[0].location.line).toBe(12);
    expect(issues[0].message).toBe(
      'Class "ReportService" queries 3 model-backed tables through Query Builder while also using Eloquent (comments, posts, tags)',
    );
    expect(issues[0].metadata.models).toEqual(['Comment', 'Post', 'Tag']);
  });

  it('should stay quiet at or below the mixing threshold', () => {
    const registry = ModelRegistry.fromSources(
      ['Post', 'Comment', 'Tag'].map((name) => ({ file: `app/Models/${name}.php`, source: modelSource(name) })),
    );
    const issues = analyzeSource(
      mixedQueryBuilderEloquent,
      service(`        $user = User::find(1);
        $posts = DB::table('posts')->get();
        $comments = DB::table('comments')->get();
        $tags = DB::table('tags')->get();`),
      { registry, options: { mixing_threshold: 3 } },
    );
    expect(issues).toEqual([]);
  });

  it('should count toBase() on an Eloquent query as Query Builder usage', () => {
    const body = `        $query = User::query();
        return $query->toBase()->get();`;

    const issues = analyzeSource(mixedQueryBuilderEloquent, service(body));
    expect(issues.map((issue) => [issue.code, issue.location.line])).toEqual([['mixed-same-table', 12]]);

    const relaxed = analyzeSource(mixedQueryBuilderEloquent, service(body), {
      options: { treat_tobase_as_query_builder: false },
    });
    expect(relaxed).toEqual([]);
  });

  it('should skip whitelisted classes', () => {
    const issues = analyzeSource(
      mixedQueryBuilderEloquent,
      service(`        User::where('active', 1)->get();
        DB::table('users')->count();`),
      { options: { whitelist: ['ReportService'] } },
    );
    expect(issues).toEqual([]);
  });

  it('should honor a rule-specific suppression on the class', () => {
    const source = (marker: string): string => `<?php
namespace App\\Services;

use App\\Models\\User;
use Illuminate\\Support\\Facades\\DB;

${marker}
class ReportService
{
    public function build()
    {
        $active = User::where('active', 1)->get();
        return [$active, DB::table('users')->count()];
    }
}
`;
    expect(
      analyzeSource(mixedQueryBuilderEloquent, source('/** @laravel-lint-ignore mixed-query-builder-eloquent */')),
    ).toEqual([]);
    expect(
      analyzeSource(mixedQueryBuilderEloquent, source('/** @laravel-lint-ignore sql-injection */')).map(
        (issue) => issue.location.line,
      ),
    ).toEqual([13]);
  });

  describe('registry options', () => {
    let root: string;

    afterEach(() => {
      removeProject(root);
    });

    function teamService(modelImport: string, modelName: string, table: string): string {
      return `<?php
namespace App\\Services;

use ${modelImport};
use Illuminate\\Support\\Facades\\DB;

class TeamService
{
    public function build()
    {
        $rows = ${modelName}::where('active', 1)->get();
        return [$rows, DB::table('${table}')->count()];
    }
}
`;
    }

    it('should resolve model tables through table_mappings', async () => {
      root = createProject({
        'app/Models/Member.php': modelSource('Member'),
        'app/Services/TeamService.php': teamService('App\\Models\\Member', 'Member', 'team_members'),
      });

      const plain = await runAnalysis({ projectPath: root, analyzers: [mixedQueryBuilderEloquent.create({})] });
      expect(plain.issues).toEqual([]);

      const mapped = await runAnalysis({
        projectPath: root,
        analyzers: [mixedQueryBuilderEloquent.create({ table_mappings: { Member: 'team_members' } })],
      });
      expect(mapped.issues.map((issue) => [issue.location.file, issue.location.line, issue.code, issue.metadata.table])).toEqual([
        ['app/Services/TeamService.php', 12, 'mixed-same-table', 'team_members'],
      ]);
    });

    it('should scan the configured model_paths for table declarations', async () => {
      root = createProject({
        'src/Domain/Models/Article.php': `<?php
namespace Domain\\Models;

use Illuminate\\Database\\Eloquent\\Model;

class Article extends Model
{
    protected $table = 'news_articles';
}
`,
        'app/Services/TeamService.php': teamService('Domain\\Models\\Article', 'Article', 'news_articles'),
      });

      const plain = await runAnalysis({ projectPath: root, analyzers: [mixedQueryBuilderEloquent.create({})] });
      expect(plain.issues).toEqual([]);

      const scanned = await runAnalysis({
        projectPath: root,
        analyzers: [mixedQueryBuilderEloquent.create({ model_paths: ['src/Domain/Models'] })],
      });
      expect(scanned.issues.map((issue) => [issue.location.line, issue.metadata.table])).toEqual([[12, 'news_articles']]);
    });
  });
});
