import { missingModelScope } from '../src/analyzers/best-practices/missing-model-scope';
import { sqlInjection } from '../src/analyzers/security/sql-injection';
import type { Analyzer } from '../src/core/analyzer';
import { runAnalysis } from '../src/core/runner';
import { parseSuppressionMarker } from '../src/core/suppression';
import { analyzeSource, createProject, removeProject } from './helpers';

describe('parseSuppressionMarker', () => {
  it('should read rule ids after the marker', () => {
    const set = parseSuppressionMarker('// @laravel-lint-ignore sql-injection,facade-usage');
    expect(set?.all).toBe(false);
    expect([...(set?.rules ?? [])]).toEqual(['sql-injection', 'facade-usage']);
  });

  it('should treat a bare marker as covering every rule', () => {
    expect(parseSuppressionMarker('# @laravel-lint-ignore')?.all).toBe(true);
  });

  it('should ignore text without the marker', () => {
    expect(parseSuppressionMarker('// nothing to see')).toBeNull();
  });
});

describe('inline suppression', () => {
  it('should silence only the annotated class', () => {
    const source = `<?php
namespace App\\Services;

use Illuminate\\Support\\Facades\\DB;

/**
 * @laravel-lint-ignore sql-injection
 */
class LegacyImporter
{
    public function run()
    {
        DB::unprepared('DROP TABLE temp_import');
    }
}

class CurrentImporter
{
    public function run()
    {
        DB::unprepared('TRUNCATE temp_import');
    }
}
`;
    const issues = analyzeSource(sqlInjection, source);
    expect(issues.map((issue) => issue.location.line)).toEqual([21]);
  });

  it('should silence a whole file from its header', () => {
    const source = `<?php
// @laravel-lint-ignore sql-injection

namespace App\\Services;

use Illuminate\\Support\\Facades\\DB;

class Cleanup
{
    public function run()
    {
        DB::unprepared('TRUNCATE sessions');
    }
}
`;
    expect(analyzeSource(sqlInjection, source)).toEqual([]);
  });

  it('should silence a line from the line above', () => {
    const source = `<?php
use Illuminate\\Support\\Facades\\DB;

function purgeTables()
{
    // @laravel-lint-ignore
    DB::unprepared('TRUNCATE cache');
    DB::unprepared('TRUNCATE jobs');
}
`;
    expect(analyzeSource(sqlInjection, source).map((issue) => issue.location.line)).toEqual([8]);
  });

  it('should not let a marker for another rule silence the issue', () => {
    const source = `<?php
use Illuminate\\Support\\Facades\\DB;

function purgeTables()
{
    DB::unprepared('TRUNCATE cache'); // @laravel-lint-ignore facade-usage
}
`;
    expect(analyzeSource(sqlInjection, source)).toHaveLength(1);
  });
});

function featuredQuery(className: string, marker: string): string {
  return `<?php
namespace App\\Services;

use App\\Models\\Post;

${marker}
class ${className}
{
    public function featured()
    {
        return Post::where('status', 'published')->where('featured', 1)->get();
    }
}
`;
}

const projectNotes: Analyzer = {
  meta: {
    id: 'project-notes',
    name: 'Project Notes Analyzer',
    description: 'Reports line 3 of every file from the project hook',
    category: 'best-practices',
    severity: 'low',
    tags: [],
  },
  analyzeProject(context) {
    for (const file of context.files) {
      context.report({ file, line: 3, message: 'Note', recommendation: 'None' });
    }
  },
};

describe('project-level suppression', () => {
  let root: string;

  afterEach(() => {
    removeProject(root);
  });

  it('should leave repeated patterns out when every occurrence sits in a suppressed class', async () => {
    root = createProject({
      'app/Services/FeedService.php': featuredQuery('FeedService', '/** @laravel-lint-ignore missing-model-scope */'),
      'app/Services/HomeService.php': featuredQuery('HomeService', '/** @laravel-lint-ignore missing-model-scope */'),
    });

    const result = await runAnalysis({ projectPath: root, analyzers: [missingModelScope.create({})] });
    expect(result.issues).toEqual([]);
  });

  it('should not count suppressed occurrences toward the threshold', async () => {
    root = createProject({
      'app/Services/FeedService.php': featuredQuery('FeedService', '/** @laravel-lint-ignore missing-model-scope */'),
      'app/Services/HomeService.php': featuredQuery('HomeService', ''),
      'app/Services/ListService.php': featuredQuery('ListService', ''),
    });

    const result = await runAnalysis({ projectPath: root, analyzers: [missingModelScope.create({})] });
    expect(result.issues.map((issue) => [issue.location.file, issue.location.line, issue.metadata?.count])).toEqual([
      ['app/Services/HomeService.php', 11, 2],
    ]);
  });

  it('should drop project hook findings in files that silence the rule', async () => {
    root = createProject({
      'app/Legacy.php': '<?php\n// @laravel-lint-ignore project-notes\n$a = 1;\n',
      'app/Other.php': '<?php\n// @laravel-lint-ignore sql-injection\n$a = 1;\n',
      'app/Plain.php': '<?php\n\n$a = 1;\n',
    });

    const result = await runAnalysis({ projectPath: root, analyzers: [projectNotes] });
    expect(result.issues.map((issue) => issue.location.file)).toEqual(['app/Other.php', 'app/Plain.php']);
  });
});
