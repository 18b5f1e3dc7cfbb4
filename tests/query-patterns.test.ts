import { chunkMissing } from '../src/analyzers/best-practices/chunk-missing';
import { phpSideFiltering } from '../src/analyzers/best-practices/php-side-filtering';
import { rawEloquentAvoidance } from '../src/analyzers/best-practices/raw-eloquent-avoidance';
import { selectAsterisk } from '../src/analyzers/best-practices/select-asterisk';
import { analyzeSource } from './helpers';

function service(body: string): string {
  return `<?php
namespace App\\Services;

use App\\Models\\User;
use Illuminate\\Support\\Facades\\DB;

class UserService
{
    public function run($rows, $ids)
    {
${body}
    }
}
`;
}

describe('select-asterisk', () => {
  it('should flag model fetches without a column list', () => {
    const issues = analyzeSource(
      selectAsterisk,
      service(`        $active = User::where('active', 1)->get();
        $everyone = User::all();`),
    );

    expect(issues.map((issue) => [issue.location.line, issue.message])).toEqual([
      [11, 'Query using ->get() without ->select() fetches all columns'],
      [12, 'Query using ->all() without ->select() fetches all columns'],
    ]);
    expect(issues[0].severity).toBe('low');
    expect(issues[0].metadata).toEqual({ model: 'User', method: 'get' });
  });

  it('should accept queries that pick their columns', () => {
    const issues = analyzeSource(
      selectAsterisk,
      service(`        $emails = User::select(['id', 'email'])->get();
        $names = User::where('active', 1)->pluck('name');`),
    );
    expect(issues).toEqual([]);
  });

  it('should leave Query Builder fetches alone', () => {
    expect(analyzeSource(selectAsterisk, service(`        return DB::table('users')->get();`))).toEqual([]);
  });
});

describe('php-side-filtering', () => {
  it('should flag a collection filter right after a model fetch', () => {
    const issues = analyzeSource(
      phpSideFiltering,
      service(`        return User::all()->filter(fn ($user) => $user->active);`),
    );

    expect(issues).toHaveLength(1);
    expect(issues[0].severity).toBe('critical');
    expect(issues[0].message).toBe('Filtering data in PHP instead of database: all->filter');
    expect(issues[0].metadata).toEqual({ pattern: 'all->filter', fetch: 'all', filter: 'filter' });
  });

  it('should describe the whole chain', () => {
    const issues = analyzeSource(
      phpSideFiltering,
      service(`        return User::where('active', 1)->get()->whereIn('id', $ids);`),
    );
    expect(issues.map((issue) => issue.metadata.pattern)).toEqual(['where->get->whereIn']);
  });

  it('should accept filters applied in the query', () => {
    const issues = analyzeSource(
      phpSideFiltering,
      service(`        $users = User::whereIn('id', $ids)->get();
        return $rows->all()->filter();`),
    );
    expect(issues).toEqual([]);
  });

  it('should skip whitelisted paths', () => {
    const issues = analyzeSource(phpSideFiltering, service(`        return User::all()->filter();`), {
      options: { whitelist: ['app/Services/'] },
    });
    expect(issues).toEqual([]);
  });
});

describe('chunk-missing', () => {
  it('should flag a loop over an unbounded fetch', () => {
    const issues = analyzeSource(
      chunkMissing,
      service(`        foreach (User::all() as $user) {
            $user->notify();
        }`),
    );

    expect(issues).toHaveLength(1);
    expect(issues[0].severity).toBe('high');
    expect(issues[0].location.line).toBe(11);
    expect(issues[0].message).toBe(
      'Looping over ->all() or ->get() without chunk() can cause memory issues on large datasets',
    );
    expect(issues[0].metadata).toEqual({ source: 'User::all()' });
  });

  it('should follow the fetch through a variable', () => {
    const issues = analyzeSource(
      chunkMissing,
      service(`        $users = User::where('active', 1)->get();
        foreach ($users as $user) {
            $user->notify();
        }`),
    );
    expect(issues.map((issue) => [issue.location.line, issue.metadata])).toEqual([
      [12, { source: '$users', variable: 'users' }],
    ]);
  });

  it('should flag Query Builder table fetches', () => {
    const issues = analyzeSource(
      chunkMissing,
      service(`        foreach (DB::table('users')->get() as $row) {
            echo $row->email;
        }`),
    );
    expect(issues).toHaveLength(1);
  });

  it('should accept limited, chunked and reassigned queries', () => {
    const issues = analyzeSource(
      chunkMissing,
      service(`        foreach (User::where('active', 1)->limit(100)->get() as $user) {
            $user->notify();
        }
        User::chunk(200, function ($users) {
            foreach ($users as $user) {
                $user->notify();
            }
        });
        $recent = User::all();
        $recent = $recent->take(10);
        foreach ($recent as $user) {
            $user->notify();
        }`),
    );
    expect(issues).toEqual([]);
  });
});

describe('raw-eloquent-avoidance', () => {
  it('should flag simple selects passed as raw SQL', () => {
    const issues = analyzeSource(rawEloquentAvoidance, service(`        return DB::select('SELECT * FROM users');`));

    expect(issues).toHaveLength(1);
    expect(issues[0].severity).toBe('low');
    expect(issues[0].message).toBe('Simple SELECT query using DB::select() could use Eloquent');
    expect(issues[0].snippet).toBe("DB::select('select * from users...')");
  });

  it('should flag raw aggregates and simple writes', () => {
    const issues = analyzeSource(
      rawEloquentAvoidance,
      service(`        $total = DB::raw('COUNT(*)');
        DB::update('UPDATE users SET active = 0');`),
    );
    expect(issues.map((issue) => issue.message)).toEqual([
      'Using DB::raw() for simple query that could use Eloquent methods',
      'Simple UPDATE query could use Eloquent',
    ]);
    expect(issues[0].recommendation).toBe(
      'Consider using Eloquent methods instead of raw SQL. Example: Model::count() or Model::where(...)->count()',
    );
  });

  it('should accept SQL that needs to be raw', () => {
    const issues = analyzeSource(
      rawEloquentAvoidance,
      service(`        return DB::select('SELECT users.id FROM users JOIN posts ON posts.user_id = users.id');`),
    );
    expect(issues).toEqual([]);
  });
});
