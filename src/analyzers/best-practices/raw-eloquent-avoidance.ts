/**
 * Unnecessary Raw SQL Detector
 *
 * Literal SQL passed to `DB::raw()`, `DB::select()` and the write statements
 * that only does what a query builder call already expresses.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade } from '../../core/laravel';
import { asStaticCall } from '../../core/php/chains';
import { startLine, stringLiteral, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'raw-eloquent-avoidance',
  name: 'Unnecessary Raw SQL Detector',
  description: 'Flags unnecessary use of raw SQL when Eloquent methods are available',
  category: 'best-practices',
  severity: 'low',
  tags: ['laravel', 'eloquent', 'sql', 'readability'],
};

const SIMPLE_AGGREGATES = [
  /^count\s*\(\s*\*\s*\)$/,
  /^sum\s*\(\s*\w+\s*\)$/,
  /^avg\s*\(\s*\w+\s*\)$/,
  /^max\s*\(\s*\w+\s*\)$/,
  /^min\s*\(\s*\w+\s*\)$/,
];

const SIMPLE_SELECTS = [
  /^select\s+\*\s+from\s+\w+\s+where\s+\w+\s*=\s*\??\s*$/,
  /^select\s+\*\s+from\s+\w+\s*$/,
  /^select\s+[\w,\s]+\s+from\s+\w+\s*$/,
];

const SIMPLE_WRITES: Record<string, RegExp> = {
  insert: /^insert\s+into\s+\w+\s*\(/,
  update: /^update\s+\w+\s+set\s+\w+\s*=/,
  delete: /^delete\s+from\s+\w+\s+where\s+\w+\s*=/,
};

const WRITE_ALTERNATIVES: Record<string, string> = {
  insert: 'Model::create([...]) or Model::insert([...])',
  update: 'Model::where(...)->update([...]) or $model->update([...])',
  delete: 'Model::where(...)->delete() or $model->delete()',
};

function aggregateAlternative(sql: string): string {
  for (const fn of ['count', 'sum', 'avg', 'max', 'min']) {
    if (!sql.includes(fn)) continue;
    return fn === 'count' ? 'Model::count() or Model::where(...)->count()' : `Model::${fn}('column')`;
  }
  return 'Use Eloquent query builder methods';
}

class RawSqlVisitor implements NodeVisitor {
  constructor(private readonly context: FileContext) {}

  enterNode(node: PhpNode): void {
    const call = asStaticCall(node);
    if (!call || call.args.length === 0) return;
    const className = this.context.scope.classReference(call.classNode);
    if (!className || !isFacade(className, 'DB')) return;
    const literal = stringLiteral(call.args[0]);
    if (literal === null) return;
    const sql = literal.trim().toLowerCase();
    const snippet = `DB::${call.method}('${sql.slice(0, 50)}...')`;

    if (call.method === 'raw' && SIMPLE_AGGREGATES.some((pattern) => pattern.test(sql))) {
      this.context.report({
        line: startLine(node),
        snippet,
        message: 'Using DB::raw() for simple query that could use Eloquent methods',
        recommendation: `Consider using Eloquent methods instead of raw SQL. Example: ${aggregateAlternative(sql)}`,
      });
    } else if (call.method === 'select' && SIMPLE_SELECTS.some((pattern) => pattern.test(sql))) {
      this.context.report({
        line: startLine(node),
        snippet,
        message: 'Simple SELECT query using DB::select() could use Eloquent',
        recommendation: 'Use the Eloquent query builder for better readability and security. Example: Model::where(...)->get()',
      });
    } else if (Object.hasOwn(SIMPLE_WRITES, call.method) && SIMPLE_WRITES[call.method].test(sql)) {
      if (sql.includes('join') || sql.includes('select')) return;
      this.context.report({
        line: startLine(node),
        snippet,
        message: `Simple ${call.method.toUpperCase()} query could use Eloquent`,
        recommendation: `Use Eloquent methods: ${WRITE_ALTERNATIVES[call.method]}`,
      });
    }
  }
}

export class RawEloquentAvoidanceAnalyzer implements Analyzer {
  readonly meta = META;

  createVisitor(context: FileContext): NodeVisitor {
    return new RawSqlVisitor(context);
  }
}

export const rawEloquentAvoidance: AnalyzerDefinition = {
  meta: META,
  create: () => new RawEloquentAvoidanceAnalyzer(),
};
