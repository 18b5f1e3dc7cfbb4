/**
 * Query Builder in Controller
 *
 * Controllers should delegate data access. Every `DB::` entry point and every
 * query-building call made inside a controller method is reported once per
 * method; joins and raw SQL rank highest.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asMethodCall, asStaticCall } from '../../core/php/chains';
import { startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import type { Severity } from '../../types';
import { isInController } from '../shared';

const META: AnalyzerMeta = {
  id: 'query-builder-in-controller',
  name: 'Query Builder in Controller',
  description: 'Detects direct database query building in controllers that should use repositories or services',
  category: 'best-practices',
  severity: 'medium',
  tags: ['architecture', 'separation-of-concerns', 'maintainability', 'repository-pattern'],
};

type QueryType = 'raw_query' | 'join' | 'aggregation' | 'complex_where' | 'db_facade' | 'query_builder';

const DB_ENTRY_METHODS = new Set(['table', 'select', 'insert', 'update', 'delete', 'statement', 'raw']);

const QUERY_METHODS = new Set([
  'where', 'whereIn', 'whereNotIn', 'whereBetween', 'whereNull', 'whereNotNull',
  'whereHas', 'whereDoesntHave', 'orWhere', 'whereRaw', 'havingRaw',
  'join', 'leftJoin', 'rightJoin', 'crossJoin', 'joinSub',
  'groupBy', 'having', 'orderBy', 'orderByRaw',
  'select', 'selectRaw', 'addSelect',
  'limit', 'offset', 'skip', 'take',
  'union', 'unionAll',
  'when', 'unless',
  'with', 'withCount', 'withSum', 'withAvg', 'withMin', 'withMax',
  'sum', 'avg', 'min', 'max', 'count',
]);

const DEFAULT_ALLOWED_METHODS = ['find', 'findOrFail', 'findMany', 'findOr', 'all', 'get', 'first', 'firstOrFail', 'count'];

const JOIN_METHODS = new Set(['join', 'leftJoin', 'rightJoin', 'crossJoin', 'joinSub']);
const RAW_METHODS = new Set(['whereRaw', 'havingRaw', 'selectRaw', 'orderByRaw']);
const AGGREGATE_METHODS = new Set(['sum', 'avg', 'min', 'max', 'count', 'withCount', 'withSum', 'withAvg']);
const COMPLEX_WHERE_METHODS = new Set(['where', 'whereIn', 'whereHas', 'orWhere']);

const SEVERITY_BY_TYPE: Record<QueryType, Severity> = {
  raw_query: 'high',
  join: 'high',
  aggregation: 'medium',
  complex_where: 'medium',
  db_facade: 'low',
  query_builder: 'low',
};

function categorize(method: string): QueryType {
  if (JOIN_METHODS.has(method)) return 'join';
  if (RAW_METHODS.has(method)) return 'raw_query';
  if (AGGREGATE_METHODS.has(method)) return 'aggregation';
  if (COMPLEX_WHERE_METHODS.has(method)) return 'complex_where';
  return 'query_builder';
}

class QueryBuilderVisitor implements NodeVisitor {
  /** Queries already reported, per controller method node. */
  private readonly reported = new WeakMap<PhpNode, Set<string>>();

  constructor(
    private readonly context: FileContext,
    private readonly allowedMethods: Set<string>,
  ) {}

  enterNode(node: PhpNode): void {
    if (node.kind !== 'call') return;
    const { scope, file } = this.context;
    const method = scope.currentMethod();
    if (!method?.node || !method.name || !isInController(scope, file)) return;

    const staticCall = asStaticCall(node);
    if (staticCall) {
      const className = scope.classReference(staticCall.classNode);
      if (className && isFacade(className, 'DB') && DB_ENTRY_METHODS.has(staticCall.method)) {
        const type: QueryType = staticCall.method === 'raw' ? 'raw_query' : 'db_facade';
        this.record(node, method.node, method.name, `DB::${staticCall.method}()`, type);
      }
    }

    const name = staticCall?.method ?? asMethodCall(node)?.method;
    if (!name || this.allowedMethods.has(name) || !QUERY_METHODS.has(name)) return;
    this.record(node, method.node, method.name, `${name}()`, categorize(name));
  }

  private record(node: PhpNode, methodNode: PhpNode, methodName: string, query: string, type: QueryType): void {
    let seen = this.reported.get(methodNode);
    if (!seen) {
      seen = new Set();
      this.reported.set(methodNode, seen);
    }
    if (seen.has(query)) return;
    seen.add(query);

    const className = this.context.scope.currentClassName() ?? 'Unknown';
    this.context.report({
      severity: SEVERITY_BY_TYPE[type],
      line: startLine(node),
      message: `Direct database query '${query}' used in controller method '${methodName}'`,
      recommendation:
        `Controller method '${methodName}' contains direct database query '${query}'. Controllers should be thin and delegate data access ` +
        'to repositories or services. Move query logic into a repository, a service class or an Eloquent model scope.',
      metadata: { query, method: methodName, class: className, type },
    });
  }
}

export class QueryBuilderInControllerAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly allowedMethods: Set<string>;

  constructor(options: AnalyzerOptions = {}) {
    this.allowedMethods = new Set(new OptionReader(META.id, options).stringList('allowed_methods', DEFAULT_ALLOWED_METHODS));
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new QueryBuilderVisitor(context, this.allowedMethods);
  }
}

export const queryBuilderInController: AnalyzerDefinition = {
  meta: META,
  create: (options) => new QueryBuilderInControllerAnalyzer(options),
};
