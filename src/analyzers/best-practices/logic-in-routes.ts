/**
 * Logic in Routes Analyzer
 *
 * Route files should only map URLs to controllers. Closures handed to `Route::`
 * calls are checked for queries, business logic and length; the most serious
 * finding decides the issue code.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade, looksLikeModelName } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall, asMethodCall, asStaticCall, flattenChain } from '../../core/php/chains';
import { shortName } from '../../core/php/names';
import { child, childNodes, containsNode, isKind, lineSpan, startLine, stringProp, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import type { ScopeTracker } from '../../core/scope';
import type { Severity } from '../../types';
import { isRouteFile } from '../shared';

const META: AnalyzerMeta = {
  id: 'logic-in-routes',
  name: 'Logic in Routes Analyzer',
  description: 'Detects business logic in route files that should be moved to controllers or action classes',
  category: 'best-practices',
  severity: 'high',
  tags: ['laravel', 'routes', 'mvc', 'architecture', 'best-practices'],
};

const BUSINESS_FUNCTIONS = new Set([
  'dispatch', 'dispatch_sync', 'dispatch_now', 'event', 'report', 'rescue', 'broadcast', 'app', 'resolve', 'retry',
]);

const BUSINESS_FACADES = ['Mail', 'Notification', 'Queue', 'Event', 'Bus', 'Broadcast'];

const CONTAINER_METHODS = new Set(['make', 'makeWith', 'call', 'get']);

const ROUTE_QUERY_METHODS = new Set([
  'where', 'find', 'all', 'first', 'create', 'query', 'findOrFail', 'firstOrFail',
  'get', 'pluck', 'count', 'exists', 'doesntExist', 'with', 'without',
]);

const STATIC_QUERY_METHODS = new Set(['where', 'find', 'all', 'first', 'create', 'query']);

const QUERY_BUILDER_METHODS = new Set([
  'orWhere', 'whereIn', 'whereNotIn', 'whereBetween', 'whereNull', 'join', 'leftJoin', 'rightJoin',
  'crossJoin', 'having', 'havingRaw', 'groupBy', 'union', 'unionAll', 'lockForUpdate', 'sharedLock',
]);

const UTILITY_CLASSES = new Set([
  'Carbon', 'Collection', 'Validator', 'Cache', 'Log', 'Session', 'Cookie', 'Request', 'Response',
  'View', 'Config', 'Str', 'Arr', 'File', 'Storage', 'Hash', 'Crypt', 'Route', 'URL', 'Redirect',
  'DB', 'App', 'Auth', 'Gate', 'Password', 'RateLimiter', 'Schema',
]);

const LOOP_KINDS = new Set(['foreach', 'for', 'while', 'do']);
const ARITHMETIC_OPERATORS = new Set(['+', '-', '*', '/']);
const ARITHMETIC_ASSIGNMENTS = new Set(['+=', '-=', '*=', '/=']);

const PROBLEM_DB = 'database queries';
const PROBLEM_LOGIC = 'complex business logic';

interface RouteOptions {
  maxClosureLines: number;
  complexChainLength: number;
}

function methodChainLength(node: PhpNode): number {
  let count = 0;
  let current: PhpNode | null = node;
  while (current) {
    const call = asMethodCall(current);
    if (!call) break;
    count += 1;
    current = call.receiver;
  }
  return count;
}

class LogicInRoutesVisitor implements NodeVisitor {
  private readonly checked = new Set<PhpNode>();

  constructor(
    private readonly context: FileContext,
    private readonly options: RouteOptions,
  ) {}

  enterNode(node: PhpNode): void {
    if (node.kind !== 'call' || !this.isRouteCall(node)) return;
    const call = asMethodCall(node) ?? asStaticCall(node);
    if (!call || call.method === 'group') return;
    for (const arg of call.args) {
      if (isKind(arg, 'closure', 'arrowfunc') && !this.checked.has(arg)) {
        this.checked.add(arg);
        this.analyzeClosure(arg);
      }
    }
  }

  private isRouteCall(node: PhpNode): boolean {
    const first = flattenChain(node).calls[0];
    if (!first?.isStatic || !first.classNode) return false;
    const className = this.context.scope.classReference(first.classNode);
    return className !== null && isFacade(className, 'Route');
  }

  private analyzeClosure(closure: PhpNode): void {
    const problems: string[] = [];
    let severity: Severity = 'low';
    let code = 'route-closure-too-long';
    const body = child(closure, 'body');

    const hasQueries = body !== null && this.hasDbQueries(body);
    const hasLogic = body !== null && this.hasBusinessLogic(body);
    if (hasQueries) problems.push(PROBLEM_DB);
    if (hasLogic) problems.push(PROBLEM_LOGIC);
    const lines = lineSpan(closure);
    if (lines > this.options.maxClosureLines) problems.push(`${lines} lines (max: ${this.options.maxClosureLines})`);
    if (problems.length === 0) return;

    let recommendation =
      'Move route logic to a controller method or single-action controller. Route files should only define routes, not contain implementation details.';
    if (hasQueries) {
      severity = 'critical';
      code = 'route-has-db-queries';
      recommendation =
        'Database queries should not be in route files. Move this logic to a controller method and use repositories or services for data access.';
    } else if (hasLogic) {
      severity = 'high';
      code = 'route-has-business-logic';
      recommendation =
        'Complex business logic should be in service classes or controllers, not in route files. Route files should only define routes.';
    } else {
      severity = 'medium';
    }

    this.context.report({
      code,
      severity,
      line: startLine(closure),
      message: `Route closure contains ${problems.join(', ')}`,
      recommendation,
      metadata: { problems, line_count: lines, has_db_queries: hasQueries, has_business_logic: hasLogic },
    });
  }

  private hasDbQueries(body: PhpNode): boolean {
    const { scope } = this.context;
    return containsNode(body, (node) => {
      const staticCall = asStaticCall(node);
      if (staticCall) {
        const className = scope.classReference(staticCall.classNode);
        if (!className) return false;
        if (isFacade(className, 'DB')) return true;
        if (!STATIC_QUERY_METHODS.has(staticCall.method)) return false;
        return scope.registry.isModel(className) || looksLikeModelName(className);
      }
      const methodCall = asMethodCall(node);
      return methodCall !== null && QUERY_BUILDER_METHODS.has(methodCall.method);
    });
  }

  private hasBusinessLogic(body: PhpNode): boolean {
    const { scope } = this.context;
    const check = (node: PhpNode, ifDepth: number, inLoop: boolean): boolean => {
      if (this.isBusinessCall(node, scope)) return true;

      let depth = ifDepth;
      let loop = inLoop;
      if (node.kind === 'if') {
        depth += 1;
        if (depth > 1) return true;
      }
      if (LOOP_KINDS.has(node.kind)) loop = true;
      if (loop || depth > 1) {
        if (node.kind === 'bin' && ARITHMETIC_OPERATORS.has(stringProp(node, 'type') ?? '')) return true;
        if (node.kind === 'assign' && ARITHMETIC_ASSIGNMENTS.has(stringProp(node, 'operator') ?? '')) return true;
      }
      for (const next of childNodes(node)) {
        // An `elseif` is the alternate of its `if`, not a nested one.
        const nextDepth = node.kind === 'if' && next.kind === 'if' && node.alternate === next ? depth - 1 : depth;
        if (check(next, nextDepth, loop)) return true;
      }
      return false;
    };
    return check(body, 0, false);
  }

  private isBusinessCall(node: PhpNode, scope: ScopeTracker): boolean {
    const fn = asFunctionCall(node);
    if (fn) return BUSINESS_FUNCTIONS.has(fn.name);

    const staticCall = asStaticCall(node);
    if (staticCall) {
      const className = scope.classReference(staticCall.classNode);
      if (!className) return false;
      if (BUSINESS_FACADES.some((facade) => isFacade(className, facade))) return true;
      if (isFacade(className, 'App')) return CONTAINER_METHODS.has(staticCall.method);
      const short = shortName(className);
      return /^[A-Z][A-Za-z0-9]*$/.test(short) && !UTILITY_CLASSES.has(short) && !ROUTE_QUERY_METHODS.has(staticCall.method);
    }

    return node.kind === 'call' && methodChainLength(node) >= this.options.complexChainLength;
  }
}

export class LogicInRoutesAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly options: RouteOptions;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.options = {
      maxClosureLines: reader.integer('max_closure_lines', 5, 1),
      complexChainLength: reader.integer('complex_chain_length', 3, 1),
    };
  }

  appliesTo(file: string): boolean {
    return isRouteFile(file);
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new LogicInRoutesVisitor(context, this.options);
  }
}

export const logicInRoutes: AnalyzerDefinition = {
  meta: META,
  create: (options) => new LogicInRoutesAnalyzer(options),
};
