/**
 * SQL Injection Analyzer
 *
 * Raw SQL entry points whose SQL argument is built by concatenation or
 * interpolation, or mentions request input. `DB::unprepared()` is always
 * reported, as are native mysqli and pgsql query functions and direct PDO or
 * mysqli connections.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall, asMethodCall, asStaticCall } from '../../core/php/chains';
import { shortName } from '../../core/php/names';
import { child, childList, containsNode, startLine, stringProp, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'sql-injection',
  name: 'SQL Injection Analyzer',
  description: 'Detects potential SQL injection vulnerabilities in database queries',
  category: 'security',
  severity: 'critical',
  failOn: 'high',
  tags: ['sql', 'injection', 'database', 'security'],
};

const DB_RAW_METHODS = new Set(['raw', 'select', 'insert', 'update', 'delete', 'statement']);
const RAW_CLAUSE_METHODS = new Set(['whereRaw', 'orWhereRaw', 'havingRaw', 'orderByRaw', 'selectRaw', 'groupByRaw']);

const NATIVE_QUERY_FUNCTIONS = [
  'mysqli_query', 'mysqli_real_query', 'mysqli_multi_query', 'mysqli_prepare', 'mysqli_stmt_prepare',
  'pg_query', 'pg_query_params', 'pg_prepare', 'pg_send_query', 'pg_send_query_params', 'pg_send_prepare',
];

const NATIVE_CONNECTION_CLASSES = new Set(['PDO', 'mysqli']);

const USER_INPUT_PATTERNS = [
  /\$_(GET|POST|REQUEST|COOKIE)\b/,
  /\brequest\s*\(/,
  /\bRequest::(input|get|all|query|post|cookie|header|route)\b/,
  /\bInput::(get|all)\b/,
  /\$request->(input|get|all|query|post|cookie|header|route)\b/,
];

/** An interpolated string with at least one embedded expression. */
function isInterpolated(node: PhpNode): boolean {
  if (node.kind !== 'encapsed') return false;
  return childList(node, 'value').some((part) => {
    const expression = part.kind === 'encapsedpart' ? child(part, 'expression') : part;
    return expression !== null && expression.kind !== 'string';
  });
}

function isConcatenation(node: PhpNode): boolean {
  return (node.kind === 'bin' && stringProp(node, 'type') === '.') || (node.kind === 'assign' && stringProp(node, 'operator') === '.=');
}

class SqlInjectionVisitor implements NodeVisitor {
  constructor(
    private readonly context: FileContext,
    private readonly nativeFunctions: Set<string>,
  ) {}

  enterNode(node: PhpNode): void {
    if (node.kind === 'new') {
      this.checkConnection(node);
      return;
    }
    if (node.kind !== 'call') return;

    const staticCall = asStaticCall(node);
    if (staticCall) {
      const className = this.context.scope.classReference(staticCall.classNode);
      const isDb = className !== null && isFacade(className, 'DB');
      if (isDb && staticCall.method === 'unprepared') {
        this.report(node, 'DB::unprepared()', 'executes SQL without parameter binding',
          'Avoid DB::unprepared(). Use DB::select(), DB::insert() and the other prepared methods with parameter binding.');
      } else if (isDb && DB_RAW_METHODS.has(staticCall.method)) {
        this.checkSql(node, staticCall.args[0], `DB::${staticCall.method}()`,
          `Use parameter binding: DB::${staticCall.method}('... where id = ?', [$id]) instead of building the SQL string.`);
      } else if (RAW_CLAUSE_METHODS.has(staticCall.method)) {
        this.checkSql(node, staticCall.args[0], `${staticCall.method}()`,
          `Use parameter binding: ::${staticCall.method}('column = ?', [$value]) instead of concatenation.`);
      }
      return;
    }

    const methodCall = asMethodCall(node);
    if (methodCall) {
      if (RAW_CLAUSE_METHODS.has(methodCall.method)) {
        this.checkSql(node, methodCall.args[0], `${methodCall.method}()`,
          `Use parameter binding: ->${methodCall.method}('column = ?', [$value]) instead of concatenation.`);
      }
      return;
    }

    const fn = asFunctionCall(node);
    if (fn && this.nativeFunctions.has(fn.name.toLowerCase())) {
      const vulnerable = fn.args.some((arg) => this.isVulnerable(arg));
      this.context.report({
        severity: vulnerable ? 'critical' : 'high',
        line: startLine(node),
        message: vulnerable
          ? `Potential SQL injection: ${fn.name}() with string concatenation or user input`
          : `Native database function ${fn.name}() bypasses the framework's parameter binding`,
        recommendation: "Avoid native database functions. Use the DB facade or Eloquent, which bind parameters for you.",
        metadata: { function: fn.name },
      });
    }
  }

  private checkConnection(node: PhpNode): void {
    const className = this.context.scope.classReference(child(node, 'what'));
    if (!className || !NATIVE_CONNECTION_CLASSES.has(shortName(className))) return;
    this.context.report({
      severity: 'high',
      line: startLine(node),
      message: `Direct database connection with new ${shortName(className)}() bypasses the framework's query layer`,
      recommendation: 'Avoid direct PDO or mysqli usage. Use the DB facade or Eloquent, which bind parameters for you.',
      metadata: { class: shortName(className) },
    });
  }

  private checkSql(node: PhpNode, sql: PhpNode | undefined, label: string, recommendation: string): void {
    if (!sql || !this.isVulnerable(sql)) return;
    this.report(node, label, 'with string concatenation or user input', recommendation);
  }

  private isVulnerable(sql: PhpNode): boolean {
    if (containsNode(sql, (inner) => isConcatenation(inner) || isInterpolated(inner))) return true;
    const text = this.context.text(sql);
    return USER_INPUT_PATTERNS.some((pattern) => pattern.test(text));
  }

  private report(node: PhpNode, label: string, problem: string, recommendation: string): void {
    this.context.report({
      line: startLine(node),
      snippet: this.context.text(node).split('\n')[0],
      message: `Potential SQL injection: ${label} ${problem}`,
      recommendation,
      metadata: { call: label },
    });
  }
}

export class SqlInjectionAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly nativeFunctions: Set<string>;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.nativeFunctions = new Set(reader.stringList('native_functions', NATIVE_QUERY_FUNCTIONS).map((name) => name.toLowerCase()));
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new SqlInjectionVisitor(context, this.nativeFunctions);
  }
}

export const sqlInjection: AnalyzerDefinition = {
  meta: META,
  create: (options) => new SqlInjectionAnalyzer(options),
};
