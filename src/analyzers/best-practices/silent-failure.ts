/**
 * Silent Failure Analyzer
 *
 * Catch blocks that swallow exceptions and `@` error suppression.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall, asMethodCall, asStaticCall } from '../../core/php/chains';
import { shortName } from '../../core/php/names';
import {
  child,
  childList,
  containsNode,
  identifierName,
  isKind,
  isThisVariable,
  startLine,
  stringProp,
  variableName,
  type PhpNode,
} from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import type { ScopeTracker } from '../../core/scope';
import type { Severity } from '../../types';

const META: AnalyzerMeta = {
  id: 'silent-failure',
  name: 'Silent Failure Analyzer',
  description: 'Detects empty catch blocks and error suppression that hide failures',
  category: 'best-practices',
  severity: 'medium',
  tags: ['laravel', 'exceptions', 'error-handling', 'debugging', 'monitoring'],
};

const BROAD_TYPES = new Set(['Throwable', 'Exception', 'Error']);

const INTENTIONAL_MARKERS = [
  'intentional', 'deliberately', 'on purpose', 'expected to fail', 'expected exception',
  'safe to ignore', 'safely ignore', 'can be ignored', 'may be ignored', 'optional',
  'not critical', 'non-critical', 'best effort', 'best-effort', 'fire and forget', 'fire-and-forget',
  'no action needed', 'no action required', 'nothing to do', 'noop', 'no-op',
  '@suppress', '@ignore', 'phpstan-ignore', 'psalm-suppress', 'swallow',
  "don't care", "doesn't matter", 'not important',
];

const LOG_METHODS = new Set(['error', 'warning', 'info', 'debug', 'log', 'critical', 'alert', 'emergency', 'notice']);
const REPORT_METHODS = new Set(['captureException', 'notifyException', 'report', 'notify']);
const SESSION_METHODS = new Set(['flash', 'put', 'push']);
const HANDLER_FRAGMENTS = ['log', 'error', 'exception', 'report', 'handle', 'notify', 'fail'];
const TRACKER_CLASSES = new Set(['Raygun', 'Rollbar', 'Honeybadger']);

const FALLBACK_VARIABLE_FRAGMENTS = ['default', 'fallback', 'backup', 'cached', 'empty', 'placeholder', 'alternative'];
const FALLBACK_CALL_FRAGMENTS = ['default', 'fallback', 'backup', 'empty', 'cached', 'retry', 'attempt', 'recover', 'restore'];
const FALLBACK_STATIC_CLASSES = new Set(['Cache', 'Config', 'Session', 'Storage', 'Redis']);
const CALL_LIKE_KINDS = ['call', 'new'] as const;

const COMMENT_PATTERN = /\/\/[^\n]*|#[^\n]*|\/\*[\s\S]*?\*\//g;

interface SilentFailureOptions {
  whitelistDirs: string[];
  whitelistClasses: RegExp[];
  whitelistExceptions: RegExp[];
  suppressionFunctions: RegExp[];
  suppressionStaticMethods: RegExp[];
  suppressionInstanceMethods: RegExp[];
}

function wildcard(pattern: string): RegExp {
  const source = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}$`, 'i');
}

function matchesAny(patterns: RegExp[], ...values: string[]): boolean {
  return patterns.some((pattern) => values.some((value) => pattern.test(value)));
}

function includesAny(value: string, fragments: string[]): boolean {
  const lower = value.toLowerCase();
  return fragments.some((fragment) => lower.includes(fragment));
}

function isLoggingCall(node: PhpNode, scope: ScopeTracker): boolean {
  const staticCall = asStaticCall(node);
  if (staticCall) {
    const className = scope.classReference(staticCall.classNode) ?? '';
    const short = shortName(className);
    if (short === 'Log' || TRACKER_CLASSES.has(short)) return true;
    if (short === 'DB' && staticCall.method.toLowerCase() === 'rollback') return true;
    return className.includes('Sentry') || className.includes('Bugsnag');
  }

  const fn = asFunctionCall(node);
  if (fn) {
    if (['logger', 'report', 'abort', 'abort_if', 'abort_unless'].includes(fn.name)) return true;
    if (fn.name.includes('Sentry\\captureException') || fn.name.startsWith('Bugsnag\\')) return true;
    // rescue($callback, $fallback, true) reports the exception.
    return fn.name === 'rescue' && fn.args[2]?.kind === 'boolean' && fn.args[2].value === true;
  }

  const methodCall = asMethodCall(node);
  if (!methodCall) return false;
  const { receiver, method } = methodCall;
  if (LOG_METHODS.has(method) || REPORT_METHODS.has(method)) return true;
  if (SESSION_METHODS.has(method)) {
    if (asFunctionCall(receiver)?.name === 'session') return true;
    if ((variableName(receiver) ?? '').toLowerCase().includes('session')) return true;
  }
  return isThisVariable(receiver) && includesAny(method, HANDLER_FRAGMENTS);
}

function isFallbackAssignment(node: PhpNode, scope: ScopeTracker): boolean {
  const target = variableName(node.left);
  if (target && includesAny(target, FALLBACK_VARIABLE_FRAGMENTS)) return true;
  const value = child(node, 'right');
  if (!value) return false;
  if (value.kind === 'new') return true;

  const methodCall = asMethodCall(value);
  if (methodCall) return includesAny(methodCall.method, FALLBACK_CALL_FRAGMENTS);
  const fn = asFunctionCall(value);
  if (fn) return includesAny(fn.name, FALLBACK_CALL_FRAGMENTS);
  const staticCall = asStaticCall(value);
  if (staticCall) {
    const short = shortName(scope.classReference(staticCall.classNode) ?? '');
    if (!FALLBACK_STATIC_CLASSES.has(short)) return false;
    if (staticCall.method === 'get') return staticCall.args.length >= 2;
    return ['remember', 'rememberForever', 'pull'].includes(staticCall.method);
  }
  if (value.kind === 'bin' && stringProp(value, 'type') === '??') return isKind(value.right, ...CALL_LIKE_KINDS);
  if (value.kind === 'retif') return isKind(value.falseExpr, ...CALL_LIKE_KINDS);
  return false;
}

function isHandled(node: PhpNode, scope: ScopeTracker): boolean {
  if (isKind(node, 'return', 'continue', 'break')) return true;
  if (node.kind === 'assign' && stringProp(node, 'operator') === '=') return isFallbackAssignment(node, scope);
  if (asFunctionCall(node)?.name === 'rescue') return true;
  return isLoggingCall(node, scope);
}

class SilentFailureVisitor implements NodeVisitor {
  private catchDepth = 0;

  constructor(
    private readonly context: FileContext,
    private readonly options: SilentFailureOptions,
  ) {}

  enterNode(node: PhpNode): void {
    if (node.kind === 'catch') this.catchDepth += 1;
    const className = this.context.scope.currentClassName();
    if (className && matchesAny(this.options.whitelistClasses, className)) return;

    if (node.kind === 'catch') this.checkCatch(node);
    else if (node.kind === 'silent') this.checkSuppression(node);
  }

  leaveNode(node: PhpNode): void {
    if (node.kind === 'catch') this.catchDepth -= 1;
  }

  private checkCatch(node: PhpNode): void {
    const { scope } = this.context;
    const types = childList(node, 'what')
      .map((type) => identifierName(type))
      .filter((name): name is string => name !== null);
    const broad = types.map((type) => shortName(type)).filter((type) => BROAD_TYPES.has(type));
    if (broad.length === 0 && types.some((type) => matchesAny(this.options.whitelistExceptions, type, shortName(type)))) {
      return;
    }

    const body = child(node, 'body');
    const statements = body
      ? childList(body, 'children').filter((statement) => statement.kind !== 'noop' && !statement.kind.startsWith('comment'))
      : [];
    const line = startLine(node);

    if (!body || statements.length === 0) {
      if (this.hasIntentionalComment(body)) return;
      this.context.report({
        severity: 'high',
        line,
        message: 'Empty catch block silently swallows exceptions',
        recommendation:
          'Never use empty catch blocks. At minimum, log the exception. If the exception really can be ignored, say so in a comment.',
        metadata: { types },
      });
      return;
    }

    const rethrows = containsNode(body, (inner) => inner.kind === 'throw');
    if (broad.length > 0 && !rethrows) {
      const listed = broad.join('|');
      this.context.report({
        severity: 'high',
        line,
        message: `Catching ${listed} is overly broad and can mask fatal errors`,
        recommendation: `Catch specific exception types instead of ${listed}. Broad catches hide programming errors like TypeError and ArgumentCountError.`,
        metadata: { types: broad },
      });
    }

    const variable = variableName(node.variable);
    if (variable && containsNode(body, (inner) => inner.kind === 'variable' && variableName(inner) === variable)) return;
    if (rethrows || containsNode(body, (inner) => isHandled(inner, scope))) return;
    this.context.report({
      line,
      message: 'Catch block does not log exception or rethrow',
      recommendation:
        'Log caught exceptions with Log::error() or report(), or rethrow them. Silent failures make debugging extremely difficult.',
      metadata: { types },
    });
  }

  private hasIntentionalComment(body: PhpNode | null): boolean {
    if (!body) return false;
    const comments = this.context.text(body).match(COMMENT_PATTERN) ?? [];
    return comments.some((comment) => includesAny(comment, INTENTIONAL_MARKERS));
  }

  private checkSuppression(node: PhpNode): void {
    const expr = child(node, 'expr');
    if (expr && this.isWhitelistedSuppression(expr)) return;

    let severity: Severity = 'medium';
    let message = 'Error suppression operator (@) hides errors';
    if (this.catchDepth > 0) {
      severity = 'high';
      message = 'Error suppression operator (@) inside catch block creates double silencing';
    } else if (expr && this.isDynamicCall(expr)) {
      severity = 'high';
      message = 'Dynamic error suppression is particularly dangerous';
    }
    this.context.report({
      severity,
      line: startLine(node),
      message,
      recommendation:
        severity === 'high'
          ? 'Dynamic or nested error suppression is highly discouraged. Use an explicit try/catch with logging.'
          : 'Avoid the @ operator. Handle errors explicitly with try/catch or check return values.',
    });
  }

  private isWhitelistedSuppression(expr: PhpNode): boolean {
    const fn = asFunctionCall(expr);
    if (fn) return matchesAny(this.options.suppressionFunctions, fn.name, shortName(fn.name));
    const staticCall = asStaticCall(expr);
    if (staticCall) {
      const written = identifierName(staticCall.classNode);
      if (!written) return false;
      const qualified = this.context.scope.classReference(staticCall.classNode) ?? written;
      return matchesAny(
        this.options.suppressionStaticMethods,
        `${qualified}::${staticCall.method}`,
        `${shortName(written)}::${staticCall.method}`,
      );
    }
    const methodCall = asMethodCall(expr);
    return methodCall !== null && matchesAny(this.options.suppressionInstanceMethods, methodCall.method);
  }

  /** `@$fn()`, `@$class::run()` and `@$obj->$method()`. */
  private isDynamicCall(expr: PhpNode): boolean {
    if (expr.kind !== 'call') return false;
    const what = child(expr, 'what');
    if (!what) return false;
    if (isKind(what, 'propertylookup', 'nullsafepropertylookup', 'staticlookup')) {
      if (what.kind === 'staticlookup' && !isKind(what.what, 'name', 'selfreference', 'staticreference', 'parentreference')) {
        return true;
      }
      return identifierName(what.offset) === null;
    }
    return what.kind !== 'name';
  }
}

export class SilentFailureAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly options: SilentFailureOptions;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    const patterns = (key: string, fallback: string[]): RegExp[] => reader.stringList(key, fallback).map(wildcard);
    this.options = {
      whitelistDirs: reader.stringList('whitelist_dirs', ['tests', 'database/seeders', 'database/factories']),
      whitelistClasses: patterns('whitelist_classes', ['*Test', '*TestCase', '*Seeder', 'DatabaseSeeder']),
      whitelistExceptions: patterns('whitelist_exceptions', [
        'ModelNotFoundException', 'NotFoundException', 'NotFoundHttpException', 'ValidationException',
      ]),
      suppressionFunctions: patterns('whitelist_error_suppression_functions', [
        'unlink', 'fopen', 'file_get_contents', 'mkdir', 'rmdir',
      ]),
      suppressionStaticMethods: patterns('whitelist_error_suppression_static_methods', [
        'Storage::delete', 'Storage::deleteDirectory', 'File::delete', 'File::deleteDirectory',
      ]),
      suppressionInstanceMethods: patterns('whitelist_error_suppression_instance_methods', ['delete', 'close', 'unlink']),
    };
  }

  appliesTo(file: string): boolean {
    return !this.options.whitelistDirs.some((dir) => file.startsWith(`${dir}/`) || file.includes(`/${dir}/`));
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new SilentFailureVisitor(context, this.options);
  }
}

export const silentFailure: AnalyzerDefinition = {
  meta: META,
  create: (options) => new SilentFailureAnalyzer(options),
};
