/**
 * Missing Database Transactions Analyzer
 *
 * Counts write operations per method that run outside `DB::transaction()` and
 * outside a manual `beginTransaction()` / `commit()` block.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall, asMethodCall, asStaticCall, flattenChain } from '../../core/php/chains';
import { sameClassName, shortName } from '../../core/php/names';
import { startLine, type PhpNode } from '../../core/php/nodes';
import { inferProvenance } from '../../core/provenance';
import type { NodeVisitor } from '../../core/php/traverse';
import { matchesAnyPattern } from '../../core/rule-tuning';
import type { ScopeTracker } from '../../core/scope';

const META: AnalyzerMeta = {
  id: 'missing-database-transactions',
  name: 'Missing Database Transactions Analyzer',
  description: 'Detects multiple database write operations without transaction protection',
  category: 'best-practices',
  severity: 'medium',
  tags: ['laravel', 'database', 'transactions', 'data-integrity', 'acid'],
};

const WRITE_METHODS = new Set([
  'save', 'delete', 'forceDelete', 'update', 'increment', 'decrement', 'touch',
  'create', 'insert', 'updateOrCreate', 'firstOrCreate', 'updateOrInsert', 'upsert',
  'sync', 'attach', 'detach', 'toggle', 'syncWithoutDetaching', 'destroy',
  'forceCreate', 'insertOrIgnore', 'insertGetId',
]);

const DB_WRITE_METHODS = new Set(['insert', 'update', 'delete', 'statement']);

/** Writes only when called on a model; `push` on a collection appends an item. */
const MODEL_ONLY_WRITE_METHODS = new Set(['push']);

/** Facades with write-like methods that never touch the database. */
const NON_DATABASE_FACADES = [
  'Cache', 'Redis', 'RateLimiter', 'Session', 'Storage', 'Queue', 'Cookie',
  'File', 'Log', 'Bus', 'Event', 'Mail', 'Notification',
];

const NON_DATABASE_HELPERS = new Set(['cache', 'session', 'storage', 'cookie', 'request', 'collect']);

const EXCLUDED_FILE_PATTERNS = [
  /(^|\/)tests\//i,
  /(^|\/)database\/(seeders|factories|migrations)\//,
  /(Test|Seeder|Factory)\.php$/,
];

interface TransactionOptions {
  threshold: number;
  whitelist: string[];
  excludePaths: string[];
}

interface MethodFrame {
  node: PhpNode;
  className: string;
  qualifiedName: string | null;
  methodName: string;
  /** Inside `beginTransaction()` without a matching commit or rollback yet. */
  manualTransaction: boolean;
  unprotected: number[];
}

/** DB facade method at the start of the chain ending in `node`, e.g. `beginTransaction` for `DB::connection()->beginTransaction()`. */
function dbChainMethod(node: PhpNode, scope: ScopeTracker): string | null {
  const { calls } = flattenChain(node);
  const first = calls[0];
  if (!first?.isStatic || !first.classNode) return null;
  const className = scope.classReference(first.classNode);
  if (!className || !isFacade(className, 'DB')) return null;
  const last = calls[calls.length - 1];
  if (calls.length === 1 || (first.method === 'connection' && calls.length === 2)) return last.method;
  return null;
}

class TransactionVisitor implements NodeVisitor {
  private readonly methods: MethodFrame[] = [];

  constructor(
    private readonly context: FileContext,
    private readonly options: TransactionOptions,
  ) {}

  enterNode(node: PhpNode): void {
    const { scope } = this.context;
    if (node.kind === 'method') {
      const method = scope.currentMethod();
      if (method?.node !== node || !method.name) return;
      this.methods.push({
        node,
        className: scope.currentClassName() ?? 'class@anonymous',
        qualifiedName: scope.currentQualifiedClassName(),
        methodName: method.name,
        manualTransaction: false,
        unprotected: [],
      });
      return;
    }
    if (node.kind !== 'call') return;
    const frame = this.methods[this.methods.length - 1];
    if (!frame || scope.currentMethod()?.node !== frame.node) return;

    // PHP method names are case-insensitive.
    const dbMethod = dbChainMethod(node, scope)?.toLowerCase();
    if (dbMethod === 'begintransaction') {
      frame.manualTransaction = true;
      return;
    }
    if (dbMethod === 'commit' || dbMethod === 'rollback') {
      frame.manualTransaction = false;
      return;
    }

    if (!this.isWriteOperation(node)) return;
    if (frame.manualTransaction || scope.isTransactionProtected()) return;
    frame.unprotected.push(startLine(node));
  }

  leaveNode(node: PhpNode): void {
    const frame = this.methods[this.methods.length - 1];
    if (!frame || frame.node !== node) return;
    this.methods.pop();
    if (frame.unprotected.length < this.options.threshold || this.isWhitelisted(frame)) return;

    const count = frame.unprotected.length;
    this.context.report({
      code: 'missing-transaction',
      line: startLine(node),
      message: `Method "${frame.className}::${frame.methodName}()" has ${count} write operations without transaction protection`,
      recommendation:
        'Wrap multiple write operations in DB::transaction() to ensure data integrity. ' +
        'If any operation fails, all changes will be rolled back. ' +
        `Write operations found at lines: ${frame.unprotected.join(', ')}`,
      metadata: {
        class: frame.qualifiedName ?? frame.className,
        method: frame.methodName,
        write_count: count,
        write_lines: frame.unprotected,
        threshold: this.options.threshold,
      },
    });
  }

  private isWhitelisted(frame: MethodFrame): boolean {
    const names = [frame.className, frame.qualifiedName, `${frame.className}::${frame.methodName}`];
    return this.options.whitelist.some((entry) => names.some((name) => name !== null && sameClassName(entry, name)));
  }

  private isWriteOperation(node: PhpNode): boolean {
    const { scope } = this.context;
    const staticCall = asStaticCall(node);
    if (staticCall) {
      const className = scope.classReference(staticCall.classNode);
      if (!className) return false;
      if (isFacade(className, 'DB')) return DB_WRITE_METHODS.has(staticCall.method);
      return WRITE_METHODS.has(staticCall.method) && !this.isNonDatabaseClass(className);
    }

    const methodCall = asMethodCall(node);
    if (!methodCall) return false;
    if (MODEL_ONLY_WRITE_METHODS.has(methodCall.method)) {
      return inferProvenance(methodCall.receiver, scope).kind === 'model-class';
    }
    if (!WRITE_METHODS.has(methodCall.method)) return false;
    const { root, calls } = flattenChain(node);
    const first = calls[0];
    if (first?.isStatic && first.classNode) {
      const className = scope.classReference(first.classNode);
      return !(className && this.isNonDatabaseClass(className));
    }
    const helper = asFunctionCall(root);
    return !(helper && NON_DATABASE_HELPERS.has(helper.name.toLowerCase()));
  }

  private isNonDatabaseClass(className: string): boolean {
    const short = shortName(className);
    return NON_DATABASE_FACADES.some((facade) => facade.toLowerCase() === short.toLowerCase());
  }
}

export class MissingDatabaseTransactionsAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly options: TransactionOptions;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.options = {
      threshold: reader.integer('threshold', 2, 1),
      whitelist: reader.stringList('whitelist', []),
      excludePaths: reader.stringList('exclude_paths', []),
    };
  }

  appliesTo(file: string): boolean {
    if (EXCLUDED_FILE_PATTERNS.some((pattern) => pattern.test(file))) return false;
    return !matchesAnyPattern(file, this.options.excludePaths);
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new TransactionVisitor(context, this.options);
  }
}

export const missingDatabaseTransactions: AnalyzerDefinition = {
  meta: META,
  create: (options) => new MissingDatabaseTransactionsAnalyzer(options),
};
