/**
 * Chunk Missing Analyzer
 *
 * Flags loops over unbounded `all()`/`get()` results, which load every row
 * into memory at once.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade } from '../../core/laravel';
import { flattenChain } from '../../core/php/chains';
import { child, startLine, variableName, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { modelForStaticCall } from '../../core/provenance';
import type { Scope } from '../../core/scope';

const META: AnalyzerMeta = {
  id: 'chunk-missing',
  name: 'Chunk Missing Analyzer',
  description: 'Detects loops over large Eloquent result sets that should use chunk(), cursor() or lazy()',
  category: 'best-practices',
  severity: 'high',
  tags: ['laravel', 'performance', 'memory', 'eloquent', 'optimization'],
};

const CHUNKING_METHODS = new Set([
  'chunk', 'chunkById', 'cursor', 'lazy', 'lazyById', 'paginate', 'simplePaginate', 'cursorPaginate',
]);

const LIMITING_METHODS = new Set([
  'limit', 'take', 'first', 'firstOrFail', 'firstWhere', 'find', 'findOrFail', 'findOr', 'sole', 'value',
]);

class ChunkMissingVisitor implements NodeVisitor {
  /** Variables holding an unbounded fetch, per function scope. */
  private readonly assignments = new Map<Scope | null, Set<string>>();

  constructor(private readonly context: FileContext) {}

  enterNode(node: PhpNode): void {
    if (node.kind === 'assign') {
      this.trackAssignment(node);
    } else if (node.kind === 'foreach') {
      this.checkLoop(node);
    }
  }

  private fetchedVariables(): Set<string> {
    const owner = this.context.scope.currentFunction();
    let names = this.assignments.get(owner);
    if (!names) {
      names = new Set();
      this.assignments.set(owner, names);
    }
    return names;
  }

  private trackAssignment(node: PhpNode): void {
    if (node.operator !== '=') return;
    const target = variableName(node.left);
    const value = child(node, 'right');
    if (!target || !value) return;
    if (this.isUnboundedFetch(value)) this.fetchedVariables().add(target);
    else this.fetchedVariables().delete(target);
  }

  private checkLoop(node: PhpNode): void {
    const source = child(node, 'source');
    if (!source) return;

    if (this.isUnboundedFetch(source)) {
      this.context.report({
        line: startLine(node),
        message: 'Looping over ->all() or ->get() without chunk() can cause memory issues on large datasets',
        recommendation:
          'Use Model::chunk(200, function ($records) { ... }) or Model::cursor() to iterate large datasets. ' +
          'chunk() processes records in batches and cursor() uses a generator.',
        metadata: { source: this.context.text(source) },
      });
      return;
    }

    const name = variableName(source);
    if (name && this.fetchedVariables().has(name)) {
      this.context.report({
        line: startLine(node),
        message: 'Looping over a variable assigned with ->all() or ->get() can cause memory issues on large datasets',
        recommendation:
          'Use Model::chunk(200, function ($records) { ... }) or Model::cursor() instead. ' +
          'Model::lazy() also returns a generator.',
        metadata: { source: this.context.text(source), variable: name },
      });
    }
  }

  /** A model or table chain that ends in `all`/`get` and is neither chunked nor limited. */
  private isUnboundedFetch(expr: PhpNode): boolean {
    if (expr.kind !== 'call') return false;
    const { root, calls } = flattenChain(expr);
    const methods = calls.map((call) => call.method);
    if (!methods.includes('all') && !methods.includes('get')) return false;
    if (methods.some((method) => CHUNKING_METHODS.has(method) || LIMITING_METHODS.has(method))) return false;

    const first = calls[0];
    if (first.isStatic && first.classNode) {
      const className = this.context.scope.classReference(first.classNode);
      if (className && isFacade(className, 'DB')) return first.method === 'table';
      return modelForStaticCall(first, this.context.scope) !== null;
    }
    // `$user->posts()->get()`; a bare `$collection->all()` is not a query.
    return calls.length > 1 && variableName(root) !== null;
  }
}

export class ChunkMissingAnalyzer implements Analyzer {
  readonly meta = META;

  createVisitor(context: FileContext): NodeVisitor {
    return new ChunkMissingVisitor(context);
  }
}

export const chunkMissing: AnalyzerDefinition = {
  meta: META,
  create: () => new ChunkMissingAnalyzer(),
};
