/**
 * PHP-Side Collection Filtering Analyzer
 *
 * `Model::all()->filter(...)` loads every row before discarding most of them.
 * Reports `all`/`get` immediately followed by `filter`, `reject`, `whereIn`
 * or `whereNotIn` on a model, relation or query chain.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { looksLikeRelationName } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asPropertyFetch, flattenChain, type CallChain } from '../../core/php/chains';
import { startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { inferProvenance, modelForStaticCall } from '../../core/provenance';

const META: AnalyzerMeta = {
  id: 'php-side-filtering',
  name: 'PHP-Side Collection Filtering Analyzer',
  description: 'Detects filter(), reject(), whereIn() and whereNotIn() on collections right after a database fetch',
  category: 'best-practices',
  severity: 'critical',
  tags: ['laravel', 'performance', 'database', 'memory', 'collections'],
};

const FETCH_METHODS = new Set(['all', 'get']);

const FILTER_ADVICE: Record<string, string> = {
  filter:
    'Replace filter() with where() clauses before get()/all() to filter at database level. For complex filtering logic, consider computed columns or raw where clauses.',
  reject:
    'Replace reject() with where() or whereNot() clauses before get()/all() to filter at database level.',
  whereIn: 'Call whereIn() on the query builder before get()/all() so the database does the filtering.',
  whereNotIn: 'Call whereNotIn() on the query builder before get()/all() so the database does the filtering.',
};

class PhpFilteringVisitor implements NodeVisitor {
  /** Inner calls of chains already checked from their outermost call. */
  private readonly seen = new WeakSet<PhpNode>();

  constructor(private readonly context: FileContext) {}

  enterNode(node: PhpNode): void {
    if (node.kind !== 'call' || this.seen.has(node)) return;
    const chain = flattenChain(node);
    chain.calls.forEach((call) => this.seen.add(call.node));
    const index = chain.calls.findIndex(
      (call, i) => i > 0 && Object.hasOwn(FILTER_ADVICE, call.method) && FETCH_METHODS.has(chain.calls[i - 1].method),
    );
    if (index < 0 || !this.isQuerySource(chain, index - 1)) return;

    const pattern = chain.calls.map((call) => call.method).join('->');
    const filter = chain.calls[index].method;
    this.context.report({
      line: startLine(node),
      message: `Filtering data in PHP instead of database: ${pattern}`,
      recommendation:
        `${FILTER_ADVICE[filter]} The current pattern "${pattern}" loads all data into memory before filtering, ` +
        'which can exhaust memory on large datasets.',
      metadata: { pattern, fetch: chain.calls[index - 1].method, filter },
    });
  }

  /** Whether the calls before the fetch at `fetchIndex` form a database query. */
  private isQuerySource({ root, calls }: CallChain, fetchIndex: number): boolean {
    const { scope } = this.context;
    const first = calls[0];
    if (first.isStatic) return modelForStaticCall(first, scope) !== null;

    const property = asPropertyFetch(root);
    if (property) return looksLikeRelationName(property.property);

    if (root.kind !== 'variable') return false;
    // `$user->posts()->get()` goes through a relation method first.
    if (fetchIndex > 0) return true;
    const provenance = inferProvenance(root, scope);
    return provenance.kind === 'model-class' || provenance.kind === 'eloquent-builder' || provenance.kind === 'query-builder';
  }
}

export class PhpSideFilteringAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly whitelist: string[];

  constructor(options: AnalyzerOptions = {}) {
    this.whitelist = new OptionReader(META.id, options).stringList('whitelist', []);
  }

  appliesTo(file: string): boolean {
    return !this.whitelist.some((entry) => file.includes(entry));
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new PhpFilteringVisitor(context);
  }
}

export const phpSideFiltering: AnalyzerDefinition = {
  meta: META,
  create: (options) => new PhpSideFilteringAnalyzer(options),
};
