/**
 * Select Asterisk Analyzer
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { asMethodCall, asStaticCall, flattenChain } from '../../core/php/chains';
import { shortName } from '../../core/php/names';
import { startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { inferProvenance, modelForStaticCall } from '../../core/provenance';

const META: AnalyzerMeta = {
  id: 'select-asterisk',
  name: 'Select Asterisk Analyzer',
  description: 'Detects queries fetching all columns when only specific columns are needed',
  category: 'best-practices',
  severity: 'low',
  tags: ['laravel', 'performance', 'database', 'optimization'],
};

const FETCH_METHODS = new Set(['all', 'get', 'first', 'find']);
const COLUMN_METHODS = new Set(['select', 'addSelect', 'selectRaw', 'pluck', 'value']);

class SelectAsteriskVisitor implements NodeVisitor {
  constructor(private readonly context: FileContext) {}

  enterNode(node: PhpNode): void {
    const model = this.fetchedModel(node);
    if (!model) return;
    const { calls } = flattenChain(node);
    if (calls.some((call) => COLUMN_METHODS.has(call.method))) return;
    const method = calls[calls.length - 1].method;

    this.context.report({
      line: startLine(node),
      message: `Query using ->${method}() without ->select() fetches all columns`,
      recommendation:
        "Use ->select(['col1', 'col2']) to fetch only the columns you need. This reduces memory use and transfer size, especially for tables with many columns or BLOB/TEXT fields.",
      metadata: { model: shortName(model), method },
    });
  }

  /** Model queried when `node` fetches rows straight from an Eloquent query. */
  private fetchedModel(node: PhpNode): string | null {
    const { scope } = this.context;
    const staticCall = asStaticCall(node);
    if (staticCall) {
      if (!FETCH_METHODS.has(staticCall.method)) return null;
      return modelForStaticCall(
        { method: staticCall.method, args: staticCall.args, node, isStatic: true, classNode: staticCall.classNode },
        scope,
      );
    }
    const methodCall = asMethodCall(node);
    if (!methodCall || !FETCH_METHODS.has(methodCall.method) || methodCall.method === 'all') return null;
    const receiver = inferProvenance(methodCall.receiver, scope);
    return receiver.kind === 'eloquent-builder' ? receiver.model : null;
  }
}

export class SelectAsteriskAnalyzer implements Analyzer {
  readonly meta = META;

  createVisitor(context: FileContext): NodeVisitor {
    return new SelectAsteriskVisitor(context);
  }
}

export const selectAsterisk: AnalyzerDefinition = {
  meta: META,
  create: () => new SelectAsteriskAnalyzer(),
};
