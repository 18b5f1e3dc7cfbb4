/**
 * Generic Exception Catch Analyzer
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { stripLeadingSlash } from '../../core/php/names';
import { childList, identifierName, startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'generic-exception-catch',
  name: 'Generic Exception Catch Analyzer',
  description: 'Detects catch blocks that catch Exception or Throwable instead of specific types',
  category: 'best-practices',
  severity: 'low',
  tags: ['laravel', 'exceptions', 'error-handling', 'specificity'],
};

const GENERIC_TYPES = new Set(['exception', 'throwable']);

class GenericExceptionVisitor implements NodeVisitor {
  constructor(private readonly context: FileContext) {}

  enterNode(node: PhpNode): void {
    if (node.kind !== 'catch') return;
    for (const type of childList(node, 'what')) {
      const written = identifierName(type);
      if (!written || !GENERIC_TYPES.has(stripLeadingSlash(written).toLowerCase())) continue;
      this.context.report({
        line: startLine(node),
        message: `Catching generic ${written} instead of specific exception type`,
        recommendation:
          'Catch specific exception types (e.g. ModelNotFoundException, ValidationException) so that unexpected errors are not handled by accident.',
        metadata: { type: written },
      });
    }
  }
}

export class GenericExceptionCatchAnalyzer implements Analyzer {
  readonly meta = META;

  createVisitor(context: FileContext): NodeVisitor {
    return new GenericExceptionVisitor(context);
  }
}

export const genericExceptionCatch: AnalyzerDefinition = {
  meta: META,
  create: () => new GenericExceptionCatchAnalyzer(),
};
