/**
 * Helper Function Abuse Analyzer
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { HELPER_FUNCTIONS } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall } from '../../core/php/chains';
import { identifierName, startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { severityForExcess } from '../shared';

const META: AnalyzerMeta = {
  id: 'helper-function-abuse',
  name: 'Helper Function Abuse Analyzer',
  description: 'Detects excessive use of framework helper functions that hide dependencies and hinder testing',
  category: 'best-practices',
  severity: 'low',
  tags: ['testability', 'dependency-injection', 'laravel', 'helpers', 'code-quality'],
};

interface ClassHelpers {
  node: PhpNode;
  name: string;
  helpers: Map<string, number>;
}

class HelperFunctionVisitor implements NodeVisitor {
  private readonly classes: ClassHelpers[] = [];

  constructor(
    private readonly context: FileContext,
    private readonly helpers: Set<string>,
    private readonly threshold: number,
  ) {}

  enterNode(node: PhpNode): void {
    if (node.kind === 'class' || node.kind === 'trait') {
      const name = identifierName(node.name);
      if (name && node.isAnonymous !== true) this.classes.push({ node, name, helpers: new Map() });
      return;
    }
    const top = this.classes[this.classes.length - 1];
    if (!top) return;
    const call = asFunctionCall(node);
    if (!call || !this.helpers.has(call.name)) return;
    top.helpers.set(call.name, (top.helpers.get(call.name) ?? 0) + 1);
  }

  leaveNode(node: PhpNode): void {
    const top = this.classes[this.classes.length - 1];
    if (!top || top.node !== node) return;
    this.classes.pop();

    let count = 0;
    for (const uses of top.helpers.values()) count += uses;
    if (count <= this.threshold) return;

    const helpers = Object.fromEntries([...top.helpers].sort(([a], [b]) => a.localeCompare(b)));
    const listed = Object.entries(helpers).map(([name, uses]) => `${name}() (${uses}x)`).join(', ');
    this.context.report({
      severity: severityForExcess(count - this.threshold, 20, 10),
      line: startLine(node),
      message: `Class '${top.name}' uses ${count} helper function calls (threshold: ${this.threshold})`,
      recommendation:
        `Class '${top.name}' uses ${count} helper function calls: ${listed}. ` +
        'Helpers are convenient, but heavy use hides dependencies and makes unit testing difficult. Inject the underlying services instead.',
      metadata: { class: top.name, helpers, count, threshold: this.threshold },
    });
  }
}

export class HelperFunctionAbuseAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly threshold: number;
  private readonly helpers: Set<string>;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.threshold = reader.integer('threshold', 5);
    const configured = reader.stringList('helper_functions', []);
    this.helpers = new Set(configured.length > 0 ? configured : HELPER_FUNCTIONS);
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new HelperFunctionVisitor(context, this.helpers, this.threshold);
  }
}

export const helperFunctionAbuse: AnalyzerDefinition = {
  meta: META,
  create: (options) => new HelperFunctionAbuseAnalyzer(options),
};
