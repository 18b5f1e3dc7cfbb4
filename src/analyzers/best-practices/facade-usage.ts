/**
 * Facade Usage
 *
 * Counts the distinct facades each class calls statically. A class that
 * reaches for many facades hides its dependencies from its constructor.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { FACADES } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asStaticCall } from '../../core/php/chains';
import { shortName } from '../../core/php/names';
import { startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { severityForExcess } from '../shared';

const META: AnalyzerMeta = {
  id: 'facade-usage',
  name: 'Facade Usage',
  description: 'Identifies excessive facade usage that makes classes hard to test and violates dependency inversion',
  category: 'best-practices',
  severity: 'medium',
  tags: ['architecture', 'testability', 'dependency-injection', 'facades', 'coupling'],
};

interface ClassFacades {
  node: PhpNode;
  name: string;
  facades: Set<string>;
}

class FacadeUsageVisitor implements NodeVisitor {
  private readonly classes: ClassFacades[] = [];

  constructor(
    private readonly context: FileContext,
    private readonly facades: Map<string, string>,
    private readonly threshold: number,
  ) {}

  enterNode(node: PhpNode): void {
    const { scope } = this.context;
    if (node.kind === 'class') {
      const current = scope.currentClass();
      if (current?.node === node) {
        this.classes.push({ node, name: current.name ?? 'class@anonymous', facades: new Set() });
      }
      return;
    }
    const top = this.classes[this.classes.length - 1];
    if (!top || scope.currentClass()?.node !== top.node) return;
    const call = asStaticCall(node);
    if (!call) return;
    const className = scope.classReference(call.classNode);
    const facade = className ? this.facades.get(shortName(className).toLowerCase()) : undefined;
    if (facade) top.facades.add(facade);
  }

  leaveNode(node: PhpNode): void {
    const top = this.classes[this.classes.length - 1];
    if (!top || top.node !== node) return;
    this.classes.pop();

    const count = top.facades.size;
    if (count <= this.threshold) return;
    const facades = [...top.facades].sort();
    const listed = facades.map((facade) => `'${facade}'`).join(', ');
    this.context.report({
      severity: severityForExcess(count - this.threshold, 5, 3),
      line: startLine(node),
      message: `Class '${top.name}' uses ${count} different facades (threshold: ${this.threshold})`,
      recommendation:
        `Class '${top.name}' uses ${count} different facades: ${listed}. Excessive facade usage couples the class to the framework and makes unit testing difficult. ` +
        'Inject the services you need through the constructor, depend on interfaces so they can be mocked, and consider splitting the class if it has too many responsibilities.',
      metadata: { class: top.name, facades, count, threshold: this.threshold },
    });
  }
}

export class FacadeUsageAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly threshold: number;
  private readonly facades: Map<string, string>;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.threshold = reader.integer('threshold', 5);
    const names = reader.stringList('facades', [...FACADES]);
    this.facades = new Map(names.map((name) => [name.toLowerCase(), name]));
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new FacadeUsageVisitor(context, this.facades, this.threshold);
  }
}

export const facadeUsage: AnalyzerDefinition = {
  meta: META,
  create: (options) => new FacadeUsageAnalyzer(options),
};
