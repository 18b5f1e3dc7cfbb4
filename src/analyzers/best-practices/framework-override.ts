/**
 * Framework Override Analyzer
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { sameClassName, shortName } from '../../core/php/names';
import { startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'framework-override',
  name: 'Framework Override Analyzer',
  description: 'Detects classes extending core framework classes that break on upgrades',
  category: 'best-practices',
  severity: 'high',
  tags: ['laravel', 'framework', 'upgradability', 'maintenance'],
};

export const CORE_FRAMEWORK_CLASSES = [
  'Illuminate\\Http\\Request',
  'Illuminate\\Http\\Response',
  'Illuminate\\Http\\RedirectResponse',
  'Illuminate\\Http\\JsonResponse',
  'Illuminate\\Routing\\Router',
  'Illuminate\\Foundation\\Application',
  'Illuminate\\Database\\Eloquent\\Builder',
  'Illuminate\\Database\\Query\\Builder',
  'Illuminate\\Support\\Facades\\Facade',
];

class FrameworkOverrideVisitor implements NodeVisitor {
  constructor(private readonly context: FileContext) {}

  enterNode(node: PhpNode): void {
    if (node.kind !== 'class') return;
    const { scope } = this.context;
    const current = scope.currentClass();
    if (current?.node !== node) return;
    const parent = current.classChain[0];
    if (!parent || !CORE_FRAMEWORK_CLASSES.some((core) => sameClassName(core, parent))) return;

    const className = current.name ?? 'class@anonymous';
    this.context.report({
      line: startLine(node),
      message: `Class "${className}" extends core framework class "${parent}"`,
      recommendation:
        "Avoid extending core framework classes. Use the framework's extension points instead: macros (e.g. Request::macro()), service providers, middleware or event listeners. " +
        `Subclasses of core classes break during framework upgrades. For ${shortName(parent)}, consider middleware or macros instead.`,
      metadata: { class: current.qualifiedName ?? className, parent },
    });
  }
}

export class FrameworkOverrideAnalyzer implements Analyzer {
  readonly meta = META;

  createVisitor(context: FileContext): NodeVisitor {
    return new FrameworkOverrideVisitor(context);
  }
}

export const frameworkOverride: AnalyzerDefinition = {
  meta: META,
  create: () => new FrameworkOverrideAnalyzer(),
};
