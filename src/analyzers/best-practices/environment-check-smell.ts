/**
 * Environment Check Smell Analyzer
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade } from '../../core/laravel';
import { asFunctionCall, asMethodCall, asStaticCall } from '../../core/php/chains';
import { startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'environment-check-smell',
  name: 'Environment Check Smell Analyzer',
  description: 'Detects environment checks used for feature flags instead of configuration',
  category: 'best-practices',
  severity: 'low',
  tags: ['laravel', 'configuration', 'maintainability', 'testing'],
};

const APP_ENVIRONMENT_METHODS = new Set(['environment', 'isLocal', 'isProduction']);

const RECOMMENDATION =
  "Use config values instead of environment checks for feature flags. Store the decision in config/features.php and read it with config('features.feature_name'). " +
  'Keep environment checks for infrastructure concerns such as logging and debugging.';

class EnvironmentCheckVisitor implements NodeVisitor {
  constructor(private readonly context: FileContext) {}

  enterNode(node: PhpNode): void {
    const methodCall = asMethodCall(node);
    if (methodCall && APP_ENVIRONMENT_METHODS.has(methodCall.method)) {
      const receiver = asFunctionCall(methodCall.receiver);
      if (receiver?.name.toLowerCase() === 'app' && receiver.args.length === 0) {
        this.report(node, `app()->${methodCall.method}()`);
      }
      return;
    }

    const staticCall = asStaticCall(node);
    if (staticCall?.method !== 'environment') return;
    const className = this.context.scope.classReference(staticCall.classNode);
    if (className && isFacade(className, 'App')) this.report(node, 'App::environment()');
  }

  private report(node: PhpNode, call: string): void {
    this.context.report({
      line: startLine(node),
      message: `Using ${call} for feature flags or behavior changes`,
      recommendation: RECOMMENDATION,
      metadata: { call },
    });
  }
}

export class EnvironmentCheckSmellAnalyzer implements Analyzer {
  readonly meta = META;

  appliesTo(file: string): boolean {
    return !file.includes('ServiceProvider') && !file.includes('ExceptionHandler') && !file.endsWith('Exceptions/Handler.php');
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new EnvironmentCheckVisitor(context);
  }
}

export const environmentCheckSmell: AnalyzerDefinition = {
  meta: META,
  create: () => new EnvironmentCheckSmellAnalyzer(),
};
