/**
 * MVC Structure Violation Analyzer
 *
 * Models that render views, controller methods long enough to hide business
 * logic, and Blade views that query the database.
 */

import type { Analyzer, AnalyzerMeta, FileContext, ProjectContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall } from '../../core/php/chains';
import { child, containsNode, endLine, identifierName, startLine, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { isInController } from '../shared';

const META: AnalyzerMeta = {
  id: 'mvc-structure-violation',
  name: 'MVC Structure Violation Analyzer',
  description: 'Detects violations of the Model-View-Controller architectural pattern',
  category: 'best-practices',
  severity: 'high',
  tags: ['laravel', 'mvc', 'architecture', 'separation-of-concerns'],
};

const RENDERING_METHODS = new Set(['render', 'toHtml', 'toView', 'renderView']);

const VIEW_QUERY_PATTERNS = [/\bDB::/, /::where\s*\(/, /::find\s*\(/, /::all\s*\(/, /::get\s*\(/];
const VIEW_WRITE_PATTERNS = [/::create\s*\(/, /->save\s*\(/];

const VIEW_GLOB = 'resources/views/**/*.blade.php';

class MvcStructureVisitor implements NodeVisitor {
  constructor(
    private readonly context: FileContext,
    private readonly maxControllerMethodLines: number,
  ) {}

  enterNode(node: PhpNode): void {
    if (node.kind !== 'method') return;
    const { scope, file } = this.context;
    const className = scope.currentClassName() ?? 'Unknown';
    const methodName = identifierName(node.name) ?? 'unknown';

    if (scope.isInModel()) {
      this.checkModelMethod(node, className, methodName);
    } else if (isInController(scope, file)) {
      const lines = endLine(node) - startLine(node);
      if (lines > this.maxControllerMethodLines) {
        this.context.report({
          code: 'controller-method-too-long',
          line: startLine(node),
          message:
            `Controller method "${className}::${methodName}()" has ${lines} lines (max: ${this.maxControllerMethodLines}). ` +
            'Large methods indicate business logic in controller',
          recommendation:
            'Controllers should be thin and handle the HTTP request and response. Extract business logic to service classes; controllers coordinate, they do not implement.',
          metadata: { class: className, method: methodName, lines, max: this.maxControllerMethodLines },
        });
      }
    }
  }

  private checkModelMethod(method: PhpNode, className: string, methodName: string): void {
    if (RENDERING_METHODS.has(methodName)) {
      this.context.report({
        code: 'model-rendering-method',
        line: startLine(method),
        message: `Model "${className}" has rendering method "${methodName}()" (MVC violation)`,
        recommendation:
          'Models should not contain view rendering logic. Move this to a controller or view composer. Models are for data and relationships only.',
        metadata: { class: className, method: methodName },
      });
    }
    const body = child(method, 'body');
    if (body && containsNode(body, (node) => asFunctionCall(node)?.name === 'view')) {
      this.context.report({
        code: 'model-calls-view',
        line: startLine(method),
        message: `Model "${className}" method "${methodName}()" calls view() helper (MVC violation)`,
        recommendation: 'Models should not render views. This belongs in controllers. Models should focus on data representation.',
        metadata: { class: className, method: methodName },
      });
    }
  }
}

export class MvcStructureViolationAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly maxControllerMethodLines: number;

  constructor(options: AnalyzerOptions = {}) {
    this.maxControllerMethodLines = new OptionReader(META.id, options).integer('max_controller_method_lines', 50, 1);
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new MvcStructureVisitor(context, this.maxControllerMethodLines);
  }

  async analyzeProject(context: ProjectContext): Promise<void> {
    const views = (await context.listFiles(VIEW_GLOB)).sort();
    for (const view of views) {
      const content = context.readFile(view);
      if (content === undefined) continue;
      content.split(/\r?\n/).forEach((text, index) => {
        const snippet = text.trim();
        if (VIEW_QUERY_PATTERNS.some((pattern) => pattern.test(text))) {
          context.report({
            file: view,
            code: 'view-database-query',
            severity: 'critical',
            line: index + 1,
            snippet,
            message: 'View contains database query (MVC violation)',
            recommendation:
              'Views should never contain database queries. Load all data in the controller and pass it to the view. Views are for presentation only.',
          });
        }
        if (VIEW_WRITE_PATTERNS.some((pattern) => pattern.test(text))) {
          context.report({
            file: view,
            code: 'view-model-write',
            severity: 'critical',
            line: index + 1,
            snippet,
            message: 'View contains model creation (MVC violation)',
            recommendation: 'Views should never create or modify models. All data manipulation belongs in controllers or services.',
          });
        }
      });
    }
  }
}

export const mvcStructureViolation: AnalyzerDefinition = {
  meta: META,
  create: (options) => new MvcStructureViolationAnalyzer(options),
};
