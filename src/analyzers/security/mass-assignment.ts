/**
 * Mass Assignment Analyzer
 *
 * Writes that hand the whole request to a model, and model classes that
 * declare neither `$fillable` nor `$guarded` or that guard nothing.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade, looksLikeModelName } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall, asMethodCall, asStaticCall } from '../../core/php/chains';
import { arrayEntries, child, childList, identifierName, startLine, variableName, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'mass-assignment',
  name: 'Mass Assignment Analyzer',
  description: 'Detects mass assignment of unfiltered request input and unprotected models',
  category: 'security',
  severity: 'high',
  tags: ['security', 'eloquent', 'mass-assignment', 'validation'],
};

const STATIC_WRITE_METHODS = new Set(['create', 'forceCreate', 'update', 'fill', 'insert', 'make', 'firstOrCreate', 'updateOrCreate']);
const INSTANCE_WRITE_METHODS = new Set(['update', 'fill', 'forceFill', 'create', 'insert', 'insertOrIgnore', 'upsert']);

/** Request methods that return every input field when called without a key. */
const WHOLE_INPUT_METHODS = new Set(['all', 'input', 'post', 'get']);

class MassAssignmentVisitor implements NodeVisitor {
  constructor(
    private readonly context: FileContext,
    private readonly requestVariables: Set<string>,
    private readonly checkModels: boolean,
  ) {}

  enterNode(node: PhpNode): void {
    if (node.kind === 'class') {
      if (this.checkModels) this.checkModelProtection(node);
      return;
    }
    if (node.kind !== 'call') return;

    const staticCall = asStaticCall(node);
    if (staticCall) {
      if (!STATIC_WRITE_METHODS.has(staticCall.method) || !this.isModelClass(staticCall.classNode)) return;
      const className = this.context.scope.classShortName(staticCall.classNode) ?? 'Model';
      this.checkArguments(node, staticCall.args, `${className}::${staticCall.method}()`);
      return;
    }

    const methodCall = asMethodCall(node);
    if (methodCall && INSTANCE_WRITE_METHODS.has(methodCall.method)) {
      this.checkArguments(node, methodCall.args, `->${methodCall.method}()`);
    }
  }

  private isModelClass(classNode: PhpNode): boolean {
    const className = this.context.scope.classReference(classNode);
    if (!className) return false;
    const { registry } = this.context.scope;
    const known = registry.find(className);
    if (known) return registry.isModel(known.name);
    return looksLikeModelName(className);
  }

  private checkArguments(node: PhpNode, args: PhpNode[], label: string): void {
    const source = args.map((arg) => this.requestWideInput(arg)).find((found) => found !== null);
    if (!source) return;
    this.context.report({
      line: startLine(node),
      snippet: this.context.text(node).split('\n')[0],
      message: `Mass assignment with unfiltered request input: ${label} receives ${source}`,
      recommendation:
        'Pass only validated fields: $request->validated(), $request->safe()->only([...]) or $request->only([...]). ' +
        'Make sure the model declares $fillable or $guarded.',
      metadata: { call: label, source },
    });
  }

  /** Source text of an expression that yields every request field, or null. */
  private requestWideInput(arg: PhpNode): string | null {
    const methodCall = asMethodCall(arg);
    if (methodCall) {
      if (!WHOLE_INPUT_METHODS.has(methodCall.method) || methodCall.args.length > 0) return null;
      return this.isRequest(methodCall.receiver) ? this.context.text(arg) : null;
    }
    const staticCall = asStaticCall(arg);
    if (staticCall) {
      if (staticCall.method !== 'all' && !(WHOLE_INPUT_METHODS.has(staticCall.method) && staticCall.args.length === 0)) {
        return null;
      }
      const className = this.context.scope.classReference(staticCall.classNode);
      return className && (isFacade(className, 'Request') || isFacade(className, 'Input')) ? this.context.text(arg) : null;
    }
    return null;
  }

  private isRequest(receiver: PhpNode): boolean {
    const fn = asFunctionCall(receiver);
    if (fn) return fn.name === 'request' && fn.args.length === 0;
    const name = variableName(receiver);
    return name !== null && this.requestVariables.has(name);
  }

  private checkModelProtection(node: PhpNode): void {
    const declared = identifierName(node.name);
    if (!declared || node.isAnonymous === true) return;
    const { registry } = this.context.scope;
    const qualified = this.context.scope.resolveClassName(declared);
    if (!registry.find(qualified) || !registry.isModel(qualified)) return;

    let fillable = false;
    let guarded: PhpNode | null = null;
    let guardedDeclared = false;
    for (const statement of childList(node, 'body')) {
      if (statement.kind !== 'propertystatement') continue;
      for (const property of childList(statement, 'properties')) {
        const name = identifierName(property.name);
        if (name === 'fillable') fillable = true;
        if (name === 'guarded') {
          guardedDeclared = true;
          guarded = child(property, 'value');
        }
      }
    }

    if (guarded && guarded.kind === 'array' && arrayEntries(guarded).length === 0) {
      this.context.report({
        code: 'model-empty-guarded',
        severity: 'critical',
        line: startLine(node),
        message: `Model '${declared}' sets $guarded = [], which allows every attribute to be mass assigned`,
        recommendation: "Declare the assignable attributes in $fillable, or list the protected ones in $guarded (at least 'id').",
        metadata: { class: declared },
      });
      return;
    }
    if (!fillable && !guardedDeclared) {
      this.context.report({
        code: 'model-missing-protection',
        line: startLine(node),
        message: `Model '${declared}' declares neither $fillable nor $guarded`,
        recommendation: 'Declare $fillable with the attributes that may be mass assigned.',
        metadata: { class: declared },
      });
    }
  }
}

export class MassAssignmentAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly requestVariables: Set<string>;
  private readonly checkModels: boolean;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.requestVariables = new Set(reader.stringList('request_variables', ['request']));
    this.checkModels = reader.boolean('check_model_protection', true);
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new MassAssignmentVisitor(context, this.requestVariables, this.checkModels);
  }
}

export const massAssignment: AnalyzerDefinition = {
  meta: META,
  create: (options) => new MassAssignmentAnalyzer(options),
};
