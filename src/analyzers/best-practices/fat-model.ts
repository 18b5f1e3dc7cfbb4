/**
 * Fat Model Analyzer
 *
 * Measures business methods, statement lines and per-method cyclomatic
 * complexity of Eloquent models. Framework hooks, scopes, accessors,
 * mutators and relationships are not business methods.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { flattenChain } from '../../core/php/chains';
import {
  bodyStatements,
  child,
  childList,
  findNodes,
  identifierName,
  lineSpan,
  startLine,
  stringProp,
  unwrapStatement,
  type PhpNode,
} from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { severityForExcess } from '../shared';

const META: AnalyzerMeta = {
  id: 'fat-model',
  name: 'Fat Model Analyzer',
  description: 'Detects Eloquent models with too much business logic that should be extracted to services',
  category: 'best-practices',
  severity: 'medium',
  tags: ['laravel', 'eloquent', 'architecture', 'solid', 'srp'],
};

const FRAMEWORK_METHODS = new Set([
  'boot', 'booting', 'booted', 'casts',
  'newEloquentBuilder', 'newCollection', 'newFactory',
  'resolveRouteBinding', 'resolveChildRouteBinding', 'getRouteKeyName', 'getRouteKey',
  'toArray', 'toJson',
  'broadcastOn', 'broadcastWith', 'broadcastAs',
  'prunable', 'shouldBeSearchable', 'toSearchableArray', 'searchableAs',
]);

const RELATION_METHODS = new Set([
  'hasOne', 'hasMany', 'belongsTo', 'belongsToMany',
  'morphTo', 'morphOne', 'morphMany', 'morphToMany',
  'hasOneThrough', 'hasManyThrough', 'morphedByMany',
]);

const RELATION_TYPES = [
  'Relation', 'HasOne', 'HasMany', 'BelongsTo', 'BelongsToMany',
  'MorphTo', 'MorphOne', 'MorphMany', 'MorphToMany',
  'HasOneThrough', 'HasManyThrough', 'MorphedByMany',
];

const BRANCH_KINDS = new Set(['if', 'case', 'for', 'foreach', 'while', 'do', 'catch', 'retif', 'match']);
const BRANCH_OPERATORS = new Set(['&&', '||', 'and', 'or', '??']);

interface Thresholds {
  methods: number;
  lines: number;
  complexity: number;
}

function typeNames(type: PhpNode | null): string[] {
  if (!type) return [];
  if (type.kind === 'uniontype' || type.kind === 'intersectiontype') {
    return childList(type, 'types').flatMap((member) => typeNames(member));
  }
  const name = identifierName(type);
  return name ? [name] : [];
}

function isRelationshipMethod(method: PhpNode): boolean {
  if (typeNames(child(method, 'type')).some((name) => RELATION_TYPES.some((relation) => name.endsWith(relation)))) {
    return true;
  }
  const statements = bodyStatements(child(method, 'body')).map(unwrapStatement);
  for (let i = statements.length - 1; i >= 0; i--) {
    const statement = statements[i];
    if (statement.kind !== 'return') continue;
    const expr = child(statement, 'expr');
    if (!expr || expr.kind !== 'call') return false;
    return flattenChain(expr).calls.some((call) => !call.isStatic && RELATION_METHODS.has(call.method));
  }
  return false;
}

export function isBusinessMethod(method: PhpNode): boolean {
  const name = identifierName(method.name);
  if (!name || FRAMEWORK_METHODS.has(name)) return false;
  if (name.startsWith('scope') || name.endsWith('Attribute')) return false;
  const visibility = stringProp(method, 'visibility');
  if (visibility === 'private' || visibility === 'protected') return false;
  return !isRelationshipMethod(method);
}

/** Decision points plus one. */
export function cyclomaticComplexity(method: PhpNode): number {
  const body = child(method, 'body');
  if (!body) return 1;
  let complexity = 1;
  for (const node of findNodes(body, () => true)) {
    if (BRANCH_KINDS.has(node.kind)) complexity += 1;
    else if (node.kind === 'bin' && BRANCH_OPERATORS.has(stringProp(node, 'type') ?? '')) complexity += 1;
    else if (node.kind === 'matcharm' && Array.isArray(node.conds)) complexity += 1;
  }
  return complexity;
}

class FatModelVisitor implements NodeVisitor {
  constructor(
    private readonly context: FileContext,
    private readonly thresholds: Thresholds,
  ) {}

  enterNode(node: PhpNode): void {
    if (node.kind !== 'class') return;
    const { scope } = this.context;
    if (scope.currentClass()?.node !== node || !scope.isInModel()) return;
    const className = scope.currentClassName() ?? 'class@anonymous';

    const members = childList(node, 'body');
    const businessMethods = members.filter((member) => member.kind === 'method' && isBusinessMethod(member));
    const { methods, lines, complexity } = this.thresholds;

    if (businessMethods.length > methods) {
      this.context.report({
        code: 'fat-model-methods',
        severity: severityForExcess(businessMethods.length - methods, 15, 5),
        line: startLine(node),
        message: `Model "${className}" has ${businessMethods.length} business methods (threshold: ${methods}). Consider extracting logic to service classes`,
        recommendation:
          'Move business logic to service classes. Models should focus on data representation, relationships and simple accessors and mutators.',
        metadata: { class: className, business_methods: businessMethods.length, threshold: methods },
      });
    }

    const statementLines = members
      .filter((member) => member.kind === 'method' || member.kind === 'propertystatement')
      .reduce((total, member) => total + lineSpan(member), 0);
    if (statementLines > lines) {
      this.context.report({
        code: 'fat-model-size',
        severity: severityForExcess(statementLines - lines, 200, 100),
        line: startLine(node),
        message: `Model "${className}" has ${statementLines} statement lines (threshold: ${lines}). Model is too large`,
        recommendation:
          'Large models are hard to maintain. Extract business logic to services, share reusable behavior through traits, and move query logic to repositories or query scopes.',
        metadata: { class: className, statement_lines: statementLines, threshold: lines },
      });
    }

    for (const method of businessMethods) {
      const score = cyclomaticComplexity(method);
      if (score <= complexity) continue;
      const methodName = identifierName(method.name) ?? 'unknown';
      this.context.report({
        code: 'fat-model-complexity',
        severity: severityForExcess(score - complexity, 15, 5),
        line: startLine(method),
        message: `Method "${className}::${methodName}()" has complexity of ${score} (threshold: ${complexity})`,
        recommendation: 'Complex methods in models indicate business logic that should be extracted to service classes.',
        metadata: { class: className, method: methodName, complexity: score, threshold: complexity },
      });
    }
  }
}

export class FatModelAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly thresholds: Thresholds;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.thresholds = {
      methods: reader.integer('method_threshold', 15),
      lines: reader.integer('loc_threshold', 300),
      complexity: reader.integer('complexity_threshold', 10),
    };
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new FatModelVisitor(context, this.thresholds);
  }
}

export const fatModel: AnalyzerDefinition = {
  meta: META,
  create: (options) => new FatModelAnalyzer(options),
};
