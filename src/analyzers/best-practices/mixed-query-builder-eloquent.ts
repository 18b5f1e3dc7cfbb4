/**
 * Mixed Query Builder and Eloquent Detector
 *
 * Tables are collected per class: Eloquent usages through the model registry,
 * Query Builder usages through `DB::table()`. A table reached both ways in one
 * class bypasses model scopes and casts on one of the paths.
 */

import type { Analyzer, AnalyzerMeta, FileContext, RegistryRequirements } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asMethodCall, asStaticCall, firstStringArgument } from '../../core/php/chains';
import { sameClassName, shortName } from '../../core/php/names';
import { startLine, variableName, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { inferProvenance, modelForStaticCall, modelOf } from '../../core/provenance';

const META: AnalyzerMeta = {
  id: 'mixed-query-builder-eloquent',
  name: 'Mixed Query Builder and Eloquent Detector',
  description: 'Detects inconsistent mixing of Query Builder and Eloquent ORM in the same class',
  category: 'best-practices',
  severity: 'medium',
  tags: ['laravel', 'eloquent', 'query-builder', 'consistency'],
};

interface MixedOptions {
  mixingThreshold: number;
  whitelist: string[];
  treatToBaseAsQueryBuilder: boolean;
}

interface TableUsage {
  eloquentLine?: number;
  queryBuilderLine?: number;
}

interface ClassState {
  node: PhpNode;
  name: string;
  qualifiedName: string;
  tables: Map<string, TableUsage>;
  eloquentUsages: number;
}

class MixedQueryVisitor implements NodeVisitor {
  private readonly classes: ClassState[] = [];

  constructor(
    private readonly context: FileContext,
    private readonly options: MixedOptions,
  ) {}

  enterNode(node: PhpNode): void {
    const { scope } = this.context;
    if (node.kind === 'class') {
      const current = scope.currentClass();
      if (current?.kind === 'class' && current.node === node && current.name && current.qualifiedName) {
        this.classes.push({ node, name: current.name, qualifiedName: current.qualifiedName, tables: new Map(), eloquentUsages: 0 });
      }
      return;
    }
    if (node.kind !== 'call') return;
    const state = this.classes[this.classes.length - 1];
    if (!state || scope.currentClass()?.node !== state.node || !scope.currentMethod()) return;
    this.recordCall(node, state);
  }

  leaveNode(node: PhpNode): void {
    const state = this.classes[this.classes.length - 1];
    if (!state || state.node !== node) return;
    this.classes.pop();
    if (!this.isWhitelisted(state)) this.evaluate(state);
  }

  private isWhitelisted(state: ClassState): boolean {
    return this.options.whitelist.some(
      (entry) => sameClassName(entry, state.qualifiedName) || sameClassName(entry, state.name),
    );
  }

  private use(state: ClassState, table: string, kind: 'eloquent' | 'query-builder', line: number): void {
    const usage = state.tables.get(table) ?? {};
    if (kind === 'eloquent') {
      usage.eloquentLine ??= line;
      state.eloquentUsages += 1;
    } else {
      usage.queryBuilderLine ??= line;
    }
    state.tables.set(table, usage);
  }

  private recordCall(node: PhpNode, state: ClassState): void {
    const { scope, registry } = this.context;
    const line = startLine(node);

    const staticCall = asStaticCall(node);
    if (staticCall) {
      const className = scope.classReference(staticCall.classNode);
      if (!className) return;
      if (isFacade(className, 'DB')) {
        const table = staticCall.method === 'table' ? firstStringArgument(staticCall.args) : null;
        if (table) this.use(state, table, 'query-builder', line);
        return;
      }
      const model = modelForStaticCall(
        { method: staticCall.method, args: staticCall.args, node, isStatic: true, classNode: staticCall.classNode },
        scope,
      );
      const table = model ? registry.tableFor(model) : undefined;
      if (table) this.use(state, table, 'eloquent', line);
      return;
    }

    const methodCall = asMethodCall(node);
    if (!methodCall) return;

    // DB::connection('x')->table('y')
    if (methodCall.method === 'table') {
      const receiver = asStaticCall(methodCall.receiver);
      const className = receiver ? scope.classReference(receiver.classNode) : null;
      if (receiver?.method === 'connection' && className && isFacade(className, 'DB')) {
        const table = firstStringArgument(methodCall.args);
        if (table) this.use(state, table, 'query-builder', line);
        return;
      }
    }

    if ((methodCall.method === 'toBase' || methodCall.method === 'getQuery') && this.options.treatToBaseAsQueryBuilder) {
      const model = modelOf(inferProvenance(methodCall.receiver, scope));
      const table = model ? registry.tableFor(model) : undefined;
      if (table) this.use(state, table, 'query-builder', line);
      return;
    }

    // Calls on variables holding Eloquent queries or results.
    if (!variableName(methodCall.receiver)) return;
    const model = modelOf(inferProvenance(node, scope));
    const table = model ? registry.tableFor(model) : undefined;
    if (table) this.use(state, table, 'eloquent', line);
  }

  private evaluate(state: ClassState): void {
    const { registry } = this.context;
    const significant: string[] = [];

    for (const [table, usage] of [...state.tables].sort(([a], [b]) => a.localeCompare(b))) {
      if (usage.queryBuilderLine === undefined) continue;
      if (usage.eloquentLine !== undefined) {
        this.context.report({
          code: 'mixed-same-table',
          severity: 'high',
          line: usage.queryBuilderLine,
          message: `Class "${state.name}" uses both Eloquent and Query Builder for table "${table}"`,
          recommendation:
            'Use a consistent approach: prefer Eloquent for better code organization, global scopes, and relationships. ' +
            'Use Query Builder only for performance-critical raw queries. Mixing both approaches can bypass global scopes and make code harder to maintain.',
          metadata: { class: state.qualifiedName, table, eloquent_line: usage.eloquentLine, query_builder_line: usage.queryBuilderLine },
        });
      }
      if (registry.hasModelForTable(table)) significant.push(table);
    }

    if (state.eloquentUsages === 0 || significant.length <= this.options.mixingThreshold) return;
    const firstLine = Math.min(...significant.map((table) => state.tables.get(table)?.queryBuilderLine ?? Number.MAX_SAFE_INTEGER));
    this.context.report({
      code: 'mixed-significant',
      severity: 'medium',
      line: firstLine,
      message: `Class "${state.name}" queries ${significant.length} model-backed tables through Query Builder while also using Eloquent (${significant.join(', ')})`,
      recommendation:
        'Consider using a consistent approach throughout the class. If using Eloquent elsewhere, continue with Eloquent for these tables so that model scopes, casts and events apply.',
      metadata: {
        class: state.qualifiedName,
        tables: significant,
        models: significant.flatMap((table) => registry.modelsForTable(table).map(shortName)),
        threshold: this.options.mixingThreshold,
      },
    });
  }
}

export class MixedQueryBuilderEloquentAnalyzer implements Analyzer {
  readonly meta = META;
  readonly registryOptions: RegistryRequirements;
  private readonly options: MixedOptions;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.options = {
      mixingThreshold: reader.integer('mixing_threshold', 2),
      whitelist: reader.stringList('whitelist', []),
      treatToBaseAsQueryBuilder: reader.boolean('treat_tobase_as_query_builder', true),
    };
    const modelPaths = reader.stringList('model_paths', []);
    this.registryOptions = {
      modelPaths: modelPaths.length > 0 ? modelPaths : undefined,
      tableMappings: reader.stringMap('table_mappings'),
    };
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new MixedQueryVisitor(context, this.options);
  }
}

export const mixedQueryBuilderEloquent: AnalyzerDefinition = {
  meta: META,
  create: (options) => new MixedQueryBuilderEloquentAnalyzer(options),
};
