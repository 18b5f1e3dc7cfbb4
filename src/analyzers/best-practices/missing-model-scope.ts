/**
 * Missing Model Scope Analyzer
 *
 * Collects chains of two or more `where*` calls per file and reports the ones
 * that repeat across the project, since they belong in a query scope.
 */

import * as path from 'node:path';
import type { Analyzer, AnalyzerMeta, FileContext, ProjectContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { flattenChain, type ChainCall } from '../../core/php/chains';
import { identifierName, isKind, startLine, stringLiteral, stringProp, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'missing-model-scope',
  name: 'Missing Model Scope Analyzer',
  description: 'Detects repeated query patterns that should be extracted into model scopes',
  category: 'best-practices',
  severity: 'low',
  tags: ['laravel', 'eloquent', 'reusability', 'dry'],
};

interface WhereCall {
  method: string;
  args: string[];
}

interface PatternOccurrence {
  file: string;
  line: number;
}

interface PatternRecord {
  pattern: string;
  occurrences: PatternOccurrence[];
}

function isWhereMethod(method: string): boolean {
  return method.startsWith('where') || method === 'orWhere';
}

/** Literal value of an argument, or null when it is computed. */
function literalArgument(node: PhpNode): string | null {
  const text = stringLiteral(node);
  if (text !== null) return text;
  if (isKind(node, 'number', 'boolean')) return stringProp(node, 'raw') ?? stringProp(node, 'value');
  if (node.kind === 'name') return identifierName(node);
  return null;
}

function whereCall(call: ChainCall): WhereCall {
  const args = call.args.map(literalArgument).filter((arg): arg is string => arg !== null);
  return { method: call.method, args };
}

function signature(chain: WhereCall[]): string {
  return chain.map(({ method, args }) => `${method}(${args.join(',')})`).join('->');
}

function describe(chain: WhereCall[]): string {
  return chain
    .map(({ method, args }) => (args.length === 0 ? `${method}(...)` : `${method}('${args.slice(0, 2).join("', '")}', ...)`))
    .join('->');
}

class ModelScopeCollector implements NodeVisitor {
  private readonly seen = new WeakSet<PhpNode>();

  constructor(
    private readonly context: FileContext,
    private readonly patterns: Map<string, PatternRecord>,
  ) {}

  enterNode(node: PhpNode): void {
    // Only the outermost call of a chain; inner calls are part of the same pattern.
    if (node.kind !== 'call' || this.seen.has(node)) return;
    const { calls } = flattenChain(node);
    calls.forEach((call) => this.seen.add(call.node));

    const chain = calls.filter((call) => isWhereMethod(call.method)).map(whereCall);
    if (chain.length < 2) return;

    const line = startLine(node);
    if (this.context.isSuppressed(line)) return;
    for (let start = 0; start < chain.length; start++) {
      for (let end = start + 2; end <= chain.length; end++) {
        const sub = chain.slice(start, end);
        const key = signature(sub);
        const record = this.patterns.get(key) ?? { pattern: describe(sub), occurrences: [] };
        record.occurrences.push({ file: this.context.file, line });
        this.patterns.set(key, record);
      }
    }
  }
}

export class MissingModelScopeAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly minOccurrences: number;
  private patterns = new Map<string, PatternRecord>();

  constructor(options: AnalyzerOptions = {}) {
    this.minOccurrences = new OptionReader(META.id, options).integer('min_occurrences', 2, 2);
  }

  reset(): void {
    this.patterns = new Map();
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new ModelScopeCollector(context, this.patterns);
  }

  analyzeProject(context: ProjectContext): void {
    const keys = [...this.patterns.keys()].sort();
    for (const key of keys) {
      const record = this.patterns.get(key);
      if (!record || record.occurrences.length < this.minOccurrences) continue;
      // Files may finish in any order under concurrency.
      const occurrences = [...record.occurrences].sort((a, b) => a.file.localeCompare(b.file) || a.line - b.line);
      const first = occurrences[0];
      const where = occurrences
        .slice(0, 3)
        .map((occurrence) => `${path.posix.basename(occurrence.file)}:${occurrence.line}`)
        .join(', ');
      context.report({
        file: first.file,
        line: first.line,
        message: `Query pattern "${record.pattern}" appears ${occurrences.length} times across the codebase`,
        recommendation: `Extract this query pattern to a model scope for reusability. Found ${occurrences.length} occurrences at: ${where}`,
        metadata: { signature: key, count: occurrences.length, locations: occurrences },
      });
    }
  }
}

export const missingModelScope: AnalyzerDefinition = {
  meta: META,
  create: (options) => new MissingModelScopeAnalyzer(options),
};
