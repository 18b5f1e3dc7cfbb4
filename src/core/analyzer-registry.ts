/**
 * Analyzer registry.
 *
 * Holds analyzer definitions by rule id and instantiates the selected ones with
 * their per-analyzer options. New rules are added by registering a definition.
 */

import type { Analyzer, AnalyzerMeta } from './analyzer';
import { logger } from './logger';
import type { AnalyzerOptions } from './options';
import { isRuleEnabled, type RuleSettings } from './rule-tuning';

export interface AnalyzerDefinition {
  meta: AnalyzerMeta;
  /** Throws `AnalyzerOptionError` on a malformed option. */
  create(options?: AnalyzerOptions): Analyzer;
}

export interface AnalyzerSelection {
  only?: string[];
  skip?: string[];
  ruleSettings?: RuleSettings;
  /** Per-analyzer option bags keyed by rule id. */
  options?: Record<string, AnalyzerOptions>;
}

export class AnalyzerRegistry {
  private definitions: Map<string, AnalyzerDefinition> = new Map();

  register(definition: AnalyzerDefinition): void {
    if (this.definitions.has(definition.meta.id)) {
      logger.warn(`Analyzer "${definition.meta.id}" is already registered; overwriting.`);
    }
    this.definitions.set(definition.meta.id, definition);
  }

  registerAll(definitions: AnalyzerDefinition[]): void {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  has(id: string): boolean {
    return this.definitions.has(id);
  }

  get(id: string): AnalyzerDefinition | undefined {
    return this.definitions.get(id);
  }

  /** Metadata of every registered analyzer, sorted by id. */
  list(): AnalyzerMeta[] {
    return Array.from(this.definitions.values(), (definition) => definition.meta).sort((a, b) =>
      a.id.localeCompare(b.id),
    );
  }

  getIds(): string[] {
    return this.list().map((meta) => meta.id);
  }

  get size(): number {
    return this.definitions.size;
  }

  /**
   * Instantiates the selected analyzers in id order. Unknown ids in `only` and
   * `skip` are reported and ignored; disabled rules are never constructed.
   */
  create(selection: AnalyzerSelection = {}): Analyzer[] {
    for (const id of [...(selection.only ?? []), ...(selection.skip ?? [])]) {
      if (!this.has(id)) logger.warn(`Unknown analyzer "${id}" ignored. Run "laravel-lint list" to see available ids.`);
    }
    const only = selection.only && selection.only.length > 0 ? new Set(selection.only) : null;
    const skip = new Set(selection.skip ?? []);

    const analyzers: Analyzer[] = [];
    for (const meta of this.list()) {
      if (only && !only.has(meta.id)) continue;
      if (skip.has(meta.id) || !isRuleEnabled(meta.id, selection.ruleSettings)) continue;
      const definition = this.definitions.get(meta.id);
      if (!definition) continue;
      analyzers.push(definition.create(selection.options?.[meta.id] ?? {}));
    }
    return analyzers;
  }
}
