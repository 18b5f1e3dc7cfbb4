/**
 * Model Registry.
 *
 * Maps Eloquent model classes to the database tables they read and write. The
 * registry is built once per run from the configured model directories and is
 * read-only afterwards; analyzers receive it by injection.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { logger } from './logger';
import { defaultTableName } from './pluralize';
import { walkFiles } from './files';
import { NameContext, shortName, stripLeadingSlash } from './php/names';
import { parsePhp } from './php/parser';
import {
  bodyStatements,
  child,
  childList,
  identifierName,
  startLine,
  stringLiteral,
  unwrapStatement,
  type PhpNode,
} from './php/nodes';
import type { RegistryCache } from './cache';

export type TableDeclaration = { kind: 'none' } | { kind: 'literal'; value: string } | { kind: 'dynamic' };

export interface ClassRecord {
  /** Fully-qualified class name. */
  name: string;
  /** Parent class as resolved through the file's namespace and imports. */
  parent: string | null;
  file: string;
  line: number;
  tableProperty: TableDeclaration;
  tableMethod: TableDeclaration;
}

export interface ModelRegistryEntry {
  className: string;
  table: string | undefined;
  file: string;
}

export interface ModelRegistryOptions {
  /** Explicit table names keyed by fully-qualified or short class name. */
  tableMappings?: Record<string, string>;
}

export interface RegistryBuildOptions extends ModelRegistryOptions {
  projectPath: string;
  modelPaths: string[];
  cache?: RegistryCache;
}

export interface ClassHierarchy {
  /** Parent of a known class, `null` for a root class, `undefined` when the class is unknown. */
  parentOf(className: string): string | null | undefined;
}

export const ORM_BASE_CLASSES = [
  'Illuminate\\Database\\Eloquent\\Model',
  'Illuminate\\Foundation\\Auth\\User',
  'Illuminate\\Database\\Eloquent\\Relations\\Pivot',
  'Illuminate\\Database\\Eloquent\\Relations\\MorphPivot',
];

const ORM_BASE_FQCN = new Set(ORM_BASE_CLASSES.map((name) => name.toLowerCase()));
const ORM_BASE_SHORT_NAMES = new Set(['model', 'authenticatable', 'pivot', 'morphpivot']);

export const DEFAULT_MODEL_PATHS = ['app/Models', 'app'];

const NONE: TableDeclaration = { kind: 'none' };

function tableFromProperty(classBody: PhpNode[]): TableDeclaration {
  for (const statement of classBody) {
    if (statement.kind !== 'propertystatement') continue;
    for (const property of childList(statement, 'properties')) {
      if (identifierName(property.name) !== 'table') continue;
      const value = child(property, 'value');
      if (!value || value.kind === 'nullkeyword') return NONE;
      const literal = stringLiteral(value);
      return literal !== null ? { kind: 'literal', value: literal } : { kind: 'dynamic' };
    }
  }
  return NONE;
}

function tableFromMethod(classBody: PhpNode[]): TableDeclaration {
  for (const statement of classBody) {
    if (statement.kind !== 'method' || identifierName(statement.name)?.toLowerCase() !== 'gettable') continue;
    const statements = bodyStatements(child(statement, 'body')).map(unwrapStatement);
    if (statements.length === 1 && statements[0].kind === 'return') {
      const literal = stringLiteral(statements[0].expr);
      if (literal !== null) return { kind: 'literal', value: literal };
    }
    return { kind: 'dynamic' };
  }
  return NONE;
}

/**
 * Named class declarations in a parsed file, with parents resolved through the
 * namespace and `use` imports in effect at the declaration.
 */
export function collectClassRecords(program: PhpNode, file: string): ClassRecord[] {
  const names = new NameContext();
  const records: ClassRecord[] = [];

  const visitStatements = (statements: PhpNode[]): void => {
    for (const statement of statements) {
      switch (statement.kind) {
        case 'namespace':
          names.enterNamespace(identifierName(statement.name) ?? '');
          visitStatements(childList(statement, 'children'));
          names.leaveNamespace();
          break;
        case 'usegroup':
          names.addUseGroup(statement);
          break;
        case 'class': {
          const declared = identifierName(statement.name);
          if (!declared || statement.isAnonymous === true) break;
          const body = childList(statement, 'body');
          const parentNode = child(statement, 'extends');
          records.push({
            name: names.resolve(declared, 'uqn'),
            parent: parentNode ? names.resolveNode(parentNode) : null,
            file,
            line: startLine(statement),
            tableProperty: tableFromProperty(body),
            tableMethod: tableFromMethod(body),
          });
          break;
        }
        case 'declare':
          visitStatements(childList(statement, 'children'));
          break;
        default:
          break;
      }
    }
  };

  visitStatements(childList(program, 'children'));
  return records;
}

function normalize(name: string): string {
  return stripLeadingSlash(name).toLowerCase();
}

export function isOrmBaseClass(name: string): boolean {
  return ORM_BASE_FQCN.has(normalize(name)) || ORM_BASE_SHORT_NAMES.has(shortName(name).toLowerCase());
}

type ChainEnd = 'orm' | 'external' | 'cycle';

export class ModelRegistry implements ClassHierarchy {
  private readonly byName = new Map<string, ClassRecord>();
  private readonly byShortName = new Map<string, ClassRecord[]>();
  private readonly tableMappings: Map<string, string>;
  private modelCache = new Map<string, boolean>();
  private tableCache = new Map<string, string | undefined>();

  constructor(records: ClassRecord[] = [], options: ModelRegistryOptions = {}) {
    for (const record of records) {
      this.byName.set(normalize(record.name), record);
      const key = shortName(record.name).toLowerCase();
      const list = this.byShortName.get(key) ?? [];
      list.push(record);
      this.byShortName.set(key, list);
    }
    this.tableMappings = new Map(
      Object.entries(options.tableMappings ?? {}).map(([className, table]) => [normalize(className), table]),
    );
  }

  static empty(): ModelRegistry {
    return new ModelRegistry();
  }

  /** Builds a registry from in-memory sources; files that fail to parse are skipped. */
  static fromSources(sources: Array<{ file: string; source: string }>, options: ModelRegistryOptions = {}): ModelRegistry {
    const records: ClassRecord[] = [];
    for (const { file, source } of sources) {
      const parsed = parsePhp(source, file);
      if (!parsed.ok) {
        logger.debug(`Model registry: skipping ${file}: ${parsed.error.message}`);
        continue;
      }
      records.push(...collectClassRecords(parsed.program, file));
    }
    return new ModelRegistry(records, options);
  }

  /**
   * Scans the model directories. Missing directories and unparseable files are
   * skipped, so the result is at worst an empty registry.
   */
  static async build(options: RegistryBuildOptions): Promise<ModelRegistry> {
    const records: ClassRecord[] = [];
    const seen = new Set<string>();
    const cache = options.cache;
    cache?.load(options.modelPaths);

    for (const modelPath of options.modelPaths) {
      const absolute = path.resolve(options.projectPath, modelPath);
      if (!fs.existsSync(absolute)) {
        logger.debug(`Model registry: ${modelPath} does not exist`);
        continue;
      }
      const files = await walkFiles(absolute, { extensions: ['.php'] });
      for (const file of files) {
        if (seen.has(file)) continue;
        seen.add(file);
        const relative = path.relative(options.projectPath, file).split(path.sep).join('/');
        let source: string;
        try {
          source = await fs.promises.readFile(file, 'utf8');
        } catch (error) {
          logger.debug(`Model registry: cannot read ${relative}: ${error instanceof Error ? error.message : String(error)}`);
          continue;
        }
        const cached = cache?.get(relative, source);
        if (cached) {
          records.push(...cached);
          continue;
        }
        const parsed = parsePhp(source, relative);
        if (!parsed.ok) {
          logger.debug(`Model registry: skipping ${relative}: ${parsed.error.message}`);
          continue;
        }
        const fileRecords = collectClassRecords(parsed.program, relative);
        cache?.set(relative, source, fileRecords);
        records.push(...fileRecords);
      }
    }

    if (cache) {
      cache.save();
      const { hits, misses } = cache.stats();
      logger.debug(`Model registry cache: ${hits} hit(s), ${misses} miss(es)`);
    }

    const registry = new ModelRegistry(records, options);
    logger.debug(`Model registry: ${records.length} class(es), ${registry.entries().length} model(s)`);
    return registry;
  }

  get size(): number {
    return this.byName.size;
  }

  /** Looks a class up by fully-qualified name, then by an unambiguous short name. */
  find(className: string): ClassRecord | undefined {
    const exact = this.byName.get(normalize(className));
    if (exact) return exact;
    const candidates = this.byShortName.get(shortName(className).toLowerCase());
    return candidates && candidates.length === 1 ? candidates[0] : undefined;
  }

  parentOf(className: string): string | null | undefined {
    const record = this.find(className);
    return record ? record.parent : undefined;
  }

  /** Scanned classes from `className` upwards, and how the walk ended. */
  private ancestry(className: string): { chain: ClassRecord[]; end: ChainEnd } {
    const chain: ClassRecord[] = [];
    const visited = new Set<string>();
    let current = this.find(className);
    if (!current) return { chain, end: 'external' };

    for (;;) {
      const key = normalize(current.name);
      if (visited.has(key)) return { chain, end: 'cycle' };
      visited.add(key);
      chain.push(current);

      const parent: string | null = current.parent;
      if (parent === null) return { chain, end: 'external' };
      const exact = this.byName.get(normalize(parent));
      if (exact) {
        if (visited.has(normalize(exact.name))) return { chain, end: 'cycle' };
        current = exact;
        continue;
      }
      if (ORM_BASE_FQCN.has(normalize(parent))) return { chain, end: 'orm' };
      const byShortName = this.find(parent);
      if (byShortName && !visited.has(normalize(byShortName.name))) {
        current = byShortName;
        continue;
      }
      return { chain, end: isOrmBaseClass(parent) ? 'orm' : 'external' };
    }
  }

  isModel(className: string): boolean {
    const key = normalize(className);
    const cached = this.modelCache.get(key);
    if (cached !== undefined) return cached;
    const result = this.ancestry(className).end === 'orm';
    this.modelCache.set(key, result);
    return result;
  }

  /**
   * Table for a model class: configured mapping, then literal `getTable()` or
   * `$table` on the class or its nearest ancestor, then the pluralized class name.
   * A dynamic `$table` without a literal override leaves the class unresolved; a
   * dynamic `getTable()` stops the ancestor search at its own class.
   */
  resolveTable(className: string): string | undefined {
    const key = normalize(className);
    if (this.tableCache.has(key)) return this.tableCache.get(key);
    const table = this.computeTable(className);
    this.tableCache.set(key, table);
    return table;
  }

  private computeTable(className: string): string | undefined {
    const { chain, end } = this.ancestry(className);
    if (end !== 'orm' || chain.length === 0) return undefined;
    const self = chain[0];

    const mapped = this.tableMappings.get(normalize(self.name)) ?? this.tableMappings.get(shortName(self.name).toLowerCase());
    if (mapped) return mapped;

    const fallback = defaultTableName(shortName(self.name));
    for (const record of chain) {
      if (record.tableMethod.kind === 'literal') return record.tableMethod.value;
      if (record.tableProperty.kind === 'literal') return record.tableProperty.value;
      if (record.tableProperty.kind === 'dynamic') return undefined;
      // A computed getTable() here hides every ancestor declaration.
      if (record.tableMethod.kind === 'dynamic') return fallback;
    }
    return fallback;
  }

  /**
   * Table for a class used as a model. Classes outside the scanned directories
   * fall back to the configured mappings and then the naming convention.
   */
  tableFor(className: string): string | undefined {
    if (this.find(className)) return this.isModel(className) ? this.resolveTable(className) : undefined;
    const short = shortName(className);
    return this.tableMappings.get(normalize(className)) ?? this.tableMappings.get(short.toLowerCase()) ?? defaultTableName(short);
  }

  entries(): ModelRegistryEntry[] {
    const result: ModelRegistryEntry[] = [];
    for (const record of this.byName.values()) {
      if (!this.isModel(record.name)) continue;
      result.push({ className: record.name, table: this.resolveTable(record.name), file: record.file });
    }
    return result.sort((a, b) => a.className.localeCompare(b.className));
  }

  modelsForTable(table: string): string[] {
    return this.entries()
      .filter((entry) => entry.table === table)
      .map((entry) => entry.className);
  }

  hasModelForTable(table: string): boolean {
    return this.modelsForTable(table).length > 0;
  }

  /** Drops memoized resolutions. */
  clearCache(): void {
    this.modelCache = new Map();
    this.tableCache = new Map();
  }
}

/**
 * Explicitly constructed holder that builds the registry lazily, once per set of
 * model directories, and hands the same read-only instance to every analyzer.
 */
export class RegistryStore {
  private readonly registries = new Map<string, Promise<ModelRegistry>>();

  constructor(private readonly cache?: RegistryCache) {}

  get(options: Omit<RegistryBuildOptions, 'cache'>): Promise<ModelRegistry> {
    const key = JSON.stringify([
      path.resolve(options.projectPath),
      [...options.modelPaths].sort(),
      Object.entries(options.tableMappings ?? {}).sort(),
    ]);
    let pending = this.registries.get(key);
    if (!pending) {
      pending = ModelRegistry.build({ ...options, cache: this.cache });
      this.registries.set(key, pending);
    }
    return pending;
  }

  clearCache(): void {
    this.registries.clear();
  }
}
