/**
 * Model registry cache.
 *
 * Hashes each model file and stores its class records in a JSON cache file.
 * Unchanged files skip parsing on subsequent runs. Entries are only valid for
 * the set of model directories they were recorded under.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { logger } from './logger';
import { isRecord } from './php/nodes';
import type { ClassRecord, TableDeclaration } from './model-registry';

export const DEFAULT_CACHE_LOCATION = '.laravel-lint-cache/registry.json';

const CACHE_VERSION = '1';

interface CacheEntry {
  hash: string;
  records: ClassRecord[];
}

interface CacheData {
  version: string;
  modelPaths: string;
  entries: Record<string, CacheEntry>;
}

function isTableDeclaration(value: unknown): value is TableDeclaration {
  if (!isRecord(value)) return false;
  if (value.kind === 'none' || value.kind === 'dynamic') return true;
  return value.kind === 'literal' && typeof value.value === 'string';
}

function isClassRecord(value: unknown): value is ClassRecord {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    (value.parent === null || typeof value.parent === 'string') &&
    typeof value.file === 'string' &&
    typeof value.line === 'number' &&
    isTableDeclaration(value.tableProperty) &&
    isTableDeclaration(value.tableMethod)
  );
}

function parseEntries(value: unknown): Record<string, CacheEntry> | null {
  if (!isRecord(value)) return null;
  const entries: Record<string, CacheEntry> = {};
  for (const [file, entry] of Object.entries(value)) {
    if (!isRecord(entry) || typeof entry.hash !== 'string' || !Array.isArray(entry.records)) return null;
    const records = entry.records.filter(isClassRecord);
    if (records.length !== entry.records.length) return null;
    entries[file] = { hash: entry.hash, records };
  }
  return entries;
}

export class RegistryCache {
  private data: CacheData = { version: CACHE_VERSION, modelPaths: '', entries: {} };
  private hits = 0;
  private misses = 0;

  constructor(private readonly cacheFile: string) {}

  static forProject(projectPath: string, location = DEFAULT_CACHE_LOCATION): RegistryCache {
    return new RegistryCache(path.resolve(projectPath, location));
  }

  /** Load the cache from disk. Starts fresh on missing or corrupt files, or when the model directories changed. */
  load(modelPaths: string[]): void {
    const key = [...modelPaths].sort().join('\n');
    this.data = { version: CACHE_VERSION, modelPaths: key, entries: {} };
    if (!fs.existsSync(this.cacheFile)) return;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.cacheFile, 'utf8'));
      if (!isRecord(parsed) || parsed.version !== CACHE_VERSION || parsed.modelPaths !== key) return;
      const entries = parseEntries(parsed.entries);
      if (entries) this.data.entries = entries;
    } catch (error) {
      logger.debug(`Registry cache at ${this.cacheFile} is unreadable, starting fresh: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  save(): void {
    try {
      fs.mkdirSync(path.dirname(this.cacheFile), { recursive: true });
      fs.writeFileSync(this.cacheFile, JSON.stringify(this.data, null, 2), 'utf8');
    } catch (error) {
      logger.warn(`Could not write registry cache ${this.cacheFile}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /** Returns cached records if the file content hash matches, undefined otherwise. */
  get(filePath: string, content: string): ClassRecord[] | undefined {
    const entry = this.data.entries[filePath];
    if (entry && entry.hash === this.hashContent(content)) {
      this.hits++;
      return entry.records;
    }
    this.misses++;
    return undefined;
  }

  set(filePath: string, content: string, records: ClassRecord[]): void {
    this.data.entries[filePath] = { hash: this.hashContent(content), records };
  }

  stats(): { hits: number; misses: number } {
    return { hits: this.hits, misses: this.misses };
  }

  private hashContent(content: string): string {
    return crypto.createHash('sha256').update(content).digest('hex');
  }
}
