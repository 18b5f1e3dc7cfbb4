/**
 * Per-analyzer option bags. Unrecognized keys are ignored; a recognized key with a
 * malformed value throws when the analyzer is constructed.
 */

import { isRecord } from './php/nodes';

export type AnalyzerOptions = Record<string, unknown>;

export class AnalyzerOptionError extends Error {
  constructor(
    readonly analyzerId: string,
    readonly option: string,
    message: string,
  ) {
    super(message);
    this.name = 'AnalyzerOptionError';
  }
}

function describe(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : JSON.stringify(value) ?? String(value);
}

export class OptionReader {
  constructor(
    private readonly analyzerId: string,
    private readonly raw: AnalyzerOptions = {},
  ) {}

  private fail(key: string, expected: string, value: unknown): never {
    throw new AnalyzerOptionError(
      this.analyzerId,
      key,
      `Invalid option "${key}" for analyzer "${this.analyzerId}": expected ${expected}, received ${describe(value)}.`,
    );
  }

  private value(key: string): unknown {
    const value = this.raw[key];
    return value === null ? undefined : value;
  }

  integer(key: string, fallback: number, min = 0): number {
    const value = this.value(key);
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
      this.fail(key, min > 0 ? `an integer >= ${min}` : 'a non-negative integer', value);
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.value(key);
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') this.fail(key, 'a boolean', value);
    return value;
  }

  stringList(key: string, fallback: string[]): string[] {
    const value = this.value(key);
    if (value === undefined) return fallback;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      this.fail(key, 'an array of strings', value);
    }
    return value;
  }

  stringMap(key: string, fallback: Record<string, string> = {}): Record<string, string> {
    const value = this.value(key);
    if (value === undefined) return fallback;
    if (!isRecord(value)) this.fail(key, 'an object of strings', value);
    const result: Record<string, string> = {};
    for (const [mapKey, mapValue] of Object.entries(value)) {
      if (typeof mapValue !== 'string') this.fail(`${key}.${mapKey}`, 'a string', mapValue);
      result[mapKey] = mapValue;
    }
    return result;
  }

  /** `{ "<regex>": "<description>" }`; every key must compile. */
  patterns(key: string): Array<{ pattern: RegExp; description: string }> {
    const map = this.stringMap(key);
    return Object.entries(map).map(([source, description]) => {
      try {
        return { pattern: new RegExp(source), description };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return this.fail(`${key}.${source}`, `a valid regular expression (${reason})`, source);
      }
    });
  }
}
