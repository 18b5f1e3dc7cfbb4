/**
 * Source file discovery.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { logger } from './logger';
import { matchesAnyPattern } from './rule-tuning';

const SKIP_DIR_NAMES = new Set(['vendor', 'node_modules', '.git', '.svn', '.hg', '.idea', '.laravel-lint-cache']);

export const DEFAULT_SCAN_PATHS = ['app', 'config', 'database', 'routes'];

export const DEFAULT_EXCLUDED_PATHS = ['vendor/**', 'node_modules/**', 'storage/**', 'bootstrap/cache/**'];

export interface WalkOptions {
  extensions?: string[];
  /** Matched against the file name, e.g. `.blade.php`. */
  suffixes?: string[];
  maxFiles?: number;
}

export interface SourceFile {
  absolutePath: string;
  /** Project-relative path with forward slashes. */
  relativePath: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function wanted(fileName: string, options: WalkOptions): boolean {
  const lower = fileName.toLowerCase();
  if (options.suffixes && options.suffixes.length > 0) {
    return options.suffixes.some((suffix) => lower.endsWith(suffix));
  }
  if (options.extensions && options.extensions.length > 0) {
    return options.extensions.includes(path.extname(lower));
  }
  return true;
}

/**
 * Breadth-first directory walk. Symlinks are not followed and every directory is
 * visited once by real path. Results are sorted.
 */
export async function walkFiles(rootDir: string, options: WalkOptions = {}): Promise<string[]> {
  const maxFiles = options.maxFiles ?? Number.POSITIVE_INFINITY;
  const files: string[] = [];
  const queue = [rootDir];
  const visitedDirs = new Set<string>();

  try {
    visitedDirs.add(await fs.promises.realpath(rootDir));
  } catch (error) {
    logger.debug(`Cannot resolve ${rootDir}: ${errorMessage(error)}`);
    return files;
  }

  while (queue.length > 0 && files.length < maxFiles) {
    const current = queue.shift();
    if (current === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(current, { withFileTypes: true });
    } catch (error) {
      logger.debug(`Cannot read directory ${current}: ${errorMessage(error)}`);
      continue;
    }

    for (const entry of entries) {
      if (files.length >= maxFiles) {
        logger.warn(`File limit of ${maxFiles} reached under ${rootDir}; remaining files are not scanned.`);
        break;
      }
      if (entry.isSymbolicLink()) continue;
      const fullPath = path.join(current, entry.name);

      if (entry.isDirectory()) {
        if (SKIP_DIR_NAMES.has(entry.name)) continue;
        try {
          const realPath = await fs.promises.realpath(fullPath);
          if (!visitedDirs.has(realPath)) {
            visitedDirs.add(realPath);
            queue.push(fullPath);
          }
        } catch (error) {
          logger.debug(`Skipping unresolvable directory ${fullPath}: ${errorMessage(error)}`);
        }
      } else if (entry.isFile() && wanted(entry.name, options)) {
        files.push(fullPath);
      }
    }
  }

  return files.sort();
}

export function toRelative(projectPath: string, filePath: string): string {
  return path.relative(projectPath, filePath).split(path.sep).join('/');
}

/**
 * PHP files under the scan paths, minus excluded globs. A scan path may also name a single file.
 */
export async function discoverSourceFiles(
  projectPath: string,
  scanPaths: string[],
  excludedPaths: string[] = DEFAULT_EXCLUDED_PATHS,
  options: WalkOptions = { extensions: ['.php'] },
): Promise<SourceFile[]> {
  const seen = new Set<string>();
  const result: SourceFile[] = [];

  for (const scanPath of scanPaths) {
    const absolute = path.resolve(projectPath, scanPath);
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(absolute);
    } catch (error) {
      logger.debug(`Scan path ${scanPath} skipped: ${errorMessage(error)}`);
      continue;
    }
    const files = stat.isDirectory() ? await walkFiles(absolute, options) : stat.isFile() ? [absolute] : [];
    for (const file of files) {
      const relativePath = toRelative(projectPath, file);
      if (seen.has(relativePath) || matchesAnyPattern(relativePath, excludedPaths)) continue;
      seen.add(relativePath);
      result.push({ absolutePath: file, relativePath });
    }
  }

  return result.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}
