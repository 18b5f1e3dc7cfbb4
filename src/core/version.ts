import { existsSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';

import { logger } from './logger';
import { isRecord } from './php/nodes';

/**
 * Read the package version from package.json. Sources run from `src/core`,
 * the build from `dist/src/core`, so both parent levels are tried.
 */
function readPackageVersion(): string {
  const candidates = [
    resolve(dirname(__filename), '..', '..', 'package.json'),
    resolve(dirname(__filename), '..', '..', '..', 'package.json'),
  ];
  for (const pkgPath of candidates) {
    if (!existsSync(pkgPath)) continue;
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf8'));
      if (isRecord(pkg) && pkg.name === 'laravel-lint' && typeof pkg.version === 'string') return pkg.version;
    } catch (error) {
      logger.debug(`Unreadable ${pkgPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return '0.0.0';
}

export const TOOL_VERSION = readPackageVersion();
