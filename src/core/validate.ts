/**
 * Shared validation utilities for the CLI
 */

import * as path from 'node:path';
import * as fs from 'node:fs';

/**
 * Error thrown when project path validation fails.
 */
export class ValidationError extends Error {
  constructor(message: string, readonly hint?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validate that the given path exists and appears to be a Laravel project.
 */
export function validateProjectPath(absolutePath: string): void {
  if (!fs.existsSync(absolutePath)) {
    throw new ValidationError(`Path does not exist: ${absolutePath}`);
  }
  if (!fs.statSync(absolutePath).isDirectory()) {
    throw new ValidationError(`Path is not a directory: ${absolutePath}`);
  }
  const artisan = path.join(absolutePath, 'artisan');
  const composerJson = path.join(absolutePath, 'composer.json');
  if (!fs.existsSync(artisan) && !fs.existsSync(composerJson)) {
    throw new ValidationError(
      'This does not appear to be a Laravel project',
      'Expected to find an "artisan" script or composer.json',
    );
  }
}
