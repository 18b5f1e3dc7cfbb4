import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import type { AnalyzerDefinition } from '../src/core/analyzer-registry';
import { ModelRegistry } from '../src/core/model-registry';
import type { AnalyzerOptions } from '../src/core/options';
import { analyzeFile } from '../src/core/runner';
import type { AnalysisIssue } from '../src/types';

export interface AnalyzeSourceOptions {
  file?: string;
  registry?: ModelRegistry;
  options?: AnalyzerOptions;
}

/** Runs one analyzer over an in-memory PHP file. */
export function analyzeSource(
  definition: AnalyzerDefinition,
  source: string,
  { file = 'app/Services/ExampleService.php', registry = ModelRegistry.empty(), options = {} }: AnalyzeSourceOptions = {},
): AnalysisIssue[] {
  const analysis = analyzeFile(file, source, [definition.create(options)], registry);
  if (analysis.parseFailure) throw new Error(`Fixture does not parse: ${analysis.parseFailure.message}`);
  return analysis.issues.get(definition.meta.id) ?? [];
}

export const POST_MODEL = `<?php
namespace App\\Models;

use Illuminate\\Database\\Eloquent\\Model;

class Post extends Model
{
}
`;

export function modelSource(name: string, body = ''): string {
  return `<?php
namespace App\\Models;

use Illuminate\\Database\\Eloquent\\Model;

class ${name} extends Model
{
${body}
}
`;
}

/** Writes a throwaway project; returns its root. */
export function createProject(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'laravel-lint-'));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf8');
  }
  return root;
}

export function removeProject(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}
