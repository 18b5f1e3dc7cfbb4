/**
 * Logic in Blade Analyzer
 *
 * Scans Blade views line by line for work that belongs in controllers, view
 * composers or presenters. A line yields at most one finding, taken in this
 * order: query, HTTP call, expensive computation, nested loop, business rule
 * in a directive, arithmetic. Inline `<?php` tags are reported on top of that.
 */

import type { Analyzer, AnalyzerMeta, IssueDraft, ProjectContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import vocabulary from '../../data/blade.json';

const META: AnalyzerMeta = {
  id: 'logic-in-blade',
  name: 'Logic in Blade Analyzer',
  description: 'Finds business logic in Blade templates that should be moved to controllers or view composers',
  category: 'best-practices',
  severity: 'medium',
  tags: ['laravel', 'blade', 'mvc', 'views', 'architecture'],
};

const VIEW_GLOB = 'resources/views/**/*.blade.php';

const ALWAYS_QUERY_PATTERNS = [/\bDB::/, /->query\s*\(/];
/** Static calls that run a query on their own, e.g. `Post::all()`. */
const SELF_TERMINAL_PATTERNS = ['find', 'all', 'first', 'create', 'update', 'delete', 'insert', 'upsert'].map(
  (method) => new RegExp(`::${method}\\s*\\(`),
);
/** Static calls that only start a chain; a terminal method or a model namespace confirms them. */
const CHAIN_START_PATTERNS = [/::where\s*\(/];
const MODEL_SAVE_PATTERN = /\$(\w+)->save\s*\(/;
const RELATION_QUERY_PATTERN = /\$(\w+)->(\w+)\(\)->(get|first|find|count|exists|pluck|sum|avg|min|max)\s*\(/;

const API_PATTERNS = [/Http::/, /\bGuzzle\b/, /\bcurl_/, /file_get_contents\s*\(\s*['"]https?:\/\//];

const PHP_BLOCK_START = /@php\b/;
const PHP_BLOCK_END = /@endphp\b/;
/** `@php($x = 1)` and `@php ... @endphp` on one line open no block. */
const INLINE_PHP_DIRECTIVE = /@php\s*\(|@php\b.*@endphp\b/;
const FOREACH_START = /@foreach\b/;
const FOREACH_END = /@endforeach\b/;

const COLLECTION_SHAPING_IN_FOREACH = new RegExp(`@foreach\\s*\\(.*->(${vocabulary.collectionShapingMethods.join('|')})\\(`);
const ARRAY_FUNCTION_PATTERNS = vocabulary.arrayFunctions.map((name) => new RegExp(`\\b${name}\\s*\\(`));
const STRING_PROCESSING_PATTERNS = vocabulary.stringProcessingFunctions.map((name) => new RegExp(`\\b${name}\\s*\\(`));

const NON_MODEL_CLASSES = new Set(vocabulary.nonModelClasses);
const NON_DB_SAVE_VARIABLES = new Set(vocabulary.nonModelSaveVariables);
const CLASS_NAME_AT_END = /\\?(?:[A-Za-z_][A-Za-z0-9_]*\\)*([A-Za-z_][A-Za-z0-9_]*)$/;

/** True when `position` falls after a `//` or inside a quoted string on the line. */
export function isInsideStringOrComment(line: string, position: number): boolean {
  const before = line.slice(0, position);
  if (before.includes('//')) return true;
  let single = false;
  let double = false;
  for (let i = 0; i < position; i++) {
    if (i > 0 && line[i - 1] === '\\') continue;
    const char = line[i];
    if (char === "'" && !double) single = !single;
    else if (char === '"' && !single) double = !double;
  }
  return single || double;
}

/** Index of the first match that is code, not string or comment text. */
function codeMatch(line: string, pattern: RegExp): RegExpExecArray | null {
  const match = pattern.exec(line);
  if (!match || isInsideStringOrComment(line, match.index)) return null;
  return match;
}

function hasTerminalMethod(line: string): boolean {
  return vocabulary.terminalQueryMethods.some((method) => line.includes(method));
}

/** Static calls on classes known, or named, not to be Eloquent models. */
function isNonModelStaticCall(line: string, position: number): boolean {
  const before = line.slice(0, position);
  const trimmed = before.trimEnd();
  // `$class::where()` and `(...)::where()` resolve at runtime.
  if (trimmed.endsWith(')') || /\$\w+$/.test(trimmed)) return true;

  const match = CLASS_NAME_AT_END.exec(trimmed);
  if (!match) return vocabulary.nonModelClasses.some((name) => before.endsWith(name));
  const className = match[1];
  if (NON_MODEL_CLASSES.has(className)) return true;
  if (vocabulary.nonModelSuffixes.some((suffix) => className.endsWith(suffix))) return true;
  if (vocabulary.ambiguousSuffixes.some((suffix) => className.endsWith(suffix))) return !hasTerminalMethod(line);
  return false;
}

export function hasDatabaseQuery(line: string): boolean {
  if (line.includes('->get(') && vocabulary.readOnlyHelpers.some((helper) => line.includes(helper))) return false;

  if (ALWAYS_QUERY_PATTERNS.some((pattern) => codeMatch(line, pattern))) return true;

  for (const pattern of SELF_TERMINAL_PATTERNS) {
    const match = codeMatch(line, pattern);
    if (match && !isNonModelStaticCall(line, match.index)) return true;
  }

  for (const pattern of CHAIN_START_PATTERNS) {
    const match = codeMatch(line, pattern);
    if (!match || isNonModelStaticCall(line, match.index)) continue;
    const before = line.slice(0, match.index);
    if (vocabulary.modelNamespaceMarkers.some((marker) => before.includes(marker))) return true;
    if (hasTerminalMethod(line)) return true;
  }

  const save = MODEL_SAVE_PATTERN.exec(line);
  if (save) {
    if (isInsideStringOrComment(line, save.index)) return false;
    return !NON_DB_SAVE_VARIABLES.has(save[1]);
  }

  const relation = RELATION_QUERY_PATTERN.exec(line);
  if (relation) {
    if (isInsideStringOrComment(line, relation.index)) return false;
    const variable = relation[1].toLowerCase();
    return !vocabulary.collectionVariableHints.some((hint) => variable.includes(hint));
  }
  return false;
}

export function hasApiCall(line: string): boolean {
  return API_PATTERNS.some((pattern) => codeMatch(line, pattern) !== null);
}

function hasExpensiveComputation(line: string, foreachDepth: number): boolean {
  if (foreachDepth >= 1 && STRING_PROCESSING_PATTERNS.some((pattern) => pattern.test(line))) return true;
  return vocabulary.materializingMethods.some((method) => {
    const position = line.indexOf(method);
    return position !== -1 && !isInsideStringOrComment(line, position);
  });
}

function hasBusinessLogicInDirective(line: string): boolean {
  if (/@if\s*\(/.test(line)) {
    const operators = line.split('&&').length - 1 + (line.split('||').length - 1);
    if (operators >= 3) return true;
  }
  if (COLLECTION_SHAPING_IN_FOREACH.test(line)) return true;
  return ARRAY_FUNCTION_PATTERNS.some((pattern) => pattern.test(line));
}

export function hasComplexCalculation(line: string): boolean {
  if (/^\{\{\s*\$\w+\s*\}\}$/.test(line.trim())) return false;
  if (/\{\{\s*(config|session|cache|request|cookie|auth)\s*\(\s*\)/.test(line)) return false;
  if (/\{\{\s*(Config|Session|Cache|Request|Cookie|Auth)::/.test(line)) return false;
  // `{{ $value ?? 0 }}`
  if (/\{\{\s*\$\w+(?:->\w+)?\s*\?\?\s*(?:\d+|['"][^'"]*['"]|null)\s*\}\}/.test(line)) return false;
  // `{{ $item->price * $quantity }}`
  if (/\{\{\s*\$\w+(?:->\w+)?\s*[+\-*\/]\s*\$\w+(?:->\w+)?\s*\}\}/.test(line)) return false;

  if (/\{\{.*[+\-*\/%].*\}\}/.test(line) && (line.match(/[+\-*\/%]/g) ?? []).length >= 2) return true;
  if (/\$\w+\s*[+\-*\/%]=/.test(line)) return true;
  return /\{\{.*\(.*\).*[+*\/]/.test(line);
}

type LineDraft = Omit<IssueDraft, 'line' | 'snippet' | 'file'>;

/** First finding for one template line, if any. */
function classifyLine(line: string, foreachDepth: number): LineDraft | null {
  if (hasDatabaseQuery(line)) {
    return {
      code: 'blade-has-db-query',
      severity: 'critical',
      message: 'Database query found in Blade template',
      recommendation:
        'Never query the database from Blade templates. Load all required data in the controller and pass it to the view.',
    };
  }
  if (hasApiCall(line)) {
    return {
      code: 'blade-has-api-call',
      severity: 'high',
      message: 'API call found in Blade template',
      recommendation: 'Make API calls in controllers or services, not in views. Views should only display pre-fetched data.',
    };
  }
  if (hasExpensiveComputation(line, foreachDepth)) {
    return {
      code: 'blade-expensive-computation',
      severity: 'medium',
      message: 'Expensive computation found in Blade template',
      recommendation:
        'Move expensive operations to controllers or services. Use computed properties or view composers for complex transformations.',
    };
  }
  if (foreachDepth >= 2 && FOREACH_START.test(line)) {
    return {
      code: 'blade-nested-foreach',
      severity: 'medium',
      message: `Nested @foreach detected (depth: ${foreachDepth}) - potential performance issue`,
      recommendation:
        'Flatten nested data in the controller using eager loading or collection methods. Deeply nested loops in Blade multiply rendering work.',
      metadata: { depth: foreachDepth },
    };
  }
  if (hasBusinessLogicInDirective(line)) {
    return {
      code: 'blade-has-business-logic',
      severity: 'medium',
      message: 'Business logic found in Blade directive',
      recommendation:
        'Extract business logic to controllers or services. Use simple conditionals in views for presentation logic only.',
    };
  }
  if (hasComplexCalculation(line)) {
    return {
      code: 'blade-has-calculation',
      severity: 'low',
      message: 'Complex calculation found in Blade template',
      recommendation:
        'Move calculations to the controller, a view composer or a model accessor. Blade should only display pre-calculated values.',
    };
  }
  return null;
}

export class LogicInBladeAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly maxPhpBlockLines: number;

  constructor(options: AnalyzerOptions = {}) {
    this.maxPhpBlockLines = new OptionReader(META.id, options).integer('max_php_block_lines', 10, 1);
  }

  async analyzeProject(context: ProjectContext): Promise<void> {
    const views = (await context.listFiles(VIEW_GLOB)).sort();
    for (const view of views) {
      const content = context.readFile(view);
      if (content === undefined) continue;
      this.scanView(view, content, context);
    }
  }

  private scanView(view: string, content: string, context: ProjectContext): void {
    const max = this.maxPhpBlockLines;
    let blockStart: number | null = null;
    let blockLines = 0;
    let foreachDepth = 0;

    const lines = content.split(/\r?\n/);
    for (let index = 0; index < lines.length; index++) {
      const text = lines[index];
      const line = index + 1;
      const snippet = text.trim();

      if (PHP_BLOCK_START.test(snippet) && !INLINE_PHP_DIRECTIVE.test(snippet)) {
        blockStart = line;
        blockLines = 0;
        continue;
      }
      if (PHP_BLOCK_END.test(snippet) && blockStart !== null) {
        if (blockLines > max) {
          context.report({
            file: view,
            line: blockStart,
            code: 'blade-php-block-too-long',
            severity: 'medium',
            message: `PHP block has ${blockLines} lines (max recommended: ${max})`,
            recommendation:
              'Move complex PHP logic to controllers, view composers, or presenter classes. Blade templates should focus on presentation only.',
            metadata: { block_lines: blockLines, max_lines: max, block_start: blockStart },
          });
        }
        blockStart = null;
        continue;
      }
      if (blockStart !== null) blockLines += 1;

      if (FOREACH_START.test(snippet)) foreachDepth += 1;
      if (FOREACH_END.test(snippet)) foreachDepth = Math.max(0, foreachDepth - 1);

      if (text.includes('<?php')) {
        context.report({
          file: view,
          line,
          snippet,
          code: 'blade-inline-php',
          severity: 'medium',
          message: 'Inline PHP found in Blade template',
          recommendation: 'Use Blade directives (@php...@endphp) instead of inline PHP for consistency.',
        });
      }
      const finding = classifyLine(text, foreachDepth);
      if (finding) context.report({ ...finding, file: view, line, snippet });
    }

    if (blockStart !== null) {
      context.report({
        file: view,
        line: blockStart,
        code: 'blade-unclosed-php-block',
        severity: 'high',
        message: 'Unclosed @php block detected',
        recommendation: 'Every @php directive must have a matching @endphp.',
        metadata: { block_start: blockStart, lines_counted: blockLines },
      });
    }
  }
}

export const logicInBlade: AnalyzerDefinition = {
  meta: META,
  create: (options) => new LogicInBladeAnalyzer(options),
};
