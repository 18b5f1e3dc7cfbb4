/**
 * Inline suppression markers.
 *
 * `@laravel-lint-ignore` silences every analyzer; `@laravel-lint-ignore rule-a,rule-b`
 * silences only the named ones. A marker applies to the class it is attached to
 * (the comment block directly above the declaration), to the whole file when it
 * sits in the file header, or to a single line when placed on or right above it.
 */

import { CLASS_LIKE_KINDS, childList, endLine, identifierName, startLine, stringProp, walk, type PhpNode } from './php/nodes';

export const SUPPRESSION_MARKER = '@laravel-lint-ignore';

const MARKER_PATTERN = /@laravel-lint-ignore(?:[ \t]+([\w,-]+))?/i;

export interface SuppressionSet {
  all: boolean;
  rules: ReadonlySet<string>;
}

export interface ClassSuppression {
  className: string | null;
  startLine: number;
  endLine: number;
  suppression: SuppressionSet;
}

export interface FileSuppressions {
  file: SuppressionSet | null;
  classes: ClassSuppression[];
  lines: Map<number, SuppressionSet>;
}

export const NO_SUPPRESSIONS: FileSuppressions = { file: null, classes: [], lines: new Map() };

export function parseSuppressionMarker(text: string): SuppressionSet | null {
  const match = MARKER_PATTERN.exec(text);
  if (!match) return null;
  if (!match[1]) return { all: true, rules: new Set() };
  const rules = match[1]
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  return rules.length === 0 ? { all: true, rules: new Set() } : { all: false, rules: new Set(rules) };
}

export function mergeSuppressions(a: SuppressionSet | null, b: SuppressionSet | null): SuppressionSet | null {
  if (!a) return b;
  if (!b) return a;
  if (a.all || b.all) return { all: true, rules: new Set() };
  return { all: false, rules: new Set([...a.rules, ...b.rules]) };
}

export function suppressionCovers(set: SuppressionSet | null | undefined, ruleId: string): boolean {
  if (!set) return false;
  return set.all || set.rules.has(ruleId);
}

function isCommentLine(text: string | undefined): boolean {
  if (text === undefined) return false;
  const trimmed = text.trim();
  return trimmed.startsWith('//') || trimmed.startsWith('#') || trimmed.startsWith('/*') || trimmed.startsWith('*');
}

function isHeaderLine(text: string): boolean {
  const trimmed = text.trim();
  return (
    trimmed === '' ||
    trimmed.startsWith('<?php') ||
    isCommentLine(trimmed) ||
    /^declare\s*\(/i.test(trimmed)
  );
}

/**
 * Pre-pass over a parsed file: records every marker and which class or file it governs.
 */
export function collectSuppressions(program: PhpNode, source: string): FileSuppressions {
  const sourceLines = source.split(/\r?\n/);
  const markerAt = (line: number): SuppressionSet | null => parseSuppressionMarker(sourceLines[line - 1] ?? '');
  const claimed = new Set<number>();
  const classes: ClassSuppression[] = [];

  walk(program, (node) => {
    if (!CLASS_LIKE_KINDS.includes(node.kind)) return;
    const start = startLine(node);
    let first = start;
    let suppression: SuppressionSet | null = null;

    for (let line = start - 1; line >= 1 && isCommentLine(sourceLines[line - 1]); line--) {
      claimed.add(line);
      first = line;
      suppression = mergeSuppressions(suppression, markerAt(line));
    }
    for (const comment of childList(node, 'leadingComments')) {
      const text = stringProp(comment, 'value');
      if (text) suppression = mergeSuppressions(suppression, parseSuppressionMarker(text));
      for (let line = startLine(comment); line > 0 && line <= endLine(comment); line++) claimed.add(line);
    }

    if (suppression) {
      classes.push({
        className: identifierName(node.name),
        startLine: first,
        endLine: endLine(node),
        suppression,
      });
    }
  });

  let file: SuppressionSet | null = null;
  for (let line = 1; line <= sourceLines.length && isHeaderLine(sourceLines[line - 1]); line++) {
    if (claimed.has(line)) continue;
    file = mergeSuppressions(file, markerAt(line));
  }

  const lines = new Map<number, SuppressionSet>();
  sourceLines.forEach((text, index) => {
    const set = parseSuppressionMarker(text);
    if (set) lines.set(index + 1, set);
  });

  return { file, classes, lines };
}

export function classSuppressionAt(suppressions: FileSuppressions, classStartLine: number): SuppressionSet | null {
  let found: SuppressionSet | null = null;
  for (const entry of suppressions.classes) {
    if (entry.startLine <= classStartLine && entry.endLine >= classStartLine) {
      found = mergeSuppressions(found, entry.suppression);
    }
  }
  return found;
}

/** True when an issue for `ruleId` reported at `line` is silenced by any marker in the file. */
export function isSuppressedAt(suppressions: FileSuppressions, ruleId: string, line: number): boolean {
  if (suppressionCovers(suppressions.file, ruleId)) return true;
  for (const entry of suppressions.classes) {
    if (line >= entry.startLine && line <= entry.endLine && suppressionCovers(entry.suppression, ruleId)) {
      return true;
    }
  }
  return suppressionCovers(suppressions.lines.get(line), ruleId) || suppressionCovers(suppressions.lines.get(line - 1), ruleId);
}
