/**
 * Typed access to php-parser's plain-object syntax nodes.
 *
 * The parser produces objects tagged with a `kind` string. Rather than trusting
 * the declared node classes, analyzers read every property through these guards.
 */

export interface PhpNode {
  kind: string;
  loc?: unknown;
  [key: string]: unknown;
}

const SKIPPED_KEYS = new Set(['kind', 'loc', 'leadingComments', 'trailingComments', 'comments']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPhpNode(value: unknown): value is PhpNode {
  return isRecord(value) && typeof value.kind === 'string';
}

/** Narrows to a node of one of the given kinds; a node that fails keeps its type. */
export function isKind<K extends string>(value: unknown, ...kinds: K[]): value is PhpNode & { kind: K } {
  return isPhpNode(value) && kinds.some((kind) => kind === value.kind);
}

export function child(node: PhpNode, key: string): PhpNode | null {
  const value = node[key];
  return isPhpNode(value) ? value : null;
}

export function childList(node: PhpNode, key: string): PhpNode[] {
  const value = node[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isPhpNode);
}

export function stringProp(node: PhpNode, key: string): string | null {
  const value = node[key];
  return typeof value === 'string' ? value : null;
}

export function boolProp(node: PhpNode, key: string): boolean {
  return node[key] === true;
}

/**
 * Name carried by an identifier, a name node, or a plain string property.
 */
export function identifierName(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (isKind(value, 'identifier', 'name')) {
    const name = value.name;
    return typeof name === 'string' ? name : null;
  }
  return null;
}

/** `$foo` yields `foo`; dynamic `$$foo` yields null. */
export function variableName(value: unknown): string | null {
  if (!isKind(value, 'variable')) return null;
  return typeof value.name === 'string' ? value.name : null;
}

export function isThisVariable(value: unknown): boolean {
  return variableName(value) === 'this';
}

/** Literal value of a single or double quoted string without interpolation. */
export function stringLiteral(value: unknown): string | null {
  if (isKind(value, 'string', 'nowdoc')) {
    return typeof value.value === 'string' ? value.value : null;
  }
  return null;
}

export function isStringLike(value: unknown): boolean {
  return isKind(value, 'string', 'nowdoc', 'encapsed');
}

interface Position {
  line: number;
  offset: number;
}

function position(node: PhpNode, edge: 'start' | 'end'): Position | null {
  const loc = node.loc;
  if (!isRecord(loc)) return null;
  const point = loc[edge];
  if (!isRecord(point)) return null;
  const { line, offset } = point;
  if (typeof line !== 'number' || typeof offset !== 'number') return null;
  return { line, offset };
}

export function startLine(node: PhpNode): number {
  return position(node, 'start')?.line ?? 0;
}

export function endLine(node: PhpNode): number {
  return position(node, 'end')?.line ?? startLine(node);
}

export function lineSpan(node: PhpNode): number {
  return endLine(node) - startLine(node) + 1;
}

/** Source text covered by the node, or an empty string without positions. */
export function nodeSource(node: PhpNode, source: string): string {
  const start = position(node, 'start');
  const end = position(node, 'end');
  if (!start || !end) return '';
  return source.slice(start.offset, end.offset);
}

/**
 * Direct syntax children in property order. Comments and locations are not children.
 */
export function childNodes(node: PhpNode): PhpNode[] {
  const result: PhpNode[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (SKIPPED_KEYS.has(key)) continue;
    if (Array.isArray(value)) {
      for (const item of value) {
        if (isPhpNode(item)) result.push(item);
      }
    } else if (isPhpNode(value)) {
      result.push(value);
    }
  }
  return result;
}

/**
 * Depth-first walk without scope tracking. Returning `false` from the callback
 * skips the node's children.
 */
export function walk(root: PhpNode, callback: (node: PhpNode, parent: PhpNode | null) => boolean | void): void {
  const visit = (node: PhpNode, parent: PhpNode | null): void => {
    if (callback(node, parent) === false) return;
    for (const next of childNodes(node)) visit(next, node);
  };
  visit(root, null);
}

export function findNodes(root: PhpNode, predicate: (node: PhpNode) => boolean): PhpNode[] {
  const found: PhpNode[] = [];
  walk(root, (node) => {
    if (predicate(node)) found.push(node);
  });
  return found;
}

export function containsNode(root: PhpNode, predicate: (node: PhpNode) => boolean): boolean {
  let hit = false;
  walk(root, (node) => {
    if (hit) return false;
    if (predicate(node)) {
      hit = true;
      return false;
    }
    return undefined;
  });
  return hit;
}

export const FUNCTION_LIKE_KINDS = ['method', 'function', 'closure', 'arrowfunc'];

export const CLASS_LIKE_KINDS = ['class', 'trait', 'interface', 'enum'];

/** Statements of a block body, or the single statement when a body has no braces. */
export function bodyStatements(node: PhpNode | null): PhpNode[] {
  if (!node) return [];
  if (node.kind === 'block') return childList(node, 'children');
  return [node];
}

/** Unwraps `expressionstatement` to its expression. */
export function unwrapStatement(node: PhpNode): PhpNode {
  if (node.kind === 'expressionstatement') {
    return child(node, 'expression') ?? node;
  }
  return node;
}

/** Arguments of a call, with named arguments reduced to their value. */
export function callArguments(node: PhpNode): PhpNode[] {
  return childList(node, 'arguments').map((arg) => (arg.kind === 'namedargument' ? child(arg, 'value') ?? arg : arg));
}

/** Values of an array literal; `entry` wrappers are unwrapped. */
export function arrayEntries(node: PhpNode): Array<{ key: PhpNode | null; value: PhpNode }> {
  if (node.kind !== 'array') return [];
  const entries: Array<{ key: PhpNode | null; value: PhpNode }> = [];
  for (const item of childList(node, 'items')) {
    if (item.kind === 'entry') {
      const value = child(item, 'value');
      if (value) entries.push({ key: child(item, 'key'), value });
    } else {
      entries.push({ key: null, value: item });
    }
  }
  return entries;
}
