/**
 * Eloquent N+1 Query Analyzer
 *
 * Flags relationship access on the value of a `foreach` over model results
 * when the relationship was not eager loaded, and any query started inside a
 * loop body.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { DB_QUERY_METHODS, FETCH_ONE_METHODS, isFacade, isModelQueryMethod } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asMethodCall, asPropertyFetch, asStaticCall, flattenChain, type ChainCall } from '../../core/php/chains';
import { shortName } from '../../core/php/names';
import {
  arrayEntries,
  child,
  childList,
  findNodes,
  startLine,
  stringLiteral,
  variableName,
  type PhpNode,
} from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import { inferProvenance, modelForStaticCall } from '../../core/provenance';
import type { Scope } from '../../core/scope';

const META: AnalyzerMeta = {
  id: 'eloquent-n-plus-one',
  name: 'Eloquent N+1 Query Analyzer',
  description: 'Identifies missing eager loading that causes N+1 query performance problems',
  category: 'best-practices',
  severity: 'high',
  tags: ['performance', 'eloquent', 'database', 'n+1', 'optimization'],
};

/** Model attributes that are columns, not relationships. */
const PLAIN_ATTRIBUTES = [
  'id', 'created_at', 'updated_at', 'deleted_at', 'name', 'email',
  'password', 'remember_token', 'email_verified_at', 'title', 'content',
  'description', 'status', 'type', 'value', 'data', 'meta', 'slug',
  'count', 'total', 'amount', 'price', 'quantity', 'active', 'enabled',
];

const EAGER_LOAD_METHODS = new Set(['with', 'load', 'loadMissing']);

type LoopType = 'foreach' | 'for' | 'while' | 'do-while';

const LOOP_KINDS: Record<string, LoopType> = {
  foreach: 'foreach',
  for: 'for',
  while: 'while',
  do: 'do-while',
};

interface LoopFrame {
  node: PhpNode;
  type: LoopType;
  owner: Scope | null;
  /** Loop value variable when the iterated source is model-derived. */
  variable: string | null;
  eagerLoaded: Set<string>;
  guarded: Set<string>;
  reported: Set<string>;
  /** Children evaluated once, before the first iteration. */
  sources: Set<PhpNode>;
  sourceDepth: number;
}

function addPath(target: Set<string>, raw: string): void {
  const relation = raw.split(':')[0].trim();
  if (!relation) return;
  const segments = relation.split('.');
  for (let i = 1; i <= segments.length; i++) {
    target.add(segments.slice(0, i).join('.'));
  }
}

/** Relationship paths named by the arguments of `with`, `load` or `loadMissing`. */
export function eagerLoadPaths(args: PhpNode[]): Set<string> {
  const paths = new Set<string>();
  for (const arg of args) {
    const literal = stringLiteral(arg);
    if (literal !== null) {
      addPath(paths, literal);
      continue;
    }
    for (const entry of arrayEntries(arg)) {
      const key = entry.key ? stringLiteral(entry.key) : null;
      const value = stringLiteral(entry.value);
      if (key !== null) addPath(paths, key);
      else if (value !== null) addPath(paths, value);
    }
  }
  return paths;
}

function chainEagerLoads(calls: ChainCall[]): Set<string> {
  const paths = new Set<string>();
  for (const call of calls) {
    if (!EAGER_LOAD_METHODS.has(call.method)) continue;
    for (const path of eagerLoadPaths(call.args)) paths.add(path);
  }
  return paths;
}

function isCovered(path: string, frame: LoopFrame): boolean {
  if (frame.eagerLoaded.has(path) || frame.guarded.has(path)) return true;
  for (const loaded of frame.eagerLoaded) {
    if (loaded.startsWith(`${path}.`)) return true;
  }
  return false;
}

class NPlusOneVisitor implements NodeVisitor {
  private readonly loops: LoopFrame[] = [];
  /** Eager loads recorded per method, function or closure, by variable. */
  private readonly eagerByFunction = new Map<Scope | null, Map<string, Set<string>>>();

  constructor(
    private readonly context: FileContext,
    private readonly plainAttributes: Set<string>,
  ) {}

  enterNode(node: PhpNode, parent: PhpNode | null): void {
    const top = this.loops[this.loops.length - 1];
    if (top?.sources.has(node)) top.sourceDepth += 1;

    const loopType = LOOP_KINDS[node.kind];
    if (loopType) {
      this.enterLoop(node, loopType);
      return;
    }

    switch (node.kind) {
      case 'assign':
        this.trackAssignment(node);
        break;
      case 'call':
        this.trackLoadCall(node);
        this.checkQueryInLoop(node);
        break;
      case 'if':
      case 'retif':
        this.trackRelationLoadedGuard(node);
        break;
      case 'propertylookup':
      case 'nullsafepropertylookup':
        this.checkPropertyChain(node, parent);
        break;
      default:
        break;
    }
  }

  leaveNode(node: PhpNode): void {
    const top = this.loops[this.loops.length - 1];
    if (!top) return;
    if (top.node === node) {
      this.loops.pop();
      return;
    }
    if (top.sources.has(node)) top.sourceDepth -= 1;
  }

  private eagerLoads(): Map<string, Set<string>> {
    const owner = this.context.scope.currentFunction();
    let loads = this.eagerByFunction.get(owner);
    if (!loads) {
      loads = new Map();
      this.eagerByFunction.set(owner, loads);
    }
    return loads;
  }

  private enterLoop(node: PhpNode, type: LoopType): void {
    const frame: LoopFrame = {
      node,
      type,
      owner: this.context.scope.currentFunction(),
      variable: null,
      eagerLoaded: new Set(),
      guarded: new Set(),
      reported: new Set(),
      sources: new Set(),
      sourceDepth: 0,
    };

    if (type === 'foreach') {
      const source = child(node, 'source');
      if (source) {
        frame.sources.add(source);
        this.describeForeachSource(frame, node, source);
      }
    } else if (type === 'for') {
      for (const init of childList(node, 'init')) frame.sources.add(init);
    }
    this.loops.push(frame);
  }

  private describeForeachSource(frame: LoopFrame, node: PhpNode, source: PhpNode): void {
    const valueName = variableName(node.value);
    if (!valueName) return;
    const nested = this.nestedEagerLoads(source);
    if (nested) {
      frame.variable = valueName;
      frame.eagerLoaded = nested;
      return;
    }
    if (inferProvenance(source, this.context.scope).kind !== 'model-class') return;

    if (source.kind === 'variable') {
      const name = variableName(source);
      frame.variable = valueName;
      frame.eagerLoaded = new Set(name ? this.eagerLoads().get(name) : []);
      return;
    }
    if (source.kind !== 'call') return;
    const { root, calls } = flattenChain(source);
    const last = calls[calls.length - 1];
    if (!last || FETCH_ONE_METHODS.has(last.method)) return;

    frame.variable = valueName;
    frame.eagerLoaded = chainEagerLoads(calls);
    const rootName = variableName(root);
    for (const path of (rootName ? this.eagerLoads().get(rootName) : undefined) ?? []) frame.eagerLoaded.add(path);
  }

  /**
   * `foreach ($post->comments as $comment)` inside a loop over `$post`: the
   * relation is model-derived, and `with('comments.author')` on the outer
   * source covers `author` here.
   */
  private nestedEagerLoads(source: PhpNode): Set<string> | null {
    const segments: string[] = [];
    let current = source;
    let fetch = asPropertyFetch(current);
    while (fetch) {
      segments.unshift(fetch.property);
      current = fetch.receiver;
      fetch = asPropertyFetch(current);
    }
    const variable = variableName(current);
    if (!variable || segments.length === 0) return null;
    if (segments.some((segment) => this.plainAttributes.has(segment.toLowerCase()))) return null;
    const outer = this.loopFor(variable);
    if (!outer) return null;

    const prefix = `${segments.join('.')}.`;
    const nested = new Set<string>();
    for (const path of outer.eagerLoaded) {
      if (path.startsWith(prefix)) nested.add(path.slice(prefix.length));
    }
    return nested;
  }

  private trackAssignment(node: PhpNode): void {
    if (node.operator !== '=') return;
    const target = variableName(node.left);
    const value = child(node, 'right');
    if (!target || !value) return;
    const loads = this.eagerLoads();
    if (value.kind === 'call') {
      const { root, calls } = flattenChain(value);
      const paths = chainEagerLoads(calls);
      const rootName = variableName(root);
      for (const path of (rootName ? loads.get(rootName) : undefined) ?? []) paths.add(path);
      loads.set(target, paths);
    } else if (value.kind === 'variable') {
      const source = variableName(value);
      loads.set(target, new Set(source ? loads.get(source) : []));
    } else {
      loads.delete(target);
    }
  }

  /** `$posts->load('user')` and `$posts->loadMissing(...)` on a variable. */
  private trackLoadCall(node: PhpNode): void {
    const call = asMethodCall(node);
    if (!call || (call.method !== 'load' && call.method !== 'loadMissing')) return;
    const name = variableName(call.receiver);
    if (!name) return;
    const loads = this.eagerLoads();
    const existing = loads.get(name) ?? new Set<string>();
    for (const path of eagerLoadPaths(call.args)) existing.add(path);
    loads.set(name, existing);
  }

  private trackRelationLoadedGuard(node: PhpNode): void {
    const test = child(node, 'test');
    if (!test || this.loops.length === 0) return;
    for (const candidate of findNodes(test, (n) => n.kind === 'call')) {
      const call = asMethodCall(candidate);
      if (!call || call.method !== 'relationLoaded') continue;
      const name = variableName(call.receiver);
      const relation = call.args.length > 0 ? stringLiteral(call.args[0]) : null;
      if (!name || relation === null) continue;
      const frame = this.loopFor(name);
      frame?.guarded.add(relation);
    }
  }

  private loopFor(variable: string): LoopFrame | undefined {
    for (let i = this.loops.length - 1; i >= 0; i--) {
      if (this.loops[i].variable === variable) return this.loops[i];
    }
    return undefined;
  }

  /** Innermost loop of the current function whose body is being visited. */
  private enclosingLoop(): LoopFrame | undefined {
    const owner = this.context.scope.currentFunction();
    for (let i = this.loops.length - 1; i >= 0; i--) {
      const frame = this.loops[i];
      if (frame.owner !== owner) return undefined;
      if (frame.sourceDepth === 0) return frame;
    }
    return undefined;
  }

  private checkQueryInLoop(node: PhpNode): void {
    const staticCall = asStaticCall(node);
    if (!staticCall) return;
    const loop = this.enclosingLoop();
    if (!loop) return;

    const { scope } = this.context;
    const className = scope.classReference(staticCall.classNode);
    if (!className) return;

    let described: string | null = null;
    if (isFacade(className, 'DB')) {
      if (DB_QUERY_METHODS.has(staticCall.method) && staticCall.method !== 'raw') described = `DB::${staticCall.method}()`;
    } else if (isModelQueryMethod(staticCall.method)) {
      const model = modelForStaticCall(
        { method: staticCall.method, args: staticCall.args, node, isStatic: true, classNode: staticCall.classNode },
        scope,
      );
      if (model) described = `${shortName(model)}::${staticCall.method}()`;
    }
    if (!described) return;

    this.context.report({
      code: 'query-in-loop',
      severity: 'critical',
      line: startLine(node),
      message: `Database query inside ${loop.type} loop: ${described}`,
      recommendation:
        'A query inside a loop runs once per iteration. Load the data before the loop, for example with a single whereIn() query or eager loading, and look it up in memory.',
      metadata: { call: described, loop_type: loop.type },
    });
  }

  private checkPropertyChain(node: PhpNode, parent: PhpNode | null): void {
    if (this.loops.length === 0) return;
    // Inner links of a chain are handled at its outermost fetch.
    if (parent && isPropertyLookup(parent) && parent.what === node) return;

    let fetch = asPropertyFetch(node);
    if (!fetch) return;
    let current: PhpNode = node;
    if (parent?.kind === 'call' && parent.what === node) {
      // `$post->user->posts()`: the last segment names a method.
      current = fetch.receiver;
      fetch = asPropertyFetch(current);
    }
    const segments: string[] = [];
    while (fetch) {
      segments.unshift(fetch.property);
      current = fetch.receiver;
      fetch = asPropertyFetch(current);
    }
    const variable = variableName(current);
    if (!variable || segments.length === 0) return;
    const frame = this.loopFor(variable);
    if (!frame) return;

    let uncovered: string | null = null;
    let path = '';
    for (const segment of segments) {
      if (this.plainAttributes.has(segment.toLowerCase())) break;
      path = path ? `${path}.${segment}` : segment;
      if (!isCovered(path, frame)) uncovered = path;
    }
    if (!uncovered || frame.reported.has(uncovered)) return;
    frame.reported.add(uncovered);

    this.context.report({
      code: 'n-plus-one-relationship',
      line: startLine(node),
      message: `Potential N+1 query: accessing '${uncovered}' inside loop`,
      recommendation:
        `Accessing the '${uncovered}' relationship inside a ${frame.type} will trigger a separate database query for each iteration, causing an N+1 query problem. ` +
        `Eager load it with ->with('${uncovered}') on the query or ->load('${uncovered}') on the collection before the loop.`,
      metadata: { relationship: uncovered, loop_type: frame.type, variable },
    });
  }
}

function isPropertyLookup(node: PhpNode): boolean {
  return node.kind === 'propertylookup' || node.kind === 'nullsafepropertylookup';
}

export class EloquentNPlusOneAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly plainAttributes: Set<string>;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    const extra = reader.stringList('ignore_properties', []);
    this.plainAttributes = new Set([...PLAIN_ATTRIBUTES, ...extra].map((name) => name.toLowerCase()));
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new NPlusOneVisitor(context, this.plainAttributes);
  }
}

export const eloquentNPlusOne: AnalyzerDefinition = {
  meta: META,
  create: (options) => new EloquentNPlusOneAnalyzer(options),
};
