/**
 * Value provenance: what a local variable is known to hold.
 */

import { FETCH_MANY_METHODS, FETCH_ONE_METHODS, isFacade, isModelQueryMethod, looksLikeModelName } from './laravel';
import { flattenChain, firstStringArgument, type ChainCall } from './php/chains';
import { child, isKind, variableName, type PhpNode } from './php/nodes';
import type { ScopeTracker } from './scope';

export type Provenance =
  | { kind: 'unknown' }
  | { kind: 'model-class'; model: string }
  | { kind: 'eloquent-builder'; model: string }
  | { kind: 'query-builder'; table: string }
  | { kind: 'transaction-protected' };

export const UNKNOWN: Provenance = { kind: 'unknown' };

const SCALAR_RESULT_METHODS = new Set([
  'avg',
  'count',
  'decrement',
  'delete',
  'doesntExist',
  'exists',
  'implode',
  'increment',
  'insert',
  'insertGetId',
  'max',
  'min',
  'pluck',
  'sum',
  'toArray',
  'toJson',
  'toSql',
  'update',
  'upsert',
  'value',
]);

const COLLECTION_PRESERVING_METHODS = new Set([
  'concat',
  'each',
  'filter',
  'fresh',
  'load',
  'loadCount',
  'loadMissing',
  'merge',
  'refresh',
  'reject',
  'reverse',
  'skip',
  'slice',
  'sortBy',
  'sortByDesc',
  'take',
  'tap',
  'unique',
  'values',
  'where',
  'whereIn',
  'whereNotIn',
]);

/**
 * Model class targeted by a static call such as `Post::where(...)`, or null.
 * The registry decides for classes it knows; otherwise a capitalized,
 * non-framework class name with a query-starting method is taken as a model.
 */
export function modelForStaticCall(call: ChainCall, scope: ScopeTracker): string | null {
  if (!call.isStatic || !call.classNode) return null;
  const className = scope.classReference(call.classNode);
  if (!className) return null;
  const known = scope.registry.find(className);
  if (known) return scope.registry.isModel(known.name) ? known.name : null;
  if (!looksLikeModelName(className) || !isModelQueryMethod(call.method)) return null;
  return className;
}

function applyCall(state: Provenance, call: ChainCall, scope: ScopeTracker): Provenance {
  switch (state.kind) {
    case 'eloquent-builder':
      if (FETCH_MANY_METHODS.has(call.method) || FETCH_ONE_METHODS.has(call.method)) {
        return { kind: 'model-class', model: state.model };
      }
      if (call.method === 'toBase' || call.method === 'getQuery') {
        const table = scope.registry.resolveTable(state.model);
        return table ? { kind: 'query-builder', table } : UNKNOWN;
      }
      if (SCALAR_RESULT_METHODS.has(call.method)) return UNKNOWN;
      return state;
    case 'model-class':
      if (call.method === 'newQuery' || call.method === 'query' || call.method === 'newModelQuery') {
        return { kind: 'eloquent-builder', model: state.model };
      }
      if (COLLECTION_PRESERVING_METHODS.has(call.method)) return state;
      if (call.method === 'first' || call.method === 'last' || call.method === 'find' || call.method === 'firstWhere') {
        return state;
      }
      return UNKNOWN;
    case 'query-builder':
      if (FETCH_MANY_METHODS.has(call.method) || FETCH_ONE_METHODS.has(call.method) || SCALAR_RESULT_METHODS.has(call.method)) {
        return UNKNOWN;
      }
      return state;
    default:
      return UNKNOWN;
  }
}

function rootProvenance(calls: ChainCall[], root: PhpNode, scope: ScopeTracker): { state: Provenance; consumed: number } {
  const first = calls[0];
  if (!first.isStatic) {
    const name = variableName(root);
    return { state: name ? scope.lookup(name) : UNKNOWN, consumed: 0 };
  }

  const className = first.classNode ? scope.classReference(first.classNode) : null;
  if (className && isFacade(className, 'DB')) {
    if (first.method === 'transaction') return { state: { kind: 'transaction-protected' }, consumed: calls.length };
    if (first.method === 'table') {
      const table = firstStringArgument(first.args);
      return { state: table ? { kind: 'query-builder', table } : UNKNOWN, consumed: 1 };
    }
    const second = calls[1];
    if (first.method === 'connection' && second?.method === 'table') {
      const table = firstStringArgument(second.args);
      return { state: table ? { kind: 'query-builder', table } : UNKNOWN, consumed: 2 };
    }
    return { state: UNKNOWN, consumed: calls.length };
  }

  const model = modelForStaticCall(first, scope);
  return { state: model ? { kind: 'eloquent-builder', model } : UNKNOWN, consumed: 0 };
}

/** Provenance of an expression, following call chains from their root. */
export function inferProvenance(expr: PhpNode, scope: ScopeTracker): Provenance {
  if (expr.kind === 'variable') {
    const name = variableName(expr);
    return name ? scope.lookup(name) : UNKNOWN;
  }
  if (expr.kind === 'new') {
    const className = scope.classReference(child(expr, 'what'));
    if (className && scope.registry.isModel(className)) {
      return { kind: 'model-class', model: scope.registry.find(className)?.name ?? className };
    }
    return UNKNOWN;
  }
  if (!isKind(expr, 'call')) return UNKNOWN;

  const { root, calls } = flattenChain(expr);
  if (calls.length === 0) return UNKNOWN;
  const { state: initial, consumed } = rootProvenance(calls, root, scope);
  let state = initial;
  for (const call of calls.slice(consumed)) {
    if (state.kind === 'unknown' || state.kind === 'transaction-protected') break;
    state = applyCall(state, call, scope);
  }
  return state;
}

/** Provenance of the elements produced by iterating a value. */
export function elementProvenance(source: Provenance): Provenance {
  if (source.kind === 'model-class' || source.kind === 'eloquent-builder') {
    return { kind: 'model-class', model: source.model };
  }
  return UNKNOWN;
}

export function modelOf(provenance: Provenance): string | null {
  return provenance.kind === 'model-class' || provenance.kind === 'eloquent-builder' ? provenance.model : null;
}
