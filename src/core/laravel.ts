/**
 * Framework vocabulary shared by the analyzers.
 */

import vocabulary from '../data/laravel.json';
import { shortName } from './php/names';

export const FACADES: readonly string[] = vocabulary.facades;
export const HELPER_FUNCTIONS: readonly string[] = vocabulary.helpers;
/** Container methods that inspect or configure rather than resolve. */
export const CONTAINER_UTILITY_METHODS: readonly string[] = vocabulary.containerUtilityMethods;
/** Core service aliases resolved by string, such as `app('config')`. */
export const CONTAINER_SERVICE_ALIASES: readonly string[] = vocabulary.containerServiceAliases;

const FACADE_SET = new Set(vocabulary.facades.map((name) => name.toLowerCase()));
const NON_MODEL_SET = new Set([...vocabulary.facades, ...vocabulary.nonModelClasses].map((name) => name.toLowerCase()));

const NON_MODEL_SUFFIXES = [
  'Controller',
  'Service',
  'Repository',
  'Helper',
  'Facade',
  'Manager',
  'Factory',
  'Seeder',
  'Request',
  'Resource',
  'Job',
  'Event',
  'Listener',
  'Exception',
  'Policy',
  'Enum',
  'Rule',
  'Mail',
  'Notification',
  'Provider',
  'Middleware',
  'Command',
  'Action',
];

/** Whether a (possibly namespaced) class name refers to the facade with the given short name. */
export function isFacade(className: string, facade: string): boolean {
  return shortName(className).toLowerCase() === facade.toLowerCase();
}

export function isKnownFacade(className: string): boolean {
  return FACADE_SET.has(shortName(className).toLowerCase());
}

/** Capitalized class names that are not framework utilities and do not carry a service-like suffix. */
export function looksLikeModelName(className: string): boolean {
  const short = shortName(className);
  if (!/^[A-Z][A-Za-z0-9]*$/.test(short)) return false;
  if (NON_MODEL_SET.has(short.toLowerCase())) return false;
  return !NON_MODEL_SUFFIXES.some((suffix) => short.length > suffix.length && short.endsWith(suffix));
}

const NON_RELATION_PROPERTIES = new Set(vocabulary.nonRelationProperties);
const RELATION_TERMS = new Set([
  'parent', 'owner', 'children', 'author', 'creator', 'members', 'followers', 'following',
  'friends', 'roles', 'permissions', 'tags', 'categories', 'items', 'entries', 'records',
]);
const SINGULAR_S_WORDS = new Set(['status', 'class', 'address', 'access', 'process', 'success', 'progress']);

/** Property names that read like a loaded to-many relation (`$user->posts`). */
export function looksLikeRelationName(name: string): boolean {
  if (NON_RELATION_PROPERTIES.has(name)) return false;
  if (RELATION_TERMS.has(name)) return true;
  if (name.length > 3 && name.endsWith('s') && !name.endsWith('ss')) return !SINGULAR_S_WORDS.has(name);
  return false;
}

/** Static methods that start an Eloquent query on a model class. */
export const MODEL_QUERY_METHODS = new Set([
  'all',
  'avg',
  'chunk',
  'chunkById',
  'count',
  'create',
  'cursor',
  'delete',
  'destroy',
  'distinct',
  'doesntHave',
  'each',
  'exists',
  'find',
  'findMany',
  'findOr',
  'findOrFail',
  'findOrNew',
  'first',
  'firstOrCreate',
  'firstOrFail',
  'firstOrNew',
  'firstWhere',
  'forceCreate',
  'get',
  'groupBy',
  'has',
  'insert',
  'join',
  'latest',
  'lazy',
  'leftJoin',
  'limit',
  'max',
  'min',
  'oldest',
  'onlyTrashed',
  'orderBy',
  'orderByDesc',
  'paginate',
  'pluck',
  'query',
  'select',
  'simplePaginate',
  'sum',
  'take',
  'update',
  'updateOrCreate',
  'upsert',
  'whereHas',
  'with',
  'withCount',
  'withTrashed',
  'withoutGlobalScopes',
]);

export function isModelQueryMethod(method: string): boolean {
  return MODEL_QUERY_METHODS.has(method) || method.startsWith('where') || method.startsWith('orWhere');
}

export const FETCH_MANY_METHODS = new Set([
  'all',
  'get',
  'paginate',
  'simplePaginate',
  'cursorPaginate',
  'cursor',
  'lazy',
  'lazyById',
  'lazyByIdDesc',
]);

export const FETCH_ONE_METHODS = new Set([
  'create',
  'find',
  'findOr',
  'findOrFail',
  'findOrNew',
  'first',
  'firstOr',
  'firstOrCreate',
  'firstOrFail',
  'firstOrNew',
  'firstWhere',
  'forceCreate',
  'make',
  'sole',
  'updateOrCreate',
]);

/** `DB::` methods that run or start a query. */
export const DB_QUERY_METHODS = new Set([
  'table',
  'select',
  'selectOne',
  'insert',
  'update',
  'delete',
  'statement',
  'unprepared',
  'raw',
  'scalar',
  'query',
  'connection',
  'cursor',
]);
