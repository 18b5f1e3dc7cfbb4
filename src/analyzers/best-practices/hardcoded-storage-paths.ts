/**
 * Hardcoded Storage Paths Analyzer
 *
 * Absolute deployment paths and relative `../storage/` style paths are always
 * reported. Root-relative paths such as `/storage/app/x` are ambiguous (they are
 * also URLs), so they are reported only when the string flows into a
 * filesystem call.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { isFacade } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall, asMethodCall, asStaticCall, flattenChain } from '../../core/php/chains';
import { childList, startLine, stringLiteral, stringProp, variableName, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'hardcoded-storage-paths',
  name: 'Hardcoded Storage Paths Analyzer',
  description: 'Detects hardcoded storage and public paths that should use path helpers',
  category: 'best-practices',
  severity: 'medium',
  tags: ['laravel', 'portability', 'paths', 'configuration'],
};

interface PathPattern {
  pattern: RegExp;
  helper: string;
  /** Needs a definite filesystem call rather than a path-like variable name. */
  strong?: boolean;
}

const DIRECTORY_HELPERS: Array<[string, string]> = [
  ['storage', 'storage_path(...)'],
  ['public', 'public_path(...)'],
  ['app', 'app_path(...)'],
  ['resources', 'resource_path(...)'],
  ['database', 'database_path(...)'],
  ['config', 'config_path(...)'],
];

const ALWAYS_FLAGGED: PathPattern[] = [
  ...DIRECTORY_HELPERS.map(([dir, helper]) => ({
    pattern: new RegExp(`/var/www/.*${dir}${dir === 'app' ? '/' : ''}`, 'i'),
    helper,
  })),
  { pattern: /[A-Z]:\\storage\\app\\/i, helper: "storage_path('app/...')" },
  { pattern: /[A-Z]:\\storage\\logs\\/i, helper: "storage_path('logs/...')" },
  { pattern: /[A-Z]:\\public\\uploads\\/i, helper: "public_path('uploads/...')" },
  ...DIRECTORY_HELPERS.map(([dir, helper]) => ({ pattern: new RegExp(`[A-Z]:\\\\${dir}\\\\`, 'i'), helper })),
  ...DIRECTORY_HELPERS.map(([dir, helper]) => ({ pattern: new RegExp(`(^|[^.])\\.{1,2}/${dir}/`, 'i'), helper })),
];

const CONTEXT_REQUIRED: PathPattern[] = [
  { pattern: /^\/storage\/app\//i, helper: "storage_path('app/...')" },
  { pattern: /^\/storage\/logs\//i, helper: "storage_path('logs/...')" },
  { pattern: /^\/storage\/framework\//i, helper: "storage_path('framework/...')" },
  { pattern: /^\/storage\//i, helper: 'storage_path(...)' },
  { pattern: /^\/public\/uploads\//i, helper: "public_path('uploads/...')", strong: true },
  { pattern: /^\/public\//i, helper: 'public_path(...)', strong: true },
  { pattern: /^\/app\//i, helper: 'app_path(...)', strong: true },
  { pattern: /^\/resources\//i, helper: 'resource_path(...)' },
  { pattern: /^\/database\//i, helper: 'database_path(...)' },
  { pattern: /^\/config\//i, helper: 'config_path(...)' },
];

const FILESYSTEM_FUNCTIONS = new Set([
  'file_get_contents', 'file_put_contents', 'fopen', 'file', 'readfile', 'file_exists',
  'is_file', 'is_dir', 'is_readable', 'is_writable', 'mkdir', 'rmdir', 'opendir', 'scandir',
  'glob', 'unlink', 'copy', 'rename', 'move_uploaded_file', 'chmod', 'touch', 'symlink',
  'filesize', 'filemtime', 'realpath', 'pathinfo', 'dirname', 'basename',
]);

const FILESYSTEM_METHODS = new Set([
  'get', 'put', 'exists', 'missing', 'path', 'delete', 'copy', 'move', 'size', 'lastModified',
  'files', 'allFiles', 'directories', 'allDirectories', 'makeDirectory', 'deleteDirectory',
  'append', 'prepend', 'read', 'write', 'readStream', 'writeStream', 'download', 'streamDownload',
]);

const URL_HELPERS = new Set(['asset', 'secure_asset', 'mix', 'url', 'secure_url', 'route', 'action', 'to_route', 'redirect']);

const PATH_VARIABLE = /(path|file|dir|folder)/i;

enum Context {
  None = 0,
  Weak = 1,
  Strong = 2,
}

function preview(value: string): string {
  return value.length > 50 ? value.slice(0, 50) : value;
}

/** Literal text of a string or the literal parts of an interpolated one. */
function literalText(node: PhpNode): string | null {
  const literal = stringLiteral(node);
  if (literal !== null) return literal;
  if (node.kind !== 'encapsed') return null;
  const text = childList(node, 'value')
    .map((part) => (part.kind === 'encapsedpart' ? stringLiteral(part.expression) ?? '' : ''))
    .join('');
  return text === '' ? null : text;
}

class HardcodedPathsVisitor implements NodeVisitor {
  private readonly ancestors: PhpNode[] = [];

  constructor(
    private readonly context: FileContext,
    private readonly alwaysFlagged: PathPattern[],
    private readonly allowedPaths: string[],
  ) {}

  enterNode(node: PhpNode): void {
    // Parts of an interpolated string are checked through the whole string.
    const insideEncapsed = this.ancestors.some((ancestor) => ancestor.kind === 'encapsed');
    this.ancestors.push(node);
    if (insideEncapsed || (node.kind !== 'string' && node.kind !== 'encapsed')) return;
    const value = literalText(node);
    if (value !== null) this.checkPath(value, node);
  }

  leaveNode(): void {
    this.ancestors.pop();
  }

  private checkPath(value: string, node: PhpNode): void {
    if (/^https?:\/\//i.test(value)) return;
    if (this.allowedPaths.some((allowed) => value.includes(allowed))) return;

    const always = this.alwaysFlagged.find(({ pattern }) => pattern.test(value));
    if (always) {
      this.report(node, value, always.helper);
      return;
    }
    const contextual = CONTEXT_REQUIRED.find(({ pattern }) => pattern.test(value));
    if (!contextual) return;
    const required = contextual.strong ? Context.Strong : Context.Weak;
    if (this.filesystemContext() >= required) this.report(node, value, contextual.helper);
  }

  /** How certain it is that the string under the cursor ends up as a filesystem path. */
  private filesystemContext(): Context {
    const { scope } = this.context;
    // The string itself is the last ancestor; walk outward through concatenations.
    for (let i = this.ancestors.length - 2; i >= 0; i--) {
      const ancestor = this.ancestors[i];
      if (ancestor.kind === 'bin' && stringProp(ancestor, 'type') === '.') continue;
      if (ancestor.kind === 'namedargument' || ancestor.kind === 'encapsed') continue;

      if (ancestor.kind === 'assign') {
        const name = variableName(ancestor.left);
        return name && PATH_VARIABLE.test(name) ? Context.Weak : Context.None;
      }
      if (ancestor.kind !== 'call') return Context.None;

      const fn = asFunctionCall(ancestor);
      if (fn) {
        const name = fn.name.toLowerCase();
        if (URL_HELPERS.has(name)) return Context.None;
        return FILESYSTEM_FUNCTIONS.has(name) ? Context.Strong : Context.None;
      }
      const staticCall = asStaticCall(ancestor);
      if (staticCall) {
        const className = scope.classReference(staticCall.classNode);
        const isFilesystem = className !== null && (isFacade(className, 'Storage') || isFacade(className, 'File'));
        return isFilesystem && FILESYSTEM_METHODS.has(staticCall.method) ? Context.Strong : Context.None;
      }
      const methodCall = asMethodCall(ancestor);
      if (methodCall && FILESYSTEM_METHODS.has(methodCall.method)) {
        // Storage::disk('x')->put(...), response()->download(...)
        const { root, calls } = flattenChain(ancestor);
        const first = calls[0];
        const className = first.isStatic && first.classNode ? scope.classReference(first.classNode) : null;
        if (className && isFacade(className, 'Storage')) return Context.Strong;
        if (asFunctionCall(root)?.name === 'response') return Context.Strong;
      }
      return Context.None;
    }
    return Context.None;
  }

  private report(node: PhpNode, value: string, helper: string): void {
    this.context.report({
      line: startLine(node),
      message: `Hardcoded storage path found: "${preview(value)}"`,
      recommendation: `Use the path helper ${helper}. Paths built by helpers stay correct across environments and storage drivers.`,
      metadata: { path: preview(value), helper },
    });
  }
}

export class HardcodedStoragePathsAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly alwaysFlagged: PathPattern[];
  private readonly allowedPaths: string[];

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    this.allowedPaths = reader.stringList('allowed_paths', []);
    const extra = reader.patterns('additional_patterns').map(({ pattern, description }) => ({ pattern, helper: description }));
    this.alwaysFlagged = [...ALWAYS_FLAGGED, ...extra];
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new HardcodedPathsVisitor(context, this.alwaysFlagged, this.allowedPaths);
  }
}

export const hardcodedStoragePaths: AnalyzerDefinition = {
  meta: META,
  create: (options) => new HardcodedStoragePathsAnalyzer(options),
};
