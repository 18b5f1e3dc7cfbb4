/**
 * Scope Tracker.
 *
 * Maintains the lexical context of a single depth-first traversal: namespace and
 * imports, enclosing classes with their resolved ancestry, the current method or
 * closure, and per-function variable bindings. The traverser drives
 * `enterNode`/`leaveNode`; analyzers only read.
 */

import { isFacade } from './laravel';
import { ModelRegistry, isOrmBaseClass, type ClassHierarchy, type ClassRecord } from './model-registry';
import { NameContext, shortName, stripLeadingSlash } from './php/names';
import { asMethodCall, asStaticCall, flattenChain } from './php/chains';
import { child, identifierName, isKind, startLine, variableName, type PhpNode } from './php/nodes';
import { UNKNOWN, elementProvenance, inferProvenance, type Provenance } from './provenance';
import {
  NO_SUPPRESSIONS,
  classSuppressionAt,
  suppressionCovers,
  type FileSuppressions,
  type SuppressionSet,
} from './suppression';

export type ScopeKind = 'file' | 'namespace' | 'class' | 'anonymous-class' | 'method' | 'function' | 'closure';

export interface Scope {
  readonly kind: ScopeKind;
  /** Short name; null for anonymous classes and closures. */
  readonly name: string | null;
  /** Fully-qualified name for named classes. */
  readonly qualifiedName: string | null;
  /** Non-owning reference to the enclosing scope. */
  readonly parent: Scope | null;
  readonly node: PhpNode | null;
  /** Resolved ancestors of a class scope, nearest first. */
  readonly classChain: readonly string[];
  readonly bindings: Map<string, Provenance>;
  /** Closure passed directly as the first argument of a transaction call. */
  readonly transactional: boolean;
  readonly suppression: SuppressionSet | null;
}

export interface ScopeTrackerOptions {
  registry?: ModelRegistry;
  suppressions?: FileSuppressions;
  /** Classes declared in the file being traversed, so local parents resolve too. */
  localClasses?: ClassRecord[];
}

const CLASS_KINDS = new Set(['class', 'trait', 'interface', 'enum']);
const FUNCTION_SCOPE_KINDS = new Set<ScopeKind>(['method', 'function', 'closure']);

/** `DB::transaction(fn)` and `DB::connection(...)->transaction(fn)`. */
export function isTransactionCall(node: PhpNode, resolve: (classNode: PhpNode) => string | null): boolean {
  const staticCall = asStaticCall(node);
  if (staticCall) {
    if (staticCall.method !== 'transaction') return false;
    const className = resolve(staticCall.classNode);
    return className !== null && isFacade(className, 'DB');
  }
  const methodCall = asMethodCall(node);
  if (!methodCall || methodCall.method !== 'transaction') return false;
  const { calls } = flattenChain(node);
  const first = calls[0];
  if (!first?.isStatic || !first.classNode) return false;
  const className = resolve(first.classNode);
  return className !== null && isFacade(className, 'DB');
}

export class ScopeTracker {
  readonly registry: ModelRegistry;
  private readonly frames: Scope[] = [];
  private readonly names = new NameContext();
  private readonly suppressions: FileSuppressions;
  private readonly localClasses = new Map<string, ClassRecord>();
  private readonly transactionClosures = new WeakSet<PhpNode>();

  constructor(options: ScopeTrackerOptions = {}) {
    this.registry = options.registry ?? ModelRegistry.empty();
    this.suppressions = options.suppressions ?? NO_SUPPRESSIONS;
    for (const record of options.localClasses ?? []) {
      this.localClasses.set(stripLeadingSlash(record.name).toLowerCase(), record);
    }
    this.frames.push(this.createScope('file', null, null, null, { suppression: this.suppressions.file }));
  }

  get depth(): number {
    return this.frames.length;
  }

  current(): Scope {
    return this.frames[this.frames.length - 1];
  }

  get namespace(): string {
    return this.names.namespace;
  }

  private createScope(
    kind: ScopeKind,
    name: string | null,
    node: PhpNode | null,
    parent: Scope | null,
    extra: Partial<Pick<Scope, 'qualifiedName' | 'classChain' | 'transactional' | 'suppression'>> = {},
  ): Scope {
    return {
      kind,
      name,
      node,
      parent,
      qualifiedName: extra.qualifiedName ?? null,
      classChain: extra.classChain ?? [],
      bindings: new Map(),
      transactional: extra.transactional ?? false,
      suppression: extra.suppression ?? null,
    };
  }

  private push(scope: Scope): void {
    this.frames.push(scope);
  }

  /**
   * Called by the traverser before a node's children are visited. Returns true
   * when a scope was pushed; the traverser hands that back to `leaveNode`.
   */
  enterNode(node: PhpNode): boolean {
    switch (node.kind) {
      case 'namespace':
        this.names.enterNamespace(identifierName(node.name) ?? '');
        this.push(this.createScope('namespace', this.names.namespace || null, node, this.current()));
        return true;
      case 'usegroup':
        this.names.addUseGroup(node);
        return false;
      case 'method':
        this.push(this.createScope('method', identifierName(node.name), node, this.current()));
        return true;
      case 'function':
        this.push(this.createScope('function', identifierName(node.name), node, this.current()));
        return true;
      case 'closure':
      case 'arrowfunc':
        this.push(
          this.createScope('closure', null, node, this.current(), { transactional: this.transactionClosures.has(node) }),
        );
        return true;
      case 'call':
        this.noteTransactionCall(node);
        return false;
      case 'foreach':
        this.bindLoopValue(node);
        return false;
      default:
        break;
    }

    if (CLASS_KINDS.has(node.kind)) {
      this.enterClass(node);
      return true;
    }
    return false;
  }

  /** Called after a node's children; pops the scope pushed by `enterNode`. */
  leaveNode(node: PhpNode, pushed: boolean): void {
    if (node.kind === 'assign' && node.operator === '=') {
      const target = variableName(node.left);
      const value = child(node, 'right');
      if (target && value) this.bind(target, inferProvenance(value, this));
    }
    if (!pushed) return;
    this.frames.pop();
    if (node.kind === 'namespace') this.names.leaveNamespace();
  }

  private enterClass(node: PhpNode): void {
    const declared = identifierName(node.name);
    const suppression = classSuppressionAt(this.suppressions, startLine(node));
    if (!declared || node.isAnonymous === true) {
      this.push(this.createScope('anonymous-class', null, node, this.current(), { suppression }));
      return;
    }
    const qualifiedName = this.names.resolve(declared, 'uqn');
    const parentNode = child(node, 'extends');
    const parentName = parentNode ? this.names.resolveNode(parentNode) : null;
    this.push(
      this.createScope('class', declared, node, this.current(), {
        qualifiedName,
        classChain: this.resolveChain(qualifiedName, parentName),
        suppression,
      }),
    );
  }

  /**
   * Ancestors nearest first. Stops after the first class that is neither declared
   * in this file nor known to the registry, and on cycles.
   */
  private resolveChain(className: string, parentName: string | null): string[] {
    const chain: string[] = [];
    const visited = new Set([className.toLowerCase()]);
    const hierarchy: ClassHierarchy = this.registry;
    let current = parentName;

    while (current) {
      const key = stripLeadingSlash(current).toLowerCase();
      if (visited.has(key)) break;
      visited.add(key);
      chain.push(current);

      const local = this.localClasses.get(key);
      if (local) {
        current = local.parent;
        continue;
      }
      const parent = hierarchy.parentOf(current);
      if (parent === undefined) break;
      current = parent;
    }
    return chain;
  }

  private noteTransactionCall(node: PhpNode): void {
    if (!isTransactionCall(node, (classNode) => this.classReference(classNode))) return;
    const args = node.arguments;
    if (!Array.isArray(args)) return;
    const first: unknown = args[0];
    if (isKind(first, 'closure', 'arrowfunc')) this.transactionClosures.add(first);
  }

  private bindLoopValue(node: PhpNode): void {
    const valueName = variableName(node.value);
    const source = child(node, 'source');
    if (!valueName || !source) return;
    this.bind(valueName, elementProvenance(inferProvenance(source, this)));
  }

  /** Innermost method, function or closure scope; the file scope for top-level code. */
  private bindingScope(): Scope {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      if (FUNCTION_SCOPE_KINDS.has(this.frames[i].kind)) return this.frames[i];
    }
    return this.frames[0];
  }

  bind(variable: string, provenance: Provenance): void {
    this.bindingScope().bindings.set(variable, provenance);
  }

  lookup(variable: string): Provenance {
    return this.bindingScope().bindings.get(variable) ?? UNKNOWN;
  }

  /** Innermost class-like scope, named or anonymous. */
  currentClass(): Scope | null {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame.kind === 'class' || frame.kind === 'anonymous-class') return frame;
    }
    return null;
  }

  /** Short name of the innermost class; null inside anonymous classes and outside classes. */
  currentClassName(): string | null {
    const scope = this.currentClass();
    return scope?.kind === 'class' ? scope.name : null;
  }

  currentQualifiedClassName(): string | null {
    const scope = this.currentClass();
    return scope?.kind === 'class' ? scope.qualifiedName : null;
  }

  currentClassChain(): readonly string[] {
    const scope = this.currentClass();
    return scope?.kind === 'class' ? scope.classChain : [];
  }

  /** Whether the innermost named class is an Eloquent model, by the registry or by its resolved ancestry. */
  isInModel(): boolean {
    const scope = this.currentClass();
    if (scope?.kind !== 'class' || !scope.qualifiedName) return false;
    return this.registry.isModel(scope.qualifiedName) || scope.classChain.some(isOrmBaseClass);
  }

  /** Innermost method scope, skipping closures nested inside it. */
  currentMethod(): Scope | null {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame.kind === 'method') return frame;
      if (frame.kind === 'class' || frame.kind === 'anonymous-class') return null;
    }
    return null;
  }

  currentMethodName(): string | null {
    return this.currentMethod()?.name ?? null;
  }

  /** Innermost method, function or closure. */
  currentFunction(): Scope | null {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      if (FUNCTION_SCOPE_KINDS.has(this.frames[i].kind)) return this.frames[i];
    }
    return null;
  }

  isInsideClosure(): boolean {
    return this.currentFunction()?.kind === 'closure';
  }

  /** True inside the closure handed to `DB::transaction`, including closures nested in it. */
  isTransactionProtected(): boolean {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame.transactional) return true;
      if (frame.kind === 'method' || frame.kind === 'function') return false;
    }
    return false;
  }

  isSuppressed(ruleId: string): boolean {
    return this.frames.some((frame) => suppressionCovers(frame.suppression, ruleId));
  }

  resolveClassName(name: string): string {
    return this.names.resolve(name);
  }

  /**
   * Class named by a static call or `new` target: `Foo`, `\App\Foo`, `self`,
   * `static` or `parent`. Dynamic references give null.
   */
  classReference(node: unknown): string | null {
    if (isKind(node, 'name')) {
      const raw = identifierName(node)?.toLowerCase();
      if (raw === 'self' || raw === 'static') return this.currentQualifiedClassName();
      if (raw === 'parent') return this.currentClassChain()[0] ?? null;
      return this.names.resolveNode(node);
    }
    if (isKind(node, 'selfreference', 'staticreference')) return this.currentQualifiedClassName();
    if (isKind(node, 'parentreference')) return this.currentClassChain()[0] ?? null;
    return null;
  }

  /** Short name of the class a static call targets, e.g. `DB` for `\Illuminate\Support\Facades\DB::table`. */
  classShortName(node: unknown): string | null {
    const resolved = this.classReference(node);
    return resolved ? shortName(resolved) : null;
  }
}
