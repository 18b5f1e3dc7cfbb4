import { childList, identifierName, isKind, stringProp, type PhpNode } from './nodes';

export function stripLeadingSlash(name: string): string {
  return name.startsWith('\\') ? name.slice(1) : name;
}

export function shortName(name: string): string {
  const clean = stripLeadingSlash(name);
  const index = clean.lastIndexOf('\\');
  return index === -1 ? clean : clean.slice(index + 1);
}

export function sameClassName(a: string, b: string): boolean {
  return stripLeadingSlash(a).toLowerCase() === stripLeadingSlash(b).toLowerCase();
}

/**
 * Namespace and `use` import state for one file, used to turn names as written
 * into fully-qualified class names.
 */
export class NameContext {
  private currentNamespace = '';
  private imports = new Map<string, string>();

  get namespace(): string {
    return this.currentNamespace;
  }

  enterNamespace(name: string): void {
    this.currentNamespace = stripLeadingSlash(name);
    this.imports = new Map();
  }

  leaveNamespace(): void {
    this.currentNamespace = '';
    this.imports = new Map();
  }

  /** Registers the class imports of a `usegroup` node. Function and const imports are ignored. */
  addUseGroup(node: PhpNode): void {
    const groupType = stringProp(node, 'type');
    if (groupType === 'function' || groupType === 'const') return;
    const prefix = stringProp(node, 'name');
    for (const item of childList(node, 'items')) {
      const itemType = stringProp(item, 'type');
      if (itemType === 'function' || itemType === 'const') continue;
      const name = identifierName(item.name);
      if (!name) continue;
      const full = stripLeadingSlash(prefix ? `${prefix}\\${name}` : name);
      const alias = identifierName(item.alias) ?? shortName(full);
      this.imports.set(alias.toLowerCase(), full);
    }
  }

  importFor(alias: string): string | undefined {
    return this.imports.get(alias.toLowerCase());
  }

  /** Resolves a class name as written against the current namespace and imports. */
  resolve(raw: string, resolution?: string | null): string {
    if (resolution === 'fqn' || raw.startsWith('\\')) return stripLeadingSlash(raw);
    if (resolution === 'rn' || /^namespace\\/i.test(raw)) {
      return this.qualify(raw.replace(/^namespace\\/i, ''));
    }
    const [first, ...rest] = raw.split('\\');
    const imported = this.importFor(first);
    if (imported) return rest.length > 0 ? `${imported}\\${rest.join('\\')}` : imported;
    return this.qualify(raw);
  }

  /** Resolves a `name` node, or returns null for anything else. */
  resolveNode(node: unknown): string | null {
    if (!isKind(node, 'name')) return null;
    const raw = identifierName(node);
    if (!raw) return null;
    return this.resolve(raw, typeof node.resolution === 'string' ? node.resolution : null);
  }

  private qualify(name: string): string {
    return this.currentNamespace ? `${this.currentNamespace}\\${name}` : name;
  }
}
