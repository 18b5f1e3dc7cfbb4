import type { ScopeTracker } from '../scope';
import { childNodes, type PhpNode } from './nodes';

export interface NodeVisitor {
  enterNode?(node: PhpNode, parent: PhpNode | null): void;
  leaveNode?(node: PhpNode, parent: PhpNode | null): void;
  /** Called once after the whole tree has been walked. */
  afterTraverse?(): void;
}

/**
 * Single depth-first pass feeding every visitor. The scope tracker sees each node
 * before the visitors on the way down and after them on the way up, so visitors
 * always observe the scope the node itself introduces. Scope pops happen in a
 * `finally` block and stay balanced even if a visitor throws.
 */
export function traverse(root: PhpNode, visitors: NodeVisitor[], scope: ScopeTracker): void {
  const visit = (node: PhpNode, parent: PhpNode | null): void => {
    const pushed = scope.enterNode(node);
    try {
      for (const visitor of visitors) visitor.enterNode?.(node, parent);
      for (const next of childNodes(node)) visit(next, node);
      for (let i = visitors.length - 1; i >= 0; i--) visitors[i].leaveNode?.(node, parent);
    } finally {
      scope.leaveNode(node, pushed);
    }
  };

  visit(root, null);
  for (const visitor of visitors) visitor.afterTraverse?.();
}
