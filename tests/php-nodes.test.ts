import { isKind, type PhpNode } from '../src/core/php/nodes';

function describeNode(node: PhpNode): string {
  if (isKind(node, 'number', 'boolean')) return `literal ${node.kind}`;
  // Still a PhpNode on this branch.
  return `other ${node.kind}`;
}

describe('isKind', () => {
  it('should narrow matching kinds and keep other nodes typed', () => {
    expect(describeNode({ kind: 'number', value: '1' })).toBe('literal number');
    expect(describeNode({ kind: 'variable', name: 'post' })).toBe('other variable');
  });

  it('should reject values that are not nodes', () => {
    expect(isKind('call', 'call')).toBe(false);
    expect(isKind(null, 'call')).toBe(false);
    expect(isKind({ kind: 'new' }, 'call', 'new')).toBe(true);
  });
});
