import {
  callArguments,
  child,
  identifierName,
  isKind,
  isPhpNode,
  stringLiteral,
  type PhpNode,
} from './nodes';

export interface ChainCall {
  method: string;
  args: PhpNode[];
  node: PhpNode;
  isStatic: boolean;
  /** Class reference node of a static call (`name`, `selfreference`, ...). */
  classNode?: PhpNode;
}

export interface CallChain {
  /** Innermost receiver: a variable, property fetch, function call, or the class node of a static call. */
  root: PhpNode;
  /** Calls in execution order, innermost first. */
  calls: ChainCall[];
}

const LOOKUP_KINDS = ['propertylookup', 'nullsafepropertylookup'];

/** `$x->method(...)` with a literal method name. */
export function asMethodCall(node: unknown): { receiver: PhpNode; method: string; args: PhpNode[] } | null {
  if (!isKind(node, 'call')) return null;
  const what = child(node, 'what');
  if (!what || !LOOKUP_KINDS.includes(what.kind)) return null;
  const receiver = child(what, 'what');
  const method = identifierName(what.offset);
  if (!receiver || !method) return null;
  return { receiver, method, args: callArguments(node) };
}

/** `Foo::method(...)` with a literal method name. */
export function asStaticCall(node: unknown): { classNode: PhpNode; method: string; args: PhpNode[] } | null {
  if (!isKind(node, 'call')) return null;
  const what = child(node, 'what');
  if (!what || what.kind !== 'staticlookup') return null;
  const classNode = child(what, 'what');
  const method = identifierName(what.offset);
  if (!classNode || !method) return null;
  return { classNode, method, args: callArguments(node) };
}

/** `foo(...)` with a literal function name, leading backslash removed. */
export function asFunctionCall(node: unknown): { name: string; args: PhpNode[] } | null {
  if (!isKind(node, 'call')) return null;
  const what = child(node, 'what');
  if (!isKind(what, 'name')) return null;
  const name = identifierName(what);
  if (!name) return null;
  return { name: name.replace(/^\\/, ''), args: callArguments(node) };
}

/** `$x->prop` with a literal property name. */
export function asPropertyFetch(node: unknown): { receiver: PhpNode; property: string } | null {
  if (!isPhpNode(node) || !LOOKUP_KINDS.includes(node.kind)) return null;
  const receiver = child(node, 'what');
  const property = identifierName(node.offset);
  if (!receiver || !property) return null;
  return { receiver, property };
}

export function flattenChain(node: PhpNode): CallChain {
  const calls: ChainCall[] = [];
  let current = node;
  for (;;) {
    const method = asMethodCall(current);
    if (method) {
      calls.unshift({ method: method.method, args: method.args, node: current, isStatic: false });
      current = method.receiver;
      continue;
    }
    const staticCall = asStaticCall(current);
    if (staticCall) {
      calls.unshift({
        method: staticCall.method,
        args: staticCall.args,
        node: current,
        isStatic: true,
        classNode: staticCall.classNode,
      });
      return { root: staticCall.classNode, calls };
    }
    return { root: current, calls };
  }
}

export function chainMethods(chain: CallChain): string[] {
  return chain.calls.map((call) => call.method);
}

export function isCallNode(node: unknown): node is PhpNode {
  return isKind(node, 'call');
}

/** First argument as a string literal, if it is one. */
export function firstStringArgument(args: PhpNode[]): string | null {
  return args.length > 0 ? stringLiteral(args[0]) : null;
}

/** Innermost variable name a property or call chain hangs off (`$a->b->c()` gives `a`). */
export function chainRootVariable(node: PhpNode): string | null {
  let current: PhpNode | null = node;
  while (current) {
    if (current.kind === 'variable') {
      return typeof current.name === 'string' ? current.name : null;
    }
    if (current.kind === 'call' || LOOKUP_KINDS.includes(current.kind) || current.kind === 'offsetlookup') {
      current = child(current, 'what');
      continue;
    }
    return null;
  }
  return null;
}
