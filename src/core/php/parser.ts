import { Engine } from 'php-parser';

import { isPhpNode, type PhpNode } from './nodes';

/**
 * Raised (as a value, never thrown past the parser) when source text is not valid PHP.
 */
export class ParseFailure extends Error {
  constructor(
    readonly file: string,
    message: string,
    readonly line?: number,
  ) {
    super(message);
    this.name = 'ParseFailure';
  }
}

export type ParseResult = { ok: true; program: PhpNode } | { ok: false; error: ParseFailure };

function createEngine(): Engine {
  return new Engine({
    parser: { php8: true, extractDoc: true, suppressErrors: false },
    ast: { withPositions: true },
  });
}

function errorLine(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'lineNumber' in error && typeof error.lineNumber === 'number') {
    return error.lineNumber;
  }
  return undefined;
}

/**
 * Parse PHP source into a syntax tree. Failures come back as a result so that a
 * single broken file never aborts a run.
 */
export function parsePhp(source: string, file: string): ParseResult {
  let program: unknown;
  try {
    program = createEngine().parseCode(source, file);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new ParseFailure(file, message, errorLine(error)) };
  }
  if (!isPhpNode(program)) {
    return { ok: false, error: new ParseFailure(file, 'Parser returned no program node') };
  }
  return { ok: true, program };
}
