/**
 * Config Outside Config Analyzer
 *
 * Flags string literals outside `config/` that look like configuration:
 * service URLs, long keys, and anything matching a configured pattern.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { startLine, stringLiteral, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';

const META: AnalyzerMeta = {
  id: 'config-outside-config',
  name: 'Config Outside Config Analyzer',
  description: 'Detects hardcoded URLs, keys and other configuration values outside config files',
  category: 'best-practices',
  severity: 'medium',
  tags: ['laravel', 'configuration', 'maintainability', 'testability'],
};

const URL_PATTERN = /^https?:\/\//;
const SECRET_PATTERN = /^[A-Za-z0-9]{31,}$/;
const ALLOWED_HOSTS = ['example.com', 'localhost', 'laravel.com', 'github.com', 'stackoverflow.com'];

interface ExtraPattern {
  pattern: RegExp;
  description: string;
}

function preview(value: string): string {
  return value.length > 50 ? value.slice(0, 50) : value;
}

class ConfigHardcodeVisitor implements NodeVisitor {
  constructor(
    private readonly context: FileContext,
    private readonly extraPatterns: ExtraPattern[],
  ) {}

  enterNode(node: PhpNode): void {
    const value = stringLiteral(node);
    if (value === null || value === '') return;
    const line = startLine(node);

    if (URL_PATTERN.test(value) && !ALLOWED_HOSTS.some((host) => value.includes(host))) {
      this.context.report({
        severity: 'medium',
        line,
        message: `Hardcoded URL: "${preview(value)}"`,
        recommendation: "Move URLs to a config file (e.g. config/services.php) and read them with config('services.api.url').",
        metadata: { value: preview(value), kind: 'url' },
      });
    }

    if (SECRET_PATTERN.test(value)) {
      this.context.report({
        severity: 'high',
        line,
        message: 'Possible hardcoded API key or secret detected',
        recommendation:
          "Never hardcode API keys in source code. Read them from environment variables through config files: config('services.api.key').",
        metadata: { length: value.length, kind: 'secret' },
      });
    }

    for (const { pattern, description } of this.extraPatterns) {
      if (!pattern.test(value)) continue;
      this.context.report({
        line,
        message: `${description}: "${preview(value)}"`,
        recommendation: 'Move this value into a config file and read it with config().',
        metadata: { value: preview(value), kind: 'pattern', pattern: pattern.source },
      });
    }
  }
}

export class ConfigOutsideConfigAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly extraPatterns: ExtraPattern[];

  constructor(options: AnalyzerOptions = {}) {
    this.extraPatterns = new OptionReader(META.id, options).patterns('additional_patterns');
  }

  appliesTo(file: string): boolean {
    return !file.startsWith('config/') && !file.includes('/config/');
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new ConfigHardcodeVisitor(context, this.extraPatterns);
  }
}

export const configOutsideConfig: AnalyzerDefinition = {
  meta: META,
  create: (options) => new ConfigOutsideConfigAnalyzer(options),
};
