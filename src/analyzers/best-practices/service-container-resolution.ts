/**
 * Service Container Resolution Analyzer
 *
 * Service-locator calls inside classes: `app()->make()`, `App::make()`,
 * `resolve()`, `app('service')`, `Container::getInstance()->make()`, and
 * container bindings made outside a service provider. Classes the framework
 * builds without constructor injection (commands, jobs, listeners and the
 * like) are skipped, as are closures.
 */

import type { Analyzer, AnalyzerMeta, FileContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { CONTAINER_SERVICE_ALIASES, CONTAINER_UTILITY_METHODS, isFacade } from '../../core/laravel';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { asFunctionCall, asMethodCall, asStaticCall } from '../../core/php/chains';
import { shortName } from '../../core/php/names';
import { child, identifierName, startLine, stringLiteral, type PhpNode } from '../../core/php/nodes';
import type { NodeVisitor } from '../../core/php/traverse';
import type { Severity } from '../../types';

const META: AnalyzerMeta = {
  id: 'service-container-resolution',
  name: 'Service Container Resolution Analyzer',
  description: 'Detects manual service container resolution that should use dependency injection',
  category: 'best-practices',
  severity: 'medium',
  tags: ['dependency-injection', 'architecture', 'testability', 'laravel', 'ioc'],
};

type ArgumentType = 'class' | 'string' | 'variable' | 'none' | 'unknown' | 'binding' | 'instantiation';

const BINDING_METHODS = new Set(['bind', 'singleton', 'instance', 'scoped']);

const DEFAULT_WHITELIST_DIRS = ['tests', 'database/migrations', 'database/seeders', 'database/factories', 'routes'];
const DEFAULT_WHITELIST_CLASSES = [
  '*Command', '*Seeder', 'DatabaseSeeder', '*Job', '*Listener', '*Middleware', '*Observer', '*Factory', '*Handler',
];

interface ContainerOptions {
  whitelistDirs: string[];
  whitelistClasses: RegExp[];
  whitelistMethods: Set<string>;
  whitelistServices: Set<string>;
  resolutionMethods: Set<string>;
  detectManualInstantiation: boolean;
  manualInstantiationPatterns: RegExp[];
}

/** `*` stays within a namespace segment, `**` crosses segments. */
function classPattern(pattern: string): RegExp {
  const source = pattern
    .split('**')
    .map((part) =>
      part
        .split('*')
        .map((literal) => literal.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('[^\\\\]*'),
    )
    .join('.*');
  return new RegExp(`^${source}$`, 'i');
}

function argumentType(args: PhpNode[]): ArgumentType {
  const first = args[0];
  if (!first) return 'none';
  if (first.kind === 'staticlookup' && identifierName(first.offset) === 'class') return 'class';
  if (stringLiteral(first) !== null) return 'string';
  if (first.kind === 'variable') return 'variable';
  return 'unknown';
}

function severityFor(type: ArgumentType): Severity {
  if (type === 'string' || type === 'binding') return 'high';
  if (type === 'instantiation') return 'low';
  return 'medium';
}

function recommendationFor(pattern: string, location: string): string {
  const base = `Manual service container resolution detected using '${pattern}' in '${location}'. `;
  if (pattern.startsWith('new ')) {
    return `${base}Let the container build this dependency through constructor injection instead of instantiating it by hand.`;
  }
  if ([...BINDING_METHODS].some((method) => pattern.includes(`->${method}(`))) {
    return `${base}Container bindings belong in a service provider's register() method, for example $this->app->bind(Contract::class, Implementation::class).`;
  }
  return (
    `${base}Manual resolution is a service locator that hides dependencies and makes testing difficult. ` +
    'Declare the dependency in the constructor, or type-hint it on the controller method so it is injected.'
  );
}

class ServiceContainerVisitor implements NodeVisitor {
  private readonly seen = new Set<string>();

  constructor(
    private readonly context: FileContext,
    private readonly options: ContainerOptions,
  ) {}

  enterNode(node: PhpNode): void {
    const { scope } = this.context;
    const className = scope.currentClassName();
    if (!className || scope.isInsideClosure() || this.isWhitelistedClass(className)) return;
    // Providers are where container bindings belong.
    if ([className, ...scope.currentClassChain()].some((name) => name.endsWith('ServiceProvider'))) return;

    if (node.kind === 'new') {
      this.checkInstantiation(node);
      return;
    }
    if (node.kind !== 'call') return;

    const fn = asFunctionCall(node);
    if (fn) {
      if (fn.name === 'resolve') this.add(node, 'resolve()', argumentType(fn.args));
      else if (fn.name === 'app' && fn.args.length > 0) {
        const service = stringLiteral(fn.args[0]);
        if (service === null || !this.options.whitelistServices.has(service)) {
          this.add(node, 'app()', argumentType(fn.args));
        }
      }
      return;
    }

    const staticCall = asStaticCall(node);
    if (staticCall) {
      const target = scope.classReference(staticCall.classNode);
      if (target && isFacade(target, 'App') && this.options.resolutionMethods.has(staticCall.method)) {
        this.add(node, `App::${staticCall.method}()`, argumentType(staticCall.args));
      }
      return;
    }

    const methodCall = asMethodCall(node);
    if (!methodCall) return;
    const { receiver, method, args } = methodCall;
    if (asFunctionCall(receiver)?.name === 'app') {
      if (this.options.whitelistMethods.has(method)) return;
      if (this.options.resolutionMethods.has(method)) this.add(node, `app()->${method}()`, argumentType(args));
      else if (BINDING_METHODS.has(method)) this.add(node, `app()->${method}()`, 'binding');
      return;
    }
    const container = asStaticCall(receiver);
    if (container?.method === 'getInstance' && this.options.resolutionMethods.has(method)) {
      const target = scope.classReference(container.classNode);
      if (target?.includes('Container')) this.add(node, `Container::getInstance()->${method}()`, argumentType(args));
    }
  }

  private checkInstantiation(node: PhpNode): void {
    if (!this.options.detectManualInstantiation) return;
    const target = this.context.scope.classReference(child(node, 'what'));
    if (!target) return;
    const short = shortName(target);
    if (this.options.manualInstantiationPatterns.some((pattern) => pattern.test(short) || pattern.test(target))) {
      this.add(node, `new ${short}()`, 'instantiation');
    }
  }

  private isWhitelistedClass(className: string): boolean {
    const qualified = this.context.scope.currentQualifiedClassName();
    return this.options.whitelistClasses.some(
      (pattern) => pattern.test(className) || (qualified !== null && pattern.test(qualified)),
    );
  }

  private add(node: PhpNode, pattern: string, type: ArgumentType): void {
    const line = startLine(node);
    const key = `${line}:${pattern}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);

    const { scope } = this.context;
    const className = scope.currentClassName() ?? 'Unknown';
    const method = scope.currentMethodName();
    const location = method ? `${className}::${method}` : className;
    this.context.report({
      severity: severityFor(type),
      line,
      message: `Manual service resolution in '${location}': ${pattern}`,
      recommendation: recommendationFor(pattern, location),
      metadata: { pattern, location, class: className, argument_type: type },
    });
  }
}

export class ServiceContainerResolutionAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly options: ContainerOptions;

  constructor(options: AnalyzerOptions = {}) {
    const reader = new OptionReader(META.id, options);
    const resolutionMethods = ['make', 'makeWith', 'resolve'];
    if (reader.boolean('detect_psr_get', false)) resolutionMethods.push('get');
    this.options = {
      whitelistDirs: reader.stringList('whitelist_dirs', DEFAULT_WHITELIST_DIRS),
      whitelistClasses: reader.stringList('whitelist_classes', DEFAULT_WHITELIST_CLASSES).map(classPattern),
      whitelistMethods: new Set(reader.stringList('whitelist_methods', [...CONTAINER_UTILITY_METHODS])),
      whitelistServices: new Set(reader.stringList('whitelist_services', [...CONTAINER_SERVICE_ALIASES])),
      resolutionMethods: new Set(resolutionMethods),
      detectManualInstantiation: reader.boolean('detect_manual_instantiation', false),
      manualInstantiationPatterns: reader
        .stringList('manual_instantiation_patterns', ['*Service', '*Repository', '*Handler'])
        .map(classPattern),
    };
  }

  appliesTo(file: string): boolean {
    if (file.endsWith('ServiceProvider.php')) return false;
    return !this.options.whitelistDirs.some((dir) => file.startsWith(`${dir}/`) || file.includes(`/${dir}/`));
  }

  createVisitor(context: FileContext): NodeVisitor {
    return new ServiceContainerVisitor(context, this.options);
  }
}

export const serviceContainerResolution: AnalyzerDefinition = {
  meta: META,
  create: (options) => new ServiceContainerResolutionAnalyzer(options),
};
