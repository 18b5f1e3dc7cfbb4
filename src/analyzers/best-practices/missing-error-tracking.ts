/**
 * Missing Error Tracking Analyzer
 *
 * Project-level check of `composer.json` for a production error tracker.
 */

import type { Analyzer, AnalyzerMeta, ProjectContext } from '../../core/analyzer';
import type { AnalyzerDefinition } from '../../core/analyzer-registry';
import { logger } from '../../core/logger';
import { OptionReader, type AnalyzerOptions } from '../../core/options';
import { isRecord } from '../../core/php/nodes';

const META: AnalyzerMeta = {
  id: 'missing-error-tracking',
  name: 'Missing Error Tracking Analyzer',
  description: 'Checks that an error tracking service is installed for production monitoring',
  category: 'best-practices',
  severity: 'medium',
  tags: ['laravel', 'monitoring', 'production', 'error-tracking'],
};

export const ERROR_TRACKING_PACKAGES = [
  'sentry/sentry-laravel',
  'bugsnag/bugsnag-laravel',
  'rollbar/rollbar-laravel',
  'airbrake/phpbrake',
  'honeybadger-io/honeybadger-laravel',
  'spatie/laravel-flare',
  'facade/ignition',
];

function dependencyNames(composer: Record<string, unknown>): Set<string> {
  const names = new Set<string>();
  for (const section of ['require', 'require-dev']) {
    const entries = composer[section];
    if (isRecord(entries)) Object.keys(entries).forEach((name) => names.add(name.toLowerCase()));
  }
  return names;
}

export class MissingErrorTrackingAnalyzer implements Analyzer {
  readonly meta = META;
  private readonly packages: string[];

  constructor(options: AnalyzerOptions = {}) {
    const extra = new OptionReader(META.id, options).stringList('additional_packages', []);
    this.packages = [...ERROR_TRACKING_PACKAGES, ...extra].map((name) => name.toLowerCase());
  }

  analyzeProject(context: ProjectContext): void {
    const raw = context.readFile('composer.json');
    if (raw === undefined) return;

    let composer: unknown;
    try {
      composer = JSON.parse(raw);
    } catch (error) {
      logger.debug('composer.json is not valid JSON; skipping error tracking check:', error);
      return;
    }
    if (!isRecord(composer)) return;

    const installed = dependencyNames(composer);
    if (this.packages.some((name) => installed.has(name))) return;

    context.report({
      file: 'composer.json',
      line: 1,
      message: 'No error tracking service found in composer.json',
      recommendation:
        'Install an error tracking service such as Sentry (sentry/sentry-laravel), Bugsnag or Rollbar for production error monitoring. ' +
        'It gives visibility into production errors with automatic grouping.',
      metadata: { checked: this.packages },
    });
  }
}

export const missingErrorTracking: AnalyzerDefinition = {
  meta: META,
  create: (options) => new MissingErrorTrackingAnalyzer(options),
};
