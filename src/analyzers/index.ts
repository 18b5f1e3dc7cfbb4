import type { Analyzer } from '../core/analyzer';
import { AnalyzerRegistry, type AnalyzerDefinition } from '../core/analyzer-registry';
import type { LintFileConfig } from '../core/config';
import { mergePresetAndCustomRuleSettings } from '../core/presets';
import { chunkMissing } from './best-practices/chunk-missing';
import { configOutsideConfig } from './best-practices/config-outside-config';
import { eloquentNPlusOne } from './best-practices/eloquent-n-plus-one';
import { environmentCheckSmell } from './best-practices/environment-check-smell';
import { facadeUsage } from './best-practices/facade-usage';
import { fatModel } from './best-practices/fat-model';
import { frameworkOverride } from './best-practices/framework-override';
import { genericExceptionCatch } from './best-practices/generic-exception-catch';
import { hardcodedStoragePaths } from './best-practices/hardcoded-storage-paths';
import { helperFunctionAbuse } from './best-practices/helper-function-abuse';
import { logicInBlade } from './best-practices/logic-in-blade';
import { logicInRoutes } from './best-practices/logic-in-routes';
import { missingDatabaseTransactions } from './best-practices/missing-database-transactions';
import { missingErrorTracking } from './best-practices/missing-error-tracking';
import { missingModelScope } from './best-practices/missing-model-scope';
import { mixedQueryBuilderEloquent } from './best-practices/mixed-query-builder-eloquent';
import { mvcStructureViolation } from './best-practices/mvc-structure-violation';
import { phpSideFiltering } from './best-practices/php-side-filtering';
import { queryBuilderInController } from './best-practices/query-builder-in-controller';
import { rawEloquentAvoidance } from './best-practices/raw-eloquent-avoidance';
import { selectAsterisk } from './best-practices/select-asterisk';
import { serviceContainerResolution } from './best-practices/service-container-resolution';
import { silentFailure } from './best-practices/silent-failure';
import { massAssignment } from './security/mass-assignment';
import { sqlInjection } from './security/sql-injection';

export const BUILTIN_ANALYZERS: readonly AnalyzerDefinition[] = [
  chunkMissing,
  configOutsideConfig,
  eloquentNPlusOne,
  environmentCheckSmell,
  facadeUsage,
  fatModel,
  frameworkOverride,
  genericExceptionCatch,
  hardcodedStoragePaths,
  helperFunctionAbuse,
  logicInBlade,
  logicInRoutes,
  missingDatabaseTransactions,
  missingErrorTracking,
  missingModelScope,
  mixedQueryBuilderEloquent,
  mvcStructureViolation,
  phpSideFiltering,
  queryBuilderInController,
  rawEloquentAvoidance,
  selectAsterisk,
  serviceContainerResolution,
  silentFailure,
  massAssignment,
  sqlInjection,
];

export function createDefaultRegistry(): AnalyzerRegistry {
  const registry = new AnalyzerRegistry();
  registry.registerAll([...BUILTIN_ANALYZERS]);
  return registry;
}

/**
 * Builds the enabled analyzers for a configuration. Preset rule settings are
 * merged under explicit ones; `AnalyzerOptionError` propagates.
 */
export function createAnalyzers(
  config: Pick<LintFileConfig, 'only' | 'skip' | 'preset' | 'ruleSettings' | 'analyzers'> = {},
  registry: AnalyzerRegistry = createDefaultRegistry(),
): Analyzer[] {
  return registry.create({
    only: config.only,
    skip: config.skip,
    ruleSettings: mergePresetAndCustomRuleSettings(config.preset, config.ruleSettings),
    options: config.analyzers,
  });
}
