/**
 * Helpers shared by several analyzers.
 */

import type { ScopeTracker } from '../core/scope';
import type { Severity } from '../types';

/** Severity growing with how far a measured value exceeds its threshold. */
export function severityForExcess(excess: number, high: number, medium: number): Severity {
  if (excess >= high) return 'high';
  if (excess >= medium) return 'medium';
  return 'low';
}

/** Controllers by location or by naming convention. */
export function isControllerFile(file: string): boolean {
  return file.includes('Http/Controllers/') || file.endsWith('Controller.php');
}

export function isInController(scope: ScopeTracker, file: string): boolean {
  const className = scope.currentClassName();
  if (!className) return false;
  return className.endsWith('Controller') || isControllerFile(file);
}

export function isRouteFile(file: string): boolean {
  return file.startsWith('routes/') || file.includes('/routes/');
}
