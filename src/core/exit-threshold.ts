import { AnalysisResult, Severity } from '../types';
import { SEVERITY_ORDER } from './summary';

export type ExitThreshold = 'none' | Severity;

export function isExitThreshold(value: string): value is ExitThreshold {
  return value === 'none' || value === 'critical' || value === 'high' || value === 'medium' || value === 'low';
}

export function normalizeExitThreshold(raw?: string): ExitThreshold {
  if (!raw) return 'high';
  const value = raw.toLowerCase();
  return isExitThreshold(value) ? value : 'high';
}

export function shouldFailForThreshold(result: AnalysisResult, threshold: ExitThreshold): boolean {
  if (threshold === 'none') return false;
  const minLevel = SEVERITY_ORDER[threshold];

  if (result.summary.critical > 0 && SEVERITY_ORDER.critical >= minLevel) return true;
  if (result.summary.high > 0 && SEVERITY_ORDER.high >= minLevel) return true;
  if (result.summary.medium > 0 && SEVERITY_ORDER.medium >= minLevel) return true;
  if (result.summary.low > 0 && SEVERITY_ORDER.low >= minLevel) return true;
  return false;
}
