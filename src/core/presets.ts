import { RuleSettings } from './rule-tuning';

export type PresetName = 'strict' | 'balanced' | 'legacy';

const PRESET_RULE_SETTINGS: Record<PresetName, RuleSettings> = {
  strict: {},
  balanced: {
    'select-asterisk': { enabled: false },
    'environment-check-smell': { severity: 'low' },
    'missing-model-scope': { enabled: false },
    'query-builder-in-controller': { severity: 'low' },
  },
  legacy: {
    'select-asterisk': { enabled: false },
    'missing-model-scope': { enabled: false },
    'facade-usage': { enabled: false },
    'helper-function-abuse': { enabled: false },
    'fat-model': { severity: 'low' },
    'mvc-structure-violation': { severity: 'medium' },
    'eloquent-n-plus-one': { severity: 'medium' },
    'missing-database-transactions': { severity: 'low' },
  },
};

export function isPresetName(value: string): value is PresetName {
  return value === 'strict' || value === 'balanced' || value === 'legacy';
}

export function resolvePresetRuleSettings(preset?: PresetName): RuleSettings {
  if (!preset) return {};
  return PRESET_RULE_SETTINGS[preset] ?? {};
}

export function mergePresetAndCustomRuleSettings(
  preset: PresetName | undefined,
  custom: RuleSettings | undefined,
): RuleSettings | undefined {
  const base = resolvePresetRuleSettings(preset);
  const hasBase = Object.keys(base).length > 0;

  if (!custom || Object.keys(custom).length === 0) return hasBase ? base : undefined;
  if (!hasBase) return custom;

  const merged: RuleSettings = { ...base };
  for (const [ruleId, customSetting] of Object.entries(custom)) {
    const baseSetting = merged[ruleId] ?? {};
    merged[ruleId] = {
      ...baseSetting,
      ...customSetting,
      ignorePaths: customSetting.ignorePaths !== undefined ? customSetting.ignorePaths : baseSetting.ignorePaths,
    };
  }

  return merged;
}
