/**
 * English pluralization and the framework's default table naming
 * (`snake(pluralStudly(ClassName))`).
 */

import inflections from '../data/inflections.json';

const IRREGULAR: Record<string, string> = inflections.irregular;
const UNCOUNTABLE = new Set<string>(inflections.uncountable);

function matchCase(value: string, model: string): string {
  if (model === model.toUpperCase() && model !== model.toLowerCase()) return value.toUpperCase();
  if (model[0] === model[0]?.toUpperCase()) return value.charAt(0).toUpperCase() + value.slice(1);
  return value;
}

export function pluralize(word: string): string {
  if (word.length === 0) return word;
  const lower = word.toLowerCase();

  if (UNCOUNTABLE.has(lower)) return word;
  const irregular = IRREGULAR[lower];
  if (irregular) return matchCase(irregular, word);

  let plural: string;
  if (/[^aeiou]y$/.test(lower)) {
    plural = `${lower.slice(0, -1)}ies`;
  } else if (/(s|x|z|ch|sh)$/.test(lower)) {
    plural = `${lower}es`;
  } else {
    plural = `${lower}s`;
  }
  return matchCase(plural, word);
}

/** `UserProfile` -> `UserProfiles`: only the last studly word is pluralized. */
export function pluralStudly(value: string): string {
  let boundary = 0;
  for (let i = value.length - 1; i > 0; i--) {
    const char = value[i];
    if (char !== char.toLowerCase() && char === char.toUpperCase()) {
      boundary = i;
      break;
    }
  }
  return value.slice(0, boundary) + pluralize(value.slice(boundary));
}

export function snakeCase(value: string): string {
  if (value === value.toLowerCase()) return value;
  return value.replace(/\s+/g, '').replace(/(.)(?=[A-Z])/g, '$1_').toLowerCase();
}

/** Default table name for a model class short name. */
export function defaultTableName(classShortName: string): string {
  return snakeCase(pluralStudly(classShortName));
}
