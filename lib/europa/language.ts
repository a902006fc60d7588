export const FALLBACK_LANGUAGE = 'int';
export const DEFAULT_LANGUAGE = 'en';

export type LanguagePreference = readonly string[];

export interface LocalizedItem {
  lang: string | null | undefined;
  label: string | null | undefined;
}

/**
 * Ordered preference list: the requested language, then English, then `int`.
 * Duplicates keep their first position.
 */
export function buildLanguagePreference(preferred?: string | null): LanguagePreference {
  const ordered: string[] = [];
  for (const candidate of [preferred ?? '', DEFAULT_LANGUAGE, FALLBACK_LANGUAGE]) {
    const code = candidate.trim().toLowerCase();
    if (code && !ordered.includes(code)) {
      ordered.push(code);
    }
  }
  return ordered;
}

export function collectLocalizedItems(items: Iterable<LocalizedItem>): Map<string, string> {
  const collected = new Map<string, string>();
  for (const item of items) {
    const lang = item.lang?.trim();
    const label = item.label?.trim();
    if (lang && label) {
      collected.set(lang, label);
    }
  }
  return collected;
}

export function pickLocalized(candidates: ReadonlyMap<string, string>, preference: LanguagePreference): string | null;
export function pickLocalized<T>(
  candidates: ReadonlyMap<string, string>,
  preference: LanguagePreference,
  fallback: T
): string | T;
export function pickLocalized<T>(
  candidates: ReadonlyMap<string, string>,
  preference: LanguagePreference,
  fallback: T | null = null
): string | T | null {
  for (const lang of preference) {
    const value = candidates.get(lang);
    if (value) return value;
  }
  return fallback;
}

/**
 * Rank of a language within the preference list: the first preferred language
 * gets the highest value, anything unlisted gets -1.
 */
export function rankLanguages(preference: LanguagePreference): (lang: string | null | undefined) => number {
  const reversed = [...preference].reverse();
  return (lang) => (lang ? reversed.indexOf(lang) : -1);
}
