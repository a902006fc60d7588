import type { SubtitleMap } from './types';

/**
 * Adds every entry of `source` to `target`, keyed by language. Entries already
 * collected stay in place; a URL is only listed once per language.
 */
export function mergeSubtitles(target: SubtitleMap, source: SubtitleMap): SubtitleMap {
  for (const [language, entries] of Object.entries(source)) {
    const existing = target[language] ?? [];
    const seen = new Set(existing.map((entry) => entry.url));
    for (const entry of entries) {
      if (seen.has(entry.url)) continue;
      seen.add(entry.url);
      existing.push(entry);
    }
    target[language] = existing;
  }
  return target;
}
