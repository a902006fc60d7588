import { describe, expect, it } from 'vitest';
import { mergeSubtitles } from '../lib/europa/subtitles';
import type { SubtitleMap } from '../lib/europa/types';

describe('mergeSubtitles', () => {
  it('adds new languages and keeps entries already collected', () => {
    const target: SubtitleMap = {
      en: [{ url: 'https://cdn.example.org/en-1.vtt', ext: 'vtt', name: 'English' }]
    };
    mergeSubtitles(target, {
      en: [
        { url: 'https://cdn.example.org/en-2.vtt', ext: 'vtt', name: 'English (alt)' },
        { url: 'https://cdn.example.org/en-1.vtt', ext: 'vtt', name: 'English again' }
      ],
      fr: [{ url: 'https://cdn.example.org/fr.vtt', ext: 'vtt', name: null }]
    });

    expect(target).toEqual({
      en: [
        { url: 'https://cdn.example.org/en-1.vtt', ext: 'vtt', name: 'English' },
        { url: 'https://cdn.example.org/en-2.vtt', ext: 'vtt', name: 'English (alt)' }
      ],
      fr: [{ url: 'https://cdn.example.org/fr.vtt', ext: 'vtt', name: null }]
    });
  });

  it('leaves the target untouched when the source is empty', () => {
    const target: SubtitleMap = { en: [{ url: 'https://cdn.example.org/en.vtt', ext: 'vtt', name: null }] };
    expect(mergeSubtitles(target, {})).toEqual({
      en: [{ url: 'https://cdn.example.org/en.vtt', ext: 'vtt', name: null }]
    });
  });
});
