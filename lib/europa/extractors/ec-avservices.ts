import { buildLanguagePreference, collectLocalizedItems, pickLocalized, rankLanguages } from '../language';
import type { LanguagePreference, LocalizedItem } from '../language';
import { parseCalendarDate, parseClockDuration } from '../temporal';
import type { FormatEntry, MediaRecord } from '../types';
import { matchId, readSiteLanguage } from './base';
import type { ExtractorContext, MediaExtractor } from './base';

const VALID_URL =
  /^https?:\/\/ec\.europa\.eu\/avservices\/(?:video\/player|audio\/audioDetails)\.cfm\?.*?\bref=(?<id>[A-Za-z0-9-]+)/;

function normalizeText(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.replace(/\s+/g, ' ').trim();
  return trimmed.length ? trimmed : null;
}

function parseCount(value: string | null): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const count = Number(value);
  return Number.isSafeInteger(count) ? count : null;
}

function extensionOf(url: string): string | null {
  try {
    return new URL(url).pathname.match(/\.([A-Za-z0-9]{2,4})$/)?.[1]?.toLowerCase() ?? null;
  } catch {
    return null;
  }
}

export class EcAvServicesExtractor implements MediaExtractor {
  readonly key = 'ec-avservices';

  supports(url: string): boolean {
    return VALID_URL.test(url);
  }

  async extract(url: string, ctx: ExtractorContext): Promise<MediaRecord> {
    const videoId = matchId(VALID_URL, url, this.key);
    const $ = await ctx.client.fetchXml(ctx.config.playlistUrl, { ID: videoId }, 'info, files');

    const preference = buildLanguagePreference(readSiteLanguage(url) ?? ctx.config.defaultLanguage);
    const languagePreference = rankLanguages(preference);

    const text = (selector: string) => normalizeText($(selector).first().text());

    const localized = (type: string, langs: LanguagePreference) => {
      const items: LocalizedItem[] = [];
      $(`info > ${type} > item`).each((_, element) => {
        const item = $(element);
        items.push({
          lang: normalizeText(item.children('lg').first().text()),
          label: item.children('label').first().text()
        });
      });
      return pickLocalized(collectLocalizedItems(items), langs);
    };

    const formats: FormatEntry[] = [];
    $('files > file').each((_, element) => {
      const file = $(element);
      const fileUrl = normalizeText(file.children('url').first().text());
      if (!fileUrl) return;
      const lang = normalizeText(file.children('lg').first().text());
      formats.push({
        url: fileUrl,
        formatId: lang,
        formatNote: normalizeText(file.children('lglabel').first().text()),
        language: lang,
        languagePreference: languagePreference(lang),
        protocol: 'https',
        ext: extensionOf(fileUrl),
        tbr: null,
        width: null,
        height: null,
        vcodec: null,
        acodec: null
      });
    });

    ctx.logger.log({ status: 'parsed', extractor: this.key, id: videoId, formats: formats.length });

    return {
      id: videoId,
      displayId: videoId,
      extractor: this.key,
      webpageUrl: url,
      title: localized('title', preference) ?? videoId,
      description: localized('description', preference),
      thumbnail: text('info > thumburl'),
      uploadDate: parseCalendarDate(text('info > date')),
      releaseTimestamp: null,
      releaseDate: null,
      duration: parseClockDuration(text('info > duration')),
      viewCount: parseCount(text('info > views')),
      isLive: null,
      formats,
      subtitles: {}
    };
  }
}
