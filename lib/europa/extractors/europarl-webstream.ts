import { ManifestError, MissingFieldError } from '../errors';
import type { ManifestExpander } from '../hls';
import { buildLanguagePreference, collectLocalizedItems, pickLocalized, rankLanguages } from '../language';
import type { LanguagePreference } from '../language';
import { extractPageProps } from '../next-data';
import { MeetingRecordSchema } from '../schemas';
import type { MeetingRecord } from '../schemas';
import {
  durationBetween,
  formatUtcSeconds,
  parseTimestamp,
  toEpochSeconds,
  toUtcDateString
} from '../temporal';
import type { TimestampResult } from '../temporal';
import { mergeSubtitles } from '../subtitles';
import type { ExpandedManifest, FormatEntry, Logger, MediaRecord, SubtitleMap } from '../types';
import { matchId, readSiteLanguage } from './base';
import type { ExtractorContext, MediaExtractor } from './base';

const VALID_URL = /^https?:\/\/multimedia\.europarl\.europa\.eu\/[^/#?]+\/(?!video)[^/#?]+\/[\w-]+_(?<id>[\w-]+)/;

const LIVE_SUBTYPE = 'Live';

/**
 * Maps the track identifiers the manifests use onto the languages listed in
 * the meeting record.
 */
export function trackLanguageResolver(audio: MeetingRecord['audio']): (trackIdentifier: string | null) => string | null {
  return (trackIdentifier) => {
    if (trackIdentifier === null) return null;
    const track = audio.find((entry) => entry.trackIdentifier === trackIdentifier);
    return track?.language ?? null;
  };
}

export function withTimeWindow(hlsUrl: string, start: TimestampResult, end: TimestampResult): string {
  let url: URL;
  try {
    url = new URL(hlsUrl);
  } catch (error) {
    throw new ManifestError(`Invalid manifest URL ${hlsUrl}`, { url: hlsUrl, cause: error });
  }
  const startParam = formatUtcSeconds(start);
  const endParam = formatUtcSeconds(end);
  if (startParam && endParam) {
    url.searchParams.set('start', startParam);
    url.searchParams.set('end', endParam);
  }
  return url.toString();
}

export interface AssembleOptions {
  meeting: Pick<MeetingRecord, 'videos' | 'audio'>;
  start: TimestampResult;
  end: TimestampResult;
  preference: LanguagePreference;
  manifests: ManifestExpander;
  videoId: string;
}

export async function assembleStreams({
  meeting,
  start,
  end,
  preference,
  manifests,
  videoId
}: AssembleOptions): Promise<ExpandedManifest> {
  const languageOf = trackLanguageResolver(meeting.audio);
  const languagePreference = rankLanguages(preference);
  const formats: FormatEntry[] = [];
  const subtitles: SubtitleMap = {};

  for (const video of meeting.videos) {
    if (!video.hlsUrl) continue;
    const expanded = await manifests.expand(withTimeWindow(video.hlsUrl, start, end), videoId);
    for (const format of expanded.formats) {
      const language = languageOf(format.language);
      formats.push({ ...format, language, languagePreference: languagePreference(language) });
    }
    mergeSubtitles(subtitles, expanded.subtitles);
  }

  return { formats, subtitles };
}

function warnOnAbsent(logger: Logger, videoId: string, field: string, result: TimestampResult) {
  if (result.kind === 'absent' && result.input !== null) {
    logger.warn({ status: 'warning', id: videoId, field, message: `Could not parse ${field} "${result.input}"` });
  }
}

export class EuroparlWebstreamExtractor implements MediaExtractor {
  readonly key = 'europarl-webstream';

  supports(url: string): boolean {
    return VALID_URL.test(url);
  }

  async extract(url: string, ctx: ExtractorContext): Promise<MediaRecord> {
    const displayId = matchId(VALID_URL, url, this.key);
    const preference = buildLanguagePreference(readSiteLanguage(url) ?? ctx.config.defaultLanguage);

    const html = await ctx.client.fetchText(url);
    const pageProps = extractPageProps(html, url);

    const meeting = await ctx.client.fetchJson(ctx.config.meetingApiUrl, MeetingRecordSchema, {
      'api-version': ctx.config.apiVersion,
      tenantId: ctx.config.tenantId,
      externalReference: displayId
    });
    if (!meeting.id) {
      throw new MissingFieldError(`Meeting record for ${displayId} has no id`, { field: 'id', url });
    }

    const start = parseTimestamp(meeting.startDateTime);
    const end = parseTimestamp(meeting.endDateTime);
    const duration = durationBetween(start, end);
    warnOnAbsent(ctx.logger, displayId, 'startDateTime', start);
    warnOnAbsent(ctx.logger, displayId, 'endDateTime', end);

    const { formats, subtitles } = await assembleStreams({
      meeting,
      start,
      end,
      preference,
      manifests: ctx.manifests,
      videoId: displayId
    });

    ctx.logger.log({ status: 'parsed', extractor: this.key, id: meeting.id, formats: formats.length });

    return {
      id: meeting.id,
      displayId,
      extractor: this.key,
      webpageUrl: url,
      title:
        pageProps.mediaItem?.title ??
        pageProps.title ??
        pickLocalized(collectLocalizedItems(meeting.titles), preference, displayId),
      description: null,
      thumbnail: null,
      uploadDate: null,
      releaseTimestamp: toEpochSeconds(start),
      releaseDate: toUtcDateString(start),
      duration: duration !== null && duration >= 0 ? duration : null,
      viewCount: null,
      isLive: pageProps.mediaItem?.mediaSubType === LIVE_SUBTYPE,
      formats,
      subtitles
    };
  }
}
