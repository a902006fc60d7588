import type { EuropaClient } from './client';
import { ManifestError, describeError } from './errors';
import type { ExpandedManifest, FormatEntry, SubtitleEntry } from './types';

export interface ManifestExpander {
  expand(manifestUrl: string, videoId: string): Promise<ExpandedManifest>;
}

type Attributes = Record<string, string>;

const ATTRIBUTE_PATTERN = /([A-Z0-9-]+)=("[^"]*"|[^,]*)/g;

export function parseAttributes(line: string): Attributes {
  const attrs: Attributes = {};
  const attrString = line.slice(line.indexOf(':') + 1);
  let match: RegExpExecArray | null;
  ATTRIBUTE_PATTERN.lastIndex = 0;
  while ((match = ATTRIBUTE_PATTERN.exec(attrString)) !== null) {
    attrs[match[1]] = match[2].replace(/^"/, '').replace(/"$/, '');
  }
  return attrs;
}

function resolveUri(uri: string, base: string): string {
  return new URL(uri, base).toString();
}

function sanitizeId(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]+/g, '_');
}

function emptyFormat(url: string): FormatEntry {
  return {
    url,
    formatId: null,
    formatNote: null,
    language: null,
    languagePreference: -1,
    protocol: 'm3u8_native',
    ext: 'mp4',
    tbr: null,
    width: null,
    height: null,
    vcodec: null,
    acodec: null
  };
}

function splitCodecs(codecs: string | undefined): { vcodec: string | null; acodec: string | null } {
  if (!codecs) return { vcodec: null, acodec: null };
  let vcodec: string | null = null;
  let acodec: string | null = null;
  for (const codec of codecs.split(',').map((value) => value.trim())) {
    if (/^(avc|hvc|hev|vp0?9|av01)/i.test(codec)) {
      vcodec = vcodec ?? codec;
    } else if (/^(mp4a|ac-3|ec-3|opus)/i.test(codec)) {
      acodec = acodec ?? codec;
    }
  }
  if (vcodec && !acodec) acodec = 'none';
  return { vcodec, acodec };
}

/**
 * Turns an HLS playlist into format entries and subtitle tracks. A media
 * playlist becomes a single format pointing at the playlist itself.
 */
export function parseHlsManifest(manifest: string, manifestUrl: string): ExpandedManifest {
  const lines = manifest
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines[0] !== '#EXTM3U') {
    throw new ManifestError(`${manifestUrl} is not an HLS playlist`, { url: manifestUrl });
  }

  const formats: FormatEntry[] = [];
  const subtitles: Record<string, SubtitleEntry[]> = {};
  let isMediaPlaylist = false;

  for (let i = 1; i < lines.length; i += 1) {
    const line = lines[i];
    if (line.startsWith('#EXTINF')) {
      isMediaPlaylist = true;
    } else if (line.startsWith('#EXT-X-MEDIA:')) {
      const attrs = parseAttributes(line);
      if (!attrs.URI) continue;
      const uri = resolveUri(attrs.URI, manifestUrl);
      if (attrs.TYPE === 'SUBTITLES') {
        const language = attrs.LANGUAGE || attrs.NAME || 'und';
        (subtitles[language] ??= []).push({ url: uri, ext: 'vtt', name: attrs.NAME ?? null });
      } else if (attrs.TYPE === 'AUDIO') {
        formats.push({
          ...emptyFormat(uri),
          formatId: sanitizeId(['audio', attrs['GROUP-ID'], attrs.NAME].filter(Boolean).join('-')),
          formatNote: attrs.NAME ?? null,
          language: attrs.LANGUAGE ?? null,
          vcodec: 'none'
        });
      }
    } else if (line.startsWith('#EXT-X-STREAM-INF:')) {
      const attrs = parseAttributes(line);
      const uriLine = lines.slice(i + 1).find((candidate) => !candidate.startsWith('#'));
      if (!uriLine) {
        throw new ManifestError(`Variant without URI in ${manifestUrl}`, { url: manifestUrl });
      }
      i = lines.indexOf(uriLine, i + 1);
      const bandwidth = Number(attrs['AVERAGE-BANDWIDTH'] ?? attrs.BANDWIDTH);
      const tbr = Number.isFinite(bandwidth) && bandwidth > 0 ? bandwidth / 1000 : null;
      const resolution = attrs.RESOLUTION?.match(/^(\d+)x(\d+)$/);
      formats.push({
        ...emptyFormat(resolveUri(uriLine, manifestUrl)),
        formatId: tbr === null ? `hls-${formats.length}` : `hls-${Math.round(tbr)}`,
        tbr,
        width: resolution ? Number(resolution[1]) : null,
        height: resolution ? Number(resolution[2]) : null,
        ...splitCodecs(attrs.CODECS)
      });
    }
  }

  if (formats.length === 0 && isMediaPlaylist) {
    formats.push({ ...emptyFormat(manifestUrl), formatId: 'hls' });
  }

  return { formats, subtitles };
}

export class HlsManifestExpander implements ManifestExpander {
  constructor(private readonly client: EuropaClient) {}

  async expand(manifestUrl: string, videoId: string): Promise<ExpandedManifest> {
    let body: string;
    try {
      body = await this.client.fetchText(manifestUrl, undefined, 'application/vnd.apple.mpegurl,*/*');
    } catch (error) {
      throw new ManifestError(`Could not download manifest for ${videoId}: ${describeError(error)}`, {
        url: manifestUrl,
        cause: error
      });
    }
    return parseHlsManifest(body, manifestUrl);
  }
}
