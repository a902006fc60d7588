import type { EuropaClient } from '../client';
import { UnsupportedUrlError } from '../errors';
import type { ManifestExpander } from '../hls';
import type { EuropaConfig, Logger, MediaRecord } from '../types';

export interface ExtractorContext {
  client: EuropaClient;
  manifests: ManifestExpander;
  config: EuropaConfig;
  logger: Logger;
}

export interface MediaExtractor {
  readonly key: string;
  supports(url: string): boolean;
  extract(url: string, ctx: ExtractorContext): Promise<MediaRecord>;
}

export function matchId(pattern: RegExp, url: string, extractor: string): string {
  const id = url.match(pattern)?.groups?.id;
  if (!id) {
    throw new UnsupportedUrlError(`${extractor} cannot handle ${url}`, { url });
  }
  return id;
}

export function readSiteLanguage(url: string): string | null {
  try {
    return new URL(url).searchParams.get('sitelang')?.trim() || null;
  } catch {
    return null;
  }
}
