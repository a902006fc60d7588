import type { Dispatcher } from 'undici';
import { EuropaClient } from './client';
import { UnsupportedUrlError } from './errors';
import { EcAvServicesExtractor } from './extractors/ec-avservices';
import { EuroparlWebstreamExtractor } from './extractors/europarl-webstream';
import type { ExtractorContext, MediaExtractor } from './extractors/base';
import { HlsManifestExpander } from './hls';
import type { ManifestExpander } from './hls';
import type { EuropaConfig, Logger, MediaRecord } from './types';

const extractors: MediaExtractor[] = [new EcAvServicesExtractor(), new EuroparlWebstreamExtractor()];

export interface CreateContextOptions {
  dispatcher?: Dispatcher;
  logger?: Logger;
  manifests?: ManifestExpander;
}

export function createContext(config: EuropaConfig, options: CreateContextOptions = {}): ExtractorContext {
  const client = new EuropaClient({ userAgent: config.userAgent, dispatcher: options.dispatcher });
  return {
    client,
    config,
    manifests: options.manifests ?? new HlsManifestExpander(client),
    logger: options.logger ?? console
  };
}

export function findExtractor(url: string): MediaExtractor | null {
  return extractors.find((extractor) => extractor.supports(url)) ?? null;
}

export function getSupportedExtractorKeys(): string[] {
  return extractors.map((extractor) => extractor.key);
}

export async function extractFromUrl(url: string, ctx: ExtractorContext): Promise<MediaRecord> {
  const extractor = findExtractor(url);
  if (!extractor) {
    throw new UnsupportedUrlError(`No extractor supports ${url}`, { url });
  }
  return extractor.extract(url, ctx);
}
