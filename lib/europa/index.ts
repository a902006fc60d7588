export { EuropaClient } from './client';
export { DEFAULT_CONFIG, loadConfig } from './config';
export {
  ExtractionError,
  ManifestError,
  MissingFieldError,
  RetrievalError,
  UnsupportedUrlError,
  describeError,
  isExtractionError
} from './errors';
export type { ExtractorContext, MediaExtractor } from './extractors/base';
export { HlsManifestExpander, parseHlsManifest } from './hls';
export type { ManifestExpander } from './hls';
export { buildLanguagePreference, pickLocalized, rankLanguages } from './language';
export { createContext, extractFromUrl, findExtractor, getSupportedExtractorKeys } from './registry';
export type { EuropaConfig, FormatEntry, Logger, MediaRecord, SubtitleEntry, SubtitleMap } from './types';
