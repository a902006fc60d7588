import type { Dispatcher } from 'undici';

export type FormatProtocol = 'https' | 'm3u8_native';

export interface FormatEntry {
  url: string;
  formatId: string | null;
  formatNote: string | null;
  language: string | null;
  languagePreference: number;
  protocol: FormatProtocol;
  ext: string | null;
  tbr: number | null;
  width: number | null;
  height: number | null;
  vcodec: string | null;
  acodec: string | null;
}

export interface SubtitleEntry {
  url: string;
  ext: string;
  name: string | null;
}

export type SubtitleMap = Record<string, SubtitleEntry[]>;

export interface MediaRecord {
  readonly id: string;
  readonly displayId: string;
  readonly extractor: string;
  readonly webpageUrl: string;
  readonly title: string;
  readonly description: string | null;
  readonly thumbnail: string | null;
  // YYYYMMDD
  readonly uploadDate: string | null;
  readonly releaseTimestamp: number | null;
  readonly releaseDate: string | null;
  readonly duration: number | null;
  readonly viewCount: number | null;
  readonly isLive: boolean | null;
  readonly formats: readonly FormatEntry[];
  readonly subtitles: Readonly<SubtitleMap>;
}

export interface ExpandedManifest {
  formats: FormatEntry[];
  subtitles: SubtitleMap;
}

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

export interface EuropaConfig {
  userAgent: string;
  defaultLanguage: string;
  playlistUrl: string;
  meetingApiUrl: string;
  tenantId: string;
  apiVersion: string;
}

export interface EuropaClientOptions {
  userAgent?: string;
  dispatcher?: Dispatcher;
}
