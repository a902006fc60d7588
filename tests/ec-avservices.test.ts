import fs from 'node:fs';
import path from 'node:path';
import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../lib/europa/config';
import { RetrievalError } from '../lib/europa/errors';
import { EcAvServicesExtractor } from '../lib/europa/extractors/ec-avservices';
import { createContext } from '../lib/europa/registry';

const PLAYLIST_XML = fs.readFileSync(path.join(process.cwd(), 'tests', 'fixtures', 'ec-playlist-I107758.xml'), 'utf-8');
const PLAYLIST_PATH = '/avservices/video/player/playlist.cfm?ID=I107758';

describe('EcAvServicesExtractor', () => {
  const extractor = new EcAvServicesExtractor();
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  function context() {
    return createContext(DEFAULT_CONFIG, { dispatcher: agent, logger: { log: vi.fn(), warn: vi.fn() } });
  }

  function mockPlaylist(body: string, status = 200) {
    agent.get('http://ec.europa.eu').intercept({ path: PLAYLIST_PATH, method: 'GET' }).reply(status, body);
  }

  it('matches video and audio detail pages', () => {
    expect(extractor.supports('http://ec.europa.eu/avservices/video/player.cfm?ref=I107758')).toBe(true);
    expect(extractor.supports('http://ec.europa.eu/avservices/video/player.cfm?sitelang=en&ref=I107786')).toBe(true);
    expect(extractor.supports('http://ec.europa.eu/avservices/audio/audioDetails.cfm?ref=I-109295&sitelang=en')).toBe(true);
    expect(extractor.supports('http://ec.europa.eu/avservices/photo/photoDetails.cfm?ref=P-1234')).toBe(false);
  });

  it('builds a record from the playlist', async () => {
    mockPlaylist(PLAYLIST_XML);
    const url = 'http://ec.europa.eu/avservices/video/player.cfm?ref=I107758';

    const record = await extractor.extract(url, context());

    expect(record).toMatchObject({
      id: 'I107758',
      displayId: 'I107758',
      extractor: 'ec-avservices',
      webpageUrl: url,
      title: 'TRADE - Wikileaks on TTIP',
      description: 'NEW  LIVE EC Midday press briefing of 11/08/2015',
      thumbnail: 'http://media.example.org/thumbs/I107758.jpg',
      uploadDate: '20150811',
      duration: 34,
      viewCount: 1234,
      isLive: null,
      subtitles: {}
    });
    expect(record.formats).toHaveLength(3);
    expect(record.formats[0]).toEqual({
      url: 'http://media.example.org/video/I107758_en.mp4',
      formatId: 'en',
      formatNote: 'English',
      language: 'en',
      languagePreference: 1,
      protocol: 'https',
      ext: 'mp4',
      tbr: null,
      width: null,
      height: null,
      vcodec: null,
      acodec: null
    });
    expect(record.formats.map((format) => [format.language, format.languagePreference])).toEqual([
      ['en', 1],
      ['fr', -1],
      ['int', 0]
    ]);
  });

  it('follows the sitelang parameter for titles and ranks', async () => {
    mockPlaylist(PLAYLIST_XML);

    const record = await extractor.extract(
      'http://ec.europa.eu/avservices/video/player.cfm?sitelang=fr&ref=I107758',
      context()
    );

    expect(record.title).toBe('COMMERCE - Wikileaks sur le TTIP');
    expect(record.description).toBe('NEW  LIVE EC Midday press briefing of 11/08/2015');
    expect(record.formats.map((format) => [format.language, format.languagePreference])).toEqual([
      ['en', 1],
      ['fr', 2],
      ['int', 0]
    ]);
  });

  it('prefers the floor language when sitelang is int', async () => {
    mockPlaylist(PLAYLIST_XML);

    const record = await extractor.extract(
      'http://ec.europa.eu/avservices/video/player.cfm?sitelang=int&ref=I107758',
      context()
    );

    expect(record.title).toBe('TRADE - Wikileaks on TTIP (floor)');
    expect(record.formats.map((format) => [format.language, format.languagePreference])).toEqual([
      ['en', 0],
      ['fr', -1],
      ['int', 1]
    ]);
  });

  it('uses the configured default language when sitelang is blank', async () => {
    mockPlaylist(PLAYLIST_XML);
    const ctx = createContext(
      { ...DEFAULT_CONFIG, defaultLanguage: 'fr' },
      { dispatcher: agent, logger: { log: vi.fn(), warn: vi.fn() } }
    );

    const record = await extractor.extract('http://ec.europa.eu/avservices/video/player.cfm?sitelang=&ref=I107758', ctx);

    expect(record.title).toBe('COMMERCE - Wikileaks sur le TTIP');
  });

  it('rejects an HTML page served in place of the playlist', async () => {
    mockPlaylist('<!DOCTYPE html><html><body><p>Service unavailable<br></p></body></html>');

    const error = await extractor
      .extract('http://ec.europa.eu/avservices/video/player.cfm?ref=I107758', context())
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({ url: 'http://ec.europa.eu/avservices/video/player/playlist.cfm?ID=I107758' });
  });

  it('falls back to the identifier when no title is present', async () => {
    mockPlaylist('<playlist><info><views>n/a</views></info><files/></playlist>');

    const record = await extractor.extract('http://ec.europa.eu/avservices/video/player.cfm?ref=I107758', context());

    expect(record).toMatchObject({
      title: 'I107758',
      description: null,
      thumbnail: null,
      uploadDate: null,
      duration: null,
      viewCount: null,
      formats: []
    });
  });

  it('propagates playlist download failures', async () => {
    mockPlaylist('gone', 404);

    await expect(
      extractor.extract('http://ec.europa.eu/avservices/video/player.cfm?ref=I107758', context())
    ).rejects.toBeInstanceOf(RetrievalError);
  });
});
