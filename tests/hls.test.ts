import fs from 'node:fs';
import path from 'node:path';
import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EuropaClient } from '../lib/europa/client';
import { ManifestError } from '../lib/europa/errors';
import { HlsManifestExpander, parseAttributes, parseHlsManifest } from '../lib/europa/hls';

const FIXTURE_ROOT = path.join(process.cwd(), 'tests', 'fixtures');
const MASTER_URL = 'https://streams.example.org/plenary/master.m3u8?start=2022-09-14T07%3A00%3A00Z';

function readFixture(name: string) {
  return fs.readFileSync(path.join(FIXTURE_ROOT, name), 'utf-8');
}

describe('parseAttributes', () => {
  it('keeps commas inside quoted values', () => {
    expect(parseAttributes('#EXT-X-STREAM-INF:BANDWIDTH=640000,CODECS="avc1.4d401e,mp4a.40.2",RESOLUTION=640x360')).toEqual({
      BANDWIDTH: '640000',
      CODECS: 'avc1.4d401e,mp4a.40.2',
      RESOLUTION: '640x360'
    });
  });
});

describe('parseHlsManifest', () => {
  it('expands a master playlist into variants, audio renditions and subtitles', () => {
    const { formats, subtitles } = parseHlsManifest(readFixture('master.m3u8'), MASTER_URL);

    expect(formats.map((format) => format.formatId)).toEqual([
      'audio-aud-Track_1',
      'audio-aud-Track_2',
      'hls-1280',
      'hls-640'
    ]);
    expect(formats[0]).toMatchObject({
      url: 'https://streams.example.org/plenary/audio/track1.m3u8',
      language: 'audio_1',
      formatNote: 'Track 1',
      vcodec: 'none',
      protocol: 'm3u8_native'
    });
    expect(formats[2]).toMatchObject({
      url: 'https://streams.example.org/plenary/video/720p.m3u8',
      tbr: 1280,
      width: 1280,
      height: 720,
      vcodec: 'avc1.4d401f',
      acodec: 'mp4a.40.2',
      language: null
    });
    expect(formats[3]).toMatchObject({ vcodec: 'avc1.4d401e', acodec: 'none', height: 360 });
    expect(subtitles).toEqual({
      en: [{ url: 'https://streams.example.org/plenary/subs/en.m3u8', ext: 'vtt', name: 'English' }]
    });
  });

  it('turns a media playlist into a single format', () => {
    const url = 'https://streams.example.org/plenary/media.m3u8';
    const { formats, subtitles } = parseHlsManifest(readFixture('media.m3u8'), url);
    expect(formats).toHaveLength(1);
    expect(formats[0]).toMatchObject({ url, formatId: 'hls', protocol: 'm3u8_native' });
    expect(subtitles).toEqual({});
  });

  it('rejects documents that are not playlists', () => {
    expect(() => parseHlsManifest('<html></html>', MASTER_URL)).toThrowError(ManifestError);
  });
});

describe('HlsManifestExpander', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('downloads and parses the manifest', async () => {
    agent
      .get('https://streams.example.org')
      .intercept({ path: '/plenary/alt.m3u8', method: 'GET' })
      .reply(200, readFixture('alt.m3u8'));

    const expander = new HlsManifestExpander(new EuropaClient({ dispatcher: agent }));
    const { formats, subtitles } = await expander.expand('https://streams.example.org/plenary/alt.m3u8', 'alt');

    expect(formats.map((format) => format.url)).toEqual(['https://streams.example.org/plenary/low.m3u8']);
    expect(formats[0].tbr).toBe(320);
    expect(Object.keys(subtitles)).toEqual(['en', 'fr']);
    expect(subtitles.fr[0].url).toBe('https://streams.example.org/plenary/subs/fr.m3u8');
  });

  it('wraps download failures in a ManifestError', async () => {
    agent
      .get('https://streams.example.org')
      .intercept({ path: '/plenary/missing.m3u8', method: 'GET' })
      .reply(404, 'not found');

    const expander = new HlsManifestExpander(new EuropaClient({ dispatcher: agent }));
    await expect(expander.expand('https://streams.example.org/plenary/missing.m3u8', 'missing')).rejects.toBeInstanceOf(
      ManifestError
    );
  });
});
