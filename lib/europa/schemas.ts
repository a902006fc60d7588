import { z } from 'zod';
import type { LocalizedItem } from './language';

const OptionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text.length ? text : null;
  });

const MeetingVideoSchema = z
  .object({
    hlsUrl: OptionalText
  })
  .passthrough();

const MeetingAudioSchema = z
  .object({
    trackIdentifier: OptionalText,
    language: OptionalText
  })
  .passthrough();

const LocalizedTitleSchema = z
  .object({
    language: OptionalText,
    text: OptionalText
  })
  .passthrough();

const MeetingTitleSchema = z
  .union([z.string(), z.array(LocalizedTitleSchema)])
  .nullish()
  .transform((value): LocalizedItem[] => {
    if (!value) return [];
    if (typeof value === 'string') {
      const text = value.trim();
      return text ? [{ lang: 'int', label: text }] : [];
    }
    return value.map((entry) => ({ lang: entry.language?.toLowerCase() ?? null, label: entry.text }));
  });

/**
 * FullMeeting response. `meetingVideo` (one stream) and `meetingVideos` (a
 * list) are folded into a single `videos` array here so nothing downstream
 * branches on the shape.
 */
export const MeetingRecordSchema = z
  .object({
    id: OptionalText,
    title: MeetingTitleSchema,
    startDateTime: OptionalText,
    endDateTime: OptionalText,
    meetingVideo: MeetingVideoSchema.nullish(),
    meetingVideos: z.array(MeetingVideoSchema).nullish(),
    meetingAudio: z.array(MeetingAudioSchema).nullish()
  })
  .passthrough()
  .transform(({ meetingVideo, meetingVideos, meetingAudio, title, ...rest }) => ({
    ...rest,
    titles: title,
    videos: [...(meetingVideo ? [meetingVideo] : []), ...(meetingVideos ?? [])],
    audio: meetingAudio ?? []
  }));

export type MeetingRecord = z.output<typeof MeetingRecordSchema>;

export const WebstreamPagePropsSchema = z
  .object({
    title: OptionalText,
    mediaItem: z
      .object({
        title: OptionalText,
        mediaSubType: OptionalText
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

export type WebstreamPageProps = z.output<typeof WebstreamPagePropsSchema>;

export const NextDataSchema = z.object({
  props: z.object({
    pageProps: WebstreamPagePropsSchema
  })
});
