import { format, isValid, parse } from 'date-fns';

export type TimestampResult =
  | { kind: 'instant'; epochMicros: number }
  | { kind: 'absent'; input: string | null };

export type Instant = Extract<TimestampResult, { kind: 'instant' }>;

const WITH_FRACTION = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})\.(\d+)(Z|[+-]\d{2}:\d{2})$/;
const WITHOUT_FRACTION = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:Z|[+-]\d{2}:\d{2})$/;

const FORMAT_WITH_FRACTION = "yyyy-MM-dd'T'HH:mm:ss.SSSSSSXXX";
const FORMAT_WITHOUT_FRACTION = "yyyy-MM-dd'T'HH:mm:ssXXX";

const CALENDAR_FORMATS = ['dd/MM/yyyy', 'dd.MM.yyyy', 'dd-MM-yyyy', 'yyyy-MM-dd', 'yyyy/MM/dd', 'yyyyMMdd'];

const REFERENCE_DATE = new Date(0);

function absent(input: string | null): TimestampResult {
  return { kind: 'absent', input };
}

function tryParse(value: string, pattern: string): Date | null {
  try {
    const parsed = parse(value, pattern, REFERENCE_DATE);
    return isValid(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Parses `YYYY-MM-DDTHH:MM:SS[.fraction](Z|±HH:MM)`. Fractions longer than six
 * digits are cut to microseconds. Anything else comes back as `absent`.
 */
export function parseTimestamp(value: string | null | undefined): TimestampResult {
  if (typeof value !== 'string') return absent(null);
  const trimmed = value.trim();

  const fractional = trimmed.match(WITH_FRACTION);
  if (fractional) {
    const [, base, digits, offset] = fractional;
    const micros = digits.slice(0, 6).padEnd(6, '0');
    const parsed = tryParse(`${base}.${micros}${offset}`, FORMAT_WITH_FRACTION);
    if (parsed) {
      // date-fns keeps milliseconds; the last three digits are added back here
      return { kind: 'instant', epochMicros: parsed.getTime() * 1000 + Number(micros.slice(3)) };
    }
  }

  if (WITHOUT_FRACTION.test(trimmed)) {
    const parsed = tryParse(trimmed, FORMAT_WITHOUT_FRACTION);
    if (parsed) {
      return { kind: 'instant', epochMicros: parsed.getTime() * 1000 };
    }
  }

  return absent(trimmed);
}

export function isInstant(result: TimestampResult): result is Instant {
  return result.kind === 'instant';
}

export function durationBetween(start: TimestampResult, end: TimestampResult): number | null {
  if (!isInstant(start) || !isInstant(end)) return null;
  return Math.floor((end.epochMicros - start.epochMicros) / 1_000_000);
}

export function toEpochSeconds(result: TimestampResult): number | null {
  return isInstant(result) ? Math.floor(result.epochMicros / 1_000_000) : null;
}

function toUtcDate(result: Instant): Date {
  return new Date(Math.floor(result.epochMicros / 1000));
}

// YYYY-MM-DDTHH:MM:SSZ
export function formatUtcSeconds(result: TimestampResult): string | null {
  if (!isInstant(result)) return null;
  return toUtcDate(result).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function toUtcDateString(result: TimestampResult): string | null {
  if (!isInstant(result)) return null;
  return toUtcDate(result).toISOString().slice(0, 10).replace(/-/g, '');
}

export function parseCalendarDate(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const candidates = [trimmed, trimmed.split(/\s+/)[0]];
  for (const candidate of candidates) {
    for (const pattern of CALENDAR_FORMATS) {
      if (candidate.length !== pattern.length) continue;
      const parsed = tryParse(candidate, pattern);
      if (parsed) {
        return format(parsed, 'yyyyMMdd');
      }
    }
  }
  return null;
}

export function parseClockDuration(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const isoMatch = trimmed.match(/^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?$/i);
  if (isoMatch && trimmed.length > 2) {
    const hours = isoMatch[1] ? Number(isoMatch[1]) : 0;
    const minutes = isoMatch[2] ? Number(isoMatch[2]) : 0;
    const seconds = isoMatch[3] ? Number(isoMatch[3]) : 0;
    return Math.round(hours * 3600 + minutes * 60 + seconds);
  }

  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed));
  }

  const clockMatch = trimmed.match(/^(\d{1,3}):(\d{2})(?::(\d{2}(?:\.\d+)?))?$/);
  if (clockMatch) {
    const hours = clockMatch[3] ? Number(clockMatch[1]) : 0;
    const minutes = Number(clockMatch[3] ? clockMatch[2] : clockMatch[1]);
    const seconds = clockMatch[3] ? Number(clockMatch[3]) : Number(clockMatch[2]);
    return Math.round(hours * 3600 + minutes * 60 + seconds);
  }

  return null;
}
