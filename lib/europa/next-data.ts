import { load } from 'cheerio';
import { MissingFieldError } from './errors';
import { NextDataSchema, type WebstreamPageProps } from './schemas';

export function extractNextData(html: string, url: string): unknown {
  const $ = load(html);
  const text = $('script#__NEXT_DATA__').first().text();
  if (!text.trim()) {
    throw new MissingFieldError(`No __NEXT_DATA__ script found on ${url}`, { field: '__NEXT_DATA__', url });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MissingFieldError(`Malformed __NEXT_DATA__ on ${url}`, { field: '__NEXT_DATA__', url, cause: error });
  }
}

export function extractPageProps(html: string, url: string): WebstreamPageProps {
  const parsed = NextDataSchema.safeParse(extractNextData(html, url));
  if (!parsed.success) {
    throw new MissingFieldError(`__NEXT_DATA__ on ${url} has no props.pageProps`, {
      field: 'props.pageProps',
      url,
      cause: parsed.error
    });
  }
  return parsed.data.props.pageProps;
}
