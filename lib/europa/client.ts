import { load } from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { fetch } from 'undici';
import type { Dispatcher, Response } from 'undici';
import type { z } from 'zod';
import { RetrievalError, describeError } from './errors';
import type { EuropaClientOptions } from './types';

export type QueryParams = Record<string, string | number | undefined>;

const DEFAULT_USER_AGENT = 'europa-media-extract/0.1';

export class EuropaClient {
  private readonly userAgent: string;
  private readonly dispatcher?: Dispatcher;

  constructor(options: EuropaClientOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.dispatcher = options.dispatcher;
  }

  buildUrl(target: string, query?: QueryParams): URL {
    const url = new URL(target);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url;
  }

  async fetchText(target: string, query?: QueryParams, accept = 'text/html,application/xhtml+xml'): Promise<string> {
    const url = this.buildUrl(target, query);
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'user-agent': this.userAgent,
          accept
        },
        dispatcher: this.dispatcher
      });
    } catch (error) {
      throw new RetrievalError(`Request failed for ${url} (${describeError(error)})`, {
        url: url.toString(),
        cause: error
      });
    }

    if (!response.ok) {
      throw new RetrievalError(`Request failed for ${url} (${response.status} ${response.statusText})`, {
        url: url.toString(),
        status: response.status
      });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new RetrievalError(`Could not read response body from ${url}`, {
        url: url.toString(),
        status: response.status,
        cause: error
      });
    }
  }

  /**
   * `requiredChildren` is a selector the document element must have a match
   * for. Lenient XML parsing accepts HTML error pages, so callers that know
   * their document's shape should pass one.
   */
  async fetchXml(target: string, query?: QueryParams, requiredChildren?: string): Promise<CheerioAPI> {
    const url = this.buildUrl(target, query).toString();
    const body = await this.fetchText(target, query, 'application/xml,text/xml');
    const $ = load(body, { xml: true });
    const root = $.root().children();
    if (root.length === 0) {
      throw new RetrievalError(`Response from ${url} is not an XML document`, { url });
    }
    if (requiredChildren && root.children(requiredChildren).length === 0) {
      throw new RetrievalError(`Response from ${url} has no ${requiredChildren} element`, { url });
    }
    return $;
  }

  async fetchJson<S extends z.ZodTypeAny>(target: string, schema: S, query?: QueryParams): Promise<z.output<S>> {
    const url = this.buildUrl(target, query).toString();
    const body = await this.fetchText(target, query, 'application/json');
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new RetrievalError(`Response from ${url} is not valid JSON`, { url, cause: error });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
      throw new RetrievalError(`Unexpected JSON from ${url}${where}: ${issue?.message ?? 'invalid payload'}`, {
        url,
        cause: parsed.error
      });
    }
    return parsed.data;
  }
}
