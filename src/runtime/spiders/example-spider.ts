import axios from 'axios';
import type { SpiderDefinition } from '../types.js';

export const EXAMPLE_SPIDER_NAME = 'example_spider';
export const EXAMPLE_SPIDER_URL = 'https://httpbin.org/json';

/**
 * GET a URL and return the decoded JSON body.
 */
export type JsonFetcher = (url: string, signal: AbortSignal) => Promise<unknown>;

export function createAxiosJsonFetcher(timeoutMs = 30000): JsonFetcher {
  const http = axios.create({
    timeout: timeoutMs,
    headers: {
      Accept: 'application/json',
      'User-Agent': 'crawl-control/0.1 (+example_spider)',
    },
  });

  return async (url, signal) => {
    const response = await http.get<unknown>(url, { signal, responseType: 'json' });
    return response.data;
  };
}

function asObject(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? { ...value }
    : undefined;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export interface ExampleSpiderOptions {
  fetchJson?: JsonFetcher;
}

/**
 * Reads a JSON document shaped like httpbin's `/json` and emits one record
 * built from its `slideshow` object. `kwargs.url` overrides the start URL.
 */
export function createExampleSpider(options: ExampleSpiderOptions = {}): SpiderDefinition {
  const fetchJson = options.fetchJson ?? createAxiosJsonFetcher();

  return {
    name: EXAMPLE_SPIDER_NAME,
    description: 'Fetches a JSON document and extracts its slideshow metadata',
    allowedDomains: ['httpbin.org'],
    startUrls: [EXAMPLE_SPIDER_URL],

    async run({ kwargs, signal, emit, logger }) {
      const url = typeof kwargs['url'] === 'string' ? kwargs['url'] : EXAMPLE_SPIDER_URL;

      logger.debug({ url }, 'Fetching start URL');
      const body = await fetchJson(url, signal);
      signal.throwIfAborted();

      const slideshow = asObject(asObject(body)?.['slideshow']);
      if (!slideshow) {
        logger.warn({ url }, 'Response has no slideshow object');
        return;
      }

      await emit({
        url,
        title: stringOrNull(slideshow['title']),
        author: stringOrNull(slideshow['author']),
        date: stringOrNull(slideshow['date']),
      });
    },
  };
}
