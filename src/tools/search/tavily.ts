/**
 * Tavily search backend
 *
 * Document-style search: results carry `title/url/content/raw_content` and the
 * response may include a direct answer.
 */

import { z } from 'zod';
import { SearchBackendError } from '../../errors/index.js';
import { resilientFetch } from '../../providers/resilient-fetch.js';
import { createComponentLogger, type StructuredLogger } from '../../utilities/logger.js';
import { limitText, normalizeResult, searchPayload } from './format.js';
import type { SearchBackend, SearchPayload, SearchRequest } from './types.js';

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

const TavilyResponseSchema = z
  .object({
    answer: z.string().nullish(),
    results: z
      .array(
        z
          .object({
            title: z.string().nullish(),
            url: z.string().nullish(),
            content: z.string().nullish(),
            raw_content: z.string().nullish(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export interface TavilyBackendOptions {
  apiKey: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  logger?: StructuredLogger;
}

export class TavilyBackend implements SearchBackend {
  readonly name = 'tavily';

  private apiKey: string;
  private timeout: number;
  private log: StructuredLogger;

  constructor(options: TavilyBackendOptions) {
    this.apiKey = options.apiKey;
    this.timeout = options.timeout ?? 30000;
    this.log = options.logger ?? createComponentLogger('TavilyBackend');
  }

  async search(request: SearchRequest): Promise<SearchPayload> {
    const { query, maxResults, fetchFullPage, maxTokensPerSource } = request;
    this.log.debug('Searching', { query, maxResults, fetchFullPage });

    const { response } = await resilientFetch({
      url: TAVILY_SEARCH_URL,
      init: {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: maxResults,
          include_raw_content: fetchFullPage,
          include_answer: true,
        }),
      },
      providerName: this.name,
      networkConfig: { timeout: this.timeout },
    });

    if (!response.ok) {
      const body = await response.text();
      throw new SearchBackendError(`HTTP ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`, this.name, response.status >= 500);
    }

    const parsed = TavilyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SearchBackendError('unexpected response shape', this.name);
    }

    const results = parsed.data.results.slice(0, maxResults).map((item) => {
      let raw = fetchFullPage ? item.raw_content : item.content;
      if (raw && fetchFullPage) {
        raw = limitText(raw, maxTokensPerSource);
      }
      return normalizeResult({ title: item.title, url: item.url, content: item.content, rawContent: raw });
    });

    this.log.debug('Search completed', { results: results.length });
    return searchPayload(results, this.name, parsed.data.answer ?? null);
  }
}
