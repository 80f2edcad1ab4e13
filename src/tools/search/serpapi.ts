/**
 * SerpApi search backend
 *
 * Engine-style search: `organic_results` with `title/link/snippet` and an
 * optional `answer_box`.
 */

import { z } from 'zod';
import { SearchBackendError } from '../../errors/index.js';
import { resilientFetch } from '../../providers/resilient-fetch.js';
import { createComponentLogger, type StructuredLogger } from '../../utilities/logger.js';
import { limitText, normalizeResult, searchPayload } from './format.js';
import type { SearchBackend, SearchPayload, SearchRequest } from './types.js';

export const SERPAPI_SEARCH_URL = 'https://serpapi.com/search.json';

const SerpApiResponseSchema = z
  .object({
    answer_box: z
      .object({
        answer: z.string().nullish(),
        snippet: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    organic_results: z
      .array(
        z
          .object({
            title: z.string().nullish(),
            link: z.string().nullish(),
            snippet: z.string().nullish(),
          })
          .passthrough()
      )
      .default([]),
    error: z.string().optional(),
  })
  .passthrough();

export interface SerpApiBackendOptions {
  apiKey: string;
  /** Search engine (default google) */
  engine?: string;
  /** Interface language (default en) */
  language?: string;
  timeout?: number;
  logger?: StructuredLogger;
}

export class SerpApiBackend implements SearchBackend {
  readonly name = 'serpapi';

  private apiKey: string;
  private engine: string;
  private language: string;
  private timeout: number;
  private log: StructuredLogger;

  constructor(options: SerpApiBackendOptions) {
    this.apiKey = options.apiKey;
    this.engine = options.engine ?? 'google';
    this.language = options.language ?? 'en';
    this.timeout = options.timeout ?? 30000;
    this.log = options.logger ?? createComponentLogger('SerpApiBackend');
  }

  async search(request: SearchRequest): Promise<SearchPayload> {
    const { query, maxResults, fetchFullPage, maxTokensPerSource } = request;
    this.log.debug('Searching', { query, maxResults });

    const params = new URLSearchParams({
      engine: this.engine,
      q: query,
      api_key: this.apiKey,
      hl: this.language,
      num: String(maxResults),
    });

    const { response } = await resilientFetch({
      url: `${SERPAPI_SEARCH_URL}?${params.toString()}`,
      init: { method: 'GET' },
      providerName: this.name,
      networkConfig: { timeout: this.timeout },
    });

    if (!response.ok) {
      const body = await response.text();
      throw new SearchBackendError(`HTTP ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`, this.name, response.status >= 500);
    }

    const parsed = SerpApiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SearchBackendError('unexpected response shape', this.name);
    }
    if (parsed.data.error) {
      throw new SearchBackendError(parsed.data.error, this.name);
    }

    const answerBox = parsed.data.answer_box;
    const answer = answerBox?.answer || answerBox?.snippet || null;

    const results = parsed.data.organic_results.slice(0, maxResults).map((item) => {
      let raw = item.snippet;
      if (raw && fetchFullPage) {
        raw = limitText(raw, maxTokensPerSource);
      }
      return normalizeResult({ title: item.title, url: item.link, content: item.snippet, rawContent: raw });
    });

    this.log.debug('Search completed', { results: results.length });
    return searchPayload(results, this.name, answer);
  }
}
