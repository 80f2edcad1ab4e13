/**
 * Search Tool
 *
 * Web search over Tavily and SerpApi. In hybrid mode the backends are tried in
 * priority order (Tavily first) and the first one with results wins; empty
 * results and failures are recorded as notices and the next backend is tried.
 */

import { z } from 'zod';
import { SearchBackendSchema } from '../../config/schema.js';
import { SearchBackendError, formatError } from '../../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../../utilities/logger.js';
import { BaseTool } from '../base.js';
import type { ToolOutput } from '../types.js';
import { formatTextResponse, searchPayload } from './format.js';
import { SerpApiBackend } from './serpapi.js';
import { TavilyBackend } from './tavily.js';
import type {
  SearchBackend,
  SearchBackendName,
  SearchPayload,
  SearchRequest,
  ServiceBackendName,
} from './types.js';

export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_MAX_TOKENS_PER_SOURCE = 2000;
export const NO_QUERY_MESSAGE = 'Error: No search query provided.';

const STRUCTURED_MODES = new Set(['structured', 'dict', 'json']);

/** Hybrid priority order */
const SERVICE_BACKENDS: readonly ServiceBackendName[] = ['tavily', 'serpapi'];

const BACKEND_LABELS: Record<ServiceBackendName, string> = {
  tavily: 'Tavily',
  serpapi: 'SerpApi',
};

const KEY_SETTINGS: Record<ServiceBackendName, string> = {
  tavily: 'TAVILY_API_KEY',
  serpapi: 'SERPAPI_API_KEY',
};

const SearchParamsSchema = z.object({
  query: z.string().optional().describe('The search query to use.'),
  input: z.string().optional().describe('Alias of query'),
  backend: z.string().optional().describe('tavily, serpapi or hybrid'),
  mode: z.string().optional().describe('text, structured, dict or json'),
  return_mode: z.string().optional().describe('Alias of mode'),
  max_results: z.coerce.number().int().positive().optional().describe('Maximum number of results'),
  fetch_full_page: z.boolean().default(false).describe('Include full page text'),
  max_tokens_per_source: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_TOKENS_PER_SOURCE)
    .describe('Token budget for full page text of each result'),
});

export type SearchParams = z.infer<typeof SearchParamsSchema>;

function parseBackend(value: string | undefined): SearchBackendName | undefined {
  const parsed = SearchBackendSchema.safeParse(value?.toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

export interface SearchToolOptions {
  /** tavily, serpapi or hybrid (default hybrid) */
  backend?: string;
  tavilyApiKey?: string;
  serpapiApiKey?: string;
  /** Default for `max_results` */
  maxResults?: number;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Backends to use instead of the ones built from API keys */
  backends?: Partial<Record<ServiceBackendName, SearchBackend>>;
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
}

export interface SearchOptions {
  backend?: SearchBackendName;
  maxResults?: number;
  fetchFullPage?: boolean;
  maxTokensPerSource?: number;
}

export class SearchTool extends BaseTool<SearchParams> {
  readonly name = 'search';
  readonly description = 'Search for information on the internet using a search engine.';
  readonly backend: SearchBackendName;
  readonly maxResults: number;

  protected readonly schema = SearchParamsSchema;
  protected readonly requiredParameters = ['query'] as const;

  private backends: Partial<Record<ServiceBackendName, SearchBackend>>;
  private log: StructuredLogger;

  constructor(options: SearchToolOptions = {}) {
    super();
    const env = options.env ?? process.env;
    this.log = options.logger ?? createComponentLogger('SearchTool');
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;

    const tavilyApiKey = options.tavilyApiKey ?? env.TAVILY_API_KEY;
    const serpapiApiKey = options.serpapiApiKey ?? env.SERPAPI_API_KEY;
    this.backends = {
      tavily:
        options.backends?.tavily ??
        (tavilyApiKey ? new TavilyBackend({ apiKey: tavilyApiKey, timeout: options.timeout, logger: this.log }) : undefined),
      serpapi:
        options.backends?.serpapi ??
        (serpapiApiKey ? new SerpApiBackend({ apiKey: serpapiApiKey, timeout: options.timeout, logger: this.log }) : undefined),
    };

    this.backend = this.selectBackend(options.backend ?? 'hybrid');
  }

  /**
   * Backends with credentials, in hybrid priority order.
   */
  get availableBackends(): ServiceBackendName[] {
    return SERVICE_BACKENDS.filter((name) => this.backends[name] !== undefined);
  }

  /**
   * Search and return the normalized payload.
   *
   * @throws SearchBackendError when an explicitly requested backend is not configured
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchPayload> {
    const backend = options.backend ?? this.backend;
    const request: SearchRequest = {
      query,
      maxResults: options.maxResults ?? this.maxResults,
      fetchFullPage: options.fetchFullPage ?? false,
      maxTokensPerSource: options.maxTokensPerSource ?? DEFAULT_MAX_TOKENS_PER_SOURCE,
    };

    this.log.info('Searching', { query, backend });
    if (backend === 'hybrid') {
      return this.searchHybrid(request);
    }

    const service = this.backends[backend];
    if (!service) {
      throw SearchBackendError.notConfigured(backend, KEY_SETTINGS[backend]);
    }
    return service.search(request);
  }

  protected async execute(input: SearchParams): Promise<ToolOutput> {
    const query = (input.query || input.input || '').trim();
    if (!query) {
      return NO_QUERY_MESSAGE;
    }

    const mode = (input.mode || input.return_mode || 'text').toLowerCase();
    const payload = await this.search(query, {
      backend: parseBackend(input.backend) ?? this.backend,
      maxResults: input.max_results,
      fetchFullPage: input.fetch_full_page,
      maxTokensPerSource: input.max_tokens_per_source,
    });

    return STRUCTURED_MODES.has(mode) ? payload : formatTextResponse(query, payload);
  }

  private async searchHybrid(request: SearchRequest): Promise<SearchPayload> {
    const notices: string[] = [];

    for (const name of SERVICE_BACKENDS) {
      const service = this.backends[name];
      if (!service) continue;

      const label = BACKEND_LABELS[name];
      try {
        const payload = await service.search(request);
        if (payload.results.length > 0) {
          return { ...payload, notices: [...notices, ...payload.notices] };
        }
        notices.push(`${label} returned no valid results; trying other search sources`);
      } catch (error) {
        this.log.warn(`${label} search failed`, { error: formatError(error) });
        notices.push(`${label} search failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return searchPayload([], 'hybrid', null, notices);
  }

  private selectBackend(requested: string): SearchBackendName {
    const backend = parseBackend(requested);
    const available = this.availableBackends;

    if (!backend) {
      this.log.warn(`Unsupported backend '${requested}'; defaulting to 'hybrid'`);
      return this.reportHybrid(available);
    }
    if (backend !== 'hybrid' && !available.includes(backend)) {
      this.log.warn(`${BACKEND_LABELS[backend]} backend selected but not available; defaulting to 'hybrid'`);
      return this.reportHybrid(available);
    }
    if (backend === 'hybrid') {
      return this.reportHybrid(available);
    }
    return backend;
  }

  private reportHybrid(available: ServiceBackendName[]): 'hybrid' {
    if (available.length > 0) {
      this.log.info(`Hybrid search will use: ${available.join(', ')}`);
    } else {
      this.log.warn('No search backends are available; searches will return no results');
    }
    return 'hybrid';
  }
}
