/**
 * Search types shared by the backends and the search tool.
 */

import type { SearchBackendName } from '../../config/schema.js';

export type { SearchBackendName };

/** Backends that talk to an external service */
export type ServiceBackendName = Exclude<SearchBackendName, 'hybrid'>;

export type SearchResult = {
  title: string;
  url: string;
  content: string;
  /** Full page text (truncated) or the snippet, when the backend has one */
  rawContent?: string;
};

export type SearchPayload = {
  results: SearchResult[];
  /** Backend that produced the results, or "hybrid" when none did */
  backend: SearchBackendName;
  answer: string | null;
  notices: string[];
};

export interface SearchRequest {
  query: string;
  maxResults: number;
  fetchFullPage: boolean;
  /** Per-source budget applied to full page text */
  maxTokensPerSource: number;
}

export interface SearchBackend {
  readonly name: ServiceBackendName;
  search(request: SearchRequest): Promise<SearchPayload>;
}
