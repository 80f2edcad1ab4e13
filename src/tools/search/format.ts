/**
 * Search result normalization and text rendering.
 */

import type { SearchBackendName, SearchPayload, SearchResult } from './types.js';

/** Average number of characters per token */
export const CHARS_PER_TOKEN = 4;

export const TRUNCATION_SUFFIX = '... [truncated]';

export function limitText(text: string, tokenLimit: number): string {
  const charLimit = tokenLimit * CHARS_PER_TOKEN;
  if (text.length <= charLimit) {
    return text;
  }
  return text.slice(0, charLimit) + TRUNCATION_SUFFIX;
}

export interface ResultFields {
  title?: string | null;
  url?: string | null;
  content?: string | null;
  rawContent?: string | null;
}

/**
 * Build a result, falling back to the URL when there is no title.
 */
export function normalizeResult(fields: ResultFields): SearchResult {
  const url = fields.url ?? '';
  const result: SearchResult = {
    title: fields.title || url,
    url,
    content: fields.content || '',
  };
  if (fields.rawContent != null) {
    result.rawContent = fields.rawContent;
  }
  return result;
}

export function searchPayload(
  results: SearchResult[],
  backend: SearchBackendName,
  answer: string | null = null,
  notices: string[] = []
): SearchPayload {
  return { results, backend, answer, notices };
}

/**
 * Human-readable rendering: header lines, numbered references, notices.
 */
export function formatTextResponse(query: string, payload: SearchPayload): string {
  const lines = [`Search query: ${query}`, `Search backend: ${payload.backend}`];
  if (payload.answer) {
    lines.push(`Direct answer: ${payload.answer}`);
  }

  if (payload.results.length > 0) {
    lines.push('', 'References:');
    payload.results.forEach((item, index) => {
      lines.push(`[${index + 1}] ${item.title || item.url}`);
      if (item.content) lines.push(`    ${item.content}`);
      if (item.url) lines.push(`    Source: ${item.url}`);
      lines.push('');
    });
  } else {
    lines.push('No relevant search results found.');
  }

  const notices = payload.notices.filter((notice) => notice.length > 0);
  if (notices.length > 0) {
    lines.push('Notices:', ...notices.map((notice) => `- ${notice}`));
  }

  return lines.join('\n');
}
