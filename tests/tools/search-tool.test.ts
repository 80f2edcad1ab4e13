/**
 * Search Tool Tests
 *
 * Hybrid fallback, parameter handling, text rendering and backend response
 * normalization (fetch is stubbed; nothing leaves the process).
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SearchTool } from '../../src/tools/search/search-tool.js';
import { TavilyBackend, TAVILY_SEARCH_URL } from '../../src/tools/search/tavily.js';
import { SerpApiBackend } from '../../src/tools/search/serpapi.js';
import { formatTextResponse, limitText } from '../../src/tools/search/format.js';
import type { SearchPayload, SearchRequest, SearchResult } from '../../src/tools/search/types.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { SearchBackendError } from '../../src/errors/index.js';

// =============================================================================
// HELPERS
// =============================================================================

const nodeResult: SearchResult = { title: 'Node.js', url: 'https://nodejs.org', content: 'JavaScript runtime' };
const denoResult: SearchResult = { title: 'Deno', url: 'https://deno.land', content: 'Another runtime' };

function payload(backend: 'tavily' | 'serpapi', results: SearchResult[], answer: string | null = null): SearchPayload {
  return { results, backend, answer, notices: [] };
}

function fakeTavily(result: SearchPayload | Error) {
  return {
    name: 'tavily' as const,
    search: vi.fn(async (_request: SearchRequest): Promise<SearchPayload> => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

function fakeSerpApi(result: SearchPayload | Error) {
  return {
    name: 'serpapi' as const,
    search: vi.fn(async (_request: SearchRequest): Promise<SearchPayload> => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// =============================================================================
// HYBRID FALLBACK
// =============================================================================

describe('SearchTool hybrid search', () => {
  it('should fall back to SerpApi when Tavily returns nothing', async () => {
    const tavily = fakeTavily(payload('tavily', []));
    const serpapi = fakeSerpApi(payload('serpapi', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily, serpapi } });

    const result = await tool.search('node');

    expect(result).toEqual({
      results: [nodeResult],
      backend: 'serpapi',
      answer: null,
      notices: ['Tavily returned no valid results; trying other search sources'],
    });
  });

  it('should turn a Tavily failure into a notice and continue', async () => {
    const tavily = fakeTavily(new Error('quota exceeded'));
    const serpapi = fakeSerpApi(payload('serpapi', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily, serpapi } });

    const result = await tool.search('node');

    expect(result.backend).toBe('serpapi');
    expect(result.notices).toEqual(['Tavily search failed: quota exceeded']);
  });

  it('should stop at Tavily when it has results', async () => {
    const tavily = fakeTavily(payload('tavily', [denoResult], 'Deno 2'));
    const serpapi = fakeSerpApi(payload('serpapi', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily, serpapi } });

    const result = await tool.search('deno');

    expect(result).toEqual({ results: [denoResult], backend: 'tavily', answer: 'Deno 2', notices: [] });
    expect(serpapi.search).not.toHaveBeenCalled();
  });

  it('should return an empty hybrid payload with every notice when all backends fail', async () => {
    const tavily = fakeTavily(payload('tavily', []));
    const serpapi = fakeSerpApi(new Error('timeout'));
    const tool = new SearchTool({ env: {}, backends: { tavily, serpapi } });

    expect(await tool.search('nothing')).toEqual({
      results: [],
      backend: 'hybrid',
      answer: null,
      notices: ['Tavily returned no valid results; trying other search sources', 'SerpApi search failed: timeout'],
    });
  });

  it('should skip backends that are not configured', async () => {
    const serpapi = fakeSerpApi(payload('serpapi', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { serpapi } });

    const result = await tool.search('node');

    expect(result.backend).toBe('serpapi');
    expect(result.notices).toEqual([]);
    expect(tool.availableBackends).toEqual(['serpapi']);
  });

  it('should return an empty payload when nothing is configured', async () => {
    const tool = new SearchTool({ env: {} });
    expect(await tool.search('node')).toEqual({ results: [], backend: 'hybrid', answer: null, notices: [] });
  });
});

// =============================================================================
// BACKEND SELECTION
// =============================================================================

describe('SearchTool backend selection', () => {
  it('should fall back to hybrid for an unsupported backend', () => {
    expect(new SearchTool({ env: {}, backend: 'bing' }).backend).toBe('hybrid');
  });

  it('should fall back to hybrid when the selected backend is unavailable', () => {
    expect(new SearchTool({ env: {}, backend: 'tavily' }).backend).toBe('hybrid');
  });

  it('should keep an available backend', () => {
    const serpapi = fakeSerpApi(payload('serpapi', []));
    expect(new SearchTool({ env: {}, backend: 'SerpApi', backends: { serpapi } }).backend).toBe('serpapi');
  });

  it('should build backends from API keys in the environment', () => {
    const tool = new SearchTool({ env: { TAVILY_API_KEY: 'test-secret', SERPAPI_API_KEY: 'test-secret' } });
    expect(tool.availableBackends).toEqual(['tavily', 'serpapi']);
  });

  it('should throw when an explicitly requested backend is not configured', async () => {
    const tool = new SearchTool({ env: {} });

    await expect(tool.search('node', { backend: 'serpapi' })).rejects.toThrow(SearchBackendError);
    await expect(tool.search('node', { backend: 'tavily' })).rejects.toThrow(
      'TAVILY_API_KEY is not set; the tavily backend is unavailable'
    );
  });
});

// =============================================================================
// RUN PARAMETERS
// =============================================================================

describe('SearchTool.run', () => {
  it('should report a missing query', async () => {
    const tool = new SearchTool({ env: {} });

    expect(await tool.run({})).toBe('Error: No search query provided.');
    expect(await tool.run({ query: '   ' })).toBe('Error: No search query provided.');
  });

  it('should accept input as an alias of query', async () => {
    const tavily = fakeTavily(payload('tavily', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily } });

    await tool.run({ input: ' node ' });

    expect(tavily.search).toHaveBeenCalledWith({
      query: 'node',
      maxResults: 5,
      fetchFullPage: false,
      maxTokensPerSource: 2000,
    });
  });

  it('should pass result limits through to the backend', async () => {
    const tavily = fakeTavily(payload('tavily', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily } });

    await tool.run({ query: 'node', max_results: '3', fetch_full_page: true, max_tokens_per_source: 10 });

    expect(tavily.search).toHaveBeenCalledWith({
      query: 'node',
      maxResults: 3,
      fetchFullPage: true,
      maxTokensPerSource: 10,
    });
  });

  it('should use the configured default result count', async () => {
    const tavily = fakeTavily(payload('tavily', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily }, maxResults: 8 });

    await tool.run({ query: 'node' });

    expect(tavily.search.mock.calls[0][0].maxResults).toBe(8);
  });

  it.each(['structured', 'dict', 'json', 'JSON'])('should return the payload for mode %s', async (mode) => {
    const tavily = fakeTavily(payload('tavily', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily } });

    expect(await tool.run({ query: 'node', mode })).toEqual(payload('tavily', [nodeResult]));
  });

  it('should accept return_mode as an alias of mode', async () => {
    const tavily = fakeTavily(payload('tavily', [nodeResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily } });

    expect(await tool.run({ query: 'node', return_mode: 'structured' })).toEqual(payload('tavily', [nodeResult]));
  });

  it('should render text for unknown modes', async () => {
    const tool = new SearchTool({ env: {} });

    expect(await tool.run({ query: 'node', mode: 'xml' })).toBe(
      'Search query: node\nSearch backend: hybrid\nNo relevant search results found.'
    );
  });

  it('should use the instance backend for an unknown backend parameter', async () => {
    const tavily = fakeTavily(payload('tavily', [nodeResult]));
    const serpapi = fakeSerpApi(payload('serpapi', [denoResult]));
    const tool = new SearchTool({ env: {}, backend: 'serpapi', backends: { tavily, serpapi } });

    const result = await tool.run({ query: 'runtime', backend: 'bing', mode: 'json' });

    expect(result).toEqual(payload('serpapi', [denoResult]));
    expect(tavily.search).not.toHaveBeenCalled();
  });

  it('should honor an explicit backend parameter', async () => {
    const tavily = fakeTavily(payload('tavily', [nodeResult]));
    const serpapi = fakeSerpApi(payload('serpapi', [denoResult]));
    const tool = new SearchTool({ env: {}, backends: { tavily, serpapi } });

    expect(await tool.run({ query: 'runtime', backend: 'serpapi', mode: 'json' })).toEqual(
      payload('serpapi', [denoResult])
    );
  });

  it('should surface a missing explicit backend as registry error text', async () => {
    const registry = new ToolRegistry();
    registry.registerTool(new SearchTool({ env: {} }));

    expect(await registry.executeTool('search', { query: 'node', backend: 'tavily' })).toBe(
      "Error: tool 'search' failed: TAVILY_API_KEY is not set; the tavily backend is unavailable"
    );
  });

  it('should take a plain text query through the registry', async () => {
    const tavily = fakeTavily(payload('tavily', [nodeResult]));
    const registry = new ToolRegistry();
    registry.registerTool(new SearchTool({ env: {}, backends: { tavily } }));

    const output = await registry.executeTool('search', 'node');

    expect(output.split('\n').slice(0, 2)).toEqual(['Search query: node', 'Search backend: tavily']);
  });

  it('should list query as required and its alias as optional', () => {
    const flags = new SearchTool({ env: {} }).getParameters().map((p) => [p.name, p.required]);

    expect(flags).toEqual([
      ['query', true],
      ['input', false],
      ['backend', false],
      ['mode', false],
      ['return_mode', false],
      ['max_results', false],
      ['fetch_full_page', false],
      ['max_tokens_per_source', false],
    ]);
  });

  it('should describe its parameters for prompts', () => {
    const registry = new ToolRegistry();
    registry.registerTool(new SearchTool({ env: {} }));

    expect(registry.getParametersDescription('search')).toBe(
      [
        'search parameters:',
        '- query (string, required): The search query to use.',
        '- input (string, optional): Alias of query',
        '- backend (string, optional): tavily, serpapi or hybrid',
        '- mode (string, optional): text, structured, dict or json',
        '- return_mode (string, optional): Alias of mode',
        '- max_results (integer, optional): Maximum number of results',
        '- fetch_full_page (boolean, optional): Include full page text (default: false)',
        '- max_tokens_per_source (integer, optional): Token budget for full page text of each result (default: 2000)',
      ].join('\n')
    );
  });
});

// =============================================================================
// FORMATTING
// =============================================================================

describe('formatTextResponse', () => {
  it('should render answer, references and notices', () => {
    const text = formatTextResponse('node', {
      results: [nodeResult, { title: '', url: 'https://example.com', content: '' }],
      backend: 'tavily',
      answer: 'Node 20',
      notices: ['Heads up', ''],
    });

    expect(text).toBe(
      [
        'Search query: node',
        'Search backend: tavily',
        'Direct answer: Node 20',
        '',
        'References:',
        '[1] Node.js',
        '    JavaScript runtime',
        '    Source: https://nodejs.org',
        '',
        '[2] https://example.com',
        '    Source: https://example.com',
        '',
        'Notices:',
        '- Heads up',
      ].join('\n')
    );
  });

  it('should report empty results with notices', () => {
    const text = formatTextResponse('x', {
      results: [],
      backend: 'hybrid',
      answer: null,
      notices: ['SerpApi search failed: timeout'],
    });

    expect(text).toBe(
      'Search query: x\nSearch backend: hybrid\nNo relevant search results found.\nNotices:\n- SerpApi search failed: timeout'
    );
  });
});

describe('limitText', () => {
  it('should keep text within four characters per token', () => {
    expect(limitText('abcd', 1)).toBe('abcd');
  });

  it('should truncate longer text with a marker', () => {
    expect(limitText('abcdefgh', 1)).toBe('abcd... [truncated]');
  });
});

// =============================================================================
// BACKENDS
// =============================================================================

describe('TavilyBackend', () => {
  const request: SearchRequest = { query: 'node', maxResults: 2, fetchFullPage: false, maxTokensPerSource: 2000 };

  it('should post the query and normalize the results', async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        answer: 'A runtime',
        results: [
          { title: 'Node.js', url: 'https://nodejs.org', content: 'JavaScript runtime', raw_content: 'full page' },
          { title: null, url: 'https://example.com', content: null },
          { title: 'Third', url: 'https://third.example', content: 'cut by maxResults' },
        ],
      })
    );

    const result = await new TavilyBackend({ apiKey: 'test-secret' }).search(request);

    expect(result).toEqual({
      results: [
        { title: 'Node.js', url: 'https://nodejs.org', content: 'JavaScript runtime', rawContent: 'JavaScript runtime' },
        { title: 'https://example.com', url: 'https://example.com', content: '' },
      ],
      backend: 'tavily',
      answer: 'A runtime',
      notices: [],
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(TAVILY_SEARCH_URL);
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      query: 'node',
      max_results: 2,
      include_raw_content: false,
      include_answer: true,
    });
  });

  it('should truncate full page content', async () => {
    stubFetch(jsonResponse({ results: [{ title: 'T', url: 'https://t.example', content: 'c', raw_content: 'abcdefghij' }] }));

    const result = await new TavilyBackend({ apiKey: 'test-secret' }).search({
      ...request,
      fetchFullPage: true,
      maxTokensPerSource: 2,
    });

    expect(result.results[0].rawContent).toBe('abcdefgh... [truncated]');
    expect(result.answer).toBeNull();
  });

  it('should raise a backend error for a rejected request', async () => {
    stubFetch(new Response('bad key', { status: 401 }));

    await expect(new TavilyBackend({ apiKey: 'test-secret' }).search(request)).rejects.toThrow('HTTP 401: bad key');
  });

  it('should become a hybrid notice when the request is rejected', async () => {
    stubFetch(new Response('bad key', { status: 401 }));
    const tool = new SearchTool({ env: { TAVILY_API_KEY: 'test-secret' } });

    expect((await tool.search('node')).notices).toEqual(['Tavily search failed: HTTP 401: bad key']);
  });
});

describe('SerpApiBackend', () => {
  const request: SearchRequest = { query: 'node js', maxResults: 5, fetchFullPage: false, maxTokensPerSource: 2000 };

  it('should query with GET and normalize organic results', async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        answer_box: { snippet: 'Node.js is a runtime' },
        organic_results: [{ title: 'Node.js', link: 'https://nodejs.org', snippet: 'JavaScript runtime' }],
      })
    );

    const result = await new SerpApiBackend({ apiKey: 'test-secret' }).search(request);

    expect(result).toEqual({
      results: [
        { title: 'Node.js', url: 'https://nodejs.org', content: 'JavaScript runtime', rawContent: 'JavaScript runtime' },
      ],
      backend: 'serpapi',
      answer: 'Node.js is a runtime',
      notices: [],
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe(
      'https://serpapi.com/search.json?engine=google&q=node+js&api_key=test-secret&hl=en&num=5'
    );
    expect(init?.method).toBe('GET');
  });

  it('should prefer the answer box answer over its snippet', async () => {
    stubFetch(jsonResponse({ answer_box: { answer: '42', snippet: 'forty-two' }, organic_results: [] }));

    const result = await new SerpApiBackend({ apiKey: 'test-secret' }).search(request);

    expect(result.answer).toBe('42');
    expect(result.results).toEqual([]);
  });

  it('should raise the error SerpApi reports in the body', async () => {
    stubFetch(jsonResponse({ error: 'Invalid API key.' }));

    await expect(new SerpApiBackend({ apiKey: 'test-secret' }).search(request)).rejects.toThrow('Invalid API key.');
  });
});
