/**
 * OpenAI-Compatible Transport
 *
 * Talks to any service exposing the `/chat/completions` endpoint of the
 * OpenAI API (OpenAI, OpenRouter, vLLM, Ollama, DeepSeek, ...).
 *
 * Configured from explicit options first, then from LLM_MODEL_ID, LLM_API_KEY
 * and LLM_BASE_URL.
 */

import { z } from 'zod';
import type { TransportMessage } from '../core/message.js';
import { ConfigurationError, ProviderError, ErrorCategory } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { resilientFetch, type NetworkConfig } from './resilient-fetch.js';
import { parseSSE } from './sse.js';
import type { ChatOptions, LLMTransport } from './types.js';

// =============================================================================
// API TYPES
// =============================================================================

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).passthrough(),
      })
    )
    .min(1),
});

const StreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).passthrough().optional(),
      })
    )
    .default([]),
  error: z.object({ message: z.string() }).passthrough().optional(),
});

// =============================================================================
// CONFIG
// =============================================================================

export interface OpenAICompatibleConfig {
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Retries for 429/5xx responses and network failures */
  maxRetries?: number;
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
}

// =============================================================================
// TRANSPORT
// =============================================================================

export class OpenAICompatibleTransport implements LLMTransport {
  readonly name = 'openai-compatible';
  readonly model: string;

  private apiKey: string;
  private baseUrl: string;
  private temperature: number;
  private maxTokens?: number;
  private networkConfig: NetworkConfig;
  private log: StructuredLogger;

  constructor(config: OpenAICompatibleConfig = {}) {
    const env = config.env ?? process.env;
    const model = config.model ?? env.LLM_MODEL_ID;
    const apiKey = config.apiKey ?? env.LLM_API_KEY;
    const baseUrl = config.baseUrl ?? env.LLM_BASE_URL;

    const missing = [
      ...(model ? [] : ['LLM_MODEL_ID']),
      ...(apiKey ? [] : ['LLM_API_KEY']),
      ...(baseUrl ? [] : ['LLM_BASE_URL']),
    ];
    if (!model || !apiKey || !baseUrl) {
      throw ConfigurationError.missing(missing);
    }

    this.model = model;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.temperature = config.temperature ?? 0.5;
    this.maxTokens = config.maxTokens;
    this.networkConfig = {
      timeout: config.timeout ?? 60000,
      maxAttempts: (config.maxRetries ?? 2) + 1,
    };
    this.log = config.logger ?? createComponentLogger('OpenAICompatibleTransport');
  }

  async invoke(messages: TransportMessage[], options?: ChatOptions): Promise<string> {
    const response = await this.post(messages, options, false);
    const payload: unknown = await response.json();
    const parsed = CompletionSchema.safeParse(payload);

    if (!parsed.success) {
      throw new ProviderError(
        `${this.name} returned an unexpected completion shape`,
        ErrorCategory.DEPENDENCY,
        false,
        this.name
      );
    }

    return parsed.data.choices[0].message.content ?? '';
  }

  async *stream(messages: TransportMessage[], options?: ChatOptions): AsyncGenerator<string> {
    const response = await this.post(messages, options, true);

    if (!response.body) {
      throw new ProviderError(
        `${this.name} returned an empty streaming body`,
        ErrorCategory.DEPENDENCY,
        false,
        this.name
      );
    }

    for await (const event of parseSSE(response.body)) {
      let payload: unknown;
      try {
        payload = JSON.parse(event.data);
      } catch {
        this.log.debug('Skipping non-JSON stream event', { data: event.data.slice(0, 200) });
        continue;
      }

      const chunk = StreamChunkSchema.safeParse(payload);
      if (!chunk.success) {
        this.log.debug('Skipping unrecognized stream event');
        continue;
      }
      if (chunk.data.error) {
        throw new ProviderError(
          `${this.name} stream error: ${chunk.data.error.message}`,
          ErrorCategory.DEPENDENCY,
          false,
          this.name
        );
      }

      const content = chunk.data.choices[0]?.delta?.content;
      if (content) {
        yield content;
      }
    }
  }

  private async post(
    messages: TransportMessage[],
    options: ChatOptions | undefined,
    stream: boolean
  ): Promise<Response> {
    const model = options?.model ?? this.model;
    const maxTokens = options?.maxTokens ?? this.maxTokens;
    const body = {
      ...options?.extra,
      model,
      messages,
      temperature: options?.temperature ?? this.temperature,
      ...(maxTokens !== undefined && { max_tokens: maxTokens }),
      stream,
    };

    this.log.debug('Calling model', { model, stream, messages: messages.length });

    const { response } = await resilientFetch({
      url: `${this.baseUrl}/chat/completions`,
      init: {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      },
      providerName: this.name,
      networkConfig: this.networkConfig,
      onRetry: (attempt, delay, error) => {
        this.log.warn('Retrying model call', { attempt, delay: Math.round(delay), error: error.message });
      },
    });

    if (!response.ok) {
      throw ProviderError.fromStatus(this.name, response.status, await response.text());
    }

    return response;
  }
}
