/**
 * LLM Transport Types
 *
 * The contract the agent loops consume. A transport turns a message list into
 * either one complete string or a lazy, finite sequence of text fragments whose
 * concatenation is the complete response.
 */

import type { TransportMessage } from '../core/message.js';

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Per-call configuration.
 */
export interface ChatOptions {
  /** Temperature for randomness */
  temperature?: number;

  /** Maximum tokens to generate */
  maxTokens?: number;

  /** Model override (uses the transport default if not specified) */
  model?: string;

  /** Provider-specific request fields passed through unchanged */
  extra?: Record<string, unknown>;
}

// =============================================================================
// TRANSPORT INTERFACE
// =============================================================================

export interface LLMTransport {
  /** Transport name for logging */
  readonly name: string;

  /** Default model used by this transport */
  readonly model: string;

  /**
   * One-shot call returning the full response.
   */
  invoke(messages: TransportMessage[], options?: ChatOptions): Promise<string>;

  /**
   * Streaming call. The iterable is not restartable; failures surface as a
   * rejection while it is being consumed.
   */
  stream(messages: TransportMessage[], options?: ChatOptions): AsyncIterable<string>;
}

/**
 * Called with every fragment as it arrives from a streaming call.
 */
export type ChunkListener = (chunk: string) => void;
