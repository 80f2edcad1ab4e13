/**
 * Folding a streamed response into one string.
 */

import type { TransportMessage } from '../core/message.js';
import type { ChatOptions, ChunkListener, LLMTransport } from './types.js';

/**
 * Drain a fragment stream, forwarding each fragment to `onChunk` before it is
 * folded into the result.
 */
export async function collectStream(
  stream: AsyncIterable<string>,
  onChunk?: ChunkListener
): Promise<string> {
  let text = '';
  for await (const chunk of stream) {
    if (!chunk) continue;
    onChunk?.(chunk);
    text += chunk;
  }
  return text;
}

/**
 * Issue one streaming call and return the complete response text.
 */
export function streamToString(
  transport: LLMTransport,
  messages: TransportMessage[],
  options?: ChatOptions,
  onChunk?: ChunkListener
): Promise<string> {
  return collectStream(transport.stream(messages, options), onChunk);
}
