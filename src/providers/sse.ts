/**
 * SSE Parser
 *
 * Parses Server-Sent Events from a streaming HTTP response body.
 *
 * ```
 * data: {"choices":[{"delta":{"content":"Hel"}}]}
 *
 * data: [DONE]
 * ```
 */

import { createComponentLogger } from '../utilities/logger.js';

export interface SSEEvent {
  event?: string;
  data: string;
  id?: string;
}

/** Sentinel some providers send as the final `data:` payload */
export const SSE_DONE = '[DONE]';

/**
 * Parse SSE events from a byte stream. Iteration ends at the end of the body
 * or at a `[DONE]` payload, whichever comes first. A body left unread, by
 * `[DONE]` or by a consumer that stops early, is cancelled so the connection
 * is released.
 */
export async function* parseSSE(stream: ReadableStream<Uint8Array>): AsyncGenerator<SSEEvent> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let drained = false;

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        drained = true;
        buffer += decoder.decode();
        const event = parseEventBlock(buffer);
        if (event && event.data !== SSE_DONE) {
          yield event;
        }
        return;
      }

      buffer = (buffer + decoder.decode(value, { stream: true })).replace(/\r\n/g, '\n');

      // Events are separated by a blank line
      const parts = buffer.split('\n\n');
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        const event = parseEventBlock(part);
        if (!event) continue;
        if (event.data === SSE_DONE) {
          return;
        }
        yield event;
      }
    }
  } finally {
    if (!drained) {
      await reader.cancel().catch((error: unknown) => {
        createComponentLogger('SSE').warn('Failed to cancel stream body', { error: String(error) });
      });
    }
    reader.releaseLock();
  }
}

/**
 * Parse a single SSE event block. Comment lines and blocks without data are
 * skipped; multiple `data:` lines are joined with newlines.
 */
export function parseEventBlock(block: string): SSEEvent | null {
  const data: string[] = [];
  let event: string | undefined;
  let id: string | undefined;

  for (const line of block.split('\n')) {
    if (line.startsWith(':')) continue;
    if (line.startsWith('event:')) {
      event = line.slice(6).trim();
    } else if (line.startsWith('data:')) {
      data.push(line.slice(5).replace(/^ /, ''));
    } else if (line.startsWith('id:')) {
      id = line.slice(3).trim();
    }
  }

  if (data.length === 0) {
    return null;
  }

  return {
    data: data.join('\n').trim(),
    ...(event !== undefined && { event }),
    ...(id !== undefined && { id }),
  };
}
