/**
 * Scripted Transport
 *
 * A deterministic in-process transport that replays queued responses. Used by
 * the tests and by `tiny-agents --dry-run` to exercise the agent loops without
 * a network.
 */

import type { TransportMessage } from '../core/message.js';
import { ErrorCategory, ProviderError } from '../errors/index.js';
import type { ChatOptions, LLMTransport } from './types.js';

/**
 * A queued reply: fixed text, a thrown error, or text computed from the call.
 */
export type ScriptedReply = string | Error | ((messages: TransportMessage[]) => string);

export interface ScriptedCall {
  method: 'invoke' | 'stream';
  messages: TransportMessage[];
  options?: ChatOptions;
}

export interface ScriptedTransportOptions {
  /** Fragment length used when streaming (default: 8) */
  chunkSize?: number;
  /** Reply used once the queue is exhausted; without it the call fails */
  fallback?: ScriptedReply;
  model?: string;
}

export class ScriptedTransport implements LLMTransport {
  readonly name = 'scripted';
  readonly model: string;

  private queue: ScriptedReply[];
  private chunkSize: number;
  private fallback?: ScriptedReply;
  private recorded: ScriptedCall[] = [];

  constructor(replies: ScriptedReply[] = [], options: ScriptedTransportOptions = {}) {
    this.queue = [...replies];
    this.chunkSize = Math.max(1, options.chunkSize ?? 8);
    this.fallback = options.fallback;
    this.model = options.model ?? 'scripted-model';
  }

  /** Queue more replies */
  enqueue(...replies: ScriptedReply[]): this {
    this.queue.push(...replies);
    return this;
  }

  get calls(): readonly ScriptedCall[] {
    return this.recorded;
  }

  get remaining(): number {
    return this.queue.length;
  }

  /** Content of the last message of every recorded call */
  get prompts(): string[] {
    return this.recorded.map((call) => call.messages[call.messages.length - 1]?.content ?? '');
  }

  async invoke(messages: TransportMessage[], options?: ChatOptions): Promise<string> {
    this.recorded.push({ method: 'invoke', messages: [...messages], options });
    return this.resolve(messages);
  }

  async *stream(messages: TransportMessage[], options?: ChatOptions): AsyncGenerator<string> {
    this.recorded.push({ method: 'stream', messages: [...messages], options });
    const text = this.resolve(messages);

    for (let i = 0; i < text.length; i += this.chunkSize) {
      yield text.slice(i, i + this.chunkSize);
    }
  }

  private resolve(messages: TransportMessage[]): string {
    const reply = this.queue.shift() ?? this.fallback;

    if (reply === undefined) {
      throw new ProviderError(
        `${this.name} transport has no reply left for call #${this.recorded.length}`,
        ErrorCategory.INTERNAL,
        false,
        this.name
      );
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(messages) : reply;
  }
}
