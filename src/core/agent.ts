/**
 * Agent base class
 *
 * Every agent has a name, a transport, an optional system prompt, settings,
 * and a history of the tasks it was given and the answers it produced.
 */

import { AgentConfigSchema, type AgentConfig, type AgentConfigInput } from '../config/schema.js';
import { ValidationError } from '../errors/index.js';
import { streamToString } from '../providers/collect.js';
import type { ChatOptions, ChunkListener, LLMTransport } from '../providers/types.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { Message, composeMessages, type MessageRole } from './message.js';

export interface AgentOptions {
  systemPrompt?: string;
  config?: AgentConfigInput;
  logger?: StructuredLogger;
}

/**
 * Options accepted by every `run` call.
 */
export interface RunOptions extends ChatOptions {
  /** Receives streamed fragments before they are folded into the answer */
  onChunk?: ChunkListener;
}

export abstract class Agent {
  readonly name: string;
  readonly llm: LLMTransport;
  readonly systemPrompt?: string;
  readonly config: AgentConfig;

  protected readonly log: StructuredLogger;
  private history: Message[] = [];

  constructor(name: string, llm: LLMTransport, options: AgentOptions = {}) {
    const parsed = AgentConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    this.name = name;
    this.llm = llm;
    this.systemPrompt = options.systemPrompt;
    this.config = parsed.data;
    this.log = (options.logger ?? createComponentLogger(this.constructor.name)).withContext({ agent: name });
  }

  /**
   * Run the agent on a task and return its answer.
   */
  abstract run(input: string, options?: RunOptions): Promise<string>;

  /**
   * Append a message. History otherwise lasts until `clearHistory()`, but
   * once it holds more than `maxHistoryLength` entries the oldest are dropped.
   */
  addToHistory(message: Message): void {
    this.history.push(message);
    const overflow = this.history.length - this.config.maxHistoryLength;
    if (overflow > 0) {
      this.history.splice(0, overflow);
    }
  }

  clearHistory(): void {
    this.history = [];
  }

  getHistory(): Message[] {
    return [...this.history];
  }

  toString(): string {
    return `Agent(name=${this.name})`;
  }

  /**
   * Record one task/answer exchange.
   */
  protected recordExchange(input: string, answer: string): void {
    this.addToHistory(Message.user(input));
    this.addToHistory(Message.assistant(answer));
  }

  /**
   * Merge the agent's defaults under the per-call options.
   */
  protected chatOptions(options: RunOptions = {}): ChatOptions {
    const { onChunk: _onChunk, ...chat } = options;
    const temperature = chat.temperature ?? this.config.temperature;
    const maxTokens = chat.maxTokens ?? this.config.maxTokens;
    return {
      ...chat,
      ...(temperature !== undefined && { temperature }),
      ...(maxTokens !== undefined && { maxTokens }),
    };
  }

  /**
   * One streamed call, folded into the complete response text.
   */
  protected complete(prompt: string, role: MessageRole, options: RunOptions = {}): Promise<string> {
    return streamToString(
      this.llm,
      composeMessages(prompt, role, this.systemPrompt),
      this.chatOptions(options),
      options.onChunk
    );
  }
}
