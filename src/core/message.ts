/**
 * Chat messages exchanged between agents and the LLM transport.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

export const MessageRoleSchema = z.enum(['user', 'assistant', 'system']);

export type MessageRole = z.infer<typeof MessageRoleSchema>;

/**
 * The minimal `{role, content}` pair sent over the wire.
 */
export interface TransportMessage {
  role: MessageRole;
  content: string;
}

export interface MessageInit {
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

/**
 * An immutable chat message.
 */
export class Message {
  readonly content: string;
  readonly role: MessageRole;
  readonly timestamp: Date;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(content: string, role: MessageRole, init: MessageInit = {}) {
    const parsedRole = MessageRoleSchema.safeParse(role);
    if (!parsedRole.success) {
      throw ValidationError.fromZodError(parsedRole.error);
    }

    this.content = content;
    this.role = parsedRole.data;
    this.timestamp = new Date((init.timestamp ?? new Date()).getTime());
    this.metadata = Object.freeze({ ...init.metadata });
    Object.freeze(this);
  }

  static user(content: string, init?: MessageInit): Message {
    return new Message(content, 'user', init);
  }

  static assistant(content: string, init?: MessageInit): Message {
    return new Message(content, 'assistant', init);
  }

  static system(content: string, init?: MessageInit): Message {
    return new Message(content, 'system', init);
  }

  toTransport(): TransportMessage {
    return { role: this.role, content: this.content };
  }

  toString(): string {
    return `[${this.role}] ${this.content}`;
  }
}

/**
 * Message list for a single prompt, led by a system prompt when one is given.
 */
export function composeMessages(prompt: string, role: MessageRole, systemPrompt?: string): TransportMessage[] {
  const messages: Message[] = [];
  if (systemPrompt) {
    messages.push(Message.system(systemPrompt));
  }
  messages.push(new Message(prompt, role));
  return messages.map((m) => m.toTransport());
}
