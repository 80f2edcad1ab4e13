/**
 * Agent Base Class Tests
 */

import { describe, it, expect } from 'vitest';
import { Agent, type RunOptions } from '../../src/core/agent.js';
import { Message } from '../../src/core/message.js';
import { ScriptedTransport } from '../../src/providers/scripted.js';
import { ValidationError } from '../../src/errors/index.js';

class EchoAgent extends Agent {
  async run(input: string, options: RunOptions = {}): Promise<string> {
    const answer = await this.complete(input, 'user', options);
    this.recordExchange(input, answer);
    return answer;
  }
}

describe('Agent', () => {
  describe('configuration', () => {
    it('should fill in defaults', () => {
      const agent = new EchoAgent('echo', new ScriptedTransport());

      expect(agent.config).toEqual({
        debug: false,
        logLevel: 'info',
        maxHistoryLength: 100,
      });
      expect(agent.systemPrompt).toBeUndefined();
    });

    it('should reject out-of-range settings', () => {
      expect(() => new EchoAgent('echo', new ScriptedTransport(), { config: { temperature: -1 } })).toThrow(
        ValidationError
      );
      expect(() => new EchoAgent('echo', new ScriptedTransport(), { config: { maxHistoryLength: 0 } })).toThrow(
        'Validation failed: maxHistoryLength: Number must be greater than 0'
      );
    });
  });

  describe('calls', () => {
    it('should merge agent defaults under per-call options', async () => {
      const llm = new ScriptedTransport(['a', 'b']);
      const agent = new EchoAgent('echo', llm, { config: { temperature: 0.2, maxTokens: 64 } });

      await agent.run('x');
      await agent.run('y', { model: 'other-model', maxTokens: 8, extra: { top_p: 0.9 } });

      expect(llm.calls[0].options).toEqual({ temperature: 0.2, maxTokens: 64 });
      expect(llm.calls[1].options).toEqual({
        model: 'other-model',
        temperature: 0.2,
        maxTokens: 8,
        extra: { top_p: 0.9 },
      });
    });

    it('should leave temperature and token limit to the transport when unset', async () => {
      const llm = new ScriptedTransport(['a']);

      await new EchoAgent('echo', llm).run('x');

      expect(llm.calls[0].options).not.toHaveProperty('temperature');
      expect(llm.calls[0].options).not.toHaveProperty('maxTokens');
    });

    it('should not pass the chunk listener to the transport', async () => {
      const llm = new ScriptedTransport(['streamed']);
      const chunks: string[] = [];

      await new EchoAgent('echo', llm).run('x', { onChunk: (chunk) => chunks.push(chunk) });

      expect(llm.calls[0].options).not.toHaveProperty('onChunk');
      expect(chunks.join('')).toBe('streamed');
    });

    it('should prepend the system prompt', async () => {
      const llm = new ScriptedTransport(['ok']);
      await new EchoAgent('echo', llm, { systemPrompt: 'Be brief' }).run('x');

      expect(llm.calls[0].messages).toEqual([
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'x' },
      ]);
    });
  });

  describe('history', () => {
    it('should record each exchange as a user and an assistant message', async () => {
      const agent = new EchoAgent('echo', new ScriptedTransport(['answer']));

      await agent.run('question');

      expect(agent.getHistory().map(String)).toEqual(['[user] question', '[assistant] answer']);
    });

    it('should hand out a copy', () => {
      const agent = new EchoAgent('echo', new ScriptedTransport());
      agent.addToHistory(Message.user('one'));

      agent.getHistory().push(Message.user('two'));

      expect(agent.getHistory()).toHaveLength(1);
    });

    it('should keep every message up to maxHistoryLength until cleared', () => {
      const agent = new EchoAgent('echo', new ScriptedTransport(), { config: { maxHistoryLength: 3 } });

      for (const content of ['1', '2', '3']) {
        agent.addToHistory(Message.user(content));
      }

      expect(agent.getHistory().map((m) => m.content)).toEqual(['1', '2', '3']);
    });

    it('should drop the oldest messages beyond maxHistoryLength', () => {
      const agent = new EchoAgent('echo', new ScriptedTransport(), { config: { maxHistoryLength: 3 } });

      for (const content of ['1', '2', '3', '4', '5']) {
        agent.addToHistory(Message.user(content));
      }

      expect(agent.getHistory().map((m) => m.content)).toEqual(['3', '4', '5']);
    });

    it('should clear', () => {
      const agent = new EchoAgent('echo', new ScriptedTransport());
      agent.addToHistory(Message.user('one'));

      agent.clearHistory();

      expect(agent.getHistory()).toEqual([]);
    });
  });
});
