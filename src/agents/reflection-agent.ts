/**
 * Reflection Agent
 *
 * Produces an answer, asks the model to critique it, and refines it until the
 * critique reports nothing left to improve or the iteration budget runs out.
 *
 *   initial → (reflect → refine)* → last execution
 */

import { z } from 'zod';
import { Agent, type AgentOptions, type RunOptions } from '../core/agent.js';
import { ValidationError } from '../errors/index.js';
import type { LLMTransport } from '../providers/types.js';
import { missingPlaceholders, renderTemplate } from '../utilities/template.js';
import { DEFAULT_REFLECTION_PROMPTS, EXPECTED_PLACEHOLDERS, type ReflectionPrompts } from './prompts.js';

// =============================================================================
// MEMORY
// =============================================================================

export type MemoryRecordType = 'execution' | 'reflection';

export interface MemoryRecord {
  readonly type: MemoryRecordType;
  readonly content: string;
}

const RECORD_HEADERS: Record<MemoryRecordType, string> = {
  execution: '--- Previous Attempt ---',
  reflection: '--- Reviewer Feedback ---',
};

/**
 * Append-only log of attempts and the feedback they received during one run.
 */
export class Memory {
  private entries: MemoryRecord[] = [];

  addRecord(type: MemoryRecordType, content: string): void {
    this.entries.push({ type, content });
  }

  /**
   * Every record in order, each under its header.
   */
  getTrajectory(): string {
    return this.entries
      .map((record) => `${RECORD_HEADERS[record.type]}\n${record.content}`)
      .join('\n\n')
      .trim();
  }

  /**
   * Content of the most recent execution record, or '' when there is none.
   */
  getLastExecution(): string {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].type === 'execution') {
        return this.entries[i].content;
      }
    }
    return '';
  }

  get records(): MemoryRecord[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

// =============================================================================
// CONVERGENCE
// =============================================================================

export const DEFAULT_CONVERGENCE_PHRASE = 'no improvement needed';

export type ConvergenceCheck = (feedback: string) => boolean;

export function isNoImprovementNeeded(feedback: string): boolean {
  return feedback.toLowerCase().includes(DEFAULT_CONVERGENCE_PHRASE);
}

// =============================================================================
// AGENT
// =============================================================================

export interface ReflectionAgentOptions extends AgentOptions {
  /** Reflect/refine rounds after the initial attempt (default 3) */
  maxIterations?: number;
  prompts?: Partial<ReflectionPrompts>;
  /** Decides whether reviewer feedback ends the loop */
  isConverged?: ConvergenceCheck;
}

const MaxIterationsSchema = z.number().int().min(0);

export class ReflectionAgent extends Agent {
  readonly maxIterations: number;
  readonly prompts: ReflectionPrompts;

  private isConverged: ConvergenceCheck;
  private currentMemory = new Memory();

  constructor(name: string, llm: LLMTransport, options: ReflectionAgentOptions = {}) {
    super(name, llm, options);

    const iterations = MaxIterationsSchema.safeParse(options.maxIterations ?? 3);
    if (!iterations.success) {
      throw ValidationError.fromZodError(iterations.error);
    }
    this.maxIterations = iterations.data;
    this.prompts = { ...DEFAULT_REFLECTION_PROMPTS, ...options.prompts };
    this.isConverged = options.isConverged ?? isNoImprovementNeeded;

    for (const key of ['initial', 'reflect', 'refine'] as const) {
      const template = options.prompts?.[key];
      if (template === undefined) continue;
      const missing = missingPlaceholders(template, EXPECTED_PLACEHOLDERS[key]);
      if (missing.length > 0) {
        this.log.warn(`Custom ${key} prompt does not use every placeholder`, { missing });
      }
    }
  }

  /**
   * Memory of the current or most recent run.
   */
  get memory(): Memory {
    return this.currentMemory;
  }

  async run(input: string, options: RunOptions = {}): Promise<string> {
    this.log.info('Starting task', { task: input });
    const memory = new Memory();
    this.currentMemory = memory;

    const initial = await this.complete(renderTemplate(this.prompts.initial, { task: input }), 'user', options);
    memory.addRecord('execution', initial);

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      this.log.debug(`Iteration ${iteration}/${this.maxIterations}: reflecting`);
      const feedback = await this.complete(
        renderTemplate(this.prompts.reflect, { task: input, content: memory.getLastExecution() }),
        'user',
        options
      );
      memory.addRecord('reflection', feedback);

      if (this.isConverged(feedback)) {
        this.log.info('Reviewer reported no further improvement', { iteration });
        break;
      }

      this.log.debug(`Iteration ${iteration}/${this.maxIterations}: refining`);
      const refined = await this.complete(
        renderTemplate(this.prompts.refine, {
          task: input,
          last_attempt: memory.getLastExecution(),
          feedback,
        }),
        'user',
        options
      );
      memory.addRecord('execution', refined);
    }

    const answer = memory.getLastExecution();
    this.log.info('Task completed', { records: memory.size });
    this.recordExchange(input, answer);
    return answer;
  }
}
