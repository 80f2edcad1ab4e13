/**
 * Plan and Solve Agent
 *
 * Decomposes a question into an ordered list of steps (Planner), then runs the
 * steps one by one, threading earlier results into each prompt (Executor).
 *
 *   question → [Planner] → ["step 1", "step 2", ...]
 *            → [Executor] step 1 → step 2 → ... → answer = result of last step
 */

import { z } from 'zod';
import { Agent, type AgentOptions, type RunOptions } from '../core/agent.js';
import { composeMessages } from '../core/message.js';
import { streamToString } from '../providers/collect.js';
import type { LLMTransport } from '../providers/types.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { missingPlaceholders, renderTemplate } from '../utilities/template.js';
import {
  DEFAULT_EXECUTOR_PROMPT,
  DEFAULT_PLANNER_PROMPT,
  EXPECTED_PLACEHOLDERS,
  type PlanSolvePrompts,
} from './prompts.js';

export const PLAN_FAILURE_MESSAGE = 'Failed to generate a valid action plan; task terminated.';

// =============================================================================
// PLAN PARSING
// =============================================================================

const PLAN_FENCE = /```json\b([\s\S]*?)```/i;

const PlanSchema = z.array(z.string());

export type PlanParseResult = { ok: true; plan: string[] } | { ok: false; reason: string };

/**
 * Extract the plan from the first ```json fenced block of a response. Prose
 * around the block is ignored; the block must hold a JSON array of strings.
 */
export function parsePlan(response: string): PlanParseResult {
  const match = PLAN_FENCE.exec(response);
  if (!match) {
    return { ok: false, reason: 'no ```json fenced block in the response' };
  }

  let value: unknown;
  try {
    value = JSON.parse(match[1].trim());
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = PlanSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: 'the fenced block is not a list of strings' };
  }
  return { ok: true, plan: parsed.data };
}

// =============================================================================
// PLANNER
// =============================================================================

export interface StepRunnerOptions {
  /** Prompt template overriding the default */
  template?: string;
  /** Sent as a leading system message with every call */
  systemPrompt?: string;
  logger?: StructuredLogger;
}

export class Planner {
  readonly template: string;

  private log: StructuredLogger;

  constructor(
    readonly llm: LLMTransport,
    private options: StepRunnerOptions = {}
  ) {
    this.template = options.template ?? DEFAULT_PLANNER_PROMPT;
    this.log = options.logger ?? createComponentLogger('Planner');
  }

  /**
   * Ask the model for a plan. Parse failures yield an empty plan; transport
   * failures reject.
   */
  async createPlan(question: string, options: RunOptions = {}): Promise<string[]> {
    const { onChunk, ...chat } = options;
    const prompt = renderTemplate(this.template, { question });

    this.log.info('Generating plan');
    const response = await streamToString(
      this.llm,
      composeMessages(prompt, 'system', this.options.systemPrompt),
      chat,
      onChunk
    );

    const result = parsePlan(response);
    if (!result.ok) {
      this.log.warn('Failed to parse plan', { reason: result.reason });
      return [];
    }

    this.log.info('Plan generated', { steps: result.plan.length });
    return result.plan;
  }
}

// =============================================================================
// EXECUTOR
// =============================================================================

export interface StepResult {
  /** 1-based position in the plan */
  index: number;
  step: string;
  result: string;
}

export interface ExecutionResult {
  /** Result of the last step */
  answer: string;
  /** Accumulated "Step i / Result" text */
  history: string;
  steps: StepResult[];
}

export class Executor {
  readonly template: string;

  private log: StructuredLogger;

  constructor(
    readonly llm: LLMTransport,
    private options: StepRunnerOptions = {}
  ) {
    this.template = options.template ?? DEFAULT_EXECUTOR_PROMPT;
    this.log = options.logger ?? createComponentLogger('Executor');
  }

  /**
   * Run every step in order and return the last step's result.
   */
  async execute(question: string, plan: string[], options: RunOptions = {}): Promise<string> {
    const { answer } = await this.run(question, plan, options);
    return answer;
  }

  /**
   * Run every step in order. Each step sees the question, the full plan and
   * the results of all earlier steps. Steps are never retried or skipped.
   */
  async run(question: string, plan: string[], options: RunOptions = {}): Promise<ExecutionResult> {
    const { onChunk, ...chat } = options;
    const renderedPlan = JSON.stringify(plan);
    const steps: StepResult[] = [];
    let history = '';

    for (const [offset, step] of plan.entries()) {
      const index = offset + 1;
      this.log.info(`Executing step ${index}/${plan.length}`, { step });

      const prompt = renderTemplate(this.template, {
        question,
        plan: renderedPlan,
        history,
        current_step: step,
      });
      const result = await streamToString(
        this.llm,
        composeMessages(prompt, 'system', this.options.systemPrompt),
        chat,
        onChunk
      );

      history += `Step ${index}: ${step}\nResult: ${result}\n\n`;
      steps.push({ index, step, result });
      this.log.debug(`Step ${index} completed`, { length: result.length });
    }

    return { answer: steps[steps.length - 1]?.result ?? '', history, steps };
  }
}

// =============================================================================
// AGENT
// =============================================================================

export interface PlanAndSolveAgentOptions extends AgentOptions {
  prompts?: Partial<PlanSolvePrompts>;
}

export class PlanAndSolveAgent extends Agent {
  readonly planner: Planner;
  readonly executor: Executor;

  constructor(name: string, llm: LLMTransport, options: PlanAndSolveAgentOptions = {}) {
    super(name, llm, options);

    const { planner, executor } = options.prompts ?? {};
    for (const [key, template] of [['planner', planner], ['executor', executor]] as const) {
      const missing = template === undefined ? [] : missingPlaceholders(template, EXPECTED_PLACEHOLDERS[key]);
      if (missing.length > 0) {
        this.log.warn(`Custom ${key} prompt does not use every placeholder`, { missing });
      }
    }

    this.planner = new Planner(llm, { template: planner, systemPrompt: this.systemPrompt, logger: this.log });
    this.executor = new Executor(llm, { template: executor, systemPrompt: this.systemPrompt, logger: this.log });
  }

  async run(input: string, options: RunOptions = {}): Promise<string> {
    this.log.info('Starting task', { question: input });
    const callOptions: RunOptions = { ...this.chatOptions(options), onChunk: options.onChunk };

    const plan = await this.planner.createPlan(input, callOptions);
    if (plan.length === 0) {
      this.log.warn('Task terminated without a plan');
      this.recordExchange(input, PLAN_FAILURE_MESSAGE);
      return PLAN_FAILURE_MESSAGE;
    }

    const answer = await this.executor.execute(input, plan, callOptions);
    this.log.info('Task completed', { steps: plan.length });
    this.recordExchange(input, answer);
    return answer;
  }
}
