/**
 * Tool System Types
 *
 * The capability contract shared by every tool the registry can hold.
 */

import type { z } from 'zod';

// =============================================================================
// PARAMETERS
// =============================================================================

/**
 * Descriptive metadata for one tool parameter. Used to build prompts; the
 * registry never validates call arguments against it.
 */
export interface ToolParameter {
  name: string;
  /** Type tag such as "string" or "integer" */
  type: string;
  description: string;
  required: boolean;
  default?: unknown;
}

/**
 * Arguments of a tool invocation, keyed by parameter name.
 */
export type ToolParams = Record<string, unknown>;

/**
 * Schema a tool validates its arguments with.
 */
export type ToolSchema<TInput extends ToolParams = ToolParams> = z.ZodType<TInput, z.ZodTypeDef, unknown>;

// =============================================================================
// OUTPUT
// =============================================================================

export type StructuredOutput = { readonly [key: string]: unknown };

/**
 * Tools answer in text; some can also return a structured payload.
 */
export type ToolOutput = string | StructuredOutput;

// =============================================================================
// TOOL
// =============================================================================

export interface Tool {
  /** Unique within a registry */
  readonly name: string;

  /** Human-readable description (shown to the LLM) */
  readonly description: string;

  /** Whether registration may replace this tool with its sub-tools */
  readonly expandable: boolean;

  run(params: ToolParams): Promise<ToolOutput>;

  getParameters(): ToolParameter[];

  /**
   * Independently addressable sub-tools. Empty for tools that do not expand.
   */
  expand(): Tool[];
}

/**
 * A plain function registered under a name. Receives the raw text input.
 */
export type ToolFunction = (input: string) => string | Promise<string>;

export interface FunctionEntry {
  description: string;
  fn: ToolFunction;
}
