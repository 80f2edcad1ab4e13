/**
 * Tool base classes
 *
 * BaseTool validates arguments against a zod schema before running, and
 * derives its parameter listing from the same schema. FunctionTool wraps a
 * handler so sub-tools can be built without a subclass each.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { Tool, ToolOutput, ToolParameter, ToolParams, ToolSchema } from './types.js';

// =============================================================================
// ZOD TO PARAMETER LIST
// =============================================================================

function typeTag(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodArray) return 'array';
  if (schema instanceof z.ZodObject || schema instanceof z.ZodRecord) return 'object';
  return 'string';
}

function describeField(name: string, field: z.ZodTypeAny): ToolParameter {
  let schema = field;
  let required = true;
  let defaultValue: unknown;
  let description = field.description;

  // Peel optional/default wrappers; the description may sit on either layer
  for (;;) {
    description ??= schema.description;
    if (schema instanceof z.ZodOptional) {
      required = false;
      schema = schema.unwrap();
    } else if (schema instanceof z.ZodDefault) {
      required = false;
      defaultValue = schema._def.defaultValue();
      schema = schema.removeDefault();
    } else {
      break;
    }
  }

  const parameter: ToolParameter = {
    name,
    type: typeTag(schema),
    description: description ?? '',
    required,
  };
  if (defaultValue !== undefined) {
    parameter.default = defaultValue;
  }
  return parameter;
}

/**
 * List the fields of an object schema as tool parameters.
 *
 * Fields named in `required` are listed as required even where the schema
 * leaves them optional, as it must when an alias field can stand in.
 */
export function describeParameters(schema: z.ZodTypeAny, required: readonly string[] = []): ToolParameter[] {
  if (!(schema instanceof z.ZodObject)) {
    return [];
  }
  return Object.entries<z.ZodTypeAny>(schema.shape).map(([name, field]) => {
    const parameter = describeField(name, field);
    return required.includes(name) ? { ...parameter, required: true } : parameter;
  });
}

// =============================================================================
// BASE TOOL
// =============================================================================

export abstract class BaseTool<TInput extends ToolParams = ToolParams> implements Tool {
  abstract readonly name: string;
  abstract readonly description: string;
  readonly expandable: boolean = false;

  protected abstract readonly schema: ToolSchema<TInput>;

  /** Listed as required although an alias lets the schema accept their absence */
  protected readonly requiredParameters: readonly string[] = [];

  /**
   * Validate the arguments and run the tool.
   */
  async run(params: ToolParams): Promise<ToolOutput> {
    const parsed = this.schema.safeParse(params);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    return this.execute(parsed.data);
  }

  getParameters(): ToolParameter[] {
    return describeParameters(this.schema, this.requiredParameters);
  }

  expand(): Tool[] {
    return [];
  }

  protected abstract execute(input: TInput): Promise<ToolOutput>;
}

// =============================================================================
// FUNCTION TOOL
// =============================================================================

export type ToolHandler<TInput extends ToolParams> = (input: TInput) => Promise<ToolOutput>;

export interface FunctionToolOptions {
  /** Parameters to list as required beyond what the schema demands */
  required?: readonly string[];
}

/**
 * A tool defined by a schema and a handler.
 */
export class FunctionTool<TInput extends ToolParams = ToolParams> extends BaseTool<TInput> {
  private readonly required: readonly string[];

  constructor(
    readonly name: string,
    readonly description: string,
    protected readonly schema: ToolSchema<TInput>,
    private readonly handler: ToolHandler<TInput>,
    options: FunctionToolOptions = {}
  ) {
    super();
    this.required = options.required ?? [];
  }

  getParameters(): ToolParameter[] {
    return describeParameters(this.schema, this.required);
  }

  protected execute(input: TInput): Promise<ToolOutput> {
    return this.handler(input);
  }
}

/**
 * Create a function tool with the input type inferred from the schema.
 */
export function defineTool<TInput extends ToolParams>(
  name: string,
  description: string,
  schema: ToolSchema<TInput>,
  handler: ToolHandler<TInput>,
  options?: FunctionToolOptions
): FunctionTool<TInput> {
  return new FunctionTool(name, description, schema, handler, options);
}
