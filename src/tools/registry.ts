/**
 * Tool Registry
 *
 * Holds tools and plain functions by name and executes them on request.
 * Tools and functions live in separate namespaces, but a name may be held
 * by only one of them.
 */

import { ToolError, ValidationError, formatErrorForLog } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { FunctionEntry, Tool, ToolFunction, ToolOutput, ToolParams } from './types.js';

export const NO_TOOLS_DESCRIPTION = 'No tools available.';

export interface ToolRegistryOptions {
  logger?: StructuredLogger;
}

export interface RegisterToolOptions {
  /** Replace an expandable tool with its sub-tools (default true) */
  autoExpand?: boolean;
}

/**
 * Render tool output as text. Structured payloads become indented JSON.
 */
export function renderToolOutput(output: ToolOutput): string {
  return typeof output === 'string' ? output : JSON.stringify(output, null, 2);
}

function functionInput(input: string | ToolParams): string {
  if (typeof input === 'string') return input;
  if (typeof input.input === 'string') return input.input;
  return JSON.stringify(input);
}

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private functions: Map<string, FunctionEntry> = new Map();
  private log: StructuredLogger;

  constructor(options: ToolRegistryOptions = {}) {
    this.log = options.logger ?? createComponentLogger('ToolRegistry');
  }

  /**
   * Register a tool. An expandable tool is replaced by its sub-tools; when
   * expansion yields nothing the tool itself is registered.
   */
  registerTool(tool: Tool, options: RegisterToolOptions = {}): void {
    const { autoExpand = true } = options;

    const subTools = autoExpand && tool.expandable ? tool.expand() : [];
    const entries = subTools.length > 0 ? subTools : [tool];

    for (const entry of entries) {
      this.assertNotFunction(entry.name);
    }
    for (const entry of entries) {
      if (this.tools.has(entry.name)) {
        this.log.warn(`Tool "${entry.name}" already registered; overwriting`);
      }
      this.tools.set(entry.name, entry);
    }

    if (subTools.length > 0) {
      this.log.info(`Tool "${tool.name}" expanded`, { subTools: subTools.map((t) => t.name) });
    } else {
      this.log.info(`Tool "${tool.name}" registered`);
    }
  }

  /**
   * Register a plain function that receives the raw text input.
   */
  registerFunction(name: string, description: string, fn: ToolFunction): void {
    if (this.tools.has(name)) {
      throw new ValidationError(`"${name}" is already registered as a tool`, ['name'], { name });
    }
    if (this.functions.has(name)) {
      this.log.warn(`Function "${name}" already registered; overwriting`);
    }
    this.functions.set(name, { description, fn });
    this.log.info(`Function "${name}" registered`);
  }

  /**
   * Remove a tool or function. Returns false when the name is unknown.
   */
  unregister(name: string): boolean {
    if (this.tools.delete(name)) {
      this.log.info(`Tool "${name}" unregistered`);
      return true;
    }
    if (this.functions.delete(name)) {
      this.log.info(`Function "${name}" unregistered`);
      return true;
    }
    this.log.warn(`Nothing registered under "${name}"`);
    return false;
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getFunction(name: string): ToolFunction | undefined {
    return this.functions.get(name)?.fn;
  }

  has(name: string): boolean {
    return this.tools.has(name) || this.functions.has(name);
  }

  /**
   * Execute a tool or function by name. Never rejects: failures and unknown
   * names come back as error text.
   *
   * Text input is passed to tools as `{ input }`; functions receive it as is.
   */
  async executeTool(name: string, input: string | ToolParams): Promise<string> {
    const tool = this.tools.get(name);
    const entry = this.functions.get(name);

    if (!tool && !entry) {
      this.log.warn(`Unknown tool "${name}"`);
      return `Error: no tool or function named '${name}'`;
    }

    this.log.debug(`Executing "${name}"`);
    try {
      if (tool) {
        return renderToolOutput(await tool.run(typeof input === 'string' ? { input } : input));
      }
      return entry ? await entry.fn(functionInput(input)) : '';
    } catch (error) {
      const toolError = ToolError.fromError(error, name);
      this.log.error(`"${name}" failed`, { error: formatErrorForLog(toolError) });
      return `Error: tool '${name}' failed: ${toolError.message}`;
    }
  }

  /**
   * One "name: description" line per entry, tools first.
   */
  getToolsDescription(): string {
    const lines = [
      ...[...this.tools.values()].map((tool) => `${tool.name}: ${tool.description}`),
      ...[...this.functions.entries()].map(([name, entry]) => `${name}: ${entry.description}`),
    ];
    return lines.length > 0 ? lines.join('\n') : NO_TOOLS_DESCRIPTION;
  }

  /**
   * Parameter listing for one tool, for prompt construction. Functions take a
   * single text input.
   */
  getParametersDescription(name: string): string | undefined {
    const tool = this.tools.get(name);
    if (tool) {
      const parameters = tool.getParameters();
      if (parameters.length === 0) return `${name}: no parameters`;
      return [
        `${name} parameters:`,
        ...parameters.map((p) => {
          const flags = `${p.type}, ${p.required ? 'required' : 'optional'}`;
          const fallback = p.default !== undefined ? ` (default: ${JSON.stringify(p.default)})` : '';
          return `- ${p.name} (${flags}): ${p.description}${fallback}`;
        }),
      ].join('\n');
    }
    if (this.functions.has(name)) {
      return `${name} parameters:\n- input (string, required): text passed to the function`;
    }
    return undefined;
  }

  /**
   * Every registered name, tools first.
   */
  listAll(): string[] {
    return [...this.tools.keys(), ...this.functions.keys()];
  }

  getAllTools(): Tool[] {
    return [...this.tools.values()];
  }

  clear(): void {
    this.tools.clear();
    this.functions.clear();
    this.log.info('Registry cleared');
  }

  private assertNotFunction(name: string): void {
    if (this.functions.has(name)) {
      throw new ValidationError(`"${name}" is already registered as a function`, ['name'], { name });
    }
  }
}
