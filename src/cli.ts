/**
 * CLI Argument Parsing and Help
 */

import chalk from 'chalk';
import type { TransportMessage } from './core/message.js';
import { ValidationError } from './errors/index.js';

export const VERSION = '0.1.0';

export const COMMANDS = ['plan', 'reflect', 'search', 'tools'] as const;

export type Command = (typeof COMMANDS)[number];

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  command?: Command;
  /** Question, task or query: every positional argument after the command */
  input?: string;
  help: boolean;
  version: boolean;
  debug: boolean;
  /** Replace the model with canned replies */
  dryRun: boolean;
  baseDir?: string;
  backend?: string;
  mode?: string;
  maxIterations?: number;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`${flag} requires a value`, [flag]);
  }
  return value;
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    dryRun: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--dry-run') {
      result.dryRun = true;
    } else if (arg === '--base-dir') {
      result.baseDir = requireValue(args, ++i, arg);
    } else if (arg === '--backend' || arg === '-b') {
      result.backend = requireValue(args, ++i, arg);
    } else if (arg === '--mode') {
      result.mode = requireValue(args, ++i, arg);
    } else if (arg === '--max-iterations' || arg === '-i') {
      const raw = requireValue(args, ++i, arg);
      const value = Number(raw);
      if (!Number.isInteger(value) || value < 0) {
        throw new ValidationError(`${arg} expects a non-negative integer, got "${raw}"`, [arg]);
      }
      result.maxIterations = value;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new ValidationError(`Unknown option: ${arg}`, [arg]);
    } else {
      positional.push(arg);
    }
  }

  const [first, ...rest] = positional;
  if (first !== undefined) {
    if (!isCommand(first)) {
      throw new ValidationError(`Unknown command: ${first}`, ['command']);
    }
    result.command = first;
    if (rest.length > 0) {
      result.input = rest.join(' ');
    }
  }

  return result;
}

/**
 * Canned replies for --dry-run, chosen by what the prompt asks for.
 */
export function dryRunReply(messages: TransportMessage[]): string {
  const prompt = messages[messages.length - 1]?.content ?? '';
  if (prompt.includes('JSON array of strings')) {
    return '```json\n["Restate the question", "Answer the question"]\n```';
  }
  if (prompt.includes('review the following answer')) {
    return 'No improvement needed.';
  }
  return '(dry run) no model was called.';
}

/**
 * Help text.
 */
export function helpText(): string {
  return `
${chalk.bold('tiny-agents')} ${chalk.dim(`v${VERSION}`)}
Plan-and-solve and reflection agents with a tool registry.

${chalk.bold('USAGE:')}
  tiny-agents <command> [options] [input]

${chalk.bold('COMMANDS:')}
  plan <question>         Decompose a question into steps and solve them in order
  reflect <task>          Answer, critique and refine until no improvement is needed
  search <query>          Search the web (Tavily, SerpApi or both)
  tools                   List the registered tools and their parameters

${chalk.bold('OPTIONS:')}
  -h, --help              Show this help
  -v, --version           Show version (${VERSION})
  -i, --max-iterations N  Reflection rounds (default: 3)
  -b, --backend NAME      Search backend: tavily, serpapi, hybrid (default: hybrid)
  --mode MODE             Search output: text or json (default: text)
  --base-dir DIR          Directory the file tools are confined to
  --dry-run               Use canned model replies instead of calling an LLM
  --debug                 Verbose logging

${chalk.bold('ENVIRONMENT:')}
  LLM_MODEL_ID, LLM_API_KEY, LLM_BASE_URL    Model endpoint (OpenAI-compatible)
  TAVILY_API_KEY, SERPAPI_API_KEY            Search credentials
  SEARCH_BACKEND, LOG_LEVEL                  Defaults for --backend and logging
  Values are also read from .env and .tiny-agents/config.json.

${chalk.bold('EXAMPLES:')}
  ${chalk.dim('# Plan and solve')}
  tiny-agents plan "How many weekdays are there in March 2025?"

  ${chalk.dim('# Reflection with two refine rounds')}
  tiny-agents reflect -i 2 "Write a haiku about version control"

  ${chalk.dim('# Structured search output')}
  tiny-agents search --mode json "node 20 release date"
`;
}

export function showHelp(): void {
  console.log(helpText());
}
