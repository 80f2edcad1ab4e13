#!/usr/bin/env node
/**
 * tiny-agents command-line entry point.
 */

import chalk from 'chalk';
import { config as loadDotenv } from 'dotenv';
import { PlanAndSolveAgent } from './agents/plan-solve-agent.js';
import { ReflectionAgent } from './agents/reflection-agent.js';
import { VERSION, dryRunReply, parseArgs, showHelp, type CLIArgs } from './cli.js';
import { loadConfig } from './config/config-manager.js';
import type { Config } from './config/schema.js';
import { ValidationError, formatError } from './errors/index.js';
import { OpenAICompatibleTransport } from './providers/openai-compatible.js';
import { ScriptedTransport } from './providers/scripted.js';
import type { LLMTransport } from './providers/types.js';
import { FileTool } from './tools/file.js';
import { ToolRegistry } from './tools/registry.js';
import { SearchTool } from './tools/search/search-tool.js';
import { ConsoleSink, configureLogger, createComponentLogger } from './utilities/logger.js';

// =============================================================================
// TRANSPORT
// =============================================================================

function createTransport(args: CLIArgs, config: Config): LLMTransport {
  if (args.dryRun) {
    return new ScriptedTransport([], { fallback: dryRunReply, model: 'dry-run' });
  }
  return new OpenAICompatibleTransport({
    model: config.llm.model,
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    timeout: config.llm.timeout,
    maxRetries: config.llm.maxRetries,
  });
}

function createRegistry(args: CLIArgs, config: Config): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerTool(new FileTool({ baseDir: args.baseDir ?? config.files.baseDir }));
  registry.registerTool(
    new SearchTool({
      backend: args.backend ?? config.search.backend,
      tavilyApiKey: config.search.tavilyApiKey,
      serpapiApiKey: config.search.serpapiApiKey,
      maxResults: config.search.maxResults,
    })
  );
  return registry;
}

function requireInput(args: CLIArgs): string {
  if (!args.input) {
    throw new ValidationError(`"${args.command ?? ''}" needs an input; see --help`, ['input']);
  }
  return args.input;
}

const printChunk = (chunk: string): void => {
  process.stdout.write(chalk.dim(chunk));
};

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<number> {
  loadDotenv();
  const args = parseArgs();

  if (args.version) {
    console.log(VERSION);
    return 0;
  }
  if (args.help || !args.command) {
    showHelp();
    return args.help ? 0 : 1;
  }

  const { config, warnings } = loadConfig();
  const debug = args.debug || config.agent.debug;
  configureLogger({
    level: debug ? 'debug' : config.agent.logLevel,
    sinks: [new ConsoleSink({ timestamps: debug })],
  });
  const log = createComponentLogger('cli');
  for (const warning of warnings) {
    log.warn(warning);
  }

  switch (args.command) {
    case 'plan': {
      const agent = new PlanAndSolveAgent('plan-solve', createTransport(args, config), { config: config.agent });
      const answer = await agent.run(requireInput(args), { onChunk: printChunk });
      console.log(`\n\n${chalk.green.bold('Answer:')} ${answer}`);
      return 0;
    }

    case 'reflect': {
      const agent = new ReflectionAgent('reflection', createTransport(args, config), {
        config: config.agent,
        maxIterations: args.maxIterations ?? config.reflection.maxIterations,
      });
      const answer = await agent.run(requireInput(args), { onChunk: printChunk });
      console.log(`\n\n${chalk.cyan(agent.memory.getTrajectory())}`);
      console.log(`\n${chalk.green.bold('Answer:')} ${answer}`);
      return 0;
    }

    case 'search': {
      const registry = createRegistry(args, config);
      const output = await registry.executeTool('search', {
        query: requireInput(args),
        mode: args.mode ?? 'text',
        ...(args.backend ? { backend: args.backend } : {}),
      });
      console.log(output);
      return output.startsWith('Error:') ? 1 : 0;
    }

    case 'tools': {
      const registry = createRegistry(args, config);
      console.log(chalk.bold('Registered tools:'));
      console.log(registry.getToolsDescription());
      for (const name of registry.listAll()) {
        console.log(`\n${chalk.cyan(registry.getParametersDescription(name) ?? name)}`);
      }
      return 0;
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red(formatError(error)));
    process.exitCode = 1;
  });
