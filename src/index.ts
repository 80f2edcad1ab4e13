/**
 * tiny-agents public API
 */

// Agents
export { Agent, type AgentOptions, type RunOptions } from './core/agent.js';
export {
  Executor,
  PLAN_FAILURE_MESSAGE,
  PlanAndSolveAgent,
  Planner,
  parsePlan,
  type ExecutionResult,
  type PlanAndSolveAgentOptions,
  type PlanParseResult,
  type StepResult,
  type StepRunnerOptions,
} from './agents/plan-solve-agent.js';
export {
  DEFAULT_CONVERGENCE_PHRASE,
  Memory,
  ReflectionAgent,
  isNoImprovementNeeded,
  type ConvergenceCheck,
  type MemoryRecord,
  type MemoryRecordType,
  type ReflectionAgentOptions,
} from './agents/reflection-agent.js';
export {
  DEFAULT_EXECUTOR_PROMPT,
  DEFAULT_PLANNER_PROMPT,
  DEFAULT_REFLECTION_PROMPTS,
  type PlanSolvePrompts,
  type ReflectionPrompts,
} from './agents/prompts.js';

// Messages and transports
export { Message, composeMessages, type MessageRole, type TransportMessage } from './core/message.js';
export type { ChatOptions, ChunkListener, LLMTransport } from './providers/types.js';
export { collectStream, streamToString } from './providers/collect.js';
export { OpenAICompatibleTransport, type OpenAICompatibleConfig } from './providers/openai-compatible.js';
export { ScriptedTransport, type ScriptedReply, type ScriptedCall } from './providers/scripted.js';

// Tools
export type {
  StructuredOutput,
  Tool,
  ToolFunction,
  ToolOutput,
  ToolParameter,
  ToolParams,
  ToolSchema,
} from './tools/types.js';
export { BaseTool, FunctionTool, defineTool, describeParameters, type FunctionToolOptions } from './tools/base.js';
export { ToolRegistry, renderToolOutput, type RegisterToolOptions } from './tools/registry.js';
export { FileTool, type FileToolOptions } from './tools/file.js';
export { SearchTool, type SearchOptions, type SearchToolOptions } from './tools/search/search-tool.js';
export { TavilyBackend } from './tools/search/tavily.js';
export { SerpApiBackend } from './tools/search/serpapi.js';
export { formatTextResponse, limitText } from './tools/search/format.js';
export type { SearchBackend, SearchPayload, SearchRequest, SearchResult } from './tools/search/types.js';

// Config, errors, logging
export { loadConfig, type ConfigLoadOptions, type ConfigLoadResult } from './config/config-manager.js';
export type { Config, ConfigInput } from './config/schema.js';
export * from './errors/index.js';
export {
  ConsoleSink,
  MemorySink,
  StructuredLogger,
  configureLogger,
  createComponentLogger,
  logger,
  LOG_LEVELS,
  type ConsoleSinkOptions,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerConfig,
} from './utilities/logger.js';
