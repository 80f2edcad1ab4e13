/**
 * Zod schemas for configuration.
 *
 * Validates what users put in `.tiny-agents/config.json` and what arrives
 * through environment variables. Every section is optional; defaults live in
 * the schemas so a parsed config is always complete.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../utilities/logger.js';

// =============================================================================
// SECTIONS
// =============================================================================

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Settings for the OpenAI-compatible transport.
 */
export const LLMConfigSchema = z
  .object({
    model: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    temperature: z.number().min(0).max(2).default(0.5),
    maxTokens: z.number().int().positive().optional(),
    /** Request timeout in milliseconds */
    timeout: z.number().int().positive().default(60000),
    /** Transport-level retries for 429/5xx responses */
    maxRetries: z.number().int().nonnegative().default(2),
  })
  .strict();

/**
 * Settings shared by every agent.
 */
export const AgentConfigSchema = z
  .object({
    /** Unset leaves the transport's own temperature in effect */
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    debug: z.boolean().default(false),
    logLevel: LogLevelSchema.default('info'),
    maxHistoryLength: z.number().int().positive().default(100),
  })
  .strict();

export const ReflectionConfigSchema = z
  .object({
    maxIterations: z.number().int().nonnegative().default(3),
  })
  .strict();

export const SearchBackendSchema = z.enum(['tavily', 'serpapi', 'hybrid']);

export const SearchConfigSchema = z
  .object({
    backend: SearchBackendSchema.default('hybrid'),
    tavilyApiKey: z.string().min(1).optional(),
    serpapiApiKey: z.string().min(1).optional(),
    maxResults: z.number().int().positive().default(5),
  })
  .strict();

export const FileToolConfigSchema = z
  .object({
    baseDir: z.string().min(1).optional(),
  })
  .strict();

// =============================================================================
// TOP-LEVEL SCHEMA
// =============================================================================

export const ConfigSchema = z
  .object({
    llm: LLMConfigSchema.default({}),
    agent: AgentConfigSchema.default({}),
    reflection: ReflectionConfigSchema.default({}),
    search: SearchConfigSchema.default({}),
    files: FileToolConfigSchema.default({}),
  })
  .strict();

export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
export type ReflectionConfig = z.infer<typeof ReflectionConfigSchema>;
export type SearchBackendName = z.infer<typeof SearchBackendSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type FileToolConfig = z.infer<typeof FileToolConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
