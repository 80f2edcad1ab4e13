/**
 * Configuration Loader
 *
 * Single entry point for loading, merging, and validating configuration from
 * the project file (.tiny-agents/config.json) and the environment.
 *
 * Priority: defaults ← project file ← environment.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { z, ZodTypeAny } from 'zod';
import {
  AgentConfigSchema,
  FileToolConfigSchema,
  LLMConfigSchema,
  ReflectionConfigSchema,
  SearchConfigSchema,
  type Config,
} from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export const PROJECT_DIR = '.tiny-agents';
export const PROJECT_CONFIG_FILE = 'config.json';

export interface ConfigLoadOptions {
  /** Working directory for locating the project config (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip project-level config loading */
  skipProject?: boolean;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: Config;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'project' | 'env'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

type RawConfig = Record<string, unknown>;

/**
 * Environment variables and the config path they fill.
 */
const ENV_BINDINGS: Array<{ variable: string; section: string; key: string; parse?: (raw: string) => unknown }> = [
  { variable: 'LLM_MODEL_ID', section: 'llm', key: 'model' },
  { variable: 'LLM_API_KEY', section: 'llm', key: 'apiKey' },
  { variable: 'LLM_BASE_URL', section: 'llm', key: 'baseUrl' },
  { variable: 'LLM_TIMEOUT_MS', section: 'llm', key: 'timeout', parse: Number },
  { variable: 'LOG_LEVEL', section: 'agent', key: 'logLevel', parse: (raw) => raw.toLowerCase() },
  { variable: 'TAVILY_API_KEY', section: 'search', key: 'tavilyApiKey' },
  { variable: 'SERPAPI_API_KEY', section: 'search', key: 'serpapiApiKey' },
  { variable: 'SEARCH_BACKEND', section: 'search', key: 'backend', parse: (raw) => raw.toLowerCase() },
];

const SECTION_NAMES: string[] = ['llm', 'agent', 'reflection', 'search', 'files'];

// =============================================================================
// DEEP MERGE
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow spread with 1-level nested object merge; arrays replace.
 */
function deepMergeConfigs(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] = isPlainObject(value) && isPlainObject(baseValue) ? { ...baseValue, ...value } : value;
  }

  return result;
}

// =============================================================================
// LOADERS
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Collects parse errors as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): RawConfig | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (!isPlainObject(parsed)) {
      warnings.push(
        `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`
      );
      return null;
    }

    return parsed;
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Build a raw config fragment from environment variables. Empty values are
 * treated as unset.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const result: Record<string, RawConfig> = {};

  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.variable]?.trim();
    if (!raw) continue;

    const section = result[binding.section] ?? {};
    section[binding.key] = binding.parse ? binding.parse(raw) : raw;
    result[binding.section] = section;
  }

  return result;
}

function parseSection<S extends ZodTypeAny>(
  key: keyof Config,
  schema: S,
  raw: RawConfig,
  warnings: string[]
): z.infer<S> {
  const result = schema.safeParse(raw[key] ?? {});
  if (result.success) {
    return result.data;
  }
  for (const issue of result.error.issues) {
    warnings.push(`${[key, ...issue.path].join('.')}: ${issue.message}`);
  }
  return schema.parse({});
}

/**
 * Validate each section on its own so that one bad value only resets its
 * section to defaults.
 */
function validateSections(raw: RawConfig, warnings: string[]): Config {
  for (const key of Object.keys(raw)) {
    if (!SECTION_NAMES.includes(key)) {
      warnings.push(`Unknown configuration section "${key}" ignored`);
    }
  }

  return {
    llm: parseSection('llm', LLMConfigSchema, raw, warnings),
    agent: parseSection('agent', AgentConfigSchema, raw, warnings),
    reflection: parseSection('reflection', ReflectionConfigSchema, raw, warnings),
    search: parseSection('search', SearchConfigSchema, raw, warnings),
    files: parseSection('files', FileToolConfigSchema, raw, warnings),
  };
}

/**
 * Load configuration from the project file and the environment.
 *
 * Validation errors are collected as warnings; the best-effort config is
 * always returned.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd = process.cwd(), env = process.env, skipProject = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  let merged: RawConfig = {};

  if (!skipProject) {
    const projectPath = join(cwd, PROJECT_DIR, PROJECT_CONFIG_FILE);
    const projectRaw = loadJsonFile(projectPath, warnings);
    sources.push({ path: projectPath, level: 'project', loaded: projectRaw !== null });
    if (projectRaw) {
      merged = deepMergeConfigs(merged, projectRaw);
    }
  }

  const envRaw = configFromEnv(env);
  sources.push({ path: 'process.env', level: 'env', loaded: Object.keys(envRaw).length > 0 });
  merged = deepMergeConfigs(merged, envRaw);

  return { config: validateSections(merged, warnings), sources, warnings };
}
