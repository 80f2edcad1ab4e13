/**
 * Centralized Error Types
 *
 * Typed, categorized errors shared by the agents, the transport and the tools.
 *
 * Error Categories:
 * - CONFIGURATION: missing credentials or settings, fatal at construction
 * - VALIDATION: malformed input, registry collisions
 * - TRANSIENT: network, timeout
 * - PERMANENT: auth, missing files, path containment
 * - DEPENDENCY: search backends and other external services
 *
 * @example
 * ```typescript
 * throw FileOperationError.notFound('/data/notes.md', 'read');
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** Missing or invalid configuration (credentials, endpoints) */
  CONFIGURATION = 'CONFIGURATION',

  /** Transient errors - may resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Permanent errors - will not resolve on retry */
  PERMANENT = 'PERMANENT',

  /** Validation errors - invalid input */
  VALIDATION = 'VALIDATION',

  /** Rate limited - API rate limits hit */
  RATE_LIMITED = 'RATE_LIMITED',

  /** Dependency errors - external service failures */
  DEPENDENCY = 'DEPENDENCY',

  /** Internal errors - unexpected internal failures */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all errors raised by the framework.
 */
export class AgentError extends Error {
  /** Error category for recovery decisions */
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'AgentError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Missing or invalid configuration. Raised while constructing a transport or
 * loading settings; never recoverable at runtime.
 */
export class ConfigurationError extends AgentError {
  /** Settings that were missing or invalid */
  readonly keys: string[];

  constructor(message: string, keys: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCategory.CONFIGURATION, false, { ...context, keys });
    this.name = 'ConfigurationError';
    this.keys = keys;
  }

  static missing(keys: string[]): ConfigurationError {
    return new ConfigurationError(
      `Missing required configuration: ${keys.join(', ')}. Set them in the environment or in .env`,
      keys
    );
  }
}

/**
 * Error from validation failures.
 */
export class ValidationError extends AgentError {
  /** Field(s) that failed validation */
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  /**
   * Create error from a Zod validation result.
   */
  static fromZodError(error: {
    issues: Array<{ path: (string | number)[]; message: string }>;
  }): ValidationError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message
    );
    return new ValidationError(`Validation failed: ${messages.join(', ')}`, fields);
  }
}

/**
 * Error from tool execution.
 */
export class ToolError extends AgentError {
  /** Name of the tool that failed */
  readonly toolName: string;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    toolName: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, category, recoverable, { ...context, tool: toolName }, cause);
    this.name = 'ToolError';
    this.toolName = toolName;
  }

  /**
   * Create a ToolError from an arbitrary thrown value.
   */
  static fromError(error: unknown, toolName: string): ToolError {
    if (error instanceof ToolError) {
      return error;
    }
    const err = toError(error);
    const { category, recoverable } =
      err instanceof AgentError ? err : categorizeError(err);
    return new ToolError(err.message, category, recoverable, toolName, undefined, err);
  }
}

export type FileOperation = 'read' | 'write';

/**
 * Error from file operations.
 */
export class FileOperationError extends AgentError {
  /** Path of the file operation */
  readonly path: string;

  readonly operation: FileOperation;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    path: string,
    operation: FileOperation,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, category, recoverable, { ...context, path, operation }, cause);
    this.name = 'FileOperationError';
    this.path = path;
    this.operation = operation;
  }

  static notFound(path: string, operation: FileOperation): FileOperationError {
    return new FileOperationError(
      `File not found: ${path}`,
      ErrorCategory.PERMANENT,
      false,
      path,
      operation,
      { reason: 'not_found' }
    );
  }

  static permissionDenied(path: string, operation: FileOperation): FileOperationError {
    return new FileOperationError(
      `Permission denied: ${path}`,
      ErrorCategory.PERMANENT,
      false,
      path,
      operation,
      { reason: 'permission_denied' }
    );
  }

  /**
   * The resolved path escapes the configured base directory.
   */
  static outsideBaseDir(path: string, baseDir: string, operation: FileOperation): FileOperationError {
    return new FileOperationError(
      `Path outside base directory: ${path} (base: ${baseDir})`,
      ErrorCategory.PERMANENT,
      false,
      path,
      operation,
      { reason: 'outside_base_dir', baseDir }
    );
  }

  get reason(): string | undefined {
    const reason = this.context.reason;
    return typeof reason === 'string' ? reason : undefined;
  }
}

/**
 * Error from LLM transport calls.
 */
export class ProviderError extends AgentError {
  /** Name of the provider */
  readonly providerName: string;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    providerName: string,
    statusCode?: number,
    cause?: Error
  ) {
    super(message, category, recoverable, { provider: providerName, statusCode }, cause);
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.statusCode = statusCode;
  }

  /**
   * Map an HTTP failure status to a categorized error.
   */
  static fromStatus(providerName: string, statusCode: number, body: string): ProviderError {
    const detail = body.trim().slice(0, 500);
    const message = `${providerName} request failed with HTTP ${statusCode}${detail ? `: ${detail}` : ''}`;

    if (statusCode === 401 || statusCode === 403) {
      return new ProviderError(message, ErrorCategory.PERMANENT, false, providerName, statusCode);
    }
    if (statusCode === 429) {
      return new ProviderError(message, ErrorCategory.RATE_LIMITED, true, providerName, statusCode);
    }
    if (statusCode >= 500) {
      return new ProviderError(message, ErrorCategory.TRANSIENT, true, providerName, statusCode);
    }
    return new ProviderError(message, ErrorCategory.VALIDATION, false, providerName, statusCode);
  }

  static network(providerName: string, cause: Error): ProviderError {
    return new ProviderError(
      `${providerName} request failed: ${cause.message}`,
      ErrorCategory.TRANSIENT,
      true,
      providerName,
      undefined,
      cause
    );
  }
}

/**
 * Failure of a single search backend. Hybrid search turns these into notices.
 */
export class SearchBackendError extends AgentError {
  readonly backend: string;

  constructor(message: string, backend: string, recoverable = false, cause?: Error) {
    super(message, ErrorCategory.DEPENDENCY, recoverable, { backend }, cause);
    this.name = 'SearchBackendError';
    this.backend = backend;
  }

  static notConfigured(backend: string, setting: string): SearchBackendError {
    return new SearchBackendError(`${setting} is not set; the ${backend} backend is unavailable`, backend);
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Normalize any thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Node system error code (`ENOENT`, `EACCES`, ...) if the error carries one.
 */
export function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Determine error category from a generic error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  const message = error.message.toLowerCase();
  const code = errorCode(error);

  if (
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    message.includes('timeout') ||
    message.includes('socket hang up') ||
    message.includes('network error') ||
    message.includes('fetch failed')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (message.includes('rate limit') || message.includes('too many requests')) {
    return { category: ErrorCategory.RATE_LIMITED, recoverable: true };
  }

  if (
    message.includes('unauthorized') ||
    message.includes('forbidden') ||
    code === 'ENOENT' ||
    code === 'EACCES'
  ) {
    return { category: ErrorCategory.PERMANENT, recoverable: false };
  }

  if (message.includes('invalid') || message.includes('validation') || message.includes('required')) {
    return { category: ErrorCategory.VALIDATION, recoverable: false };
  }

  return { category: ErrorCategory.INTERNAL, recoverable: false };
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof AgentError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof AgentError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
