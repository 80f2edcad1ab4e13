/**
 * File Tool
 *
 * Reads and writes text files, optionally confined to a base directory.
 * Registered through a ToolRegistry it expands into `file_read` and
 * `file_write`.
 */

import { z } from 'zod';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ErrorCategory, FileOperationError, ValidationError, errorCode, toError, type FileOperation } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { BaseTool, defineTool } from './base.js';
import type { Tool } from './types.js';

// =============================================================================
// SCHEMAS
// =============================================================================

const EncodingSchema = z
  .enum(['utf-8', 'utf8', 'utf16le', 'latin1', 'ascii', 'base64', 'hex'])
  .default('utf-8')
  .describe('Text encoding');

export type FileEncoding = z.infer<typeof EncodingSchema>;

const pathFields = {
  path: z.string().min(1).optional().describe('File path, relative to the base directory when one is set'),
  file: z.string().min(1).optional().describe('Alias of path'),
};

const FileReadSchema = z.object({
  ...pathFields,
  encoding: EncodingSchema,
});

const FileWriteSchema = z.object({
  ...pathFields,
  content: z.string().default('').describe('Content to write'),
  encoding: EncodingSchema,
});

const FileToolSchema = z.object({
  action: z.enum(['read', 'write']).describe('Action to perform: read or write'),
  ...pathFields,
  content: z.string().default('').describe('Content to write'),
  encoding: EncodingSchema,
});

/** `file` may replace `path`, so the schema cannot demand either */
const PATH_REQUIRED = ['path'] as const;

export type FileToolParams = z.infer<typeof FileToolSchema>;

function requirePath(input: { path?: string; file?: string }): string {
  const target = input.path ?? input.file;
  if (!target) {
    throw new ValidationError('file path is required', ['path']);
  }
  return target;
}

// =============================================================================
// PATH RESOLUTION
// =============================================================================

function expandHome(target: string): string {
  if (target === '~') return os.homedir();
  if (target.startsWith('~/')) return path.join(os.homedir(), target.slice(2));
  return target;
}

/**
 * realpath that tolerates a missing tail: symlinks in the longest existing
 * prefix are followed and the missing segments appended.
 */
async function realpathPartial(target: string): Promise<string> {
  const missing: string[] = [];
  let current = target;
  for (;;) {
    try {
      const real = await fs.realpath(current);
      return path.join(real, ...missing.reverse());
    } catch (error) {
      const parent = path.dirname(current);
      if (errorCode(toError(error)) !== 'ENOENT' || parent === current) {
        throw error;
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function isWithin(baseDir: string, target: string): boolean {
  const relative = path.relative(baseDir, target);
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

// =============================================================================
// ATOMIC WRITE
// =============================================================================

/**
 * Write to a temp file beside the target, then rename over it.
 */
async function writeFileAtomic(filePath: string, content: string, encoding: FileEncoding): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2, 8)}`;

  try {
    await fs.writeFile(tempPath, content, { encoding });
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

function fileError(error: unknown, target: string, operation: FileOperation): FileOperationError {
  if (error instanceof FileOperationError) return error;
  const err = toError(error);
  const code = errorCode(err);
  if (code === 'ENOENT') return FileOperationError.notFound(target, operation);
  if (code === 'EACCES' || code === 'EPERM') return FileOperationError.permissionDenied(target, operation);
  return new FileOperationError(
    `Error ${operation === 'read' ? 'reading' : 'writing'} file: ${err.message}`,
    code === 'ENOSPC' ? ErrorCategory.DEPENDENCY : ErrorCategory.INTERNAL,
    false,
    target,
    operation,
    { code },
    err
  );
}

// =============================================================================
// FILE TOOL
// =============================================================================

export interface FileToolOptions {
  /** Paths must resolve inside this directory */
  baseDir?: string;
  logger?: StructuredLogger;
}

export class FileTool extends BaseTool<FileToolParams> {
  readonly name = 'file_tool';
  readonly description = 'Read and write local files.';
  readonly expandable = true;
  readonly baseDir?: string;

  protected readonly schema = FileToolSchema;
  protected readonly requiredParameters = PATH_REQUIRED;

  private log: StructuredLogger;

  constructor(options: FileToolOptions = {}) {
    super();
    this.baseDir = options.baseDir ? path.resolve(expandHome(options.baseDir)) : undefined;
    this.log = options.logger ?? createComponentLogger('FileTool');
  }

  /**
   * Resolve a requested path. With a base directory the result, symlinks
   * followed, must stay inside it.
   */
  async resolvePath(target: string, operation: FileOperation): Promise<string> {
    const expanded = expandHome(target);
    if (!this.baseDir) {
      return realpathPartial(path.resolve(expanded));
    }

    const base = await realpathPartial(this.baseDir);
    const resolved = await realpathPartial(path.resolve(base, expanded));
    if (!isWithin(base, resolved)) {
      this.log.warn('Rejected path outside base directory', { path: target, baseDir: base });
      throw FileOperationError.outsideBaseDir(target, base, operation);
    }
    return resolved;
  }

  async read(target: string, encoding: FileEncoding = 'utf-8'): Promise<string> {
    try {
      const resolved = await this.resolvePath(target, 'read');
      const content = await fs.readFile(resolved, { encoding });
      this.log.debug('Read file', { path: resolved, bytes: content.length });
      return content;
    } catch (error) {
      throw fileError(error, target, 'read');
    }
  }

  /**
   * Create or overwrite a file, creating parent directories as needed.
   */
  async write(target: string, content = '', encoding: FileEncoding = 'utf-8'): Promise<string> {
    try {
      const resolved = await this.resolvePath(target, 'write');
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      await writeFileAtomic(resolved, content, encoding);
      this.log.debug('Wrote file', { path: resolved, bytes: content.length });
      return `OK: wrote ${resolved}`;
    } catch (error) {
      throw fileError(error, target, 'write');
    }
  }

  expand(): Tool[] {
    return [
      defineTool(
        'file_read',
        'Read a file',
        FileReadSchema,
        async (input) => this.read(requirePath(input), input.encoding),
        { required: PATH_REQUIRED }
      ),
      defineTool(
        'file_write',
        'Write to a file',
        FileWriteSchema,
        async (input) => this.write(requirePath(input), input.content, input.encoding),
        { required: PATH_REQUIRED }
      ),
    ];
  }

  protected async execute(input: FileToolParams): Promise<string> {
    const target = requirePath(input);
    return input.action === 'read' ? this.read(target, input.encoding) : this.write(target, input.content, input.encoding);
  }
}
