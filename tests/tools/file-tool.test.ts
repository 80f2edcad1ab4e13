/**
 * File Tool Tests
 *
 * Path containment, read/write round trips and the expanded sub-tools.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileTool } from '../../src/tools/file.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { FileOperationError, ValidationError } from '../../src/errors/index.js';

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

describe('FileTool', () => {
  let root: string;
  let base: string;
  let tool: FileTool;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'file-tool-')));
    base = path.join(root, 'base');
    await fs.mkdir(base);
    await fs.writeFile(path.join(root, 'secret.txt'), 'outside');
    tool = new FileTool({ baseDir: base });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  // ===========================================================================
  // ROUND TRIP
  // ===========================================================================

  describe('read and write', () => {
    it('should read back exactly what was written', async () => {
      await tool.write('hello.txt', 'hello');
      expect(await tool.read('hello.txt')).toBe('hello');
    });

    it('should report the resolved path of a write', async () => {
      expect(await tool.write('notes/a.txt', 'x')).toBe(`OK: wrote ${path.join(base, 'notes', 'a.txt')}`);
    });

    it('should create parent directories', async () => {
      await tool.write('deep/nested/file.txt', 'nested');
      expect(await fs.readFile(path.join(base, 'deep', 'nested', 'file.txt'), 'utf-8')).toBe('nested');
    });

    it('should overwrite instead of appending', async () => {
      await tool.write('same.txt', 'first');
      await tool.write('same.txt', 'second');
      expect(await tool.read('same.txt')).toBe('second');
    });

    it('should write an empty file when no content is given', async () => {
      await tool.write('empty.txt');
      expect(await tool.read('empty.txt')).toBe('');
    });

    it('should leave no temp files behind', async () => {
      await tool.write('only.txt', 'content');
      expect(await fs.readdir(base)).toEqual(['only.txt']);
    });

    it('should honor the encoding', async () => {
      await tool.write('encoded.txt', 'aGk=', 'base64');
      expect(await tool.read('encoded.txt')).toBe('hi');
    });

    it('should allow .. segments that stay inside the base directory', async () => {
      await tool.write('hello.txt', 'hello');
      expect(await tool.read('sub/../hello.txt')).toBe('hello');
    });

    it('should fail with not found for a missing file', async () => {
      const error = await failure(tool.read('missing.txt'));

      expect(error).toBeInstanceOf(FileOperationError);
      expect(error instanceof FileOperationError && error.reason).toBe('not_found');
      expect(error instanceof Error && error.message).toBe('File not found: missing.txt');
    });

    it('should work without a base directory', async () => {
      const free = new FileTool();
      const target = path.join(root, 'free.txt');

      await free.write(target, 'free');
      expect(await free.read(target)).toBe('free');
    });
  });

  // ===========================================================================
  // CONTAINMENT
  // ===========================================================================

  describe('path containment', () => {
    it('should reject paths escaping through ..', async () => {
      const error = await failure(tool.read('../secret.txt'));

      expect(error).toBeInstanceOf(FileOperationError);
      expect(error instanceof FileOperationError && error.reason).toBe('outside_base_dir');
    });

    it('should reject ../etc/passwd', async () => {
      const error = await failure(tool.read('../etc/passwd'));
      expect(error instanceof FileOperationError && error.reason).toBe('outside_base_dir');
    });

    it('should reject absolute paths outside the base directory', async () => {
      const error = await failure(tool.read(path.join(root, 'secret.txt')));
      expect(error instanceof FileOperationError && error.reason).toBe('outside_base_dir');
    });

    it('should reject symlinks that lead outside', async () => {
      await fs.symlink(root, path.join(base, 'link'));

      const error = await failure(tool.read('link/secret.txt'));
      expect(error instanceof FileOperationError && error.reason).toBe('outside_base_dir');
    });

    it('should not write outside the base directory', async () => {
      const error = await failure(tool.write('../escaped.txt', 'nope'));

      expect(error instanceof FileOperationError && error.reason).toBe('outside_base_dir');
      await expect(fs.access(path.join(root, 'escaped.txt'))).rejects.toThrow();
    });
  });

  // ===========================================================================
  // PARENT TOOL
  // ===========================================================================

  describe('run', () => {
    it('should dispatch on action and accept file as an alias of path', async () => {
      await tool.run({ action: 'write', file: 'alias.txt', content: 'x' });
      expect(await tool.run({ action: 'read', path: 'alias.txt' })).toBe('x');
    });

    it('should require a path', async () => {
      const error = await failure(tool.run({ action: 'read' }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof Error && error.message).toBe('file path is required');
    });

    it('should reject unknown actions', async () => {
      await expect(tool.run({ action: 'delete', path: 'x' })).rejects.toThrow(ValidationError);
    });

    it('should list its parameters', () => {
      expect(tool.getParameters().map((p) => p.name)).toEqual(['action', 'path', 'file', 'content', 'encoding']);
      expect(tool.getParameters().find((p) => p.name === 'encoding')).toEqual({
        name: 'encoding',
        type: 'string',
        description: 'Text encoding',
        required: false,
        default: 'utf-8',
      });
    });

    it('should list path as required and file as its optional alias', () => {
      expect(tool.getParameters().map((p) => [p.name, p.required])).toEqual([
        ['action', true],
        ['path', true],
        ['file', false],
        ['content', false],
        ['encoding', false],
      ]);
    });
  });

  // ===========================================================================
  // REGISTRY
  // ===========================================================================

  describe('through a registry', () => {
    let registry: ToolRegistry;

    beforeEach(() => {
      registry = new ToolRegistry();
      registry.registerTool(tool);
    });

    it('should expand into file_read and file_write', () => {
      expect(registry.listAll()).toEqual(['file_read', 'file_write']);
      expect(registry.getTool('file_tool')).toBeUndefined();
    });

    it('should list path as required on both sub-tools', () => {
      for (const name of ['file_read', 'file_write']) {
        const parameters = registry.getTool(name)?.getParameters() ?? [];
        expect(parameters.find((p) => p.name === 'path')?.required).toBe(true);
        expect(parameters.find((p) => p.name === 'file')?.required).toBe(false);
      }
    });

    it('should round-trip through the sub-tools', async () => {
      expect(await registry.executeTool('file_write', { path: 'hello.txt', content: 'hello' })).toBe(
        `OK: wrote ${path.join(base, 'hello.txt')}`
      );
      expect(await registry.executeTool('file_read', { path: 'hello.txt' })).toBe('hello');
    });

    it('should write empty content by default', async () => {
      await registry.executeTool('file_write', { path: 'empty.txt' });
      expect(await registry.executeTool('file_read', { path: 'empty.txt' })).toBe('');
    });

    it('should return containment failures as text', async () => {
      expect(await registry.executeTool('file_read', { path: '../secret.txt' })).toBe(
        `Error: tool 'file_read' failed: Path outside base directory: ../secret.txt (base: ${base})`
      );
    });

    it('should reject unsupported encodings', async () => {
      expect(await registry.executeTool('file_read', { path: 'a.txt', encoding: 'klingon' })).toMatch(
        /^Error: tool 'file_read' failed: Validation failed: encoding: /
      );
    });
  });
});
