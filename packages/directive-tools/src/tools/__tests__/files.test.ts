import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { errorPayload, noopLogger } from '@tagwire/directive-contracts';
import type { CapabilityContext } from '@tagwire/directive-contracts';
import { InMemoryTodoStore, TodoSessionManager } from '@tagwire/directive-core';
import {
  createCreateFileTool,
  createDeleteFileTool,
  createFullFileRewriteTool,
  createStrReplaceTool,
} from '../files.js';
import type { ToolContext } from '../../types.js';

function ctx(tag = 'test'): CapabilityContext {
  return { tag, signal: new AbortController().signal, logger: noopLogger, onCleanup: vi.fn() };
}

describe('file tools', () => {
  let dir: string;
  let context: ToolContext;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tagwire-files-'));
    context = {
      workingDir: dir,
      sessionId: 'session-1',
      todo: new TodoSessionManager({ store: new InMemoryTodoStore() }),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('create-file', () => {
    it('creates the file and its parent directories', async () => {
      const result = await createCreateFileTool(context).capability(
        { file_path: 'notes/todo.txt', file_contents: 'buy milk' },
        ctx(),
      );

      expect(result.status).toBe('ok');
      expect(result.message).toBe('Created file: notes/todo.txt');
      expect(readFileSync(join(dir, 'notes', 'todo.txt'), 'utf-8')).toBe('buy milk');
    });

    it('refuses to overwrite an existing file', async () => {
      writeFileSync(join(dir, 'a.txt'), 'old');

      const result = await createCreateFileTool(context).capability({ file_path: 'a.txt', file_contents: 'new' }, ctx());

      expect(errorPayload(result)?.code).toBe('FILE_EXISTS');
      expect(readFileSync(join(dir, 'a.txt'), 'utf-8')).toBe('old');
    });

    it('refuses paths outside the working directory', async () => {
      const result = await createCreateFileTool(context).capability(
        { file_path: '../escape.txt', file_contents: 'x' },
        ctx(),
      );

      expect(errorPayload(result)?.code).toBe('PATH_VALIDATION_FAILED');
      expect(result.message).toBe('Cannot access "../escape.txt": path is outside the working directory');
    });
  });

  describe('full-file-rewrite', () => {
    it('replaces the contents', async () => {
      writeFileSync(join(dir, 'a.txt'), 'old');

      const result = await createFullFileRewriteTool(context).capability({ file_path: 'a.txt', file_contents: 'new' }, ctx());

      expect(result.message).toBe('Rewrote file: a.txt');
      expect(readFileSync(join(dir, 'a.txt'), 'utf-8')).toBe('new');
    });

    it('reports a missing file', async () => {
      const result = await createFullFileRewriteTool(context).capability({ file_path: 'b.txt', file_contents: 'x' }, ctx());

      expect(result).toMatchObject({ status: 'error', message: 'File "b.txt" does not exist' });
      expect(errorPayload(result)?.code).toBe('FILE_NOT_FOUND');
    });
  });

  describe('str-replace', () => {
    beforeEach(() => {
      writeFileSync(join(dir, 'app.ts'), 'const a = 1;\nconst b = 1;\n');
    });

    it('replaces a unique occurrence', async () => {
      const result = await createStrReplaceTool(context).capability(
        { file_path: 'app.ts', old_str: 'const a = 1;', new_str: 'const a = 2;' },
        ctx(),
      );

      expect(result.status).toBe('ok');
      expect(readFileSync(join(dir, 'app.ts'), 'utf-8')).toBe('const a = 2;\nconst b = 1;\n');
    });

    it('refuses an ambiguous match', async () => {
      const result = await createStrReplaceTool(context).capability(
        { file_path: 'app.ts', old_str: '= 1;', new_str: '= 3;' },
        ctx(),
      );

      expect(result.message).toBe('"= 1;" occurs 2 times in app.ts');
      expect(errorPayload(result)?.code).toBe('STRING_NOT_UNIQUE');
    });

    it('reports text that is not there', async () => {
      const result = await createStrReplaceTool(context).capability(
        { file_path: 'app.ts', old_str: 'const c', new_str: 'x' },
        ctx(),
      );

      expect(errorPayload(result)?.code).toBe('STRING_NOT_FOUND');
    });
  });

  describe('delete-file', () => {
    it('deletes a file', async () => {
      writeFileSync(join(dir, 'a.txt'), 'x');

      const result = await createDeleteFileTool(context).capability({ file_path: 'a.txt' }, ctx());

      expect(result.message).toBe('Deleted file: a.txt');
      expect(existsSync(join(dir, 'a.txt'))).toBe(false);
    });

    it('does not delete directories', async () => {
      mkdirSync(join(dir, 'sub'));

      const result = await createDeleteFileTool(context).capability({ file_path: 'sub' }, ctx());

      expect(errorPayload(result)?.code).toBe('NOT_A_FILE');
      expect(existsSync(join(dir, 'sub'))).toBe(true);
    });
  });
});
