/**
 * TodoStore port with in-memory and file-system implementations.
 *
 * The file store keeps one canonical checklist per session:
 *   <rootDir>/<sessionId>/todo.md
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CollaboratorUnavailableError, errorMessage } from '@tagwire/directive-contracts';
import { cloneTodo, parseTodo, serializeTodo } from './todo-document.js';
import type { TodoDocument } from './todo-document.js';

export interface TodoStore {
  load(sessionId: string): Promise<TodoDocument | undefined>;
  save(sessionId: string, document: TodoDocument): Promise<void>;
}

export class InMemoryTodoStore implements TodoStore {
  private documents = new Map<string, TodoDocument>();

  async load(sessionId: string): Promise<TodoDocument | undefined> {
    const document = this.documents.get(sessionId);
    return document ? cloneTodo(document) : undefined;
  }

  async save(sessionId: string, document: TodoDocument): Promise<void> {
    this.documents.set(sessionId, cloneTodo(document));
  }
}

const SAFE_SESSION_ID = /^[A-Za-z0-9_-]+$/;

export class FileTodoStore implements TodoStore {
  constructor(
    private readonly rootDir: string,
    private readonly fileName = 'todo.md',
  ) {}

  async load(sessionId: string): Promise<TodoDocument | undefined> {
    const file = this.pathFor(sessionId);
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new CollaboratorUnavailableError('todo store', `cannot read ${file}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return parseTodo(text);
  }

  async save(sessionId: string, document: TodoDocument): Promise<void> {
    const file = this.pathFor(sessionId);
    const temp = `${file}.tmp`;
    try {
      await mkdir(join(this.rootDir, sessionId), { recursive: true });
      await writeFile(temp, serializeTodo(document), 'utf-8');
      await rename(temp, file);
    } catch (error) {
      throw new CollaboratorUnavailableError('todo store', `cannot write ${file}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  pathFor(sessionId: string): string {
    if (!SAFE_SESSION_ID.test(sessionId)) {
      throw new Error(`Invalid session id "${sessionId}"`);
    }
    return join(this.rootDir, sessionId, this.fileName);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
