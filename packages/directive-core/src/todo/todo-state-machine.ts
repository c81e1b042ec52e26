/**
 * TodoStateMachine
 *
 * Owns one session's todo document: absent → present (ensure) → updated
 * (update, repeatable). There is no terminal state.
 *
 * ensure() and update() are serialized through a promise queue, so two
 * concurrent updates never read the same snapshot.
 */

import { TodoNotFoundError, noopLogger } from '@tagwire/directive-contracts';
import type { ILogger } from '@tagwire/directive-contracts';
import { mergeTodo } from './todo-document.js';
import type { TodoDocument, TodoUpdate } from './todo-document.js';
import { buildTodoFromTemplates, DEFAULT_TODO_TEMPLATES } from './todo-templates.js';
import type { TodoTemplate } from './todo-templates.js';
import type { TodoStore } from './todo-store.js';

export type TodoState = 'absent' | 'present' | 'updated';

export interface EnsureOutcome {
  action: 'created' | 'unchanged' | 'replaced';
  document: TodoDocument;
}

export interface UpdateOutcome {
  document: TodoDocument;
  added: string[];
  completed: string[];
  changed: boolean;
}

export interface TodoStateMachineOptions {
  sessionId: string;
  store: TodoStore;
  templates?: readonly TodoTemplate[];
  logger?: ILogger;
}

export class TodoStateMachine {
  readonly sessionId: string;
  private readonly store: TodoStore;
  private readonly templates: readonly TodoTemplate[];
  private readonly logger: ILogger;
  private queue: Promise<void> = Promise.resolve();
  private updated = false;

  constructor(options: TodoStateMachineOptions) {
    this.sessionId = options.sessionId;
    this.store = options.store;
    this.templates = options.templates ?? DEFAULT_TODO_TEMPLATES;
    this.logger = options.logger ?? noopLogger;
  }

  // ── Queries ─────────────────────────────────────────────────────────────

  async state(): Promise<TodoState> {
    const document = await this.read();
    if (!document) {
      return 'absent';
    }
    return this.updated ? 'updated' : 'present';
  }

  async read(): Promise<TodoDocument | undefined> {
    await this.queue;
    return this.store.load(this.sessionId);
  }

  // ── Transitions ─────────────────────────────────────────────────────────

  /**
   * Create the document from a template. No-op when present, unless overwrite.
   */
  ensure(description: string, overwrite: boolean): Promise<EnsureOutcome> {
    return this.enqueue<EnsureOutcome>(async () => {
      const existing = await this.store.load(this.sessionId);
      if (existing && !overwrite) {
        this.logger.debug('Todo already present', { sessionId: this.sessionId });
        return { action: 'unchanged', document: existing };
      }

      const document = buildTodoFromTemplates(description, this.templates);
      await this.store.save(this.sessionId, document);
      this.updated = false;

      const action = existing ? 'replaced' : 'created';
      this.logger.info(`Todo ${action}`, { sessionId: this.sessionId, sections: document.sections.length });
      return { action, document };
    });
  }

  /**
   * Merge completed and new tasks into a section.
   * @throws TodoNotFoundError when no document exists yet
   */
  update(update: TodoUpdate): Promise<UpdateOutcome> {
    return this.enqueue<UpdateOutcome>(async () => {
      const existing = await this.store.load(this.sessionId);
      if (!existing) {
        throw new TodoNotFoundError(this.sessionId);
      }

      const merged = mergeTodo(existing, update);
      const changed = merged.added.length > 0 || merged.completed.length > 0 || !hasSection(existing, update.section);
      if (changed) {
        await this.store.save(this.sessionId, merged.document);
      }
      this.updated = true;

      this.logger.debug('Todo updated', {
        sessionId: this.sessionId,
        section: update.section,
        added: merged.added.length,
        completed: merged.completed.length,
      });
      return { document: merged.document, added: merged.added, completed: merged.completed, changed };
    });
  }

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const run = this.queue.then(job);
    // The caller receives the failure through `run`; the queue keeps going
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

function hasSection(document: TodoDocument, name: string): boolean {
  return document.sections.some(s => s.name === name.trim());
}

/**
 * One state machine per session, created on first use.
 */
export class TodoSessionManager {
  private machines = new Map<string, TodoStateMachine>();

  constructor(private readonly options: Omit<TodoStateMachineOptions, 'sessionId'>) {}

  forSession(sessionId: string): TodoStateMachine {
    let machine = this.machines.get(sessionId);
    if (!machine) {
      machine = new TodoStateMachine({ ...this.options, sessionId });
      this.machines.set(sessionId, machine);
    }
    return machine;
  }
}
