import { describe, it, expect, beforeEach, vi } from 'vitest';
import { errorPayload, noopLogger } from '@tagwire/directive-contracts';
import type { CapabilityContext } from '@tagwire/directive-contracts';
import { InMemoryTodoStore, TodoSessionManager } from '@tagwire/directive-core';
import { createEnsureTodoTool, createUpdateTodoTool } from '../todo.js';
import type { ToolContext } from '../../types.js';

function ctx(): CapabilityContext {
  return { tag: 'todo', signal: new AbortController().signal, logger: noopLogger, onCleanup: vi.fn() };
}

describe('todo tools', () => {
  let context: ToolContext;

  beforeEach(() => {
    context = {
      workingDir: '/unused',
      sessionId: 'session-1',
      todo: new TodoSessionManager({ store: new InMemoryTodoStore() }),
    };
  });

  it('creates the list from the default template', async () => {
    const result = await createEnsureTodoTool(context).capability(
      { overwrite: false, description: 'Build a landing page' },
      ctx(),
    );

    expect(result.status).toBe('ok');
    expect(result.message.startsWith('Todo list created.\n\n# Task: Build a landing page\n\n## Initial Research\n- [ ] ')).toBe(
      true,
    );
  });

  it('keeps an existing list unless overwrite is set', async () => {
    const ensure = createEnsureTodoTool(context);
    await ensure.capability({ overwrite: false, description: 'Build a landing page' }, ctx());

    const kept = await ensure.capability({ overwrite: false, description: 'Something else' }, ctx());
    const replaced = await ensure.capability({ overwrite: true, description: 'Something else' }, ctx());

    expect(kept.message).toContain('Todo list already exists; kept it.\n\n# Task: Build a landing page');
    expect(replaced.message).toContain('Todo list replaced.\n\n# Task: Something else');
  });

  it('merges updates idempotently', async () => {
    await createEnsureTodoTool(context).capability({ overwrite: false, description: 'Build a landing page' }, ctx());
    const update = createUpdateTodoTool(context);
    const args = {
      section: 'Implementation',
      completed_tasks: ['Set up project structure'],
      new_tasks: ['Add a contact form'],
    };

    const first = await update.capability(args, ctx());
    const second = await update.capability(args, ctx());

    expect(first.message).toMatch(/^Updated todo list: 1 completed, 1 added\.\n\n/);
    expect(first.message).toContain('- [x] Set up project structure');
    expect(first.message).toContain('- [ ] Add a contact form');
    expect(second.message).toMatch(/^Todo list unchanged\.\n\n/);
  });

  it('asks for ensure-todo before the first update', async () => {
    const result = await createUpdateTodoTool(context).capability(
      { section: 'Implementation', completed_tasks: [], new_tasks: ['A'] },
      ctx(),
    );

    expect(errorPayload(result)).toEqual({ code: 'TODO_NOT_FOUND', hint: 'Create the list with ensure-todo first.' });
  });
});
