/**
 * Todo tools for task planning and progress tracking
 */

import { booleanArg, listArg, stringArg, toolError, toolOk, TodoNotFoundError } from '@tagwire/directive-contracts';
import type { ToolSchema } from '@tagwire/directive-contracts';
import { serializeTodo } from '@tagwire/directive-core';
import type { DirectiveTool, ToolContext } from '../types.js';

export const ensureTodoSchema: ToolSchema = {
  tag: 'ensure-todo',
  description: 'Create the todo list for this task from a template. Keeps an existing list unless overwrite is true.',
  bindings: [
    { name: 'overwrite', source: 'attribute', path: 'overwrite', required: true, valueType: 'boolean' },
    { name: 'description', source: 'content', path: '.', required: true, valueType: 'string' },
  ],
  example: '<ensure-todo overwrite="false">\nBuild a landing page for a bakery\n</ensure-todo>',
};

export const updateTodoSchema: ToolSchema = {
  tag: 'update-todo',
  description: 'Mark tasks of a section as done and add new ones. Applying the same update twice changes nothing.',
  bindings: [
    { name: 'section', source: 'attribute', path: 'section', required: true, valueType: 'string' },
    { name: 'completed_tasks', source: 'element', path: 'completed_tasks', required: true, valueType: 'list' },
    { name: 'new_tasks', source: 'element', path: 'new_tasks', required: true, valueType: 'list' },
  ],
  example: [
    '<update-todo section="Implementation">',
    '<completed_tasks>',
    '- Set up project structure',
    '</completed_tasks>',
    '<new_tasks>',
    '- Add a contact form',
    '</new_tasks>',
    '</update-todo>',
  ].join('\n'),
};

/**
 * ensure-todo
 */
export function createEnsureTodoTool(context: ToolContext): DirectiveTool {
  return {
    schema: ensureTodoSchema,
    capability: async (args) => {
      const machine = context.todo.forSession(context.sessionId);
      const outcome = await machine.ensure(stringArg(args, 'description'), booleanArg(args, 'overwrite'));

      const summary =
        outcome.action === 'unchanged'
          ? 'Todo list already exists; kept it.'
          : `Todo list ${outcome.action}.`;
      return toolOk(`${summary}\n\n${serializeTodo(outcome.document)}`, outcome);
    },
  };
}

/**
 * update-todo
 */
export function createUpdateTodoTool(context: ToolContext): DirectiveTool {
  return {
    schema: updateTodoSchema,
    capability: async (args) => {
      const machine = context.todo.forSession(context.sessionId);
      try {
        const outcome = await machine.update({
          section: stringArg(args, 'section'),
          completedTasks: listArg(args, 'completed_tasks'),
          newTasks: listArg(args, 'new_tasks'),
        });

        const summary = outcome.changed
          ? `Updated todo list: ${outcome.completed.length} completed, ${outcome.added.length} added.`
          : 'Todo list unchanged.';
        return toolOk(`${summary}\n\n${serializeTodo(outcome.document)}`, outcome);
      } catch (error) {
        if (error instanceof TodoNotFoundError) {
          return toolError({
            code: 'TODO_NOT_FOUND',
            message: error.message,
            hint: 'Create the list with ensure-todo first.',
          });
        }
        throw error;
      }
    },
  };
}
