/**
 * Default toolset: the built-in directive vocabulary.
 */

import { SchemaRegistry } from '@tagwire/directive-core';
import type { DirectiveTool, ToolContext } from './types.js';
import { createEnsureTodoTool, createUpdateTodoTool } from './tools/todo.js';
import {
  createCreateFileTool,
  createDeleteFileTool,
  createFullFileRewriteTool,
  createStrReplaceTool,
} from './tools/files.js';
import { createExecuteCommandTool } from './tools/command.js';
import { createBrowserTools } from './tools/browser.js';
import { createWebSearchTool } from './tools/web-search.js';
import { createToolStatusTool } from './tools/tool-status.js';

/**
 * Every built-in tool, bound to one session's context
 */
export function createDefaultToolset(context: ToolContext): DirectiveTool[] {
  return [
    createEnsureTodoTool(context),
    createUpdateTodoTool(context),
    createCreateFileTool(context),
    createFullFileRewriteTool(context),
    createStrReplaceTool(context),
    createDeleteFileTool(context),
    createExecuteCommandTool(context),
    ...createBrowserTools(context),
    createWebSearchTool(context),
    createToolStatusTool(),
  ];
}

/**
 * Register tools into a registry (not sealed, so hosts can add their own).
 */
export function registerTools(registry: SchemaRegistry, tools: readonly DirectiveTool[]): SchemaRegistry {
  for (const tool of tools) {
    registry.register(tool.schema, tool.capability);
  }
  return registry;
}

/**
 * Sealed registry holding the default toolset plus any extra tools.
 */
export function createDefaultRegistry(context: ToolContext, extraTools: readonly DirectiveTool[] = []): SchemaRegistry {
  return registerTools(new SchemaRegistry(), [...createDefaultToolset(context), ...extraTools]).seal();
}
