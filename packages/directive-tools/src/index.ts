// ============================================
// tagwire - Built-in Directive Tools
// ============================================

// Toolset
export { createDefaultToolset, createDefaultRegistry, registerTools } from './toolset.js';

// Tools
export { createEnsureTodoTool, createUpdateTodoTool, ensureTodoSchema, updateTodoSchema } from './tools/todo.js';
export {
  createCreateFileTool,
  createFullFileRewriteTool,
  createStrReplaceTool,
  createDeleteFileTool,
  createFileSchema,
  fullFileRewriteSchema,
  strReplaceSchema,
  deleteFileSchema,
} from './tools/files.js';
export { createExecuteCommandTool, executeCommandSchema } from './tools/command.js';
export {
  createBrowserTools,
  browserNavigateToSchema,
  browserClickElementSchema,
  browserInputTextSchema,
  browserClickCoordinatesSchema,
  browserGoBackSchema,
} from './tools/browser.js';
export { createWebSearchTool, webSearchSchema } from './tools/web-search.js';
export { createToolStatusTool, toolStatusSchema, formatToolStatus } from './tools/tool-status.js';

// Config & utilities
export { FILESYSTEM_CONFIG, COMMAND_CONFIG, WEB_SEARCH_CONFIG } from './config.js';
export { validatePath } from './utils.js';

// Types
export type {
  DirectiveTool,
  ToolContext,
  BrowserDriver,
  BrowserState,
  SearchProvider,
  SearchResult,
} from './types.js';
