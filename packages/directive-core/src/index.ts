/**
 * @tagwire/directive-core
 *
 * Directive protocol layer: registry, parser, validator, dispatcher,
 * result encoder, turn processing, directive catalog and todo state machine.
 */

// Registry
export { SchemaRegistry } from './registry/schema-registry.js';
export type { RegisteredTool } from './registry/schema-registry.js';

// Parser
export { DirectiveParser, parseDirectives, scanNext, decodeEntities } from './parser/directive-parser.js';
export type { ParseOptions, ScanStep } from './parser/directive-parser.js';
export { IncrementalDirectiveScanner } from './parser/incremental-scanner.js';

// Validator
export { validate, validateWithRegistry, extractRaw } from './validator/directive-validator.js';
export { coerceValue, coerceInteger, coerceBoolean, coerceList, stripTagNewlines } from './validator/coerce.js';
export type { CoercionResult } from './validator/coerce.js';

// Dispatcher
export { DirectiveDispatcher, TIMEOUT_MESSAGE } from './dispatcher/directive-dispatcher.js';
export type { DirectiveDispatcherOptions, DispatcherConfig } from './dispatcher/directive-dispatcher.js';
export { redactSecrets } from './dispatcher/redact.js';

// Encoder
export {
  encodeResult,
  parseFailureResult,
  unknownToolResult,
  validationFailureResult,
  RESULT_ELEMENT,
} from './encoder/result-encoder.js';
export type { TranscriptMessage } from './encoder/result-encoder.js';

// Turn processing
export { TurnProcessor } from './turn/turn-processor.js';
export type { TurnEntry, TurnEntryKind, TurnOutcome, TurnProcessorOptions } from './turn/turn-processor.js';

// Directive catalog
export { DirectiveCatalogBuilder, exampleFor } from './prompt/directive-catalog.js';
export type { CatalogOptions } from './prompt/directive-catalog.js';

// Todo
export { mergeTodo, serializeTodo, parseTodo, cloneTodo } from './todo/todo-document.js';
export type { TodoDocument, TodoSection, TodoUpdate, TodoMergeResult } from './todo/todo-document.js';
export {
  buildTodoFromTemplates,
  defaultTemplate,
  marketResearchTemplate,
  DEFAULT_TODO_TEMPLATES,
} from './todo/todo-templates.js';
export type { TodoTemplate } from './todo/todo-templates.js';
export { InMemoryTodoStore, FileTodoStore } from './todo/todo-store.js';
export type { TodoStore } from './todo/todo-store.js';
export { TodoStateMachine, TodoSessionManager } from './todo/todo-state-machine.js';
export type {
  TodoState,
  EnsureOutcome,
  UpdateOutcome,
  TodoStateMachineOptions,
} from './todo/todo-state-machine.js';
