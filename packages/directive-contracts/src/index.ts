// ============================================
// tagwire - Directive Contracts
// ============================================

// Directive Types
export type {
  ParamSource,
  ParamValueType,
  ArgValue,
  ToolArgs,
  ParamBinding,
  ToolSchema,
  InvocationChild,
  Invocation,
  ParseErrorCode,
  RawSpanError,
  ParseItem,
  ValidatedCall,
  ValidationFailure,
  UnknownToolFailure,
  ValidationOutcome,
} from './directive-types.js';

// Tool Types
export type {
  ToolResult,
  ToolErrorPayload,
  CleanupHandler,
  CapabilityContext,
  Capability,
  AuditRecord,
  AuditSink,
} from './tool-types.js';

// Tool result helpers
export {
  toolOk,
  toolError,
  errorPayload,
  stringArg,
  optionalStringArg,
  integerArg,
  optionalIntegerArg,
  booleanArg,
  listArg,
} from './tool-result.js';

// Schema validation (Zod)
export {
  TAG_NAME_PATTERN,
  MAX_TIMEOUT_MS,
  TimeoutMsSchema,
  ArgValueSchema,
  ParamBindingSchema,
  ToolSchemaSchema,
  validateToolSchema,
  formatZodIssues,
} from './directive-schemas.js';

// Configuration
export {
  DEFAULT_TOOL_TIMEOUT_MS,
  ClassifierThresholdsSchema,
  DirectiveConfigSchema,
  parseDirectiveConfig,
  validateDirectiveConfig,
  loadDirectiveConfig,
  resolveToolTimeout,
} from './config.js';
export type {
  DirectiveConfig,
  DirectiveConfigInput,
  ClassifierStrategy,
  ClassifierThresholds,
} from './config.js';

// Logger
export { noopLogger, createConsoleLogger } from './logger.js';
export type { ILogger, LogLevel } from './logger.js';

// Errors
export {
  DirectiveError,
  DuplicateToolError,
  RegistrySealedError,
  InvalidSchemaError,
  ArgumentTypeError,
  ConfigError,
  ClassificationError,
  TodoNotFoundError,
  CollaboratorUnavailableError,
  errorMessage,
} from './errors.js';
