/**
 * Error classes.
 *
 * Failures inside a turn are values (ToolResult, ValidationFailure); these
 * classes cover programmer and configuration errors plus the one fault the
 * dispatcher lets through: an unavailable collaborator.
 */

export class DirectiveError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DuplicateToolError extends DirectiveError {
  constructor(readonly tag: string) {
    super('DUPLICATE_TOOL', `Tool "${tag}" is already registered`);
  }
}

export class RegistrySealedError extends DirectiveError {
  constructor(readonly tag: string) {
    super('REGISTRY_SEALED', `Cannot register "${tag}": registry is sealed`);
  }
}

export class InvalidSchemaError extends DirectiveError {
  constructor(
    readonly tag: string,
    readonly issues: string[],
  ) {
    super('INVALID_SCHEMA', `Invalid schema for "${tag}": ${issues.join('; ')}`);
  }
}

/**
 * A capability read an argument with the wrong type.
 */
export class ArgumentTypeError extends DirectiveError {
  constructor(
    readonly argument: string,
    readonly expected: string,
  ) {
    super('ARGUMENT_TYPE', `Argument "${argument}" must be ${expected}`);
  }
}

export class ConfigError extends DirectiveError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_ERROR', message, options);
  }
}

export class ClassificationError extends DirectiveError {
  constructor(message: string, options?: ErrorOptions) {
    super('CLASSIFICATION_FAILED', message, options);
  }
}

export class TodoNotFoundError extends DirectiveError {
  constructor(readonly sessionId: string) {
    super('TODO_NOT_FOUND', `No todo document exists for session "${sessionId}"`);
  }
}

/**
 * A collaborator (persistence, audit store) cannot serve requests.
 * Rethrown unmodified by the dispatcher.
 */
export class CollaboratorUnavailableError extends DirectiveError {
  constructor(
    readonly collaborator: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super('COLLABORATOR_UNAVAILABLE', `${collaborator} unavailable: ${message}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
