import type { ToolErrorPayload, ToolResult } from './tool-types.js';
import type { ArgValue, ToolArgs } from './directive-types.js';
import { ArgumentTypeError } from './errors.js';

export function toolOk(message: string, payload?: unknown): ToolResult {
  return payload === undefined ? { status: 'ok', message } : { status: 'ok', message, payload };
}

export function toolError(input: {
  code: string;
  message: string;
  hint?: string;
  details?: Record<string, unknown>;
}): ToolResult {
  const payload: ToolErrorPayload = { code: input.code };
  if (input.hint) {
    payload.hint = input.hint;
  }
  if (input.details) {
    payload.details = input.details;
  }
  return {
    status: 'error',
    message: input.message,
    payload,
  };
}

/**
 * Narrow an error result's payload to ToolErrorPayload.
 */
export function errorPayload(result: ToolResult): ToolErrorPayload | undefined {
  const payload = result.payload;
  if (
    result.status === 'error' &&
    typeof payload === 'object' &&
    payload !== null &&
    'code' in payload &&
    typeof payload.code === 'string'
  ) {
    const hint = 'hint' in payload && typeof payload.hint === 'string' ? payload.hint : undefined;
    return hint === undefined ? { code: payload.code } : { code: payload.code, hint };
  }
  return undefined;
}

// ── Typed argument access for capabilities ─────────────────────────────

export function stringArg(args: ToolArgs, name: string): string {
  const value = args[name];
  if (typeof value !== 'string') {
    throw new ArgumentTypeError(name, 'a string');
  }
  return value;
}

export function optionalStringArg(args: ToolArgs, name: string): string | undefined {
  return args[name] === undefined ? undefined : stringArg(args, name);
}

export function integerArg(args: ToolArgs, name: string): number {
  const value = args[name];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ArgumentTypeError(name, 'an integer');
  }
  return value;
}

export function optionalIntegerArg(args: ToolArgs, name: string): number | undefined {
  return args[name] === undefined ? undefined : integerArg(args, name);
}

export function booleanArg(args: ToolArgs, name: string): boolean {
  const value = args[name];
  if (typeof value !== 'boolean') {
    throw new ArgumentTypeError(name, 'a boolean');
  }
  return value;
}

export function listArg(args: ToolArgs, name: string): string[] {
  const value: ArgValue | undefined = args[name];
  if (!Array.isArray(value)) {
    throw new ArgumentTypeError(name, 'a list');
  }
  return value;
}
