/**
 * Tool System Types
 *
 * Defines the capability contract, tool results and audit records.
 */

import type { ILogger } from './logger.js';
import type { ToolArgs } from './directive-types.js';

/**
 * Outcome of one directive. Always produced, never thrown.
 */
export interface ToolResult {
  status: 'ok' | 'error';
  /** Structured data for the caller (not shown to the model verbatim) */
  payload?: unknown;
  /** Human/model-readable message */
  message: string;
}

/**
 * Structured payload attached to error results.
 */
export interface ToolErrorPayload {
  /** Error code (e.g. 'UNKNOWN_TOOL', 'VALIDATION_FAILED', 'TOOL_TIMEOUT') */
  code: string;
  hint?: string;
  details?: Record<string, unknown>;
}

export type CleanupHandler = () => void | Promise<void>;

/**
 * Per-call context handed to a capability by the dispatcher.
 */
export interface CapabilityContext {
  tag: string;
  /** Aborted when the call times out */
  signal: AbortSignal;
  logger: ILogger;
  /**
   * Register a release step for a resource acquired by this call
   * (session, handle, child process). Runs on every exit path.
   */
  onCleanup(handler: CleanupHandler): void;
}

/**
 * Executable implementation bound to a tag at registry time.
 */
export type Capability = (
  args: ToolArgs,
  ctx: CapabilityContext,
) => Promise<ToolResult> | ToolResult;

/**
 * Auditable record emitted for every dispatched call.
 */
export interface AuditRecord {
  tag: string;
  args: ToolArgs;
  result: ToolResult;
  /** ISO timestamp of call start */
  timestamp: string;
  durationMs: number;
}

/**
 * External collaborator receiving audit records.
 */
export interface AuditSink {
  record(entry: AuditRecord): void | Promise<void>;
}
