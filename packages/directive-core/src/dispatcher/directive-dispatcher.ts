/**
 * DirectiveDispatcher: runs validated calls against their bound capabilities.
 *
 * Execution order per call:
 *   1. Resolve capability and timeout (schema → perToolTimeoutMs → default)
 *   2. Run capability with an AbortSignal, racing the timeout
 *   3. Fault → error result (redacted); CollaboratorUnavailableError → rethrow
 *   4. Run cleanup handlers (LIFO) on every exit path
 *   5. Redact message, emit audit record, return ToolResult
 *
 * Calls of one turn go through executeAll() and run strictly in order.
 */

import {
  CollaboratorUnavailableError,
  DEFAULT_TOOL_TIMEOUT_MS,
  errorMessage,
  MAX_TIMEOUT_MS,
  noopLogger,
  resolveToolTimeout,
  toolError,
} from '@tagwire/directive-contracts';
import type {
  AuditSink,
  Capability,
  CapabilityContext,
  CleanupHandler,
  DirectiveConfig,
  ILogger,
  ToolArgs,
  ToolResult,
  ValidatedCall,
} from '@tagwire/directive-contracts';
import type { SchemaRegistry } from '../registry/schema-registry.js';
import { redactSecrets } from './redact.js';

export type DispatcherConfig = Pick<
  DirectiveConfig,
  'perToolTimeoutMs' | 'defaultToolTimeoutMs' | 'redactOutput'
>;

export interface DirectiveDispatcherOptions {
  registry: SchemaRegistry;
  config?: Partial<DispatcherConfig>;
  auditSink?: AuditSink;
  logger?: ILogger;
}

export const TIMEOUT_MESSAGE = 'timeout';

export class DirectiveDispatcher {
  private readonly registry: SchemaRegistry;
  private readonly config: DispatcherConfig;
  private readonly auditSink: AuditSink | undefined;
  private readonly logger: ILogger;

  constructor(options: DirectiveDispatcherOptions) {
    this.registry = options.registry;
    this.config = {
      perToolTimeoutMs: options.config?.perToolTimeoutMs ?? {},
      defaultToolTimeoutMs: options.config?.defaultToolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
      redactOutput: options.config?.redactOutput ?? true,
    };
    this.auditSink = options.auditSink;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Execute calls one after another, in the given order.
   */
  async executeAll(calls: readonly ValidatedCall[]): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const call of calls) {
      results.push(await this.execute(call));
    }
    return results;
  }

  /**
   * Execute one call. Never rejects, except with CollaboratorUnavailableError.
   */
  async execute(call: ValidatedCall): Promise<ToolResult> {
    const timestamp = new Date().toISOString();
    const startedAt = Date.now();

    const tool = this.registry.get(call.tag);
    if (!tool) {
      const result = toolError({
        code: 'UNKNOWN_TOOL',
        message: `Unknown tool "${call.tag}"`,
        hint: `Available tools: ${this.registry.tags().join(', ')}`,
      });
      await this.audit(call, result, timestamp, startedAt);
      return result;
    }

    const timeoutMs = resolveToolTimeout(this.config, call.tag, tool.schema.timeoutMs);
    this.logger.debug('Executing directive', { tag: call.tag, timeoutMs });

    const controller = new AbortController();
    const scope = new CleanupScope(call.tag, this.logger);
    const ctx: CapabilityContext = {
      tag: call.tag,
      signal: controller.signal,
      logger: this.logger,
      onCleanup: handler => scope.add(handler),
    };

    let result: ToolResult;
    try {
      result = await this.runWithTimeout(tool.capability, call.args, ctx, controller, timeoutMs);
    } catch (error) {
      if (error instanceof CollaboratorUnavailableError) {
        this.logger.error('Collaborator unavailable', { tag: call.tag, collaborator: error.collaborator });
        throw error;
      }
      const message = redactSecrets(errorMessage(error));
      this.logger.warn('Directive failed', { tag: call.tag, error: message });
      result = toolError({ code: 'EXECUTION_FAILED', message });
    } finally {
      await scope.close();
    }

    result = this.redact(result);
    const durationMs = Date.now() - startedAt;
    if (result.message === TIMEOUT_MESSAGE && result.status === 'error') {
      this.logger.warn('Directive timed out', { tag: call.tag, timeoutMs });
    } else {
      this.logger.info('Directive completed', { tag: call.tag, status: result.status, durationMs });
    }

    await this.audit(call, result, timestamp, startedAt);
    return result;
  }

  private runWithTimeout(
    capability: Capability,
    args: ToolArgs,
    ctx: CapabilityContext,
    controller: AbortController,
    timeoutMs: number,
  ): Promise<ToolResult> {
    return new Promise<ToolResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort(new Error(`Directive <${ctx.tag}> timed out after ${timeoutMs}ms`));
        resolve(
          toolError({
            code: 'TIMEOUT',
            message: TIMEOUT_MESSAGE,
            hint: `The tool did not finish within ${timeoutMs}ms`,
            details: { timeoutMs },
          }),
        );
      }, Math.min(timeoutMs, MAX_TIMEOUT_MS));

      // Synchronous throws from the capability become rejections
      Promise.resolve()
        .then(() => capability(args, ctx))
        .then(
          value => {
            clearTimeout(timer);
            resolve(value);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          },
        );
    });
  }

  private redact(result: ToolResult): ToolResult {
    if (result.status === 'ok' && !this.config.redactOutput) {
      return result;
    }
    const message = redactSecrets(result.message);
    return message === result.message ? result : { ...result, message };
  }

  private async audit(
    call: ValidatedCall,
    result: ToolResult,
    timestamp: string,
    startedAt: number,
  ): Promise<void> {
    if (!this.auditSink) {
      return;
    }
    try {
      await this.auditSink.record({
        tag: call.tag,
        args: call.args,
        result,
        timestamp,
        durationMs: Date.now() - startedAt,
      });
    } catch (error) {
      if (error instanceof CollaboratorUnavailableError) {
        throw error;
      }
      this.logger.error('Audit sink failed', { tag: call.tag, error: errorMessage(error) });
    }
  }
}

/**
 * Release steps registered by one call. Handlers added after close() run at once.
 */
class CleanupScope {
  private handlers: CleanupHandler[] = [];
  private closed = false;

  constructor(
    private readonly tag: string,
    private readonly logger: ILogger,
  ) {}

  add(handler: CleanupHandler): void {
    if (this.closed) {
      void this.runOne(handler);
      return;
    }
    this.handlers.push(handler);
  }

  async close(): Promise<void> {
    this.closed = true;
    const handlers = this.handlers.reverse();
    this.handlers = [];
    for (const handler of handlers) {
      await this.runOne(handler);
    }
  }

  private async runOne(handler: CleanupHandler): Promise<void> {
    try {
      await handler();
    } catch (error) {
      this.logger.warn('Cleanup handler failed', { tag: this.tag, error: errorMessage(error) });
    }
  }
}
