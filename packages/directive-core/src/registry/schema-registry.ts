/**
 * Schema registry: directive tag → (ToolSchema, Capability).
 *
 * Built once at start-up, then sealed. Lookups after sealing are the only
 * shared state between concurrent turns.
 */

import {
  DuplicateToolError,
  InvalidSchemaError,
  RegistrySealedError,
  validateToolSchema,
} from '@tagwire/directive-contracts';
import type { Capability, ToolSchema } from '@tagwire/directive-contracts';

export interface RegisteredTool {
  schema: ToolSchema;
  capability: Capability;
}

export class SchemaRegistry {
  private tools = new Map<string, RegisteredTool>();
  private sealed = false;

  /**
   * Register a tool
   * @throws DuplicateToolError, InvalidSchemaError, RegistrySealedError
   */
  register(schema: ToolSchema, capability: Capability): this {
    if (this.sealed) {
      throw new RegistrySealedError(schema.tag);
    }
    if (this.tools.has(schema.tag)) {
      throw new DuplicateToolError(schema.tag);
    }

    const validation = validateToolSchema(schema);
    if (!validation.success || !validation.data) {
      throw new InvalidSchemaError(schema.tag, validation.issues ?? []);
    }

    this.tools.set(schema.tag, { schema: validation.data, capability });
    return this;
  }

  /**
   * Make the registry read-only. Idempotent.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get(tag: string): RegisteredTool | undefined {
    return this.tools.get(tag);
  }

  getSchema(tag: string): ToolSchema | undefined {
    return this.tools.get(tag)?.schema;
  }

  has(tag: string): boolean {
    return this.tools.has(tag);
  }

  /**
   * Registered tags in registration order
   */
  tags(): string[] {
    return Array.from(this.tools.keys());
  }

  schemas(): ToolSchema[] {
    return Array.from(this.tools.values()).map(t => t.schema);
  }
}
