/**
 * Validator: applies a tool's bindings to a parsed invocation.
 *
 * Pure. Missing required values and coercion failures come back as a
 * ValidationFailure; attributes and children no binding mentions are ignored.
 */

import type {
  ArgValue,
  Invocation,
  ParamBinding,
  ToolSchema,
  UnknownToolFailure,
  ValidationOutcome,
} from '@tagwire/directive-contracts';
import type { SchemaRegistry } from '../registry/schema-registry.js';
import { coerceValue } from './coerce.js';

/**
 * Locate the raw text for a binding, or undefined when absent.
 */
export function extractRaw(binding: ParamBinding, invocation: Invocation): string | undefined {
  switch (binding.source) {
    case 'content':
      return invocation.bodyText.trim() === '' ? undefined : invocation.bodyText;
    case 'attribute':
      return Object.hasOwn(invocation.attributes, binding.path)
        ? invocation.attributes[binding.path]
        : undefined;
    case 'element': {
      const path = binding.path.replace(/\//g, '.');
      return invocation.children.find(child => child.name === path)?.value;
    }
  }
}

export function validate(schema: ToolSchema, invocation: Invocation): ValidationOutcome {
  if (schema.tag !== invocation.tag) {
    return {
      kind: 'validation-failure',
      tag: invocation.tag,
      reason: `Schema "${schema.tag}" does not apply to <${invocation.tag}>`,
    };
  }

  const args: Record<string, ArgValue> = {};

  for (const binding of schema.bindings) {
    let raw = extractRaw(binding, invocation);

    // <tag flag> : a valueless boolean attribute means true
    if (raw === '' && binding.source === 'attribute' && binding.valueType === 'boolean') {
      raw = 'true';
    }

    if (raw === undefined) {
      if (binding.required) {
        return {
          kind: 'validation-failure',
          tag: invocation.tag,
          binding: binding.name,
          reason: `Missing required ${describeLocation(binding)} for "${binding.name}"`,
        };
      }
      if (binding.default !== undefined) {
        args[binding.name] = binding.default;
      }
      continue;
    }

    const coerced = coerceValue(raw, binding.valueType, binding.source);
    if (!coerced.ok) {
      return {
        kind: 'validation-failure',
        tag: invocation.tag,
        binding: binding.name,
        reason: `Invalid value for "${binding.name}": ${coerced.reason}`,
      };
    }
    args[binding.name] = coerced.value;
  }

  return { kind: 'call', tag: invocation.tag, args };
}

/**
 * Resolve the invocation's schema in the registry, then validate.
 */
export function validateWithRegistry(
  registry: SchemaRegistry,
  invocation: Invocation,
): ValidationOutcome | UnknownToolFailure {
  const schema = registry.getSchema(invocation.tag);
  if (!schema) {
    return {
      kind: 'unknown-tool',
      tag: invocation.tag,
      reason: `Unknown tool "${invocation.tag}"`,
    };
  }
  return validate(schema, invocation);
}

function describeLocation(binding: ParamBinding): string {
  switch (binding.source) {
    case 'content':
      return 'body content';
    case 'attribute':
      return `attribute "${binding.path}"`;
    case 'element':
      return `element <${binding.path}>`;
  }
}
