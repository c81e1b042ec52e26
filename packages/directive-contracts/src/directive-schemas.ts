/**
 * Zod Schemas for Tool Schema Validation
 *
 * Registry input is checked once at registration; a bad schema is a
 * programming error and fails fast.
 */

import { z } from 'zod';
import type { ToolSchema } from './directive-types.js';

/** Directive tag / attribute / element name */
export const TAG_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

/** Child element path: names joined by '.' or '/' */
const ELEMENT_PATH_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*(?:[./][A-Za-z][A-Za-z0-9_-]*)*$/;

/** Largest delay a Node.js timer honours; longer ones fire at once */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Timeout in milliseconds */
export const TimeoutMsSchema = z.number().int().positive().max(MAX_TIMEOUT_MS);

export const ArgValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

export const ParamBindingSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Binding name must be an identifier'),
  source: z.enum(['content', 'attribute', 'element']),
  path: z.string().min(1),
  required: z.boolean(),
  valueType: z.enum(['string', 'integer', 'boolean', 'list']),
  default: ArgValueSchema.optional(),
  description: z.string().optional(),
});

export const ToolSchemaSchema = z
  .object({
    tag: z.string().regex(TAG_NAME_PATTERN, "Tag must start with a letter and contain only letters, digits, '-' or '_'"),
    description: z.string().optional(),
    bindings: z.array(ParamBindingSchema),
    example: z.string().optional(),
    timeoutMs: TimeoutMsSchema.optional(),
  })
  .superRefine((schema, ctx) => {
    const seen = new Set<string>();
    schema.bindings.forEach((binding, index) => {
      if (seen.has(binding.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bindings', index, 'name'],
          message: `Duplicate binding "${binding.name}"`,
        });
      }
      seen.add(binding.name);

      if (binding.source === 'content' && binding.path !== '.') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bindings', index, 'path'],
          message: `Content binding "${binding.name}" must use path "."`,
        });
      }
      if (binding.source === 'attribute' && !TAG_NAME_PATTERN.test(binding.path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bindings', index, 'path'],
          message: `Attribute binding "${binding.name}" has invalid attribute name "${binding.path}"`,
        });
      }
      if (binding.source === 'element' && !ELEMENT_PATH_PATTERN.test(binding.path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bindings', index, 'path'],
          message: `Element binding "${binding.name}" has invalid path "${binding.path}"`,
        });
      }
      if (binding.required && binding.default !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bindings', index, 'default'],
          message: `Required binding "${binding.name}" cannot declare a default`,
        });
      }
    });
  });

/**
 * Validate a tool schema without throwing
 */
export function validateToolSchema(data: unknown): {
  success: boolean;
  data?: ToolSchema;
  issues?: string[];
} {
  const result = ToolSchemaSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, issues: formatZodIssues(result.error) };
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
