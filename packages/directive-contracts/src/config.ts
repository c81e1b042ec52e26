/**
 * Runtime configuration.
 *
 * One object drives model routing and dispatch timeouts. Hosts may build it
 * in code or load it from a YAML/JSON file with loadDirectiveConfig().
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { formatZodIssues, TimeoutMsSchema } from './directive-schemas.js';

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export const ClassifierThresholdsSchema = z.object({
  lexical: z.number().min(0).max(1).default(0.2),
  embedding: z.number().min(0).max(1).default(0.6),
});

export const DirectiveConfigSchema = z.object({
  /** Model used when classification is weak or fails */
  defaultModel: z.string().min(1),
  /** Task type → model identifier */
  taskModels: z.record(z.string(), z.string().min(1)).default({}),
  /** Which classifier drives routing */
  classifierStrategy: z.enum(['lexical', 'embedding', 'hybrid']).default('lexical'),
  classifierThresholds: ClassifierThresholdsSchema.default({}),
  /** Apply keyword override rules after gating */
  applyOverrides: z.boolean().default(false),
  /** Tag → timeout (ms) */
  perToolTimeoutMs: z.record(z.string(), TimeoutMsSchema).default({}),
  defaultToolTimeoutMs: TimeoutMsSchema.default(DEFAULT_TOOL_TIMEOUT_MS),
  /** Redact secrets from successful tool output as well as from faults */
  redactOutput: z.boolean().default(true),
});

export type DirectiveConfig = z.infer<typeof DirectiveConfigSchema>;
export type DirectiveConfigInput = z.input<typeof DirectiveConfigSchema>;
export type ClassifierStrategy = DirectiveConfig['classifierStrategy'];
export type ClassifierThresholds = DirectiveConfig['classifierThresholds'];

/**
 * Parse and validate configuration, filling defaults.
 * @throws ConfigError listing every invalid field
 */
export function parseDirectiveConfig(data: unknown): DirectiveConfig {
  const result = DirectiveConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodIssues(result.error).join('; ')}`);
  }
  return result.data;
}

/**
 * Validate configuration without throwing
 */
export function validateDirectiveConfig(data: unknown): {
  success: boolean;
  data?: DirectiveConfig;
  error?: z.ZodError;
} {
  const result = DirectiveConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Load configuration from a YAML or JSON file (JSON is valid YAML).
 */
export async function loadDirectiveConfig(filePath: string): Promise<DirectiveConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = parseYAML(raw);
  } catch (error) {
    throw new ConfigError(`Cannot parse configuration file ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return parseDirectiveConfig(data);
}

/**
 * Resolve the timeout for a tag: schema value, then per-tool config, then default.
 */
export function resolveToolTimeout(
  config: Pick<DirectiveConfig, 'perToolTimeoutMs' | 'defaultToolTimeoutMs'>,
  tag: string,
  schemaTimeoutMs?: number,
): number {
  return schemaTimeoutMs ?? config.perToolTimeoutMs[tag] ?? config.defaultToolTimeoutMs;
}
