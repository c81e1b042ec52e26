/**
 * @module @tagwire/task-classifier/profiles
 * Keyword profiles and embedding example sets, loaded from JSON data files.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, errorMessage, formatZodIssues } from '@tagwire/directive-contracts';
import type { TaskType } from './types.js';

const TaskTypeSchema = z.enum(['coding', 'reasoning', 'creative', 'chat', 'general']);

export const LexicalProfileSchema = z.object({
  taskType: TaskTypeSchema,
  keywords: z.array(z.string().trim().toLowerCase().min(1)).min(1),
});

export const LexicalProfilesFileSchema = z.object({
  profiles: z.array(LexicalProfileSchema).min(1),
});

export const EmbeddingExamplesFileSchema = z.object({
  examples: z.record(TaskTypeSchema, z.array(z.string().min(1)).min(1)),
});

export type LexicalProfile = z.infer<typeof LexicalProfileSchema>;
export type EmbeddingExamples = Partial<Record<TaskType, string[]>>;

const LEXICAL_PROFILES_URL = new URL('../data/lexical-profiles.json', import.meta.url);
const EMBEDDING_EXAMPLES_URL = new URL('../data/embedding-examples.json', import.meta.url);

function readDataFile<S extends z.ZodTypeAny>(file: string | URL, schema: S): z.infer<S> {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read data file ${String(file)}: ${errorMessage(error)}`, { cause: error });
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid data file ${String(file)}: ${formatZodIssues(result.error).join('; ')}`);
  }
  return result.data;
}

/**
 * Load keyword profiles. Defaults to the bundled profile file.
 * @throws ConfigError when the file is missing or malformed
 */
export function loadLexicalProfiles(file: string | URL = LEXICAL_PROFILES_URL): LexicalProfile[] {
  return readDataFile(file, LexicalProfilesFileSchema).profiles;
}

/**
 * Load example prompts per category. Defaults to the bundled example file.
 * @throws ConfigError when the file is missing or malformed
 */
export function loadEmbeddingExamples(file: string | URL = EMBEDDING_EXAMPLES_URL): EmbeddingExamples {
  return readDataFile(file, EmbeddingExamplesFileSchema).examples;
}
