/**
 * @module @tagwire/task-classifier
 * Prompt classification and model routing.
 *
 * Provides three classification strategies:
 * - **Lexical**: keyword profiles, local and instant
 * - **Embedding**: cosine similarity to per-category centroids
 * - **Hybrid**: lexical first, embeddings when lexical is unsure
 *
 * @example
 * ```typescript
 * import { createTaskRouter } from '@tagwire/task-classifier';
 * import { parseDirectiveConfig } from '@tagwire/directive-contracts';
 *
 * const router = createTaskRouter(parseDirectiveConfig({
 *   defaultModel: 'general-model',
 *   taskModels: { coding: 'code-model' },
 * }));
 *
 * const route = await router.route('debug this function');
 * console.log(route.selectedModel); // 'code-model'
 * console.log(route.confidence);    // 0.2
 * ```
 */

export { LexicalTaskClassifier, tokenize, lexicalConfidence } from './lexical-classifier.js';
export { EmbeddingTaskClassifier, cosineSimilarity, meanVector } from './embedding-classifier.js';
export { HybridTaskClassifier } from './hybrid-classifier.js';
export {
  OllamaEmbeddingProvider,
  HashingEmbeddingProvider,
  FallbackEmbeddingProvider,
  fnv1a,
  DEFAULT_OLLAMA_HOST,
  DEFAULT_EMBEDDING_MODEL,
  HASHING_DIMENSIONS,
} from './embedding-providers.js';
export { EmbeddingCache, CachedEmbeddingProvider } from './embedding-cache.js';
export { ModelRouter } from './model-router.js';
export { createClassifier, createTaskRouter } from './create-router.js';
export {
  evaluateOverrides,
  CODING_OVERRIDE_TERMS,
  REASONING_OVERRIDE_TERMS,
  LONG_PROMPT_WORDS,
} from './override-rules.js';
export {
  InMemorySelectionLog,
  LoggerSelectionLog,
  createSelectionLogEntry,
  summarizeSelections,
  PROMPT_PREVIEW_LENGTH,
} from './selection-log.js';
export { TASK_HINTS, getTaskHints, resolveTemperature, applyTaskInstruction } from './task-hints.js';
export { loadLexicalProfiles, loadEmbeddingExamples } from './profiles.js';
export { TASK_TYPES } from './types.js';

export type {
  TaskType,
  TaskScore,
  ITaskClassifier,
  Classification,
  ClassificationMethod,
  OverrideReason,
  EmbeddingProvider,
  SelectionLogEntry,
  SelectionLogSink,
} from './types.js';
export type { EmbeddingTaskClassifierOptions } from './embedding-classifier.js';
export type { HybridTaskClassifierOptions, HybridStats } from './hybrid-classifier.js';
export type { OllamaEmbeddingProviderOptions } from './embedding-providers.js';
export type { ModelRouterOptions } from './model-router.js';
export type { CreateTaskRouterOptions } from './create-router.js';
export type { OverrideDecision } from './override-rules.js';
export type { SelectionStats } from './selection-log.js';
export type { TaskHints, ChatMessage } from './task-hints.js';
export type { LexicalProfile, EmbeddingExamples } from './profiles.js';
