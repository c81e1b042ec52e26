/**
 * @module @tagwire/task-classifier/types
 * Type definitions for prompt classification and model routing.
 */

/**
 * Task categories a prompt can be routed by. `general` is the fallback
 * category for weak, tied or failed classifications.
 */
export type TaskType = 'coding' | 'reasoning' | 'creative' | 'chat' | 'general';

export const TASK_TYPES: readonly TaskType[] = ['coding', 'reasoning', 'creative', 'chat', 'general'];

export type ClassificationMethod = 'lexical' | 'embedding';

/**
 * Raw classifier output, before routing.
 */
export interface TaskScore {
  taskType: TaskType;
  /** Confidence in [0, 1]; its scale depends on `method` */
  confidence: number;
  /** Method that produced `confidence` (decides which threshold gates it) */
  method: ClassificationMethod;
  /** Per-category raw scores (keyword score or cosine similarity) */
  scores: Partial<Record<TaskType, number>>;
  reasoning: string;
}

/**
 * Task classifier interface.
 */
export interface ITaskClassifier {
  /**
   * Score a prompt against the task categories.
   * @throws ClassificationError when the scoring pipeline fails
   */
  classify(prompt: string): Promise<TaskScore>;
}

/**
 * Routing decision for one prompt.
 */
export interface Classification {
  taskType: TaskType;
  confidence: number;
  selectedModel: string;
  /** `fallback` when classification failed and the default model was used */
  method: ClassificationMethod | 'fallback';
  overrideReason?: OverrideReason;
}

export type OverrideReason =
  | 'coding_keywords_detected'
  | 'long_complex_prompt'
  | 'reasoning_terms_detected'
  | 'classification_failed';

/**
 * Embedding-vector provider (remote model or local fallback).
 */
export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string): Promise<number[]>;
}

/**
 * One recorded model-selection decision.
 */
export interface SelectionLogEntry {
  timestamp: string;
  /** First 50 characters of the prompt, followed by "..." when longer */
  promptPreview: string;
  promptLength: number;
  taskType: TaskType;
  /** Rounded to two decimals */
  confidence: number;
  selectedModel: string;
  method: Classification['method'];
  overrideApplied: boolean;
  overrideReason?: OverrideReason;
}

export interface SelectionLogSink {
  record(entry: SelectionLogEntry): void | Promise<void>;
}
