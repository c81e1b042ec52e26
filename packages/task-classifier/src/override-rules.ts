/**
 * @module @tagwire/task-classifier/override-rules
 * Keyword rules that redirect a classified prompt to another category.
 */

import { tokenize } from './lexical-classifier.js';
import type { OverrideReason, TaskType } from './types.js';

export const CODING_OVERRIDE_TERMS = [
  'code', 'function', 'programming', 'debug', 'algorithm', 'class',
  'method', 'variable', 'compile', 'syntax', 'api',
] as const;

export const REASONING_OVERRIDE_TERMS = [
  'analyze', 'evaluate', 'compare', 'contrast', 'implications',
  'reasoning', 'logic', 'argument', 'debate', 'philosophy',
] as const;

/** Prompts longer than this many words go to the reasoning model */
export const LONG_PROMPT_WORDS = 100;

export interface OverrideDecision {
  taskType: TaskType;
  reason: OverrideReason;
}

/**
 * First matching rule, in order: coding terms, long prompt, reasoning terms.
 * A rule never fires for the category it would route to.
 */
export function evaluateOverrides(prompt: string, classified: TaskType): OverrideDecision | undefined {
  const words = new Set(tokenize(prompt));
  const mentions = (terms: readonly string[]) => terms.some((term) => words.has(term));

  if (classified !== 'coding' && mentions(CODING_OVERRIDE_TERMS)) {
    return { taskType: 'coding', reason: 'coding_keywords_detected' };
  }
  if (classified !== 'reasoning' && prompt.split(/\s+/).filter(Boolean).length > LONG_PROMPT_WORDS) {
    return { taskType: 'reasoning', reason: 'long_complex_prompt' };
  }
  if (classified !== 'reasoning' && mentions(REASONING_OVERRIDE_TERMS)) {
    return { taskType: 'reasoning', reason: 'reasoning_terms_detected' };
  }
  return undefined;
}
