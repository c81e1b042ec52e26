/**
 * @module @tagwire/task-classifier/lexical-classifier
 * Keyword-based task classifier.
 *
 * Fast and local: counts whole-word keyword hits per category and
 * normalizes them by prompt length.
 */

import type { ITaskClassifier, TaskScore, TaskType } from './types.js';
import { loadLexicalProfiles } from './profiles.js';
import type { LexicalProfile } from './profiles.js';

const WORD_PATTERN = /[\p{L}\p{N}_+#]+/gu;

/**
 * Lowercased word tokens of a prompt.
 */
export function tokenize(prompt: string): string[] {
  return prompt.toLowerCase().match(WORD_PATTERN) ?? [];
}

/**
 * Map a normalized keyword score to [0, 1]. A single hit in a short prompt
 * is weak evidence: "debug this function" (score 2) → 0.2, "debug" (score 1) → 0.05.
 */
export function lexicalConfidence(score: number): number {
  return Math.min(1, score / 10) * Math.min(1, score / 2);
}

/**
 * Lexical task classifier.
 *
 * @example
 * ```typescript
 * const classifier = new LexicalTaskClassifier();
 *
 * const result = await classifier.classify('debug this function');
 * // result.taskType === 'coding'
 * // result.confidence === 0.2
 * ```
 */
export class LexicalTaskClassifier implements ITaskClassifier {
  private readonly profiles: Array<{ taskType: TaskType; keywords: Set<string> }>;

  constructor(profiles: LexicalProfile[] = loadLexicalProfiles()) {
    this.profiles = profiles.map((profile) => ({
      taskType: profile.taskType,
      keywords: new Set(profile.keywords.map((keyword) => keyword.toLowerCase())),
    }));
  }

  async classify(prompt: string): Promise<TaskScore> {
    const words = tokenize(prompt);
    const wordCount = prompt.split(/\s+/).filter(Boolean).length;
    const normalizer = Math.max(1, wordCount / 10);

    const totals = new Map<TaskType, number>();
    for (const profile of this.profiles) {
      const hits = words.filter((word) => profile.keywords.has(word)).length;
      totals.set(profile.taskType, (totals.get(profile.taskType) ?? 0) + hits / normalizer);
    }

    let best: TaskType = 'general';
    let bestScore = 0;
    let tied = false;
    for (const [taskType, score] of totals) {
      if (score > bestScore) {
        best = taskType;
        bestScore = score;
        tied = false;
      } else if (score === bestScore && score > 0) {
        tied = true;
      }
    }
    const scores = Object.fromEntries(totals);

    if (bestScore === 0 || tied) {
      return {
        taskType: 'general',
        confidence: 0,
        method: 'lexical',
        scores,
        reasoning: bestScore === 0 ? 'No category keywords found' : 'Keyword scores tied',
      };
    }

    return {
      taskType: best,
      confidence: lexicalConfidence(bestScore),
      method: 'lexical',
      scores,
      reasoning: `Matched ${best} keywords (score ${bestScore.toFixed(2)})`,
    };
  }
}
