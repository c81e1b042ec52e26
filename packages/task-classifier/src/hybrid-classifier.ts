/**
 * @module @tagwire/task-classifier/hybrid-classifier
 * Hybrid task classifier.
 *
 * Combines the lexical and embedding classifiers:
 * 1. Try lexical first (local, no model call)
 * 2. If its confidence is below the lexical threshold, ask the embedding classifier
 */

import { noopLogger } from '@tagwire/directive-contracts';
import type { ILogger } from '@tagwire/directive-contracts';
import type { ITaskClassifier, TaskScore } from './types.js';

export interface HybridTaskClassifierOptions {
  lexical: ITaskClassifier;
  embedding: ITaskClassifier;
  /** Lexical confidence at or above which the embedding step is skipped */
  lexicalThreshold: number;
  logger?: ILogger;
}

export interface HybridStats {
  lexicalCount: number;
  embeddingCount: number;
  lexicalRate: number;
}

/**
 * Hybrid task classifier.
 *
 * @example
 * ```typescript
 * const classifier = new HybridTaskClassifier({
 *   lexical: new LexicalTaskClassifier(),
 *   embedding: new EmbeddingTaskClassifier({ provider }),
 *   lexicalThreshold: 0.2,
 * });
 *
 * // Keyword-rich prompt → lexical (no embedding call)
 * await classifier.classify('debug this function');
 *
 * // Prompt without keywords → embedding
 * await classifier.classify('Plan a surprise party for my sister');
 * ```
 */
export class HybridTaskClassifier implements ITaskClassifier {
  private readonly lexical: ITaskClassifier;
  private readonly embedding: ITaskClassifier;
  private readonly lexicalThreshold: number;
  private readonly logger: ILogger;
  private lexicalCount = 0;
  private embeddingCount = 0;

  constructor(options: HybridTaskClassifierOptions) {
    this.lexical = options.lexical;
    this.embedding = options.embedding;
    this.lexicalThreshold = options.lexicalThreshold;
    this.logger = options.logger ?? noopLogger;
  }

  async classify(prompt: string): Promise<TaskScore> {
    const lexicalResult = await this.lexical.classify(prompt);

    if (lexicalResult.confidence >= this.lexicalThreshold) {
      this.lexicalCount++;
      return lexicalResult;
    }

    this.logger.debug('Lexical confidence below threshold, using embeddings', {
      confidence: lexicalResult.confidence,
      threshold: this.lexicalThreshold,
    });
    const embeddingResult = await this.embedding.classify(prompt);
    this.embeddingCount++;

    return {
      ...embeddingResult,
      reasoning: `${embeddingResult.reasoning} (escalated from lexical due to low confidence)`,
    };
  }

  /**
   * Which method answered so far.
   */
  getStats(): HybridStats {
    const total = this.lexicalCount + this.embeddingCount;
    return {
      lexicalCount: this.lexicalCount,
      embeddingCount: this.embeddingCount,
      lexicalRate: total === 0 ? 0 : this.lexicalCount / total,
    };
  }
}
