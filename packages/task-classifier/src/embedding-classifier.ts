/**
 * @module @tagwire/task-classifier/embedding-classifier
 * Embedding-similarity task classifier.
 *
 * Each category is represented by the centroid (mean embedding) of its
 * example prompts. A prompt goes to the category whose centroid is most
 * similar by cosine.
 */

import { ClassificationError, errorMessage, noopLogger } from '@tagwire/directive-contracts';
import type { ILogger } from '@tagwire/directive-contracts';
import type { EmbeddingProvider, ITaskClassifier, TaskScore, TaskType } from './types.js';
import { loadEmbeddingExamples } from './profiles.js';
import type { EmbeddingExamples } from './profiles.js';

export interface EmbeddingTaskClassifierOptions {
  provider: EmbeddingProvider;
  /** Defaults to the bundled example set */
  examples?: EmbeddingExamples;
  logger?: ILogger;
}

type Centroid = { taskType: TaskType; vector: number[] };

/**
 * Cosine similarity in [-1, 1]. Zero when either vector has no length.
 * @throws ClassificationError on a dimension mismatch
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ClassificationError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Element-wise mean of equally sized vectors.
 * @throws ClassificationError on a dimension mismatch
 */
export function meanVector(vectors: readonly (readonly number[])[]): number[] {
  const [first] = vectors;
  if (!first) {
    return [];
  }
  const sum = new Array<number>(first.length).fill(0);
  for (const vector of vectors) {
    if (vector.length !== first.length) {
      throw new ClassificationError(`Embedding dimension mismatch: ${first.length} vs ${vector.length}`);
    }
    vector.forEach((value, i) => {
      sum[i] = (sum[i] ?? 0) + value;
    });
  }
  return sum.map((value) => value / vectors.length);
}

/**
 * Embedding task classifier.
 *
 * @example
 * ```typescript
 * const classifier = new EmbeddingTaskClassifier({
 *   provider: new CachedEmbeddingProvider(new OllamaEmbeddingProvider(), new EmbeddingCache()),
 * });
 *
 * const result = await classifier.classify('Write a haiku about autumn');
 * // result.method === 'embedding'
 * ```
 */
export class EmbeddingTaskClassifier implements ITaskClassifier {
  private readonly provider: EmbeddingProvider;
  private readonly examples: EmbeddingExamples;
  private readonly logger: ILogger;
  private centroids?: Promise<Centroid[]>;

  constructor(options: EmbeddingTaskClassifierOptions) {
    this.provider = options.provider;
    this.examples = options.examples ?? loadEmbeddingExamples();
    this.logger = options.logger ?? noopLogger;
  }

  async classify(prompt: string): Promise<TaskScore> {
    let centroids = await this.loadCentroids();
    if (centroids.length === 0) {
      throw new ClassificationError('No embedding examples configured');
    }

    let vector: number[];
    try {
      vector = await this.provider.embed(prompt);
    } catch (error) {
      throw asClassificationError(error, 'Failed to embed prompt');
    }

    // The provider switched models (e.g. a fallback took over or recovered)
    const dimensions = centroids[0]?.vector.length;
    if (dimensions !== undefined && dimensions !== vector.length) {
      this.logger.info('Embedding size changed, recomputing centroids', { from: dimensions, to: vector.length });
      this.centroids = undefined;
      centroids = await this.loadCentroids();
    }

    const scores: Partial<Record<TaskType, number>> = {};
    let best: Centroid | undefined;
    let bestSimilarity = -Infinity;
    for (const centroid of centroids) {
      const similarity = cosineSimilarity(vector, centroid.vector);
      scores[centroid.taskType] = similarity;
      if (similarity > bestSimilarity) {
        best = centroid;
        bestSimilarity = similarity;
      }
    }

    const taskType = best?.taskType ?? 'general';
    const confidence = Math.min(1, Math.max(0, (bestSimilarity + 1) / 2));
    this.logger.debug('Embedding similarities', { scores });

    return {
      taskType,
      confidence,
      method: 'embedding',
      scores,
      reasoning: `Closest to ${taskType} examples (similarity ${bestSimilarity.toFixed(2)})`,
    };
  }

  /**
   * Compute the category centroids once. A failed attempt is not memoized.
   */
  private async loadCentroids(): Promise<Centroid[]> {
    this.centroids ??= this.computeCentroids();
    try {
      return await this.centroids;
    } catch (error) {
      this.centroids = undefined;
      throw error;
    }
  }

  private async computeCentroids(): Promise<Centroid[]> {
    const centroids: Centroid[] = [];
    for (const [taskType, prompts] of Object.entries(this.examples)) {
      if (!isTaskType(taskType) || !prompts || prompts.length === 0) {
        continue;
      }
      let vectors: number[][];
      try {
        vectors = await Promise.all(prompts.map((example) => this.provider.embed(example)));
      } catch (error) {
        throw asClassificationError(error, `Failed to embed ${taskType} examples`);
      }
      centroids.push({ taskType, vector: meanVector(vectors) });
      this.logger.info('Initialized task centroid', { taskType, examples: prompts.length });
    }
    return centroids;
  }
}

function isTaskType(value: string): value is TaskType {
  return value === 'coding' || value === 'reasoning' || value === 'creative' || value === 'chat' || value === 'general';
}

function asClassificationError(error: unknown, context: string): ClassificationError {
  return error instanceof ClassificationError
    ? error
    : new ClassificationError(`${context}: ${errorMessage(error)}`, { cause: error });
}
