/**
 * @module @tagwire/task-classifier/embedding-providers
 * Embedding providers: Ollama, a deterministic hashing fallback, and a
 * provider that chains the two.
 */

import { Ollama } from 'ollama';
import { ClassificationError, errorMessage, noopLogger } from '@tagwire/directive-contracts';
import type { ILogger } from '@tagwire/directive-contracts';
import type { EmbeddingProvider } from './types.js';

export const DEFAULT_OLLAMA_HOST = 'http://127.0.0.1:11434';
export const DEFAULT_EMBEDDING_MODEL = 'mxbai-embed-large';
export const HASHING_DIMENSIONS = 100;

export interface OllamaEmbeddingProviderOptions {
  host?: string;
  model?: string;
  /** Preconstructed client; takes precedence over `host` */
  client?: Pick<Ollama, 'embeddings'>;
}

/**
 * Embeddings from a local or remote Ollama server.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  private readonly client: Pick<Ollama, 'embeddings'>;
  private readonly model: string;

  constructor(options: OllamaEmbeddingProviderOptions = {}) {
    this.client = options.client ?? new Ollama({ host: options.host ?? DEFAULT_OLLAMA_HOST });
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
  }

  async embed(text: string): Promise<number[]> {
    let embedding: number[];
    try {
      ({ embedding } = await this.client.embeddings({ model: this.model, prompt: text }));
    } catch (error) {
      throw new ClassificationError(`Ollama embedding request failed: ${errorMessage(error)}`, { cause: error });
    }
    if (embedding.length === 0) {
      throw new ClassificationError(`Ollama returned an empty embedding for model ${this.model}`);
    }
    return embedding;
  }
}

/**
 * 32-bit FNV-1a hash of a string's UTF-16 code units.
 */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Deterministic local fallback.
 *
 * Each of the first `dimensions` lowercase words adds `1 / (position + 1)`
 * to bucket `fnv1a(word) % dimensions`; the vector is L2-normalized.
 * Captures word overlap only, no semantics.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';

  constructor(private readonly dimensions = HASHING_DIMENSIONS) {}

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    const words = text.toLowerCase().split(/\s+/).filter(Boolean).slice(0, this.dimensions);

    words.forEach((word, position) => {
      const bucket = fnv1a(word) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1 / (position + 1);
    });

    const norm = Math.hypot(...vector);
    return norm > 0 ? vector.map((value) => value / norm) : vector;
  }
}

/**
 * Uses `primary` and switches to `fallback` for a call that fails.
 */
export class FallbackEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;

  constructor(
    private readonly primary: EmbeddingProvider,
    private readonly fallback: EmbeddingProvider,
    private readonly logger: ILogger = noopLogger,
  ) {
    this.name = `${primary.name}|${fallback.name}`;
  }

  async embed(text: string): Promise<number[]> {
    try {
      return await this.primary.embed(text);
    } catch (error) {
      this.logger.warn('Embedding provider failed, using fallback', {
        provider: this.primary.name,
        fallback: this.fallback.name,
        error: errorMessage(error),
      });
      return this.fallback.embed(text);
    }
  }
}
