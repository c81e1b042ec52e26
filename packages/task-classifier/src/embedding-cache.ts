/**
 * @module @tagwire/task-classifier/embedding-cache
 * Write-once embedding cache keyed by exact text.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { CollaboratorUnavailableError, errorMessage, formatZodIssues, ConfigError, noopLogger } from '@tagwire/directive-contracts';
import type { ILogger } from '@tagwire/directive-contracts';
import type { EmbeddingProvider } from './types.js';

const CacheSnapshotSchema = z.record(z.string(), z.array(z.number()));

/**
 * Append-only map from text to embedding vector.
 *
 * Entries never change once written. Concurrent lookups of a key that is
 * still being computed share one computation.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, readonly number[]>();
  private readonly inFlight = new Map<string, Promise<readonly number[]>>();

  get size(): number {
    return this.entries.size;
  }

  has(text: string): boolean {
    return this.entries.has(text);
  }

  get(text: string): readonly number[] | undefined {
    return this.entries.get(text);
  }

  /**
   * Store a vector unless the key already has one.
   * @returns the vector held for the key afterwards
   */
  set(text: string, vector: readonly number[]): readonly number[] {
    const existing = this.entries.get(text);
    if (existing) {
      return existing;
    }
    const frozen = Object.freeze([...vector]);
    this.entries.set(text, frozen);
    return frozen;
  }

  async getOrCompute(text: string, compute: (text: string) => Promise<number[]>): Promise<readonly number[]> {
    const cached = this.entries.get(text);
    if (cached) {
      return cached;
    }

    const pending = this.inFlight.get(text);
    if (pending) {
      return pending;
    }

    const computation = compute(text)
      .then((vector) => this.set(text, vector))
      .finally(() => this.inFlight.delete(text));
    this.inFlight.set(text, computation);
    return computation;
  }

  toJSON(): Record<string, number[]> {
    return Object.fromEntries([...this.entries].map(([text, vector]) => [text, [...vector]]));
  }

  /**
   * Write a JSON snapshot of every entry.
   * @throws CollaboratorUnavailableError when the file cannot be written
   */
  async save(filePath: string): Promise<void> {
    try {
      await writeFile(filePath, JSON.stringify(this.toJSON()), 'utf-8');
    } catch (error) {
      throw new CollaboratorUnavailableError('embedding cache', `cannot write ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Merge a JSON snapshot into the cache. Keys already present keep their vector.
   * A missing file loads nothing.
   * @returns number of entries added
   */
  async load(filePath: string): Promise<number> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw new CollaboratorUnavailableError('embedding cache', `cannot read ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`Cannot parse embedding cache ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    const result = CacheSnapshotSchema.safeParse(data);
    if (!result.success) {
      throw new ConfigError(`Invalid embedding cache ${filePath}: ${formatZodIssues(result.error).join('; ')}`);
    }

    let added = 0;
    for (const [text, vector] of Object.entries(result.data)) {
      if (!this.entries.has(text)) {
        this.set(text, vector);
        added++;
      }
    }
    return added;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Provider decorator that serves repeated texts from an EmbeddingCache.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly cache: EmbeddingCache,
    private readonly logger: ILogger = noopLogger,
  ) {
    this.name = `cached(${provider.name})`;
  }

  async embed(text: string): Promise<number[]> {
    if (this.cache.has(text)) {
      this.logger.debug('Embedding cache hit', { length: text.length });
    }
    const vector = await this.cache.getOrCompute(text, (t) => this.provider.embed(t));
    return [...vector];
  }
}
