/**
 * @module @tagwire/task-classifier/create-router
 * Builds the classifier and router a configuration asks for.
 */

import { noopLogger } from '@tagwire/directive-contracts';
import type { DirectiveConfig, ILogger } from '@tagwire/directive-contracts';
import type { EmbeddingProvider, ITaskClassifier, SelectionLogSink } from './types.js';
import { LexicalTaskClassifier } from './lexical-classifier.js';
import { EmbeddingTaskClassifier } from './embedding-classifier.js';
import { HybridTaskClassifier } from './hybrid-classifier.js';
import { CachedEmbeddingProvider, EmbeddingCache } from './embedding-cache.js';
import {
  FallbackEmbeddingProvider,
  HashingEmbeddingProvider,
  OllamaEmbeddingProvider,
} from './embedding-providers.js';
import { ModelRouter } from './model-router.js';
import type { EmbeddingExamples, LexicalProfile } from './profiles.js';

export interface CreateTaskRouterOptions {
  /** Primary provider, Ollama by default; the hashing provider covers its failures */
  embeddingProvider?: EmbeddingProvider;
  /** Shared cache of primary vectors; a private one is created otherwise */
  embeddingCache?: EmbeddingCache;
  lexicalProfiles?: LexicalProfile[];
  embeddingExamples?: EmbeddingExamples;
  selectionLog?: SelectionLogSink;
  logger?: ILogger;
}

export function createClassifier(
  config: Pick<DirectiveConfig, 'classifierStrategy' | 'classifierThresholds'>,
  options: CreateTaskRouterOptions = {},
): ITaskClassifier {
  const logger = options.logger ?? noopLogger;

  const lexical = () => new LexicalTaskClassifier(options.lexicalProfiles);
  const embedding = () => {
    const primary = new CachedEmbeddingProvider(
      options.embeddingProvider ?? new OllamaEmbeddingProvider(),
      options.embeddingCache ?? new EmbeddingCache(),
      logger,
    );
    // Fallback vectors stay out of the cache so the primary's take over once it recovers
    const provider = new FallbackEmbeddingProvider(primary, new HashingEmbeddingProvider(), logger);
    return new EmbeddingTaskClassifier({ provider, examples: options.embeddingExamples, logger });
  };

  switch (config.classifierStrategy) {
    case 'lexical':
      return lexical();
    case 'embedding':
      return embedding();
    case 'hybrid':
      return new HybridTaskClassifier({
        lexical: lexical(),
        embedding: embedding(),
        lexicalThreshold: config.classifierThresholds.lexical,
        logger,
      });
  }
}

/**
 * Router wired from configuration.
 *
 * @example
 * ```typescript
 * const config = await loadDirectiveConfig('tagwire.yaml');
 * const router = createTaskRouter(config, { selectionLog: new InMemorySelectionLog() });
 * const model = await router.selectModel(prompt);
 * ```
 */
export function createTaskRouter(config: DirectiveConfig, options: CreateTaskRouterOptions = {}): ModelRouter {
  return new ModelRouter({
    classifier: createClassifier(config, options),
    defaultModel: config.defaultModel,
    taskModels: config.taskModels,
    thresholds: config.classifierThresholds,
    applyOverrides: config.applyOverrides,
    selectionLog: options.selectionLog,
    logger: options.logger,
  });
}
