/**
 * @module @tagwire/task-classifier/model-router
 * Turns a classifier score into a model identifier.
 */

import { errorMessage, noopLogger } from '@tagwire/directive-contracts';
import type { ClassifierThresholds, ILogger } from '@tagwire/directive-contracts';
import type { Classification, ITaskClassifier, SelectionLogSink, TaskScore, TaskType } from './types.js';
import { evaluateOverrides } from './override-rules.js';
import { createSelectionLogEntry } from './selection-log.js';

export interface ModelRouterOptions {
  classifier: ITaskClassifier;
  /** Model used when confidence is below threshold or classification fails */
  defaultModel: string;
  /** Task type → model; missing types use `defaultModel` */
  taskModels?: Partial<Record<TaskType, string>>;
  thresholds: ClassifierThresholds;
  applyOverrides?: boolean;
  selectionLog?: SelectionLogSink;
  logger?: ILogger;
}

/**
 * Model router.
 *
 * Never rejects: classification failures fall back to the default model.
 *
 * @example
 * ```typescript
 * const router = new ModelRouter({
 *   classifier: new LexicalTaskClassifier(),
 *   defaultModel: 'general-model',
 *   taskModels: { coding: 'code-model' },
 *   thresholds: { lexical: 0.2, embedding: 0.6 },
 * });
 *
 * await router.selectModel('debug this function'); // 'code-model'
 * await router.selectModel('debug');               // 'general-model'
 * ```
 */
export class ModelRouter {
  private readonly classifier: ITaskClassifier;
  private readonly defaultModel: string;
  private readonly taskModels: Record<string, string | undefined>;
  private readonly thresholds: ClassifierThresholds;
  private readonly applyOverrides: boolean;
  private readonly selectionLog?: SelectionLogSink;
  private readonly logger: ILogger;

  constructor(options: ModelRouterOptions) {
    this.classifier = options.classifier;
    this.defaultModel = options.defaultModel;
    this.taskModels = { ...options.taskModels };
    this.thresholds = options.thresholds;
    this.applyOverrides = options.applyOverrides ?? false;
    this.selectionLog = options.selectionLog;
    this.logger = options.logger ?? noopLogger;
  }

  async selectModel(prompt: string): Promise<string> {
    return (await this.route(prompt)).selectedModel;
  }

  async route(prompt: string): Promise<Classification> {
    let score: TaskScore;
    try {
      score = await this.classifier.classify(prompt);
    } catch (error) {
      this.logger.warn('Classification failed, using default model', { error: errorMessage(error) });
      const fallback: Classification = {
        taskType: 'general',
        confidence: 0,
        selectedModel: this.defaultModel,
        method: 'fallback',
        overrideReason: 'classification_failed',
      };
      await this.record(prompt, fallback);
      return fallback;
    }

    const threshold = this.thresholds[score.method];
    const confident = score.confidence >= threshold;
    const classification: Classification = {
      taskType: score.taskType,
      confidence: score.confidence,
      selectedModel: confident ? this.modelFor(score.taskType) : this.defaultModel,
      method: score.method,
    };

    if (this.applyOverrides) {
      const override = evaluateOverrides(prompt, score.taskType);
      if (override) {
        this.logger.info('Overriding classification', { from: score.taskType, to: override.taskType, reason: override.reason });
        classification.selectedModel = this.modelFor(override.taskType);
        classification.overrideReason = override.reason;
      }
    }

    this.logger.info('Selected model', {
      model: classification.selectedModel,
      taskType: score.taskType,
      confidence: score.confidence,
      threshold,
      method: score.method,
    });
    await this.record(prompt, classification);
    return classification;
  }

  private modelFor(taskType: TaskType): string {
    return this.taskModels[taskType] ?? this.defaultModel;
  }

  private async record(prompt: string, classification: Classification): Promise<void> {
    if (!this.selectionLog) {
      return;
    }
    try {
      await this.selectionLog.record(createSelectionLogEntry(prompt, classification));
    } catch (error) {
      this.logger.error('Selection log failed', { error: errorMessage(error) });
    }
  }
}
