/**
 * @module @tagwire/task-classifier/selection-log
 * Records of model-selection decisions and their statistics.
 */

import type { ILogger } from '@tagwire/directive-contracts';
import type { Classification, SelectionLogEntry, SelectionLogSink, TaskType } from './types.js';

export const PROMPT_PREVIEW_LENGTH = 50;

export function createSelectionLogEntry(
  prompt: string,
  classification: Classification,
  now: Date = new Date(),
): SelectionLogEntry {
  const entry: SelectionLogEntry = {
    timestamp: now.toISOString(),
    promptPreview: prompt.length > PROMPT_PREVIEW_LENGTH ? `${prompt.slice(0, PROMPT_PREVIEW_LENGTH)}...` : prompt,
    promptLength: prompt.length,
    taskType: classification.taskType,
    confidence: Math.round(classification.confidence * 100) / 100,
    selectedModel: classification.selectedModel,
    method: classification.method,
    overrideApplied: classification.overrideReason !== undefined,
  };
  if (classification.overrideReason) {
    entry.overrideReason = classification.overrideReason;
  }
  return entry;
}

export interface SelectionStats {
  totalSelections: number;
  modelsUsed: Record<string, number>;
  taskTypes: Partial<Record<TaskType, number>>;
  /** Mean confidence, two decimals */
  confidenceAvg: number;
  /** Percentage of decisions with an override, one decimal */
  overrideRate: number;
}

export function summarizeSelections(entries: readonly SelectionLogEntry[]): SelectionStats {
  const modelsUsed: Record<string, number> = {};
  const taskTypes: Partial<Record<TaskType, number>> = {};
  let confidenceSum = 0;
  let overrides = 0;

  for (const entry of entries) {
    modelsUsed[entry.selectedModel] = (modelsUsed[entry.selectedModel] ?? 0) + 1;
    taskTypes[entry.taskType] = (taskTypes[entry.taskType] ?? 0) + 1;
    confidenceSum += entry.confidence;
    if (entry.overrideApplied) {
      overrides++;
    }
  }

  const total = entries.length;
  return {
    totalSelections: total,
    modelsUsed,
    taskTypes,
    confidenceAvg: total === 0 ? 0 : Math.round((confidenceSum / total) * 100) / 100,
    overrideRate: total === 0 ? 0 : Math.round((overrides / total) * 1000) / 10,
  };
}

/**
 * Keeps entries in memory, optionally bounded to the most recent `capacity`.
 */
export class InMemorySelectionLog implements SelectionLogSink {
  private readonly items: SelectionLogEntry[] = [];

  constructor(private readonly capacity = Infinity) {}

  record(entry: SelectionLogEntry): void {
    this.items.push(entry);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  entries(): readonly SelectionLogEntry[] {
    return this.items;
  }

  /**
   * Statistics over entries newer than `since` (all entries by default).
   */
  stats(since?: Date): SelectionStats {
    const cutoff = since?.toISOString();
    return summarizeSelections(cutoff ? this.items.filter((entry) => entry.timestamp >= cutoff) : this.items);
  }
}

/**
 * Writes each entry as one structured info line.
 */
export class LoggerSelectionLog implements SelectionLogSink {
  constructor(private readonly logger: ILogger) {}

  record(entry: SelectionLogEntry): void {
    this.logger.info('Model selection', { ...entry });
  }
}
