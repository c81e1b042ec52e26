/**
 * TurnProcessor: one model turn → tool results and transcript messages.
 *
 * parse → validate → dispatch → encode, directive by directive in the order
 * they appear in the text. A directive starts only after the previous one
 * has finished, so later directives observe earlier side effects.
 */

import { noopLogger } from '@tagwire/directive-contracts';
import type { ILogger, ParseItem, ToolArgs, ToolResult } from '@tagwire/directive-contracts';
import { parseDirectives } from '../parser/directive-parser.js';
import type { SchemaRegistry } from '../registry/schema-registry.js';
import { validateWithRegistry } from '../validator/directive-validator.js';
import type { DirectiveDispatcher } from '../dispatcher/directive-dispatcher.js';
import {
  encodeResult,
  parseFailureResult,
  unknownToolResult,
  validationFailureResult,
} from '../encoder/result-encoder.js';
import type { TranscriptMessage } from '../encoder/result-encoder.js';

export type TurnEntryKind = 'call' | 'parse-error' | 'unknown-tool' | 'validation-failure';

export interface TurnEntry {
  kind: TurnEntryKind;
  /** Empty when the tag could not be read */
  tag: string;
  /** Offset of the directive in the model output */
  offset: number;
  /** Present for dispatched calls */
  args?: ToolArgs;
  result: ToolResult;
}

export interface TurnOutcome {
  entries: TurnEntry[];
  transcript: TranscriptMessage[];
}

export interface TurnProcessorOptions {
  registry: SchemaRegistry;
  dispatcher: DirectiveDispatcher;
  /**
   * Treat only registered tags as directives. Off by default so that a
   * misspelled directive comes back to the model as an unknown tool.
   */
  registeredTagsOnly?: boolean;
  logger?: ILogger;
}

export class TurnProcessor {
  private readonly registry: SchemaRegistry;
  private readonly dispatcher: DirectiveDispatcher;
  private readonly registeredTagsOnly: boolean;
  private readonly logger: ILogger;

  constructor(options: TurnProcessorOptions) {
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.registeredTagsOnly = options.registeredTagsOnly ?? false;
    this.logger = options.logger ?? noopLogger;
  }

  async processTurn(text: string): Promise<TurnOutcome> {
    const items = parseDirectives(text, this.registeredTagsOnly ? { tags: this.registry.tags() } : {});
    return this.processItems(items);
  }

  /**
   * Process already-parsed items, e.g. from an IncrementalDirectiveScanner.
   */
  async processItems(items: Iterable<ParseItem>): Promise<TurnOutcome> {
    const entries: TurnEntry[] = [];

    for (const item of items) {
      entries.push(await this.processItem(item));
    }

    const failed = entries.filter(e => e.result.status === 'error').length;
    this.logger.info('Turn processed', { directives: entries.length, failed });

    return {
      entries,
      transcript: entries.map(entry => encodeResult(entry.tag, entry.result)),
    };
  }

  private async processItem(item: ParseItem): Promise<TurnEntry> {
    if (item.kind === 'parse-error') {
      this.logger.debug('Malformed directive', { tag: item.tag, code: item.code, offset: item.offset });
      return {
        kind: 'parse-error',
        tag: item.tag ?? '',
        offset: item.offset,
        result: parseFailureResult(item),
      };
    }

    const outcome = validateWithRegistry(this.registry, item);
    switch (outcome.kind) {
      case 'unknown-tool':
        return {
          kind: 'unknown-tool',
          tag: item.tag,
          offset: item.offset,
          result: unknownToolResult(outcome, this.registry.tags()),
        };
      case 'validation-failure':
        return {
          kind: 'validation-failure',
          tag: item.tag,
          offset: item.offset,
          result: validationFailureResult(outcome),
        };
      case 'call':
        return {
          kind: 'call',
          tag: item.tag,
          offset: item.offset,
          args: outcome.args,
          result: await this.dispatcher.execute(outcome),
        };
    }
  }
}
