/**
 * IncrementalDirectiveScanner - directive extraction from streamed output.
 *
 * push() returns the directives completed so far. A span that may still be
 * completed by a later chunk (unterminated opening tag, missing closing tag)
 * is held back instead of reported. finish() flushes the tail and reports
 * whatever is still truncated.
 *
 * Offsets are absolute positions in the concatenated stream.
 *
 * Without a `tags` filter any `<word>` opens a span, so a stray unclosed
 * element in prose holds back everything after it until finish(). Streaming
 * callers should pass the registered tags.
 */

import type { ParseItem } from '@tagwire/directive-contracts';
import { parseDirectives, scanNext } from './directive-parser.js';
import type { ParseOptions } from './directive-parser.js';

export class IncrementalDirectiveScanner {
  private buffer = '';
  /** Stream offset of buffer[0] */
  private base = 0;
  private readonly filter: ReadonlySet<string> | undefined;
  private readonly tags: string[] | undefined;
  /** Closing tag the held span waits for, and where to look for it next */
  private awaiting: { needle: string; from: number } | undefined;

  constructor(options: ParseOptions = {}) {
    this.tags = options.tags ? [...options.tags] : undefined;
    this.filter = this.tags ? new Set(this.tags) : undefined;
  }

  push(chunk: string): ParseItem[] {
    this.buffer += chunk;
    if (this.awaiting) {
      const { needle, from } = this.awaiting;
      if (this.buffer.indexOf(needle, Math.max(0, from - needle.length + 1)) === -1) {
        this.awaiting.from = this.buffer.length;
        return [];
      }
      this.awaiting = undefined;
    }

    const items: ParseItem[] = [];
    let cursor = 0;

    for (;;) {
      const step = scanNext(this.buffer, cursor, this.filter);
      if (!step) {
        // A lone trailing "<" may start a directive in the next chunk
        cursor = this.buffer.endsWith('<') ? this.buffer.length - 1 : this.buffer.length;
        break;
      }
      const { item } = step;
      if (
        item.kind === 'parse-error' &&
        (item.code === 'UNTERMINATED_OPEN_TAG' || item.code === 'MISSING_CLOSING_TAG')
      ) {
        cursor = item.offset;
        if (item.code === 'MISSING_CLOSING_TAG') {
          this.awaiting = { needle: `</${item.tag}`, from: this.buffer.length - cursor };
        }
        break;
      }
      items.push(this.toStreamOffsets(item));
      cursor = step.resume;
    }

    this.consume(cursor);
    return items;
  }

  /**
   * Flush the remaining text, reporting truncated spans, and reset.
   */
  finish(): ParseItem[] {
    const items = [...parseDirectives(this.buffer, this.tags ? { tags: this.tags } : {})].map(item =>
      this.toStreamOffsets(item),
    );
    this.base += this.buffer.length;
    this.buffer = '';
    this.awaiting = undefined;
    return items;
  }

  /**
   * Text held back waiting for more input
   */
  pending(): string {
    return this.buffer;
  }

  private consume(count: number): void {
    this.base += count;
    this.buffer = this.buffer.slice(count);
  }

  private toStreamOffsets(item: ParseItem): ParseItem {
    return { ...item, offset: item.offset + this.base, end: item.end + this.base };
  }
}
