/**
 * Result Encoder
 *
 * Turns every per-directive outcome into a ToolResult and serializes
 * results into transcript messages for the next model turn:
 *
 *   <tool_result tag="create-file" status="ok">
 *   Created src/app.ts (21 bytes)
 *   </tool_result>
 */

import { errorPayload, toolError } from '@tagwire/directive-contracts';
import type {
  RawSpanError,
  ToolResult,
  UnknownToolFailure,
  ValidationFailure,
} from '@tagwire/directive-contracts';

export interface TranscriptMessage {
  role: 'tool';
  /** Directive tag the result belongs to ("" when the tag could not be read) */
  name: string;
  content: string;
}

export const RESULT_ELEMENT = 'tool_result';

export function parseFailureResult(error: RawSpanError): ToolResult {
  const subject = error.tag ? `<${error.tag}>` : 'directive';
  return toolError({
    code: 'PARSE_ERROR',
    message: `Could not parse ${subject} at offset ${error.offset}: ${error.reason}`,
    hint: 'Close every directive with its matching closing tag and quote attribute values',
    details: { parseCode: error.code, offset: error.offset },
  });
}

export function unknownToolResult(failure: UnknownToolFailure, availableTags: readonly string[]): ToolResult {
  return toolError({
    code: 'UNKNOWN_TOOL',
    message: `${failure.reason}: <${failure.tag}> is not a registered directive`,
    hint: availableTags.length > 0 ? `Available directives: ${availableTags.join(', ')}` : undefined,
  });
}

export function validationFailureResult(failure: ValidationFailure): ToolResult {
  return toolError({
    code: 'VALIDATION_FAILED',
    message: `<${failure.tag}>: ${failure.reason}`,
    details: failure.binding ? { binding: failure.binding } : undefined,
  });
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

/**
 * Serialize one result as a transcript message.
 */
export function encodeResult(tag: string, result: ToolResult): TranscriptMessage {
  const lines = [result.message];
  const payload = errorPayload(result);
  if (payload) {
    lines.push(`Error code: ${payload.code}`);
    if (payload.hint) {
      lines.push(`Hint: ${payload.hint}`);
    }
  }

  // Keep the body from closing the wrapper early
  const body = lines.join('\n').replace(new RegExp(`</${RESULT_ELEMENT}`, 'g'), `&lt;/${RESULT_ELEMENT}`);
  const tagAttr = tag ? ` tag="${escapeAttribute(tag)}"` : '';

  return {
    role: 'tool',
    name: tag,
    content: `<${RESULT_ELEMENT}${tagAttr} status="${result.status}">\n${body}\n</${RESULT_ELEMENT}>`,
  };
}
