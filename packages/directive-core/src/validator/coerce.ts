/**
 * Raw directive text → typed argument values.
 */

import { z } from 'zod';
import type { ArgValue, ParamSource, ParamValueType } from '@tagwire/directive-contracts';

export type CoercionResult = { ok: true; value: ArgValue } | { ok: false; reason: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;

const TRUE_WORDS = new Set(['true', 'yes', '1', 'on']);
const FALSE_WORDS = new Set(['false', 'no', '0', 'off']);

const JsonScalarListSchema = z.array(z.union([z.string(), z.number(), z.boolean()]));

/** Leading list markers: "-", "*", "[ ]", "[x]", "- [ ]", "* [x]" */
const BULLET_PATTERN = /^(?:[-*]\s+)?(?:\[[ xX]\]\s*)?/;

export function coerceInteger(raw: string): CoercionResult {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) {
    return { ok: false, reason: `expected an integer, got "${text}"` };
  }
  const value = Number.parseInt(text, 10);
  if (!Number.isSafeInteger(value)) {
    return { ok: false, reason: `integer out of range: ${text}` };
  }
  return { ok: true, value };
}

export function coerceBoolean(raw: string): CoercionResult {
  const text = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(text)) {
    return { ok: true, value: true };
  }
  if (FALSE_WORDS.has(text)) {
    return { ok: true, value: false };
  }
  return { ok: false, reason: `expected a boolean, got "${raw.trim()}"` };
}

function parseJsonList(text: string): string[] | undefined {
  if (!text.startsWith('[') || !text.endsWith(']')) {
    return undefined;
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    // Not JSON: "[ ] task" style checklists also start with "["
    return undefined;
  }
  const result = JsonScalarListSchema.safeParse(data);
  return result.success ? result.data.map(item => String(item).trim()) : undefined;
}

/**
 * JSON array of scalars, else one item per non-empty line with bullets stripped.
 */
export function coerceList(raw: string): CoercionResult {
  const text = raw.trim();
  if (text === '') {
    return { ok: true, value: [] };
  }

  const json = parseJsonList(text);
  if (json) {
    return { ok: true, value: json.filter(item => item !== '') };
  }
  if (text.startsWith('[') && text.endsWith(']') && !text.includes('\n') && text.includes('"')) {
    return { ok: false, reason: 'malformed JSON list' };
  }

  const items = text
    .split(/\r?\n/)
    .map(line => line.trim().replace(BULLET_PATTERN, '').trim())
    .filter(line => line !== '');
  return { ok: true, value: items };
}

/**
 * Drop the one line break that sits against each tag:
 * "<tag>\n  body\n</tag>" → "  body". Other whitespace is kept.
 */
export function stripTagNewlines(raw: string): string {
  return raw.replace(/^\r?\n/, '').replace(/\r?\n$/, '');
}

/**
 * Attribute strings are trimmed. Body and element strings keep their
 * indentation and inner blank lines, minus the newlines next to the tags.
 */
export function coerceValue(raw: string, valueType: ParamValueType, source: ParamSource = 'attribute'): CoercionResult {
  switch (valueType) {
    case 'string':
      return { ok: true, value: source === 'attribute' ? raw.trim() : stripTagNewlines(raw) };
    case 'integer':
      return coerceInteger(raw);
    case 'boolean':
      return coerceBoolean(raw);
    case 'list':
      return coerceList(raw);
  }
}
