/**
 * Directive Parser
 *
 * Finds tag-delimited directives embedded in free-form model output:
 *
 *   Let me create the file.
 *   <create-file file_path="src/app.ts">
 *   export const app = 1;
 *   </create-file>
 *
 * Supported: quoted (double/single), bare and valueless attributes,
 * multi-line bodies, nested child elements (flattened with dotted paths),
 * self-closing tags. A malformed span becomes a RawSpanError and scanning
 * continues after its opening tag.
 *
 * Attribute values are entity-decoded. Body and child element text is
 * passed on exactly as written.
 */

import type { Invocation, InvocationChild, ParseItem, RawSpanError } from '@tagwire/directive-contracts';

export interface ParseOptions {
  /**
   * Only these tag names are treated as directives; any other markup is prose.
   * When omitted, every `<name ...>` is a directive candidate.
   */
  tags?: Iterable<string>;
}

/**
 * One scan step: the next item and where scanning resumes.
 */
export interface ScanStep {
  item: ParseItem;
  resume: number;
}

const NAME_START = /[A-Za-z]/;
const NAME_CHAR = /[A-Za-z0-9_-]/;
const ATTR_NAME_START = /[A-Za-z_:]/;
const ATTR_NAME_CHAR = /[A-Za-z0-9_:.-]/;
const BARE_VALUE_CHAR = /[^\s"'=<>`]/;
const WHITESPACE = /\s/;

interface OpenTag {
  name: string;
  attributes: Record<string, string>;
  selfClosing: boolean;
  /** Index just past ">" */
  end: number;
}

type OpenTagResult =
  | { ok: true; tag: OpenTag }
  | { ok: false; code: 'UNTERMINATED_OPEN_TAG' | 'MALFORMED_ATTRIBUTE'; reason: string; end: number };

// ── Character helpers ──────────────────────────────────────────────────

function readWhile(text: string, from: number, pattern: RegExp): number {
  let i = from;
  while (i < text.length && pattern.test(text.charAt(i))) {
    i++;
  }
  return i;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(codePoint: number, match: string): string {
  // Out of range or a lone surrogate: keep the entity as written
  if (codePoint > MAX_CODE_POINT || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    return match;
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Decode XML entities in an attribute value. Body and child element text is
 * kept verbatim so that code can carry "&lt;" or "&amp;" literally.
 */
export function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g, (match, entity: string) => {
    if (entity.startsWith('#x')) {
      return fromCodePoint(Number.parseInt(entity.slice(2), 16), match);
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(Number.parseInt(entity.slice(1), 10), match);
    }
    return NAMED_ENTITIES[entity] ?? match;
  });
}

// ── Tag-level parsing ──────────────────────────────────────────────────

function unterminated(name: string, text: string): OpenTagResult {
  return {
    ok: false,
    code: 'UNTERMINATED_OPEN_TAG',
    reason: `Opening tag <${name}> is not terminated`,
    end: text.length,
  };
}

function malformed(text: string, at: number, reason: string): OpenTagResult {
  const close = text.indexOf('>', at);
  if (close === -1) {
    return { ok: false, code: 'UNTERMINATED_OPEN_TAG', reason, end: text.length };
  }
  return { ok: false, code: 'MALFORMED_ATTRIBUTE', reason, end: close + 1 };
}

/**
 * Parse an opening tag starting at `offset` (which points at "<").
 */
function parseOpenTag(text: string, offset: number): OpenTagResult {
  const nameEnd = readWhile(text, offset + 1, NAME_CHAR);
  const name = text.slice(offset + 1, nameEnd);
  const attributes: Record<string, string> = {};
  let i = nameEnd;

  for (;;) {
    i = readWhile(text, i, WHITESPACE);
    if (i >= text.length) {
      return unterminated(name, text);
    }

    const ch = text.charAt(i);
    if (ch === '>') {
      return { ok: true, tag: { name, attributes, selfClosing: false, end: i + 1 } };
    }
    if (ch === '/') {
      if (i + 1 >= text.length) {
        return unterminated(name, text);
      }
      if (text.charAt(i + 1) === '>') {
        return { ok: true, tag: { name, attributes, selfClosing: true, end: i + 2 } };
      }
      return malformed(text, i, `Unexpected "/" in <${name}>`);
    }
    if (!ATTR_NAME_START.test(ch)) {
      return malformed(text, i, `Unexpected character "${ch}" in <${name}>`);
    }

    const attrEnd = readWhile(text, i, ATTR_NAME_CHAR);
    const attrName = text.slice(i, attrEnd);
    i = readWhile(text, attrEnd, WHITESPACE);
    if (i >= text.length) {
      return unterminated(name, text);
    }
    if (text.charAt(i) !== '=') {
      attributes[attrName] = '';
      continue;
    }

    i = readWhile(text, i + 1, WHITESPACE);
    if (i >= text.length) {
      return unterminated(name, text);
    }

    const quote = text.charAt(i);
    if (quote === '"' || quote === "'") {
      const close = text.indexOf(quote, i + 1);
      if (close === -1) {
        return unterminated(name, text);
      }
      attributes[attrName] = decodeEntities(text.slice(i + 1, close));
      i = close + 1;
      if (i < text.length && !/[\s/>]/.test(text.charAt(i))) {
        return malformed(text, i, `Missing whitespace after attribute "${attrName}" in <${name}>`);
      }
      continue;
    }

    let valueEnd = readWhile(text, i, BARE_VALUE_CHAR);
    if (valueEnd === i) {
      return malformed(text, i, `Attribute "${attrName}" in <${name}> has no value`);
    }
    // <tag a=b/> : the slash belongs to the tag
    if (text.charAt(valueEnd) === '>' && text.charAt(valueEnd - 1) === '/' && valueEnd - 1 > i) {
      valueEnd -= 1;
    }
    attributes[attrName] = decodeEntities(text.slice(i, valueEnd));
    i = valueEnd;
  }
}

/**
 * Find the closing tag for `name`, honouring nested same-name elements.
 */
function findClosingTag(
  text: string,
  name: string,
  from: number,
): { bodyEnd: number; end: number } | undefined {
  const pattern = new RegExp(`</${name}\\s*>|<${name}(?=[\\s/>])`, 'g');
  pattern.lastIndex = from;
  let depth = 0;

  let match = pattern.exec(text);
  while (match) {
    if (match[0].startsWith('</')) {
      if (depth === 0) {
        return { bodyEnd: match.index, end: match.index + match[0].length };
      }
      depth--;
    } else {
      const nested = parseOpenTag(text, match.index);
      if (nested.ok) {
        if (!nested.tag.selfClosing) {
          depth++;
        }
        pattern.lastIndex = nested.tag.end;
      }
    }
    match = pattern.exec(text);
  }
  return undefined;
}

/**
 * Collect child elements of a body in document order. Malformed children are skipped.
 */
function collectChildren(body: string, prefix: string, out: InvocationChild[]): void {
  let i = 0;
  while (i < body.length) {
    const lt = body.indexOf('<', i);
    if (lt === -1) {
      return;
    }
    if (!NAME_START.test(body.charAt(lt + 1))) {
      i = lt + 1;
      continue;
    }

    const open = parseOpenTag(body, lt);
    if (!open.ok) {
      i = lt + 1;
      continue;
    }

    const path = `${prefix}${open.tag.name}`;
    if (open.tag.selfClosing) {
      out.push({ name: path, value: '' });
      i = open.tag.end;
      continue;
    }

    const close = findClosingTag(body, open.tag.name, open.tag.end);
    if (!close) {
      i = open.tag.end;
      continue;
    }

    const inner = body.slice(open.tag.end, close.bodyEnd);
    out.push({ name: path, value: inner });
    collectChildren(inner, `${path}.`, out);
    i = close.end;
  }
}

function readDirective(text: string, offset: number): ScanStep {
  const open = parseOpenTag(text, offset);
  const nameEnd = readWhile(text, offset + 1, NAME_CHAR);
  const tag = text.slice(offset + 1, nameEnd);

  if (!open.ok) {
    const error: RawSpanError = {
      kind: 'parse-error',
      code: open.code,
      tag,
      offset,
      end: open.end,
      reason: open.reason,
    };
    return { item: error, resume: open.code === 'UNTERMINATED_OPEN_TAG' ? nameEnd : open.end };
  }

  if (open.tag.selfClosing) {
    const invocation: Invocation = {
      kind: 'invocation',
      tag,
      attributes: open.tag.attributes,
      bodyText: '',
      children: [],
      offset,
      end: open.tag.end,
    };
    return { item: invocation, resume: open.tag.end };
  }

  const close = findClosingTag(text, tag, open.tag.end);
  if (!close) {
    const error: RawSpanError = {
      kind: 'parse-error',
      code: 'MISSING_CLOSING_TAG',
      tag,
      offset,
      end: open.tag.end,
      reason: `Missing closing tag </${tag}>`,
    };
    return { item: error, resume: open.tag.end };
  }

  const bodyText = text.slice(open.tag.end, close.bodyEnd);
  const children: InvocationChild[] = [];
  collectChildren(bodyText, '', children);

  const invocation: Invocation = {
    kind: 'invocation',
    tag,
    attributes: open.tag.attributes,
    bodyText,
    children,
    offset,
    end: close.end,
  };
  return { item: invocation, resume: close.end };
}

/**
 * Scan `text` from `from` for the next directive span.
 * Returns undefined when the rest of the text is prose.
 */
export function scanNext(text: string, from: number, filter?: ReadonlySet<string>): ScanStep | undefined {
  let i = from;
  for (;;) {
    const lt = text.indexOf('<', i);
    if (lt === -1) {
      return undefined;
    }
    if (!NAME_START.test(text.charAt(lt + 1))) {
      i = lt + 1;
      continue;
    }

    const nameEnd = readWhile(text, lt + 1, NAME_CHAR);
    const name = text.slice(lt + 1, nameEnd);

    if (filter && !filter.has(name)) {
      // A name cut off by the end of the text may still grow into a known tag
      if (nameEnd >= text.length && [...filter].some(t => t.startsWith(name))) {
        const error: RawSpanError = {
          kind: 'parse-error',
          code: 'UNTERMINATED_OPEN_TAG',
          tag: name,
          offset: lt,
          end: text.length,
          reason: `Opening tag <${name}> is not terminated`,
        };
        return { item: error, resume: nameEnd };
      }
      i = nameEnd;
      continue;
    }

    return readDirective(text, lt);
  }
}

/**
 * Lazily parse every directive span in `text`, in input order.
 */
export function* parseDirectives(text: string, options: ParseOptions = {}): Generator<ParseItem, void, undefined> {
  const filter = options.tags ? new Set(options.tags) : undefined;
  let position = 0;

  for (;;) {
    const step = scanNext(text, position, filter);
    if (!step) {
      return;
    }
    yield step.item;
    position = step.resume;
  }
}

/**
 * Parser bound to a fixed set of options
 */
export class DirectiveParser {
  private readonly options: ParseOptions;

  constructor(options: ParseOptions = {}) {
    this.options = options.tags ? { tags: [...options.tags] } : {};
  }

  parse(text: string): Generator<ParseItem, void, undefined> {
    return parseDirectives(text, this.options);
  }
}
