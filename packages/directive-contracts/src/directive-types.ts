/**
 * Directive Types
 *
 * Shapes for the directive protocol: how a tool declares its parameters
 * (ToolSchema / ParamBinding), what the parser extracts from model output
 * (Invocation / RawSpanError), and what validation produces (ValidatedCall
 * or a failure).
 */

/**
 * Where a parameter lives inside a directive.
 *
 * - `content`: the directive body (path is always ".")
 * - `attribute`: an attribute on the opening tag
 * - `element`: a child element, addressed by dotted/segment path
 */
export type ParamSource = 'content' | 'attribute' | 'element';

/**
 * Target type a raw string is coerced into during validation.
 */
export type ParamValueType = 'string' | 'integer' | 'boolean' | 'list';

/**
 * Coerced argument value.
 */
export type ArgValue = string | number | boolean | string[];

/**
 * Validated, coerced arguments keyed by binding name.
 */
export type ToolArgs = Readonly<Record<string, ArgValue>>;

/**
 * Rule mapping one tool parameter to a location in the directive.
 */
export interface ParamBinding {
  /** Parameter name as seen by the capability */
  name: string;
  source: ParamSource;
  /** Attribute name, child element path ('outer.inner' or 'outer/inner'), or '.' for the body */
  path: string;
  required: boolean;
  valueType: ParamValueType;
  /** Used when an optional binding is absent */
  default?: ArgValue;
  /** Human-readable description (rendered into the directive catalog) */
  description?: string;
}

/**
 * Registered tool: a directive tag and its parameter bindings.
 */
export interface ToolSchema {
  /** Unique directive tag, e.g. 'create-file' */
  tag: string;
  description?: string;
  bindings: ParamBinding[];
  /** Example directive shown to the model */
  example?: string;
  /** Per-tool timeout; overrides configuration */
  timeoutMs?: number;
}

/**
 * Child element found inside a directive, flattened with its dotted path.
 */
export interface InvocationChild {
  name: string;
  /** Inner text, verbatim (entities are not decoded) */
  value: string;
}

/**
 * Raw parse result for one tag-delimited span, before validation.
 */
export interface Invocation {
  kind: 'invocation';
  tag: string;
  /** Entity-decoded attribute values */
  attributes: Record<string, string>;
  /** Everything between the opening and closing tag, verbatim */
  bodyText: string;
  children: InvocationChild[];
  /** Offset of '<' in the scanned text */
  offset: number;
  /** Offset just past the closing tag */
  end: number;
}

export type ParseErrorCode =
  | 'UNTERMINATED_OPEN_TAG'
  | 'MISSING_CLOSING_TAG'
  | 'MALFORMED_ATTRIBUTE';

/**
 * A span that looked like a directive but could not be parsed.
 * Scanning continues past it.
 */
export interface RawSpanError {
  kind: 'parse-error';
  code: ParseErrorCode;
  tag?: string;
  offset: number;
  end: number;
  reason: string;
}

export type ParseItem = Invocation | RawSpanError;

/**
 * Invocation whose required bindings all resolved and coerced.
 */
export interface ValidatedCall {
  kind: 'call';
  tag: string;
  args: ToolArgs;
}

export interface ValidationFailure {
  kind: 'validation-failure';
  tag: string;
  /** Binding that failed, when the failure is binding-specific */
  binding?: string;
  reason: string;
}

export interface UnknownToolFailure {
  kind: 'unknown-tool';
  tag: string;
  reason: string;
}

export type ValidationOutcome = ValidatedCall | ValidationFailure;
