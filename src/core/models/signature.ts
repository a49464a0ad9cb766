/**
 * Signature Rendering
 *
 * Signatures are pure functions of (identifier, parameters, return type).
 * Annotation text is re-tokenized and printed with canonical spacing so that
 * `Dict[str,int]`, `Dict[ str, int ]` and a wrapped multi-line annotation all
 * render as `Dict[str, int]`.
 *
 * @module
 */

// =============================================================================
// Tokenizer
// =============================================================================

const TOKEN_PATTERN = new RegExp(
  [
    String.raw`(?<comment>#[^\n]*)`,
    String.raw`(?<continuation>\\\r?\n)`,
    String.raw`(?<space>\s+)`,
    String.raw`(?<string>(?:[rRbBuUfF]{1,2})?(?:'''[\s\S]*?'''|"""[\s\S]*?"""|'(?:[^'\\\n]|\\.)*'|"(?:[^"\\\n]|\\.)*"))`,
    String.raw`(?<number>\d[\d_]*(?:\.\d[\d_]*)?(?:[eE][+-]?\d+)?[jJ]?)`,
    String.raw`(?<name>[\p{L}_][\p{L}\p{N}_]*)`,
    String.raw`(?<op>\.\.\.|\*\*|->|==|!=|<=|>=|//|:=|<<|>>|\S)`,
  ].join("|"),
  "gu"
);

/**
 * Splits annotation text into tokens, dropping whitespace, comments and
 * line continuations. String literals come back with canonical quoting.
 */
export function tokenizeAnnotation(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const groups = match.groups ?? {};
    if (groups.comment !== undefined || groups.continuation !== undefined || groups.space !== undefined) {
      continue;
    }
    if (groups.string !== undefined) {
      tokens.push(canonicalStringLiteral(groups.string));
      continue;
    }
    tokens.push(match[0]);
  }
  return tokens;
}

/**
 * Plain single-line literals are printed with single quotes, the way
 * Python's own unparser does. Anything with a prefix, escapes or an
 * embedded quote is kept as written.
 */
function canonicalStringLiteral(literal: string): string {
  const quote = literal[0];
  if (quote !== '"' || literal.startsWith('"""') || literal.length < 2) {
    return literal;
  }
  const content = literal.slice(1, -1);
  if (content.includes("'") || content.includes("\\")) {
    return literal;
  }
  return `'${content}'`;
}

// =============================================================================
// Printer
// =============================================================================

const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS = new Set([")", "]", "}"]);
const NO_SPACE_BEFORE = new Set([",", ")", "]", "}", ":"]);
const PREFIX_OPERATORS = new Set(["-", "+", "~", "*", "**"]);

function isWord(token: string): boolean {
  return /^[\p{L}\p{N}_'"]/u.test(token) || token === "...";
}

function isPrefixPosition(before: string | undefined): boolean {
  if (before === undefined) return true;
  if (OPENERS.has(before) || before === "," || before === ":") return true;
  return !isWord(before) && !CLOSERS.has(before);
}

function separator(before: string | undefined, prev: string | undefined, cur: string): string {
  if (prev === undefined) return "";
  if (NO_SPACE_BEFORE.has(cur)) return "";
  if (cur === "." || prev === ".") return "";
  if (OPENERS.has(prev)) return "";
  if (prev === "," || prev === ":") return " ";
  if (OPENERS.has(cur) && (isWord(prev) || CLOSERS.has(prev))) return "";
  if (PREFIX_OPERATORS.has(prev) && isPrefixPosition(before)) return "";
  return " ";
}

// =============================================================================
// Token Simplification
// =============================================================================

/** Opener index → matching closer index */
function matchBrackets(tokens: readonly string[]): Map<number, number> {
  const pairs = new Map<number, number>();
  const open: number[] = [];
  tokens.forEach((token, i) => {
    if (OPENERS.has(token)) {
      open.push(i);
    } else if (CLOSERS.has(token)) {
      const start = open.pop();
      if (start !== undefined) pairs.set(start, i);
    }
  });
  return pairs;
}

/**
 * Tokens directly inside a bracket pair. A nested group shows up as its
 * opening bracket only.
 */
function topLevelTokens(
  tokens: readonly string[],
  pairs: ReadonlyMap<number, number>,
  start: number,
  end: number
): string[] {
  const inner: string[] = [];
  for (let i = start + 1; i < end; i++) {
    const token = tokens[i];
    if (token === undefined) break;
    inner.push(token);
    i = pairs.get(i) ?? i;
  }
  return inner;
}

function isCallPosition(before: string | undefined): boolean {
  return before !== undefined && (isWord(before) || CLOSERS.has(before));
}

/**
 * A name, literal or nested group, optionally followed by attribute access,
 * subscripts or calls.
 */
function isSingleTerm(inner: readonly string[]): boolean {
  const [head, ...rest] = inner;
  if (head === undefined || !(isWord(head) || OPENERS.has(head))) return false;
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (token === ".") {
      const next = rest[++i];
      if (next === undefined || !isWord(next)) return false;
    } else if (token === undefined || !OPENERS.has(token)) {
      return false;
    }
  }
  return true;
}

/**
 * Drops tokens that do not change what an annotation means: a trailing
 * comma in a call, a display or a group of two or more elements, and
 * parentheses around a single term. `Tuple[int,]` keeps its comma.
 */
function simplifyTokens(input: readonly string[]): readonly string[] {
  let tokens = input;
  for (;;) {
    const pairs = matchBrackets(tokens);
    const drop = new Set<number>();

    for (const [start, end] of pairs) {
      const opener = tokens[start];
      const call = isCallPosition(tokens[start - 1]);
      const inner = topLevelTokens(tokens, pairs, start, end);
      const commas = inner.filter((token) => token === ",").length;

      const subscript = opener === "[" && call;
      const tuple = opener === "(" && !call;
      if (tokens[end - 1] === "," && (commas >= 2 || !(subscript || tuple))) {
        drop.add(end - 1);
      }
      if (tuple && commas === 0 && isSingleTerm(inner)) {
        drop.add(start);
        drop.add(end);
      }
    }

    if (drop.size === 0) return tokens;
    tokens = tokens.filter((_, i) => !drop.has(i));
  }
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Renders an annotation with canonical whitespace and without redundant
 * commas or parentheses.
 *
 * @example
 * ```typescript
 * normalizeAnnotation("Optional[ Dict[str,int] ]"); // "Optional[Dict[str, int]]"
 * normalizeAnnotation('int|"Node"');                // "int | 'Node'"
 * normalizeAnnotation("Dict[\n    str,\n    int,\n]"); // "Dict[str, int]"
 * ```
 */
export function normalizeAnnotation(text: string): string {
  const tokens = simplifyTokens(tokenizeAnnotation(text));
  let out = "";
  for (let i = 0; i < tokens.length; i++) {
    const cur = tokens[i];
    if (cur === undefined) continue;
    out += separator(tokens[i - 2], tokens[i - 1], cur) + cur;
  }
  return out;
}

// =============================================================================
// Signatures
// =============================================================================

export interface SignatureParameter {
  readonly identifier: string;
  readonly type: string | null;
}

/**
 * Renders `name: type`, or the bare name for unannotated parameters.
 */
export function formatParameter(parameter: SignatureParameter): string {
  return parameter.type === null
    ? parameter.identifier
    : `${parameter.identifier}: ${normalizeAnnotation(parameter.type)}`;
}

/**
 * Builds the annotation-free signature `identifier(p1: T1, p2) -> R`.
 */
export function buildSignature(
  identifier: string,
  parameters: readonly SignatureParameter[],
  returnType: string | null
): string {
  const params = parameters.map(formatParameter).join(", ");
  const returns = returnType === null ? "" : ` -> ${normalizeAnnotation(returnType)}`;
  return `${identifier}(${params})${returns}`;
}

/**
 * Prefixes the verbatim decorator block to a signature.
 */
export function buildFullSignature(annotations: string, signature: string): string {
  return annotations.length > 0 ? `${annotations}\n${signature}` : signature;
}
