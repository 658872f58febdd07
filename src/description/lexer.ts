/**
 * Description tokenizer.
 *
 * Splits source text into tag tokens and the literal text between them.
 * A tag token is `[name]`, `[name=attribute]` or `[/name]`, where name starts
 * with a letter and continues with letters, digits or underscores. Any `[`
 * that does not begin such a token is ordinary text, so "[1]" or "a [ b"
 * pass through untouched.
 *
 * Tag names are lowercased; attributes are kept verbatim (trimmed).
 */

import type { SourcePosition } from "./ast.js";

export interface TextToken {
  readonly kind: "text";
  readonly value: string;
  readonly start: number;
  readonly end: number;
}

export interface OpenTagToken {
  readonly kind: "open";
  readonly name: string;
  readonly attribute: string | undefined;
  readonly raw: string;
  readonly start: number;
  readonly end: number;
}

export interface CloseTagToken {
  readonly kind: "close";
  readonly name: string;
  /** Set when a closing tag carries `=…`, which is always an error. */
  readonly attribute: string | undefined;
  readonly raw: string;
  readonly start: number;
  readonly end: number;
}

export type Token = TextToken | OpenTagToken | CloseTagToken;

/**
 * Sticky tag pattern, tried at every `[`.
 *
 * Groups:
 *   1: "/" for closing tags
 *   2: tag name
 *   3: attribute (after "="), optional
 */
const TAG_RE = /\[(\/)?([A-Za-z][A-Za-z0-9_]*)(?:=([^[\]]*))?\]/y;

/**
 * Tokenize a description source.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let textStart = 0;
  let pos = source.indexOf("[");

  const flushText = (end: number): void => {
    if (end > textStart) {
      tokens.push({
        kind: "text",
        value: source.slice(textStart, end),
        start: textStart,
        end,
      });
    }
  };

  while (pos !== -1) {
    TAG_RE.lastIndex = pos;
    const match = TAG_RE.exec(source);

    if (match === null) {
      pos = source.indexOf("[", pos + 1);
      continue;
    }

    flushText(pos);

    const [raw, slash, name, attribute] = match;
    const end = pos + raw.length;
    tokens.push({
      kind: slash ? "close" : "open",
      name: name.toLowerCase(),
      attribute: attribute?.trim(),
      raw,
      start: pos,
      end,
    });

    textStart = end;
    pos = source.indexOf("[", end);
  }

  flushText(source.length);
  return tokens;
}

/**
 * Convert a character offset into a line/column position.
 */
export function locate(source: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  const limit = Math.min(offset, source.length);
  for (let i = 0; i < limit; i++) {
    if (source.charCodeAt(i) === 10 /* \n */) {
      line++;
      lineStart = i + 1;
    }
  }
  return { offset, line, column: offset - lineStart + 1 };
}
