/**
 * Positional-only parameter extraction.
 *
 * Parameter lists are read as a flat token sequence: child nodes of the
 * list plus the punctuation found in the gaps between them. This does not
 * depend on which punctuation the grammar keeps as nodes, and treats a `/`
 * the parser recovered from as a marker as well.
 */

import type { SyntaxNode } from "@lezer/common";
import { MalformedConstruct, locate } from "../errors";
import { childNodes, nextLineStart, lineStart } from "../parser/python";
import type { TextRange } from "../parser/python";
import type { ScopeKind } from "./context";

export type ParamTokenKind = "name" | "punct" | "node" | "comment";

export type ParamToken = {
  kind: ParamTokenKind;
  text: string;
  from: number;
  to: number;
};

export type ParamName = {
  name: string;
  from: number;
  to: number;
};

export type Extraction = {
  target: "function" | "lambda";
  /** Positional-only parameter names in declaration order */
  names: ParamName[];
  /** The `/` token */
  marker: TextRange;
  /** Text deleted to remove the marker */
  span: TextRange;
  /** Kind of scope the signature is declared in */
  scope: ScopeKind;
};

const PUNCTUATION = new Set(["(", ")", ",", "/", "*", "**", ":", "="]);
const IDENTIFIER = /[\p{L}_][\p{L}\p{N}_]*/uy;

/**
 * Tokenize the range [from, to) given the child nodes that lie inside it.
 */
export function tokenizeParams(
  source: string,
  from: number,
  to: number,
  children: readonly SyntaxNode[]
): ParamToken[] {
  const tokens: ParamToken[] = [];
  let pos = from;
  for (const child of children) {
    if (child.from < pos) continue;
    scanGap(source, pos, child.from, tokens);
    const token = classify(source, child);
    if (token) tokens.push(token);
    pos = Math.max(pos, child.to);
  }
  scanGap(source, pos, to, tokens);
  return tokens;
}

function classify(source: string, node: SyntaxNode): ParamToken | null {
  const text = source.slice(node.from, node.to);
  const trimmed = text.trim();
  if (node.name === "Comment") {
    return { kind: "comment", text, from: node.from, to: node.to };
  }
  if (node.type.isError) {
    if (trimmed === "") return null;
    if (!PUNCTUATION.has(trimmed)) {
      return { kind: "node", text, from: node.from, to: node.to };
    }
    const offset = text.indexOf(trimmed);
    return { kind: "punct", text: trimmed, from: node.from + offset, to: node.from + offset + trimmed.length };
  }
  if (node.name === "VariableName") {
    return { kind: "name", text, from: node.from, to: node.to };
  }
  if (PUNCTUATION.has(text)) {
    return { kind: "punct", text, from: node.from, to: node.to };
  }
  return { kind: "node", text, from: node.from, to: node.to };
}

function scanGap(source: string, from: number, to: number, tokens: ParamToken[]): void {
  let i = from;
  while (i < to) {
    const ch = source[i];
    if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f" || ch === "\\") {
      i++;
    } else if (ch === "#") {
      let end = i;
      while (end < to && source[end] !== "\n" && source[end] !== "\r") end++;
      tokens.push({ kind: "comment", text: source.slice(i, end), from: i, to: end });
      i = end;
    } else if (ch === "*" && source[i + 1] === "*" && i + 1 < to) {
      tokens.push({ kind: "punct", text: "**", from: i, to: i + 2 });
      i += 2;
    } else if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: "punct", text: ch, from: i, to: i + 1 });
      i++;
    } else {
      IDENTIFIER.lastIndex = i;
      const match = IDENTIFIER.exec(source);
      if (match && i + match[0].length <= to) {
        tokens.push({ kind: "name", text: match[0], from: i, to: i + match[0].length });
        i += match[0].length;
      } else {
        tokens.push({ kind: "node", text: ch, from: i, to: i + 1 });
        i++;
      }
    }
  }
}

function isPunct(token: ParamToken | undefined, text: string): boolean {
  return token !== undefined && token.kind === "punct" && token.text === text;
}

/**
 * Find the positional-only marker in a token sequence and build the
 * extraction. Returns null when there is no marker.
 */
export function extractFromTokens(
  source: string,
  tokens: readonly ParamToken[],
  target: "function" | "lambda",
  scope: ScopeKind,
  filename?: string
): Extraction | null {
  const significant = tokens.filter((t) => t.kind !== "comment");

  // Split into comma-separated groups; each group's head decides what it is
  const groups: ParamToken[][] = [[]];
  for (const token of significant) {
    if (isPunct(token, ",")) {
      groups.push([]);
    } else {
      groups[groups.length - 1].push(token);
    }
  }

  const names: ParamName[] = [];
  let marker: ParamToken | undefined;
  let starred: ParamToken | undefined;
  for (const group of groups) {
    const head = group[0];
    if (head === undefined) continue;
    if (isPunct(head, "/")) {
      if (marker) {
        throw new MalformedConstruct(
          "duplicate positional-only marker",
          filename,
          locate(source, head.from, head.to)
        );
      }
      marker = head;
    } else if (isPunct(head, "*") || isPunct(head, "**")) {
      starred ??= head;
    } else if (head.kind === "name" && !marker) {
      names.push({ name: head.text, from: head.from, to: head.to });
    }
  }

  if (!marker) return null;

  if (starred && starred.from < marker.from) {
    throw new MalformedConstruct(
      `positional-only marker after ${JSON.stringify(starred.text)}`,
      filename,
      locate(source, marker.from, marker.to)
    );
  }
  if (names.length === 0) {
    throw new MalformedConstruct(
      "positional-only marker without preceding parameters",
      filename,
      locate(source, marker.from, marker.to)
    );
  }

  const index = tokens.indexOf(marker);
  return {
    target,
    names,
    marker: { from: marker.from, to: marker.to },
    span: markerSpan(source, tokens, index),
    scope,
  };
}

/**
 * The range to delete so that the remaining list keeps its separators.
 */
export function markerSpan(source: string, tokens: readonly ParamToken[], index: number): TextRange {
  const marker = tokens[index];
  const next = tokens[index + 1];
  const prev = tokens[index - 1];

  if (isPunct(next, ",")) {
    const line = wholeLine(source, marker.from, next.to);
    if (line) return line;
    let probe = next.to;
    while (probe < source.length && (source[probe] === " " || source[probe] === "\t")) probe++;
    if (probe < source.length && !"\r\n#\\".includes(source[probe])) {
      return { from: marker.from, to: probe };
    }
    // The comma ends its line: take the space after the previous comma too
    if (isPunct(prev, ",") && /^[ \t]*$/.test(source.slice(prev.to, marker.from))) {
      return { from: prev.to, to: next.to };
    }
    return { from: marker.from, to: next.to };
  }

  const line = wholeLine(source, marker.from, marker.to);
  if (line) return line;
  if (isPunct(prev, ",") && /^[ \t]*$/.test(source.slice(prev.to, marker.from))) {
    return { from: prev.from, to: marker.to };
  }
  return { from: marker.from, to: marker.to };
}

/**
 * The full line holding [from, to), line break included, when nothing else
 * is on it.
 */
function wholeLine(source: string, from: number, to: number): TextRange | null {
  const start = lineStart(source, from);
  if (!/^[ \t]*$/.test(source.slice(start, from))) return null;
  const end = nextLineStart(source, to);
  if (end === -1) return null;
  if (!/^[ \t]*(\r\n|\r|\n)$/.test(source.slice(to, end))) return null;
  return { from: start, to: end };
}

// ============================================
// Signatures
// ============================================

/**
 * Extract from a function definition's ParamList node.
 */
export function extractFunction(
  paramList: SyntaxNode,
  source: string,
  scope: ScopeKind,
  filename?: string
): Extraction | null {
  const tokens = tokenizeParams(source, paramList.from, paramList.to, childNodes(paramList));
  const first = tokens.findIndex((t) => t.kind !== "comment");
  let last = tokens.length - 1;
  while (last >= 0 && tokens[last].kind === "comment") last--;
  const inner = tokens.filter(
    (t, i) => !((i === first && isPunct(t, "(")) || (i === last && isPunct(t, ")")))
  );
  return extractFromTokens(source, inner, "function", scope, filename);
}

/**
 * Extract from a LambdaExpression node. The parameters sit between the
 * `lambda` keyword and the `:` before the body, either directly or wrapped
 * in a ParamList node.
 */
export function extractLambda(
  lambda: SyntaxNode,
  source: string,
  scope: ScopeKind,
  filename?: string
): Extraction | null {
  const children = childNodes(lambda).filter((c) => c.name !== "Comment");
  const keyword = children[0];
  const body = children[children.length - 1];
  if (keyword === undefined || body === undefined || keyword === body) return null;

  const region: SyntaxNode[] = [];
  for (const child of children.slice(1, -1)) {
    if (child.name === "ParamList") {
      region.push(...childNodes(child));
    } else {
      region.push(child);
    }
  }

  const tokens = tokenizeParams(source, keyword.to, body.from, region);
  const colon = tokens.findIndex((t) => isPunct(t, ":"));
  const params = colon === -1 ? tokens : tokens.slice(0, colon);
  return extractFromTokens(source, params, "lambda", scope, filename);
}
