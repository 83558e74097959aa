/**
 * Python parser module.
 *
 * Uses @lezer/python. Node offsets index the original string, so every
 * piece of text the converter keeps is sliced straight from the source.
 */

import { parser } from "@lezer/python";
import type { SyntaxNode, Tree } from "@lezer/common";
import { ParseFailure, locate } from "../errors";

export type TextRange = {
  from: number;
  to: number;
};

/**
 * Parse Python source. Syntax errors appear as error nodes in the tree.
 */
export function parsePython(source: string): Tree {
  return parser.parse(source);
}

/**
 * Ranges of all error nodes in the tree.
 */
export function syntaxErrors(tree: Tree): TextRange[] {
  const errors: TextRange[] = [];
  tree.iterate({
    enter(node) {
      if (node.type.isError) {
        errors.push({ from: node.from, to: node.to });
      }
    },
  });
  return errors;
}

/**
 * Throw a ParseFailure for the first error, with the rest as notes.
 */
export function assertParsed(
  source: string,
  errors: readonly TextRange[],
  filename: string,
  version: string
): void {
  if (errors.length === 0) return;
  const [first, ...rest] = errors;
  const failure = new ParseFailure(
    `invalid syntax (Python ${version}) near ${describe(source, first)}`,
    filename,
    locate(source, first.from, first.to)
  );
  for (const error of rest) {
    failure.addNote(`invalid syntax near ${describe(source, error)}`, locate(source, error.from, error.to));
  }
  throw failure;
}

function describe(source: string, range: TextRange): string {
  const text = source.slice(range.from, range.to);
  if (text !== "") return JSON.stringify(text.length > 40 ? text.slice(0, 40) + "..." : text);
  const next = source.slice(range.from, range.from + 20).split(/\r?\n|\r/)[0];
  return next === "" ? "end of line" : JSON.stringify(next);
}

/**
 * Get text content of a node
 */
export function getText(node: TextRange, source: string): string {
  return source.slice(node.from, node.to);
}

/**
 * All direct children of a node, in source order.
 */
export function childNodes(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    children.push(child);
  }
  return children;
}

/**
 * Offset of the start of the line containing `offset`.
 */
export function lineStart(source: string, offset: number): number {
  let i = offset;
  while (i > 0 && source[i - 1] !== "\n" && source[i - 1] !== "\r") i--;
  return i;
}

/**
 * Offset just past the line break ending the line that contains `offset`,
 * or -1 on the last line.
 */
export function nextLineStart(source: string, offset: number): number {
  for (let i = offset; i < source.length; i++) {
    if (source[i] === "\n") return i + 1;
    if (source[i] === "\r") return source[i + 1] === "\n" ? i + 2 : i + 1;
  }
  return -1;
}
