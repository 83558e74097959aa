/**
 * Decorator rendering.
 *
 * Turns an extraction into edits: the marker deletion, plus either a
 * decorator line above a function or a call wrapped around a lambda.
 */

import { CodeBuilder } from "../codegen/code-builder";
import type { ConvertOptions } from "../config/options";
import { MalformedConstruct, locate } from "../errors";
import { lineStart } from "../parser/python";
import type { TextRange } from "../parser/python";
import { mangle } from "./context";
import type { Extraction } from "./params";
import type { EditInput } from "./rewriter";
import { chooseQuote, quoteName } from "./string-context";
import type { QuoteChar, StringDelimiter } from "./string-context";

export type RenderOptions = Pick<ConvertOptions, "decorator" | "indentation" | "linesep" | "dismiss" | "filename">;

export type RenderContext = {
  source: string;
  options: RenderOptions;
  /** Class used to mangle private names, if any */
  mangleClass?: string;
  /** Enclosing format string delimiters, outermost first */
  delimiters: readonly StringDelimiter[];
};

/**
 * The decorator's own definition, ending with a line separator.
 */
export function renderDecoratorDefinition(
  options: Pick<ConvertOptions, "decorator" | "indentation" | "linesep">
): string {
  const builder = new CodeBuilder(options.indentation, options.linesep);
  builder
    .writeLine(`def ${options.decorator}(*posonly):`)
    .indent()
    .writeLine('"""Positional-only parameters runtime checker.')
    .writeLine()
    .writeLine("Args:")
    .indent()
    .writeLine("*posonly: names of the positional-only parameters")
    .dedent()
    .writeLine()
    .writeLine('"""')
    .writeLine("import functools")
    .writeLine()
    .writeLine("def caller(func):")
    .indent()
    .writeLine("@functools.wraps(func)")
    .writeLine("def wrapper(*args, **kwargs):")
    .indent()
    .writeLine("names = set(posonly).intersection(kwargs)")
    .writeLine("if names:")
    .indent()
    .writeLine("raise TypeError(")
    .indent()
    .writeLine("'%s() got some positional-only arguments passed as keyword arguments: %r'")
    .writeLine("% (func.__name__, ', '.join(sorted(names))))")
    .dedent()
    .dedent()
    .writeLine("return func(*args, **kwargs)")
    .dedent()
    .writeLine("return wrapper")
    .dedent()
    .writeLine("return caller");
  return builder.build();
}

/**
 * `<decorator>('a', 'b')` for the given names.
 */
export function renderDecoratorCall(
  decorator: string,
  names: readonly string[],
  quote: QuoteChar = "'"
): string {
  return `${decorator}(${names.map((name) => quoteName(name, quote)).join(", ")})`;
}

function emittedNames(extraction: Extraction, ctx: RenderContext): string[] {
  return extraction.names.map((param) => mangle(param.name, ctx.mangleClass));
}

/**
 * Edits for a function definition. `definition` is the FunctionDefinition
 * node's range.
 */
export function renderFunction(
  extraction: Extraction,
  definition: TextRange,
  ctx: RenderContext
): EditInput[] {
  const { source, options } = ctx;
  const edits: EditInput[] = [{ ...extraction.span, text: "", origin: "marker" }];
  if (options.dismiss) return edits;

  if (ctx.delimiters.length > 0) {
    throw new MalformedConstruct(
      "function definition inside a format string",
      options.filename,
      locate(source, definition.from, definition.to)
    );
  }

  const start = lineStart(source, definition.from);
  const prefix = source.slice(start, definition.from);
  const indent = /^[ \t]*/.exec(prefix)?.[0] ?? "";
  const rest = prefix.slice(indent.length);
  if (rest !== "" && !/^async[ \t]+$/.test(rest)) {
    throw new MalformedConstruct(
      "function definition does not start its line",
      options.filename,
      locate(source, definition.from, definition.to)
    );
  }

  const call = renderDecoratorCall(options.decorator, emittedNames(extraction, ctx));
  edits.push({
    from: start,
    to: start,
    text: `${indent}@${call}${options.linesep}`,
    origin: "decorator",
  });
  return edits;
}

/**
 * Edits for a lambda expression. `lambda` is the LambdaExpression node's
 * range; its text is kept as is between the inserted call and parenthesis.
 */
export function renderLambda(
  extraction: Extraction,
  lambda: TextRange,
  ctx: RenderContext
): EditInput[] {
  const { source, options } = ctx;
  const edits: EditInput[] = [{ ...extraction.span, text: "", origin: "marker" }];
  if (options.dismiss) return edits;

  const quote = chooseQuote(ctx.delimiters);
  if (quote === null) {
    throw new MalformedConstruct(
      "no quote character is free inside the enclosing format strings",
      options.filename,
      locate(source, lambda.from, lambda.to)
    );
  }

  const call = renderDecoratorCall(options.decorator, emittedNames(extraction, ctx), quote);
  edits.unshift({ from: lambda.from, to: lambda.from, text: `${call}(`, origin: "wrap-open" });
  edits.push({ from: lambda.to, to: lambda.to, text: ")", origin: "wrap-close" });
  return edits;
}
