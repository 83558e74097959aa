/**
 * Conversion engine.
 *
 * Walks the syntax tree, extracts positional-only markers from function and
 * lambda signatures, and rewrites the source through a single edit pass:
 *
 *   def f(a, b, /, c): ...      @decorator('a', 'b')
 *                          →    def f(a, b, c): ...
 *
 *   lambda a, /, b: a       →   decorator('a')(lambda a, b: a)
 */

import type { TreeCursor } from "@lezer/common";
import { resolveOptions } from "../config/options";
import type { ConvertOptions } from "../config/options";
import { InternalConsistencyFault, locate } from "../errors";
import { assertVersion } from "../parser/features";
import { assertParsed, getText, lineStart, parsePython, syntaxErrors } from "../parser/python";
import type { TextRange } from "../parser/python";
import { ScopeStack } from "./context";
import { extractFunction, extractLambda } from "./params";
import type { Extraction } from "./params";
import { renderDecoratorDefinition, renderFunction, renderLambda } from "./render";
import type { RenderContext } from "./render";
import { EditSet } from "./rewriter";
import type { DefinitionInsertion, Edit, EditInput } from "./rewriter";
import { readDelimiter } from "./string-context";

export type ConversionState = "parsed" | "scanning" | "unchanged" | "rewriting" | "assembled" | "failed";

const TRANSITIONS: Record<ConversionState, readonly ConversionState[]> = {
  parsed: ["scanning"],
  scanning: ["unchanged", "rewriting"],
  rewriting: ["assembled"],
  unchanged: [],
  assembled: [],
  failed: [],
};

export type ConversionResult = {
  text: string;
  state: "unchanged" | "assembled";
  /** Edits in application order, without the definition block */
  edits: readonly Edit[];
  /** The decorator definition insertion, when one was made */
  definition?: DefinitionInsertion;
  options: Readonly<ConvertOptions>;
};

/**
 * Convert Python source, returning the rewritten text.
 */
export function convert(source: string, options: Partial<ConvertOptions> = {}): string {
  return convertSource(source, options).text;
}

/**
 * Convert Python source, returning the text together with the edits made.
 */
export function convertSource(source: string, options: Partial<ConvertOptions> = {}): ConversionResult {
  const resolved = resolveOptions(options, source);
  return new Converter(source, resolved).run();
}

class Converter {
  private state: ConversionState = "parsed";
  private readonly scopes: ScopeStack;
  private readonly edits: EditSet;
  private readonly extractions: Extraction[] = [];
  private definitionAt: number | undefined;

  constructor(
    private readonly source: string,
    private readonly options: Readonly<ConvertOptions>
  ) {
    this.scopes = new ScopeStack(options.filename);
    this.edits = new EditSet(options.filename);
  }

  run(): ConversionResult {
    try {
      return this.execute();
    } catch (error) {
      this.state = "failed";
      throw error;
    }
  }

  private execute(): ConversionResult {
    const { source, options } = this;
    const tree = parsePython(source);

    this.transition("scanning");
    const cursor = tree.cursor();
    this.visitScript(cursor);
    if (this.scopes.depth !== 0) {
      throw new InternalConsistencyFault(`scope stack not empty after traversal (${this.scopes.depth})`, options.filename);
    }

    // A marker the grammar only recovered from is not a syntax error here
    const errors = syntaxErrors(tree).filter((error) => !this.withinMarker(error));
    assertParsed(source, errors, options.filename, options.pythonVersion);
    assertVersion(source, tree, options.filename, options.pythonVersion);

    if (this.edits.size === 0) {
      this.transition("unchanged");
      return { text: source, state: "unchanged", edits: [], options };
    }

    this.transition("rewriting");
    const definition = this.definitionInsertion();
    const text = this.edits.apply(source, definition);
    if (options.lint) {
      verifyOutput(text, options);
    }
    this.transition("assembled");
    return { text, state: "assembled", edits: this.edits.sorted(source), definition, options };
  }

  private transition(next: ConversionState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new InternalConsistencyFault(`invalid conversion state change ${this.state} -> ${next}`, this.options.filename);
    }
    this.state = next;
  }

  private withinMarker(range: TextRange): boolean {
    return this.extractions.some((e) => range.from >= e.span.from && range.to <= e.span.to);
  }

  // ============================================
  // Traversal
  // ============================================

  private visitScript(cursor: TreeCursor): void {
    const module = this.scopes.enter("module");
    if (cursor.firstChild()) {
      do {
        const before = this.extractions.length;
        this.visit(cursor);
        if (this.extractions.length > before && !this.options.dismiss && this.scopes.scheduleDefinition()) {
          this.definitionAt = cursor.from;
        }
      } while (cursor.nextSibling());
      cursor.parent();
    }
    this.scopes.exit(module);
  }

  private visit(cursor: TreeCursor): void {
    switch (cursor.name) {
      case "ClassDefinition":
        return this.visitClass(cursor);
      case "FunctionDefinition":
        return this.visitFunction(cursor);
      case "LambdaExpression":
        return this.visitLambda(cursor);
      case "FormatString":
        return this.visitFormatString(cursor);
      default:
        return this.visitChildren(cursor);
    }
  }

  private visitChildren(cursor: TreeCursor): void {
    if (cursor.firstChild()) {
      do {
        this.visit(cursor);
      } while (cursor.nextSibling());
      cursor.parent();
    }
  }

  private visitClass(cursor: TreeCursor): void {
    const nameNode = cursor.node.getChild("VariableName");
    const scope = this.scopes.enter("class", nameNode ? getText(nameNode, this.source) : undefined);
    this.visitChildren(cursor);
    this.scopes.exit(scope);
  }

  private visitFunction(cursor: TreeCursor): void {
    const node = cursor.node;
    const params = node.getChild("ParamList");
    const extraction = params
      ? extractFunction(params, this.source, this.scopes.current().kind, this.options.filename)
      : null;
    const ctx = this.renderContext("function");

    const nameNode = node.getChild("VariableName");
    const scope = this.scopes.enter("function", nameNode ? getText(nameNode, this.source) : undefined);
    this.visitChildren(cursor);
    this.scopes.exit(scope);

    if (extraction) {
      this.record(extraction, renderFunction(extraction, node, ctx));
    }
  }

  private visitLambda(cursor: TreeCursor): void {
    const node = cursor.node;
    const extraction = extractLambda(node, this.source, this.scopes.current().kind, this.options.filename);
    const ctx = this.renderContext("lambda");

    const scope = this.scopes.enter("lambda");
    this.visitChildren(cursor);
    this.scopes.exit(scope);

    // Recorded after the body so that nested closing parentheses come first
    if (extraction) {
      this.record(extraction, renderLambda(extraction, node, ctx));
    }
  }

  private visitFormatString(cursor: TreeCursor): void {
    const delimiter = readDelimiter(this.source, cursor.from);
    const scope = this.scopes.enter("string", undefined, delimiter ?? undefined);
    this.visitChildren(cursor);
    this.scopes.exit(scope);
  }

  private renderContext(target: "function" | "lambda"): RenderContext {
    return {
      source: this.source,
      options: this.options,
      mangleClass: this.scopes.mangleClassFor(target, this.options.mangling),
      delimiters: this.scopes.stringDelimiters(),
    };
  }

  private record(extraction: Extraction, edits: EditInput[]): void {
    this.extractions.push(extraction);
    this.edits.addAll(edits);
  }

  // ============================================
  // Decorator definition placement
  // ============================================

  private definitionInsertion(): DefinitionInsertion | undefined {
    if (this.definitionAt === undefined) return undefined;
    const { source, options } = this;
    const block = renderDecoratorDefinition(options);
    const offset = lineStart(source, this.definitionAt);

    // Already defined above its first use, e.g. by an earlier run
    if (source.slice(0, offset).includes(block)) return undefined;

    let before = "";
    let after = "";
    if (options.pep8) {
      if (offset > 0) {
        before = options.linesep.repeat(Math.max(0, 2 - blankLinesBefore(source, offset)));
      }
      after = options.linesep.repeat(2);
    }
    return { offset, text: before + block + after };
  }
}

/**
 * Number of whitespace-only lines directly above the line starting at
 * `offset`.
 */
export function blankLinesBefore(source: string, offset: number): number {
  const lines = source.slice(0, offset).split(/\r\n|\r|\n/);
  lines.pop();
  let count = 0;
  for (let i = lines.length - 1; i >= 0 && lines[i].trim() === ""; i--) {
    count++;
  }
  return count;
}

/**
 * Check converted text: it must parse and hold no positional-only marker.
 */
export function verifyOutput(text: string, options: Readonly<ConvertOptions>): void {
  const errors = syntaxErrors(parsePython(text));
  if (errors.length > 0) {
    const first = errors[0];
    throw new InternalConsistencyFault(
      "converted source does not parse",
      options.filename,
      locate(text, first.from, first.to)
    );
  }
  const rescan = new Converter(text, { ...options, lint: false }).run();
  if (rescan.state !== "unchanged") {
    const first = rescan.edits[0];
    throw new InternalConsistencyFault(
      "converted source still contains a positional-only marker",
      options.filename,
      first ? locate(text, first.from, first.to) : undefined
    );
  }
}
