import { describe, it, expect } from "vitest";
import { MalformedConstruct } from "../errors";
import type { Extraction } from "./params";
import { renderDecoratorCall, renderDecoratorDefinition, renderFunction, renderLambda } from "./render";
import type { RenderContext, RenderOptions } from "./render";

const OPTIONS: RenderOptions = {
  decorator: "dec",
  indentation: "    ",
  linesep: "\n",
  dismiss: false,
  filename: "render.py",
};

function extraction(names: string[], span: { from: number; to: number }, target: "function" | "lambda"): Extraction {
  return {
    target,
    names: names.map((name) => ({ name, from: 0, to: 0 })),
    marker: span,
    span,
    scope: "module",
  };
}

function context(source: string, overrides: Partial<RenderContext> = {}): RenderContext {
  return { source, options: OPTIONS, delimiters: [], ...overrides };
}

describe("renderDecoratorCall", () => {
  it("quotes names in order", () => {
    expect(renderDecoratorCall("dec", ["a", "b"])).toBe("dec('a', 'b')");
    expect(renderDecoratorCall("dec", ["a"], '"')).toBe('dec("a")');
  });
});

describe("renderDecoratorDefinition", () => {
  it("renders the runtime checker", () => {
    expect(renderDecoratorDefinition(OPTIONS)).toBe(
      [
        "def dec(*posonly):",
        '    """Positional-only parameters runtime checker.',
        "",
        "    Args:",
        "        *posonly: names of the positional-only parameters",
        "",
        '    """',
        "    import functools",
        "",
        "    def caller(func):",
        "        @functools.wraps(func)",
        "        def wrapper(*args, **kwargs):",
        "            names = set(posonly).intersection(kwargs)",
        "            if names:",
        "                raise TypeError(",
        "                    '%s() got some positional-only arguments passed as keyword arguments: %r'",
        "                    % (func.__name__, ', '.join(sorted(names))))",
        "            return func(*args, **kwargs)",
        "        return wrapper",
        "    return caller",
        "",
      ].join("\n")
    );
  });

  it("uses the given indentation and line separator", () => {
    const text = renderDecoratorDefinition({ decorator: "dec", indentation: "\t", linesep: "\r\n" });
    expect(text.startsWith("def dec(*posonly):\r\n\t\"\"\"Positional-only")).toBe(true);
    expect(text.endsWith("\t\treturn wrapper\r\n\treturn caller\r\n")).toBe(true);
    expect(text.replace(/\r\n/g, "")).not.toContain("\n");
  });
});

describe("renderFunction", () => {
  const source = "class A:\n    def f(a, /):\n        pass\n";
  const def = { from: 13, to: source.length };
  const span = { from: 20, to: 23 };

  it("inserts an indented decorator line", () => {
    const edits = renderFunction(extraction(["a"], span, "function"), def, context(source));
    expect(edits).toEqual([
      { from: 20, to: 23, text: "", origin: "marker" },
      { from: 9, to: 9, text: "    @dec('a')\n", origin: "decorator" },
    ]);
  });

  it("mangles private names", () => {
    const edits = renderFunction(extraction(["__a"], span, "function"), def, context(source, { mangleClass: "A" }));
    expect(edits[1].text).toBe("    @dec('_A__a')\n");
  });

  it("only deletes the marker when dismissed", () => {
    const edits = renderFunction(
      extraction(["a"], span, "function"),
      def,
      context(source, { options: { ...OPTIONS, dismiss: true } })
    );
    expect(edits).toEqual([{ from: 20, to: 23, text: "", origin: "marker" }]);
  });

  it("rejects a definition that does not start its line", () => {
    const inline = "if x: def f(a, /): pass\n";
    expect(() =>
      renderFunction(extraction(["a"], { from: 14, to: 17 }, "function"), { from: 6, to: 23 }, context(inline))
    ).toThrow(MalformedConstruct);
  });
});

describe("renderLambda", () => {
  const source = "f = lambda a, /: a\n";
  const lambda = { from: 4, to: 18 };
  const span = { from: 12, to: 15 };

  it("wraps the lambda in a decorator call", () => {
    const edits = renderLambda(extraction(["a"], span, "lambda"), lambda, context(source));
    expect(edits).toEqual([
      { from: 4, to: 4, text: "dec('a')(", origin: "wrap-open" },
      { from: 12, to: 15, text: "", origin: "marker" },
      { from: 18, to: 18, text: ")", origin: "wrap-close" },
    ]);
  });

  it("switches quotes inside a single-quoted format string", () => {
    const edits = renderLambda(
      extraction(["a"], span, "lambda"),
      lambda,
      context(source, { delimiters: [{ prefix: "f", quote: "'", triple: false, from: 0 }] })
    );
    expect(edits[0].text).toBe('dec("a")(');
  });

  it("fails when no quote is free", () => {
    const delimiters = [
      { prefix: "f", quote: "'" as const, triple: false, from: 0 },
      { prefix: "f", quote: '"' as const, triple: false, from: 0 },
    ];
    expect(() => renderLambda(extraction(["a"], span, "lambda"), lambda, context(source, { delimiters }))).toThrow(
      "no quote character is free inside the enclosing format strings"
    );
  });
});
