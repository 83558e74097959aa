import { describe, it, expect } from "vitest";
import { MalformedConstruct, ParseFailure, formatConversionError, locate } from "./errors";

describe("locate", () => {
  it("counts lines across separators", () => {
    expect(locate("a\nb\r\ncd", 6)).toEqual({ from: 6, to: 6, line: 3, column: 1 });
    expect(locate("a\rb", 2, 3)).toEqual({ from: 2, to: 3, line: 2, column: 0 });
  });
});

describe("formatConversionError", () => {
  it("prints location, kind and notes", () => {
    const error = new ParseFailure("invalid syntax", "mod.py", locate("x = = 1", 4, 5));
    error.addNote("invalid syntax near \"1\"", locate("x = = 1", 6, 7));
    expect(formatConversionError(error)).toBe(
      'mod.py:1:4: ParseFailure: invalid syntax\n  note: 1:6: invalid syntax near "1"'
    );
  });

  it("prints the file alone without a location", () => {
    expect(formatConversionError(new MalformedConstruct("bad marker"))).toBe(
      "<unknown>: MalformedConstruct: bad marker"
    );
  });
});
