import { describe, it, expect } from "vitest";
import { InternalConsistencyFault } from "../errors";
import { EditSet, applyEdits } from "./rewriter";

describe("EditSet", () => {
  it("orders insertions before replacements at one offset", () => {
    const edits = new EditSet();
    edits.add({ from: 2, to: 4, text: "X", origin: "marker" });
    edits.add({ from: 2, to: 2, text: "[", origin: "wrap-open" });
    edits.add({ from: 0, to: 0, text: "@", origin: "decorator" });
    expect(edits.sorted().map((e) => e.origin)).toEqual(["decorator", "wrap-open", "marker"]);
    expect(edits.apply("abcdef")).toBe("@ab[Xef");
  });

  it("keeps insertion order between insertions at one offset", () => {
    const edits = new EditSet();
    edits.add({ from: 3, to: 3, text: ")", origin: "wrap-close" });
    edits.add({ from: 3, to: 3, text: "]", origin: "wrap-close" });
    expect(edits.apply("abc")).toBe("abc)]");
  });

  it("puts the definition ahead of other insertions", () => {
    const edits = new EditSet();
    edits.add({ from: 0, to: 0, text: "@", origin: "decorator" });
    expect(edits.apply("abc", { offset: 0, text: "D" })).toBe("D@abc");
  });

  it("does not change on apply", () => {
    const edits = new EditSet();
    edits.add({ from: 1, to: 2, text: "", origin: "marker" });
    expect(edits.apply("abc", { offset: 0, text: "D" })).toBe("Dac");
    expect(edits.apply("abc", { offset: 0, text: "D" })).toBe("Dac");
    expect(edits.size).toBe(1);
  });

  it("faults on overlapping edits", () => {
    const edits = new EditSet("overlap.py");
    edits.add({ from: 1, to: 3, text: "", origin: "marker" });
    edits.add({ from: 2, to: 4, text: "", origin: "marker" });
    expect(() => edits.sorted("abcdef")).toThrow(InternalConsistencyFault);
  });

  it("faults on invalid ranges", () => {
    expect(() => new EditSet().add({ from: 3, to: 1, text: "", origin: "marker" })).toThrow(
      "invalid edit range [3, 1)"
    );
    const edits = new EditSet();
    edits.add({ from: 10, to: 10, text: "x", origin: "wrap-close" });
    expect(() => edits.apply("abc")).toThrow("edit past end of source at 10");
  });
});

describe("applyEdits", () => {
  it("copies text outside edits verbatim", () => {
    expect(applyEdits("a\r\nb", [{ from: 1, to: 1, text: "!", origin: "decorator" }])).toBe("a!\r\nb");
  });
});
