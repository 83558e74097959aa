import { describe, it, expect } from "vitest";
import type { PythonVersion } from "../config/options";
import { newerSyntax } from "./features";
import { parsePython } from "./python";

function features(source: string, version: PythonVersion): string[] {
  return newerSyntax(parsePython(source), source, version).map((f) => `${f.feature}@${f.since}`);
}

describe("newerSyntax", () => {
  it("finds type aliases", () => {
    expect(features("type X = int\n", "3.11")).toEqual(["type alias statement@3.12"]);
    expect(features("type X = int\n", "3.12")).toEqual([]);
  });

  it("does not mistake calls and names for newer statements", () => {
    expect(features("x = type(1)\ntype = 3\nmatch(x)\n", "3.8")).toEqual([]);
  });

  it("finds match statements", () => {
    expect(features("match x:\n    case 1:\n        pass\n", "3.9")).toEqual(["match statement@3.10"]);
    expect(features("match x:\n    case 1:\n        pass\n", "3.10")).toEqual([]);
  });
});
