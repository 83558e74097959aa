import { describe, it, expect } from "vitest";
import { InternalConsistencyFault } from "../errors";
import { ScopeStack, mangle } from "./context";

describe("mangle", () => {
  it("prefixes class-private names", () => {
    expect(mangle("__value", "Box")).toBe("_Box__value");
    expect(mangle("__value", "__Box")).toBe("_Box__value");
  });

  it("leaves other names alone", () => {
    expect(mangle("__init__", "Box")).toBe("__init__");
    expect(mangle("_value", "Box")).toBe("_value");
    expect(mangle("__value", "___")).toBe("__value");
    expect(mangle("__value", undefined)).toBe("__value");
  });
});

describe("ScopeStack", () => {
  it("tracks the nearest enclosing class", () => {
    const stack = new ScopeStack();
    const module = stack.enter("module");
    const cls = stack.enter("class", "Box");
    const fn = stack.enter("function", "method");
    expect(stack.current().mangleClass).toBe("Box");
    expect(stack.depth).toBe(3);
    stack.exit(fn);
    stack.exit(cls);
    expect(stack.current().mangleClass).toBeUndefined();
    stack.exit(module);
    expect(stack.depth).toBe(0);
  });

  it("faults on unbalanced exits", () => {
    const stack = new ScopeStack("broken.py");
    const module = stack.enter("module");
    stack.enter("class", "Box");
    expect(() => stack.exit(module)).toThrow(InternalConsistencyFault);
  });

  it("faults when a scope opens outside a module", () => {
    expect(() => new ScopeStack().enter("function")).toThrow("function scope entered outside a module");
  });

  it("schedules the definition once", () => {
    const stack = new ScopeStack();
    stack.enter("module");
    expect(stack.scheduleDefinition()).toBe(true);
    expect(stack.scheduleDefinition()).toBe(false);
  });

  it("collects enclosing string delimiters", () => {
    const stack = new ScopeStack();
    stack.enter("module");
    stack.enter("string", undefined, { prefix: "f", quote: "'", triple: false, from: 0 });
    stack.enter("lambda");
    expect(stack.stringDelimiters().map((d) => d.quote)).toEqual(["'"]);
  });

  it("applies the mangling policy", () => {
    const stack = new ScopeStack();
    stack.enter("module");
    stack.enter("class", "Box");
    expect(stack.mangleClassFor("function", "all")).toBe("Box");
    expect(stack.mangleClassFor("lambda", "all")).toBe("Box");
    expect(stack.mangleClassFor("function", "functions")).toBe("Box");
    expect(stack.mangleClassFor("lambda", "functions")).toBeUndefined();
    expect(stack.mangleClassFor("function", "none")).toBeUndefined();
  });
});
