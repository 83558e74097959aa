/**
 * Lexical scope tracking during traversal.
 */

import { InternalConsistencyFault } from "../errors";
import type { ManglePolicy } from "../config/options";
import type { StringDelimiter } from "./string-context";

export type ScopeKind = "module" | "class" | "function" | "lambda" | "string";

export type ScopeContext = {
  kind: ScopeKind;
  /** Class or function name, when the scope has one */
  name?: string;
  parent?: ScopeContext;
  /** Name of the nearest enclosing class, used for private name mangling */
  mangleClass?: string;
  /** Opening delimiter of the format string, on "string" scopes */
  delimiter?: StringDelimiter;
  /** Set on the module scope once the decorator definition is scheduled */
  definitionScheduled: boolean;
};

export type ScopeHandle = {
  readonly depth: number;
  readonly scope: ScopeContext;
};

/**
 * Mangle a class-private identifier the way Python does for names used
 * inside a class body: `__x` in class `_Foo` becomes `_Foo__x`.
 */
export function mangle(name: string, className: string | undefined): string {
  if (className === undefined) return name;
  if (!name.startsWith("__") || name.endsWith("__")) return name;
  const stripped = className.replace(/^_+/, "");
  if (stripped === "") return name;
  return `_${stripped}${name}`;
}

export class ScopeStack {
  private scopes: ScopeContext[] = [];
  private filename: string;

  constructor(filename: string = "<unknown>") {
    this.filename = filename;
  }

  enter(kind: ScopeKind, name?: string, delimiter?: StringDelimiter): ScopeHandle {
    if (kind === "module" && this.scopes.length > 0) {
      throw new InternalConsistencyFault("module scope entered twice", this.filename);
    }
    if (kind !== "module" && this.scopes.length === 0) {
      throw new InternalConsistencyFault(`${kind} scope entered outside a module`, this.filename);
    }
    const parent = this.scopes.length > 0 ? this.current() : undefined;
    const scope: ScopeContext = {
      kind,
      name,
      parent,
      mangleClass: kind === "class" ? name : parent?.mangleClass,
      delimiter,
      definitionScheduled: false,
    };
    this.scopes.push(scope);
    return { depth: this.scopes.length, scope };
  }

  exit(handle: ScopeHandle): void {
    const top = this.scopes[this.scopes.length - 1];
    if (top === undefined) {
      throw new InternalConsistencyFault(`exit of ${handle.scope.kind} scope with an empty stack`, this.filename);
    }
    if (this.scopes.length !== handle.depth || top !== handle.scope) {
      throw new InternalConsistencyFault(
        `exit of ${handle.scope.kind} scope at depth ${handle.depth}, but the innermost is ${top.kind} at depth ${this.scopes.length}`,
        this.filename
      );
    }
    this.scopes.pop();
  }

  current(): ScopeContext {
    const top = this.scopes[this.scopes.length - 1];
    if (top === undefined) {
      throw new InternalConsistencyFault("no active scope", this.filename);
    }
    return top;
  }

  get depth(): number {
    return this.scopes.length;
  }

  /**
   * Opening delimiters of all enclosing format strings, outermost first.
   */
  stringDelimiters(): StringDelimiter[] {
    const delimiters: StringDelimiter[] = [];
    for (const scope of this.scopes) {
      if (scope.delimiter) delimiters.push(scope.delimiter);
    }
    return delimiters;
  }

  /**
   * Record that the decorator definition will be inserted.
   * Returns true only for the first call in a file.
   */
  scheduleDefinition(): boolean {
    const root = this.scopes[0];
    if (root === undefined || root.kind !== "module") {
      throw new InternalConsistencyFault("decorator definition scheduled outside a module", this.filename);
    }
    if (root.definitionScheduled) return false;
    root.definitionScheduled = true;
    return true;
  }

  /**
   * The class name used to mangle parameter names of a function or lambda
   * declared in the current scope, under the given policy.
   */
  mangleClassFor(target: "function" | "lambda", policy: ManglePolicy): string | undefined {
    if (policy === "none") return undefined;
    if (policy === "functions" && target === "lambda") return undefined;
    return this.current().mangleClass;
  }
}
