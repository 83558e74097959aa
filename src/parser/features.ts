/**
 * Grammar version checks.
 *
 * The Lezer grammar accepts the newest syntax. Constructs introduced after
 * the declared input version are reported as parse failures.
 */

import type { SyntaxNodeRef, Tree } from "@lezer/common";
import { PYTHON_VERSIONS } from "../config/options";
import type { PythonVersion } from "../config/options";
import { ParseFailure, locate } from "../errors";
import { readDelimiter } from "../convert/string-context";
import type { StringDelimiter } from "../convert/string-context";
import type { TextRange } from "./python";

export type VersionedFeature = TextRange & {
  feature: string;
  since: PythonVersion;
};

const TYPE_ALIAS = /^type[ \t]+[\p{L}_][\p{L}\p{N}_]*[ \t]*[[=]/u;
const MATCH_HEADER = /^match[ \t([{].*:[ \t]*(#.*)?$/;

function firstLine(source: string, from: number): string {
  const end = source.slice(from, from + 240).search(/[\r\n]/);
  return end === -1 ? source.slice(from, from + 240) : source.slice(from, from + end);
}

function isStatement(node: SyntaxNodeRef): boolean {
  const parent = node.node.parent;
  return parent !== null && (parent.name === "Script" || parent.name === "Body");
}

/**
 * Every construct in `tree` that needs a newer grammar than `version`.
 */
export function newerSyntax(tree: Tree, source: string, version: PythonVersion): VersionedFeature[] {
  const declared = PYTHON_VERSIONS.indexOf(version);
  const found: VersionedFeature[] = [];
  const report = (node: SyntaxNodeRef, feature: string, since: PythonVersion) => {
    if (PYTHON_VERSIONS.indexOf(since) > declared) {
      found.push({ from: node.from, to: node.to, feature, since });
    }
  };

  const strings: StringDelimiter[] = [];
  tree.iterate({
    enter(node) {
      switch (node.name) {
        case "MatchStatement":
          report(node, "match statement", "3.10");
          break;
        case "except":
          if (/^[ \t]*\*/.test(source.slice(node.to, node.to + 8))) {
            report(node, "except* clause", "3.11");
          }
          break;
        case "TypeParamList":
          report(node, "type parameter list", "3.12");
          break;
        case "String":
        case "FormatString": {
          const delimiter = readDelimiter(source, node.from);
          const enclosing = strings[strings.length - 1];
          if (delimiter && enclosing && delimiter.quote === enclosing.quote && (!enclosing.triple || delimiter.triple)) {
            report(node, "nested string reusing the enclosing quote", "3.12");
          }
          if (node.name === "FormatString" && delimiter) strings.push(delimiter);
          break;
        }
        default:
          if (!isStatement(node)) break;
          if (TYPE_ALIAS.test(firstLine(source, node.from))) {
            report(node, "type alias statement", "3.12");
          } else if (node.name !== "ExpressionStatement" && MATCH_HEADER.test(firstLine(source, node.from))) {
            report(node, "match statement", "3.10");
          }
      }
    },
    leave(node) {
      if (node.name === "FormatString" && readDelimiter(source, node.from)) strings.pop();
    },
  });
  return found;
}

/**
 * Throw a ParseFailure for the first construct newer than `version`, with
 * the rest as notes.
 */
export function assertVersion(source: string, tree: Tree, filename: string, version: PythonVersion): void {
  const [first, ...rest] = newerSyntax(tree, source, version);
  if (first === undefined) return;
  const failure = new ParseFailure(
    `${first.feature} requires Python ${first.since} (input declared as Python ${version})`,
    filename,
    locate(source, first.from, first.to)
  );
  for (const feature of rest) {
    failure.addNote(`${feature.feature} requires Python ${feature.since}`, locate(source, feature.from, feature.to));
  }
  throw failure;
}
