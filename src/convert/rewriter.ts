/**
 * Edit collection and final text assembly.
 *
 * The syntax tree is never modified. Every change is an edit against the
 * original text, and all edits are applied in one pass at the end.
 */

import { InternalConsistencyFault, locate } from "../errors";

export type EditOrigin = "marker" | "decorator" | "wrap-open" | "wrap-close" | "definition";

export type EditInput = {
  from: number;
  to: number;
  text: string;
  origin: EditOrigin;
};

export type Edit = EditInput & {
  /** Insertion order, breaks ties between insertions at one offset */
  seq: number;
};

/** Where the decorator definition goes, and its full text with spacing. */
export type DefinitionInsertion = {
  offset: number;
  text: string;
};

/**
 * Sort order: by start offset; at equal offsets insertions come before
 * replacements, then earlier-added edits first.
 */
function compareEdits(a: Edit, b: Edit): number {
  if (a.from !== b.from) return a.from - b.from;
  const aEmpty = a.from === a.to;
  const bEmpty = b.from === b.to;
  if (aEmpty !== bEmpty) return aEmpty ? -1 : 1;
  return a.seq - b.seq;
}

export class EditSet {
  private edits: Edit[] = [];
  private nextSeq = 0;
  private filename: string;

  constructor(filename: string = "<unknown>") {
    this.filename = filename;
  }

  add(edit: EditInput): Edit {
    if (edit.from < 0 || edit.to < edit.from) {
      throw new InternalConsistencyFault(`invalid edit range [${edit.from}, ${edit.to})`, this.filename);
    }
    const stored: Edit = { ...edit, seq: this.nextSeq++ };
    this.edits.push(stored);
    return stored;
  }

  addAll(edits: readonly EditInput[]): void {
    for (const edit of edits) this.add(edit);
  }

  get size(): number {
    return this.edits.length;
  }

  /**
   * Edits in application order. Throws when two edits overlap.
   */
  sorted(source: string = ""): Edit[] {
    return sortEdits(this.edits, source, this.filename);
  }

  /**
   * Apply all edits, plus the definition block if given, to `source`.
   */
  apply(source: string, definition?: DefinitionInsertion): string {
    const all = definition
      ? [
          ...this.edits,
          // Ahead of every other insertion at the same offset
          { from: definition.offset, to: definition.offset, text: definition.text, origin: "definition" as const, seq: -1 },
        ]
      : this.edits;
    const edits = sortEdits(all, source, this.filename);
    const outside = edits.find((edit) => edit.to > source.length);
    if (outside) {
      throw new InternalConsistencyFault(`edit past end of source at ${outside.to}`, this.filename);
    }
    return applyEdits(source, edits);
  }
}

function sortEdits(edits: readonly Edit[], source: string, filename: string): Edit[] {
  const sorted = [...edits].sort(compareEdits);
  let end = 0;
  let previous: Edit | undefined;
  for (const edit of sorted) {
    if (previous && edit.from < end) {
      throw new InternalConsistencyFault(
        `overlapping edits: ${previous.origin} [${previous.from}, ${previous.to}) and ${edit.origin} [${edit.from}, ${edit.to})`,
        filename,
        locate(source, edit.from, edit.to)
      );
    }
    if (edit.to >= end) {
      end = edit.to;
      previous = edit;
    }
  }
  return sorted;
}

/**
 * Copy `source`, replacing each edit's range with its text. `edits` must be
 * sorted and non-overlapping.
 */
export function applyEdits(source: string, edits: readonly EditInput[]): string {
  const parts: string[] = [];
  let pos = 0;
  for (const edit of edits) {
    parts.push(source.slice(pos, edit.from));
    parts.push(edit.text);
    pos = edit.to;
  }
  parts.push(source.slice(pos));
  return parts.join("");
}
