import type { EditedEntry, RawEntry } from "@scout-ledger/schema";

export interface MergeRawEntriesInput {
  rawEntries: readonly RawEntry[];
  editedEntries: readonly EditedEntry[];
  nextId: number;
}

export interface MergeRawEntriesResult {
  editedEntries: EditedEntry[];
  appended: EditedEntry[];
  nextId: number;
}

/**
 * Gives every raw entry an edited counterpart. Existing rows are returned untouched and
 * in place; raw entries already referenced through `rawIndex` are skipped, so merging the
 * same batch twice appends nothing the second time.
 */
export function mergeRawEntries(input: MergeRawEntriesInput): MergeRawEntriesResult {
  const referenced = new Set<number>();
  for (const entry of input.editedEntries) {
    if (entry.rawIndex !== null) {
      referenced.add(entry.rawIndex);
    }
  }

  let nextId = input.editedEntries.reduce((highest, entry) => Math.max(highest, entry.id + 1), input.nextId);
  const appended: EditedEntry[] = [];
  for (const [rawIndex, raw] of input.rawEntries.entries()) {
    if (referenced.has(rawIndex)) {
      continue;
    }
    appended.push({ ...raw, id: nextId, rawIndex, edited: "" });
    nextId += 1;
  }

  return {
    editedEntries: [...input.editedEntries, ...appended],
    appended,
    nextId
  };
}
