import type { EditedEntry, RawEntry } from "@scout-ledger/schema";
import { describe, expect, it } from "vitest";
import { mergeRawEntries } from "./merge-raw-entries.js";

function raw(match: number, team: number, name: string): RawEntry {
  return {
    match,
    team,
    name,
    startTime: "2024-03-02 10:15:00",
    board: "Comp",
    data: "0001",
    comments: ""
  };
}

const RAW_BATCH = [raw(1, 254, "Sam"), raw(1, 1114, "Ana"), raw(2, 2056, "Lee")];

describe("mergeRawEntries", () => {
  it("creates one never-edited row per raw entry on an empty table", () => {
    const result = mergeRawEntries({ rawEntries: RAW_BATCH, editedEntries: [], nextId: 0 });

    expect(result.editedEntries).toEqual([
      { ...RAW_BATCH[0], id: 0, rawIndex: 0, edited: "" },
      { ...RAW_BATCH[1], id: 1, rawIndex: 1, edited: "" },
      { ...RAW_BATCH[2], id: 2, rawIndex: 2, edited: "" }
    ]);
    expect(result.appended).toHaveLength(3);
    expect(result.nextId).toBe(3);
  });

  it("appends nothing when the same batch is merged again", () => {
    const once = mergeRawEntries({ rawEntries: RAW_BATCH, editedEntries: [], nextId: 0 });
    const twice = mergeRawEntries({ rawEntries: RAW_BATCH, editedEntries: once.editedEntries, nextId: once.nextId });

    expect(twice.appended).toEqual([]);
    expect(twice.editedEntries).toEqual(once.editedEntries);
    expect(twice.nextId).toBe(once.nextId);
  });

  it("keeps existing rows, edited and manual, unchanged and in front", () => {
    const editedSam: EditedEntry = {
      ...RAW_BATCH[1],
      name: "Ana B",
      data: "0000",
      id: 0,
      rawIndex: 1,
      edited: "2024-03-02 11:00:00"
    };
    const manual: EditedEntry = { ...raw(9, 4, "Kim"), id: 5, rawIndex: null, edited: "" };

    const result = mergeRawEntries({ rawEntries: RAW_BATCH, editedEntries: [editedSam, manual], nextId: 6 });

    expect(result.editedEntries.slice(0, 2)).toEqual([editedSam, manual]);
    expect(result.appended.map((row) => [row.id, row.rawIndex])).toEqual([
      [6, 0],
      [7, 2]
    ]);
  });

  it("references every raw index exactly once", () => {
    const partial = mergeRawEntries({ rawEntries: RAW_BATCH.slice(0, 1), editedEntries: [], nextId: 0 });
    const full = mergeRawEntries({
      rawEntries: RAW_BATCH,
      editedEntries: partial.editedEntries,
      nextId: partial.nextId
    });

    const references = full.editedEntries.map((row) => row.rawIndex).filter((index) => index !== null);
    expect(references.sort()).toEqual([0, 1, 2]);
  });

  it("never hands out an id already in use, even when nextId lags behind", () => {
    const existing: EditedEntry = { ...raw(3, 5, "Mo"), id: 10, rawIndex: null, edited: "" };

    const result = mergeRawEntries({ rawEntries: RAW_BATCH.slice(0, 1), editedEntries: [existing], nextId: 0 });

    expect(result.appended[0].id).toBe(11);
    expect(result.nextId).toBe(12);
  });
});
