import { parseQueryCriteria, type EditedEntry } from "@scout-ledger/schema";
import { describe, expect, it } from "vitest";
import { EditedTable } from "./edited-table.js";

function row(id: number, match: number, team: number, name: string, extra: Partial<EditedEntry> = {}): EditedEntry {
  return {
    id,
    rawIndex: id,
    match,
    team,
    name,
    startTime: "2024-03-02 10:15:00",
    board: "Comp",
    data: "",
    comments: "",
    edited: "",
    ...extra
  };
}

function createTable(): EditedTable {
  return new EditedTable([
    row(0, 5, 200, "Sam"),
    row(1, 3, 20, "Ana", { board: "Pit" }),
    row(2, 5, 120, "Bo", { edited: "2024-03-02 11:00:00" }),
    row(3, 12, 2001, "Cy"),
    row(4, 5, 1114, "sam", { rawIndex: null })
  ]);
}

const ids = (rows: readonly EditedEntry[]): number[] => rows.map((entry) => entry.id);

describe("EditedTable.filter", () => {
  it("keeps exact matches only, sorted by match then team", () => {
    const table = createTable();

    expect(ids(table.filter({ match: [5] }))).toEqual([2, 0, 4]);
    expect(ids(table.filter({ match: [5], name: ["Sam"] }))).toEqual([0]);
    expect(ids(table.filter({ board: ["Pit"] }))).toEqual([1]);
    expect(ids(table.filter({ edited: [""], match: [5] }))).toEqual([0, 4]);
  });

  it("returns every row for no criteria and nothing for an empty allowed list", () => {
    const table = createTable();

    expect(ids(table.filter())).toEqual([1, 2, 0, 4, 3]);
    expect(table.filter({ match: [] })).toEqual([]);
  });

  it("accepts loosely keyed criteria through parseQueryCriteria", () => {
    const table = createTable();

    expect(ids(table.filter(parseQueryCriteria({ MATCH: ["5"], Team: 200 })))).toEqual([0]);
  });

  it("compares decimal strings by value", () => {
    expect(ids(createTable().filter(parseQueryCriteria({ team: ["0200"] })))).toEqual([0]);
  });
});

describe("parseQueryCriteria", () => {
  it("rejects empty and non-decimal match or team values", () => {
    expect(() => parseQueryCriteria({ match: ["5", ""] })).toThrow(
      "Invalid query criteria at match.1: must be a non-negative decimal number"
    );
    expect(() => parseQueryCriteria({ team: "12a" })).toThrow("Invalid query criteria at team.0");
  });

  it("keeps match and team strings as written", () => {
    expect(parseQueryCriteria({ Match: "020", TEAM: [7], colour: "red" })).toEqual({ match: ["020"], team: [7] });
  });
});

describe("EditedTable.search", () => {
  it("matches team numbers by decimal prefix", () => {
    expect(ids(createTable().search({ team: [20] }))).toEqual([1, 0, 3]);
  });

  it("matches names case-insensitively by substring, OR across values", () => {
    const table = createTable();

    expect(ids(table.search({ name: ["SAM"] }))).toEqual([0, 4]);
    expect(ids(table.search({ name: ["an", "cy"] }))).toEqual([1, 3]);
  });

  it("keeps leading zeros in prefixes", () => {
    const table = createTable();

    expect(table.search(parseQueryCriteria({ team: "020" }))).toEqual([]);
    expect(ids(table.search(parseQueryCriteria({ team: " 20 " })))).toEqual([1, 0, 3]);
  });

  it("combines fields with AND and ignores empty lists", () => {
    const table = createTable();

    expect(ids(table.search({ match: [1], team: [2] }))).toEqual([3]);
    expect(ids(table.search({ match: [] }))).toEqual([1, 2, 0, 4, 3]);
  });
});

describe("EditedTable.getRelative", () => {
  const table = new EditedTable([row(10, 1, 1, "A"), row(11, 1, 2, "B"), row(12, 1, 3, "C")]);
  const view = table.filter();

  it("wraps forwards and backwards", () => {
    expect(table.getRelative(view, 12, 1)?.id).toBe(10);
    expect(table.getRelative(view, 10, -1)?.id).toBe(12);
    expect(table.getRelative(view, 11, 4)?.id).toBe(12);
  });

  it("falls back to the first row for an id outside the view", () => {
    expect(table.getRelative(view, 99, 1)?.id).toBe(10);
  });

  it("returns undefined for an empty view", () => {
    expect(table.getRelative([], 10, 1)).toBeUndefined();
  });

  it("skips to the first stored row when the target was removed after the view was built", () => {
    const shrinking = createTable();
    const stale = shrinking.filter({ match: [5] });

    shrinking.remove(5, 200, "Sam", 0);

    expect(ids(stale)).toEqual([2, 0, 4]);
    expect(shrinking.getRelative(stale, 2, 1)?.id).toBe(2);
    expect(shrinking.getRelative(stale, 99, 1)?.id).toBe(2);
  });

  it("returns the stored version of the target row", () => {
    const editing = createTable();
    const stale = editing.filter({ match: [5] });

    editing.update(0, { comments: "rechecked" });

    expect(editing.getRelative(stale, 2, 1)?.comments).toBe("rechecked");
  });

  it("returns undefined once every row of the view is gone", () => {
    const emptied = createTable();
    const stale = emptied.filter({ match: [3] });

    emptied.remove(3, 20, "Ana", 1);

    expect(emptied.getRelative(stale, 1, 1)).toBeUndefined();
  });
});

describe("EditedTable mutations", () => {
  it("finds rows by exact match, team and name", () => {
    const table = createTable();

    expect(table.exactMatch(5, 200, "Sam")?.id).toBe(0);
    expect(table.exactMatch(5, 200, "sam")).toBeUndefined();
  });

  it("keeps the exact-match lookup in step with updates", () => {
    const table = createTable();

    table.update(0, { name: "Samuel" });

    expect(table.exactMatch(5, 200, "Sam")).toBeUndefined();
    expect(table.exactMatch(5, 200, "Samuel")?.id).toBe(0);
    expect(ids(table.filter())).toEqual([1, 2, 0, 4, 3]);
  });

  it("removes a row only when it still holds the given match, team and name", () => {
    const table = createTable();

    expect(table.remove(5, 200, "Sam", 3)).toBe(false);
    expect(table.size).toBe(5);
    expect(table.remove(5, 200, "Sam", 0)).toBe(true);
    expect(table.get(0)).toBeUndefined();
    expect(table.exactMatch(5, 200, "Sam")).toBeUndefined();
  });

  it("keeps identities stable after a deletion and never reuses an id", () => {
    const table = createTable();
    const view = table.filter({ match: [5] });

    table.remove(3, 20, "Ana", 1);
    const inserted = table.insert(row(table.allocateId(), 7, 7, "New"));

    expect(table.get(2)?.name).toBe("Bo");
    expect(table.get(4)?.name).toBe("sam");
    expect(inserted.id).toBe(5);
    expect(table.getRelative(view, 0, 1)?.id).toBe(4);
  });

  it("refuses to insert a duplicate id", () => {
    expect(() => createTable().insert(row(3, 1, 1, "Dup"))).toThrow("already exists");
  });
});
