import type { EditedEntry, QueryCriteria } from "@scout-ledger/schema";
import { buildFilterPredicate, buildSearchPredicate, compareByMatchTeam, type RowPredicate } from "./criteria.js";

export type EditedEntryPatch = Partial<Omit<EditedEntry, "id">>;

/**
 * The edited overlay: rows in insertion order, plus lookups by id and by
 * (match, team, name) kept in step with every insert, update and removal.
 * Ids are never reused, so a removal does not disturb any other row's identity.
 */
export class EditedTable {
  private readonly ordered: EditedEntry[] = [];
  private readonly byId = new Map<number, EditedEntry>();
  private readonly byKey = new Map<string, EditedEntry[]>();
  private nextIdValue: number;

  constructor(rows: readonly EditedEntry[] = [], nextId = 0) {
    this.nextIdValue = nextId;
    for (const row of rows) {
      this.insert(row);
    }
  }

  get size(): number {
    return this.ordered.length;
  }

  get nextId(): number {
    return this.nextIdValue;
  }

  rows(): readonly EditedEntry[] {
    return [...this.ordered];
  }

  get(id: number): EditedEntry | undefined {
    return this.byId.get(id);
  }

  allocateId(): number {
    const id = this.nextIdValue;
    this.nextIdValue += 1;
    return id;
  }

  reserveIds(nextId: number): void {
    this.nextIdValue = Math.max(this.nextIdValue, nextId);
  }

  insert(row: EditedEntry): EditedEntry {
    if (this.byId.has(row.id)) {
      throw new Error(`Edited entry id ${row.id} already exists`);
    }
    const stored = { ...row };
    this.ordered.push(stored);
    this.byId.set(stored.id, stored);
    this.addToKeyIndex(stored);
    this.reserveIds(stored.id + 1);
    return stored;
  }

  update(id: number, patch: EditedEntryPatch): EditedEntry | undefined {
    const current = this.byId.get(id);
    if (!current) {
      return undefined;
    }

    const next: EditedEntry = { ...current, ...patch, id };
    this.ordered[this.ordered.indexOf(current)] = next;
    this.byId.set(id, next);
    this.removeFromKeyIndex(current);
    this.addToKeyIndex(next);
    return next;
  }

  /** Deletes the row at `id` only when it still holds the given match, team and name. */
  remove(match: number, team: number, name: string, id: number): boolean {
    const current = this.byId.get(id);
    if (!current || current.match !== match || current.team !== team || current.name !== name) {
      return false;
    }

    this.ordered.splice(this.ordered.indexOf(current), 1);
    this.byId.delete(id);
    this.removeFromKeyIndex(current);
    return true;
  }

  exactMatch(match: number, team: number, name: string): EditedEntry | undefined {
    return this.byKey.get(rowKey(match, team, name))?.[0];
  }

  filter(criteria: QueryCriteria = {}): EditedEntry[] {
    return this.select(buildFilterPredicate(criteria));
  }

  search(criteria: QueryCriteria = {}): EditedEntry[] {
    return this.select(buildSearchPredicate(criteria));
  }

  /**
   * Steps `offset` rows away from `currentId` within a previously computed view, wrapping
   * at both ends. An id missing from the view, or a target removed since the view was
   * built, falls back to the view's first row that is still stored.
   */
  getRelative(view: readonly EditedEntry[], currentId: number, offset: number): EditedEntry | undefined {
    if (view.length === 0) {
      return undefined;
    }
    const position = view.findIndex((row) => row.id === currentId);
    if (position >= 0) {
      const target = view[(((position + offset) % view.length) + view.length) % view.length];
      const current = this.byId.get(target.id);
      if (current) {
        return current;
      }
    }
    for (const row of view) {
      const current = this.byId.get(row.id);
      if (current) {
        return current;
      }
    }
    return undefined;
  }

  private select(predicate: RowPredicate): EditedEntry[] {
    return this.ordered.filter(predicate).sort(compareByMatchTeam);
  }

  private addToKeyIndex(row: EditedEntry): void {
    const key = rowKey(row.match, row.team, row.name);
    const bucket = this.byKey.get(key);
    if (!bucket) {
      this.byKey.set(key, [row]);
      return;
    }
    bucket.push(row);
    bucket.sort((left, right) => this.ordered.indexOf(left) - this.ordered.indexOf(right));
  }

  private removeFromKeyIndex(row: EditedEntry): void {
    const key = rowKey(row.match, row.team, row.name);
    const remaining = (this.byKey.get(key) ?? []).filter((candidate) => candidate !== row);
    if (remaining.length === 0) {
      this.byKey.delete(key);
    } else {
      this.byKey.set(key, remaining);
    }
  }
}

function rowKey(match: number, team: number, name: string): string {
  return `${match}\u0000${team}\u0000${name}`;
}
