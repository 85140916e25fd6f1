import {
  EntryCommentsSchema,
  EntryKeySchema,
  type EditedEntry,
  type EntryKey,
  type QueryCriteria,
  type RawEntry
} from "@scout-ledger/schema";
import type { Board, BoardRegistry } from "../boards/board-registry.js";
import { Entry } from "../entries/entry.js";
import { IdentityNotFoundError, InvalidEntryError } from "../errors.js";
import { writeExportFile } from "../export/write-export.js";
import { scanRawEntries } from "../import/raw-importer.js";
import { EditedTable } from "../query/edited-table.js";
import { mergeRawEntries } from "../reconcile/merge-raw-entries.js";
import { loadEntryStore, preserveEntryStore, saveEntryStore, type EntryTables } from "../store/entry-store.js";
import { nowDisplayTime } from "../time/display-time.js";

export interface EntryManagerOptions {
  storePath: string;
  csvDirectory: string;
  registry: BoardRegistry;
  /** Board given to manually appended entries; defaults to the registry's first board. */
  defaultBoard?: string;
  now?: () => Date;
  onProgress?: (message: string) => void;
  onWarning?: (message: string) => void;
}

export type EntryLookup =
  | {
      kind: "found";
      id: number;
      edited: Entry;
      raw: Entry | null;
      lastEdited: string;
    }
  | { kind: "empty" };

export interface UpdateResult {
  imported: number;
  appended: number;
  skippedLines: number;
  duplicateLines: number;
}

export type AppendEntryInput = EntryKey;

export class EntryManager {
  private rawEntries: RawEntry[];
  private readonly table: EditedTable;
  private readonly defaultBoard: Board;
  private readonly now: () => Date;
  /** Set while the file at `storePath` is one that failed to load and has not been moved aside. */
  private unreadableStore = false;

  constructor(
    private readonly options: EntryManagerOptions,
    tables: EntryTables
  ) {
    this.rawEntries = tables.rawEntries;
    this.table = new EditedTable(tables.editedEntries, tables.nextId);
    this.defaultBoard =
      options.defaultBoard !== undefined
        ? options.registry.getBoardByName(options.defaultBoard)
        : options.registry.getFirst();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Loads the stored tables. A store that does not exist yet is bootstrapped from the CSV
   * directory and saved; one that cannot be read leaves the manager running on empty tables,
   * and the first save moves the unreadable file aside instead of overwriting it.
   */
  static async open(options: EntryManagerOptions): Promise<EntryManager> {
    const loaded = await loadEntryStore(options.storePath);
    if (loaded.status === "degraded") {
      options.onWarning?.(`[store] ${loaded.diagnostic}; continuing with empty tables`);
    }

    const manager = new EntryManager(options, loaded.tables);
    manager.unreadableStore = loaded.status === "degraded";
    if (loaded.status === "missing") {
      options.onProgress?.(`[store] no store at ${options.storePath}, importing from ${options.csvDirectory}`);
      await manager.update();
      await manager.save();
    }
    return manager;
  }

  get size(): number {
    return this.table.size;
  }

  rawEntryCount(): number {
    return this.rawEntries.length;
  }

  editedRows(): readonly EditedEntry[] {
    return this.table.rows();
  }

  /** Replaces the raw table with a fresh scan, then merges it into the edited table. */
  async update(): Promise<UpdateResult> {
    const scan = await scanRawEntries(this.options.csvDirectory, this.options.registry, {
      onProgress: this.options.onProgress,
      onWarning: this.options.onWarning
    });
    this.rawEntries = scan.rawEntries;
    const appended = this.merge();

    this.options.onProgress?.(
      `[update] files=${scan.files.length} imported=${scan.rawEntries.length} appended=${appended} ` +
        `skipped=${scan.skippedLines} duplicates=${scan.duplicateLines}`
    );
    return {
      imported: scan.rawEntries.length,
      appended,
      skippedLines: scan.skippedLines,
      duplicateLines: scan.duplicateLines
    };
  }

  merge(): number {
    const result = mergeRawEntries({
      rawEntries: this.rawEntries,
      editedEntries: this.table.rows(),
      nextId: this.table.nextId
    });
    for (const row of result.appended) {
      this.table.insert(row);
    }
    this.table.reserveIds(result.nextId);
    return result.appended.length;
  }

  getEntry(id: number): EntryLookup {
    const row = this.table.get(id);
    if (!row) {
      return { kind: "empty" };
    }

    const rawRow = row.rawIndex !== null ? this.rawEntries[row.rawIndex] : undefined;
    return {
      kind: "found",
      id,
      edited: this.decode(row, id),
      raw: rawRow ? this.decode(rawRow, null) : null,
      lastEdited: row.edited
    };
  }

  setEntry(id: number, entry: Entry): EditedEntry {
    if (!this.table.get(id)) {
      throw new IdentityNotFoundError(id);
    }
    const row = entry.toRow();
    checkEntryKey(row);
    const updated = this.table.update(id, {
      ...row,
      comments: EntryCommentsSchema.parse(row.comments),
      edited: nowDisplayTime(this.now)
    });
    if (!updated) {
      throw new IdentityNotFoundError(id);
    }
    return updated;
  }

  filter(criteria: QueryCriteria = {}): EditedEntry[] {
    return this.table.filter(criteria);
  }

  search(criteria: QueryCriteria = {}): EditedEntry[] {
    return this.table.search(criteria);
  }

  getRelative(view: readonly EditedEntry[], currentId: number, offset: number): EntryLookup {
    const row = this.table.getRelative(view, currentId, offset);
    return row ? this.getEntry(row.id) : { kind: "empty" };
  }

  next(view: readonly EditedEntry[], currentId: number): EntryLookup {
    return this.getRelative(view, currentId, 1);
  }

  previous(view: readonly EditedEntry[], currentId: number): EntryLookup {
    return this.getRelative(view, currentId, -1);
  }

  exactMatch(match: number, team: number, name: string): EditedEntry | undefined {
    return this.table.exactMatch(match, team, name);
  }

  append(input: AppendEntryInput): EntryLookup {
    checkEntryKey(input);
    const existing = this.table.exactMatch(input.match, input.team, input.name);
    if (existing) {
      return this.getEntry(existing.id);
    }

    const row = this.table.insert({
      id: this.table.allocateId(),
      rawIndex: null,
      match: input.match,
      team: input.team,
      name: input.name,
      startTime: nowDisplayTime(this.now),
      board: this.defaultBoard.name,
      data: "",
      comments: "",
      edited: ""
    });
    return this.getEntry(row.id);
  }

  remove(match: number, team: number, name: string, id: number): boolean {
    return this.table.remove(match, team, name, id);
  }

  tables(): EntryTables {
    return {
      rawEntries: [...this.rawEntries],
      editedEntries: [...this.table.rows()],
      nextId: this.table.nextId
    };
  }

  async save(): Promise<void> {
    if (this.unreadableStore) {
      const preserved = await preserveEntryStore(this.options.storePath, this.now());
      if (preserved !== null) {
        this.options.onWarning?.(`[store] moved unreadable store to ${preserved}`);
      }
      this.unreadableStore = false;
    }
    await saveEntryStore(this.options.storePath, this.tables());
  }

  async exportCsv(targetPath: string): Promise<number> {
    return writeExportFile(targetPath, this.table.search(), this.options.registry, nowDisplayTime(this.now));
  }

  private decode(row: RawEntry, rowId: number | null): Entry {
    return Entry.decode(row, this.options.registry.getBoardByName(row.board), rowId);
  }
}

function checkEntryKey(key: EntryKey): void {
  const parsed = EntryKeySchema.safeParse({ match: key.match, team: key.team, name: key.name });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidEntryError(`Invalid entry ${issue.path.join(".")}: ${issue.message}`);
  }
}
