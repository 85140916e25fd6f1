export { createBoardRegistry, loadBoardRegistry } from "./boards/board-registry.js";
export type { Board, BoardFieldType, BoardRegistry } from "./boards/board-registry.js";
export { decodeData, encodeData } from "./codec/codec.js";
export type { DataPoint } from "./codec/codec.js";
export { loadConfig, LedgerConfigSchema } from "./config.js";
export type { LedgerConfig } from "./config.js";
export { Entry } from "./entries/entry.js";
export type { EntryField } from "./entries/entry.js";
export { CodecError, DecodeError, EncodeError, IdentityNotFoundError, InvalidEntryError, UnknownBoardError } from "./errors.js";
export { formatExportLine, writeExportFile } from "./export/write-export.js";
export { collectSourceLines, parseSourceLine, scanRawEntries, stripTrailingColumn } from "./import/raw-importer.js";
export type { ScanRawEntriesResult, SourceLine } from "./import/raw-importer.js";
export { EntryManager } from "./manager/entry-manager.js";
export type { AppendEntryInput, EntryLookup, EntryManagerOptions, UpdateResult } from "./manager/entry-manager.js";
export { EditedTable } from "./query/edited-table.js";
export { mergeRawEntries } from "./reconcile/merge-raw-entries.js";
export { emptyTables, loadEntryStore, saveEntryStore } from "./store/entry-store.js";
export type { EntryTables, LoadEntryStoreResult } from "./store/entry-store.js";
export { formatDisplayTime, parseDisplayTime } from "./time/display-time.js";
