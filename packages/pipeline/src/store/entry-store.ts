import { readFile, rename } from "node:fs/promises";
import { EntryStoreSchema, type EditedEntry, type RawEntry } from "@scout-ledger/schema";
import { writeJsonFile } from "../io/write-json.js";

export interface EntryTables {
  rawEntries: RawEntry[];
  editedEntries: EditedEntry[];
  nextId: number;
}

export type LoadEntryStoreResult =
  | { status: "loaded"; tables: EntryTables }
  | { status: "missing"; tables: EntryTables }
  | { status: "degraded"; tables: EntryTables; diagnostic: string };

export function emptyTables(): EntryTables {
  return { rawEntries: [], editedEntries: [], nextId: 0 };
}

export async function loadEntryStore(storePath: string): Promise<LoadEntryStoreResult> {
  let raw: string;
  try {
    raw = await readFile(storePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return { status: "missing", tables: emptyTables() };
    }
    return { status: "degraded", tables: emptyTables(), diagnostic: describeError(storePath, error) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { status: "degraded", tables: emptyTables(), diagnostic: describeError(storePath, error) };
  }

  const validated = EntryStoreSchema.safeParse(parsed);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    return {
      status: "degraded",
      tables: emptyTables(),
      diagnostic: `Invalid entry store (${storePath}): ${issue?.path.join(".") ?? "<root>"} ${issue?.message ?? "unknown error"}`
    };
  }

  return {
    status: "loaded",
    tables: {
      rawEntries: validated.data.rawEntries,
      editedEntries: validated.data.editedEntries,
      nextId: validated.data.nextId
    }
  };
}

export async function saveEntryStore(storePath: string, tables: EntryTables): Promise<void> {
  await writeJsonFile(storePath, {
    version: 1,
    nextId: tables.nextId,
    rawEntries: tables.rawEntries,
    editedEntries: tables.editedEntries
  });
}

/**
 * Renames the store to `<storePath>.corrupt-<timestamp>` so a following save does not
 * overwrite it. Returns the new path, or `null` when there was no file to move.
 */
export async function preserveEntryStore(storePath: string, at: Date): Promise<string | null> {
  const target = `${storePath}.corrupt-${at.toISOString().replace(/[:.]/g, "-")}`;
  try {
    await rename(storePath, target);
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
  return target;
}

function isMissingFileError(error: unknown): boolean {
  return Boolean(error && typeof error === "object" && "code" in error && error.code === "ENOENT");
}

function describeError(storePath: string, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Could not read entry store (${storePath}): ${message}`;
}
