#!/usr/bin/env node

import path from "node:path";
import { parseQueryCriteria, type EditedEntry, type QueryCriteria } from "@scout-ledger/schema";
import { loadBoardRegistry } from "./boards/board-registry.js";
import { loadConfig } from "./config.js";
import { loadEnvLocal } from "./io/load-env-local.js";
import { findRepoRoot } from "./io/repo-paths.js";
import { EntryManager, type EntryLookup } from "./manager/entry-manager.js";

type Flags = Map<string, string | boolean>;

const FILTER_FLAGS = ["--match", "--team", "--name", "--board", "--edited"] as const;
const COMMANDS = new Set(["update", "list", "show", "next", "previous", "append", "remove", "export"]);

async function main(): Promise<void> {
  loadEnvLocal(findRepoRoot(process.cwd()));

  const [command, ...args] = process.argv.slice(2);
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printUsage();
    return;
  }

  if (!COMMANDS.has(command)) {
    throw new Error(`Unknown command: ${command}`);
  }

  const flags = parseFlags(args);
  const config = loadConfig({ flags });
  const registry = await loadBoardRegistry(config.boardDirectory);
  const manager = await EntryManager.open({
    storePath: config.databasePath,
    csvDirectory: config.csvDirectory,
    registry,
    defaultBoard: config.defaultBoard,
    onProgress: (message) => console.log(message),
    onWarning: (message) => console.warn(message)
  });

  switch (command) {
    case "update": {
      const result = await manager.update();
      await manager.save();
      console.log(`Imported: ${result.imported}`);
      console.log(`Appended: ${result.appended}`);
      console.log(`Database: ${config.databasePath}`);
      return;
    }
    case "list": {
      const view = selectView(manager, flags);
      for (const row of view) {
        console.log(formatRow(row));
      }
      console.log(`[list] rows=${view.length} of ${manager.size}`);
      return;
    }
    case "show": {
      printLookup(manager.getEntry(getRequiredIntFlag(flags, "--id")));
      return;
    }
    case "next":
    case "previous": {
      const view = selectView(manager, flags);
      const currentId = getRequiredIntFlag(flags, "--id");
      printLookup(command === "next" ? manager.next(view, currentId) : manager.previous(view, currentId));
      return;
    }
    case "append": {
      const before = manager.size;
      const lookup = manager.append({
        match: getRequiredIntFlag(flags, "--match"),
        team: getRequiredIntFlag(flags, "--team"),
        name: getRequiredStringFlag(flags, "--name")
      });
      if (manager.size !== before) {
        await manager.save();
      }
      printLookup(lookup);
      return;
    }
    case "remove": {
      const removed = manager.remove(
        getRequiredIntFlag(flags, "--match"),
        getRequiredIntFlag(flags, "--team"),
        getRequiredStringFlag(flags, "--name"),
        getRequiredIntFlag(flags, "--id")
      );
      if (removed) {
        await manager.save();
      }
      console.log(removed ? "[remove] removed" : "[remove] no entry with that id holds the given match, team and name");
      return;
    }
    case "export": {
      const target = path.resolve(process.cwd(), getRequiredStringFlag(flags, "--out"));
      const count = await manager.exportCsv(target);
      console.log(`[export] rows=${count} path=${target}`);
      return;
    }
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

function selectView(manager: EntryManager, flags: Flags): EditedEntry[] {
  const criteria = criteriaFromFlags(flags);
  return flags.get("--search") === true ? manager.search(criteria) : manager.filter(criteria);
}

function criteriaFromFlags(flags: Flags): QueryCriteria {
  const raw: Record<string, unknown> = {};
  for (const flag of FILTER_FLAGS) {
    const value = getStringFlag(flags, flag);
    if (value !== undefined) {
      raw[flag.slice(2)] = value.split(",").map((part) => part.trim());
    }
  }
  return parseQueryCriteria(raw);
}

function formatRow(row: EditedEntry): string {
  const edited = row.edited.length > 0 ? row.edited : "-";
  return `#${row.id}\tmatch=${row.match}\tteam=${row.team}\tname=${row.name}\tboard=${row.board}\tedited=${edited}`;
}

function printLookup(lookup: EntryLookup): void {
  if (lookup.kind === "empty") {
    console.log("(no entry)");
    return;
  }

  const { edited } = lookup;
  console.log(`#${lookup.id} match=${edited.match} team=${edited.team} name=${edited.name} board=${edited.boardName}`);
  console.log(`Started: ${edited.startTime}`);
  console.log(`Edited: ${lookup.lastEdited.length > 0 ? lookup.lastEdited : "never"}`);
  console.log(`Source: ${lookup.raw ? "scanned" : "manual"}`);
  console.log(`Comments: ${edited.comments}`);
  for (const field of edited.fields) {
    console.log(`  ${field.type}: ${field.value}${field.undone ? " (undone)" : ""}`);
  }
}

function parseFlags(args: string[]): Flags {
  const flags: Flags = new Map();

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token.startsWith("--")) {
      continue;
    }

    const maybeValue = args[index + 1];
    if (!maybeValue || maybeValue.startsWith("--")) {
      flags.set(token, true);
      continue;
    }

    flags.set(token, maybeValue);
    index += 1;
  }

  return flags;
}

function getStringFlag(flags: Flags, key: string): string | undefined {
  const value = flags.get(key);
  return typeof value === "string" ? value : undefined;
}

function getRequiredStringFlag(flags: Flags, key: string): string {
  const value = getStringFlag(flags, key);
  if (value === undefined) {
    throw new Error(`Missing value for ${key}`);
  }
  return value;
}

function getRequiredIntFlag(flags: Flags, key: string): number {
  const value = getRequiredStringFlag(flags, key);
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${key} must be an integer >= 0`);
  }
  return parsed;
}

function printUsage(): void {
  console.log(`
Usage:
  npm run cli -- <command> [options]

Commands:
  update                   Re-scan the CSV directory, merge new entries and save
  list                     List edited entries (filters below; --search for prefix matching)
  show --id <n>            Show one decoded entry
  next --id <n>            Entry after <n> within the filtered list (wraps)
  previous --id <n>        Entry before <n> within the filtered list (wraps)
  append --match <n> --team <n> --name <s>
                           Add a manual entry, or show the existing one
  remove --match <n> --team <n> --name <s> --id <n>
                           Remove entry <n> if it still holds match, team and name
  export --out <file>      Write all entries in scanner line format

Filters (comma-separated values):
  --match <n,..>  --team <n,..>  --name <s,..>  --board <s,..>  --edited <s,..>
  --search                 Prefix match for match/team, substring for name

Paths:
  --database <file>        Default: packages/data/database/entries.v1.json
  --csv-dir <dir>          Default: packages/data/raw/csv
  --board-dir <dir>        Default: packages/data/boards
  --default-board <name>   Board for appended entries (default: first board)

Environment overrides:
  SCOUT_DATABASE, SCOUT_CSV_DIR, SCOUT_BOARD_DIR, SCOUT_DEFAULT_BOARD
`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
