import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import type { RawEntry } from "@scout-ledger/schema";
import type { BoardRegistry } from "../boards/board-registry.js";
import { formatDisplayTime } from "../time/display-time.js";
import { discoverCsvFiles } from "../io/discover-csv-files.js";

const SOURCE_LINE_REGEX =
  /^(\d{1,3})_(\d{1,4})_([^_]+)_([0-9a-f]{8})_([0-9a-f]{8})_((?:[0-9a-f]{4})*)_(.*)/;

export interface SourceLine {
  match: number;
  team: number;
  name: string;
  startTimeSeconds: number;
  boardId: number;
  data: string;
  comments: string;
}

export interface ScanRawEntriesOptions {
  onProgress?: (message: string) => void;
  onWarning?: (message: string) => void;
}

export interface ScanRawEntriesResult {
  rawEntries: RawEntry[];
  files: string[];
  linesRead: number;
  skippedLines: number;
  duplicateLines: number;
}

/** Drops the trailing column (the device's write timestamp) the same way the scanner app appends it. */
export function stripTrailingColumn(line: string): string {
  return line.split(",").slice(0, -1).join("");
}

export function parseSourceLine(line: string): SourceLine | null {
  const match = line.match(SOURCE_LINE_REGEX);
  if (!match) {
    return null;
  }

  const [, matchNumber, team, name, startTime, boardId, data, comments] = match;
  return {
    match: Number.parseInt(matchNumber, 10),
    team: Number.parseInt(team, 10),
    name,
    startTimeSeconds: Number.parseInt(startTime, 16),
    boardId: Number.parseInt(boardId, 16),
    data,
    comments
  };
}

export function toRawEntry(line: SourceLine, registry: BoardRegistry): RawEntry {
  return {
    match: line.match,
    team: line.team,
    name: line.name,
    startTime: formatDisplayTime(line.startTimeSeconds),
    board: registry.getBoardById(line.boardId).name,
    data: line.data,
    comments: line.comments
  };
}

/**
 * Collects the unique, well-formed lines of the given file contents in first-seen order.
 * Lines that do not fit the grammar are counted and dropped.
 */
export function collectSourceLines(contents: readonly string[]): {
  lines: string[];
  linesRead: number;
  skippedLines: number;
  duplicateLines: number;
} {
  const seen = new Set<string>();
  const lines: string[] = [];
  let linesRead = 0;
  let skippedLines = 0;
  let duplicateLines = 0;

  for (const content of contents) {
    for (const rawLine of content.split(/\r?\n/)) {
      if (rawLine.length === 0) {
        continue;
      }
      linesRead += 1;
      const line = stripTrailingColumn(rawLine);
      if (!SOURCE_LINE_REGEX.test(line)) {
        skippedLines += 1;
        continue;
      }
      if (seen.has(line)) {
        duplicateLines += 1;
        continue;
      }
      seen.add(line);
      lines.push(line);
    }
  }

  return { lines, linesRead, skippedLines, duplicateLines };
}

export async function scanRawEntries(
  directory: string,
  registry: BoardRegistry,
  options: ScanRawEntriesOptions = {}
): Promise<ScanRawEntriesResult> {
  if (!existsSync(directory)) {
    options.onWarning?.(`[import] source directory not found: ${directory}`);
    return { rawEntries: [], files: [], linesRead: 0, skippedLines: 0, duplicateLines: 0 };
  }

  const files = await discoverCsvFiles(directory);
  const contents: string[] = [];
  for (const [index, filePath] of files.entries()) {
    options.onProgress?.(`[import] ${index + 1}/${files.length} ${filePath}`);
    contents.push(await readFile(filePath, "utf8"));
  }

  const collected = collectSourceLines(contents);
  const rawEntries: RawEntry[] = [];
  for (const line of collected.lines) {
    const parsed = parseSourceLine(line);
    if (parsed) {
      rawEntries.push(toRawEntry(parsed, registry));
    }
  }

  return {
    rawEntries,
    files,
    linesRead: collected.linesRead,
    skippedLines: collected.skippedLines,
    duplicateLines: collected.duplicateLines
  };
}
