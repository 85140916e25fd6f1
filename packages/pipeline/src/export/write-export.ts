import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { EditedEntry } from "@scout-ledger/schema";
import type { BoardRegistry } from "../boards/board-registry.js";
import { parseDisplayTime } from "../time/display-time.js";

const toHex8 = (value: number): string => value.toString(16).padStart(8, "0");

/** One line in the scanner's own format, so an export can be imported again. */
export function formatExportLine(row: EditedEntry, registry: BoardRegistry, writtenAt: string): string {
  const tokens = [
    String(row.match),
    String(row.team),
    row.name,
    toHex8(parseDisplayTime(row.startTime)),
    toHex8(registry.getBoardByName(row.board).id),
    row.data.toLowerCase(),
    row.comments
  ];
  return `${tokens.join("_")}, ${writtenAt}`;
}

export async function writeExportFile(
  targetPath: string,
  rows: readonly EditedEntry[],
  registry: BoardRegistry,
  writtenAt: string
): Promise<number> {
  const lines = rows.map((row) => formatExportLine(row, registry, writtenAt));
  await mkdir(path.dirname(targetPath), { recursive: true });
  await writeFile(targetPath, lines.length > 0 ? `${lines.join("\n")}\n` : "", "utf8");
  return lines.length;
}
