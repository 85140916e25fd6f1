import { readdir } from "node:fs/promises";
import path from "node:path";

const CSV_FILE_REGEX = /\.csv$/i;

export async function discoverCsvFiles(rootDirectory: string): Promise<string[]> {
  const discovered: string[] = [];
  const pending = [rootDirectory];

  while (pending.length > 0) {
    const directory = pending.pop();
    if (directory === undefined) {
      break;
    }
    const entries = await readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.isFile() && CSV_FILE_REGEX.test(entry.name)) {
        discovered.push(entryPath);
      }
    }
  }

  return discovered.sort(compareSourcePaths);
}

/**
 * Natural order ("tablet-2" before "tablet-10"), falling back to code units so paths that
 * differ only in case or leading zeros never compare equal.
 */
export function compareSourcePaths(left: string, right: string): number {
  const natural = left.localeCompare(right, undefined, { numeric: true });
  if (natural !== 0) {
    return natural;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}
