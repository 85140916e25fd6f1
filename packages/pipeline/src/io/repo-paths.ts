import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

const rootCache = new Map<string, string>();

/** Nearest ancestor holding `.git` or a workspaces `package.json`; the start directory otherwise. */
export function findRepoRoot(startDirectory: string): string {
  const start = path.resolve(startDirectory);
  const cached = rootCache.get(start);
  if (cached) {
    return cached;
  }

  let currentDir = start;
  while (true) {
    if (existsSync(path.join(currentDir, ".git")) || isWorkspaceRoot(currentDir)) {
      rootCache.set(start, currentDir);
      return currentDir;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      rootCache.set(start, start);
      return start;
    }
    currentDir = parentDir;
  }
}

function isWorkspaceRoot(directory: string): boolean {
  const manifestPath = path.join(directory, "package.json");
  if (!existsSync(manifestPath)) {
    return false;
  }
  const manifest = JSON.parse(readFileSync(manifestPath, "utf8")) as unknown;
  return typeof manifest === "object" && manifest !== null && "workspaces" in manifest;
}
