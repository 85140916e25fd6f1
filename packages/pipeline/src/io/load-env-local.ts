import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

const ENV_KEY_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Copies `KEY=value` pairs from `<root>/.env.local` into `env` without overriding keys
 * that are already set. Returns the file path when one was read.
 */
export function loadEnvLocal(root: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const envLocalPath = path.join(root, ".env.local");
  if (!existsSync(envLocalPath)) {
    return null;
  }

  for (const [key, value] of parseEnvFile(readFileSync(envLocalPath, "utf8"))) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return envLocalPath;
}

export function parseEnvFile(contents: string): Map<string, string> {
  const parsed = new Map<string, string>();

  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, "");
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const separatorIndex = trimmed.indexOf("=");
    const key = trimmed.slice(0, Math.max(separatorIndex, 0)).trim();
    if (separatorIndex <= 0 || !ENV_KEY_REGEX.test(key)) {
      continue;
    }
    parsed.set(key, unquote(trimmed.slice(separatorIndex + 1).trim()));
  }

  return parsed;
}

function unquote(value: string): string {
  const quoted = value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0]);
  if (quoted) {
    return value.slice(1, -1);
  }
  return value.replace(/\s+#.*$/, "");
}
