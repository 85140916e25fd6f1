import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_BOARD_DIR,
  DEFAULT_CSV_DIR,
  DEFAULT_DATABASE_PATH,
  ENV_BOARD_DIR,
  ENV_CSV_DIR,
  ENV_DATABASE,
  ENV_DEFAULT_BOARD
} from "./constants.js";
import { findRepoRoot } from "./io/repo-paths.js";

export const LedgerConfigSchema = z
  .object({
    databasePath: z.string().min(1),
    csvDirectory: z.string().min(1),
    boardDirectory: z.string().min(1),
    defaultBoard: z.string().min(1).optional()
  })
  .strict();
export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;

export interface LoadConfigInput {
  env?: NodeJS.ProcessEnv;
  flags?: ReadonlyMap<string, string | boolean>;
  cwd?: string;
}

/** Flags win over the environment, which wins over the defaults. Defaults are repo-relative. */
export function loadConfig(input: LoadConfigInput = {}): LedgerConfig {
  const env = input.env ?? process.env;
  const flags = input.flags ?? new Map<string, string | boolean>();
  const cwd = input.cwd ?? process.cwd();
  const repoRoot = findRepoRoot(cwd);

  const pick = (flag: string, envKey: string, fallback: string): string => {
    const explicit = flags.get(flag);
    if (typeof explicit === "string" && explicit.length > 0) {
      return path.resolve(cwd, explicit);
    }
    const fromEnv = env[envKey];
    if (fromEnv) {
      return path.resolve(cwd, fromEnv);
    }
    return path.resolve(repoRoot, fallback);
  };

  const boardFlag = flags.get("--default-board");
  const defaultBoard = typeof boardFlag === "string" ? boardFlag : env[ENV_DEFAULT_BOARD];

  const parsed = LedgerConfigSchema.safeParse({
    databasePath: pick("--database", ENV_DATABASE, DEFAULT_DATABASE_PATH),
    csvDirectory: pick("--csv-dir", ENV_CSV_DIR, DEFAULT_CSV_DIR),
    boardDirectory: pick("--board-dir", ENV_BOARD_DIR, DEFAULT_BOARD_DIR),
    defaultBoard: defaultBoard && defaultBoard.length > 0 ? defaultBoard : undefined
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration: ${issue?.path.join(".") ?? "<root>"} ${issue?.message ?? "unknown error"}`);
  }
  return parsed.data;
}
