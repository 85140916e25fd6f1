export const DEFAULT_DATABASE_PATH = "packages/data/database/entries.v1.json";
export const DEFAULT_CSV_DIR = "packages/data/raw/csv";
export const DEFAULT_BOARD_DIR = "packages/data/boards";

export const ENV_DATABASE = "SCOUT_DATABASE";
export const ENV_CSV_DIR = "SCOUT_CSV_DIR";
export const ENV_BOARD_DIR = "SCOUT_BOARD_DIR";
export const ENV_DEFAULT_BOARD = "SCOUT_DEFAULT_BOARD";
