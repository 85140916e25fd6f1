import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import {
  BoardDefinitionSchema,
  FIELD_KIND_MAX,
  type BoardDefinition,
  type FieldKind
} from "@scout-ledger/schema";
import { UnknownBoardError } from "../errors.js";

export interface BoardFieldType {
  index: number;
  name: string;
  kind: FieldKind;
  max: number;
}

export interface Board {
  id: number;
  name: string;
  fields: readonly BoardFieldType[];
  fieldByName: ReadonlyMap<string, BoardFieldType>;
}

export interface BoardRegistry {
  getBoardByName(name: string): Board;
  getBoardById(id: number): Board;
  getFirst(): Board;
  list(): readonly Board[];
}

export function createBoardRegistry(definitions: readonly unknown[]): BoardRegistry {
  if (definitions.length === 0) {
    throw new Error("Board registry needs at least one board definition");
  }

  const boards = definitions.map((definition, index) => {
    const parsed = BoardDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(
        `Invalid board definition at index ${index}: ${issue?.path.join(".") ?? "<root>"} ${issue?.message ?? "unknown error"}`
      );
    }
    return toBoard(parsed.data);
  });

  const byId = new Map<number, Board>();
  const byName = new Map<string, Board>();
  for (const board of boards) {
    if (byId.has(board.id)) {
      throw new Error(`Duplicate board id ${board.id}`);
    }
    if (byName.has(board.name)) {
      throw new Error(`Duplicate board name "${board.name}"`);
    }
    byId.set(board.id, board);
    byName.set(board.name, board);
  }

  return {
    getBoardByName(name) {
      const board = byName.get(name);
      if (!board) {
        throw new UnknownBoardError(name);
      }
      return board;
    },
    getBoardById(id) {
      const board = byId.get(id);
      if (!board) {
        throw new UnknownBoardError(id);
      }
      return board;
    },
    getFirst() {
      return boards[0];
    },
    list() {
      return boards;
    }
  };
}

/** Reads every `*.json` board definition in `directory`, in file-name order. */
export async function loadBoardRegistry(directory: string): Promise<BoardRegistry> {
  const entries = await readdir(directory, { withFileTypes: true });
  const fileNames = entries
    .filter((entry) => entry.isFile() && /\.json$/i.test(entry.name))
    .map((entry) => entry.name)
    .sort((left, right) => left.localeCompare(right));

  const definitions: BoardDefinition[] = [];
  for (const fileName of fileNames) {
    const filePath = path.join(directory, fileName);
    const parsed = BoardDefinitionSchema.safeParse(JSON.parse(await readFile(filePath, "utf8")) as unknown);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(
        `Invalid board file (${filePath}): ${issue?.path.join(".") ?? "<root>"} ${issue?.message ?? "unknown error"}`
      );
    }
    definitions.push(parsed.data);
  }

  if (definitions.length === 0) {
    throw new Error(`No board definitions found in ${directory}`);
  }
  return createBoardRegistry(definitions);
}

function toBoard(definition: BoardDefinition): Board {
  const fields = definition.fields.map((field, index) => ({
    index,
    name: field.name,
    kind: field.kind,
    max: Math.min(field.max ?? FIELD_KIND_MAX[field.kind], FIELD_KIND_MAX[field.kind])
  }));
  return {
    id: definition.id,
    name: definition.name,
    fields,
    fieldByName: new Map(fields.map((field) => [field.name, field]))
  };
}
