import type { RawEntry } from "@scout-ledger/schema";
import type { Board } from "../boards/board-registry.js";
import { decodeData, encodeData, type DataPoint } from "../codec/codec.js";

export interface EntryField {
  type: string;
  value: number;
  /** Value as decoded from the stored token; `null` for fields added afterwards. */
  priorValue: number | null;
  undone: boolean;
}

/**
 * Decoded view of one stored row. It does not own the row: `rowId` only tells the
 * manager where to write the result back.
 */
export class Entry {
  match: number;
  team: number;
  name: string;
  startTime: string;
  comments: string;
  fields: EntryField[];
  private currentBoard: Board;
  /** Decoded point each field started from; fields added later have none. */
  private readonly origins = new WeakMap<EntryField, DataPoint>();

  private constructor(
    readonly rowId: number | null,
    row: RawEntry,
    board: Board,
    private readonly decoded: readonly DataPoint[]
  ) {
    this.match = row.match;
    this.team = row.team;
    this.name = row.name;
    this.startTime = row.startTime;
    this.comments = row.comments;
    this.currentBoard = board;
    this.fields = this.fieldsFromDecoded();
  }

  static decode(row: RawEntry, board: Board, rowId: number | null = null): Entry {
    return new Entry(rowId, row, board, decodeData(row.data, board));
  }

  get board(): Board {
    return this.currentBoard;
  }

  get boardName(): string {
    return this.currentBoard.name;
  }

  setBoard(board: Board): void {
    this.currentBoard = board;
  }

  addField(type: string, value: number, undone = false): void {
    this.fields.push({ type, value, priorValue: null, undone });
  }

  /** Restores the type, value and undone flag a decoded field started with. */
  revertField(index: number): void {
    if (index < 0 || index >= this.fields.length) {
      return;
    }
    const field = this.fields[index];
    const origin = this.origins.get(field);
    if (origin) {
      field.type = origin.type;
      field.value = origin.value;
      field.undone = origin.undone;
    }
  }

  /** Rebuilds the field list from the stored token, dropping added fields and restoring removed ones. */
  revertAll(): void {
    this.fields = this.fieldsFromDecoded();
  }

  private fieldsFromDecoded(): EntryField[] {
    return this.decoded.map((point) => {
      const field = { type: point.type, value: point.value, priorValue: point.value, undone: point.undone };
      this.origins.set(field, point);
      return field;
    });
  }

  dataPoints(): DataPoint[] {
    return this.fields.map((field) => ({ type: field.type, value: field.value, undone: field.undone }));
  }

  encode(): string {
    return encodeData(this.dataPoints(), this.currentBoard);
  }

  toRow(): RawEntry {
    return {
      match: this.match,
      team: this.team,
      name: this.name,
      startTime: this.startTime,
      board: this.currentBoard.name,
      data: this.encode(),
      comments: this.comments
    };
  }
}
