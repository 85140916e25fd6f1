export class CodecError extends Error {
  constructor(
    message: string,
    readonly offset: number | null
  ) {
    super(message);
    this.name = "CodecError";
  }
}

export class DecodeError extends CodecError {
  constructor(message: string, offset: number | null = null) {
    super(message, offset);
    this.name = "DecodeError";
  }
}

export class EncodeError extends CodecError {
  constructor(message: string, offset: number | null = null) {
    super(message, offset);
    this.name = "EncodeError";
  }
}

export class UnknownBoardError extends Error {
  constructor(readonly board: number | string) {
    super(
      typeof board === "number"
        ? `Unknown board id ${board} (0x${board.toString(16).padStart(8, "0")})`
        : `Unknown board "${board}"`
    );
    this.name = "UnknownBoardError";
  }
}

export class IdentityNotFoundError extends Error {
  constructor(readonly id: number) {
    super(`No edited entry with id ${id}`);
    this.name = "IdentityNotFoundError";
  }
}

export class InvalidEntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEntryError";
  }
}
