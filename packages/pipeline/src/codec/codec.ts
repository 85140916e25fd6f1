import type { Board } from "../boards/board-registry.js";
import { DecodeError, EncodeError } from "../errors.js";

/**
 * One recorded action. On the wire each point is a 16-bit word written as four hex digits:
 * bits 15..9 hold the field index within the board, bit 8 the undone flag, bits 7..0 the value.
 */
export interface DataPoint {
  type: string;
  value: number;
  undone: boolean;
}

const WORD_LENGTH = 4;
const WORD_REGEX = /^[0-9a-fA-F]{4}$/;
const UNDONE_BIT = 0x100;
const VALUE_MASK = 0xff;
const INDEX_SHIFT = 9;

export function decodeData(token: string, board: Board): DataPoint[] {
  if (token.length % WORD_LENGTH !== 0) {
    throw new DecodeError(
      `Data token length ${token.length} is not a multiple of ${WORD_LENGTH} (board "${board.name}")`,
      token.length - (token.length % WORD_LENGTH)
    );
  }

  const points: DataPoint[] = [];
  for (let offset = 0; offset < token.length; offset += WORD_LENGTH) {
    const word = token.slice(offset, offset + WORD_LENGTH);
    if (!WORD_REGEX.test(word)) {
      throw new DecodeError(`Data word "${word}" at offset ${offset} is not hex`, offset);
    }

    const bits = Number.parseInt(word, 16);
    const fieldIndex = bits >> INDEX_SHIFT;
    const field = board.fields[fieldIndex];
    if (!field) {
      throw new DecodeError(
        `Data word "${word}" at offset ${offset} names field ${fieldIndex}, board "${board.name}" has ${board.fields.length}`,
        offset
      );
    }

    const value = bits & VALUE_MASK;
    if (value > field.max) {
      throw new DecodeError(
        `Value ${value} at offset ${offset} exceeds ${field.max} for field "${field.name}"`,
        offset
      );
    }

    points.push({ type: field.name, value, undone: (bits & UNDONE_BIT) !== 0 });
  }

  return points;
}

export function encodeData(points: readonly DataPoint[], board: Board): string {
  return points
    .map((point, position) => {
      const offset = position * WORD_LENGTH;
      const field = board.fieldByName.get(point.type);
      if (!field) {
        throw new EncodeError(`Field type "${point.type}" is not on board "${board.name}"`, offset);
      }
      if (!Number.isInteger(point.value) || point.value < 0 || point.value > field.max) {
        throw new EncodeError(`Value ${point.value} for field "${field.name}" must be an integer in 0..${field.max}`, offset);
      }

      const bits = (field.index << INDEX_SHIFT) | (point.undone ? UNDONE_BIT : 0) | point.value;
      return bits.toString(16).padStart(WORD_LENGTH, "0");
    })
    .join("");
}
