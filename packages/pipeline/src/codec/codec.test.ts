import { describe, expect, it } from "vitest";
import { DecodeError, EncodeError } from "../errors.js";
import { createTestRegistry } from "../testing/boards.js";
import { decodeData, encodeData, type DataPoint } from "./codec.js";

const comp = createTestRegistry().getBoardByName("Comp");

describe("encodeData", () => {
  it("packs field index, undone flag and value into four hex digits per point", () => {
    const points: DataPoint[] = [
      { type: "Auto line", value: 1, undone: false },
      { type: "Tele intake", value: 66, undone: false },
      { type: "Driver skill", value: 3, undone: true }
    ];

    expect(encodeData(points, comp)).toBe("000102420503");
  });

  it("encodes an empty point list as an empty token", () => {
    expect(encodeData([], comp)).toBe("");
  });

  it("rejects field types the board does not declare", () => {
    expect(() => encodeData([{ type: "Climb", value: 1, undone: false }], comp)).toThrow(EncodeError);
  });

  it("rejects values outside the field's range", () => {
    expect(() => encodeData([{ type: "Driver skill", value: 5, undone: false }], comp)).toThrow(EncodeError);
    expect(() => encodeData([{ type: "Tele intake", value: 1.5, undone: false }], comp)).toThrow(EncodeError);
    expect(() => encodeData([{ type: "Tele intake", value: -1, undone: false }], comp)).toThrow(EncodeError);
  });
});

describe("decodeData", () => {
  it("restores the points written by encodeData", () => {
    const points: DataPoint[] = [
      { type: "Tele intake", value: 255, undone: true },
      { type: "Auto line", value: 0, undone: false },
      { type: "Tele intake", value: 84, undone: false }
    ];

    expect(decodeData(encodeData(points, comp), comp)).toEqual(points);
  });

  it("accepts upper-case hex and re-encodes it in lower case", () => {
    const points = decodeData("022A", comp);

    expect(points).toEqual([{ type: "Tele intake", value: 42, undone: false }]);
    expect(encodeData(points, comp)).toBe("022a");
  });

  it("decodes an empty token to no points", () => {
    expect(decodeData("", comp)).toEqual([]);
  });

  it("fails on a token whose length is not a whole number of words", () => {
    expect(() => decodeData("abc", comp)).toThrow(DecodeError);
  });

  it("fails on non-hex words and reports their offset", () => {
    try {
      decodeData("0001zz01", comp);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError);
      expect(error instanceof DecodeError ? error.offset : null).toBe(4);
    }
  });

  it("fails on a field index outside the board", () => {
    expect(() => decodeData("00010c00", comp)).toThrow(/names field 6, board "Comp" has 3/);
  });

  it("fails on a value above the field's maximum", () => {
    expect(() => decodeData("00ff", comp)).toThrow(/exceeds 1 for field "Auto line"/);
  });
});
