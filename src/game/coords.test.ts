import { describe, it, expect } from "vitest";
import {
  UNDEFINED_COORD,
  coordToSquare,
  flipCoord,
  homeRow,
  inBounds,
  isUndefinedCoord,
  isValidCoord,
  pawnDir,
  pawnPromotionRow,
  pawnStartRow,
  squareToCoord,
} from "./coords.ts";

describe("coords", () => {
  it("accepts only integer cells on the 8x8 board", () => {
    expect(inBounds(0, 0)).toBe(true);
    expect(inBounds(7, 7)).toBe(true);
    expect(inBounds(8, 0)).toBe(false);
    expect(inBounds(-1, 3)).toBe(false);
    expect(inBounds(1.5, 2)).toBe(false);
  });

  it("treats the undefined coordinate as invalid", () => {
    expect(isValidCoord(UNDEFINED_COORD)).toBe(false);
    expect(isUndefinedCoord(UNDEFINED_COORD)).toBe(true);
    expect(isUndefinedCoord({ row: 0, col: 0 })).toBe(false);
  });

  it("flips by 180 degrees and leaves invalid coordinates alone", () => {
    expect(flipCoord({ row: 0, col: 0 })).toEqual({ row: 7, col: 7 });
    expect(flipCoord({ row: 6, col: 4 })).toEqual({ row: 1, col: 3 });
    expect(flipCoord(UNDEFINED_COORD)).toEqual({ row: -1, col: -1 });
  });

  it("converts between cells and square names", () => {
    expect(coordToSquare({ row: 6, col: 4 })).toBe("e2");
    expect(coordToSquare({ row: 0, col: 0 })).toBe("a8");
    expect(coordToSquare({ row: 7, col: 7 })).toBe("h1");
    expect(coordToSquare(UNDEFINED_COORD)).toBe("-");

    expect(squareToCoord("e2")).toEqual({ row: 6, col: 4 });
    expect(squareToCoord("h8")).toEqual({ row: 0, col: 7 });
    expect(squareToCoord("E2")).toEqual({ row: 6, col: 4 });
    expect(squareToCoord("i9")).toBeNull();
    expect(squareToCoord("e")).toBeNull();
  });

  it("knows each side's home, start and promotion rows", () => {
    expect(homeRow("W")).toBe(7);
    expect(homeRow("B")).toBe(0);
    expect(pawnDir("W")).toBe(-1);
    expect(pawnDir("B")).toBe(1);
    expect(pawnStartRow("W")).toBe(6);
    expect(pawnStartRow("B")).toBe(1);
    expect(pawnPromotionRow("W")).toBe(0);
    expect(pawnPromotionRow("B")).toBe(7);
  });
});
