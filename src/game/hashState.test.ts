import { describe, it, expect } from "vitest";
import { boardFromRows, createEmptyBoard, createInitialBoard } from "./board.ts";
import { hashBoard } from "./hashState.ts";

describe("hashBoard", () => {
  it("writes the piece placement field", () => {
    expect(hashBoard(createInitialBoard())).toBe("rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR");
    expect(hashBoard(createEmptyBoard())).toBe("8/8/8/8/8/8/8/8");
    expect(
      hashBoard(boardFromRows(["r...k..r", "........", "........", "...pP...", "........", "........", "........", "R...K..R"])),
    ).toBe("r3k2r/8/8/3pP3/8/8/8/R3K2R");
  });
});
