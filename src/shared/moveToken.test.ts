import { describe, it, expect } from "vitest";
import { decodeMoveToken, encodeMoveToken } from "./moveToken.ts";

describe("move tokens", () => {
  it("encodes rows and columns as digits", () => {
    expect(encodeMoveToken({ from: { row: 6, col: 4 }, to: { row: 4, col: 4 } })).toBe("6444");
    expect(encodeMoveToken({ from: { row: 1, col: 0 }, to: { row: 0, col: 0 }, promotion: "Q" })).toBe("1000q");
    expect(() => encodeMoveToken({ from: { row: -1, col: -1 }, to: { row: 0, col: 0 } })).toThrow();
  });

  it("decodes moves and the end marker", () => {
    expect(decodeMoveToken("6444")).toEqual({
      type: "move",
      move: { from: { row: 6, col: 4 }, to: { row: 4, col: 4 } },
    });
    expect(decodeMoveToken("1000n")).toEqual({
      type: "move",
      move: { from: { row: 1, col: 0 }, to: { row: 0, col: 0 }, promotion: "N" },
    });
    expect(decodeMoveToken(" ended\n")).toEqual({ type: "ended" });
  });

  it("reports malformed tokens", () => {
    for (const token of ["6484", "64", "6444x", "hello"]) {
      expect(decodeMoveToken(token)).toEqual({ type: "error", token, reason: "malformed move token" });
    }
  });
});
