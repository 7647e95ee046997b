import { describe, it, expect } from "vitest";
import type { Coord } from "../types.ts";
import { boardFromRows, createInitialBoard, getPiece } from "./board.ts";
import { coordToSquare, squareToCoord } from "./coords.ts";
import { pseudoLegalMoves, protectedSquares } from "./movegen.ts";
import { createSessionFromBoard, type GameSession } from "./state.ts";

function at(square: string): Coord {
  const c = squareToCoord(square);
  if (!c) throw new Error(`bad square ${square}`);
  return c;
}

function names(coords: Coord[]): string[] {
  return coords.map(coordToSquare).sort();
}

function pseudo(session: GameSession, square: string): string[] {
  const from = at(square);
  const piece = getPiece(session.board, from);
  if (!piece) throw new Error(`no piece on ${square}`);
  return names(pseudoLegalMoves(session, from, piece, { allowAllyTargets: false }));
}

function guarded(session: GameSession, square: string): string[] {
  return names(protectedSquares(session, at(square)));
}

const initial = () => createSessionFromBoard(createInitialBoard(), "W");

describe("pseudo-legal moves", () => {
  it("slides a rook across an open board", () => {
    const session = createSessionFromBoard(
      boardFromRows([
        "k.......",
        "........",
        "........",
        "........",
        "...R....",
        "........",
        "........",
        ".......K",
      ]),
      "W",
    );
    expect(pseudo(session, "d4")).toEqual(
      ["a4", "b4", "c4", "d1", "d2", "d3", "d5", "d6", "d7", "d8", "e4", "f4", "g4", "h4"],
    );
  });

  it("stops sliders at the first piece, capturing only enemies", () => {
    const session = createSessionFromBoard(
      boardFromRows([
        ".......k",
        "........",
        "........",
        "........",
        "........",
        "P.......",
        ".......K",
        "R..n....",
      ]),
      "W",
    );
    expect(pseudo(session, "a1")).toEqual(["a2", "b1", "c1", "d1"]);
    expect(guarded(session, "a1")).toEqual(["a2", "a3", "b1", "c1", "d1"]);
  });

  it("blocks bishops and queens behind their own pawns", () => {
    const session = initial();
    expect(pseudo(session, "c1")).toEqual([]);
    expect(guarded(session, "c1")).toEqual(["b2", "d2"]);
    expect(pseudo(session, "d1")).toEqual([]);
    expect(guarded(session, "d1")).toEqual(["c1", "c2", "d2", "e1", "e2"]);
  });

  it("jumps knights over pieces", () => {
    const session = initial();
    expect(pseudo(session, "b1")).toEqual(["a3", "c3"]);
    expect(guarded(session, "b1")).toEqual(["a3", "c3", "d2"]);
  });

  it("limits a cornered knight to two squares", () => {
    const session = createSessionFromBoard(
      boardFromRows([
        "N.......",
        "........",
        "........",
        "........",
        "........",
        "........",
        "........",
        "k.....K.",
      ]),
      "W",
    );
    expect(pseudo(session, "a8")).toEqual(["b6", "c7"]);
  });

  it("pushes pawns one or two squares from the start row", () => {
    const session = initial();
    expect(pseudo(session, "e2")).toEqual(["e3", "e4"]);
    expect(pseudo(session, "d7")).toEqual(["d5", "d6"]);
    expect(guarded(session, "e2")).toEqual(["d3", "f3"]);
    expect(guarded(session, "a2")).toEqual(["b3"]);
  });

  it("stops pawns at blockers and captures diagonally", () => {
    const blockedAtOne = createSessionFromBoard(
      boardFromRows([
        "....k...",
        "........",
        "........",
        "........",
        "........",
        "....n...",
        "....P...",
        "....K...",
      ]),
      "W",
    );
    expect(pseudo(blockedAtOne, "e2")).toEqual([]);

    const blockedAtTwo = createSessionFromBoard(
      boardFromRows([
        "....k...",
        "........",
        "........",
        "........",
        "....n...",
        "........",
        "....P...",
        "....K...",
      ]),
      "W",
    );
    expect(pseudo(blockedAtTwo, "e2")).toEqual(["e3"]);

    const captures = createSessionFromBoard(
      boardFromRows([
        "....k...",
        "........",
        "........",
        "...ppp..",
        "....P...",
        "........",
        "........",
        "....K...",
      ]),
      "W",
    );
    expect(pseudo(captures, "e4")).toEqual(["d5", "f5"]);
  });

  it("steps the king one square in every direction", () => {
    const session = createSessionFromBoard(
      boardFromRows([
        "k.......",
        "........",
        "........",
        "........",
        "........",
        "........",
        "........",
        "....K...",
      ]),
      "W",
    );
    expect(pseudo(session, "e1")).toEqual(["d1", "d2", "e2", "f1", "f2"]);
  });

  it("protects nothing from an empty square", () => {
    expect(protectedSquares(initial(), at("e4"))).toEqual([]);
  });
});
