import { describe, it, expect } from "vitest";
import type { Coord } from "../types.ts";
import { createInitialBoard } from "../game/board.ts";
import { squareToCoord, coordToSquare } from "../game/coords.ts";
import { executeMove } from "../game/applyMove.ts";
import { endTurn } from "../game/endTurn.ts";
import { legalMoves } from "../game/legalMoves.ts";
import { createSessionFromBoard, type GameSession } from "../game/state.ts";
import {
  FenParseError,
  START_FEN,
  coordsToUci,
  createSessionFromFen,
  parseFen,
  sessionToFen,
  uciMoveToFromTo,
} from "./fen.ts";

function at(square: string): Coord {
  const c = squareToCoord(square);
  if (!c) throw new Error(`bad square ${square}`);
  return c;
}

function playTurns(session: GameSession, ...moves: Array<[string, string]>): void {
  for (const [from, to] of moves) {
    if (!executeMove(session, at(from), at(to))) throw new Error(`cannot play ${from}${to}`);
    endTurn(session);
  }
}

function fenError(fen: string): FenParseError {
  try {
    parseFen(fen);
  } catch (err) {
    if (err instanceof FenParseError) return err;
    throw err;
  }
  throw new Error("expected a FenParseError");
}

describe("sessionToFen", () => {
  it("writes the start position", () => {
    expect(sessionToFen(createSessionFromBoard(createInitialBoard(), "W"))).toBe(START_FEN);
  });

  it("writes the en passant square after every double step", () => {
    const session = createSessionFromBoard(createInitialBoard(), "W");
    playTurns(session, ["e2", "e4"]);
    expect(sessionToFen(session)).toBe("rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1");

    playTurns(session, ["c7", "c5"], ["g1", "f3"]);
    expect(sessionToFen(session)).toBe("rnbqkbnr/pp1ppppp/8/2p5/4P3/5N2/PPPP1PPP/RNBQKBNR b KQkq - 1 2");
  });

  it("drops castling rights once the kings have moved", () => {
    const session = createSessionFromFen("r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1");
    playTurns(session, ["e1", "f1"], ["e8", "f8"]);
    expect(sessionToFen(session)).toBe("r4k1r/8/8/8/8/8/8/R4K1R w - - 2 2");
  });

  it("counts full moves from a Black-to-move start", () => {
    const session = createSessionFromFen("4k3/4p3/8/8/8/8/8/4K3 b - - 0 7");
    playTurns(session, ["e7", "e6"]);
    expect(sessionToFen(session)).toBe("4k3/8/4p3/8/8/8/8/4K3 w - - 0 8");
  });
});

describe("parseFen", () => {
  it("reads every field", () => {
    expect(parseFen("r3k2r/8/8/8/8/8/8/R3K2R b Kq - 5 12")).toMatchObject({
      toMove: "B",
      castlingRights: { W: { kingSide: true, queenSide: false }, B: { kingSide: false, queenSide: true } },
      enPassant: null,
      halfmoveClock: 5,
      fullmove: 12,
    });
  });

  it("defaults the counters when they are left out", () => {
    const setup = parseFen("4k3/8/8/8/8/8/8/4K3 w - -");
    expect(setup).toMatchObject({ toMove: "W", halfmoveClock: 0, fullmove: 1 });
  });

  it("round-trips positions", () => {
    for (const fen of [
      START_FEN,
      "r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1",
      "rnbqkbnr/ppp1pppp/8/3pP3/8/8/PPPP1PPP/RNBQKBNR w KQkq d6 0 3",
    ]) {
      expect(sessionToFen(createSessionFromFen(fen))).toBe(fen);
    }
  });

  it("allows the en passant capture it grants", () => {
    const session = createSessionFromFen("rnbqkbnr/ppp1pppp/8/3pP3/8/8/PPPP1PPP/RNBQKBNR w KQkq d6 0 3");
    expect(legalMoves(session, at("e5")).map(coordToSquare).sort()).toEqual(["d6", "e6"]);
  });

  it("evaluates the game state of the position", () => {
    expect(createSessionFromFen("k7/8/1Q6/8/8/8/8/7K b - - 0 1").gameState).toBe("draw");
  });

  it("rejects malformed positions", () => {
    expect(fenError("8/8/8 w - - 0 1").reason).toBe("expected 8 ranks, got 3");
    expect(fenError("8/8/8/8/8/8/8/8 w - - 0 1").reason).toBe("White must have exactly one king");
    expect(fenError("4k3/8/8/8/8/8/8/4K3 x - - 0 1").reason).toBe('side to move must be "w" or "b"');
    expect(fenError("4k3/8/8/8/8/8/8/4K3 w KX - 0 1").reason).toBe('bad castling field "KX"');
    expect(fenError("4k3/8/8/8/8/8/8/4K3 w - e3 0 1").reason).toBe('bad en passant square "e3"');
    expect(fenError("4k3/8/8/8/8/8/8/4K3 w - - -1 1").reason).toBe("halfmove clock must be a non-negative integer");
    expect(fenError("4k3/8/8/8/8/8/8/4K3 w - - 0 0").reason).toBe("fullmove number must be at least 1");
    expect(fenError("4k3/8/8/8/8/8/8/4K3").reason).toBe("expected 6 fields, got 1");
    expect(fenError("8/8/8 w - - 0 1").message).toBe('Invalid FEN "8/8/8 w - - 0 1": expected 8 ranks, got 3');
  });
});

describe("UCI move text", () => {
  it("parses squares and promotion letters", () => {
    expect(uciMoveToFromTo("e2e4")).toEqual({ from: at("e2"), to: at("e4") });
    expect(uciMoveToFromTo("e7e8q")).toEqual({ from: at("e7"), to: at("e8"), promotion: "Q" });
    expect(() => uciMoveToFromTo("e2e9")).toThrow("Invalid UCI move: e2e9");
  });

  it("writes moves", () => {
    expect(coordsToUci(at("g1"), at("f3"))).toBe("g1f3");
    expect(coordsToUci(at("a2"), at("a1"), "N")).toBe("a2a1n");
  });
});
