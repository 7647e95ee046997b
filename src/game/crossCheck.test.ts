import { describe, it, expect } from "vitest";
import { Chess } from "chess.js";
import { ChessGame } from "../controller/gameController.ts";
import { coordToSquare } from "./coords.ts";
import { allLegalMoves } from "./legalMoves.ts";
import { sessionToFen } from "../bot/fen.ts";

function ourMoves(game: ChessGame): string[] {
  const session = game.getSession();
  const moves = allLegalMoves(session, session.toMove).map((m) => `${coordToSquare(m.from)}${coordToSquare(m.to)}`);
  return [...new Set(moves)].sort();
}

function referenceMoves(chess: Chess): string[] {
  return [...new Set(chess.moves({ verbose: true }).map((m) => `${m.from}${m.to}`))].sort();
}

function firstFields(fen: string): string {
  return fen.split(" ").slice(0, 3).join(" ");
}

/** Play `line` on both engines and compare after every ply. */
function replay(line: string[]): { game: ChessGame; chess: Chess } {
  const game = new ChessGame();
  const chess = new Chess();
  expect(ourMoves(game)).toEqual(referenceMoves(chess));

  for (const uci of line) {
    expect(game.applyUciMove(uci), uci).not.toBeNull();
    chess.move({ from: uci.slice(0, 2), to: uci.slice(2, 4), ...(uci.length === 5 ? { promotion: uci[4] } : {}) });

    expect(firstFields(sessionToFen(game.getSession())), uci).toBe(firstFields(chess.fen()));
    expect(ourMoves(game), uci).toEqual(referenceMoves(chess));
    expect(game.isInCheck(), uci).toBe(chess.inCheck());
  }
  return { game, chess };
}

describe("agreement with chess.js", () => {
  it("follows an opening with castling", () => {
    replay(["e2e4", "e7e5", "g1f3", "b8c6", "f1b5", "a7a6", "b5c6", "d7c6", "e1g1", "f7f6"]);
  });

  it("follows an en passant capture", () => {
    replay(["e2e4", "a7a6", "e4e5", "d7d5", "e5d6", "c7d6"]);
  });

  it("follows a capture-promotion", () => {
    replay(["a2a4", "b7b5", "a4b5", "a7a6", "b5a6", "c8b7", "a6b7", "b8c6", "b7a8q"]);
  });

  it("follows queen-side castling on both sides", () => {
    replay(["d2d4", "d7d5", "c1f4", "c8f5", "b1c3", "b8c6", "d1d2", "d8d7", "e1c1", "e8c8", "c3b5", "f5c2"]);
  });

  it("agrees on checkmate", () => {
    const { game, chess } = replay(["e2e4", "f7f6", "d2d4", "g7g5", "d1h5"]);
    expect(game.getState()).toBe("checkmate");
    expect(chess.isCheckmate()).toBe(true);
  });
});
