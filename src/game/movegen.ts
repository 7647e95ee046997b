import type { Coord, Piece } from "../types.ts";
import type { PositionContext } from "./state.ts";
import { getPiece } from "./board.ts";
import { pawnTargets } from "./movegenPawn.ts";
import { knightTargets } from "./movegenKnight.ts";
import { bishopTargets, queenTargets, rookTargets } from "./movegenSliders.ts";
import { kingTargets } from "./movegenKing.ts";

function assertNever(x: never): never {
  throw new Error(`Unhandled piece kind: ${String(x)}`);
}

/**
 * Destinations for `piece` on `from`, ignoring whether the mover's own king is
 * left in check. Castling is not pseudo-legal: it needs attack information and
 * is added by the legal-move filter.
 */
export function pseudoLegalMoves(
  ctx: PositionContext,
  from: Coord,
  piece: Piece,
  opts: { allowAllyTargets: boolean },
): Coord[] {
  const { board } = ctx;
  const ally = opts.allowAllyTargets;
  switch (piece.kind) {
    case "P":
      return pawnTargets(ctx, from, piece.owner, ally);
    case "N":
      return knightTargets(board, from, piece.owner, ally);
    case "B":
      return bishopTargets(board, from, piece.owner, ally);
    case "R":
      return rookTargets(board, from, piece.owner, ally);
    case "Q":
      return queenTargets(board, from, piece.owner, ally);
    case "K":
      return kingTargets(ctx, from, piece.owner, ally);
    default:
      return assertNever(piece.kind);
  }
}

/** Squares the piece on `from` attacks or defends. Empty for an empty cell. */
export function protectedSquares(ctx: PositionContext, from: Coord): Coord[] {
  const piece = getPiece(ctx.board, from);
  if (!piece) return [];
  return pseudoLegalMoves(ctx, from, piece, { allowAllyTargets: true });
}
