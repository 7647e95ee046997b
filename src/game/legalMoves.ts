import type { Coord, Player } from "../types.ts";
import type { PositionContext } from "./state.ts";
import { getPiece, piecesOf } from "./board.ts";
import { opponentOf } from "./coords.ts";
import { pseudoLegalMoves } from "./movegen.ts";
import { castlingTargets } from "./movegenKing.ts";
import { attackedSquareSet, leavesKingInCheck, squareKey } from "./check.ts";

/**
 * Player-facing destinations for the piece on `from`: no ally-occupied squares,
 * no king steps onto attacked squares, castling included, and nothing that
 * leaves the mover's own king in check.
 */
export function legalMoves(ctx: PositionContext, from: Coord): Coord[] {
  const piece = getPiece(ctx.board, from);
  if (!piece) return [];

  let candidates = pseudoLegalMoves(ctx, from, piece, { allowAllyTargets: false });

  if (piece.kind === "K") {
    const attacked = attackedSquareSet(ctx, opponentOf(piece.owner));
    candidates = candidates.filter((sq) => !attacked.has(squareKey(sq)));
    candidates.push(...castlingTargets(ctx, from, piece.owner, (sq) => attacked.has(squareKey(sq))));
  }

  return candidates.filter((to) => !leavesKingInCheck(ctx, from, to));
}

export interface LegalMove {
  from: Coord;
  to: Coord;
}

export function allLegalMoves(ctx: PositionContext, player: Player): LegalMove[] {
  const out: LegalMove[] = [];
  for (const { coord } of piecesOf(ctx.board, player)) {
    for (const to of legalMoves(ctx, coord)) out.push({ from: coord, to });
  }
  return out;
}

export function countLegalMoves(ctx: PositionContext, player: Player): number {
  let n = 0;
  for (const { coord } of piecesOf(ctx.board, player)) n += legalMoves(ctx, coord).length;
  return n;
}
