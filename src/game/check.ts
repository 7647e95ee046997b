import type { Coord, Player } from "../types.ts";
import type { PositionContext } from "./state.ts";
import { cloneBoard, findKing, getPiece, piecesOf } from "./board.ts";
import { opponentOf } from "./coords.ts";
import { protectedSquares } from "./movegen.ts";
import { movePieceOnBoard } from "./boardMove.ts";

function key(c: Coord): number {
  return c.row * 8 + c.col;
}

/** Union of the protected squares of every piece owned by `byPlayer`. */
export function attackedSquares(ctx: PositionContext, byPlayer: Player): Coord[] {
  const seen = new Set<number>();
  const out: Coord[] = [];
  for (const { coord } of piecesOf(ctx.board, byPlayer)) {
    for (const sq of protectedSquares(ctx, coord)) {
      const k = key(sq);
      if (seen.has(k)) continue;
      seen.add(k);
      out.push(sq);
    }
  }
  return out;
}

export function attackedSquareSet(ctx: PositionContext, byPlayer: Player): Set<number> {
  return new Set(attackedSquares(ctx, byPlayer).map(key));
}

export function isSquareAttacked(ctx: PositionContext, square: Coord, byPlayer: Player): boolean {
  return attackedSquareSet(ctx, byPlayer).has(key(square));
}

/** A side without a king on the board is never in check. */
export function isInCheck(ctx: PositionContext, player: Player): boolean {
  const kingSq = findKing(ctx.board, player);
  if (!kingSq) return false;
  return isSquareAttacked(ctx, kingSq, opponentOf(player));
}

/**
 * Play `from -> to` on a scratch copy of the board and test the mover's king.
 * This filter alone is what keeps pinned pieces on their pin line.
 */
export function leavesKingInCheck(ctx: PositionContext, from: Coord, to: Coord): boolean {
  const mover = getPiece(ctx.board, from);
  if (!mover) return false;
  const scratch = cloneBoard(ctx.board);
  movePieceOnBoard(scratch, from, to);
  return isInCheck({ ...ctx, board: scratch }, mover.owner);
}

export function squareKey(c: Coord): number {
  return key(c);
}
