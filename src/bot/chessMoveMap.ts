import type { PositionContext } from "../game/state.ts";
import type { Player } from "../types.ts";
import type { WireMove } from "../shared/moveToken.ts";
import { getPiece } from "../game/board.ts";
import { containsCoord, pawnPromotionRow } from "../game/coords.ts";
import { legalMoves } from "../game/legalMoves.ts";
import { uciMoveToFromTo } from "./fen.ts";

/**
 * Map an engine reply onto a legal move for `player`, or null. Castling
 * arrives as the king's two-square step; a pawn reaching its back rank
 * must name its promotion piece.
 */
export function uciToLegalMove(ctx: PositionContext, player: Player, uci: string): WireMove | null {
  let parsed: ReturnType<typeof uciMoveToFromTo>;
  try {
    parsed = uciMoveToFromTo(uci);
  } catch {
    return null;
  }

  const piece = getPiece(ctx.board, parsed.from);
  if (!piece || piece.owner !== player) return null;
  if (!containsCoord(legalMoves(ctx, parsed.from), parsed.to)) return null;

  const promotes = piece.kind === "P" && parsed.to.row === pawnPromotionRow(player);
  if (promotes !== Boolean(parsed.promotion)) return null;
  return parsed;
}
