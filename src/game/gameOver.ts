import type { Player } from "../types.ts";
import type { GameSession, PositionContext } from "./state.ts";
import { isInCheck } from "./check.ts";
import { countLegalMoves } from "./legalMoves.ts";
import { isThreefoldRepetition } from "./repetition.ts";

/** Half-moves without a pawn move or capture before the game is drawn. */
export const FIFTY_MOVE_THRESHOLD = 50;

export type DrawReason = "stalemate" | "fifty-move" | "repetition";

export { countLegalMoves };

export function isCheckmate(ctx: PositionContext, player: Player): boolean {
  return isInCheck(ctx, player) && countLegalMoves(ctx, player) === 0;
}

export function isStalemate(ctx: PositionContext, player: Player): boolean {
  return !isInCheck(ctx, player) && countLegalMoves(ctx, player) === 0;
}

export function isFiftyMoveDraw(session: Pick<GameSession, "halfmoveClock">): boolean {
  return session.halfmoveClock >= FIFTY_MOVE_THRESHOLD;
}

/** Why the side to move is drawn, or null. Checkmate is not a draw. */
export function drawReason(session: GameSession): DrawReason | null {
  const player = session.toMove;
  const moves = countLegalMoves(session, player);
  if (moves === 0) return isInCheck(session, player) ? null : "stalemate";
  if (isFiftyMoveDraw(session)) return "fifty-move";
  if (isThreefoldRepetition(session.positionHistory)) return "repetition";
  return null;
}

/**
 * Oracle for the side to move. Checkmate wins over every draw condition.
 */
export function evaluateGameState(session: GameSession): "checkmate" | "draw" | "playing" {
  const player = session.toMove;
  const moves = countLegalMoves(session, player);
  if (moves === 0 && isInCheck(session, player)) return "checkmate";
  if (moves === 0) return "draw";
  if (isFiftyMoveDraw(session) || isThreefoldRepetition(session.positionHistory)) return "draw";
  return "playing";
}
