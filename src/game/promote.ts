import type { PromotionKind } from "../types.ts";
import type { GameSession } from "./state.ts";
import { makeMoveRecord } from "./moveTypes.ts";
import { cloneBoard, getPiece, setPiece } from "./board.ts";
import { pawnPromotionRow } from "./coords.ts";

export const PROMOTION_CHOICES: readonly PromotionKind[] = ["Q", "R", "B", "N"];

/** Cursor index 0..3 of the promotion picker to a piece kind. */
export function promotionKindAt(cursor: number): PromotionKind | null {
  if (!Number.isInteger(cursor)) return null;
  return PROMOTION_CHOICES[cursor] ?? null;
}

export function isPromotionLetter(letter: string): boolean {
  return letter.length === 1 && PROMOTION_CHOICES.some((k) => k === letter.toUpperCase());
}

export function promotionKindFromLetter(letter: string): PromotionKind | null {
  const upper = letter.toUpperCase();
  return PROMOTION_CHOICES.find((k) => k === upper) ?? null;
}

/** True when the last move put a pawn on its back rank and no piece has been chosen yet. */
export function isPromotionPending(session: GameSession): boolean {
  const last = session.moveHistory[session.moveHistory.length - 1];
  if (!last || last.kind !== "P" || last.promotion) return false;
  if (last.to.row !== pawnPromotionRow(last.owner)) return false;
  const piece = getPiece(session.board, last.to);
  return Boolean(piece && piece.kind === "P" && piece.owner === last.owner);
}

/**
 * Replace the pawn that just reached its back rank with `kind`, rewriting the
 * last move record and the last position snapshot. False when nothing is
 * pending.
 */
export function promotePawn(session: GameSession, kind: PromotionKind): boolean {
  if (!isPromotionPending(session)) return false;
  const last = session.moveHistory[session.moveHistory.length - 1];

  setPiece(session.board, last.to, { owner: last.owner, kind });
  session.moveHistory[session.moveHistory.length - 1] = makeMoveRecord({ ...last, promotion: kind });
  session.positionHistory[session.positionHistory.length - 1] = cloneBoard(session.board);
  return true;
}
