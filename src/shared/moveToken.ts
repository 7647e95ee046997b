import type { Coord, PromotionKind } from "../types.ts";
import { isValidCoord } from "../game/coords.ts";
import { promotionKindFromLetter } from "../game/promote.ts";

/** Sent instead of a move when a player leaves the game. */
export const ENDED_TOKEN = "ended";

export type WireMove = {
  from: Coord;
  to: Coord;
  promotion?: PromotionKind;
};

export type RemoteEvent =
  | { type: "move"; move: WireMove }
  | { type: "ended" }
  | { type: "error"; token: string; reason: string };

/**
 * `from.row from.col to.row to.col` as four digits, then an optional
 * lowercase promotion letter: "6444", "1707q".
 */
export function encodeMoveToken(move: WireMove): string {
  if (!isValidCoord(move.from) || !isValidCoord(move.to)) {
    throw new Error("encodeMoveToken: coordinates must be on the board");
  }
  const digits = `${move.from.row}${move.from.col}${move.to.row}${move.to.col}`;
  return move.promotion ? `${digits}${move.promotion.toLowerCase()}` : digits;
}

const TOKEN_RE = /^([0-7])([0-7])([0-7])([0-7])([qrbn])?$/;

export function decodeMoveToken(raw: string): RemoteEvent {
  const token = raw.trim();
  if (token === ENDED_TOKEN) return { type: "ended" };

  const m = TOKEN_RE.exec(token);
  if (!m) return { type: "error", token, reason: "malformed move token" };

  const move: WireMove = {
    from: { row: Number(m[1]), col: Number(m[2]) },
    to: { row: Number(m[3]), col: Number(m[4]) },
  };
  const promotion = m[5] ? promotionKindFromLetter(m[5]) : null;
  if (promotion) move.promotion = promotion;
  return { type: "move", move };
}
