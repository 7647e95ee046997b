import type { Coord, Player } from "../types.ts";
import type { PositionContext } from "./state.ts";
import { getPiece } from "./board.ts";
import { inBounds, opponentOf, pawnDir, pawnStartRow } from "./coords.ts";

export interface EnPassantOpportunity {
  /** The empty square the capturing pawn lands on. */
  target: Coord;
  /** The enemy pawn that is removed. */
  victim: Coord;
}

/**
 * En passant is available against `capturer` when the previous move was an
 * enemy pawn double step (or, before any move, when the set-up position
 * granted a target square).
 */
export function enPassantOpportunity(ctx: PositionContext, capturer: Player): EnPassantOpportunity | null {
  const last = ctx.moveHistory[ctx.moveHistory.length - 1];
  if (last) {
    if (last.kind !== "P" || last.owner === capturer) return null;
    if (last.from.col !== last.to.col || Math.abs(last.to.row - last.from.row) !== 2) return null;
    return {
      target: { row: (last.from.row + last.to.row) / 2, col: last.to.col },
      victim: { ...last.to },
    };
  }

  const target = ctx.initialEnPassant;
  if (!target) return null;
  const victim = { row: target.row - pawnDir(capturer), col: target.col };
  const pawn = getPiece(ctx.board, victim);
  if (!pawn || pawn.kind !== "P" || pawn.owner !== opponentOf(capturer)) return null;
  return { target: { ...target }, victim };
}

/** Squares a pawn on `from` attacks, whatever occupies them. */
export function pawnAttackSquares(from: Coord, owner: Player): Coord[] {
  const out: Coord[] = [];
  const r = from.row + pawnDir(owner);
  for (const dc of [-1, 1]) {
    const c = from.col + dc;
    if (inBounds(r, c)) out.push({ row: r, col: c });
  }
  return out;
}

/**
 * With `allowAllyTargets` set only the two attacked diagonals are returned:
 * forward pushes never attack anything.
 */
export function pawnTargets(ctx: PositionContext, from: Coord, owner: Player, allowAllyTargets: boolean): Coord[] {
  if (allowAllyTargets) return pawnAttackSquares(from, owner);

  const { board } = ctx;
  const out: Coord[] = [];
  const dr = pawnDir(owner);

  // Forward 1
  const one = { row: from.row + dr, col: from.col };
  if (inBounds(one.row, one.col) && !getPiece(board, one)) {
    out.push(one);

    // Forward 2 from start
    const two = { row: from.row + 2 * dr, col: from.col };
    if (from.row === pawnStartRow(owner) && inBounds(two.row, two.col) && !getPiece(board, two)) {
      out.push(two);
    }
  }

  // Captures
  for (const to of pawnAttackSquares(from, owner)) {
    const occupant = getPiece(board, to);
    if (occupant && occupant.owner !== owner) out.push(to);
  }

  // En passant
  const ep = enPassantOpportunity(ctx, owner);
  if (ep && ep.victim.row === from.row && Math.abs(ep.victim.col - from.col) === 1 && !getPiece(board, ep.target)) {
    out.push(ep.target);
  }

  return out;
}
