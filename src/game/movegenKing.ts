import type { Coord, PieceKind, Player } from "../types.ts";
import type { MoveRecord } from "./moveTypes.ts";
import type { PositionContext } from "./state.ts";
import { getPiece } from "./board.ts";
import { homeRow, inBounds, sameCoord } from "./coords.ts";

export type CastleSide = "kingSide" | "queenSide";

export const KING_HOME_COL = 4;

const CASTLE_GEOMETRY: Record<CastleSide, {
  rookCol: number;
  kingToCol: number;
  rookToCol: number;
  /** Strictly between king and rook; must be empty. */
  betweenCols: number[];
  /** Squares the king crosses or lands on; must not be attacked. */
  passCols: number[];
}> = {
  kingSide: { rookCol: 7, kingToCol: 6, rookToCol: 5, betweenCols: [5, 6], passCols: [5, 6] },
  queenSide: { rookCol: 0, kingToCol: 2, rookToCol: 3, betweenCols: [1, 2, 3], passCols: [3, 2] },
};

export function castleGeometry(side: CastleSide) {
  return CASTLE_GEOMETRY[side];
}

export function kingTargets(ctx: PositionContext, from: Coord, owner: Player, allowAllyTargets: boolean): Coord[] {
  const out: Coord[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = from.row + dr;
      const c = from.col + dc;
      if (!inBounds(r, c)) continue;
      const to = { row: r, col: c };
      const occupant = getPiece(ctx.board, to);
      if (occupant && occupant.owner === owner && !allowAllyTargets) continue;
      out.push(to);
    }
  }
  return out;
}

/** True if a move of this kind and color ever left `square`. */
export function didPieceMoveFrom(history: readonly MoveRecord[], kind: PieceKind, owner: Player, square: Coord): boolean {
  return history.some((m) => m.kind === kind && m.owner === owner && sameCoord(m.from, square));
}

/**
 * Castling rights that are still intact after the moves played so far.
 * Board occupancy is checked too, so a captured rook loses its side.
 */
export function remainingCastlingRights(ctx: PositionContext, owner: Player): Record<CastleSide, boolean> {
  const row = homeRow(owner);
  const kingHome = { row, col: KING_HOME_COL };
  const king = getPiece(ctx.board, kingHome);
  const kingOk = Boolean(king && king.owner === owner && king.kind === "K")
    && !didPieceMoveFrom(ctx.moveHistory, "K", owner, kingHome);

  const sideOk = (side: CastleSide): boolean => {
    if (!kingOk || !ctx.castlingRights[owner][side]) return false;
    const corner = { row, col: CASTLE_GEOMETRY[side].rookCol };
    const rook = getPiece(ctx.board, corner);
    if (!rook || rook.owner !== owner || rook.kind !== "R") return false;
    return !didPieceMoveFrom(ctx.moveHistory, "R", owner, corner);
  };

  return { kingSide: sideOk("kingSide"), queenSide: sideOk("queenSide") };
}

/**
 * King landing squares for every castle currently allowed. `isAttacked`
 * answers whether the opponent attacks a square in the current position.
 */
export function castlingTargets(
  ctx: PositionContext,
  from: Coord,
  owner: Player,
  isAttacked: (square: Coord) => boolean,
): Coord[] {
  const row = homeRow(owner);
  if (!sameCoord(from, { row, col: KING_HOME_COL })) return [];

  const rights = remainingCastlingRights(ctx, owner);
  if (!rights.kingSide && !rights.queenSide) return [];

  // King cannot castle out of check.
  if (isAttacked(from)) return [];

  const out: Coord[] = [];
  for (const side of ["kingSide", "queenSide"] as const) {
    if (!rights[side]) continue;
    const g = CASTLE_GEOMETRY[side];
    if (g.betweenCols.some((c) => getPiece(ctx.board, { row, col: c }) !== null)) continue;
    if (g.passCols.some((c) => isAttacked({ row, col: c }))) continue;
    out.push({ row, col: g.kingToCol });
  }
  return out;
}
