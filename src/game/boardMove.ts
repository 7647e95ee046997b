import type { Coord, Piece } from "../types.ts";
import type { Board } from "./board.ts";
import { clearCell, getPiece, setPiece } from "./board.ts";
import { isValidCoord } from "./coords.ts";
import { castleGeometry, type CastleSide } from "./movegenKing.ts";

export type BoardMoveShape = "normal" | "enPassant" | "castle";

export interface BoardMoveResult {
  moved: Piece;
  /** Where the moving piece ended up (castling is normalised to the g/c file). */
  landing: Coord;
  captured: Piece | null;
  capturedAt: Coord | null;
  shape: BoardMoveShape;
  castleSide?: CastleSide;
}

export function isEnPassantShape(board: Board, from: Coord, to: Coord): boolean {
  const piece = getPiece(board, from);
  if (!piece || piece.kind !== "P") return false;
  // Diagonal onto an empty cell.
  return from.row !== to.row && from.col !== to.col && getPiece(board, to) === null;
}

export function isCastlingShape(board: Board, from: Coord, to: Coord): boolean {
  const piece = getPiece(board, from);
  if (!piece || piece.kind !== "K") return false;
  return from.row === to.row && Math.abs(to.col - from.col) >= 2;
}

/**
 * Apply the board part of a move in place: captures, en passant removal and
 * castling rook relocation. Castling accepts both the king's landing square
 * and the rook's corner square as `to`.
 * Returns null when either coordinate is off board or `from` is empty.
 */
export function movePieceOnBoard(board: Board, from: Coord, to: Coord): BoardMoveResult | null {
  if (!isValidCoord(from) || !isValidCoord(to)) return null;
  const moved = getPiece(board, from);
  if (!moved) return null;

  if (isCastlingShape(board, from, to)) {
    const side: CastleSide = to.col > from.col ? "kingSide" : "queenSide";
    const g = castleGeometry(side);
    const corner = { row: from.row, col: g.rookCol };
    const rook = getPiece(board, corner);
    const kingTo = { row: from.row, col: g.kingToCol };

    clearCell(board, from);
    if (rook && rook.owner === moved.owner && rook.kind === "R") {
      clearCell(board, corner);
      setPiece(board, { row: from.row, col: g.rookToCol }, rook);
    }
    setPiece(board, kingTo, moved);

    return { moved, landing: kingTo, captured: null, capturedAt: null, shape: "castle", castleSide: side };
  }

  if (isEnPassantShape(board, from, to)) {
    // The passed pawn sits beside the mover, directly behind the destination.
    const behind = { row: from.row, col: to.col };
    const victim = getPiece(board, behind);
    const captured = victim && victim.owner !== moved.owner ? victim : null;
    if (captured) clearCell(board, behind);
    clearCell(board, from);
    setPiece(board, to, moved);
    return { moved, landing: { ...to }, captured, capturedAt: captured ? behind : null, shape: "enPassant" };
  }

  const target = getPiece(board, to);
  const captured = target && target.owner !== moved.owner ? target : null;
  clearCell(board, from);
  setPiece(board, to, moved);
  return { moved, landing: { ...to }, captured, capturedAt: captured ? { ...to } : null, shape: "normal" };
}
