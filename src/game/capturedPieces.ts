import type { Piece, PieceKind } from "../types.ts";

/** Display ranking only; the king sorts last. */
export const PIECE_VALUE: Record<PieceKind, number> = {
  P: 1,
  N: 3,
  B: 3,
  R: 5,
  Q: 9,
  K: 100,
};

// Knights before bishops when the values tie.
const TIE_ORDER: Record<PieceKind, number> = { P: 0, N: 1, B: 2, R: 3, Q: 4, K: 5 };

export function comparePieces(a: Piece, b: Piece): number {
  return PIECE_VALUE[a.kind] - PIECE_VALUE[b.kind] || TIE_ORDER[a.kind] - TIE_ORDER[b.kind];
}

export function sortByRank(pieces: readonly Piece[]): Piece[] {
  return [...pieces].sort(comparePieces);
}

/** Material sum of a capture list, used for the "+n" display. */
export function materialOf(pieces: readonly Piece[]): number {
  return pieces.reduce((sum, p) => sum + (p.kind === "K" ? 0 : PIECE_VALUE[p.kind]), 0);
}
