export type Player = "W" | "B";
export type PieceKind = "P" | "N" | "B" | "R" | "Q" | "K";

export interface Piece { owner: Player; kind: PieceKind; }

/** Board cell address. Row 0 is rank 8, col 0 is the a-file. */
export interface Coord { row: number; col: number; }

export type PromotionKind = "Q" | "R" | "B" | "N";
