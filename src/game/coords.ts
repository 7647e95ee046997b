import type { Coord, Player } from "../types.ts";

export const BOARD_SIZE = 8;

/** "No selection". Must never be used to index the board. */
export const UNDEFINED_COORD: Coord = Object.freeze({ row: -1, col: -1 });

export function inBounds(r: number, c: number): boolean {
  return Number.isInteger(r) && Number.isInteger(c) && r >= 0 && r < BOARD_SIZE && c >= 0 && c < BOARD_SIZE;
}

export function isValidCoord(coord: Coord): boolean {
  return inBounds(coord.row, coord.col);
}

export function isUndefinedCoord(coord: Coord): boolean {
  return coord.row === UNDEFINED_COORD.row && coord.col === UNDEFINED_COORD.col;
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}

export function containsCoord(list: readonly Coord[], coord: Coord): boolean {
  return list.some((c) => sameCoord(c, coord));
}

/** 180° rotation. Invalid coordinates are returned unchanged. */
export function flipCoord(coord: Coord): Coord {
  if (!isValidCoord(coord)) return coord;
  return { row: BOARD_SIZE - 1 - coord.row, col: BOARD_SIZE - 1 - coord.col };
}

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}

/** Row index the player's pieces start on (king row). */
export function homeRow(player: Player): number {
  return player === "W" ? 7 : 0;
}

export function pawnDir(player: Player): number {
  // White starts on row 6/7 and moves upward (toward row 0).
  return player === "W" ? -1 : 1;
}

export function pawnStartRow(player: Player): number {
  return player === "W" ? 6 : 1;
}

export function pawnPromotionRow(player: Player): number {
  return player === "W" ? 0 : 7;
}

const SQUARE_RE = /^(?<file>[a-h])(?<rank>[1-8])$/;

/** `{ row: 6, col: 4 }` -> `"e2"`. Returns "-" for invalid coordinates. */
export function coordToSquare(coord: Coord): string {
  if (!isValidCoord(coord)) return "-";
  const file = String.fromCharCode("a".charCodeAt(0) + coord.col);
  // Rows are addressed top-to-bottom (row 0 at the top). Ranks count bottom-to-top.
  return `${file}${BOARD_SIZE - coord.row}`;
}

export function squareToCoord(square: string): Coord | null {
  const match = SQUARE_RE.exec(square.trim().toLowerCase());
  if (!match || !match.groups) return null;
  const col = match.groups.file.charCodeAt(0) - "a".charCodeAt(0);
  const row = BOARD_SIZE - Number(match.groups.rank);
  return { row, col };
}
