import type { Coord, Player } from "../types.ts";
import type { Board } from "./board.ts";
import { getPiece } from "./board.ts";
import { inBounds } from "./coords.ts";

export type Direction = { dr: number; dc: number };

export const DIAGONALS: ReadonlyArray<Direction> = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: 1 },
  { dr: 1, dc: -1 },
  { dr: 1, dc: 1 },
];

export const ORTHOGONALS: ReadonlyArray<Direction> = [
  { dr: -1, dc: 0 },
  { dr: 1, dc: 0 },
  { dr: 0, dc: -1 },
  { dr: 0, dc: 1 },
];

export const ALL_DIRECTIONS: ReadonlyArray<Direction> = [...DIAGONALS, ...ORTHOGONALS];

/**
 * Walk each ray until the edge or the first occupied cell. An enemy blocker is
 * included; an ally blocker only when `allowAllyTargets` is set, since a
 * defended piece still counts as an attacked square.
 */
export function slidingTargets(
  board: Board,
  from: Coord,
  owner: Player,
  dirs: ReadonlyArray<Direction>,
  allowAllyTargets: boolean,
): Coord[] {
  const out: Coord[] = [];

  for (const { dr, dc } of dirs) {
    let r = from.row + dr;
    let c = from.col + dc;
    while (inBounds(r, c)) {
      const to = { row: r, col: c };
      const occupant = getPiece(board, to);
      if (!occupant) {
        out.push(to);
      } else {
        if (occupant.owner !== owner || allowAllyTargets) out.push(to);
        break;
      }
      r += dr;
      c += dc;
    }
  }

  return out;
}

export function bishopTargets(board: Board, from: Coord, owner: Player, allowAllyTargets: boolean): Coord[] {
  return slidingTargets(board, from, owner, DIAGONALS, allowAllyTargets);
}

export function rookTargets(board: Board, from: Coord, owner: Player, allowAllyTargets: boolean): Coord[] {
  return slidingTargets(board, from, owner, ORTHOGONALS, allowAllyTargets);
}

export function queenTargets(board: Board, from: Coord, owner: Player, allowAllyTargets: boolean): Coord[] {
  return slidingTargets(board, from, owner, ALL_DIRECTIONS, allowAllyTargets);
}
