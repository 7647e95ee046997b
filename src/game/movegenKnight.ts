import type { Coord, Player } from "../types.ts";
import type { Board } from "./board.ts";
import { getPiece } from "./board.ts";
import { inBounds } from "./coords.ts";

const JUMPS = [
  { dr: -2, dc: -1 },
  { dr: -2, dc: 1 },
  { dr: -1, dc: -2 },
  { dr: -1, dc: 2 },
  { dr: 1, dc: -2 },
  { dr: 1, dc: 2 },
  { dr: 2, dc: -1 },
  { dr: 2, dc: 1 },
] as const;

export function knightTargets(board: Board, from: Coord, owner: Player, allowAllyTargets: boolean): Coord[] {
  const out: Coord[] = [];
  for (const j of JUMPS) {
    const r = from.row + j.dr;
    const c = from.col + j.dc;
    if (!inBounds(r, c)) continue;
    const to = { row: r, col: c };
    const occupant = getPiece(board, to);
    if (occupant && occupant.owner === owner && !allowAllyTargets) continue;
    out.push(to);
  }
  return out;
}
