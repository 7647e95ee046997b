import type { Board } from "./board.ts";
import { pieceToLetter } from "./board.ts";

/**
 * Piece-placement key of a board, e.g. "rnbqkbnr/pppppppp/8/...".
 * Side to move, castling and en passant are not part of it.
 */
export function hashBoard(board: Board): string {
  const ranks: string[] = [];
  for (const row of board) {
    let out = "";
    let empty = 0;
    for (const cell of row) {
      if (!cell) {
        empty++;
        continue;
      }
      if (empty > 0) out += String(empty);
      empty = 0;
      out += pieceToLetter(cell);
    }
    if (empty > 0) out += String(empty);
    ranks.push(out);
  }
  return ranks.join("/");
}
