import type { Coord } from "../types.ts";
import type { GameSession } from "./state.ts";
import { makeMoveRecord, type MoveRecord } from "./moveTypes.ts";
import { cloneBoard, getPiece } from "./board.ts";
import { isValidCoord } from "./coords.ts";
import { movePieceOnBoard } from "./boardMove.ts";
import { sortByRank } from "./capturedPieces.ts";
import { createSessionFromSetup } from "./state.ts";
import { isPromotionPending, promotePawn } from "./promote.ts";
import { endTurn } from "./endTurn.ts";

/**
 * Apply `from -> to` to the session in place and return the appended record.
 * The executor trusts its input: legality is the caller's job. Invalid
 * coordinates or an empty origin leave the session untouched and give null.
 *
 * The turn is not switched here; see `endTurn`.
 */
export function executeMove(session: GameSession, from: Coord, to: Coord): MoveRecord | null {
  if (!isValidCoord(from) || !isValidCoord(to)) return null;
  const mover = getPiece(session.board, from);
  if (!mover) return null;

  const result = movePieceOnBoard(session.board, from, to);
  if (!result) return null;

  if (mover.kind === "P" || result.captured) {
    session.halfmoveClock = 0;
  } else {
    session.halfmoveClock += 1;
  }

  if (result.captured) {
    const taken = session.takenPieces[mover.owner];
    session.takenPieces[mover.owner] = sortByRank([...taken, result.captured]);
  }

  const record = makeMoveRecord({ kind: mover.kind, owner: mover.owner, from, to: result.landing });
  session.moveHistory.push(record);
  session.positionHistory.push(cloneBoard(session.board));
  return record;
}

/**
 * Replay the first `plies` moves of `session` onto a fresh copy of its set-up
 * position. Used for history truncation and for restoring a saved game.
 */
export function rebuildSession(session: GameSession, plies: number): GameSession {
  const next = createSessionFromSetup(session);
  const count = Math.max(0, Math.min(Math.trunc(plies), session.moveHistory.length));

  for (let i = 0; i < count; i++) {
    const m = session.moveHistory[i];
    const record = executeMove(next, m.from, m.to);
    if (!record) throw new Error(`rebuildSession: move ${i + 1} does not apply`);
    if (m.promotion) promotePawn(next, m.promotion);
    // An unresolved promotion can only be the last ply; it stays pending.
    if (isPromotionPending(next)) {
      next.gameState = "promotion";
      continue;
    }
    endTurn(next);
  }

  return next;
}
