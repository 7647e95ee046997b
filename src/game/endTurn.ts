import type { GameSession } from "./state.ts";
import { opponentOf } from "./coords.ts";
import { evaluateGameState } from "./gameOver.ts";

/**
 * End a turn: flip `toMove` and re-run the oracle for the side now to move.
 */
export function endTurn(session: GameSession): GameSession {
  session.toMove = opponentOf(session.toMove);
  session.gameState = evaluateGameState(session);
  return session;
}
