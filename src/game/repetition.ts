import type { Board } from "./board.ts";
import { hashBoard } from "./hashState.ts";

export const REPETITION_LIMIT = 3;

/** How many times each layout occurs in the history. */
export function countLayouts(history: readonly Board[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const board of history) {
    const key = hashBoard(board);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Returns true if any piece layout occurs `REPETITION_LIMIT` times or more
 * in the position history.
 */
export function isThreefoldRepetition(history: readonly Board[]): boolean {
  for (const n of countLayouts(history).values()) {
    if (n >= REPETITION_LIMIT) return true;
  }
  return false;
}
