import type { Board } from "./board.ts";
import { cloneBoard } from "./board.ts";

/**
 * Viewing cursor over a game's position history. The history itself is owned
 * by the session; this only remembers which snapshot is on screen.
 * A `null` cursor means "follow the live position".
 */
export class HistoryManager {
  private viewIndex: number | null = null;
  private readonly snapshots: () => readonly Board[];

  constructor(snapshots: () => readonly Board[]) {
    this.snapshots = snapshots;
  }

  size(): number {
    return this.snapshots().length;
  }

  isLive(): boolean {
    return this.viewIndex === null || this.viewIndex >= this.size() - 1;
  }

  /** Index of the snapshot being viewed. */
  getCurrentIndex(): number {
    const last = this.size() - 1;
    if (this.viewIndex === null) return last;
    return Math.max(0, Math.min(this.viewIndex, last));
  }

  canUndo(): boolean {
    return this.getCurrentIndex() > 0;
  }

  canRedo(): boolean {
    return this.getCurrentIndex() < this.size() - 1;
  }

  /**
   * Step back one position.
   * Returns the viewed board, or null if already at the beginning.
   */
  undo(): Board | null {
    if (!this.canUndo()) return null;
    this.viewIndex = this.getCurrentIndex() - 1;
    return this.getCurrent();
  }

  /**
   * Step forward one position.
   * Returns the viewed board, or null if already live.
   */
  redo(): Board | null {
    if (!this.canRedo()) return null;
    const next = this.getCurrentIndex() + 1;
    this.viewIndex = next >= this.size() - 1 ? null : next;
    return this.getCurrent();
  }

  goLive(): void {
    this.viewIndex = null;
  }

  getCurrent(): Board {
    const snaps = this.snapshots();
    return cloneBoard(snaps[this.getCurrentIndex()]);
  }

  /**
   * Number of moves to keep when a move is played from the viewed position:
   * everything after it is discarded. Null when viewing live.
   */
  truncationPoint(): number | null {
    return this.isLive() ? null : this.getCurrentIndex();
  }
}
