import type { Player } from "../types.ts";

export const DEFAULT_CLOCK_MS = 10 * 60 * 1000;

export type ClockState = {
  /** Remaining time per color. */
  remainingMs: Record<Player, number>;
  /** Whose clock runs when not paused. */
  active: Player;
  paused: boolean;
  /** Timestamp (ms) when the active clock last started or was read. */
  lastTickMs: number;
};

export type ClockOptions = {
  initialMs?: number;
  incrementMs?: number;
  /** Time source, replaceable in tests. */
  now?: () => number;
};

/**
 * Two-sided game clock. Time is charged lazily: every read or switch first
 * subtracts the elapsed time from the running side.
 */
export class ChessClock {
  private readonly state: ClockState;
  private readonly initialMs: number;
  private readonly incrementMs: number;
  private readonly now: () => number;

  constructor(opts: ClockOptions = {}) {
    const initial = Math.max(0, opts.initialMs ?? DEFAULT_CLOCK_MS);
    this.initialMs = initial;
    this.incrementMs = Math.max(0, opts.incrementMs ?? 0);
    this.now = opts.now ?? (() => Date.now());
    this.state = {
      remainingMs: { W: initial, B: initial },
      active: "W",
      paused: true,
      lastTickMs: this.now(),
    };
  }

  private touch(): void {
    const now = this.now();
    const elapsed = Math.max(0, now - this.state.lastTickMs);
    this.state.lastTickMs = now;
    if (this.state.paused) return;
    const active = this.state.active;
    this.state.remainingMs[active] = Math.max(0, this.state.remainingMs[active] - elapsed);
  }

  /** Both sides back to the initial time, paused. */
  reset(): void {
    this.state.remainingMs = { W: this.initialMs, B: this.initialMs };
    this.state.active = "W";
    this.state.paused = true;
    this.state.lastTickMs = this.now();
  }

  /** Start (or resume) the clock of `player`. */
  start(player: Player): void {
    this.touch();
    this.state.active = player;
    this.state.paused = false;
  }

  stop(): void {
    this.touch();
    this.state.paused = true;
  }

  /** Charge the mover, add the increment and start the other side. */
  switchAfterMove(mover: Player): void {
    this.touch();
    if (this.isTimeUp()) {
      this.state.paused = true;
      return;
    }
    this.state.remainingMs[mover] += this.incrementMs;
    this.state.active = mover === "W" ? "B" : "W";
    this.state.paused = false;
  }

  getTime(player: Player): number {
    this.touch();
    return this.state.remainingMs[player];
  }

  isRunning(): boolean {
    return !this.state.paused;
  }

  isTimeUp(): boolean {
    return this.timeUpColor() !== null;
  }

  /** The side whose flag fell, if any. */
  timeUpColor(): Player | null {
    this.touch();
    if (this.state.remainingMs.W <= 0) return "W";
    if (this.state.remainingMs.B <= 0) return "B";
    return null;
  }

  snapshot(): ClockState {
    this.touch();
    return { ...this.state, remainingMs: { ...this.state.remainingMs } };
  }
}

/** "m:ss" with minutes unpadded; negative input shows as 0:00. */
export function formatClock(ms: number): string {
  const totalSeconds = Math.max(0, Math.ceil(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, "0")}`;
}
