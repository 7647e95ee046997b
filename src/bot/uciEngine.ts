export type EngineErrorReason = "spawn" | "timeout" | "protocol" | "illegal-move" | "exited";

export class EngineError extends Error {
  readonly reason: EngineErrorReason;

  constructor(reason: EngineErrorReason, message: string) {
    super(message);
    this.name = "EngineError";
    this.reason = reason;
  }
}

export type UciBestMoveArgs = {
  fen: string;
  /** `go depth <n>`; combined with movetime when both are set. */
  depth?: number;
  /** `go movetime <ms>`; 0 or absent means no time limit. */
  movetimeMs?: number;
  /** Strength limit via UCI_LimitStrength / UCI_Elo. */
  elo?: number;
  /** Optional overall timeout guard for the request. */
  timeoutMs?: number;
};

export interface UciEngine {
  init(opts?: { timeoutMs?: number }): Promise<void>;
  /** Optional for engines that support a skill/strength knob. */
  setSkillLevel?(skill: number, opts?: { timeoutMs?: number }): Promise<void>;
  bestMove(args: UciBestMoveArgs): Promise<string>; // returns UCI move like "e2e4" or "e7e8q"
  terminate?(): void;
}

export function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  if (ms <= 0 || !Number.isFinite(ms)) return p;
  return new Promise<T>((resolve, reject) => {
    const tid = setTimeout(() => reject(new EngineError("timeout", `Engine timeout: ${label}`)), ms);
    p.then(
      (v) => {
        clearTimeout(tid);
        resolve(v);
      },
      (err) => {
        clearTimeout(tid);
        reject(err);
      },
    );
  });
}

export function toEngineError(err: unknown): EngineError {
  if (err instanceof EngineError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new EngineError("protocol", message);
}
