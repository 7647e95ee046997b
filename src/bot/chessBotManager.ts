import type { ChessGame } from "../controller/gameController.ts";
import type { MoveRecord } from "../game/moveTypes.ts";
import type { AppConfig } from "../config.ts";
import type { UciEngine } from "./uciEngine.ts";
import { EngineError, toEngineError } from "./uciEngine.ts";
import { UciProcessEngine } from "./uciProcessEngine.ts";
import { searchLimits } from "./presets.ts";
import { uciToLegalMove } from "./chessMoveMap.ts";

export type BotMoveResult =
  | { ok: true; uci: string; record: MoveRecord }
  | { ok: false; error: EngineError };

type BotConfig = Pick<AppConfig, "enginePath" | "botDepth" | "botDifficulty" | "engineTimeoutMs">;

function defaultEngineFactory(config: BotConfig): () => UciEngine {
  return () => {
    if (!config.enginePath) throw new EngineError("spawn", "No engine path configured (CHESS_ENGINE_PATH)");
    return UciProcessEngine.spawn(config.enginePath);
  };
}

/**
 * Plays the bot's side of a `bot` mode game. Engine failures come back as
 * `{ ok: false }` results and leave the game untouched.
 */
export class ChessBotManager {
  private readonly game: ChessGame;
  private readonly config: BotConfig;
  private readonly engineFactory: () => UciEngine;
  private engine: UciEngine | null = null;
  private busy = false;

  constructor(game: ChessGame, config: BotConfig, opts?: { engineFactory?: () => UciEngine }) {
    this.game = game;
    this.config = config;
    this.engineFactory = opts?.engineFactory ?? defaultEngineFactory(config);
  }

  isBotTurn(): boolean {
    const botColor = this.game.getBotColor();
    return botColor !== null && this.game.getState() === "playing" && this.game.getToMove() === botColor;
  }

  isBusy(): boolean {
    return this.busy;
  }

  private resetEngine(): void {
    try {
      this.engine?.terminate?.();
    } catch (err) {
      console.warn("[chess-bot] engine terminate failed", err);
    }
    this.engine = null;
  }

  private getEngine(): UciEngine {
    if (!this.engine) this.engine = this.engineFactory();
    return this.engine;
  }

  /** Ask the engine for a move in the current position without playing it. */
  async requestMove(): Promise<{ ok: true; uci: string } | { ok: false; error: EngineError }> {
    const limits = searchLimits(this.config.botDifficulty, this.config.botDepth);
    try {
      const engine = this.getEngine();
      await engine.setSkillLevel?.(limits.skill, { timeoutMs: this.config.engineTimeoutMs });
      const uci = await engine.bestMove({
        fen: this.game.toFen(),
        depth: limits.depth,
        movetimeMs: limits.movetimeMs,
        ...(limits.elo !== undefined ? { elo: limits.elo } : {}),
        timeoutMs: this.config.engineTimeoutMs,
      });
      return { ok: true, uci };
    } catch (err) {
      const error = toEngineError(err);
      console.warn(`[chess-bot] engine failure (${error.reason}): ${error.message}`);
      // A timed-out or dead engine is not reused.
      this.resetEngine();
      return { ok: false, error };
    }
  }

  /**
   * Play one bot move when it is the bot's turn. Returns null when there is
   * nothing to do (not the bot's turn, or a request already in flight).
   */
  async playTurn(): Promise<BotMoveResult | null> {
    if (this.busy || !this.isBotTurn()) return null;
    this.busy = true;
    try {
      const plies = this.game.getMoveHistory().length;
      const reply = await this.requestMove();
      if (!reply.ok) return reply;

      // The game may have been reset while the engine was thinking.
      if (!this.isBotTurn() || this.game.getMoveHistory().length !== plies) {
        return { ok: false, error: new EngineError("protocol", "Position changed while the engine was thinking") };
      }

      const move = uciToLegalMove(this.game.getSession(), this.game.getToMove(), reply.uci);
      const record = move ? this.game.playMove(move.from, move.to, move.promotion) : null;
      if (!record) {
        const error = new EngineError("illegal-move", `Engine move ${reply.uci} is not legal here`);
        console.warn(`[chess-bot] ${error.message}`);
        return { ok: false, error };
      }
      console.log(`[chess-bot] played ${reply.uci}`);
      return { ok: true, uci: reply.uci, record };
    } finally {
      this.busy = false;
    }
  }

  terminate(): void {
    this.resetEngine();
  }
}
