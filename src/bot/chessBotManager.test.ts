import { describe, it, expect } from "vitest";
import type { Coord } from "../types.ts";
import { squareToCoord } from "../game/coords.ts";
import { ChessGame } from "../controller/gameController.ts";
import { DEFAULT_CONFIG, type AppConfig } from "../config.ts";
import { EngineError, type UciBestMoveArgs, type UciEngine } from "./uciEngine.ts";
import { ChessBotManager } from "./chessBotManager.ts";
import { UciProcessEngine, type EngineTransport } from "./uciProcessEngine.ts";

function at(square: string): Coord {
  const c = squareToCoord(square);
  if (!c) throw new Error(`bad square ${square}`);
  return c;
}

/** Replies with queued moves, or throws queued errors. */
class FakeEngine implements UciEngine {
  readonly requests: UciBestMoveArgs[] = [];
  readonly skills: number[] = [];
  terminated = false;
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = replies;
  }

  async init(): Promise<void> {}

  async setSkillLevel(skill: number): Promise<void> {
    this.skills.push(skill);
  }

  async bestMove(args: UciBestMoveArgs): Promise<string> {
    this.requests.push(args);
    const next = this.replies.shift();
    if (next === undefined) throw new EngineError("protocol", "no reply queued");
    if (next instanceof Error) throw next;
    return next;
  }

  terminate(): void {
    this.terminated = true;
  }
}

/** Answers the UCI handshake and every search with `bestmove`. */
class ScriptedTransport implements EngineTransport {
  readonly sent: string[] = [];
  private listeners: Array<(line: string) => void> = [];
  private readonly bestmove: string;

  constructor(bestmove: string) {
    this.bestmove = bestmove;
  }

  send(line: string): void {
    this.sent.push(line);
    let replies: string[] = [];
    if (line === "uci") replies = ["uciok"];
    else if (line === "isready") replies = ["readyok"];
    else if (line.startsWith("go")) replies = [`bestmove ${this.bestmove}`];
    queueMicrotask(() => {
      for (const reply of replies) for (const cb of this.listeners) cb(reply);
    });
  }

  onLine(cb: (line: string) => void): void {
    this.listeners.push(cb);
  }

  onFailure(): void {}

  close(): void {}
}

function setup(replies: Array<string | Error>, config: Partial<AppConfig> = {}) {
  const game = new ChessGame(undefined, { mode: "bot" });
  const engines: FakeEngine[] = [];
  const manager = new ChessBotManager(game, { ...DEFAULT_CONFIG, enginePath: "fake-engine", ...config }, {
    engineFactory: () => {
      const engine = new FakeEngine(replies);
      engines.push(engine);
      return engine;
    },
  });
  return { game, manager, engines };
}

describe("ChessBotManager", () => {
  it("does nothing on the human's turn", async () => {
    const { manager, engines } = setup(["e7e5"]);
    expect(manager.isBotTurn()).toBe(false);
    await expect(manager.playTurn()).resolves.toBeNull();
    expect(engines).toHaveLength(0);
  });

  it("plays the engine's reply for the bot's side", async () => {
    const { game, manager, engines } = setup(["e7e5"]);
    game.playMove(at("e2"), at("e4"));
    expect(manager.isBotTurn()).toBe(true);

    const result = await manager.playTurn();
    expect(result).toMatchObject({ ok: true, uci: "e7e5", record: { from: at("e7"), to: at("e5") } });
    expect(game.getToMove()).toBe("W");
    expect(engines[0].requests).toEqual([
      {
        fen: "rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1",
        depth: 10,
        movetimeMs: 0,
        timeoutMs: 15_000,
      },
    ]);
    expect(engines[0].skills).toEqual([20]);
  });

  it("passes the difficulty preset to the engine", async () => {
    const { game, manager, engines } = setup(["e7e5"], { botDifficulty: "easy", engineTimeoutMs: 2_000 });
    game.playMove(at("e2"), at("e4"));
    await manager.playTurn();
    expect(engines[0].requests[0]).toMatchObject({ depth: 1, movetimeMs: 50, elo: 1350, timeoutMs: 2_000 });
    expect(engines[0].skills).toEqual([0]);
  });

  it("sends the preset skill level to a UCI engine before searching", async () => {
    const transport = new ScriptedTransport("e7e5");
    const game = new ChessGame(undefined, { mode: "bot" });
    const manager = new ChessBotManager(game, { ...DEFAULT_CONFIG, enginePath: "fake-engine", botDifficulty: "medium" }, {
      engineFactory: () => new UciProcessEngine(transport),
    });
    game.playMove(at("e2"), at("e4"));

    const result = await manager.playTurn();
    expect(result?.ok).toBe(true);
    expect(transport.sent).toEqual([
      "uci",
      "isready",
      "setoption name Skill Level value 8",
      "isready",
      "setoption name UCI_LimitStrength value true",
      "setoption name UCI_Elo value 1700",
      "isready",
      "position fen rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1",
      "go depth 4 movetime 200",
    ]);
  });

  it("reports engine failures and starts a fresh engine next time", async () => {
    const { game, manager, engines } = setup([new EngineError("timeout", "Engine timeout: bestmove"), "e7e5"]);
    game.playMove(at("e2"), at("e4"));

    const failed = await manager.playTurn();
    expect(failed?.ok).toBe(false);
    if (failed && !failed.ok) expect(failed.error.reason).toBe("timeout");
    expect(game.getMoveHistory()).toHaveLength(1);
    expect(engines[0].terminated).toBe(true);

    const retried = await manager.playTurn();
    expect(retried?.ok).toBe(true);
    expect(engines).toHaveLength(2);
  });

  it("maps unexpected errors to protocol failures", async () => {
    const { game, manager } = setup([new Error("boom")]);
    game.playMove(at("e2"), at("e4"));
    const result = await manager.requestMove();
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe("protocol");
  });

  it("refuses illegal engine moves", async () => {
    const { game, manager } = setup(["e7e4"]);
    game.playMove(at("e2"), at("e4"));
    const result = await manager.playTurn();
    expect(result?.ok).toBe(false);
    if (result && !result.ok) expect(result.error.reason).toBe("illegal-move");
    expect(game.getMoveHistory()).toHaveLength(1);
  });

  it("fails without an engine path", async () => {
    const game = new ChessGame(undefined, { mode: "bot", botStarts: true });
    const manager = new ChessBotManager(game, { ...DEFAULT_CONFIG, enginePath: null });
    expect(manager.isBotTurn()).toBe(true);
    const result = await manager.playTurn();
    expect(result?.ok).toBe(false);
    if (result && !result.ok) expect(result.error.reason).toBe("spawn");
  });
});
