import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { EngineError, withTimeout, type UciBestMoveArgs, type UciEngine } from "./uciEngine.ts";

const UCI_MOVE_RE = /^[a-h][1-8][a-h][1-8][qrbn]?$/;
const DEFAULT_TIMEOUT_MS = 15_000;

/** Line-oriented pipe to a UCI engine. */
export interface EngineTransport {
  send(line: string): void;
  onLine(cb: (line: string) => void): void;
  /** Called once when the engine can no longer be talked to. */
  onFailure(cb: (err: EngineError) => void): void;
  close(): void;
}

/**
 * Split "stockfish --threads 2" into a command and its arguments.
 */
export function parseEngineCommand(commandLine: string): { command: string; args: string[] } {
  const parts = commandLine.trim().split(/\s+/).filter((p) => p.length > 0);
  if (parts.length === 0) throw new EngineError("spawn", "Engine path is empty");
  const [command, ...args] = parts;
  return { command, args };
}

export function spawnEngineTransport(commandLine: string): EngineTransport {
  const { command, args } = parseEngineCommand(commandLine);
  const child = spawn(command, args, { stdio: ["pipe", "pipe", "ignore"] });
  const lineListeners: Array<(line: string) => void> = [];
  const failureListeners: Array<(err: EngineError) => void> = [];
  let failed: EngineError | null = null;
  let closing = false;

  const fail = (err: EngineError) => {
    if (failed) return;
    failed = err;
    for (const cb of failureListeners) cb(err);
  };

  child.on("error", (err) => fail(new EngineError("spawn", `Failed to spawn engine "${command}": ${err.message}`)));
  child.on("exit", (code, signal) => {
    if (closing) return;
    fail(new EngineError("exited", `Engine exited (code=${code ?? "null"} signal=${signal ?? "null"})`));
  });
  child.stdin.on("error", (err) => fail(new EngineError("exited", `Engine stdin closed: ${err.message}`)));

  const rl = createInterface({ input: child.stdout });
  rl.on("line", (raw) => {
    const line = raw.trim();
    if (line.length === 0) return;
    for (const cb of lineListeners) cb(line);
  });

  return {
    send(line: string): void {
      if (failed) throw failed;
      child.stdin.write(`${line}\n`);
    },
    onLine(cb) {
      lineListeners.push(cb);
    },
    onFailure(cb) {
      failureListeners.push(cb);
      if (failed) cb(failed);
    },
    close(): void {
      closing = true;
      rl.close();
      if (child.exitCode === null && !child.killed) {
        if (child.stdin.writable) child.stdin.write("quit\n");
        child.kill();
      }
    },
  };
}

type Waiter = {
  pred: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (err: EngineError) => void;
};

/**
 * UCI engine driven over a line transport, normally a child process.
 */
export class UciProcessEngine implements UciEngine {
  private readonly transport: EngineTransport;
  private lines: string[] = [];
  private waiters: Waiter[] = [];
  private isReady = false;
  private initPromise: Promise<void> | null = null;
  private currentSkill: number | null = null;
  private currentElo: number | null = null;
  private failure: EngineError | null = null;

  constructor(transport: EngineTransport) {
    this.transport = transport;

    this.transport.onLine((line) => {
      const idx = this.waiters.findIndex((w) => w.pred(line));
      if (idx >= 0) {
        const [w] = this.waiters.splice(idx, 1);
        w.resolve(line);
        return;
      }
      this.lines.push(line);
      if (this.lines.length > 200) this.lines.splice(0, this.lines.length - 200);
    });

    this.transport.onFailure((err) => {
      this.failure = err;
      this.isReady = false;
      const pending = this.waiters;
      this.waiters = [];
      for (const w of pending) w.reject(err);
    });
  }

  static spawn(commandLine: string): UciProcessEngine {
    return new UciProcessEngine(spawnEngineTransport(commandLine));
  }

  terminate(): void {
    this.transport.close();
  }

  private send(cmd: string): void {
    if (this.failure) throw this.failure;
    this.transport.send(cmd);
  }

  private waitForLine(pred: (line: string) => boolean): Promise<string> {
    if (this.failure) return Promise.reject(this.failure);

    // First check buffered lines.
    const idx = this.lines.findIndex(pred);
    if (idx >= 0) {
      const [line] = this.lines.splice(idx, 1);
      return Promise.resolve(line);
    }

    return new Promise<string>((resolve, reject) => {
      this.waiters.push({ pred, resolve, reject });
    });
  }

  /** Drop the waiter of a request that timed out so it cannot eat a later line. */
  private forget(pred: (line: string) => boolean): void {
    this.waiters = this.waiters.filter((w) => w.pred !== pred);
  }

  private async request(cmd: string, pred: (line: string) => boolean, timeoutMs: number, label: string): Promise<string> {
    if (this.failure) throw this.failure;
    const pending = this.waitForLine(pred);
    try {
      this.send(cmd);
      return await withTimeout(pending, timeoutMs, label);
    } catch (err) {
      this.forget(pred);
      throw err;
    }
  }

  async init(opts?: { timeoutMs?: number }): Promise<void> {
    if (this.isReady) return;
    if (!this.initPromise) {
      const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
      this.initPromise = (async () => {
        await this.request("uci", (l) => l === "uciok", timeoutMs, "uciok");
        await this.request("isready", (l) => l === "readyok", timeoutMs, "readyok");
        this.isReady = true;
      })().catch((e: unknown) => {
        // Allow retry after a real failure.
        this.initPromise = null;
        throw e;
      });
    }
    return this.initPromise;
  }

  async setSkillLevel(skill: number, opts?: { timeoutMs?: number }): Promise<void> {
    const s = Math.max(0, Math.min(20, Math.round(skill)));
    if (this.currentSkill === s && this.isReady) return;

    const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    await this.init({ timeoutMs });
    this.send(`setoption name Skill Level value ${s}`);
    // Engines don't ack setoption, so sync with isready.
    await this.request("isready", (l) => l === "readyok", timeoutMs, "readyok after setoption");
    this.currentSkill = s;
  }

  private async setElo(elo: number, timeoutMs: number): Promise<void> {
    const e = Math.round(elo);
    if (this.currentElo === e) return;
    this.send("setoption name UCI_LimitStrength value true");
    this.send(`setoption name UCI_Elo value ${e}`);
    await this.request("isready", (l) => l === "readyok", timeoutMs, "readyok after UCI_Elo");
    this.currentElo = e;
  }

  async bestMove(args: UciBestMoveArgs): Promise<string> {
    const movetimeMs = Math.max(0, Math.round(args.movetimeMs ?? 0));
    const depth = args.depth !== undefined ? Math.max(1, Math.round(args.depth)) : null;
    const timeoutMs = args.timeoutMs ?? Math.max(DEFAULT_TIMEOUT_MS, movetimeMs * 20);

    await this.init({ timeoutMs });
    if (args.elo !== undefined) await this.setElo(args.elo, timeoutMs);

    // Clear any buffered bestmove from previous searches.
    this.lines = this.lines.filter((l) => !l.startsWith("bestmove "));

    let go = "go";
    if (depth !== null) go += ` depth ${depth}`;
    if (movetimeMs > 0) go += ` movetime ${movetimeMs}`;
    if (go === "go") go += ` movetime 1000`;

    this.send(`position fen ${args.fen}`);
    const line = await this.request(go, (l) => l.startsWith("bestmove "), timeoutMs, "bestmove");
    const move = line.split(/\s+/)[1];
    if (!move || move === "(none)") {
      throw new EngineError("protocol", "Engine returned no bestmove");
    }
    if (!UCI_MOVE_RE.test(move)) {
      throw new EngineError("protocol", `Engine returned a malformed move: ${move}`);
    }
    return move;
  }
}
