import WebSocket, { type RawData } from "ws";

import type { Player } from "../types.ts";
import type { GameSession } from "../game/state.ts";
import { ChessGame, type PlayedMove } from "../controller/gameController.ts";
import { ENDED_TOKEN, decodeMoveToken, encodeMoveToken, type RemoteEvent } from "../shared/moveToken.ts";
import { START_TOKEN, parseColorToken, relaySocketUrl, type RoomId } from "../shared/relayProtocol.ts";

type Pending = {
  resolve: (ev: RemoteEvent) => void;
};

/**
 * RemoteDriver.
 *
 * Plays one side of a game against a peer through the relay server. Local
 * moves of `localColor` are sent as move tokens; incoming tokens are applied
 * to the attached game and surfaced as `RemoteEvent`s.
 */
export class RemoteDriver {
  readonly mode = "online" as const;

  private readonly ws: WebSocket;
  private readonly localColor: Player;
  private readonly roomId: RoomId;
  private game: ChessGame | null = null;
  private detachGame: (() => void) | null = null;
  private started = false;
  private closed = false;
  private endSeen = false;
  private startWaiters: Array<{ resolve: () => void; reject: (err: Error) => void }> = [];
  private queue: RemoteEvent[] = [];
  private pending: Pending[] = [];
  private listeners: Array<(ev: RemoteEvent) => void> = [];

  private constructor(ws: WebSocket, roomId: RoomId, localColor: Player, bufferedStart: boolean) {
    this.ws = ws;
    this.roomId = roomId;
    this.localColor = localColor;
    this.started = bufferedStart;

    this.ws.on("message", (raw: RawData) => this.onFrame(raw.toString()));
    this.ws.on("close", () => this.onClosed());
    this.ws.on("error", (err) => {
      console.error("[remote] socket error", err.message);
    });
  }

  /**
   * Join `roomId` on the relay. The first player in a room is the host and
   * may pick its color; the guest is given the other one.
   */
  static connect(args: { serverUrl: string; roomId: RoomId; hostColor?: Player; timeoutMs?: number }): Promise<RemoteDriver> {
    const url = relaySocketUrl(args.serverUrl, args.roomId, args.hostColor);
    const timeoutMs = args.timeoutMs ?? 10_000;

    return new Promise<RemoteDriver>((resolve, reject) => {
      const ws = new WebSocket(url);
      let color: Player | null = null;
      let sawStart = false;

      const tid = setTimeout(() => {
        cleanup();
        ws.terminate();
        reject(new Error(`Relay did not assign a color within ${timeoutMs}ms`));
      }, timeoutMs);

      const onMessage = (raw: RawData) => {
        const text = raw.toString().trim();
        if (color === null) {
          color = parseColorToken(text);
          if (color === null) {
            cleanup();
            ws.close();
            reject(new Error(`Unexpected first frame from relay: "${text}"`));
            return;
          }
          // The start token can arrive in the same tick as the color.
          setImmediate(() => {
            if (color === null) return;
            cleanup();
            resolve(new RemoteDriver(ws, args.roomId, color, sawStart));
          });
          return;
        }
        if (text === START_TOKEN) sawStart = true;
      };
      const onClose = (code: number, reason: Buffer) => {
        cleanup();
        reject(new Error(`Relay closed the connection (${code} ${reason.toString() || "no reason"})`));
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const cleanup = () => {
        clearTimeout(tid);
        ws.off("message", onMessage);
        ws.off("close", onClose);
        ws.off("error", onError);
      };

      ws.on("message", onMessage);
      ws.on("close", onClose);
      ws.on("error", onError);
    });
  }

  getLocalColor(): Player {
    return this.localColor;
  }

  getRoomId(): RoomId {
    return this.roomId;
  }

  isStarted(): boolean {
    return this.started;
  }

  /** Resolves once both seats are taken. */
  waitForStart(): Promise<void> {
    if (this.started) return Promise.resolve();
    if (this.closed) return Promise.reject(new Error("Connection closed before the game started"));
    return new Promise<void>((resolve, reject) => {
      this.startWaiters.push({ resolve, reject });
    });
  }

  /** A remote-mode game for this side, already attached. */
  createGame(session?: GameSession): ChessGame {
    const game = new ChessGame(session, { mode: "remote", localColor: this.localColor });
    this.attach(game);
    return game;
  }

  attach(game: ChessGame): void {
    this.detachGame?.();
    this.game = game;
    this.detachGame = game.addMoveListener((move) => this.onLocalMove(move));
  }

  onEvent(cb: (ev: RemoteEvent) => void): () => void {
    this.listeners.push(cb);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== cb);
    };
  }

  /** Next event from the peer; queued events are returned first. */
  nextEvent(): Promise<RemoteEvent> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve({ type: "ended" });
    return new Promise<RemoteEvent>((resolve) => {
      this.pending.push({ resolve });
    });
  }

  private onLocalMove(move: PlayedMove): void {
    if (move.owner !== this.localColor) return;
    this.sendRaw(encodeMoveToken(move));
  }

  private sendRaw(text: string): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      console.warn(`[remote] not connected, dropping "${text}"`);
      return;
    }
    this.ws.send(text);
  }

  private onFrame(raw: string): void {
    const text = raw.trim();
    if (text === START_TOKEN) {
      this.markStarted();
      return;
    }

    let event = decodeMoveToken(text);
    if (event.type === "move" && this.game) {
      const record = this.game.playMove(event.move.from, event.move.to, event.move.promotion);
      if (!record) event = { type: "error", token: text, reason: "illegal move" };
    }
    this.emit(event);
  }

  private markStarted(): void {
    if (this.started) return;
    this.started = true;
    const waiters = this.startWaiters;
    this.startWaiters = [];
    for (const w of waiters) w.resolve();
  }

  private onClosed(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.startWaiters;
    this.startWaiters = [];
    for (const w of waiters) w.reject(new Error("Connection closed before the game started"));
    // A lost channel ends the game for listeners and readers alike.
    if (!this.endSeen) this.emit({ type: "ended" });
  }

  private emit(event: RemoteEvent): void {
    if (event.type === "ended") this.endSeen = true;
    for (const cb of this.listeners) {
      try {
        cb(event);
      } catch (err) {
        console.error("[remote] event listener error", err);
      }
    }
    const next = this.pending.shift();
    if (next) next.resolve(event);
    else this.queue.push(event);
  }

  /** Tell the peer the game is over and disconnect. */
  async end(): Promise<void> {
    this.sendRaw(ENDED_TOKEN);
    await this.close();
  }

  close(): Promise<void> {
    this.detachGame?.();
    this.detachGame = null;
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.ws.once("close", () => resolve());
      this.ws.close();
    });
  }
}
