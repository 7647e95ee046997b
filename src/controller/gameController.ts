import type { Coord, Player, PromotionKind } from "../types.ts";
import type { Board } from "../game/board.ts";
import type { MoveRecord } from "../game/moveTypes.ts";
import type { GameSession, GameState, TakenPieces } from "../game/state.ts";
import { createInitialSession } from "../game/state.ts";
import { cloneBoard, flipBoard, getPiece } from "../game/board.ts";
import {
  UNDEFINED_COORD,
  containsCoord,
  homeRow,
  isUndefinedCoord,
  isValidCoord,
  opponentOf,
  sameCoord,
} from "../game/coords.ts";
import { legalMoves } from "../game/legalMoves.ts";
import { castleGeometry, KING_HOME_COL } from "../game/movegenKing.ts";
import { executeMove, rebuildSession } from "../game/applyMove.ts";
import { isPromotionPending, promotePawn, promotionKindAt } from "../game/promote.ts";
import { endTurn } from "../game/endTurn.ts";
import { drawReason, evaluateGameState, type DrawReason } from "../game/gameOver.ts";
import { isInCheck as sideInCheck } from "../game/check.ts";
import { HistoryManager } from "../game/historyManager.ts";
import { ChessClock } from "../game/clock.ts";
import { exportPgn, parsePgn, sanHistory, type PgnHeaders } from "../game/pgn.ts";
import { createSessionFromFen, sessionToFen, uciMoveToFromTo } from "../bot/fen.ts";
import { decodeMoveToken } from "../shared/moveToken.ts";

export type GameMode = "local" | "bot" | "remote";

export type HistoryChangeReason = "move" | "promotion" | "view" | "reset" | "load";

/** A completed turn, reported once any promotion has been chosen. */
export type PlayedMove = {
  from: Coord;
  to: Coord;
  owner: Player;
  promotion?: PromotionKind;
};

export type ChessGameOptions = {
  mode?: GameMode;
  /** Bot games: the bot plays White and moves first. */
  botStarts?: boolean;
  /** Remote games: the color this side plays. */
  localColor?: Player;
  clock?: ChessClock | null;
};

export type SelectResult = "selected" | "moved" | "cleared";

/**
 * One game of chess: owns the session, validates moves against the rules,
 * drives the playing / promotion / checkmate / draw state machine and keeps
 * the board perspective for the current mode.
 */
export class ChessGame {
  private session: GameSession;
  private history: HistoryManager;
  private readonly mode: GameMode;
  private readonly botStarts: boolean;
  private readonly localColor: Player;
  private clock: ChessClock | null;
  private flipped = false;
  private selected: Coord = UNDEFINED_COORD;
  private currentTargets: Coord[] = [];
  private viewCache: { index: number; session: GameSession } | null = null;
  private historyListeners: Array<(reason: HistoryChangeReason) => void> = [];
  private moveListeners: Array<(move: PlayedMove) => void> = [];

  constructor(session: GameSession = createInitialSession(), opts: ChessGameOptions = {}) {
    this.session = session;
    this.mode = opts.mode ?? "local";
    this.botStarts = Boolean(opts.botStarts);
    this.localColor = opts.localColor ?? "W";
    this.clock = opts.clock ?? null;
    this.history = new HistoryManager(() => this.session.positionHistory);
    this.applyInitialPerspective();
    if (this.clock && this.session.gameState === "playing") this.clock.start(this.session.toMove);
  }

  static fromPgn(text: string, opts?: ChessGameOptions): ChessGame {
    return new ChessGame(parsePgn(text).session, opts);
  }

  static fromFen(fen: string, opts?: ChessGameOptions): ChessGame {
    return new ChessGame(createSessionFromFen(fen), opts);
  }

  private applyInitialPerspective(): void {
    if (this.mode === "bot") this.flipped = this.botStarts;
    else if (this.mode === "remote") this.flipped = this.localColor === "B";
    else this.flipped = false;
  }

  addHistoryChangeCallback(callback: (reason: HistoryChangeReason) => void): void {
    this.historyListeners.push(callback);
  }

  addMoveListener(callback: (move: PlayedMove) => void): () => void {
    this.moveListeners.push(callback);
    return () => {
      this.moveListeners = this.moveListeners.filter((cb) => cb !== callback);
    };
  }

  private fireHistoryChange(reason: HistoryChangeReason): void {
    for (const cb of this.historyListeners) {
      try {
        cb(reason);
      } catch (err) {
        console.error("[controller] history listener error", err);
      }
    }
  }

  private fireMove(move: PlayedMove): void {
    for (const cb of this.moveListeners) {
      try {
        cb(move);
      } catch (err) {
        console.error("[controller] move listener error", err);
      }
    }
  }

  // ---- Read access ----

  getMode(): GameMode {
    return this.mode;
  }

  /** Color the engine plays in a bot game. */
  getBotColor(): Player | null {
    if (this.mode !== "bot") return null;
    return this.botStarts ? "W" : "B";
  }

  getLocalColor(): Player {
    return this.localColor;
  }

  getState(): GameState {
    return this.session.gameState;
  }

  getToMove(): Player {
    return this.session.toMove;
  }

  isOver(): boolean {
    return this.session.gameState === "checkmate" || this.session.gameState === "draw";
  }

  /** Winner of a finished game, null for a draw or a game in progress. */
  getWinner(): Player | null {
    return this.session.gameState === "checkmate" ? opponentOf(this.session.toMove) : null;
  }

  getDrawReason(): DrawReason | null {
    return this.session.gameState === "draw" ? drawReason(this.session) : null;
  }

  isInCheck(): boolean {
    return sideInCheck(this.session, this.session.toMove);
  }

  /** Live board in absolute orientation (row 0 = rank 8). */
  getBoard(): Board {
    return cloneBoard(this.session.board);
  }

  /** Board as it should be drawn: viewed snapshot, rotated when flipped. */
  getDisplayBoard(): Board {
    const board = this.viewedBoard();
    return this.flipped ? flipBoard(board) : board;
  }

  isFlipped(): boolean {
    return this.flipped;
  }

  getMoveHistory(): readonly MoveRecord[] {
    return this.session.moveHistory;
  }

  getPositionHistory(): readonly Board[] {
    return this.session.positionHistory;
  }

  getTakenPieces(): TakenPieces {
    return { W: [...this.session.takenPieces.W], B: [...this.session.takenPieces.B] };
  }

  getHalfmoveClock(): number {
    return this.session.halfmoveClock;
  }

  getClock(): ChessClock | null {
    return this.clock;
  }

  getSession(): Readonly<GameSession> {
    return this.session;
  }

  getSelected(): Coord {
    return { ...this.selected };
  }

  getCurrentTargets(): Coord[] {
    return this.currentTargets.map((c) => ({ ...c }));
  }

  getMoveList(): string[] {
    return sanHistory(this.session);
  }

  // ---- History viewing ----

  canViewPrevious(): boolean {
    return this.history.canUndo();
  }

  canViewNext(): boolean {
    return this.history.canRedo();
  }

  viewPrevious(): Board | null {
    const board = this.history.undo();
    if (board) {
      this.clearSelection();
      this.fireHistoryChange("view");
    }
    return board;
  }

  viewNext(): Board | null {
    const board = this.history.redo();
    if (board) {
      this.clearSelection();
      this.fireHistoryChange("view");
    }
    return board;
  }

  viewLive(): void {
    if (this.history.isLive()) return;
    this.history.goLive();
    this.clearSelection();
    this.fireHistoryChange("view");
  }

  isViewingLive(): boolean {
    return this.history.isLive();
  }

  viewedIndex(): number {
    return this.history.getCurrentIndex();
  }

  viewedBoard(): Board {
    return this.history.getCurrent();
  }

  /** Session at the viewed index; the live one when not looking back. */
  private activeSession(): GameSession {
    const cut = this.history.truncationPoint();
    if (cut === null) return this.session;
    if (!this.viewCache || this.viewCache.index !== cut) {
      this.viewCache = { index: cut, session: rebuildSession(this.session, cut) };
    }
    return this.viewCache.session;
  }

  /** Only local games may branch off an earlier position. */
  private playSession(): GameSession {
    return this.mode === "local" ? this.activeSession() : this.session;
  }

  // ---- Moves ----

  /** Whether the local user may move the side to move in this mode. */
  isHumanTurn(): boolean {
    const toMove = this.playSession().toMove;
    if (this.mode === "remote") return toMove === this.localColor;
    if (this.mode === "bot") return toMove !== this.getBotColor();
    return true;
  }

  legalMovesFrom(coord: Coord): Coord[] {
    const session = this.playSession();
    if (session.gameState !== "playing" || !isValidCoord(coord)) return [];
    const piece = getPiece(session.board, coord);
    if (!piece || piece.owner !== session.toMove) return [];
    return legalMoves(session, coord);
  }

  /**
   * Click on a square: picks up an own piece, plays the selected piece onto
   * a highlighted target, or drops the selection.
   */
  selectSquare(coord: Coord): SelectResult {
    if (!isUndefinedCoord(this.selected) && containsCoord(this.currentTargets, coord)) {
      return this.moveSelectedTo(coord) ? "moved" : "cleared";
    }

    const session = this.playSession();
    const piece = isValidCoord(coord) ? getPiece(session.board, coord) : null;
    if (!piece || piece.owner !== session.toMove || !this.isHumanTurn()) {
      this.clearSelection();
      return "cleared";
    }

    this.selected = { ...coord };
    this.currentTargets = this.legalMovesFrom(coord);
    return "selected";
  }

  clearSelection(): void {
    this.selected = UNDEFINED_COORD;
    this.currentTargets = [];
  }

  moveSelectedTo(coord: Coord): MoveRecord | null {
    if (isUndefinedCoord(this.selected)) return null;
    const from = this.selected;
    this.clearSelection();
    return this.playMove(from, coord);
  }

  /** A king dropped on its own rook's corner means castling on that side. */
  private normalizeCastleTarget(session: GameSession, from: Coord, to: Coord): Coord {
    const king = getPiece(session.board, from);
    const target = getPiece(session.board, to);
    if (!king || king.kind !== "K" || !target || target.kind !== "R" || target.owner !== king.owner) return to;
    const row = homeRow(king.owner);
    if (!sameCoord(from, { row, col: KING_HOME_COL }) || to.row !== row) return to;
    if (to.col === castleGeometry("kingSide").rookCol) return { row, col: castleGeometry("kingSide").kingToCol };
    if (to.col === castleGeometry("queenSide").rookCol) return { row, col: castleGeometry("queenSide").kingToCol };
    return to;
  }

  /**
   * Play `from -> to` for the side to move. Returns the stored record, or
   * null when the move is not legal or the game is not in the playing state.
   * Without `promotion` a pawn reaching its back rank leaves the game in the
   * promotion state until `promote` is called.
   */
  playMove(from: Coord, to: Coord, promotion?: PromotionKind): MoveRecord | null {
    const session = this.playSession();
    if (session.gameState !== "playing") return null;
    if (this.clock?.isTimeUp()) {
      this.clock.stop();
      return null;
    }

    const piece = getPiece(session.board, from);
    if (!piece || piece.owner !== session.toMove) return null;
    const dest = this.normalizeCastleTarget(session, from, to);
    if (!containsCoord(legalMoves(session, from), dest)) return null;

    if (session !== this.session) {
      // Playing from an earlier position drops everything after it.
      const dropped = this.session.moveHistory.length - session.moveHistory.length;
      if (this.mode === "local" && dropped % 2 === 1) this.flipped = !this.flipped;
      this.session = session;
      this.viewCache = null;
      this.history.goLive();
    }
    this.clearSelection();

    const mover = session.toMove;
    const record = executeMove(session, from, dest);
    if (!record) return null;

    if (isPromotionPending(session)) {
      if (promotion) {
        promotePawn(session, promotion);
        this.completeTurn(mover);
        return this.lastRecord();
      }
      // The position is judged from the opponent's side even before the
      // piece is chosen; a finished game does not wait for the choice.
      const peek = evaluateGameState({ ...session, toMove: opponentOf(mover) });
      if (peek !== "playing") {
        this.completeTurn(mover);
        return this.lastRecord();
      }
      session.gameState = "promotion";
      this.fireHistoryChange("move");
      return record;
    }

    this.completeTurn(mover);
    return record;
  }

  /** Resolve a pending promotion. */
  promote(kind: PromotionKind): MoveRecord | null {
    if (this.session.gameState !== "promotion") return null;
    if (!promotePawn(this.session, kind)) return null;
    this.session.gameState = "playing";
    const mover = this.session.toMove;
    this.completeTurn(mover, true);
    return this.lastRecord();
  }

  /** Promotion picker cursor: 0..3 for queen, rook, bishop, knight. */
  promoteAt(cursor: number): MoveRecord | null {
    const kind = promotionKindAt(cursor);
    return kind ? this.promote(kind) : null;
  }

  private lastRecord(): MoveRecord | null {
    return this.session.moveHistory[this.session.moveHistory.length - 1] ?? null;
  }

  private completeTurn(mover: Player, afterPromotion = false): void {
    endTurn(this.session);
    const state = this.session.gameState;

    if (this.mode === "local") {
      const finished = state === "checkmate" || state === "draw";
      if (afterPromotion ? !finished : true) this.flipped = !this.flipped;
    }

    if (this.clock) {
      if (state === "playing") this.clock.switchAfterMove(mover);
      else this.clock.stop();
    }

    const last = this.lastRecord();
    this.fireHistoryChange(afterPromotion ? "promotion" : "move");
    if (last) {
      this.fireMove({
        from: { ...last.from },
        to: { ...last.to },
        owner: last.owner,
        ...(last.promotion ? { promotion: last.promotion } : {}),
      });
    }
  }

  /** Engine reply such as "e2e4" or "e7e8q". */
  applyUciMove(text: string): MoveRecord | null {
    let parsed: ReturnType<typeof uciMoveToFromTo>;
    try {
      parsed = uciMoveToFromTo(text);
    } catch {
      return null;
    }
    return this.playMove(parsed.from, parsed.to, parsed.promotion);
  }

  /**
   * Move token from the remote peer. "ended" finishes nothing here; the
   * caller decides what a departed opponent means.
   */
  applyMoveToken(token: string): MoveRecord | null {
    const event = decodeMoveToken(token);
    if (event.type !== "move") return null;
    return this.playMove(event.move.from, event.move.to, event.move.promotion);
  }

  // ---- Whole-game operations ----

  reset(session: GameSession = createInitialSession()): void {
    this.replaceSession(session, "reset");
  }

  private replaceSession(session: GameSession, reason: HistoryChangeReason): void {
    this.session = session;
    this.viewCache = null;
    this.history.goLive();
    this.clearSelection();
    this.applyInitialPerspective();
    if (this.clock) {
      this.clock.reset();
      if (this.session.gameState === "playing") this.clock.start(this.session.toMove);
    }
    this.fireHistoryChange(reason);
  }

  toFen(): string {
    return sessionToFen(this.session);
  }

  toPgn(headers?: PgnHeaders): string {
    return exportPgn(this.session, headers);
  }

  /** Replace the game with one replayed from PGN text. Throws PgnParseError. */
  loadPgn(text: string): void {
    const { session } = parsePgn(text);
    this.replaceSession(session, "load");
  }
}
