import type { Coord, Piece, Player } from "../types.ts";
import type { MoveRecord } from "./moveTypes.ts";
import { cloneBoard, createInitialBoard, type Board } from "./board.ts";

export type GameState = "playing" | "promotion" | "checkmate" | "draw";

export interface SideCastlingRights {
  kingSide: boolean;
  queenSide: boolean;
}

export type CastlingRights = Record<Player, SideCastlingRights>;

/**
 * Everything move generation needs to know about a position.
 * Castling and en passant eligibility are derived from `moveHistory`;
 * `castlingRights` and `initialEnPassant` only describe what the set-up
 * position granted before any move was played.
 */
export interface PositionContext {
  board: Board;
  moveHistory: readonly MoveRecord[];
  castlingRights: CastlingRights;
  initialEnPassant: Coord | null;
}

export type TakenPieces = Record<Player, Piece[]>;

export interface GameSession extends PositionContext {
  moveHistory: MoveRecord[];
  /** Board snapshots, the first entry being the set-up position. */
  positionHistory: Board[];
  /** Consecutive moves without a pawn move or a capture. */
  halfmoveClock: number;
  /** Pieces captured BY each side, sorted by rank. */
  takenPieces: TakenPieces;
  toMove: Player;
  gameState: GameState;
  initialToMove: Player;
  initialHalfmoveClock: number;
  initialFullmove: number;
}

export function fullCastlingRights(): CastlingRights {
  return {
    W: { kingSide: true, queenSide: true },
    B: { kingSide: true, queenSide: true },
  };
}

export function createSessionFromBoard(
  board: Board,
  toMove: Player,
  opts?: {
    castlingRights?: CastlingRights;
    enPassant?: Coord | null;
    halfmoveClock?: number;
    fullmove?: number;
  },
): GameSession {
  const rights = opts?.castlingRights ?? fullCastlingRights();
  const halfmove = Math.max(0, Math.trunc(opts?.halfmoveClock ?? 0));
  const fullmove = Math.max(1, Math.trunc(opts?.fullmove ?? 1));
  return {
    board: cloneBoard(board),
    moveHistory: [],
    positionHistory: [cloneBoard(board)],
    castlingRights: {
      W: { ...rights.W },
      B: { ...rights.B },
    },
    initialEnPassant: opts?.enPassant ? { ...opts.enPassant } : null,
    halfmoveClock: halfmove,
    takenPieces: { W: [], B: [] },
    toMove,
    gameState: "playing",
    initialToMove: toMove,
    initialHalfmoveClock: halfmove,
    initialFullmove: fullmove,
  };
}

export function createInitialSession(): GameSession {
  return createSessionFromBoard(createInitialBoard(), "W");
}

/** Copy of the set-up data only (no moves played). */
export function createSessionFromSetup(session: GameSession): GameSession {
  return createSessionFromBoard(session.positionHistory[0], session.initialToMove, {
    castlingRights: session.castlingRights,
    enPassant: session.initialEnPassant,
    halfmoveClock: session.initialHalfmoveClock,
    fullmove: session.initialFullmove,
  });
}
