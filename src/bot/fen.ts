import type { Coord, Player, PromotionKind } from "../types.ts";
import type { Board } from "../game/board.ts";
import type { CastlingRights, GameSession, PositionContext } from "../game/state.ts";
import { createEmptyBoard, pieceFromLetter, piecesOf } from "../game/board.ts";
import { BOARD_SIZE, coordToSquare, squareToCoord } from "../game/coords.ts";
import { hashBoard } from "../game/hashState.ts";
import { remainingCastlingRights } from "../game/movegenKing.ts";
import { createSessionFromBoard } from "../game/state.ts";
import { evaluateGameState } from "../game/gameOver.ts";
import { promotionKindFromLetter } from "../game/promote.ts";

export const START_FEN = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

export class FenParseError extends Error {
  readonly fen: string;
  readonly reason: string;

  constructor(fen: string, reason: string) {
    super(`Invalid FEN "${fen}": ${reason}`);
    this.name = "FenParseError";
    this.fen = fen;
    this.reason = reason;
  }
}

export interface FenSetup {
  board: Board;
  toMove: Player;
  castlingRights: CastlingRights;
  enPassant: Coord | null;
  halfmoveClock: number;
  fullmove: number;
}

/**
 * Square passed over by a pawn double step on the last move. Emitted after
 * every double step, whether or not a capture is possible.
 */
function enPassantField(ctx: PositionContext): string {
  const last = ctx.moveHistory[ctx.moveHistory.length - 1];
  if (last) {
    const isDouble = last.kind === "P" && last.from.col === last.to.col && Math.abs(last.to.row - last.from.row) === 2;
    if (!isDouble) return "-";
    return coordToSquare({ row: (last.from.row + last.to.row) / 2, col: last.to.col });
  }
  return ctx.initialEnPassant ? coordToSquare(ctx.initialEnPassant) : "-";
}

function castlingField(ctx: PositionContext): string {
  const w = remainingCastlingRights(ctx, "W");
  const b = remainingCastlingRights(ctx, "B");
  let s = "";
  if (w.kingSide) s += "K";
  if (w.queenSide) s += "Q";
  if (b.kingSide) s += "k";
  if (b.queenSide) s += "q";
  return s.length > 0 ? s : "-";
}

export function fullmoveNumber(session: GameSession): number {
  const offset = session.initialToMove === "B" ? 1 : 0;
  return session.initialFullmove + Math.floor((session.moveHistory.length + offset) / 2);
}

export function sessionToFen(session: GameSession): string {
  const side = session.toMove === "W" ? "w" : "b";
  return [
    hashBoard(session.board),
    side,
    castlingField(session),
    enPassantField(session),
    String(session.halfmoveClock),
    String(fullmoveNumber(session)),
  ].join(" ");
}

function parsePlacement(fen: string, field: string): Board {
  const ranks = field.split("/");
  if (ranks.length !== BOARD_SIZE) throw new FenParseError(fen, `expected ${BOARD_SIZE} ranks, got ${ranks.length}`);

  const board = createEmptyBoard();
  ranks.forEach((rank, r) => {
    let c = 0;
    for (const ch of rank) {
      if (/[1-8]/.test(ch)) {
        c += Number(ch);
        continue;
      }
      const piece = pieceFromLetter(ch);
      if (!piece) throw new FenParseError(fen, `unknown piece letter "${ch}"`);
      if (c >= BOARD_SIZE) throw new FenParseError(fen, `rank ${BOARD_SIZE - r} is too long`);
      board[r][c] = piece;
      c++;
    }
    if (c !== BOARD_SIZE) throw new FenParseError(fen, `rank ${BOARD_SIZE - r} has ${c} squares`);
  });

  for (const player of ["W", "B"] as const) {
    const kings = piecesOf(board, player).filter((p) => p.piece.kind === "K").length;
    if (kings !== 1) throw new FenParseError(fen, `${player === "W" ? "White" : "Black"} must have exactly one king`);
  }
  return board;
}

function parseCount(fen: string, text: string | undefined, name: string, fallback: number, min: number): number {
  if (text === undefined) return fallback;
  if (!/^\d+$/.test(text)) throw new FenParseError(fen, `${name} must be a non-negative integer`);
  const n = Number(text);
  if (n < min) throw new FenParseError(fen, `${name} must be at least ${min}`);
  return n;
}

/**
 * Parse the six FEN fields. The last two may be omitted (defaults 0 and 1).
 */
export function parseFen(fen: string): FenSetup {
  const fields = fen.trim().split(/\s+/);
  if (fields.length < 4 || fields.length > 6) throw new FenParseError(fen, `expected 6 fields, got ${fields.length}`);
  const [placement, sideText, castlingText, epText, halfText, fullText] = fields;

  const board = parsePlacement(fen, placement);

  if (sideText !== "w" && sideText !== "b") throw new FenParseError(fen, `side to move must be "w" or "b"`);
  const toMove: Player = sideText === "w" ? "W" : "B";

  if (!/^(-|K?Q?k?q?)$/.test(castlingText) || castlingText.length === 0) {
    throw new FenParseError(fen, `bad castling field "${castlingText}"`);
  }
  const castlingRights: CastlingRights = {
    W: { kingSide: castlingText.includes("K"), queenSide: castlingText.includes("Q") },
    B: { kingSide: castlingText.includes("k"), queenSide: castlingText.includes("q") },
  };

  let enPassant: Coord | null = null;
  if (epText !== "-") {
    enPassant = squareToCoord(epText);
    // Rank 6 when White is to move, rank 3 when Black is.
    const expectedRow = toMove === "W" ? 2 : 5;
    if (!enPassant || enPassant.row !== expectedRow) {
      throw new FenParseError(fen, `bad en passant square "${epText}"`);
    }
  }

  return {
    board,
    toMove,
    castlingRights,
    enPassant,
    halfmoveClock: parseCount(fen, halfText, "halfmove clock", 0, 0),
    fullmove: parseCount(fen, fullText, "fullmove number", 1, 1),
  };
}

export function createSessionFromFen(fen: string): GameSession {
  const setup = parseFen(fen);
  const session = createSessionFromBoard(setup.board, setup.toMove, {
    castlingRights: setup.castlingRights,
    enPassant: setup.enPassant,
    halfmoveClock: setup.halfmoveClock,
    fullmove: setup.fullmove,
  });
  session.gameState = evaluateGameState(session);
  return session;
}

export function uciSquareToCoord(sq: string): Coord {
  const s = String(sq).trim().toLowerCase();
  const coord = /^[a-h][1-8]$/.test(s) ? squareToCoord(s) : null;
  if (!coord) throw new Error(`Invalid UCI square: ${sq}`);
  return coord;
}

export function uciMoveToFromTo(uci: string): { from: Coord; to: Coord; promotion?: PromotionKind } {
  const s = String(uci).trim().toLowerCase();
  if (!/^[a-h][1-8][a-h][1-8][qrbn]?$/.test(s)) {
    throw new Error(`Invalid UCI move: ${uci}`);
  }
  const from = uciSquareToCoord(s.slice(0, 2));
  const to = uciSquareToCoord(s.slice(2, 4));
  const promotion = s.length === 5 ? promotionKindFromLetter(s.slice(4, 5)) : null;
  return promotion ? { from, to, promotion } : { from, to };
}

export function coordsToUci(from: Coord, to: Coord, promotion?: PromotionKind): string {
  return `${coordToSquare(from)}${coordToSquare(to)}${promotion ? promotion.toLowerCase() : ""}`;
}
