import type { Coord, PieceKind, Player, PromotionKind } from "../types.ts";
import type { PositionContext } from "./state.ts";
import { cloneBoard, getPiece, piecesOf, setPiece } from "./board.ts";
import { coordToSquare, homeRow, opponentOf, pawnPromotionRow, sameCoord, squareToCoord, containsCoord } from "./coords.ts";
import { isCastlingShape, isEnPassantShape, movePieceOnBoard } from "./boardMove.ts";
import { makeMoveRecord } from "./moveTypes.ts";
import { isInCheck } from "./check.ts";
import { countLegalMoves, legalMoves } from "./legalMoves.ts";
import { KING_HOME_COL, castleGeometry } from "./movegenKing.ts";
import { promotionKindFromLetter } from "./promote.ts";

export interface SanMove {
  from: Coord;
  to: Coord;
  promotion?: PromotionKind;
}

export type SanResult = { ok: true; move: SanMove } | { ok: false; reason: string };

/** Position after `move`, used for the check suffix. */
function positionAfter(ctx: PositionContext, move: SanMove): PositionContext | null {
  const board = cloneBoard(ctx.board);
  const result = movePieceOnBoard(board, move.from, move.to);
  if (!result) return null;
  if (move.promotion) setPiece(board, result.landing, { owner: result.moved.owner, kind: move.promotion });
  const record = makeMoveRecord({
    kind: result.moved.kind,
    owner: result.moved.owner,
    from: move.from,
    to: result.landing,
    ...(move.promotion ? { promotion: move.promotion } : {}),
  });
  return { ...ctx, board, moveHistory: [...ctx.moveHistory, record] };
}

function disambiguation(ctx: PositionContext, from: Coord, to: Coord, kind: PieceKind, owner: Player): string {
  const rivals = piecesOf(ctx.board, owner)
    .filter(({ coord, piece }) => piece.kind === kind && !sameCoord(coord, from))
    .filter(({ coord }) => containsCoord(legalMoves(ctx, coord), to))
    .map(({ coord }) => coord);
  if (rivals.length === 0) return "";

  const square = coordToSquare(from);
  if (rivals.every((c) => c.col !== from.col)) return square[0];
  if (rivals.every((c) => c.row !== from.row)) return square[1];
  return square;
}

/**
 * Standard algebraic notation of `move` in the position `ctx`, including
 * the "+" / "#" suffix. Returns "" when `from` is empty.
 */
export function toSan(ctx: PositionContext, move: SanMove): string {
  const piece = getPiece(ctx.board, move.from);
  if (!piece) return "";

  let text: string;
  if (isCastlingShape(ctx.board, move.from, move.to)) {
    text = move.to.col > move.from.col ? "O-O" : "O-O-O";
  } else {
    const target = getPiece(ctx.board, move.to);
    const isCapture = Boolean(target && target.owner !== piece.owner) || isEnPassantShape(ctx.board, move.from, move.to);
    const dest = coordToSquare(move.to);
    if (piece.kind === "P") {
      text = isCapture ? `${coordToSquare(move.from)[0]}x${dest}` : dest;
      if (move.promotion) text += `=${move.promotion}`;
    } else {
      text = `${piece.kind}${disambiguation(ctx, move.from, move.to, piece.kind, piece.owner)}${isCapture ? "x" : ""}${dest}`;
    }
  }

  const after = positionAfter(ctx, move);
  if (after) {
    const opp = opponentOf(piece.owner);
    if (isInCheck(after, opp)) text += countLegalMoves(after, opp) === 0 ? "#" : "+";
  }
  return text;
}

const SAN_RE = /^(?<kind>[NBRQK])?(?<file>[a-h])?(?<rank>[1-8])?(?<capture>x)?(?<dest>[a-h][1-8])(?:=?(?<promo>[QRBNqrbn]))?$/;

function resolveCastle(ctx: PositionContext, player: Player, queenSide: boolean): SanResult {
  const row = homeRow(player);
  const from = { row, col: KING_HOME_COL };
  const king = getPiece(ctx.board, from);
  if (!king || king.kind !== "K" || king.owner !== player) return { ok: false, reason: "king is not on its home square" };
  const to = { row, col: castleGeometry(queenSide ? "queenSide" : "kingSide").kingToCol };
  if (!containsCoord(legalMoves(ctx, from), to)) return { ok: false, reason: "castling is not legal" };
  return { ok: true, move: { from, to } };
}

/**
 * Resolve one SAN token for `player`. Check and annotation suffixes are
 * ignored; castling accepts both letter O and digit 0 forms.
 */
export function parseSan(ctx: PositionContext, player: Player, token: string): SanResult {
  const text = token.trim().replace(/[+#!?]+$/, "");
  if (/^(O-O-O|0-0-0)$/.test(text)) return resolveCastle(ctx, player, true);
  if (/^(O-O|0-0)$/.test(text)) return resolveCastle(ctx, player, false);

  const match = SAN_RE.exec(text);
  if (!match || !match.groups) return { ok: false, reason: "not a SAN move" };
  const g = match.groups;

  const to = squareToCoord(g.dest);
  if (!to) return { ok: false, reason: "bad destination square" };
  const kind: PieceKind = g.kind === "N" || g.kind === "B" || g.kind === "R" || g.kind === "Q" || g.kind === "K" ? g.kind : "P";
  const fileHint = g.file ? g.file.charCodeAt(0) - "a".charCodeAt(0) : null;
  const rowHint = g.rank ? 8 - Number(g.rank) : null;
  const promotion = g.promo ? promotionKindFromLetter(g.promo) : null;

  const candidates = piecesOf(ctx.board, player)
    .filter(({ piece }) => piece.kind === kind)
    .filter(({ coord }) => (fileHint === null || coord.col === fileHint) && (rowHint === null || coord.row === rowHint))
    .filter(({ coord }) => containsCoord(legalMoves(ctx, coord), to))
    // A pawn capture names its origin file; a push never leaves it.
    .filter(({ coord }) => kind !== "P" || (g.capture ? coord.col !== to.col : coord.col === to.col));

  if (candidates.length === 0) return { ok: false, reason: "no legal move matches" };
  if (candidates.length > 1) return { ok: false, reason: "ambiguous move" };

  const from = candidates[0].coord;
  const reachesBackRank = kind === "P" && to.row === pawnPromotionRow(player);
  if (reachesBackRank && !promotion) return { ok: false, reason: "missing promotion piece" };
  if (!reachesBackRank && promotion) return { ok: false, reason: "promotion on a non-promoting move" };

  return { ok: true, move: promotion ? { from, to, promotion } : { from, to } };
}
