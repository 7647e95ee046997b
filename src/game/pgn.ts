import type { Player } from "../types.ts";
import type { GameSession } from "./state.ts";
import { createInitialSession, createSessionFromSetup } from "./state.ts";
import { executeMove } from "./applyMove.ts";
import { promotePawn } from "./promote.ts";
import { endTurn } from "./endTurn.ts";
import { parseSan, toSan } from "./san.ts";
import { opponentOf } from "./coords.ts";
import { createSessionFromFen, sessionToFen } from "../bot/fen.ts";

export class PgnParseError extends Error {
  readonly token: string;
  readonly reason: string;
  /** 1-based ply of the offending token. */
  readonly ply: number;

  constructor(token: string, reason: string, ply: number) {
    super(`PGN move ${ply} "${token}": ${reason}`);
    this.name = "PgnParseError";
    this.token = token;
    this.reason = reason;
    this.ply = ply;
  }
}

export type PgnHeaders = Record<string, string>;

export interface ParsedPgn {
  session: GameSession;
  toMove: Player;
  headers: PgnHeaders;
}

const RESULT_TOKENS = new Set(["1-0", "0-1", "1/2-1/2", "*"]);
const HEADER_RE = /^\[(\w+)\s+"((?:[^"\\]|\\.)*)"\]$/;

function stripVariations(text: string): string {
  let prev = "";
  let cur = text;
  // Innermost first so nested variations come out too.
  while (cur !== prev) {
    prev = cur;
    cur = cur.replace(/\([^()]*\)/g, " ");
  }
  return cur;
}

/** Headers and the SAN tokens of a PGN text, in order. */
export function tokenizePgn(text: string): { headers: PgnHeaders; tokens: string[] } {
  const headers: PgnHeaders = {};
  const moveLines: string[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith("[")) {
      const m = HEADER_RE.exec(line);
      if (m) headers[m[1]] = m[2].replace(/\\(.)/g, "$1");
      continue;
    }
    const semi = line.indexOf(";");
    moveLines.push(semi >= 0 ? line.slice(0, semi) : line);
  }

  let body = moveLines.join(" ");
  body = body.replace(/\{[^}]*\}/g, " ");
  body = stripVariations(body);
  body = body.replace(/\$\d+/g, " ");

  const tokens: string[] = [];
  for (const word of body.split(/\s+/)) {
    if (word.length === 0 || RESULT_TOKENS.has(word)) continue;
    const move = word.replace(/^\d+\.(\.\.)?/, "");
    if (move.length === 0 || RESULT_TOKENS.has(move)) continue;
    tokens.push(move);
  }
  return { headers, tokens };
}

/**
 * Replay the move text of a PGN game. A `[FEN "..."]` header sets up the
 * starting position. The first token that does not resolve to a legal move
 * throws `PgnParseError` and nothing after it is applied.
 */
export function parsePgn(text: string): ParsedPgn {
  const { headers, tokens } = tokenizePgn(text);
  const session = headers.FEN ? createSessionFromFen(headers.FEN) : createInitialSession();

  tokens.forEach((token, i) => {
    const ply = i + 1;
    // A mated or stalemated side has no move left to match.
    const resolved = parseSan(session, session.toMove, token);
    if (!resolved.ok) throw new PgnParseError(token, resolved.reason, ply);

    const { from, to, promotion } = resolved.move;
    executeMove(session, from, to);
    if (promotion) promotePawn(session, promotion);
    endTurn(session);
  });

  return { session, toMove: session.toMove, headers };
}

export function resultOf(session: GameSession): string {
  if (session.gameState === "checkmate") return opponentOf(session.toMove) === "W" ? "1-0" : "0-1";
  if (session.gameState === "draw") return "1/2-1/2";
  return "*";
}

function quote(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/** SAN of every move played, replayed from the set-up position. */
export function sanHistory(session: GameSession): string[] {
  const replay = createSessionFromSetup(session);
  return session.moveHistory.map((m) => {
    const san = toSan(replay, { from: m.from, to: m.to, ...(m.promotion ? { promotion: m.promotion } : {}) });
    executeMove(replay, m.from, m.to);
    if (m.promotion) promotePawn(replay, m.promotion);
    endTurn(replay);
    return san;
  });
}

/**
 * Numbered SAN move text, preceded by the given headers. A game that did not
 * start from the standard position gets `SetUp` and `FEN` headers.
 */
export function exportPgn(session: GameSession, headers: PgnHeaders = {}): string {
  const result = resultOf(session);
  const startFen = sessionToFen(createSessionFromSetup(session));

  const tags: PgnHeaders = { ...headers };
  if (startFen !== sessionToFen(createInitialSession())) {
    tags.SetUp = "1";
    tags.FEN = startFen;
  }
  if (Object.keys(tags).length > 0 && tags.Result === undefined) tags.Result = result;

  const sans = sanHistory(session);
  const parts: string[] = [];
  let moveNo = session.initialFullmove;
  session.moveHistory.forEach((m, i) => {
    if (m.owner === "W") parts.push(`${moveNo}.`);
    else if (i === 0) parts.push(`${moveNo}...`);
    parts.push(sans[i]);
    if (m.owner === "B") moveNo++;
  });
  parts.push(result);

  const headerText = Object.entries(tags)
    .map(([k, v]) => `[${k} "${quote(v)}"]`)
    .join("\n");
  return headerText.length > 0 ? `${headerText}\n\n${parts.join(" ")}\n` : `${parts.join(" ")}\n`;
}
