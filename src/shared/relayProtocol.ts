import type { Player } from "../types.ts";

export const RELAY_WS_PATH = "/api/ws";
export const DEFAULT_RELAY_PORT = 2308;

/** Both seats are taken; moves may flow. */
export const START_TOKEN = "s";

export type ColorToken = "w" | "b";

export type RoomId = string;

export type RoomInfo = {
  roomId: RoomId;
  /** Connected seats, 0..2. */
  seats: number;
  hostColor: ColorToken | null;
  started: boolean;
  ended: boolean;
};

export type RelayError = {
  error: string;
};

const ROOM_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

export function isValidRoomId(v: unknown): v is RoomId {
  return typeof v === "string" && ROOM_ID_RE.test(v);
}

export function colorToken(p: Player): ColorToken {
  return p === "W" ? "w" : "b";
}

export function parseColorToken(raw: string | null | undefined): Player | null {
  const s = String(raw ?? "").trim().toLowerCase();
  if (s === "w") return "W";
  if (s === "b") return "B";
  return null;
}

/** `http://host:port` -> `ws://host:port/api/ws?room=<id>[&color=w]`. */
export function relaySocketUrl(serverUrl: string, roomId: RoomId, hostColor?: Player): string {
  const u = new URL(serverUrl);
  u.protocol = u.protocol === "https:" ? "wss:" : "ws:";
  u.pathname = `${u.pathname.replace(/\/$/, "")}${RELAY_WS_PATH}`;
  u.search = "";
  u.searchParams.set("room", roomId);
  if (hostColor) u.searchParams.set("color", colorToken(hostColor));
  return u.toString();
}
