import express from "express";
import cors from "cors";
import { createServer, type IncomingMessage, type Server } from "node:http";

import WebSocket, { WebSocketServer, type RawData } from "ws";

import { opponentOf } from "../../src/game/coords.ts";
import { ENDED_TOKEN } from "../../src/shared/moveToken.ts";
import {
  RELAY_WS_PATH,
  START_TOKEN,
  colorToken,
  isValidRoomId,
  parseColorToken,
  type RelayError,
  type RoomId,
  type RoomInfo,
} from "../../src/shared/relayProtocol.ts";
import type { Player } from "../../src/types.ts";

export type RelayRoom = {
  roomId: RoomId;
  hostColor: Player | null;
  seats: WebSocket[];
  started: boolean;
  ended: boolean;
};

function roomInfo(room: RelayRoom): RoomInfo {
  return {
    roomId: room.roomId,
    seats: room.seats.length,
    hostColor: room.hostColor ? colorToken(room.hostColor) : null,
    started: room.started,
    ended: room.ended,
  };
}

function sendText(ws: WebSocket, text: string): void {
  if (ws.readyState !== WebSocket.OPEN) return;
  ws.send(text);
}

/**
 * Two-seat move relay. The server knows nothing about chess: it assigns
 * colors, announces the start and forwards every frame to the other seat.
 */
export function createRelayApp(): {
  app: express.Express;
  rooms: Map<RoomId, RelayRoom>;
  attachWebSockets: (server: Server) => void;
  shutdown: () => Promise<void>;
} {
  const rooms = new Map<RoomId, RelayRoom>();
  let wss: WebSocketServer | null = null;

  function otherSeat(room: RelayRoom, ws: WebSocket): WebSocket | null {
    return room.seats.find((s) => s !== ws) ?? null;
  }

  function join(ws: WebSocket, req: IncomingMessage): void {
    const url = new URL(req.url ?? "/", "http://localhost");
    const roomId = url.searchParams.get("room");
    if (!isValidRoomId(roomId)) {
      ws.close(1008, "room required");
      return;
    }

    const room = rooms.get(roomId) ?? { roomId, hostColor: null, seats: [], started: false, ended: false };
    if (room.ended) {
      ws.close(1008, "game ended");
      return;
    }
    if (room.seats.length >= 2) {
      ws.close(1008, "room full");
      return;
    }
    rooms.set(roomId, room);
    room.seats.push(ws);

    if (room.seats.length === 1) {
      room.hostColor = parseColorToken(url.searchParams.get("color")) ?? "W";
      sendText(ws, colorToken(room.hostColor));
      console.log(`[chess-relay] room ${roomId}: host joined as ${colorToken(room.hostColor)}`);
    } else {
      const host = room.hostColor ?? "W";
      sendText(ws, colorToken(opponentOf(host)));
      room.started = true;
      for (const seat of room.seats) sendText(seat, START_TOKEN);
      console.log(`[chess-relay] room ${roomId}: guest joined, game started`);
    }

    ws.on("message", (raw: RawData, isBinary: boolean) => {
      if (isBinary) return;
      const text = raw.toString().trim();
      if (!room.started || room.ended) {
        console.warn(`[chess-relay] room ${roomId}: dropped frame before start`);
        return;
      }
      const peer = otherSeat(room, ws);
      if (peer) sendText(peer, text);
      if (text === ENDED_TOKEN) room.ended = true;
    });

    ws.on("close", () => {
      room.seats = room.seats.filter((s) => s !== ws);
      if (room.started && !room.ended) {
        room.ended = true;
        for (const seat of room.seats) sendText(seat, ENDED_TOKEN);
      }
      if (room.seats.length === 0) rooms.delete(roomId);
      console.log(`[chess-relay] room ${roomId}: seat left (${room.seats.length} remaining)`);
    });

    ws.on("error", (err) => {
      console.error(`[chess-relay] room ${roomId}: socket error`, err.message);
    });
  }

  function attachWebSockets(server: Server): void {
    if (wss) return;
    wss = new WebSocketServer({ server, path: RELAY_WS_PATH });
    wss.on("connection", (ws: WebSocket, req: IncomingMessage) => join(ws, req));
  }

  const app = express();
  app.use(cors());

  app.use((req, _res, next) => {
    console.log(`[chess-relay] ${req.method} ${req.path}`);
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/rooms/:roomId", (req, res) => {
    const room = rooms.get(req.params.roomId);
    if (!room) {
      const response: RelayError = { error: "Room not found" };
      res.status(404).json(response);
      return;
    }
    res.json(roomInfo(room));
  });

  async function shutdown(): Promise<void> {
    for (const room of rooms.values()) {
      for (const seat of room.seats) seat.terminate();
    }
    rooms.clear();

    const server = wss;
    wss = null;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  }

  return { app, rooms, attachWebSockets, shutdown };
}

export async function startRelayServer(args: { port?: number } = {}): Promise<{
  app: express.Express;
  server: Server;
  url: string;
  close: () => Promise<void>;
}> {
  const { app, attachWebSockets, shutdown } = createRelayApp();
  const port = args.port ?? 0;

  // Use an explicit HTTP server so WebSockets can attach cleanly.
  const server = createServer(app);
  attachWebSockets(server);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;

  const close = async (): Promise<void> => {
    await shutdown();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  };

  return { app, server, url: `http://localhost:${actualPort}`, close };
}
