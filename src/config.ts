import { parseDifficulty, type BotDifficulty } from "./bot/presets.ts";
import { DEFAULT_RELAY_PORT } from "./shared/relayProtocol.ts";

export type AppConfig = {
  /** Engine command, optionally with arguments ("stockfish --threads 2"). */
  enginePath: string | null;
  botDepth: number;
  /** Null means full strength at `botDepth`. */
  botDifficulty: BotDifficulty | null;
  engineTimeoutMs: number;
  relayPort: number;
  /** Per-side clock; null disables the clock. */
  clockSeconds: number | null;
};

export const DEFAULT_CONFIG: AppConfig = {
  enginePath: null,
  botDepth: 10,
  botDifficulty: null,
  engineTimeoutMs: 15_000,
  relayPort: DEFAULT_RELAY_PORT,
  clockSeconds: null,
};

function readInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const s = String(raw ?? "").trim();
  if (!/^\d+$/.test(s)) return fallback;
  const n = Number(s);
  return n >= min && n <= max ? n : fallback;
}

function readOptionalInt(raw: string | undefined, min: number, max: number): number | null {
  const n = readInt(raw, -1, min, max);
  return n < 0 ? null : n;
}

/**
 * Build the configuration from environment variables. Unset or malformed
 * values fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const enginePath = String(env.CHESS_ENGINE_PATH ?? "").trim();
  return {
    enginePath: enginePath.length > 0 ? enginePath : DEFAULT_CONFIG.enginePath,
    botDepth: readInt(env.CHESS_BOT_DEPTH, DEFAULT_CONFIG.botDepth, 1, 255),
    botDifficulty: parseDifficulty(env.CHESS_BOT_DIFFICULTY),
    engineTimeoutMs: readInt(env.CHESS_ENGINE_TIMEOUT_MS, DEFAULT_CONFIG.engineTimeoutMs, 1, 600_000),
    relayPort: readInt(env.PORT, DEFAULT_CONFIG.relayPort, 0, 65_535),
    clockSeconds: readOptionalInt(env.CHESS_CLOCK_SECONDS, 1, 24 * 60 * 60),
  };
}
