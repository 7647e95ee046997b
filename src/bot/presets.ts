export type BotDifficulty = "easy" | "medium" | "hard" | "magnus";

export const BOT_DIFFICULTIES: readonly BotDifficulty[] = ["easy", "medium", "hard", "magnus"];

export type BotPreset = {
  depth: number; // UCI: go depth <n>
  movetimeMs: number; // UCI: go movetime <ms>
  /** UCI_Elo with UCI_LimitStrength; absent means full strength. */
  elo?: number;
  skill: number; // Stockfish "Skill Level" (0..20)
};

export const BOT_PRESETS: Record<BotDifficulty, BotPreset> = {
  easy: { depth: 1, movetimeMs: 50, elo: 1350, skill: 0 },
  medium: { depth: 4, movetimeMs: 200, elo: 1700, skill: 8 },
  hard: { depth: 10, movetimeMs: 600, elo: 2200, skill: 15 },
  magnus: { depth: 20, movetimeMs: 1500, elo: 2850, skill: 20 },
} as const;

/** Accepts a name ("hard") or a preset index ("0".."3"). */
export function parseDifficulty(v: string | null | undefined): BotDifficulty | null {
  const s = String(v ?? "").trim().toLowerCase();
  if (/^[0-3]$/.test(s)) return BOT_DIFFICULTIES[Number(s)] ?? null;
  return BOT_DIFFICULTIES.find((d) => d === s) ?? null;
}

/** Search limits for a request: the preset when set, else full strength at `depth`. */
export function searchLimits(difficulty: BotDifficulty | null, depth: number): BotPreset {
  if (difficulty) return BOT_PRESETS[difficulty];
  return { depth: Math.max(1, Math.round(depth)), movetimeMs: 0, skill: 20 };
}
