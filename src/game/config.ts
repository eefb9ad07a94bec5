import { z } from "zod";
import type { GameState } from "./state.ts";
import { createInitialGameState } from "./state.ts";
import { TOPOLOGY_IDS } from "../variants/variantTypes.ts";
import type { GameMeta } from "../variants/variantTypes.ts";
import { DEFAULT_TOPOLOGY_ID } from "../variants/variantRegistry.ts";
import { ConfigError, formatZodError } from "./errors.ts";

export const DEFAULT_MOVE_LIMIT = 500;
export const MIN_MOVE_LIMIT = 50;
export const MAX_MOVE_LIMIT = 2000;

export const MoveLimitSchema = z.number().int().min(MIN_MOVE_LIMIT).max(MAX_MOVE_LIMIT);

export const GameConfigSchema = z.object({
  moveLimit: MoveLimitSchema.default(DEFAULT_MOVE_LIMIT),
  boardTopology: z.enum(TOPOLOGY_IDS).default(DEFAULT_TOPOLOGY_ID),
  captureDirection: z.enum(["any", "forward"]).default("any"),
});

export type GameConfig = z.infer<typeof GameConfigSchema>;
export type GameConfigInput = z.input<typeof GameConfigSchema>;

export const GAME_CONFIG_PRESETS = {
  standard: { moveLimit: DEFAULT_MOVE_LIMIT },
  quick: { moveLimit: 200 },
  test: { moveLimit: 100 },
} as const satisfies Record<string, GameConfigInput>;

export type GameConfigPreset = keyof typeof GAME_CONFIG_PRESETS;

/** @throws ConfigError listing every failing field. */
export function parseGameConfig(raw: unknown = {}): GameConfig {
  const result = GameConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid game config: ${formatZodError(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

export function metaFromConfig(config: GameConfig): GameMeta {
  return {
    topologyId: config.boardTopology,
    moveLimit: config.moveLimit,
    captureDirection: config.captureDirection,
  };
}

/** Fresh game in the standard setup, Player A to move. */
export function newGame(config: GameConfigInput = {}): GameState {
  return createInitialGameState(metaFromConfig(parseGameConfig(config)));
}

export function newGameFromPreset(preset: GameConfigPreset, overrides: GameConfigInput = {}): GameState {
  return newGame({ ...GAME_CONFIG_PRESETS[preset], ...overrides });
}
