import { z } from "zod";
import type { DifficultySchedule, NpcDifficulty, NpcStyle, StyleWeights } from "./presets.ts";
import { DIFFICULTY_SCHEDULES, STYLE_WEIGHTS } from "./presets.ts";
import { ConfigError, formatZodError } from "../game/errors.ts";

const WeightsSchema = z
  .object({
    material: z.number().min(0),
    capture: z.number().min(0),
    chainCaptureBonus: z.number().min(0),
    kingSafety: z.number().min(0),
    forwardProgress: z.number().min(0),
    centerControl: z.number().min(0),
    pieceProtection: z.number().min(0),
    threatCreation: z.number().min(0),
  })
  .partial();

export const NpcProfileSchema = z
  .object({
    style: z.enum(["smart", "aggressive", "defensive", "random"]),
    difficulty: z.enum(["easy", "medium", "hard"]),
    /** Overrides the difficulty's chance of a uniformly random move. */
    randomness: z.number().min(0).max(1).optional(),
    topMoves: z.number().int().min(1).max(10).optional(),
    selectionWeights: z.array(z.number().min(0)).min(1).optional(),
    weights: WeightsSchema.optional(),
    /** Makes every random draw reproducible for a given position. */
    seed: z.union([z.number().int(), z.string()]).optional(),
  })
  .strict();

export type NpcProfile = z.infer<typeof NpcProfileSchema>;

/** A profile with every tunable filled in. */
export interface ResolvedProfile {
  style: NpcStyle;
  difficulty: NpcDifficulty;
  schedule: DifficultySchedule;
  weights: StyleWeights;
  seed?: number | string;
}

type WeightOverrides = z.infer<typeof WeightsSchema>;

// Keys given as `undefined` fall back to the table value.
function mergeWeights(base: Readonly<StyleWeights>, o: WeightOverrides = {}): StyleWeights {
  return {
    material: o.material ?? base.material,
    capture: o.capture ?? base.capture,
    chainCaptureBonus: o.chainCaptureBonus ?? base.chainCaptureBonus,
    kingSafety: o.kingSafety ?? base.kingSafety,
    forwardProgress: o.forwardProgress ?? base.forwardProgress,
    centerControl: o.centerControl ?? base.centerControl,
    pieceProtection: o.pieceProtection ?? base.pieceProtection,
    threatCreation: o.threatCreation ?? base.threatCreation,
  };
}

/** @throws ConfigError for an invalid profile. */
export function resolveProfile(raw: unknown): ResolvedProfile {
  const result = NpcProfileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid NPC profile: ${formatZodError(result.error)}`, { issues: result.error.issues });
  }
  const p = result.data;
  const base = DIFFICULTY_SCHEDULES[p.difficulty];
  const baseWeights = p.style === "random" ? STYLE_WEIGHTS.smart : STYLE_WEIGHTS[p.style];

  return {
    style: p.style,
    difficulty: p.difficulty,
    schedule: {
      randomness: p.randomness ?? base.randomness,
      topMoves: p.topMoves ?? base.topMoves,
      selectionWeights: p.selectionWeights ?? base.selectionWeights,
    },
    weights: mergeWeights(baseWeights, p.weights),
    seed: p.seed,
  };
}
