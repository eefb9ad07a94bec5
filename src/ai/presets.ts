export type NpcStyle = "smart" | "aggressive" | "defensive" | "random";
export type NpcDifficulty = "easy" | "medium" | "hard";

/** Per-feature multipliers used by the heuristic styles. */
export type StyleWeights = {
  material: number; // own minus opponent piece value
  capture: number; // value of the piece taken by this leg
  chainCaptureBonus: number; // flat bonus when the leg leaves a chain pending
  kingSafety: number;
  forwardProgress: number;
  centerControl: number;
  pieceProtection: number;
  threatCreation: number;
};

export const STYLE_WEIGHTS: Record<Exclude<NpcStyle, "random">, Readonly<StyleWeights>> = {
  smart: {
    material: 1.0,
    capture: 1.0,
    chainCaptureBonus: 6.0,
    kingSafety: 0.7,
    forwardProgress: 0.8,
    centerControl: 0.2,
    pieceProtection: 0.3,
    threatCreation: 0.7,
  },
  aggressive: {
    material: 1.2,
    capture: 1.5,
    chainCaptureBonus: 8.0,
    kingSafety: 0.3,
    forwardProgress: 1.0,
    centerControl: 0.2,
    pieceProtection: 0.1,
    threatCreation: 1.0,
  },
  defensive: {
    material: 1.0,
    capture: 0.3,
    chainCaptureBonus: 4.0,
    kingSafety: 1.5,
    forwardProgress: 0.2,
    centerControl: 0.3,
    pieceProtection: 0.8,
    threatCreation: 0.3,
  },
} as const;

export type DifficultySchedule = {
  randomness: number; // chance of a uniformly random legal move
  topMoves: number; // otherwise pick among this many best candidates
  selectionWeights: readonly number[];
};

export const DIFFICULTY_SCHEDULES: Record<NpcDifficulty, Readonly<DifficultySchedule>> = {
  easy: { randomness: 0.4, topMoves: 3, selectionWeights: [3, 2, 1] },
  medium: { randomness: 0.2, topMoves: 2, selectionWeights: [3, 1] },
  hard: { randomness: 0, topMoves: 1, selectionWeights: [1] },
} as const;

// King safety scale, distances in board units.
export const KING_SAFETY = {
  missingKingPenalty: -50,
  captureDangerPenalty: -5,
  closeDistancePenalty: -4,
  mediumDistancePenalty: -2,
  safeDistanceBonus: 0.2,
  verySafeBonus: 0.5,
  immediateDangerThreshold: 1.1,
  closeDangerThreshold: 1.6,
  mediumSafetyThreshold: 2.5,
} as const;

export const CENTER_CONTROL = {
  rowBonus: 0.3,
  colBonus: 0.3,
  /** Half-step distance from the centre line that still counts as central. */
  band: 1,
} as const;

export const THREAT = {
  multiplier: 0.3,
  maxValue: 3.0,
} as const;

/** Only pieces worth at least this much earn protection credit. */
export const MIN_PROTECTED_VALUE = 2;
