import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { StyleWeights } from "./presets.ts";
import type { NpcProfile, ResolvedProfile } from "./aiTypes.ts";
import type { ScoredMove } from "./evaluate.ts";
import type { Prng } from "../shared/prng.ts";
import { resolveProfile } from "./aiTypes.ts";
import { evaluateMove } from "./evaluate.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { evaluateOutcome } from "../game/gameOver.ts";
import { hashGameState } from "../game/hashState.ts";
import { formatMove } from "../game/coordFormat.ts";
import { PreconditionError } from "../game/errors.ts";
import { playerLabel } from "../pieces/pieceLabel.ts";
import { createPrng, defaultPrng } from "../shared/prng.ts";

export type SelectionReason = "random_style" | "randomness" | "best" | "weighted";

export interface Selection {
  move: Move;
  /** Heuristic score of the chosen move; null when it was picked at random. */
  score: number | null;
  reason: SelectionReason;
  candidates: number;
}

/** Every legal move scored one ply deep, best first. Ties keep generation order. */
export function rankMoves(state: GameState, weights: StyleWeights): ScoredMove[] {
  const scored = generateLegalMoves(state).map((m) => evaluateMove(state, m, weights));
  return scored.sort((a, b) => b.score - a.score);
}

/**
 * Ranked candidates as a profile sees them. A random-style profile is scored
 * with the smart weights.
 * @throws ConfigError for an invalid profile.
 */
export function scoreMoves(state: GameState, profile: NpcProfile): ScoredMove[] {
  return rankMoves(state, resolveProfile(profile).weights);
}

function rngFor(state: GameState, profile: ResolvedProfile): Prng {
  if (profile.seed === undefined) return defaultPrng();
  return createPrng(`${profile.seed}|${hashGameState(state)}`);
}

function formatScore(score: number | null): string {
  return score === null ? "-" : score.toFixed(2);
}

function logSelection(state: GameState, profile: ResolvedProfile, sel: Selection): void {
  if (process.env.DABLO_AI_LOG !== "1") return;
  const parts = [
    "[ai:move]",
    playerLabel(state.toMove),
    `${profile.style}/${profile.difficulty}`,
    formatMove(sel.move, "id"),
    `eval=${formatScore(sel.score)}`,
    `n=${sel.candidates}`,
    `via=${sel.reason}`,
  ];
  console.log(parts.join(" "));
}

function choose(state: GameState, profile: ResolvedProfile, legal: Move[]): Selection {
  const rng = rngFor(state, profile);

  if (profile.style === "random") {
    return { move: rng.pick(legal), score: null, reason: "random_style", candidates: legal.length };
  }

  if (rng.chance(profile.schedule.randomness)) {
    return { move: rng.pick(legal), score: null, reason: "randomness", candidates: legal.length };
  }

  const scored = rankMoves(state, profile.weights);
  const top = scored.slice(0, Math.max(1, profile.schedule.topMoves));
  if (top.length === 1) {
    return { move: top[0].move, score: top[0].score, reason: "best", candidates: scored.length };
  }

  const picked = rng.weightedPick(top, profile.schedule.selectionWeights);
  return { move: picked.move, score: picked.score, reason: "weighted", candidates: scored.length };
}

/**
 * Pick a move for the side to move, including the next leg of a pending chain.
 *
 * @throws ConfigError for an invalid profile.
 * @throws PreconditionError when the game is over or there is nothing to play.
 */
export function selectMoveWithInfo(state: GameState, profile: NpcProfile): Selection {
  const resolved = resolveProfile(profile);
  const legal = generateLegalMoves(state);

  if (!state.pendingChain) {
    const outcome = evaluateOutcome(state, legal.length === 0);
    if (outcome.kind !== "ongoing") {
      throw new PreconditionError(`selectMove: game is over (${outcome.message})`, { outcome });
    }
  }
  if (legal.length === 0) {
    throw new PreconditionError(`selectMove: ${playerLabel(state.toMove)} has no legal moves`);
  }

  const sel = choose(state, resolved, legal);
  logSelection(state, resolved, sel);
  return sel;
}

export function selectMove(state: GameState, profile: NpcProfile): Move {
  return selectMoveWithInfo(state, profile).move;
}
