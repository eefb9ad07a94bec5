import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Outcome } from "../game/gameOver.ts";
import type { GameConfigInput } from "../game/config.ts";
import type { Player } from "../types.ts";
import type { NpcProfile } from "./aiTypes.ts";
import { newGame } from "../game/config.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { applyMove } from "../game/applyMove.ts";
import { evaluateOutcome } from "../game/gameOver.ts";
import { selectMove } from "./search.ts";

export type FinalOutcome = Exclude<Outcome, { kind: "ongoing" }>;

export interface NpcMatchOptions {
  config?: GameConfigInput;
  profiles: Record<Player, NpcProfile>;
  /** Start from this position instead of a new game built from `config`. */
  initialState?: GameState;
}

export interface NpcMatchResult {
  outcome: FinalOutcome;
  state: GameState;
  /** Every leg played, chain legs included. */
  moves: Move[];
  moveCount: number;
}

/**
 * Play one NPC-vs-NPC game to the end. The move limit bounds the loop, since
 * every completed turn increments `moveCount` and every chain leg removes a piece.
 */
export function playNpcMatch(opts: NpcMatchOptions): NpcMatchResult {
  let state = opts.initialState ?? newGame(opts.config);
  const moves: Move[] = [];

  for (;;) {
    if (!state.pendingChain) {
      const outcome = evaluateOutcome(state, generateLegalMoves(state).length === 0);
      if (outcome.kind !== "ongoing") {
        if (process.env.DABLO_AI_LOG === "1") {
          console.log(`[selfplay] ${outcome.message} turns=${state.moveCount} legs=${moves.length}`);
        }
        return { outcome, state, moves, moveCount: state.moveCount };
      }
    }

    const move = selectMove(state, opts.profiles[state.toMove]);
    state = applyMove(state, move);
    moves.push(move);
  }
}
