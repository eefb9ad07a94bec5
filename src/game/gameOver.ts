import type { GameState } from "./state.ts";
import type { Player } from "../types.ts";
import { opponentOf } from "../types.ts";
import { generateLegalMoves } from "./movegen.ts";
import { playerLabel } from "../pieces/pieceLabel.ts";

export type WinReason = "king_captured" | "lone_king" | "stalemate";
export type DrawReason = "both_kings_only" | "move_limit";

export type Outcome =
  | { kind: "ongoing" }
  | { kind: "win"; winner: Player; reason: WinReason; message: string }
  | { kind: "draw"; reason: DrawReason; message: string };

export interface SideCounts {
  pieces: number;
  kings: number;
}

export function countPieces(state: GameState): Record<Player, SideCounts> {
  const out: Record<Player, SideCounts> = {
    A: { pieces: 0, kings: 0 },
    B: { pieces: 0, kings: 0 },
  };
  for (const piece of state.board.values()) {
    out[piece.owner].pieces += 1;
    if (piece.rank === "king") out[piece.owner].kings += 1;
  }
  return out;
}

function win(winner: Player, reason: WinReason, detail: string): Outcome {
  return { kind: "win", winner, reason, message: `${playerLabel(winner)} wins: ${detail}` };
}

/**
 * Classify a state after a committed turn.
 *
 * Precedence: king captured, lone king (or kings-only draw), stalemate, move limit.
 * A state in the middle of a chain capture is always ongoing.
 *
 * @param noLegalMoves - pass when the caller already knows whether the side to
 *   move has no moves; otherwise move generation is run.
 */
export function evaluateOutcome(state: GameState, noLegalMoves?: boolean): Outcome {
  if (state.pendingChain) return { kind: "ongoing" };

  const side = state.toMove;
  const other = opponentOf(side);
  const counts = countPieces(state);

  // 1. King captured.
  if (counts[side].kings === 0) {
    return win(other, "king_captured", `${playerLabel(side)} has lost the king`);
  }
  if (counts[other].kings === 0) {
    return win(side, "king_captured", `${playerLabel(other)} has lost the king`);
  }

  // 2. Reduced to the king alone.
  const sideLone = counts[side].pieces === 1;
  const otherLone = counts[other].pieces === 1;
  if (sideLone && otherLone) {
    return { kind: "draw", reason: "both_kings_only", message: "Draw: both sides are reduced to their kings" };
  }
  if (sideLone) return win(other, "lone_king", `${playerLabel(side)} is reduced to a lone king`);
  if (otherLone) return win(side, "lone_king", `${playerLabel(other)} is reduced to a lone king`);

  // 3. Stalemate.
  const stuck = noLegalMoves ?? generateLegalMoves(state).length === 0;
  if (stuck) return win(other, "stalemate", `${playerLabel(side)} has no legal moves`);

  // 4. Move limit.
  if (state.moveCount >= state.meta.moveLimit) {
    return { kind: "draw", reason: "move_limit", message: `Draw: move limit of ${state.meta.moveLimit} reached` };
  }

  return { kind: "ongoing" };
}

export function isTerminal(outcome: Outcome): boolean {
  return outcome.kind !== "ongoing";
}
