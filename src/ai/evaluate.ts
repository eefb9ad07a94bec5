import type { GameState, NodeId } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Player } from "../types.ts";
import { opponentOf } from "../types.ts";
import type { BoardGraph } from "../game/board.ts";
import type { StyleWeights } from "./presets.ts";
import { CENTER_CONTROL, KING_SAFETY, MIN_PROTECTED_VALUE, THREAT } from "./presets.ts";
import { generateCaptureMoves, generateCaptureMovesFrom, graphFor } from "../game/movegen.ts";
import { applyMove } from "../game/applyMove.ts";
import { pieceValue } from "../pieces/captureTable.ts";

export interface MoveFeatures {
  material: number;
  capture: number;
  chainPending: boolean;
  /** Best piece value the next chain leg could take; 0 when the chain ends. */
  chainFollowUp: number;
  kingSafety: number;
  forwardProgress: number;
  centerControl: number;
  pieceProtection: number;
  threatCreation: number;
}

export interface ScoredMove {
  move: Move;
  score: number;
  features: MoveFeatures;
}

/** Same position with `player` to move and no chain in progress. */
function withMover(state: GameState, player: Player): GameState {
  const next: GameState = { ...state, toMove: player };
  delete next.pendingChain;
  return next;
}

export function materialBalance(state: GameState, perspective: Player): number {
  let score = 0;
  for (const piece of state.board.values()) {
    score += piece.owner === perspective ? pieceValue(piece) : -pieceValue(piece);
  }
  return score;
}

/** How many captures `attacker` could make over `nodeId` if it were their move. */
export function threatsAgainst(state: GameState, nodeId: NodeId, attacker: Player): number {
  return generateCaptureMoves(withMover(state, attacker)).filter((m) => m.over === nodeId).length;
}

function findKing(state: GameState, owner: Player): NodeId | null {
  for (const [nodeId, piece] of state.board.entries()) {
    if (piece.owner === owner && piece.rank === "king") return nodeId;
  }
  return null;
}

function distance(graph: BoardGraph, a: NodeId, b: NodeId): number {
  const na = graph.nodeById.get(a);
  const nb = graph.nodeById.get(b);
  if (!na || !nb) return Infinity;
  // Half-step grid → board units.
  return Math.hypot(na.r - nb.r, na.c - nb.c) / 2;
}

export function kingSafety(state: GameState, perspective: Player): number {
  const king = findKing(state, perspective);
  if (!king) return KING_SAFETY.missingKingPenalty;

  const opp = opponentOf(perspective);
  if (threatsAgainst(state, king, opp) > 0) return KING_SAFETY.captureDangerPenalty;

  const graph = graphFor(state);
  let nearest = Infinity;
  for (const [nodeId, piece] of state.board.entries()) {
    if (piece.owner === perspective) continue;
    nearest = Math.min(nearest, distance(graph, king, nodeId));
  }

  if (nearest < KING_SAFETY.immediateDangerThreshold) return KING_SAFETY.closeDistancePenalty;
  if (nearest < KING_SAFETY.closeDangerThreshold) return KING_SAFETY.mediumDistancePenalty;
  if (nearest < KING_SAFETY.mediumSafetyThreshold) return KING_SAFETY.safeDistanceBonus;
  return KING_SAFETY.verySafeBonus;
}

/** Sum of how far each non-king piece has come, 0 at its own back row and 1 at the far row. */
export function forwardProgress(state: GameState, perspective: Player): number {
  const graph = graphFor(state);
  if (graph.maxR === 0) return 0;
  let total = 0;
  for (const [nodeId, piece] of state.board.entries()) {
    if (piece.owner !== perspective || piece.rank === "king") continue;
    const node = graph.nodeById.get(nodeId);
    if (!node) continue;
    total += perspective === "A" ? (graph.maxR - node.r) / graph.maxR : node.r / graph.maxR;
  }
  return total;
}

export function centerControl(graph: BoardGraph, nodeId: NodeId): number {
  const node = graph.nodeById.get(nodeId);
  if (!node) return 0;
  let bonus = 0;
  if (Math.abs(node.r - graph.maxR / 2) <= CENTER_CONTROL.band) bonus += CENTER_CONTROL.rowBonus;
  if (Math.abs(node.c - graph.maxC / 2) <= CENTER_CONTROL.band) bonus += CENTER_CONTROL.colBonus;
  return bonus;
}

/** Credit for taking a valuable piece out of capture range. */
export function pieceProtection(before: GameState, move: Move, after: GameState, perspective: Player): number {
  const moving = before.board.get(move.from);
  if (!moving) return 0;
  const value = pieceValue(moving);
  if (value < MIN_PROTECTED_VALUE) return 0;

  const opp = opponentOf(perspective);
  const threatBefore = threatsAgainst(before, move.from, opp);
  if (threatBefore === 0) return 0;
  const threatAfter = threatsAgainst(after, move.to, opp);
  return (threatBefore - threatAfter) * value;
}

export function threatCreation(state: GameState, perspective: Player): number {
  const captures = generateCaptureMoves(withMover(state, perspective));
  let value = 0;
  for (const m of captures) {
    const target = state.board.get(m.over);
    if (target) value += pieceValue(target);
  }
  return Math.min(value * THREAT.multiplier, THREAT.maxValue);
}

export function extractMoveFeatures(before: GameState, move: Move, after: GameState): MoveFeatures {
  const perspective = before.toMove;
  const graph = graphFor(before);

  const captured = move.kind === "capture" ? before.board.get(move.over) : undefined;
  const chainPending = Boolean(after.pendingChain);
  let chainFollowUp = 0;
  if (chainPending) {
    for (const m of generateCaptureMovesFrom(after, move.to, true)) {
      const target = after.board.get(m.over);
      if (target) chainFollowUp = Math.max(chainFollowUp, pieceValue(target));
    }
  }

  return {
    material: materialBalance(after, perspective),
    capture: captured ? pieceValue(captured) : 0,
    chainPending,
    chainFollowUp,
    kingSafety: kingSafety(after, perspective),
    forwardProgress: forwardProgress(after, perspective),
    centerControl: centerControl(graph, move.to),
    pieceProtection: pieceProtection(before, move, after, perspective),
    threatCreation: threatCreation(after, perspective),
  };
}

export function scoreFeatures(f: MoveFeatures, w: StyleWeights): number {
  let score = 0;
  score += w.material * f.material;
  score += w.capture * f.capture;
  if (f.chainPending) score += w.chainCaptureBonus + f.chainFollowUp;
  score += w.kingSafety * f.kingSafety;
  score += w.forwardProgress * f.forwardProgress;
  score += w.centerControl * f.centerControl;
  score += w.pieceProtection * f.pieceProtection;
  score += w.threatCreation * f.threatCreation;
  return score;
}

/** One-ply evaluation: apply `move` to a tentative copy and score the result for the mover. */
export function evaluateMove(state: GameState, move: Move, weights: StyleWeights): ScoredMove {
  const after = applyMove(state, move);
  const features = extractMoveFeatures(state, move, after);
  return { move, score: scoreFeatures(features, weights), features };
}
