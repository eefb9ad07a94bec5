import type { GameState, NodeId } from "./state.ts";
import type { Move, CaptureMove, QuietMove } from "./moveTypes.ts";
import type { BoardGraph } from "./board.ts";
import { forwardNeighbors, getBoardGraph, isForwardOf, jumpTargets } from "./board.ts";
import { canCapture } from "../pieces/captureTable.ts";

export function graphFor(state: GameState): BoardGraph {
  return getBoardGraph(state.meta.topologyId);
}

/**
 * Capture legs available to the side to move's piece on `fromId`.
 * Returns [] when the node is empty or holds an opposing piece.
 */
export function generateCaptureMovesFrom(
  state: GameState,
  fromId: NodeId,
  continuation = false
): CaptureMove[] {
  const attacker = state.board.get(fromId);
  if (!attacker || attacker.owner !== state.toMove) return [];

  const graph = graphFor(state);
  const forwardOnly = state.meta.captureDirection === "forward";
  const out: CaptureMove[] = [];

  for (const { over, land } of jumpTargets(graph, fromId)) {
    const target = state.board.get(over);
    if (!target || !canCapture(attacker, target)) continue;
    if (state.board.has(land)) continue; // landing must be empty
    if (forwardOnly && !isForwardOf(graph, fromId, land, attacker.owner)) continue;
    out.push({ kind: "capture", from: fromId, over, to: land, continuation });
  }

  return out;
}

/** Every capture for the side to move, ignoring any pending chain. */
export function generateCaptureMoves(state: GameState): CaptureMove[] {
  const captures: CaptureMove[] = [];
  for (const [fromId, piece] of state.board.entries()) {
    if (piece.owner !== state.toMove) continue;
    captures.push(...generateCaptureMovesFrom(state, fromId));
  }
  return captures;
}

export function generateQuietMoves(state: GameState): QuietMove[] {
  const graph = graphFor(state);
  const moves: QuietMove[] = [];

  for (const [fromId, piece] of state.board.entries()) {
    if (piece.owner !== state.toMove) continue;
    for (const to of forwardNeighbors(graph, fromId, piece.owner)) {
      if (!state.board.has(to)) moves.push({ kind: "move", from: fromId, to });
    }
  }

  return moves;
}

/**
 * Legal moves for the side to move.
 *
 * Mid-chain only the chaining piece may continue, and only by capturing.
 * Otherwise captures are compulsory across the whole side: if any piece can
 * capture, every capture of every piece is offered and no quiet move is.
 */
export function generateLegalMoves(state: GameState): Move[] {
  const chain = state.pendingChain;
  if (chain) {
    const piece = state.board.get(chain.from);
    if (!piece || piece.owner !== chain.owner || piece.rank !== chain.rank) return [];
    return generateCaptureMovesFrom(state, chain.from, true);
  }

  const captures = generateCaptureMoves(state);
  if (captures.length > 0) return captures; // mandatory capture

  return generateQuietMoves(state);
}
