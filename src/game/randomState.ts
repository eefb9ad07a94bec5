import type { GameState, NodeId } from "./state.ts";
import type { Piece, Player } from "../types.ts";
import { PLAYERS } from "../types.ts";
import type { GameConfigInput } from "./config.ts";
import type { Prng } from "../shared/prng.ts";
import { newGame } from "./config.ts";
import { getAllNodes, getBoardGraph } from "./board.ts";
import { createPrng, defaultPrng } from "../shared/prng.ts";

function shuffle<T>(arr: readonly T[], rng: Prng): T[] {
  const a = arr.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = rng.int(0, i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

export type RandomStateOptions = {
  seed?: number | string;
  piecesPerSide?: number; // default: 8, king included
  princesPerSide?: number; // default: 1
  toMove?: Player; // default: "A"
  config?: GameConfigInput;
};

/**
 * A scattered position with one king per side, for tests and analysis.
 * Not necessarily reachable from the standard setup.
 */
export function createRandomGameState(opts: RandomStateOptions = {}): GameState {
  const base = newGame(opts.config);
  const rng = opts.seed === undefined ? defaultPrng() : createPrng(opts.seed);
  const nodes = shuffle(getAllNodes(getBoardGraph(base.meta.topologyId)), rng);

  const perSide = Math.min(Math.max(opts.piecesPerSide ?? 8, 1), Math.floor(nodes.length / 2));
  const princes = Math.min(Math.max(opts.princesPerSide ?? 1, 0), perSide - 1);

  const board = new Map<NodeId, Piece>();
  let idx = 0;
  for (const owner of PLAYERS) {
    for (let i = 0; i < perSide; i++) {
      const rank = i === 0 ? "king" : i <= princes ? "prince" : "warrior";
      board.set(nodes[idx++], { owner, rank });
    }
  }

  return { ...base, board, toMove: opts.toMove ?? "A" };
}
