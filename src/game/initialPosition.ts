import type { Piece } from "../types.ts";
import type { NodeId } from "./state.ts";
import type { TopologyId } from "../variants/variantTypes.ts";
import { getBoardGraph } from "./board.ts";
import { makeNodeId } from "./coords.ts";

/**
 * Standard setup, Player B at the top (row 0) and Player A at the bottom:
 * each side fills its three back half-rows with warriors; the king and prince
 * stand just in front, on the left for B and on the right for A.
 *
 * On the 6×5 board (board units) this is A: warriors rows 4 / 4.5 / 5, prince
 * (3.5, 3.5), king (3, 4); B: warriors rows 0 / 0.5 / 1, prince (1.5, 0.5), king (2, 0).
 */
export function computeStartPosition(topologyId: TopologyId): Array<[NodeId, Piece]> {
  const graph = getBoardGraph(topologyId);
  const { maxR, maxC } = graph;
  const out: Array<[NodeId, Piece]> = [];

  for (const node of graph.nodes) {
    if (node.r <= 2) out.push([node.id, { owner: "B", rank: "warrior" }]);
  }
  out.push([makeNodeId(3, 1), { owner: "B", rank: "prince" }]);
  out.push([makeNodeId(4, 0), { owner: "B", rank: "king" }]);

  for (const node of graph.nodes) {
    if (node.r >= maxR - 2) out.push([node.id, { owner: "A", rank: "warrior" }]);
  }
  out.push([makeNodeId(maxR - 3, maxC - 1), { owner: "A", rank: "prince" }]);
  out.push([makeNodeId(maxR - 4, maxC), { owner: "A", rank: "king" }]);

  return out;
}
