import type { NodeId } from "./state.ts";
import type { Player } from "../types.ts";
import type { TopologyId, TopologySpec } from "../variants/variantTypes.ts";
import { getTopologyById } from "../variants/variantRegistry.ts";
import { isPrimaryCell, isSecondaryCell, makeNodeId } from "./coords.ts";
import { TopologyError } from "./errors.ts";

export type NodeKind = "primary" | "secondary";

export interface BoardNode {
  readonly id: NodeId;
  readonly kind: NodeKind;
  /** Half-step grid row (board row × 2). Position metadata only. */
  readonly r: number;
  readonly c: number;
}

/** Raw topology as written down before validation. */
export interface TopologyDefinition {
  id: string;
  nodes: readonly BoardNode[];
  adjacency: Readonly<Partial<Record<NodeId, readonly NodeId[]>>>;
}

export interface JumpTarget {
  over: NodeId;
  land: NodeId;
}

export interface BoardGraph {
  readonly id: string;
  readonly nodes: readonly BoardNode[];
  readonly maxR: number;
  readonly maxC: number;
  readonly nodeById: ReadonlyMap<NodeId, BoardNode>;
  readonly adjacency: ReadonlyMap<NodeId, readonly NodeId[]>;
  readonly forward: Readonly<Record<Player, ReadonlyMap<NodeId, readonly NodeId[]>>>;
  /** from → over → landing node, or null when the line has no node beyond `over`. */
  readonly landings: ReadonlyMap<NodeId, ReadonlyMap<NodeId, NodeId | null>>;
  /** Only the jumps that have a landing. */
  readonly jumps: ReadonlyMap<NodeId, readonly JumpTarget[]>;
}

const PRIMARY_DELTAS = [
  { dr: -2, dc: 0 },
  { dr: +2, dc: 0 },
  { dr: 0, dc: -2 },
  { dr: 0, dc: +2 },
  { dr: -1, dc: -1 },
  { dr: -1, dc: +1 },
  { dr: +1, dc: -1 },
  { dr: +1, dc: +1 },
];

const SECONDARY_DELTAS = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: +1 },
  { dr: +1, dc: -1 },
  { dr: +1, dc: +1 },
];

/**
 * Lay out a Dablo board: a rows×cols lattice of primary nodes with one secondary
 * node in the middle of each cell. Primary nodes link orthogonally to primaries and
 * diagonally to secondaries; secondaries only link to their four corner primaries.
 */
export function defineTopology(spec: Pick<TopologySpec, "topologyId" | "rows" | "cols">): TopologyDefinition {
  const maxR = 2 * (spec.rows - 1);
  const maxC = 2 * (spec.cols - 1);

  const nodes: BoardNode[] = [];
  const ids = new Set<NodeId>();
  for (let r = 0; r <= maxR; r++) {
    for (let c = 0; c <= maxC; c++) {
      const kind: NodeKind | null = isPrimaryCell(r, c) ? "primary" : isSecondaryCell(r, c) ? "secondary" : null;
      if (!kind) continue;
      const id = makeNodeId(r, c);
      nodes.push({ id, kind, r, c });
      ids.add(id);
    }
  }

  const adjacency: Record<NodeId, NodeId[]> = {};
  for (const node of nodes) {
    const deltas = node.kind === "primary" ? PRIMARY_DELTAS : SECONDARY_DELTAS;
    adjacency[node.id] = deltas
      .map(({ dr, dc }) => makeNodeId(node.r + dr, node.c + dc))
      .filter((id) => ids.has(id));
  }

  return { id: spec.topologyId, nodes, adjacency };
}

function checkReachable(def: TopologyDefinition, adjacency: Map<NodeId, readonly NodeId[]>): void {
  const undirected = new Map<NodeId, Set<NodeId>>();
  for (const node of def.nodes) undirected.set(node.id, new Set());
  for (const [from, list] of adjacency) {
    for (const to of list) {
      undirected.get(from)?.add(to);
      undirected.get(to)?.add(from);
    }
  }

  const start = def.nodes[0].id;
  const seen = new Set<NodeId>([start]);
  const queue: NodeId[] = [start];
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    for (const next of undirected.get(id) ?? []) {
      if (seen.has(next)) continue;
      seen.add(next);
      queue.push(next);
    }
  }

  const unreachable = def.nodes.filter((n) => !seen.has(n.id)).map((n) => n.id);
  if (unreachable.length > 0) {
    throw new TopologyError(`${def.id}: node(s) unreachable from ${start}: ${unreachable.join(", ")}`, {
      unreachable,
    });
  }
}

/**
 * Validate a topology definition and freeze it into a graph.
 * @throws TopologyError when the definition is malformed.
 */
export function createBoardGraph(def: TopologyDefinition): BoardGraph {
  if (def.nodes.length === 0) throw new TopologyError(`${def.id}: topology has no nodes`);

  const nodeById = new Map<NodeId, BoardNode>();
  for (const node of def.nodes) {
    if (nodeById.has(node.id)) {
      throw new TopologyError(`${def.id}: duplicate node id ${node.id}`, { nodeId: node.id });
    }
    nodeById.set(node.id, node);
  }

  for (const key of Object.keys(def.adjacency)) {
    if (!nodeById.has(key)) {
      throw new TopologyError(`${def.id}: adjacency defined for undefined node ${key}`, { nodeId: key });
    }
  }

  const adjacency = new Map<NodeId, readonly NodeId[]>();
  for (const node of def.nodes) {
    const list = def.adjacency[node.id];
    if (!list) throw new TopologyError(`${def.id}: node ${node.id} has no adjacency entry`, { nodeId: node.id });
    for (const to of list) {
      if (to === node.id) {
        throw new TopologyError(`${def.id}: node ${node.id} lists itself as adjacent`, { nodeId: node.id });
      }
      if (!nodeById.has(to)) {
        throw new TopologyError(`${def.id}: adjacency of ${node.id} references undefined node ${to}`, {
          nodeId: node.id,
          missing: to,
        });
      }
    }
    adjacency.set(node.id, Object.freeze(Array.from(new Set(list))));
  }

  checkReachable(def, adjacency);

  const forwardA = new Map<NodeId, readonly NodeId[]>();
  const forwardB = new Map<NodeId, readonly NodeId[]>();
  const landings = new Map<NodeId, ReadonlyMap<NodeId, NodeId | null>>();
  const jumps = new Map<NodeId, readonly JumpTarget[]>();
  let maxR = 0;
  let maxC = 0;

  for (const node of def.nodes) {
    maxR = Math.max(maxR, node.r);
    maxC = Math.max(maxC, node.c);

    const list = adjacency.get(node.id) ?? [];
    const rowOf = (id: NodeId) => nodeById.get(id)?.r ?? node.r;
    forwardA.set(node.id, Object.freeze(list.filter((id) => rowOf(id) < node.r)));
    forwardB.set(node.id, Object.freeze(list.filter((id) => rowOf(id) > node.r)));

    // Landing policy: keep going one step along the same line. The node beyond
    // must exist and be adjacent to the jumped node, otherwise there is no jump.
    const byOver = new Map<NodeId, NodeId | null>();
    const nodeJumps: JumpTarget[] = [];
    for (const overId of list) {
      const over = nodeById.get(overId);
      if (!over) continue;
      const landId = makeNodeId(2 * over.r - node.r, 2 * over.c - node.c);
      const land =
        nodeById.has(landId) && (adjacency.get(overId) ?? []).includes(landId) ? landId : null;
      byOver.set(overId, land);
      if (land !== null) nodeJumps.push({ over: overId, land });
    }
    landings.set(node.id, byOver);
    jumps.set(node.id, Object.freeze(nodeJumps));
  }

  return Object.freeze({
    id: def.id,
    nodes: Object.freeze(def.nodes.slice()),
    maxR,
    maxC,
    nodeById,
    adjacency,
    forward: Object.freeze({ A: forwardA, B: forwardB }),
    landings,
    jumps,
  });
}

const GRAPH_CACHE = new Map<TopologyId, BoardGraph>();

/** Shared, build-once graph for a registered topology. */
export function getBoardGraph(topologyId: TopologyId): BoardGraph {
  const cached = GRAPH_CACHE.get(topologyId);
  if (cached) return cached;
  const graph = createBoardGraph(defineTopology(getTopologyById(topologyId)));
  GRAPH_CACHE.set(topologyId, graph);
  return graph;
}

export function getAllNodes(graph: BoardGraph): NodeId[] {
  return graph.nodes.map((n) => n.id);
}

export function neighbors(graph: BoardGraph, id: NodeId): readonly NodeId[] {
  return graph.adjacency.get(id) ?? [];
}

export function forwardNeighbors(graph: BoardGraph, id: NodeId, player: Player): readonly NodeId[] {
  return graph.forward[player].get(id) ?? [];
}

export function captureLanding(graph: BoardGraph, from: NodeId, over: NodeId): NodeId | null {
  return graph.landings.get(from)?.get(over) ?? null;
}

export function jumpTargets(graph: BoardGraph, from: NodeId): readonly JumpTarget[] {
  return graph.jumps.get(from) ?? [];
}

/** True when `to` is strictly closer than `from` to the opponent's back row. */
export function isForwardOf(graph: BoardGraph, from: NodeId, to: NodeId, player: Player): boolean {
  const a = graph.nodeById.get(from);
  const b = graph.nodeById.get(to);
  if (!a || !b) return false;
  return player === "A" ? b.r < a.r : b.r > a.r;
}
