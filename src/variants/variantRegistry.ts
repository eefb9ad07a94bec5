import { TOPOLOGY_IDS, type TopologyId, type TopologySpec } from "./variantTypes.ts";

export const TOPOLOGIES: readonly TopologySpec[] = [
  {
    topologyId: "dablo_6x5",
    displayName: "Dablo",
    subtitle: "Board: 6×5 primary + 5×4 secondary nodes • Pieces: 16/side",
    rows: 6,
    cols: 5,
    available: true,
  },
  {
    topologyId: "dablo_7x6",
    displayName: "Dablo (wide)",
    subtitle: "Board: 7×6 primary + 6×5 secondary nodes • Pieces: 19/side",
    rows: 7,
    cols: 6,
    available: true,
  },
] as const;

export const DEFAULT_TOPOLOGY_ID: TopologyId = "dablo_6x5";

export function isTopologyId(raw: string): raw is TopologyId {
  return TOPOLOGY_IDS.some((id) => id === raw);
}

export function getTopologyById(id: TopologyId): TopologySpec {
  const spec = TOPOLOGIES.find((t) => t.topologyId === id);
  if (!spec) throw new Error(`getTopologyById: unknown topology ${id}`);
  return spec;
}
