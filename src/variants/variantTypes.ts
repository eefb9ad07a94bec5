export const TOPOLOGY_IDS = ["dablo_6x5", "dablo_7x6"] as const;

export type TopologyId = (typeof TOPOLOGY_IDS)[number];

/**
 * Direction rule for capture legs.
 * - "any": a capture may jump in every direction the graph allows (default).
 * - "forward": the landing node must be strictly closer to the opponent's back row.
 */
export type CaptureDirection = "any" | "forward";

export interface GameMeta {
  topologyId: TopologyId;
  /** A game whose move counter reaches this value is drawn. */
  moveLimit: number;
  captureDirection: CaptureDirection;
}

export interface TopologySpec {
  topologyId: TopologyId;
  displayName: string;
  subtitle: string;
  /** Primary-node rows. */
  rows: number;
  /** Primary-node columns. */
  cols: number;
  available: boolean;
}
