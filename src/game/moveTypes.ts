import type { NodeId } from "./state.ts";

export interface QuietMove {
  kind: "move";
  from: NodeId;
  to: NodeId;
}

export interface CaptureMove {
  kind: "capture";
  from: NodeId;
  over: NodeId;
  to: NodeId;
  /** True for the second and later legs of a chain capture. */
  continuation: boolean;
}

export type Move = QuietMove | CaptureMove;

export function sameMove(a: Move, b: Move): boolean {
  if (a.kind !== b.kind || a.from !== b.from || a.to !== b.to) return false;
  if (a.kind === "capture" && b.kind === "capture") return a.over === b.over;
  return true;
}
