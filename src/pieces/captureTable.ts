import type { Piece, Rank } from "../types.ts";

/** Which ranks each rank may jump. Warrior < prince < king. */
export const CAPTURABLE_BY: Readonly<Record<Rank, ReadonlySet<Rank>>> = {
  warrior: new Set<Rank>(["warrior"]),
  prince: new Set<Rank>(["warrior", "prince"]),
  king: new Set<Rank>(["warrior", "prince", "king"]),
};

// NPC material weights.
export const PIECE_VALUES: Readonly<Record<Rank, number>> = {
  warrior: 1,
  prince: 3,
  king: 10,
};

export function canCapture(attacker: Piece, target: Piece): boolean {
  if (attacker.owner === target.owner) return false;
  return CAPTURABLE_BY[attacker.rank].has(target.rank);
}

export function pieceValue(p: Piece): number {
  return PIECE_VALUES[p.rank];
}
