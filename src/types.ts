export type Player = "A" | "B";
export type Rank = "warrior" | "prince" | "king";

export interface Piece {
  readonly owner: Player;
  readonly rank: Rank;
}

export const PLAYERS: readonly Player[] = ["A", "B"];
export const RANKS: readonly Rank[] = ["warrior", "prince", "king"];

export function opponentOf(p: Player): Player {
  return p === "A" ? "B" : "A";
}
