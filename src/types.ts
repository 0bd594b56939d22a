export type Player = "R" | "B";
export type Rank = "M" | "K";

export interface Piece {
  readonly owner: Player;
  readonly rank: Rank;
}

export function otherPlayer(p: Player): Player {
  return p === "R" ? "B" : "R";
}

export function playerName(p: Player): string {
  return p === "R" ? "Red" : "Black";
}
