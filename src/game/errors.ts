import type { Player } from "../types.ts";
import type { Move } from "./moveTypes.ts";

export class CheckersError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CheckersError";
  }
}

/** The board is malformed, or a caller asked for moves of the side not on turn. */
export class InvalidStateError extends CheckersError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class InvalidMoveError extends CheckersError {
  constructor(
    message: string,
    public readonly move?: Move
  ) {
    super(message);
    this.name = "InvalidMoveError";
  }
}

export class NoLegalMoveError extends CheckersError {
  constructor(public readonly player: Player) {
    super(`${player === "R" ? "Red" : "Black"} has no legal move`);
    this.name = "NoLegalMoveError";
  }
}
