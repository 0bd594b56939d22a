import type { GameState, NodeId } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import type { Piece } from "../types.ts";
import { otherPlayer } from "../types.ts";
import { DIRECTIONS, forwardDr, jumpTarget, promotionRow, rowOf, stepTarget } from "./board.ts";
import { destinationOf } from "./moveTypes.ts";
import { promoteIfNeeded } from "./promote.ts";
import { InvalidMoveError } from "./errors.ts";
import { rulesOf } from "./state.ts";

function checkQuiet(state: GameState, move: Move, piece: Piece): void {
  if (move.path.length !== 1 || move.captured.length !== 0) {
    throw new InvalidMoveError(`applyMove: a quiet move is a single step`, move);
  }
  const to = move.path[0];
  const dirIndex = DIRECTIONS.findIndex((_, i) => stepTarget(move.from, i) === to);
  if (dirIndex < 0) {
    throw new InvalidMoveError(`applyMove: ${move.from} to ${to} is not a diagonal step`, move);
  }
  if (piece.rank === "M" && DIRECTIONS[dirIndex].dr !== forwardDr(piece.owner)) {
    throw new InvalidMoveError(`applyMove: a man cannot step backward from ${move.from}`, move);
  }
  if (state.board.has(to)) {
    throw new InvalidMoveError(`applyMove: landing square ${to} is not empty`, move);
  }
  checkPromotes(move, piece.rank === "M" && rowOf(to) === promotionRow(piece.owner));
}

function checkPromotes(move: Move, crowns: boolean): void {
  if (move.promotes !== crowns) {
    throw new InvalidMoveError(
      `applyMove: promotes is ${move.promotes} but the move ${crowns ? "crowns" : "does not crown"} the piece`,
      move
    );
  }
}

function checkCapture(state: GameState, move: Move, piece: Piece): void {
  if (move.path.length === 0 || move.path.length !== move.captured.length) {
    throw new InvalidMoveError(`applyMove: a capture needs one jumped square per landing square`, move);
  }
  if (new Set(move.captured).size !== move.captured.length) {
    throw new InvalidMoveError(`applyMove: a piece cannot be jumped twice`, move);
  }

  const rules = rulesOf(state);
  let at: NodeId = move.from;
  let rank = piece.rank;
  move.path.forEach((land, i) => {
    const over = move.captured[i];
    const dirIndex = DIRECTIONS.findIndex((_, d) => {
      const j = jumpTarget(at, d);
      return j !== null && j.over === over && j.land === land;
    });
    if (dirIndex < 0) {
      throw new InvalidMoveError(`applyMove: ${at} to ${land} is not a jump over ${over}`, move);
    }
    if (rank === "M" && !rules.menCaptureBackward && DIRECTIONS[dirIndex].dr !== forwardDr(piece.owner)) {
      throw new InvalidMoveError(`applyMove: a man cannot capture backward from ${at}`, move);
    }
    const victim = state.board.get(over);
    if (!victim || victim.owner === piece.owner) {
      throw new InvalidMoveError(`applyMove: no opposing piece to capture at ${over}`, move);
    }
    if (land !== move.from && state.board.has(land)) {
      throw new InvalidMoveError(`applyMove: landing square ${land} is not empty`, move);
    }
    if (rank === "M" && rowOf(land) === promotionRow(piece.owner)) {
      rank = "K";
      if (rules.promotionDuringCapture === "ends_move" && i < move.path.length - 1) {
        throw new InvalidMoveError(`applyMove: a man crowned on ${land} ends the move there`, move);
      }
    }
    at = land;
  });

  checkPromotes(move, rank !== piece.rank);
}

/**
 * Play a complete move and pass the turn.
 *
 * Only the move's shape is checked against the board: mover, geometry and direction,
 * victims, empty landings and the `promotes` flag. Legality such as mandatory
 * capture is the move generator's job.
 * The given state is left untouched.
 */
export function applyMove(state: GameState, move: Move): GameState & { didPromote: boolean } {
  const piece = state.board.get(move.from);
  if (!piece) {
    throw new InvalidMoveError(`applyMove: no piece at ${move.from}`, move);
  }
  if (piece.owner !== state.toMove) {
    throw new InvalidMoveError(`applyMove: the piece at ${move.from} does not belong to the side to move`, move);
  }

  if (move.kind === "capture") checkCapture(state, move, piece);
  else checkQuiet(state, move, piece);

  const nextBoard = new Map(state.board);
  const to = destinationOf(move);

  nextBoard.delete(move.from);
  for (const over of move.captured) nextBoard.delete(over);

  // A man crowned mid-chain may finish the chain off its promotion row.
  const crownedEarlier = move.promotes && piece.rank === "M";
  nextBoard.set(to, crownedEarlier ? { owner: piece.owner, rank: "K" } : piece);
  const didPromote = promoteIfNeeded(nextBoard, to) || crownedEarlier;

  return { ...state, board: nextBoard, toMove: otherPlayer(state.toMove), didPromote };
}
