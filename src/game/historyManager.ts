import type { GameState } from "./state.ts";
import type { Player } from "../types.ts";
import type { RepetitionHistory } from "./repetition.ts";
import type { GameStatus, GameStatusOptions } from "./gameOver.ts";
import { getGameStatus } from "./gameOver.ts";

/**
 * Game record with undo/redo.
 * Stores positions at turn boundaries only, each with the notation of the move that
 * produced it. States are immutable values, so they are kept as given.
 */
export class HistoryManager {
  private history: GameState[] = [];
  private moveNotation: string[] = []; // Parallel array storing move notation
  private currentIndex: number = -1;

  exportSnapshots(): { states: GameState[]; notation: string[]; currentIndex: number } {
    return {
      states: [...this.history],
      notation: [...this.moveNotation],
      currentIndex: this.currentIndex,
    };
  }

  /**
   * Record a new position (called after a complete turn).
   * This clears any future history if we're not at the end.
   */
  push(state: GameState, notation?: string): void {
    this.history = this.history.slice(0, this.currentIndex + 1);
    this.moveNotation = this.moveNotation.slice(0, this.currentIndex + 1);

    this.history.push(state);
    this.moveNotation.push(notation ?? "");
    this.currentIndex = this.history.length - 1;
  }

  /**
   * Go back one move. Returns the previous state, or null if at the beginning.
   */
  undo(): GameState | null {
    if (!this.canUndo()) return null;
    this.currentIndex--;
    return this.history[this.currentIndex];
  }

  /**
   * Go forward one move. Returns the next state, or null if at the end.
   */
  redo(): GameState | null {
    if (!this.canRedo()) return null;
    this.currentIndex++;
    return this.history[this.currentIndex];
  }

  canUndo(): boolean {
    return this.currentIndex > 0;
  }

  canRedo(): boolean {
    return this.currentIndex < this.history.length - 1;
  }

  getCurrent(): GameState | null {
    if (this.currentIndex < 0 || this.currentIndex >= this.history.length) {
      return null;
    }
    return this.history[this.currentIndex];
  }

  /** Entries for a move list. */
  getHistory(): Array<{ index: number; toMove: Player; isCurrent: boolean; notation: string }> {
    return this.history.map((state, idx) => ({
      index: idx,
      toMove: state.toMove,
      isCurrent: idx === this.currentIndex,
      notation: this.moveNotation[idx] ?? "",
    }));
  }

  size(): number {
    return this.history.length;
  }

  getCurrentIndex(): number {
    return this.currentIndex;
  }

  asRepetitionHistory(): RepetitionHistory {
    return { states: this.history, currentIndex: this.currentIndex };
  }

  /** Status of the current position, draws included. */
  status(options?: GameStatusOptions): GameStatus | null {
    const current = this.getCurrent();
    if (!current) return null;
    return getGameStatus(current, this.asRepetitionHistory(), options);
  }

  clear(): void {
    this.history = [];
    this.moveNotation = [];
    this.currentIndex = -1;
  }
}
