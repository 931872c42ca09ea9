import { LoseEvent, LoseEvents, ScoreEvent, ScoreEvents, WinEvent, WinEvents } from "./interfaces/capabilities";
import { type GameState, currentBoard, previousBoard } from "./state";

function sum(cells: number[]): number {
  return cells.reduce((total, cell) => total + cell, 0);
}

/** Won once any tile reaches the goal value. */
export class ReachTile extends WinEvent {
  check(state: GameState): boolean {
    const board = currentBoard(state);
    return board !== undefined && board.cells.some((cell) => cell >= this.rules.goal);
  }
}

/** Lost when the current board has no empty cell left. */
export class NoEmptyCell extends LoseEvent {
  check(state: GameState): boolean {
    const board = currentBoard(state);
    return board !== undefined && !board.cells.includes(0);
  }
}

/** Score changes whenever the tile total differs from the previous board. */
export class TileSum extends ScoreEvent {
  check(state: GameState): boolean {
    const board = currentBoard(state);
    if (!board) return false;
    const previous = previousBoard(state);
    return previous === undefined || sum(previous.cells) !== sum(board.cells);
  }
}

WinEvents.register(ReachTile, "ReachTile");
LoseEvents.register(NoEmptyCell, "NoEmptyCell");
ScoreEvents.register(TileSum, "TileSum");
