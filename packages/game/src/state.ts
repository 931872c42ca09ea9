/** Row-major tile values of a square board; 0 marks an empty cell. */
export interface GameBoard {
  cells: number[];
}

export interface GameState {
  size: number;
  /** Oldest board first; the last entry is the current one. */
  history: GameBoard[];
}

export function createInitialState(size: number): GameState {
  return {
    size,
    history: [{ cells: new Array<number>(size * size).fill(0) }],
  };
}

export function currentBoard(state: GameState): GameBoard | undefined {
  return state.history[state.history.length - 1];
}

export function previousBoard(state: GameState): GameBoard | undefined {
  return state.history[state.history.length - 2];
}
