import { Move, Moves } from "./interfaces/capabilities";

/** A move that shifts tiles one way, triggered by any of its keys. */
abstract class DirectionalMove extends Move {
  abstract readonly keys: readonly string[];
  abstract readonly delta: { row: number; col: number };

  check(input: string): boolean {
    return this.keys.includes(input.trim().toLowerCase());
  }
}

export class Up extends DirectionalMove {
  readonly keys = ["w", "k", "up"];
  readonly delta = { row: -1, col: 0 };
}

export class Down extends DirectionalMove {
  readonly keys = ["s", "j", "down"];
  readonly delta = { row: 1, col: 0 };
}

export class Left extends DirectionalMove {
  readonly keys = ["a", "h", "left"];
  readonly delta = { row: 0, col: -1 };
}

export class Right extends DirectionalMove {
  readonly keys = ["d", "l", "right"];
  readonly delta = { row: 0, col: 1 };
}

Moves.register(Up, "Up");
Moves.register(Down, "Down");
Moves.register(Left, "Left");
Moves.register(Right, "Right");
