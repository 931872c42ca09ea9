import { Registrable, RegisterBase } from "@squaremerge/register";
import type { GameState } from "../state";

// ---------------------------------------------------------------------------
// Base capabilities of the square-merge game. Implementations register with
// the matching registry and are picked by name from the game settings.
// ---------------------------------------------------------------------------

const MOVE_INFO = "Type of possible interactions for the game.";
const MOVE_METHOD_INFO = "The method to perform different moves.";
const TEXT_METHOD_INFO = "Versions of all text contents in the game.";
const EVENT_INFO = "Different events in the game.";
const WIN_EVENT_INFO = "Game winning conditions.";
const LOSE_EVENT_INFO = "Game losing conditions.";
const SCORE_EVENT_INFO = "Methods to score the game.";

export class Move extends Registrable {
  /** Returns true if the input is captured by this move. */
  check(_input: string): boolean {
    return false;
  }

  protected describe(): string {
    return MOVE_INFO;
  }
}

export class MoveMethod extends Registrable {
  protected describe(): string {
    return MOVE_METHOD_INFO;
  }
}

export class TextMethod extends Registrable {
  /** Text for a named entry such as "title" or "win", or "" if unknown. */
  getText(_entry: string): string {
    return "";
  }

  protected describe(): string {
    return TEXT_METHOD_INFO;
  }
}

/** Rule parameters every event is constructed with. */
export interface EventRules {
  /** Tile value that wins the game. */
  goal: number;
}

export abstract class Event extends Registrable {
  constructor(protected readonly rules: EventRules) {
    super();
  }

  /** Returns true if the event happened in the given state. */
  abstract check(state: GameState): boolean;

  protected describe(): string {
    return EVENT_INFO;
  }
}

export class WinEvent extends Event {
  check(_state: GameState): boolean {
    return false;
  }

  protected describe(): string {
    return WIN_EVENT_INFO;
  }
}

export class LoseEvent extends Event {
  check(_state: GameState): boolean {
    return false;
  }

  protected describe(): string {
    return LOSE_EVENT_INFO;
  }
}

export class ScoreEvent extends Event {
  /** Returns true if the score needs to be updated. */
  check(_state: GameState): boolean {
    return false;
  }

  protected describe(): string {
    return SCORE_EVENT_INFO;
  }
}

export const Moves = new RegisterBase<Move>(Move, { description: MOVE_INFO });
export const MoveMethods = new RegisterBase<MoveMethod>(MoveMethod, { description: MOVE_METHOD_INFO });
export const TextMethods = new RegisterBase<TextMethod>(TextMethod, { description: TEXT_METHOD_INFO });
export const WinEvents = new RegisterBase<WinEvent, [EventRules]>(WinEvent, {
  description: WIN_EVENT_INFO,
  signature: "rules",
});
export const LoseEvents = new RegisterBase<LoseEvent, [EventRules]>(LoseEvent, {
  description: LOSE_EVENT_INFO,
  signature: "rules",
});
export const ScoreEvents = new RegisterBase<ScoreEvent, [EventRules]>(ScoreEvent, {
  description: SCORE_EVENT_INFO,
  signature: "rules",
});

/** What the inspection tools need to know about a registry. */
export interface CapabilityInfo {
  readonly label: string;
  readonly description: string;
  readonly signature: string;
  getChildren(): string[];
}

export const CAPABILITIES: readonly CapabilityInfo[] = [
  Moves,
  MoveMethods,
  TextMethods,
  WinEvents,
  LoseEvents,
  ScoreEvents,
];

export function findCapability(label: string): CapabilityInfo | undefined {
  return CAPABILITIES.find((capability) => capability.label === label);
}
