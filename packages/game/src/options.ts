import type { Destructible, SharedHandle } from "@squaremerge/register";
import {
  type EventRules,
  LoseEvent,
  LoseEvents,
  Move,
  MoveMethod,
  MoveMethods,
  Moves,
  ScoreEvent,
  ScoreEvents,
  TextMethod,
  TextMethods,
  WinEvent,
  WinEvents,
} from "./interfaces/capabilities";
import log from "./logger";

/** Game configuration as plain values; capabilities are given by name. */
export interface GameSettings {
  randSeed: number;
  gameSize: number;
  maxUndo: number;
  goal: number;
  textMethod: string;
  moveMethod: string;
  winEvent: string;
  loseEvent: string;
  scoreEvent: string;
  moves: string[];
}

export interface GameOptions {
  randSeed: number;
  gameSize: number;
  maxUndo: number;
  textMethod: SharedHandle<TextMethod>;
  moveMethod: SharedHandle<MoveMethod>;
  winEvent: SharedHandle<WinEvent>;
  loseEvent: SharedHandle<LoseEvent>;
  scoreEvent: SharedHandle<ScoreEvent>;
  moves: SharedHandle<Move>[];
}

export const DEFAULT_SETTINGS: GameSettings = {
  randSeed: 0,
  gameSize: 4,
  maxUndo: 3,
  goal: 2048,
  textMethod: "English",
  moveMethod: "Slide",
  winEvent: "ReachTile",
  loseEvent: "NoEmptyCell",
  scoreEvent: "TileSum",
  moves: ["Up", "Down", "Left", "Right"],
};

/** Releases every capability held by `options`. */
export function releaseGameOptions(options: GameOptions): void {
  options.textMethod.reset();
  options.moveMethod.reset();
  options.winEvent.reset();
  options.loseEvent.reset();
  options.scoreEvent.reset();
  for (const move of options.moves) {
    move.reset();
  }
}

/**
 * Builds game options by creating each configured capability by name.
 * Throws if a number is out of range or a name is not registered; nothing
 * stays allocated in that case.
 */
export function resolveGameOptions(settings: GameSettings): GameOptions {
  if (!Number.isInteger(settings.gameSize) || settings.gameSize < 2) {
    throw new Error(`Game size must be an integer of at least 2, got ${settings.gameSize}`);
  }
  if (!Number.isInteger(settings.maxUndo) || settings.maxUndo < 0) {
    throw new Error(`Undo limit must be a non-negative integer, got ${settings.maxUndo}`);
  }
  if (!(settings.goal > 0)) {
    throw new Error(`Goal must be positive, got ${settings.goal}`);
  }
  if (settings.moves.length === 0) {
    throw new Error("At least one move is required");
  }

  const rules: EventRules = { goal: settings.goal };
  const acquired: SharedHandle<Destructible>[] = [];
  function take<T extends Destructible>(handle: SharedHandle<T>, label: string, name: string): SharedHandle<T> {
    acquired.push(handle);
    if (handle.empty) {
      throw new Error(`Unknown ${label} "${name}"`);
    }
    return handle;
  }

  try {
    const options: GameOptions = {
      randSeed: settings.randSeed,
      gameSize: settings.gameSize,
      maxUndo: settings.maxUndo,
      textMethod: take(TextMethods.createShared(settings.textMethod), TextMethods.label, settings.textMethod),
      moveMethod: take(MoveMethods.createShared(settings.moveMethod), MoveMethods.label, settings.moveMethod),
      winEvent: take(WinEvents.createShared(settings.winEvent, rules), WinEvents.label, settings.winEvent),
      loseEvent: take(LoseEvents.createShared(settings.loseEvent, rules), LoseEvents.label, settings.loseEvent),
      scoreEvent: take(ScoreEvents.createShared(settings.scoreEvent, rules), ScoreEvents.label, settings.scoreEvent),
      moves: settings.moves.map((name) => take(Moves.createShared(name), Moves.label, name)),
    };
    log.debug({ settings }, "game options resolved");
    return options;
  } catch (err) {
    for (const handle of acquired) {
      handle.reset();
    }
    throw err;
  }
}
