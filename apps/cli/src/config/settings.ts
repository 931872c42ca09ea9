import type { GameSettings } from "@squaremerge/game";
import type { ConfigData } from "./defaults";

function parseInteger(key: keyof ConfigData, value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${key}: "${value}" is not an integer`);
  }
  return parseInt(trimmed, 10);
}

/** Converts resolved text config into game settings. */
export function toGameSettings(config: ConfigData): GameSettings {
  return {
    randSeed: parseInteger("randSeed", config.randSeed),
    gameSize: parseInteger("gameSize", config.gameSize),
    maxUndo: parseInteger("maxUndo", config.maxUndo),
    goal: parseInteger("goal", config.goal),
    textMethod: config.textMethod.trim(),
    moveMethod: config.moveMethod.trim(),
    winEvent: config.winEvent.trim(),
    loseEvent: config.loseEvent.trim(),
    scoreEvent: config.scoreEvent.trim(),
    moves: config.moves
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name !== ""),
  };
}
