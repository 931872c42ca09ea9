import { DEFAULT_SETTINGS } from "@squaremerge/game";

/** Every value is kept as text, the way it appears in files and the environment. */
export interface ConfigData {
  textMethod: string;
  moveMethod: string;
  winEvent: string;
  loseEvent: string;
  scoreEvent: string;
  /** Comma-separated move names */
  moves: string;
  gameSize: string;
  goal: string;
  maxUndo: string;
  randSeed: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "textMethod",
  "moveMethod",
  "winEvent",
  "loseEvent",
  "scoreEvent",
  "moves",
  "gameSize",
  "goal",
  "maxUndo",
  "randSeed",
];

export const DEFAULTS: ConfigData = {
  textMethod: DEFAULT_SETTINGS.textMethod,
  moveMethod: DEFAULT_SETTINGS.moveMethod,
  winEvent: DEFAULT_SETTINGS.winEvent,
  loseEvent: DEFAULT_SETTINGS.loseEvent,
  scoreEvent: DEFAULT_SETTINGS.scoreEvent,
  moves: DEFAULT_SETTINGS.moves.join(","),
  gameSize: String(DEFAULT_SETTINGS.gameSize),
  goal: String(DEFAULT_SETTINGS.goal),
  maxUndo: String(DEFAULT_SETTINGS.maxUndo),
  randSeed: String(DEFAULT_SETTINGS.randSeed),
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  textMethod: "SQUAREMERGE_TEXT_METHOD",
  moveMethod: "SQUAREMERGE_MOVE_METHOD",
  winEvent: "SQUAREMERGE_WIN_EVENT",
  loseEvent: "SQUAREMERGE_LOSE_EVENT",
  scoreEvent: "SQUAREMERGE_SCORE_EVENT",
  moves: "SQUAREMERGE_MOVES",
  gameSize: "SQUAREMERGE_GAME_SIZE",
  goal: "SQUAREMERGE_GOAL",
  maxUndo: "SQUAREMERGE_MAX_UNDO",
  randSeed: "SQUAREMERGE_RAND_SEED",
};

export function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((known) => known === key);
}
