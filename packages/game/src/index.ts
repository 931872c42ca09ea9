import "./moves";
import "./text";
import "./events";

export * from "./interfaces/capabilities";
export * from "./state";
export { Up, Down, Left, Right } from "./moves";
export { English, Slide } from "./text";
export { ReachTile, NoEmptyCell, TileSum } from "./events";
export { DEFAULT_SETTINGS, resolveGameOptions, releaseGameOptions } from "./options";
export type { GameSettings, GameOptions } from "./options";
