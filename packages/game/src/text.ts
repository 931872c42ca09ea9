import { MoveMethod, MoveMethods, TextMethod, TextMethods } from "./interfaces/capabilities";

const ENGLISH: Record<string, string> = {
  title: "Square Merge",
  help: "Slide the tiles with w/a/s/d or h/j/k/l. Equal tiles merge when they touch.",
  win: "You reached the goal tile!",
  lose: "No more moves. Game over.",
};

export class English extends TextMethod {
  getText(entry: string): string {
    return ENGLISH[entry] ?? "";
  }
}

/** Stock move method; carries no behaviour of its own. */
export class Slide extends MoveMethod {}

TextMethods.register(English, "English");
MoveMethods.register(Slide, "Slide");
