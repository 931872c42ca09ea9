import { strict as assert } from "assert";
import { DEFAULT_SETTINGS, Moves, WinEvents, releaseGameOptions, resolveGameOptions } from "@squaremerge/game";
import { formatBase, formatOptions } from "./registry";

describe("formatBase", () => {
  it("should show label, description and children", () => {
    assert.deepEqual(formatBase(Moves), [
      "  Move",
      "    Type of possible interactions for the game.",
      "    Children: Down, Left, Right, Up",
    ]);
  });

  it("should show the argument signature", () => {
    assert.equal(formatBase(WinEvents)[0], "  WinEvent (rules)");
  });

  it("should mark a base without children", () => {
    const empty = { label: "Empty", description: "Nothing here.", signature: "", getChildren: () => [] };

    assert.equal(formatBase(empty)[2], "    Children: (none)");
  });
});

describe("formatOptions", () => {
  it("should print each capability's name and description", () => {
    const options = resolveGameOptions(DEFAULT_SETTINGS);
    const lines = formatOptions(options);
    releaseGameOptions(options);

    assert.equal(lines.length, 12);
    assert.equal(lines[0], "  gameSize    4");
    assert.equal(lines[3], "  textMethod  English" + " ".repeat(7) + 'Registered sub-class "English".');
    assert.equal(lines[8], "  move" + " ".repeat(8) + "Up" + " ".repeat(12) + 'Registered sub-class "Up".');
  });
});
