import { Command } from "commander";
import {
  CAPABILITIES,
  type CapabilityInfo,
  type GameOptions,
  findCapability,
  releaseGameOptions,
  resolveGameOptions,
} from "@squaremerge/game";
import { resolveConfig, toGameSettings } from "../config";

interface Described {
  name(): string;
  info(): string;
}

export function formatBase(capability: CapabilityInfo): string[] {
  const signature = capability.signature ? ` (${capability.signature})` : "";
  const children = capability.getChildren();
  return [
    `  ${capability.label}${signature}`,
    `    ${capability.description}`,
    `    Children: ${children.length > 0 ? children.join(", ") : "(none)"}`,
  ];
}

function formatEntry(key: string, value: Described | null): string {
  if (!value) return `  ${key.padEnd(12)}(empty)`;
  return `  ${key.padEnd(12)}${value.name().padEnd(14)}${value.info()}`;
}

export function formatOptions(options: GameOptions): string[] {
  const lines = [
    `  ${"gameSize".padEnd(12)}${options.gameSize}`,
    `  ${"maxUndo".padEnd(12)}${options.maxUndo}`,
    `  ${"randSeed".padEnd(12)}${options.randSeed}`,
    formatEntry("textMethod", options.textMethod.get()),
    formatEntry("moveMethod", options.moveMethod.get()),
    formatEntry("winEvent", options.winEvent.get()),
    formatEntry("loseEvent", options.loseEvent.get()),
    formatEntry("scoreEvent", options.scoreEvent.get()),
  ];
  for (const move of options.moves) {
    lines.push(formatEntry("move", move.get()));
  }
  return lines;
}

export function registerRegistryCommands(program: Command): void {
  program
    .command("bases")
    .description("List base capabilities and their registered children")
    .action(() => {
      console.log("\nBase Capabilities:");
      console.log("──────────────────");
      for (const capability of CAPABILITIES) {
        for (const line of formatBase(capability)) console.log(line);
        console.log("");
      }
    });

  program
    .command("children <base>")
    .description("List the names registered for one base capability")
    .action((base: string) => {
      const capability = findCapability(base);
      if (!capability) {
        const labels = CAPABILITIES.map((c) => c.label).join(", ");
        console.error(`Unknown base: "${base}". Valid bases: ${labels}`);
        process.exit(1);
      }
      for (const name of capability.getChildren()) {
        console.log(name);
      }
    });

  program
    .command("options")
    .description("Resolve the configured game options")
    .action(async () => {
      const config = await resolveConfig();
      try {
        const options = resolveGameOptions(toGameSettings(config));
        console.log("\nGame Options:");
        console.log("─────────────");
        for (const line of formatOptions(options)) console.log(line);
        console.log("");
        releaseGameOptions(options);
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });
}
