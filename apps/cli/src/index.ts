import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { isConfigKey, setCliOverride } from "./config";
import { registerConfigCommand } from "./commands/config";
import { registerRegistryCommands } from "./commands/registry";

program
  .name("squaremerge")
  .description("Inspect square-merge capability registries")
  .version("0.1.0", "-v, --version")
  .option("-s, --set <key=value...>", "Override a config value for this run")
  .hook("preAction", () => {
    const pairs: unknown = program.opts().set;
    if (!Array.isArray(pairs)) return;
    for (const pair of pairs) {
      const [key, ...rest] = String(pair).split("=");
      if (!isConfigKey(key) || rest.length === 0) {
        console.error(`Invalid override: "${String(pair)}". Use key=value with a known config key.`);
        process.exit(1);
      }
      setCliOverride(key, rest.join("="));
    }
  });

registerConfigCommand(program);
registerRegistryCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
