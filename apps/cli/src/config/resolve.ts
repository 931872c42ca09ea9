import { type ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults";
import { readConfigFile } from "./configFile";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

/** Layers defaults, file values, environment and overrides; empty strings are skipped. */
export function mergeConfig(
  fileConfig: Partial<ConfigData>,
  env: NodeJS.ProcessEnv,
  overrides: Partial<ConfigData> = {},
): ConfigData {
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "") {
      resolved[key] = fileVal;
    }

    const envVal = env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      resolved[key] = envVal;
    }

    const overrideVal = overrides[key];
    if (overrideVal !== undefined && overrideVal !== "") {
      resolved[key] = overrideVal;
    }
  }

  return resolved;
}

/** Where the resolved value of `key` comes from. */
export function getSource(
  key: keyof ConfigData,
  fileConfig: Partial<ConfigData>,
  env: NodeJS.ProcessEnv,
  overrides: Partial<ConfigData> = {},
): string {
  const overrideVal = overrides[key];
  if (overrideVal !== undefined && overrideVal !== "") return "command line";
  const envVal = env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  const fileVal = fileConfig[key];
  if (fileVal !== undefined && fileVal !== "") return "config file";
  return "default";
}

export async function resolveConfig(): Promise<ConfigData> {
  return mergeConfig(await readConfigFile(), process.env, cliOverrides);
}

export function getCliOverrides(): Partial<ConfigData> {
  return { ...cliOverrides };
}
