import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { type ConfigData, isConfigKey } from "./defaults";

const CONFIG_DIR = join(homedir(), ".squaremerge");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export function getConfigPath(): string {
  return CONFIG_PATH;
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/** Keeps the known keys of a parsed config file; numbers are accepted as text. */
export function parseConfigData(parsed: unknown): Partial<ConfigData> {
  const data: Partial<ConfigData> = {};
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return data;
  }
  const entries: [string, unknown][] = Object.entries(parsed);
  for (const [key, value] of entries) {
    if (!isConfigKey(key)) continue;
    if (typeof value === "string") {
      data[key] = value;
    } else if (typeof value === "number") {
      data[key] = String(value);
    } else if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
      data[key] = value.join(",");
    }
  }
  return data;
}

export async function readConfigFile(path: string = CONFIG_PATH): Promise<Partial<ConfigData>> {
  try {
    const raw = await readFile(path, "utf-8");
    return parseConfigData(JSON.parse(raw));
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return {};
    }
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "squaremerge config set" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
  path: string = CONFIG_PATH,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
  path: string = CONFIG_PATH,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile(path);
  existing[key] = value;
  await writeConfigFile(existing, path);
  return existing;
}
