import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigData, ConfigKey } from "./defaults";

/** Raw contents of the config file; values are checked when resolved. */
export type ConfigFileData = Partial<Record<ConfigKey, unknown>>;

export function getConfigDir(): string {
  return process.env.HEXBRIDGE_CONFIG_DIR || join(homedir(), ".hexbridge");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

export async function readConfigFile(): Promise<ConfigFileData> {
  const path = getConfigPath();
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "hexbridge config" to recreate it.`
      );
      return {};
    }
    throw err;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}

export async function writeConfigFile(data: ConfigFileData): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile<K extends ConfigKey>(
  key: K,
  value: ConfigData[K]
): Promise<ConfigFileData> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
