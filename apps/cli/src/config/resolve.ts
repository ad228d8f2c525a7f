import { CONFIG_HINTS, CONFIG_KEYS, CONFIG_PARSERS, ConfigData, ConfigKey, DEFAULTS, ENV_MAP } from "./defaults";
import { readConfigFile } from "./configFile";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends ConfigKey>(key: K, value: ConfigData[K]): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) {
    delete cliOverrides[key];
  }
}

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  /** Receives one message per ignored value. Defaults to stderr. */
  onWarning?: (message: string) => void;
}

/** Layer defaults, config file, environment and command-line overrides, in that order. */
export async function resolveConfig(options: ResolveOptions = {}): Promise<ConfigData> {
  const env = options.env ?? process.env;
  const warn = options.onWarning ?? ((message: string) => console.error(`Warning: ${message}`));
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "" && !applyValue(resolved, key, fileVal)) {
      warn(`ignoring ${key} ${JSON.stringify(fileVal)} from config file, expected ${CONFIG_HINTS[key]}`);
    }

    const envVal = env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "" && !applyValue(resolved, key, envVal)) {
      warn(`ignoring ${ENV_MAP[key]}=${JSON.stringify(envVal)}, expected ${CONFIG_HINTS[key]}`);
    }

    applyOverride(resolved, key);
  }

  return resolved;
}

function applyValue<K extends ConfigKey>(target: ConfigData, key: K, raw: unknown): boolean {
  const parsed = CONFIG_PARSERS[key](raw);
  if (parsed === undefined) {
    return false;
  }
  target[key] = parsed;
  return true;
}

function applyOverride<K extends ConfigKey>(target: ConfigData, key: K): void {
  const value = cliOverrides[key];
  if (value !== undefined) {
    target[key] = value;
  }
}
