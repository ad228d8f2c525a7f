import bunyan from "bunyan";
import { DEFAULT_BOARD_SIZE, MAX_BOARD_SIZE, MIN_BOARD_SIZE } from "@hexbridge/game-hex";

export interface ConfigData {
  /** Board size for new games */
  boardSize: number;
  logLevel: bunyan.LogLevelString;
  /** Directory that relative save and load paths start from */
  saveDir: string;
  /** Print the cells to defend after a bridge is attacked */
  showBridges: boolean;
}

export type ConfigKey = keyof ConfigData;

export const CONFIG_KEYS: ConfigKey[] = ["boardSize", "logLevel", "saveDir", "showBridges"];

export const DEFAULTS: ConfigData = {
  boardSize: DEFAULT_BOARD_SIZE,
  logLevel: "warn",
  saveDir: ".",
  showBridges: true,
};

export const ENV_MAP: Record<ConfigKey, string> = {
  boardSize: "HEXBRIDGE_BOARD_SIZE",
  logLevel: "LOG_LEVEL",
  saveDir: "HEXBRIDGE_SAVE_DIR",
  showBridges: "HEXBRIDGE_SHOW_BRIDGES",
};

const LOG_LEVELS: readonly bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

type ConfigParsers = { [K in ConfigKey]: (raw: unknown) => ConfigData[K] | undefined };

/**
 * Per-key parsers. Values come as strings from the environment and the
 * command line, and as JSON values from the config file; both are accepted.
 * `undefined` means the value is unusable.
 */
export const CONFIG_PARSERS: ConfigParsers = {
  boardSize(raw) {
    const size =
      typeof raw === "number"
        ? raw
        : typeof raw === "string" && /^[0-9]+$/.test(raw.trim())
          ? parseInt(raw, 10)
          : NaN;
    return Number.isInteger(size) && size >= MIN_BOARD_SIZE && size <= MAX_BOARD_SIZE
      ? size
      : undefined;
  },

  logLevel(raw) {
    if (typeof raw !== "string") return undefined;
    const level = raw.trim().toLowerCase();
    return LOG_LEVELS.find((l) => l === level);
  },

  saveDir(raw) {
    return typeof raw === "string" && raw.trim() !== "" ? raw.trim() : undefined;
  },

  showBridges(raw) {
    if (typeof raw === "boolean") return raw;
    if (raw === "true") return true;
    if (raw === "false") return false;
    return undefined;
  },
};

/** Hint printed next to a rejected value */
export const CONFIG_HINTS: Record<ConfigKey, string> = {
  boardSize: `an integer between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}`,
  logLevel: LOG_LEVELS.join(", "),
  saveDir: "a directory path",
  showBridges: "true or false",
};

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}
