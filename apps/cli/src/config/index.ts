export type { ConfigData, ConfigKey } from "./defaults";
export {
  CONFIG_HINTS,
  CONFIG_KEYS,
  CONFIG_PARSERS,
  DEFAULTS,
  ENV_MAP,
  isConfigKey,
} from "./defaults";
export type { ConfigFileData } from "./configFile";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export { resolveConfig, setCliOverride, clearCliOverrides } from "./resolve";
export type { ResolveOptions } from "./resolve";
export { initConfig } from "./runtime";
