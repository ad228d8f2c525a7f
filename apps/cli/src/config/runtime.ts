import { ConfigData } from "./defaults";
import { resolveConfig } from "./resolve";
import { setLogLevel } from "../logger";

/** Resolve the configuration for a command and apply its log level. */
export async function initConfig(): Promise<ConfigData> {
  const config = await resolveConfig();
  setLogLevel(config.logLevel);
  return config;
}
