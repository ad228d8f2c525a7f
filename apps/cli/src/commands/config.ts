import { Command } from "commander";
import { createInterface } from "node:readline";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  writeConfigFile,
  getConfigPath,
  CONFIG_HINTS,
  CONFIG_KEYS,
  CONFIG_PARSERS,
  ENV_MAP,
  ConfigFileData,
  ConfigKey,
  isConfigKey,
} from "../config";

function createPrompter() {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    ask(prompt: string): Promise<string> {
      if (closed) return Promise.resolve("");
      return new Promise((resolve) => {
        rl.question(prompt, (answer) => resolve(answer));
        rl.once("close", () => resolve(""));
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.hexbridge/config.json)");

  configCmd.action(async () => {
    await runWizard();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) {
        console.error(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
        process.exit(1);
      }
      if (!(await setConfigValue(key, value))) {
        console.error(`Invalid value for ${key}: "${value}". Expected ${CONFIG_HINTS[key]}`);
        process.exit(1);
      }
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isConfigKey(key)) {
        console.error(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
        process.exit(1);
      }
      const resolved = await resolveConfig();
      console.log(String(resolved[key]));
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      console.log(await formatConfigList());
    });
}

/** Parse and store one value. False if the value does not parse for the key. */
export async function setConfigValue<K extends ConfigKey>(key: K, raw: string): Promise<boolean> {
  const parsed = CONFIG_PARSERS[key](raw);
  if (parsed === undefined) {
    return false;
  }
  await updateConfigFile(key, parsed);
  return true;
}

export async function runWizard(): Promise<void> {
  const existing = await readConfigFile();
  const current = await resolveConfig();
  const prompter = createPrompter();

  console.log("\nHexbridge Configuration");
  console.log("───────────────────────\n");

  try {
    const data: ConfigFileData = { ...existing };
    for (const key of ["boardSize", "saveDir", "showBridges"] as const) {
      const answer = (await prompter.ask(`${key} [${String(current[key])}]: `)).trim();
      if (answer === "") continue;
      if (!storeAnswer(data, key, answer)) {
        console.log(`  Ignored "${answer}", expected ${CONFIG_HINTS[key]}`);
      }
    }

    await writeConfigFile(data);
    console.log(`\nConfig saved to ${getConfigPath()}\n`);

    const resolved = await resolveConfig();
    for (const key of CONFIG_KEYS) {
      console.log(`  ${key}: ${String(resolved[key])}`);
    }
    console.log("");
  } finally {
    prompter.close();
  }
}

function storeAnswer<K extends ConfigKey>(data: ConfigFileData, key: K, answer: string): boolean {
  const parsed = CONFIG_PARSERS[key](answer);
  if (parsed === undefined) {
    return false;
  }
  data[key] = parsed;
  return true;
}

export async function formatConfigList(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const resolved = await resolveConfig({ env });
  const fileData = await readConfigFile();

  const lines = [`\nConfig file: ${getConfigPath()}`, "──────────────────────────────────────"];
  for (const key of CONFIG_KEYS) {
    lines.push(`  ${key}: ${String(resolved[key])}  (${getSource(key, fileData, env)})`);
  }
  lines.push("");
  return lines.join("\n");
}

function getSource(key: ConfigKey, fileData: ConfigFileData, env: NodeJS.ProcessEnv): string {
  const envVal = env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}
