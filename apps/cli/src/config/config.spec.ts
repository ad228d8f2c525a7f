import { strict as assert } from "assert";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  clearCliOverrides,
  getConfigPath,
  initConfig,
  resolveConfig,
  setCliOverride,
  writeConfigFile,
} from "./index";
import { formatConfigList, setConfigValue } from "../commands/config";
import log, { setLogLevel } from "../logger";

describe("config", () => {
  let dir: string;
  let previousDir: string | undefined;
  let warnings: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hexbridge-config-"));
    previousDir = process.env.HEXBRIDGE_CONFIG_DIR;
    process.env.HEXBRIDGE_CONFIG_DIR = dir;
    warnings = [];
  });

  afterEach(async () => {
    clearCliOverrides();
    if (previousDir === undefined) {
      delete process.env.HEXBRIDGE_CONFIG_DIR;
    } else {
      process.env.HEXBRIDGE_CONFIG_DIR = previousDir;
    }
    await rm(dir, { recursive: true, force: true });
  });

  function resolveWith(env: NodeJS.ProcessEnv) {
    return resolveConfig({ env, onWarning: (message) => warnings.push(message) });
  }

  it("should fall back to defaults without a config file", async () => {
    assert.equal(getConfigPath(), join(dir, "config.json"));
    assert.deepEqual(await resolveWith({}), {
      boardSize: 11,
      logLevel: "warn",
      saveDir: ".",
      showBridges: true,
    });
  });

  it("should layer file, environment and command line", async () => {
    await writeConfigFile({ boardSize: 7, showBridges: false, saveDir: "/tmp/games" });

    const fromFile = await resolveWith({});
    assert.equal(fromFile.boardSize, 7);
    assert.equal(fromFile.showBridges, false);
    assert.equal(fromFile.saveDir, "/tmp/games");

    const fromEnv = await resolveWith({ HEXBRIDGE_BOARD_SIZE: "9", LOG_LEVEL: "DEBUG" });
    assert.equal(fromEnv.boardSize, 9);
    assert.equal(fromEnv.logLevel, "debug");

    setCliOverride("boardSize", 5);
    const fromCli = await resolveWith({ HEXBRIDGE_BOARD_SIZE: "9" });
    assert.equal(fromCli.boardSize, 5);
    assert.deepEqual(warnings, []);
  });

  it("should ignore unusable values with a warning", async () => {
    await writeConfigFile({ boardSize: "big" });
    const config = await resolveWith({ HEXBRIDGE_SHOW_BRIDGES: "maybe", HEXBRIDGE_BOARD_SIZE: "42" });

    assert.equal(config.boardSize, 11);
    assert.equal(config.showBridges, true);
    assert.deepEqual(warnings, [
      'ignoring boardSize "big" from config file, expected an integer between 2 and 19',
      'ignoring HEXBRIDGE_BOARD_SIZE="42", expected an integer between 2 and 19',
      'ignoring HEXBRIDGE_SHOW_BRIDGES="maybe", expected true or false',
    ]);
  });

  it("should store parsed values", async () => {
    assert.equal(await setConfigValue("boardSize", "13"), true);
    assert.equal(await setConfigValue("showBridges", "false"), true);
    assert.equal(await setConfigValue("showBridges", "maybe"), false);

    const stored: unknown = JSON.parse(await readFile(getConfigPath(), "utf-8"));
    assert.deepEqual(stored, { boardSize: 13, showBridges: false });
  });

  it("should list values with their sources", async () => {
    await writeConfigFile({ boardSize: 13 });
    const lines = (await formatConfigList({ LOG_LEVEL: "info" })).split("\n");

    assert.equal(lines[1], `Config file: ${join(dir, "config.json")}`);
    assert.deepEqual(lines.slice(3, 7), [
      "  boardSize: 13  (config file)",
      "  logLevel: info  (env: LOG_LEVEL)",
      "  saveDir: .  (default)",
      "  showBridges: true  (default)",
    ]);
  });

  it("should apply the resolved log level when a command starts", async () => {
    const previousLevel = process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL;
    await writeConfigFile({ logLevel: "error" });
    try {
      const config = await initConfig();
      assert.equal(config.logLevel, "error");
      assert.equal(log.level(), 50);
    } finally {
      if (previousLevel !== undefined) {
        process.env.LOG_LEVEL = previousLevel;
      }
      setLogLevel("warn");
    }
  });
});
