import { Command } from "commander";
import { createInterface } from "node:readline";
import { Game } from "@hexbridge/game-hex";
import { CONFIG_HINTS, CONFIG_PARSERS, initConfig, setCliOverride } from "../config";
import { PlaySession, loadGameFile } from "../play/session";
import log from "../logger";

interface PlayOptions {
  size?: string;
  load?: string;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play a two-player game of Hex in this terminal")
    .option("-s, --size <n>", "Board size for a new game")
    .option("-l, --load <file>", "Continue a saved game")
    .action(async (opts: PlayOptions) => {
      if (opts.size !== undefined) {
        const size = CONFIG_PARSERS.boardSize(opts.size);
        if (size === undefined) {
          console.error(`Error: Invalid size "${opts.size}", expected ${CONFIG_HINTS.boardSize}`);
          process.exit(1);
        }
        setCliOverride("boardSize", size);
      }

      const config = await initConfig();

      let game: Game;
      if (opts.load !== undefined) {
        const loaded = await loadGameFile(opts.load, config.saveDir);
        if (!loaded.ok) {
          console.error(`Error: ${loaded.error}`);
          process.exit(1);
        }
        game = loaded.value;
      } else {
        game = Game.create(config.boardSize);
      }

      log.info({ size: game.board.size, loaded: opts.load !== undefined }, "game started");
      await runInteractive(
        new PlaySession(game, { showBridges: config.showBridges, saveDir: config.saveDir }, (text) =>
          console.log(text)
        )
      );
    });
}

async function runInteractive(session: PlaySession): Promise<void> {
  if (session.start() !== "continue") {
    return;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    rl.setPrompt(session.prompt());
    rl.prompt();
    for await (const line of rl) {
      const result = await session.handleLine(line);
      if (result !== "continue") {
        break;
      }
      rl.setPrompt(session.prompt());
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
