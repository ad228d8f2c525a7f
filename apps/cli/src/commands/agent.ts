import { Command } from "commander";
import { CONFIG_HINTS, CONFIG_PARSERS, initConfig, setCliOverride } from "../config";
import { createRegistry } from "../registry";
import { SeededRandom } from "@hexbridge/core";
import { playRandomGame } from "../agent/selfPlay";
import log from "../logger";

interface AgentOptions {
  game: string;
  count: string;
  size?: string;
  seed: string;
  moves?: boolean;
}

export function registerAgentCommand(program: Command): void {
  program
    .command("agent")
    .description("Play games headlessly between two random agents")
    .option("-g, --game <gameId>", "Game to play", "hex")
    .option("-n, --count <N>", "Number of games to play", "1")
    .option("-s, --size <n>", "Board size")
    .option("--seed <seed>", "Seed for the random agents", "hexbridge")
    .option("--moves", "Print every game's moves")
    .action(async (opts: AgentOptions) => {
      if (opts.size !== undefined) {
        const size = CONFIG_PARSERS.boardSize(opts.size);
        if (size === undefined) {
          console.error(`Error: Invalid size "${opts.size}", expected ${CONFIG_HINTS.boardSize}`);
          process.exit(1);
        }
        setCliOverride("boardSize", size);
      }
      const config = await initConfig();

      const gameModule = createRegistry().get(opts.game);
      if (!gameModule) {
        console.error(`Error: Unknown game "${opts.game}". Run "hexbridge games" to list games.`);
        process.exit(1);
      }

      const count = parseInt(opts.count, 10) || 1;
      const random = new SeededRandom(opts.seed);
      const wins: Record<string, number> = {};

      for (let i = 1; i <= count; i++) {
        const result = playRandomGame(
          gameModule,
          { gameId: gameModule.gameId, version: "0.1.0", settings: { size: config.boardSize } },
          random
        );
        const winner = result.outcome.winner ?? "draw";
        wins[winner] = (wins[winner] ?? 0) + 1;
        log.info({ game: i, winner, moves: result.moves.length }, "self-play game finished");

        console.log(`Game ${i}: ${winner} after ${result.moves.length} moves`);
        if (opts.moves) {
          console.log(`  ${result.moves.join(" ")}`);
        }
      }

      console.log("");
      for (const [player, total] of Object.entries(wins)) {
        console.log(`  ${player}: ${total}`);
      }
    });
}
