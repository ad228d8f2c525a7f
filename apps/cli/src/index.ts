import dotenv from "dotenv";
dotenv.config();

import { program } from "commander";
import { registerConfigCommand } from "./commands/config";
import { registerPlayCommand } from "./commands/play";
import { registerGamesCommand } from "./commands/games";
import { registerAgentCommand } from "./commands/agent";
import log from "./logger";

program
  .name("hexbridge")
  .description("Play Hex in the terminal, with hints for attacked bridges")
  .version("0.1.0", "-v, --version");

registerPlayCommand(program);
registerGamesCommand(program);
registerAgentCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((err: unknown) => {
  log.fatal({ err }, "command failed");
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
