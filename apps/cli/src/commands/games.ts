import { Command } from "commander";
import { createRegistry } from "../registry";

export function formatGameList(registry = createRegistry()): string {
  const lines = ["", "Available Games:", "────────────────"];
  for (const game of registry.list()) {
    lines.push(`  ${game.name} (${game.gameId})`);
    lines.push(`    ${game.description}`);
    const players =
      game.minPlayers === game.maxPlayers ? `${game.minPlayers}` : `${game.minPlayers}-${game.maxPlayers}`;
    lines.push(`    Players: ${players}`);
    lines.push("");
  }
  return lines.join("\n");
}

export function registerGamesCommand(program: Command): void {
  program
    .command("games")
    .description("List available games")
    .action(() => {
      console.log(formatGameList());
    });
}
