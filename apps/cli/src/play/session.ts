import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import {
  Color,
  Coords,
  Game,
  Result,
  describeAttackedBridges,
  describeInvalidMove,
  describeLoadError,
  err,
  loadGameFromString,
  ok,
  renderBoard,
  saveGameToString,
} from "@hexbridge/game-hex";
import log from "../logger";
import { USAGE, parseCommand } from "./input";

export interface SessionOptions {
  showBridges: boolean;
  /** Relative save paths start here */
  saveDir: string;
}

/** What the input loop does after a line. */
export type LineResult = "continue" | "quit" | "finished";

const PLAYER_NAMES: Record<Color, string> = {
  black: "BLACK",
  white: "WHITE",
};

/**
 * One interactive game. Output goes through `print` a line (or a block of
 * lines) at a time, so the readline loop and tests share the same flow.
 */
export class PlaySession {
  private moves = 0;

  constructor(
    readonly game: Game,
    private readonly options: SessionOptions,
    private readonly print: (text: string) => void
  ) {}

  /** Print the opening board, plus the result if the game is already over. */
  start(): LineResult {
    this.print(renderBoard(this.game.board));
    const winner = this.game.getWinner();
    if (winner !== null) {
      this.print(`${PLAYER_NAMES[winner]} wins`);
      return "finished";
    }
    return "continue";
  }

  prompt(): string {
    const player = this.game.getCurrentPlayer();
    return player === null
      ? "> "
      : `${PLAYER_NAMES[player]}: Please enter the coordinates for your next move: `;
  }

  async handleLine(line: string): Promise<LineResult> {
    const parsed = parseCommand(line, this.game.board.size);
    if (!parsed.ok) {
      log.debug({ input: line }, "unparsable input");
      this.print(`Error: ${parsed.error}`);
      return "continue";
    }

    const command = parsed.value;
    switch (command.kind) {
      case "help":
        this.print(USAGE);
        return "continue";
      case "quit":
        log.info({ moves: this.moves }, "game abandoned");
        return "quit";
      case "save":
        await this.save(command.path);
        return "continue";
      case "move":
        return this.play(command.coords);
    }
  }

  private play(coords: Coords): LineResult {
    const player = this.game.getCurrentPlayer();
    const played = this.game.play(coords);
    if (!played.ok) {
      log.debug({ coords, reason: played.error.kind }, "move rejected");
      this.print(`Error: ${describeInvalidMove(played.error)}`);
      return "continue";
    }

    this.moves++;
    log.info({ player, coords, moves: this.moves }, "move played");
    this.print(renderBoard(this.game.board));

    const winner = this.game.getWinner();
    if (winner !== null) {
      log.info({ winner, moves: this.moves }, "game finished");
      this.print(`${PLAYER_NAMES[winner]} wins`);
      return "finished";
    }

    if (this.options.showBridges) {
      const hint = describeAttackedBridges(this.game.board.findAttackedBridges(coords));
      if (hint !== null) {
        this.print(hint);
      }
    }
    return "continue";
  }

  private async save(path: string): Promise<void> {
    const target = resolve(this.options.saveDir, path);
    try {
      await writeFile(target, saveGameToString(this.game) + "\n", "utf-8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn({ path: target, err: error }, "save failed");
      this.print(`Error: Could not save to ${target}: ${reason}`);
      return;
    }
    log.info({ path: target }, "game saved");
    this.print(`Saved to ${target}`);
  }
}

/** Read a saved game. Relative paths start at `saveDir`. */
export async function loadGameFile(path: string, saveDir: string): Promise<Result<Game, string>> {
  const target = resolve(saveDir, path);
  let text: string;
  try {
    text = await readFile(target, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(`Could not read ${target}: ${reason}`);
  }

  const loaded = loadGameFromString(text);
  if (!loaded.ok) {
    log.warn({ path: target, reason: loaded.error.kind }, "load failed");
    return err(describeLoadError(loaded.error));
  }
  log.info({ path: target, size: loaded.value.board.size }, "game loaded");
  return ok(loaded.value);
}
