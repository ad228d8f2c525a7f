import { GameConfig } from "@hexbridge/core";
import { Color } from "./color";
import { Coords } from "./coords";
import { describeLoadError } from "./errors";
import { Game } from "./game";
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from "./hexCells";
import { ColorCode, encodeColor, loadGameFromJson } from "./serialize";

/** Board size when the match config does not name one */
export const DEFAULT_BOARD_SIZE = 11;

/**
 * The game-specific data stored in GameState.data. Plain JSON, so a state
 * can be persisted as-is; the union-find is rebuilt from `cells` on demand.
 */
export type HexData = {
  size: number;
  /** Stones as color codes, row-major (0 empty, 1 black, 2 white) */
  cells: ColorCode[][];
  /** Maps player id to their color */
  colors: Record<string, Color>;
  /** The color whose turn it is */
  activeColor: Color;
  /** The last move played */
  lastMove: Coords | null;
  /** Bridges attacked by the last move, as the cells the defender should answer on */
  attackedBridges: Coords[];
  /** The color that connected its edges, or null while the game is on */
  winnerColor: Color | null;
};

/** Hex is a complete information game: everyone sees the whole state. */
export type HexPublicData = HexData;

/** Read `settings.size`, falling back to {@link DEFAULT_BOARD_SIZE}. */
export function readBoardSize(config: GameConfig): number {
  const size = config.settings?.size ?? DEFAULT_BOARD_SIZE;
  if (
    typeof size !== "number" ||
    !Number.isInteger(size) ||
    size < MIN_BOARD_SIZE ||
    size > MAX_BOARD_SIZE
  ) {
    throw new Error(
      `Hex board size must be an integer between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}`
    );
  }
  return size;
}

export function emptyCells(size: number): ColorCode[][] {
  return Array.from({ length: size }, () => Array<ColorCode>(size).fill(0));
}

export function cloneCells(cells: ColorCode[][]): ColorCode[][] {
  return cells.map((row) => [...row]);
}

/** Rebuild a playable game from stored data. Throws if the data is corrupt. */
export function toGame(data: HexData): Game {
  const loaded = loadGameFromJson({
    size: data.size,
    currentPlayer: encodeColor(data.activeColor),
    cells: data.cells,
  });
  if (!loaded.ok) {
    throw new Error(`Corrupt hex state: ${describeLoadError(loaded.error)}`);
  }
  return loaded.value;
}
